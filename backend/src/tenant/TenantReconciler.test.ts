import { createMemoryTenantDirectory, type MemoryTenantDirectory } from "../dao/TenantDirectoryDao.mock";
import { createMemoryTenantStorage, type MemoryTenantStorage } from "../dao/TenantStorageDao.mock";
import {
	AdministratorInUseError,
	AdministratorNotFoundError,
	InvalidNameError,
	StorageResourceInUseError,
} from "./TenantErrors";
import { TenantProvisioningEngine } from "./TenantProvisioningEngine";
import { isCleanReport, TenantReconciler } from "./TenantReconciler";
import { beforeEach, describe, expect, it, vi } from "vitest";

const NOW = new Date("2026-03-01T09:00:00.000Z");
const PASSWORD_HASH = "$argon2id$v=19$m=1024,t=1,p=1$c2FsdA$aGFzaA";
const MISSING_ID = "5b0e9c1d-3a4f-4e2b-8c7d-6f1a2b3c4d5e";

describe("TenantReconciler", () => {
	let directory: MemoryTenantDirectory;
	let storage: MemoryTenantStorage;
	let engine: TenantProvisioningEngine;
	let reconciler: TenantReconciler;

	beforeEach(() => {
		directory = createMemoryTenantDirectory(() => NOW);
		storage = createMemoryTenantStorage(() => NOW);
		engine = new TenantProvisioningEngine({
			directory: directory.dao,
			storage: storage.dao,
			schemaVersion: 1,
			renameBatchSize: 500,
			clock: () => NOW,
		});
		reconciler = new TenantReconciler({ directory: directory.dao, storage: storage.dao });
	});

	describe("audit", () => {
		it("should report nothing for fully provisioned organizations", async () => {
			await engine.create("Acme Inc", "owner@acme.test", PASSWORD_HASH);
			await engine.create("Globex", "owner@globex.test", PASSWORD_HASH);

			const report = await reconciler.audit();

			expect(report).toEqual({
				orphanedStorageResources: [],
				orphanedAdministrators: [],
				organizationsMissingStorage: [],
				organizationsMissingAdministrator: [],
			});
			expect(isCleanReport(report)).toBe(true);
		});

		it("should report the storage resource a rename left behind", async () => {
			await engine.create("Acme Inc", "owner@acme.test", PASSWORD_HASH);
			await engine.rename("acme-inc", "Acme Corp");

			const report = await reconciler.audit();

			expect(report.orphanedStorageResources).toEqual(["tenant_acme-inc"]);
			expect(isCleanReport(report)).toBe(false);
		});

		it("should report what a create that failed after the administrator insert left behind", async () => {
			vi.mocked(directory.dao.createOrgIfAbsent).mockRejectedValueOnce(new Error("connection terminated"));

			await expect(engine.create("Acme Inc", "owner@acme.test", PASSWORD_HASH)).rejects.toThrow(
				"connection terminated",
			);
			const report = await reconciler.audit();

			const [admin] = [...directory.administrators.values()];
			expect(report.orphanedStorageResources).toEqual(["tenant_acme-inc"]);
			expect(report.orphanedAdministrators).toEqual([
				{ adminId: admin.id, email: "owner@acme.test", organizationId: null },
			]);
			expect(report.organizationsMissingStorage).toEqual([]);
		});

		it("should not report an owner whose back-link was never written", async () => {
			vi.mocked(directory.dao.linkAdminToOrg).mockRejectedValueOnce(new Error("connection terminated"));

			await expect(engine.create("Acme Inc", "owner@acme.test", PASSWORD_HASH)).rejects.toThrow(
				"connection terminated",
			);

			expect(isCleanReport(await reconciler.audit())).toBe(true);
		});

		it("should report organizations whose storage or administrator is gone", async () => {
			const view = await engine.create("Acme Inc", "owner@acme.test", PASSWORD_HASH);
			const org = directory.organizations.get(view.id);
			await storage.dao.drop("tenant_acme-inc");
			await directory.dao.deleteAdmin(org?.adminId ?? "");

			const report = await reconciler.audit();

			const issue = {
				orgId: view.id,
				slug: "acme-inc",
				storageResourceName: "tenant_acme-inc",
				adminId: org?.adminId,
			};
			expect(report.organizationsMissingStorage).toEqual([issue]);
			expect(report.organizationsMissingAdministrator).toEqual([issue]);
			expect(report.orphanedStorageResources).toEqual([]);
		});
	});

	describe("reclaimStorageResource", () => {
		it("should drop an unreferenced resource", async () => {
			await engine.create("Acme Inc", "owner@acme.test", PASSWORD_HASH);
			await engine.rename("acme-inc", "Acme Corp");

			await reconciler.reclaimStorageResource("tenant_acme-inc");

			expect(storage.resources.has("tenant_acme-inc")).toBe(false);
			expect(storage.resources.has("tenant_acme-corp")).toBe(true);
			expect(isCleanReport(await reconciler.audit())).toBe(true);
		});

		it("should refuse a resource an organization still uses", async () => {
			const view = await engine.create("Acme Inc", "owner@acme.test", PASSWORD_HASH);

			const error = await reconciler.reclaimStorageResource("tenant_acme-inc").then(
				() => undefined,
				(err: unknown) => err,
			);

			expect(error).toBeInstanceOf(StorageResourceInUseError);
			expect(error instanceof StorageResourceInUseError && error.organizationId).toBe(view.id);
			expect(storage.resources.has("tenant_acme-inc")).toBe(true);
		});

		it("should refuse a name outside the tenant namespace", async () => {
			await expect(reconciler.reclaimStorageResource("organizations")).rejects.toBeInstanceOf(InvalidNameError);
			expect(storage.dao.drop).not.toHaveBeenCalled();
		});
	});

	describe("reclaimAdministrator", () => {
		it("should delete an administrator that owns nothing", async () => {
			vi.mocked(directory.dao.createOrgIfAbsent).mockRejectedValueOnce(new Error("connection terminated"));
			await expect(engine.create("Acme Inc", "owner@acme.test", PASSWORD_HASH)).rejects.toThrow();
			const [admin] = [...directory.administrators.values()];

			await reconciler.reclaimAdministrator(admin.id);

			expect(directory.administrators.size).toBe(0);
		});

		it("should refuse an administrator that owns an organization", async () => {
			const view = await engine.create("Acme Inc", "owner@acme.test", PASSWORD_HASH);
			const [admin] = [...directory.administrators.values()];

			await expect(reconciler.reclaimAdministrator(admin.id)).rejects.toThrow(AdministratorInUseError);
			expect(directory.administrators.has(admin.id)).toBe(true);
			expect(directory.organizations.has(view.id)).toBe(true);
		});

		it("should fail for an unknown administrator", async () => {
			await expect(reconciler.reclaimAdministrator(MISSING_ID)).rejects.toThrow(AdministratorNotFoundError);
		});
	});
});
