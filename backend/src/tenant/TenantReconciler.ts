import type { TenantDirectoryDao } from "../dao/TenantDirectoryDao";
import type { TenantStorageDao } from "../dao/TenantStorageDao";
import type { Organization } from "../model/Organization";
import { getLog } from "../util/Logger";
import {
	AdministratorInUseError,
	AdministratorNotFoundError,
	InvalidNameError,
	StorageResourceInUseError,
} from "./TenantErrors";
import { isStorageResourceName } from "orgspace-common";

const log = getLog(import.meta);

export interface TenantReconcilerDeps {
	directory: TenantDirectoryDao;
	storage: TenantStorageDao;
}

export interface OrphanedAdministrator {
	adminId: string;
	email: string;
	/** The organization the record points at, if the back-link was written */
	organizationId: string | null;
}

export interface OrganizationIssue {
	orgId: string;
	slug: string;
	storageResourceName: string;
	adminId: string;
}

/**
 * State left behind by create, rename and delete sequences that did not run to completion,
 * and by renames, which keep the previous storage resource.
 */
export interface ReconciliationReport {
	/** Storage resources no organization references */
	orphanedStorageResources: Array<string>;
	/** Administrators no organization names as its owner */
	orphanedAdministrators: Array<OrphanedAdministrator>;
	organizationsMissingStorage: Array<OrganizationIssue>;
	organizationsMissingAdministrator: Array<OrganizationIssue>;
}

export function isCleanReport(report: ReconciliationReport): boolean {
	return (
		report.orphanedStorageResources.length === 0 &&
		report.orphanedAdministrators.length === 0 &&
		report.organizationsMissingStorage.length === 0 &&
		report.organizationsMissingAdministrator.length === 0
	);
}

function toIssue(org: Organization): OrganizationIssue {
	return { orgId: org.id, slug: org.slug, storageResourceName: org.storageResourceName, adminId: org.adminId };
}

/**
 * Detects partial tenant state and removes it on request. Nothing is removed automatically.
 */
export class TenantReconciler {
	constructor(private readonly deps: TenantReconcilerDeps) {}

	async audit(): Promise<ReconciliationReport> {
		const { directory, storage } = this.deps;
		const [orgs, admins, resources] = await Promise.all([
			directory.listOrgs(),
			directory.listAdmins(),
			storage.listResources(),
		]);

		const ownerIds = new Set(orgs.map(org => org.adminId));
		const adminIds = new Set(admins.map(admin => admin.id));
		const referencedResources = new Set(orgs.map(org => org.storageResourceName));
		const existingResources = new Set(resources);

		const report: ReconciliationReport = {
			orphanedStorageResources: resources.filter(name => !referencedResources.has(name)),
			orphanedAdministrators: admins
				.filter(admin => !ownerIds.has(admin.id))
				.map(admin => ({ adminId: admin.id, email: admin.email, organizationId: admin.organizationId })),
			organizationsMissingStorage: orgs.filter(org => !existingResources.has(org.storageResourceName)).map(toIssue),
			organizationsMissingAdministrator: orgs.filter(org => !adminIds.has(org.adminId)).map(toIssue),
		};

		log.info(
			{
				organizations: orgs.length,
				orphanedStorageResources: report.orphanedStorageResources.length,
				orphanedAdministrators: report.orphanedAdministrators.length,
				organizationsMissingStorage: report.organizationsMissingStorage.length,
				organizationsMissingAdministrator: report.organizationsMissingAdministrator.length,
			},
			"Audited %d organizations",
			orgs.length,
		);
		return report;
	}

	/**
	 * Drop a storage resource no organization references, such as the one a rename left behind.
	 *
	 * Run it only while no create or rename is in flight: a create's new resource has no
	 * organization until its last step, and would be dropped.
	 */
	async reclaimStorageResource(resourceName: string): Promise<void> {
		if (!isStorageResourceName(resourceName)) {
			throw new InvalidNameError(resourceName, "not a tenant storage resource name");
		}
		const owner = await this.deps.directory.findOrgByStorageResourceName(resourceName);
		if (owner) {
			throw new StorageResourceInUseError(resourceName, owner.id);
		}
		await this.deps.storage.drop(resourceName);
		log.info({ resourceName }, "Reclaimed storage resource %s", resourceName);
	}

	/**
	 * Delete an administrator that owns no organization. Like reclaimStorageResource, this
	 * must not run while a create is in flight.
	 */
	async reclaimAdministrator(adminId: string): Promise<void> {
		const { directory } = this.deps;
		const admin = await directory.findAdminById(adminId);
		if (!admin) {
			throw new AdministratorNotFoundError(adminId);
		}
		const org = await directory.findOrgByAdminId(admin.id);
		if (org) {
			throw new AdministratorInUseError(admin.id, org.id);
		}
		await directory.deleteAdmin(admin.id);
		log.info({ adminId, email: admin.email }, "Reclaimed administrator %s", adminId);
	}
}
