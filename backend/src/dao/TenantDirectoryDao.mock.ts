import type { Administrator, NewAdministrator } from "../model/Administrator";
import type { NewOrganization, Organization } from "../model/Organization";
import type { OrganizationUpdates, TenantDirectoryDao, UpdateOrganizationResult } from "./TenantDirectoryDao";
import { randomUUID } from "node:crypto";
import { vi } from "vitest";

export function mockTenantDirectoryDao(partial?: Partial<TenantDirectoryDao>): TenantDirectoryDao {
	return {
		findOrgBySlug: vi.fn(),
		findOrgById: vi.fn(),
		findOrgByStorageResourceName: vi.fn(),
		findOrgByAdminId: vi.fn(),
		findAdminByEmail: vi.fn(),
		findAdminById: vi.fn(),
		listOrgs: vi.fn(),
		listAdmins: vi.fn(),
		createOrgIfAbsent: vi.fn(),
		createAdminIfAbsent: vi.fn(),
		updateOrg: vi.fn(),
		linkAdminToOrg: vi.fn(),
		deleteOrg: vi.fn(),
		deleteAdmin: vi.fn(),
		...partial,
	};
}

export interface MemoryTenantDirectory {
	readonly dao: TenantDirectoryDao;
	readonly organizations: Map<string, Organization>;
	readonly administrators: Map<string, Administrator>;
}

/**
 * Directory held in maps, with the same unique slug and email rules as the database indexes.
 * Methods are vi.fn spies around the real behavior.
 */
export function createMemoryTenantDirectory(now: () => Date = () => new Date()): MemoryTenantDirectory {
	const organizations = new Map<string, Organization>();
	const administrators = new Map<string, Administrator>();

	function orgWithSlug(slug: string, exceptId?: string): Organization | undefined {
		return [...organizations.values()].find(org => org.slug === slug && org.id !== exceptId);
	}

	const dao: TenantDirectoryDao = {
		findOrgBySlug: vi.fn(async (slug: string) => orgWithSlug(slug)),
		findOrgById: vi.fn(async (id: string) => organizations.get(id)),
		findOrgByStorageResourceName: vi.fn(async (name: string) =>
			[...organizations.values()].find(org => org.storageResourceName === name),
		),
		findOrgByAdminId: vi.fn(async (adminId: string) =>
			[...organizations.values()].find(org => org.adminId === adminId),
		),
		findAdminByEmail: vi.fn(async (email: string) =>
			[...administrators.values()].find(admin => admin.email === email.toLowerCase()),
		),
		findAdminById: vi.fn(async (id: string) => administrators.get(id)),
		listOrgs: vi.fn(async () => [...organizations.values()]),
		listAdmins: vi.fn(async () => [...administrators.values()]),
		createOrgIfAbsent: vi.fn(async (newOrg: NewOrganization) => {
			if (orgWithSlug(newOrg.slug)) {
				return;
			}
			const createdAt = now();
			const org: Organization = { ...newOrg, id: randomUUID(), createdAt, updatedAt: createdAt };
			organizations.set(org.id, org);
			return org;
		}),
		createAdminIfAbsent: vi.fn(async (newAdmin: NewAdministrator) => {
			const email = newAdmin.email.toLowerCase();
			if ([...administrators.values()].some(admin => admin.email === email)) {
				return;
			}
			const admin: Administrator = {
				id: randomUUID(),
				email,
				passwordHash: newAdmin.passwordHash,
				organizationId: null,
				createdAt: now(),
			};
			administrators.set(admin.id, admin);
			return admin;
		}),
		updateOrg: vi.fn(async (id: string, updates: OrganizationUpdates): Promise<UpdateOrganizationResult> => {
			const org = organizations.get(id);
			if (!org) {
				return "not_found";
			}
			if (updates.slug !== undefined && orgWithSlug(updates.slug, id)) {
				return "slug_taken";
			}
			organizations.set(id, { ...org, ...updates, updatedAt: now() });
			return "updated";
		}),
		linkAdminToOrg: vi.fn(async (adminId: string, orgId: string) => {
			const admin = administrators.get(adminId);
			if (!admin) {
				return false;
			}
			administrators.set(adminId, { ...admin, organizationId: orgId });
			return true;
		}),
		deleteOrg: vi.fn(async (id: string) => organizations.delete(id)),
		deleteAdmin: vi.fn(async (id: string) => administrators.delete(id)),
	};

	return { dao, organizations, administrators };
}
