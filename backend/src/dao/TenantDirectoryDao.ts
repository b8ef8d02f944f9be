import type { Administrator, NewAdministrator } from "../model/Administrator";
import { defineAdministrators } from "../model/Administrator";
import type { NewOrganization, Organization } from "../model/Organization";
import { defineOrganizations } from "../model/Organization";
import { type Sequelize, UniqueConstraintError } from "sequelize";
import { z } from "zod";

const UuidSchema = z.string().uuid();

export type OrganizationUpdates = Partial<Pick<Organization, "name" | "slug" | "storageResourceName">>;

export type UpdateOrganizationResult = "updated" | "not_found" | "slug_taken";

/**
 * Data Access Object for the tenant directory: organizations and their administrators.
 * Uniqueness of slugs and emails is enforced by unique indexes, not by this code.
 */
export interface TenantDirectoryDao {
	findOrgBySlug(slug: string): Promise<Organization | undefined>;

	findOrgById(id: string): Promise<Organization | undefined>;

	findOrgByStorageResourceName(storageResourceName: string): Promise<Organization | undefined>;

	/**
	 * The organization owned by an administrator, whether or not the back-link was written.
	 */
	findOrgByAdminId(adminId: string): Promise<Organization | undefined>;

	/**
	 * Case-insensitive; emails are stored lower-cased.
	 */
	findAdminByEmail(email: string): Promise<Administrator | undefined>;

	findAdminById(id: string): Promise<Administrator | undefined>;

	listOrgs(): Promise<Array<Organization>>;

	listAdmins(): Promise<Array<Administrator>>;

	/**
	 * Insert unless another organization already has the slug, in which case resolve undefined.
	 */
	createOrgIfAbsent(newOrg: NewOrganization): Promise<Organization | undefined>;

	/**
	 * Insert unless another administrator already has the email, in which case resolve undefined.
	 */
	createAdminIfAbsent(newAdmin: NewAdministrator): Promise<Administrator | undefined>;

	updateOrg(id: string, updates: OrganizationUpdates): Promise<UpdateOrganizationResult>;

	/**
	 * @returns whether the administrator exists
	 */
	linkAdminToOrg(adminId: string, orgId: string): Promise<boolean>;

	/**
	 * @returns whether a record was removed
	 */
	deleteOrg(id: string): Promise<boolean>;

	/**
	 * @returns whether a record was removed
	 */
	deleteAdmin(id: string): Promise<boolean>;
}

function isUuid(value: string): boolean {
	return UuidSchema.safeParse(value).success;
}

export function createTenantDirectoryDao(sequelize: Sequelize): TenantDirectoryDao {
	const Organizations = defineOrganizations(sequelize);
	const Administrators = defineAdministrators(sequelize);

	return {
		findOrgBySlug,
		findOrgById,
		findOrgByStorageResourceName,
		findOrgByAdminId,
		findAdminByEmail,
		findAdminById,
		listOrgs,
		listAdmins,
		createOrgIfAbsent,
		createAdminIfAbsent,
		updateOrg,
		linkAdminToOrg,
		deleteOrg,
		deleteAdmin,
	};

	async function findOrgBySlug(slug: string): Promise<Organization | undefined> {
		const result = await Organizations.findOne({ where: { slug } });
		return result ? (result.get({ plain: true }) as Organization) : undefined;
	}

	async function findOrgById(id: string): Promise<Organization | undefined> {
		if (!isUuid(id)) {
			return;
		}
		const result = await Organizations.findByPk(id);
		return result ? (result.get({ plain: true }) as Organization) : undefined;
	}

	async function findOrgByStorageResourceName(storageResourceName: string): Promise<Organization | undefined> {
		const result = await Organizations.findOne({ where: { storageResourceName } });
		return result ? (result.get({ plain: true }) as Organization) : undefined;
	}

	async function findOrgByAdminId(adminId: string): Promise<Organization | undefined> {
		if (!isUuid(adminId)) {
			return;
		}
		const result = await Organizations.findOne({ where: { adminId } });
		return result ? (result.get({ plain: true }) as Organization) : undefined;
	}

	async function findAdminByEmail(email: string): Promise<Administrator | undefined> {
		const result = await Administrators.findOne({ where: { email: email.toLowerCase() } });
		return result ? (result.get({ plain: true }) as Administrator) : undefined;
	}

	async function findAdminById(id: string): Promise<Administrator | undefined> {
		if (!isUuid(id)) {
			return;
		}
		const result = await Administrators.findByPk(id);
		return result ? (result.get({ plain: true }) as Administrator) : undefined;
	}

	async function listOrgs(): Promise<Array<Organization>> {
		const results = await Organizations.findAll({ order: [["createdAt", "ASC"]] });
		return results.map(result => result.get({ plain: true }) as Organization);
	}

	async function listAdmins(): Promise<Array<Administrator>> {
		const results = await Administrators.findAll({ order: [["createdAt", "ASC"]] });
		return results.map(result => result.get({ plain: true }) as Administrator);
	}

	async function createOrgIfAbsent(newOrg: NewOrganization): Promise<Organization | undefined> {
		try {
			const result = await Organizations.create({
				name: newOrg.name,
				slug: newOrg.slug,
				storageResourceName: newOrg.storageResourceName,
				adminId: newOrg.adminId,
			});
			return result.get({ plain: true }) as Organization;
		} catch (error) {
			if (error instanceof UniqueConstraintError) {
				return;
			}
			throw error;
		}
	}

	async function createAdminIfAbsent(newAdmin: NewAdministrator): Promise<Administrator | undefined> {
		try {
			const result = await Administrators.create({
				email: newAdmin.email.toLowerCase(),
				passwordHash: newAdmin.passwordHash,
			});
			return result.get({ plain: true }) as Administrator;
		} catch (error) {
			if (error instanceof UniqueConstraintError) {
				return;
			}
			throw error;
		}
	}

	async function updateOrg(id: string, updates: OrganizationUpdates): Promise<UpdateOrganizationResult> {
		if (!isUuid(id)) {
			return "not_found";
		}
		try {
			const [affectedCount] = await Organizations.update(updates, { where: { id } });
			return affectedCount > 0 ? "updated" : "not_found";
		} catch (error) {
			if (error instanceof UniqueConstraintError) {
				return "slug_taken";
			}
			throw error;
		}
	}

	async function linkAdminToOrg(adminId: string, orgId: string): Promise<boolean> {
		if (!isUuid(adminId)) {
			return false;
		}
		const [affectedCount] = await Administrators.update({ organizationId: orgId }, { where: { id: adminId } });
		return affectedCount > 0;
	}

	async function deleteOrg(id: string): Promise<boolean> {
		if (!isUuid(id)) {
			return false;
		}
		const deletedCount = await Organizations.destroy({ where: { id } });
		return deletedCount > 0;
	}

	async function deleteAdmin(id: string): Promise<boolean> {
		if (!isUuid(id)) {
			return false;
		}
		const deletedCount = await Administrators.destroy({ where: { id } });
		return deletedCount > 0;
	}
}
