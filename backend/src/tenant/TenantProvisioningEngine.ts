import type { OrganizationUpdates, TenantDirectoryDao } from "../dao/TenantDirectoryDao";
import type { TenantStorageDao } from "../dao/TenantStorageDao";
import type { Organization } from "../model/Organization";
import { getLog } from "../util/Logger";
import {
	DuplicateAdministratorError,
	DuplicateOrganizationError,
	InvalidNameError,
	NotAuthorizedError,
	OrganizationNotFoundError,
	RenameInterruptedError,
	StorageResourceConflictError,
} from "./TenantErrors";
import {
	normalizeOrganizationName,
	type OrganizationView,
	type RenameProgress,
	type RenameResult,
	SlugValidationError,
	type StorageSentinel,
	storageResourceName,
} from "orgspace-common";

const log = getLog(import.meta);

export interface TenantProvisioningEngineDeps {
	directory: TenantDirectoryDao;
	storage: TenantStorageDao;
	/** Written into the sentinel document of every new storage resource */
	schemaVersion: number;
	/** Documents read per page while a rename copies a storage resource */
	renameBatchSize: number;
	clock?: () => Date;
}

export interface RenameOptions {
	/** Checked before every document; an aborted rename throws RenameInterruptedError */
	signal?: AbortSignal;
	/** Source document id to continue after, from RenameInterruptedError.cursor. Document ids start at 1 */
	resumeAfter?: number;
	batchSize?: number;
	/** Called after each copied page */
	onProgress?: (progress: RenameProgress) => void;
}

/**
 * Creates, renames and deletes organizations together with their storage resources.
 *
 * Each operation is a sequence of independent writes with no surrounding transaction and no
 * rollback: a failure part way leaves the earlier writes in place for TenantReconciler to report.
 * Slug and email uniqueness is checked up front and enforced again by the directory's unique
 * indexes and by storage resource creation, so two concurrent requests for one slug cannot both win.
 */
export class TenantProvisioningEngine {
	private readonly clock: () => Date;

	constructor(private readonly deps: TenantProvisioningEngineDeps) {
		this.clock = deps.clock ?? (() => new Date());
	}

	/**
	 * Provision storage, then the administrator, then the organization that ties them together.
	 *
	 * @param passwordHash already hashed by the caller
	 */
	async create(name: string, email: string, passwordHash: string): Promise<OrganizationView> {
		const { directory, storage } = this.deps;
		const slug = normalizeName(name);

		if (await directory.findOrgBySlug(slug)) {
			throw new DuplicateOrganizationError(slug);
		}
		if (await directory.findAdminByEmail(email)) {
			throw new DuplicateAdministratorError(email);
		}

		const resourceName = storageResourceName(slug);
		await this.createStorageResource(slug, resourceName);
		const sentinel = {
			schemaVersion: this.deps.schemaVersion,
			createdAt: this.clock().toISOString(),
		} satisfies StorageSentinel;
		await storage.insertDocument(resourceName, sentinel);

		const admin = await directory.createAdminIfAbsent({ email, passwordHash });
		if (!admin) {
			throw new DuplicateAdministratorError(email);
		}

		const org = await directory.createOrgIfAbsent({
			name,
			slug,
			storageResourceName: resourceName,
			adminId: admin.id,
		});
		if (!org) {
			throw new DuplicateOrganizationError(slug);
		}

		await directory.linkAdminToOrg(admin.id, org.id);
		log.info({ orgId: org.id, adminId: admin.id, slug }, "Created organization %s", slug);
		return toView(org, admin.email);
	}

	/**
	 * Move an organization to the slug of `newName`, copying its documents into a new storage
	 * resource. The previous resource is kept; reclaim it with TenantReconciler.
	 */
	async rename(currentSlug: string, newName: string, options: RenameOptions = {}): Promise<RenameResult> {
		const { directory, storage } = this.deps;
		const newSlug = normalizeName(newName);

		const holder = await directory.findOrgBySlug(newSlug);
		if (holder && holder.slug !== currentSlug) {
			throw new DuplicateOrganizationError(newSlug);
		}

		const current = await directory.findOrgBySlug(currentSlug);
		if (!current) {
			throw new OrganizationNotFoundError(currentSlug);
		}

		if (newSlug === current.slug) {
			await this.updateOrganization(current, { name: newName });
			log.info({ orgId: current.id, slug: newSlug }, "Renamed organization %s without moving storage", newSlug);
			return {
				organization: await this.view({ ...current, name: newName }),
				previousStorageResourceName: current.storageResourceName,
				storageResourceName: current.storageResourceName,
				copiedDocuments: 0,
			};
		}

		const newResourceName = storageResourceName(newSlug);
		const resuming = options.resumeAfter !== undefined;
		const created = await storage.create(newResourceName);
		if (!created && !resuming) {
			throw await this.storageResourceTaken(newSlug, newResourceName);
		}

		const copiedDocuments = await this.copyDocuments(current, newResourceName, options);

		const renamed: Organization = { ...current, name: newName, slug: newSlug, storageResourceName: newResourceName };
		await this.updateOrganization(current, {
			name: newName,
			slug: newSlug,
			storageResourceName: newResourceName,
		});
		log.info(
			{ orgId: current.id, from: current.slug, to: newSlug, copiedDocuments },
			"Renamed organization %s to %s",
			current.slug,
			newSlug,
		);

		return {
			organization: await this.view(renamed),
			previousStorageResourceName: current.storageResourceName,
			storageResourceName: newResourceName,
			copiedDocuments,
		};
	}

	/**
	 * Drop the storage resource, then the administrator, then the organization.
	 *
	 * @throws NotAuthorizedError unless `requesterAdminId` owns the organization
	 */
	async delete(slug: string, requesterAdminId: string): Promise<void> {
		const { directory, storage } = this.deps;
		const org = await directory.findOrgBySlug(slug);
		if (!org) {
			throw new OrganizationNotFoundError(slug);
		}
		if (org.adminId !== requesterAdminId) {
			log.warn({ orgId: org.id, requesterAdminId }, "Refused to delete organization %s", slug);
			throw new NotAuthorizedError();
		}

		await storage.drop(org.storageResourceName);
		await directory.deleteAdmin(org.adminId);
		await directory.deleteOrg(org.id);
		log.info({ orgId: org.id, adminId: org.adminId, slug }, "Deleted organization %s", slug);
	}

	/**
	 * Look up an organization by any name that normalizes to its slug.
	 */
	async findBySlug(name: string): Promise<OrganizationView | undefined> {
		const org = await this.deps.directory.findOrgBySlug(normalizeName(name));
		return org ? this.view(org) : undefined;
	}

	private async createStorageResource(slug: string, resourceName: string): Promise<void> {
		if (!(await this.deps.storage.create(resourceName))) {
			throw await this.storageResourceTaken(slug, resourceName);
		}
	}

	/**
	 * A storage resource exists for the slug: either a concurrent request has just claimed the slug,
	 * or the resource is left over from an earlier crash or rename and must be reclaimed first.
	 */
	private async storageResourceTaken(slug: string, resourceName: string): Promise<Error> {
		if (await this.deps.directory.findOrgBySlug(slug)) {
			return new DuplicateOrganizationError(slug);
		}
		log.warn({ resourceName }, "Storage resource %s exists without an organization", resourceName);
		return new StorageResourceConflictError(resourceName);
	}

	private async copyDocuments(source: Organization, destination: string, options: RenameOptions): Promise<number> {
		const { storage } = this.deps;
		const batchSize = options.batchSize ?? this.deps.renameBatchSize;
		let cursor = options.resumeAfter ?? 0;
		let copiedDocuments = 0;

		for (;;) {
			const page = await storage.readDocuments(source.storageResourceName, { afterId: cursor, limit: batchSize });
			for (const stored of page) {
				if (options.signal?.aborted) {
					log.warn(
						{ orgId: source.id, cursor, copiedDocuments },
						"Rename of %s interrupted while copying documents",
						source.slug,
					);
					throw new RenameInterruptedError(source.slug, cursor, copiedDocuments, {
						cause: options.signal.reason,
					});
				}
				await storage.insertDocument(destination, stored.document);
				cursor = stored.id;
				copiedDocuments++;
			}
			if (page.length > 0) {
				options.onProgress?.({ copiedDocuments, cursor });
			}
			if (page.length < batchSize) {
				return copiedDocuments;
			}
		}
	}

	private async updateOrganization(org: Organization, updates: OrganizationUpdates): Promise<void> {
		const result = await this.deps.directory.updateOrg(org.id, updates);
		if (result === "slug_taken") {
			throw new DuplicateOrganizationError(updates.slug ?? org.slug);
		}
		if (result === "not_found") {
			throw new OrganizationNotFoundError(org.slug);
		}
	}

	private async view(org: Organization): Promise<OrganizationView> {
		const admin = await this.deps.directory.findAdminById(org.adminId);
		return toView(org, admin?.email);
	}
}

/**
 * The slug of an organization name.
 *
 * @throws InvalidNameError when the name has no slug
 */
export function normalizeName(name: string): string {
	try {
		return normalizeOrganizationName(name);
	} catch (error) {
		if (error instanceof SlugValidationError) {
			throw new InvalidNameError(error.input, error.reason, { cause: error });
		}
		throw error;
	}
}

function toView(org: Organization, adminEmail: string | undefined): OrganizationView {
	return {
		id: org.id,
		name: org.name,
		slug: org.slug,
		storageResourceName: org.storageResourceName,
		adminEmail,
	};
}
