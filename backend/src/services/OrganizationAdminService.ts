import type { AuthorizationGate } from "../auth/AuthorizationGate";
import type { CredentialService } from "../auth/CredentialService";
import type { TenantDirectoryDao } from "../dao/TenantDirectoryDao";
import { InvalidCredentialsError, NotAuthorizedError, OrganizationNotFoundError } from "../tenant/TenantErrors";
import { normalizeName, type RenameOptions, type TenantProvisioningEngine } from "../tenant/TenantProvisioningEngine";
import { getLog } from "../util/Logger";
import type { OrganizationView, RenameResult } from "orgspace-common";

const log = getLog(import.meta);

export interface OrganizationRequest {
	organizationName: string;
	email: string;
	password: string;
}

export interface LoginRequest {
	email: string;
	password: string;
}

export interface LoginResult {
	token: string;
	adminId: string;
	orgId: string;
}

export interface OrganizationAdminServiceDeps {
	credentials: CredentialService;
	gate: AuthorizationGate;
	engine: TenantProvisioningEngine;
	directory: TenantDirectoryDao;
}

/**
 * The administrator-facing organization operations. Request shapes are validated by the caller;
 * authorization headers are passed through as received.
 */
export class OrganizationAdminService {
	constructor(private readonly deps: OrganizationAdminServiceDeps) {}

	async createOrganization(request: OrganizationRequest): Promise<OrganizationView> {
		const passwordHash = await this.deps.credentials.hash(request.password);
		return this.deps.engine.create(request.organizationName, request.email, passwordHash);
	}

	async getOrganization(organizationName: string): Promise<OrganizationView> {
		const org = await this.deps.engine.findBySlug(organizationName);
		if (!org) {
			throw new OrganizationNotFoundError(normalizeName(organizationName));
		}
		return org;
	}

	/**
	 * @throws InvalidCredentialsError for an unknown email, a wrong password, or an administrator
	 * that owns no organization
	 */
	async login(request: LoginRequest): Promise<LoginResult> {
		const { credentials, directory } = this.deps;
		const admin = await directory.findAdminByEmail(request.email);
		if (!admin) {
			log.warn({ email: request.email }, "Login failed: administrator not found");
			throw new InvalidCredentialsError();
		}
		if (!(await credentials.verify(request.password, admin.passwordHash))) {
			log.warn({ adminId: admin.id }, "Login failed: wrong password");
			throw new InvalidCredentialsError();
		}
		const org = await directory.findOrgByAdminId(admin.id);
		if (!org) {
			log.warn({ adminId: admin.id }, "Login failed: administrator owns no organization");
			throw new InvalidCredentialsError();
		}

		const token = credentials.issueToken(admin.id, org.id, admin.email);
		log.info({ adminId: admin.id, orgId: org.id }, "Administrator %s logged in", admin.email);
		return { token, adminId: admin.id, orgId: org.id };
	}

	/**
	 * Renames the caller's own organization. The caller re-enters their email and password.
	 */
	async renameOrganization(
		authorizationHeader: string | undefined,
		request: OrganizationRequest,
		options?: RenameOptions,
	): Promise<RenameResult> {
		const { credentials, directory, engine, gate } = this.deps;
		const principal = gate.authenticate(authorizationHeader);

		const admin = await directory.findAdminByEmail(request.email);
		if (!admin || !(await credentials.verify(request.password, admin.passwordHash))) {
			throw new InvalidCredentialsError();
		}
		if (admin.id !== principal.adminId) {
			log.warn(
				{ adminId: principal.adminId, email: request.email },
				"Rename refused: credentials of another administrator",
			);
			throw new NotAuthorizedError();
		}

		const current = await directory.findOrgById(principal.orgId);
		if (!current) {
			throw new OrganizationNotFoundError(principal.orgId);
		}
		await gate.requireOrganizationOwner(principal, current.slug);
		return engine.rename(current.slug, request.organizationName, options);
	}

	/**
	 * Deletes the caller's own organization, named by any name that normalizes to its slug.
	 */
	async deleteOrganization(authorizationHeader: string | undefined, organizationName: string): Promise<void> {
		const { directory, engine, gate } = this.deps;
		const principal = gate.authenticate(authorizationHeader);
		const slug = normalizeName(organizationName);

		const own = await directory.findOrgById(principal.orgId);
		if (!own || own.slug !== slug) {
			log.warn({ adminId: principal.adminId, slug }, "Delete refused: not the caller's organization");
			throw new NotAuthorizedError();
		}
		await engine.delete(slug, principal.adminId);
	}
}
