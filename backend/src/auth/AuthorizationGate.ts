import type { TenantDirectoryDao } from "../dao/TenantDirectoryDao";
import type { Organization } from "../model/Organization";
import { MissingCredentialsError, NotAuthorizedError, OrganizationNotFoundError } from "../tenant/TenantErrors";
import { getLog } from "../util/Logger";
import type { CredentialService } from "./CredentialService";

const log = getLog(import.meta);

const BEARER_PREFIX = "Bearer ";

/**
 * The administrator a verified token speaks for.
 */
export interface AuthenticatedAdmin {
	adminId: string;
	orgId: string;
	email: string;
	expiresAt: Date;
}

export interface AuthorizationGateDeps {
	credentials: CredentialService;
	directory: TenantDirectoryDao;
}

/**
 * Turns an Authorization header into an administrator, and checks that administrator against
 * the organization a request targets.
 */
export class AuthorizationGate {
	constructor(private readonly deps: AuthorizationGateDeps) {}

	/**
	 * Verifies the token only; the directory is not consulted.
	 *
	 * @throws MissingCredentialsError unless the header is `Bearer <token>`
	 */
	authenticate(header: string | undefined): AuthenticatedAdmin {
		if (header === undefined || !header.startsWith(BEARER_PREFIX)) {
			throw new MissingCredentialsError();
		}
		const token = header.slice(BEARER_PREFIX.length).trim();
		if (token.length === 0) {
			throw new MissingCredentialsError();
		}

		const claims = this.deps.credentials.verifyToken(token);
		return {
			adminId: claims.sub,
			orgId: claims.orgId,
			email: claims.email,
			expiresAt: new Date(claims.exp * 1000),
		};
	}

	/**
	 * Tokens outlive directory changes, so ownership is read again from the directory.
	 */
	async requireOrganizationOwner(principal: AuthenticatedAdmin, slug: string): Promise<Organization> {
		const org = await this.deps.directory.findOrgBySlug(slug);
		if (!org) {
			throw new OrganizationNotFoundError(slug);
		}
		if (org.id !== principal.orgId || org.adminId !== principal.adminId) {
			log.warn({ orgId: org.id, adminId: principal.adminId }, "Administrator does not own organization %s", slug);
			throw new NotAuthorizedError();
		}
		return org;
	}
}
