/**
 * How an adapter should surface a failure to its caller.
 */
export type TenantErrorKind =
	| "client"
	| "conflict"
	| "authorization"
	| "not_found"
	| "authentication"
	| "integrity"
	| "interrupted";

/**
 * Base class of every failure the tenant lifecycle reports to its callers.
 */
export abstract class TenantError extends Error {
	abstract readonly kind: TenantErrorKind;

	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

export function isTenantError(value: unknown): value is TenantError {
	return value instanceof TenantError;
}

export class InvalidNameError extends TenantError {
	readonly kind = "client";

	constructor(
		readonly organizationName: string,
		reason: string,
		options?: ErrorOptions,
	) {
		super(`Invalid organization name "${organizationName}": ${reason}`, options);
	}
}

export class DuplicateOrganizationError extends TenantError {
	readonly kind = "client";

	constructor(readonly slug: string) {
		super(`An organization with slug "${slug}" already exists`);
	}
}

export class DuplicateAdministratorError extends TenantError {
	readonly kind = "client";

	constructor(readonly email: string) {
		super(`An administrator with email "${email}" already exists`);
	}
}

/**
 * A storage resource with the derived name exists but no organization owns it.
 */
export class StorageResourceConflictError extends TenantError {
	readonly kind = "conflict";

	constructor(readonly storageResourceName: string) {
		super(`Storage resource "${storageResourceName}" already exists without an owning organization`);
	}
}

export class StorageResourceInUseError extends TenantError {
	readonly kind = "conflict";

	constructor(
		readonly storageResourceName: string,
		readonly organizationId: string,
	) {
		super(`Storage resource "${storageResourceName}" belongs to organization ${organizationId}`);
	}
}

export class AdministratorInUseError extends TenantError {
	readonly kind = "conflict";

	constructor(
		readonly adminId: string,
		readonly organizationId: string,
	) {
		super(`Administrator ${adminId} owns organization ${organizationId}`);
	}
}

export class NotAuthorizedError extends TenantError {
	readonly kind = "authorization";

	constructor(message = "Not authorized to manage this organization") {
		super(message);
	}
}

export class OrganizationNotFoundError extends TenantError {
	readonly kind = "not_found";

	constructor(readonly slug: string) {
		super(`Organization "${slug}" not found`);
	}
}

export class AdministratorNotFoundError extends TenantError {
	readonly kind = "not_found";

	constructor(readonly adminId: string) {
		super(`Administrator ${adminId} not found`);
	}
}

export class MissingCredentialsError extends TenantError {
	readonly kind = "authentication";

	constructor(message = "Missing bearer token") {
		super(message);
	}
}

export class TokenInvalidError extends TenantError {
	readonly kind = "authentication";

	constructor(message = "Invalid token", options?: ErrorOptions) {
		super(message, options);
	}
}

export class TokenExpiredError extends TenantError {
	readonly kind = "authentication";

	constructor(
		readonly expiredAt: Date,
		options?: ErrorOptions,
	) {
		super(`Token expired at ${expiredAt.toISOString()}`, options);
	}
}

export class InvalidCredentialsError extends TenantError {
	readonly kind = "authentication";

	constructor() {
		super("Invalid email or password");
	}
}

/**
 * A stored password hash cannot be parsed.
 */
export class CorruptCredentialError extends TenantError {
	readonly kind = "integrity";

	constructor(message = "Stored password hash is malformed", options?: ErrorOptions) {
		super(message, options);
	}
}

/**
 * A rename stopped while copying documents. Resume it with `resumeAfter: cursor`.
 */
export class RenameInterruptedError extends TenantError {
	readonly kind = "interrupted";

	constructor(
		readonly slug: string,
		readonly cursor: number,
		readonly copiedDocuments: number,
		options?: ErrorOptions,
	) {
		super(
			`Rename of "${slug}" interrupted after ${copiedDocuments} documents (resume after document ${cursor})`,
			options,
		);
	}
}
