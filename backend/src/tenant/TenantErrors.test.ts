import {
	AdministratorInUseError,
	CorruptCredentialError,
	DuplicateOrganizationError,
	InvalidNameError,
	isTenantError,
	MissingCredentialsError,
	NotAuthorizedError,
	OrganizationNotFoundError,
	RenameInterruptedError,
	StorageResourceConflictError,
	TenantError,
	TokenExpiredError,
} from "./TenantErrors";
import { describe, expect, it } from "vitest";

describe("TenantErrors", () => {
	it("should tag each error with the kind an adapter maps", () => {
		expect(new InvalidNameError("--", "it contains no letters or digits").kind).toBe("client");
		expect(new DuplicateOrganizationError("acme-inc").kind).toBe("client");
		expect(new StorageResourceConflictError("tenant_acme-inc").kind).toBe("conflict");
		expect(new AdministratorInUseError("a1", "o1").kind).toBe("conflict");
		expect(new NotAuthorizedError().kind).toBe("authorization");
		expect(new OrganizationNotFoundError("acme-inc").kind).toBe("not_found");
		expect(new MissingCredentialsError().kind).toBe("authentication");
		expect(new CorruptCredentialError().kind).toBe("integrity");
		expect(new RenameInterruptedError("acme-inc", 10, 9).kind).toBe("interrupted");
	});

	it("should name errors after their class", () => {
		const error = new DuplicateOrganizationError("acme-inc");

		expect(error.name).toBe("DuplicateOrganizationError");
		expect(error.message).toBe('An organization with slug "acme-inc" already exists');
		expect(error).toBeInstanceOf(TenantError);
		expect(error).toBeInstanceOf(Error);
	});

	it("should describe where an interrupted rename can resume", () => {
		expect(new RenameInterruptedError("acme-inc", 42, 40).message).toBe(
			'Rename of "acme-inc" interrupted after 40 documents (resume after document 42)',
		);
		expect(new RenameInterruptedError("acme-inc", 0, 0).message).toBe(
			'Rename of "acme-inc" interrupted after 0 documents (resume after document 0)',
		);
	});

	it("should report the expiry instant of an expired token", () => {
		const error = new TokenExpiredError(new Date(Date.UTC(2026, 0, 1, 12, 0, 0)));

		expect(error.message).toBe("Token expired at 2026-01-01T12:00:00.000Z");
	});

	it("should keep the cause", () => {
		const cause = new Error("pchstr must contain a $ as first char");

		expect(new CorruptCredentialError("bad hash", { cause }).cause).toBe(cause);
	});

	it("should narrow unknown values", () => {
		expect(isTenantError(new NotAuthorizedError())).toBe(true);
		expect(isTenantError(new Error("boom"))).toBe(false);
		expect(isTenantError({ kind: "client" })).toBe(false);
		expect(isTenantError(undefined)).toBe(false);
	});
});
