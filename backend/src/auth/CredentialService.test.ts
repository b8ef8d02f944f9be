import { CorruptCredentialError, TokenExpiredError, TokenInvalidError } from "../tenant/TenantErrors";
import { CredentialService, type CredentialServiceOptions } from "./CredentialService";
import jwt from "jsonwebtoken";
import { describe, expect, it } from "vitest";

const SECRET = "test-secret";
const NOW = Date.UTC(2026, 2, 1, 9, 0, 0);
const NOW_SECONDS = NOW / 1000;

function createService(overrides: Partial<CredentialServiceOptions> = {}) {
	let now = NOW;
	const service = new CredentialService({
		tokenSecret: SECRET,
		tokenAlgorithm: "HS256",
		tokenExpiresIn: "60m",
		// Cheapest argon2id parameters; production uses the library defaults
		hashOptions: { memoryCost: 1024, timeCost: 1, parallelism: 1 },
		clock: () => now,
		...overrides,
	});
	return {
		service,
		setNow(value: number) {
			now = value;
		},
	};
}

describe("CredentialService", () => {
	describe("hash and verify", () => {
		it("should produce an argon2id hash that verifies the password", async () => {
			const { service } = createService();

			const passwordHash = await service.hash("test-password");

			expect(passwordHash.startsWith("$argon2id$")).toBe(true);
			await expect(service.verify("test-password", passwordHash)).resolves.toBe(true);
		});

		it("should salt every hash", async () => {
			const { service } = createService();

			const first = await service.hash("test-password");
			const second = await service.hash("test-password");

			expect(first).not.toBe(second);
		});

		it("should resolve false for a wrong password", async () => {
			const { service } = createService();
			const passwordHash = await service.hash("test-password");

			await expect(service.verify("other-password", passwordHash)).resolves.toBe(false);
		});

		it("should reject a hash that is not an argon2 string", async () => {
			const { service } = createService();

			await expect(service.verify("test-password", "plain-text")).rejects.toBeInstanceOf(CorruptCredentialError);
			await expect(service.verify("test-password", "")).rejects.toBeInstanceOf(CorruptCredentialError);
		});

		it("should reject an argon2 string argon2 cannot parse", async () => {
			const { service } = createService();

			await expect(service.verify("test-password", "$argon2id$garbage")).rejects.toBeInstanceOf(
				CorruptCredentialError,
			);
		});
	});

	describe("issueToken", () => {
		it("should embed the administrator, organization, email and expiry", () => {
			const { service } = createService();

			const token = service.issueToken("admin-1", "org-1", "owner@example.com");

			expect(jwt.decode(token)).toEqual({
				sub: "admin-1",
				orgId: "org-1",
				email: "owner@example.com",
				iat: NOW_SECONDS,
				exp: NOW_SECONDS + 3600,
			});
		});

		it("should accept a lifetime in seconds or as a duration string", () => {
			const { service } = createService();

			expect(jwt.decode(service.issueToken("a", "o", "e@example.com", 90))).toMatchObject({
				exp: NOW_SECONDS + 90,
			});
			expect(jwt.decode(service.issueToken("a", "o", "e@example.com", "2h"))).toMatchObject({
				exp: NOW_SECONDS + 7200,
			});
		});

		it("should reject a non-positive lifetime", () => {
			const { service } = createService();

			expect(() => service.issueToken("a", "o", "e@example.com", 0)).toThrow(RangeError);
		});

		it("should sign with the configured algorithm", () => {
			const { service } = createService({ tokenAlgorithm: "HS512" });

			const token = service.issueToken("a", "o", "e@example.com");

			expect(jwt.decode(token, { complete: true })?.header.alg).toBe("HS512");
		});
	});

	describe("verifyToken", () => {
		it("should return the claims before expiry", () => {
			const { service, setNow } = createService();
			const token = service.issueToken("admin-1", "org-1", "owner@example.com", 60);

			setNow(NOW + 59_000);

			expect(service.verifyToken(token)).toEqual({
				sub: "admin-1",
				orgId: "org-1",
				email: "owner@example.com",
				iat: NOW_SECONDS,
				exp: NOW_SECONDS + 60,
			});
		});

		it("should reject a token once its expiry is reached", () => {
			const { service, setNow } = createService();
			const token = service.issueToken("admin-1", "org-1", "owner@example.com", 60);

			setNow(NOW + 60_000);

			expect(() => service.verifyToken(token)).toThrow(TokenExpiredError);
		});

		it("should reject a token whose signature was altered", () => {
			const { service } = createService();
			const token = service.issueToken("admin-1", "org-1", "owner@example.com");
			const [header, payload, signature] = token.split(".");
			const alteredFirst = signature[0] === "A" ? "B" : "A";
			const tampered = `${header}.${payload}.${alteredFirst}${signature.slice(1)}`;

			expect(() => service.verifyToken(tampered)).toThrow(TokenInvalidError);
		});

		it("should reject a token whose payload was altered", () => {
			const { service } = createService();
			const token = service.issueToken("admin-1", "org-1", "owner@example.com");
			const [header, , signature] = token.split(".");
			const forged = Buffer.from(
				JSON.stringify({ sub: "admin-2", orgId: "org-1", email: "owner@example.com", iat: NOW_SECONDS, exp: NOW_SECONDS + 3600 }),
			).toString("base64url");

			expect(() => service.verifyToken(`${header}.${forged}.${signature}`)).toThrow(TokenInvalidError);
		});

		it("should reject a token signed with another secret", () => {
			const { service } = createService();
			const { service: other } = createService({ tokenSecret: "other-secret" });

			expect(() => service.verifyToken(other.issueToken("a", "o", "e@example.com"))).toThrow(TokenInvalidError);
		});

		it("should reject a token signed with another algorithm", () => {
			const { service } = createService();
			const { service: other } = createService({ tokenAlgorithm: "HS384" });

			expect(() => service.verifyToken(other.issueToken("a", "o", "e@example.com"))).toThrow(TokenInvalidError);
		});

		it("should reject malformed tokens", () => {
			const { service } = createService();

			expect(() => service.verifyToken("not-a-token")).toThrow(TokenInvalidError);
			expect(() => service.verifyToken("")).toThrow(TokenInvalidError);
		});

		it("should reject a signed token without the organization claim", () => {
			const { service } = createService();
			const token = jwt.sign({ sub: "admin-1", email: "owner@example.com", iat: NOW_SECONDS, exp: NOW_SECONDS + 60 }, SECRET, {
				algorithm: "HS256",
			});

			expect(() => service.verifyToken(token)).toThrow("Invalid token: missing or malformed claims");
		});
	});
});
