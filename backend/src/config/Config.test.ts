import { getConfig, reloadEnvFiles, resetConfig } from "./Config";
import { config as dotenvConfig } from "dotenv";
import { afterEach, describe, expect, it, vi } from "vitest";

// Keep .env files on the developer's machine out of the tests
vi.mock("dotenv", () => ({
	config: vi.fn(),
}));

describe("Config", () => {
	afterEach(() => {
		resetConfig();
	});

	it("should apply defaults for unset variables", () => {
		vi.stubEnv("TOKEN_SECRET", "test-secret");

		const config = getConfig();

		expect(config.TOKEN_SECRET).toBe("test-secret");
		expect(config.TOKEN_ALGORITHM).toBe("HS256");
		expect(config.TOKEN_EXPIRES_IN).toBe("60m");
		expect(config.TENANT_SCHEMA_VERSION).toBe(1);
		expect(config.RENAME_COPY_BATCH_SIZE).toBe(500);
		expect(config.POSTGRES_PORT).toBe(5432);
		expect(config.POSTGRES_SSL).toBe(false);
		expect(config.DB_CONNECT_MAX_RETRIES).toBe(5);
	});

	it("should coerce numbers and booleans from strings", () => {
		vi.stubEnv("POSTGRES_PORT", "6543");
		vi.stubEnv("POSTGRES_SSL", "true");
		vi.stubEnv("RENAME_COPY_BATCH_SIZE", "25");
		vi.stubEnv("TENANT_SCHEMA_VERSION", "3");

		const config = getConfig();

		expect(config.POSTGRES_PORT).toBe(6543);
		expect(config.POSTGRES_SSL).toBe(true);
		expect(config.RENAME_COPY_BATCH_SIZE).toBe(25);
		expect(config.TENANT_SCHEMA_VERSION).toBe(3);
	});

	it("should treat empty strings as unset", () => {
		vi.stubEnv("POSTGRES_PORT", "");
		vi.stubEnv("TOKEN_EXPIRES_IN", "");

		const config = getConfig();

		expect(config.POSTGRES_PORT).toBe(5432);
		expect(config.TOKEN_EXPIRES_IN).toBe("60m");
	});

	it("should accept the HMAC token algorithms", () => {
		vi.stubEnv("TOKEN_ALGORITHM", "HS512");
		vi.stubEnv("TOKEN_EXPIRES_IN", "2h");

		const config = getConfig();

		expect(config.TOKEN_ALGORITHM).toBe("HS512");
		expect(config.TOKEN_EXPIRES_IN).toBe("2h");
	});

	describe("validation", () => {
		function silenceValidationOutput() {
			vi.spyOn(console, "error").mockImplementation(() => undefined);
		}

		it("should reject a missing token secret", () => {
			silenceValidationOutput();
			vi.stubEnv("TOKEN_SECRET", "");

			expect(() => getConfig()).toThrow();
		});

		it("should reject asymmetric token algorithms", () => {
			silenceValidationOutput();
			vi.stubEnv("TOKEN_ALGORITHM", "RS256");

			expect(() => getConfig()).toThrow();
		});

		it("should reject a token lifetime that is not a duration", () => {
			silenceValidationOutput();
			vi.stubEnv("TOKEN_EXPIRES_IN", "forever");

			expect(() => getConfig()).toThrow();
		});

		it("should reject a batch size below one", () => {
			silenceValidationOutput();
			vi.stubEnv("RENAME_COPY_BATCH_SIZE", "0");

			expect(() => getConfig()).toThrow();
		});
	});

	it("should cache the configuration until reset", () => {
		vi.stubEnv("TENANT_SCHEMA_VERSION", "2");
		const first = getConfig();

		vi.stubEnv("TENANT_SCHEMA_VERSION", "4");
		expect(getConfig()).toBe(first);
		expect(Object.isFrozen(first)).toBe(true);

		resetConfig();
		expect(getConfig().TENANT_SCHEMA_VERSION).toBe(4);
	});

	it("should reload .env and .env.local with override", () => {
		reloadEnvFiles();

		expect(dotenvConfig).toHaveBeenNthCalledWith(1, { path: ".env", override: true, quiet: true });
		expect(dotenvConfig).toHaveBeenNthCalledWith(2, { path: ".env.local", override: true, quiet: true });
	});
});
