import { getLog } from "../util/Logger";
import { createEnv } from "@t3-oss/env-core";
import { config as dotenvConfig } from "dotenv";
import type { StringValue } from "ms";
import ms from "ms";
import { z } from "zod";

const log = getLog(import.meta);

const BooleanSchema = z
	.string()
	// only allow "true" or "false"
	.refine(s => s === "true" || s === "false")
	// transform to boolean
	.transform(s => s === "true")
	.default("false");

/**
 * Duration strings understood by `ms` ("60m", "2h", "30 days").
 */
const MSStringValueSchema = z
	.string()
	.refine(s => isDurationString(s), { message: "Expected a duration such as 60m or 2h" })
	.transform(s => s as StringValue);

/**
 * HMAC algorithms only: the signing key is a shared secret.
 */
const TokenAlgorithmSchema = z.enum(["HS256", "HS384", "HS512"]);

function isDurationString(value: string): boolean {
	try {
		return Number.isFinite(ms(value as StringValue));
	} catch {
		return false;
	}
}

/**
 * Configuration schema definition
 */
const configSchema = {
	server: {
		// Database connection retry configuration
		// Maximum number of retries for initial database connection (default: 5)
		DB_CONNECT_MAX_RETRIES: z.coerce.number().default(5),
		// Base delay in milliseconds for connection retry backoff (default: 2000)
		DB_CONNECT_RETRY_BASE_DELAY_MS: z.coerce.number().default(2000),
		// Maximum delay in milliseconds for connection retry backoff (default: 30000)
		DB_CONNECT_RETRY_MAX_DELAY_MS: z.coerce.number().default(30000),
		NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
		POSTGRES_DATABASE: z.string().default(""),
		POSTGRES_HOST: z.string().default("localhost"),
		POSTGRES_LOGGING: BooleanSchema,
		POSTGRES_NO_PORT: BooleanSchema,
		POSTGRES_PASSWORD: z.string().default(""),
		POSTGRES_POOL_MAX: z.coerce.number().default(5),
		POSTGRES_PORT: z.coerce.number().default(5432),
		POSTGRES_QUERY: z.string().default(""),
		POSTGRES_SCHEME: z.enum(["postgres", "postgresql"]).default("postgres"),
		POSTGRES_SSL: BooleanSchema,
		POSTGRES_USERNAME: z.string().default(""),
		// Documents read per page while a rename copies a storage resource
		RENAME_COPY_BATCH_SIZE: z.coerce.number().int().min(1).default(500),
		// Version written into the sentinel document of every new storage resource
		TENANT_SCHEMA_VERSION: z.coerce.number().int().min(1).default(1),
		TOKEN_ALGORITHM: TokenAlgorithmSchema.default("HS256"),
		// Token lifetime used when the caller does not pass one
		TOKEN_EXPIRES_IN: MSStringValueSchema.default("60m"),
		TOKEN_SECRET: z.string().min(1),
	},
	/**
	 * What object holds the environment variables at runtime.
	 */
	runtimeEnv: process.env,

	/**
	 * Treat `PORT=` in a .env file as unset so that defaults apply instead of
	 * failing number or enum validation on an empty string.
	 */
	emptyStringAsUndefined: true,
};

/**
 * Creates a new configuration object from the current environment
 */
function createConfig() {
	return createEnv(configSchema);
}

export type Config = Readonly<ReturnType<typeof createConfig>>;

let currentConfig: Config | undefined;

/**
 * Gets the process configuration. It is read from the environment once and stays
 * the same for the lifetime of the process.
 */
export function getConfig(): Config {
	if (!currentConfig) {
		currentConfig = Object.freeze(createConfig());
	}
	return currentConfig;
}

/**
 * Re-parses .env and .env.local files, updating process.env with new values.
 * `.env.local` takes precedence over `.env`.
 */
export function reloadEnvFiles(): void {
	dotenvConfig({ path: ".env", override: true, quiet: true });
	dotenvConfig({ path: ".env.local", override: true, quiet: true });
	log.info("Reloaded .env and .env.local files");
}

/**
 * Resets the configuration cache, forcing it to be recreated on the next call to getConfig().
 * This is primarily useful for testing when environment variables change between tests.
 */
export function resetConfig(): void {
	currentConfig = undefined;
}
