import type { Config } from "../config/Config";
import { getLog } from "./Logger";
import { retryWithBackoff } from "./Retry";
import { Sequelize } from "sequelize";

const log = getLog(import.meta);

const RETRYABLE_CONNECTION_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ECONNABORTED", "ENOTFOUND", "EAI_AGAIN", "ETIMEDOUT"]);

export type PostgresConfig = Pick<
	Config,
	| "POSTGRES_SCHEME"
	| "POSTGRES_DATABASE"
	| "POSTGRES_USERNAME"
	| "POSTGRES_PASSWORD"
	| "POSTGRES_HOST"
	| "POSTGRES_PORT"
	| "POSTGRES_NO_PORT"
	| "POSTGRES_QUERY"
>;

export type SequelizeConfig = PostgresConfig &
	Pick<
		Config,
		| "POSTGRES_SSL"
		| "POSTGRES_LOGGING"
		| "POSTGRES_POOL_MAX"
		| "DB_CONNECT_MAX_RETRIES"
		| "DB_CONNECT_RETRY_BASE_DELAY_MS"
		| "DB_CONNECT_RETRY_MAX_DELAY_MS"
	>;

export function getPostgresConnectionUri(config: PostgresConfig): string {
	const username = encodeURIComponent(config.POSTGRES_USERNAME);
	const password = encodeURIComponent(config.POSTGRES_PASSWORD);
	const portPart = config.POSTGRES_NO_PORT ? "" : `:${config.POSTGRES_PORT}`;
	const queryPart = config.POSTGRES_QUERY ? `?${config.POSTGRES_QUERY}` : "";
	return `${config.POSTGRES_SCHEME}://${username}:${password}@${config.POSTGRES_HOST}${portPart}/${config.POSTGRES_DATABASE}${queryPart}`;
}

/**
 * Socket-level error code of a failed connection attempt (`ECONNREFUSED`, ...).
 * Sequelize keeps the driver error on `parent`.
 */
function getConnectionErrorCode(error: unknown): string | undefined {
	if (typeof error !== "object" || error === null || !("parent" in error)) {
		return;
	}
	const parent: unknown = error.parent;
	if (typeof parent === "object" && parent !== null && "code" in parent && typeof parent.code === "string") {
		return parent.code;
	}
	return;
}

/**
 * Whether a failed connection attempt is worth repeating: the server is not reachable yet,
 * as opposed to rejecting the credentials or the database name.
 */
export function isRetryableConnectionError(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}
	const code = getConnectionErrorCode(error);
	if (code && RETRYABLE_CONNECTION_CODES.has(code)) {
		return true;
	}
	return error.message.toLowerCase().includes("timeout");
}

/**
 * Wraps a connection failure with the address that was tried.
 */
export function formatConnectionError(error: unknown, host: string, port: number): Error {
	const originalMessage = error instanceof Error ? error.message : String(error);
	const message =
		getConnectionErrorCode(error) === "ECONNREFUSED"
			? [
					`PostgreSQL connection refused at ${host}:${port}`,
					"",
					"Check that PostgreSQL is running and that POSTGRES_HOST and POSTGRES_PORT point at it.",
				].join("\n")
			: `Failed to connect to PostgreSQL at ${host}:${port}: ${originalMessage}`;
	return new Error(message, { cause: error });
}

/**
 * Opens the connection pool and waits until PostgreSQL accepts a connection,
 * retrying transient failures with backoff.
 */
export async function createSequelize(config: SequelizeConfig): Promise<Sequelize> {
	const sequelize = new Sequelize(getPostgresConnectionUri(config), {
		dialect: "postgres",
		dialectOptions: config.POSTGRES_SSL ? { ssl: { rejectUnauthorized: false } } : {},
		logging: config.POSTGRES_LOGGING ? (sql: string) => log.debug(sql) : false,
		pool: { max: config.POSTGRES_POOL_MAX },
		define: { underscored: true },
	});

	try {
		await retryWithBackoff(
			() => sequelize.authenticate(),
			{
				attempts: config.DB_CONNECT_MAX_RETRIES,
				baseDelayMs: config.DB_CONNECT_RETRY_BASE_DELAY_MS,
				maxDelayMs: config.DB_CONNECT_RETRY_MAX_DELAY_MS,
			},
			{ shouldRetry: isRetryableConnectionError, label: "DB connect" },
		);
		log.info("PostgreSQL connection established successfully");
	} catch (error) {
		await sequelize.close();
		throw formatConnectionError(error, config.POSTGRES_HOST, config.POSTGRES_PORT);
	}

	return sequelize;
}
