import type { DestinationStream, Logger as PinoLogger } from "pino";
import pino from "pino";

/**
 * Log level type - using pino's native levels
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LOG_LEVELS: ReadonlyArray<LogLevel> = ["trace", "debug", "info", "warn", "error", "fatal"];

/**
 * Logging configuration interface
 */
export interface LoggingConfig {
	/**
	 * Whether logging is enabled. If false, a no-op logger will be returned.
	 */
	enabled: boolean;
	/**
	 * Default log level
	 */
	level: LogLevel;
	/**
	 * Whether console output goes through pino-pretty instead of JSON lines on stdout.
	 */
	pretty: boolean;
	/**
	 * Module-specific log level overrides. Use the name of the file without extension as module name.
	 * Format: "module1:level1,module2:level2"
	 * Example: "TenantProvisioningEngine:debug,CredentialService:warn"
	 */
	moduleOverrides: Record<string, string | undefined>;
}

const transports = new Map<string, DestinationStream>();

function getConsoleTransport(pretty: boolean, level: LogLevel): DestinationStream {
	const key = pretty ? `console-pretty:${level}` : "console";
	const existing = transports.get(key);
	if (existing) {
		return existing;
	}

	const transport: DestinationStream = pretty
		? pino.transport({
				target: "pino-pretty",
				level,
				options: {
					colorize: true,
					translateTime: "yyyy-mm-dd HH:MM:ss",
					ignore: "pid,hostname",
					messageFormat: "{module} - {msg}",
					singleLine: true,
				},
			})
		: process.stdout;
	transports.set(key, transport);
	return transport;
}

function getModuleName(module: string | ImportMeta): string {
	const moduleUrl = typeof module === "string" ? module : module.url;
	const lastSlashIndex = moduleUrl.lastIndexOf("/");
	const fileNameWithExtension = lastSlashIndex >= 0 ? moduleUrl.substring(lastSlashIndex + 1) : moduleUrl;
	const parts = fileNameWithExtension.split(".");
	// If there's an extension, remove it; otherwise return the whole name
	return parts.length > 1 ? parts.slice(0, -1).join(".") : fileNameWithExtension;
}

/**
 * Validate that a string is a valid LogLevel.
 */
export function isValidLogLevel(level: string): level is LogLevel {
	return LOG_LEVELS.some(candidate => candidate === level);
}

/**
 * Create a logging configuration.
 *
 * @param enabled Whether logging is enabled. If false, a no-op logger will be returned.
 * @param level Default log level.
 * @param pretty Whether to use pretty-printing for console transport.
 * @param moduleOverrides Module-specific log level overrides in the format "module1:level1,module2:level2"
 */
export function createLoggingConfig(
	enabled: boolean,
	level: LogLevel,
	pretty: boolean,
	moduleOverrides: string,
): LoggingConfig {
	const overrides: Record<string, string> = {};
	if (moduleOverrides) {
		for (const pair of moduleOverrides.split(",")) {
			const [module, lvl] = pair.split(":");
			if (module && lvl) {
				overrides[module.trim()] = lvl.trim();
			}
		}
	}
	return {
		enabled,
		level,
		pretty,
		moduleOverrides: overrides,
	};
}

/**
 * Configures server-side logging based on environment variables.
 * The supported environment variables are:
 * - DISABLE_LOGGING: Set to "true" to disable logging entirely (returns no-op logger).
 * - LOG_LEVEL: Default log level. If not provided or invalid, defaults to "info".
 * - LOG_PRETTY: Whether to use pretty-printing for console output (defaults to true in development).
 * - LOG_LEVEL_OVERRIDES: module-specific log level overrides, e.g. "TenantProvisioningEngine:debug"
 */
function getLoggingConfig(): LoggingConfig {
	const enabled = process.env.DISABLE_LOGGING !== "true";
	const isDevelopment = process.env.NODE_ENV === "development";
	const rawLevel = process.env.LOG_LEVEL ?? "info";
	const level = isValidLogLevel(rawLevel) ? rawLevel : "info";
	const pretty = (process.env.LOG_PRETTY ?? (isDevelopment ? "true" : "false")) === "true";
	const moduleOverrides = process.env.LOG_LEVEL_OVERRIDES ?? "";
	return createLoggingConfig(enabled, level, pretty, moduleOverrides);
}

function createDefaultLogger(config: LoggingConfig): PinoLogger {
	return pino({ level: config.level }, getConsoleTransport(config.pretty, config.level));
}

function resolveModuleLevel(moduleName: string, override: string | undefined): LogLevel | undefined {
	if (!override) {
		return;
	}
	const level = override.toLowerCase();
	if (!isValidLogLevel(level)) {
		// biome-ignore lint/suspicious/noConsole: needed to fix logging mistakes.
		console.log(`Unable to set ${moduleName} log level to ${override} as it is an invalid value`);
		return;
	}
	return level;
}

// Helper to get the more verbose (lower priority number) level
function getMinimumLevel(level1: LogLevel, level2: LogLevel): LogLevel {
	const levels = pino.levels.values;
	return levels[level1] < levels[level2] ? level1 : level2;
}

// Create a child logger for a specific module with optional level override
function createModuleLogger(
	moduleName: string,
	loggingConfig: LoggingConfig,
	defaultLoggerProvider: (config: LoggingConfig) => PinoLogger,
): PinoLogger {
	const childLevel = resolveModuleLevel(moduleName, loggingConfig.moduleOverrides[moduleName]);
	const effectiveLevel = childLevel ?? loggingConfig.level;

	// A module override more verbose than the base level needs a parent logger at that level
	const parentLevel = getMinimumLevel(effectiveLevel, loggingConfig.level);
	const logger = defaultLoggerProvider({ ...loggingConfig, level: parentLevel });

	return logger.child({ module: moduleName }, { level: effectiveLevel });
}

export type Logger = PinoLogger;

let noopLoggerInstance: Logger | undefined;

function getNoOpLogger(): Logger {
	if (!noopLoggerInstance) {
		noopLoggerInstance = pino({ enabled: false });
	}
	return noopLoggerInstance;
}

/**
 * Get a logger for the specified module. The module name is derived from the file name.
 * To use in a module, call `createLog(import.meta)` near the top of the file (after imports).
 *
 * If the logging config has enabled=false, a no-op logger is returned.
 *
 * @param module the module meta or module name
 * @param loggingConfigProvider an optional logging config provider to use instead of the environment.
 * @param defaultLoggerProvider an optional default logger provider to use instead of the default one.
 */
export function createLog(
	module: string | ImportMeta,
	loggingConfigProvider?: () => LoggingConfig,
	defaultLoggerProvider?: (config: LoggingConfig) => PinoLogger,
): Logger {
	const config = (loggingConfigProvider ?? getLoggingConfig)();
	if (!config.enabled) {
		return getNoOpLogger();
	}
	return createModuleLogger(getModuleName(module), config, defaultLoggerProvider ?? createDefaultLogger);
}
