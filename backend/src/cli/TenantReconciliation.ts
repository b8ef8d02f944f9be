/**
 * TenantReconciliation - Audit and cleanup of partial tenant state.
 *
 * Create, rename and delete run without transactions, so an interrupted sequence can leave
 * storage resources or administrators behind. This module reports them and, only when asked,
 * reclaims named ones. The CLI runner in ReconcileTenants.ts uses these functions.
 *
 * @module TenantReconciliation
 */

import { reloadEnvFiles } from "../config/Config";
import { openServices, type Services } from "../ServiceFactory";
import { isTenantError } from "../tenant/TenantErrors";
import { isCleanReport, type ReconciliationReport } from "../tenant/TenantReconciler";

/**
 * Options of a reconciliation run.
 */
export interface ReconcileConfig {
	/** Verbose logging */
	verbose: boolean;
	/** Storage resources to drop before auditing */
	reclaimStorage: Array<string>;
	/** Administrator ids to delete before auditing */
	reclaimAdmins: Array<string>;
}

/**
 * Logger interface for the reconciliation script.
 */
export interface ReconcileLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * Create a console logger for CLI output.
 */
export function createConsoleLogger(verbose: boolean): ReconcileLogger {
	function log(level: "info" | "warn" | "error" | "debug", message: string, data?: Record<string, unknown>): void {
		if (level === "debug" && !verbose) {
			return;
		}
		const timestamp = new Date().toISOString();
		const dataStr = data ? ` ${JSON.stringify(data)}` : "";
		const prefix = level === "error" ? "ERROR" : level === "warn" ? "WARN" : level === "debug" ? "DEBUG" : "INFO";
		console.log(`[${timestamp}] [${prefix}] ${message}${dataStr}`);
	}

	return {
		info: (message, data) => log("info", message, data),
		warn: (message, data) => log("warn", message, data),
		error: (message, data) => log("error", message, data),
		debug: (message, data) => log("debug", message, data),
	};
}

/**
 * Result of parsing command line arguments.
 */
export interface ParseArgsResult {
	config: ReconcileConfig;
	/** Set when the arguments cannot be used */
	validationError?: string;
}

/**
 * Parse command line arguments. `--reclaim-storage` and `--reclaim-admin` may repeat.
 */
export function parseArgs(args: Array<string>): ParseArgsResult {
	const config: ReconcileConfig = { verbose: false, reclaimStorage: [], reclaimAdmins: [] };

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === "--verbose" || arg === "-v") {
			config.verbose = true;
		} else if (arg === "--reclaim-storage" || arg === "--reclaim-admin") {
			const value = args[i + 1];
			if (value === undefined || value.startsWith("-")) {
				return { config, validationError: `${arg} requires a value` };
			}
			(arg === "--reclaim-storage" ? config.reclaimStorage : config.reclaimAdmins).push(value);
			i++;
		} else {
			return { config, validationError: `Unknown argument: ${arg}` };
		}
	}

	return { config };
}

/**
 * Print the report using the provided logger, one line per finding.
 */
export function printReport(report: ReconciliationReport, logger: ReconcileLogger): void {
	logger.info("=".repeat(60));
	logger.info("RECONCILIATION REPORT");
	logger.info("=".repeat(60));
	logger.info(`Orphaned storage resources:            ${report.orphanedStorageResources.length}`);
	logger.info(`Orphaned administrators:               ${report.orphanedAdministrators.length}`);
	logger.info(`Organizations missing storage:         ${report.organizationsMissingStorage.length}`);
	logger.info(`Organizations missing administrator:   ${report.organizationsMissingAdministrator.length}`);
	logger.info("=".repeat(60));

	for (const resourceName of report.orphanedStorageResources) {
		logger.warn(`  - orphaned storage resource ${resourceName}`);
	}
	for (const admin of report.orphanedAdministrators) {
		logger.warn(`  - orphaned administrator ${admin.adminId} (${admin.email})`);
	}
	for (const org of report.organizationsMissingStorage) {
		logger.warn(`  - organization ${org.slug} is missing storage resource ${org.storageResourceName}`);
	}
	for (const org of report.organizationsMissingAdministrator) {
		logger.warn(`  - organization ${org.slug} is missing administrator ${org.adminId}`);
	}

	if (isCleanReport(report)) {
		logger.info("\n✓ No partial tenant state found.");
	}
}

/**
 * Exit codes for the reconciliation script.
 * Using codes >= 10 to avoid conflicts with standard POSIX exit codes.
 */
export const EXIT_CODES = {
	/** Nothing to reconcile */
	SUCCESS: 0,
	/** The audit could not run or a requested reclaim failed */
	ERROR: 1,
	/** Orphaned or dangling records remain */
	ISSUES_FOUND: 10,
} as const;

export interface ReconcileCliResult {
	exitCode: number;
}

/**
 * Injection point for tests.
 */
export interface ReconcileDependencies {
	openServices: () => Promise<Services>;
}

export const defaultDependencies: ReconcileDependencies = {
	openServices: () => openServices({ skipSync: true }),
};

export const IN_FLIGHT_WARNING =
	"Reclaiming while a create or rename is in flight removes that tenant's new resources; stop writers first";

async function reclaimAll(services: Services, config: ReconcileConfig, log: ReconcileLogger): Promise<number> {
	const requests = [
		...config.reclaimStorage.map(name => ({
			label: `storage resource ${name}`,
			run: () => services.reconciler.reclaimStorageResource(name),
		})),
		...config.reclaimAdmins.map(adminId => ({
			label: `administrator ${adminId}`,
			run: () => services.reconciler.reclaimAdministrator(adminId),
		})),
	];

	let failed = 0;
	for (const request of requests) {
		try {
			await request.run();
			log.info(`Reclaimed ${request.label}`);
		} catch (error) {
			// Tenant errors are refusals; anything else is an infrastructure failure
			if (!isTenantError(error)) {
				throw error;
			}
			failed++;
			log.error(`Could not reclaim ${request.label}: ${error.message}`, { kind: error.kind });
		}
	}
	return failed;
}

/**
 * Run the reconciliation CLI with the given arguments.
 * Returns an exit code instead of calling process.exit() directly.
 *
 * @param args - Command line arguments (defaults to process.argv.slice(2))
 * @param logger - Optional logger override for testing
 */
export async function runReconcileCli(
	args: Array<string> = process.argv.slice(2),
	logger?: ReconcileLogger,
	deps: ReconcileDependencies = defaultDependencies,
): Promise<ReconcileCliResult> {
	const { config, validationError } = parseArgs(args);
	const log = logger ?? createConsoleLogger(config.verbose);

	if (validationError) {
		log.error(`Error: ${validationError}`);
		return { exitCode: EXIT_CODES.ERROR };
	}

	// Load .env and .env.local files before reading any config values
	reloadEnvFiles();

	let services: Services | undefined;
	try {
		services = await deps.openServices();
		log.debug("Connected to the tenant directory", {
			reclaimStorage: config.reclaimStorage,
			reclaimAdmins: config.reclaimAdmins,
		});

		if (config.reclaimStorage.length > 0 || config.reclaimAdmins.length > 0) {
			log.warn(IN_FLIGHT_WARNING);
		}
		const failedReclaims = await reclaimAll(services, config, log);
		const report = await services.reconciler.audit();
		printReport(report, log);

		if (failedReclaims > 0) {
			log.error(`${failedReclaims} reclaim request(s) failed`);
			return { exitCode: EXIT_CODES.ERROR };
		}
		return { exitCode: isCleanReport(report) ? EXIT_CODES.SUCCESS : EXIT_CODES.ISSUES_FOUND };
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		log.error(`Reconciliation failed: ${message}`);
		if (error instanceof Error && error.stack) {
			log.debug(error.stack);
		}
		return { exitCode: EXIT_CODES.ERROR };
	} finally {
		if (services) {
			await services.close();
		}
	}
}
