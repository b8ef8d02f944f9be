import { AuthorizationGate } from "./auth/AuthorizationGate";
import { CredentialService } from "./auth/CredentialService";
import { type Config, getConfig } from "./config/Config";
import { createDatabase, type CreateDatabaseOptions, type Database } from "./core/Database";
import { OrganizationAdminService } from "./services/OrganizationAdminService";
import { TenantProvisioningEngine } from "./tenant/TenantProvisioningEngine";
import { TenantReconciler } from "./tenant/TenantReconciler";
import { getLog } from "./util/Logger";
import { createSequelize } from "./util/Sequelize";
import type { Sequelize } from "sequelize";

const log = getLog(import.meta);

export type ServicesConfig = Pick<
	Config,
	"TOKEN_SECRET" | "TOKEN_ALGORITHM" | "TOKEN_EXPIRES_IN" | "TENANT_SCHEMA_VERSION" | "RENAME_COPY_BATCH_SIZE"
>;

/**
 * Everything a process needs to serve tenant lifecycle requests, wired once at startup.
 */
export interface Services {
	readonly database: Database;
	readonly credentials: CredentialService;
	readonly gate: AuthorizationGate;
	readonly engine: TenantProvisioningEngine;
	readonly reconciler: TenantReconciler;
	readonly organizations: OrganizationAdminService;
	/** Closes the connection pool */
	close(): Promise<void>;
}

export function buildServices(config: ServicesConfig, database: Database): Services {
	const directory = database.tenantDirectoryDao;
	const storage = database.tenantStorageDao;

	const credentials = new CredentialService({
		tokenSecret: config.TOKEN_SECRET,
		tokenAlgorithm: config.TOKEN_ALGORITHM,
		tokenExpiresIn: config.TOKEN_EXPIRES_IN,
	});
	const gate = new AuthorizationGate({ credentials, directory });
	const engine = new TenantProvisioningEngine({
		directory,
		storage,
		schemaVersion: config.TENANT_SCHEMA_VERSION,
		renameBatchSize: config.RENAME_COPY_BATCH_SIZE,
	});
	const reconciler = new TenantReconciler({ directory, storage });
	const organizations = new OrganizationAdminService({ credentials, gate, engine, directory });

	return {
		database,
		credentials,
		gate,
		engine,
		reconciler,
		organizations,
		close: () => database.sequelize.close(),
	};
}

export async function createServices(
	config: ServicesConfig,
	sequelize: Sequelize,
	options?: CreateDatabaseOptions,
): Promise<Services> {
	const database = await createDatabase(sequelize, options);
	return buildServices(config, database);
}

/**
 * Connects to PostgreSQL with the process configuration and wires the services on top.
 */
export async function openServices(options?: CreateDatabaseOptions): Promise<Services> {
	const config = getConfig();
	const sequelize = await createSequelize(config);
	try {
		return await createServices(config, sequelize, options);
	} catch (error) {
		log.error(error, "Failed to set up the tenant directory");
		await sequelize.close();
		throw error;
	}
}
