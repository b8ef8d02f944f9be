/**
 * Database - DAO factory and schema setup for the tenant directory.
 *
 * Tenant storage resources are not Sequelize models: they are created and dropped one by one
 * by the provisioning engine, so `sync()` only ever touches the directory tables.
 *
 * @module Database
 */

import { createTenantDirectoryDao, type TenantDirectoryDao } from "../dao/TenantDirectoryDao";
import { createTenantStorageDao, type TenantStorageDao } from "../dao/TenantStorageDao";
import { defineAdministrators } from "../model/Administrator";
import { defineOrganizations } from "../model/Organization";
import { getLog } from "../util/Logger";
import type { Sequelize } from "sequelize";

const log = getLog(import.meta);

export interface Database {
	// Sequelize instance (for closing the pool and raw queries)
	readonly sequelize: Sequelize;

	readonly tenantDirectoryDao: TenantDirectoryDao;
	readonly tenantStorageDao: TenantStorageDao;
}

export interface CreateDatabaseOptions {
	/**
	 * Skip creating missing directory tables. Use when the schema is managed elsewhere.
	 */
	skipSync?: boolean;
}

/**
 * Creates the directory tables that do not exist yet. Existing tables are left as they are.
 */
async function syncDirectoryModels(sequelize: Sequelize): Promise<void> {
	for (const modelName of Object.keys(sequelize.models)) {
		const model = sequelize.models[modelName];
		await model.sync();
		log.info("Synced model: %s", modelName);
	}
}

export async function createDatabase(sequelize: Sequelize, options?: CreateDatabaseOptions): Promise<Database> {
	defineAdministrators(sequelize);
	defineOrganizations(sequelize);

	const tenantDirectoryDao = createTenantDirectoryDao(sequelize);
	const tenantStorageDao = createTenantStorageDao(sequelize);

	if (!options?.skipSync) {
		await syncDirectoryModels(sequelize);
	}

	return {
		sequelize,
		tenantDirectoryDao,
		tenantStorageDao,
	};
}
