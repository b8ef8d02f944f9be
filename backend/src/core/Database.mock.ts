import { mockTenantDirectoryDao } from "../dao/TenantDirectoryDao.mock";
import { mockTenantStorageDao } from "../dao/TenantStorageDao.mock";
import type { Database } from "./Database";
import type { Sequelize } from "sequelize";
import { vi } from "vitest";

export function mockDatabase(partial?: Partial<Database>): Database {
	return {
		// Sequelize instance (mock)
		sequelize: { close: vi.fn() } as unknown as Sequelize,

		// DAOs
		tenantDirectoryDao: mockTenantDirectoryDao(),
		tenantStorageDao: mockTenantStorageDao(),

		...partial,
	};
}
