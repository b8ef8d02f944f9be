import { getLog } from "../util/Logger";
import { isStorageResourceName, STORAGE_RESOURCE_PREFIX } from "orgspace-common";
import { DatabaseError, QueryTypes, type Sequelize, UniqueConstraintError } from "sequelize";

const log = getLog(import.meta);

const DUPLICATE_TABLE = "42P07";

/**
 * Content of a tenant document. The storage layer does not interpret it.
 */
export type TenantDocument = Record<string, unknown>;

export interface StoredDocument {
	/** Assigned by the storage resource; increases with insertion order */
	readonly id: number;
	readonly document: TenantDocument;
	readonly createdAt: Date;
}

export interface ReadDocumentsOptions {
	/** Only documents with a greater id are returned */
	afterId?: number;
	limit: number;
}

/**
 * Per-tenant storage resources: one table per organization, named `tenant_<slug>`,
 * holding one JSONB document per row.
 */
export interface TenantStorageDao {
	exists(resourceName: string): Promise<boolean>;

	/**
	 * Names of every storage resource in the current schema, sorted.
	 */
	listResources(): Promise<Array<string>>;

	/**
	 * Create an empty resource.
	 * @returns false when a resource with that name already exists
	 */
	create(resourceName: string): Promise<boolean>;

	insertDocument(resourceName: string, document: TenantDocument): Promise<StoredDocument>;

	/**
	 * One keyset page, in id order.
	 */
	readDocuments(resourceName: string, options: ReadDocumentsOptions): Promise<Array<StoredDocument>>;

	countDocuments(resourceName: string): Promise<number>;

	/**
	 * Drop the resource and every document in it. Does nothing when it does not exist.
	 */
	drop(resourceName: string): Promise<void>;
}

interface DocumentRow {
	id: number;
	document: TenantDocument;
	created_at: Date;
}

/**
 * PostgreSQL SQLSTATE of a failed query, when the driver reported one.
 */
export function getPostgresErrorCode(error: unknown): string | undefined {
	if (!(error instanceof DatabaseError)) {
		return;
	}
	const parent: unknown = error.parent;
	if (typeof parent === "object" && parent !== null && "code" in parent && typeof parent.code === "string") {
		return parent.code;
	}
	return;
}

function toStoredDocument(row: DocumentRow): StoredDocument {
	return { id: Number(row.id), document: row.document, createdAt: row.created_at };
}

export function createTenantStorageDao(sequelize: Sequelize): TenantStorageDao {
	const queryInterface = sequelize.getQueryInterface();

	return {
		exists,
		listResources,
		create,
		insertDocument,
		readDocuments,
		countDocuments,
		drop,
	};

	/**
	 * Quoted identifier of a validated resource name. Names never reach SQL unvalidated.
	 */
	function table(resourceName: string): string {
		if (!isStorageResourceName(resourceName)) {
			throw new Error(`Not a tenant storage resource name: ${resourceName}`);
		}
		return queryInterface.quoteIdentifier(resourceName);
	}

	async function exists(resourceName: string): Promise<boolean> {
		const rows = await sequelize.query<{ table_name: string }>(
			"SELECT table_name FROM information_schema.tables WHERE table_schema = current_schema() AND table_name = $1",
			{ bind: [resourceName], type: QueryTypes.SELECT },
		);
		return rows.length > 0;
	}

	async function listResources(): Promise<Array<string>> {
		const rows = await sequelize.query<{ table_name: string }>(
			"SELECT table_name FROM information_schema.tables WHERE table_schema = current_schema() AND starts_with(table_name, $1) ORDER BY table_name",
			{ bind: [STORAGE_RESOURCE_PREFIX], type: QueryTypes.SELECT },
		);
		return rows.map(row => row.table_name).filter(isStorageResourceName);
	}

	async function create(resourceName: string): Promise<boolean> {
		const quoted = table(resourceName);
		try {
			await sequelize.query(
				`CREATE TABLE ${quoted} (id SERIAL PRIMARY KEY, document JSONB NOT NULL, created_at TIMESTAMPTZ NOT NULL DEFAULT now())`,
			);
		} catch (error) {
			// A concurrent CREATE TABLE of the same name loses on the catalog's unique index (23505),
			// which Sequelize raises as UniqueConstraintError rather than DatabaseError
			if (error instanceof UniqueConstraintError || getPostgresErrorCode(error) === DUPLICATE_TABLE) {
				log.info({ resourceName }, "Storage resource %s already exists", resourceName);
				return false;
			}
			throw error;
		}
		log.info({ resourceName }, "Created storage resource %s", resourceName);
		return true;
	}

	async function insertDocument(resourceName: string, document: TenantDocument): Promise<StoredDocument> {
		const rows = await sequelize.query<DocumentRow>(
			`INSERT INTO ${table(resourceName)} (document) VALUES ($1::jsonb) RETURNING id, document, created_at`,
			{ bind: [JSON.stringify(document)], type: QueryTypes.SELECT },
		);
		const [row] = rows;
		if (!row) {
			throw new Error(`Insert into ${resourceName} returned no row`);
		}
		return toStoredDocument(row);
	}

	async function readDocuments(resourceName: string, options: ReadDocumentsOptions): Promise<Array<StoredDocument>> {
		const rows = await sequelize.query<DocumentRow>(
			`SELECT id, document, created_at FROM ${table(resourceName)} WHERE id > $1 ORDER BY id LIMIT $2`,
			{ bind: [options.afterId ?? 0, options.limit], type: QueryTypes.SELECT },
		);
		return rows.map(toStoredDocument);
	}

	async function countDocuments(resourceName: string): Promise<number> {
		const rows = await sequelize.query<{ count: string }>(`SELECT COUNT(*) AS count FROM ${table(resourceName)}`, {
			type: QueryTypes.SELECT,
		});
		return Number.parseInt(rows[0]?.count ?? "0", 10);
	}

	async function drop(resourceName: string): Promise<void> {
		await sequelize.query(`DROP TABLE IF EXISTS ${table(resourceName)}`);
		log.info({ resourceName }, "Dropped storage resource %s", resourceName);
	}
}
