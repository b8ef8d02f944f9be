import type { ReadDocumentsOptions, StoredDocument, TenantDocument, TenantStorageDao } from "./TenantStorageDao";
import { vi } from "vitest";

export function mockTenantStorageDao(partial?: Partial<TenantStorageDao>): TenantStorageDao {
	return {
		exists: vi.fn(),
		listResources: vi.fn(),
		create: vi.fn(),
		insertDocument: vi.fn(),
		readDocuments: vi.fn(),
		countDocuments: vi.fn(),
		drop: vi.fn(),
		...partial,
	};
}

interface MemoryResource {
	nextId: number;
	documents: Array<StoredDocument>;
}

export interface MemoryTenantStorage {
	readonly dao: TenantStorageDao;
	readonly resources: Map<string, MemoryResource>;
	/** Document contents of a resource in id order */
	contents(resourceName: string): Array<TenantDocument>;
}

/**
 * Storage resources held in memory. Ids start at 1 per resource like a SERIAL column,
 * and touching a resource that does not exist fails like a missing table.
 */
export function createMemoryTenantStorage(now: () => Date = () => new Date()): MemoryTenantStorage {
	const resources = new Map<string, MemoryResource>();

	function resource(resourceName: string): MemoryResource {
		const found = resources.get(resourceName);
		if (!found) {
			throw new Error(`relation "${resourceName}" does not exist`);
		}
		return found;
	}

	const dao: TenantStorageDao = {
		exists: vi.fn(async (resourceName: string) => resources.has(resourceName)),
		listResources: vi.fn(async () => [...resources.keys()].sort()),
		create: vi.fn(async (resourceName: string) => {
			if (resources.has(resourceName)) {
				return false;
			}
			resources.set(resourceName, { nextId: 1, documents: [] });
			return true;
		}),
		insertDocument: vi.fn(async (resourceName: string, document: TenantDocument) => {
			const target = resource(resourceName);
			const stored: StoredDocument = { id: target.nextId, document: structuredClone(document), createdAt: now() };
			target.nextId++;
			target.documents.push(stored);
			return stored;
		}),
		readDocuments: vi.fn(async (resourceName: string, options: ReadDocumentsOptions) => {
			const afterId = options.afterId ?? 0;
			return resource(resourceName)
				.documents.filter(document => document.id > afterId)
				.slice(0, options.limit);
		}),
		countDocuments: vi.fn(async (resourceName: string) => resource(resourceName).documents.length),
		drop: vi.fn(async (resourceName: string) => {
			resources.delete(resourceName);
		}),
	};

	return {
		dao,
		resources,
		contents: (resourceName: string) => resource(resourceName).documents.map(stored => stored.document),
	};
}
