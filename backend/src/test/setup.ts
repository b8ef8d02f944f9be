import { afterEach, beforeAll, beforeEach, vi } from "vitest";

/**
 * Restores process.env between tests so that a test changing configuration does not leak
 * into the next one, and drops the cached configuration built from it.
 */
let originalEnvSnapshot: Record<string, string | undefined>;

beforeAll(() => {
	originalEnvSnapshot = { ...process.env };
});

beforeEach(async () => {
	for (const key of Object.keys(process.env)) {
		if (!(key in originalEnvSnapshot)) {
			delete process.env[key];
		}
	}
	for (const [key, value] of Object.entries(originalEnvSnapshot)) {
		if (value !== undefined) {
			process.env[key] = value;
		}
	}
	// Imported lazily so that modules under test are loaded after each test file's vi.mock();
	// the real module is reset even where a test file mocks it
	const { resetConfig } = await vi.importActual<typeof import("../config/Config")>("../config/Config");
	resetConfig();
});

afterEach(() => {
	vi.unstubAllEnvs();
});
