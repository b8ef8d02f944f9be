import slugify from "slugify";

const SLUG_REGEX = /^[a-z0-9-]+$/;

/**
 * Prefix of every tenant storage resource name.
 */
export const STORAGE_RESOURCE_PREFIX = "tenant_";

/**
 * Storage resource names are PostgreSQL identifiers, which are cut off at 63 bytes.
 * `tenant_` takes 7 of them.
 */
export const MAX_SLUG_LENGTH = 63 - STORAGE_RESOURCE_PREFIX.length;

const STORAGE_RESOURCE_REGEX = new RegExp(`^${STORAGE_RESOURCE_PREFIX}[a-z0-9-]{1,${MAX_SLUG_LENGTH}}$`);

/**
 * Thrown when a name does not produce a usable slug.
 */
export class SlugValidationError extends Error {
	constructor(
		readonly input: string,
		readonly reason: string,
	) {
		super(`Invalid organization name "${input}": ${reason}`);
		this.name = "SlugValidationError";
	}
}

/**
 * Derive the canonical slug of an organization name.
 * Lower-cases, transliterates accents, collapses whitespace and hyphens into single hyphens,
 * and drops every other character. Normalizing a slug returns the same slug.
 *
 * @example
 * normalizeOrganizationName("Acme Inc") // "acme-inc"
 * normalizeOrganizationName("  Café -- Délice ") // "cafe-delice"
 *
 * @throws SlugValidationError when the slug is empty, too long, or outside `[a-z0-9-]`
 */
export function normalizeOrganizationName(name: string): string {
	const slug = slugify(name, {
		lower: true,
		strict: true,
		trim: true,
	});

	if (!slug) {
		throw new SlugValidationError(name, "it contains no letters or digits");
	}
	if (!SLUG_REGEX.test(slug)) {
		throw new SlugValidationError(name, `"${slug}" contains characters outside [a-z0-9-]`);
	}
	if (slug.length > MAX_SLUG_LENGTH) {
		throw new SlugValidationError(name, `slug is longer than ${MAX_SLUG_LENGTH} characters`);
	}
	return slug;
}

/**
 * Name of the dedicated storage resource of the organization with the given slug.
 */
export function storageResourceName(slug: string): string {
	return `${STORAGE_RESOURCE_PREFIX}${slug}`;
}

/**
 * Whether a name has the shape of a tenant storage resource (`tenant_<slug>`).
 */
export function isStorageResourceName(name: string): boolean {
	return STORAGE_RESOURCE_REGEX.test(name);
}
