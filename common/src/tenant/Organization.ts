/** Organization as returned to callers of the provisioning engine */
export interface OrganizationView {
	id: string;
	name: string;
	slug: string;
	storageResourceName: string;
	/** Undefined when the owning administrator record is missing */
	adminEmail: string | undefined;
}

/** Outcome of renaming an organization */
export interface RenameResult {
	organization: OrganizationView;
	previousStorageResourceName: string;
	storageResourceName: string;
	/** Documents copied by this call (a resumed rename counts only its own copies) */
	copiedDocuments: number;
}

/** Progress of the document copy performed by a rename */
export interface RenameProgress {
	copiedDocuments: number;
	/** Id of the last source document copied, usable as `resumeAfter`; 0 before the first */
	cursor: number;
}

/** Sentinel document written into every freshly provisioned storage resource */
export interface StorageSentinel {
	schemaVersion: number;
	createdAt: string;
}
