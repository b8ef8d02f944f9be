#!/usr/bin/env node

/**
 * ReconcileTenants - CLI entry point for the tenant reconciliation audit.
 *
 * This is a thin wrapper that calls runReconcileCli() and exits with the returned code.
 * All logic is in TenantReconciliation.ts where it can be tested.
 *
 * ## Usage
 *
 * ```bash
 * # Report orphaned storage resources and administrators
 * npx tsx backend/src/cli/ReconcileTenants.ts
 *
 * # Drop a storage resource left behind by a rename, then report again
 * npx tsx backend/src/cli/ReconcileTenants.ts --reclaim-storage tenant_acme-inc
 *
 * # Delete an administrator left behind by an interrupted create
 * npx tsx backend/src/cli/ReconcileTenants.ts --reclaim-admin <admin-id>
 * ```
 *
 * Reclaim only while no create or rename is running. A create in progress has a storage
 * resource and an administrator but no organization yet, so both look orphaned.
 *
 * @module ReconcileTenants
 */

import { EXIT_CODES, runReconcileCli } from "./TenantReconciliation";

// Run the CLI and exit with the returned code
runReconcileCli()
	.then(result => {
		process.exit(result.exitCode);
	})
	.catch(error => {
		console.error("Unhandled error:", error);
		process.exit(EXIT_CODES.ERROR);
	});
