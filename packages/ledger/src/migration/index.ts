export {
	type IdMaps,
	idsPreservable,
	type MigrationExpectation,
	type MigrationOptions,
	type MigrationReport,
	type MigrationStatus,
	type MigrationVerifier,
	runDryRun,
	runMigration,
	verifyMigration,
} from "./engine.js";
export { loadMigrationSource, validateMigrationSource } from "./source.js";
