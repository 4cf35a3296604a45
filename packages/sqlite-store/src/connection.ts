import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { LedgerError } from "@pocket-ledger/core";
import Database from "better-sqlite3";
import { Kysely, SqliteDialect } from "kysely";
import type { LedgerDatabase } from "./schema.js";

/** The schema shipped with this package. */
export const DEFAULT_SCHEMA_PATH = fileURLToPath(new URL("../sql/schema.sql", import.meta.url));

export interface OpenDatabaseOptions {
	/** File path, or `":memory:"`. */
	path: string;
	/** Default: {@link DEFAULT_SCHEMA_PATH} */
	schemaPath?: string;
}

export async function readSchema(schemaPath: string): Promise<string> {
	try {
		return await readFile(schemaPath, "utf-8");
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			throw LedgerError.migrationFailed(`schema.sql not found: ${schemaPath}`, error);
		}
		throw error;
	}
}

/**
 * Open one better-sqlite3 handle with WAL journaling and foreign keys on,
 * apply the schema (idempotent), and wrap the handle in Kysely.
 * `db.destroy()` closes the handle.
 */
export async function openDatabase(options: OpenDatabaseOptions): Promise<Kysely<LedgerDatabase>> {
	const schema = await readSchema(options.schemaPath ?? DEFAULT_SCHEMA_PATH);

	const sqlite = new Database(options.path);
	try {
		sqlite.pragma("journal_mode = WAL");
		sqlite.pragma("foreign_keys = ON");
		sqlite.exec(schema);
	} catch (error) {
		sqlite.close();
		throw LedgerError.migrationFailed(`Failed to apply schema to ${options.path}`, error);
	}

	return new Kysely<LedgerDatabase>({
		dialect: new SqliteDialect({ database: sqlite }),
	});
}

/**
 * Apply the schema inside a transaction and roll it back. Confirms the
 * schema is valid against `path` without changing any table.
 */
export async function checkSchema(options: OpenDatabaseOptions): Promise<void> {
	const schema = await readSchema(options.schemaPath ?? DEFAULT_SCHEMA_PATH);

	const sqlite = new Database(options.path);
	try {
		sqlite.exec("BEGIN");
		try {
			sqlite.exec(schema);
		} finally {
			sqlite.exec("ROLLBACK");
		}
	} catch (error) {
		throw LedgerError.migrationFailed(`Schema does not apply to ${options.path}`, error);
	} finally {
		sqlite.close();
	}
}
