import type { LedgerStore } from "@pocket-ledger/core";
import { jsonFileStore } from "@pocket-ledger/file-store";
import { openSqliteStore } from "@pocket-ledger/sqlite-store";
import { createTempDir, type TempDir } from "./temp-dir.js";

export interface TestStores {
	dir: TempDir;
	jsonPath: string;
	sqlitePath: string;
	json: LedgerStore;
	sqlite: LedgerStore;
	/** Close both stores and remove the directory -- call in afterEach. */
	cleanup: () => Promise<void>;
}

/** A JSON store and an SQLite store side by side in a fresh temp dir. */
export async function createTestStores(): Promise<TestStores> {
	const dir = await createTempDir();
	const jsonPath = dir.file("ledger.json");
	const sqlitePath = dir.file("ledger.db");
	const json = jsonFileStore({ path: jsonPath });
	const sqlite = await openSqliteStore({ path: sqlitePath });

	return {
		dir,
		jsonPath,
		sqlitePath,
		json,
		sqlite,
		cleanup: async () => {
			await json.close();
			await sqlite.close();
			await dir.cleanup();
		},
	};
}
