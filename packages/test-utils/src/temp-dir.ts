import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

export interface TempDir {
	path: string;
	/** Absolute path of `name` inside the directory. */
	file(name: string): string;
	cleanup(): Promise<void>;
}

export async function createTempDir(prefix = "pocket-ledger-"): Promise<TempDir> {
	const path = await mkdtemp(join(tmpdir(), prefix));
	return {
		path,
		file: (name) => join(path, name),
		cleanup: () => rm(path, { recursive: true, force: true }),
	};
}
