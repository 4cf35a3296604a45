import { access, copyFile, mkdir } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

/** Local time as `YYYYMMDD_HHMMSS`. */
export function backupStamp(now: Date): string {
	const date = `${pad(now.getFullYear(), 4)}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
	const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
	return `${date}_${time}`;
}

/** `{dir}/backups/{stem}_backup_{stamp}{ext}` for a file at `{dir}/{stem}{ext}`. */
export function backupPathFor(path: string, now: Date): string {
	const ext = extname(path);
	const stem = basename(path, ext);
	return join(dirname(path), "backups", `${stem}_backup_${backupStamp(now)}${ext}`);
}

export async function fileExists(path: string): Promise<boolean> {
	try {
		await access(path);
		return true;
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			return false;
		}
		throw error;
	}
}

/**
 * Copy `path` into its `backups/` directory. Returns the copy's path, or
 * null when there is nothing to back up.
 */
export async function createBackup(path: string, now: Date = new Date()): Promise<string | null> {
	if (!(await fileExists(path))) return null;
	const target = backupPathFor(path, now);
	await mkdir(dirname(target), { recursive: true });
	await copyFile(path, target);
	return target;
}
