import { LedgerError } from "@pocket-ledger/core";
import { openDatabase } from "@pocket-ledger/sqlite-store";
import { createTempDir, type TempDir } from "@pocket-ledger/test-utils";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { bootstrapStorage } from "../bootstrap/index.js";

vi.mock("@pocket-ledger/sqlite-store", async (importOriginal) => {
	const actual = await importOriginal<typeof import("@pocket-ledger/sqlite-store")>();
	return { ...actual, openDatabase: vi.fn(actual.openDatabase) };
});

describe("bootstrapStorage when the database cannot be reopened", () => {
	let dir: TempDir;

	beforeEach(async () => {
		dir = await createTempDir();
	});

	afterEach(async () => {
		vi.mocked(openDatabase).mockClear();
		await dir.cleanup();
	});

	it("reports BOOTSTRAP_FAILED", async () => {
		const { openDatabase: realOpen } =
			await vi.importActual<typeof import("@pocket-ledger/sqlite-store")>("@pocket-ledger/sqlite-store");
		vi.mocked(openDatabase)
			.mockImplementationOnce(realOpen)
			.mockRejectedValueOnce(new Error("disk I/O error"));

		const error = await bootstrapStorage({
			storage: "sqlite",
			jsonPath: dir.file("data.json"),
			sqlitePath: dir.file("finance.db"),
			env: {},
		}).catch((e: unknown) => e);

		expect(LedgerError.is(error, "BOOTSTRAP_FAILED")).toBe(true);
		expect(error).toHaveProperty("message", "Cannot open SQLite database: disk I/O error");
		expect(openDatabase).toHaveBeenCalledTimes(2);
	});
});
