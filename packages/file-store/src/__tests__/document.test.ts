import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { encodeDataset, LedgerError } from "@pocket-ledger/core";
import { buildSampleDataset, createTempDir, type TempDir } from "@pocket-ledger/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { readDocument, upgradeLegacyDocument, writeDocumentAtomic } from "../document.js";

let dir: TempDir;

beforeEach(async () => {
	dir = await createTempDir();
});

afterEach(async () => {
	await dir.cleanup();
});

describe("upgradeLegacyDocument", () => {
	it("turns a bare record array into a one-wallet document", () => {
		const { document, upgraded, dropped } = upgradeLegacyDocument([
			{ type: "income", date: "2024-01-01", amount: 10, category: "Salary" },
			{ type: "bonus", date: "2024-01-02", amount: 5 },
		]);

		expect(upgraded).toBe(true);
		expect(dropped).toBe(1);
		expect(document.wallets).toEqual([
			{
				id: 1,
				name: "Main wallet",
				currency: "KZT",
				initial_balance: 0,
				system: true,
				allow_negative: false,
				is_active: true,
			},
		]);
		expect(document.records).toEqual([
			{
				type: "income",
				date: "2024-01-01",
				category: "Salary",
				id: 1,
				wallet_id: 1,
				amount_original: 10,
				amount_kzt: 10,
				currency: "KZT",
				rate_at_operation: 1,
				description: "",
			},
		]);
	});

	it("carries the top-level initial balance into the system wallet", () => {
		const { document } = upgradeLegacyDocument({
			initial_balance: 250,
			records: [{ id: 4, type: "expense", date: "2024-03-01", amount: 20, category: "" }],
			mandatory_expenses: [{ date: "", amount: 70, category: "Rent", period: "monthly" }],
		});

		expect(document.wallets).toEqual([expect.objectContaining({ id: 1, initial_balance: 250 })]);
		expect(document.records).toEqual([
			expect.objectContaining({ id: 4, category: "General", amount_kzt: 20 }),
		]);
		expect(document.mandatory_expenses).toEqual([
			expect.objectContaining({ id: 1, amount_original: 70, period: "monthly" }),
		]);
		expect(document.transfers).toEqual([]);
	});

	it("leaves current documents alone", () => {
		const current = encodeDataset(buildSampleDataset());
		const result = upgradeLegacyDocument(current);
		expect(result.upgraded).toBe(false);
		expect(result.document).toBe(current);
	});

	it("rejects a scalar root", () => {
		expect(() => upgradeLegacyDocument(42)).toThrow("Document root must be an object or an array");
	});
});

describe("readDocument", () => {
	it("reports a missing file", async () => {
		const result = await readDocument(dir.file("nope.json"));
		expect(result.missing).toBe(true);
		expect(result.dataset.wallets).toEqual([]);
	});

	it("treats an empty file as an empty ledger", async () => {
		const path = dir.file("empty.json");
		await writeFile(path, "  \n", "utf-8");
		const result = await readDocument(path);
		expect(result.missing).toBe(false);
		expect(result.dataset.records).toEqual([]);
	});

	it("rejects invalid JSON", async () => {
		const path = dir.file("broken.json");
		await writeFile(path, "{ not json", "utf-8");
		await expect(readDocument(path)).rejects.toThrow(`${path} is not valid JSON`);
	});

	it("decodes an upgraded legacy file", async () => {
		const path = dir.file("legacy.json");
		await writeFile(
			path,
			JSON.stringify({ initial_balance: 100, records: [{ type: "income", date: "2024-05-05", amount: 40 }] }),
			"utf-8",
		);

		const result = await readDocument(path);
		expect(result.upgraded).toBe(true);
		expect(result.dataset.wallets[0]).toMatchObject({ id: 1, system: true, initialBalance: 100 });
		expect(result.dataset.records[0]).toMatchObject({
			id: 1,
			type: "income",
			walletId: 1,
			amountKzt: 40,
			category: "General",
		});
	});

	it("names the offending row when a field is invalid", async () => {
		const path = dir.file("bad-row.json");
		const doc = encodeDataset(buildSampleDataset());
		await writeFile(
			path,
			JSON.stringify({ ...doc, records: [{ ...doc.records[0], date: "2024-13-01" }, doc.records[1]] }),
			"utf-8",
		);

		const error = await readDocument(path).catch((e: unknown) => e);
		expect(LedgerError.is(error, "STORAGE_CORRUPT")).toBe(true);
		expect(error).toHaveProperty("message", expect.stringMatching(/^records\[0\]: /));
	});
});

describe("writeDocumentAtomic", () => {
	it("creates parent directories and writes pretty JSON", async () => {
		const path = join(dir.path, "nested", "deeper", "ledger.json");
		const doc = encodeDataset(buildSampleDataset());

		await writeDocumentAtomic(path, doc);

		const text = await readFile(path, "utf-8");
		expect(text.endsWith("}\n")).toBe(true);
		expect(JSON.parse(text)).toEqual(doc);
		expect(await readdir(join(dir.path, "nested", "deeper"))).toEqual(["ledger.json"]);
	});

	it("cleans up the temporary file when the rename fails", async () => {
		// A directory at the target path makes rename fail.
		const path = dir.file("taken");
		await mkdir(path);

		await expect(writeDocumentAtomic(path, encodeDataset(buildSampleDataset()))).rejects.toThrow();
		expect(await readdir(dir.path)).toEqual(["taken"]);
	});
});
