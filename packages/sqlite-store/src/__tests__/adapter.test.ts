import { LedgerError, type LedgerStore } from "@pocket-ledger/core";
import {
	assertWalletBalance,
	buildExpense,
	buildIncome,
	buildMandatory,
	buildSampleDataset,
	buildTransferPair,
	createTempDir,
} from "@pocket-ledger/test-utils";
import { sql } from "kysely";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { openSqliteStore, sqliteStore } from "../adapter.js";
import { openDatabase } from "../connection.js";

// =============================================================================
// SQLITE STORE TESTS
// =============================================================================

let store: LedgerStore;

beforeEach(async () => {
	store = await openSqliteStore({ path: ":memory:" });
});

afterEach(async () => {
	await store.close();
});

async function codeOf(promise: Promise<unknown>): Promise<string | undefined> {
	try {
		await promise;
	} catch (error) {
		return LedgerError.is(error) ? error.code : "not a LedgerError";
	}
	return undefined;
}

describe("sqliteStore", () => {
	it("has id 'sqlite'", () => {
		expect(store.id).toBe("sqlite");
	});

	it("starts empty", async () => {
		expect(await store.loadDataset()).toEqual({
			wallets: [],
			records: [],
			transfers: [],
			mandatoryExpenses: [],
		});
		expect(await store.loadInitialBalance()).toBe(0);
	});

	// =========================================================================
	// WALLETS
	// =========================================================================

	describe("wallets", () => {
		it("creates the system wallet once", async () => {
			const wallet = await store.getSystemWallet();
			expect(wallet).toMatchObject({ id: 1, name: "Main wallet", system: true, isActive: true });
			await store.getSystemWallet();
			expect(await store.loadWallets()).toHaveLength(1);
		});

		it("allocates max + 1 ids and upper-cases currencies", async () => {
			await store.getSystemWallet();
			const card = await store.createWallet({ name: "Card", currency: "eur", allowNegative: true });
			expect(card).toMatchObject({ id: 2, currency: "EUR", allowNegative: true, initialBalance: 0 });
		});

		it("upserts wallets by id", async () => {
			const card = await store.createWallet({ name: "Card", currency: "KZT" });
			await store.saveWallet({ ...card, name: "Debit card" });
			expect((await store.loadWallets()).map((w) => w.name)).toEqual(["Debit card"]);
		});

		it("rejects a second system wallet", async () => {
			await store.getSystemWallet();
			const card = await store.createWallet({ name: "Card", currency: "KZT" });
			expect(await codeOf(store.saveWallet({ ...card, system: true }))).toBe("INVALID_ARGUMENT");
		});

		it("soft-deletes regular wallets only", async () => {
			await store.getSystemWallet();
			const card = await store.createWallet({ name: "Card", currency: "KZT" });

			expect(await codeOf(store.softDeleteWallet(1))).toBe("DOMAIN_RULE_VIOLATION");
			expect(await store.softDeleteWallet(card.id)).toBe(true);
			expect(await store.softDeleteWallet(99)).toBe(false);
			expect((await store.loadActiveWallets()).map((w) => w.id)).toEqual([1]);
		});

		it("keeps the initial balance on the system wallet", async () => {
			await store.saveInitialBalance(320.5);
			expect(await store.loadInitialBalance()).toBe(320.5);
			expect((await store.getSystemWallet()).initialBalance).toBe(320.5);
		});
	});

	// =========================================================================
	// RECORDS
	// =========================================================================

	describe("records", () => {
		beforeEach(async () => {
			await store.getSystemWallet();
		});

		it("assigns ids and reads records back in id order", async () => {
			const income = await store.save(buildIncome({ amountOriginal: 250 }));
			const expense = await store.save(buildExpense({ currency: "USD", amountOriginal: 2, amountKzt: 1000 }));

			expect([income.id, expense.id]).toEqual([1, 2]);
			expect(await store.loadAll()).toEqual([income, expense]);
			expect((await store.getById(2)).rateAtOperation).toBe(500);
		});

		it("moves a clashing id to max + 1", async () => {
			await store.save(buildIncome({ id: 3 }));
			expect((await store.save(buildIncome({ id: 3 }))).id).toBe(4);
		});

		it("rejects records on unknown wallets", async () => {
			await expect(store.save(buildIncome({ walletId: 5 }))).rejects.toThrow(
				"Record references missing wallet 5",
			);
		});

		it("replaces existing records and refuses unknown ids", async () => {
			const saved = await store.save(buildExpense({ amountOriginal: 40 }));
			await store.replace(buildExpense({ id: saved.id, amountOriginal: 45, description: "fixed" }));
			expect(await store.getById(saved.id)).toMatchObject({ amountKzt: 45, description: "fixed" });
			expect(await codeOf(store.replace(buildExpense({ id: 50 })))).toBe("NOT_FOUND");
		});

		it("deletes by position in id order", async () => {
			await store.save(buildIncome({ id: 10, description: "ten" }));
			await store.save(buildIncome({ id: 5, description: "five" }));

			expect(await store.deleteByIndex(2)).toBe(false);
			expect(await store.deleteByIndex(0)).toBe(true);
			expect((await store.loadAll()).map((r) => r.description)).toEqual(["ten"]);
		});

		it("deletes a whole transfer through one of its legs", async () => {
			await store.replaceAllData(buildSampleDataset());
			const gift = await store.save(buildIncome({ amountOriginal: 20, description: "gift" }));
			await store.save(buildExpense({ amountOriginal: 5, category: "Commission", commissionForTransferId: 1 }));

			expect(await store.deleteByIndex(1)).toBe(true);
			expect(await store.loadAll()).toEqual([gift]);
			expect(await store.loadTransfers()).toEqual([]);
			await assertWalletBalance(store, 1, 1020);
			await assertWalletBalance(store, 2, 500);
		});

		it("refuses a replace that would leave a transfer with one leg", async () => {
			await store.replaceAllData(buildSampleDataset());

			await expect(store.replace(buildIncome({ id: 2, walletId: 2 }))).rejects.toThrow(
				"Transfer 1 must have exactly 2 linked records, found 1",
			);
			expect((await store.loadAll()).map((r) => r.transferId)).toEqual([1, 1]);
		});

		it("stores mandatory expenses in the records table with their period", async () => {
			const saved = await store.save(buildMandatory({ date: "2025-03-01", period: "yearly" }));
			expect(await store.getById(saved.id)).toMatchObject({ type: "mandatory_expense", period: "yearly" });
		});
	});

	// =========================================================================
	// MANDATORY TEMPLATES
	// =========================================================================

	describe("mandatory templates", () => {
		beforeEach(async () => {
			await store.getSystemWallet();
		});

		it("saves, deletes by index and clears templates", async () => {
			await store.saveMandatoryExpense(buildMandatory({ description: "Rent" }));
			await store.saveMandatoryExpense(buildMandatory({ description: "Internet", period: "weekly" }));
			expect((await store.loadMandatoryExpenses()).map((m) => [m.id, m.description, m.date])).toEqual([
				[1, "Rent", ""],
				[2, "Internet", ""],
			]);

			expect(await store.deleteMandatoryExpenseByIndex(0)).toBe(true);
			expect((await store.loadMandatoryExpenses()).map((m) => m.description)).toEqual(["Internet"]);

			await store.deleteAllMandatoryExpenses();
			expect(await store.loadMandatoryExpenses()).toEqual([]);
		});

		it("replaces the template list", async () => {
			await store.saveMandatoryExpense(buildMandatory({ description: "Old" }));
			await store.replaceMandatoryExpenses([buildMandatory({ id: 0, description: "New" })]);
			expect((await store.loadMandatoryExpenses()).map((m) => [m.id, m.description])).toEqual([[1, "New"]]);
		});
	});

	// =========================================================================
	// BULK + INTEGRITY
	// =========================================================================

	describe("bulk replace", () => {
		it("round-trips a full dataset", async () => {
			const sample = buildSampleDataset();
			await store.replaceAllData(sample);

			expect(await store.loadDataset()).toEqual(sample);
			await assertWalletBalance(store, 1, 900);
			await assertWalletBalance(store, 2, 600);
		});

		it("rolls back a replace that fails integrity", async () => {
			await store.replaceAllData(buildSampleDataset());
			const { transfer, legs } = buildTransferPair({ id: 9, fromWalletId: 1, toWalletId: 2, amount: 5 });

			const code = await codeOf(store.replaceRecordsAndTransfers([legs[1]], [transfer]));

			expect(code).toBe("BROKEN_TRANSFER_PAIR");
			expect(await store.loadDataset()).toEqual(buildSampleDataset());
		});

		it("appends a transfer with its legs through replaceRecordsAndTransfers", async () => {
			const sample = buildSampleDataset();
			await store.replaceAllData(sample);
			const { transfer, legs } = buildTransferPair({ id: 2, fromWalletId: 2, toWalletId: 1, amount: 50 });

			await store.replaceRecordsAndTransfers([...sample.records, ...legs], [...sample.transfers, transfer]);

			expect((await store.loadAll()).map((r) => r.id)).toEqual([1, 2, 3, 4]);
			await assertWalletBalance(store, 1, 950);
			await assertWalletBalance(store, 2, 550);
		});

		it("deleteAll removes records and transfers but keeps wallets", async () => {
			await store.replaceAllData(buildSampleDataset());
			await store.deleteAll();
			const dataset = await store.loadDataset();
			expect(dataset.records).toEqual([]);
			expect(dataset.transfers).toEqual([]);
			expect(dataset.wallets).toHaveLength(2);
		});
	});
});

describe("sqliteStore on disk", () => {
	it("refuses to return records whose transfer disappeared", async () => {
		const dir = await createTempDir();
		try {
			const path = dir.file("ledger.db");
			const first = await openSqliteStore({ path });
			await first.replaceAllData(buildSampleDataset());
			await first.close();

			// Remove the transfer behind the store's back.
			const db = await openDatabase({ path });
			await sql`PRAGMA foreign_keys = OFF`.execute(db);
			await sql`DELETE FROM transfers`.execute(db);
			const store = sqliteStore(db);

			expect(await codeOf(store.loadAll())).toBe("DANGLING_TRANSFER_LINK");
			expect(await store.loadWallets()).toHaveLength(2);
			await store.close();
		} finally {
			await dir.cleanup();
		}
	});
});
