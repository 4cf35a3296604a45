import { readFile } from "node:fs/promises";
import { LedgerError, netWorth, walletBalances } from "@pocket-ledger/core";
import {
	assertDatasetBalanced,
	assertWalletBalance,
	buildWallet,
	createTestStores,
	type TestStores,
} from "@pocket-ledger/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createLedger, type Ledger } from "../ledger/base.js";

// =============================================================================
// LEDGER FACADE TESTS -- run against both stores
// =============================================================================

async function codeOf(promise: Promise<unknown>): Promise<string | undefined> {
	try {
		await promise;
	} catch (error) {
		return LedgerError.is(error) ? error.code : "not a LedgerError";
	}
	return undefined;
}

describe.each(["json", "sqlite"] as const)("ledger on the %s store", (kind) => {
	let stores: TestStores;
	let ledger: Ledger;

	beforeEach(async () => {
		stores = await createTestStores();
		await stores[kind].replaceAllData({
			wallets: [
				buildWallet({ initialBalance: 1000 }),
				buildWallet({ id: 2, name: "Card", initialBalance: 500 }),
			],
			records: [],
			transfers: [],
			mandatoryExpenses: [],
		});
		ledger = createLedger({ store: stores[kind], today: () => "2025-06-30" });
	});

	afterEach(async () => {
		await stores.cleanup();
	});

	// =========================================================================
	// TRANSFERS
	// =========================================================================

	describe("transfers", () => {
		it("moves 100 KZT from A to B and keeps net worth", async () => {
			const { transfer, legs, commission } = await ledger.transfers.create({
				fromWalletId: 1,
				toWalletId: 2,
				date: "2025-03-01",
				amount: 100,
				currency: "KZT",
			});

			expect(transfer.id).toBe(1);
			expect(legs.map((leg) => [leg.type, leg.walletId, leg.transferId])).toEqual([
				["expense", 1, 1],
				["income", 2, 1],
			]);
			expect(commission).toBeNull();
			await assertWalletBalance(stores[kind], 1, 900);
			await assertWalletBalance(stores[kind], 2, 600);
			expect(await ledger.wallets.netWorth()).toBe(1500);
			assertDatasetBalanced(await ledger.snapshot());
		});

		it("lowers net worth by exactly the commission", async () => {
			const { commission } = await ledger.transfers.create({
				fromWalletId: 1,
				toWalletId: 2,
				date: "2025-03-01",
				amount: 100,
				currency: "KZT",
				commission: { amount: 5, currency: "KZT" },
			});

			expect(commission).toMatchObject({
				type: "expense",
				walletId: 1,
				category: "Commission",
				transferId: null,
				commissionForTransferId: 1,
				amountKzt: 5,
			});
			expect(await ledger.wallets.balance(1)).toBe(895);
			expect(await ledger.wallets.balance(2)).toBe(600);
			expect(await ledger.wallets.netWorth()).toBe(1495);
		});

		it("converts a foreign-currency transfer and fixes the rate on both legs", async () => {
			const { transfer, legs } = await ledger.transfers.create({
				fromWalletId: 1,
				toWalletId: 2,
				date: "2025-03-01",
				amount: 1,
				currency: "usd",
			});

			expect(transfer).toMatchObject({ currency: "USD", amountKzt: 500, rateAtOperation: 500 });
			expect(legs.map((leg) => leg.rateAtOperation)).toEqual([500, 500]);
			expect(await ledger.wallets.balance(1)).toBe(500);
		});

		it("refuses to overdraw before writing anything", async () => {
			expect(
				await codeOf(
					ledger.transfers.create({
						fromWalletId: 2,
						toWalletId: 1,
						date: "2025-03-01",
						amount: 400,
						currency: "KZT",
						commission: { amount: 200, currency: "KZT" },
					}),
				),
			).toBe("INSUFFICIENT_FUNDS");
			expect(await ledger.transfers.list()).toEqual([]);
			expect(await ledger.records.list()).toEqual([]);
		});

		it("rejects missing, inactive and identical wallets", async () => {
			const spare = await ledger.wallets.create({ name: "Spare", currency: "KZT" });
			await ledger.wallets.softDelete(spare.id);
			const base = { date: "2025-03-01", amount: 10, currency: "KZT" };

			expect(await codeOf(ledger.transfers.create({ ...base, fromWalletId: 1, toWalletId: 9 }))).toBe(
				"NOT_FOUND",
			);
			expect(
				await codeOf(ledger.transfers.create({ ...base, fromWalletId: 1, toWalletId: spare.id })),
			).toBe("DOMAIN_RULE_VIOLATION");
			expect(await codeOf(ledger.transfers.create({ ...base, fromWalletId: 1, toWalletId: 1 }))).toBe(
				"INVALID_ARGUMENT",
			);
		});

		it("rejects dates after today", async () => {
			await expect(
				ledger.transfers.create({
					fromWalletId: 1,
					toWalletId: 2,
					date: "2025-07-01",
					amount: 10,
					currency: "KZT",
				}),
			).rejects.toThrow("Date cannot be in the future");
		});

		it("deletes the transfer with both legs and the commission", async () => {
			await ledger.records.createIncome({ date: "2025-02-01", amount: 10, currency: "KZT", category: "Gift" });
			await ledger.transfers.create({
				fromWalletId: 1,
				toWalletId: 2,
				date: "2025-03-01",
				amount: 100,
				currency: "KZT",
				commission: { amount: 5, currency: "KZT" },
			});

			expect(await ledger.transfers.delete(1)).toBe(3);

			const dataset = await ledger.snapshot();
			expect(dataset.transfers).toEqual([]);
			expect(dataset.records.map((record) => record.category)).toEqual(["Gift"]);
			expect(netWorth(dataset.wallets, dataset.records)).toBe(1510);
		});

		it("fails to delete the same transfer twice", async () => {
			await ledger.transfers.create({
				fromWalletId: 1,
				toWalletId: 2,
				date: "2025-03-01",
				amount: 100,
				currency: "KZT",
			});
			await ledger.transfers.delete(1);

			await expect(ledger.transfers.delete(1)).rejects.toThrow("Transfer 1 not found");
			expect(await codeOf(ledger.transfers.delete(1))).toBe("DOMAIN_RULE_VIOLATION");
		});
	});

	// =========================================================================
	// RECORDS
	// =========================================================================

	describe("records", () => {
		it("derives the rate from the provider", async () => {
			const eur = await ledger.records.createIncome({
				date: "2025-02-01",
				amount: 2,
				currency: "EUR",
				category: "Refund",
			});
			const kzt = await ledger.records.createIncome({
				date: "2025-02-01",
				amount: 0,
				currency: "KZT",
				category: "Zero",
			});

			expect(eur).toMatchObject({ amountKzt: 1180, rateAtOperation: 590, walletId: 1 });
			expect(kzt.rateAtOperation).toBe(1);
		});

		it("rejects an expense larger than the balance", async () => {
			expect(
				await codeOf(
					ledger.records.createExpense({
						date: "2025-02-01",
						walletId: 2,
						amount: 501,
						currency: "KZT",
						category: "Food",
					}),
				),
			).toBe("INSUFFICIENT_FUNDS");

			await ledger.records.createExpense({
				date: "2025-02-01",
				walletId: 2,
				amount: 500,
				currency: "KZT",
				category: "Food",
			});
			expect(await ledger.wallets.balance(2)).toBe(0);
		});

		it("lets a wallet with allowNegative go below zero", async () => {
			const credit = await ledger.wallets.create({ name: "Credit", currency: "KZT", allowNegative: true });
			await ledger.records.createExpense({
				date: "2025-02-01",
				walletId: credit.id,
				amount: 70,
				currency: "KZT",
				category: "Food",
			});
			expect(await ledger.wallets.balance(credit.id)).toBe(-70);
		});

		it("corrects the base amount and re-derives the rate", async () => {
			const income = await ledger.records.createIncome({
				date: "2025-02-01",
				amount: 10,
				currency: "USD",
				category: "Salary",
			});

			const updated = await ledger.records.updateAmountKzt(income.id, 5200);

			expect(updated).toMatchObject({ id: income.id, amountOriginal: 10, amountKzt: 5200, rateAtOperation: 520 });
			expect((await ledger.records.list())[0]).toEqual(updated);
		});

		it("refuses to edit a transfer leg", async () => {
			const { legs } = await ledger.transfers.create({
				fromWalletId: 1,
				toWalletId: 2,
				date: "2025-03-01",
				amount: 100,
				currency: "KZT",
			});
			expect(await codeOf(ledger.records.updateAmountKzt(legs[0].id, 50))).toBe("DOMAIN_RULE_VIOLATION");
		});

		it("deletes a whole transfer when a leg is deleted by index", async () => {
			await ledger.records.createIncome({ date: "2025-02-01", amount: 10, currency: "KZT", category: "Gift" });
			await ledger.transfers.create({
				fromWalletId: 1,
				toWalletId: 2,
				date: "2025-03-01",
				amount: 100,
				currency: "KZT",
			});

			expect(await ledger.records.delete(2)).toBe(true);

			expect(await ledger.transfers.list()).toEqual([]);
			expect((await ledger.records.list()).map((record) => record.category)).toEqual(["Gift"]);
			expect(await ledger.records.delete(5)).toBe(false);
		});

		it("deleteAll clears records and transfers", async () => {
			await ledger.transfers.create({
				fromWalletId: 1,
				toWalletId: 2,
				date: "2025-03-01",
				amount: 100,
				currency: "KZT",
			});
			await ledger.records.deleteAll();
			const dataset = await ledger.snapshot();
			expect([dataset.records.length, dataset.transfers.length, dataset.wallets.length]).toEqual([0, 0, 2]);
		});
	});

	// =========================================================================
	// WALLETS
	// =========================================================================

	describe("wallets", () => {
		it("soft-deletes only empty non-system wallets", async () => {
			expect(await codeOf(ledger.wallets.softDelete(1))).toBe("DOMAIN_RULE_VIOLATION");
			expect(await codeOf(ledger.wallets.softDelete(2))).toBe("DOMAIN_RULE_VIOLATION");
			expect(await codeOf(ledger.wallets.softDelete(42))).toBe("NOT_FOUND");

			const spare = await ledger.wallets.create({ name: "Spare", currency: "usd" });
			expect(spare).toMatchObject({ id: 3, currency: "USD", isActive: true, system: false });

			const deleted = await ledger.wallets.softDelete(3);
			expect(deleted.isActive).toBe(false);
			expect((await ledger.wallets.listActive()).map((wallet) => wallet.id)).toEqual([1, 2]);
			expect((await ledger.wallets.list()).map((wallet) => wallet.id)).toEqual([1, 2, 3]);
		});
	});

	// =========================================================================
	// MANDATORY TEMPLATES
	// =========================================================================

	describe("mandatory expenses", () => {
		it("applies a template as a dated record and keeps the template", async () => {
			const template = await ledger.mandatory.create({
				amount: 50,
				currency: "KZT",
				category: "Housing",
				description: "Rent",
				period: "monthly",
			});
			expect(template).toMatchObject({ id: 1, date: "", period: "monthly" });

			const applied = await ledger.mandatory.apply({ index: 0, date: "2025-06-01" });

			expect(applied).toMatchObject({ type: "mandatory_expense", date: "2025-06-01", amountKzt: 50 });
			expect(await ledger.wallets.balance(1)).toBe(950);
			expect(await ledger.mandatory.list()).toHaveLength(1);
		});

		it("deletes templates by index", async () => {
			await ledger.mandatory.create({
				amount: 50,
				currency: "KZT",
				category: "Housing",
				description: "Rent",
				period: "monthly",
			});
			expect(await ledger.mandatory.delete(5)).toBe(false);
			expect(await ledger.mandatory.delete(0)).toBe(true);
			expect(await ledger.mandatory.list()).toEqual([]);
			expect(await codeOf(ledger.mandatory.apply({ index: 0, date: "2025-06-01" }))).toBe("NOT_FOUND");
		});
	});

	// =========================================================================
	// IMPORT / EXPORT
	// =========================================================================

	describe("import and export", () => {
		it("round-trips counts and balances through export rows", async () => {
			await ledger.records.createIncome({ date: "2025-02-01", amount: 2, currency: "EUR", category: "Refund" });
			await ledger.records.createExpense({ date: "2025-02-02", walletId: 2, amount: 30, currency: "KZT", category: "Food" });
			await ledger.transfers.create({
				fromWalletId: 1,
				toWalletId: 2,
				date: "2025-03-01",
				amount: 100,
				currency: "KZT",
				commission: { amount: 5, currency: "KZT" },
			});
			const before = await ledger.snapshot();

			const rows = await ledger.imports.exportRows();
			const summary = await ledger.imports.importDataset(rows, "full_backup");

			const after = await ledger.snapshot();
			expect(summary).toMatchObject({ imported: 4, skipped: 0, errors: [] });
			expect([after.records.length, after.transfers.length, after.wallets.length]).toEqual([
				before.records.length,
				before.transfers.length,
				before.wallets.length,
			]);
			expect(walletBalances(after.wallets, after.records)).toEqual(
				walletBalances(before.wallets, before.records),
			);
			expect(after.records.find((record) => record.category === "Commission")?.commissionForTransferId).toBe(1);
			assertDatasetBalanced(after);
		});

		it("aborts a batch with one bad date and leaves the store untouched", async () => {
			await ledger.records.createIncome({ date: "2025-02-01", amount: 10, currency: "KZT", category: "Gift" });
			const before = await ledger.snapshot();
			const fileBefore = kind === "json" ? await readFile(stores.jsonPath, "utf-8") : "";

			const row = {
				type: "income",
				category: "Salary",
				amount_original: "100",
				currency: "KZT",
				rate_at_operation: "1",
				amount_kzt: "100",
			};
			const rows = [
				{ ...row, date: "2025-01-01" },
				{ ...row, date: "2025-13-01" },
				{ ...row, date: "2025-01-03" },
			];

			const error = await ledger.imports.importDataset(rows, "full_backup").catch((e: unknown) => e);

			expect(LedgerError.is(error, "IMPORT_REJECTED")).toBe(true);
			expect(error).toHaveProperty(
				"message",
				"Import aborted: 1 invalid rows. row 2: invalid date '2025-13-01' (Invalid month)",
			);
			expect(await ledger.snapshot()).toEqual(before);
			if (kind === "json") {
				expect(await readFile(stores.jsonPath, "utf-8")).toBe(fileBefore);
			}
		});

		it("resets the opening balance from an initial_balance row", async () => {
			await ledger.imports.importDataset([{ type: "initial_balance", amount_original: "250" }], "legacy");
			expect(await ledger.wallets.balance(1)).toBe(250);
			expect(await ledger.wallets.balance(2)).toBe(500);
		});

		it("parses a single row with the ledger's rates", () => {
			expect(
				ledger.imports.parse(
					{ date: "2025-01-01", type: "income", category: "Tips", amount_original: "3", currency: "USD" },
					"current_rate",
				),
			).toMatchObject({ kind: "record", record: { amountKzt: 1500, rateAtOperation: 500 } });
		});
	});
});
