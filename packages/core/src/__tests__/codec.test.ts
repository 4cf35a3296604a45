import { describe, expect, it } from "vitest";
import {
	decodeDocument,
	decodeMandatoryExpense,
	decodeRecord,
	decodeWallet,
	encodeDataset,
	encodeMandatoryExpense,
	encodeRecord,
} from "../db/codec.js";
import { createMandatoryExpense } from "../domain/record.js";

describe("decodeWallet", () => {
	it("accepts integer booleans from SQL-style rows", () => {
		const wallet = decodeWallet({
			id: 1,
			name: "Main wallet",
			currency: "KZT",
			initial_balance: 10,
			system: 1,
			allow_negative: 0,
			is_active: 1,
		});
		expect(wallet.system).toBe(true);
		expect(wallet.allowNegative).toBe(false);
		expect(wallet.isActive).toBe(true);
	});

	it("reports the row position on failure", () => {
		expect(() => decodeWallet({ id: 0, name: "x", currency: "KZT" }, "wallets[3]")).toThrow(
			"wallets[3]: Wallet id must be a positive integer",
		);
	});

	it("rejects non-objects", () => {
		expect(() => decodeWallet("wallet", "wallets[0]")).toThrow("wallets[0]: expected an object");
	});
});

describe("decodeRecord", () => {
	it("keeps the stored rate instead of re-deriving it", () => {
		const record = decodeRecord({
			id: 4,
			type: "expense",
			date: "2025-01-01",
			wallet_id: 1,
			transfer_id: null,
			amount_original: 10,
			currency: "USD",
			rate_at_operation: 480,
			amount_kzt: 4800,
			category: "Books",
		});
		expect(record.rateAtOperation).toBe(480);
		expect(record.commissionForTransferId).toBeNull();
		expect(record.description).toBe("");
	});

	it("rejects unknown types", () => {
		expect(() => decodeRecord({ id: 1, type: "refund" }, "records[0]")).toThrow(
			"records[0]: unsupported record type 'refund'",
		);
	});

	it("flags STORAGE_CORRUPT", () => {
		try {
			decodeRecord({ id: 1, type: "income", date: "2025-02-30" });
			expect.unreachable();
		} catch (error) {
			expect(error).toMatchObject({ code: "STORAGE_CORRUPT" });
		}
	});
});

describe("decodeMandatoryExpense", () => {
	it("allows an empty date", () => {
		const expense = decodeMandatoryExpense({
			id: 1,
			date: "",
			wallet_id: 1,
			amount_original: 50,
			currency: "KZT",
			rate_at_operation: 1,
			amount_kzt: 50,
			category: "Mandatory",
			description: "Rent",
			period: "monthly",
		});
		expect(expense.type).toBe("mandatory_expense");
		expect(expense.date).toBe("");
	});
});

describe("document round trip", () => {
	it("decodes what it encodes", () => {
		const expense = createMandatoryExpense(
			{ id: 1, date: "", amountOriginal: 50, currency: "KZT", category: "Mandatory", description: "Rent", period: "yearly" },
			{ allowEmptyDate: true },
		);
		const doc = {
			wallets: [
				{ id: 1, name: "Main wallet", currency: "KZT", initial_balance: 0, system: true, allow_negative: false, is_active: true },
			],
			records: [],
			transfers: [],
			mandatory_expenses: [encodeMandatoryExpense(expense)],
		};
		const dataset = decodeDocument(doc);
		expect(encodeDataset(dataset)).toEqual(doc);
	});

	it("writes period only for mandatory records", () => {
		const dataset = decodeDocument({
			wallets: [],
			records: [
				{ id: 1, type: "income", date: "2025-01-01", wallet_id: 1, amount_original: 5, currency: "KZT", rate_at_operation: 1, amount_kzt: 5, category: "A" },
			],
		});
		const [record] = dataset.records;
		expect(record && "period" in encodeRecord(record)).toBe(false);
		expect(dataset.transfers).toEqual([]);
		expect(dataset.mandatoryExpenses).toEqual([]);
	});

	it("rejects a non-array collection", () => {
		expect(() => decodeDocument({ wallets: {} })).toThrow("'wallets' must be an array");
	});
});
