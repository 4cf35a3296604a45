import { buildSampleDataset } from "@pocket-ledger/test-utils";
import { describe, expect, it } from "vitest";
import { exportRows, importRows } from "../import/importer.js";

const leg = {
	date: "2025-02-01",
	category: "Transfer",
	amount_original: "50",
	currency: "KZT",
	rate_at_operation: "1",
	amount_kzt: "50",
};

const transferRow = {
	...leg,
	type: "transfer",
	from_wallet_id: "1",
	to_wallet_id: "2",
};

describe("importRows", () => {
	it("skips a row with a malformed currency", () => {
		const summary = importRows(
			[
				{
					date: "2025-01-01",
					type: "income",
					category: "Salary",
					amount_original: "10",
					currency: "US",
					rate_at_operation: "1",
					amount_kzt: "10",
				},
			],
			{ policy: "full_backup" },
		);

		expect(summary).toMatchObject({ imported: 0, skipped: 1, errors: ["row 1: invalid currency 'US'"], records: [] });
	});

	it("rejects batches over the row limit", () => {
		expect(() => importRows([{}, {}, {}], { policy: "legacy", maxRows: 2 })).toThrow(
			"Import has 3 rows, the maximum is 2",
		);
	});

	it("ignores blank rows but keeps row numbers", () => {
		const summary = importRows([{}, { date: " ", type: "" }, { date: "2025-01-01", type: "income" }], {
			policy: "legacy",
			firstRowNumber: 2,
		});
		expect(summary.errors).toEqual(["row 4: missing required field 'category'"]);
	});

	it("restores a transfer from its two legs", () => {
		const summary = importRows(
			[
				{ ...leg, type: "expense", wallet_id: "1", transfer_id: "5" },
				{ ...leg, type: "income", wallet_id: "2", transfer_id: "5" },
			],
			{ policy: "full_backup" },
		);

		expect(summary).toMatchObject({ imported: 2, skipped: 0, errors: [] });
		expect(summary.transfers).toHaveLength(1);
		expect(summary.transfers[0]).toMatchObject({ id: 5, fromWalletId: 1, toWalletId: 2, amountKzt: 50 });
	});

	it("drops a leg whose transfer is missing", () => {
		const summary = importRows([{ ...leg, type: "expense", wallet_id: "1", transfer_id: "7" }], {
			policy: "full_backup",
		});
		expect(summary.errors).toEqual(["Transfer #7: missing transfer aggregate"]);
		expect(summary.records).toEqual([]);
	});

	it("drops legs that disagree", () => {
		const summary = importRows(
			[
				{ ...leg, type: "expense", wallet_id: "1", transfer_id: "5" },
				{ ...leg, type: "income", wallet_id: "2", transfer_id: "5", amount_original: "60", amount_kzt: "60" },
			],
			{ policy: "full_backup" },
		);
		expect(summary.errors).toEqual(["Transfer 5 legs disagree on amount, currency or rate"]);
		expect(summary.records).toEqual([]);
		expect(summary.transfers).toEqual([]);
	});

	it("drops a commission whose transfer is missing", () => {
		const summary = importRows(
			[{ ...leg, type: "expense", wallet_id: "1", category: "Commission", commission_for_transfer_id: "9" }],
			{ policy: "full_backup" },
		);
		expect(summary.errors).toEqual(["Transfer #9: commission references a missing transfer"]);
		expect(summary.records).toEqual([]);
	});

	it("rejects a repeated transfer id", () => {
		const summary = importRows(
			[
				{ ...transferRow, transfer_id: "3" },
				{ ...transferRow, transfer_id: "3" },
			],
			{ policy: "full_backup" },
		);
		expect(summary.errors).toEqual(["row 2: duplicate transfer_id #3"]);
		expect(summary.transfers.map((transfer) => transfer.id)).toEqual([3]);
		expect(summary.records).toHaveLength(2);
	});

	it("numbers transfers after the ids already seen on legs", () => {
		const summary = importRows(
			[
				{ ...leg, type: "expense", wallet_id: "1", transfer_id: "4" },
				{ ...leg, type: "income", wallet_id: "2", transfer_id: "4" },
				transferRow,
			],
			{ policy: "full_backup" },
		);
		expect(summary.transfers.map((transfer) => transfer.id).sort()).toEqual([4, 5]);
	});

	it("takes the first initial_balance row only", () => {
		const summary = importRows(
			[
				{ type: "initial_balance", amount: "10" },
				{ type: "initial_balance", amount: "20" },
			],
			{ policy: "legacy" },
		);
		expect(summary.initialBalance).toBe(10);
		expect(summary.errors).toEqual(["row 2: duplicate initial_balance"]);
	});

	it("checks wallets against the known set", () => {
		const summary = importRows(
			[
				{ date: "2025-01-01", type: "income", category: "Gift", amount: "5", wallet_id: "3" },
				{ ...transferRow, to_wallet_id: "3" },
			],
			{ policy: "legacy", walletIds: new Set([1, 2]) },
		);
		expect(summary.errors).toEqual(["row 1: wallet not found (3)", "row 2: wallet not found (3)"]);
	});
});

describe("exportRows", () => {
	it("writes the opening balance, plain records and one row per transfer", () => {
		const rows = exportRows(buildSampleDataset());

		expect(rows).toHaveLength(2);
		expect(rows[0]).toMatchObject({ type: "initial_balance", amount_original: 1000 });
		expect(rows[1]).toMatchObject({
			date: "2025-02-01",
			type: "transfer",
			category: "Transfer",
			amount_original: 100,
			currency: "KZT",
			transfer_id: 1,
			from_wallet_id: 1,
			to_wallet_id: 2,
			wallet_id: "",
		});
	});

	it("reads back through importRows", () => {
		const dataset = buildSampleDataset();
		const summary = importRows(exportRows(dataset), { policy: "full_backup" });

		expect(summary).toMatchObject({ imported: 1, skipped: 0, initialBalance: 1000 });
		expect(summary.transfers).toHaveLength(1);
		expect(summary.records.map((record) => [record.type, record.walletId, record.amountKzt])).toEqual([
			["expense", 1, 100],
			["income", 2, 100],
		]);
	});
});
