// =============================================================================
// QUERIES -- row mapping and the SQL the store and the migration share
// =============================================================================
// Every function takes a `Kysely` handle, so the same code runs inside and
// outside `db.transaction()`.

import {
	type DatasetCounts,
	decodeMandatoryExpense,
	decodeRecord,
	decodeTransfer,
	decodeWallet,
	type LedgerDataset,
	type LedgerRecord,
	type MandatoryExpenseRecord,
	type Transfer,
	type Wallet,
} from "@pocket-ledger/core";
import { type Kysely, sql } from "kysely";
import type {
	LedgerDatabase,
	NewMandatoryExpenseRow,
	NewRecordRow,
	NewTransferRow,
	NewWalletRow,
} from "./schema.js";

// =============================================================================
// DOMAIN -> ROW
// =============================================================================

const flag = (value: boolean): number => (value ? 1 : 0);

export function toWalletRow(wallet: Wallet): NewWalletRow {
	return {
		id: wallet.id,
		name: wallet.name,
		currency: wallet.currency,
		initial_balance: wallet.initialBalance,
		system: flag(wallet.system),
		allow_negative: flag(wallet.allowNegative),
		is_active: flag(wallet.isActive),
	};
}

export function toTransferRow(transfer: Transfer): NewTransferRow {
	return {
		id: transfer.id,
		from_wallet_id: transfer.fromWalletId,
		to_wallet_id: transfer.toWalletId,
		date: transfer.date,
		amount_original: transfer.amountOriginal,
		currency: transfer.currency,
		rate_at_operation: transfer.rateAtOperation,
		amount_kzt: transfer.amountKzt,
		description: transfer.description,
	};
}

export function toRecordRow(record: LedgerRecord): NewRecordRow {
	return {
		id: record.id,
		type: record.type,
		date: record.date,
		wallet_id: record.walletId,
		transfer_id: record.transferId,
		commission_for_transfer_id: record.commissionForTransferId,
		amount_original: record.amountOriginal,
		currency: record.currency,
		rate_at_operation: record.rateAtOperation,
		amount_kzt: record.amountKzt,
		category: record.category,
		description: record.description,
		period: record.type === "mandatory_expense" ? record.period : null,
	};
}

export function toMandatoryExpenseRow(expense: MandatoryExpenseRecord): NewMandatoryExpenseRow {
	return {
		id: expense.id,
		date: expense.date,
		wallet_id: expense.walletId,
		amount_original: expense.amountOriginal,
		currency: expense.currency,
		rate_at_operation: expense.rateAtOperation,
		amount_kzt: expense.amountKzt,
		category: expense.category,
		description: expense.description,
		period: expense.period,
	};
}

// =============================================================================
// READS
// =============================================================================

export async function selectWallets(db: Kysely<LedgerDatabase>): Promise<Wallet[]> {
	const rows = await db.selectFrom("wallets").selectAll().orderBy("id").execute();
	return rows.map((row) => decodeWallet(row, `wallets id=${row.id}`));
}

/**
 * Read every table in id order. Rows are decoded through the domain
 * factories; transfer integrity is left to the caller.
 */
export async function selectDataset(
	db: Kysely<LedgerDatabase>,
	baseCurrency: string,
): Promise<LedgerDataset> {
	const options = { baseCurrency };
	const wallets = await selectWallets(db);
	const records = await db.selectFrom("records").selectAll().orderBy("id").execute();
	const transfers = await db.selectFrom("transfers").selectAll().orderBy("id").execute();
	const mandatory = await db.selectFrom("mandatory_expenses").selectAll().orderBy("id").execute();
	return {
		wallets,
		records: records.map((row) => decodeRecord(row, `records id=${row.id}`, options)),
		transfers: transfers.map((row) => decodeTransfer(row, `transfers id=${row.id}`, options)),
		mandatoryExpenses: mandatory.map((row) =>
			decodeMandatoryExpense(row, `mandatory_expenses id=${row.id}`, options),
		),
	};
}

export async function maxId(
	db: Kysely<LedgerDatabase>,
	table: keyof LedgerDatabase,
): Promise<number> {
	const { rows } = await sql<{ max: number | null }>`select max(id) as max from ${sql.table(table)}`.execute(db);
	return rows[0]?.max ?? 0;
}

export async function idExists(
	db: Kysely<LedgerDatabase>,
	table: keyof LedgerDatabase,
	id: number,
): Promise<boolean> {
	const { rows } = await sql<{ id: number }>`select id from ${sql.table(table)} where id = ${id}`.execute(db);
	return rows.length > 0;
}

export async function countRows(db: Kysely<LedgerDatabase>): Promise<DatasetCounts> {
	const count = async (table: keyof LedgerDatabase): Promise<number> => {
		const { rows } = await sql<{ count: number }>`select count(*) as count from ${sql.table(table)}`.execute(db);
		return Number(rows[0]?.count ?? 0);
	};
	return {
		wallets: await count("wallets"),
		records: await count("records"),
		transfers: await count("transfers"),
		mandatoryExpenses: await count("mandatory_expenses"),
	};
}

/**
 * Per-wallet balance computed by SQLite itself: initial balance plus
 * income minus expenses, over every wallet including inactive ones.
 */
export async function selectWalletBalances(db: Kysely<LedgerDatabase>): Promise<Map<number, number>> {
	const rows = await db
		.selectFrom("wallets as w")
		.leftJoin("records as r", "r.wallet_id", "w.id")
		.select([
			"w.id as walletId",
			sql<number>`w.initial_balance + coalesce(sum(case when r.type = 'income' then r.amount_kzt else -abs(r.amount_kzt) end), 0)`.as(
				"balance",
			),
		])
		.groupBy("w.id")
		.orderBy("w.id")
		.execute();
	return new Map(rows.map((row) => [row.walletId, Number(row.balance)]));
}

export async function selectNetWorth(db: Kysely<LedgerDatabase>): Promise<number> {
	let total = 0;
	for (const balance of (await selectWalletBalances(db)).values()) {
		total += balance;
	}
	return total;
}

// =============================================================================
// WRITES
// =============================================================================

export async function clearRecordsAndTransfers(db: Kysely<LedgerDatabase>): Promise<void> {
	// Records first: they reference transfers.
	await db.deleteFrom("records").execute();
	await db.deleteFrom("transfers").execute();
}

/** Remove a transfer with its legs and commission records. */
export async function deleteTransferCascade(db: Kysely<LedgerDatabase>, transferId: number): Promise<void> {
	await db
		.deleteFrom("records")
		.where((eb) =>
			eb.or([eb("transfer_id", "=", transferId), eb("commission_for_transfer_id", "=", transferId)]),
		)
		.execute();
	await db.deleteFrom("transfers").where("id", "=", transferId).execute();
}

export async function clearAll(db: Kysely<LedgerDatabase>): Promise<void> {
	await clearRecordsAndTransfers(db);
	await db.deleteFrom("mandatory_expenses").execute();
	await db.deleteFrom("wallets").execute();
}

/** Insert in dependency order: wallets, transfers, records, templates. */
export async function insertDataset(db: Kysely<LedgerDatabase>, dataset: LedgerDataset): Promise<void> {
	for (const wallet of dataset.wallets) {
		await db.insertInto("wallets").values(toWalletRow(wallet)).execute();
	}
	for (const transfer of dataset.transfers) {
		await db.insertInto("transfers").values(toTransferRow(transfer)).execute();
	}
	for (const record of dataset.records) {
		await db.insertInto("records").values(toRecordRow(record)).execute();
	}
	for (const expense of dataset.mandatoryExpenses) {
		await db.insertInto("mandatory_expenses").values(toMandatoryExpenseRow(expense)).execute();
	}
}
