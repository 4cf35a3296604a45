// =============================================================================
// TABLE TYPES -- Kysely view of sql/schema.sql
// =============================================================================
// Booleans are stored as 0/1 integers. Ids are generated by AUTOINCREMENT
// unless an insert supplies one.

import type { MandatoryPeriod, RecordType } from "@pocket-ledger/core";
import type { Generated, Insertable, Selectable } from "kysely";

export interface WalletsTable {
	id: Generated<number>;
	name: string;
	currency: string;
	initial_balance: number;
	system: number;
	allow_negative: number;
	is_active: number;
}

export interface TransfersTable {
	id: Generated<number>;
	from_wallet_id: number;
	to_wallet_id: number;
	date: string;
	amount_original: number;
	currency: string;
	rate_at_operation: number;
	amount_kzt: number;
	description: string;
}

export interface RecordsTable {
	id: Generated<number>;
	type: RecordType;
	date: string;
	wallet_id: number;
	transfer_id: number | null;
	commission_for_transfer_id: number | null;
	amount_original: number;
	currency: string;
	rate_at_operation: number;
	amount_kzt: number;
	category: string;
	description: string;
	period: MandatoryPeriod | null;
}

export interface MandatoryExpensesTable {
	id: Generated<number>;
	date: string;
	wallet_id: number;
	amount_original: number;
	currency: string;
	rate_at_operation: number;
	amount_kzt: number;
	category: string;
	description: string;
	period: MandatoryPeriod;
}

export interface LedgerDatabase {
	wallets: WalletsTable;
	transfers: TransfersTable;
	records: RecordsTable;
	mandatory_expenses: MandatoryExpensesTable;
}

export type WalletRow = Selectable<WalletsTable>;
export type NewWalletRow = Insertable<WalletsTable>;
export type NewTransferRow = Insertable<TransfersTable>;
export type NewRecordRow = Insertable<RecordsTable>;
export type NewMandatoryExpenseRow = Insertable<MandatoryExpensesTable>;
