// =============================================================================
// WIRE SHAPES -- snake_case rows as they appear in the JSON document
// =============================================================================

import type { MandatoryPeriod, RecordType } from "../types/record.js";

export interface RawWallet {
	id: number;
	name: string;
	currency: string;
	initial_balance: number;
	system: boolean;
	allow_negative: boolean;
	is_active: boolean;
}

export interface RawRecord {
	id: number;
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
	period?: MandatoryPeriod;
}

export interface RawMandatoryExpense {
	id: number;
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

export interface RawTransfer {
	id: number;
	from_wallet_id: number;
	to_wallet_id: number;
	date: string;
	amount_original: number;
	currency: string;
	rate_at_operation: number;
	amount_kzt: number;
	description: string;
}

export interface LedgerDocument {
	wallets: RawWallet[];
	records: RawRecord[];
	transfers: RawTransfer[];
	mandatory_expenses: RawMandatoryExpense[];
}
