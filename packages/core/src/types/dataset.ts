import type { LedgerRecord, MandatoryExpenseRecord } from "./record.js";
import type { Transfer } from "./transfer.js";
import type { Wallet } from "./wallet.js";

/** Everything a store holds, as one value. */
export interface LedgerDataset {
	wallets: Wallet[];
	records: LedgerRecord[];
	transfers: Transfer[];
	mandatoryExpenses: MandatoryExpenseRecord[];
}

export interface DatasetCounts {
	wallets: number;
	records: number;
	transfers: number;
	mandatoryExpenses: number;
}
