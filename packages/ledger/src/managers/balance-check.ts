// =============================================================================
// BALANCE CHECK -- Shared funds validation
// =============================================================================
// Used by expenses, transfers and applied mandatory templates. Runs before
// anything is written.

import { LedgerError, type Wallet } from "@pocket-ledger/core";

/**
 * Throw `INSUFFICIENT_FUNDS` when debiting `amount` (base currency) would
 * take a wallet that does not allow negative balances below zero.
 */
export function ensureSufficientFunds(params: {
	wallet: Wallet;
	balance: number;
	amount: number;
}): void {
	const { wallet, balance, amount } = params;
	if (wallet.allowNegative) return;

	if (balance - amount < 0) {
		throw LedgerError.insufficientFunds(
			`Insufficient funds in wallet ${wallet.name}. Available: ${balance}, Required: ${amount}`,
			{ walletId: wallet.id, balance, required: amount },
		);
	}
}
