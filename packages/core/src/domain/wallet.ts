import type { Wallet } from "../types/wallet.js";
import { DEFAULT_BASE_CURRENCY } from "../utils/money.js";
import {
	ensureFiniteAmount,
	ensureNonBlank,
	ensurePositiveId,
	normalizeCurrency,
} from "../utils/validate.js";
import { LedgerError } from "../error/index.js";

export const SYSTEM_WALLET_ID = 1;
export const SYSTEM_WALLET_NAME = "Main wallet";

export interface WalletInput {
	id: number;
	name: string;
	currency: string;
	initialBalance?: number;
	system?: boolean;
	allowNegative?: boolean;
	isActive?: boolean;
}

export function createWallet(input: WalletInput): Wallet {
	const initialBalance = ensureFiniteAmount(input.initialBalance ?? 0, "initialBalance");
	if (initialBalance < 0) {
		throw LedgerError.invalidArgument("initialBalance must be non-negative");
	}
	return Object.freeze({
		id: ensurePositiveId(input.id, "Wallet id"),
		name: ensureNonBlank(input.name, "Wallet name"),
		currency: normalizeCurrency(input.currency),
		initialBalance,
		system: input.system ?? false,
		allowNegative: input.allowNegative ?? false,
		isActive: input.isActive ?? true,
	});
}

/** The wallet every dataset falls back to when it has none. */
export function defaultSystemWallet(
	initialBalance = 0,
	currency: string = DEFAULT_BASE_CURRENCY,
): Wallet {
	return createWallet({
		id: SYSTEM_WALLET_ID,
		name: SYSTEM_WALLET_NAME,
		currency,
		initialBalance,
		system: true,
	});
}

export function withWalletActive(wallet: Wallet, isActive: boolean): Wallet {
	return Object.freeze({ ...wallet, isActive });
}

export function withInitialBalance(wallet: Wallet, initialBalance: number): Wallet {
	return createWallet({ ...wallet, initialBalance });
}
