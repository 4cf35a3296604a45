// =============================================================================
// WALLET MANAGER -- Wallet lifecycle and derived balances
// =============================================================================
// Balances are never stored; every read folds the wallet's records.

import {
	type CreateWalletInput,
	LedgerError,
	nearlyEqual,
	netWorth,
	type Wallet,
	walletBalance,
	withWalletActive,
} from "@pocket-ledger/core";
import type { LedgerContext } from "../context/context.js";

export function findWallet(wallets: readonly Wallet[], walletId: number): Wallet {
	const wallet = wallets.find((existing) => existing.id === walletId);
	if (!wallet) {
		throw LedgerError.notFound(`Wallet ${walletId} not found`);
	}
	return wallet;
}

/** Like `findWallet`, but soft-deleted wallets are rejected too. */
export function findActiveWallet(wallets: readonly Wallet[], walletId: number): Wallet {
	const wallet = findWallet(wallets, walletId);
	if (!wallet.isActive) {
		throw LedgerError.domainRule(`Wallet ${walletId} is inactive`, { walletId });
	}
	return wallet;
}

// =============================================================================
// OPERATIONS
// =============================================================================

export async function createWallet(ctx: LedgerContext, params: CreateWalletInput): Promise<Wallet> {
	const wallet = await ctx.store.createWallet(params);
	ctx.logger.info("Wallet created", { walletId: wallet.id, currency: wallet.currency });
	return wallet;
}

export async function listWallets(ctx: LedgerContext): Promise<Wallet[]> {
	return ctx.store.loadWallets();
}

export async function listActiveWallets(ctx: LedgerContext): Promise<Wallet[]> {
	return ctx.store.loadActiveWallets();
}

export async function getWalletBalance(ctx: LedgerContext, walletId: number): Promise<number> {
	const { wallets, records } = await ctx.store.loadDataset();
	return walletBalance(findWallet(wallets, walletId), records);
}

export async function getNetWorth(ctx: LedgerContext): Promise<number> {
	const { wallets, records } = await ctx.store.loadDataset();
	return netWorth(wallets, records);
}

/**
 * Hide a wallet from active listings. Only non-system wallets whose balance
 * is zero can be deleted; the row and its history are kept.
 */
export async function softDeleteWallet(ctx: LedgerContext, walletId: number): Promise<Wallet> {
	const { wallets, records } = await ctx.store.loadDataset();
	const wallet = findWallet(wallets, walletId);
	if (wallet.system) {
		throw LedgerError.domainRule("System wallet cannot be deleted", { walletId });
	}
	if (!wallet.isActive) {
		throw LedgerError.domainRule(`Wallet ${walletId} is already deleted`, { walletId });
	}

	const balance = walletBalance(wallet, records);
	if (!nearlyEqual(balance, 0)) {
		throw LedgerError.domainRule(
			`Wallet ${walletId} can only be deleted with a zero balance, current balance is ${balance}`,
			{ walletId, balance },
		);
	}

	await ctx.store.softDeleteWallet(walletId);
	ctx.logger.info("Wallet deleted", { walletId });
	return withWalletActive(wallet, false);
}
