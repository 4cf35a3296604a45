// =============================================================================
// TRANSFER INTEGRITY -- the double-entry invariant over a whole dataset
// =============================================================================
// Every transfer owns exactly two records: an expense leg on the source
// wallet and an income leg on the destination wallet, both carrying the
// transfer's amount, currency and rate. Commission records point at their
// transfer through `commissionForTransferId` and are never legs themselves.
//
// Stores call this on every load and before every bulk replace; nothing else
// decides whether a dataset is consistent.

import { LedgerError } from "../error/index.js";
import type { LedgerRecord } from "../types/record.js";
import type { Transfer } from "../types/transfer.js";
import { RATE_EPSILON } from "../utils/money.js";

type Amounts = Pick<LedgerRecord, "currency" | "amountOriginal" | "rateAtOperation">;

function amountsAgree(a: Amounts, b: Amounts): boolean {
	return (
		a.currency === b.currency &&
		Math.abs(a.amountOriginal - b.amountOriginal) <= RATE_EPSILON &&
		Math.abs(a.rateAtOperation - b.rateAtOperation) <= RATE_EPSILON
	);
}

/**
 * Throws `DANGLING_TRANSFER_LINK` or `BROKEN_TRANSFER_PAIR` on the first
 * violation found.
 */
export function validateTransferIntegrity(
	records: readonly LedgerRecord[],
	transfers: readonly Transfer[],
): void {
	const transferIds = new Set<number>();
	for (const transfer of transfers) {
		if (transferIds.has(transfer.id)) {
			throw LedgerError.brokenTransferPair(`Duplicate transfer id ${transfer.id}`, {
				transferId: transfer.id,
			});
		}
		transferIds.add(transfer.id);
	}

	const groups = new Map<number, LedgerRecord[]>();
	for (const record of records) {
		if (record.commissionForTransferId !== null) {
			if (!transferIds.has(record.commissionForTransferId)) {
				throw LedgerError.danglingTransferLink(
					`Commission record ${record.id} references missing transfer ${record.commissionForTransferId}`,
					{ recordId: record.id, transferId: record.commissionForTransferId },
				);
			}
			if (record.transferId !== null) {
				throw LedgerError.danglingTransferLink(
					`Commission record ${record.id} must not be a transfer leg`,
					{ recordId: record.id },
				);
			}
		}

		if (record.transferId === null) continue;
		if (!transferIds.has(record.transferId)) {
			throw LedgerError.danglingTransferLink(
				`Record ${record.id} references missing transfer ${record.transferId}`,
				{ recordId: record.id, transferId: record.transferId },
			);
		}
		const group = groups.get(record.transferId);
		if (group) {
			group.push(record);
		} else {
			groups.set(record.transferId, [record]);
		}
	}

	for (const transfer of transfers) {
		const legs = groups.get(transfer.id) ?? [];
		const [first, second] = legs;
		if (legs.length !== 2 || first === undefined || second === undefined) {
			throw LedgerError.brokenTransferPair(
				`Transfer ${transfer.id} must have exactly 2 linked records, found ${legs.length}`,
				{ transferId: transfer.id, legs: legs.length },
			);
		}
		const types = new Set([first.type, second.type]);
		if (types.size !== 2 || !types.has("income") || !types.has("expense")) {
			throw LedgerError.brokenTransferPair(
				`Transfer ${transfer.id} must link one income and one expense record`,
				{ transferId: transfer.id, types: [first.type, second.type] },
			);
		}
		if (!amountsAgree(first, second)) {
			throw LedgerError.brokenTransferPair(
				`Transfer ${transfer.id} legs disagree on amount, currency or rate`,
				{ transferId: transfer.id },
			);
		}

		const [expense, income] = first.type === "expense" ? [first, second] : [second, first];
		if (expense.walletId !== transfer.fromWalletId) {
			throw LedgerError.brokenTransferPair(
				`Transfer ${transfer.id} expense leg is on wallet ${expense.walletId}, expected ${transfer.fromWalletId}`,
				{ transferId: transfer.id, recordId: expense.id },
			);
		}
		if (income.walletId !== transfer.toWalletId) {
			throw LedgerError.brokenTransferPair(
				`Transfer ${transfer.id} income leg is on wallet ${income.walletId}, expected ${transfer.toWalletId}`,
				{ transferId: transfer.id, recordId: income.id },
			);
		}
		if (!amountsAgree(expense, transfer)) {
			throw LedgerError.brokenTransferPair(
				`Transfer ${transfer.id} legs disagree with the transfer on amount, currency or rate`,
				{ transferId: transfer.id },
			);
		}
	}
}

/** Non-throwing variant for batch callers that report instead of abort. */
export function checkTransferIntegrity(
	records: readonly LedgerRecord[],
	transfers: readonly Transfer[],
): { ok: true } | { ok: false; error: LedgerError } {
	try {
		validateTransferIntegrity(records, transfers);
		return { ok: true };
	} catch (error) {
		if (error instanceof LedgerError) {
			return { ok: false, error };
		}
		throw error;
	}
}
