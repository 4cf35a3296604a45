import { LedgerError } from "../error/index.js";
import type { Transfer } from "../types/transfer.js";
import { parseYmd } from "../utils/date.js";
import { computeRate, DEFAULT_BASE_CURRENCY } from "../utils/money.js";
import { ensureFiniteAmount, ensurePositiveId, normalizeCurrency } from "../utils/validate.js";

export interface TransferInput {
	id: number;
	fromWalletId: number;
	toWalletId: number;
	date: string;
	amountOriginal: number;
	currency: string;
	rateAtOperation?: number;
	amountKzt: number;
	description?: string;
}

export function createTransfer(
	input: TransferInput,
	baseCurrency: string = DEFAULT_BASE_CURRENCY,
): Transfer {
	const id = ensurePositiveId(input.id, "Transfer id");
	const fromWalletId = ensurePositiveId(input.fromWalletId, "Transfer fromWalletId");
	const toWalletId = ensurePositiveId(input.toWalletId, "Transfer toWalletId");
	if (fromWalletId === toWalletId) {
		throw LedgerError.invalidArgument(
			"Transfer source and destination wallets must be different",
		);
	}
	parseYmd(input.date);

	const amountOriginal = ensureFiniteAmount(input.amountOriginal, "Transfer amount");
	if (amountOriginal <= 0) {
		throw LedgerError.invalidArgument("Transfer amount must be positive");
	}
	const amountKzt = ensureFiniteAmount(input.amountKzt, "Transfer amountKzt");
	if (amountKzt <= 0) {
		throw LedgerError.invalidArgument("Transfer amountKzt must be positive");
	}

	const currency = normalizeCurrency(input.currency);
	const rateAtOperation =
		input.rateAtOperation ?? computeRate(amountOriginal, amountKzt, currency, baseCurrency);
	if (!Number.isFinite(rateAtOperation) || rateAtOperation <= 0) {
		throw LedgerError.invalidArgument("Transfer rateAtOperation must be positive");
	}

	return Object.freeze({
		id,
		fromWalletId,
		toWalletId,
		date: input.date,
		amountOriginal,
		currency,
		rateAtOperation,
		amountKzt,
		description: input.description ?? "",
	});
}
