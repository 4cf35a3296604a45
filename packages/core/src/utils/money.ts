import type { LedgerRecord } from "../types/record.js";

/** Absolute tolerance for comparing balances across stores. */
export const BALANCE_EPSILON = 0.00001;

/** Tolerance for `rate * amountOriginal ≈ amountKzt`. */
export const RATE_EPSILON = 0.000001;

export const DEFAULT_BASE_CURRENCY = "KZT";

export function nearlyEqual(a: number, b: number, epsilon = BALANCE_EPSILON): boolean {
	return Math.abs(a - b) <= epsilon;
}

/**
 * Rate fixed on a record at creation time. Exactly 1 for the base currency
 * and for zero amounts.
 */
export function computeRate(
	amountOriginal: number,
	amountKzt: number,
	currency: string,
	baseCurrency: string = DEFAULT_BASE_CURRENCY,
): number {
	if (currency === baseCurrency || amountOriginal === 0) {
		return 1;
	}
	return amountKzt / amountOriginal;
}

export function signedAmountKzt(record: LedgerRecord): number {
	switch (record.type) {
		case "income":
			return record.amountKzt;
		case "expense":
		case "mandatory_expense":
			return -Math.abs(record.amountKzt);
	}
}
