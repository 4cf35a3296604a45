import { LedgerError } from "../error/index.js";
import type { MandatoryPeriod } from "../types/record.js";

export const MANDATORY_PERIODS: readonly MandatoryPeriod[] = ["daily", "weekly", "monthly", "yearly"];

const CURRENCY_CODE = /^[A-Z]{3}$/;

export function isMandatoryPeriod(value: string): value is MandatoryPeriod {
	return MANDATORY_PERIODS.some((period) => period === value);
}

export function ensureValidPeriod(value: string): MandatoryPeriod {
	if (!isMandatoryPeriod(value)) {
		throw LedgerError.invalidArgument(
			`Invalid period: ${value}. Must be one of ${MANDATORY_PERIODS.join(", ")}`,
		);
	}
	return value;
}

/** Upper-case and check a three letter currency code. */
export function normalizeCurrency(value: string): string {
	const code = value.trim().toUpperCase();
	if (!CURRENCY_CODE.test(code)) {
		throw LedgerError.invalidArgument(`Invalid currency code: '${value}'`);
	}
	return code;
}

export function ensurePositiveId(value: number, field: string): number {
	if (!Number.isInteger(value) || value <= 0) {
		throw LedgerError.invalidArgument(`${field} must be a positive integer`);
	}
	return value;
}

export function ensureFiniteAmount(value: number, field: string): number {
	if (!Number.isFinite(value)) {
		throw LedgerError.invalidArgument(`${field} must be a finite number`);
	}
	return value;
}

export function ensureNonBlank(value: string, field: string): string {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw LedgerError.invalidArgument(`${field} must not be empty`);
	}
	return trimmed;
}
