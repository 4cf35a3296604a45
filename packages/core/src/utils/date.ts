// =============================================================================
// CALENDAR DATES -- strict YYYY-MM-DD handling
// =============================================================================
// Dates are kept as strings everywhere; these helpers only check them.

import { LedgerError } from "../error/index.js";

const YMD = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface CalendarDate {
	year: number;
	month: number;
	day: number;
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
	return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
	if (month === 2 && isLeapYear(year)) return 29;
	return DAYS_IN_MONTH[month - 1] ?? 0;
}

/**
 * Parse an exact `YYYY-MM-DD` string. Throws `INVALID_ARGUMENT` for anything
 * else, including impossible days such as `2025-02-30`.
 */
export function parseYmd(value: string): CalendarDate {
	const match = YMD.exec(value);
	if (!match) {
		throw LedgerError.invalidArgument("Invalid date format, expected YYYY-MM-DD");
	}
	const year = Number(match[1]);
	const month = Number(match[2]);
	const day = Number(match[3]);
	if (month < 1 || month > 12) {
		throw LedgerError.invalidArgument("Invalid month");
	}
	if (day < 1 || day > daysInMonth(year, month)) {
		throw LedgerError.invalidArgument("Invalid day");
	}
	return { year, month, day };
}

export function formatYmd(date: CalendarDate): string {
	const mm = String(date.month).padStart(2, "0");
	const dd = String(date.day).padStart(2, "0");
	return `${String(date.year).padStart(4, "0")}-${mm}-${dd}`;
}

/** Local calendar date of `now`. */
export function todayYmd(now: Date = new Date()): string {
	return formatYmd({ year: now.getFullYear(), month: now.getMonth() + 1, day: now.getDate() });
}

/**
 * Reject dates after `today`. Applies to user-entered operations; imported
 * history is exempt.
 */
export function ensureNotFuture(value: string, today: string = todayYmd()): void {
	parseYmd(value);
	// Zero-padded ISO dates order lexicographically.
	if (value > today) {
		throw LedgerError.invalidArgument("Date cannot be in the future");
	}
}
