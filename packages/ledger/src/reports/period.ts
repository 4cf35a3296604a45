import { daysInMonth, formatYmd, LedgerError, parseYmd } from "@pocket-ledger/core";

const PERIOD = /^(\d{4})(?:-(\d{2}))?(?:-(\d{2}))?$/;

export interface PeriodBounds {
	start: string;
	end: string;
}

/**
 * Inclusive calendar bounds of a period written as `YYYY`, `YYYY-MM` or
 * `YYYY-MM-DD`.
 *
 * @example
 * ```ts
 * periodBounds("2024-02"); // { start: "2024-02-01", end: "2024-02-29" }
 * ```
 */
export function periodBounds(period: string): PeriodBounds {
	const value = period.trim();
	const match = PERIOD.exec(value);
	if (!match) {
		throw LedgerError.invalidArgument(
			`Invalid period '${period}', expected YYYY, YYYY-MM or YYYY-MM-DD`,
		);
	}

	if (match[3] !== undefined) {
		parseYmd(value);
		return { start: value, end: value };
	}

	const year = Number(match[1]);
	if (match[2] !== undefined) {
		const month = Number(match[2]);
		if (month < 1 || month > 12) {
			throw LedgerError.invalidArgument("Invalid month");
		}
		return {
			start: formatYmd({ year, month, day: 1 }),
			end: formatYmd({ year, month, day: daysInMonth(year, month) }),
		};
	}

	return {
		start: formatYmd({ year, month: 1, day: 1 }),
		end: formatYmd({ year, month: 12, day: 31 }),
	};
}
