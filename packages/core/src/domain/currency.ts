import { LedgerError } from "../error/index.js";
import type { RateProvider } from "../types/currency.js";
import { DEFAULT_BASE_CURRENCY } from "../utils/money.js";

/** Rates used when no table is configured. Units of KZT per unit. */
export const DEFAULT_RATES: Readonly<Record<string, number>> = Object.freeze({
	USD: 500,
	EUR: 590,
	RUB: 6.5,
});

export interface StaticRateProviderOptions {
	rates?: Record<string, number>;
	baseCurrency?: string;
}

export function createStaticRateProvider(options: StaticRateProviderOptions = {}): RateProvider {
	const baseCurrency = options.baseCurrency ?? DEFAULT_BASE_CURRENCY;
	const rates = new Map<string, number>();
	for (const [code, rate] of Object.entries(options.rates ?? DEFAULT_RATES)) {
		if (!Number.isFinite(rate) || rate <= 0) {
			throw LedgerError.invalidArgument(`Rate for ${code} must be positive`);
		}
		rates.set(code.toUpperCase(), rate);
	}

	function getRate(currency: string): number {
		const code = currency.toUpperCase();
		if (code === baseCurrency) return 1;
		const rate = rates.get(code);
		if (rate === undefined) {
			throw LedgerError.unsupportedCurrency(code);
		}
		return rate;
	}

	return {
		baseCurrency,
		getRate,
		convert: (amount, currency) => amount * getRate(currency),
	};
}
