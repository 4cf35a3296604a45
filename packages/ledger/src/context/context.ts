// =============================================================================
// CONTEXT BUILDER
// =============================================================================
// Everything a manager function needs, resolved once from the facade options.

import {
	createStaticRateProvider,
	DEFAULT_BASE_CURRENCY,
	LedgerError,
	type LedgerLogger,
	type LedgerStore,
	type RateProvider,
	silentLogger,
	todayYmd,
} from "@pocket-ledger/core";
import { DEFAULT_MAX_IMPORT_ROWS, validateConfig } from "../config/index.js";

export interface LedgerContext {
	store: LedgerStore;
	rates: RateProvider;
	baseCurrency: string;
	logger: LedgerLogger;
	/** Current local date as `YYYY-MM-DD`. Injected so tests can pin it. */
	today: () => string;
	maxImportRows: number;
}

export interface ContextOptions {
	store: LedgerStore;
	/** A provider, or a rate table for the built-in static provider. */
	rates?: RateProvider | Record<string, number>;
	baseCurrency?: string;
	logger?: LedgerLogger;
	today?: () => string;
	maxImportRows?: number;
}

function isRateProvider(value: RateProvider | Record<string, number>): value is RateProvider {
	return typeof value.getRate === "function";
}

export function buildContext(options: ContextOptions): LedgerContext {
	const rateTable = options.rates && !isRateProvider(options.rates) ? options.rates : undefined;
	validateConfig({
		baseCurrency: options.baseCurrency,
		rates: rateTable,
		maxImportRows: options.maxImportRows,
	});

	const baseCurrency = options.baseCurrency ?? DEFAULT_BASE_CURRENCY;
	const rates =
		options.rates && isRateProvider(options.rates)
			? options.rates
			: createStaticRateProvider({ rates: rateTable, baseCurrency });

	if (rates.baseCurrency !== baseCurrency) {
		throw LedgerError.invalidArgument(
			`Invalid ledger config: rate provider base currency ${rates.baseCurrency} does not match ledger base currency ${baseCurrency}`,
		);
	}

	return {
		store: options.store,
		rates,
		baseCurrency,
		logger: options.logger ?? silentLogger,
		today: options.today ?? (() => todayYmd()),
		maxImportRows: options.maxImportRows ?? DEFAULT_MAX_IMPORT_ROWS,
	};
}
