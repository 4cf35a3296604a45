/**
 * Source of exchange rates into the base currency. Implementations are
 * synchronous; fetching live rates happens outside the ledger.
 */
export interface RateProvider {
	readonly baseCurrency: string;
	/** Units of base currency per one unit of `currency`. */
	getRate(currency: string): number;
	convert(amount: number, currency: string): number;
}
