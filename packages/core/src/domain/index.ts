export { createStaticRateProvider, DEFAULT_RATES, type StaticRateProviderOptions } from "./currency.js";
export {
	createExpenseRecord,
	createIncomeRecord,
	createMandatoryExpense,
	createRecord,
	type MandatoryExpenseInput,
	materializeMandatoryExpense,
	type RecordInput,
	type RecordOptions,
	withAmountKzt,
	withRecordId,
} from "./record.js";
export { createTransfer, type TransferInput } from "./transfer.js";
export {
	createWallet,
	defaultSystemWallet,
	SYSTEM_WALLET_ID,
	SYSTEM_WALLET_NAME,
	type WalletInput,
	withInitialBalance,
	withWalletActive,
} from "./wallet.js";
export { datasetCounts, netWorth, walletBalance, walletBalances } from "./balance.js";
