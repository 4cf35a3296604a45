export { assertDatasetBalanced, assertWalletBalance } from "./assertions.js";
export {
	buildExpense,
	buildIncome,
	buildMandatory,
	buildSampleDataset,
	buildTransferPair,
	buildWallet,
	type TransferPairInput,
} from "./fixtures.js";
export { createTempDir, type TempDir } from "./temp-dir.js";
export { createTestStores, type TestStores } from "./stores.js";
