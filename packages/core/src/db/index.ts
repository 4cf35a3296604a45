export {
	decodeDocument,
	type DecodeOptions,
	decodeMandatoryExpense,
	decodeRecord,
	decodeTransfer,
	decodeWallet,
	encodeDataset,
	encodeMandatoryExpense,
	encodeRecord,
	encodeTransfer,
	encodeWallet,
	isPlainObject,
} from "./codec.js";
export type {
	LedgerDocument,
	RawMandatoryExpense,
	RawRecord,
	RawTransfer,
	RawWallet,
} from "./raw-types.js";
export type { LedgerStore, ReplaceAllDataInput } from "./store.js";
export {
	assignIds,
	emptyDataset,
	ensureSingleSystemWallet,
	ensureWalletExists,
	nextId,
	prepareDataset,
	withoutTransfer,
} from "./store-utils.js";
