export { type JsonFileStoreOptions, jsonFileStore } from "./adapter.js";
export {
	type ReadResult,
	readDocument,
	type UpgradeResult,
	upgradeLegacyDocument,
	writeDocumentAtomic,
} from "./document.js";
