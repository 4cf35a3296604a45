// Facade
export { createLedger, type Ledger } from "./ledger/base.js";

// Configuration and context
export {
	DEFAULT_JSON_PATH,
	DEFAULT_MAX_IMPORT_ROWS,
	DEFAULT_SQLITE_PATH,
	defineLedgerConfig,
	type LedgerOptions,
	type ResolvedLedgerOptions,
	resolveLedgerOptions,
	type StorageKind,
	validateConfig,
} from "./config/index.js";
export { buildContext, type ContextOptions, type LedgerContext } from "./context/context.js";

// Use cases
export { ensureSufficientFunds } from "./managers/balance-check.js";
export type { MandatoryExpenseParams } from "./managers/mandatory-manager.js";
export type { RecordParams } from "./managers/record-manager.js";
export type { ReportParams } from "./managers/report-manager.js";
export {
	COMMISSION_CATEGORY,
	TRANSFER_CATEGORY,
	type TransferParams,
	type TransferResult,
} from "./managers/transfer-manager.js";

// Reports
export * from "./reports/index.js";

// Import / export
export {
	EXPORT_HEADERS,
	type ExportHeader,
	type ExportRow,
	exportRows,
	importDataset,
	importMandatoryExpenses,
	importRows,
	type ImportRowsOptions,
	type ImportSummary,
} from "./import/importer.js";
export {
	type ImportPolicy,
	type ImportRow,
	normalizeKey,
	parseAmount,
	parseImportRow,
	type ParsedRow,
	type ParsedTransfer,
	type ParseRowOptions,
	type ParseTransferOptions,
	parseTransferRow,
} from "./import/row-parser.js";

// Migration and bootstrap
export * from "./migration/index.js";
export {
	backupPathFor,
	backupStamp,
	type BootstrapOptions,
	type BootstrapResult,
	bootstrapStorage,
	createBackup,
} from "./bootstrap/index.js";
