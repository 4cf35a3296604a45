// =============================================================================
// JSON FILE STORE -- LedgerStore backed by a single JSON document
// =============================================================================
// Every operation reads the whole document; every mutation writes it back
// through `writeDocumentAtomic`. Loads validate transfer integrity before
// returning anything. Mutations work on the raw document so that a transfer
// and its legs can be written in separate calls.
//
// Single-process use only: there is no locking between concurrent writers.

import {
	createWallet,
	DEFAULT_BASE_CURRENCY,
	defaultSystemWallet,
	encodeDataset,
	ensureSingleSystemWallet,
	ensureWalletExists,
	LedgerError,
	type LedgerDataset,
	type LedgerLogger,
	type LedgerRecord,
	type LedgerStore,
	type MandatoryExpenseRecord,
	nextId,
	prepareDataset,
	silentLogger,
	SYSTEM_WALLET_ID,
	type Transfer,
	validateTransferIntegrity,
	type Wallet,
	withInitialBalance,
	withoutTransfer,
	withRecordId,
	withWalletActive,
} from "@pocket-ledger/core";
import { readDocument, writeDocumentAtomic } from "./document.js";

export interface JsonFileStoreOptions {
	/** Path of the JSON document. Created on first write. */
	path: string;
	/** Default: `"KZT"` */
	baseCurrency?: string;
	logger?: LedgerLogger;
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function upsertById<T extends { id: number }>(items: readonly T[], item: T): T[] {
	const index = items.findIndex((existing) => existing.id === item.id);
	if (index === -1) return [...items, item];
	const next = [...items];
	next[index] = item;
	return next;
}

/** Keep the record's id when it is free, otherwise allocate the next one. */
function withFreeId<T extends LedgerRecord>(items: readonly { id: number }[], record: T): T {
	const taken = record.id <= 0 || items.some((existing) => existing.id === record.id);
	return taken ? withRecordId(record, nextId(items.map((existing) => existing.id))) : record;
}

function systemWalletOf(wallets: readonly Wallet[]): Wallet | undefined {
	return wallets.find((wallet) => wallet.system);
}

function newSystemWallet(wallets: readonly Wallet[], baseCurrency: string): Wallet {
	const base = defaultSystemWallet(0, baseCurrency);
	if (!wallets.some((wallet) => wallet.id === SYSTEM_WALLET_ID)) return base;
	return createWallet({ ...base, id: nextId(wallets.map((wallet) => wallet.id)) });
}

// =============================================================================
// STORE
// =============================================================================

export function jsonFileStore(options: JsonFileStoreOptions): LedgerStore {
	const path = options.path;
	const baseCurrency = options.baseCurrency ?? DEFAULT_BASE_CURRENCY;
	const logger = options.logger ?? silentLogger;

	async function read(): Promise<LedgerDataset> {
		const result = await readDocument(path, { baseCurrency });
		if (result.upgraded) {
			logger.info("Upgraded legacy document in memory", { path, dropped: result.dropped });
		}
		return result.dataset;
	}

	async function readChecked(): Promise<LedgerDataset> {
		const dataset = await read();
		validateTransferIntegrity(dataset.records, dataset.transfers);
		return dataset;
	}

	async function write(dataset: LedgerDataset): Promise<void> {
		await writeDocumentAtomic(path, encodeDataset(dataset));
		logger.debug("Wrote document", {
			path,
			wallets: dataset.wallets.length,
			records: dataset.records.length,
			transfers: dataset.transfers.length,
		});
	}

	/** Read, apply `fn`, write. `fn` returns the next dataset and a result. */
	async function mutate<T>(
		fn: (dataset: LedgerDataset) => { dataset: LedgerDataset; result: T },
	): Promise<T> {
		const { dataset, result } = fn(await read());
		await write(dataset);
		return result;
	}

	async function ensureSystemWallet(): Promise<Wallet> {
		const dataset = await read();
		const existing = systemWalletOf(dataset.wallets);
		if (existing) return existing;
		const wallet = newSystemWallet(dataset.wallets, baseCurrency);
		await write({ ...dataset, wallets: [...dataset.wallets, wallet] });
		logger.info("Created system wallet", { walletId: wallet.id });
		return wallet;
	}

	return {
		id: "json",

		// --- Wallets ---

		async loadWallets() {
			return (await readChecked()).wallets;
		},

		async loadActiveWallets() {
			return (await readChecked()).wallets.filter((wallet) => wallet.isActive);
		},

		async saveWallet(wallet) {
			await mutate((dataset) => {
				const wallets = upsertById(dataset.wallets, wallet);
				ensureSingleSystemWallet(wallets);
				return { dataset: { ...dataset, wallets }, result: undefined };
			});
		},

		async createWallet(input) {
			return mutate((dataset) => {
				const wallet = createWallet({
					id: nextId(dataset.wallets.map((existing) => existing.id)),
					name: input.name,
					currency: input.currency,
					initialBalance: input.initialBalance,
					allowNegative: input.allowNegative,
				});
				return { dataset: { ...dataset, wallets: [...dataset.wallets, wallet] }, result: wallet };
			});
		},

		async softDeleteWallet(walletId) {
			const dataset = await read();
			const wallet = dataset.wallets.find((existing) => existing.id === walletId);
			if (!wallet) return false;
			if (wallet.system) {
				throw LedgerError.domainRule("System wallet cannot be deleted", { walletId });
			}
			await write({
				...dataset,
				wallets: upsertById(dataset.wallets, withWalletActive(wallet, false)),
			});
			return true;
		},

		getSystemWallet: ensureSystemWallet,

		// --- Records ---

		async loadAll() {
			return (await readChecked()).records;
		},

		async getById(recordId) {
			const record = (await readChecked()).records.find((existing) => existing.id === recordId);
			if (!record) {
				throw LedgerError.notFound(`Record ${recordId} not found`);
			}
			return record;
		},

		async save(record) {
			return mutate((dataset) => {
				ensureWalletExists(dataset.wallets, record.walletId, "Record");
				const stored = withFreeId(dataset.records, record);
				return { dataset: { ...dataset, records: [...dataset.records, stored] }, result: stored };
			});
		},

		async replace(record) {
			await mutate((dataset) => {
				const index = dataset.records.findIndex((existing) => existing.id === record.id);
				if (index === -1) {
					throw LedgerError.notFound(`Record ${record.id} not found`);
				}
				ensureWalletExists(dataset.wallets, record.walletId, `Record ${record.id}`);
				const records = [...dataset.records];
				records[index] = record;
				validateTransferIntegrity(records, dataset.transfers);
				return { dataset: { ...dataset, records }, result: undefined };
			});
		},

		async deleteByIndex(index) {
			const dataset = await read();
			const target = Number.isInteger(index) && index >= 0 ? dataset.records[index] : undefined;
			if (!target) return false;
			if (target.transferId === null) {
				await write({ ...dataset, records: dataset.records.filter((_, i) => i !== index) });
				return true;
			}
			await write({
				...dataset,
				...withoutTransfer(dataset.records, dataset.transfers, target.transferId),
			});
			logger.debug("Deleted transfer through one of its legs", { transferId: target.transferId });
			return true;
		},

		async deleteAll() {
			// Transfers cannot outlive their legs.
			await mutate((dataset) => ({
				dataset: { ...dataset, records: [], transfers: [] },
				result: undefined,
			}));
		},

		// --- Transfers ---

		async loadTransfers() {
			return (await readChecked()).transfers;
		},

		async saveTransfer(transfer: Transfer) {
			await mutate((dataset) => {
				ensureWalletExists(dataset.wallets, transfer.fromWalletId, `Transfer ${transfer.id}`);
				ensureWalletExists(dataset.wallets, transfer.toWalletId, `Transfer ${transfer.id}`);
				return {
					dataset: { ...dataset, transfers: upsertById(dataset.transfers, transfer) },
					result: undefined,
				};
			});
		},

		// --- Mandatory expense templates ---

		async loadMandatoryExpenses() {
			return (await readChecked()).mandatoryExpenses;
		},

		async saveMandatoryExpense(expense: MandatoryExpenseRecord) {
			return mutate((dataset) => {
				ensureWalletExists(dataset.wallets, expense.walletId, "Mandatory expense");
				const stored = withFreeId(dataset.mandatoryExpenses, expense);
				return {
					dataset: { ...dataset, mandatoryExpenses: [...dataset.mandatoryExpenses, stored] },
					result: stored,
				};
			});
		},

		async deleteMandatoryExpenseByIndex(index) {
			const dataset = await read();
			if (!Number.isInteger(index) || index < 0 || index >= dataset.mandatoryExpenses.length) {
				return false;
			}
			await write({
				...dataset,
				mandatoryExpenses: dataset.mandatoryExpenses.filter((_, i) => i !== index),
			});
			return true;
		},

		async deleteAllMandatoryExpenses() {
			await mutate((dataset) => ({
				dataset: { ...dataset, mandatoryExpenses: [] },
				result: undefined,
			}));
		},

		async replaceMandatoryExpenses(expenses) {
			await mutate((dataset) => {
				const prepared = prepareDataset({ ...dataset, mandatoryExpenses: expenses }, baseCurrency);
				return { dataset: { ...dataset, mandatoryExpenses: prepared.mandatoryExpenses }, result: undefined };
			});
		},

		// --- Initial balance ---

		async saveInitialBalance(balance) {
			const wallet = await ensureSystemWallet();
			await mutate((dataset) => ({
				dataset: {
					...dataset,
					wallets: upsertById(dataset.wallets, withInitialBalance(wallet, balance)),
				},
				result: undefined,
			}));
		},

		async loadInitialBalance() {
			const wallet = systemWalletOf((await readChecked()).wallets);
			return wallet?.initialBalance ?? 0;
		},

		// --- Bulk ---

		loadDataset: readChecked,

		async replaceRecordsAndTransfers(records, transfers) {
			await mutate((dataset) => {
				const prepared = prepareDataset(
					{
						wallets: dataset.wallets,
						records,
						transfers,
						mandatoryExpenses: dataset.mandatoryExpenses,
					},
					baseCurrency,
				);
				return { dataset: prepared, result: undefined };
			});
		},

		async replaceAllData(data) {
			const prepared = prepareDataset(data, baseCurrency);
			await write(prepared);
			logger.info("Replaced all data", {
				path,
				wallets: prepared.wallets.length,
				records: prepared.records.length,
				transfers: prepared.transfers.length,
				mandatoryExpenses: prepared.mandatoryExpenses.length,
			});
		},

		async close() {},
	};
}
