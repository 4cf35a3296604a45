import { createStaticRateProvider } from "@pocket-ledger/core";
import { DEFAULT_SCHEMA_PATH } from "@pocket-ledger/sqlite-store";
import { createTestStores } from "@pocket-ledger/test-utils";
import { describe, expect, it } from "vitest";
import { defineLedgerConfig, resolveLedgerOptions, validateConfig } from "../config/index.js";
import { buildContext } from "../context/context.js";

describe("validateConfig", () => {
	it("accepts an empty config", () => {
		expect(() => validateConfig({})).not.toThrow();
	});

	it("names the offending key", () => {
		expect(() => validateConfig({ jsonPath: "  " })).toThrow(
			"Invalid ledger config: 'jsonPath' must be a non-empty string",
		);
		expect(() => validateConfig({ baseCurrency: "kzt" })).toThrow(
			`Invalid ledger config: 'baseCurrency' must be a three letter upper-case code, got "kzt"`,
		);
		expect(() => validateConfig({ rates: { USD: 0 } })).toThrow(
			"Invalid ledger config: rate for USD must be a positive finite number",
		);
		expect(() => validateConfig({ rates: { dollars: 500 } })).toThrow(
			`Invalid ledger config: rate key "dollars" is not a currency code`,
		);
		expect(() => validateConfig({ maxImportRows: 1.5 })).toThrow(
			"Invalid ledger config: 'maxImportRows' must be a positive integer",
		);
	});

	it("is applied by defineLedgerConfig", () => {
		expect(defineLedgerConfig({ storage: "json" })).toEqual({ storage: "json" });
		expect(() => defineLedgerConfig({ sqlitePath: "" })).toThrow("'sqlitePath' must be a non-empty string");
	});
});

describe("resolveLedgerOptions", () => {
	it("falls back to the defaults", () => {
		expect(resolveLedgerOptions({}, {})).toEqual({
			storage: "sqlite",
			jsonPath: "data.json",
			sqlitePath: "finance.db",
			schemaPath: DEFAULT_SCHEMA_PATH,
			baseCurrency: "KZT",
			rates: { USD: 500, EUR: 590, RUB: 6.5 },
			maxImportRows: 10_000,
			logger: undefined,
		});
	});

	it("reads POCKET_LEDGER_* variables", () => {
		const resolved = resolveLedgerOptions(
			{},
			{
				POCKET_LEDGER_STORAGE: "json",
				POCKET_LEDGER_JSON_PATH: "/var/ledger/data.json",
				POCKET_LEDGER_BASE_CURRENCY: "usd",
				POCKET_LEDGER_SQLITE_PATH: "   ",
			},
		);
		expect(resolved).toMatchObject({
			storage: "json",
			jsonPath: "/var/ledger/data.json",
			sqlitePath: "finance.db",
			baseCurrency: "USD",
		});
	});

	it("prefers explicit options over the environment", () => {
		const resolved = resolveLedgerOptions({ storage: "sqlite", jsonPath: "mine.json" }, {
			POCKET_LEDGER_STORAGE: "json",
			POCKET_LEDGER_JSON_PATH: "theirs.json",
		});
		expect([resolved.storage, resolved.jsonPath]).toEqual(["sqlite", "mine.json"]);
	});

	it("rejects an unknown storage kind from the environment", () => {
		expect(() => resolveLedgerOptions({}, { POCKET_LEDGER_STORAGE: "mongo" })).toThrow(
			`Invalid ledger config: POCKET_LEDGER_STORAGE must be "json" or "sqlite", got "mongo"`,
		);
	});
});

describe("buildContext", () => {
	it("refuses a rate provider in another base currency", async () => {
		const stores = await createTestStores();
		try {
			expect(() =>
				buildContext({
					store: stores.json,
					rates: createStaticRateProvider({ baseCurrency: "USD", rates: { KZT: 0.002 } }),
				}),
			).toThrow("Invalid ledger config: rate provider base currency USD does not match ledger base currency KZT");
		} finally {
			await stores.cleanup();
		}
	});

	it("builds a provider from a rate table", async () => {
		const stores = await createTestStores();
		try {
			const ctx = buildContext({ store: stores.json, rates: { USD: 450 }, today: () => "2025-01-01" });
			expect(ctx.rates.convert(2, "usd")).toBe(900);
			expect(ctx.today()).toBe("2025-01-01");
			expect(ctx.maxImportRows).toBe(10_000);
		} finally {
			await stores.cleanup();
		}
	});
});
