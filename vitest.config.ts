import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (path: string) => fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
	resolve: {
		// Subpath aliases come before their package so they match first.
		alias: [
			{ find: "@pocket-ledger/core/logger", replacement: src("core/src/logger/index.ts") },
			{ find: "@pocket-ledger/core/error", replacement: src("core/src/error/index.ts") },
			{ find: "@pocket-ledger/core", replacement: src("core/src/index.ts") },
			{ find: "@pocket-ledger/file-store", replacement: src("file-store/src/index.ts") },
			{ find: "@pocket-ledger/sqlite-store", replacement: src("sqlite-store/src/index.ts") },
			{ find: "@pocket-ledger/ledger/config", replacement: src("ledger/src/config/index.ts") },
			{ find: "@pocket-ledger/ledger/migration", replacement: src("ledger/src/migration/index.ts") },
			{ find: "@pocket-ledger/ledger", replacement: src("ledger/src/index.ts") },
			{ find: "@pocket-ledger/test-utils", replacement: src("test-utils/src/index.ts") },
		],
	},
	test: {
		environment: "node",
		include: ["packages/*/src/**/__tests__/**/*.test.ts"],
		testTimeout: 20_000,
		coverage: {
			provider: "v8",
			reporter: ["text", "lcov", "json-summary"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/__tests__/**", "**/*.test.ts", "**/test-utils/**", "packages/cli/src/index.ts"],
		},
	},
});
