import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleLogger } from "../logger/console-logger.js";
import { createJsonLogger } from "../logger/json-logger.js";

describe("createJsonLogger", () => {
	it("writes one JSON line per entry with merged data", () => {
		const lines: string[] = [];
		const logger = createJsonLogger({ service: "test", write: (line) => lines.push(line) });

		logger.info("migrated", { wallets: 2 });

		expect(lines).toHaveLength(1);
		const entry = JSON.parse(lines[0] ?? "{}");
		expect(entry).toMatchObject({ level: "info", service: "test", message: "migrated", wallets: 2 });
		expect(typeof entry.timestamp).toBe("string");
	});

	it("drops entries below the configured level", () => {
		const lines: string[] = [];
		const logger = createJsonLogger({ level: "warn", write: (line) => lines.push(line) });

		logger.debug("noise");
		logger.info("noise");
		logger.warn("kept");

		expect(lines).toHaveLength(1);
	});
});

describe("createConsoleLogger", () => {
	// picocolors only colours a TTY; compare the plain text either way.
	const plain = (line: string) => line.replace(/\u001b\[[0-9;]*m/g, "");

	function capture(options: Parameters<typeof createConsoleLogger>[0] = {}) {
		const lines: string[] = [];
		const logger = createConsoleLogger({ ...options, write: (line) => lines.push(plain(line)) });
		return { logger, lines };
	}

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("writes the level, prefix and message on one line", () => {
		const { logger, lines } = capture({ prefix: "migrate" });

		logger.error("rollback");

		expect(lines).toEqual(["ERROR [migrate] rollback"]);
	});

	it("renders structured data inline as key=value pairs", () => {
		const { logger, lines } = capture();

		logger.info("Inserted rows", { table: "records", count: 3, path: "/tmp/my ledger.json", idMap: [4, 5] });

		expect(lines).toEqual([
			'INFO  [ledger] Inserted rows table=records count=3 path="/tmp/my ledger.json" idMap=4,5',
		]);
	});

	it("prefixes the local time when asked", () => {
		const { logger, lines } = capture({ timestamps: true });

		logger.warn("slow");

		expect(lines[0]).toMatch(/^\d{2}:\d{2}:\d{2} WARN  \[ledger\] slow$/);
	});

	it("respects the minimum level", () => {
		const { logger, lines } = capture({ level: "warn" });

		logger.debug("hidden");
		logger.info("hidden");

		expect(lines).toEqual([]);
	});

	it("writes to stderr by default", () => {
		const spy = vi.spyOn(console, "error").mockImplementation(() => {});
		const log = vi.spyOn(console, "log").mockImplementation(() => {});

		createConsoleLogger().info("counts", { records: 3 });

		expect(spy).toHaveBeenCalledTimes(1);
		expect(plain(String(spy.mock.calls[0]?.[0]))).toBe("INFO  [ledger] counts records=3");
		expect(log).not.toHaveBeenCalled();
	});
});
