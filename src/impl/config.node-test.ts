import {describe, test, expect} from "./node-test-utils.js";
import {
	openDatabase,
	parseConfig,
	parsePostgresConfig,
	parseSQLiteConfig,
} from "./config.js";
import {ConfigError} from "./errors.js";
import {createLogger} from "./logger.js";

function configError(fn: () => unknown): ConfigError {
	try {
		fn();
	} catch (error) {
		if (error instanceof ConfigError) {
			return error;
		}
		throw error;
	}
	throw new Error("expected a ConfigError");
}

describe("parseConfig", () => {
	test("applies SQLite defaults", () => {
		const config = parseConfig({backend: "sqlite"});
		if (config.backend !== "sqlite") {
			throw new Error("expected a sqlite config");
		}
		expect(config.path).toBe(":memory:");
		expect(config.timeout).toBe(30000);
		expect(config.memoryPersist).toBe(false);
		expect(config.readonly).toBe(false);
		expect(config.schemas).toEqual([]);
		expect(config.autoCreateSchema).toBe(true);
		expect(config.enableExecutionLog).toBe(true);
		expect(config.autoCommit).toBe(true);
	});

	test("applies PostgreSQL defaults", () => {
		const config = parsePostgresConfig({database: "inventory"});
		expect(config.host).toBe("localhost");
		expect(config.port).toBe(5432);
		expect(config.schema).toBe("public");
		expect(config.timezone).toBe("UTC");
		expect(config.max).toBe(1);
		expect(config.connectTimeout).toBe(30);
		expect(config.idleTimeout).toBe(0);
		expect(config.url).toBeUndefined();
	});

	test("rejects an unknown backend", () => {
		const error = configError(() => parseConfig({backend: "oracle"}));
		expect(error.code).toBe("CONFIG_ERROR");
		expect(error.issues).toHaveLength(1);
		expect(error.issues[0]).toMatch(/^backend: /);
	});

	test("lists every invalid option", () => {
		const error = configError(() =>
			parseSQLiteConfig({timeout: -5, schemas: [["items", ""]]}),
		);
		expect(error.issues).toHaveLength(2);
		expect(error.issues[0]).toMatch(/^schemas\.0\.1: /);
		expect(error.issues[1]).toMatch(/^timeout: /);
	});

	test("rejects an unknown isolation level", () => {
		const error = configError(() =>
			parseConfig({backend: "postgres", isolationLevel: "CHAOS"}),
		);
		expect(error.issues[0]).toMatch(/^isolationLevel: /);
	});
});

describe("openDatabase", () => {
	test("opens the selected backend and creates declared tables", async () => {
		const db = await openDatabase(
			{
				backend: "sqlite",
				schemas: [["items", "CREATE TABLE items (id INTEGER PRIMARY KEY, name TEXT)"]],
			},
			{logger: createLogger({silent: true})},
		);
		try {
			expect(db.backend.dialect).toBe("sqlite");
			expect(await db.listTables()).toEqual(["items"]);
		} finally {
			await db.close();
		}
	});

	test("leaves tables alone when autoCreateSchema is off", async () => {
		const db = await openDatabase({
			backend: "sqlite",
			autoCreateSchema: false,
			schemas: [["items", "CREATE TABLE items (id INTEGER PRIMARY KEY, name TEXT)"]],
		});
		try {
			expect(await db.tableExists("items")).toBe(false);
		} finally {
			await db.close();
		}
	});

	test("validates before connecting", async () => {
		await expect(openDatabase({backend: "sqlite", path: ""})).rejects.toThrow(
			ConfigError,
		);
	});
});
