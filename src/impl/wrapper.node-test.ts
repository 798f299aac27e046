import {describe, test, expect} from "./node-test-utils.js";
import {Wrapper} from "./wrapper.js";
import {QueryError, SchemaError, TransactionError} from "./errors.js";
import {createLogger} from "./logger.js";
import {createRow} from "./row.js";
import {TestBackend} from "./test-backend.js";

const logger = createLogger({silent: true});

const schemas = [
	["users", "CREATE TABLE users (id INTEGER PRIMARY KEY, first_name TEXT)"],
	["orders", "CREATE TABLE orders (id INTEGER PRIMARY KEY, user_id INTEGER)"],
] as const;

/**
 * A backend whose metadata query reports the tables in `existing`.
 */
function catalogBackend(existing: Set<string>) {
	return new TestBackend({
		responder: (sql, params) => {
			if (sql === "TABLE EXISTS") {
				const count = existing.has(String(params[0])) ? 1 : 0;
				return [createRow(["table_count"], [count])];
			}
			if (sql === "TABLE LIST") {
				return [...existing].map((name) => createRow(["name"], [name]));
			}
			return {rows: [], rowCount: 0};
		},
	});
}

describe("Wrapper statements", () => {
	test("action returns the affected row count and logs the statement", async () => {
		const backend = new TestBackend({responder: () => ({rows: [], rowCount: 2})});
		const db = new Wrapper(backend, {logger});

		const changed = await db.action(
			"UPDATE users SET active = ? WHERE last_name = ?",
			[false, "Doe"],
		);

		expect(changed).toBe(2);
		expect(db.executionLog).toEqual([
			{
				sql: "UPDATE users SET active = ? WHERE last_name = ?",
				params: [false, "Doe"],
				rowCount: 2,
			},
		]);
		expect(backend.openCursors).toBe(0);

		db.clearExecutionLog();
		expect(db.executionLog).toEqual([]);
	});

	test("the execution log can be disabled", async () => {
		const db = new Wrapper(new TestBackend(), {logger, enableExecutionLog: false});
		await db.action("DELETE FROM users");
		expect(db.executionLog).toEqual([]);
	});

	test("fetchone returns the first row and closes the cursor", async () => {
		const first = createRow(["id"], [1]);
		const backend = new TestBackend({
			responder: () => [first, createRow(["id"], [2])],
		});
		const db = new Wrapper(backend, {logger});

		expect(await db.fetchone("SELECT id FROM users")).toBe(first);
		expect(backend.openCursors).toBe(0);
	});

	test("fetchone returns null for no rows", async () => {
		const db = new Wrapper(new TestBackend(), {logger});
		expect(await db.fetchone("SELECT id FROM users WHERE id = ?", [99])).toBeNull();
	});

	test("query hands the open cursor to the caller", async () => {
		const backend = new TestBackend({responder: () => [createRow(["id"], [1])]});
		const db = new Wrapper(backend, {logger});

		const cursor = await db.query("SELECT id FROM users");
		expect(backend.openCursors).toBe(1);
		expect(await cursor.fetchAll()).toEqual([createRow(["id"], [1])]);
		await cursor.close();
		expect(backend.openCursors).toBe(0);
	});

	test("a failed statement closes its cursor and is not logged", async () => {
		const backend = new TestBackend({
			responder: (sql) => {
				throw new QueryError("near \"SELEC\": syntax error", sql);
			},
		});
		const db = new Wrapper(backend, {logger});

		await expect(db.fetchall("SELEC id FROM users")).rejects.toThrow(QueryError);
		expect(backend.openCursors).toBe(0);
		expect(db.executionLog).toEqual([]);
	});

	test("builder runs on the wrapper's backend", () => {
		const db = new Wrapper(new TestBackend({dialect: "postgresql"}), {logger});
		expect(db.builder("users").where("id", 1).buildQuery()).toBe(
			"SELECT * FROM users WHERE id = $1;",
		);
	});
});

describe("Wrapper metadata", () => {
	test("lastInsertId reads last_id for the table and key", async () => {
		const backend = new TestBackend({
			responder: (sql, params) =>
				sql === "LAST INSERT ID" && params[0] === "users" ? [createRow(["last_id"], ["16"])] : [],
		});
		const db = new Wrapper(backend, {logger});

		expect(await db.lastInsertId("users")).toBe(16);
		expect(backend.statements).toEqual([{sql: "LAST INSERT ID", params: ["users", "id"]}]);
		expect(await db.lastInsertId("orders", "order_id")).toBeNull();
		expect(backend.statements[1]).toEqual({sql: "LAST INSERT ID", params: ["orders", "order_id"]});
	});

	test("tableExists reads table_count", async () => {
		const db = new Wrapper(catalogBackend(new Set(["users"])), {logger});
		expect(await db.tableExists("users")).toBe(true);
		expect(await db.tableExists("orders")).toBe(false);
	});

	test("listTables reads the name column", async () => {
		const db = new Wrapper(catalogBackend(new Set(["users", "orders"])), {logger});
		expect(await db.listTables()).toEqual(["users", "orders"]);
	});
});

describe("Wrapper schemas", () => {
	test("createSchemas creates only missing tables", async () => {
		const backend = catalogBackend(new Set(["users"]));
		const db = new Wrapper(backend, {logger, schemas});

		expect(await db.createSchemas()).toEqual({created: ["orders"], skipped: ["users"]});
		expect(backend.statements.map((s) => s.sql)).toEqual([
			"TABLE EXISTS",
			"TABLE EXISTS",
			"CREATE TABLE orders (id INTEGER PRIMARY KEY, user_id INTEGER)",
		]);
	});

	test("createSchemas can be limited to named tables", async () => {
		const db = new Wrapper(catalogBackend(new Set()), {logger, schemas});
		expect(await db.createSchemas("users")).toEqual({created: ["users"], skipped: []});
	});

	test("dropSchemas drops in reverse order", async () => {
		const backend = catalogBackend(new Set(["users", "orders"]));
		const db = new Wrapper(backend, {logger, schemas});

		expect(await db.dropSchemas()).toEqual({dropped: ["orders", "users"], skipped: []});
		expect(
			backend.statements.map((s) => s.sql).filter((sql) => sql.startsWith("DROP")),
		).toEqual(['DROP TABLE IF EXISTS "orders";', 'DROP TABLE IF EXISTS "users";']);
	});

	test("dropSchemas skips tables that do not exist", async () => {
		const db = new Wrapper(catalogBackend(new Set(["users"])), {logger, schemas});
		expect(await db.dropSchemas("users", "legacy_users")).toEqual({
			dropped: ["users"],
			skipped: ["legacy_users"],
		});
	});

	test("createSchema needs a declared schema or a statement", async () => {
		const db = new Wrapper(catalogBackend(new Set()), {logger, schemas});
		await expect(db.createSchema("invoices")).rejects.toThrow(SchemaError);
		expect(
			await db.createSchema("invoices", "CREATE TABLE invoices (id INTEGER)"),
		).toBe(true);
	});

	test("dropTables reports each table", async () => {
		const db = new Wrapper(catalogBackend(new Set(["users"])), {logger});
		expect(await db.dropTables("users", "orders")).toEqual([
			["users", true],
			["orders", false],
		]);
	});
});

describe("Wrapper transactions", () => {
	test("commits when the callback resolves", async () => {
		const backend = new TestBackend();
		const db = new Wrapper(backend, {logger});

		const result = await db.transaction(async (tx) => {
			await tx.action("INSERT INTO users (first_name) VALUES (?)", ["Dave"]);
			return "done";
		});

		expect(result).toBe("done");
		expect(backend.statements.map((s) => s.sql)).toEqual([
			"BEGIN",
			"INSERT INTO users (first_name) VALUES (?)",
			"COMMIT",
		]);
	});

	test("rolls back and rethrows when the callback throws", async () => {
		const backend = new TestBackend();
		const db = new Wrapper(backend, {logger});

		await expect(
			db.transaction(async () => {
				throw new Error("payment declined");
			}),
		).rejects.toThrow("payment declined");
		expect(backend.statements.map((s) => s.sql)).toEqual(["BEGIN", "ROLLBACK"]);
		expect(backend.inTransaction).toBe(false);
	});

	test("does not nest", async () => {
		const db = new Wrapper(new TestBackend(), {logger});
		await expect(
			db.transaction(async (tx) => tx.transaction(async () => 1)),
		).rejects.toThrow(TransactionError);
	});
});
