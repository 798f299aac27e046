import {existsSync, mkdtempSync, rmSync} from "node:fs";
import {tmpdir} from "node:os";
import {join} from "node:path";

import {describe, test, expect, beforeEach, afterEach} from "./impl/node-test-utils.js";
import {
	openSQLite,
	sharedMemoryPaths,
	toDatabaseError,
	toSQLiteParam,
} from "./sqlite.js";
import type SQLiteBackend from "./sqlite.js";
import type {Wrapper} from "./impl/wrapper.js";
import type {SQLiteOptions} from "./impl/config.js";
import {
	ConnectionError,
	ConstraintViolationError,
	QueryError,
	StateError,
} from "./impl/errors.js";
import {createLogger} from "./impl/logger.js";
import {createRow, rowColumns, type Row} from "./impl/row.js";

const logger = createLogger({silent: true});

const USERS =
	"CREATE TABLE users (id INTEGER PRIMARY KEY, first_name TEXT NOT NULL, last_name TEXT NOT NULL, address TEXT)";
const ACCOUNTS =
	"CREATE TABLE accounts (id INTEGER PRIMARY KEY, email TEXT NOT NULL UNIQUE)";

const people: [string, string, string | null][] = [
	["John", "Doe", null],
	["Jane", "Doe", null],
	["Anna", "Smith", "12 Elm Street"],
	["Mark", "Smith", null],
	["Lucy", "Brown", "3 Oak Avenue"],
];

async function seedUsers(db: Wrapper<SQLiteBackend>): Promise<void> {
	for (const [first, last, address] of people) {
		await db.action(
			"INSERT INTO users (first_name, last_name, address) VALUES (?, ?, ?)",
			[first, last, address],
		);
	}
}

// ============================================================================
// Scenarios
// ============================================================================

describe("SQLite wrapper", () => {
	let db: Wrapper<SQLiteBackend>;

	beforeEach(async () => {
		db = await openSQLite(
			{
				schemas: [
					["items", "CREATE TABLE items (id INTEGER PRIMARY KEY, name TEXT)"],
					["users", USERS],
					["accounts", ACCOUNTS],
				],
			},
			{logger},
		);
	});

	afterEach(async () => {
		await db.close();
	});

	test("finds an inserted item through the builder", async () => {
		expect(await db.action("INSERT INTO items (name) VALUES (?)", ["Orange"])).toBe(1);

		const item = await db.builder("items").where("name", "Orange").fetch();
		expect(item).toEqual(createRow(["id", "name"], [1, "Orange"]));
		expect(item?.["name"]).toBe("Orange");
	});

	test("groups users without an address", async () => {
		await seedUsers(db);

		const rows = await db
			.builder("users")
			.select("last_name", "COUNT(*) AS total")
			.where("address", null)
			.groupBy("last_name")
			.order("last_name", {direction: "ASC"})
			.all();

		expect(rows).toEqual([
			createRow(["last_name", "total"], ["Doe", 2]),
			createRow(["last_name", "total"], ["Smith", 1]),
		]);
	});

	test("fetchNext returns null after limit rows", async () => {
		await seedUsers(db);
		const q = db.builder("users").order("id", {direction: "ASC"}).limit(2);

		expect((await q.fetchNext())?.["first_name"]).toBe("John");
		expect((await q.fetchNext())?.["first_name"]).toBe("Jane");
		expect(await q.fetchNext()).toBeNull();
	});

	test("limit with offset pages through the rows", async () => {
		await seedUsers(db);
		const rows = await db
			.builder("users")
			.select("first_name")
			.order("id", {direction: "ASC"})
			.limit(2, 2)
			.all();
		expect(rows.map((row) => row.first_name)).toEqual(["Anna", "Mark"]);
	});

	test("all returns the rows iteration yields", async () => {
		await seedUsers(db);
		const q = db.builder("users").where("last_name", "Smith").order("first_name");

		const iterated: Row[] = [];
		for await (const row of q) {
			iterated.push(row);
		}
		expect(await q.all()).toEqual(iterated);
		expect(iterated.map((row) => row.first_name)).toEqual(["Mark", "Anna"]);
	});

	test("OR conditions follow SQL precedence", async () => {
		await seedUsers(db);
		const rows = await db
			.builder("users")
			.select("first_name")
			.where("last_name", "Doe")
			.where("first_name", "Jane")
			.whereOr("address", "3 Oak Avenue")
			.order("id", {direction: "ASC"})
			.all();
		expect(rows.map((row) => row.first_name)).toEqual(["Jane", "Lucy"]);
	});

	test("closeCursor twice does not throw", async () => {
		await seedUsers(db);
		const q = db.builder("users");
		await q.fetchNext();
		await q.closeCursor();
		await q.closeCursor();
		await expect(q.fetchNext()).rejects.toThrow(StateError);
	});

	test("round trips an insert through fetchone", async () => {
		await db.action(
			"INSERT INTO users (id, first_name, last_name) VALUES (?, ?, ?)",
			[42, "Dave", "Johnson"],
		);
		const row = await db.fetchone("SELECT * FROM users WHERE id = ?", [42]);
		expect(row).toEqual(
			createRow(["id", "first_name", "last_name", "address"], [42, "Dave", "Johnson", null]),
		);
	});

	test("insert returns the stored row", async () => {
		await seedUsers(db);
		const row = await db.insert("users", {first_name: "Dave", last_name: "Johnson"});
		expect(row).toEqual(
			createRow(["id", "first_name", "last_name", "address"], [6, "Dave", "Johnson", null]),
		);
	});

	test("reports the last inserted rowid", async () => {
		await seedUsers(db);
		const cursor = await db.query(
			"INSERT INTO users (first_name, last_name) VALUES (?, ?)",
			["Dave", "Johnson"],
		);
		try {
			expect(cursor.lastInsertId).toBe(6);
		} finally {
			await cursor.close();
		}
		expect(await db.lastInsertId("users")).toBe(6);
	});

	test("keeps every selected column name", async () => {
		const row = await db.fetchone("SELECT 1 AS __proto__, 2 AS b");
		expect(row === null ? [] : rowColumns(row)).toEqual(["__proto__", "b"]);
		expect(row?.["__proto__"]).toBe(1);
	});

	test("records executed statements", async () => {
		db.clearExecutionLog();
		await db.action("INSERT INTO items (name) VALUES (?)", ["Orange"]);
		await db.fetchall("SELECT name FROM items");
		expect(db.executionLog).toEqual([
			{sql: "INSERT INTO items (name) VALUES (?)", params: ["Orange"], rowCount: 1},
			{sql: "SELECT name FROM items", params: [], rowCount: 1},
		]);
	});

	test("binds booleans as integers and dates as ISO text", async () => {
		await db.action("CREATE TABLE visits (active INTEGER, seen_at TEXT)");
		await db.action("INSERT INTO visits (active, seen_at) VALUES (?, ?)", [
			true,
			new Date("2024-05-01T12:00:00.000Z"),
		]);

		expect(await db.fetchone("SELECT * FROM visits")).toEqual(
			createRow(["active", "seen_at"], [1, "2024-05-01T12:00:00.000Z"]),
		);

		const visit = await db.builder("visits").selectDate("seen_at").fetch();
		expect(visit?.["seen_at"]).toBe("2024-05-01T12:00:00Z");
	});

	test("buffers rows when streaming is requested", async () => {
		const q = db.builder("items", {stream: true});
		const cursor = await q.execute();
		expect(cursor.streaming).toBe(false);
		await q.closeCursor();
	});
});

// ============================================================================
// Schemas and metadata
// ============================================================================

describe("SQLite schemas", () => {
	test("creates declared tables once and drops them", async () => {
		const db = await openSQLite(
			{schemas: [["items", "CREATE TABLE items (id INTEGER PRIMARY KEY, name TEXT)"]]},
			{logger},
		);
		try {
			expect(await db.tableExists("items")).toBe(true);
			expect(await db.createSchemas()).toEqual({created: [], skipped: ["items"]});
			expect(await db.dropSchemas()).toEqual({dropped: ["items"], skipped: []});
			expect(await db.tableExists("items")).toBe(false);
			expect(await db.listTables()).toEqual([]);
			expect(await db.recreateSchemas()).toEqual({dropped: [], created: ["items"]});
		} finally {
			await db.close();
		}
	});

	test("uses a custom table-exists query", async () => {
		const db = await openSQLite(
			{tableQuery: "SELECT 1 AS table_count WHERE ? = 'everything'"},
			{logger},
		);
		try {
			expect(await db.tableExists("everything")).toBe(true);
			expect(await db.tableExists("items")).toBe(false);
		} finally {
			await db.close();
		}
	});
});

// ============================================================================
// Errors
// ============================================================================

describe("SQLite errors", () => {
	let db: Wrapper<SQLiteBackend>;

	beforeEach(async () => {
		db = await openSQLite({schemas: [["accounts", ACCOUNTS]]}, {logger});
	});

	afterEach(async () => {
		await db.close();
	});

	test("maps unique violations", async () => {
		await db.insert("accounts", {email: "ana@example.com"});

		let caught: unknown;
		try {
			await db.insert("accounts", {email: "ana@example.com"});
		} catch (error) {
			caught = error;
		}

		if (!(caught instanceof ConstraintViolationError)) {
			throw new Error("expected a ConstraintViolationError");
		}
		expect(caught.kind).toBe("unique");
		expect(caught.table).toBe("accounts");
		expect(caught.column).toBe("email");
		expect(caught.message).toBe("UNIQUE constraint failed: accounts.email");
		expect(caught.sql).toBe('INSERT INTO "accounts" ("email") VALUES (?) RETURNING *;');
	});

	test("maps not-null violations", async () => {
		await expect(db.insert("accounts", {email: null})).rejects.toThrow(
			"NOT NULL constraint failed: accounts.email",
		);
	});

	test("wraps other statement failures in QueryError", async () => {
		await expect(db.query("SELECT nickname FROM accounts")).rejects.toThrow(QueryError);
		await expect(db.query("SELECT nickname FROM accounts")).rejects.toThrow(
			"no such column: nickname",
		);
	});

	test("rolls back a failed transaction", async () => {
		await expect(
			db.transaction(async (tx) => {
				await tx.insert("accounts", {email: "ana@example.com"});
				await tx.insert("accounts", {email: "ana@example.com"});
			}),
		).rejects.toThrow(ConstraintViolationError);

		expect(await db.fetchall("SELECT * FROM accounts")).toEqual([]);
		expect(db.backend.inTransaction).toBe(false);
	});

	test("toDatabaseError reads the constraint kind from the code", () => {
		const error = toDatabaseError(
			Object.assign(new Error("FOREIGN KEY constraint failed"), {
				code: "SQLITE_CONSTRAINT_FOREIGNKEY",
			}),
		);
		if (!(error instanceof ConstraintViolationError)) {
			throw new Error("expected a ConstraintViolationError");
		}
		expect(error.kind).toBe("foreign_key");
		expect(error.table).toBeUndefined();
	});

	test("toDatabaseError maps open failures to ConnectionError", () => {
		const error = toDatabaseError(
			Object.assign(new Error("unable to open database file"), {code: "SQLITE_CANTOPEN"}),
		);
		expect(error).toBeInstanceOf(ConnectionError);
	});
});

// ============================================================================
// Connection options
// ============================================================================

describe("SQLite connection options", () => {
	let folder: string;

	beforeEach(() => {
		folder = mkdtempSync(join(tmpdir(), "relwrap-"));
	});

	afterEach(() => {
		rmSync(folder, {recursive: true, force: true});
	});

	test("resolves a relative path against folder and creates it", async () => {
		const db = await openSQLite({path: "data/app.db", folder}, {logger});
		try {
			expect(db.backend.filename).toBe(join(folder, "data", "app.db"));
			expect(existsSync(join(folder, "data", "app.db"))).toBe(true);
		} finally {
			await db.close();
		}
	});

	test("fails with ConnectionError when a read-only file is missing", async () => {
		await expect(
			openSQLite({path: "missing.db", folder, readonly: true}, {logger}),
		).rejects.toThrow(ConnectionError);
	});

	test("memoryPersist wrappers on one path share a database", async () => {
		const options: SQLiteOptions = {
			path: "shared-notes",
			memoryPersist: true,
			schemas: [["notes", "CREATE TABLE notes (body TEXT)"]],
		};
		const first = await openSQLite(options, {logger});
		const second = await openSQLite(options, {logger});
		try {
			await first.action("INSERT INTO notes (body) VALUES (?)", ["remember me"]);
			expect(await second.tableExists("notes")).toBe(true);
			expect(await second.fetchall("SELECT body FROM notes")).toEqual([
				createRow(["body"], ["remember me"]),
			]);

			await first.close();
			expect(sharedMemoryPaths()).toContain("shared-notes");
			expect(await second.fetchone("SELECT count(*) AS n FROM notes")).toEqual(
				createRow(["n"], [1]),
			);
		} finally {
			await first.close();
			await second.close();
		}

		expect(sharedMemoryPaths().includes("shared-notes")).toBe(false);
		const reopened = await openSQLite({path: "shared-notes", memoryPersist: true}, {logger});
		try {
			expect(await reopened.tableExists("notes")).toBe(false);
		} finally {
			await reopened.close();
		}
	});

	test("memoryPersist paths are separate databases", async () => {
		const a = await openSQLite({path: "alpha", memoryPersist: true}, {logger});
		const b = await openSQLite({path: "beta", memoryPersist: true}, {logger});
		try {
			await a.action("CREATE TABLE notes (body TEXT)");
			expect(await b.tableExists("notes")).toBe(false);
		} finally {
			await a.close();
			await b.close();
		}
	});

	test("autoCommit off keeps statements in a transaction until commit", async () => {
		const db = await openSQLite({autoCommit: false}, {logger});
		try {
			await db.action("CREATE TABLE notes (body TEXT)");
			expect(db.backend.inTransaction).toBe(true);
			await db.commit();
			expect(db.backend.inTransaction).toBe(false);

			await db.action("INSERT INTO notes (body) VALUES (?)", ["draft"]);
			await db.rollback();
			expect(await db.fetchall("SELECT body FROM notes")).toEqual([]);
			await db.rollback();
		} finally {
			await db.close();
		}
	});
});

describe("toSQLiteParam", () => {
	test("converts values better-sqlite3 cannot bind", () => {
		expect(toSQLiteParam(false)).toBe(0);
		expect(toSQLiteParam(new Date("2024-01-02T03:04:05.000Z"))).toBe(
			"2024-01-02T03:04:05.000Z",
		);
		expect(toSQLiteParam(new Uint8Array([7, 8]))).toEqual(Buffer.from([7, 8]));
		expect(toSQLiteParam("text")).toBe("text");
		expect(toSQLiteParam(null)).toBeNull();
	});
});
