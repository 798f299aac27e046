import {describe, test, expect} from "./node-test-utils.js";
import {QueryBuilder} from "./builder.js";
import {NotFoundError, QueryError, StateError} from "./errors.js";
import {createRow, type Row} from "./row.js";
import {TestBackend} from "./test-backend.js";

const john = createRow(["id", "first_name"], [1, "John"]);
const jane = createRow(["id", "first_name"], [2, "Jane"]);
const dave = createRow(["id", "first_name"], [3, "Dave"]);

function usersBackend(rows: Row[] = [john, jane, dave]) {
	return new TestBackend({responder: () => rows});
}

// ============================================================================
// Query building
// ============================================================================

describe("QueryBuilder.buildQuery", () => {
	test("selects every column by default", () => {
		const q = new QueryBuilder("users", new TestBackend());
		expect(q.buildQuery()).toBe("SELECT * FROM users;");
		expect(q.params).toEqual([]);
	});

	test("assembles select, where and order", () => {
		const q = new QueryBuilder("users", new TestBackend())
			.select("first_name")
			.where("first_name", "John")
			.where("last_name", "Doe")
			.order("first_name");

		expect(q.buildQuery()).toBe(
			"SELECT first_name FROM users WHERE first_name = ? AND last_name = ? ORDER BY first_name DESC;",
		);
		expect(q.params).toEqual(["John", "Doe"]);
	});

	test("numbers placeholders for postgresql", () => {
		const q = new QueryBuilder("users", new TestBackend({dialect: "postgresql"}))
			.where("first_name", "John")
			.where("age", 18, {compare: ">="});

		expect(q.buildQuery()).toBe(
			"SELECT * FROM users WHERE first_name = $1 AND age >= $2;",
		);
		expect(q.params).toEqual(["John", 18]);
	});

	test("renders null values as IS NULL without binding them", () => {
		const q = new QueryBuilder("users", new TestBackend({dialect: "postgresql"}))
			.where("address", null)
			.where("last_name", "Smith");

		expect(q.buildQuery()).toBe(
			"SELECT * FROM users WHERE address IS NULL AND last_name = $1;",
		);
		expect(q.params).toEqual(["Smith"]);
	});

	test("renders undefined like null", () => {
		const q = new QueryBuilder("users", new TestBackend()).where("deleted_at", undefined);
		expect(q.buildQuery()).toBe("SELECT * FROM users WHERE deleted_at IS NULL;");
	});

	test("renders != null as IS NOT NULL", () => {
		const q = new QueryBuilder("users", new TestBackend()).where("address", null, {
			compare: "!=",
		});
		expect(q.buildQuery()).toBe("SELECT * FROM users WHERE address IS NOT NULL;");
	});

	test("joins OR conditions left to right", () => {
		const q = new QueryBuilder("users", new TestBackend())
			.where("first_name", "John")
			.where("last_name", "Doe")
			.whereOr("id", 7);

		expect(q.buildQuery()).toBe(
			"SELECT * FROM users WHERE first_name = ? AND last_name = ? OR id = ?;",
		);
		expect(q.params).toEqual(["John", "Doe", 7]);
	});

	test("wraps the placeholder in a value template", () => {
		const q = new QueryBuilder("users", new TestBackend({dialect: "postgresql"}))
			.where("email", "john@example.com", {placeholder: "LOWER(?)"});

		expect(q.buildQuery()).toBe("SELECT * FROM users WHERE email = LOWER($1);");
	});

	test("rejects a template without exactly one placeholder", () => {
		const q = new QueryBuilder("users", new TestBackend());
		expect(() => q.where("email", "x", {placeholder: "COALESCE(?, ?)"})).toThrow(
			TypeError,
		);
	});

	test("assembles the aggregate query in clause order", () => {
		const q = new QueryBuilder("users", new TestBackend())
			.select("last_name", "COUNT(*) AS total")
			.where("address", null)
			.groupBy("last_name")
			.order("last_name", {direction: "ASC"})
			.limit(10, 20);

		expect(q.buildQuery()).toBe(
			"SELECT last_name, COUNT(*) AS total FROM users WHERE address IS NULL GROUP BY last_name ORDER BY last_name ASC LIMIT 10 OFFSET 20;",
		);
	});

	test("applies the direction to every order column", () => {
		const q = new QueryBuilder("users", new TestBackend()).order(
			"last_name",
			"first_name",
			{direction: "ASC"},
		);
		expect(q.buildQuery()).toBe(
			"SELECT * FROM users ORDER BY last_name ASC, first_name ASC;",
		);
	});

	test("order replaces the previous order", () => {
		const q = new QueryBuilder("users", new TestBackend())
			.order("id")
			.orderBy("first_name", {direction: "ASC"});
		expect(q.buildQuery()).toBe("SELECT * FROM users ORDER BY first_name ASC;");
	});

	test("places pre and post query fragments around the select", () => {
		const q = new QueryBuilder("users", new TestBackend(), {
			preQuery: "WITH active AS (SELECT 1)",
			postQuery: "FOR UPDATE",
		});
		expect(q.buildQuery()).toBe(
			"WITH active AS (SELECT 1) SELECT * FROM users FOR UPDATE;",
		);
	});

	test("selects dates as ISO strings", () => {
		const sqlite = new QueryBuilder("events", new TestBackend()).selectDate("created_at");
		expect(sqlite.buildQuery()).toBe(
			"SELECT strftime('%Y-%m-%dT%H:%M:%SZ', created_at) AS created_at FROM events;",
		);

		const pg = new QueryBuilder("events", new TestBackend({dialect: "postgresql"}))
			.select("id")
			.selectDate("created_at");
		expect(pg.buildQuery()).toBe(
			`SELECT id, to_char(created_at, 'YYYY-MM-DD"T"HH24:MI:SS"Z"') AS created_at FROM events;`,
		);
	});

	test("validates limit and offset", () => {
		const q = new QueryBuilder("users", new TestBackend());
		expect(() => q.limit(-1)).toThrow(RangeError);
		expect(() => q.limit(1.5)).toThrow(RangeError);
		expect(() => q.limit(5, -2)).toThrow("offset must be a non-negative integer");
	});

	test("is deterministic across calls", () => {
		const q = new QueryBuilder("users", new TestBackend())
			.where("first_name", "John")
			.limit(3);
		const first = q.buildQuery();
		expect(q.buildQuery()).toBe(first);
		expect(q.params).toEqual(["John"]);
		expect(q.params).toEqual(["John"]);
	});

	test("moves from empty to accumulating to built", () => {
		const q = new QueryBuilder("users", new TestBackend());
		expect(q.state).toBe("empty");
		q.where("id", 1);
		expect(q.state).toBe("accumulating");
		q.buildQuery();
		expect(q.state).toBe("built");
	});

	test("uses a custom placeholder style", () => {
		const q = new QueryBuilder("users", new TestBackend(), {
			placeholder: (index) => `:p${index}`,
		}).where("id", 1).where("first_name", "John");
		expect(q.buildQuery()).toBe(
			"SELECT * FROM users WHERE id = :p1 AND first_name = :p2;",
		);
	});
});

// ============================================================================
// Execution
// ============================================================================

describe("QueryBuilder execution", () => {
	test("execute sends the built query and its parameters", async () => {
		const backend = usersBackend();
		const q = new QueryBuilder("users", backend).where("first_name", "John");

		await q.execute();
		expect(q.state).toBe("executed");
		expect(backend.statements).toEqual([
			{sql: "SELECT * FROM users WHERE first_name = ?;", params: ["John"]},
		]);

		await q.closeCursor();
		expect(backend.openCursors).toBe(0);
	});

	test("fetch returns the first row and releases the cursor", async () => {
		const backend = usersBackend();
		const q = new QueryBuilder("users", backend);

		expect(await q.fetch()).toBe(john);
		expect(backend.openCursors).toBe(0);
		expect(q.state).toBe("built");
	});

	test("fetch returns null when nothing matches", async () => {
		const q = new QueryBuilder("users", usersBackend([]));
		expect(await q.fetch()).toBeNull();
	});

	test("fetchOrThrow throws NotFoundError when nothing matches", async () => {
		const q = new QueryBuilder("users", usersBackend([]));
		await expect(q.fetchOrThrow()).rejects.toThrow(NotFoundError);
	});

	test("fetchNext walks the rows then returns null", async () => {
		const backend = usersBackend();
		const q = new QueryBuilder("users", backend);

		expect(await q.fetchNext()).toBe(john);
		expect(await q.fetchNext()).toBe(jane);
		expect(await q.fetchNext()).toBe(dave);
		expect(await q.fetchNext()).toBeNull();
		expect(q.state).toBe("exhausted");
		expect(backend.openCursors).toBe(0);
		expect(await q.fetchNext()).toBeNull();
		expect(backend.statements).toHaveLength(1);
	});

	test("fetch continues an open cursor", async () => {
		const q = new QueryBuilder("users", usersBackend());
		await q.execute();
		expect(await q.fetch()).toBe(john);
		expect(await q.fetch()).toBe(jane);
		await q.closeCursor();
	});

	test("all returns the same rows as iteration", async () => {
		const backend = usersBackend();
		const q = new QueryBuilder("users", backend);

		const iterated: Row[] = [];
		for await (const row of q) {
			iterated.push(row);
		}

		expect(await q.all()).toEqual(iterated);
		expect(iterated).toEqual([john, jane, dave]);
		expect(backend.openCursors).toBe(0);
	});

	test("leaving an iteration early closes the cursor", async () => {
		const backend = usersBackend();
		const q = new QueryBuilder("users", backend);

		for await (const row of q) {
			expect(row).toBe(john);
			break;
		}
		expect(backend.openCursors).toBe(0);
		expect(q.state).toBe("built");
	});

	test("closeCursor can be called twice", async () => {
		const q = new QueryBuilder("users", usersBackend());
		await q.execute();
		await q.closeCursor();
		await q.closeCursor();
		expect(q.state).toBe("closed");
	});

	test("fetchNext after closeCursor throws StateError", async () => {
		const q = new QueryBuilder("users", usersBackend());
		await q.fetchNext();
		await q.closeCursor();
		await expect(q.fetchNext()).rejects.toThrow(StateError);
	});

	test("clause methods are rejected while the cursor is open", async () => {
		const q = new QueryBuilder("users", usersBackend());
		await q.execute();
		expect(() => q.where("id", 1)).toThrow(StateError);
		await q.closeCursor();

		q.where("id", 1);
		expect(q.state).toBe("accumulating");
		expect(q.buildQuery()).toBe("SELECT * FROM users WHERE id = ?;");
	});

	test("executing again closes the previous cursor", async () => {
		const backend = usersBackend();
		const q = new QueryBuilder("users", backend);
		await q.execute();
		await q.execute();
		expect(backend.openCursors).toBe(1);
		await q.closeCursor();
		expect(backend.openCursors).toBe(0);
	});

	test("a failed statement closes its cursor and propagates", async () => {
		const backend = new TestBackend({
			responder: (sql) => {
				throw new QueryError("no such column: nickname", sql);
			},
		});
		const q = new QueryBuilder("users", backend).where("nickname", "JJ");

		await expect(q.execute()).rejects.toThrow("no such column: nickname");
		expect(backend.openCursors).toBe(0);
		expect(q.state).toBe("built");
	});

	test("streams in batches when the backend supports it", async () => {
		const backend = new TestBackend({
			streaming: true,
			responder: () => [john, jane, dave],
		});
		const q = new QueryBuilder("users", backend, {stream: true, batchSize: 2});

		const cursor = await q.execute();
		expect(cursor.streaming).toBe(true);
		expect(await q.fetchNext()).toBe(john);
		expect(backend.batches).toBe(1);
		expect(await q.fetchNext()).toBe(jane);
		expect(await q.fetchNext()).toBe(dave);
		expect(backend.batches).toBe(2);
		expect(await q.fetchNext()).toBeNull();
		expect(backend.openCursors).toBe(0);
	});

	test("buffers when the backend cannot stream", async () => {
		const q = new QueryBuilder("users", usersBackend(), {stream: true});
		const cursor = await q.execute();
		expect(cursor.streaming).toBe(false);
		await q.closeCursor();
	});
});
