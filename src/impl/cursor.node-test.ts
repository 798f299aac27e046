import {describe, test, expect} from "./node-test-utils.js";
import {BatchedCursor, BufferedCursor, type StatementResult} from "./cursor.js";
import {StateError} from "./errors.js";
import {createRow, type Row} from "./row.js";
import type {SQLValue} from "./sql.js";

const rows = [1, 2, 3, 4, 5].map((id) => createRow(["id"], [id]));

class ArrayCursor extends BufferedCursor {
	protected async run(): Promise<StatementResult> {
		return {rows: [...rows], rowCount: rows.length};
	}
}

class InsertCursor extends BufferedCursor {
	protected async run(): Promise<StatementResult> {
		return {rows: [], rowCount: 1, lastInsertId: 7};
	}
}

class PagedCursor extends BatchedCursor {
	pulled = 0;
	returned = false;
	#size: number;

	constructor(size: number) {
		super();
		this.#size = size;
	}

	protected async *open(
		_sql: string,
		_params: readonly SQLValue[],
	): AsyncGenerator<Row[], void, undefined> {
		try {
			for (let i = 0; i < rows.length; i += this.#size) {
				this.pulled++;
				yield rows.slice(i, i + this.#size);
			}
		} finally {
			this.returned = true;
		}
	}
}

describe("BufferedCursor", () => {
	test("reports -1 before execute", () => {
		expect(new ArrayCursor().rowCount).toBe(-1);
	});

	test("fetches one, many, then all", async () => {
		const cursor = new ArrayCursor();
		await cursor.execute("SELECT id FROM t");
		expect(cursor.rowCount).toBe(5);
		expect(await cursor.fetchOne()).toBe(rows[0]);
		expect(await cursor.fetchMany(2)).toEqual([rows[1], rows[2]]);
		expect(await cursor.fetchAll()).toEqual([rows[3], rows[4]]);
		expect(await cursor.fetchOne()).toBeNull();
	});

	test("close is idempotent and blocks fetching", async () => {
		const cursor = new ArrayCursor();
		await cursor.execute("SELECT id FROM t");
		await cursor.close();
		await cursor.close();
		expect(cursor.closed).toBe(true);
		await expect(cursor.fetchOne()).rejects.toThrow(StateError);
	});

	test("execute again starts from the first row", async () => {
		const cursor = new ArrayCursor();
		await cursor.execute("SELECT id FROM t");
		expect(await cursor.fetchMany(4)).toEqual(rows.slice(0, 4));
		expect(await cursor.fetchMany(4)).toEqual([rows[4]]);
		expect(await cursor.fetchMany(4)).toEqual([]);

		await cursor.execute("SELECT id FROM t");
		expect(await cursor.fetchOne()).toBe(rows[0]);
		expect(await cursor.fetchAll()).toEqual(rows.slice(1));
	});

	test("reports the inserted row id", async () => {
		const cursor = new InsertCursor();
		expect(cursor.lastInsertId).toBeNull();
		await cursor.execute("INSERT INTO t (name) VALUES (?)", ["Orange"]);
		expect(cursor.lastInsertId).toBe(7);
		expect(await cursor.fetchOne()).toBeNull();

		const query = new ArrayCursor();
		await query.execute("SELECT id FROM t");
		expect(query.lastInsertId).toBeNull();
	});
});

describe("BatchedCursor", () => {
	test("pulls the first batch on execute", async () => {
		const cursor = new PagedCursor(2);
		await cursor.execute("SELECT id FROM t");
		expect(cursor.pulled).toBe(1);
		expect(cursor.rowCount).toBe(2);
		expect(cursor.streaming).toBe(true);
		await cursor.close();
	});

	test("pulls further batches as rows are fetched", async () => {
		const cursor = new PagedCursor(2);
		await cursor.execute("SELECT id FROM t");
		expect(await cursor.fetchMany(3)).toEqual([rows[0], rows[1], rows[2]]);
		expect(cursor.pulled).toBe(2);
		expect(await cursor.fetchAll()).toEqual([rows[3], rows[4]]);
		expect(cursor.rowCount).toBe(5);
		expect(await cursor.fetchOne()).toBeNull();
		expect(cursor.returned).toBe(true);
	});

	test("close returns an unfinished iterator", async () => {
		const cursor = new PagedCursor(2);
		await cursor.execute("SELECT id FROM t");
		expect(await cursor.fetchOne()).toBe(rows[0]);
		await cursor.close();
		expect(cursor.returned).toBe(true);
		expect(cursor.pulled).toBe(1);
		await cursor.close();
	});
});
