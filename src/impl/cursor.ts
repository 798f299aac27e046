/**
 * Cursors - one statement, its results, and its release.
 *
 * A cursor is owned by whichever operation opened it and must be closed on
 * every exit path. Closing is idempotent.
 */

import type {Row} from "./row.js";
import type {SQLValue} from "./sql.js";
import {StateError} from "./errors.js";

export interface Cursor {
	/** True once close() has been called */
	readonly closed: boolean;
	/** True when rows are fetched from the server incrementally */
	readonly streaming: boolean;
	/**
	 * Rows affected by the last statement (INSERT/UPDATE/DELETE), or rows
	 * returned so far for a query. -1 before execute().
	 */
	readonly rowCount: number;
	/**
	 * Row id of the most recent INSERT on the connection, where the driver
	 * reports one (SQLite). Null otherwise.
	 */
	readonly lastInsertId: number | bigint | null;

	execute(sql: string, params?: readonly SQLValue[]): Promise<void>;
	/** The next row, or null when the results are exhausted */
	fetchOne(): Promise<Row | null>;
	fetchMany(size: number): Promise<Row[]>;
	fetchAll(): Promise<Row[]>;
	close(): Promise<void>;
}

export interface StatementResult {
	rows: Row[];
	rowCount: number;
	lastInsertId?: number | bigint;
}

/**
 * Cursor whose statement materializes every row when it runs.
 *
 * Backends implement run(); fetching reads from the buffer.
 */
export abstract class BufferedCursor implements Cursor {
	readonly streaming = false;
	#closed = false;
	#rows: Row[] = [];
	/** Index of the next row to hand out */
	#offset = 0;
	#rowCount = -1;
	#lastInsertId: number | bigint | null = null;

	get closed(): boolean {
		return this.#closed;
	}

	get rowCount(): number {
		return this.#rowCount;
	}

	get lastInsertId(): number | bigint | null {
		return this.#lastInsertId;
	}

	protected abstract run(
		sql: string,
		params: readonly SQLValue[],
	): Promise<StatementResult>;

	async execute(sql: string, params: readonly SQLValue[] = []): Promise<void> {
		this.#assertOpen("execute");
		const result = await this.run(sql, params);
		this.#rows = result.rows;
		this.#offset = 0;
		this.#rowCount = result.rowCount;
		this.#lastInsertId = result.lastInsertId ?? null;
	}

	async fetchOne(): Promise<Row | null> {
		this.#assertOpen("fetchOne");
		if (this.#offset >= this.#rows.length) {
			return null;
		}
		return this.#rows[this.#offset++];
	}

	async fetchMany(size: number): Promise<Row[]> {
		this.#assertOpen("fetchMany");
		return this.#take(size);
	}

	async fetchAll(): Promise<Row[]> {
		this.#assertOpen("fetchAll");
		return this.#take(this.#rows.length - this.#offset);
	}

	async close(): Promise<void> {
		this.#closed = true;
		this.#rows = [];
		this.#offset = 0;
	}

	#take(size: number): Row[] {
		const start = this.#offset;
		this.#offset = Math.min(start + Math.max(size, 0), this.#rows.length);
		return this.#rows.slice(start, this.#offset);
	}

	#assertOpen(operation: string): void {
		if (this.#closed) {
			throw new StateError(`Cannot ${operation}() on a closed cursor`, "closed");
		}
	}
}

/**
 * Cursor that pulls rows from the server in batches.
 *
 * Backends implement open(), returning an iterator of row batches for the
 * statement. execute() pulls the first batch so statement errors surface
 * there; close() returns the iterator, which releases the server-side
 * cursor.
 */
export abstract class BatchedCursor implements Cursor {
	readonly streaming = true;
	readonly lastInsertId = null;
	#closed = false;
	#iterator: AsyncIterator<Row[]> | null = null;
	#pending: Row[] = [];
	#rowCount = -1;

	get closed(): boolean {
		return this.#closed;
	}

	get rowCount(): number {
		return this.#rowCount;
	}

	protected abstract open(
		sql: string,
		params: readonly SQLValue[],
	): AsyncIterator<Row[]>;

	async execute(sql: string, params: readonly SQLValue[] = []): Promise<void> {
		this.#assertOpen("execute");
		await this.#finish();
		this.#pending = [];
		this.#rowCount = 0;
		this.#iterator = this.open(sql, params);
		await this.#pull();
	}

	async fetchOne(): Promise<Row | null> {
		this.#assertOpen("fetchOne");
		while (this.#pending.length === 0 && (await this.#pull()));
		return this.#pending.shift() ?? null;
	}

	async fetchMany(size: number): Promise<Row[]> {
		this.#assertOpen("fetchMany");
		while (this.#pending.length < size && (await this.#pull()));
		return this.#pending.splice(0, size);
	}

	async fetchAll(): Promise<Row[]> {
		this.#assertOpen("fetchAll");
		while (await this.#pull());
		return this.#pending.splice(0, this.#pending.length);
	}

	async close(): Promise<void> {
		if (this.#closed) {
			return;
		}
		this.#closed = true;
		this.#pending = [];
		await this.#finish();
	}

	async #pull(): Promise<boolean> {
		const iterator = this.#iterator;
		if (iterator === null) {
			return false;
		}

		let result: IteratorResult<Row[]>;
		try {
			result = await iterator.next();
		} catch (error) {
			this.#iterator = null;
			throw error;
		}

		if (result.done) {
			this.#iterator = null;
			return false;
		}
		this.#pending.push(...result.value);
		this.#rowCount += result.value.length;
		return true;
	}

	async #finish(): Promise<void> {
		const iterator = this.#iterator;
		this.#iterator = null;
		if (iterator?.return) {
			await iterator.return();
		}
	}

	#assertOpen(operation: string): void {
		if (this.#closed) {
			throw new StateError(`Cannot ${operation}() on a closed cursor`, "closed");
		}
	}
}
