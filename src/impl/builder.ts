/**
 * Query builder - a fluent, single-table SELECT accumulator.
 *
 * Clause methods collect fragments; buildQuery() assembles them in a fixed
 * order and terminal methods run the result through a backend cursor.
 *
 * NOTE: select(), groupBy() and order() take raw SQL and are not escaped.
 * Only where()/whereOr() values are bound as parameters.
 *
 * @example
 * const rows = await db
 *   .builder("orders")
 *   .select("full_name", "SUM(amount) AS total")
 *   .where("country", "FR")
 *   .where("SUM(amount)", 100, {compare: ">="})
 *   .groupBy("full_name")
 *   .order("full_name", {direction: "ASC"})
 *   .all();
 */

import type {Backend} from "./backend.js";
import type {Cursor} from "./cursor.js";
import type {Row} from "./row.js";
import type {Logger} from "./logger.js";
import {getDefaultLogger} from "./logger.js";
import {NotFoundError, StateError} from "./errors.js";
import {isoDateColumn, type PlaceholderStyle, type SQLValue} from "./sql.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Builder lifecycle.
 *
 * empty -> accumulating -> built -> executed -> exhausted | closed
 *
 * Clause methods are rejected only while a cursor is open ("executed").
 * From "built", "exhausted" and "closed" they are accepted and the next
 * terminal call executes again.
 */
export type BuilderState =
	| "empty"
	| "accumulating"
	| "built"
	| "executed"
	| "exhausted"
	| "closed";

export type Conjunction = "AND" | "OR";

export type OrderDirection = "ASC" | "DESC";

export interface WhereOptions {
	/** Comparison operator (default "="), e.g. ">", "<=", "LIKE" */
	compare?: string;
	/**
	 * Value template with a single "?" where the parameter goes,
	 * e.g. "LOWER(?)". The "?" is replaced with the backend's placeholder.
	 */
	placeholder?: string;
}

export interface OrderOptions {
	/** Applied to every listed column (default "DESC") */
	direction?: OrderDirection;
}

export type OrderArgs =
	| [...columns: string[], options: OrderOptions]
	| string[];

export interface QueryBuilderOptions {
	/** Overrides the backend's placeholder syntax */
	placeholder?: PlaceholderStyle;
	/** Raw SQL placed before SELECT */
	preQuery?: string;
	/** Raw SQL placed after LIMIT/OFFSET */
	postQuery?: string;
	/** Fetch rows incrementally where the backend supports it */
	stream?: boolean;
	/** Rows per round trip in streaming mode (default 100) */
	batchSize?: number;
	logger?: Logger;
}

interface WhereCondition {
	conjunction: Conjunction;
	column: string;
	compare: string;
	value: SQLValue;
	template: string;
}

interface OrderColumn {
	column: string;
	direction: OrderDirection;
}

// ============================================================================
// QueryBuilder
// ============================================================================

export class QueryBuilder implements AsyncIterable<Row> {
	readonly table: string;

	#backend: Backend;
	#options: QueryBuilderOptions;
	#logger: Logger;

	#columns: string[] = [];
	#conditions: WhereCondition[] = [];
	#groupColumns: string[] = [];
	#orderColumns: OrderColumn[] = [];
	#limit: number | null = null;
	#offset: number | null = null;

	#state: BuilderState = "empty";
	#cursor: Cursor | null = null;

	constructor(table: string, backend: Backend, options: QueryBuilderOptions = {}) {
		this.table = table;
		this.#backend = backend;
		this.#options = options;
		this.#logger = (options.logger ?? getDefaultLogger()).child({
			component: "builder",
		});
	}

	get state(): BuilderState {
		return this.#state;
	}

	/**
	 * Parameters for the current query, in placeholder order.
	 */
	get params(): SQLValue[] {
		return this.#render().params;
	}

	// ==========================================================================
	// Clauses
	// ==========================================================================

	/**
	 * Add columns to the select clause. Chained calls append.
	 *
	 * @example
	 * q.select("name", "COUNT(name) AS total")
	 */
	select(...columns: string[]): this {
		this.#mutate("select");
		this.#columns.push(...columns);
		return this;
	}

	/**
	 * Select date/time columns as ISO-8601 UTC strings under their own names.
	 * Pass bare column names, not `col AS alias`.
	 */
	selectDate(...columns: string[]): this {
		this.#mutate("selectDate");
		for (const column of columns) {
			this.#columns.push(isoDateColumn(column, this.#backend.dialect));
		}
		return this;
	}

	/**
	 * Add a condition joined with AND to the previous one.
	 * A null value renders `column IS NULL` and binds nothing.
	 *
	 * @example
	 * q.where("first_name", "John").where("age", 18, {compare: ">="})
	 * // WHERE first_name = ? AND age >= ?
	 */
	where(column: string, value: SQLValue | undefined, options?: WhereOptions): this {
		return this.#addCondition("AND", column, value, options);
	}

	/**
	 * Add a condition joined with OR to the previous one.
	 *
	 * Conditions are joined left to right without parentheses, so SQL
	 * precedence applies: `where(a).where(b).whereOr(c)` is
	 * `a AND b OR c`, i.e. `(a AND b) OR c`.
	 */
	whereOr(column: string, value: SQLValue | undefined, options?: WhereOptions): this {
		return this.#addCondition("OR", column, value, options);
	}

	/**
	 * Add columns to the GROUP BY clause. Chained calls append.
	 */
	groupBy(...columns: string[]): this {
		this.#mutate("groupBy");
		this.#groupColumns.push(...columns);
		return this;
	}

	/**
	 * Set the ORDER BY clause, replacing any previous one.
	 *
	 * @example
	 * q.order("last_name", "first_name", {direction: "ASC"})
	 * // ORDER BY last_name ASC, first_name ASC
	 */
	order(...args: OrderArgs): this {
		return this.#setOrder("order", args);
	}

	/** Alias of order() */
	orderBy(...args: OrderArgs): this {
		return this.#setOrder("orderBy", args);
	}

	/**
	 * Limit the number of rows, optionally skipping `offset` rows first.
	 * Use an ORDER BY with an offset for stable pages.
	 */
	limit(limit: number, offset?: number): this {
		this.#mutate("limit");
		assertCount("limit", limit);
		this.#limit = limit;
		if (offset !== undefined) {
			assertCount("offset", offset);
			this.#offset = offset;
		}
		return this;
	}

	// ==========================================================================
	// Query Building
	// ==========================================================================

	/**
	 * Assemble the SQL for the accumulated clauses.
	 * Repeated calls without mutation return identical strings.
	 */
	buildQuery(): string {
		const {sql} = this.#render();
		if (this.#state === "empty" || this.#state === "accumulating") {
			this.#state = "built";
		}
		return sql;
	}

	#render(): {sql: string; params: SQLValue[]} {
		const style = this.#options.placeholder ?? this.#backend.placeholder;
		const params: SQLValue[] = [];
		const parts: string[] = [];

		if (this.#options.preQuery) {
			parts.push(this.#options.preQuery.trim());
		}

		const columns = this.#columns.length > 0 ? this.#columns.join(", ") : "*";
		parts.push(`SELECT ${columns} FROM ${this.table}`);

		if (this.#conditions.length > 0) {
			const clauses = this.#conditions.map((condition, i) => {
				let rendered: string;
				if (condition.value === null) {
					rendered = `${condition.column} ${condition.compare} NULL`;
				} else {
					params.push(condition.value);
					const index = params.length;
					const bound = condition.template.replace("?", () => style(index));
					rendered = `${condition.column} ${condition.compare} ${bound}`;
				}
				return i === 0 ? rendered : `${condition.conjunction} ${rendered}`;
			});
			parts.push(`WHERE ${clauses.join(" ")}`);
		}

		if (this.#groupColumns.length > 0) {
			parts.push(`GROUP BY ${this.#groupColumns.join(", ")}`);
		}

		if (this.#orderColumns.length > 0) {
			const order = this.#orderColumns
				.map(({column, direction}) => `${column} ${direction}`)
				.join(", ");
			parts.push(`ORDER BY ${order}`);
		}

		if (this.#limit !== null) {
			parts.push(`LIMIT ${this.#limit}`);
			if (this.#offset !== null) {
				parts.push(`OFFSET ${this.#offset}`);
			}
		}

		if (this.#options.postQuery) {
			parts.push(this.#options.postQuery.trim());
		}

		return {sql: `${parts.join(" ")};`, params};
	}

	// ==========================================================================
	// Execution
	// ==========================================================================

	/**
	 * Run the query on a new cursor and keep it open for fetchNext().
	 * Any cursor still open from a previous execution is closed first.
	 */
	async execute(): Promise<Cursor> {
		await this.#release(this.#state === "executed" ? "built" : this.#state);

		const {sql, params} = this.#render();
		this.#logger.debug("Executing built query", {sql, params});

		const stream = this.#options.stream === true && this.#backend.supportsStreaming;
		if (this.#options.stream && !stream) {
			this.#logger.debug("Backend has no streaming cursor; results are buffered", {
				dialect: this.#backend.dialect,
			});
		}

		const cursor = await this.#backend.cursor({
			stream,
			batchSize: this.#options.batchSize,
		});
		try {
			await cursor.execute(sql, params);
		} catch (error) {
			await cursor.close();
			this.#state = "built";
			throw error;
		}

		this.#cursor = cursor;
		this.#state = "executed";
		return cursor;
	}

	/**
	 * The first row of the query, or null when nothing matches.
	 * While a cursor is open (after execute() or fetchNext()) this returns
	 * the next row of that cursor instead.
	 */
	async fetch(): Promise<Row | null> {
		if (this.#state === "executed") {
			return this.fetchNext();
		}

		const cursor = await this.execute();
		try {
			return await cursor.fetchOne();
		} finally {
			await this.#release("built");
		}
	}

	/**
	 * Like fetch(), but throws NotFoundError instead of returning null.
	 */
	async fetchOrThrow(): Promise<Row> {
		const row = await this.fetch();
		if (row === null) {
			throw new NotFoundError(this.table);
		}
		return row;
	}

	/**
	 * Advance one row on the open cursor, executing first if needed.
	 * Returns null once the results are exhausted and releases the cursor.
	 *
	 * Throws StateError after closeCursor() abandoned an open cursor.
	 */
	async fetchNext(): Promise<Row | null> {
		if (this.#state === "closed") {
			throw new StateError(
				`fetchNext() called on ${this.table} after its cursor was closed`,
				this.#state,
			);
		}
		if (this.#state === "exhausted") {
			return null;
		}

		const cursor = this.#cursor ?? (await this.execute());
		let row: Row | null;
		try {
			row = await cursor.fetchOne();
		} catch (error) {
			await this.#release("built");
			throw error;
		}

		if (row === null) {
			await this.#release("exhausted");
		}
		return row;
	}

	/**
	 * Every remaining row of the query, in order. Executes first unless a
	 * cursor is already open; closes the cursor afterwards.
	 */
	async all(): Promise<Row[]> {
		const cursor = this.#cursor ?? (await this.execute());
		try {
			return await cursor.fetchAll();
		} finally {
			await this.#release("built");
		}
	}

	/**
	 * Iterate the query's rows. Each iteration executes the query afresh;
	 * leaving the loop early closes the cursor.
	 *
	 * @example
	 * for await (const row of db.builder("users").where("id", 10, {compare: ">="})) {
	 *   console.log(row.username);
	 * }
	 */
	async *[Symbol.asyncIterator](): AsyncGenerator<Row, void, undefined> {
		const cursor = await this.execute();
		try {
			for (;;) {
				const row = await cursor.fetchOne();
				if (row === null) return;
				yield row;
			}
		} finally {
			if (this.#cursor === cursor) {
				await this.#release("built");
			}
		}
	}

	/**
	 * Release the open cursor, if any. Safe to call any number of times.
	 */
	async closeCursor(): Promise<void> {
		if (this.#cursor === null) {
			return;
		}
		await this.#release("closed");
	}

	// ==========================================================================
	// Internals
	// ==========================================================================

	async #release(next: BuilderState): Promise<void> {
		const cursor = this.#cursor;
		this.#cursor = null;
		this.#state = next;
		if (cursor !== null) {
			await cursor.close();
		}
	}

	#setOrder(operation: string, args: OrderArgs): this {
		this.#mutate(operation);
		const {columns, options} = splitOrderArgs(args);
		const direction = options.direction ?? "DESC";
		if (direction !== "ASC" && direction !== "DESC") {
			throw new TypeError(`Invalid sort direction: ${String(direction)}`);
		}
		this.#orderColumns = columns.map((column) => ({column, direction}));
		return this;
	}

	#mutate(operation: string): void {
		if (this.#state === "executed") {
			throw new StateError(
				`Cannot call ${operation}() on ${this.table} while its cursor is open; call closeCursor() first`,
				this.#state,
			);
		}
		this.#state = "accumulating";
	}

	#addCondition(
		conjunction: Conjunction,
		column: string,
		value: SQLValue | undefined,
		options: WhereOptions = {},
	): this {
		this.#mutate(conjunction === "AND" ? "where" : "whereOr");

		let compare = options.compare ?? "=";
		const template = options.placeholder ?? "?";
		if (value === null || value === undefined) {
			if (compare === "=") compare = "IS";
			else if (compare === "!=" || compare === "<>") compare = "IS NOT";
		} else if (template.split("?").length !== 2) {
			throw new TypeError(
				`Placeholder template must contain exactly one "?": ${template}`,
			);
		}

		this.#conditions.push({
			conjunction,
			column,
			compare,
			value: value ?? null,
			template,
		});
		return this;
	}
}

// ============================================================================
// Helpers
// ============================================================================

function splitOrderArgs(
	args: readonly (string | OrderOptions)[],
): {columns: string[]; options: OrderOptions} {
	const columns: string[] = [];
	let options: OrderOptions = {};
	for (const arg of args) {
		if (typeof arg === "string") {
			columns.push(arg);
		} else {
			options = arg;
		}
	}
	return {columns, options};
}

function assertCount(name: string, value: number): void {
	if (!Number.isInteger(value) || value < 0) {
		throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
	}
}
