/**
 * Wrapper - the main API over one backend connection.
 *
 * Runs raw statements (query, action, fetchone, fetchall), manages the
 * declared table schemas, and hands out query builders bound to the same
 * connection.
 */

import type {Backend} from "./backend.js";
import type {Cursor} from "./cursor.js";
import type {Row} from "./row.js";
import type {Logger} from "./logger.js";
import {getDefaultLogger} from "./logger.js";
import {QueryBuilder, type QueryBuilderOptions} from "./builder.js";
import {QueryError, SchemaError, TransactionError} from "./errors.js";
import {quoteIdent, renderInsert, type SQLValue} from "./sql.js";

// ============================================================================
// Types
// ============================================================================

/**
 * A table name and the statement that creates it.
 *
 * @example
 * ["users", "CREATE TABLE users (id INTEGER PRIMARY KEY, name TEXT)"]
 */
export type SchemaDefinition = readonly [table: string, statement: string];

export interface WrapperOptions {
	/** Tables managed by createSchemas()/dropSchemas(), in creation order */
	schemas?: readonly SchemaDefinition[];
	/** Record every statement in executionLog (default true) */
	enableExecutionLog?: boolean;
	logger?: Logger;
}

export interface ExecutionRecord {
	sql: string;
	params: SQLValue[];
	/** Affected rows for writes, returned rows for queries */
	rowCount: number;
}

export interface CreateSchemasResult {
	created: string[];
	skipped: string[];
}

export interface DropSchemasResult {
	dropped: string[];
	skipped: string[];
}

// ============================================================================
// Wrapper
// ============================================================================

/**
 * @example
 * const db = await openSQLite({
 *   path: "app.db",
 *   schemas: [["items", "CREATE TABLE items (id INTEGER PRIMARY KEY, name TEXT)"]],
 * });
 *
 * await db.action("INSERT INTO items (name) VALUES (?)", ["Orange"]);
 * const item = await db.builder("items").where("name", "Orange").fetch();
 */
export class Wrapper<TBackend extends Backend = Backend> {
	readonly backend: TBackend;
	readonly schemas: readonly SchemaDefinition[];
	enableExecutionLog: boolean;

	#logger: Logger;
	#executionLog: ExecutionRecord[] = [];

	constructor(backend: TBackend, options: WrapperOptions = {}) {
		this.backend = backend;
		this.schemas = options.schemas ?? [];
		this.enableExecutionLog = options.enableExecutionLog ?? true;
		this.#logger = (options.logger ?? getDefaultLogger()).child({
			component: "wrapper",
		});
	}

	get logger(): Logger {
		return this.#logger;
	}

	/**
	 * Statements run through query()/action()/fetchone()/fetchall(),
	 * oldest first. Empty while enableExecutionLog is false.
	 */
	get executionLog(): readonly ExecutionRecord[] {
		return this.#executionLog;
	}

	clearExecutionLog(): void {
		this.#executionLog = [];
	}

	// ==========================================================================
	// Connection management
	// ==========================================================================

	/**
	 * Open the connection now instead of on first use.
	 */
	async connect(): Promise<this> {
		await this.backend.connect();
		return this;
	}

	/**
	 * Close the connection. Later calls are no-ops.
	 */
	async close(): Promise<void> {
		await this.backend.close();
	}

	// ==========================================================================
	// Statements
	// ==========================================================================

	/**
	 * Execute a statement and return its open cursor.
	 * The caller owns the cursor and must close it.
	 *
	 * @example
	 * const cursor = await db.query("SELECT * FROM users WHERE first_name = ?", ["John"]);
	 * try {
	 *   const first = await cursor.fetchOne();
	 * } finally {
	 *   await cursor.close();
	 * }
	 */
	async query(sql: string, params: readonly SQLValue[] = []): Promise<Cursor> {
		const cursor = await this.backend.cursor();
		try {
			await cursor.execute(sql, params);
		} catch (error) {
			await cursor.close();
			throw error;
		}
		this.#record(sql, params, cursor.rowCount);
		return cursor;
	}

	/**
	 * Execute a statement that returns no rows (INSERT, UPDATE, DDL) and
	 * return the number of affected rows.
	 */
	async action(sql: string, params: readonly SQLValue[] = []): Promise<number> {
		const cursor = await this.query(sql, params);
		try {
			return cursor.rowCount;
		} finally {
			await cursor.close();
		}
	}

	/**
	 * The first row a statement returns, or null.
	 */
	async fetchone(sql: string, params: readonly SQLValue[] = []): Promise<Row | null> {
		const cursor = await this.query(sql, params);
		try {
			return await cursor.fetchOne();
		} finally {
			await cursor.close();
		}
	}

	/**
	 * Every row a statement returns.
	 */
	async fetchall(sql: string, params: readonly SQLValue[] = []): Promise<Row[]> {
		const cursor = await this.query(sql, params);
		try {
			return await cursor.fetchAll();
		} finally {
			await cursor.close();
		}
	}

	/**
	 * Insert one row and return it as stored (defaults and generated keys
	 * included). Column names are quoted; values are bound.
	 *
	 * @example
	 * const user = await db.insert("users", {first_name: "Dave", last_name: "Johnson"});
	 * user.id; // 1
	 */
	async insert(table: string, fields: Record<string, SQLValue>): Promise<Row> {
		const {sql, params} = renderInsert(table, fields, this.backend.dialect);
		const row = await this.fetchone(sql, params);
		if (row === null) {
			throw new QueryError(`INSERT into ${table} returned no row`, sql);
		}
		return row;
	}

	/**
	 * The most recent key generated for `pk` in `table`, or null when the
	 * database reports none. SQLite answers with the connection's last
	 * inserted rowid; PostgreSQL reads `<table>_<pk>_seq`.
	 *
	 * @example
	 * await db.action("INSERT INTO users (first_name) VALUES ($1)", ["John"]);
	 * const id = await db.lastInsertId("users");
	 */
	async lastInsertId(table: string, pk: string = "id"): Promise<number | null> {
		const {sql, params} = this.backend.lastInsertIdStatement(table, pk);
		const row = await this.fetchone(sql, params);
		if (row === null || row.last_id === null || row.last_id === undefined) {
			return null;
		}
		return Number(row.last_id);
	}

	/**
	 * A query builder for `table` on this wrapper's connection.
	 */
	builder(table: string, options: QueryBuilderOptions = {}): QueryBuilder {
		return new QueryBuilder(table, this.backend, {
			logger: this.#logger,
			...options,
		});
	}

	// ==========================================================================
	// Metadata
	// ==========================================================================

	async tableExists(table: string): Promise<boolean> {
		const {sql, params} = this.backend.tableExistsStatement(table);
		const row = await this.fetchone(sql, params);
		return row !== null && Number(row.table_count) > 0;
	}

	async listTables(): Promise<string[]> {
		const {sql, params} = this.backend.tableListStatement();
		const rows = await this.fetchall(sql, params);
		return rows.map((row) => String(row.name));
	}

	// ==========================================================================
	// Schema management
	// ==========================================================================

	/**
	 * Create the declared tables that don't exist yet.
	 * With table names, only those tables are considered.
	 */
	async createSchemas(...tables: string[]): Promise<CreateSchemasResult> {
		const result: CreateSchemasResult = {created: [], skipped: []};
		for (const [table, statement] of this.schemas) {
			if (tables.length > 0 && !tables.includes(table)) {
				continue;
			}
			if (await this.createSchema(table, statement)) {
				result.created.push(table);
			} else {
				result.skipped.push(table);
			}
		}
		this.#logger.debug("Created schemas", {...result});
		return result;
	}

	/**
	 * Create one table unless it exists. Returns true when it was created.
	 * Without a statement, the declared schema for `table` is used.
	 */
	async createSchema(table: string, statement?: string): Promise<boolean> {
		const sql = statement ?? this.schemas.find(([name]) => name === table)?.[1];
		if (sql === undefined) {
			throw new SchemaError(
				`Cannot create table ${table}: it has no declared schema and no statement was given`,
				table,
			);
		}

		if (await this.tableExists(table)) {
			this.#logger.debug("Table already exists, not creating it", {table});
			return false;
		}
		this.#logger.debug("Table does not exist, creating it", {table});
		await this.action(sql);
		return true;
	}

	/**
	 * Drop the declared tables that exist, in reverse declaration order.
	 * With table names, only those tables are dropped (declared or not).
	 */
	async dropSchemas(...tables: string[]): Promise<DropSchemasResult> {
		const declared = this.schemas.map(([name]) => name).reverse();
		const targets =
			tables.length > 0
				? [
						...declared.filter((name) => tables.includes(name)),
						...tables.filter((name) => !declared.includes(name)),
					]
				: declared;

		const result: DropSchemasResult = {dropped: [], skipped: []};
		for (const table of targets) {
			if (await this.dropTable(table)) {
				result.dropped.push(table);
			} else {
				result.skipped.push(table);
			}
		}
		this.#logger.debug("Dropped schemas", {...result});
		return result;
	}

	/**
	 * Drop then create the declared tables.
	 */
	async recreateSchemas(
		...tables: string[]
	): Promise<{dropped: string[]; created: string[]}> {
		const dropped = await this.dropSchemas(...tables);
		const created = await this.createSchemas(...tables);
		return {dropped: dropped.dropped, created: created.created};
	}

	/**
	 * Drop `table` if it exists. Returns false when there was nothing to drop.
	 */
	async dropTable(table: string): Promise<boolean> {
		if (!(await this.tableExists(table))) {
			return false;
		}
		await this.action(
			`DROP TABLE IF EXISTS ${quoteIdent(table, this.backend.dialect)};`,
		);
		return true;
	}

	async dropTables(...tables: string[]): Promise<[table: string, dropped: boolean][]> {
		const results: [string, boolean][] = [];
		for (const table of tables) {
			results.push([table, await this.dropTable(table)]);
		}
		return results;
	}

	// ==========================================================================
	// Transactions
	// ==========================================================================

	/**
	 * Run `fn` between BEGIN and COMMIT, rolling back if it throws.
	 * Transactions do not nest.
	 */
	async transaction<T>(fn: (db: this) => Promise<T>): Promise<T> {
		if (this.backend.inTransaction) {
			throw new TransactionError("A transaction is already open on this connection");
		}

		await this.backend.begin();
		try {
			const result = await fn(this);
			await this.backend.commit();
			return result;
		} catch (error) {
			await this.backend.rollback();
			throw error;
		}
	}

	/**
	 * Commit the open transaction (with autoCommit disabled, the one
	 * started implicitly by the first statement).
	 */
	async commit(): Promise<void> {
		await this.backend.commit();
	}

	async rollback(): Promise<void> {
		await this.backend.rollback();
	}

	// ==========================================================================
	// Internals
	// ==========================================================================

	#record(sql: string, params: readonly SQLValue[], rowCount: number): void {
		this.#logger.debug("Executed statement", {sql, params, rowCount});
		if (this.enableExecutionLog) {
			this.#executionLog.push({sql, params: [...params], rowCount});
		}
	}
}
