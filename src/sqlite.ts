/**
 * better-sqlite3 backend
 *
 * One better-sqlite3 handle per wrapper, opened on first use and kept
 * until close(). memoryPersist backends on the same path share a handle.
 *
 * Requires: better-sqlite3
 */

import {mkdirSync} from "node:fs";
import {dirname, isAbsolute, resolve} from "node:path";
import Database from "better-sqlite3";

import type {Backend, CursorOptions, Statement} from "./impl/backend.js";
import {BufferedCursor, type StatementResult} from "./impl/cursor.js";
import {
	ConnectionError,
	ConstraintViolationError,
	type ConstraintKind,
	type DatabaseError,
	errorMessage,
	errorProperty,
	isDatabaseError,
	QueryError,
	TransactionError,
} from "./impl/errors.js";
import type {Logger} from "./impl/logger.js";
import {getDefaultLogger} from "./impl/logger.js";
import {createRow, type Row} from "./impl/row.js";
import {placeholderStyle, type SQLValue} from "./impl/sql.js";
import {Wrapper} from "./impl/wrapper.js";
import {
	initializeWrapper,
	parseSQLiteConfig,
	type OpenOptions,
	type SQLiteConfig,
	type SQLiteOptions,
} from "./impl/config.js";

const DIALECT = "sqlite" as const;

const TABLE_EXISTS_QUERY =
	"SELECT count(name) AS table_count FROM sqlite_master WHERE type = 'table' AND name = ?";
const TABLE_LIST_QUERY = "SELECT name FROM sqlite_master WHERE type = 'table'";

export type SQLiteBackendConfig = Omit<
	SQLiteConfig,
	"backend" | "schemas" | "autoCreateSchema" | "enableExecutionLog"
>;

// ============================================================================
// Values and errors
// ============================================================================

type SQLiteParam = string | number | bigint | Buffer | null;

/**
 * Convert a bound value to one better-sqlite3 accepts.
 * Booleans become 1/0, dates ISO-8601 text.
 */
export function toSQLiteParam(value: SQLValue): SQLiteParam {
	if (typeof value === "boolean") {
		return value ? 1 : 0;
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (value instanceof Uint8Array) {
		return Buffer.isBuffer(value)
			? value
			: Buffer.from(value.buffer, value.byteOffset, value.byteLength);
	}
	return value;
}

const CONSTRAINT_KINDS: Record<string, ConstraintKind> = {
	SQLITE_CONSTRAINT_UNIQUE: "unique",
	SQLITE_CONSTRAINT_PRIMARYKEY: "primary_key",
	SQLITE_CONSTRAINT_FOREIGNKEY: "foreign_key",
	SQLITE_CONSTRAINT_CHECK: "check",
	SQLITE_CONSTRAINT_NOTNULL: "not_null",
};

const CONNECTION_CODES = new Set([
	"SQLITE_CANTOPEN",
	"SQLITE_NOTADB",
	"SQLITE_CORRUPT",
	"SQLITE_PERM",
	"SQLITE_AUTH",
]);

/**
 * Wrap a better-sqlite3 error in the matching DatabaseError.
 *
 * @example
 * // SqliteError {code: "SQLITE_CONSTRAINT_UNIQUE",
 * //   message: "UNIQUE constraint failed: users.email"}
 * // -> ConstraintViolationError {kind: "unique", table: "users", column: "email"}
 */
export function toDatabaseError(error: unknown, sql?: string): DatabaseError {
	if (isDatabaseError(error)) {
		return error;
	}

	const code = errorProperty(error, "code");
	const message = errorMessage(error);

	if (code?.startsWith("SQLITE_CONSTRAINT")) {
		// "UNIQUE constraint failed: users.email"
		const match = message.match(/constraint failed: (\w+)\.(\w+)/i);
		const table = match?.[1];
		const column = match?.[2];

		let kind = CONSTRAINT_KINDS[code] ?? "unknown";
		if (kind === "unknown") {
			if (message.includes("UNIQUE")) kind = "unique";
			else if (message.includes("FOREIGN KEY")) kind = "foreign_key";
			else if (message.includes("NOT NULL")) kind = "not_null";
			else if (message.includes("CHECK")) kind = "check";
		}

		return new ConstraintViolationError(
			message,
			{
				kind,
				sql,
				constraint: table && column ? `${table}.${column}` : undefined,
				table,
				column,
			},
			{cause: error},
		);
	}

	if (code !== undefined && CONNECTION_CODES.has(code)) {
		return new ConnectionError(message, {cause: error});
	}

	return new QueryError(message, sql, {cause: error});
}

// ============================================================================
// Shared in-memory databases
// ============================================================================

interface SharedDatabase {
	db: Database.Database;
	/** Backends currently holding the handle */
	refs: number;
}

/**
 * In-memory databases opened by memoryPersist backends, by path. Every
 * backend on a path uses the same handle; the last close() frees it.
 */
const sharedDatabases = new Map<string, SharedDatabase>();

/**
 * Paths with a shared in-memory database open in this process.
 */
export function sharedMemoryPaths(): string[] {
	return [...sharedDatabases.keys()];
}

// ============================================================================
// Cursor
// ============================================================================

/**
 * Runs one statement at a time and materializes its rows.
 *
 * better-sqlite3 keeps the connection busy while a statement iterator is
 * open, so rows are read when the statement runs.
 */
export class SQLiteCursor extends BufferedCursor {
	#db: Database.Database;

	constructor(db: Database.Database) {
		super();
		this.#db = db;
	}

	protected async run(
		sql: string,
		params: readonly SQLValue[],
	): Promise<StatementResult> {
		try {
			const stmt = this.#db.prepare<SQLiteParam[], unknown[]>(sql);
			const bound = params.map(toSQLiteParam);
			if (stmt.reader) {
				// Raw value arrays, zipped with the column names by position
				const columns = stmt.columns().map((column) => column.name);
				const rows: Row[] = stmt
					.raw(true)
					.all(...bound)
					.map((values) => createRow(columns, values));
				return {rows, rowCount: rows.length};
			}
			const info = stmt.run(...bound);
			return {rows: [], rowCount: info.changes, lastInsertId: info.lastInsertRowid};
		} catch (error) {
			throw toDatabaseError(error, sql);
		}
	}
}

// ============================================================================
// Backend
// ============================================================================

/**
 * SQLite backend using better-sqlite3.
 *
 * @example
 * import SQLiteBackend from "relwrap/sqlite";
 * import {Wrapper} from "relwrap";
 *
 * const backend = new SQLiteBackend(parseSQLiteConfig({path: "app.db"}));
 * const db = new Wrapper(backend);
 * await db.connect();
 */
export default class SQLiteBackend implements Backend {
	readonly dialect = DIALECT;
	readonly placeholder = placeholderStyle(DIALECT);
	readonly supportsStreaming = false;
	readonly config: SQLiteBackendConfig;

	#db: Database.Database | null = null;
	#logger: Logger;

	constructor(config: SQLiteBackendConfig, logger: Logger = getDefaultLogger()) {
		this.config = config;
		this.#logger = logger.child({component: "sqlite"});
	}

	get autoCommit(): boolean {
		return this.config.autoCommit;
	}

	get inTransaction(): boolean {
		return this.#db?.inTransaction ?? false;
	}

	/**
	 * The file better-sqlite3 opens, or ":memory:".
	 */
	get filename(): string {
		const {path, folder} = this.config;
		if (path === ":memory:" || isAbsolute(path)) {
			return path;
		}
		return resolve(folder ?? process.cwd(), path);
	}

	// ==========================================================================
	// Connection management
	// ==========================================================================

	async connect(): Promise<void> {
		this.#connection();
	}

	async cursor(options: CursorOptions = {}): Promise<SQLiteCursor> {
		const db = this.#connection();
		if (options.stream) {
			this.#logger.debug("Streaming requested; SQLite results are buffered");
		}
		if (!this.config.autoCommit && !db.inTransaction) {
			this.#begin(db);
		}
		return new SQLiteCursor(db);
	}

	async close(): Promise<void> {
		const db = this.#db;
		if (db === null) {
			return;
		}
		this.#db = null;

		const shared = this.config.memoryPersist
			? sharedDatabases.get(this.config.path)
			: undefined;
		if (shared !== undefined && shared.db === db) {
			shared.refs--;
			if (shared.refs > 0) {
				this.#logger.debug("Released shared database", {
					filename: this.#describe(),
					refs: shared.refs,
				});
				return;
			}
			sharedDatabases.delete(this.config.path);
		}
		db.close();
		this.#logger.debug("Closed database", {filename: this.#describe()});
	}

	#connection(): Database.Database {
		if (this.#db !== null) {
			return this.#db;
		}

		const {memoryPersist, path, readonly, timeout} = this.config;
		if (memoryPersist) {
			const shared = sharedDatabases.get(path);
			if (shared !== undefined) {
				shared.refs++;
				this.#db = shared.db;
				this.#logger.debug("Joined shared database", {
					filename: this.#describe(),
					refs: shared.refs,
				});
				return shared.db;
			}
		}

		let db: Database.Database;
		try {
			if (memoryPersist) {
				db = new Database(":memory:", {timeout});
			} else {
				const filename = this.filename;
				if (filename !== ":memory:" && !readonly) {
					mkdirSync(dirname(filename), {recursive: true});
				}
				db = new Database(filename, {
					readonly,
					fileMustExist: readonly,
					timeout,
				});
			}
		} catch (error) {
			throw new ConnectionError(
				`Cannot open SQLite database ${this.#describe()}: ${errorMessage(error)}`,
				{cause: error},
			);
		}

		if (!readonly) {
			db.pragma("foreign_keys = ON");
			if (!memoryPersist && db.name !== ":memory:") {
				db.pragma("journal_mode = WAL");
			}
		}

		if (memoryPersist) {
			sharedDatabases.set(path, {db, refs: 1});
		}
		this.#db = db;
		this.#logger.debug("Opened database", {filename: this.#describe()});
		return db;
	}

	#describe(): string {
		return this.config.memoryPersist
			? `${this.config.path} (shared memory)`
			: this.filename;
	}

	// ==========================================================================
	// Transactions
	// ==========================================================================

	async begin(): Promise<void> {
		const db = this.#connection();
		if (db.inTransaction) {
			throw new TransactionError("A transaction is already open on this connection");
		}
		this.#begin(db);
	}

	async commit(): Promise<void> {
		this.#end("COMMIT");
	}

	async rollback(): Promise<void> {
		this.#end("ROLLBACK");
	}

	#begin(db: Database.Database): void {
		const level = this.config.isolationLevel;
		db.exec(level ? `BEGIN ${level}` : "BEGIN");
	}

	/**
	 * COMMIT or ROLLBACK the open transaction; no-op when none is open.
	 */
	#end(statement: "COMMIT" | "ROLLBACK"): void {
		const db = this.#db;
		if (db === null || !db.inTransaction) {
			return;
		}
		try {
			db.exec(statement);
		} catch (error) {
			throw toDatabaseError(error, statement);
		}
	}

	// ==========================================================================
	// Metadata queries
	// ==========================================================================

	tableExistsStatement(table: string): Statement {
		return {sql: this.config.tableQuery ?? TABLE_EXISTS_QUERY, params: [table]};
	}

	tableListStatement(): Statement {
		return {sql: this.config.tableListQuery ?? TABLE_LIST_QUERY, params: []};
	}

	/**
	 * The connection's last inserted rowid; `table` and `pk` are not needed.
	 */
	lastInsertIdStatement(_table: string, _pk: string): Statement {
		return {sql: "SELECT last_insert_rowid() AS last_id", params: []};
	}
}

// ============================================================================
// Factories
// ============================================================================

/**
 * Open a wrapper over a validated SQLite configuration.
 */
export async function openSQLiteWrapper(
	config: SQLiteConfig,
	options: OpenOptions = {},
): Promise<Wrapper<SQLiteBackend>> {
	const logger = options.logger ?? getDefaultLogger();
	const wrapper = new Wrapper(new SQLiteBackend(config, logger), {
		schemas: config.schemas,
		enableExecutionLog: config.enableExecutionLog,
		logger,
	});
	return initializeWrapper(wrapper, config);
}

/**
 * Open a SQLite wrapper, creating declared tables that don't exist yet.
 *
 * @example
 * const db = await openSQLite({
 *   path: "inventory.db",
 *   folder: "./data",
 *   schemas: [["items", "CREATE TABLE items (id INTEGER PRIMARY KEY, name TEXT)"]],
 * });
 */
export async function openSQLite(
	options: SQLiteOptions = {},
	openOptions: OpenOptions = {},
): Promise<Wrapper<SQLiteBackend>> {
	return openSQLiteWrapper(parseSQLiteConfig(options), openOptions);
}
