/**
 * postgres.js backend
 *
 * The wrapper's session is one connection reserved from the postgres.js
 * pool on first use and released on close(). Statements, transactions and
 * streaming cursors all run on that connection.
 *
 * Requires: postgres
 */

import postgres from "postgres";

import type {Backend, CursorOptions, Statement} from "./impl/backend.js";
import {
	BatchedCursor,
	BufferedCursor,
	type Cursor,
	type StatementResult,
} from "./impl/cursor.js";
import {
	ConnectionError,
	ConstraintViolationError,
	type ConstraintKind,
	type DatabaseError,
	errorMessage,
	errorProperty,
	isDatabaseError,
	QueryError,
	StateError,
	TransactionError,
} from "./impl/errors.js";
import type {Logger} from "./impl/logger.js";
import {getDefaultLogger} from "./impl/logger.js";
import {rowFromRecord, type Row} from "./impl/row.js";
import {placeholderStyle, quoteIdent, type SQLValue} from "./impl/sql.js";
import {Wrapper} from "./impl/wrapper.js";
import {
	initializeWrapper,
	parsePostgresConfig,
	type OpenOptions,
	type PostgresConfig,
	type PostgresOptions,
} from "./impl/config.js";

const DIALECT = "postgresql" as const;

const DEFAULT_BATCH_SIZE = 100;

const TABLE_EXISTS_QUERY =
	"SELECT count(*)::int AS table_count FROM information_schema.tables WHERE table_schema = $1 AND table_name = $2";
const TABLE_LIST_QUERY =
	"SELECT table_name AS name FROM information_schema.tables WHERE table_schema = $1 AND table_type = 'BASE TABLE'";

export type PostgresBackendConfig = Omit<
	PostgresConfig,
	"backend" | "schemas" | "autoCreateSchema" | "enableExecutionLog"
>;

/**
 * The part of a reserved postgres.js connection the backend uses.
 */
export interface Session {
	unsafe(query: string, parameters?: SQLValue[]): SessionQuery;
	release(): void;
}

export interface SessionQuery extends PromiseLike<SessionResult> {
	cursor(rows: number): AsyncIterable<Record<string, unknown>[]>;
}

/** Result rows plus the count from the command tag (null for DDL) */
export type SessionResult = readonly Record<string, unknown>[] & {
	readonly count: number | null;
};

// ============================================================================
// Errors
// ============================================================================

const CONSTRAINT_KINDS: Record<string, ConstraintKind> = {
	"23505": "unique",
	"23503": "foreign_key",
	"23514": "check",
	"23502": "not_null",
};

/** Socket errors and postgres.js connection errors */
const CONNECTION_CODES = new Set([
	"ECONNREFUSED",
	"ECONNRESET",
	"ENOTFOUND",
	"ETIMEDOUT",
	"EHOSTUNREACH",
	"CONNECT_TIMEOUT",
	"CONNECTION_CLOSED",
	"CONNECTION_ENDED",
	"CONNECTION_DESTROYED",
	// invalid_authorization_specification, invalid_password
	"28000",
	"28P01",
	// invalid_catalog_name (no such database)
	"3D000",
]);

/**
 * Wrap a postgres.js error in the matching DatabaseError.
 *
 * @example
 * // PostgresError {code: "23505", constraint_name: "users_email_key"}
 * // -> ConstraintViolationError {kind: "unique", constraint: "users_email_key"}
 */
export function toDatabaseError(error: unknown, sql?: string): DatabaseError {
	if (isDatabaseError(error)) {
		return error;
	}

	const code = errorProperty(error, "code");
	const message = errorMessage(error);

	// Class 23: integrity constraint violation
	if (code?.startsWith("23")) {
		return new ConstraintViolationError(
			message,
			{
				kind: CONSTRAINT_KINDS[code] ?? "unknown",
				sql,
				constraint: errorProperty(error, "constraint_name"),
				table: errorProperty(error, "table_name"),
				column: errorProperty(error, "column_name"),
			},
			{cause: error},
		);
	}

	// Class 08: connection exception
	if (code !== undefined && (code.startsWith("08") || CONNECTION_CODES.has(code))) {
		return new ConnectionError(message, {cause: error});
	}

	return new QueryError(message, sql, {cause: error});
}

// ============================================================================
// Cursors
// ============================================================================

/**
 * Runs the statement and materializes its rows.
 */
export class PostgresCursor extends BufferedCursor {
	#session: Session;

	constructor(session: Session) {
		super();
		this.#session = session;
	}

	protected async run(
		sql: string,
		params: readonly SQLValue[],
	): Promise<StatementResult> {
		try {
			const result = await this.#session.unsafe(sql, [...params]);
			const rows: Row[] = result.map(rowFromRecord);
			return {rows, rowCount: result.count ?? 0};
		} catch (error) {
			throw toDatabaseError(error, sql);
		}
	}
}

/**
 * Fetches `batchSize` rows at a time through a server-side portal.
 * The session is held until the cursor is exhausted or closed.
 */
export class PostgresStreamingCursor extends BatchedCursor {
	#session: Session;
	#batchSize: number;
	#onClose: (() => void) | undefined;

	constructor(
		session: Session,
		batchSize: number = DEFAULT_BATCH_SIZE,
		onClose?: () => void,
	) {
		super();
		this.#session = session;
		this.#batchSize = batchSize;
		this.#onClose = onClose;
	}

	async close(): Promise<void> {
		try {
			await super.close();
		} finally {
			this.#onClose?.();
		}
	}

	protected async *open(
		sql: string,
		params: readonly SQLValue[],
	): AsyncGenerator<Row[], void, undefined> {
		try {
			const batches = this.#session.unsafe(sql, [...params]).cursor(this.#batchSize);
			for await (const batch of batches) {
				yield batch.map(rowFromRecord);
			}
		} catch (error) {
			throw toDatabaseError(error, sql);
		}
	}
}

// ============================================================================
// Backend
// ============================================================================

/**
 * PostgreSQL backend using postgres.js.
 *
 * @example
 * import PostgresBackend from "relwrap/postgres";
 * import {Wrapper, parsePostgresConfig} from "relwrap";
 *
 * const backend = new PostgresBackend(
 *   parsePostgresConfig({url: "postgresql://localhost/inventory"}),
 * );
 * const db = new Wrapper(backend);
 * await db.connect();
 */
export default class PostgresBackend implements Backend {
	readonly dialect = DIALECT;
	readonly placeholder = placeholderStyle(DIALECT);
	readonly supportsStreaming = true;
	readonly config: PostgresBackendConfig;

	#sql: postgres.Sql | null = null;
	#session: Session | null = null;
	/** The streaming cursor holding the session, until it is closed */
	#streamingCursor: PostgresStreamingCursor | null = null;
	#inTransaction = false;
	#logger: Logger;

	constructor(config: PostgresBackendConfig, logger: Logger = getDefaultLogger()) {
		this.config = config;
		this.#logger = logger.child({component: "postgres"});
	}

	get autoCommit(): boolean {
		return this.config.autoCommit;
	}

	get inTransaction(): boolean {
		return this.#inTransaction;
	}

	// ==========================================================================
	// Connection management
	// ==========================================================================

	async connect(): Promise<void> {
		await this.#connection();
	}

	/**
	 * Throws StateError while a streaming cursor is open: its statement
	 * holds the session, so anything else would wait for it forever.
	 */
	async cursor(options: CursorOptions = {}): Promise<Cursor> {
		this.#assertIdle("run a statement");
		const session = await this.#connection();
		if (!this.config.autoCommit && !this.#inTransaction) {
			await this.#begin(session);
		}
		if (!options.stream) {
			return new PostgresCursor(session);
		}

		const cursor: PostgresStreamingCursor = new PostgresStreamingCursor(
			session,
			options.batchSize,
			() => {
				if (this.#streamingCursor === cursor) {
					this.#streamingCursor = null;
				}
			},
		);
		this.#streamingCursor = cursor;
		return cursor;
	}

	async close(): Promise<void> {
		const sql = this.#sql;
		const session = this.#session;
		this.#sql = null;
		this.#session = null;
		this.#streamingCursor = null;
		this.#inTransaction = false;

		session?.release();
		if (sql !== null) {
			await sql.end();
			this.#logger.debug("Closed connection", {database: this.#describe()});
		}
	}

	/**
	 * postgres.js options for the configured connection. With a url, the
	 * host, port, database and credentials come from the url instead.
	 */
	clientOptions(): postgres.Options<{}> {
		const {config} = this;
		const options: postgres.Options<{}> = {
			max: config.max,
			idle_timeout: config.idleTimeout > 0 ? config.idleTimeout : undefined,
			connect_timeout: config.connectTimeout,
			connection: {TimeZone: config.timezone},
			onnotice: (notice) => {
				this.#logger.debug("Server notice", {message: notice.message});
			},
		};
		if (config.url) {
			return options;
		}
		return {
			...options,
			host: config.host,
			port: config.port,
			database: config.database,
			username: config.user,
			password: config.password,
		};
	}

	/**
	 * Create the postgres.js client and reserve the session's connection.
	 */
	protected async reserve(): Promise<Session> {
		const options = this.clientOptions();
		const sql = this.config.url ? postgres(this.config.url, options) : postgres(options);
		try {
			const session = await sql.reserve();
			this.#sql = sql;
			return session;
		} catch (error) {
			await sql.end({timeout: 0});
			throw error;
		}
	}

	async #connection(): Promise<Session> {
		if (this.#session !== null) {
			return this.#session;
		}

		let session: Session;
		try {
			session = await this.reserve();
		} catch (error) {
			const mapped = toDatabaseError(error);
			throw mapped instanceof ConnectionError
				? mapped
				: new ConnectionError(mapped.message, {cause: error});
		}
		this.#session = session;
		this.#logger.debug("Opened connection", {database: this.#describe()});
		return session;
	}

	#assertIdle(operation: string): void {
		if (this.#streamingCursor !== null) {
			throw new StateError(
				`Cannot ${operation} while a streaming cursor holds the connection; close it first`,
				"streaming",
			);
		}
	}

	#describe(): string {
		if (this.config.url) {
			return new URL(this.config.url).pathname.slice(1);
		}
		return `${this.config.host}:${this.config.port}/${this.config.database ?? ""}`;
	}

	// ==========================================================================
	// Transactions
	// ==========================================================================

	async begin(): Promise<void> {
		this.#assertIdle("begin a transaction");
		if (this.#inTransaction) {
			throw new TransactionError("A transaction is already open on this connection");
		}
		await this.#begin(await this.#connection());
	}

	async commit(): Promise<void> {
		await this.#end("COMMIT");
	}

	async rollback(): Promise<void> {
		await this.#end("ROLLBACK");
	}

	async #begin(session: Session): Promise<void> {
		const level = this.config.isolationLevel;
		const statement = level ? `BEGIN ISOLATION LEVEL ${level}` : "BEGIN";
		try {
			await session.unsafe(statement);
		} catch (error) {
			throw toDatabaseError(error, statement);
		}
		this.#inTransaction = true;
	}

	/**
	 * COMMIT or ROLLBACK the open transaction; no-op when none is open.
	 */
	async #end(statement: "COMMIT" | "ROLLBACK"): Promise<void> {
		const session = this.#session;
		if (session === null || !this.#inTransaction) {
			return;
		}
		this.#assertIdle(statement);
		this.#inTransaction = false;
		try {
			await session.unsafe(statement);
		} catch (error) {
			throw toDatabaseError(error, statement);
		}
	}

	// ==========================================================================
	// Metadata queries
	// ==========================================================================

	tableExistsStatement(table: string): Statement {
		return {
			sql: this.config.tableQuery ?? TABLE_EXISTS_QUERY,
			params: [this.config.schema, table],
		};
	}

	tableListStatement(): Statement {
		return {
			sql: this.config.tableListQuery ?? TABLE_LIST_QUERY,
			params: [this.config.schema],
		};
	}

	/**
	 * Reads the `<table>_<pk>_seq` sequence a SERIAL key creates.
	 */
	lastInsertIdStatement(table: string, pk: string): Statement {
		const sequence = quoteIdent(`${table}_${pk}_seq`, DIALECT);
		return {
			sql: `SELECT last_value AS last_id FROM ${quoteIdent(this.config.schema, DIALECT)}.${sequence}`,
			params: [],
		};
	}
}

// ============================================================================
// Factories
// ============================================================================

/**
 * Open a wrapper over a validated PostgreSQL configuration.
 */
export async function openPostgresWrapper(
	config: PostgresConfig,
	options: OpenOptions = {},
): Promise<Wrapper<PostgresBackend>> {
	const logger = options.logger ?? getDefaultLogger();
	const wrapper = new Wrapper(new PostgresBackend(config, logger), {
		schemas: config.schemas,
		enableExecutionLog: config.enableExecutionLog,
		logger,
	});
	return initializeWrapper(wrapper, config);
}

/**
 * Open a PostgreSQL wrapper, creating declared tables that don't exist yet.
 *
 * @example
 * const db = await openPostgres({
 *   host: "localhost",
 *   database: "inventory",
 *   user: "app",
 *   password: "test-secret",
 *   schemas: [["items", "CREATE TABLE items (id SERIAL PRIMARY KEY, name TEXT)"]],
 * });
 */
export async function openPostgres(
	options: PostgresOptions = {},
	openOptions: OpenOptions = {},
): Promise<Wrapper<PostgresBackend>> {
	return openPostgresWrapper(parsePostgresConfig(options), openOptions);
}
