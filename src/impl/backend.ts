/**
 * Backend interface - what a wrapper needs from a database driver.
 *
 * Each backend owns exactly one connection handle for its lifetime.
 * Implementations: SQLiteBackend (better-sqlite3), PostgresBackend
 * (postgres.js).
 */

import type {Cursor} from "./cursor.js";
import type {PlaceholderStyle, SQLDialect, SQLValue} from "./sql.js";

export interface Statement {
	sql: string;
	params: SQLValue[];
}

export interface CursorOptions {
	/**
	 * Fetch rows from the server incrementally instead of materializing
	 * the result. Only honored when supportsStreaming is true.
	 */
	stream?: boolean;
	/** Rows per round trip in streaming mode */
	batchSize?: number;
}

export interface Backend {
	// ==========================================================================
	// Capabilities
	// ==========================================================================

	readonly dialect: SQLDialect;

	/** Placeholder syntax expected by the driver */
	readonly placeholder: PlaceholderStyle;

	/** Whether cursor({stream: true}) fetches incrementally */
	readonly supportsStreaming: boolean;

	/** Whether a transaction is currently open on the connection */
	readonly inTransaction: boolean;

	/** Whether statements run outside an explicit transaction commit at once */
	readonly autoCommit: boolean;

	// ==========================================================================
	// Connection management
	// ==========================================================================

	/**
	 * Open the connection if it is not open yet.
	 * Throws ConnectionError when the database cannot be reached.
	 */
	connect(): Promise<void>;

	/**
	 * Create a cursor on the connection, connecting first if needed.
	 */
	cursor(options?: CursorOptions): Promise<Cursor>;

	/**
	 * Close the connection. Later calls are no-ops.
	 */
	close(): Promise<void>;

	// ==========================================================================
	// Transactions
	// ==========================================================================

	begin(): Promise<void>;
	commit(): Promise<void>;
	rollback(): Promise<void>;

	// ==========================================================================
	// Metadata queries
	// ==========================================================================

	/**
	 * Statement returning one row with an integer `table_count` column.
	 */
	tableExistsStatement(table: string): Statement;

	/**
	 * Statement returning one row per table with a `name` column.
	 */
	tableListStatement(): Statement;

	/**
	 * Statement returning one row whose `last_id` column is the most recent
	 * key generated for `pk` in `table`.
	 */
	lastInsertIdStatement(table: string, pk: string): Statement;
}
