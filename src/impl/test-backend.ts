/**
 * Test backend for running builders and wrappers without a real database.
 *
 * Every statement is recorded and answered by a responder function. Open
 * cursors are counted so tests can check that each one was released.
 */

import type {Backend, CursorOptions, Statement} from "./backend.js";
import {BatchedCursor, BufferedCursor, type Cursor, type StatementResult} from "./cursor.js";
import type {Row} from "./row.js";
import {
	placeholderStyle,
	type PlaceholderStyle,
	type SQLDialect,
	type SQLValue,
} from "./sql.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Answers a statement with rows (a query) or a full result (a write).
 * Throw to simulate a driver failure.
 */
export type TestResponder = (
	sql: string,
	params: readonly SQLValue[],
) => Row[] | StatementResult;

export interface TestBackendOptions {
	dialect?: SQLDialect;
	streaming?: boolean;
	responder?: TestResponder;
}

function toResult(answer: Row[] | StatementResult): StatementResult {
	return Array.isArray(answer)
		? {rows: [...answer], rowCount: answer.length}
		: {rows: [...answer.rows], rowCount: answer.rowCount, lastInsertId: answer.lastInsertId};
}

// ============================================================================
// Cursors
// ============================================================================

class TestCursor extends BufferedCursor {
	#backend: TestBackend;

	constructor(backend: TestBackend) {
		super();
		this.#backend = backend;
	}

	protected async run(
		sql: string,
		params: readonly SQLValue[],
	): Promise<StatementResult> {
		return toResult(this.#backend.respond(sql, params));
	}

	async close(): Promise<void> {
		if (!this.closed) {
			this.#backend.openCursors--;
		}
		await super.close();
	}
}

class TestBatchedCursor extends BatchedCursor {
	#backend: TestBackend;
	#batchSize: number;

	constructor(backend: TestBackend, batchSize: number) {
		super();
		this.#backend = backend;
		this.#batchSize = batchSize;
	}

	protected async *open(
		sql: string,
		params: readonly SQLValue[],
	): AsyncGenerator<Row[], void, undefined> {
		const {rows} = toResult(this.#backend.respond(sql, params));
		for (let i = 0; i < rows.length; i += this.#batchSize) {
			this.#backend.batches++;
			yield rows.slice(i, i + this.#batchSize);
		}
	}

	async close(): Promise<void> {
		if (!this.closed) {
			this.#backend.openCursors--;
		}
		await super.close();
	}
}

// ============================================================================
// Backend
// ============================================================================

export class TestBackend implements Backend {
	readonly dialect: SQLDialect;
	readonly placeholder: PlaceholderStyle;
	readonly supportsStreaming: boolean;
	readonly autoCommit = true;
	inTransaction = false;

	/** Every statement received, in order */
	readonly statements: Statement[] = [];
	/** Cursors created and not yet closed */
	openCursors = 0;
	/** Batches handed out by streaming cursors */
	batches = 0;
	closed = false;

	#responder: TestResponder;

	constructor(options: TestBackendOptions = {}) {
		this.dialect = options.dialect ?? "sqlite";
		this.placeholder = placeholderStyle(this.dialect);
		this.supportsStreaming = options.streaming ?? false;
		this.#responder = options.responder ?? (() => []);
	}

	respond(sql: string, params: readonly SQLValue[]): Row[] | StatementResult {
		this.statements.push({sql, params: [...params]});
		return this.#responder(sql, params);
	}

	async connect(): Promise<void> {}

	async cursor(options: CursorOptions = {}): Promise<Cursor> {
		this.openCursors++;
		return options.stream
			? new TestBatchedCursor(this, options.batchSize ?? 100)
			: new TestCursor(this);
	}

	async close(): Promise<void> {
		this.closed = true;
	}

	async begin(): Promise<void> {
		this.inTransaction = true;
		this.statements.push({sql: "BEGIN", params: []});
	}

	async commit(): Promise<void> {
		this.inTransaction = false;
		this.statements.push({sql: "COMMIT", params: []});
	}

	async rollback(): Promise<void> {
		this.inTransaction = false;
		this.statements.push({sql: "ROLLBACK", params: []});
	}

	tableExistsStatement(table: string): Statement {
		return {sql: "TABLE EXISTS", params: [table]};
	}

	tableListStatement(): Statement {
		return {sql: "TABLE LIST", params: []};
	}

	lastInsertIdStatement(table: string, pk: string): Statement {
		return {sql: "LAST INSERT ID", params: [table, pk]};
	}
}
