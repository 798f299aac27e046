/**
 * Structured error types for database operations.
 *
 * All database errors extend DatabaseError, which includes an error code
 * for programmatic error handling. Driver errors are wrapped, not replaced:
 * the driver's message is kept and the original error is the `cause`.
 */

// ============================================================================
// Error Codes
// ============================================================================

export type DatabaseErrorCode =
	| "CONFIG_ERROR"
	| "CONNECTION_ERROR"
	| "QUERY_ERROR"
	| "CONSTRAINT_VIOLATION"
	| "NOT_FOUND"
	| "STATE_ERROR"
	| "SCHEMA_ERROR"
	| "TRANSACTION_ERROR";

// ============================================================================
// Base Error
// ============================================================================

/**
 * Base error class for all database errors.
 *
 * Includes an error code for programmatic handling.
 */
export class DatabaseError extends Error {
	readonly code: DatabaseErrorCode;

	constructor(
		code: DatabaseErrorCode,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "DatabaseError";
		this.code = code;

		// Maintains proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}
}

// ============================================================================
// Specific Error Types
// ============================================================================

/**
 * Thrown when wrapper or backend configuration fails validation.
 */
export class ConfigError extends DatabaseError {
	readonly issues: string[];

	constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
		super("CONFIG_ERROR", message, options);
		this.name = "ConfigError";
		this.issues = issues;
	}
}

/**
 * Thrown when the database cannot be opened or reached.
 */
export class ConnectionError extends DatabaseError {
	constructor(message: string, options?: ErrorOptions) {
		super("CONNECTION_ERROR", message, options);
		this.name = "ConnectionError";
	}
}

/**
 * Thrown when a statement fails: malformed SQL, type mismatches and the
 * like. The message is the driver's own.
 */
export class QueryError extends DatabaseError {
	readonly sql?: string;

	constructor(
		message: string,
		sql?: string,
		options?: ErrorOptions,
		code: DatabaseErrorCode = "QUERY_ERROR",
	) {
		super(code, message, options);
		this.name = "QueryError";
		this.sql = sql;
	}
}

export type ConstraintKind =
	| "unique"
	| "primary_key"
	| "foreign_key"
	| "check"
	| "not_null"
	| "unknown";

/**
 * Thrown when a database constraint is violated.
 *
 * A QueryError, so callers catching QueryError see constraint failures too.
 * Detected from driver error codes; `constraint`, `table` and `column` are
 * best-effort and may be undefined.
 */
export class ConstraintViolationError extends QueryError {
	readonly kind: ConstraintKind;
	readonly constraint?: string;
	readonly table?: string;
	readonly column?: string;

	constructor(
		message: string,
		details: {
			kind: ConstraintKind;
			sql?: string;
			constraint?: string;
			table?: string;
			column?: string;
		},
		options?: ErrorOptions,
	) {
		super(message, details.sql, options, "CONSTRAINT_VIOLATION");
		this.name = "ConstraintViolationError";
		this.kind = details.kind;
		this.constraint = details.constraint;
		this.table = details.table;
		this.column = details.column;
	}
}

/**
 * Thrown when a row that must exist is missing.
 */
export class NotFoundError extends DatabaseError {
	readonly tableName: string;

	constructor(tableName: string, options?: ErrorOptions) {
		super("NOT_FOUND", `No matching row in ${tableName}`, options);
		this.name = "NotFoundError";
		this.tableName = tableName;
	}
}

/**
 * Thrown when a builder or cursor operation is invoked in a state that
 * does not allow it, e.g. fetchNext() after closeCursor().
 */
export class StateError extends DatabaseError {
	readonly state: string;

	constructor(message: string, state: string, options?: ErrorOptions) {
		super("STATE_ERROR", message, options);
		this.name = "StateError";
		this.state = state;
	}
}

/**
 * Thrown when a table has no declared create statement.
 */
export class SchemaError extends DatabaseError {
	readonly table: string;

	constructor(message: string, table: string, options?: ErrorOptions) {
		super("SCHEMA_ERROR", message, options);
		this.name = "SchemaError";
		this.table = table;
	}
}

/**
 * Thrown when BEGIN, COMMIT or ROLLBACK is used out of order.
 */
export class TransactionError extends DatabaseError {
	constructor(message: string, options?: ErrorOptions) {
		super("TRANSACTION_ERROR", message, options);
		this.name = "TransactionError";
	}
}

// ============================================================================
// Driver Error Helpers
// ============================================================================

/**
 * Read a string property off an unknown driver error.
 */
export function errorProperty(error: unknown, key: string): string | undefined {
	if (error === null || typeof error !== "object" || !(key in error)) {
		return undefined;
	}
	const value: unknown = Reflect.get(error, key);
	return typeof value === "string" ? value : undefined;
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if an error is a DatabaseError.
 */
export function isDatabaseError(error: unknown): error is DatabaseError {
	return error instanceof DatabaseError;
}

/**
 * Check if an error has a specific error code.
 */
export function hasErrorCode(
	error: unknown,
	code: DatabaseErrorCode,
): error is DatabaseError {
	return isDatabaseError(error) && error.code === code;
}
