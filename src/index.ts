/**
 * relwrap - thin wrappers over SQLite and PostgreSQL drivers
 *
 * Open a wrapper. Write SQL or build it. Get rows.
 *
 * Backends load from their own entry points ("relwrap/sqlite",
 * "relwrap/postgres") so only the driver in use needs installing.
 */

// ============================================================================
// Wrapper
// ============================================================================

export {
	Wrapper,
	type WrapperOptions,
	type SchemaDefinition,
	type ExecutionRecord,
	type CreateSchemasResult,
	type DropSchemasResult,
} from "./impl/wrapper.js";

// ============================================================================
// Query Builder
// ============================================================================

export {
	QueryBuilder,
	type QueryBuilderOptions,
	type BuilderState,
	type Conjunction,
	type OrderDirection,
	type OrderArgs,
	type OrderOptions,
	type WhereOptions,
} from "./impl/builder.js";

// ============================================================================
// Rows and Cursors
// ============================================================================

export {
	createRow,
	rowFromRecord,
	rowColumns,
	rowEquals,
	type Row,
} from "./impl/row.js";

export {
	BufferedCursor,
	BatchedCursor,
	type Cursor,
	type StatementResult,
} from "./impl/cursor.js";

export type {Backend, CursorOptions, Statement} from "./impl/backend.js";

// ============================================================================
// SQL Helpers
// ============================================================================

export {
	quoteIdent,
	placeholder,
	placeholderStyle,
	isoDateColumn,
	renderInsert,
	type SQLDialect,
	type SQLValue,
	type PlaceholderStyle,
} from "./impl/sql.js";

// ============================================================================
// Configuration
// ============================================================================

export {
	CommonOptionsSchema,
	SQLiteConfigSchema,
	PostgresConfigSchema,
	DatabaseConfigSchema,
	parseConfig,
	parseSQLiteConfig,
	parsePostgresConfig,
	openDatabase,
	type CommonOptions,
	type DatabaseConfig,
	type SQLiteConfig,
	type SQLiteOptions,
	type PostgresConfig,
	type PostgresOptions,
	type OpenOptions,
} from "./impl/config.js";

// ============================================================================
// Logging
// ============================================================================

export {
	createLogger,
	getDefaultLogger,
	type Logger,
	type LoggerConfig,
} from "./impl/logger.js";

// ============================================================================
// Errors
// ============================================================================

export {
	DatabaseError,
	ConfigError,
	ConnectionError,
	QueryError,
	ConstraintViolationError,
	NotFoundError,
	StateError,
	SchemaError,
	TransactionError,
	isDatabaseError,
	hasErrorCode,
	type DatabaseErrorCode,
	type ConstraintKind,
} from "./impl/errors.js";
