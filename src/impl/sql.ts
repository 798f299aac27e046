/**
 * SQL rendering utilities for all dialects.
 *
 * This is the single source of truth for dialect-specific SQL rendering:
 * - Identifier quoting
 * - Placeholder syntax
 * - Date projection
 */

// ============================================================================
// Types
// ============================================================================

export type SQLDialect = "sqlite" | "postgresql";

/**
 * Values that may be bound to a statement placeholder.
 */
export type SQLValue = string | number | boolean | null | Date | Uint8Array;

/**
 * Renders the placeholder for the 1-based parameter index.
 */
export type PlaceholderStyle = (index: number) => string;

// ============================================================================
// Core Helpers
// ============================================================================

/**
 * Quote an identifier. PostgreSQL and SQLite both use double quotes.
 */
export function quoteIdent(name: string, _dialect?: SQLDialect): string {
	return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Get placeholder syntax based on dialect.
 * PostgreSQL uses $1, $2, etc. SQLite uses ?.
 */
export function placeholder(index: number, dialect: SQLDialect): string {
	if (dialect === "postgresql") {
		return `$${index}`;
	}
	return "?";
}

/**
 * Placeholder style for a dialect, suitable for QueryBuilder options.
 */
export function placeholderStyle(dialect: SQLDialect): PlaceholderStyle {
	return (index) => placeholder(index, dialect);
}

/**
 * Select expression returning `column` as an ISO-8601 UTC string, aliased
 * back to the column name.
 */
export function isoDateColumn(column: string, dialect: SQLDialect): string {
	if (dialect === "postgresql") {
		return `to_char(${column}, 'YYYY-MM-DD"T"HH24:MI:SS"Z"') AS ${column}`;
	}
	return `strftime('%Y-%m-%dT%H:%M:%SZ', ${column}) AS ${column}`;
}

/**
 * Render a list of quoted identifiers and matching placeholders for an
 * INSERT statement.
 */
export function renderInsert(
	table: string,
	fields: Record<string, SQLValue>,
	dialect: SQLDialect,
): {sql: string; params: SQLValue[]} {
	const columns = Object.keys(fields);
	const params = columns.map((column) => fields[column]);
	const columnList = columns.map((c) => quoteIdent(c, dialect)).join(", ");
	const valueList = columns
		.map((_, i) => placeholder(i + 1, dialect))
		.join(", ");

	const sql =
		columns.length > 0
			? `INSERT INTO ${quoteIdent(table, dialect)} (${columnList}) VALUES (${valueList}) RETURNING *;`
			: `INSERT INTO ${quoteIdent(table, dialect)} DEFAULT VALUES RETURNING *;`;
	return {sql, params};
}
