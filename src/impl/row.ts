/**
 * Read-only result rows.
 *
 * A row is a frozen object mapping column names to values, so `row["name"]`
 * and `row.name` are the same lookup. Rows are built from a column list and
 * a value list zipped by position; when a column name repeats, the later
 * value wins.
 */

export type Row = Readonly<Record<string, unknown>>;

/**
 * Build a row from column names and the values at the same positions.
 */
export function createRow(
	columns: readonly string[],
	values: readonly unknown[],
): Row {
	if (columns.length !== values.length) {
		throw new RangeError(
			`Row has ${values.length} values for ${columns.length} columns`,
		);
	}

	// defineProperty, so a column named __proto__ stays an own property
	const row: Record<string, unknown> = {};
	for (let i = 0; i < columns.length; i++) {
		Object.defineProperty(row, columns[i], {
			value: values[i],
			enumerable: true,
			configurable: true,
			writable: true,
		});
	}
	return Object.freeze(row);
}

/**
 * Build a row from a driver record (an object keyed by column name).
 */
export function rowFromRecord(record: object): Row {
	return createRow(Object.keys(record), Object.values(record));
}

export function rowColumns(row: Row): string[] {
	return Object.keys(row);
}

/**
 * Value equality: same columns in the same order with equal values.
 * Dates compare by time, byte arrays by content.
 */
export function rowEquals(a: Row, b: Row): boolean {
	const aColumns = Object.keys(a);
	const bColumns = Object.keys(b);
	if (aColumns.length !== bColumns.length) return false;

	for (let i = 0; i < aColumns.length; i++) {
		if (aColumns[i] !== bColumns[i]) return false;
		if (!valueEquals(a[aColumns[i]], b[bColumns[i]])) return false;
	}
	return true;
}

function valueEquals(a: unknown, b: unknown): boolean {
	if (a instanceof Date && b instanceof Date) {
		return a.getTime() === b.getTime();
	}
	if (a instanceof Uint8Array && b instanceof Uint8Array) {
		return a.length === b.length && a.every((byte, i) => byte === b[i]);
	}
	return Object.is(a, b);
}
