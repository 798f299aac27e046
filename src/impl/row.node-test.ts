import {describe, test, expect} from "./node-test-utils.js";
import {createRow, rowColumns, rowEquals, rowFromRecord} from "./row.js";

describe("createRow", () => {
	test("zips columns and values by position", () => {
		const row = createRow(["id", "name"], [1, "Orange"]);
		expect(row.id).toBe(1);
		expect(row["name"]).toBe("Orange");
		expect(rowColumns(row)).toEqual(["id", "name"]);
	});

	test("is frozen", () => {
		const row = createRow(["id"], [1]);
		expect(Object.isFrozen(row)).toBe(true);
	});

	test("rejects mismatched lengths", () => {
		expect(() => createRow(["id", "name"], [1])).toThrow(
			"Row has 1 values for 2 columns",
		);
	});

	test("later duplicate columns win", () => {
		const row = createRow(["id", "id"], [1, 2]);
		expect(row.id).toBe(2);
		expect(rowColumns(row)).toEqual(["id"]);
	});

	test("keeps a __proto__ column as a value", () => {
		const row = createRow(["__proto__", "b"], [1, 2]);
		expect(rowColumns(row)).toEqual(["__proto__", "b"]);
		expect(row["__proto__"]).toBe(1);
		expect(Object.getPrototypeOf(row)).toBe(Object.prototype);
	});
});

describe("rowFromRecord", () => {
	test("keeps the record's column order", () => {
		const row = rowFromRecord({last_name: "Smith", first_name: "Anna"});
		expect(rowColumns(row)).toEqual(["last_name", "first_name"]);
		expect(row.first_name).toBe("Anna");
	});
});

describe("rowEquals", () => {
	test("compares columns and values", () => {
		const a = createRow(["id", "name"], [1, "Orange"]);
		expect(rowEquals(a, createRow(["id", "name"], [1, "Orange"]))).toBe(true);
		expect(rowEquals(a, createRow(["id", "name"], [1, "Apple"]))).toBe(false);
		expect(rowEquals(a, createRow(["name", "id"], ["Orange", 1]))).toBe(false);
		expect(rowEquals(a, createRow(["id"], [1]))).toBe(false);
	});

	test("compares dates by time and bytes by content", () => {
		const a = createRow(
			["at", "data"],
			[new Date("2024-03-01T10:00:00Z"), new Uint8Array([1, 2, 3])],
		);
		const b = createRow(
			["at", "data"],
			[new Date("2024-03-01T10:00:00Z"), new Uint8Array([1, 2, 3])],
		);
		const c = createRow(
			["at", "data"],
			[new Date("2024-03-01T10:00:00Z"), new Uint8Array([1, 2, 4])],
		);
		expect(rowEquals(a, b)).toBe(true);
		expect(rowEquals(a, c)).toBe(false);
	});
});
