import {describe, test, expect} from "./node-test-utils.js";
import {isoDateColumn, placeholder, quoteIdent, renderInsert} from "./sql.js";

describe("quoteIdent", () => {
	test("wraps names in double quotes", () => {
		expect(quoteIdent("users")).toBe('"users"');
	});

	test("doubles embedded quotes", () => {
		expect(quoteIdent('odd"name')).toBe('"odd""name"');
	});
});

describe("placeholder", () => {
	test("uses ? for sqlite and $n for postgresql", () => {
		expect(placeholder(3, "sqlite")).toBe("?");
		expect(placeholder(3, "postgresql")).toBe("$3");
	});
});

describe("isoDateColumn", () => {
	test("aliases the formatted column to its own name", () => {
		expect(isoDateColumn("created_at", "sqlite")).toBe(
			"strftime('%Y-%m-%dT%H:%M:%SZ', created_at) AS created_at",
		);
		expect(isoDateColumn("created_at", "postgresql")).toBe(
			`to_char(created_at, 'YYYY-MM-DD"T"HH24:MI:SS"Z"') AS created_at`,
		);
	});
});

describe("renderInsert", () => {
	test("quotes columns and binds values", () => {
		const {sql, params} = renderInsert(
			"users",
			{first_name: "Dave", last_name: "Johnson"},
			"postgresql",
		);
		expect(sql).toBe(
			'INSERT INTO "users" ("first_name", "last_name") VALUES ($1, $2) RETURNING *;',
		);
		expect(params).toEqual(["Dave", "Johnson"]);
	});

	test("uses ? placeholders for sqlite", () => {
		const {sql} = renderInsert("items", {name: "Orange"}, "sqlite");
		expect(sql).toBe('INSERT INTO "items" ("name") VALUES (?) RETURNING *;');
	});

	test("inserts defaults when no fields are given", () => {
		const {sql, params} = renderInsert("items", {}, "sqlite");
		expect(sql).toBe('INSERT INTO "items" DEFAULT VALUES RETURNING *;');
		expect(params).toEqual([]);
	});
});
