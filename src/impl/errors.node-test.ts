import {describe, test, expect} from "./node-test-utils.js";
import {
	ConstraintViolationError,
	DatabaseError,
	NotFoundError,
	QueryError,
	StateError,
	errorMessage,
	errorProperty,
	hasErrorCode,
	isDatabaseError,
} from "./errors.js";

describe("DatabaseError hierarchy", () => {
	test("constraint violations are query errors", () => {
		const cause = new Error("UNIQUE constraint failed: users.email");
		const error = new ConstraintViolationError(
			cause.message,
			{kind: "unique", table: "users", column: "email", sql: "INSERT ..."},
			{cause},
		);

		expect(error).toBeInstanceOf(QueryError);
		expect(error).toBeInstanceOf(DatabaseError);
		expect(error.code).toBe("CONSTRAINT_VIOLATION");
		expect(error.name).toBe("ConstraintViolationError");
		expect(error.sql).toBe("INSERT ...");
		expect(error.cause).toBe(cause);
	});

	test("NotFoundError names the table", () => {
		const error = new NotFoundError("users");
		expect(error.message).toBe("No matching row in users");
		expect(error.tableName).toBe("users");
	});

	test("StateError keeps the state", () => {
		const error = new StateError("cursor closed", "closed");
		expect(error.state).toBe("closed");
		expect(error.code).toBe("STATE_ERROR");
	});
});

describe("type guards", () => {
	test("isDatabaseError and hasErrorCode", () => {
		const error = new QueryError("syntax error", "SELEC 1");
		expect(isDatabaseError(error)).toBe(true);
		expect(isDatabaseError(new Error("plain"))).toBe(false);
		expect(hasErrorCode(error, "QUERY_ERROR")).toBe(true);
		expect(hasErrorCode(error, "NOT_FOUND")).toBe(false);
	});
});

describe("driver error helpers", () => {
	test("errorProperty reads string properties only", () => {
		const error = Object.assign(new Error("boom"), {code: "23505", errno: 19});
		expect(errorProperty(error, "code")).toBe("23505");
		expect(errorProperty(error, "errno")).toBeUndefined();
		expect(errorProperty(error, "missing")).toBeUndefined();
		expect(errorProperty("not an object", "code")).toBeUndefined();
	});

	test("errorMessage handles non-errors", () => {
		expect(errorMessage(new Error("boom"))).toBe("boom");
		expect(errorMessage("plain text")).toBe("plain text");
	});
});
