/**
 * Bun-compatible test utilities for Node's built-in test runner.
 *
 * Provides describe, test, expect API compatible with Bun tests.
 */

import {
	describe as nodeDescribe,
	test as nodeTest,
	beforeEach as nodeBeforeEach,
	afterEach as nodeAfterEach,
} from "node:test";
import assert from "node:assert";

export {describe, test, beforeEach, afterEach};

// Re-export Node's describe, test and hooks
const describe = nodeDescribe;
const test = nodeTest;
const beforeEach = nodeBeforeEach;
const afterEach = nodeAfterEach;

type Constructor = abstract new (...args: never[]) => unknown;

/**
 * What a thrown error must match: a message substring, a message pattern,
 * or an error class.
 */
type ThrowExpectation = string | RegExp | Constructor;

function matchesThrown(
	expected: ThrowExpectation | undefined,
): (thrown: unknown) => boolean {
	return (thrown) => {
		if (expected === undefined) {
			return true;
		}
		if (typeof expected === "string") {
			return thrown instanceof Error && thrown.message.includes(expected);
		}
		if (expected instanceof RegExp) {
			return thrown instanceof Error && expected.test(thrown.message);
		}
		return thrown instanceof expected;
	};
}

// Bun-compatible expect API
export function expect<T>(actual: T) {
	return {
		toBe(expected: T) {
			assert.strictEqual(actual, expected);
		},
		toEqual(expected: T) {
			assert.deepStrictEqual(actual, expected);
		},
		toBeNull() {
			assert.strictEqual(actual, null);
		},
		toBeUndefined() {
			assert.strictEqual(actual, undefined);
		},
		toBeTruthy() {
			assert.ok(actual);
		},
		toBeFalsy() {
			assert.ok(!actual);
		},
		toBeGreaterThan(expected: number) {
			if (typeof actual !== "number") {
				throw new Error("toBeGreaterThan expects a number");
			}
			assert.ok(actual > expected, `expected ${actual} > ${expected}`);
		},
		toBeInstanceOf(expected: Constructor) {
			assert.ok(
				actual instanceof expected,
				`expected an instance of ${expected.name}`,
			);
		},
		toHaveLength(expected: number) {
			if (typeof actual !== "string" && !Array.isArray(actual)) {
				throw new Error("toHaveLength expects an array or string");
			}
			assert.strictEqual(actual.length, expected);
		},
		toContain(expected: unknown) {
			if (Array.isArray(actual)) {
				assert.ok(actual.includes(expected));
			} else if (typeof actual === "string" && typeof expected === "string") {
				assert.ok(actual.includes(expected), `expected "${actual}" to contain "${expected}"`);
			} else {
				throw new Error("toContain expects an array or string");
			}
		},
		toMatch(expected: RegExp) {
			if (typeof actual !== "string") {
				throw new Error("toMatch expects a string");
			}
			assert.match(actual, expected);
		},
		toThrow(expected?: ThrowExpectation) {
			if (typeof actual !== "function") {
				throw new Error("toThrow expects a function");
			}
			assert.throws(() => Reflect.apply(actual, undefined, []), matchesThrown(expected));
		},
		not: {
			toBe(expected: T) {
				assert.notStrictEqual(actual, expected);
			},
			toEqual(expected: T) {
				assert.notDeepStrictEqual(actual, expected);
			},
			toBeNull() {
				assert.notStrictEqual(actual, null);
			},
			toThrow() {
				if (typeof actual !== "function") {
					throw new Error("not.toThrow expects a function");
				}
				assert.doesNotThrow(() => Reflect.apply(actual, undefined, []));
			},
		},
		rejects: {
			async toThrow(expected?: ThrowExpectation) {
				if (!(actual instanceof Promise)) {
					throw new Error("rejects.toThrow expects a Promise");
				}
				await assert.rejects(actual, matchesThrown(expected));
			},
		},
	};
}
