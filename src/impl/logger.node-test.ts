import {describe, test, expect, afterEach} from "./node-test-utils.js";
import {createLogger, lineFormat} from "./logger.js";

const MESSAGE = Symbol.for("message");

describe("createLogger", () => {
	const saved = process.env["LOG_LEVEL"];

	afterEach(() => {
		if (saved === undefined) {
			delete process.env["LOG_LEVEL"];
		} else {
			process.env["LOG_LEVEL"] = saved;
		}
	});

	test("uses the given level", () => {
		expect(createLogger({level: "debug"}).level).toBe("debug");
	});

	test("falls back to LOG_LEVEL, then warn", () => {
		process.env["LOG_LEVEL"] = "info";
		expect(createLogger().level).toBe("info");

		delete process.env["LOG_LEVEL"];
		expect(createLogger().level).toBe("warn");
	});

	test("can be silenced", () => {
		expect(createLogger({silent: true}).silent).toBe(true);
	});
});

describe("lineFormat", () => {
	test("prints the component and remaining metadata", () => {
		const info = lineFormat.transform({
			level: "debug",
			message: "Executed statement",
			timestamp: "2024-05-01T12:00:00.000Z",
			component: "builder",
			sql: "SELECT 1;",
		});
		if (typeof info === "boolean") {
			throw new Error("entry was filtered out");
		}
		expect(info[MESSAGE]).toBe(
			'2024-05-01T12:00:00.000Z debug [builder]: Executed statement {"sql":"SELECT 1;"}',
		);
	});

	test("omits empty metadata", () => {
		const info = lineFormat.transform({
			level: "warn",
			message: "Closed database",
			timestamp: "2024-05-01T12:00:00.000Z",
		});
		if (typeof info === "boolean") {
			throw new Error("entry was filtered out");
		}
		expect(info[MESSAGE]).toBe("2024-05-01T12:00:00.000Z warn: Closed database");
	});
});
