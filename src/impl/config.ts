/**
 * Configuration validation and wrapper factory.
 */

import {z} from "zod";
import type {Backend} from "./backend.js";
import type {Logger} from "./logger.js";
import type {Wrapper} from "./wrapper.js";
import {ConfigError} from "./errors.js";

// ============================================================================
// Config schemas
// ============================================================================

/**
 * Options every wrapper accepts, whatever the backend.
 */
export const CommonOptionsSchema = z.object({
	/** [table, CREATE statement] pairs, in creation order */
	schemas: z
		.array(z.tuple([z.string().min(1), z.string().min(1)]))
		.default([]),
	/** Create missing declared tables when the wrapper opens */
	autoCreateSchema: z.boolean().default(true),
	enableExecutionLog: z.boolean().default(true),
	/** When false, a transaction is opened before the first statement */
	autoCommit: z.boolean().default(true),
	/** Replaces the table-exists metadata query */
	tableQuery: z.string().min(1).optional(),
	/** Replaces the table-list metadata query */
	tableListQuery: z.string().min(1).optional(),
});

export const SQLiteConfigSchema = CommonOptionsSchema.extend({
	backend: z.literal("sqlite"),
	/** File path, or ":memory:" */
	path: z.string().min(1).default(":memory:"),
	/** Directory a relative path is resolved against (default: cwd) */
	folder: z.string().min(1).optional(),
	/** Use a shared in-memory database instead of `path` */
	memoryPersist: z.boolean().default(false),
	/** Busy timeout in milliseconds */
	timeout: z.number().int().nonnegative().default(30000),
	readonly: z.boolean().default(false),
	isolationLevel: z.enum(["DEFERRED", "IMMEDIATE", "EXCLUSIVE"]).optional(),
});

export const PostgresConfigSchema = CommonOptionsSchema.extend({
	backend: z.literal("postgres"),
	/** Connection URL; takes precedence over host/port/database/user/password */
	url: z.string().min(1).optional(),
	host: z.string().min(1).default("localhost"),
	port: z.number().int().min(1).max(65535).default(5432),
	database: z.string().min(1).optional(),
	user: z.string().min(1).optional(),
	password: z.string().optional(),
	/** Schema searched by tableExists()/listTables() */
	schema: z.string().min(1).default("public"),
	/** Session time zone */
	timezone: z.string().min(1).default("UTC"),
	/** Connections in the driver's pool; the wrapper reserves one */
	max: z.number().int().positive().default(1),
	/** Seconds */
	connectTimeout: z.number().int().positive().default(30),
	/** Seconds before an idle connection closes; 0 keeps it open */
	idleTimeout: z.number().int().nonnegative().default(0),
	isolationLevel: z
		.enum(["READ UNCOMMITTED", "READ COMMITTED", "REPEATABLE READ", "SERIALIZABLE"])
		.optional(),
});

export const DatabaseConfigSchema = z.discriminatedUnion("backend", [
	SQLiteConfigSchema,
	PostgresConfigSchema,
]);

export type CommonOptions = z.infer<typeof CommonOptionsSchema>;
export type SQLiteConfig = z.infer<typeof SQLiteConfigSchema>;
export type PostgresConfig = z.infer<typeof PostgresConfigSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;

/** SQLite options as callers write them (defaults not yet applied) */
export type SQLiteOptions = Omit<z.input<typeof SQLiteConfigSchema>, "backend">;
/** PostgreSQL options as callers write them (defaults not yet applied) */
export type PostgresOptions = Omit<z.input<typeof PostgresConfigSchema>, "backend">;

export interface OpenOptions {
	logger?: Logger;
}

// ============================================================================
// Parsing
// ============================================================================

function validate<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
	const result = schema.safeParse(raw);
	if (!result.success) {
		const issues = result.error.issues.map((issue) =>
			issue.path.length > 0
				? `${issue.path.join(".")}: ${issue.message}`
				: issue.message,
		);
		throw new ConfigError(
			`Invalid database configuration: ${issues.join("; ")}`,
			issues,
		);
	}
	return result.data;
}

/**
 * Validate a configuration object and apply defaults.
 *
 * @example
 * parseConfig({backend: "sqlite", path: "app.db"}).timeout; // 30000
 */
export function parseConfig(raw: unknown): DatabaseConfig {
	return validate(DatabaseConfigSchema, raw);
}

export function parseSQLiteConfig(options: SQLiteOptions = {}): SQLiteConfig {
	return validate(SQLiteConfigSchema, {...options, backend: "sqlite"});
}

export function parsePostgresConfig(options: PostgresOptions = {}): PostgresConfig {
	return validate(PostgresConfigSchema, {...options, backend: "postgres"});
}

// ============================================================================
// Wrapper factory
// ============================================================================

/**
 * Build, connect and initialize the wrapper the configuration selects.
 * Backend modules are loaded on demand, so only the selected driver needs
 * to be installed.
 *
 * @example
 * const db = await openDatabase({
 *   backend: "postgres",
 *   url: process.env.DATABASE_URL,
 *   schemas: [["items", "CREATE TABLE items (id SERIAL PRIMARY KEY, name TEXT)"]],
 * });
 */
export async function openDatabase(
	raw: unknown,
	options: OpenOptions = {},
): Promise<Wrapper<Backend>> {
	const config = parseConfig(raw);
	switch (config.backend) {
		case "sqlite": {
			const {openSQLiteWrapper} = await import("../sqlite.js");
			return openSQLiteWrapper(config, options);
		}
		case "postgres": {
			const {openPostgresWrapper} = await import("../postgres.js");
			return openPostgresWrapper(config, options);
		}
	}
}

/**
 * Connect a wrapper and create its missing declared tables when
 * autoCreateSchema is on. Closes the connection if either step fails.
 */
export async function initializeWrapper<TWrapper extends Wrapper<Backend>>(
	wrapper: TWrapper,
	config: CommonOptions,
): Promise<TWrapper> {
	try {
		await wrapper.connect();
		if (config.autoCreateSchema && config.schemas.length > 0) {
			await wrapper.createSchemas();
		}
	} catch (error) {
		await wrapper.close();
		throw error;
	}
	return wrapper;
}
