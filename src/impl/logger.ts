/**
 * Logger factory.
 *
 * Wrappers and builders log built queries and executed statements at
 * `debug`. Pass your own winston logger to route them elsewhere.
 */

import winston from "winston";

const {format} = winston;

export type Logger = winston.Logger;

export interface LoggerConfig {
	/** Minimum level. Defaults to LOG_LEVEL, then "warn". */
	level?: string;
	/** Emit JSON lines instead of the human-readable format */
	json?: boolean;
	/** Disable every transport (the logger still accepts calls) */
	silent?: boolean;
}

/**
 * One line per entry: `<timestamp> <level> [<component>]: <message> <meta>`.
 */
export const lineFormat = format.printf(
	({timestamp, level, message, component, ...meta}) => {
		const scope = typeof component === "string" ? ` [${component}]` : "";
		const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
		return `${String(timestamp)} ${level}${scope}: ${String(message)}${extra}`;
	},
);

export function createLogger(config: LoggerConfig = {}): Logger {
	const {
		level = process.env["LOG_LEVEL"] ?? "warn",
		json = false,
		silent = false,
	} = config;

	return winston.createLogger({
		level,
		silent,
		format: format.combine(
			format.timestamp(),
			format.errors({stack: true}),
			json ? format.json() : lineFormat,
		),
		transports: [new winston.transports.Console()],
		exitOnError: false,
	});
}

let defaultLogger: Logger | undefined;

/**
 * Shared logger used when a wrapper is not given one.
 */
export function getDefaultLogger(): Logger {
	defaultLogger ??= createLogger();
	return defaultLogger;
}
