/**
 * Logging through LogTape.
 *
 * The library only emits records. Applications decide where they go, either
 * with their own LogTape configure() call or with configureLogging().
 */

import {
	configure,
	getConsoleSink,
	getLevelFilter,
	getLogger,
	type LogLevel,
	type Logger,
	type Sink,
} from "@logtape/logtape";

export const LOG_CATEGORY = "tablegate";

/** Prepared statements (debug) and execution failures (warning). */
export const sqlLogger: Logger = getLogger([LOG_CATEGORY, "sql"]);

/** DDL statements (info) and DDL failures (error). */
export const ddlLogger: Logger = getLogger([LOG_CATEGORY, "ddl"]);

export interface LoggingOptions {
	/** Lowest level that reaches the sinks (default: "info") */
	level?: LogLevel;
	/** Sinks by name (default: a console sink) */
	sinks?: Record<string, Sink>;
	/** Whether to reset an existing LogTape configuration (default: true) */
	reset?: boolean;
}

/**
 * Route the tablegate categories to the console, or to the given sinks.
 */
export async function configureLogging(
	options: LoggingOptions = {},
): Promise<void> {
	const {level = "info", reset = true} = options;
	const sinks = options.sinks ?? {console: getConsoleSink()};

	await configure({
		reset,
		sinks,
		filters: {level: getLevelFilter(level)},
		loggers: [
			{
				category: [LOG_CATEGORY],
				sinks: Object.keys(sinks),
				filters: ["level"],
			},
			// Suppress info messages about LogTape itself
			{
				category: ["logtape", "meta"],
				sinks: [],
			},
		],
	});
}
