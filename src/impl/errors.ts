/**
 * Structured error types for table operations.
 *
 * All errors extend DatabaseError, which includes an error code
 * for programmatic error handling.
 */

// ============================================================================
// Error Codes
// ============================================================================

export type DatabaseErrorCode =
	| "CONFIGURATION_ERROR"
	| "TABLE_DEFINITION_ERROR"
	| "TYPE_MISMATCH"
	| "QUERY_ERROR"
	| "EXECUTION_ERROR"
	| "NOT_FOUND"
	| "ALREADY_EXISTS"
	| "ENSURE_ERROR"
	| "SCHEMA_DRIFT_ERROR";

// ============================================================================
// Base Error
// ============================================================================

/**
 * Base error class for all database errors.
 *
 * Includes an error code for programmatic handling.
 */
export class DatabaseError extends Error {
	readonly code: DatabaseErrorCode;

	constructor(
		code: DatabaseErrorCode,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "DatabaseError";
		this.code = code;

		// Maintains proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}
}

// ============================================================================
// Programming Errors
// ============================================================================

/**
 * Thrown when database options fail validation.
 */
export class ConfigurationError extends DatabaseError {
	readonly issues: string[];

	constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
		super("CONFIGURATION_ERROR", message, options);
		this.name = "ConfigurationError";
		this.issues = issues;
	}
}

/**
 * Thrown when a table definition is invalid or used incorrectly
 * (bad column definition, unknown column, unknown table reference).
 */
export class TableDefinitionError extends DatabaseError {
	readonly tableName?: string;
	readonly fieldName?: string;

	constructor(
		message: string,
		tableName?: string,
		fieldName?: string,
		options?: ErrorOptions,
	) {
		super("TABLE_DEFINITION_ERROR", message, options);
		this.name = "TableDefinitionError";
		this.tableName = tableName;
		this.fieldName = fieldName;
	}
}

/**
 * Thrown when a row is handed to a table it does not belong to.
 */
export class TypeMismatchError extends DatabaseError {
	readonly tableName: string;
	readonly received: string;

	constructor(tableName: string, received: string, options?: ErrorOptions) {
		super(
			"TYPE_MISMATCH",
			`${tableName} got a ${received} which isn't one of its rows`,
			options,
		);
		this.name = "TypeMismatchError";
		this.tableName = tableName;
		this.received = received;
	}
}

// ============================================================================
// Statement Errors
// ============================================================================

/**
 * Thrown when the driver refuses to prepare a statement.
 */
export class QueryError extends DatabaseError {
	readonly sql?: string;

	constructor(message: string, sql?: string, options?: ErrorOptions) {
		super("QUERY_ERROR", message, options);
		this.name = "QueryError";
		this.sql = sql;
	}
}

/**
 * A failed statement execution.
 *
 * Tables do not throw these. The failing call returns null and the error is
 * kept on the table (`table.lastError`) until the next execution.
 */
export class ExecutionError extends DatabaseError {
	/** The driver's native error code, e.g. DB2's SQLCODE */
	readonly driverCode?: string | number;
	/** The driver's SQLSTATE */
	readonly state?: string;
	readonly sql: string;

	constructor(
		message: string,
		details: {sql: string; driverCode?: string | number; state?: string},
		options?: ErrorOptions,
	) {
		super("EXECUTION_ERROR", message, options);
		this.name = "ExecutionError";
		this.sql = details.sql;
		this.driverCode = details.driverCode;
		this.state = details.state;
	}

	/**
	 * Normalize whatever a driver rejected with.
	 */
	static from(error: unknown, sql: string): ExecutionError {
		if (error instanceof ExecutionError) {
			return error;
		}

		let driverCode: string | number | undefined;
		let state: string | undefined;
		let message = String(error);
		if (error !== null && typeof error === "object") {
			if ("code" in error) {
				const code = error.code;
				if (typeof code === "string" || typeof code === "number") {
					driverCode = code;
				}
			}
			if ("state" in error && typeof error.state === "string") {
				state = error.state;
			} else if ("sqlState" in error && typeof error.sqlState === "string") {
				state = error.sqlState;
			}
			if ("message" in error && typeof error.message === "string") {
				message = error.message;
			}
		}

		return new ExecutionError(
			message,
			{sql, driverCode, state},
			{cause: error},
		);
	}
}

/**
 * Thrown when an explicit update targets a row that is not stored.
 */
export class NotFoundError extends DatabaseError {
	readonly tableName: string;
	readonly id?: unknown;

	constructor(tableName: string, id?: unknown, options?: ErrorOptions) {
		const message =
			id !== undefined && id !== null
				? `${tableName} with id "${id}" not found`
				: `${tableName} not found`;
		super("NOT_FOUND", message, options);
		this.name = "NotFoundError";
		this.tableName = tableName;
		this.id = id;
	}
}

/**
 * Thrown when an explicit insert targets a primary key that is already stored.
 */
export class AlreadyExistsError extends DatabaseError {
	readonly tableName: string;
	readonly field?: string;
	readonly value?: unknown;

	constructor(
		tableName: string,
		field?: string,
		value?: unknown,
		options?: ErrorOptions,
	) {
		const message = field
			? `${tableName} with ${field}="${value}" already exists`
			: `${tableName} already exists`;
		super("ALREADY_EXISTS", message, options);
		this.name = "AlreadyExistsError";
		this.tableName = tableName;
		this.field = field;
		this.value = value;
	}
}

// ============================================================================
// Schema Ensure Errors
// ============================================================================

/**
 * Operation type for ensure operations.
 */
export type EnsureOperation = "createTable" | "alterTable" | "grant";

/**
 * Thrown when DDL fails and the database is configured with
 * `ddlErrors: "throw"`.
 *
 * Includes step information for diagnosing partial failures, since
 * earlier ALTER statements are not rolled back.
 */
export class EnsureError extends DatabaseError {
	/** The operation that failed */
	readonly operation: EnsureOperation;
	/** The table being operated on */
	readonly table: string;
	/** The step index where failure occurred (0-based) */
	readonly step: number;
	readonly sql: string;

	constructor(
		message: string,
		details: {
			operation: EnsureOperation;
			table: string;
			step: number;
			sql: string;
		},
		options?: ErrorOptions,
	) {
		super("ENSURE_ERROR", message, options);
		this.name = "EnsureError";
		this.operation = details.operation;
		this.table = details.table;
		this.step = details.step;
		this.sql = details.sql;
	}
}

/**
 * Thrown when the catalog disagrees with what a table expects, such as two
 * catalog entries for one schema and name.
 */
export class SchemaDriftError extends DatabaseError {
	/** The table where drift was detected */
	readonly table: string;
	/** Description of what drifted */
	readonly drift: string;

	constructor(
		message: string,
		details: {
			table: string;
			drift: string;
		},
		options?: ErrorOptions,
	) {
		super("SCHEMA_DRIFT_ERROR", message, options);
		this.name = "SchemaDriftError";
		this.table = details.table;
		this.drift = details.drift;
	}
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if an error is a DatabaseError.
 */
export function isDatabaseError(error: unknown): error is DatabaseError {
	return error instanceof DatabaseError;
}

/**
 * Check if an error has a specific error code.
 */
export function hasErrorCode(
	error: unknown,
	code: DatabaseErrorCode,
): error is DatabaseError {
	return isDatabaseError(error) && error.code === code;
}
