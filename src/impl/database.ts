/**
 * Database - the driver, its options and the table registry.
 *
 * Tables are registered once, at setup, together with the row class their
 * finds construct. Cross-table references in SQL text (`!Name!`) resolve
 * through this registry.
 */

import type {Row, RowClass} from "./row.js";
import type {Table, TableClass} from "./table.js";
import {TableDefinitionError} from "./errors.js";
import {
	resolveOptions,
	type DatabaseOptions,
	type ResolvedDatabaseOptions,
} from "./options.js";

// ============================================================================
// Driver Interface
// ============================================================================

/**
 * A prepared statement.
 */
export interface Statement {
	/**
	 * Column names of the result set. Available after execute().
	 */
	readonly columns: readonly string[];

	/**
	 * Execute with positional bind values and return the number of affected
	 * rows (drivers may return -1 for queries).
	 *
	 * Rejects on failure. Rejection values carrying `code` and `state` (or
	 * `sqlState`) keep them on the resulting ExecutionError.
	 *
	 * A single value bound to `<column> IN ?` must match that value.
	 */
	execute(params: readonly unknown[]): Promise<number>;

	/**
	 * All result rows of the last execution, as positional tuples.
	 */
	fetchAll(): Promise<unknown[][]>;
}

/**
 * A catalog entry returned by Driver.tables().
 */
export interface TableInfo {
	schema: string;
	name: string;
	type?: string;
}

/**
 * Database driver interface.
 *
 * One driver is one connection. Statements are prepared and executed one at
 * a time; the driver owns cancellation and timeouts.
 */
export interface Driver {
	/**
	 * Prepare SQL text with `?` placeholders. Rejects when the database
	 * refuses the statement.
	 */
	prepare(sql: string): Promise<Statement>;

	/**
	 * Catalog lookup by upper-case schema and table name.
	 */
	tables(filter: {schema: string; name: string}): Promise<TableInfo[]>;

	commit(): Promise<void>;

	rollback(): Promise<void>;

	/**
	 * Close the connection.
	 */
	close(): Promise<void>;
}

// ============================================================================
// Schema Ensure Types
// ============================================================================

/**
 * Result from ensure operations.
 */
export interface EnsureResult {
	/** Whether any DDL was executed (false = no-op) */
	applied: boolean;
	action: "created" | "altered" | "none";
	/** Columns added by ALTER (every column for a created table) */
	added: string[];
}

// ============================================================================
// Database
// ============================================================================

export class Database {
	#driver: Driver;
	#options: ResolvedDatabaseOptions;
	#tables = new Map<string, Table<Row>>();

	constructor(driver: Driver, options?: DatabaseOptions) {
		this.#driver = driver;
		this.#options = resolveOptions(options);
	}

	get driver(): Driver {
		return this.#driver;
	}

	get options(): ResolvedDatabaseOptions {
		return this.#options;
	}

	/**
	 * Register a table together with the row class its finds construct.
	 *
	 * @example
	 * const employees = db.register(Employee, EmployeeRow);
	 * const products = db.register(Product, Row);
	 */
	register<R extends Row, T extends Table<R>>(
		table: TableClass<R, T>,
		row: RowClass<R>,
	): T {
		const instance = new table(this, row);
		const name = instance.tableName().toUpperCase();
		const existing = this.#tables.get(name);
		if (existing !== undefined) {
			throw new TableDefinitionError(
				`A table named ${name} is already registered (${existing.fullTableName()})`,
				name,
			);
		}
		this.#tables.set(name, instance);
		return instance;
	}

	/**
	 * Look up a registered table by name, case-insensitively.
	 */
	getTable(name: string): Table<Row> {
		const table = this.#tables.get(name.toUpperCase());
		if (table === undefined) {
			throw new TableDefinitionError(`No table registered as ${name}`, name);
		}
		return table;
	}

	/**
	 * Look up the registered instance of a table class.
	 */
	table<R extends Row, T extends Table<R>>(table: TableClass<R, T>): T {
		for (const instance of this.#tables.values()) {
			if (instance instanceof table) {
				return instance;
			}
		}
		throw new TableDefinitionError(
			`No table registered for ${table.name}`,
			table.name,
		);
	}

	/**
	 * Registered tables, in registration order.
	 */
	tables(): Table<Row>[] {
		return [...this.#tables.values()];
	}

	/**
	 * Fully qualified name of the table registered as `name`.
	 */
	resolveTableName(name: string): string {
		return this.getTable(name).fullTableName();
	}

	/**
	 * Create or extend every registered table, in registration order.
	 */
	async ensureSchema(): Promise<EnsureResult[]> {
		const results: EnsureResult[] = [];
		for (const table of this.#tables.values()) {
			results.push(await table.ensureSchema());
		}
		return results;
	}

	commit(): Promise<void> {
		return this.#driver.commit();
	}

	rollback(): Promise<void> {
		return this.#driver.rollback();
	}

	close(): Promise<void> {
		return this.#driver.close();
	}
}
