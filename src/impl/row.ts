/**
 * Rows and row construction.
 *
 * A Row holds one value per column of its table and remembers which columns
 * were set since it was loaded or last saved. The dirty set drives partial
 * UPDATEs.
 */

import {TableDefinitionError} from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/** Column values keyed by column name. */
export type RowValues = Record<string, unknown>;

/**
 * What a row needs from its table. Implemented by Table.
 */
export interface RowTable {
	fullTableName(): string;
	columnList(): readonly string[];
	hasColumn(name: string): boolean;
	primaryColumn(): string | null;
	save(row: Row): Promise<number | null>;
	delete(row: Row): Promise<number | null>;
}

/**
 * A row class registered for a table, e.g. `db.register(Employee, EmployeeRow)`.
 */
export type RowClass<R extends Row> = new (table: RowTable, values?: RowValues) => R;

// ============================================================================
// Row
// ============================================================================

export class Row {
	readonly table: RowTable;
	#values = new Map<string, unknown>();
	#modified = new Set<string>();

	constructor(table: RowTable, values: RowValues = {}) {
		this.table = table;
		for (const [name, value] of Object.entries(values)) {
			this.#values.set(this.#column(name), value);
		}
	}

	/**
	 * Read a column. Columns that were never set read as undefined.
	 */
	get(name: string): unknown {
		return this.#values.get(this.#column(name));
	}

	/**
	 * Write a column and mark it modified.
	 */
	set(name: string, value: unknown): this {
		const column = this.#column(name);
		this.#values.set(column, value);
		this.#modified.add(column);
		return this;
	}

	/**
	 * Whether a column holds a value (null counts, undefined does not). Rows
	 * built by rowFromTuple() leave NULL columns unset, so has() is false for
	 * them.
	 */
	has(name: string): boolean {
		return this.#values.get(this.#column(name)) !== undefined;
	}

	/**
	 * With a name, whether that column was modified; without, whether any was.
	 */
	isModified(name?: string): boolean {
		if (name === undefined) {
			return this.#modified.size > 0;
		}
		return this.#modified.has(this.#column(name));
	}

	/**
	 * Modified column names, in the order they were first set.
	 */
	modifiedColumns(): string[] {
		return [...this.#modified];
	}

	primaryColumnValue(): unknown {
		const primary = this.table.primaryColumn();
		return primary === null ? undefined : this.#values.get(primary);
	}

	/**
	 * Forget modifications. Called by the table after a successful write.
	 */
	markClean(): void {
		this.#modified.clear();
	}

	save(): Promise<number | null> {
		return this.table.save(this);
	}

	delete(): Promise<number | null> {
		return this.table.delete(this);
	}

	toJSON(): RowValues {
		const json: RowValues = {};
		for (const column of this.table.columnList()) {
			json[column] = this.#values.get(column) ?? null;
		}
		return json;
	}

	#column(name: string): string {
		const column = name.toUpperCase();
		if (!this.table.hasColumn(column)) {
			throw new TableDefinitionError(
				`Table ${this.table.fullTableName()} has no column ${column}`,
				this.table.fullTableName(),
				column,
			);
		}
		return column;
	}
}

// ============================================================================
// Row construction
// ============================================================================

/**
 * Build a row from a positional tuple in column-list order.
 *
 * null and undefined entries stay unset; strings lose trailing whitespace,
 * which fixed-width CHAR columns come back padded with.
 */
export function rowFromTuple<R extends Row>(
	table: RowTable,
	rowClass: RowClass<R>,
	tuple: readonly unknown[],
): R {
	const columns = table.columnList();
	const values: RowValues = {};
	for (let i = 0; i < columns.length; i++) {
		const value = tuple[i];
		if (value === null || value === undefined) continue;
		values[columns[i]] = typeof value === "string" ? value.trimEnd() : value;
	}
	return new rowClass(table, values);
}

/**
 * The single-value calling convention: no rows gives null, one row gives the
 * row itself, more give the array.
 */
export function shapeRows<R>(rows: R[]): R | R[] | null {
	if (rows.length === 0) {
		return null;
	}
	if (rows.length === 1) {
		return rows[0];
	}
	return rows;
}
