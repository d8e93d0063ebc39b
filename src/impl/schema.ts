/**
 * Per-table schema registry.
 *
 * Derives the column list, the name lookup and the primary and identity
 * columns from a table's column definitions. Everything is computed on first
 * use and cached until reset().
 */

import {
	columnDefinitionSchema,
	isIdentityColumn,
	type Column,
	type ColumnDefinition,
	type ColumnField,
} from "./column.js";
import {TableDefinitionError} from "./errors.js";

export class SchemaRegistry {
	readonly tableName: string;
	#load: () => readonly ColumnDefinition[];

	#columns?: readonly Column[];
	#columnList?: readonly string[];
	#byName?: ReadonlyMap<string, Column>;
	#primary?: string;
	#identity?: string | null;

	constructor(tableName: string, load: () => readonly ColumnDefinition[]) {
		this.tableName = tableName;
		this.#load = load;
	}

	/**
	 * The validated column definitions, in declaration order.
	 */
	columns(): readonly Column[] {
		if (this.#columns === undefined) {
			this.#columns = this.#parse(this.#load());
		}
		return this.#columns;
	}

	/**
	 * Column names in declaration order. The same array is returned until
	 * reset().
	 */
	columnList(): readonly string[] {
		if (this.#columnList === undefined) {
			this.#columnList = Object.freeze(this.columns().map((c) => c.name));
		}
		return this.#columnList;
	}

	/**
	 * Look up a column descriptor, or one field of it. Names are matched
	 * case-insensitively.
	 */
	getColumn(name: string): Column | undefined;
	getColumn<K extends ColumnField>(name: string, field: K): Column[K] | undefined;
	getColumn<K extends ColumnField>(
		name: string,
		field?: K,
	): Column | Column[K] | undefined {
		const column = this.#registry().get(name.toUpperCase());
		if (column === undefined || field === undefined) {
			return column;
		}
		return column[field];
	}

	hasColumn(name: string): boolean {
		return this.#registry().has(name.toUpperCase());
	}

	/**
	 * The first column flagged primary, or the last column when none is.
	 */
	primaryColumn(): string {
		if (this.#primary === undefined) {
			const columns = this.columns();
			const flagged = columns.find((c) => c.primary === true);
			this.#primary = (flagged ?? columns[columns.length - 1]).name;
		}
		return this.#primary;
	}

	/**
	 * The first column the database generates values for, or null.
	 */
	identityColumn(): string | null {
		if (this.#identity === undefined) {
			const identity = this.columns().find(isIdentityColumn);
			this.#identity = identity?.name ?? null;
		}
		return this.#identity;
	}

	/**
	 * Drop every cached derivation. The next call reloads the definitions.
	 */
	reset(): void {
		this.#columns = undefined;
		this.#columnList = undefined;
		this.#byName = undefined;
		this.#primary = undefined;
		this.#identity = undefined;
	}

	#registry(): ReadonlyMap<string, Column> {
		if (this.#byName === undefined) {
			this.#byName = new Map(this.columns().map((c) => [c.name, c]));
		}
		return this.#byName;
	}

	#parse(definitions: readonly ColumnDefinition[]): readonly Column[] {
		if (definitions.length === 0) {
			throw new TableDefinitionError(
				`Table ${this.tableName} must declare at least one column`,
				this.tableName,
			);
		}

		const columns: Column[] = [];
		const seen = new Set<string>();
		for (let i = 0; i < definitions.length; i++) {
			const result = columnDefinitionSchema.safeParse(definitions[i]);
			if (!result.success) {
				const label = describeDefinition(definitions[i], i);
				const issues = result.error.issues
					.map((issue) => `${issue.path.join(".") || "column"}: ${issue.message}`)
					.join("; ");
				throw new TableDefinitionError(
					`Invalid column ${label} in table ${this.tableName}: ${issues}`,
					this.tableName,
					label,
					{cause: result.error},
				);
			}

			const column = result.data;
			if (seen.has(column.name)) {
				throw new TableDefinitionError(
					`Column ${column.name} is declared twice in table ${this.tableName}`,
					this.tableName,
					column.name,
				);
			}
			seen.add(column.name);
			columns.push(Object.freeze(column));
		}

		return Object.freeze(columns);
	}
}

function describeDefinition(definition: ColumnDefinition, index: number): string {
	return typeof definition.name === "string" && definition.name
		? definition.name.toUpperCase()
		: `#${index}`;
}
