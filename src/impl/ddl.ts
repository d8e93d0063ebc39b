/**
 * DDL generation from column definitions.
 *
 * The output is literal SQL text that existing deployed tables were created
 * from, so the shapes here (spacing included) must not drift.
 */

import {
	asList,
	DEFAULT_IDENTITY,
	isBoolColumn,
	type Column,
} from "./column.js";
import {replaceTableReferences, type TableReferences} from "./sql.js";

/** Table-level options closing every CREATE TABLE. */
export const TABLE_OPTIONS = "DATA CAPTURE NONE";

/**
 * Render the identity clause for a generated column, or "" when the column
 * carries no identity marker.
 */
function identityClause(column: Column): string {
	const directive = column.generatedIdentity;
	if (directive === undefined) {
		return "";
	}
	if (directive === null || directive === true || directive === "default") {
		return ` GENERATED ALWAYS AS IDENTITY ${DEFAULT_IDENTITY}`;
	}
	const text = directive.trim();
	return ` GENERATED ALWAYS AS IDENTITY ${text.startsWith("(") ? text : `(${text})`}`;
}

/**
 * Generate a single column definition, shared by CREATE and ALTER.
 *
 * @example
 * // {name: "ACTIVE", type: "BOOL", length: 1}
 * // ACTIVE CHAR (1) CHECK (ACTIVE IN ('Y','N'))
 */
export function buildColumnDefinition(
	column: Column,
	refs: TableReferences,
): string {
	const bool = isBoolColumn(column);
	let definition = `${column.name} ${bool ? "CHAR" : column.type}`;
	if (column.length !== undefined) {
		definition += ` (${column.length})`;
	}
	if (column.options) {
		definition += ` ${column.options}`;
	}
	if (bool) {
		definition += ` CHECK (${column.name} IN ('Y','N'))`;
	}
	definition += identityClause(column);
	return replaceTableReferences(definition, refs);
}

/**
 * Generate CREATE TABLE: column definitions, then CONSTRAINT clauses and the
 * primary key, then FOREIGN KEY clauses, then the table options.
 */
export function buildCreateTable(
	tableName: string,
	columns: readonly Column[],
	primary: string | null,
	refs: TableReferences,
): string {
	const definitions: string[] = [];
	const constraints: string[] = [];
	const foreignKeys: string[] = [];

	for (const column of columns) {
		definitions.push(buildColumnDefinition(column, refs));
		for (const constraint of asList(column.constraint)) {
			constraints.push(replaceTableReferences(`CONSTRAINT ${constraint}`, refs));
		}
		for (const reference of asList(column.foreignKey)) {
			foreignKeys.push(
				replaceTableReferences(
					`FOREIGN KEY (${column.name}) REFERENCES ${reference}`,
					refs,
				),
			);
		}
	}

	if (primary !== null) {
		constraints.push(`PRIMARY KEY (${primary})`);
	}

	const body = [...definitions, ...constraints, ...foreignKeys].join(", ");
	return `CREATE TABLE ${tableName} (${body}) ${TABLE_OPTIONS}`;
}

/**
 * Generate one ALTER TABLE ... ADD statement per column.
 */
export function buildAlterAdd(
	tableName: string,
	columns: readonly Column[],
	refs: TableReferences,
): string[] {
	return columns.map(
		(column) =>
			`ALTER TABLE ${tableName} ADD ${buildColumnDefinition(column, refs)}`,
	);
}

/**
 * Generate the default post-create grant.
 */
export function buildGrant(tableName: string, user: string): string {
	return `GRANT SELECT,INSERT,UPDATE,DELETE ON TABLE ${tableName} TO USER ${user}`;
}
