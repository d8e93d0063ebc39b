/**
 * DML statement builders.
 *
 * Builders only assemble SQL text and the ordered list of bind values.
 * Every value goes through a `?` placeholder; nothing is interpolated.
 * Execution happens in Table, through the driver.
 */

import type {SchemaRegistry} from "./schema.js";

// ============================================================================
// Types
// ============================================================================

/**
 * SQL text with its bind values, in placeholder order.
 */
export interface SQLStatement {
	sql: string;
	params: unknown[];
}

/**
 * Resolves table-reference placeholders in free-text SQL.
 */
export interface TableReferences {
	/** Fully qualified name substituted for `!!!` */
	readonly self: string;
	/** Fully qualified name of the table registered as `name` */
	resolve(name: string): string;
}

// ============================================================================
// Table-reference substitution
// ============================================================================

const SELF_REFERENCE = /!!!/g;
const TABLE_REFERENCE = /!(\S+?)!/g;

/**
 * Rewrite `!!!` to this table's full name, then `!name!` to the full name of
 * the table registered as `name`.
 *
 * @example
 * replaceTableReferences("!!!.DEPTNO = !Department!.DEPTNO", refs)
 * // "HR.EMPLOYEE.DEPTNO = HR.DEPARTMENT.DEPTNO"
 */
export function replaceTableReferences(
	text: string,
	refs: TableReferences,
): string {
	return text
		.replace(SELF_REFERENCE, () => refs.self)
		.replace(TABLE_REFERENCE, (_match, name: string) => refs.resolve(name));
}

// ============================================================================
// SELECT
// ============================================================================

function select(
	keyword: string,
	columns: string,
	from: string,
	where: string | null | undefined,
	params: readonly unknown[],
	refs: TableReferences,
): SQLStatement {
	let sql = `${keyword} ${columns} FROM ${from}`;
	if (where) {
		sql += ` WHERE ${replaceTableReferences(where, refs)}`;
	}
	return {sql, params: [...params]};
}

/**
 * Build: SELECT <columns> FROM <from> [WHERE <where>]
 */
export function buildSelect(
	columns: string,
	from: string,
	where: string | null | undefined,
	params: readonly unknown[],
	refs: TableReferences,
): SQLStatement {
	return select("SELECT", columns, from, where, params, refs);
}

/**
 * Build: SELECT DISTINCT <columns> FROM <from> [WHERE <where>]
 */
export function buildSelectDistinct(
	columns: string,
	from: string,
	where: string | null | undefined,
	params: readonly unknown[],
	refs: TableReferences,
): SQLStatement {
	return select("SELECT DISTINCT", columns, from, where, params, refs);
}

/**
 * Build: <primary> IN (?, ?, ...) for a lookup by primary key values.
 */
export function buildPrimaryKeyMatch(primary: string, count: number): string {
	return `${primary} IN (${Array.from({length: count}, () => "?").join(", ")})`;
}

// ============================================================================
// INSERT / UPDATE / DELETE
// ============================================================================

/**
 * Columns an INSERT writes: every column except `noCreate` columns and the
 * identity column.
 */
export function insertColumns(schema: SchemaRegistry): string[] {
	const identity = schema.identityColumn();
	return schema
		.columns()
		.filter((column) => !column.noCreate && column.name !== identity)
		.map((column) => column.name);
}

/**
 * Build: INSERT INTO <table> (<col1>, <col2>) VALUES(?, ?)
 */
export function buildInsert(
	tableName: string,
	schema: SchemaRegistry,
	values: (column: string) => unknown,
): SQLStatement {
	const columns = insertColumns(schema);
	const sql =
		`INSERT INTO ${tableName} (${columns.join(", ")})` +
		` VALUES(${columns.map(() => "?").join(", ")})`;
	return {sql, params: columns.map((column) => values(column) ?? null)};
}

/**
 * Build: UPDATE <table> SET <col1> = ?, <col2> = ? WHERE <primary> IN ?
 *
 * The primary column is never rewritten. Returns null when there is nothing
 * to set.
 */
export function buildUpdate(
	tableName: string,
	primary: string,
	modified: Iterable<string>,
	values: (column: string) => unknown,
): SQLStatement | null {
	const sets: string[] = [];
	const params: unknown[] = [];
	for (const column of modified) {
		if (column === primary) continue;
		sets.push(`${column} = ?`);
		params.push(values(column) ?? null);
	}

	if (sets.length === 0) {
		return null;
	}

	params.push(values(primary) ?? null);
	return {
		sql: `UPDATE ${tableName} SET ${sets.join(", ")} WHERE ${primary} IN ?`,
		params,
	};
}

/**
 * Build: DELETE FROM <table> WHERE <primary> IN ?
 *
 * Returns null for a table without a primary column.
 */
export function buildDelete(
	tableName: string,
	primary: string | null,
	value: unknown,
): SQLStatement | null {
	if (primary === null) {
		return null;
	}
	return {
		sql: `DELETE FROM ${tableName} WHERE ${primary} IN ?`,
		params: [value ?? null],
	};
}
