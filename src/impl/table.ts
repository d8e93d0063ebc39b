/**
 * Table - the gateway between rows and one database table.
 *
 * A table is declared by subclassing Table with a schema name and an ordered
 * column list:
 *
 * @example
 * class Employee extends Table<EmployeeRow> {
 *   schemaName() { return "HR"; }
 *   columns() {
 *     return [
 *       {name: "EMPNO", type: "CHAR", length: 6, options: "NOT NULL", primary: true},
 *       {name: "FIRSTNAME", type: "CHAR", length: 12, options: "NOT NULL"},
 *     ];
 *   }
 * }
 *
 * const employees = db.register(Employee, EmployeeRow);
 * const [alice] = await employees.findById("000010");
 */

import type {Column, ColumnDefinition, ColumnField} from "./column.js";
import type {Database, EnsureResult, Statement} from "./database.js";
import {buildAlterAdd, buildCreateTable, buildGrant} from "./ddl.js";
import {
	AlreadyExistsError,
	EnsureError,
	ExecutionError,
	NotFoundError,
	QueryError,
	SchemaDriftError,
	TableDefinitionError,
	TypeMismatchError,
	type EnsureOperation,
} from "./errors.js";
import {ddlLogger, sqlLogger} from "./logging.js";
import {
	Row,
	rowFromTuple,
	shapeRows,
	type RowClass,
	type RowTable,
} from "./row.js";
import {SchemaRegistry} from "./schema.js";
import {
	buildDelete,
	buildInsert,
	buildPrimaryKeyMatch,
	buildSelect,
	buildSelectDistinct,
	buildUpdate,
	replaceTableReferences,
	type SQLStatement,
	type TableReferences,
} from "./sql.js";

// ============================================================================
// Types
// ============================================================================

/**
 * A concrete Table subclass, as passed to Database.register().
 */
export type TableClass<R extends Row, T extends Table<R>> = new (
	db: Database,
	row: RowClass<R>,
) => T;

/**
 * What afterProvision() is told: the table was created, or columns were
 * added to it.
 */
export type ProvisionChange =
	| {action: "created"}
	| {action: "altered"; added: string[]};

/**
 * Result of the single-value finds: null for no match, the row for one
 * match, an array for more.
 */
export type FindResult<R> = R | R[] | null;

function messageOf(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// ============================================================================
// Table
// ============================================================================

export abstract class Table<R extends Row = Row> implements RowTable {
	readonly db: Database;
	readonly #rowClass: RowClass<R>;
	#schema?: SchemaRegistry;
	#fullTableName?: string;
	#lastError: ExecutionError | null = null;

	constructor(db: Database, row: RowClass<R>) {
		this.db = db;
		this.#rowClass = row;
	}

	// ==========================================================================
	// Declaration
	// ==========================================================================

	/**
	 * The database schema holding this table.
	 */
	abstract schemaName(): string;

	/**
	 * The ordered column definitions. Called once; the result is cached.
	 */
	abstract columns(): readonly ColumnDefinition[];

	/**
	 * The table name without schema. Defaults to the class name, upper case.
	 */
	tableName(): string {
		return this.constructor.name.toUpperCase();
	}

	/**
	 * SCHEMA.TABLE, upper case.
	 */
	fullTableName(): string {
		if (this.#fullTableName === undefined) {
			this.#fullTableName =
				`${this.schemaName()}.${this.tableName()}`.toUpperCase();
		}
		return this.#fullTableName;
	}

	// ==========================================================================
	// Schema introspection
	// ==========================================================================

	get schema(): SchemaRegistry {
		if (this.#schema === undefined) {
			this.#schema = new SchemaRegistry(this.fullTableName(), () =>
				this.columns(),
			);
		}
		return this.#schema;
	}

	columnList(): readonly string[] {
		return this.schema.columnList();
	}

	getColumn(name: string): Column | undefined;
	getColumn<K extends ColumnField>(name: string, field: K): Column[K] | undefined;
	getColumn<K extends ColumnField>(
		name: string,
		field?: K,
	): Column | Column[K] | undefined {
		return field === undefined
			? this.schema.getColumn(name)
			: this.schema.getColumn(name, field);
	}

	hasColumn(name: string): boolean {
		return this.schema.hasColumn(name);
	}

	/**
	 * The column used to match rows on save, update and delete. Override to
	 * return null for a table without a primary key.
	 */
	primaryColumn(): string | null {
		return this.schema.primaryColumn();
	}

	identityColumn(): string | null {
		return this.schema.identityColumn();
	}

	/**
	 * Drop cached schema derivations so the column list is read again.
	 */
	resetSchema(): void {
		this.#schema?.reset();
		this.#fullTableName = undefined;
	}

	/**
	 * Rewrite `!!!` and `!Name!` placeholders into full table names.
	 */
	replaceTableReferences(text: string): string {
		return replaceTableReferences(text, this.#references());
	}

	#references(): TableReferences {
		return {
			self: this.fullTableName(),
			resolve: (name) => this.db.resolveTableName(name),
		};
	}

	// ==========================================================================
	// Statement execution
	// ==========================================================================

	/**
	 * The failure of the most recent statement, or null when it succeeded.
	 */
	get lastError(): ExecutionError | null {
		return this.#lastError;
	}

	async #prepare(sql: string, params: readonly unknown[]): Promise<Statement> {
		sqlLogger.debug("{sql}", {sql, params, table: this.fullTableName()});
		try {
			return await this.db.driver.prepare(sql);
		} catch (error) {
			throw new QueryError(`Can't prepare [${sql}]: ${messageOf(error)}`, sql, {
				cause: error,
			});
		}
	}

	async #execute(
		statement: Statement,
		sql: string,
		params: readonly unknown[],
	): Promise<number | null> {
		this.#lastError = null;
		try {
			return await statement.execute(params);
		} catch (error) {
			this.#fail(error, sql);
			return null;
		}
	}

	#fail(error: unknown, sql: string): void {
		const failure = ExecutionError.from(error, sql);
		this.#lastError = failure;
		sqlLogger.warn("Statement failed on {table}: {message}", {
			table: this.fullTableName(),
			sql,
			driverCode: failure.driverCode,
			state: failure.state,
			message: failure.message,
		});
	}

	async #run({sql, params}: SQLStatement): Promise<number | null> {
		const statement = await this.#prepare(sql, params);
		return this.#execute(statement, sql, params);
	}

	async #query({sql, params}: SQLStatement): Promise<unknown[][] | null> {
		const statement = await this.#prepare(sql, params);
		if ((await this.#execute(statement, sql, params)) === null) {
			return null;
		}
		try {
			return await statement.fetchAll();
		} catch (error) {
			this.#fail(error, sql);
			return null;
		}
	}

	// ==========================================================================
	// Raw queries
	// ==========================================================================

	/**
	 * SELECT <columns> FROM this table [WHERE <where>], as positional tuples.
	 * Returns null when execution fails (see lastError).
	 *
	 * @example
	 * await employees.select("MAX(SALARY)", "LASTNAME = ?", "Smith");
	 */
	async select(
		columns: string,
		where?: string | null,
		...params: unknown[]
	): Promise<unknown[][] | null> {
		return this.#query(
			buildSelect(columns, this.fullTableName(), where, params, this.#references()),
		);
	}

	/**
	 * Like select(), returning distinct tuples only.
	 */
	async selectDistinct(
		columns: string,
		where?: string | null,
		...params: unknown[]
	): Promise<unknown[][] | null> {
		return this.#query(
			buildSelectDistinct(
				columns,
				this.fullTableName(),
				where,
				params,
				this.#references(),
			),
		);
	}

	/**
	 * SELECT over joined tables. `!!!` and `!Name!` in the table and WHERE
	 * text are replaced with full table names.
	 */
	async selectJoin(
		columns: string,
		tables: string,
		where?: string | null,
		...params: unknown[]
	): Promise<unknown[][] | null> {
		return this.#query(
			buildSelect(
				columns,
				this.replaceTableReferences(tables),
				where,
				params,
				this.#references(),
			),
		);
	}

	/**
	 * Number of rows in the table, or null when the query fails.
	 */
	async count(): Promise<number | null> {
		return firstNumber(await this.select("COUNT(*)"));
	}

	/**
	 * Number of rows matching the WHERE text and its bind values.
	 */
	async countWhere(where: string, ...params: unknown[]): Promise<number | null> {
		return firstNumber(await this.select("COUNT(*)", where, ...params));
	}

	// ==========================================================================
	// Finds
	// ==========================================================================

	/**
	 * Rows whose primary column matches any of the given values.
	 */
	async findById(...ids: unknown[]): Promise<R[]> {
		if (ids.length === 0) {
			return [];
		}
		const primary = this.#requirePrimary("findById");
		return this.findAll(buildPrimaryKeyMatch(primary, ids.length), ...ids);
	}

	/**
	 * Every row matching the WHERE text. Empty when nothing matches or the
	 * query fails (see lastError).
	 */
	findAll(where?: string | null, ...params: unknown[]): Promise<R[]> {
		return this.findJoinAll(this.fullTableName(), where, ...params);
	}

	/**
	 * Rows matching the WHERE text: null for none, the row itself for one,
	 * an array for several.
	 */
	async findWhere(
		where?: string | null,
		...params: unknown[]
	): Promise<FindResult<R>> {
		return shapeRows(await this.findAll(where, ...params));
	}

	/**
	 * The first row matching the WHERE text, or null.
	 */
	async findOne(where?: string | null, ...params: unknown[]): Promise<R | null> {
		const rows = await this.findAll(where, ...params);
		return rows.length > 0 ? rows[0] : null;
	}

	/**
	 * Rows of this table selected from a join. When the join text aliases
	 * this table (`!!! AS e`), the selected columns use the alias.
	 *
	 * @example
	 * await employees.findJoinAll(
	 *   "!!! AS e JOIN !Department! AS d ON e.WORKDEPT = d.DEPTNO",
	 *   "d.DEPTNAME = ?",
	 *   "PLANNING",
	 * );
	 */
	async findJoinAll(
		tables: string,
		where?: string | null,
		...params: unknown[]
	): Promise<R[]> {
		const prefix = this.#aliasPrefix(tables);
		const columns = this.columnList()
			.map((column) => prefix + column)
			.join(", ");
		const rows = await this.#query(
			buildSelectDistinct(
				columns,
				this.replaceTableReferences(tables),
				where,
				params,
				this.#references(),
			),
		);
		if (rows === null) {
			return [];
		}
		return rows.map((tuple) => rowFromTuple(this, this.#rowClass, tuple));
	}

	/**
	 * findJoinAll() with the single-value result shape of findWhere().
	 */
	async findJoin(
		tables: string,
		where?: string | null,
		...params: unknown[]
	): Promise<FindResult<R>> {
		return shapeRows(await this.findJoinAll(tables, where, ...params));
	}

	#aliasPrefix(tables: string): string {
		const patterns = [
			/!!!\s+AS\s+(\w+)/i,
			new RegExp(`${escapeRegExp(this.fullTableName())}\\s+AS\\s+(\\w+)`, "i"),
			new RegExp(`\\b${escapeRegExp(this.tableName())}\\s+AS\\s+(\\w+)`, "i"),
		];
		for (const pattern of patterns) {
			const match = pattern.exec(tables);
			if (match) {
				return `${match[1]}.`;
			}
		}
		return "";
	}

	#requirePrimary(operation: string): string {
		const primary = this.primaryColumn();
		if (primary === null) {
			throw new TableDefinitionError(
				`${operation} needs a primary column, and ${this.fullTableName()} has none`,
				this.fullTableName(),
			);
		}
		return primary;
	}

	// ==========================================================================
	// Rows
	// ==========================================================================

	/**
	 * A new, unsaved row holding each column's default. Identity columns are
	 * left for the database to fill.
	 */
	createRow(): R {
		const defaults = this.columnList().map((column) =>
			this.getColumn(column, "default"),
		);
		return rowFromTuple(this, this.#rowClass, defaults);
	}

	/**
	 * Store a row: update its modified columns when a row with its primary
	 * key value exists, insert it otherwise.
	 *
	 * Existence is decided by the primary key value alone, so a new row that
	 * collides with a stored key becomes an update. Use insert() or update()
	 * to state the intent instead.
	 *
	 * Resolves to the affected row count (0 when nothing was modified), or
	 * null when a statement fails (see lastError).
	 */
	async save(row: R): Promise<number | null> {
		this.#checkRow(row);
		const exists = await this.#exists(row);
		if (exists === null) {
			return null;
		}
		return exists > 0 ? this.#update(row) : this.#insert(row);
	}

	/**
	 * Insert a row, refusing a primary key value that is already stored.
	 */
	async insert(row: R): Promise<number | null> {
		this.#checkRow(row);
		const exists = await this.#exists(row);
		if (exists === null) {
			return null;
		}
		if (exists > 0) {
			throw new AlreadyExistsError(
				this.fullTableName(),
				this.primaryColumn() ?? undefined,
				row.primaryColumnValue(),
			);
		}
		return this.#insert(row);
	}

	/**
	 * Update a stored row's modified columns, refusing a row that is not
	 * stored.
	 */
	async update(row: R): Promise<number | null> {
		this.#checkRow(row);
		this.#requirePrimary("update");
		const exists = await this.#exists(row);
		if (exists === null) {
			return null;
		}
		if (exists === 0) {
			throw new NotFoundError(this.fullTableName(), row.primaryColumnValue());
		}
		return this.#update(row);
	}

	/**
	 * Delete a row if it is stored. Resolves to 0 when it is not.
	 */
	async delete(row: R): Promise<number | null> {
		this.#checkRow(row);
		const exists = await this.#exists(row);
		if (exists === null || exists === 0) {
			return exists;
		}
		const statement = buildDelete(
			this.fullTableName(),
			this.primaryColumn(),
			row.primaryColumnValue(),
		);
		return statement === null ? 0 : this.#run(statement);
	}

	commit(): Promise<void> {
		return this.db.driver.commit();
	}

	rollback(): Promise<void> {
		return this.db.driver.rollback();
	}

	#checkRow(row: unknown): void {
		if (row instanceof Row && row.table === this) {
			return;
		}
		const received =
			row instanceof Row
				? `row of ${row.table.fullTableName()}`
				: row === null
					? "null"
					: typeof row === "object"
						? row.constructor.name
						: typeof row;
		throw new TypeMismatchError(this.fullTableName(), received);
	}

	async #exists(row: R): Promise<number | null> {
		const primary = this.primaryColumn();
		if (primary === null) {
			return 0;
		}
		return this.countWhere(`${primary} IN ?`, row.primaryColumnValue() ?? null);
	}

	async #insert(row: R): Promise<number | null> {
		const result = await this.#run(
			buildInsert(this.fullTableName(), this.schema, (column) => row.get(column)),
		);
		if (result !== null) {
			row.markClean();
		}
		return result;
	}

	async #update(row: R): Promise<number | null> {
		const primary = this.primaryColumn();
		if (primary === null) {
			return 0;
		}
		const statement = buildUpdate(
			this.fullTableName(),
			primary,
			row.modifiedColumns(),
			(column) => row.get(column),
		);
		if (statement === null) {
			return 0;
		}
		const result = await this.#run(statement);
		if (result !== null) {
			row.markClean();
		}
		return result;
	}

	// ==========================================================================
	// Provisioning
	// ==========================================================================

	/**
	 * Whether the catalog lists this table.
	 */
	async tableExists(): Promise<boolean> {
		const matches = await this.db.driver.tables({
			schema: this.schemaName().toUpperCase(),
			name: this.tableName().toUpperCase(),
		});
		if (matches.length > 1) {
			throw new SchemaDriftError(
				`The catalog lists ${matches.length} tables named ${this.fullTableName()}`,
				{table: this.fullTableName(), drift: "duplicate catalog entries"},
			);
		}
		return matches.length === 1;
	}

	/**
	 * Column names the stored table has, or [] when it does not exist.
	 */
	async currentColumns(): Promise<string[]> {
		if (!(await this.tableExists())) {
			return [];
		}
		return (await this.#probeColumns()) ?? [];
	}

	/**
	 * Column names of an existing table, or null when the probe fails (see
	 * lastError).
	 */
	async #probeColumns(): Promise<string[] | null> {
		const sql = `SELECT * FROM ${this.fullTableName()} WHERE 1 = 0`;
		const statement = await this.#prepare(sql, []);
		if ((await this.#execute(statement, sql, [])) === null) {
			return null;
		}
		return statement.columns.map((column) => column.toUpperCase());
	}

	/**
	 * Create the table when it does not exist, or add the declared columns
	 * it lacks, then call afterProvision() once for the change.
	 */
	async ensureSchema(): Promise<EnsureResult> {
		const tableName = this.fullTableName();
		const refs = this.#references();

		if (!(await this.tableExists())) {
			const sql = buildCreateTable(
				tableName,
				this.schema.columns(),
				this.primaryColumn(),
				refs,
			);
			if (!(await this.runDDL(sql, "createTable"))) {
				return {applied: false, action: "none", added: []};
			}
			await this.afterProvision({action: "created"});
			return {applied: true, action: "created", added: [...this.columnList()]};
		}

		const probed = await this.#probeColumns();
		if (probed === null || probed.length === 0) {
			ddlLogger.warn("Can't read the columns of {table}; leaving it unchanged", {
				table: tableName,
			});
			return {applied: false, action: "none", added: []};
		}
		const current = new Set(probed);
		const missing = this.schema.columns().filter((c) => !current.has(c.name));
		const statements = buildAlterAdd(tableName, missing, refs);
		const added: string[] = [];
		for (let i = 0; i < statements.length; i++) {
			if (await this.runDDL(statements[i], "alterTable", i)) {
				added.push(missing[i].name);
			}
		}
		if (added.length === 0) {
			return {applied: false, action: "none", added};
		}
		await this.afterProvision({action: "altered", added});
		return {applied: true, action: "altered", added};
	}

	/**
	 * Runs once after each successful CREATE or ALTER. The default grants
	 * SELECT, INSERT, UPDATE and DELETE on a new table to the `grantTo` user
	 * (NOBODY unless configured otherwise).
	 */
	protected async afterProvision(change: ProvisionChange): Promise<void> {
		const grantee = this.db.options.grantTo;
		if (change.action === "created" && grantee !== null) {
			await this.runDDL(buildGrant(this.fullTableName(), grantee), "grant");
		}
	}

	/**
	 * Run one DDL statement. Failures are logged and reported as false, or
	 * raised as EnsureError under `ddlErrors: "throw"`.
	 */
	protected async runDDL(
		sql: string,
		operation: EnsureOperation,
		step = 0,
	): Promise<boolean> {
		const table = this.fullTableName();
		ddlLogger.info("{sql}", {sql, table});
		try {
			const statement = await this.db.driver.prepare(sql);
			await statement.execute([]);
			return true;
		} catch (error) {
			const failure = ExecutionError.from(error, sql);
			ddlLogger.error(
				"{operation} failed for {table}: {driverCode}[{state}] {message}",
				{
					operation,
					table,
					sql,
					driverCode: failure.driverCode,
					state: failure.state,
					message: failure.message,
				},
			);
			if (this.db.options.ddlErrors === "throw") {
				throw new EnsureError(
					`${operation} failed for ${table}: ${failure.message}`,
					{operation, table, step, sql},
					{cause: failure},
				);
			}
			return false;
		}
	}
}

function firstNumber(rows: unknown[][] | null): number | null {
	if (rows === null || rows.length === 0 || rows[0].length === 0) {
		return null;
	}
	const value = rows[0][0];
	return value === null || value === undefined ? null : Number(value);
}
