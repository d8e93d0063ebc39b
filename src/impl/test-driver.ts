/**
 * Scripted in-process driver for tests.
 *
 * Records every prepared statement and every execution, and answers each
 * execution from a handler. Nothing leaves the process.
 */

import type {Driver, Statement, TableInfo} from "./database.js";

// ============================================================================
// Types
// ============================================================================

/**
 * What an execution answers with. An `error` makes execute() reject with it.
 */
export interface TestResult {
	rows?: unknown[][];
	columns?: string[];
	changes?: number;
	error?: unknown;
}

export type TestHandler = (
	sql: string,
	params: readonly unknown[],
) => TestResult | undefined;

export interface TestDriverOptions {
	/** Answers executions (default: no rows, 1 change) */
	handler?: TestHandler;
	/** Catalog entries returned by tables() */
	tables?: TableInfo[];
	/** Returns a rejection value for SQL the driver should refuse to prepare */
	refuse?: (sql: string) => unknown;
}

export interface ExecutedStatement {
	sql: string;
	params: unknown[];
}

// ============================================================================
// TestDriver
// ============================================================================

export class TestDriver implements Driver {
	readonly prepared: string[] = [];
	readonly executed: ExecutedStatement[] = [];
	commits = 0;
	rollbacks = 0;
	closed = false;

	#handler: TestHandler;
	#tables: TableInfo[];
	#refuse?: (sql: string) => unknown;

	constructor(options: TestDriverOptions = {}) {
		this.#handler = options.handler ?? (() => undefined);
		this.#tables = options.tables ?? [];
		this.#refuse = options.refuse;
	}

	/**
	 * Replace the handler for subsequent executions.
	 */
	respond(handler: TestHandler): void {
		this.#handler = handler;
	}

	/**
	 * Executed SQL text only, in order.
	 */
	get statements(): string[] {
		return this.executed.map((statement) => statement.sql);
	}

	async prepare(sql: string): Promise<Statement> {
		this.prepared.push(sql);
		const refusal = this.#refuse?.(sql);
		if (refusal !== undefined) {
			throw refusal;
		}
		return new TestStatement(sql, (params) => {
			this.executed.push({sql, params: [...params]});
			return this.#handler(sql, params) ?? {};
		});
	}

	async tables(filter: {schema: string; name: string}): Promise<TableInfo[]> {
		return this.#tables.filter(
			(table) => table.schema === filter.schema && table.name === filter.name,
		);
	}

	async commit(): Promise<void> {
		this.commits++;
	}

	async rollback(): Promise<void> {
		this.rollbacks++;
	}

	async close(): Promise<void> {
		this.closed = true;
	}
}

class TestStatement implements Statement {
	readonly sql: string;
	columns: string[] = [];
	#answer: (params: readonly unknown[]) => TestResult;
	#rows: unknown[][] = [];

	constructor(sql: string, answer: (params: readonly unknown[]) => TestResult) {
		this.sql = sql;
		this.#answer = answer;
	}

	async execute(params: readonly unknown[]): Promise<number> {
		const result = this.#answer(params);
		if (result.error !== undefined) {
			throw result.error;
		}
		this.#rows = result.rows ?? [];
		this.columns = result.columns ?? [];
		return result.changes ?? (result.rows ? -1 : 1);
	}

	async fetchAll(): Promise<unknown[][]> {
		return this.#rows;
	}
}
