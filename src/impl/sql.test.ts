import {describe, expect, test} from "vitest";
import {SchemaRegistry} from "./schema.js";
import {
	buildDelete,
	buildInsert,
	buildPrimaryKeyMatch,
	buildSelect,
	buildSelectDistinct,
	buildUpdate,
	insertColumns,
	replaceTableReferences,
	type TableReferences,
} from "./sql.js";

const refs: TableReferences = {
	self: "HR.EMPLOYEE",
	resolve: (name) => `HR.${name.toUpperCase()}`,
};

describe("replaceTableReferences", () => {
	test("self and named references", () => {
		expect(
			replaceTableReferences("!!!.WORKDEPT = !Department!.DEPTNO", refs),
		).toBe("HR.EMPLOYEE.WORKDEPT = HR.DEPARTMENT.DEPTNO");
	});

	test("text without references is unchanged", () => {
		expect(replaceTableReferences("SALARY > ? AND NAME <> 'Hi!'", refs)).toBe(
			"SALARY > ? AND NAME <> 'Hi!'",
		);
	});

	test("unknown names surface the resolver's error", () => {
		const strict: TableReferences = {
			self: "HR.EMPLOYEE",
			resolve: (name) => {
				throw new Error(`No table registered as ${name}`);
			},
		};
		expect(() => replaceTableReferences("!Nope!", strict)).toThrow(
			"No table registered as Nope",
		);
	});
});

describe("SELECT", () => {
	test("without WHERE", () => {
		expect(buildSelect("COUNT(*)", "HR.EMPLOYEE", undefined, [], refs)).toEqual({
			sql: "SELECT COUNT(*) FROM HR.EMPLOYEE",
			params: [],
		});
	});

	test("an empty WHERE is left out", () => {
		expect(buildSelect("*", "HR.EMPLOYEE", "", [], refs).sql).toBe(
			"SELECT * FROM HR.EMPLOYEE",
		);
	});

	test("WHERE references are substituted", () => {
		expect(
			buildSelect(
				"EMPNO",
				"HR.EMPLOYEE",
				"WORKDEPT IN (SELECT DEPTNO FROM !Department!) AND SALARY > ?",
				[50000],
				refs,
			),
		).toEqual({
			sql: "SELECT EMPNO FROM HR.EMPLOYEE WHERE WORKDEPT IN (SELECT DEPTNO FROM HR.DEPARTMENT) AND SALARY > ?",
			params: [50000],
		});
	});

	test("DISTINCT", () => {
		expect(
			buildSelectDistinct("LASTNAME", "HR.EMPLOYEE", "SALARY > ?", [1], refs).sql,
		).toBe("SELECT DISTINCT LASTNAME FROM HR.EMPLOYEE WHERE SALARY > ?");
	});

	test("primary key match", () => {
		expect(buildPrimaryKeyMatch("EMPNO", 1)).toBe("EMPNO IN (?)");
		expect(buildPrimaryKeyMatch("EMPNO", 3)).toBe("EMPNO IN (?, ?, ?)");
	});
});

describe("INSERT", () => {
	const product = new SchemaRegistry("HR.PRODUCT", () => [
		{name: "CREATED", type: "TIMESTAMP", noCreate: true},
		{name: "PRODNAME", type: "VARCHAR", length: 30},
		{name: "BASEPRICE", type: "DECIMAL", length: "8,2"},
		{name: "PRODID", type: "INTEGER", generatedIdentity: true},
	]);

	test("skips noCreate and identity columns", () => {
		expect(insertColumns(product)).toEqual(["PRODNAME", "BASEPRICE"]);
	});

	test("binds every inserted column, unset ones as null", () => {
		const values: Record<string, unknown> = {PRODNAME: "Widget", PRODID: 7};
		expect(buildInsert("HR.PRODUCT", product, (column) => values[column])).toEqual(
			{
				sql: "INSERT INTO HR.PRODUCT (PRODNAME, BASEPRICE) VALUES(?, ?)",
				params: ["Widget", null],
			},
		);
	});
});

describe("UPDATE", () => {
	const values: Record<string, unknown> = {
		EMPNO: "000010",
		LASTNAME: "HAAS",
		SALARY: 52750,
	};

	test("sets modified columns in order and matches the primary key last", () => {
		expect(
			buildUpdate(
				"HR.EMPLOYEE",
				"EMPNO",
				["SALARY", "LASTNAME"],
				(column) => values[column],
			),
		).toEqual({
			sql: "UPDATE HR.EMPLOYEE SET SALARY = ?, LASTNAME = ? WHERE EMPNO IN ?",
			params: [52750, "HAAS", "000010"],
		});
	});

	test("never sets the primary column", () => {
		expect(
			buildUpdate("HR.EMPLOYEE", "EMPNO", ["EMPNO", "SALARY"], (c) => values[c])
				?.sql,
		).toBe("UPDATE HR.EMPLOYEE SET SALARY = ? WHERE EMPNO IN ?");
	});

	test("null when nothing is modified", () => {
		expect(buildUpdate("HR.EMPLOYEE", "EMPNO", [], (c) => values[c])).toBeNull();
		expect(
			buildUpdate("HR.EMPLOYEE", "EMPNO", ["EMPNO"], (c) => values[c]),
		).toBeNull();
	});
});

describe("DELETE", () => {
	test("matches the primary key", () => {
		expect(buildDelete("HR.EMPLOYEE", "EMPNO", "000010")).toEqual({
			sql: "DELETE FROM HR.EMPLOYEE WHERE EMPNO IN ?",
			params: ["000010"],
		});
	});

	test("null without a primary column", () => {
		expect(buildDelete("HR.AUDITLOG", null, undefined)).toBeNull();
	});
});
