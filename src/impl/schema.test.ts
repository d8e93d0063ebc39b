import {describe, expect, test} from "vitest";
import type {ColumnDefinition} from "./column.js";
import {TableDefinitionError} from "./errors.js";
import {SchemaRegistry} from "./schema.js";

const employee: ColumnDefinition[] = [
	{name: "EMPNO", type: "CHAR", length: 6, options: "NOT NULL", primary: true},
	{name: "firstname", type: "CHAR", length: 12, options: "NOT NULL"},
	{name: "SALARY", type: "DECIMAL", length: "8,2"},
];

describe("SchemaRegistry", () => {
	test("column list keeps declaration order and upper-cases names", () => {
		const schema = new SchemaRegistry("HR.EMPLOYEE", () => employee);
		expect(schema.columnList()).toEqual(["EMPNO", "FIRSTNAME", "SALARY"]);
	});

	test("column list is cached", () => {
		let loads = 0;
		const schema = new SchemaRegistry("HR.EMPLOYEE", () => {
			loads++;
			return employee;
		});
		expect(schema.columnList()).toBe(schema.columnList());
		expect(loads).toBe(1);
	});

	test("reset reloads the definitions", () => {
		let loads = 0;
		const schema = new SchemaRegistry("HR.EMPLOYEE", () => {
			loads++;
			return employee;
		});
		const first = schema.columnList();
		schema.reset();
		expect(schema.columnList()).not.toBe(first);
		expect(loads).toBe(2);
	});

	test("getColumn is case-insensitive", () => {
		const schema = new SchemaRegistry("HR.EMPLOYEE", () => employee);
		expect(schema.getColumn("salary")).toEqual({
			name: "SALARY",
			type: "DECIMAL",
			length: "8,2",
		});
		expect(schema.getColumn("Empno", "length")).toBe(6);
		expect(schema.getColumn("SALARY", "options")).toBeUndefined();
		expect(schema.getColumn("BONUS")).toBeUndefined();
		expect(schema.hasColumn("FirstName")).toBe(true);
		expect(schema.hasColumn("BONUS")).toBe(false);
	});

	test("column descriptors are frozen", () => {
		const schema = new SchemaRegistry("HR.EMPLOYEE", () => employee);
		const column = schema.getColumn("EMPNO");
		expect(Object.isFrozen(column)).toBe(true);
		expect(Object.isFrozen(schema.columns())).toBe(true);
	});

	describe("primary column", () => {
		test("first flagged column", () => {
			const schema = new SchemaRegistry("HR.T", () => [
				{name: "A", type: "INTEGER"},
				{name: "B", type: "INTEGER", primary: true},
				{name: "C", type: "INTEGER", primary: true},
			]);
			expect(schema.primaryColumn()).toBe("B");
		});

		test("last column when none is flagged", () => {
			const schema = new SchemaRegistry("HR.T", () => [
				{name: "A", type: "INTEGER"},
				{name: "B", type: "INTEGER"},
			]);
			expect(schema.primaryColumn()).toBe("B");
		});
	});

	describe("identity column", () => {
		test("generatedIdentity marks the column", () => {
			const schema = new SchemaRegistry("HR.PRODUCT", () => [
				{name: "PRODNAME", type: "VARCHAR", length: 30},
				{name: "PRODID", type: "INTEGER", generatedIdentity: null},
			]);
			expect(schema.identityColumn()).toBe("PRODID");
		});

		test("an identity clause in options marks the column", () => {
			const schema = new SchemaRegistry("HR.PRODUCT", () => [
				{
					name: "PRODID",
					type: "INTEGER",
					options: "NOT NULL generated always as identity",
				},
				{name: "PRODNAME", type: "VARCHAR", length: 30},
			]);
			expect(schema.identityColumn()).toBe("PRODID");
		});

		test("null without one", () => {
			const schema = new SchemaRegistry("HR.EMPLOYEE", () => employee);
			expect(schema.identityColumn()).toBeNull();
		});
	});

	describe("invalid definitions", () => {
		test("no columns", () => {
			const schema = new SchemaRegistry("HR.EMPTY", () => []);
			expect(() => schema.columns()).toThrow(
				"Table HR.EMPTY must declare at least one column",
			);
		});

		test("duplicate names, in any case", () => {
			const schema = new SchemaRegistry("HR.T", () => [
				{name: "A", type: "INTEGER"},
				{name: "a", type: "CHAR"},
			]);
			expect(() => schema.columnList()).toThrow(
				"Column A is declared twice in table HR.T",
			);
		});

		test("a name that is not an identifier", () => {
			const schema = new SchemaRegistry("HR.T", () => [
				{name: "BAD NAME", type: "INTEGER"},
			]);
			let error: unknown;
			try {
				schema.columns();
			} catch (err) {
				error = err;
			}
			expect(error).toBeInstanceOf(TableDefinitionError);
			expect(error).toMatchObject({
				tableName: "HR.T",
				fieldName: "BAD NAME",
				message:
					"Invalid column BAD NAME in table HR.T: name: must be a plain SQL identifier",
			});
		});

		test("a length that is not positive", () => {
			const schema = new SchemaRegistry("HR.T", () => [
				{name: "A", type: "CHAR", length: 0},
			]);
			expect(() => schema.columns()).toThrow(TableDefinitionError);
		});
	});
});
