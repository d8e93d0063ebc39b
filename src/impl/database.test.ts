import {describe, expect, test} from "vitest";
import {
	Department,
	Employee,
	EmployeeRow,
	setup,
} from "../../test/fixtures/tables.js";
import {Database} from "./database.js";
import {ConfigurationError, TableDefinitionError} from "./errors.js";
import {Row} from "./row.js";
import {TestDriver} from "./test-driver.js";

describe("Database", () => {
	test("default options", () => {
		const db = new Database(new TestDriver());
		expect(db.options).toEqual({ddlErrors: "log", grantTo: "NOBODY"});
	});

	test("invalid options are refused", () => {
		expect(() => new Database(new TestDriver(), {grantTo: "SOME USER"})).toThrow(
			ConfigurationError,
		);
		expect(() => new Database(new TestDriver(), {grantTo: "SOME USER"})).toThrow(
			"Invalid database options: grantTo: must be a plain SQL identifier",
		);
	});

	describe("registry", () => {
		test("register returns the table instance", () => {
			const db = new Database(new TestDriver());
			const employees = db.register(Employee, EmployeeRow);
			expect(employees).toBeInstanceOf(Employee);
			expect(employees.db).toBe(db);
			expect(db.tables()).toEqual([employees]);
		});

		test("a name is registered once", () => {
			const db = new Database(new TestDriver());
			db.register(Employee, EmployeeRow);
			expect(() => db.register(Employee, EmployeeRow)).toThrow(
				"A table named EMPLOYEE is already registered (HR.EMPLOYEE)",
			);
		});

		test("lookup by name, in any case", () => {
			const {db, departments} = setup();
			expect(db.getTable("DEPARTMENT")).toBe(departments);
			expect(db.getTable("department")).toBe(departments);
			expect(db.resolveTableName("Department")).toBe("HR.DEPARTMENT");
			expect(() => db.getTable("DIVISION")).toThrow(TableDefinitionError);
			expect(() => db.getTable("Division")).toThrow(
				"No table registered as Division",
			);
		});

		test("lookup by class", () => {
			const db = new Database(new TestDriver());
			const departments = db.register(Department, Row);
			expect(db.table(Department)).toBe(departments);
			expect(() => db.table(Employee)).toThrow("No table registered for Employee");
		});

		test("tables keep registration order", () => {
			const {db} = setup();
			expect(db.tables().map((table) => table.fullTableName())).toEqual([
				"HR.DEPARTMENT",
				"HR.EMPLOYEE",
				"HR.PRODUCT",
				"HR.AUDITLOG",
			]);
		});
	});

	test("transactions and close go to the driver", async () => {
		const driver = new TestDriver();
		const db = new Database(driver);
		await db.commit();
		await db.rollback();
		await db.close();
		expect(driver.commits).toBe(1);
		expect(driver.rollbacks).toBe(1);
		expect(driver.closed).toBe(true);
	});
});
