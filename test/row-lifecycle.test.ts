import {describe, expect, test} from "vitest";
import {Database, Row, Table, type ColumnDefinition} from "../src/index.js";
import {TestDriver, type TestHandler} from "../src/impl/test-driver.js";

class Staff extends Table {
	schemaName(): string {
		return "HR";
	}

	columns(): readonly ColumnDefinition[] {
		return [
			{name: "EMPNO", type: "CHAR", length: 6, options: "NOT NULL", primary: true},
			{name: "NAME", type: "CHAR", length: 12},
		];
	}
}

/**
 * A stand-in for HR.STAFF that stores rows in a map, padding NAME the way a
 * CHAR(12) column comes back.
 */
function staffStore(): {stored: Map<string, unknown[]>; handler: TestHandler} {
	const stored = new Map<string, unknown[]>();
	const pad = (value: unknown) =>
		typeof value === "string" ? value.padEnd(12) : value;

	const handler: TestHandler = (sql, params) => {
		const key = String(params[params.length - 1]);
		switch (sql) {
			case "SELECT COUNT(*) FROM HR.STAFF WHERE EMPNO IN ?":
				return {rows: [[stored.has(key) ? 1 : 0]]};
			case "SELECT DISTINCT EMPNO, NAME FROM HR.STAFF WHERE EMPNO IN (?)": {
				const tuple = stored.get(key);
				return {rows: tuple ? [tuple] : []};
			}
			case "INSERT INTO HR.STAFF (EMPNO, NAME) VALUES(?, ?)":
				stored.set(String(params[0]), [params[0], pad(params[1])]);
				return {changes: 1};
			case "UPDATE HR.STAFF SET NAME = ? WHERE EMPNO IN ?":
				stored.set(key, [key, pad(params[0])]);
				return {changes: 1};
			case "DELETE FROM HR.STAFF WHERE EMPNO IN ?":
				return {changes: stored.delete(key) ? 1 : 0};
			default:
				return {error: new Error(`unexpected statement: ${sql}`)};
		}
	};

	return {stored, handler};
}

describe("a staff row from creation to deletion", () => {
	test("create, save, modify, save, find, delete", async () => {
		const {stored, handler} = staffStore();
		const driver = new TestDriver({handler});
		const db = new Database(driver);
		const staff = db.register(Staff, Row);

		const row = staff.createRow();
		row.set("EMPNO", "000100");
		expect(await row.save()).toBe(1);

		row.set("NAME", "PAT");
		expect(await row.save()).toBe(1);

		const writes = driver.statements.filter((sql) => !sql.startsWith("SELECT"));
		expect(writes).toEqual([
			"INSERT INTO HR.STAFF (EMPNO, NAME) VALUES(?, ?)",
			"UPDATE HR.STAFF SET NAME = ? WHERE EMPNO IN ?",
		]);
		expect(stored.get("000100")).toEqual(["000100", "PAT         "]);

		const [found] = await staff.findById("000100");
		expect(found.toJSON()).toEqual({EMPNO: "000100", NAME: "PAT"});
		expect(found.isModified()).toBe(false);

		expect(await found.delete()).toBe(1);
		expect(stored.size).toBe(0);
		expect(await staff.findById("000100")).toEqual([]);

		await db.commit();
		expect(driver.commits).toBe(1);
		expect(staff.lastError).toBeNull();
	});
});
