/**
 * Column definitions.
 *
 * A table declares its columns as an ordered list of plain objects. The order
 * matters twice: it is the column order of generated SQL, and it is the
 * positional order used to turn result tuples back into rows.
 */

import {z} from "zod";

const SQL_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

const textOrList = z.union([z.string().min(1), z.array(z.string().min(1))]);

/**
 * Validator for a single column definition. Names come out upper case.
 */
export const columnDefinitionSchema = z
	.object({
		name: z
			.string()
			.regex(SQL_NAME, "must be a plain SQL identifier")
			.transform((name) => name.toUpperCase()),
		type: z.string().min(1),
		length: z.union([z.string().min(1), z.number().int().positive()]).optional(),
		options: z.string().optional(),
		default: z.unknown().optional(),
		primary: z.boolean().optional(),
		constraint: textOrList.optional(),
		foreignKey: textOrList.optional(),
		/**
		 * `null`, `true` or "default" select
		 * `(START WITH 0, INCREMENT BY 1, NO CACHE)`; any other text is used
		 * as the identity directive.
		 */
		generatedIdentity: z
			.union([z.string().min(1), z.literal(true), z.null()])
			.optional(),
		noCreate: z.boolean().optional(),
	})
	.strict();

/** A column definition as a table declares it. */
export type ColumnDefinition = z.input<typeof columnDefinitionSchema>;

/** A validated column definition. */
export type Column = z.output<typeof columnDefinitionSchema>;

/** Descriptor fields that can be read with `getColumn(name, field)`. */
export type ColumnField = keyof Column;

export const DEFAULT_IDENTITY = "(START WITH 0, INCREMENT BY 1, NO CACHE)";

const IDENTITY_OPTION = /GENERATED ALWAYS AS IDENTITY/i;

/**
 * Whether the database generates this column's values.
 */
export function isIdentityColumn(column: Column): boolean {
	return (
		column.generatedIdentity !== undefined ||
		(column.options !== undefined && IDENTITY_OPTION.test(column.options))
	);
}

/**
 * Whether this column uses the Y/N BOOL pseudo-type.
 */
export function isBoolColumn(column: Column): boolean {
	return column.type.toUpperCase() === "BOOL";
}

/**
 * Normalize a constraint or foreign key entry to a list.
 */
export function asList(value: string | string[] | undefined): string[] {
	if (value === undefined) {
		return [];
	}
	return Array.isArray(value) ? value : [value];
}
