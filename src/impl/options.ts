/**
 * Database options.
 */

import {z} from "zod";
import {ConfigurationError} from "./errors.js";

export const databaseOptionsSchema = z
	.object({
		/**
		 * What a failed CREATE/ALTER/GRANT does: "log" reports it and carries on,
		 * "throw" raises EnsureError.
		 */
		ddlErrors: z.enum(["log", "throw"]).default("log"),
		/** Grantee of the default post-create grant; null skips the grant. */
		grantTo: z
			.string()
			.regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be a plain SQL identifier")
			.nullable()
			.default("NOBODY"),
	})
	.strict();

export type DatabaseOptions = z.input<typeof databaseOptionsSchema>;
export type ResolvedDatabaseOptions = z.output<typeof databaseOptionsSchema>;

/**
 * Validate options and fill in defaults.
 */
export function resolveOptions(
	options: DatabaseOptions = {},
): ResolvedDatabaseOptions {
	return parseOptions(options);
}

function parseOptions(options: unknown): ResolvedDatabaseOptions {
	const result = databaseOptionsSchema.safeParse(options);
	if (!result.success) {
		const issues = result.error.issues.map(
			(issue) => `${issue.path.join(".") || "options"}: ${issue.message}`,
		);
		throw new ConfigurationError(
			`Invalid database options: ${issues.join("; ")}`,
			issues,
			{cause: result.error},
		);
	}
	return result.data;
}

/**
 * Read options from the environment.
 *
 * - TABLEGATE_DDL_ERRORS: "log" or "throw"
 * - TABLEGATE_GRANT_TO: grantee, or "" / "none" to skip the grant
 *
 * Unset variables take their defaults. Invalid values raise
 * ConfigurationError.
 */
export function optionsFromEnv(
	env: Record<string, string | undefined> = process.env,
): ResolvedDatabaseOptions {
	const options: Record<string, unknown> = {};

	const ddlErrors = env.TABLEGATE_DDL_ERRORS;
	if (ddlErrors !== undefined) {
		options.ddlErrors = ddlErrors.trim().toLowerCase();
	}

	const grantTo = env.TABLEGATE_GRANT_TO;
	if (grantTo !== undefined) {
		const grantee = grantTo.trim();
		options.grantTo =
			grantee === "" || grantee.toLowerCase() === "none" ? null : grantee;
	}

	return parseOptions(options);
}
