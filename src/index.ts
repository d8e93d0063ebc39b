/**
 * tablegate - table gateways for DB2-style databases
 *
 * Declare columns. Get rows. Keep the schema in step.
 */

// ============================================================================
// Tables and Rows
// ============================================================================

export {
	// Classes
	Table,

	// Types
	type TableClass,
	type ProvisionChange,
	type FindResult,
} from "./impl/table.js";

export {
	// Classes
	Row,

	// Functions
	rowFromTuple,
	shapeRows,

	// Types
	type RowClass,
	type RowTable,
	type RowValues,
} from "./impl/row.js";

export {
	// Validation
	columnDefinitionSchema,
	isIdentityColumn,
	isBoolColumn,
	DEFAULT_IDENTITY,

	// Types
	type Column,
	type ColumnDefinition,
	type ColumnField,
} from "./impl/column.js";

export {SchemaRegistry} from "./impl/schema.js";

// ============================================================================
// Database
// ============================================================================

export {
	// Classes
	Database,

	// Types
	type Driver,
	type Statement,
	type TableInfo,
	type EnsureResult,
} from "./impl/database.js";

export {
	databaseOptionsSchema,
	resolveOptions,
	optionsFromEnv,
	type DatabaseOptions,
	type ResolvedDatabaseOptions,
} from "./impl/options.js";

// ============================================================================
// SQL
// ============================================================================

export {
	buildSelect,
	buildSelectDistinct,
	buildPrimaryKeyMatch,
	buildInsert,
	buildUpdate,
	buildDelete,
	insertColumns,
	replaceTableReferences,
	type SQLStatement,
	type TableReferences,
} from "./impl/sql.js";

export {
	buildColumnDefinition,
	buildCreateTable,
	buildAlterAdd,
	buildGrant,
	TABLE_OPTIONS,
} from "./impl/ddl.js";

// ============================================================================
// Logging
// ============================================================================

export {
	configureLogging,
	LOG_CATEGORY,
	type LoggingOptions,
} from "./impl/logging.js";

// ============================================================================
// Errors
// ============================================================================

export {
	// Base error
	DatabaseError,
	isDatabaseError,
	hasErrorCode,

	// Programming errors
	ConfigurationError,
	TableDefinitionError,
	TypeMismatchError,

	// Statement errors
	QueryError,
	ExecutionError,
	NotFoundError,
	AlreadyExistsError,

	// Provisioning errors
	EnsureError,
	SchemaDriftError,

	// Error types
	type DatabaseErrorCode,
	type EnsureOperation,
} from "./impl/errors.js";
