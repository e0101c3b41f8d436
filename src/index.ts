/**
 * @file Main entry point. Exports the statement builder, its value model, dialects,
 * configuration helpers and logger.
 */
export { QueryBuilder, isSqlString, withDefault, matchToNull, DEFAULT_COLUMN_LENGTH, VALUE_COLUMN_LENGTH } from './queryBuilder';
export type { QueryBuilderOptions, ValueOptions, ValueOption } from './queryBuilder';

export { StatementCompiler, resolveValue, wrapCount } from './statementCompiler';
export type { ResolvedValue } from './statementCompiler';

export type {
	BuildResult,
	LiteralBuildResult,
	Column,
	CommandType,
	Filter,
	FilterContribution,
	InsertReturn,
	Sort,
	SortDirection,
	StatementSpec,
	ValueEntry
} from './statement';

export {
	Ref, ref, SqlString, VarChar, VarCharMax, NVarCharMax,
	normalize, isAbsent, isScalar, scalarEquals, scalarKind, textOf
} from './scalar';
export type { Scalar, ScalarKind } from './scalar';

export {
	Dialect, MySQLDialect, PostgreSQLDialect, SQLiteDialect, SQLServerDialect,
	DEFAULT_ENGINE_CONSTANTS, dialectFor, parseReservedWordChars
} from './dialect';
export type { DialectName, EngineConstants, LimitPosition } from './dialect';

export { renderLiteral, renderRawFragment, formatTimestamp } from './literal';
export { interpolateTable, resolveQualifier, DEFAULT_REFERENCE_PREFIX } from './interpolate';
export type { QualifierSettings } from './interpolate';

export {
	databaseInfoSchema, parseDatabaseInfo, safeParseDatabaseInfo, resolveDialect, resolveQualifierSettings
} from './databaseInfo';
export type { DatabaseInfo, DatabaseInfoParseResult } from './databaseInfo';

export { QueryBuildError, isQueryBuildError } from './errors';
export type { QueryBuildErrorCode } from './errors';

export { Logger, LogLevel, globalLogger, getLogger, defaultFormatter } from './logger';
export type { LoggerConfig, LogEntry, LogData, ContextLogger } from './logger';
