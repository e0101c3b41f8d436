import type { Scalar } from './scalar';
import type { Dialect } from './dialect';
import type { QueryBuildError } from './errors';

/**
 * Statement kind: SELECT/INSERT/UPDATE/DELETE
 */
export type CommandType = 'SELECT' | 'INSERT' | 'UPDATE' | 'DELETE';

export type SortDirection = 'ASC' | 'DESC';

/**
 * Column registered on a builder. Length is advisory only.
 */
export interface Column
{
	name: string;
	length: number;
}

/**
 * Value attached to a column, plus its rendering policy.
 * `value`, `defaultValue` and `matchToNull` hold caller input as given; they are
 * normalized at build time.
 */
export interface ValueEntry
{
	/** Column name, as first registered */
	column: string;
	value: unknown;
	/** Used when `value` normalizes to absent */
	defaultValue: unknown;
	/** When equal to the effective value, the column renders as NULL */
	matchToNull: unknown;
	/** true: rendered as a placeholder or quoted literal. false: raw SQL fragment */
	isParameter: boolean;
}

/**
 * WHERE predicate.
 * `expressionOnly` filters are emitted verbatim; others compare `expression` to `value`,
 * or check `IS NULL` when the value is absent.
 */
export interface Filter
{
	expression: string;
	value: unknown;
	expressionOnly: boolean;
}

export interface Sort
{
	column: string;
	direction: SortDirection;
}

/**
 * Additional WHERE fragments supplied from outside the builder (e.g. a filter builder).
 * Receives the current parameter counter, the placeholder token and whether placeholders
 * are numbered, and returns its fragments together with their arguments.
 */
export type FilterContribution = (
	parameterOffset: number,
	placeholder: string,
	inSequence: boolean
) => [fragments: string[], args: Scalar[]];

/**
 * Statement that retrieves the generated key after an INSERT.
 * Inline clauses are appended before the terminating semicolon (`RETURNING id`);
 * otherwise the clause follows as its own statement (`SELECT SCOPE_IDENTITY();`).
 */
export interface InsertReturn
{
	sql: string;
	inline: boolean;
}

/**
 * Everything the compiler needs to assemble one statement.
 */
export interface StatementSpec
{
	source: string;
	command: CommandType;
	distinct: boolean;
	columns: Column[];
	values: ValueEntry[];
	filters: Filter[];
	sorts: Sort[];
	groups: string[];
	/** Row limit value, rendered as-is; empty means no limit */
	resultLimit: string;
	dialect: Dialect;
	/** Omit absent-valued columns from INSERT/UPDATE */
	skipNilWrite: boolean;
	/** Rewrite `{Table}` tokens */
	interpolate: boolean;
	/** Resolved schema or reference prefix used by interpolation */
	qualifier: string;
	parameterOffset: number;
	filterFunc?: FilterContribution;
	insertReturn?: InsertReturn;
}

/**
 * Output of a parameterized build.
 */
export type BuildResult =
	| { ok: true; sql: string; args: Scalar[]; parameterOffset: number }
	| { ok: false; error: QueryBuildError };

/**
 * Output of a literal build.
 */
export type LiteralBuildResult =
	| { ok: true; sql: string }
	| { ok: false; error: QueryBuildError };
