import { Dialect, dialectFor } from './dialect';
import type { DialectName, EngineConstants } from './dialect';
import type { DatabaseInfo } from './databaseInfo';
import { resolveDialect, resolveQualifierSettings } from './databaseInfo';
import { resolveQualifier } from './interpolate';
import type { QualifierSettings } from './interpolate';
import { StatementCompiler, wrapCount } from './statementCompiler';
import { QueryBuildError } from './errors';
import type {
	BuildResult,
	Column,
	CommandType,
	Filter,
	FilterContribution,
	InsertReturn,
	LiteralBuildResult,
	Sort,
	SortDirection,
	StatementSpec,
	ValueEntry
} from './statement';
import { getLogger } from './logger';

/** Length recorded for columns added without one */
export const DEFAULT_COLUMN_LENGTH = 255;

/** Length recorded for columns created by {@link QueryBuilder.addValue} */
export const VALUE_COLUMN_LENGTH = 8000;

/**
 * Per-value rendering policy.
 */
export interface ValueOptions
{
	/** true (default): bind as a parameter. false: insert the value verbatim as a SQL fragment */
	isParameter?: boolean;
	/** Used when the value is absent */
	default?: unknown;
	/** When the effective value equals this, the column is written as NULL */
	matchToNull?: unknown;
}

export type ValueOption = (options: ValueOptions) => void;

/**
 * Marks whether the value is bound as a parameter (true) or is a raw SQL fragment (false).
 */
export function isSqlString(indeed: boolean): ValueOption
{
	return options => { options.isParameter = indeed; };
}

export function withDefault(value: unknown): ValueOption
{
	return options => { options.default = value; };
}

export function matchToNull(value: unknown): ValueOption
{
	return options => { options.matchToNull = value; };
}

/**
 * Builder construction options.
 */
export interface QueryBuilderOptions
{
	/** Table, view or joined source name; may contain `{Table}` tokens */
	source?: string;
	/** Defaults to SELECT */
	command?: CommandType;
	distinct?: boolean;
	/** Dialect instance, preset name, or engine constants. Wins over `databaseInfo` */
	dialect?: Dialect | DialectName | Partial<EngineConstants>;
	/** Application configuration; supplies the dialect and qualifier when not given directly */
	databaseInfo?: DatabaseInfo;
	/** Omit absent-valued columns from INSERT/UPDATE (default: true) */
	skipNilWrite?: boolean;
	/** Rewrite `{Table}` tokens (default: true) */
	interpolate?: boolean;
	schema?: string;
	referenceMode?: boolean;
	referencePrefix?: string;
	resultLimit?: string | number;
	parameterOffset?: number;
	insertReturn?: InsertReturn;
	filterFunc?: FilterContribution;
}

/**
 * Fluent builder for one SQL statement.
 * Not safe to share between concurrent callers; each build reads a snapshot of the
 * builder and only writes back the parameter counter.
 *
 * @example
 * ```typescript
 * const result = QueryBuilder.select('users', { dialect: 'postgresql' })
 *   .addColumn('Id')
 *   .addColumn('UserName')
 *   .addFilter('IsActive', true)
 *   .addOrder('UserName', 'ASC')
 *   .limit(10)
 *   .build();
 * // result.sql  === 'SELECT Id, UserName FROM users WHERE IsActive = $1 ORDER BY UserName ASC LIMIT 10;'
 * // result.args === [true]
 * ```
 */
export class QueryBuilder
{
	/** Table or view name */
	source: string;
	command: CommandType;
	/** Row limit value; empty means no limit */
	resultLimit: string;
	/** Placeholder sequence offset, advanced by every parameterized build */
	parameterOffset: number;
	/** External WHERE contribution, appended after the built-in filters */
	filterFunc?: FilterContribution;

	private isDistinct: boolean;
	private insertReturn?: InsertReturn;
	private readonly dialect: Dialect;
	private readonly skipNilWrite: boolean;
	private readonly interpolate: boolean;
	private readonly qualifierSettings: QualifierSettings;
	private readonly columns: Column[] = [];
	private readonly values: ValueEntry[] = [];
	private readonly filters: Filter[] = [];
	private readonly sorts: Sort[] = [];
	private readonly groups: string[] = [];
	private readonly compiler = new StatementCompiler();
	private readonly logger = getLogger('QueryBuilder');

	constructor(options: QueryBuilderOptions = {})
	{
		this.source = options.source ?? '';
		this.command = options.command ?? 'SELECT';
		this.isDistinct = options.distinct ?? false;
		this.resultLimit = options.resultLimit !== undefined ? String(options.resultLimit) : '';
		this.parameterOffset = options.parameterOffset ?? 0;
		this.filterFunc = options.filterFunc;
		this.insertReturn = options.insertReturn;
		this.skipNilWrite = options.skipNilWrite ?? true;
		this.interpolate = options.interpolate ?? true;
		this.dialect = this.pickDialect(options);

		const fromInfo = resolveQualifierSettings(options.databaseInfo);
		this.qualifierSettings = {
			schema: options.schema ?? fromInfo.schema,
			referenceMode: options.referenceMode ?? fromInfo.referenceMode,
			referencePrefix: options.referencePrefix ?? fromInfo.referencePrefix
		};
	}

	private pickDialect(options: QueryBuilderOptions): Dialect
	{
		const { dialect } = options;
		if (dialect instanceof Dialect) return dialect;
		if (typeof dialect === 'string') return dialectFor(dialect);
		if (dialect) return new Dialect(dialect);
		if (options.databaseInfo) return resolveDialect(options.databaseInfo);

		this.logger.info('Database info was not set, using default engine constants');
		return new Dialect();
	}

	static select(source: string, options: QueryBuilderOptions = {}): QueryBuilder
	{
		return new QueryBuilder({ ...options, source, command: 'SELECT' });
	}

	static insert(source: string, options: QueryBuilderOptions = {}): QueryBuilder
	{
		return new QueryBuilder({ ...options, source, command: 'INSERT' });
	}

	static update(source: string, options: QueryBuilderOptions = {}): QueryBuilder
	{
		return new QueryBuilder({ ...options, source, command: 'UPDATE' });
	}

	static delete(source: string, options: QueryBuilderOptions = {}): QueryBuilder
	{
		return new QueryBuilder({ ...options, source, command: 'DELETE' });
	}

	/**
	 * Creates a builder with this builder's dialect, skip-nil, interpolation and qualifier
	 * settings, and nothing else: no columns, filters, limit or parameter offset.
	 */
	spawn(options: QueryBuilderOptions = {}): QueryBuilder
	{
		return new QueryBuilder({
			dialect: this.dialect,
			skipNilWrite: this.skipNilWrite,
			interpolate: this.interpolate,
			...this.qualifierSettings,
			...options
		});
	}

	/**
	 * Set the source name
	 */
	table(source: string): this
	{
		this.source = source;
		return this;
	}

	distinct(yes = true): this
	{
		this.isDistinct = yes;
		return this;
	}

	limit(limit: string | number): this
	{
		this.resultLimit = String(limit);
		return this;
	}

	withParameterOffset(offset: number): this
	{
		this.parameterOffset = offset;
		return this;
	}

	withFilter(filterFunc: FilterContribution | undefined): this
	{
		this.filterFunc = filterFunc;
		return this;
	}

	/**
	 * Sets the statement that returns the generated key of an INSERT.
	 * An empty statement clears it.
	 */
	returning(sql: string, inline = true): this
	{
		this.insertReturn = sql !== '' ? { sql, inline } : undefined;
		return this;
	}

	/**
	 * Adds a column with no value. Re-adding an existing name (case-insensitive) changes
	 * nothing. Ignored for DELETE.
	 */
	addColumn(name: string, length = DEFAULT_COLUMN_LENGTH): this
	{
		if (this.command === 'DELETE' || this.findColumn(name) !== -1) return this;
		return this.setValue(this.registerColumn(name, length), null, true, null, null);
	}

	/**
	 * Adds a column together with its value. Calling it again for the same column
	 * overwrites the value and its options. Ignored for DELETE.
	 *
	 * @example
	 * ```typescript
	 * builder
	 *   .addValue('UserName', 'john.doe')
	 *   .addValue('CreatedAt', 'CURRENT_TIMESTAMP', { isParameter: false })
	 *   .addValue('ParentKey', 0, matchToNull(0));
	 * ```
	 */
	addValue(name: string, value: unknown, ...options: Array<ValueOptions | ValueOption | undefined>): this
	{
		if (this.command === 'DELETE') return this;

		const resolved: ValueOptions = { isParameter: true };
		for (const option of options)
		{
			if (option === undefined) continue;
			if (typeof option === 'function') option(resolved);
			else Object.assign(resolved, option);
		}

		return this.setValue(
			this.registerColumn(name, VALUE_COLUMN_LENGTH),
			value,
			resolved.isParameter ?? true,
			resolved.default,
			resolved.matchToNull
		);
	}

	/**
	 * Replaces the value of a registered column, resetting it to a plain parameter.
	 * Unknown columns are ignored.
	 */
	setColumnValue(name: string, value: unknown): this
	{
		if (this.command === 'DELETE') return this;

		const index = this.findColumn(name);
		if (index === -1) return this;
		return this.setValue(index, value, true, null, null);
	}

	/**
	 * Adds a `column = value` filter, or `column IS NULL` when the value is absent.
	 */
	addFilter(expression: string, value: unknown): this
	{
		this.filters.push({ expression, value, expressionOnly: false });
		return this;
	}

	/**
	 * Adds a filter expression that is emitted verbatim.
	 */
	addFilterExp(expression: string): this
	{
		this.filters.push({ expression, value: null, expressionOnly: true });
		return this;
	}

	addOrder(column: string, direction: SortDirection = 'ASC'): this
	{
		this.sorts.push({ column, direction });
		return this;
	}

	addGroup(...groups: string[]): this
	{
		this.groups.push(...groups);
		return this;
	}

	/**
	 * Escapes the string enclosing character so the value can be embedded in a literal.
	 */
	escape(value: string): string
	{
		return this.dialect.escapeString(value);
	}

	escapeIdentifier(name: string): string
	{
		return this.dialect.escapeIdentifier(name);
	}

	getColumns(): readonly Readonly<Column>[]
	{
		return this.columns;
	}

	getDialect(): Dialect
	{
		return this.dialect;
	}

	/**
	 * Snapshot of the builder state handed to the compiler.
	 */
	toSpec(): StatementSpec
	{
		return {
			source: this.source,
			command: this.command,
			distinct: this.isDistinct,
			columns: this.columns.map(c => ({ ...c })),
			values: this.values.map(v => ({ ...v })),
			filters: this.filters.map(f => ({ ...f })),
			sorts: this.sorts.map(s => ({ ...s })),
			groups: [...this.groups],
			resultLimit: this.resultLimit,
			dialect: this.dialect,
			skipNilWrite: this.skipNilWrite,
			interpolate: this.interpolate,
			qualifier: resolveQualifier(this.qualifierSettings),
			parameterOffset: this.parameterOffset,
			filterFunc: this.filterFunc,
			insertReturn: this.insertReturn
		};
	}

	/**
	 * Builds parameterized SQL with its arguments in placeholder order.
	 * On success the parameter offset moves to the last placeholder number used,
	 * so the next build continues the sequence.
	 */
	build(): BuildResult
	{
		const result = this.compiler.compile(this.toSpec());
		if (result.ok) this.parameterOffset = result.parameterOffset;
		return result;
	}

	/**
	 * Builds SQL with every value inlined as a literal. Does not touch the parameter offset.
	 */
	buildLiteral(): LiteralBuildResult
	{
		return this.compiler.compileLiteral(this.toSpec());
	}

	/**
	 * Builds the SELECT and wraps it as `SELECT COUNT(*) FROM (<select>) AS <alias>;`
	 * with the same arguments.
	 */
	buildCount(alias = 'cnt'): BuildResult
	{
		if (this.command !== 'SELECT')
		{
			return {
				ok: false,
				error: new QueryBuildError('COUNT_REQUIRES_SELECT', `row count wrapping requires SELECT, got ${this.command}`)
			};
		}

		const result = this.build();
		if (!result.ok) return result;
		return { ...result, sql: wrapCount(result.sql, alias) };
	}

	private findColumn(name: string): number
	{
		const key = name.toLowerCase();
		return this.columns.findIndex(c => c.name.toLowerCase() === key);
	}

	private registerColumn(name: string, length: number): number
	{
		const index = this.findColumn(name);
		if (index !== -1) return index;
		this.columns.push({ name, length });
		return this.columns.length - 1;
	}

	private setValue(index: number, value: unknown, isParameter: boolean, defaultValue: unknown, matchToNullValue: unknown): this
	{
		const column = this.columns[index];
		if (!column) return this;

		const key = column.name.toLowerCase();
		const existing = this.values.find(v => v.column.toLowerCase() === key);
		if (existing)
		{
			existing.value = value;
			existing.isParameter = isParameter;
			existing.defaultValue = defaultValue;
			existing.matchToNull = matchToNullValue;
			return this;
		}

		this.values.push({
			column: column.name,
			value,
			defaultValue,
			matchToNull: matchToNullValue,
			isParameter
		});
		return this;
	}
}
