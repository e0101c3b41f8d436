/**
 * StatementCompiler - Assembles a StatementSpec into SQL text
 *
 * The StatementCompiler is responsible for:
 * 1. Validating the spec before any text is emitted
 * 2. Normalizing every value, default, match-to-null sentinel and filter value
 * 3. Deciding per column whether it is skipped, forced to NULL, bound as a parameter
 *    or inlined as a raw fragment
 * 4. Numbering placeholders and collecting arguments in the same order
 *
 * The spec is never mutated. The caller receives the advanced parameter counter in
 * the result and decides whether to keep it.
 *
 * @module statementCompiler
 */

import { normalize, scalarEquals, scalarKind } from './scalar';
import type { Scalar } from './scalar';
import type { Dialect } from './dialect';
import { renderLiteral, renderRawFragment } from './literal';
import { interpolateTable } from './interpolate';
import { QueryBuildError } from './errors';
import type { BuildResult, LiteralBuildResult, StatementSpec, ValueEntry } from './statement';
import { getLogger } from './logger';

type CompileMode = 'parameterized' | 'literal';

/**
 * Value entry after normalization, default substitution and match-to-null.
 */
export interface ResolvedValue
{
	column: string;
	/** Effective value, `null` when absent */
	value: Scalar | null;
	isParameter: boolean;
	/** Matched its match-to-null sentinel; rendered as NULL and never skipped */
	forceNull: boolean;
	/** Left out of INSERT/UPDATE */
	skip: boolean;
}

/**
 * Resolves one value entry. The order of the steps matters: the default is applied
 * before the match-to-null comparison, so a default can itself be matched to NULL.
 */
export function resolveValue(entry: ValueEntry, skipNilWrite: boolean): ResolvedValue
{
	let value = normalize(entry.value);
	const defaultValue = normalize(entry.defaultValue);
	const matchToNull = normalize(entry.matchToNull);
	let isParameter = entry.isParameter;
	let forceNull = false;

	if (value === null && defaultValue !== null)
	{
		value = defaultValue;
	}

	if (value !== null && matchToNull !== null && scalarEquals(matchToNull, value))
	{
		forceNull = true;
		isParameter = true;
	}

	const isNullish = value === null || forceNull;

	return {
		column: entry.column,
		value,
		isParameter,
		forceNull,
		skip: skipNilWrite && isNullish && !forceNull
	};
}

/**
 * Strips the terminating semicolon and wraps a SELECT as a row count.
 */
export function wrapCount(sql: string, alias: string): string
{
	const inner = sql.replace(/[\s;]+$/, '');
	return `SELECT COUNT(*) FROM (${inner}) AS ${alias};`;
}

/**
 * Running placeholder counter shared by columns, filters and the filter callback.
 */
class ParameterCounter
{
	constructor(
		private readonly dialect: Dialect,
		public value: number
	) {}

	next(): string
	{
		if (!this.dialect.inSequence) return this.dialect.placeholder;
		this.value++;
		return this.dialect.placeholder + String(this.value);
	}

	advance(count: number): void
	{
		if (this.dialect.inSequence) this.value += count;
	}
}

interface Assembled
{
	sql: string;
	args: Scalar[];
	parameterOffset: number;
}

/**
 * StatementCompiler turns a StatementSpec into either parameterized SQL with its
 * arguments, or literal SQL with all values inlined.
 */
export class StatementCompiler
{
	private readonly logger: ReturnType<typeof getLogger>;

	constructor()
	{
		this.logger = getLogger('StatementCompiler');
	}

	/**
	 * Compiles a spec into parameterized SQL.
	 * Arguments are returned in placeholder order.
	 */
	compile(spec: StatementSpec): BuildResult
	{
		const assembled = this.run(spec, 'parameterized');
		if (assembled instanceof QueryBuildError) return { ok: false, error: assembled };
		return { ok: true, ...assembled };
	}

	/**
	 * Compiles a spec into SQL with every value rendered as a literal.
	 */
	compileLiteral(spec: StatementSpec): LiteralBuildResult
	{
		const assembled = this.run(spec, 'literal');
		if (assembled instanceof QueryBuildError) return { ok: false, error: assembled };
		return { ok: true, sql: assembled.sql };
	}

	private run(spec: StatementSpec, mode: CompileMode): Assembled | QueryBuildError
	{
		this.logger.debug('Compiling statement', { command: spec.command, source: spec.source, mode });

		const result = this.validate(spec, mode) ?? this.assemble(spec, mode);

		if (result instanceof QueryBuildError)
		{
			this.logger.warn('Statement build failed', { code: result.code, source: spec.source, message: result.message });
			return result;
		}

		this.logger.debug('Statement compiled successfully', { command: spec.command, argCount: result.args.length });
		return result;
	}

	/**
	 * Structural checks that need no value resolution.
	 */
	private validate(spec: StatementSpec, mode: CompileMode): QueryBuildError | undefined
	{
		if (spec.source === '')
		{
			return QueryBuildError.missingSource();
		}

		if (spec.command !== 'DELETE' && spec.columns.length === 0)
		{
			return QueryBuildError.missingColumns();
		}

		if (spec.command !== 'SELECT')
		{
			if (spec.sorts.length > 0)
			{
				return new QueryBuildError('UNSUPPORTED_CLAUSE', `ORDER BY is not supported for ${spec.command}`);
			}
			if (spec.groups.length > 0)
			{
				return new QueryBuildError('UNSUPPORTED_CLAUSE', `GROUP BY is not supported for ${spec.command}`);
			}
			if (spec.resultLimit !== '' && spec.dialect.limitPosition === 'FRONT')
			{
				return new QueryBuildError('UNSUPPORTED_CLAUSE', `TOP is not supported for ${spec.command}`);
			}
		}

		if (mode === 'literal' && spec.filterFunc)
		{
			return new QueryBuildError('UNSUPPORTED_CLAUSE', 'filter callbacks cannot be rendered in literal mode');
		}

		return undefined;
	}

	private assemble(spec: StatementSpec, mode: CompileMode): Assembled | QueryBuildError
	{
		const { dialect, command } = spec;
		const counter = new ParameterCounter(dialect, spec.parameterOffset);
		const args: Scalar[] = [];

		const resolved: ResolvedValue[] = command === 'DELETE'
			? []
			: spec.values.map(v => resolveValue(v, spec.skipNilWrite));
		const written = resolved.filter(r => !r.skip);

		// Table tokens are rewritten piece by piece so that inlined literal values are never touched
		const qualify = (text: string): string =>
			spec.interpolate ? interpolateTable(text, spec.qualifier) : text;

		if ((command === 'INSERT' || command === 'UPDATE') && written.length === 0)
		{
			return new QueryBuildError('MISSING_COLUMNS', 'no columns left to write after skipping absent values');
		}

		// Renders one column value, pushing its argument when it becomes a placeholder
		const renderValue = (entry: ResolvedValue): string | QueryBuildError =>
		{
			if (entry.forceNull || entry.value === null) return 'NULL';

			if (entry.isParameter)
			{
				if (mode === 'literal') return renderLiteral(entry.value, dialect);
				args.push(entry.value);
				return counter.next();
			}

			const fragment = renderRawFragment(entry.value);
			if (fragment === undefined)
			{
				return new QueryBuildError(
					'RAW_VALUE_NOT_TEXT',
					`raw fragment value for column ${entry.column} must be textual, got ${scalarKind(entry.value)}`
				);
			}
			return qualify(fragment);
		};

		const rendered: string[] = [];
		if (command === 'INSERT' || command === 'UPDATE')
		{
			for (const entry of written)
			{
				const text = renderValue(entry);
				if (text instanceof QueryBuildError) return text;
				rendered.push(command === 'UPDATE' ? `${qualify(entry.column)} = ${text}` : text);
			}
		}

		const source = qualify(spec.source);
		let sql: string;
		switch (command)
		{
			case 'SELECT':
				sql = 'SELECT ';
				if (spec.distinct) sql += 'DISTINCT ';
				if (spec.resultLimit !== '' && dialect.limitPosition === 'FRONT') sql += `TOP ${spec.resultLimit} `;
				sql += resolved.map(r => qualify(r.column)).join(', ') + ` FROM ${source}`;
				break;
			case 'INSERT':
				sql = `INSERT INTO ${source} (${written.map(r => qualify(r.column)).join(', ')}) VALUES (${rendered.join(', ')})`;
				break;
			case 'UPDATE':
				sql = `UPDATE ${source} SET ${rendered.join(', ')}`;
				break;
			case 'DELETE':
				sql = `DELETE FROM ${source}`;
				break;
		}

		if (command !== 'INSERT')
		{
			const predicates: string[] = [];
			for (const filter of spec.filters)
			{
				const value = normalize(filter.value);
				const expression = qualify(filter.expression);
				if (value !== null)
				{
					if (mode === 'literal')
					{
						predicates.push(`${expression} = ${renderLiteral(value, dialect)}`);
					}
					else
					{
						args.push(value);
						predicates.push(`${expression} = ${counter.next()}`);
					}
				}
				else if (!filter.expressionOnly)
				{
					predicates.push(`${expression} IS NULL`);
				}
				else
				{
					predicates.push(expression);
				}
			}

			if (spec.filterFunc)
			{
				const [fragments, extra] = spec.filterFunc(counter.value, dialect.placeholder, dialect.inSequence);
				// Arguments are kept only alongside fragments
				if (fragments.length > 0)
				{
					predicates.push(...fragments.map(qualify));
					args.push(...extra);
					counter.advance(extra.length);
				}
			}

			if (predicates.length > 0)
			{
				sql += ' WHERE ' + predicates.join(' AND ');
			}
		}

		if (spec.groups.length > 0)
		{
			sql += ' GROUP BY ' + spec.groups.map(qualify).join(', ');
		}

		if (spec.sorts.length > 0)
		{
			sql += ' ORDER BY ' + spec.sorts.map(s => `${qualify(s.column)} ${s.direction}`).join(', ');
		}

		if (spec.resultLimit !== '' && dialect.limitPosition === 'REAR')
		{
			sql += ` LIMIT ${spec.resultLimit}`;
		}

		sql += ';';

		if (command === 'INSERT' && spec.insertReturn && spec.insertReturn.sql !== '')
		{
			const clause = qualify(spec.insertReturn.sql.replace(/[\s;]+$/, ''));
			sql = spec.insertReturn.inline
				? `${sql.slice(0, -1)} ${clause};`
				: `${sql} ${clause};`;
		}

		return { sql, args, parameterOffset: counter.value };
	}
}
