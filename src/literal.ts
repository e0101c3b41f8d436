/**
 * @file Conversion of normalized scalars into SQL text.
 */
import Decimal from 'decimal.js';
import { SqlString, textOf } from './scalar';
import type { Scalar } from './scalar';
import type { Dialect } from './dialect';

/**
 * RFC 3339 timestamp in UTC without fractional seconds, e.g. `2024-03-01T08:30:00Z`.
 */
export function formatTimestamp(value: Date): string
{
	return value.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Renders a scalar as a SQL literal.
 *
 * @param value Normalized value; `null`, invalid dates and non-finite numbers render as `NULL`
 * @param dialect Supplies the string quoting rules
 */
export function renderLiteral(value: Scalar | null, dialect: Dialect): string
{
	if (value === null) return 'NULL';

	if (typeof value === 'string' || value instanceof SqlString)
	{
		return dialect.quoteString(typeof value === 'string' ? value : value.text);
	}

	if (typeof value === 'number')
	{
		if (!Number.isFinite(value)) return 'NULL';
		return Number.isInteger(value) ? String(value) : value.toFixed(6);
	}

	if (typeof value === 'bigint') return value.toString();
	if (typeof value === 'boolean') return value ? '1' : '0';
	if (value instanceof Decimal) return value.toString();

	if (value instanceof Date)
	{
		if (Number.isNaN(value.getTime())) return 'NULL';
		return dialect.quoteString(formatTimestamp(value));
	}

	return `X'${Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('hex').toUpperCase()}'`;
}

/**
 * Renders a non-parameter value that is inserted into the statement verbatim.
 * Strings pass through unchanged; numbers, decimals and booleans are formatted.
 *
 * @returns The fragment, or `undefined` for values with no fragment form (timestamps, bytes, NaN, infinities)
 */
export function renderRawFragment(value: Scalar): string | undefined
{
	const text = textOf(value);
	if (text !== undefined) return text;
	if (typeof value === 'number') return Number.isFinite(value) ? value.toString() : undefined;
	if (typeof value === 'bigint') return value.toString();
	if (typeof value === 'boolean') return value ? '1' : '0';
	if (value instanceof Decimal) return value.toString();
	return undefined;
}
