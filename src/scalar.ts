/**
 * @file Closed set of values a statement can carry, and the normalizer that reduces
 * loosely typed caller input into that set.
 */
import Decimal from 'decimal.js';

/**
 * Base class for database string kinds that carry their own storage semantics.
 */
export abstract class SqlString
{
	constructor(readonly text: string) {}

	toString(): string
	{
		return this.text;
	}
}

/** Length-bounded single-byte string. */
export class VarChar extends SqlString {}

/** Single-byte string of maximum length. */
export class VarCharMax extends SqlString {}

/** Unicode string of maximum length. */
export class NVarCharMax extends SqlString {}

/**
 * A normalized, concretely typed value.
 * `number` covers the integer and floating kinds; `bigint` is the wide integer kind.
 */
export type Scalar =
	| string
	| number
	| bigint
	| boolean
	| Date
	| Uint8Array
	| Decimal
	| SqlString;

export type ScalarKind =
	| 'string'
	| 'integer'
	| 'float'
	| 'bigint'
	| 'boolean'
	| 'timestamp'
	| 'bytes'
	| 'decimal'
	| 'varchar'
	| 'varcharmax'
	| 'nvarcharmax';

/**
 * Mutable box standing in for a pointer or optional wrapper.
 * The normalizer looks through it once.
 *
 * @example
 * ```typescript
 * const middleName = ref<string>(null);
 * builder.addValue('MiddleName', middleName); // normalizes to NULL
 * ```
 */
export class Ref<T = unknown>
{
	constructor(public current: T | null | undefined = null) {}
}

export function ref<T>(value: T | null | undefined): Ref<T>
{
	return new Ref<T>(value);
}

export function isAbsent(value: unknown): value is null | undefined
{
	return value === null || value === undefined;
}

export function isScalar(value: unknown): value is Scalar
{
	switch (typeof value)
	{
		case 'string':
		case 'number':
		case 'bigint':
		case 'boolean':
			return true;
		case 'object':
			return value instanceof Date
				|| value instanceof Uint8Array
				|| value instanceof Decimal
				|| value instanceof SqlString;
		default:
			return false;
	}
}

/**
 * Reduces a caller-supplied value to a {@link Scalar} or `null` (absent).
 *
 * A {@link Ref} is unwrapped once and its content handed to the scalar classifier,
 * which accepts plain scalars and one more `Ref` holding a scalar. Deeper nesting,
 * plain objects, arrays, functions and symbols all normalize to `null`.
 */
export function normalize(value: unknown): Scalar | null
{
	if (isAbsent(value)) return null;

	if (value instanceof Ref)
	{
		const inner: unknown = value.current;
		return isAbsent(inner) ? null : classify(inner);
	}

	return classify(value);
}

function classify(value: unknown): Scalar | null
{
	if (isScalar(value)) return value;

	if (value instanceof Ref)
	{
		const pointed: unknown = value.current;
		if (isScalar(pointed)) return pointed;
	}

	return null;
}

export function scalarKind(value: Scalar): ScalarKind
{
	if (typeof value === 'string') return 'string';
	if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'float';
	if (typeof value === 'bigint') return 'bigint';
	if (typeof value === 'boolean') return 'boolean';
	if (value instanceof Date) return 'timestamp';
	if (value instanceof Uint8Array) return 'bytes';
	if (value instanceof Decimal) return 'decimal';
	if (value instanceof VarChar) return 'varchar';
	if (value instanceof VarCharMax) return 'varcharmax';
	return 'nvarcharmax';
}

/**
 * Structural equality used by match-to-null checks.
 * Both sides must be of the same kind; `1` and `1n` are different values.
 */
export function scalarEquals(a: Scalar, b: Scalar): boolean
{
	if (typeof a !== 'object' || typeof b !== 'object')
	{
		// integer and float share `number`, so compare by primitive type only
		return typeof a === typeof b && a === b;
	}

	if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();

	if (a instanceof Uint8Array && b instanceof Uint8Array)
	{
		const other = b;
		return a.length === other.length && a.every((byte, i) => byte === other[i]);
	}

	if (a instanceof Decimal && b instanceof Decimal) return a.equals(b);

	if (a instanceof SqlString && b instanceof SqlString)
	{
		return a.constructor === b.constructor && a.text === b.text;
	}

	return false;
}

/**
 * Text view of string-shaped scalars, `undefined` for every other kind.
 */
export function textOf(value: Scalar): string | undefined
{
	if (typeof value === 'string') return value;
	if (value instanceof SqlString) return value.text;
	return undefined;
}
