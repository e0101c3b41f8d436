import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import {
	normalize, isAbsent, isScalar, scalarEquals, scalarKind, textOf,
	Ref, ref, VarChar, VarCharMax, NVarCharMax
} from './scalar';

describe('normalize', () =>
{
	it('should treat null and undefined as absent', () =>
	{
		expect(normalize(null)).toBeNull();
		expect(normalize(undefined)).toBeNull();
	});

	it('should return plain scalars as-is', () =>
	{
		const when = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));
		const bytes = new Uint8Array([1, 2, 3]);
		const amount = new Decimal('12.50');
		const name = new VarChar('abc');

		expect(normalize('john.doe')).toBe('john.doe');
		expect(normalize(42)).toBe(42);
		expect(normalize(1.25)).toBe(1.25);
		expect(normalize(9007199254740993n)).toBe(9007199254740993n);
		expect(normalize(false)).toBe(false);
		expect(normalize(when)).toBe(when);
		expect(normalize(bytes)).toBe(bytes);
		expect(normalize(amount)).toBe(amount);
		expect(normalize(name)).toBe(name);
	});

	it('should keep falsy scalars that are not absent', () =>
	{
		expect(normalize(0)).toBe(0);
		expect(normalize('')).toBe('');
	});

	it('should unwrap a Ref once', () =>
	{
		expect(normalize(ref('VDI'))).toBe('VDI');
		expect(normalize(ref(true))).toBe(true);
	});

	it('should treat an empty Ref as absent', () =>
	{
		expect(normalize(ref<string>(null))).toBeNull();
		expect(normalize(new Ref())).toBeNull();
	});

	it('should dereference a Ref held inside a Ref', () =>
	{
		expect(normalize(ref(ref(5)))).toBe(5);
	});

	it('should not unwrap deeper than two levels', () =>
	{
		expect(normalize(ref(ref(ref(5))))).toBeNull();
	});

	it('should normalize unrecognized values to absent', () =>
	{
		expect(normalize({ id: 1 })).toBeNull();
		expect(normalize([1, 2])).toBeNull();
		expect(normalize(() => 1)).toBeNull();
		expect(normalize(Symbol('x'))).toBeNull();
		expect(normalize(ref({ id: 1 }))).toBeNull();
	});

	it('should see changes made to a Ref after it was created', () =>
	{
		const box = ref<number>(null);
		expect(normalize(box)).toBeNull();
		box.current = 7;
		expect(normalize(box)).toBe(7);
	});
});

describe('isAbsent / isScalar', () =>
{
	it('should classify values', () =>
	{
		expect(isAbsent(null)).toBe(true);
		expect(isAbsent(undefined)).toBe(true);
		expect(isAbsent(0)).toBe(false);
		expect(isScalar(new NVarCharMax('x'))).toBe(true);
		expect(isScalar({})).toBe(false);
		expect(isScalar(ref(1))).toBe(false);
	});
});

describe('scalarKind', () =>
{
	it('should report the kind of each scalar', () =>
	{
		expect(scalarKind('a')).toBe('string');
		expect(scalarKind(3)).toBe('integer');
		expect(scalarKind(3.5)).toBe('float');
		expect(scalarKind(3n)).toBe('bigint');
		expect(scalarKind(true)).toBe('boolean');
		expect(scalarKind(new Date(0))).toBe('timestamp');
		expect(scalarKind(new Uint8Array(0))).toBe('bytes');
		expect(scalarKind(new Decimal(1))).toBe('decimal');
		expect(scalarKind(new VarChar('a'))).toBe('varchar');
		expect(scalarKind(new VarCharMax('a'))).toBe('varcharmax');
		expect(scalarKind(new NVarCharMax('a'))).toBe('nvarcharmax');
	});
});

describe('scalarEquals', () =>
{
	it('should compare primitives of the same type', () =>
	{
		expect(scalarEquals(0, 0)).toBe(true);
		expect(scalarEquals('a', 'a')).toBe(true);
		expect(scalarEquals('a', 'b')).toBe(false);
		expect(scalarEquals(1, 1n)).toBe(false);
		expect(scalarEquals(0, false)).toBe(false);
		expect(scalarEquals('0', 0)).toBe(false);
	});

	it('should compare dates by time value', () =>
	{
		expect(scalarEquals(new Date(1000), new Date(1000))).toBe(true);
		expect(scalarEquals(new Date(1000), new Date(2000))).toBe(false);
	});

	it('should compare bytes by content', () =>
	{
		expect(scalarEquals(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true);
		expect(scalarEquals(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(false);
		expect(scalarEquals(new Uint8Array([1]), new Uint8Array([1, 0]))).toBe(false);
	});

	it('should compare decimals numerically', () =>
	{
		expect(scalarEquals(new Decimal('1.50'), new Decimal('1.5'))).toBe(true);
		expect(scalarEquals(new Decimal('1.5'), new Decimal('1.51'))).toBe(false);
	});

	it('should compare string wrappers by kind and text', () =>
	{
		expect(scalarEquals(new VarChar('a'), new VarChar('a'))).toBe(true);
		expect(scalarEquals(new VarChar('a'), new VarCharMax('a'))).toBe(false);
		expect(scalarEquals(new VarChar('a'), 'a')).toBe(false);
	});
});

describe('textOf', () =>
{
	it('should return text for string-shaped scalars only', () =>
	{
		expect(textOf('x')).toBe('x');
		expect(textOf(new NVarCharMax('y'))).toBe('y');
		expect(textOf(1)).toBeUndefined();
	});
});
