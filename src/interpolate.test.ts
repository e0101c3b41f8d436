import { describe, it, expect } from 'vitest';
import { interpolateTable, resolveQualifier } from './interpolate';

describe('interpolateTable', () =>
{
	it('should qualify every token', () =>
	{
		expect(interpolateTable('SELECT a FROM {users} u JOIN {roles} r ON u.r = r.id;', 'app'))
			.toBe('SELECT a FROM app.users u JOIN app.roles r ON u.r = r.id;');
	});

	it('should strip the braces when the qualifier is empty', () =>
	{
		expect(interpolateTable('DELETE FROM {users};', '')).toBe('DELETE FROM users;');
	});

	it('should leave SQL without tokens unchanged', () =>
	{
		const sql = 'SELECT Id FROM users WHERE Name = ?;';
		expect(interpolateTable(sql, 's')).toBe(sql);
	});

	it('should accept brackets, quotes, underscores and hyphens inside tokens', () =>
	{
		expect(interpolateTable('FROM {[Order-Lines]} JOIN {"tax_codes"}', 'dbo'))
			.toBe('FROM dbo.[Order-Lines] JOIN dbo."tax_codes"');
	});

	it('should not touch braces around other characters', () =>
	{
		const sql = `SELECT '{a b}' FROM t;`;
		expect(interpolateTable(sql, 'x')).toBe(sql);
	});

	it('should not treat $ in the qualifier as a replacement pattern', () =>
	{
		expect(interpolateTable('{t}', 'a$1')).toBe('a$1.t');
	});
});

describe('resolveQualifier', () =>
{
	it('should prefer the schema', () =>
	{
		expect(resolveQualifier({ schema: 'sales', referenceMode: true, referencePrefix: 'src' })).toBe('sales');
	});

	it('should use the reference prefix with a trailing underscore', () =>
	{
		expect(resolveQualifier({ referenceMode: true, referencePrefix: 'src' })).toBe('src_');
		expect(resolveQualifier({ referenceMode: true, referencePrefix: 'src_' })).toBe('src_');
	});

	it('should default the reference prefix', () =>
	{
		expect(resolveQualifier({ referenceMode: true })).toBe('ref_');
	});

	it('should return an empty qualifier otherwise', () =>
	{
		expect(resolveQualifier({})).toBe('');
		expect(resolveQualifier({ referencePrefix: 'src' })).toBe('');
	});
});
