import { describe, it, expect } from 'vitest';
import { QueryBuildError, isQueryBuildError } from './errors';

describe('QueryBuildError', () =>
{
	it('should carry a code and message', () =>
	{
		const error = QueryBuildError.missingSource();
		expect(error).toBeInstanceOf(Error);
		expect(error.name).toBe('QueryBuildError');
		expect(error.code).toBe('MISSING_SOURCE');
		expect(error.message).toBe('table or view was not specified');
		expect(QueryBuildError.missingColumns().code).toBe('MISSING_COLUMNS');
	});

	it('should be recognized by the type guard', () =>
	{
		expect(isQueryBuildError(new QueryBuildError('INVALID_CONFIG', 'bad'))).toBe(true);
		expect(isQueryBuildError(new Error('bad'))).toBe(false);
		expect(isQueryBuildError('bad')).toBe(false);
	});
});
