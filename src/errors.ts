/**
 * @file Error type returned by statement builds and thrown by configuration parsing.
 */

/**
 * Machine-readable reason attached to every {@link QueryBuildError}.
 */
export type QueryBuildErrorCode =
	| 'MISSING_SOURCE'
	| 'MISSING_COLUMNS'
	| 'UNSUPPORTED_CLAUSE'
	| 'RAW_VALUE_NOT_TEXT'
	| 'COUNT_REQUIRES_SELECT'
	| 'INVALID_CONFIG';

export class QueryBuildError extends Error
{
	readonly code: QueryBuildErrorCode;

	constructor(code: QueryBuildErrorCode, message: string)
	{
		super(message);
		this.name = 'QueryBuildError';
		this.code = code;
	}

	static missingSource(): QueryBuildError
	{
		return new QueryBuildError('MISSING_SOURCE', 'table or view was not specified');
	}

	static missingColumns(): QueryBuildError
	{
		return new QueryBuildError('MISSING_COLUMNS', 'no columns were specified');
	}
}

/**
 * Type guard for errors produced by this library.
 */
export function isQueryBuildError(err: unknown): err is QueryBuildError
{
	return err instanceof QueryBuildError;
}
