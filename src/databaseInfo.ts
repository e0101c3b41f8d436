/**
 * @file Database information supplied by the embedding application's configuration,
 * validated with zod and resolved into a dialect and interpolation settings.
 */
import { z } from 'zod';
import { Dialect } from './dialect';
import type { QualifierSettings } from './interpolate';
import { QueryBuildError } from './errors';

/**
 * Every field is optional; missing or empty values fall back to the engine defaults.
 */
export const databaseInfoSchema = z.object({
	stringEnclosingChar: z.string().max(1).optional(),
	stringEscapeChar: z.string().max(1).optional(),
	reservedWordEscapeChar: z.string().max(2).optional(),
	parameterPlaceholder: z.string().max(8).optional(),
	parameterInSequence: z.boolean().optional(),
	resultLimitPosition: z.enum(['FRONT', 'REAR']).optional(),
	schema: z.string().regex(/^[A-Za-z0-9_]*$/, 'schema may only contain letters, digits and underscores').optional(),
	referenceMode: z.boolean().optional(),
	referenceModePrefix: z.string().regex(/^[A-Za-z0-9_]*$/, 'prefix may only contain letters, digits and underscores').optional()
}).strict();

export type DatabaseInfo = z.infer<typeof databaseInfoSchema>;

export type DatabaseInfoParseResult =
	| { ok: true; info: DatabaseInfo }
	| { ok: false; error: QueryBuildError };

function describeIssues(error: z.ZodError): string
{
	return error.issues
		.map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
		.join('; ');
}

/**
 * Validates a configuration object without throwing.
 */
export function safeParseDatabaseInfo(input: unknown): DatabaseInfoParseResult
{
	const parsed = databaseInfoSchema.safeParse(input);
	if (!parsed.success)
	{
		return {
			ok: false,
			error: new QueryBuildError('INVALID_CONFIG', `invalid database info: ${describeIssues(parsed.error)}`)
		};
	}
	return { ok: true, info: parsed.data };
}

/**
 * Validates a configuration object.
 * @throws QueryBuildError with code `INVALID_CONFIG`
 */
export function parseDatabaseInfo(input: unknown): DatabaseInfo
{
	const result = safeParseDatabaseInfo(input);
	if (!result.ok) throw result.error;
	return result.info;
}

export function resolveDialect(info: DatabaseInfo = {}): Dialect
{
	return new Dialect({
		stringEnclosingChar: info.stringEnclosingChar,
		stringEscapeChar: info.stringEscapeChar,
		reservedWordEscapeChar: info.reservedWordEscapeChar,
		parameterPlaceholder: info.parameterPlaceholder,
		parameterInSequence: info.parameterInSequence,
		resultLimitPosition: info.resultLimitPosition
	});
}

export function resolveQualifierSettings(info: DatabaseInfo = {}): QualifierSettings
{
	return {
		schema: info.schema,
		referenceMode: info.referenceMode,
		referencePrefix: info.referenceModePrefix
	};
}
