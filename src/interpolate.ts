/**
 * @file Rewrites `{Table}` tokens in assembled SQL text with a schema or reference prefix.
 */

const TABLE_TOKEN = /\{([a-zA-Z0-9[\]"_-]*)\}/g;

export const DEFAULT_REFERENCE_PREFIX = 'ref';

export interface QualifierSettings
{
	/** Explicit schema, wins over reference mode */
	schema?: string;
	/** Prefix table names with the reference prefix */
	referenceMode?: boolean;
	/** Reference prefix, `ref` when not set */
	referencePrefix?: string;
}

/**
 * Replaces every `{name}` token with `qualifier.name`, or with the bare name when
 * the qualifier is empty.
 *
 * @example
 * ```typescript
 * interpolateTable('SELECT * FROM {users};', 'app'); // 'SELECT * FROM app.users;'
 * ```
 */
export function interpolateTable(sql: string, qualifier: string): string
{
	const prefix = qualifier !== '' ? `${qualifier}.` : '';
	return sql.replace(TABLE_TOKEN, (_token, name: string) => prefix + name);
}

/**
 * Schema > reference-mode prefix > none. A reference prefix always ends with `_`.
 */
export function resolveQualifier(settings: QualifierSettings): string
{
	if (settings.schema) return settings.schema;

	if (settings.referenceMode)
	{
		const prefix = settings.referencePrefix || DEFAULT_REFERENCE_PREFIX;
		return prefix.endsWith('_') ? prefix : `${prefix}_`;
	}

	return '';
}
