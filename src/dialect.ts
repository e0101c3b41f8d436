/**
 * @file Database engine constants and the dialect objects built from them.
 * Different engines quote strings and identifiers differently and use different
 * parameter placeholders.
 */

export type LimitPosition = 'FRONT' | 'REAR';

/**
 * Settings that follow the database engine.
 */
export interface EngineConstants
{
	/** Character that encloses a string literal */
	stringEnclosingChar: string;
	/** Character that escapes the enclosing character inside a string literal */
	stringEscapeChar: string;
	/** Reserved word escape characters. One character for both sides, or two for open/close (e.g. `[]`) */
	reservedWordEscapeChar: string;
	/** Placeholder token for prepared statements (e.g. `?`, `$`, `@p`) */
	parameterPlaceholder: string;
	/** When true, placeholders are numbered in sequence (`$1`, `$2`, ...) */
	parameterInSequence: boolean;
	/** Where the row limiting clause goes: `TOP n` at the front, `LIMIT n` at the rear */
	resultLimitPosition: LimitPosition;
}

export const DEFAULT_ENGINE_CONSTANTS: Readonly<EngineConstants> = Object.freeze({
	stringEnclosingChar: `'`,
	stringEscapeChar: `\\`,
	reservedWordEscapeChar: `"`,
	parameterPlaceholder: '?',
	parameterInSequence: false,
	resultLimitPosition: 'REAR'
});

/**
 * Always returns the opening and closing reserved word escape characters.
 */
export function parseReservedWordChars(chars: string): [string, string]
{
	if (chars.length === 1) return [chars, chars];
	if (chars.length >= 2) return [chars.charAt(0), chars.charAt(1)];
	return ['"', '"'];
}

/**
 * Read-only view of engine constants with the text operations the compiler needs.
 * Empty strings in the supplied constants fall back to the defaults.
 */
export class Dialect
{
	readonly constants: Readonly<EngineConstants>;

	constructor(constants: Partial<EngineConstants> = {})
	{
		const pick = (value: string | undefined, fallback: string): string =>
			value !== undefined && value !== '' ? value : fallback;

		this.constants = Object.freeze({
			stringEnclosingChar: pick(constants.stringEnclosingChar, DEFAULT_ENGINE_CONSTANTS.stringEnclosingChar),
			stringEscapeChar: pick(constants.stringEscapeChar, DEFAULT_ENGINE_CONSTANTS.stringEscapeChar),
			reservedWordEscapeChar: pick(constants.reservedWordEscapeChar, DEFAULT_ENGINE_CONSTANTS.reservedWordEscapeChar),
			parameterPlaceholder: pick(constants.parameterPlaceholder, DEFAULT_ENGINE_CONSTANTS.parameterPlaceholder),
			parameterInSequence: constants.parameterInSequence ?? DEFAULT_ENGINE_CONSTANTS.parameterInSequence,
			resultLimitPosition: constants.resultLimitPosition ?? DEFAULT_ENGINE_CONSTANTS.resultLimitPosition
		});
	}

	get placeholder(): string
	{
		return this.constants.parameterPlaceholder;
	}

	get inSequence(): boolean
	{
		return this.constants.parameterInSequence;
	}

	get limitPosition(): LimitPosition
	{
		return this.constants.resultLimitPosition;
	}

	/**
	 * Doubles the enclosing character inside a string by prefixing the escape character.
	 * @param value Raw string (e.g. "O'Brien")
	 * @returns Escaped string (e.g. "O\'Brien" with the default constants)
	 */
	escapeString(value: string): string
	{
		if (value.length === 0) return value;
		const { stringEnclosingChar: quote, stringEscapeChar: escape } = this.constants;
		return value.split(quote).join(escape + quote);
	}

	/**
	 * Escapes and encloses a string literal.
	 */
	quoteString(value: string): string
	{
		const quote = this.constants.stringEnclosingChar;
		return quote + this.escapeString(value) + quote;
	}

	/**
	 * Escape identifiers with the reserved word characters, supports table.field format
	 * @param identifier Identifier (e.g., "users.id" or "id")
	 * @returns Escaped identifier (e.g., "[users].[id]" for SQL Server)
	 */
	escapeIdentifier(identifier: string): string
	{
		const [open, close] = parseReservedWordChars(this.constants.reservedWordEscapeChar);
		return identifier.split('.').map(part => `${open}${part}${close}`).join('.');
	}
}

/**
 * MySQL: backtick identifiers, backslash string escapes, `?` placeholders.
 */
export class MySQLDialect extends Dialect
{
	constructor()
	{
		super({
			stringEnclosingChar: `'`,
			stringEscapeChar: `\\`,
			reservedWordEscapeChar: '`',
			parameterPlaceholder: '?',
			parameterInSequence: false,
			resultLimitPosition: 'REAR'
		});
	}
}

/**
 * PostgreSQL: double-quoted identifiers, doubled quotes, `$1`-style placeholders.
 */
export class PostgreSQLDialect extends Dialect
{
	constructor()
	{
		super({
			stringEnclosingChar: `'`,
			stringEscapeChar: `'`,
			reservedWordEscapeChar: '"',
			parameterPlaceholder: '$',
			parameterInSequence: true,
			resultLimitPosition: 'REAR'
		});
	}
}

/**
 * SQLite: double-quoted identifiers, doubled quotes, `?` placeholders.
 */
export class SQLiteDialect extends Dialect
{
	constructor()
	{
		super({
			stringEnclosingChar: `'`,
			stringEscapeChar: `'`,
			reservedWordEscapeChar: '"',
			parameterPlaceholder: '?',
			parameterInSequence: false,
			resultLimitPosition: 'REAR'
		});
	}
}

/**
 * SQL Server: bracket identifiers, `@p1`-style placeholders, `TOP n` row limiting.
 */
export class SQLServerDialect extends Dialect
{
	constructor()
	{
		super({
			stringEnclosingChar: `'`,
			stringEscapeChar: `'`,
			reservedWordEscapeChar: '[]',
			parameterPlaceholder: '@p',
			parameterInSequence: true,
			resultLimitPosition: 'FRONT'
		});
	}
}

export type DialectName = 'mysql' | 'postgresql' | 'sqlite' | 'sqlserver';

export function dialectFor(name: DialectName): Dialect
{
	switch (name)
	{
		case 'mysql':
			return new MySQLDialect();
		case 'postgresql':
			return new PostgreSQLDialect();
		case 'sqlite':
			return new SQLiteDialect();
		case 'sqlserver':
			return new SQLServerDialect();
	}
}
