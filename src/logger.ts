/**
 * @file Leveled logger used by the builder and compiler.
 */

/**
 * Available log levels in order of priority (from lowest to highest).
 */
export enum LogLevel {
	/** Log all messages (debug, info, warn, error) */
	ALL = 0,
	/** Log debug, info, warn and error messages */
	DEBUG = 10,
	/** Log info, warn and error messages */
	INFO = 20,
	/** Log warn and error messages only */
	WARN = 30,
	/** Log error messages only */
	ERROR = 40,
	/** Disable all logging */
	OFF = 50
}

/**
 * Structured payload attached to a log entry.
 */
export type LogData = Record<string, unknown>;

export interface LogEntry {
	timestamp: Date;
	level: LogLevel;
	message: string;
	context?: string;
	data?: LogData;
}

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
	/** The minimum log level to output (default: WARN) */
	level?: LogLevel;
	/** Whether to output logs to console (default: true) */
	console?: boolean;
	/** Custom log formatter function */
	formatter?: (entry: LogEntry) => string;
	/** Custom log handler function */
	handler?: (entry: LogEntry) => void;
}

// bigint arguments would make JSON.stringify throw
const stringifyData = (data: LogData): string =>
	JSON.stringify(data, (_key, value: unknown) => typeof value === 'bigint' ? `${value}n` : value);

/**
 * Default log formatter: `<iso time> <LEVEL> [context] message {data}`.
 */
export const defaultFormatter = (entry: LogEntry): string => {
	const timestamp = entry.timestamp.toISOString();
	const level = LogLevel[entry.level].padEnd(5);
	const context = entry.context ? `[${entry.context}] ` : '';
	const data = entry.data ? ` ${stringifyData(entry.data)}` : '';
	return `${timestamp} ${level} ${context}${entry.message}${data}`;
};

/**
 * Logger with configurable level and output.
 * Statement builds are hot paths, so the default level is WARN.
 */
export class Logger {
	private config: Required<LoggerConfig>;

	constructor(config: LoggerConfig = {}) {
		this.config = {
			level: config.level ?? LogLevel.WARN,
			console: config.console ?? true,
			formatter: config.formatter ?? defaultFormatter,
			handler: config.handler ?? this.writeToConsole.bind(this)
		};
	}

	/**
	 * Updates the logger configuration. Omitted hooks keep their current value.
	 */
	configure(config: Partial<LoggerConfig>): void {
		this.config = {
			level: config.level ?? this.config.level,
			console: config.console ?? this.config.console,
			formatter: config.formatter ?? this.config.formatter,
			handler: config.handler ?? this.config.handler
		};
	}

	getLevel(): LogLevel {
		return this.config.level;
	}

	setLevel(level: LogLevel): void {
		this.config.level = level;
	}

	private shouldLog(level: LogLevel): boolean {
		return this.config.level !== LogLevel.OFF && level >= this.config.level;
	}

	private writeToConsole(entry: LogEntry): void {
		if (!this.config.console) return;

		const formatted = this.config.formatter(entry);

		switch (entry.level) {
			case LogLevel.ERROR:
				console.error(formatted);
				break;
			case LogLevel.WARN:
				console.warn(formatted);
				break;
			case LogLevel.DEBUG:
				console.debug(formatted);
				break;
			default:
				console.log(formatted);
				break;
		}
	}

	private log(level: LogLevel, message: string, context?: string, data?: LogData): void {
		if (!this.shouldLog(level)) return;

		this.config.handler({
			timestamp: new Date(),
			level,
			message,
			context,
			data
		});
	}

	debug(message: string, context?: string, data?: LogData): void {
		this.log(LogLevel.DEBUG, message, context, data);
	}

	info(message: string, context?: string, data?: LogData): void {
		this.log(LogLevel.INFO, message, context, data);
	}

	warn(message: string, context?: string, data?: LogData): void {
		this.log(LogLevel.WARN, message, context, data);
	}

	error(message: string, context?: string, data?: LogData): void {
		this.log(LogLevel.ERROR, message, context, data);
	}
}

/**
 * Logger bound to a fixed context.
 */
export interface ContextLogger {
	debug(message: string, data?: LogData): void;
	info(message: string, data?: LogData): void;
	warn(message: string, data?: LogData): void;
	error(message: string, data?: LogData): void;
}

/**
 * Global logger instance shared by every builder.
 */
export const globalLogger = new Logger();

/**
 * Returns a logger that writes through {@link globalLogger} with the given context.
 */
export function getLogger(context?: string): ContextLogger {
	return {
		debug: (message, data) => globalLogger.debug(message, context, data),
		info: (message, data) => globalLogger.info(message, context, data),
		warn: (message, data) => globalLogger.warn(message, context, data),
		error: (message, data) => globalLogger.error(message, context, data)
	};
}
