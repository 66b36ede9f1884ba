/**
 * Structured logger for hybrid-search
 *
 * Leveled logging with bound context. Fallback paths log at "warn" so that
 * operators can see when filters are being discarded.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

export interface LogEntry {
	level: LogLevel;
	message: string;
	timestamp: number;
	context?: LogContext;
	error?: Error;
}

export interface Logger {
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, error?: Error, context?: LogContext): void;

	/** Create a child logger with additional context */
	child(context: LogContext): Logger;

	setLevel(level: LogLevel): void;

	/** Stored entries (only when storeEntries is on) */
	getEntries(): LogEntry[];

	clear(): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

const LEVEL_NAMES: readonly string[] = LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
	return LEVEL_NAMES.includes(value);
}

export interface LoggerOptions {
	/** Minimum level to log (default: "info") */
	level?: LogLevel;
	/** Keep entries in memory (default: false) */
	storeEntries?: boolean;
	/** Maximum entries to keep (default: 1000) */
	maxEntries?: number;
	/** Write formatted lines to the console (default: true) */
	console?: boolean;
	prefix?: string;
	/** Context merged into every entry */
	baseContext?: LogContext;
}

/**
 * Shared state between a logger and its children: they write to the same
 * entry buffer and honor the same level.
 */
interface LoggerCore {
	level: LogLevel;
	readonly entries: LogEntry[];
	readonly storeEntries: boolean;
	readonly maxEntries: number;
	readonly useConsole: boolean;
	readonly prefix: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
	const core: LoggerCore = {
		level: options.level ?? "info",
		entries: [],
		storeEntries: options.storeEntries ?? false,
		maxEntries: options.maxEntries ?? 1000,
		useConsole: options.console ?? true,
		prefix: options.prefix ?? "[hybrid-search]",
	};
	return bindLogger(core, options.baseContext ?? {});
}

function formatLine(prefix: string, entry: LogEntry): string {
	const timestamp = new Date(entry.timestamp).toISOString();
	const contextStr =
		entry.context && Object.keys(entry.context).length > 0
			? ` ${JSON.stringify(entry.context)}`
			: "";
	return `${timestamp} ${prefix} [${entry.level.toUpperCase()}] ${entry.message}${contextStr}`;
}

function writeToConsole(line: string, entry: LogEntry): void {
	switch (entry.level) {
		case "debug":
			console.debug(line);
			break;
		case "info":
			console.info(line);
			break;
		case "warn":
			console.warn(line);
			break;
		case "error":
			console.error(line);
			if (entry.error?.stack) {
				console.error(entry.error.stack);
			}
			break;
	}
}

function bindLogger(core: LoggerCore, baseContext: LogContext): Logger {
	function log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
		if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[core.level]) return;

		const merged = { ...baseContext, ...context };
		const entry: LogEntry = {
			level,
			message,
			timestamp: Date.now(),
			context: Object.keys(merged).length > 0 ? merged : undefined,
			error,
		};

		if (core.storeEntries) {
			core.entries.push(entry);
			if (core.entries.length > core.maxEntries) {
				core.entries.shift();
			}
		}

		if (core.useConsole) {
			writeToConsole(formatLine(core.prefix, entry), entry);
		}
	}

	return {
		debug: (message, context) => log("debug", message, context),
		info: (message, context) => log("info", message, context),
		warn: (message, context) => log("warn", message, context),
		error: (message, error, context) => log("error", message, context, error),

		child(context: LogContext): Logger {
			return bindLogger(core, { ...baseContext, ...context });
		},

		setLevel(level: LogLevel): void {
			core.level = level;
		},

		getEntries(): LogEntry[] {
			return [...core.entries];
		},

		clear(): void {
			core.entries.length = 0;
		},
	};
}

/** Silent logger for tests and embedding callers that bring their own */
export const nullLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
	child: () => nullLogger,
	setLevel: () => {},
	getEntries: () => [],
	clear: () => {},
};
