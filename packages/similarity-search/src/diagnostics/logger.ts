/**
 * Structured Logger for similarity-search
 *
 * Leveled logging with bound context. Entries can be kept in memory so
 * tests can assert on warnings without scraping the console.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
	level: LogLevel;
	message: string;
	timestamp: number;
	context?: Record<string, unknown>;
	error?: Error;
}

export type LogSink = (level: LogLevel, line: string, error?: Error) => void;

export interface Logger {
	debug(message: string, context?: Record<string, unknown>): void;
	info(message: string, context?: Record<string, unknown>): void;
	warn(message: string, context?: Record<string, unknown>): void;
	error(message: string, error?: Error, context?: Record<string, unknown>): void;

	/** Create a child logger with additional context */
	child(context: Record<string, unknown>): Logger;

	setLevel(level: LogLevel): void;

	/** Stored entries (only populated with storeEntries: true) */
	getEntries(): LogEntry[];

	clear(): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export interface LoggerOptions {
	/** Minimum level to log (default: "info") */
	level?: LogLevel;
	/** Keep entries in memory (default: false) */
	storeEntries?: boolean;
	/** Maximum entries to keep (default: 1000) */
	maxEntries?: number;
	/** Write formatted lines to the sink (default: true) */
	console?: boolean;
	/** Where formatted lines go (default: the matching console method) */
	sink?: LogSink;
	/** Prefix for all log messages */
	prefix?: string;
	/** Context added to every entry */
	baseContext?: Record<string, unknown>;
}

export function isLogLevel(value: string): value is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(value);
}

const consoleSink: LogSink = (level, line, error) => {
	switch (level) {
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
			if (error?.stack) {
				console.error(error.stack);
			}
			break;
	}
};

export function createLogger(options: LoggerOptions = {}): Logger {
	const {
		level: initialLevel = "info",
		storeEntries = false,
		maxEntries = 1000,
		console: useConsole = true,
		sink = consoleSink,
		prefix = "[similarity-search]",
		baseContext = {},
	} = options;

	let currentLevel = initialLevel;
	// Shared with children so a test can read entries from the root logger
	const entries: LogEntry[] = [];

	return buildLogger(baseContext);

	function buildLogger(boundContext: Record<string, unknown>): Logger {
		function log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
			if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[currentLevel]) return;

			const merged = { ...boundContext, ...context };
			const hasContext = Object.keys(merged).length > 0;

			if (storeEntries) {
				entries.push({
					level,
					message,
					timestamp: Date.now(),
					context: hasContext ? merged : undefined,
					error,
				});
				if (entries.length > maxEntries) {
					entries.shift();
				}
			}

			if (useConsole) {
				const contextStr = hasContext ? ` ${JSON.stringify(merged)}` : "";
				sink(level, `${new Date().toISOString()} ${prefix} [${level.toUpperCase()}] ${message}${contextStr}`, error);
			}
		}

		return {
			debug(message, context) {
				log("debug", message, context);
			},
			info(message, context) {
				log("info", message, context);
			},
			warn(message, context) {
				log("warn", message, context);
			},
			error(message, error, context) {
				log("error", message, context, error);
			},
			child(context) {
				return buildLogger({ ...boundContext, ...context });
			},
			setLevel(level) {
				currentLevel = level;
			},
			getEntries() {
				return [...entries];
			},
			clear() {
				entries.length = 0;
			},
		};
	}
}

/** Silent logger for testing */
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
