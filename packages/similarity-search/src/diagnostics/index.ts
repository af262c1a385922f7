/**
 * Diagnostics module exports
 */

export {
	createLogger,
	isLogLevel,
	nullLogger,
	LOG_LEVELS,
	type Logger,
	type LogLevel,
	type LogEntry,
	type LogSink,
	type LoggerOptions,
} from "./logger";

export {
	createMetricsRegistry,
	createSearchMetrics,
	percentile,
	type MetricsRegistry,
	type MetricsSnapshot,
	type Counter,
	type Histogram,
	type HistogramStats,
	type Timer,
	type SearchMetrics,
} from "./metrics";
