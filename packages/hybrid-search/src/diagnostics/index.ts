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
	type LogContext,
	type LoggerOptions,
} from "./logger";

export {
	createMetricsRegistry,
	createRetrievalMetrics,
	type MetricsRegistry,
	type MetricsSnapshot,
	type Counter,
	type Gauge,
	type Histogram,
	type HistogramStats,
	type Timer,
	type RetrievalMetrics,
} from "./metrics";
