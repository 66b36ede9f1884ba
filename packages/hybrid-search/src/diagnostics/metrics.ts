/**
 * Metrics for hybrid-search
 *
 * In-process counters, gauges and duration histograms. Degraded fallbacks
 * each have their own counter so a dashboard can alert on filters being
 * silently discarded.
 */

export interface Counter {
	inc(): void;
	add(value: number): void;
	get(): number;
	reset(): void;
}

export interface Gauge {
	set(value: number): void;
	get(): number;
}

export interface HistogramStats {
	count: number;
	sum: number;
	min: number;
	max: number;
	avg: number;
	p50: number;
	p90: number;
	p99: number;
}

export interface Histogram {
	observe(value: number): void;
	getStats(): HistogramStats;
	reset(): void;
}

export interface Timer {
	/** Start timing; the returned function stops and records the duration in ms */
	start(): () => number;
	time<T>(fn: () => Promise<T>): Promise<T>;
	getHistogram(): Histogram;
}

export interface MetricsSnapshot {
	timestamp: number;
	counters: Record<string, number>;
	gauges: Record<string, number>;
	histograms: Record<string, HistogramStats>;
}

export interface MetricsRegistry {
	counter(name: string): Counter;
	gauge(name: string): Gauge;
	histogram(name: string): Histogram;
	timer(name: string): Timer;
	snapshot(): MetricsSnapshot;
	/** Reset counters and histograms; gauges hold current state and are kept */
	reset(): void;
}

/** Histograms keep the most recent samples only */
const MAX_HISTOGRAM_SAMPLES = 10_000;

const EMPTY_STATS: HistogramStats = {
	count: 0,
	sum: 0,
	min: 0,
	max: 0,
	avg: 0,
	p50: 0,
	p90: 0,
	p99: 0,
};

function percentile(sorted: number[], p: number): number {
	const index = Math.ceil((p / 100) * sorted.length) - 1;
	return sorted[Math.max(0, Math.min(index, sorted.length - 1))];
}

function createCounter(): Counter {
	let value = 0;
	return {
		inc: () => {
			value++;
		},
		add: (v: number) => {
			value += v;
		},
		get: () => value,
		reset: () => {
			value = 0;
		},
	};
}

function createGauge(): Gauge {
	let value = 0;
	return {
		set: (v: number) => {
			value = v;
		},
		get: () => value,
	};
}

function createHistogram(): Histogram {
	const samples: number[] = [];

	return {
		observe(value: number) {
			samples.push(value);
			if (samples.length > MAX_HISTOGRAM_SAMPLES) {
				samples.shift();
			}
		},

		getStats(): HistogramStats {
			if (samples.length === 0) return { ...EMPTY_STATS };

			const sorted = [...samples].sort((a, b) => a - b);
			const sum = sorted.reduce((acc, v) => acc + v, 0);
			return {
				count: sorted.length,
				sum,
				min: sorted[0],
				max: sorted[sorted.length - 1],
				avg: sum / sorted.length,
				p50: percentile(sorted, 50),
				p90: percentile(sorted, 90),
				p99: percentile(sorted, 99),
			};
		},

		reset() {
			samples.length = 0;
		},
	};
}

function createTimer(histogram: Histogram): Timer {
	const start = (): (() => number) => {
		const startedAt = performance.now();
		return () => {
			const duration = performance.now() - startedAt;
			histogram.observe(duration);
			return duration;
		};
	};

	return {
		start,
		async time<T>(fn: () => Promise<T>): Promise<T> {
			const stop = start();
			try {
				return await fn();
			} finally {
				stop();
			}
		},
		getHistogram: () => histogram,
	};
}

function getOrCreate<T>(map: Map<string, T>, name: string, create: () => T): T {
	let metric = map.get(name);
	if (!metric) {
		metric = create();
		map.set(name, metric);
	}
	return metric;
}

export function createMetricsRegistry(): MetricsRegistry {
	const counters = new Map<string, Counter>();
	const gauges = new Map<string, Gauge>();
	const histograms = new Map<string, Histogram>();

	const histogram = (name: string): Histogram => getOrCreate(histograms, name, createHistogram);

	return {
		counter: (name) => getOrCreate(counters, name, createCounter),
		gauge: (name) => getOrCreate(gauges, name, createGauge),
		histogram,
		timer: (name) => createTimer(histogram(name)),

		snapshot(): MetricsSnapshot {
			const snapshot: MetricsSnapshot = {
				timestamp: Date.now(),
				counters: {},
				gauges: {},
				histograms: {},
			};
			for (const [name, counter] of counters) snapshot.counters[name] = counter.get();
			for (const [name, gauge] of gauges) snapshot.gauges[name] = gauge.get();
			for (const [name, h] of histograms) snapshot.histograms[name] = h.getStats();
			return snapshot;
		},

		reset(): void {
			for (const counter of counters.values()) counter.reset();
			for (const h of histograms.values()) h.reset();
		},
	};
}

/**
 * Pre-defined metrics for retrieval operations
 */
export interface RetrievalMetrics {
	// Queries
	queriesExecuted: Counter;
	queryDuration: Timer;
	denseSearches: Counter;
	sparseSearches: Counter;

	// Failures and degradations
	denseFailures: Counter;
	denseFilterRetries: Counter;
	sparseFilterFallbacks: Counter;
	unfilteredRetries: Counter;

	// Index
	indexRebuilds: Counter;
	indexedDocuments: Gauge;

	registry: MetricsRegistry;
}

export function createRetrievalMetrics(registry: MetricsRegistry = createMetricsRegistry()): RetrievalMetrics {
	return {
		queriesExecuted: registry.counter("queries_executed"),
		queryDuration: registry.timer("query_duration_ms"),
		denseSearches: registry.counter("dense_searches"),
		sparseSearches: registry.counter("sparse_searches"),

		denseFailures: registry.counter("dense_failures"),
		denseFilterRetries: registry.counter("dense_filter_retries"),
		sparseFilterFallbacks: registry.counter("sparse_filter_fallbacks"),
		unfilteredRetries: registry.counter("unfiltered_retries"),

		indexRebuilds: registry.counter("index_rebuilds"),
		indexedDocuments: registry.gauge("indexed_documents"),

		registry,
	};
}
