/**
 * Metrics for similarity-search
 *
 * In-process counters and latency histograms. Nothing is exported to an
 * external backend; callers read `snapshot()`.
 */

export interface Counter {
	inc(): void;
	add(value: number): void;
	get(): number;
	reset(): void;
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
	/** Start timing; the returned function stops and records the duration */
	start(): () => number;
	time<T>(fn: () => Promise<T>): Promise<T>;
	getHistogram(): Histogram;
}

export interface MetricsRegistry {
	counter(name: string, help?: string): Counter;
	histogram(name: string, help?: string): Histogram;
	/** Histogram of durations in milliseconds */
	timer(name: string, help?: string): Timer;
	snapshot(): MetricsSnapshot;
	reset(): void;
	describe(name: string): string | undefined;
}

export interface MetricsSnapshot {
	timestamp: number;
	counters: Record<string, number>;
	histograms: Record<string, HistogramStats>;
}

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

function createCounter(): Counter {
	let value = 0;
	return {
		inc() {
			value++;
		},
		add(v: number) {
			value += v;
		},
		get() {
			return value;
		},
		reset() {
			value = 0;
		},
	};
}

/** Nearest-rank percentile over an ascending array */
export function percentile(sorted: number[], p: number): number {
	if (sorted.length === 0) return 0;
	const index = Math.ceil((p / 100) * sorted.length) - 1;
	return sorted[Math.max(0, Math.min(index, sorted.length - 1))];
}

function createHistogram(): Histogram {
	const values: number[] = [];

	return {
		observe(value: number) {
			values.push(value);
		},

		getStats(): HistogramStats {
			if (values.length === 0) return { ...EMPTY_STATS };

			const sorted = [...values].sort((a, b) => a - b);
			const sum = values.reduce((a, b) => a + b, 0);

			return {
				count: values.length,
				sum,
				min: sorted[0],
				max: sorted[sorted.length - 1],
				avg: sum / values.length,
				p50: percentile(sorted, 50),
				p90: percentile(sorted, 90),
				p99: percentile(sorted, 99),
			};
		},

		reset() {
			values.length = 0;
		},
	};
}

function createTimer(histogram: Histogram): Timer {
	function start(): () => number {
		const startTime = performance.now();
		return () => {
			const duration = performance.now() - startTime;
			histogram.observe(duration);
			return duration;
		};
	}

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

		getHistogram(): Histogram {
			return histogram;
		},
	};
}

export function createMetricsRegistry(): MetricsRegistry {
	const counters = new Map<string, Counter>();
	const histograms = new Map<string, Histogram>();
	const help = new Map<string, string>();

	function histogram(name: string, description?: string): Histogram {
		let existing = histograms.get(name);
		if (!existing) {
			existing = createHistogram();
			histograms.set(name, existing);
			if (description) help.set(name, description);
		}
		return existing;
	}

	return {
		counter(name: string, description?: string): Counter {
			let counter = counters.get(name);
			if (!counter) {
				counter = createCounter();
				counters.set(name, counter);
				if (description) help.set(name, description);
			}
			return counter;
		},

		histogram,

		timer(name: string, description?: string): Timer {
			return createTimer(histogram(name, description));
		},

		snapshot(): MetricsSnapshot {
			const snapshot: MetricsSnapshot = {
				timestamp: Date.now(),
				counters: {},
				histograms: {},
			};
			for (const [name, counter] of counters) {
				snapshot.counters[name] = counter.get();
			}
			for (const [name, h] of histograms) {
				snapshot.histograms[name] = h.getStats();
			}
			return snapshot;
		},

		reset(): void {
			for (const counter of counters.values()) counter.reset();
			for (const h of histograms.values()) h.reset();
		},

		describe(name: string): string | undefined {
			return help.get(name);
		},
	};
}

/**
 * Pre-defined metrics for the search pipeline
 */
export interface SearchMetrics {
	searchesExecuted: Counter;
	searchFailures: Counter;
	searchDuration: Timer;
	facetQueries: Counter;
	recordsHydrated: Counter;
	recordsFilteredOut: Counter;
	recordParseWarnings: Counter;

	registry: MetricsRegistry;
}

export function createSearchMetrics(registry: MetricsRegistry = createMetricsRegistry()): SearchMetrics {
	return {
		searchesExecuted: registry.counter("searches_executed", "Searches that returned results"),
		searchFailures: registry.counter("search_failures", "Searches that ended in a typed failure"),
		searchDuration: registry.timer("search_duration_ms", "End-to-end search latency"),
		facetQueries: registry.counter("facet_queries", "Neighbor queries sent to the vector store"),
		recordsHydrated: registry.counter("records_hydrated", "Listing records fetched for fused candidates"),
		recordsFilteredOut: registry.counter("records_filtered_out", "Hydrated records removed by post-filters"),
		recordParseWarnings: registry.counter("record_parse_warnings", "Records excluded for malformed filter fields"),

		registry,
	};
}
