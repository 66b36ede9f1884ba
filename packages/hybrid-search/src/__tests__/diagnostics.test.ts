import { describe, expect, test } from "vitest";
import { createLogger, createMetricsRegistry, createRetrievalMetrics, isLogLevel } from "../diagnostics";

describe("createLogger", () => {
	test("drops entries below the level", () => {
		const logger = createLogger({ level: "warn", storeEntries: true, console: false });
		logger.debug("hidden");
		logger.info("hidden too");
		logger.warn("shown", { attempt: 1 });

		const entries = logger.getEntries();
		expect(entries).toHaveLength(1);
		expect(entries[0]).toMatchObject({ level: "warn", message: "shown", context: { attempt: 1 } });
	});

	test("children merge context and share level and entries", () => {
		const logger = createLogger({ storeEntries: true, console: false, baseContext: { service: "kb" } });
		const child = logger.child({ component: "sparse" });

		child.info("from child", { query: "vpn" });
		logger.setLevel("error");
		child.warn("suppressed");

		expect(logger.getEntries()).toHaveLength(1);
		expect(logger.getEntries()[0].context).toEqual({ service: "kb", component: "sparse", query: "vpn" });
	});

	test("error entries carry the error object", () => {
		const logger = createLogger({ storeEntries: true, console: false });
		const failure = new Error("boom");
		logger.error("port failed", failure);

		expect(logger.getEntries()[0].error).toBe(failure);
		expect(logger.getEntries()[0].context).toBeUndefined();
	});

	test("keeps at most maxEntries and clears", () => {
		const logger = createLogger({ storeEntries: true, console: false, maxEntries: 2 });
		logger.info("one");
		logger.info("two");
		logger.info("three");

		expect(logger.getEntries().map((e) => e.message)).toEqual(["two", "three"]);
		logger.clear();
		expect(logger.getEntries()).toEqual([]);
	});

	test("isLogLevel recognizes the four levels", () => {
		expect(isLogLevel("debug")).toBe(true);
		expect(isLogLevel("trace")).toBe(false);
	});
});

describe("metrics", () => {
	test("counters and gauges", () => {
		const registry = createMetricsRegistry();
		const counter = registry.counter("queries");
		counter.inc();
		counter.add(4);
		registry.gauge("docs").set(12);

		expect(registry.counter("queries").get()).toBe(5);
		expect(registry.snapshot().counters).toEqual({ queries: 5 });
		expect(registry.snapshot().gauges).toEqual({ docs: 12 });
	});

	test("histogram statistics", () => {
		const histogram = createMetricsRegistry().histogram("latency");
		for (const value of [4, 1, 3, 2]) histogram.observe(value);

		expect(histogram.getStats()).toEqual({ count: 4, sum: 10, min: 1, max: 4, avg: 2.5, p50: 2, p90: 4, p99: 4 });
	});

	test("timers record one sample per run", async () => {
		const timer = createMetricsRegistry().timer("query_ms");
		const value = await timer.time(async () => "done");
		const stop = timer.start();
		const elapsed = stop();

		expect(value).toBe("done");
		expect(elapsed).toBeGreaterThanOrEqual(0);
		expect(timer.getHistogram().getStats().count).toBe(2);
	});

	test("reset clears counters but keeps gauges", () => {
		const metrics = createRetrievalMetrics();
		metrics.sparseFilterFallbacks.inc();
		metrics.indexedDocuments.set(3);
		metrics.registry.reset();

		expect(metrics.sparseFilterFallbacks.get()).toBe(0);
		expect(metrics.indexedDocuments.get()).toBe(3);
	});
});
