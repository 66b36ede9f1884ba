import { describe, expect, test } from "vitest";
import { configFromEnv, DEFAULT_CONFIG, resolveConfig } from "../config";
import { ConfigError } from "../errors";

describe("resolveConfig", () => {
	test("defaults", () => {
		expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
		expect(DEFAULT_CONFIG).toMatchObject({
			defaultTopK: 5,
			overFetchMultiplier: 3,
			filteredOverFetchMultiplier: 10,
			rrfK: 60,
			bm25: { k1: 1.5, b: 0.75, epsilon: 0.25 },
		});
	});

	test("merges partial BM25 parameters", () => {
		expect(resolveConfig({ bm25: { k1: 1.2 } }).bm25).toEqual({ k1: 1.2, b: 0.75, epsilon: 0.25 });
	});

	test("rejects out-of-range values", () => {
		expect(() => resolveConfig({ defaultTopK: 0 })).toThrow(ConfigError);
		expect(() => resolveConfig({ defaultTopK: 0 })).toThrow(/^Invalid hybrid-search config: defaultTopK: /);
		expect(() => resolveConfig({ bm25: { b: 1.5 } })).toThrow(/bm25\.b: /);
	});
});

describe("configFromEnv", () => {
	test("reads overrides", () => {
		const config = configFromEnv({
			HYBRID_SEARCH_TOP_K: "8",
			HYBRID_SEARCH_RRF_K: "30",
			HYBRID_SEARCH_VECTOR_TIMEOUT_MS: "2500",
			HYBRID_SEARCH_LOG_LEVEL: " WARN ",
		});

		expect(config).toMatchObject({ defaultTopK: 8, rrfK: 30, vectorTimeoutMs: 2500, logLevel: "warn" });
	});

	test("an empty environment gives the defaults", () => {
		expect(configFromEnv({})).toEqual(DEFAULT_CONFIG);
	});

	test("rejects unparseable values", () => {
		expect(() => configFromEnv({ HYBRID_SEARCH_TOP_K: "abc" })).toThrow('HYBRID_SEARCH_TOP_K must be a number, got "abc"');
		expect(() => configFromEnv({ HYBRID_SEARCH_LOG_LEVEL: "loud" })).toThrow(
			'HYBRID_SEARCH_LOG_LEVEL must be one of debug, info, warn, error, got "loud"',
		);
		expect(() => configFromEnv({ HYBRID_SEARCH_TOP_K: "2.5" })).toThrow(ConfigError);
	});
});
