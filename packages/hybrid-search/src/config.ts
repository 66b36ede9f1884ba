/**
 * Configuration for hybrid-search
 */

import { z } from "zod";
import { isLogLevel, LOG_LEVELS, type LogLevel } from "./diagnostics";
import { ConfigError } from "./errors";

// ============================================================================
// Types
// ============================================================================

export interface Bm25Parameters {
	/** Term-frequency saturation */
	k1: number;
	/** Length normalization */
	b: number;
	/** Floor for negative IDF values, as a fraction of the mean IDF */
	epsilon: number;
}

export interface HybridSearchConfig {
	/** Results returned when the caller gives no topK */
	defaultTopK: number;
	/** Candidates per branch = topK * overFetchMultiplier */
	overFetchMultiplier: number;
	/** Sparse candidates fetched before post-hoc filtering = topK * this */
	filteredOverFetchMultiplier: number;
	/** RRF smoothing constant */
	rrfK: number;
	bm25: Bm25Parameters;
	/** Upper bound on a single vector port call */
	vectorTimeoutMs: number;
	logLevel: LogLevel;
}

export const DEFAULT_CONFIG: HybridSearchConfig = {
	defaultTopK: 5,
	overFetchMultiplier: 3,
	filteredOverFetchMultiplier: 10,
	rrfK: 60,
	bm25: { k1: 1.5, b: 0.75, epsilon: 0.25 },
	vectorTimeoutMs: 10_000,
	logLevel: "info",
};

export type HybridSearchConfigInput = Partial<Omit<HybridSearchConfig, "bm25">> & {
	bm25?: Partial<Bm25Parameters>;
};

// ============================================================================
// Validation
// ============================================================================

const ConfigSchema = z.object({
	defaultTopK: z.number().int().positive(),
	overFetchMultiplier: z.number().int().positive(),
	filteredOverFetchMultiplier: z.number().int().positive(),
	rrfK: z.number().nonnegative(),
	bm25: z.object({
		k1: z.number().nonnegative(),
		b: z.number().min(0).max(1),
		epsilon: z.number().nonnegative(),
	}),
	vectorTimeoutMs: z.number().int().positive(),
	logLevel: z.enum(LOG_LEVELS),
});

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => {
			const path = issue.path.length > 0 ? issue.path.join(".") : "root";
			return `${path}: ${issue.message}`;
		})
		.join("; ");
}

/**
 * Merge a partial config over the defaults and validate the result.
 * @throws ConfigError when any value is out of range
 */
export function resolveConfig(input: HybridSearchConfigInput = {}): HybridSearchConfig {
	const candidate: HybridSearchConfig = {
		...DEFAULT_CONFIG,
		...input,
		bm25: { ...DEFAULT_CONFIG.bm25, ...input.bm25 },
	};

	const result = ConfigSchema.safeParse(candidate);
	if (!result.success) {
		throw new ConfigError(`Invalid hybrid-search config: ${formatIssues(result.error)}`);
	}
	return result.data;
}

// ============================================================================
// Environment
// ============================================================================

const ENV_NUMBER_KEYS = {
	HYBRID_SEARCH_TOP_K: "defaultTopK",
	HYBRID_SEARCH_RRF_K: "rrfK",
	HYBRID_SEARCH_VECTOR_TIMEOUT_MS: "vectorTimeoutMs",
} as const;

function parseEnvNumber(name: string, raw: string): number {
	const value = Number(raw.trim());
	if (raw.trim() === "" || !Number.isFinite(value)) {
		throw new ConfigError(`${name} must be a number, got "${raw}"`);
	}
	return value;
}

/**
 * Read overrides from environment variables:
 * HYBRID_SEARCH_TOP_K, HYBRID_SEARCH_RRF_K, HYBRID_SEARCH_VECTOR_TIMEOUT_MS,
 * HYBRID_SEARCH_LOG_LEVEL.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): HybridSearchConfig {
	const input: HybridSearchConfigInput = {};

	for (const [name, key] of Object.entries(ENV_NUMBER_KEYS)) {
		const raw = env[name];
		if (raw !== undefined) {
			input[key] = parseEnvNumber(name, raw);
		}
	}

	const level = env.HYBRID_SEARCH_LOG_LEVEL;
	if (level !== undefined) {
		const normalized = level.trim().toLowerCase();
		if (!isLogLevel(normalized)) {
			throw new ConfigError(`HYBRID_SEARCH_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${level}"`);
		}
		input.logLevel = normalized;
	}

	return resolveConfig(input);
}
