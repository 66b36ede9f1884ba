/**
 * Hybrid Search - dense + sparse retrieval fused with RRF
 *
 * Per query:
 * 1. Dense branch: vector port, filter applied natively (one unfiltered retry on failure)
 * 2. Sparse branch: BM25, filter applied post-hoc (unfiltered fallback when nothing survives)
 * 3. Fuse [dense, sparse] with reciprocal rank fusion
 * 4. Empty fused result under a filter: rerun the whole pass once without it
 * 5. Truncate to topK
 *
 * Every fallback is logged at warn, counted, and listed in the result metadata.
 */

import { resolveConfig, type HybridSearchConfig, type HybridSearchConfigInput } from "../config";
import { createLogger, createRetrievalMetrics, type Logger, type RetrievalMetrics } from "../diagnostics";
import type { CorpusIndex } from "../indexing/corpus-index";
import type { IndexHandle } from "../indexing/index-handle";
import type {
	BranchOutcome,
	Degradation,
	FusedResult,
	HybridSearchResult,
	RankedDocument,
	SearchResult,
} from "../types";
import { runDenseBranch } from "./dense-branch";
import { type FilterPredicate, toWireFilter } from "./filter-predicate";
import { fuseWithRrf } from "./rrf-fusion";
import { runSparseBranch } from "./sparse-branch";
import type { VectorSearchPort } from "./vector-port";

// ============================================================================
// Types
// ============================================================================

export interface HybridSearchOptions {
	/** Results to return (default: config.defaultTopK) */
	topK?: number;
	filter?: FilterPredicate | null;
}

export interface HybridRetriever {
	/**
	 * @throws IndexUnavailableError before an index is published
	 * @throws MalformedPredicateError on a predicate the evaluator rejects
	 * @throws VectorPortFailureError when the dense branch fails for good
	 * @throws RangeError when topK is not a positive integer
	 */
	search(query: string, options?: HybridSearchOptions): Promise<HybridSearchResult>;

	/** Dense branch alone, with the same retry policy */
	searchDense(query: string, options?: HybridSearchOptions): Promise<SearchResult[]>;

	/** BM25 alone, with the same post-hoc filtering and fallback */
	searchSparse(query: string, options?: HybridSearchOptions): SearchResult[];

	readonly config: HybridSearchConfig;
}

export interface HybridRetrieverDeps {
	index: IndexHandle;
	vectorPort: VectorSearchPort;
	logger?: Logger;
	metrics?: RetrievalMetrics;
	config?: HybridSearchConfigInput;
}

interface PassResult {
	dense: BranchOutcome;
	sparse: BranchOutcome;
	fused: FusedResult[];
}

// ============================================================================
// Implementation
// ============================================================================

export function createHybridRetriever(deps: HybridRetrieverDeps): HybridRetriever {
	const config = resolveConfig(deps.config);
	const logger = deps.logger ?? createLogger({ level: config.logLevel });
	const metrics = deps.metrics ?? createRetrievalMetrics();
	const handle = deps.index;

	function resolveTopK(topK: number | undefined): number {
		const value = topK ?? config.defaultTopK;
		if (!Number.isInteger(value) || value <= 0) {
			throw new RangeError(`topK must be a positive integer, got ${value}`);
		}
		return value;
	}

	async function runPass(
		index: CorpusIndex,
		query: string,
		topK: number,
		filter: FilterPredicate | null,
	): Promise<PassResult> {
		const limit = topK * config.overFetchMultiplier;

		const densePending = runDenseBranch(
			{ port: deps.vectorPort, index, timeoutMs: config.vectorTimeoutMs, logger, metrics },
			{ query, limit, filter },
		);
		const sparsePending = Promise.resolve().then(() =>
			runSparseBranch(
				{ index, logger, metrics },
				{ query, limit, candidateLimit: topK * config.filteredOverFetchMultiplier, filter },
			),
		);

		const [dense, sparse] = await Promise.all([densePending, sparsePending]);
		if (dense.status === "failed") {
			throw dense.error;
		}

		return { dense, sparse, fused: fuseWithRrf([dense.items, sparse.items], config.rrfK) };
	}

	async function executeWithFallback(
		index: CorpusIndex,
		query: string,
		topK: number,
		filter: FilterPredicate | null,
	): Promise<{ pass: PassResult; degradations: Degradation[]; filterDropped: boolean }> {
		const first = await runPass(index, query, topK, filter);
		if (first.fused.length > 0 || !filter) {
			return { pass: first, degradations: collectDegradations(first), filterDropped: false };
		}

		metrics.unfilteredRetries.inc();
		logger.warn("Filtered hybrid search returned nothing; retrying without filter", {
			query,
			filter: toWireFilter(filter),
		});

		const retry = await runPass(index, query, topK, null);
		return {
			pass: retry,
			degradations: [
				...collectDegradations(first),
				{ kind: "unfiltered-retry", reason: "no result satisfied the filter in either branch" },
				...collectDegradations(retry),
			],
			filterDropped: true,
		};
	}

	return {
		config,

		async search(query: string, options: HybridSearchOptions = {}): Promise<HybridSearchResult> {
			const topK = resolveTopK(options.topK);
			const filter = options.filter ?? null;
			const snapshot = handle.current();

			metrics.queriesExecuted.inc();
			const startedAt = performance.now();

			const { pass, degradations, filterDropped } = await metrics.queryDuration.time(() =>
				executeWithFallback(snapshot.index, query, topK, filter),
			);

			const results = pass.fused.slice(0, topK).map(toSearchResult);
			const queryTime = performance.now() - startedAt;
			const filterApplied =
				filter !== null && !filterDropped && pass.dense.status === "ok" && pass.sparse.status === "ok";

			logger.debug("Hybrid search complete", {
				query,
				topK,
				results: results.length,
				denseHits: pass.dense.items.length,
				sparseHits: pass.sparse.items.length,
				degradations: degradations.map((d) => d.kind),
				queryTime,
			});

			return {
				results,
				metadata: {
					queryTime,
					denseHits: pass.dense.items.length,
					sparseHits: pass.sparse.items.length,
					filterApplied,
					degradations,
					indexVersion: snapshot.version,
				},
			};
		},

		async searchDense(query: string, options: HybridSearchOptions = {}): Promise<SearchResult[]> {
			const topK = resolveTopK(options.topK);
			const { index } = handle.current();

			const outcome = await runDenseBranch(
				{ port: deps.vectorPort, index, timeoutMs: config.vectorTimeoutMs, logger, metrics },
				{ query, limit: topK, filter: options.filter ?? null },
			);
			if (outcome.status === "failed") {
				throw outcome.error;
			}
			return outcome.items.map(toSearchResult);
		},

		searchSparse(query: string, options: HybridSearchOptions = {}): SearchResult[] {
			const topK = resolveTopK(options.topK);
			const { index } = handle.current();

			const outcome = runSparseBranch(
				{ index, logger, metrics },
				{
					query,
					limit: topK,
					candidateLimit: topK * config.filteredOverFetchMultiplier,
					filter: options.filter ?? null,
				},
			);
			return outcome.items.map(toSearchResult);
		},
	};
}

// ============================================================================
// Pure Functions
// ============================================================================

function collectDegradations(pass: PassResult): Degradation[] {
	const degradations: Degradation[] = [];
	if (pass.dense.status === "degraded") degradations.push(pass.dense.degradation);
	if (pass.sparse.status === "degraded") degradations.push(pass.sparse.degradation);
	return degradations;
}

function toSearchResult(item: FusedResult | RankedDocument): SearchResult {
	return { ...item.document, score: item.score, rank: item.rank };
}
