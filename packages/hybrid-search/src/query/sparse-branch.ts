/**
 * Sparse branch - BM25 retrieval with post-hoc filtering
 *
 * The BM25 index has no native filtering, so a filtered query over-fetches
 * unfiltered candidates, evaluates the predicate on each, and re-ranks the
 * survivors. When nothing survives the branch falls back to plain BM25.
 */

import type { Logger, RetrievalMetrics } from "../diagnostics";
import { toDisplay } from "../indexing/documents";
import type { CorpusIndex } from "../indexing/corpus-index";
import type { BranchOutcome, RankedDocument, RankedItem } from "../types";
import { type FilterPredicate, toWireFilter } from "./filter-predicate";
import { compileFilter } from "./filter-evaluator";

export interface SparseBranchRequest {
	query: string;
	/** Items the branch returns */
	limit: number;
	/** Unfiltered candidates fetched before filtering */
	candidateLimit: number;
	filter: FilterPredicate | null;
}

export interface SparseBranchDeps {
	index: CorpusIndex;
	logger: Logger;
	metrics: RetrievalMetrics;
}

/**
 * @throws MalformedPredicateError from the evaluator; never degraded around
 */
export function runSparseBranch(deps: SparseBranchDeps, request: SparseBranchRequest): BranchOutcome {
	const { index, logger, metrics } = deps;
	const { query, limit, candidateLimit, filter } = request;
	metrics.sparseSearches.inc();

	if (!filter) {
		return { status: "ok", items: hydrate(index, index.search(query, limit)) };
	}

	const matches = compileFilter(filter);
	const survivors = index
		.search(query, candidateLimit)
		.filter((item) => matches(index.getMetadata(item.doc_id) ?? {}))
		.slice(0, limit)
		.map((item, i) => ({ ...item, rank: i + 1 }));

	if (survivors.length > 0) {
		return { status: "ok", items: hydrate(index, survivors) };
	}

	metrics.sparseFilterFallbacks.inc();
	logger.warn("Sparse filter matched no candidates; using unfiltered BM25", {
		query,
		filter: toWireFilter(filter),
		candidates: candidateLimit,
	});

	return {
		status: "degraded",
		items: hydrate(index, index.search(query, limit)),
		degradation: {
			kind: "sparse-filter-fallback",
			reason: `no BM25 candidate among the top ${candidateLimit} satisfied the filter`,
		},
	};
}

function hydrate(index: CorpusIndex, items: readonly RankedItem[]): RankedDocument[] {
	const hydrated: RankedDocument[] = [];
	for (const item of items) {
		const document = index.getDocument(item.doc_id);
		if (document) {
			hydrated.push({ ...item, document: toDisplay(document) });
		}
	}
	return hydrated;
}
