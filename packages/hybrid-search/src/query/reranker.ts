/**
 * Reranker - second-stage scoring of fused results
 *
 * A cross-encoder sees the query and each candidate together, so it can
 * reorder a short candidate list more precisely than either retrieval
 * branch. Rerankers replace the fused score with their own relevance score.
 */

import type { SearchResult } from "../types";

export interface AsyncReranker {
	/**
	 * Re-score results against the query and return the best topK,
	 * sorted by descending relevance and ranked 1..n.
	 */
	rerank(query: string, results: readonly SearchResult[], topK: number): Promise<SearchResult[]>;
}

export interface RelevanceScore {
	/** Position in the input list */
	index: number;
	score: number;
}

/**
 * Apply relevance scores to their source results. Stable on equal scores;
 * scores pointing outside the input are ignored.
 */
export function applyRelevanceScores(
	results: readonly SearchResult[],
	scores: readonly RelevanceScore[],
	topK: number,
): SearchResult[] {
	const seen = new Set<number>();
	const scored: Array<{ result: SearchResult; score: number; index: number }> = [];

	for (const { index, score } of scores) {
		if (!Number.isInteger(index) || index < 0 || index >= results.length || seen.has(index)) continue;
		seen.add(index);
		scored.push({ result: results[index], score, index });
	}

	return scored
		.sort((a, b) => b.score - a.score || a.index - b.index)
		.slice(0, Math.max(0, topK))
		.map(({ result, score }, i) => ({ ...result, score, rank: i + 1 }));
}
