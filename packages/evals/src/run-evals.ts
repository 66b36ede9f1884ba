/**
 * Eval runner - runs labelled queries through the hybrid retriever and
 * scores the ranked doc_ids
 */

import { nullLogger, type HybridRetriever, type Logger } from "hybrid-search";
import type { EvalEntry } from "./eval-set";
import { mean, recallAtK, reciprocalRank } from "./metrics";

// ============================================================================
// Types
// ============================================================================

export interface EvalQueryResult {
	query_id: string;
	query: string;
	category: string;
	expected_doc_ids: string[];
	retrieved_doc_ids: string[];
	recall_at_5: number;
	recall_at_10: number;
	reciprocal_rank: number;
	/** Fallbacks the retriever reported for this query */
	degradations: string[];
}

export interface CategorySummary {
	category: string;
	queries: number;
	recallAt5: number;
	recallAt10: number;
	mrr: number;
}

export interface RunEvalsOptions {
	/** Results retrieved per query (default: 10) */
	topK?: number;
	logger?: Logger;
}

export const OVERALL_CATEGORY = "OVERALL";

const DEFAULT_EVAL_TOP_K = 10;

// ============================================================================
// Running
// ============================================================================

export async function runEvalQuery(
	entry: EvalEntry,
	retriever: Pick<HybridRetriever, "search">,
	topK: number = DEFAULT_EVAL_TOP_K,
): Promise<EvalQueryResult> {
	const { results, metadata } = await retriever.search(entry.query, { topK, filter: entry.filter });
	const retrieved = results.map((result) => result.doc_id);

	return {
		query_id: entry.query_id,
		query: entry.query,
		category: entry.category,
		expected_doc_ids: entry.expected_doc_ids,
		retrieved_doc_ids: retrieved,
		recall_at_5: recallAtK(retrieved, entry.expected_doc_ids, 5),
		recall_at_10: recallAtK(retrieved, entry.expected_doc_ids, 10),
		reciprocal_rank: reciprocalRank(retrieved, entry.expected_doc_ids),
		degradations: metadata.degradations.map((d) => d.kind),
	};
}

/** Queries run one at a time, in eval-set order */
export async function runEvals(
	entries: readonly EvalEntry[],
	retriever: Pick<HybridRetriever, "search">,
	options: RunEvalsOptions = {},
): Promise<EvalQueryResult[]> {
	const logger = options.logger ?? nullLogger;
	const results: EvalQueryResult[] = [];

	for (const [i, entry] of entries.entries()) {
		logger.info(`[${i + 1}/${entries.length}] ${entry.query_id}`, { query: entry.query.slice(0, 60) });
		results.push(await runEvalQuery(entry, retriever, options.topK));
	}

	return results;
}

// ============================================================================
// Summaries
// ============================================================================

function summarize(category: string, results: readonly EvalQueryResult[]): CategorySummary {
	return {
		category,
		queries: results.length,
		recallAt5: mean(results.map((r) => r.recall_at_5)),
		recallAt10: mean(results.map((r) => r.recall_at_10)),
		mrr: mean(results.map((r) => r.reciprocal_rank)),
	};
}

/** One row per category (sorted by name), then an OVERALL row */
export function summarizeByCategory(results: readonly EvalQueryResult[]): CategorySummary[] {
	const byCategory = new Map<string, EvalQueryResult[]>();
	for (const result of results) {
		const bucket = byCategory.get(result.category) ?? [];
		bucket.push(result);
		byCategory.set(result.category, bucket);
	}

	const rows = [...byCategory.keys()]
		.sort()
		.map((category) => summarize(category, byCategory.get(category) ?? []));

	return [...rows, summarize(OVERALL_CATEGORY, results)];
}

/** Plain-text table, metrics to three decimals */
export function formatSummary(rows: readonly CategorySummary[]): string {
	const header = [
		"Category".padEnd(20),
		"Queries".padStart(8),
		"Recall@5".padStart(10),
		"Recall@10".padStart(10),
		"MRR".padStart(10),
	];
	const lines = [header.join(" ")];

	for (const row of rows) {
		lines.push(
			[
				row.category.padEnd(20),
				String(row.queries).padStart(8),
				row.recallAt5.toFixed(3).padStart(10),
				row.recallAt10.toFixed(3).padStart(10),
				row.mrr.toFixed(3).padStart(10),
			].join(" "),
		);
	}

	return lines.join("\n");
}
