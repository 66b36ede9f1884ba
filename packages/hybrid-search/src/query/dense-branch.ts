/**
 * Dense branch - vector retrieval through the Vector Search Port
 *
 * The port applies the filter natively. A failed filtered call is retried
 * once without the filter; a second failure, or a failure without a filter,
 * is reported as a failed outcome for the caller to raise.
 */

import type { Logger, RetrievalMetrics } from "../diagnostics";
import { describeError, VectorPortFailureError } from "../errors";
import { toDisplay } from "../indexing/documents";
import type { CorpusIndex } from "../indexing/corpus-index";
import type { BranchOutcome, RankedDocument } from "../types";
import { type FilterPredicate, toWireFilter } from "./filter-predicate";
import { queryWithTimeout, type VectorMatch, type VectorSearchPort } from "./vector-port";

export type DenseOutcome = BranchOutcome | { status: "failed"; error: VectorPortFailureError };

export interface DenseBranchRequest {
	query: string;
	limit: number;
	filter: FilterPredicate | null;
}

export interface DenseBranchDeps {
	port: VectorSearchPort;
	/** Snapshot used to hydrate matches into display records */
	index: CorpusIndex;
	timeoutMs: number;
	logger: Logger;
	metrics: RetrievalMetrics;
}

export async function runDenseBranch(deps: DenseBranchDeps, request: DenseBranchRequest): Promise<DenseOutcome> {
	const { port, timeoutMs, logger, metrics } = deps;
	const { query, limit, filter } = request;
	metrics.denseSearches.inc();

	const attempt = async (withFilter: FilterPredicate | null): Promise<VectorMatch[]> =>
		queryWithTimeout(port, { text: query, topK: limit, filter: withFilter }, timeoutMs);

	let firstError: unknown;
	try {
		const matches = await attempt(filter);
		return { status: "ok", items: hydrateMatches(deps, matches, limit) };
	} catch (error) {
		firstError = error;
	}

	metrics.denseFailures.inc();

	if (!filter) {
		logger.warn("Vector search failed", { query, error: describeError(firstError) });
		return {
			status: "failed",
			error: new VectorPortFailureError("Vector search failed", firstError, false),
		};
	}

	metrics.denseFilterRetries.inc();
	logger.warn("Filtered vector search failed; retrying without filter", {
		query,
		filter: toWireFilter(filter),
		error: describeError(firstError),
	});

	try {
		const matches = await attempt(null);
		return {
			status: "degraded",
			items: hydrateMatches(deps, matches, limit),
			degradation: {
				kind: "dense-filter-dropped",
				reason: `filtered vector search failed: ${describeError(firstError)}`,
			},
		};
	} catch (retryError) {
		metrics.denseFailures.inc();
		const failure = new VectorPortFailureError(
			"Vector search failed with and without the filter",
			retryError,
			true,
		);
		logger.error("Unfiltered vector search retry failed", failure, { query });
		return { status: "failed", error: failure };
	}
}

/**
 * Attach display fields to port matches, in port rank order.
 *
 * Documents missing from the snapshot use the port's payload; without one
 * they are dropped and the remaining items re-ranked contiguously.
 */
export function hydrateMatches(
	deps: Pick<DenseBranchDeps, "index" | "logger">,
	matches: readonly VectorMatch[],
	limit: number,
): RankedDocument[] {
	const ordered = matches
		.map((match, position) => ({ match, position }))
		.sort((a, b) => a.match.rank - b.match.rank || a.position - b.position);

	const seen = new Set<string>();
	const hydrated: RankedDocument[] = [];

	for (const { match } of ordered) {
		if (hydrated.length >= limit) break;
		if (seen.has(match.doc_id)) continue;

		const known = deps.index.getDocument(match.doc_id);
		const document = known ? toDisplay(known) : match.document;
		if (!document) {
			deps.logger.warn("Dropping vector match unknown to the corpus index", { docId: match.doc_id });
			continue;
		}

		seen.add(match.doc_id);
		hydrated.push({
			doc_id: match.doc_id,
			score: match.score,
			rank: hydrated.length + 1,
			document,
		});
	}

	return hydrated;
}
