/**
 * Voyage AI Reranker
 *
 * Async cross-encoder reranker on Voyage AI's rerank API. Each result is
 * sent as "title body"; returned relevance scores replace the fused score.
 *
 * Features:
 * - Configurable model (default: rerank-2.5)
 * - Candidate limit to control API cost (default: 40)
 * - Availability check based on VOYAGE_AI_API_KEY
 */

import { VoyageAIClient } from "voyageai";
import { nullLogger, type Logger } from "../diagnostics";
import type { SearchResult } from "../types";
import { applyRelevanceScores, type AsyncReranker, type RelevanceScore } from "./reranker";

// ============================================================================
// Types
// ============================================================================

export interface VoyageRerankerOptions {
	/**
	 * Voyage AI API key.
	 * Falls back to VOYAGE_AI_API_KEY environment variable.
	 */
	apiKey?: string;

	/**
	 * Rerank model to use.
	 * @default "rerank-2.5"
	 */
	model?: string;

	/**
	 * Maximum candidates to send to the API per request.
	 * @default 40
	 */
	maxCandidates?: number;

	/** @default 30 */
	timeoutSeconds?: number;

	/** SDK-level retries on transient HTTP failures (default: 2) */
	maxRetries?: number;

	logger?: Logger;
}

const DEFAULT_MODEL = "rerank-2.5";
const DEFAULT_MAX_CANDIDATES = 40;
const DEFAULT_TIMEOUT_SECONDS = 30;
const DEFAULT_MAX_RETRIES = 2;

// ============================================================================
// Availability Check
// ============================================================================

export function isVoyageRerankerAvailable(apiKey?: string): boolean {
	return !!(apiKey ?? process.env.VOYAGE_AI_API_KEY);
}

// ============================================================================
// Implementation
// ============================================================================

/**
 * Results beyond maxCandidates are not sent to the API and do not survive
 * reranking.
 */
export function createVoyageReranker(options: VoyageRerankerOptions = {}): AsyncReranker {
	const apiKey = options.apiKey ?? process.env.VOYAGE_AI_API_KEY;
	if (!apiKey) {
		throw new Error(
			"Voyage AI API key is required for reranking. Set VOYAGE_AI_API_KEY environment variable or pass apiKey option.",
		);
	}

	const model = options.model ?? DEFAULT_MODEL;
	const maxCandidates = options.maxCandidates ?? DEFAULT_MAX_CANDIDATES;
	const timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
	const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
	const logger = options.logger ?? nullLogger;
	const client = new VoyageAIClient({ apiKey });

	return {
		async rerank(query: string, results: readonly SearchResult[], topK: number): Promise<SearchResult[]> {
			if (results.length === 0 || topK <= 0) {
				return [];
			}

			const candidates = results.slice(0, maxCandidates);
			const documents = candidates.map((result) => `${result.title} ${result.body}`);

			const response = await client.rerank(
				{
					model,
					query,
					documents,
					topK: Math.min(topK, candidates.length),
					returnDocuments: false,
				},
				{ timeoutInSeconds: timeoutSeconds, maxRetries },
			);

			if (!response.data || response.data.length === 0) {
				throw new Error(
					`Voyage AI rerank returned empty response for model ${model}. Query: "${query.slice(0, 80)}"`,
				);
			}

			const scores: RelevanceScore[] = [];
			for (const entry of response.data) {
				if (entry.index === undefined) continue;
				scores.push({ index: entry.index, score: entry.relevanceScore ?? 0 });
			}

			logger.debug("Reranked results", { model, candidates: candidates.length, returned: scores.length });
			return applyRelevanceScores(candidates, scores, topK);
		},
	};
}
