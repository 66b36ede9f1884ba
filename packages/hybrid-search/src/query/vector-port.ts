/**
 * Vector Search Port - the dense branch's only external dependency
 *
 * Implementations apply the filter predicate natively. They may return fewer
 * than topK matches and may reject; the orchestrator owns the retry policy.
 */

import { VectorPortTimeoutError } from "../errors";
import type { DocumentDisplay } from "../types";
import type { FilterPredicate } from "./filter-predicate";

// ============================================================================
// Types
// ============================================================================

export interface VectorQuery {
	/** Raw query text; the port owns embedding it */
	text: string;
	topK: number;
	filter?: FilterPredicate | null;
	/** Aborted when the caller's time budget runs out */
	signal?: AbortSignal;
}

export interface VectorMatch {
	doc_id: string;
	/** Similarity, higher is better */
	score: number;
	/** 1-based rank as reported by the port */
	rank: number;
	/** Display fields, for documents the local corpus snapshot does not know */
	document?: DocumentDisplay;
}

export interface VectorSearchPort {
	query(request: VectorQuery): Promise<VectorMatch[]>;
}

// ============================================================================
// Timeout
// ============================================================================

/**
 * Run one port call under a time budget. On expiry the request's signal is
 * aborted and the call rejects with VectorPortTimeoutError.
 */
export async function queryWithTimeout(
	port: VectorSearchPort,
	request: Omit<VectorQuery, "signal">,
	timeoutMs: number,
): Promise<VectorMatch[]> {
	const controller = new AbortController();
	let timer: ReturnType<typeof setTimeout> | undefined;

	const expired = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			controller.abort();
			reject(new VectorPortTimeoutError(timeoutMs));
		}, timeoutMs);
	});

	try {
		return await Promise.race([port.query({ ...request, signal: controller.signal }), expired]);
	} finally {
		clearTimeout(timer);
	}
}
