/**
 * RRF Fusion - Reciprocal Rank Fusion over ranked candidate lists
 *
 * score(d) = Σ 1 / (k + rank_L(d)) over the lists L that contain d.
 * Rank-only: branch scores are ignored, so BM25 and cosine scales never mix.
 */

import type { FusedResult, RankedDocument } from "../types";

export const DEFAULT_RRF_K = 60;

interface Accumulator {
	score: number;
	/** Index of the first input list that contained the document */
	firstList: number;
	/** Rank within that first list */
	firstRank: number;
	/** Encounter order, last resort for duplicate entries */
	order: number;
	document: RankedDocument["document"];
}

/**
 * Fuse ranked lists into one list ranked 1..n.
 *
 * Equal fused scores are ordered by where a document first appeared: the
 * earlier input list wins, then the better rank inside that list. The
 * display payload is the copy from that first appearance.
 */
export function fuseWithRrf(
	lists: ReadonlyArray<readonly RankedDocument[]>,
	k: number = DEFAULT_RRF_K,
): FusedResult[] {
	if (!Number.isFinite(k) || k < 0) {
		throw new RangeError(`RRF k must be a finite non-negative number, got ${k}`);
	}

	const fused = new Map<string, Accumulator>();
	let order = 0;

	lists.forEach((items, listIndex) => {
		for (const item of items) {
			const contribution = 1 / (k + item.rank);
			const existing = fused.get(item.doc_id);
			if (existing) {
				existing.score += contribution;
				continue;
			}
			fused.set(item.doc_id, {
				score: contribution,
				firstList: listIndex,
				firstRank: item.rank,
				order: order++,
				document: item.document,
			});
		}
	});

	return Array.from(fused, ([docId, acc]) => ({ docId, ...acc }))
		.sort(
			(a, b) =>
				b.score - a.score ||
				a.firstList - b.firstList ||
				a.firstRank - b.firstRank ||
				a.order - b.order,
		)
		.map((entry, i) => ({
			doc_id: entry.docId,
			score: entry.score,
			rank: i + 1,
			document: entry.document,
		}));
}
