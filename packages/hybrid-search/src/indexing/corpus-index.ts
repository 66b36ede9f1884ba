/**
 * Corpus Index - immutable BM25 snapshot over the full document set
 *
 * Built once from an ordered corpus; never updated in place. A rebuild
 * constructs a new snapshot (see index-handle.ts). Scores follow Okapi BM25
 * with the IDF variant of the rank_bm25 BM25Okapi scorer: negative IDFs are
 * floored to epsilon * mean IDF.
 */

import { DEFAULT_CONFIG, type Bm25Parameters } from "../config";
import { CorpusValidationError } from "../errors";
import type { CorpusStats, FlatMetadata, KbDocument, RankedItem } from "../types";
import { documentText, flattenMetadata } from "./documents";
import { tokenize } from "./tokenizer";

// ============================================================================
// Types
// ============================================================================

export interface CorpusIndex {
	readonly size: number;

	/**
	 * Score every document against the query and return the best topK.
	 * Zero-score documents stay eligible; ties keep corpus insertion order.
	 */
	search(query: string, topK: number): RankedItem[];

	getDocument(docId: string): KbDocument | undefined;

	/** Flattened metadata record the filter evaluator runs against */
	getMetadata(docId: string): FlatMetadata | undefined;

	/** Position of the document in the corpus it was built from */
	getOrdinal(docId: string): number | undefined;

	/** Documents in insertion order */
	documents(): readonly KbDocument[];

	stats(): CorpusStats;
}

interface IndexedDocument {
	readonly document: KbDocument;
	readonly metadata: FlatMetadata;
	readonly ordinal: number;
	readonly length: number;
}

interface Posting {
	ordinal: number;
	tf: number;
}

// ============================================================================
// Construction
// ============================================================================

export function buildCorpusIndex(
	documents: readonly KbDocument[],
	params: Bm25Parameters = DEFAULT_CONFIG.bm25,
): CorpusIndex {
	const { k1, b, epsilon } = params;

	const entries: IndexedDocument[] = [];
	const byId = new Map<string, IndexedDocument>();
	const postings = new Map<string, Posting[]>();
	let totalLength = 0;

	const duplicates: string[] = [];
	documents.forEach((document, ordinal) => {
		if (byId.has(document.doc_id)) {
			duplicates.push(`[${ordinal}.doc_id]: duplicate doc_id "${document.doc_id}"`);
			return;
		}

		const tokens = tokenize(documentText(document));
		const termFrequencies = new Map<string, number>();
		for (const token of tokens) {
			termFrequencies.set(token, (termFrequencies.get(token) ?? 0) + 1);
		}
		for (const [term, tf] of termFrequencies) {
			let list = postings.get(term);
			if (!list) {
				list = [];
				postings.set(term, list);
			}
			list.push({ ordinal, tf });
		}

		const entry: IndexedDocument = {
			document,
			metadata: Object.freeze(flattenMetadata(document)),
			ordinal,
			length: tokens.length,
		};
		entries.push(entry);
		byId.set(document.doc_id, entry);
		totalLength += tokens.length;
	});

	if (duplicates.length > 0) {
		throw new CorpusValidationError(duplicates);
	}

	const documentCount = entries.length;
	const averageLength = documentCount > 0 ? totalLength / documentCount : 0;
	const idf = computeIdf(postings, documentCount, epsilon);
	const orderedDocuments = Object.freeze(entries.map((e) => e.document));

	function score(query: string): Float64Array {
		const scores = new Float64Array(documentCount);
		if (averageLength === 0) return scores;

		// Repeated query tokens each contribute, as in the reference scorer
		for (const term of tokenize(query)) {
			const termIdf = idf.get(term);
			const termPostings = postings.get(term);
			if (termIdf === undefined || termIdf === 0 || !termPostings) continue;

			for (const { ordinal, tf } of termPostings) {
				const docLength = entries[ordinal].length;
				const denominator = tf + k1 * (1 - b + (b * docLength) / averageLength);
				scores[ordinal] += termIdf * ((tf * (k1 + 1)) / denominator);
			}
		}
		return scores;
	}

	const index: CorpusIndex = {
		size: documentCount,

		search(query: string, topK: number): RankedItem[] {
			if (topK <= 0 || documentCount === 0) return [];

			const scores = score(query);
			const order = entries.map((e) => e.ordinal);
			order.sort((a, b) => scores[b] - scores[a] || a - b);

			return order.slice(0, topK).map((ordinal, i) => ({
				doc_id: entries[ordinal].document.doc_id,
				score: scores[ordinal],
				rank: i + 1,
			}));
		},

		getDocument: (docId) => byId.get(docId)?.document,
		getMetadata: (docId) => byId.get(docId)?.metadata,
		getOrdinal: (docId) => byId.get(docId)?.ordinal,
		documents: () => orderedDocuments,

		stats: () => ({
			documentCount,
			vocabularySize: postings.size,
			averageDocumentLength: averageLength,
		}),
	};

	return Object.freeze(index);
}

// ============================================================================
// Pure Functions
// ============================================================================

function computeIdf(
	postings: ReadonlyMap<string, Posting[]>,
	documentCount: number,
	epsilon: number,
): Map<string, number> {
	const idf = new Map<string, number>();
	if (postings.size === 0) return idf;

	let idfSum = 0;
	const negative: string[] = [];
	for (const [term, list] of postings) {
		const df = list.length;
		const value = Math.log(documentCount - df + 0.5) - Math.log(df + 0.5);
		idf.set(term, value);
		idfSum += value;
		if (value < 0) negative.push(term);
	}

	const floor = epsilon * (idfSum / postings.size);
	for (const term of negative) {
		idf.set(term, floor);
	}
	return idf;
}
