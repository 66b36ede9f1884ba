/**
 * Index Handle - atomically swappable reference to the current corpus snapshot
 *
 * Readers call current() once at the start of a query and keep that snapshot
 * for the whole query; a concurrent rebuild publishes a new snapshot without
 * affecting queries already in flight.
 */

import { DEFAULT_CONFIG, type Bm25Parameters } from "../config";
import { nullLogger, type Logger, type RetrievalMetrics } from "../diagnostics";
import { IndexUnavailableError } from "../errors";
import type { KbDocument } from "../types";
import { buildCorpusIndex, type CorpusIndex } from "./corpus-index";

export interface IndexSnapshot {
	readonly index: CorpusIndex;
	/** Increments with every publish, starting at 1 */
	readonly version: number;
	readonly publishedAt: number;
}

export interface IndexHandle {
	/** @throws IndexUnavailableError before the first publish */
	current(): IndexSnapshot;

	isReady(): boolean;

	/** Swap in a prebuilt index */
	publish(index: CorpusIndex): IndexSnapshot;

	/** Build a fresh index from a full corpus and swap it in */
	rebuild(documents: readonly KbDocument[]): IndexSnapshot;

	/** Number of publishes so far (0 before the first) */
	version(): number;
}

export interface IndexHandleOptions {
	initial?: CorpusIndex;
	bm25?: Bm25Parameters;
	logger?: Logger;
	metrics?: RetrievalMetrics;
}

export function createIndexHandle(options: IndexHandleOptions = {}): IndexHandle {
	const bm25 = options.bm25 ?? DEFAULT_CONFIG.bm25;
	const logger = options.logger ?? nullLogger;
	const metrics = options.metrics;

	let snapshot: IndexSnapshot | null = null;
	let publishCount = 0;

	function publish(index: CorpusIndex): IndexSnapshot {
		publishCount++;
		const next: IndexSnapshot = Object.freeze({
			index,
			version: publishCount,
			publishedAt: Date.now(),
		});
		snapshot = next;

		metrics?.indexedDocuments.set(index.size);
		logger.info("Published corpus index", {
			version: next.version,
			documents: index.size,
		});
		return next;
	}

	if (options.initial) {
		publish(options.initial);
	}

	return {
		current(): IndexSnapshot {
			if (!snapshot) {
				throw new IndexUnavailableError();
			}
			return snapshot;
		},

		isReady: () => snapshot !== null,

		publish,

		rebuild(documents: readonly KbDocument[]): IndexSnapshot {
			const startTime = Date.now();
			const index = buildCorpusIndex(documents, bm25);
			metrics?.indexRebuilds.inc();
			logger.debug("Built corpus index", {
				documents: index.size,
				vocabulary: index.stats().vocabularySize,
				buildMs: Date.now() - startTime,
			});
			return publish(index);
		},

		version: () => publishCount,
	};
}
