/**
 * SQLite Vector Store
 *
 * Local Vector Search Port: embeddings and flattened metadata persisted in
 * SQLite, similarity computed in process. Filters run through the same
 * evaluator as the sparse branch, so both branches agree on what a predicate
 * matches.
 */

import type Database from "better-sqlite3";
import { z } from "zod";
import { nullLogger, type Logger } from "../diagnostics";
import { describeError } from "../errors";
import type { Embedder } from "../embeddings/embedder";
import { documentText, flattenMetadata, toDisplay } from "../indexing/documents";
import { evaluateFilter } from "../query/filter-evaluator";
import type { VectorMatch, VectorQuery, VectorSearchPort } from "../query/vector-port";
import type { DocumentDisplay, FlatMetadata, KbDocument } from "../types";

// ============================================================================
// Types
// ============================================================================

export interface SqliteVectorStore extends VectorSearchPort {
	/** Embed and store documents; existing doc_ids are overwritten in place */
	upsertDocuments(documents: readonly KbDocument[]): Promise<number>;

	query(request: VectorQuery): Promise<VectorMatch[]>;

	count(): number;

	clear(): void;

	/** @returns whether a row was removed */
	delete(docId: string): boolean;
}

export interface SqliteVectorStoreOptions {
	/** Texts per embedder call during upsert (default: 32) */
	batchSize?: number;
	logger?: Logger;
}

interface StoredVector {
	docId: string;
	embedding: number[];
	metadata: FlatMetadata;
	document: DocumentDisplay;
}

const DEFAULT_BATCH_SIZE = 32;

const StoredRowSchema = z.object({
	doc_id: z.string(),
	embedding: z.string(),
	metadata: z.string(),
	document: z.string(),
});

const FlatMetadataSchema = z.object({
	region: z.string(),
	product_version: z.string(),
	category: z.string(),
	deprecated: z.boolean(),
	effective_date: z.string(),
	error_codes_str: z.string(),
});

const DocumentDisplaySchema = z.object({
	doc_id: z.string(),
	title: z.string(),
	body: z.string(),
	region: z.string(),
	product_version: z.string(),
	category: z.string(),
	deprecated: z.boolean(),
});

const CountRowSchema = z.object({ count: z.number() });

// ============================================================================
// Vector Math Utilities
// ============================================================================

/**
 * Cosine similarity in [-1, 1]; 0 when either vector has zero length.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
	if (a.length !== b.length) {
		throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
	}

	let dotProduct = 0;
	let normA = 0;
	let normB = 0;

	for (let i = 0; i < a.length; i++) {
		dotProduct += a[i] * b[i];
		normA += a[i] * a[i];
		normB += b[i] * b[i];
	}

	const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
	if (magnitude === 0) return 0;

	return dotProduct / magnitude;
}

/** Float32 bytes, base64 encoded */
export function serializeEmbedding(embedding: readonly number[]): string {
	const buffer = new Float32Array(embedding);
	return Buffer.from(buffer.buffer, buffer.byteOffset, buffer.byteLength).toString("base64");
}

export function deserializeEmbedding(base64: string): number[] {
	const bytes = Buffer.from(base64, "base64");
	if (bytes.length % 4 !== 0) {
		throw new Error(`Embedding blob has ${bytes.length} bytes, not a multiple of 4`);
	}
	// Copy into an aligned buffer; Buffer views may start at any byte offset
	const aligned = new Uint8Array(bytes);
	return Array.from(new Float32Array(aligned.buffer));
}

// ============================================================================
// Implementation
// ============================================================================

export function createSqliteVectorStore(
	db: Database.Database,
	embedder: Embedder,
	options: SqliteVectorStoreOptions = {},
): SqliteVectorStore {
	const batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
	const logger = options.logger ?? nullLogger;

	db.exec(`
		CREATE TABLE IF NOT EXISTS kb_vectors (
			doc_id TEXT PRIMARY KEY,
			embedding TEXT NOT NULL,
			metadata TEXT NOT NULL,
			document TEXT NOT NULL,
			updated_at INTEGER NOT NULL
		)
	`);

	// ON CONFLICT keeps the original rowid, so re-upserts keep their position
	const upsertStmt = db.prepare(`
		INSERT INTO kb_vectors (doc_id, embedding, metadata, document, updated_at)
		VALUES (?, ?, ?, ?, ?)
		ON CONFLICT(doc_id) DO UPDATE SET
			embedding = excluded.embedding,
			metadata = excluded.metadata,
			document = excluded.document,
			updated_at = excluded.updated_at
	`);
	const deleteStmt = db.prepare(`DELETE FROM kb_vectors WHERE doc_id = ?`);
	const countStmt = db.prepare(`SELECT COUNT(*) AS count FROM kb_vectors`);
	const getAllStmt = db.prepare(`SELECT doc_id, embedding, metadata, document FROM kb_vectors ORDER BY rowid`);
	const clearStmt = db.prepare(`DELETE FROM kb_vectors`);

	const writeBatch = db.transaction((rows: Array<{ document: KbDocument; embedding: number[] }>) => {
		const now = Date.now();
		for (const { document, embedding } of rows) {
			upsertStmt.run(
				document.doc_id,
				serializeEmbedding(embedding),
				JSON.stringify(flattenMetadata(document)),
				JSON.stringify(toDisplay(document)),
				now,
			);
		}
	});

	// In-memory copy for search, reloaded after any write
	let vectorCache: StoredVector[] | null = null;

	function parseRow(raw: unknown): StoredVector | null {
		const row = StoredRowSchema.safeParse(raw);
		if (!row.success) {
			logger.warn("Skipping vector row with unexpected shape");
			return null;
		}

		try {
			const metadata = FlatMetadataSchema.safeParse(JSON.parse(row.data.metadata));
			const document = DocumentDisplaySchema.safeParse(JSON.parse(row.data.document));
			if (!metadata.success || !document.success) {
				logger.warn("Skipping vector row with invalid metadata", { docId: row.data.doc_id });
				return null;
			}

			return {
				docId: row.data.doc_id,
				embedding: deserializeEmbedding(row.data.embedding),
				metadata: metadata.data,
				document: document.data,
			};
		} catch (error) {
			logger.warn("Skipping unreadable vector row", {
				docId: row.data.doc_id,
				error: describeError(error),
			});
			return null;
		}
	}

	function loadCache(): StoredVector[] {
		if (vectorCache) return vectorCache;

		const loaded: StoredVector[] = [];
		for (const raw of getAllStmt.all()) {
			const stored = parseRow(raw);
			if (stored) loaded.push(stored);
		}

		vectorCache = loaded;
		return loaded;
	}

	return {
		async upsertDocuments(documents: readonly KbDocument[]): Promise<number> {
			for (let start = 0; start < documents.length; start += batchSize) {
				const batch = documents.slice(start, start + batchSize);
				const embeddings = await embedder.embedBatch(batch.map(documentText), { inputType: "document" });

				if (embeddings.length !== batch.length) {
					throw new Error(`Embedder returned ${embeddings.length} vectors for ${batch.length} documents`);
				}

				writeBatch(batch.map((document, i) => ({ document, embedding: embeddings[i] })));
				vectorCache = null;
			}

			logger.debug("Upserted documents into vector store", {
				documents: documents.length,
				model: embedder.modelId,
			});
			return documents.length;
		},

		async query(request: VectorQuery): Promise<VectorMatch[]> {
			if (request.topK <= 0) return [];

			const queryEmbedding = await embedder.embed(request.text, { inputType: "query" });
			request.signal?.throwIfAborted();

			const filter = request.filter ?? null;
			const scored: Array<{ stored: StoredVector; similarity: number; position: number }> = [];

			loadCache().forEach((stored, position) => {
				if (filter && !evaluateFilter(filter, stored.metadata)) return;
				scored.push({ stored, similarity: cosineSimilarity(queryEmbedding, stored.embedding), position });
			});

			return scored
				.sort((a, b) => b.similarity - a.similarity || a.position - b.position)
				.slice(0, request.topK)
				.map(({ stored, similarity }, i) => ({
					doc_id: stored.docId,
					score: similarity,
					rank: i + 1,
					document: stored.document,
				}));
		},

		count(): number {
			return CountRowSchema.parse(countStmt.get()).count;
		},

		clear(): void {
			clearStmt.run();
			vectorCache = null;
		},

		delete(docId: string): boolean {
			const { changes } = deleteStmt.run(docId);
			vectorCache = null;
			return changes > 0;
		},
	};
}
