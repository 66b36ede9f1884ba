/**
 * Embeddings Module
 *
 * Text embeddings for the local vector store: Voyage AI, and a hash-based
 * offline embedder.
 */

export type { Embedder, EmbedInputType, EmbedOptions } from "./embedder";

export {
	VoyageEmbedder,
	createVoyageEmbedder,
	isVoyageAvailable,
	MAX_BATCH_SIZE,
	type VoyageEmbedderOptions,
} from "./voyage-embedder";

export { SimpleEmbedder, createSimpleEmbedder, createHashEmbedding } from "./simple-embedder";

export { EmbeddingCache, type EmbeddingCacheOptions, type CacheStats } from "./cache";
