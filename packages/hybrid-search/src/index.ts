/**
 * hybrid-search
 *
 * Lexical (BM25) + semantic retrieval over a knowledge base corpus, with
 * structured metadata filters and reciprocal rank fusion.
 */

export * from "./types";
export * from "./errors";

export {
	DEFAULT_CONFIG,
	configFromEnv,
	resolveConfig,
	type Bm25Parameters,
	type HybridSearchConfig,
	type HybridSearchConfigInput,
} from "./config";

export * from "./diagnostics";
export * from "./indexing";
export * from "./query";
export * from "./embeddings";
export * from "./storage";
