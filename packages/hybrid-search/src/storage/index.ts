/**
 * Storage Layer exports
 */

export {
	createSqliteVectorStore,
	cosineSimilarity,
	serializeEmbedding,
	deserializeEmbedding,
} from "./sqlite-vector-store";
export type { SqliteVectorStore, SqliteVectorStoreOptions } from "./sqlite-vector-store";
