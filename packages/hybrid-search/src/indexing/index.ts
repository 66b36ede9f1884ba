/**
 * Indexing Layer exports
 */

export { tokenize } from "./tokenizer";

export { documentText, flattenMetadata, toDisplay } from "./documents";

export { buildCorpusIndex } from "./corpus-index";
export type { CorpusIndex } from "./corpus-index";

export { createIndexHandle } from "./index-handle";
export type { IndexHandle, IndexHandleOptions, IndexSnapshot } from "./index-handle";

export { DocumentSchema, loadDocuments, parseDocuments } from "./corpus-loader";
