/**
 * Embedder Interface
 *
 * Contract for embedding generators used by the local vector store.
 * Implementations return vectors of a fixed dimension for both single and
 * batch calls.
 */

export type EmbedInputType = "query" | "document";

export interface EmbedOptions {
	/**
	 * Asymmetric models embed queries and documents differently.
	 * Providers without that distinction ignore it.
	 */
	inputType?: EmbedInputType;
}

export interface Embedder {
	embed(text: string, options?: EmbedOptions): Promise<number[]>;

	/** One vector per input text, in input order */
	embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]>;

	readonly dimension: number;

	/** e.g. "voyageai/voyage-3.5" */
	readonly modelId: string;
}
