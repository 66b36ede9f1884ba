/**
 * Simple Embedder - deterministic token-hash embeddings
 *
 * Works offline and gives identical vectors for identical text, so the local
 * vector store can be exercised without an embedding service. Texts that share
 * tokens land close together; there is no semantic understanding beyond that.
 */

import { tokenize } from "../indexing/tokenizer";
import type { Embedder } from "./embedder";

const DEFAULT_DIMENSION = 256;

/** FNV-1a, 32-bit */
function hashString(str: string): number {
	let hash = 0x811c9dc5;
	for (let i = 0; i < str.length; i++) {
		hash ^= str.charCodeAt(i);
		hash = Math.imul(hash, 0x01000193);
	}
	return hash >>> 0;
}

function addFeature(vector: Float64Array, feature: string, weight: number): void {
	const hash = hashString(feature);
	const index = hash % vector.length;
	// High bit picks the sign so collisions partly cancel instead of piling up
	vector[index] += (hash & 0x80000000 ? -1 : 1) * weight;
}

export function createHashEmbedding(text: string, dimension: number): number[] {
	const tokens = tokenize(text);
	const vector = new Float64Array(dimension);

	for (const token of tokens) {
		addFeature(vector, token, 1);
		addFeature(vector, `${token}#2`, 0.5);
	}
	for (let i = 0; i < tokens.length - 1; i++) {
		addFeature(vector, `${tokens[i]} ${tokens[i + 1]}`, 0.5);
	}

	let norm = 0;
	for (const value of vector) norm += value * value;
	norm = Math.sqrt(norm);

	return Array.from(vector, (value) => (norm > 0 ? value / norm : 0));
}

export class SimpleEmbedder implements Embedder {
	readonly dimension: number;
	readonly modelId = "simple-hash-embedder";

	constructor(dimension: number = DEFAULT_DIMENSION) {
		if (!Number.isInteger(dimension) || dimension <= 0) {
			throw new RangeError(`Embedding dimension must be a positive integer, got ${dimension}`);
		}
		this.dimension = dimension;
	}

	async embed(text: string): Promise<number[]> {
		return createHashEmbedding(text, this.dimension);
	}

	async embedBatch(texts: string[]): Promise<number[][]> {
		return texts.map((text) => createHashEmbedding(text, this.dimension));
	}
}

export function createSimpleEmbedder(dimension?: number): SimpleEmbedder {
	return new SimpleEmbedder(dimension);
}
