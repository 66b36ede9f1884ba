/**
 * Voyage AI Embedder
 *
 * General-purpose text embeddings for knowledge base articles and queries.
 *
 * Features:
 * - Asymmetric embeddings (query vs document input types)
 * - Configurable output dimensions (256, 512, 1024, 2048)
 * - Integrated LRU caching
 * - Batch processing (up to 128 items per request)
 */

import { VoyageAIClient } from "voyageai";
import type { VoyageAI } from "voyageai";
import { EmbeddingCache, type CacheStats } from "./cache";
import type { Embedder, EmbedOptions } from "./embedder";

// ============================================================================
// Types
// ============================================================================

export interface VoyageEmbedderOptions {
	/**
	 * Voyage AI API key.
	 * Falls back to VOYAGE_AI_API_KEY environment variable.
	 */
	apiKey?: string;

	/** @default "voyage-3.5" */
	model?: string;

	/** @default 1024 */
	dimensions?: number;

	/** @default 5000 */
	cacheSize?: number;

	/** @default 30 */
	timeoutSeconds?: number;

	/** SDK-level retries on transient HTTP failures (default: 2) */
	maxRetries?: number;
}

const DEFAULT_MODEL = "voyage-3.5";
const DEFAULT_DIMENSIONS = 1024;
const DEFAULT_TIMEOUT_SECONDS = 30;
const DEFAULT_MAX_RETRIES = 2;

// Voyage accepts up to 128 inputs per request
export const MAX_BATCH_SIZE = 128;

// ============================================================================
// Implementation
// ============================================================================

export class VoyageEmbedder implements Embedder {
	readonly dimension: number;
	readonly modelId: string;

	private readonly client: VoyageAIClient;
	private readonly model: string;
	private readonly cache: EmbeddingCache;
	private readonly timeoutSeconds: number;
	private readonly maxRetries: number;

	constructor(options: VoyageEmbedderOptions = {}) {
		const apiKey = options.apiKey ?? process.env.VOYAGE_AI_API_KEY;
		if (!apiKey) {
			throw new Error(
				"Voyage AI API key is required. Set VOYAGE_AI_API_KEY environment variable or pass apiKey option.",
			);
		}

		this.model = options.model ?? DEFAULT_MODEL;
		this.dimension = options.dimensions ?? DEFAULT_DIMENSIONS;
		this.modelId = `voyageai/${this.model}`;
		this.timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
		this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
		this.cache = new EmbeddingCache({ maxSize: options.cacheSize ?? 5000 });

		this.client = new VoyageAIClient({ apiKey });
	}

	private inputType(options?: EmbedOptions): VoyageAI.EmbedRequestInputType | undefined {
		return options?.inputType;
	}

	private zeroVector(): number[] {
		return new Array<number>(this.dimension).fill(0);
	}

	async embed(text: string, options?: EmbedOptions): Promise<number[]> {
		const [embedding] = await this.embedBatch([text], options);
		return embedding;
	}

	/**
	 * Blank texts get a zero vector without an API call; cached texts are
	 * served locally. The rest go out in sub-batches of MAX_BATCH_SIZE.
	 */
	async embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]> {
		if (texts.length === 0) {
			return [];
		}

		const slots = new Array<number[] | undefined>(texts.length).fill(undefined);
		const pending: number[] = [];

		texts.forEach((text, i) => {
			if (!text.trim()) {
				slots[i] = this.zeroVector();
				return;
			}
			const cached = this.cache.get(text, options?.inputType);
			if (cached) {
				slots[i] = cached;
			} else {
				pending.push(i);
			}
		});

		for (let start = 0; start < pending.length; start += MAX_BATCH_SIZE) {
			const batch = pending.slice(start, start + MAX_BATCH_SIZE);

			const response = await this.client.embed(
				{
					model: this.model,
					input: batch.map((i) => texts[i]),
					inputType: this.inputType(options),
					outputDimension: this.dimension,
					truncation: true,
				},
				{ timeoutInSeconds: this.timeoutSeconds, maxRetries: this.maxRetries },
			);

			if (!response.data || response.data.length === 0) {
				throw new Error(`Voyage AI returned empty batch response for model ${this.model}`);
			}

			for (const item of response.data) {
				if (item.index === undefined || !item.embedding || item.embedding.length === 0) continue;
				const target = batch[item.index];
				if (target === undefined) continue;

				slots[target] = item.embedding;
				this.cache.set(texts[target], item.embedding, options?.inputType);
			}
		}

		return slots.map((embedding, i) => {
			if (!embedding) {
				throw new Error(`Voyage AI did not return an embedding for item at index ${i}`);
			}
			return embedding;
		});
	}

	getCacheStats(): CacheStats {
		return this.cache.getStats();
	}

	clearCache(): void {
		this.cache.clear();
	}
}

export function isVoyageAvailable(apiKey?: string): boolean {
	return !!(apiKey ?? process.env.VOYAGE_AI_API_KEY);
}

export function createVoyageEmbedder(options?: VoyageEmbedderOptions): VoyageEmbedder {
	return new VoyageEmbedder(options);
}
