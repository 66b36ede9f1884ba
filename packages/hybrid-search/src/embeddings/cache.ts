/**
 * LRU Embedding Cache
 *
 * Keyed by a hash of input type plus text, so query and document embeddings
 * of the same string never collide. Map insertion order doubles as LRU order.
 */

import { createHash } from "node:crypto";
import type { EmbedInputType } from "./embedder";

export interface EmbeddingCacheOptions {
	/** @default 5000 */
	maxSize?: number;
}

export interface CacheStats {
	size: number;
	maxSize: number;
	hitRate: number;
	hits: number;
	misses: number;
}

export class EmbeddingCache {
	private readonly entries = new Map<string, number[]>();
	private readonly maxSize: number;
	private hits = 0;
	private misses = 0;

	constructor(options: EmbeddingCacheOptions = {}) {
		this.maxSize = Math.max(1, options.maxSize ?? 5000);
	}

	private key(text: string, inputType?: EmbedInputType): string {
		return createHash("sha256")
			.update(`${inputType ?? "any"}:${text}`)
			.digest("hex")
			.slice(0, 16);
	}

	/** Refreshes recency on hit */
	get(text: string, inputType?: EmbedInputType): number[] | undefined {
		const key = this.key(text, inputType);
		const value = this.entries.get(key);

		if (value === undefined) {
			this.misses++;
			return undefined;
		}

		this.entries.delete(key);
		this.entries.set(key, value);
		this.hits++;
		return value;
	}

	set(text: string, embedding: number[], inputType?: EmbedInputType): void {
		const key = this.key(text, inputType);

		if (this.entries.has(key)) {
			this.entries.delete(key);
		} else if (this.entries.size >= this.maxSize) {
			const oldest = this.entries.keys().next().value;
			if (oldest !== undefined) {
				this.entries.delete(oldest);
			}
		}

		this.entries.set(key, embedding);
	}

	has(text: string, inputType?: EmbedInputType): boolean {
		return this.entries.has(this.key(text, inputType));
	}

	clear(): void {
		this.entries.clear();
		this.hits = 0;
		this.misses = 0;
	}

	getStats(): CacheStats {
		const total = this.hits + this.misses;
		return {
			size: this.entries.size,
			maxSize: this.maxSize,
			hitRate: total > 0 ? this.hits / total : 0,
			hits: this.hits,
			misses: this.misses,
		};
	}

	get size(): number {
		return this.entries.size;
	}
}
