import { afterEach, describe, expect, test, vi } from "vitest";
import { VoyageAIClient } from "voyageai";
import { isVoyageAvailable, MAX_BATCH_SIZE, VoyageEmbedder } from "../embeddings/voyage-embedder";

describe("VoyageEmbedder", () => {
	const originalApiKey = process.env.VOYAGE_AI_API_KEY;

	afterEach(() => {
		if (originalApiKey === undefined) {
			delete process.env.VOYAGE_AI_API_KEY;
		} else {
			process.env.VOYAGE_AI_API_KEY = originalApiKey;
		}
		vi.restoreAllMocks();
	});

	test("requires an API key", () => {
		delete process.env.VOYAGE_AI_API_KEY;
		expect(() => new VoyageEmbedder()).toThrow(/VOYAGE_AI_API_KEY/);
		expect(isVoyageAvailable()).toBe(false);
		expect(isVoyageAvailable("test-key")).toBe(true);
	});

	test("reports model and dimension", () => {
		const embedder = new VoyageEmbedder({ apiKey: "test-key", model: "voyage-3.5-lite", dimensions: 512 });
		expect(embedder.modelId).toBe("voyageai/voyage-3.5-lite");
		expect(embedder.dimension).toBe(512);
	});

	test("sends the input type and maps embeddings back by index", async () => {
		const embed = vi.spyOn(VoyageAIClient.prototype, "embed").mockResolvedValue({
			data: [
				{ index: 1, embedding: [0, 1] },
				{ index: 0, embedding: [1, 0] },
			],
		});
		const embedder = new VoyageEmbedder({ apiKey: "test-key", dimensions: 2 });

		const vectors = await embedder.embedBatch(["refund policy", "vpn setup"], { inputType: "document" });

		expect(vectors).toEqual([
			[1, 0],
			[0, 1],
		]);
		expect(embed).toHaveBeenCalledWith(
			{
				model: "voyage-3.5",
				input: ["refund policy", "vpn setup"],
				inputType: "document",
				outputDimension: 2,
				truncation: true,
			},
			{ timeoutInSeconds: 30, maxRetries: 2 },
		);
	});

	test("serves repeated texts from the cache and blank texts without a call", async () => {
		const embed = vi.spyOn(VoyageAIClient.prototype, "embed").mockResolvedValue({
			data: [{ index: 0, embedding: [0.6, 0.8] }],
		});
		const embedder = new VoyageEmbedder({ apiKey: "test-key", dimensions: 2 });

		await embedder.embed("refund policy", { inputType: "query" });
		const [cached, blank] = await embedder.embedBatch(["refund policy", "   "], { inputType: "query" });

		expect(cached).toEqual([0.6, 0.8]);
		expect(blank).toEqual([0, 0]);
		expect(embed).toHaveBeenCalledTimes(1);
		expect(embedder.getCacheStats()).toMatchObject({ size: 1, hits: 1, misses: 1 });
	});

	test("splits large batches", async () => {
		const embed = vi
			.spyOn(VoyageAIClient.prototype, "embed")
			.mockResolvedValueOnce({
				data: Array.from({ length: MAX_BATCH_SIZE }, (_, index) => ({ index, embedding: [index] })),
			})
			.mockResolvedValueOnce({
				data: [
					{ index: 0, embedding: [0] },
					{ index: 1, embedding: [1] },
				],
			});
		const embedder = new VoyageEmbedder({ apiKey: "test-key", dimensions: 1 });
		const texts = Array.from({ length: MAX_BATCH_SIZE + 2 }, (_, i) => `article ${i}`);

		const vectors = await embedder.embedBatch(texts);

		expect(embed).toHaveBeenCalledTimes(2);
		expect(vectors).toHaveLength(MAX_BATCH_SIZE + 2);
		expect(vectors[MAX_BATCH_SIZE]).toEqual([0]);
		expect(vectors[MAX_BATCH_SIZE + 1]).toEqual([1]);
	});

	test("a missing embedding is an error", async () => {
		vi.spyOn(VoyageAIClient.prototype, "embed").mockResolvedValue({
			data: [{ index: 0, embedding: [1, 0] }],
		});
		const embedder = new VoyageEmbedder({ apiKey: "test-key", dimensions: 2 });

		await expect(embedder.embedBatch(["first", "second"])).rejects.toThrow(
			"Voyage AI did not return an embedding for item at index 1",
		);
	});
});
