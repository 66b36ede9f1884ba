import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { createLogger } from "../diagnostics";
import { SimpleEmbedder } from "../embeddings/simple-embedder";
import { condition, or } from "../query/filter-predicate";
import {
	cosineSimilarity,
	createSqliteVectorStore,
	deserializeEmbedding,
	serializeEmbedding,
	type SqliteVectorStore,
} from "../storage/sqlite-vector-store";
import { makeDocument, SUPPORT_CORPUS } from "./fixtures/documents";

describe("vector math", () => {
	test("cosine similarity", () => {
		expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
		expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 12);
		expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
		expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
	});

	test("cosine similarity rejects mismatched dimensions", () => {
		expect(() => cosineSimilarity([1, 2, 3], [1, 2])).toThrow("Vector dimension mismatch: 3 vs 2");
	});

	test("embeddings survive serialization as float32", () => {
		expect(deserializeEmbedding(serializeEmbedding([0.5, -1, 0.25, 8]))).toEqual([0.5, -1, 0.25, 8]);
	});

	test("blobs that are not whole float32 values are rejected", () => {
		expect(() => deserializeEmbedding(Buffer.from([1, 2, 3]).toString("base64"))).toThrow(
			"Embedding blob has 3 bytes, not a multiple of 4",
		);
	});
});

describe("SQLite vector store", () => {
	let db: Database.Database;
	let embedder: SimpleEmbedder;
	let store: SqliteVectorStore;

	beforeEach(async () => {
		db = new Database(":memory:");
		embedder = new SimpleEmbedder(128);
		store = createSqliteVectorStore(db, embedder);
		await store.upsertDocuments(SUPPORT_CORPUS);
	});

	afterEach(() => {
		db.close();
	});

	test("stores one row per document", () => {
		expect(store.count()).toBe(4);
	});

	test("ranks the closest document first and attaches its display fields", async () => {
		const matches = await store.query({ text: "forgotten password reset", topK: 2 });

		expect(matches).toHaveLength(2);
		expect(matches[0]).toMatchObject({
			doc_id: "KB-0001",
			rank: 1,
			document: { title: "Password reset", region: "EU", deprecated: false },
		});
		expect(matches[1].rank).toBe(2);
		expect(matches[0].score).toBeGreaterThan(matches[1].score);
	});

	test("applies filters natively", async () => {
		const matches = await store.query({
			text: "login",
			topK: 10,
			filter: condition("region", "eq", "US"),
		});

		expect(matches.map((m) => m.doc_id).sort()).toEqual(["KB-0002", "KB-0003"]);
		expect(matches.map((m) => m.rank)).toEqual([1, 2]);
	});

	test("filters on error codes through the flattened string", async () => {
		const matches = await store.query({
			text: "error",
			topK: 10,
			filter: or(condition("error_codes_str", "eq", "E-4012"), condition("error_codes_str", "eq", "E-1001")),
		});

		expect(matches.map((m) => m.doc_id).sort()).toEqual(["KB-0001", "KB-0003"]);
	});

	test("a non-positive topK returns nothing", async () => {
		expect(await store.query({ text: "password", topK: 0 })).toEqual([]);
	});

	test("embeds queries and documents with their input types", async () => {
		const embed = vi.spyOn(embedder, "embed");
		const embedBatch = vi.spyOn(embedder, "embedBatch");
		const batched = createSqliteVectorStore(new Database(":memory:"), embedder, { batchSize: 3 });

		await batched.upsertDocuments(SUPPORT_CORPUS);
		await batched.query({ text: "invoice", topK: 1 });

		expect(embedBatch).toHaveBeenCalledTimes(2);
		expect(embedBatch.mock.calls[0]).toEqual([
			[
				"Password reset Reset a forgotten password from the login page",
				"Invoice download Download an invoice from the billing page",
				"Login timeout Login fails with error E-4012 after a timeout",
			],
			{ inputType: "document" },
		]);
		expect(embedBatch.mock.calls[1][0]).toEqual(["Deploy rollback Roll back a failed deployment"]);
		expect(embed).toHaveBeenCalledWith("invoice", { inputType: "query" });
	});

	test("re-upserting a document replaces it in place", async () => {
		await store.upsertDocuments([
			makeDocument("KB-0002", "Invoice export", "Export invoices as CSV", { region: "EU" }),
		]);

		expect(store.count()).toBe(4);
		const matches = await store.query({ text: "zzz", topK: 10, filter: condition("region", "eq", "EU") });
		expect(matches.map((m) => m.doc_id).sort()).toEqual(["KB-0001", "KB-0002"]);
		const updated = matches.find((m) => m.doc_id === "KB-0002");
		expect(updated?.document?.title).toBe("Invoice export");
	});

	test("equal similarities keep insertion order", async () => {
		// Documents without tokens embed to the zero vector
		const fresh = createSqliteVectorStore(new Database(":memory:"), embedder);
		await fresh.upsertDocuments([
			makeDocument("A", "", ""),
			makeDocument("B", "", ""),
			makeDocument("C", "", ""),
		]);

		const matches = await fresh.query({ text: "zzz", topK: 3 });
		expect(matches.map((m) => [m.doc_id, m.score])).toEqual([
			["A", 0],
			["B", 0],
			["C", 0],
		]);
	});

	test("delete reports whether a row was removed", async () => {
		expect(store.delete("KB-0003")).toBe(true);
		expect(store.delete("KB-0003")).toBe(false);
		expect(store.count()).toBe(3);

		const matches = await store.query({ text: "login timeout", topK: 10 });
		expect(matches.map((m) => m.doc_id)).not.toContain("KB-0003");
	});

	test("clear empties the store", async () => {
		store.clear();
		expect(store.count()).toBe(0);
		expect(await store.query({ text: "password", topK: 5 })).toEqual([]);
	});

	test("an aborted request rejects", async () => {
		const controller = new AbortController();
		controller.abort();

		await expect(store.query({ text: "password", topK: 5, signal: controller.signal })).rejects.toThrow();
	});

	test("rows that cannot be read are skipped with a warning", async () => {
		const logger = createLogger({ level: "warn", storeEntries: true, console: false });
		const logged = createSqliteVectorStore(db, embedder, { logger });
		db.prepare(
			"INSERT INTO kb_vectors (doc_id, embedding, metadata, document, updated_at) VALUES (?, ?, ?, ?, ?)",
		).run("BROKEN", serializeEmbedding([1]), "not json", "{}", 0);

		const matches = await logged.query({ text: "password", topK: 10 });

		expect(matches.map((m) => m.doc_id)).not.toContain("BROKEN");
		expect(matches).toHaveLength(4);
		expect(logger.getEntries().map((e) => [e.message, e.context?.docId])).toEqual([
			["Skipping unreadable vector row", "BROKEN"],
		]);
	});
});
