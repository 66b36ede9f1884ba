import { describe, expect, test } from "vitest";
import { CorpusValidationError } from "../errors";
import { buildCorpusIndex } from "../indexing/corpus-index";
import { makeDocument } from "./fixtures/documents";

const K1 = 1.5;
const B = 0.75;

function termScore(idf: number, tf: number, docLength: number, averageLength: number): number {
	return (idf * (tf * (K1 + 1))) / (tf + K1 * (1 - B + (B * docLength) / averageLength));
}

// Lengths 2, 3, 2; "alpha" appears in two of three documents
const corpus = [
	makeDocument("d1", "alpha", "beta"),
	makeDocument("d2", "alpha", "alpha gamma"),
	makeDocument("d3", "delta", "epsilon"),
];
const averageLength = 7 / 3;
const rareIdf = Math.log(2.5 / 1.5);
const commonIdf = Math.log(1.5 / 2.5);
const flooredIdf = 0.25 * ((commonIdf + 4 * rareIdf) / 5);

describe("buildCorpusIndex", () => {
	test("reports corpus statistics", () => {
		const index = buildCorpusIndex(corpus);
		expect(index.size).toBe(3);
		expect(index.stats()).toEqual({
			documentCount: 3,
			vocabularySize: 5,
			averageDocumentLength: averageLength,
		});
	});

	test("scores a rare term with Okapi BM25", () => {
		const index = buildCorpusIndex(corpus);
		const results = index.search("beta", 3);

		expect(results.map((r) => r.doc_id)).toEqual(["d1", "d2", "d3"]);
		expect(results.map((r) => r.rank)).toEqual([1, 2, 3]);
		expect(results[0].score).toBeCloseTo(termScore(rareIdf, 1, 2, averageLength), 10);
		expect(results[1].score).toBe(0);
		expect(results[2].score).toBe(0);
	});

	test("floors negative IDF to epsilon times the mean IDF", () => {
		const index = buildCorpusIndex(corpus);
		const results = index.search("alpha", 2);

		expect(results.map((r) => r.doc_id)).toEqual(["d2", "d1"]);
		expect(results[0].score).toBeCloseTo(termScore(flooredIdf, 2, 3, averageLength), 10);
		expect(results[1].score).toBeCloseTo(termScore(flooredIdf, 1, 2, averageLength), 10);
	});

	test("repeated query tokens each contribute", () => {
		const index = buildCorpusIndex(corpus);
		const single = index.search("beta", 1)[0].score;
		const doubled = index.search("beta beta", 1)[0].score;
		expect(doubled).toBeCloseTo(2 * single, 10);
	});

	test("unknown terms and empty queries keep insertion order at zero score", () => {
		const index = buildCorpusIndex(corpus);
		for (const query of ["zeta", ""]) {
			const results = index.search(query, 5);
			expect(results).toEqual([
				{ doc_id: "d1", score: 0, rank: 1 },
				{ doc_id: "d2", score: 0, rank: 2 },
				{ doc_id: "d3", score: 0, rank: 3 },
			]);
		}
	});

	test("equal scores tie-break by insertion order", () => {
		const index = buildCorpusIndex([
			makeDocument("b", "same", "words"),
			makeDocument("a", "same", "words"),
			makeDocument("c", "other", "text"),
			makeDocument("d", "more", "text"),
			makeDocument("e", "filler", "stuff"),
		]);
		expect(index.search("words", 3).map((r) => r.doc_id)).toEqual(["b", "a", "c"]);
	});

	test("topK bounds the result size", () => {
		const index = buildCorpusIndex(corpus);
		expect(index.search("alpha", 0)).toEqual([]);
		expect(index.search("alpha", -1)).toEqual([]);
		expect(index.search("alpha", 10)).toHaveLength(3);
	});

	test("an empty corpus returns nothing", () => {
		const index = buildCorpusIndex([]);
		expect(index.search("anything", 5)).toEqual([]);
		expect(index.stats()).toEqual({ documentCount: 0, vocabularySize: 0, averageDocumentLength: 0 });
	});

	test("a corpus of blank documents scores zero", () => {
		const index = buildCorpusIndex([makeDocument("x", "", ""), makeDocument("y", "", "")]);
		expect(index.search("x", 2)).toEqual([
			{ doc_id: "x", score: 0, rank: 1 },
			{ doc_id: "y", score: 0, rank: 2 },
		]);
	});

	test("exposes documents, metadata and ordinals", () => {
		const index = buildCorpusIndex([
			makeDocument("KB-1", "First", "one", { error_codes: ["E-1001", "E-1002"] }),
			makeDocument("KB-2", "Second", "two"),
		]);

		expect(index.documents().map((d) => d.doc_id)).toEqual(["KB-1", "KB-2"]);
		expect(index.getOrdinal("KB-2")).toBe(1);
		expect(index.getDocument("missing")).toBeUndefined();
		expect(index.getMetadata("KB-1")).toEqual({
			region: "EU",
			product_version: "v2.0",
			category: "authentication",
			deprecated: false,
			effective_date: "2024-01-15",
			error_codes_str: "E-1001,E-1002",
		});
	});

	test("rejects duplicate doc_ids", () => {
		const build = () => buildCorpusIndex([makeDocument("dup", "a", "b"), makeDocument("dup", "c", "d")]);
		expect(build).toThrow(CorpusValidationError);
		expect(build).toThrow('[1.doc_id]: duplicate doc_id "dup"');
	});

	test("repeated searches return identical results", () => {
		const index = buildCorpusIndex(corpus);
		expect(index.search("alpha beta", 3)).toEqual(index.search("alpha beta", 3));
	});
});
