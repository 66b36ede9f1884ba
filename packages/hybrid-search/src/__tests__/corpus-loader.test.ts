import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { CorpusValidationError } from "../errors";
import { loadDocuments, parseDocuments } from "../indexing/corpus-loader";

const FIXTURE_PATH = fileURLToPath(new URL("./fixtures/corpus.json", import.meta.url));

const validDocument = {
	doc_id: "KB-1",
	title: "Title",
	body: "Body",
	region: "EU",
	product_version: "v1.0",
	category: "networking",
	deprecated: false,
	effective_date: "2024-03-18",
	error_codes: ["E-1001"],
};

function validationIssues(raw: unknown): string[] {
	try {
		parseDocuments(raw);
	} catch (error) {
		if (error instanceof CorpusValidationError) return error.issues;
		throw error;
	}
	throw new Error("expected parseDocuments to throw");
}

describe("parseDocuments", () => {
	test("returns frozen documents in input order", () => {
		const documents = parseDocuments([validDocument, { ...validDocument, doc_id: "KB-2", error_codes: [] }]);

		expect(documents.map((d) => d.doc_id)).toEqual(["KB-1", "KB-2"]);
		expect(Object.isFrozen(documents[0])).toBe(true);
		expect(Object.isFrozen(documents[0].error_codes)).toBe(true);
	});

	test("error_codes defaults to empty", () => {
		const { error_codes: _omitted, ...withoutCodes } = validDocument;
		expect(parseDocuments([withoutCodes])[0].error_codes).toEqual([]);
	});

	test("names the path of each schema violation", () => {
		expect(validationIssues([{ ...validDocument, region: "MARS" }])).toEqual([
			expect.stringMatching(/^\[0\.region\]: /),
		]);
		expect(validationIssues([{ ...validDocument, effective_date: "18/03/2024" }])).toEqual([
			"[0.effective_date]: effective_date must be an ISO-8601 date (YYYY-MM-DD)",
		]);
		expect(validationIssues([{ ...validDocument, error_codes: ["E-12"] }])).toEqual([
			"[0.error_codes.0]: Error codes must match E-####",
		]);
		expect(validationIssues({ not: "an array" })).toEqual([expect.stringMatching(/^\[root\]: /)]);
	});

	test("rejects duplicate doc_ids and error codes", () => {
		expect(validationIssues([validDocument, validDocument])).toEqual(['[1.doc_id]: duplicate doc_id "KB-1"']);
		expect(validationIssues([{ ...validDocument, error_codes: ["E-1001", "E-1001"] }])).toEqual([
			'[0.error_codes]: duplicate error code in "KB-1"',
		]);
	});
});

describe("loadDocuments", () => {
	let workDir: string;

	beforeEach(async () => {
		workDir = await mkdtemp(join(tmpdir(), "corpus-loader-"));
	});

	afterEach(async () => {
		await rm(workDir, { recursive: true, force: true });
	});

	test("reads a JSON corpus from disk", async () => {
		const documents = await loadDocuments(FIXTURE_PATH);

		expect(documents.map((d) => d.doc_id)).toEqual(["KB-0101", "KB-0102"]);
		expect(documents[1].error_codes).toEqual([]);
		expect(documents[0].category).toBe("networking");
	});

	test("invalid JSON is a validation error", async () => {
		const filePath = join(workDir, "broken.json");
		await writeFile(filePath, "[{", "utf8");

		await expect(loadDocuments(filePath)).rejects.toThrow(CorpusValidationError);
	});
});
