/**
 * Corpus loading - validates the document input format and freezes documents
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { CorpusValidationError, describeError } from "../errors";
import { CATEGORIES, PRODUCT_VERSIONS, REGIONS, type KbDocument } from "../types";

// ============================================================================
// Schema
// ============================================================================

const ERROR_CODE_PATTERN = /^E-\d{4}$/;

export const DocumentSchema = z.object({
	doc_id: z.string().min(1, "doc_id cannot be empty"),
	title: z.string(),
	body: z.string(),
	region: z.enum(REGIONS),
	product_version: z.enum(PRODUCT_VERSIONS),
	category: z.enum(CATEGORIES),
	deprecated: z.boolean(),
	effective_date: z.iso.date("effective_date must be an ISO-8601 date (YYYY-MM-DD)"),
	error_codes: z.array(z.string().regex(ERROR_CODE_PATTERN, "Error codes must match E-####")).default([]),
});

const CorpusSchema = z.array(DocumentSchema);

// ============================================================================
// Parsing
// ============================================================================

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) => {
		const path = issue.path.length > 0 ? `[${issue.path.join(".")}]` : "[root]";
		return `${path}: ${issue.message}`;
	});
}

function findSetViolations(documents: readonly KbDocument[]): string[] {
	const issues: string[] = [];
	const seenIds = new Set<string>();

	documents.forEach((doc, i) => {
		if (seenIds.has(doc.doc_id)) {
			issues.push(`[${i}.doc_id]: duplicate doc_id "${doc.doc_id}"`);
		}
		seenIds.add(doc.doc_id);

		if (new Set(doc.error_codes).size !== doc.error_codes.length) {
			issues.push(`[${i}.error_codes]: duplicate error code in "${doc.doc_id}"`);
		}
	});

	return issues;
}

/**
 * Validate raw input as an ordered corpus. Order is preserved: it is the
 * insertion order that BM25 tie-breaking relies on.
 * @throws CorpusValidationError listing every issue found
 */
export function parseDocuments(raw: unknown): KbDocument[] {
	const result = CorpusSchema.safeParse(raw);
	if (!result.success) {
		throw new CorpusValidationError(formatIssues(result.error));
	}

	const documents: KbDocument[] = result.data.map((doc) =>
		Object.freeze({ ...doc, error_codes: Object.freeze([...doc.error_codes]) }),
	);

	const violations = findSetViolations(documents);
	if (violations.length > 0) {
		throw new CorpusValidationError(violations);
	}

	return documents;
}

/** Read a JSON array of documents from disk and validate it */
export async function loadDocuments(filePath: string): Promise<KbDocument[]> {
	const text = await readFile(filePath, "utf8");

	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (error) {
		throw new CorpusValidationError([`[root]: ${filePath} is not valid JSON (${describeError(error)})`]);
	}

	return parseDocuments(raw);
}
