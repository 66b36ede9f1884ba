/**
 * Eval set loading and validation
 *
 * An eval set is a JSON array of labelled queries:
 *
 *   { "query_id": "q-001", "query": "...", "category": "filtered",
 *     "expected_doc_ids": ["KB-0001"], "filter": { "region": "EU" } }
 *
 * The optional filter uses the same wire format as the retriever.
 */

import { readFile } from "node:fs/promises";
import { describeError, parseFilterPredicate, type FilterPredicate } from "hybrid-search";
import { z } from "zod";

export const EvalEntrySchema = z.object({
	query_id: z.string().min(1),
	query: z.string().min(1),
	category: z.string().min(1),
	expected_doc_ids: z.array(z.string()),
	filter: z.unknown().optional(),
});

export const EvalSetSchema = z.array(EvalEntrySchema);

export interface EvalEntry {
	query_id: string;
	query: string;
	category: string;
	expected_doc_ids: string[];
	filter: FilterPredicate | null;
}

export class EvalSetError extends Error {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(`Invalid eval set:\n${issues.join("\n")}`);
		this.name = "EvalSetError";
		this.issues = issues;
	}
}

/**
 * @throws EvalSetError naming every invalid entry
 */
export function parseEvalSet(raw: unknown): EvalEntry[] {
	const result = EvalSetSchema.safeParse(raw);
	if (!result.success) {
		throw new EvalSetError(
			result.error.issues.map((issue) => `[${issue.path.map(String).join(".")}]: ${issue.message}`),
		);
	}

	const issues: string[] = [];
	const seen = new Set<string>();
	const entries: EvalEntry[] = [];

	result.data.forEach((entry, i) => {
		if (seen.has(entry.query_id)) {
			issues.push(`[${i}.query_id]: duplicate query_id "${entry.query_id}"`);
		}
		seen.add(entry.query_id);

		let filter: FilterPredicate | null = null;
		try {
			filter = parseFilterPredicate(entry.filter);
		} catch (error) {
			issues.push(`[${i}.filter]: ${describeError(error)}`);
		}

		entries.push({
			query_id: entry.query_id,
			query: entry.query,
			category: entry.category,
			expected_doc_ids: entry.expected_doc_ids,
			filter,
		});
	});

	if (issues.length > 0) {
		throw new EvalSetError(issues);
	}
	return entries;
}

export async function loadEvalSet(filePath: string): Promise<EvalEntry[]> {
	const text = await readFile(filePath, "utf-8");

	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (error) {
		throw new EvalSetError([`${filePath}: ${describeError(error)}`]);
	}
	return parseEvalSet(raw);
}
