/**
 * Extracted Filters - bridge from a filter extractor's flat output
 *
 * Extractors (rule-based or model-driven) produce a flat object of optional
 * equality constraints. Everything except error_codes maps onto a Filter
 * Predicate; error codes are matched after retrieval because they live in a
 * list, not a scalar field.
 */

import { z } from "zod";
import { MalformedPredicateError } from "../errors";
import type { CorpusIndex } from "../indexing/corpus-index";
import { and, condition, type FilterPredicate } from "./filter-predicate";

export const ExtractedFiltersSchema = z.object({
	region: z.string().optional(),
	product_version: z.string().optional(),
	category: z.string().optional(),
	deprecated: z.boolean().optional(),
	error_codes: z.string().optional(),
});

export type ExtractedFilters = z.infer<typeof ExtractedFiltersSchema>;

/**
 * Validate an extractor's output. Unknown keys are dropped.
 * @throws MalformedPredicateError when a known key has the wrong type
 */
export function parseExtractedFilters(raw: unknown): ExtractedFilters {
	const result = ExtractedFiltersSchema.safeParse(raw ?? {});
	if (!result.success) {
		const issue = result.error.issues[0];
		throw new MalformedPredicateError(`Invalid extracted filters: ${issue.message}`, issue.path.map(String).join("."));
	}
	return result.data;
}

/** Equality conditions in the order region, product_version, category, deprecated */
export function predicateFromExtractedFilters(filters: ExtractedFilters): FilterPredicate | null {
	const conditions: FilterPredicate[] = [];

	if (filters.region !== undefined) conditions.push(condition("region", "eq", filters.region));
	if (filters.product_version !== undefined) {
		conditions.push(condition("product_version", "eq", filters.product_version));
	}
	if (filters.category !== undefined) conditions.push(condition("category", "eq", filters.category));
	if (filters.deprecated !== undefined) conditions.push(condition("deprecated", "eq", filters.deprecated));

	if (conditions.length === 0) return null;
	if (conditions.length === 1) return conditions[0];
	return and(...conditions);
}

export function errorCodeFromExtractedFilters(filters: ExtractedFilters): string | null {
	return filters.error_codes ?? null;
}

/**
 * Keep results whose document lists the error code, re-ranked from 1.
 * Results unknown to the index are dropped.
 */
export function filterByErrorCode<T extends { doc_id: string; rank: number }>(
	results: readonly T[],
	errorCode: string,
	index: CorpusIndex,
): T[] {
	return results
		.filter((result) => index.getDocument(result.doc_id)?.error_codes.includes(errorCode) ?? false)
		.map((result, i) => ({ ...result, rank: i + 1 }));
}
