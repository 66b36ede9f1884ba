/**
 * Filter Evaluator - applies a Filter Predicate to one metadata record
 *
 * Used post-hoc by the sparse branch and natively by the local vector store,
 * so a predicate means the same thing on both sides of a hybrid query.
 */

import { MalformedPredicateError } from "../errors";
import type { FlatMetadata } from "../types";
import type { ConditionNode, FilterPredicate, FilterScalar } from "./filter-predicate";

/**
 * Metadata as seen by the evaluator. Fields may be missing on records that
 * come from outside the corpus index.
 */
export type MetadataRecord = Partial<FlatMetadata>;

/** Strings compare lexicographically (ISO dates sort chronologically), numbers numerically */
function compareOrdered(value: FilterScalar, target: string | number): number | null {
	if (typeof value === "string" && typeof target === "string") {
		return value < target ? -1 : value > target ? 1 : 0;
	}
	if (typeof value === "number" && typeof target === "number") {
		return value - target;
	}
	return null;
}

function evaluateCondition(node: ConditionNode, metadata: MetadataRecord): boolean {
	const value: FilterScalar | undefined = metadata[node.field];

	// An absent field fails every comparator except ne / nin
	switch (node.operator) {
		case "eq":
			return value !== undefined && value === node.value;
		case "ne":
			return value === undefined || value !== node.value;
		case "in":
			return value !== undefined && node.value.includes(value);
		case "nin":
			return value === undefined || !node.value.includes(value);
		case "gt":
		case "gte":
		case "lt":
		case "lte": {
			if (value === undefined) return false;
			const cmp = compareOrdered(value, node.value);
			if (cmp === null) return false;
			if (node.operator === "gt") return cmp > 0;
			if (node.operator === "gte") return cmp >= 0;
			if (node.operator === "lt") return cmp < 0;
			return cmp <= 0;
		}
		default: {
			const unknownNode: never = node;
			throw new MalformedPredicateError(`Unsupported filter condition ${JSON.stringify(unknownNode)}`, "");
		}
	}
}

/**
 * Evaluate a predicate against a metadata record.
 * @throws MalformedPredicateError when the tree contains a node kind or
 *         operator it does not know (only reachable from untyped callers)
 */
export function evaluateFilter(predicate: FilterPredicate, metadata: MetadataRecord): boolean {
	switch (predicate.kind) {
		case "condition":
			return evaluateCondition(predicate, metadata);
		case "and":
			return predicate.children.every((child) => evaluateFilter(child, metadata));
		case "or":
			return predicate.children.some((child) => evaluateFilter(child, metadata));
		default: {
			const unknownNode: never = predicate;
			throw new MalformedPredicateError(`Unsupported filter node ${JSON.stringify(unknownNode)}`, "");
		}
	}
}

/** Bind a predicate once for repeated evaluation */
export function compileFilter(predicate: FilterPredicate): (metadata: MetadataRecord) => boolean {
	return (metadata) => evaluateFilter(predicate, metadata);
}
