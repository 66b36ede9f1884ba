/**
 * Filter Predicate - typed boolean expressions over document metadata
 *
 * The wire form is the JSON-like shape produced by filter extractors and
 * consumed by vector services:
 *
 *   { region: "EU" }                              equality shorthand
 *   { region: { eq: "EU" } }                      explicit operator ($eq also accepted)
 *   { AND: [ ...conditions ] } / { OR: [ ... ] }  composites ($and / $or also accepted)
 *
 * parseFilterPredicate() turns that into a tagged tree. Anything it does not
 * recognize raises MalformedPredicateError instead of silently matching
 * nothing.
 */

import { z } from "zod";
import { MalformedPredicateError } from "../errors";

// ============================================================================
// Types
// ============================================================================

export const FILTER_FIELDS = [
	"region",
	"product_version",
	"category",
	"deprecated",
	"effective_date",
	"error_codes_str",
] as const;

export type FilterField = (typeof FILTER_FIELDS)[number];

export const FILTER_OPERATORS = ["eq", "ne", "gt", "gte", "lt", "lte", "in", "nin"] as const;

export type FilterOperator = (typeof FILTER_OPERATORS)[number];

export type EqualityOperator = "eq" | "ne";
export type OrderingOperator = "gt" | "gte" | "lt" | "lte";
export type MembershipOperator = "in" | "nin";

export type FilterScalar = string | number | boolean;

export type ConditionNode =
	| { readonly kind: "condition"; readonly field: FilterField; readonly operator: EqualityOperator; readonly value: FilterScalar }
	| { readonly kind: "condition"; readonly field: FilterField; readonly operator: OrderingOperator; readonly value: string | number }
	| {
			readonly kind: "condition";
			readonly field: FilterField;
			readonly operator: MembershipOperator;
			readonly value: readonly FilterScalar[];
	  };

export interface AndNode {
	readonly kind: "and";
	readonly children: readonly FilterPredicate[];
}

export interface OrNode {
	readonly kind: "or";
	readonly children: readonly FilterPredicate[];
}

export type FilterPredicate = ConditionNode | AndNode | OrNode;

/** Canonical wire form: { $and: [...] }, { field: { $op: value } } */
export type WireFilter = { [key: string]: unknown };

/** Value type each field holds in the flattened metadata record */
const FIELD_TYPES: Record<FilterField, "string" | "boolean"> = {
	region: "string",
	product_version: "string",
	category: "string",
	deprecated: "boolean",
	effective_date: "string",
	error_codes_str: "string",
};

const COMPOSITE_KEYS: Record<string, "and" | "or"> = {
	AND: "and",
	$and: "and",
	OR: "or",
	$or: "or",
};

// ============================================================================
// Builders
// ============================================================================

export function condition(field: FilterField, operator: EqualityOperator, value: FilterScalar): ConditionNode;
export function condition(field: FilterField, operator: OrderingOperator, value: string | number): ConditionNode;
export function condition(field: FilterField, operator: MembershipOperator, value: readonly FilterScalar[]): ConditionNode;
export function condition(
	field: FilterField,
	operator: FilterOperator,
	value: FilterScalar | readonly FilterScalar[],
): ConditionNode {
	return buildCondition(field, operator, value, field);
}

export function and(...children: FilterPredicate[]): FilterPredicate {
	const node: AndNode = { kind: "and", children: Object.freeze([...children]) };
	return Object.freeze(node);
}

export function or(...children: FilterPredicate[]): FilterPredicate {
	const node: OrNode = { kind: "or", children: Object.freeze([...children]) };
	return Object.freeze(node);
}

// ============================================================================
// Operand Validation
// ============================================================================

const StringOperand = z.string();
const BooleanOperand = z.boolean();
const StringListOperand = z.array(StringOperand);
const BooleanListOperand = z.array(BooleanOperand);

function parseScalar(field: FilterField, value: unknown): FilterScalar | undefined {
	const result = FIELD_TYPES[field] === "boolean" ? BooleanOperand.safeParse(value) : StringOperand.safeParse(value);
	return result.success ? result.data : undefined;
}

function parseScalarList(field: FilterField, value: unknown): FilterScalar[] | undefined {
	const result =
		FIELD_TYPES[field] === "boolean" ? BooleanListOperand.safeParse(value) : StringListOperand.safeParse(value);
	return result.success ? result.data : undefined;
}

function buildCondition(
	field: FilterField,
	operator: FilterOperator,
	value: unknown,
	path: string,
): ConditionNode {
	let node: ConditionNode;

	switch (operator) {
		case "eq":
		case "ne": {
			const operand = parseScalar(field, value);
			if (operand === undefined) {
				throw new MalformedPredicateError(
					`Operator "${operator}" on "${field}" needs a ${FIELD_TYPES[field]} operand`,
					path,
				);
			}
			node = { kind: "condition", field, operator, value: operand };
			break;
		}
		case "gt":
		case "gte":
		case "lt":
		case "lte": {
			if (FIELD_TYPES[field] !== "string") {
				throw new MalformedPredicateError(`Operator "${operator}" is not supported on "${field}"`, path);
			}
			const parsed = StringOperand.safeParse(value);
			if (!parsed.success) {
				throw new MalformedPredicateError(`Operator "${operator}" on "${field}" needs a string operand`, path);
			}
			node = { kind: "condition", field, operator, value: parsed.data };
			break;
		}
		case "in":
		case "nin": {
			const operand = parseScalarList(field, value);
			if (operand === undefined) {
				throw new MalformedPredicateError(
					`Operator "${operator}" on "${field}" needs an array of ${FIELD_TYPES[field]} values`,
					path,
				);
			}
			node = { kind: "condition", field, operator, value: Object.freeze(operand) };
			break;
		}
		default: {
			const unknownOperator: never = operator;
			throw new MalformedPredicateError(`Unknown filter operator "${String(unknownOperator)}"`, path);
		}
	}

	return Object.freeze(node);
}

// ============================================================================
// Parsing
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

const FIELD_NAMES: readonly string[] = FILTER_FIELDS;
const OPERATOR_NAMES: readonly string[] = FILTER_OPERATORS;

function isFilterField(key: string): key is FilterField {
	return FIELD_NAMES.includes(key);
}

function isFilterOperator(key: string): key is FilterOperator {
	return OPERATOR_NAMES.includes(key);
}

function childPath(path: string, key: string): string {
	return path ? `${path}.${key}` : key;
}

function parseNode(raw: unknown, path: string): FilterPredicate {
	if (!isPlainObject(raw)) {
		throw new MalformedPredicateError("Filter node must be an object", path);
	}

	const keys = Object.keys(raw);
	if (keys.length === 0) {
		throw new MalformedPredicateError("Filter node cannot be empty", path);
	}

	const compositeKey = keys.find((key) => Object.hasOwn(COMPOSITE_KEYS, key));
	if (compositeKey !== undefined) {
		if (keys.length > 1) {
			throw new MalformedPredicateError(
				`Composite "${compositeKey}" cannot be combined with other keys (${keys.join(", ")})`,
				path,
			);
		}
		return parseComposite(COMPOSITE_KEYS[compositeKey], raw[compositeKey], childPath(path, compositeKey));
	}

	const conditions: FilterPredicate[] = [];
	for (const key of keys) {
		conditions.push(...parseField(key, raw[key], childPath(path, key)));
	}
	return conditions.length === 1 ? conditions[0] : and(...conditions);
}

function parseComposite(kind: "and" | "or", raw: unknown, path: string): FilterPredicate {
	if (!Array.isArray(raw) || raw.length === 0) {
		throw new MalformedPredicateError(`"${kind.toUpperCase()}" needs a non-empty array of conditions`, path);
	}
	const children = raw.map((child, i) => parseNode(child, `${path}[${i}]`));
	return kind === "and" ? and(...children) : or(...children);
}

function parseField(key: string, constraint: unknown, path: string): ConditionNode[] {
	if (!isFilterField(key)) {
		throw new MalformedPredicateError(`Unknown filter field "${key}"`, path);
	}

	// Shorthand: { field: value } means equality
	if (!isPlainObject(constraint)) {
		return [buildCondition(key, "eq", constraint, path)];
	}

	const operators = Object.keys(constraint);
	if (operators.length === 0) {
		throw new MalformedPredicateError(`No operator given for "${key}"`, path);
	}

	return operators.map((rawOperator) => {
		const operator = rawOperator.startsWith("$") ? rawOperator.slice(1) : rawOperator;
		if (!isFilterOperator(operator)) {
			throw new MalformedPredicateError(`Unknown filter operator "${rawOperator}"`, childPath(path, rawOperator));
		}
		return buildCondition(key, operator, constraint[rawOperator], childPath(path, rawOperator));
	});
}

/**
 * Parse a wire-format filter. null, undefined and {} mean "no filter".
 * @throws MalformedPredicateError on unknown fields, operators or bad operands
 */
export function parseFilterPredicate(raw: unknown): FilterPredicate | null {
	if (raw === null || raw === undefined) return null;
	if (isPlainObject(raw) && Object.keys(raw).length === 0) return null;
	return parseNode(raw, "");
}

// ============================================================================
// Serialization
// ============================================================================

/** Canonical $-prefixed wire form, suitable for external vector services and logs */
export function toWireFilter(predicate: FilterPredicate): WireFilter {
	switch (predicate.kind) {
		case "and":
			return { $and: predicate.children.map(toWireFilter) };
		case "or":
			return { $or: predicate.children.map(toWireFilter) };
		case "condition":
			return { [predicate.field]: { [`$${predicate.operator}`]: predicate.value } };
	}
}
