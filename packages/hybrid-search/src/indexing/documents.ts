/**
 * Document projections used across indexing and querying
 */

import type { DocumentDisplay, FlatMetadata, KbDocument } from "../types";

/** Text that both the lexical index and the embedder see for a document */
export function documentText(doc: KbDocument): string {
	return `${doc.title} ${doc.body}`;
}

export function flattenMetadata(doc: KbDocument): FlatMetadata {
	return {
		region: doc.region,
		product_version: doc.product_version,
		category: doc.category,
		deprecated: doc.deprecated,
		effective_date: doc.effective_date,
		error_codes_str: doc.error_codes.join(","),
	};
}

export function toDisplay(doc: KbDocument): DocumentDisplay {
	return {
		doc_id: doc.doc_id,
		title: doc.title,
		body: doc.body,
		region: doc.region,
		product_version: doc.product_version,
		category: doc.category,
		deprecated: doc.deprecated,
	};
}
