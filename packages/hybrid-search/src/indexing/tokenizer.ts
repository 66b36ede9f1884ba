/**
 * Tokenizer shared by indexing and querying.
 *
 * Lowercases, then takes maximal alphanumeric runs that may contain internal
 * hyphens, so error codes survive as one token ("E-4012" -> "e-4012").
 * No stemming, no stop words.
 */

const TOKEN_PATTERN = /[a-z0-9](?:[a-z0-9-]*[a-z0-9])?/g;

export function tokenize(text: string): string[] {
	return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}
