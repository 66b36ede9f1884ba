import { describe, expect, test } from "vitest";
import { tokenize } from "../indexing/tokenizer";

describe("tokenize", () => {
	test("keeps internal hyphens and drops punctuation", () => {
		expect(tokenize("Error E-4012, retry!")).toEqual(["error", "e-4012", "retry"]);
	});

	test("strips leading and trailing hyphens", () => {
		expect(tokenize("--foo-bar-- baz-")).toEqual(["foo-bar", "baz"]);
	});

	test("splits on dots and underscores", () => {
		expect(tokenize("v2.0 API_KEY")).toEqual(["v2", "0", "api", "key"]);
	});

	test("only ASCII letters and digits form tokens", () => {
		expect(tokenize("Ünïcode café")).toEqual(["n", "code", "caf"]);
	});

	test("empty and punctuation-only text yield no tokens", () => {
		expect(tokenize("")).toEqual([]);
		expect(tokenize(" -- !! ")).toEqual([]);
	});
});
