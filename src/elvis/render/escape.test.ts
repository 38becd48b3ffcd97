import { describe, expect, test } from "vitest";

import {
	escapeHeredoc,
	escapePattern,
	escapeReplacement,
	formatInlineToken,
	hasWhitespace,
	percentEncode,
	shellQuote,
	toCommentText,
} from "./escape.js";

describe("percentEncode", () => {
	test("encodes spaces and reserved characters", () => {
		expect(percentEncode("a b")).toBe("a%20b");
		expect(percentEncode("a&b=c/d?")).toBe("a%26b%3Dc%2Fd%3F");
	});

	test("encodes the characters encodeURIComponent keeps", () => {
		expect(percentEncode("it's (ok)!*")).toBe("it%27s%20%28ok%29%21%2A");
	});

	test("keeps the unreserved set", () => {
		expect(percentEncode("Az09-._~")).toBe("Az09-._~");
	});

	test("encodes UTF-8 bytes", () => {
		expect(percentEncode("é")).toBe("%C3%A9");
	});
});

describe("shellQuote", () => {
	test("wraps in single quotes", () => {
		expect(shellQuote("a b $c")).toBe("'a b $c'");
	});

	test("handles embedded single quotes", () => {
		expect(shellQuote("it's")).toBe("'it'\\''s'");
	});
});

describe("escapeHeredoc", () => {
	test("escapes expansions and backslashes", () => {
		expect(escapeHeredoc("costs $5 `now` \\o/")).toBe(
			"costs \\$5 \\`now\\` \\\\o/",
		);
	});
});

describe("escapeReplacement", () => {
	test("keeps references to the matched value live", () => {
		expect(escapeReplacement("pre-$1-${1}")).toBe("pre-$1-${1}");
	});

	test("makes quotes and other expansions literal", () => {
		expect(escapeReplacement('say "hi" `x` $HOME \\')).toBe(
			'say \\"hi\\" \\`x\\` \\$HOME \\\\',
		);
	});
});

describe("escapePattern", () => {
	test("leaves plain words alone", () => {
		expect(escapePattern("date-desc")).toBe("date-desc");
	});

	test("escapes glob characters", () => {
		expect(escapePattern("a*b?[c]")).toBe("a\\*b\\?\\[c\\]");
	});

	test("escapes shell syntax", () => {
		expect(escapePattern("a|b c)")).toBe("a\\|b\\ c\\)");
	});

	test("renders the empty pattern as an empty quoted word", () => {
		expect(escapePattern("")).toBe("''");
	});

	test("quotes patterns with newlines", () => {
		expect(escapePattern("a\nb")).toBe("'a\nb'");
	});
});

describe("formatInlineToken", () => {
	test("skips empty values", () => {
		expect(formatInlineToken("site", "")).toBeNull();
	});

	test("quotes values with whitespace", () => {
		expect(formatInlineToken("intitle", "two words")).toBe(
			'intitle:"two words"',
		);
	});

	test("passes other values through", () => {
		expect(formatInlineToken("site", "example.org")).toBe("site:example.org");
	});
});

describe("hasWhitespace", () => {
	test("detects tabs and spaces", () => {
		expect(hasWhitespace("a\tb")).toBe(true);
		expect(hasWhitespace("ab")).toBe(false);
	});
});

describe("toCommentText", () => {
	test("folds lines", () => {
		expect(toCommentText("first\n  second")).toBe("first second");
	});
});
