import { describe, expect, test } from "vitest";

import { resolveUrls, splitScheme } from "./urls.js";

describe("splitScheme", () => {
	test("separates an explicit scheme", () => {
		expect(splitScheme("http://example.com/s?")).toEqual({
			scheme: "http",
			rest: "example.com/s?",
		});
		expect(splitScheme("example.com")).toEqual({
			scheme: null,
			rest: "example.com",
		});
	});
});

describe("resolveUrls", () => {
	test("defaults to https", () => {
		expect(resolveUrls("example.com", "example.com/search", false)).toEqual({
			baseUrl: "https://example.com",
			searchUrl: "https://example.com/search",
			baseUrlWithoutScheme: "example.com",
		});
	});

	test("uses http when insecure", () => {
		expect(resolveUrls("example.com", "example.com/s", true).searchUrl).toBe(
			"http://example.com/s",
		);
	});

	test("copies the one explicit scheme to the other URL", () => {
		expect(resolveUrls("example.com", "ftp://example.com/s", false)).toEqual({
			baseUrl: "ftp://example.com",
			searchUrl: "ftp://example.com/s",
			baseUrlWithoutScheme: "example.com",
		});
	});

	test("rejects differing schemes", () => {
		expect(() =>
			resolveUrls("http://example.com", "https://example.com/s", false),
		).toThrow("the schemes of both URLs must be the same ('http' and 'https')");
	});
});
