import { describe, expect, test } from "vitest";

import { CompilationError } from "../core/errors.js";
import { parseDirective } from "./parse.js";

function parseError(type: string, text: string): CompilationError {
	try {
		parseDirective({ type, text }, 0);
	} catch (error) {
		if (error instanceof CompilationError) return error;
		throw error;
	}
	throw new Error(`expected ${type}:${text} to fail`);
}

describe("parseDirective", () => {
	test("parses bool and its yes-no synonym", () => {
		expect(parseDirective({ type: "bool", text: "safe:yes" }, 0)).toEqual({
			kind: "bool",
			location: { index: 0, type: "bool" },
			name: "safe",
			defaultValue: true,
		});
		const synonym = parseDirective({ type: "yes-no", text: "safe:no" }, 4);
		expect(synonym).toMatchObject({
			kind: "bool",
			location: { index: 4, type: "yes-no" },
			defaultValue: false,
		});
	});

	test("rejects bool defaults other than yes and no", () => {
		const error = parseError("bool", "safe:true");
		expect(error.code).toBe("MalformedDirective");
		expect(error.message).toBe(
			"directive #1 (bool): expected 'yes' or 'no', got 'true'",
		);
	});

	test("parses enums", () => {
		expect(
			parseDirective({ type: "enum", text: "sort:date:date,relevance" }, 0),
		).toMatchObject({
			kind: "enum",
			name: "sort",
			defaultValue: "date",
			values: ["date", "relevance"],
		});
	});

	test("rejects duplicate and malformed enum values", () => {
		expect(parseError("enum", "sort:a:a,b,a").detail).toBe(
			"enum value 'a' is listed twice",
		);
		expect(parseError("enum", "sort:a:a,B").code).toBe("MalformedDirective");
		expect(parseError("enum", "sort:a:a,,b").code).toBe("MalformedDirective");
	});

	test("allows an empty anything default", () => {
		const site = parseDirective({ type: "anything", text: "site:" }, 0);
		expect(site).toMatchObject({
			kind: "anything",
			name: "site",
			defaultValue: "",
		});
	});

	test("parses lists, keeping empty items", () => {
		expect(
			parseDirective({ type: "list", text: "tags:enum:a,b:a,b,c" }, 0),
		).toMatchObject({
			kind: "list",
			elementType: "enum",
			defaults: ["a", "b"],
			values: ["a", "b", "c"],
		});
		expect(
			parseDirective({ type: "list", text: "words:anything:x,,y" }, 0),
		).toMatchObject({
			elementType: "anything",
			defaults: ["x", "", "y"],
			values: null,
		});
		expect(
			parseDirective({ type: "list", text: "words:anything:" }, 0),
		).toMatchObject({ defaults: [] });
	});

	test("requires values for enum lists only", () => {
		expect(parseError("list", "tags:enum:a").detail).toBe(
			"enum lists need a list of valid values",
		);
		expect(parseError("list", "tags:anything:a:a,b").detail).toBe(
			"only enum lists take a list of valid values",
		);
		expect(parseError("list", "tags:bool:a").code).toBe("MalformedDirective");
	});

	test("parses special options", () => {
		expect(parseDirective({ type: "special", text: "results" }, 0)).toEqual({
			kind: "special",
			location: { index: 0, type: "special" },
			specialKind: "results",
		});
		expect(parseError("special", "region").code).toBe("MalformedDirective");
	});

	test("parses flags and aliases", () => {
		expect(
			parseDirective({ type: "flag", text: "recent:sort:date" }, 0),
		).toMatchObject({
			kind: "flag",
			name: "recent",
			target: "sort",
			value: "date",
		});
		expect(
			parseDirective({ type: "alias", text: "s:safe:yes-no" }, 0),
		).toMatchObject({
			kind: "alias",
			name: "s",
			target: "safe",
			targetType: "bool",
		});
		expect(parseError("alias", "s:safe:string").code).toBe(
			"MalformedDirective",
		);
	});

	test("parses collapse groups with the last item as the result", () => {
		expect(
			parseDirective({ type: "collapse", text: "sort:a,b,X:c,Y" }, 0),
		).toMatchObject({
			kind: "collapse",
			variable: "sort",
			branches: [
				{ patterns: ["a", "b"], replacement: "X" },
				{ patterns: ["c"], replacement: "Y" },
			],
		});
	});

	test("rejects collapse groups without a pattern", () => {
		expect(parseError("collapse", "sort:X").code).toBe("MalformedDirective");
		expect(parseError("collapse", "sort").code).toBe("MalformedDirective");
	});

	test("drops repeated patterns inside one collapse group", () => {
		expect(
			parseDirective({ type: "collapse", text: "sort:a,a,b,X" }, 0),
		).toMatchObject({ branches: [{ patterns: ["a", "b"], replacement: "X" }] });
	});

	test("parses mappings with url encoding on by default", () => {
		expect(parseDirective({ type: "map", text: "sort:s" }, 0)).toMatchObject({
			kind: "map",
			variable: "sort",
			parameter: "s",
			urlEncode: true,
		});
		expect(
			parseDirective({ type: "list-map", text: "tags:tag:no" }, 0),
		).toMatchObject({ kind: "list-map", parameter: "tag", urlEncode: false });
		expect(parseError("map", "sort:").code).toBe("MalformedDirective");
	});

	test("parses inlines", () => {
		expect(
			parseDirective({ type: "inline", text: "site:site" }, 0),
		).toMatchObject({ kind: "inline", variable: "site", keyword: "site" });
		expect(parseError("list-inline", "types:").code).toBe("MalformedDirective");
	});

	test("upper-cases metavars", () => {
		expect(
			parseDirective({ type: "metavar", text: "sort:order" }, 0),
		).toMatchObject({ kind: "metavar", variable: "sort", metavar: "ORDER" });
		expect(parseError("metavar", "sort:Order").code).toBe("MalformedDirective");
	});

	test("keeps colons inside descriptions", () => {
		expect(
			parseDirective({ type: "describe", text: "sort:Order: newest first" }, 0),
		).toMatchObject({ variable: "sort", description: "Order: newest first" });
	});

	test("rejects extra fields", () => {
		const error = parseError("anything", "site:a:b");
		expect(error.code).toBe("MalformedDirective");
		expect(error.detail).toBe("expected NAME:DEFAULT, got 'site:a:b'");
	});

	test("rejects unknown directive types", () => {
		expect(parseError("number", "n:1").code).toBe("MalformedDirective");
	});

	test("rejects names outside lowercase letters", () => {
		expect(parseError("bool", "safe2:yes").code).toBe("MalformedDirective");
		expect(parseError("flag", "f:Sort:x").code).toBe("MalformedDirective");
	});

	test("rejects surfraw's global option names", () => {
		const error = parseError("bool", "help:no");
		expect(error.code).toBe("ReservedName");
		expect(error.detail).toBe(
			"'help' is a global surfraw option and cannot be redefined",
		);
	});
});
