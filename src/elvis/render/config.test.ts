import { describe, expect, test } from "vitest";

import { graphFrom } from "../testing.js";
import { renderConfigHook } from "./config.js";

describe("renderConfigHook", () => {
	test("declares defaults grouped by kind", () => {
		const graph = graphFrom([
			["special", "results"],
			["anything", "site:"],
			["list", "tags:enum:a,b:a,b,c"],
			["enum", "sort:date:date,relevance"],
			["bool", "safe:no"],
		]);
		expect(renderConfigHook(graph)).toEqual([
			"w3_config_hook ()",
			"{",
			"\t# bool options",
			"\tdefyn SURFRAW_ex_safe no",
			"\t# enum options",
			"\tdef SURFRAW_ex_sort 'date'",
			"\t# list options",
			"\tdef SURFRAW_ex_tags 'a,b'",
			"\t# anything options",
			"\tdef SURFRAW_ex_site ''",
			"\t# special options",
			'\tdef SURFRAW_ex_results "$SURFRAW_results"',
			"}",
		]);
	});

	test("leaves an example for empty groups", () => {
		const lines = renderConfigHook(graphFrom([["special", "language"]]));
		expect(lines).toContain(
			"\t# no bool options, e.g.: defyn SURFRAW_ex_VAR yes",
		);
		expect(lines).toContain('\tdef SURFRAW_ex_language "${SURFRAW_lang:=en}"');
		expect(lines).not.toContain("\t:");
	});
});
