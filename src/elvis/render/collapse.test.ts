import { describe, expect, test } from "vitest";

import { graphFrom } from "../testing.js";
import { renderCollapses } from "./collapse.js";

describe("renderCollapses", () => {
	test("keeps branch order so the first match wins", () => {
		const graph = graphFrom([
			["enum", "sort:date:date,relevance"],
			["collapse", "sort:a,b,X:a,Y"],
		]);
		expect(renderCollapses(graph)).toEqual([
			"_sr_collapse_sort_1 ()",
			"{",
			'\tcase "$1" in',
			"\t\ta|b) printf '%s\\n' \"X\" ;;",
			"\t\ta) printf '%s\\n' \"Y\" ;;",
			"\t\t*) printf '%s\\n' \"$1\" ;;",
			"\tesac",
			"}",
			'SURFRAW_ex_sort="$(_sr_collapse_sort_1 "$SURFRAW_ex_sort")"',
		]);
	});

	test("escapes patterns", () => {
		const graph = graphFrom([
			["anything", "site:"],
			["collapse", "site:*,a b,all"],
		]);
		expect(renderCollapses(graph)[3]).toBe(
			"\t\t\\*|a\\ b) printf '%s\\n' \"all\" ;;",
		);
	});

	test("writes replacements literally apart from $1", () => {
		const graph = graphFrom([
			["anything", "v:"],
			["collapse", 'v:x,say "hi" to $1'],
		]);
		expect(renderCollapses(graph)[3]).toBe(
			"\t\tx) printf '%s\\n' \"say \\\"hi\\\" to $1\" ;;",
		);
	});

	test("collapses list variables item by item", () => {
		const graph = graphFrom([
			["list", "tags:anything:"],
			["collapse", "tags:x,y"],
		]);
		expect(renderCollapses(graph).slice(6)).toEqual([
			"}",
			"_sr_collapsed=''",
			"_sr_begin_list_ctx",
			"for _sr_item in $SURFRAW_ex_tags; do",
			'\t_sr_item="$(_sr_collapse_tags_1 "$_sr_item")"',
			'\t_sr_collapsed="${_sr_collapsed:+${_sr_collapsed},}${_sr_item}"',
			"done",
			"_sr_end_list_ctx",
			'SURFRAW_ex_tags="$_sr_collapsed"',
		]);
	});
});
