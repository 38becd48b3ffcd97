import { describe, expect, test } from "vitest";

import { graphFrom } from "../testing.js";
import { renderParseHook } from "./parse-hook.js";

describe("renderParseHook", () => {
	test("renders variables then flags, each in bucket order", () => {
		const graph = graphFrom([
			["special", "results"],
			["anything", "site:"],
			["list", "tags:enum:a:a,b,c"],
			["enum", "sort:date:date,relevance"],
			["bool", "safe:yes"],
			["alias", "s:safe:bool"],
			["flag", "recent:sort:date"],
			["flag", "nsfw:safe:no"],
			["flag", "ab:tags:a,b"],
		]);
		expect(renderParseHook(graph)).toEqual([
			"w3_parse_option_hook ()",
			"{",
			'\topt="$1"',
			'\toptarg="$2"',
			'\tcase "$opt" in',
			'\t\t-safe=*|-s=*) setoptyn SURFRAW_ex_safe "$optarg" ;;',
			'\t\t-sort=*) setopt SURFRAW_ex_sort "$optarg" ;;',
			'\t\t-add-tags=*) _sr_list_add SURFRAW_ex_tags "$optarg" ;;',
			"\t\t-clear-tags) SURFRAW_ex_tags='' ;;",
			'\t\t-remove-tags=*) _sr_list_remove SURFRAW_ex_tags "$optarg" ;;',
			'\t\t-site=*) setopt SURFRAW_ex_site "$optarg" ;;',
			'\t\t-results=*) setopt SURFRAW_ex_results "$optarg" ;;',
			"\t\t-nsfw) setoptyn SURFRAW_ex_safe no ;;",
			"\t\t-recent) setopt SURFRAW_ex_sort 'date' ;;",
			"\t\t-add-ab) _sr_list_add SURFRAW_ex_tags 'a,b' ;;",
			"\t\t-remove-ab) _sr_list_remove SURFRAW_ex_tags 'a,b' ;;",
			"\t\t*) return 1 ;;",
			"\tesac",
			"\treturn 0",
			"}",
		]);
	});

	test("quotes flag values for the shell", () => {
		const graph = graphFrom([
			["anything", "site:"],
			["flag", "mine:site:it's mine"],
		]);
		expect(renderParseHook(graph)).toContain(
			"\t\t-mine) setopt SURFRAW_ex_site 'it'\\''s mine' ;;",
		);
	});

	test("includes flag aliases in the pattern", () => {
		const graph = graphFrom([
			["enum", "sort:date:date,relevance"],
			["flag", "recent:sort:date"],
			["alias", "r:recent:flag"],
		]);
		expect(renderParseHook(graph)).toContain(
			"\t\t-recent|-r) setopt SURFRAW_ex_sort 'date' ;;",
		);
	});
});
