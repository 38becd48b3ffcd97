import { buildOptionGraph } from "./model/builder.js";
import type { ElvisSettings, OptionGraph } from "./model/options.js";
import { parseDirectives } from "./parse/parse.js";

export const exampleSettings: ElvisSettings = {
	name: "ex",
	baseUrl: "example.com",
	searchUrl: "example.com/search",
	queryParameter: "q",
};

/** Build a graph from `[type, text]` pairs, for tests. */
export function graphFrom(
	directives: [string, string][],
	settings: Partial<ElvisSettings> = {},
): OptionGraph {
	return buildOptionGraph(
		{ ...exampleSettings, ...settings },
		parseDirectives(directives.map(([type, text]) => ({ type, text }))),
	);
}
