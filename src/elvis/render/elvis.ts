import type { OptionGraph } from "../model/options.js";
import { renderEnumChecks } from "./checks.js";
import { renderCollapses } from "./collapse.js";
import { renderCompletionHooks } from "./completions.js";
import { renderConfigHook } from "./config.js";
import { toCommentText } from "./escape.js";
import { renderUsageHook } from "./help.js";
import { renderListHelpers } from "./list-context.js";
import { renderParseHook } from "./parse-hook.js";
import { renderDispatch, renderInlines, renderMappings } from "./url.js";

export type GeneratorInfo = {
	name: string;
	version?: string;
};

export type RenderOptions = {
	/** Named in the generated header comment. */
	generator?: GeneratorInfo;
};

function renderHeader(graph: OptionGraph, generator: GeneratorInfo): string[] {
	const { settings } = graph;
	const tabs = "\t".repeat(settings.numTabs);
	const generatedBy = generator.version
		? `${generator.name} ${generator.version}`
		: generator.name;
	const lines = [
		`# elvis: ${settings.name}${tabs}-- ${toCommentText(settings.description)}`,
		`# Generated by ${generatedBy}`,
		". surfraw || exit 1",
		"",
		`base_url="${settings.baseUrl}"`,
	];
	if (settings.appendSearchArgs) {
		lines.push(`search_url="${settings.searchUrl}"`);
	}
	return lines;
}

/**
 * Render the elvis for a validated option graph. The output has no shebang;
 * writers add one. Rendering is deterministic: the same graph always gives
 * the same text.
 */
export function renderElvis(
	graph: OptionGraph,
	options: RenderOptions = {},
): string {
	const generator = options.generator ?? { name: "mkelvis" };
	const hasLists = graph.variables.some((v) => v.kind === "list");
	const hasCompletions =
		graph.settings.enableCompletions &&
		graph.variables.length + graph.flags.length > 0;

	const sections: string[][] = [
		renderHeader(graph, generator),
		renderUsageHook(graph),
		renderConfigHook(graph),
		hasLists ? renderListHelpers() : [],
		renderParseHook(graph),
		hasCompletions ? renderCompletionHooks(graph) : [],
		["w3_config", 'w3_parse_args "$@"'],
		renderEnumChecks(graph),
		renderCollapses(graph),
		renderMappings(graph),
		renderInlines(graph),
		renderDispatch(graph),
	];

	return `${sections
		.filter((section) => section.length > 0)
		.map((section) => section.join("\n"))
		.join("\n\n")}\n`;
}
