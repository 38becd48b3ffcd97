import { type OptionGraph, variableName } from "../model/options.js";
import { percentEncode, shellQuote } from "./escape.js";
import { forEachListItem, shellFunction } from "./shell.js";

function encoded(reference: string, urlEncode: boolean): string {
	return urlEncode ? `$(w3_url_escape "${reference}")` : reference;
}

/**
 * Build `_sr_params` from the mappings: scalar mappings first, then list
 * mappings, one `KEY=VALUE` per item. An empty list still contributes
 * `KEY=`.
 */
export function renderMappings(graph: OptionGraph): string[] {
	const scalars = graph.mappings.filter((m) => m.traversal === "scalar");
	const lists = graph.mappings.filter((m) => m.traversal === "list");
	if (graph.mappings.length === 0) return [];

	const lines = scalars.map((mapping, index) => {
		const key = percentEncode(mapping.parameter);
		const value = encoded(
			`$${variableName(graph, mapping.variable)}`,
			mapping.urlEncode,
		);
		return index === 0
			? `_sr_params="${key}=${value}"`
			: `_sr_params="\${_sr_params}&${key}=${value}"`;
	});
	if (lines.length === 0) lines.push("_sr_params=''");
	if (lists.length === 0) return lines;

	lines.push(
		...shellFunction("_sr_append_param", [
			'_sr_params="${_sr_params:+${_sr_params}&}$1=$2"',
		]),
	);
	for (const mapping of lists) {
		const key = shellQuote(percentEncode(mapping.parameter));
		const variable = variableName(graph, mapping.variable);
		lines.push(
			`if [ -z "$${variable}" ]; then`,
			`\t_sr_append_param ${key} ''`,
			"else",
			...forEachListItem(variable, [
				`_sr_append_param ${key} "${encoded("$_sr_item", mapping.urlEncode)}"`,
			]).map((line) => `\t${line}`),
			"fi",
		);
	}
	return lines;
}

/** Collect inline tokens such as ` site:example.org` in `_sr_inlines`. */
export function renderInlines(graph: OptionGraph): string[] {
	if (graph.inlines.length === 0) return [];
	const lines = [
		"_sr_inlines=''",
		...shellFunction("_sr_inline", [
			'case "$2" in',
			"\t'') ;;",
			'\t*[[:space:]]*) _sr_inlines="${_sr_inlines} $1:\\"$2\\"" ;;',
			'\t*) _sr_inlines="${_sr_inlines} $1:$2" ;;',
			"esac",
		]),
	];
	for (const inline of graph.inlines) {
		const keyword = shellQuote(inline.keyword);
		const variable = variableName(graph, inline.variable);
		if (inline.traversal === "list") {
			lines.push(
				...forEachListItem(variable, [`_sr_inline ${keyword} "$_sr_item"`]),
			);
		} else {
			lines.push(`_sr_inline ${keyword} "$${variable}"`);
		}
	}
	return lines;
}

/** Open the base URL without search terms, the search URL otherwise. */
export function renderDispatch(graph: OptionGraph): string[] {
	const { settings } = graph;
	const args =
		graph.inlines.length > 0 ? "${w3_args}${_sr_inlines}" : "$w3_args";
	const params = graph.mappings.length > 0 ? "${_sr_params}" : "";

	let search: string[];
	if (!settings.appendSearchArgs) {
		search = [
			`search_url="${settings.searchUrl}"`,
			params
				? `w3_browse_url "\${search_url}${params}"`
				: 'w3_browse_url "$search_url"',
		];
	} else if (settings.queryParameter !== null) {
		const key = percentEncode(settings.queryParameter);
		const query = `\${search_url}${key}=\${escaped_args}`;
		search = [`w3_browse_url "${query}${params ? `&${params}` : ""}"`];
	} else {
		search = ['w3_browse_url "${search_url}${escaped_args}"'];
	}

	return [
		'if [ -z "$w3_args" ]; then',
		'\tw3_browse_url "$base_url"',
		"else",
		`\tescaped_args="$(w3_url_of_arg "${args}")"`,
		...search.map((line) => `\t${line}`),
		"fi",
	];
}
