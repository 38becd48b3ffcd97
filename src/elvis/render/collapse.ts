import {
	type Collapse,
	type OptionGraph,
	variableName,
} from "../model/options.js";
import { escapePattern, escapeReplacement } from "./escape.js";
import { forEachListItem, shellFunction } from "./shell.js";

/**
 * One function per collapse, taking the value as `$1` and printing the
 * replacement of the first matching branch, or the value unchanged. A
 * replacement is literal apart from `$1`.
 */
function collapseFunction(name: string, collapse: Collapse): string[] {
	const arms = collapse.branches.map((branch) => {
		const patterns = branch.patterns.map(escapePattern).join("|");
		const replacement = escapeReplacement(branch.replacement);
		return `\t${patterns}) printf '%s\\n' "${replacement}" ;;`;
	});
	return shellFunction(name, [
		'case "$1" in',
		...arms,
		`\t*) printf '%s\\n' "$1" ;;`,
		"esac",
	]);
}

export function renderCollapses(graph: OptionGraph): string[] {
	return graph.collapses.flatMap((collapse, index) => {
		const variable = variableName(graph, collapse.variable);
		const fn = `_sr_collapse_${collapse.variable.name}_${index + 1}`;
		const apply =
			collapse.variable.kind === "list"
				? [
						"_sr_collapsed=''",
						...forEachListItem(variable, [
							`_sr_item="$(${fn} "$_sr_item")"`,
							'_sr_collapsed="${_sr_collapsed:+${_sr_collapsed},}${_sr_item}"',
						]),
						`${variable}="$_sr_collapsed"`,
					]
				: [`${variable}="$(${fn} "$${variable}")"`];
		return [...collapseFunction(fn, collapse), ...apply];
	});
}
