import type { OptionGraph, VariableOption } from "./options.js";

function variableJson(option: VariableOption): Record<string, unknown> {
	return { ...option, aliases: [...option.aliases] };
}

/**
 * Plain-data view of the graph: references to other options are replaced
 * by their names.
 */
export function graphToJson(graph: OptionGraph): Record<string, unknown> {
	return {
		settings: graph.settings,
		variables: graph.variables.map(variableJson),
		flags: graph.flags.map((flag) => ({ ...flag, target: flag.target.name })),
		aliases: graph.aliases.map((alias) => ({
			name: alias.name,
			namespace: alias.target.namespace,
			target: alias.target.option.name,
		})),
		collapses: graph.collapses.map((c) => ({
			variable: c.variable.name,
			branches: c.branches,
		})),
		mappings: graph.mappings.map((m) => ({ ...m, variable: m.variable.name })),
		inlines: graph.inlines.map((i) => ({ ...i, variable: i.variable.name })),
	};
}
