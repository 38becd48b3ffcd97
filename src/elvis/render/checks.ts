import { type OptionGraph, variableName } from "../model/options.js";
import { escapePattern } from "./escape.js";
import { forEachListItem } from "./shell.js";

function membershipCase(
	subject: string,
	values: readonly string[],
	message: string,
): string[] {
	return [
		`case "${subject}" in`,
		`\t${values.map(escapePattern).join("|")}) ;;`,
		`\t*) err "${message}" ;;`,
		"esac",
	];
}

/** Reject enum values the user passed that are not among the declared ones. */
export function renderEnumChecks(graph: OptionGraph): string[] {
	return graph.variables.flatMap((option) => {
		const name = variableName(graph, option);
		if (option.kind === "enum") {
			return membershipCase(
				`$${name}`,
				option.values,
				`invalid value '$${name}' for -${option.name} (expected one of: ${option.values.join(", ")})`,
			);
		}
		if (option.kind === "list" && option.values) {
			return forEachListItem(
				name,
				membershipCase(
					"$_sr_item",
					option.values,
					`invalid value '$_sr_item' for -add-${option.name} (expected any of: ${option.values.join(", ")})`,
				),
			);
		}
		return [];
	});
}
