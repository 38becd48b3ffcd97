import { inBucketOrder } from "../model/buckets.js";
import type { OptionGraph, VariableOption } from "../model/options.js";
import { flagSpellings, variableSpellings } from "../model/spellings.js";
import { shellFunction } from "./shell.js";

function completable(option: VariableOption): readonly string[] | null {
	switch (option.kind) {
		case "bool":
			return ["yes", "no"];
		case "enum":
			return option.values;
		case "list":
			return option.values;
		default:
			return null;
	}
}

function argumentSpellings(option: VariableOption, name: string): string[] {
	return variableSpellings(option, name)
		.filter((s) => s.endsWith("="))
		.map((s) => s.slice(1, -1));
}

/**
 * Completion hooks: every option spelling for `mkopts`, and the candidate
 * values of bool and enum options.
 */
export function renderCompletionHooks(graph: OptionGraph): string[] {
	const variables = inBucketOrder(graph.variables, (v) => v.kind);
	const flags = inBucketOrder(graph.flags, (f) => f.target.kind);

	const spellings = [
		...variables.flatMap((v) =>
			[v.name, ...v.aliases].flatMap((n) => variableSpellings(v, n)),
		),
		...flags.flatMap((f) =>
			[f.name, ...f.aliases].flatMap((n) => flagSpellings(f, n)),
		),
	].map((s) => s.slice(1));

	const lines = shellFunction("w3_complete_hook_opt", [
		`mkopts ${spellings.join(" ")}`,
	]);

	const arms = variables.flatMap((v) => {
		const values = completable(v);
		if (!values) return [];
		const names = [v.name, ...v.aliases].flatMap((n) =>
			argumentSpellings(v, n),
		);
		return [`\t${names.join("|")}) printf '%s\\n' ${values.join(" ")} ;;`];
	});
	if (arms.length === 0) return lines;

	return [
		...lines,
		...shellFunction("w3_complete_hook_arg", ['case "$1" in', ...arms, "esac"]),
	];
}
