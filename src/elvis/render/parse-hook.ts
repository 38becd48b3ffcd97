import { inBucketOrder } from "../model/buckets.js";
import {
	type FlagOption,
	type OptionGraph,
	type VariableOption,
	variableName,
} from "../model/options.js";
import { shellQuote } from "./escape.js";
import { shellFunction } from "./shell.js";

function patterns(
	names: readonly string[],
	prefix: string,
	suffix: string,
): string {
	return names.map((n) => `-${prefix}${n}${suffix}`).join("|");
}

function variableArms(graph: OptionGraph, option: VariableOption): string[] {
	const names = [option.name, ...option.aliases];
	const name = variableName(graph, option);
	switch (option.kind) {
		case "bool":
			return [`${patterns(names, "", "=*")}) setoptyn ${name} "$optarg" ;;`];
		case "list":
			return [
				`${patterns(names, "add-", "=*")}) _sr_list_add ${name} "$optarg" ;;`,
				`${patterns(names, "clear-", "")}) ${name}='' ;;`,
				`${patterns(names, "remove-", "=*")}) _sr_list_remove ${name} "$optarg" ;;`,
			];
		default:
			return [`${patterns(names, "", "=*")}) setopt ${name} "$optarg" ;;`];
	}
}

function flagArms(graph: OptionGraph, flag: FlagOption): string[] {
	const names = [flag.name, ...flag.aliases];
	const name = variableName(graph, flag.target);
	switch (flag.target.kind) {
		case "bool":
			return [`${patterns(names, "", "")}) setoptyn ${name} ${flag.value} ;;`];
		case "list": {
			const values = shellQuote((flag.values ?? []).join(","));
			return [
				`${patterns(names, "add-", "")}) _sr_list_add ${name} ${values} ;;`,
				`${patterns(names, "remove-", "")}) _sr_list_remove ${name} ${values} ;;`,
			];
		}
		default:
			return [
				`${patterns(names, "", "")}) setopt ${name} ${shellQuote(flag.value)} ;;`,
			];
	}
}

/**
 * `w3_parse_option_hook`: variables first, then flags, each in bucket
 * order. Unknown options fall through to surfraw.
 */
export function renderParseHook(graph: OptionGraph): string[] {
	const arms = [
		...inBucketOrder(graph.variables, (v) => v.kind).flatMap((v) =>
			variableArms(graph, v),
		),
		...inBucketOrder(graph.flags, (f) => f.target.kind).flatMap((f) =>
			flagArms(graph, f),
		),
	];
	return shellFunction("w3_parse_option_hook", [
		'opt="$1"',
		'optarg="$2"',
		'case "$opt" in',
		...arms.map((arm) => `\t${arm}`),
		"\t*) return 1 ;;",
		"esac",
		"return 0",
	]);
}
