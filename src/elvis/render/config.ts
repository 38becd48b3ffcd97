import {
	type Bucket,
	BUCKET_ORDER,
	partitionByBucket,
} from "../model/buckets.js";
import {
	type OptionGraph,
	type VariableOption,
	variableName,
} from "../model/options.js";
import { shellQuote } from "./escape.js";
import { shellFunction } from "./shell.js";

function defaultLine(graph: OptionGraph, option: VariableOption): string {
	const name = variableName(graph, option);
	switch (option.kind) {
		case "bool":
			return `defyn ${name} ${option.defaultValue ? "yes" : "no"}`;
		case "enum":
		case "anything":
			return `def ${name} ${shellQuote(option.defaultValue)}`;
		case "list":
			return `def ${name} ${shellQuote(option.defaults.join(","))}`;
		case "special":
			return `def ${name} "${option.defaultValue}"`;
	}
}

function exampleLine(graph: OptionGraph, bucket: Bucket): string {
	const prefix = `SURFRAW_${graph.settings.name}`;
	switch (bucket) {
		case "bool":
			return `defyn ${prefix}_VAR yes`;
		case "list":
			return `def ${prefix}_VAR 'one,two'`;
		case "special":
			return `def ${prefix}_results "$SURFRAW_results"`;
		default:
			return `def ${prefix}_VAR 'value'`;
	}
}

/** `w3_config_hook`: one `def`/`defyn` per variable, grouped by option kind. */
export function renderConfigHook(graph: OptionGraph): string[] {
	const buckets = partitionByBucket(graph.variables, (v) => v.kind);
	const body = BUCKET_ORDER.flatMap((bucket) => {
		const options = buckets[bucket];
		if (options.length === 0) {
			return [`# no ${bucket} options, e.g.: ${exampleLine(graph, bucket)}`];
		}
		return [
			`# ${bucket} options`,
			...options.map((o) => defaultLine(graph, o)),
		];
	});
	if (graph.variables.length === 0) body.push(":");
	return shellFunction("w3_config_hook", body);
}
