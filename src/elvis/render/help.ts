import { inBucketOrder } from "../model/buckets.js";
import type {
	FlagOption,
	OptionGraph,
	VariableOption,
} from "../model/options.js";
import { variableName } from "../model/options.js";
import { escapeHeredoc, toCommentText } from "./escape.js";

type HelpEntry = {
	/** Option spellings and, for enums, their values. */
	left: string[];
	/** Description first, then details. Already escaped for the heredoc. */
	right: string[];
};

const FIRST_GAP = "    ";
const NEXT_GAP = "  | ";

/** One heredoc line: folded, so no line of the text can end the heredoc. */
function helpText(text: string): string {
	return escapeHeredoc(toCommentText(text));
}

function sortedNames(option: {
	name: string;
	aliases: readonly string[];
}): string[] {
	return [option.name, ...option.aliases].sort();
}

function environmentOf(graph: OptionGraph, option: VariableOption): string {
	const own = variableName(graph, option);
	if (option.kind !== "special") return own;
	return option.specialKind === "results"
		? `${own}, SURFRAW_results`
		: `${own}, SURFRAW_lang`;
}

function valueLines(header: string, values: readonly string[]): string[] {
	const column = header.lastIndexOf("=") + 1;
	return values.map((value) => `${" ".repeat(column)}${value}`);
}

function variableEntry(graph: OptionGraph, option: VariableOption): HelpEntry {
	const names = sortedNames(option);
	const right = [
		helpText(option.description),
		`Default: $${variableName(graph, option)}`,
		`Environment: ${environmentOf(graph, option)}`,
	];

	if (option.kind === "list") {
		const spell = (prefix: string, withMetavar: boolean) =>
			`  ${names
				.map((n) => `-${prefix}${n}${withMetavar ? `=${option.metavar}` : ""}`)
				.join(", ")}`;
		const add = spell("add-", true);
		const left = [add, spell("clear-", false), spell("remove-", true)];
		if (option.values) left.push(...valueLines(add, option.values));
		return { left, right };
	}

	const header = `  ${names.map((n) => `-${n}=${option.metavar}`).join(", ")}`;
	const left = [header];
	if (option.kind === "enum") left.push(...valueLines(header, option.values));
	return { left, right };
}

function flagEntry(flag: FlagOption): HelpEntry {
	const names = sortedNames(flag);
	const spell = (prefix: string) =>
		`  ${names.map((n) => `-${prefix}${n}`).join(", ")}`;
	const left =
		flag.target.kind === "list"
			? [spell("add-"), spell("remove-")]
			: [spell("")];
	return { left, right: [helpText(flag.description)] };
}

/**
 * The "Local options" block of the usage text. Spellings sit in a left
 * column padded to a common width; descriptions and details follow on the
 * right, continuation rows marked with `|`.
 */
export function renderLocalHelp(graph: OptionGraph): string[] {
	const entries = [
		...inBucketOrder(graph.variables, (v) => v.kind).map((v) =>
			variableEntry(graph, v),
		),
		...inBucketOrder(graph.flags, (f) => f.target.kind).map(flagEntry),
	];

	const width = Math.max(
		0,
		...entries.flatMap((e) => e.left.map((l) => l.length)),
	);

	return entries.flatMap(({ left, right }) => {
		const rows = Math.max(left.length, right.length);
		return Array.from({ length: rows }, (_, row) => {
			const cell = (left[row] ?? "").padEnd(width);
			const gap = row === 0 ? FIRST_GAP : NEXT_GAP;
			return `${cell}${gap}${right[row] ?? ""}`.trimEnd();
		});
	});
}

export function renderUsageHook(graph: OptionGraph): string[] {
	const help = renderLocalHelp(graph);
	return [
		"w3_usage_hook ()",
		"{",
		"\tcat <<EOF",
		"Usage: $w3_argv0 [options] [search words]...",
		"Description:",
		`  ${helpText(graph.settings.description)}`,
		...(help.length > 0 ? ["Local options:", ...help] : []),
		"EOF",
		"\tw3_global_usage",
		"}",
	];
}
