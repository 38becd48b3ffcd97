import type { OptionGraph, VariableOption } from "./model/options.js";
import { formatInlineToken, percentEncode } from "./render/escape.js";

export type PreviewInput = {
	/** Search words, joined with spaces as surfraw does. */
	terms?: readonly string[];
	/** Option values by option name, as the user would pass them. */
	values?: Readonly<Record<string, string>>;
	/** Values of the global surfraw variables read by special options. */
	env?: { results?: string; language?: string };
};

/** An option value the generated elvis would reject with `err`. */
export class PreviewError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "PreviewError";
	}
}

function initialValue(
	option: VariableOption,
	env: PreviewInput["env"],
): string {
	switch (option.kind) {
		case "bool":
			return option.defaultValue ? "yes" : "no";
		case "enum":
		case "anything":
			return option.defaultValue;
		case "list":
			return option.defaults.join(",");
		case "special":
			return option.specialKind === "results"
				? (env?.results ?? "")
				: env?.language || "en";
	}
}

/**
 * Items of a list value as the shell's `for` loop sees them with `IFS=,`:
 * an empty value has none, and a trailing separator adds no empty item.
 */
export function listItems(value: string): string[] {
	if (value === "") return [];
	const items = value.split(",");
	if (items[items.length - 1] === "") items.pop();
	return items;
}

/** Join as `${acc:+${acc},}${item}` does. */
function appendItem(acc: string, item: string, separator: string): string {
	return acc ? `${acc}${separator}${item}` : item;
}

/**
 * Compute the URL the generated elvis opens for the given search terms and
 * option values, following the same steps: enum checks, collapses, mapped
 * parameters, inlines and dispatch. `w3_url_escape` is taken to be
 * `percentEncode`; a collapse replacement may refer to the value as `$1`.
 */
export function previewSearchUrl(
	graph: OptionGraph,
	input: PreviewInput = {},
): string {
	const { settings } = graph;
	const values = new Map<string, string>();
	for (const option of graph.variables) {
		values.set(option.name, initialValue(option, input.env));
	}
	for (const [name, value] of Object.entries(input.values ?? {})) {
		if (!values.has(name)) throw new PreviewError(`unknown option '${name}'`);
		values.set(name, value);
	}
	const valueOf = (option: VariableOption) => values.get(option.name) ?? "";

	for (const option of graph.variables) {
		if (option.kind === "enum" && !option.values.includes(valueOf(option))) {
			throw new PreviewError(
				`invalid value '${valueOf(option)}' for -${option.name} (expected one of: ${option.values.join(", ")})`,
			);
		}
		if (option.kind === "list" && option.values) {
			const allowed = option.values;
			const invalid = listItems(valueOf(option)).find(
				(item) => !allowed.includes(item),
			);
			if (invalid !== undefined) {
				throw new PreviewError(
					`invalid value '${invalid}' for -add-${option.name} (expected any of: ${allowed.join(", ")})`,
				);
			}
		}
	}

	for (const collapse of graph.collapses) {
		const apply = (value: string) => {
			const branch = collapse.branches.find((b) => b.patterns.includes(value));
			return branch
				? branch.replacement.replace(/\$\{1\}|\$1/g, () => value)
				: value;
		};
		const current = valueOf(collapse.variable);
		values.set(
			collapse.variable.name,
			collapse.variable.kind === "list"
				? listItems(current).reduce(
						(acc, item) => appendItem(acc, apply(item), ","),
						"",
					)
				: apply(current),
		);
	}

	const encode = (value: string, urlEncode: boolean) =>
		urlEncode ? percentEncode(value) : value;
	const pairs = [
		...graph.mappings
			.filter((m) => m.traversal === "scalar")
			.map((m) => {
				const value = encode(valueOf(m.variable), m.urlEncode);
				return [`${percentEncode(m.parameter)}=${value}`];
			}),
		...graph.mappings
			.filter((m) => m.traversal === "list")
			.map((m) => {
				const key = percentEncode(m.parameter);
				const items = listItems(valueOf(m.variable));
				return items.length === 0
					? [`${key}=`]
					: items.map((item) => `${key}=${encode(item, m.urlEncode)}`);
			}),
	].flat();
	const params = pairs.reduce((acc, pair) => appendItem(acc, pair, "&"), "");

	let inlines = "";
	for (const inline of graph.inlines) {
		const value = valueOf(inline.variable);
		const items = inline.traversal === "list" ? listItems(value) : [value];
		for (const item of items) {
			const token = formatInlineToken(inline.keyword, item);
			if (token !== null) inlines += ` ${token}`;
		}
	}

	const args = (input.terms ?? []).join(" ");
	if (args === "") return settings.baseUrl;
	const escaped = percentEncode(`${args}${inlines}`);

	if (!settings.appendSearchArgs) {
		const url = settings.searchUrl.replace(/\$\{escaped_args\}/g, escaped);
		return `${url}${params}`;
	}
	if (settings.queryParameter !== null) {
		const key = percentEncode(settings.queryParameter);
		const query = `${settings.searchUrl}${key}=${escaped}`;
		return graph.mappings.length > 0 ? `${query}&${params}` : query;
	}
	return `${settings.searchUrl}${escaped}`;
}
