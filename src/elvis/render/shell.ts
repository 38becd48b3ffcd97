export function indent(lines: readonly string[], depth = 1): string[] {
	const prefix = "\t".repeat(depth);
	return lines.map((line) => (line === "" ? line : `${prefix}${line}`));
}

export function shellFunction(name: string, body: readonly string[]): string[] {
	return [`${name} ()`, "{", ...indent(body.length > 0 ? body : [":"]), "}"];
}

/**
 * Loop over the comma-separated items of a list variable as `_sr_item`.
 * This is the only place list traversals are written, so every
 * `_sr_begin_list_ctx` is paired with an `_sr_end_list_ctx`.
 */
export function forEachListItem(
	variable: string,
	body: readonly string[],
): string[] {
	return [
		"_sr_begin_list_ctx",
		`for _sr_item in $${variable}; do`,
		...indent(body),
		"done",
		"_sr_end_list_ctx",
	];
}
