import { forEachListItem, shellFunction } from "./shell.js";

/**
 * Runtime helpers for list options. Entering a list context switches the
 * field separator to `,` and turns off filename expansion; leaving restores
 * both. Contexts do not nest.
 */
export function renderListHelpers(): string[] {
	return [
		"_sr_list_ctx=no",
		...shellFunction("_sr_begin_list_ctx", [
			'if [ "$_sr_list_ctx" = yes ]; then',
			'\terr "internal error: list context entered twice"',
			"fi",
			"_sr_list_ctx=yes",
			'_sr_saved_ifs="$IFS"',
			'case "$-" in',
			"\t*f*) _sr_saved_noglob=yes ;;",
			"\t*) _sr_saved_noglob=no ;;",
			"esac",
			"IFS=','",
			"set -f",
		]),
		...shellFunction("_sr_end_list_ctx", [
			'if [ "$_sr_list_ctx" != yes ]; then',
			'\terr "internal error: list context left without being entered"',
			"fi",
			'IFS="$_sr_saved_ifs"',
			'if [ "$_sr_saved_noglob" = no ]; then',
			"\tset +f",
			"fi",
			"_sr_list_ctx=no",
		]),
		...shellFunction("_sr_list_add", [
			'if [ -n "$2" ]; then',
			'\teval "_sr_current=\\"\\${$1}\\""',
			'\teval "$1=\\"\\${_sr_current:+\\${_sr_current},}\\$2\\""',
			"fi",
		]),
		...shellFunction("_sr_list_remove", [
			'eval "_sr_current=\\"\\${$1}\\""',
			"_sr_kept=''",
			...forEachListItem("_sr_current", [
				"_sr_keep=yes",
				"for _sr_pattern in $2; do",
				'\tif [ -n "$_sr_pattern" ] && [ "$_sr_item" = "$_sr_pattern" ]; then',
				"\t\t_sr_keep=no",
				"\tfi",
				"done",
				'if [ "$_sr_keep" = yes ]; then',
				'\t_sr_kept="${_sr_kept:+${_sr_kept},}${_sr_item}"',
				"fi",
			]),
			'eval "$1=\\"\\$_sr_kept\\""',
		]),
	];
}
