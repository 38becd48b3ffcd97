import type { FlagOption, VariableOption } from "./options.js";

/**
 * Option spellings as they appear in the parse hook's case patterns, with a
 * trailing `=` where the option takes an argument.
 */
export function variableSpellings(
	option: VariableOption,
	name: string = option.name,
): string[] {
	if (option.kind === "list") {
		return [`-add-${name}=`, `-clear-${name}`, `-remove-${name}=`];
	}
	return [`-${name}=`];
}

export function flagSpellings(
	flag: FlagOption,
	name: string = flag.name,
): string[] {
	if (flag.target.kind === "list") {
		return [`-add-${name}`, `-remove-${name}`];
	}
	return [`-${name}`];
}
