import { CompilationError, type DirectiveLocation } from "../core/errors.js";

const NAME_PATTERN = /^[a-z]+$/;
const ENUM_VALUE_PATTERN = /^[a-z0-9][a-z0-9_+-]*$/;

/** Options surfraw itself understands; an elvis may not redefine them. */
export const RESERVED_NAMES: ReadonlySet<string> = new Set([
	"browser",
	"elvi",
	"g",
	"graphical",
	"h",
	"help",
	"lh",
	"p",
	"print",
	"o",
	"new",
	"ns",
	"newscreen",
	"t",
	"text",
	"q",
	"quote",
	"version",
	"bookmark-search-elvis",
	"custom-search",
	"escape-url-args",
	"local-help",
]);

export function checkName(name: string, location: DirectiveLocation): string {
	checkReference(name, location);
	if (RESERVED_NAMES.has(name)) {
		throw new CompilationError(
			"ReservedName",
			`'${name}' is a global surfraw option and cannot be redefined`,
			location,
		);
	}
	return name;
}

/** Syntax check for names that point at another option. */
export function checkReference(
	name: string,
	location: DirectiveLocation,
): string {
	if (!NAME_PATTERN.test(name)) {
		throw new CompilationError(
			"MalformedDirective",
			`option names must be lowercase letters only, got '${name}'`,
			location,
		);
	}
	return name;
}

export function parseYesNo(
	value: string,
	location: DirectiveLocation,
): boolean {
	if (value === "yes") return true;
	if (value === "no") return false;
	throw new CompilationError(
		"MalformedDirective",
		`expected 'yes' or 'no', got '${value}'`,
		location,
	);
}

export function isEnumValue(value: string): boolean {
	return ENUM_VALUE_PATTERN.test(value);
}

export function checkEnumValues(
	values: string[],
	location: DirectiveLocation,
): string[] {
	if (values.length === 0) {
		throw new CompilationError(
			"MalformedDirective",
			"an enum needs at least one value",
			location,
		);
	}
	const seen = new Set<string>();
	for (const value of values) {
		if (!isEnumValue(value)) {
			throw new CompilationError(
				"MalformedDirective",
				`enum values must match [a-z0-9][a-z0-9_+-]*, got '${value}'`,
				location,
			);
		}
		if (seen.has(value)) {
			throw new CompilationError(
				"MalformedDirective",
				`enum value '${value}' is listed twice`,
				location,
			);
		}
		seen.add(value);
	}
	return values;
}

export function checkMetavar(
	value: string,
	location: DirectiveLocation,
): string {
	if (!NAME_PATTERN.test(value)) {
		throw new CompilationError(
			"MalformedDirective",
			`metavars must be lowercase letters only, got '${value}'`,
			location,
		);
	}
	return value.toUpperCase();
}
