import { CompilationError, type DirectiveLocation } from "../core/errors.js";

/**
 * Split directive text on `:` and check the field count. There is no escape
 * character, so a delimiter can never appear inside a field.
 */
export function splitFields(
	text: string,
	arity: { min: number; max: number },
	usage: string,
	location: DirectiveLocation,
): string[] {
	const fields = text.split(":");
	if (fields.length < arity.min || fields.length > arity.max) {
		throw new CompilationError(
			"MalformedDirective",
			`expected ${usage}, got '${text}'`,
			location,
		);
	}
	return fields;
}

/**
 * Split text on the first `:` only; the remainder is kept whole.
 */
export function splitHead(
	text: string,
	usage: string,
	location: DirectiveLocation,
): [string, string] {
	const at = text.indexOf(":");
	if (at < 0) {
		throw new CompilationError(
			"MalformedDirective",
			`expected ${usage}, got '${text}'`,
			location,
		);
	}
	return [text.slice(0, at), text.slice(at + 1)];
}

/**
 * Comma list. An empty field is the empty list; any other empty item is kept.
 */
export function splitList(field: string): string[] {
	if (field === "") return [];
	return field.split(",");
}
