import type { DirectiveLocation } from "../core/errors.js";

export const DIRECTIVE_TYPES = [
	"bool",
	"yes-no",
	"enum",
	"anything",
	"list",
	"special",
	"flag",
	"alias",
	"collapse",
	"map",
	"list-map",
	"inline",
	"list-inline",
	"metavar",
	"describe",
] as const;

export type DirectiveType = (typeof DIRECTIVE_TYPES)[number];

/**
 * One directive as a user (or a discovery tool) writes it: a type tag and
 * the colon/comma-delimited text that follows it.
 */
export type RawDirective = {
	type: string;
	text: string;
};

export type SpecialKind = "results" | "language";
export type ListElementType = "enum" | "anything";

/**
 * What an alias names explicitly, so that equal names in both namespaces stay
 * unambiguous.
 */
export type AliasTargetType =
	| "bool"
	| "enum"
	| "anything"
	| "special"
	| "list"
	| "flag"
	| "alias";

type Located = { location: DirectiveLocation };

export type BoolDirective = Located & {
	kind: "bool";
	name: string;
	defaultValue: boolean;
};

export type EnumDirective = Located & {
	kind: "enum";
	name: string;
	defaultValue: string;
	values: string[];
};

export type AnythingDirective = Located & {
	kind: "anything";
	name: string;
	defaultValue: string;
};

export type ListDirective = Located & {
	kind: "list";
	name: string;
	elementType: ListElementType;
	defaults: string[];
	/** Present exactly when `elementType` is "enum". */
	values: string[] | null;
};

export type SpecialDirective = Located & {
	kind: "special";
	specialKind: SpecialKind;
};

export type FlagDirective = Located & {
	kind: "flag";
	name: string;
	target: string;
	/** Raw value; list targets split it on commas. */
	value: string;
};

export type AliasDirective = Located & {
	kind: "alias";
	name: string;
	target: string;
	targetType: AliasTargetType;
};

export type CollapseBranch = {
	patterns: string[];
	replacement: string;
};

export type CollapseDirective = Located & {
	kind: "collapse";
	variable: string;
	branches: CollapseBranch[];
};

export type MappingDirective = Located & {
	kind: "map" | "list-map";
	variable: string;
	parameter: string;
	urlEncode: boolean;
};

export type InlineDirective = Located & {
	kind: "inline" | "list-inline";
	variable: string;
	keyword: string;
};

export type MetavarDirective = Located & {
	kind: "metavar";
	variable: string;
	metavar: string;
};

export type DescribeDirective = Located & {
	kind: "describe";
	variable: string;
	description: string;
};

export type VariableDirective =
	| BoolDirective
	| EnumDirective
	| AnythingDirective
	| ListDirective
	| SpecialDirective;

export type Directive =
	| VariableDirective
	| FlagDirective
	| AliasDirective
	| CollapseDirective
	| MappingDirective
	| InlineDirective
	| MetavarDirective
	| DescribeDirective;

export function isDirectiveType(type: string): type is DirectiveType {
	return DIRECTIVE_TYPES.some((t) => t === type);
}
