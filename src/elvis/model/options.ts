import type {
	CollapseBranch,
	ListElementType,
	SpecialKind,
} from "../parse/directives.js";

// ----------------------------------------------------------------------------
// Settings
// ----------------------------------------------------------------------------

export type ElvisSettings = {
	/** Elvis name; also the namespace of its shell variables. */
	name: string;
	baseUrl: string;
	searchUrl: string;
	description?: string;
	/** URL key that carries the search terms. */
	queryParameter?: string;
	/**
	 * `false` leaves the placement of the search terms to the search URL
	 * itself, through `${escaped_args}`. Mapped parameters are then appended
	 * to it as they are, so it must end in its own `?` or `&`.
	 */
	appendSearchArgs?: boolean;
	/** Use http instead of https when neither URL names a scheme. */
	insecure?: boolean;
	enableCompletions?: boolean;
	/** Tabs between the name and the description in the `# elvis:` line. */
	numTabs?: number;
};

export type ResolvedSettings = {
	readonly name: string;
	readonly baseUrl: string;
	readonly searchUrl: string;
	/** Full description, ending in the base URL without its scheme. */
	readonly description: string;
	readonly queryParameter: string | null;
	readonly appendSearchArgs: boolean;
	readonly enableCompletions: boolean;
	readonly numTabs: number;
};

// ----------------------------------------------------------------------------
// Options
// ----------------------------------------------------------------------------

type OptionBase = {
	readonly name: string;
	readonly description: string;
	/** Names of the aliases pointing at this option, in declaration order. */
	readonly aliases: readonly string[];
};

type VariableBase = OptionBase & {
	readonly metavar: string;
};

export type BoolOption = VariableBase & {
	readonly kind: "bool";
	readonly defaultValue: boolean;
};

export type EnumOption = VariableBase & {
	readonly kind: "enum";
	readonly defaultValue: string;
	readonly values: readonly string[];
};

export type AnythingOption = VariableBase & {
	readonly kind: "anything";
	readonly defaultValue: string;
};

export type SpecialOption = VariableBase & {
	readonly kind: "special";
	readonly specialKind: SpecialKind;
	/** Shell expression evaluated at runtime, e.g. `$SURFRAW_results`. */
	readonly defaultValue: string;
};

export type ListOption = VariableBase & {
	readonly kind: "list";
	readonly elementType: ListElementType;
	readonly defaults: readonly string[];
	/** Valid values of an enum list; null for anything lists. */
	readonly values: readonly string[] | null;
};

/** Options that create a shell variable. */
export type VariableOption =
	| BoolOption
	| EnumOption
	| AnythingOption
	| SpecialOption
	| ListOption;

export type FlagOption = OptionBase & {
	readonly kind: "flag";
	readonly target: VariableOption;
	/** The value as written. */
	readonly value: string;
	/** The value split on commas when the target is a list, otherwise null. */
	readonly values: readonly string[] | null;
};

export type AliasTarget =
	| { readonly namespace: "variable"; readonly option: VariableOption }
	| { readonly namespace: "flag"; readonly option: FlagOption };

export type AliasOption = {
	readonly kind: "alias";
	readonly name: string;
	readonly target: AliasTarget;
};

// ----------------------------------------------------------------------------
// Behaviors attached to variables
// ----------------------------------------------------------------------------

export type Traversal = "scalar" | "list";

export type Collapse = {
	readonly variable: VariableOption;
	readonly branches: readonly CollapseBranch[];
};

export type Mapping = {
	readonly variable: VariableOption;
	readonly parameter: string;
	readonly urlEncode: boolean;
	readonly traversal: Traversal;
};

export type Inline = {
	readonly variable: VariableOption;
	readonly keyword: string;
	readonly traversal: Traversal;
};

/**
 * The validated, cross-referenced result of all directives. Options appear
 * in declaration order; flags and aliases point at their target objects.
 */
export type OptionGraph = {
	readonly settings: ResolvedSettings;
	readonly variables: readonly VariableOption[];
	readonly flags: readonly FlagOption[];
	readonly aliases: readonly AliasOption[];
	readonly collapses: readonly Collapse[];
	readonly mappings: readonly Mapping[];
	readonly inlines: readonly Inline[];
};

/** Name of the shell variable holding an option's value. */
export function variableName(
	graph: OptionGraph,
	option: VariableOption,
): string {
	return `SURFRAW_${graph.settings.name}_${option.name}`;
}
