import { CompilationError, type DirectiveLocation } from "../core/errors.js";
import type {
	AliasDirective,
	CollapseDirective,
	Directive,
	FlagDirective,
	InlineDirective,
	MappingDirective,
	SpecialKind,
	VariableDirective,
} from "../parse/directives.js";
import { splitList } from "../parse/fields.js";
import type {
	AliasOption,
	AliasTarget,
	Collapse,
	ElvisSettings,
	FlagOption,
	Inline,
	Mapping,
	OptionGraph,
	ResolvedSettings,
	VariableOption,
} from "./options.js";
import { flagSpellings, variableSpellings } from "./spellings.js";
import { resolveUrls } from "./urls.js";

const SPECIALS: Record<
	SpecialKind,
	{ defaultValue: string; metavar: string; description: string }
> = {
	results: {
		defaultValue: "$SURFRAW_results",
		metavar: "NUM",
		description: "Number of search results returned",
	},
	language: {
		defaultValue: "${SURFRAW_lang:=en}",
		metavar: "ISOCODE",
		description: "Two letter language code (resembles ISO country codes)",
	},
};

type AliasRef = { namespace: "variable" | "flag"; name: string };

type Registry = {
	variables: Map<string, VariableDirective>;
	/** Flags and aliases share one namespace, apart from the variables. */
	nonVariables: Map<string, FlagDirective | AliasDirective>;
	flags: FlagDirective[];
	aliases: { directive: AliasDirective; target: AliasRef }[];
	aliasNames: Map<string, string[]>;
	metavars: Map<string, string>;
	descriptions: Map<string, string>;
	collapses: CollapseDirective[];
	mappings: MappingDirective[];
	inlines: InlineDirective[];
};

function variableDirectiveName(directive: VariableDirective): string {
	return directive.kind === "special" ? directive.specialKind : directive.name;
}

function aliasKey(ref: AliasRef): string {
	return `${ref.namespace}:${ref.name}`;
}

function lookup<K, V>(map: ReadonlyMap<K, V>, key: K): V {
	const value = map.get(key);
	if (value === undefined) {
		throw new Error(`option '${String(key)}' was resolved but never built`);
	}
	return value;
}

/**
 * Resolve and validate directives into an option graph. Runs fail-fast
 * passes in a fixed order: settings, variable registration, flag and alias
 * registration and resolution, attachment of behaviors, then whole-graph
 * checks. Forward references are legal.
 */
export function buildOptionGraph(
	settings: ElvisSettings,
	directives: readonly Directive[],
): OptionGraph {
	checkSettings(settings);

	const registry: Registry = {
		variables: new Map(),
		nonVariables: new Map(),
		flags: [],
		aliases: [],
		aliasNames: new Map(),
		metavars: new Map(),
		descriptions: new Map(),
		collapses: [],
		mappings: [],
		inlines: [],
	};

	registerVariables(registry, directives);
	registerNonVariables(registry, directives);
	for (const flag of registry.flags) resolveFlag(registry, flag);
	for (const directive of directives) {
		if (directive.kind === "alias") resolveAlias(registry, directive);
	}
	attachBehaviors(registry, directives);

	return assemble(registry, settings);
}

// ----------------------------------------------------------------------------
// Settings
// ----------------------------------------------------------------------------

function invalidSetting(detail: string): never {
	throw new CompilationError("InvalidSetting", detail);
}

function checkSettings(settings: ElvisSettings): void {
	const { name } = settings;
	if (name.includes("/")) invalidSetting("elvis names may not be paths");
	if (!/^[A-Za-z0-9_]+$/.test(name)) {
		invalidSetting(
			`elvis names may only contain letters, digits and '_', got '${name}'`,
		);
	}
	if (settings.baseUrl === "") invalidSetting("the base URL may not be empty");
	if (settings.searchUrl === "") {
		invalidSetting("the search URL may not be empty");
	}
	const numTabs = settings.numTabs ?? 1;
	if (!Number.isInteger(numTabs) || numTabs < 1) {
		invalidSetting(`the number of tabs must be at least 1, got ${numTabs}`);
	}
	if (
		settings.queryParameter !== undefined &&
		settings.appendSearchArgs === false
	) {
		invalidSetting(
			"a query parameter cannot be used when search terms are not appended",
		);
	}
	if (settings.queryParameter === "") {
		invalidSetting("the query parameter may not be empty");
	}
}

// ----------------------------------------------------------------------------
// Registration
// ----------------------------------------------------------------------------

function registerVariables(
	registry: Registry,
	directives: readonly Directive[],
): void {
	for (const directive of directives) {
		switch (directive.kind) {
			case "bool":
			case "enum":
			case "anything":
			case "list":
			case "special": {
				const name = variableDirectiveName(directive);
				if (registry.variables.has(name)) {
					throw new CompilationError(
						"DuplicateName",
						`the variable option '${name}' is already defined`,
						directive.location,
					);
				}
				registry.variables.set(name, directive);
				break;
			}
			default:
				break;
		}
	}
}

function registerNonVariables(
	registry: Registry,
	directives: readonly Directive[],
): void {
	const register = (directive: FlagDirective | AliasDirective) => {
		const existing = registry.nonVariables.get(directive.name);
		if (existing) {
			throw new CompilationError(
				"DuplicateName",
				`the name '${directive.name}' is already used by the ${existing.kind} '${existing.name}'`,
				directive.location,
			);
		}
		registry.nonVariables.set(directive.name, directive);
	};

	for (const directive of directives) {
		if (directive.kind === "flag") {
			register(directive);
			registry.flags.push(directive);
		}
	}
	for (const directive of directives) {
		if (directive.kind === "alias") register(directive);
	}
}

// ----------------------------------------------------------------------------
// Flags and aliases
// ----------------------------------------------------------------------------

function invalidFlagValue(flag: FlagDirective, detail: string): never {
	throw new CompilationError(
		"InvalidFlagValue",
		`flag '${flag.name}': ${detail}`,
		flag.location,
	);
}

function resolveFlag(registry: Registry, flag: FlagDirective): void {
	const target = registry.variables.get(flag.target);
	if (!target) {
		throw new CompilationError(
			"UnresolvedReference",
			`flag '${flag.name}' targets '${flag.target}', which is not a variable option`,
			flag.location,
		);
	}

	const { value } = flag;
	switch (target.kind) {
		case "bool":
			if (value !== "yes" && value !== "no") {
				invalidFlagValue(flag, `bool values are 'yes' or 'no', got '${value}'`);
			}
			return;
		case "enum":
			if (!target.values.includes(value)) {
				invalidFlagValue(
					flag,
					`'${value}' is not one of ${target.values.join(", ")}`,
				);
			}
			return;
		case "list":
			if (target.values) {
				const allowed = target.values;
				const invalid = splitList(value).filter((v) => !allowed.includes(v));
				if (invalid.length > 0) {
					invalidFlagValue(
						flag,
						`'${invalid.join(",")}' not among ${allowed.join(", ")}`,
					);
				}
			}
			return;
		case "special":
			if (target.specialKind === "results" && !/^[0-9]+$/.test(value)) {
				invalidFlagValue(flag, `results must be a number, got '${value}'`);
			}
			return;
		case "anything":
			return;
	}
}

function resolveAlias(registry: Registry, alias: AliasDirective): void {
	const chained = () =>
		new CompilationError(
			"InvalidAliasChain",
			`alias '${alias.name}' targets the alias '${alias.target}'; aliases must target options directly`,
			alias.location,
		);

	const targetAlias = registry.nonVariables.get(alias.target);
	if (alias.targetType === "alias") throw chained();

	let target: AliasRef | null = null;
	if (alias.targetType === "flag") {
		if (targetAlias?.kind === "alias") throw chained();
		if (targetAlias?.kind === "flag") {
			target = { namespace: "flag", name: alias.target };
		}
	} else {
		const variable = registry.variables.get(alias.target);
		if (variable?.kind === alias.targetType) {
			target = { namespace: "variable", name: alias.target };
		} else if (!variable && targetAlias?.kind === "alias") {
			throw chained();
		}
	}

	if (!target) {
		throw new CompilationError(
			"UnresolvedReference",
			`alias '${alias.name}' targets '${alias.target}', which is not an option of type '${alias.targetType}'`,
			alias.location,
		);
	}

	registry.aliases.push({ directive: alias, target });
	const key = aliasKey(target);
	registry.aliasNames.set(key, [
		...(registry.aliasNames.get(key) ?? []),
		alias.name,
	]);
}

// ----------------------------------------------------------------------------
// Behaviors
// ----------------------------------------------------------------------------

function requireVariable(
	registry: Registry,
	name: string,
	location: DirectiveLocation,
	listOnly: boolean,
): VariableDirective {
	const variable = registry.variables.get(name);
	if (!variable) {
		throw new CompilationError(
			"UnresolvedReference",
			`'${name}' is not a variable option`,
			location,
		);
	}
	if (listOnly && variable.kind !== "list") {
		throw new CompilationError(
			"UnresolvedReference",
			`'${name}' is not a list option`,
			location,
		);
	}
	return variable;
}

function attachBehaviors(
	registry: Registry,
	directives: readonly Directive[],
): void {
	for (const directive of directives) {
		switch (directive.kind) {
			case "metavar":
				requireVariable(
					registry,
					directive.variable,
					directive.location,
					false,
				);
				registry.metavars.set(directive.variable, directive.metavar);
				break;
			case "describe":
				requireVariable(
					registry,
					directive.variable,
					directive.location,
					false,
				);
				registry.descriptions.set(directive.variable, directive.description);
				break;
			case "collapse":
				// Patterns are not checked against enum values.
				requireVariable(
					registry,
					directive.variable,
					directive.location,
					false,
				);
				registry.collapses.push(directive);
				break;
			case "map":
			case "list-map":
				requireVariable(
					registry,
					directive.variable,
					directive.location,
					directive.kind === "list-map",
				);
				registry.mappings.push(directive);
				break;
			case "inline":
			case "list-inline":
				requireVariable(
					registry,
					directive.variable,
					directive.location,
					directive.kind === "list-inline",
				);
				registry.inlines.push(directive);
				break;
			default:
				break;
		}
	}
}

// ----------------------------------------------------------------------------
// Assembly and whole-graph checks
// ----------------------------------------------------------------------------

function buildVariable(
	registry: Registry,
	directive: VariableDirective,
): VariableOption {
	const name = variableDirectiveName(directive);
	const aliases =
		registry.aliasNames.get(aliasKey({ namespace: "variable", name })) ?? [];
	const metavar = registry.metavars.get(name);
	const description = registry.descriptions.get(name);

	switch (directive.kind) {
		case "bool":
			return {
				kind: "bool",
				name,
				aliases,
				metavar: metavar ?? name.toUpperCase(),
				description: description ?? `A bool option for '${name}'`,
				defaultValue: directive.defaultValue,
			};
		case "enum":
			return {
				kind: "enum",
				name,
				aliases,
				metavar: metavar ?? name.toUpperCase(),
				description: description ?? `An enum option for '${name}'`,
				defaultValue: directive.defaultValue,
				values: directive.values,
			};
		case "anything":
			return {
				kind: "anything",
				name,
				aliases,
				metavar: metavar ?? name.toUpperCase(),
				description: description ?? `An unchecked option for '${name}'`,
				defaultValue: directive.defaultValue,
			};
		case "list":
			return {
				kind: "list",
				name,
				aliases,
				metavar: metavar ?? name.toUpperCase(),
				description:
					description ??
					`A repeatable (cumulative) '${directive.elementType}' list option for '${name}'`,
				elementType: directive.elementType,
				defaults: directive.defaults,
				values: directive.values,
			};
		case "special": {
			const special = SPECIALS[directive.specialKind];
			return {
				kind: "special",
				name,
				aliases,
				specialKind: directive.specialKind,
				metavar: metavar ?? special.metavar,
				description: description ?? special.description,
				defaultValue: special.defaultValue,
			};
		}
	}
}

function buildFlag(
	registry: Registry,
	directive: FlagDirective,
	target: VariableOption,
): FlagOption {
	const aliases =
		registry.aliasNames.get(
			aliasKey({ namespace: "flag", name: directive.name }),
		) ?? [];
	if (target.kind === "list") {
		const values = splitList(directive.value);
		return {
			kind: "flag",
			name: directive.name,
			aliases,
			target,
			value: directive.value,
			values,
			description: `An alias for the '${target.elementType}' list option '${target.name}' with the values '${values.join(",")}'`,
		};
	}
	return {
		kind: "flag",
		name: directive.name,
		aliases,
		target,
		value: directive.value,
		values: null,
		description: `An alias for -${target.name}=${directive.value}`,
	};
}

function checkDefault(directive: VariableDirective): void {
	if (
		directive.kind === "enum" &&
		!directive.values.includes(directive.defaultValue)
	) {
		throw new CompilationError(
			"InvalidDefault",
			`default '${directive.defaultValue}' of '${directive.name}' is not one of ${directive.values.join(", ")}`,
			directive.location,
		);
	}
	if (directive.kind === "list" && directive.values) {
		const allowed = directive.values;
		const invalid = directive.defaults.filter((d) => !allowed.includes(d));
		if (invalid.length > 0) {
			throw new CompilationError(
				"InvalidDefault",
				`defaults '${invalid.join(",")}' of '${directive.name}' are not among ${allowed.join(", ")}`,
				directive.location,
			);
		}
	}
}

function checkSpellings(
	registry: Registry,
	variables: ReadonlyMap<string, VariableOption>,
	flags: ReadonlyMap<string, FlagOption>,
): void {
	const owners = new Map<string, string>();
	const claim = (
		spellings: string[],
		owner: string,
		location: DirectiveLocation,
	) => {
		for (const spelling of spellings) {
			const existing = owners.get(spelling);
			if (existing !== undefined) {
				throw new CompilationError(
					"DuplicateName",
					`'${spelling}' would be handled by both ${existing} and ${owner}`,
					location,
				);
			}
			owners.set(spelling, owner);
		}
	};

	for (const directive of registry.variables.values()) {
		const option = lookup(variables, variableDirectiveName(directive));
		claim(
			variableSpellings(option),
			`the ${option.kind} option '${option.name}'`,
			directive.location,
		);
	}
	for (const directive of registry.flags) {
		claim(
			flagSpellings(lookup(flags, directive.name)),
			`the flag '${directive.name}'`,
			directive.location,
		);
	}
	for (const { directive, target } of registry.aliases) {
		const spellings =
			target.namespace === "variable"
				? variableSpellings(lookup(variables, target.name), directive.name)
				: flagSpellings(lookup(flags, target.name), directive.name);
		claim(spellings, `the alias '${directive.name}'`, directive.location);
	}
}

function assemble(registry: Registry, settings: ElvisSettings): OptionGraph {
	const variables = new Map<string, VariableOption>();
	for (const directive of registry.variables.values()) {
		checkDefault(directive);
		variables.set(
			variableDirectiveName(directive),
			buildVariable(registry, directive),
		);
	}

	const flags = new Map<string, FlagOption>();
	for (const directive of registry.flags) {
		flags.set(
			directive.name,
			buildFlag(registry, directive, lookup(variables, directive.target)),
		);
	}

	const aliases: AliasOption[] = registry.aliases.map(
		({ directive, target }) => {
			const resolved: AliasTarget =
				target.namespace === "variable"
					? { namespace: "variable", option: lookup(variables, target.name) }
					: { namespace: "flag", option: lookup(flags, target.name) };
			return { kind: "alias", name: directive.name, target: resolved };
		},
	);

	checkSpellings(registry, variables, flags);

	const collapses: Collapse[] = registry.collapses.map((directive) => ({
		variable: lookup(variables, directive.variable),
		branches: directive.branches,
	}));
	const mappings: Mapping[] = registry.mappings.map((directive) => ({
		variable: lookup(variables, directive.variable),
		parameter: directive.parameter,
		urlEncode: directive.urlEncode,
		traversal: directive.kind === "list-map" ? "list" : "scalar",
	}));
	const inlines: Inline[] = registry.inlines.map((directive) => ({
		variable: lookup(variables, directive.variable),
		keyword: directive.keyword,
		traversal: directive.kind === "list-inline" ? "list" : "scalar",
	}));

	const appendSearchArgs = settings.appendSearchArgs ?? true;
	const firstMapping = registry.mappings[0];
	if (
		firstMapping &&
		settings.queryParameter === undefined &&
		appendSearchArgs
	) {
		throw new CompilationError(
			"MissingQueryParameter",
			"mapped URL parameters need a query parameter for the search terms, or search terms that are not appended",
			firstMapping.location,
		);
	}

	const urls = resolveUrls(
		settings.baseUrl,
		settings.searchUrl,
		settings.insecure ?? false,
	);
	const description = settings.description ?? `Search ${settings.name}`;
	const resolvedSettings: ResolvedSettings = {
		name: settings.name,
		baseUrl: urls.baseUrl,
		searchUrl: urls.searchUrl,
		description: `${description} (${urls.baseUrlWithoutScheme})`,
		queryParameter: settings.queryParameter ?? null,
		appendSearchArgs,
		enableCompletions: settings.enableCompletions ?? true,
		numTabs: settings.numTabs ?? 1,
	};

	return deepFreeze({
		settings: resolvedSettings,
		variables: [...variables.values()],
		flags: [...flags.values()],
		aliases,
		collapses,
		mappings,
		inlines,
	});
}

function deepFreeze<T>(value: T): T {
	if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const child of Object.values(value)) deepFreeze(child);
	}
	return value;
}
