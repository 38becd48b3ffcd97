import { CompilationError, type DirectiveLocation } from "../core/errors.js";
import {
	type AliasTargetType,
	type CollapseBranch,
	DIRECTIVE_TYPES,
	type Directive,
	type DirectiveType,
	isDirectiveType,
	type RawDirective,
} from "./directives.js";
import { splitFields, splitHead, splitList } from "./fields.js";
import {
	checkEnumValues,
	checkMetavar,
	checkName,
	checkReference,
	parseYesNo,
} from "./validators.js";

export const DIRECTIVE_USAGE: Record<DirectiveType, string> = {
	bool: "NAME:DEFAULT",
	"yes-no": "NAME:DEFAULT",
	enum: "NAME:DEFAULT:VALUE1,VALUE2,...",
	anything: "NAME:DEFAULT",
	list: "NAME:TYPE:DEFAULT1,DEFAULT2,...[:VALUE1,VALUE2,...]",
	special: "results|language",
	flag: "NAME:TARGET:VALUE",
	alias: "NAME:TARGET:TYPE",
	collapse: "VARIABLE:VAL1,VAL2,RESULT[:VAL3,RESULT2...]",
	map: "VARIABLE:PARAMETER[:URL_ENCODE]",
	"list-map": "VARIABLE:PARAMETER[:URL_ENCODE]",
	inline: "VARIABLE:KEYWORD",
	"list-inline": "VARIABLE:KEYWORD",
	metavar: "VARIABLE:METAVAR",
	describe: "VARIABLE:DESCRIPTION",
};

const ALIAS_TARGET_TYPES = new Map<string, AliasTargetType>([
	["bool", "bool"],
	["yes-no", "bool"],
	["enum", "enum"],
	["anything", "anything"],
	["special", "special"],
	["list", "list"],
	["flag", "flag"],
	["alias", "alias"],
]);

function malformed(detail: string, location: DirectiveLocation): never {
	throw new CompilationError("MalformedDirective", detail, location);
}

/**
 * Tokenize one directive into its typed record. Only syntax is checked here;
 * references to other options are resolved by the option model builder.
 *
 * @param index - Position of the directive in the input, used in error messages
 */
export function parseDirective(raw: RawDirective, index: number): Directive {
	const location: DirectiveLocation = { index, type: raw.type };
	const { type, text } = raw;

	if (!isDirectiveType(type)) {
		malformed(
			`unknown directive type '${type}' (expected one of: ${DIRECTIVE_TYPES.join(", ")})`,
			location,
		);
	}

	const usage = DIRECTIVE_USAGE[type];

	switch (type) {
		case "bool":
		case "yes-no": {
			const [name, defaultValue] = splitFields(
				text,
				{ min: 2, max: 2 },
				usage,
				location,
			);
			return {
				kind: "bool",
				location,
				name: checkName(name, location),
				defaultValue: parseYesNo(defaultValue, location),
			};
		}

		case "enum": {
			const [name, defaultValue, values] = splitFields(
				text,
				{ min: 3, max: 3 },
				usage,
				location,
			);
			return {
				kind: "enum",
				location,
				name: checkName(name, location),
				defaultValue,
				values: checkEnumValues(splitList(values), location),
			};
		}

		case "anything": {
			const [name, defaultValue] = splitFields(
				text,
				{ min: 2, max: 2 },
				usage,
				location,
			);
			return {
				kind: "anything",
				location,
				name: checkName(name, location),
				defaultValue,
			};
		}

		case "list": {
			const fields = splitFields(text, { min: 3, max: 4 }, usage, location);
			const [name, elementType, defaults] = fields;
			const values = fields[3];
			if (elementType === "enum") {
				if (values === undefined) {
					malformed("enum lists need a list of valid values", location);
				}
				return {
					kind: "list",
					location,
					name: checkName(name, location),
					elementType,
					defaults: splitList(defaults),
					values: checkEnumValues(splitList(values), location),
				};
			}
			if (elementType === "anything") {
				if (values !== undefined) {
					malformed("only enum lists take a list of valid values", location);
				}
				return {
					kind: "list",
					location,
					name: checkName(name, location),
					elementType,
					defaults: splitList(defaults),
					values: null,
				};
			}
			return malformed(
				`list type must be 'enum' or 'anything', got '${elementType}'`,
				location,
			);
		}

		case "special": {
			if (text === "results" || text === "language") {
				return { kind: "special", location, specialKind: text };
			}
			return malformed(
				`special options are 'results' or 'language', got '${text}'`,
				location,
			);
		}

		case "flag": {
			const [name, target, value] = splitFields(
				text,
				{ min: 3, max: 3 },
				usage,
				location,
			);
			return {
				kind: "flag",
				location,
				name: checkName(name, location),
				target: checkReference(target, location),
				value,
			};
		}

		case "alias": {
			const [name, target, typeName] = splitFields(
				text,
				{ min: 3, max: 3 },
				usage,
				location,
			);
			const targetType = ALIAS_TARGET_TYPES.get(typeName);
			if (targetType === undefined) {
				malformed(
					`alias type must be one of ${[...ALIAS_TARGET_TYPES.keys()].join(", ")}, got '${typeName}'`,
					location,
				);
			}
			return {
				kind: "alias",
				location,
				name: checkName(name, location),
				target: checkReference(target, location),
				targetType,
			};
		}

		case "collapse": {
			const [variable, ...groups] = splitFields(
				text,
				{ min: 2, max: Number.POSITIVE_INFINITY },
				usage,
				location,
			);
			return {
				kind: "collapse",
				location,
				variable: checkReference(variable, location),
				branches: groups.map((group) =>
					parseCollapseBranch(group, usage, location),
				),
			};
		}

		case "map":
		case "list-map": {
			const [variable, parameter, urlEncode] = splitFields(
				text,
				{ min: 2, max: 3 },
				usage,
				location,
			);
			if (parameter === "") {
				malformed("the URL parameter may not be empty", location);
			}
			return {
				kind: type,
				location,
				variable: checkReference(variable, location),
				parameter,
				urlEncode:
					urlEncode === undefined ? true : parseYesNo(urlEncode, location),
			};
		}

		case "inline":
		case "list-inline": {
			const [variable, keyword] = splitFields(
				text,
				{ min: 2, max: 2 },
				usage,
				location,
			);
			if (keyword === "" || /\s/.test(keyword)) {
				malformed(
					`inline keywords must be non-empty and contain no whitespace, got '${keyword}'`,
					location,
				);
			}
			return {
				kind: type,
				location,
				variable: checkReference(variable, location),
				keyword,
			};
		}

		case "metavar": {
			const [variable, metavar] = splitFields(
				text,
				{ min: 2, max: 2 },
				usage,
				location,
			);
			return {
				kind: "metavar",
				location,
				variable: checkReference(variable, location),
				metavar: checkMetavar(metavar, location),
			};
		}

		case "describe": {
			const [variable, description] = splitHead(text, usage, location);
			if (description === "") {
				malformed("descriptions may not be empty", location);
			}
			return {
				kind: "describe",
				location,
				variable: checkReference(variable, location),
				description,
			};
		}
	}
}

function parseCollapseBranch(
	group: string,
	usage: string,
	location: DirectiveLocation,
): CollapseBranch {
	const items = splitList(group);
	const replacement = items.pop();
	if (replacement === undefined || items.length === 0) {
		malformed(
			`each collapse group needs at least one value and a result (${usage}), got '${group}'`,
			location,
		);
	}
	return { patterns: [...new Set(items)], replacement };
}

export function parseDirectives(raw: readonly RawDirective[]): Directive[] {
	return raw.map((directive, index) => parseDirective(directive, index));
}
