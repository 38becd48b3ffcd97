/**
 * mkelvis - compile option directives into surfraw elvi
 *
 * @example
 * ```ts
 * import { compileElvis } from "mkelvis";
 *
 * const { text } = compileElvis({
 *   settings: {
 *     name: "ex",
 *     baseUrl: "example.com",
 *     searchUrl: "example.com/search",
 *     queryParameter: "q",
 *   },
 *   directives: [
 *     { type: "enum", text: "sort:date:date,relevance" },
 *     { type: "map", text: "sort:sort" },
 *   ],
 * });
 * ```
 */

export {
	type CompileInput,
	type CompileResult,
	compileElvis,
} from "./elvis/compile.js";
export {
	CompilationError,
	type CompilationErrorCode,
	type DirectiveLocation,
	isCompilationError,
} from "./elvis/core/errors.js";
export { stableStringify } from "./elvis/core/stable-json.js";
export { BUCKET_ORDER, type Bucket } from "./elvis/model/buckets.js";
export { buildOptionGraph } from "./elvis/model/builder.js";
export { graphToJson } from "./elvis/model/json.js";
export type {
	AliasOption,
	AliasTarget,
	AnythingOption,
	BoolOption,
	Collapse,
	ElvisSettings,
	EnumOption,
	FlagOption,
	Inline,
	ListOption,
	Mapping,
	OptionGraph,
	ResolvedSettings,
	SpecialOption,
	Traversal,
	VariableOption,
} from "./elvis/model/options.js";
export { variableName } from "./elvis/model/options.js";
export {
	DIRECTIVE_TYPES,
	type Directive,
	type DirectiveType,
	type RawDirective,
} from "./elvis/parse/directives.js";
export {
	DIRECTIVE_USAGE,
	parseDirective,
	parseDirectives,
} from "./elvis/parse/parse.js";
export {
	type PreviewInput,
	PreviewError,
	previewSearchUrl,
} from "./elvis/preview.js";
export {
	type GeneratorInfo,
	type RenderOptions,
	renderElvis,
} from "./elvis/render/elvis.js";
export {
	escapeHeredoc,
	escapePattern,
	escapeReplacement,
	percentEncode,
	shellQuote,
} from "./elvis/render/escape.js";
