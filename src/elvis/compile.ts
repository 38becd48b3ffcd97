import { buildOptionGraph } from "./model/builder.js";
import type { ElvisSettings, OptionGraph } from "./model/options.js";
import type { RawDirective } from "./parse/directives.js";
import { parseDirectives } from "./parse/parse.js";
import { type GeneratorInfo, renderElvis } from "./render/elvis.js";

export type CompileInput = {
	settings: ElvisSettings;
	directives: readonly RawDirective[];
	generator?: GeneratorInfo;
};

export type CompileResult = {
	graph: OptionGraph;
	/** The elvis, without a shebang. */
	text: string;
};

/**
 * Parse, resolve and render in one go. Throws a `CompilationError` on the
 * first problem; nothing is rendered in that case.
 */
export function compileElvis(input: CompileInput): CompileResult {
	const graph = buildOptionGraph(
		input.settings,
		parseDirectives(input.directives),
	);
	return { graph, text: renderElvis(graph, { generator: input.generator }) };
}
