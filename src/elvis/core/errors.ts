export type CompilationErrorCode =
	| "MalformedDirective"
	| "ReservedName"
	| "DuplicateName"
	| "UnresolvedReference"
	| "InvalidAliasChain"
	| "InvalidDefault"
	| "InvalidFlagValue"
	| "MissingQueryParameter"
	| "SchemeMismatch"
	| "InvalidSetting";

/**
 * Where a failure came from: the zero-based position of the directive and its
 * type.
 */
export type DirectiveLocation = {
	index: number;
	type: string;
};

/**
 * Raised by the parser and the option model builder. Compilation stops at the
 * first one; no partial script is ever rendered.
 */
export class CompilationError extends Error {
	readonly code: CompilationErrorCode;
	readonly directive?: DirectiveLocation;
	/** The message without the directive prefix. */
	readonly detail: string;

	constructor(
		code: CompilationErrorCode,
		detail: string,
		directive?: DirectiveLocation,
	) {
		super(
			directive
				? `directive #${directive.index + 1} (${directive.type}): ${detail}`
				: detail,
		);
		this.name = "CompilationError";
		this.code = code;
		this.detail = detail;
		this.directive = directive;
	}
}

export function isCompilationError(error: unknown): error is CompilationError {
	return error instanceof CompilationError;
}
