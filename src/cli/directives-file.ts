import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

import type { ElvisSettings } from "../elvis/model/options.js";
import type { RawDirective } from "../elvis/parse/directives.js";

/**
 * Custom filesystem interface for reading directives files.
 */
export type DirectivesFs = {
	/** Read file contents as UTF-8 string */
	readFile: (path: string) => Promise<string>;
};

export type LoadedDirectives = {
	settings: Partial<ElvisSettings>;
	directives: RawDirective[];
};

/**
 * "unreadable" when the file could not be read, "invalid" when its content is
 * wrong.
 */
export type DirectivesFileProblem = "unreadable" | "invalid";

export class DirectivesFileError extends Error {
	readonly problem: DirectivesFileProblem;

	constructor(message: string, problem: DirectivesFileProblem) {
		super(message);
		this.name = "DirectivesFileError";
		this.problem = problem;
	}
}

const directiveEntrySchema = z
	.record(z.string(), z.string())
	.refine((entry) => Object.keys(entry).length === 1, {
		message: "each directive needs exactly one type key, e.g. { enum: 'sort:date:date,relevance' }",
	});

const directivesFileSchema = z
	.object({
		name: z.string().optional(),
		baseUrl: z.string().optional(),
		searchUrl: z.string().optional(),
		description: z.string().optional(),
		queryParameter: z.string().optional(),
		appendSearchArgs: z.boolean().optional(),
		insecure: z.boolean().optional(),
		completions: z.boolean().optional(),
		numTabs: z.number().int().optional(),
		directives: z.array(directiveEntrySchema).default([]),
	})
	.strict();

function formatIssues(issues: z.ZodIssue[]): string {
	return issues
		.map((issue) => {
			const path = issue.path.join(".");
			return path ? `${path}: ${issue.message}` : issue.message;
		})
		.join("; ");
}

function parseDocument(text: string): unknown {
	const trimmed = text.trimStart();
	if (trimmed.startsWith("{")) {
		return JSON.parse(text);
	}

	return parseYaml(text);
}

function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Parse the text of a directives file (YAML, or JSON when it starts with
 * `{`). Settings keys the file leaves out stay undefined.
 */
export function parseDirectivesText(
	text: string,
	source: string,
): LoadedDirectives {
	let document: unknown;
	try {
		document = parseDocument(text);
	} catch (error) {
		throw new DirectivesFileError(
			`${source}: ${describeError(error)}`,
			"invalid",
		);
	}

	const result = directivesFileSchema.safeParse(document ?? {});
	if (!result.success) {
		throw new DirectivesFileError(
			`${source}: ${formatIssues(result.error.issues)}`,
			"invalid",
		);
	}

	const { directives, completions, ...settings } = result.data;
	return {
		settings: { ...settings, enableCompletions: completions },
		directives: directives.flatMap((entry) =>
			Object.entries(entry).map(([type, text]) => ({ type, text })),
		),
	};
}

const nodeFs: DirectivesFs = {
	readFile: (path) => readFile(path, "utf-8"),
};

export async function loadDirectivesFile(
	path: string,
	fs: DirectivesFs = nodeFs,
): Promise<LoadedDirectives> {
	let text: string;
	try {
		text = await fs.readFile(path);
	} catch (error) {
		throw new DirectivesFileError(
			`cannot read ${path}: ${describeError(error)}`,
			"unreadable",
		);
	}
	return parseDirectivesText(text, path);
}
