import { Command, CommanderError, InvalidArgumentError } from "commander";

import { compileElvis } from "../elvis/compile.js";
import { isCompilationError } from "../elvis/core/errors.js";
import { stableStringify } from "../elvis/core/stable-json.js";
import { graphToJson } from "../elvis/model/json.js";
import type { ElvisSettings } from "../elvis/model/options.js";
import type { DirectiveType, RawDirective } from "../elvis/parse/directives.js";
import { PreviewError, previewSearchUrl } from "../elvis/preview.js";
import {
	type DirectivesFs,
	DirectivesFileError,
	type LoadedDirectives,
	loadDirectivesFile,
} from "./directives-file.js";
import { EXIT } from "./exit-codes.js";
import { createLogger, type Logger, type Verbosity } from "./log.js";
import { OutputError, writeElvis } from "./output.js";
import { getPackageVersion } from "./version.js";

type CliOptions = {
	description?: string;
	insecure?: boolean;
	queryParameter?: string;
	appendArgs: boolean;
	completions: boolean;
	numTabs?: number;
	useResultsOption?: boolean;
	useLanguageOption?: boolean;
	directives?: string;
	output?: string;
	printGraph?: boolean;
	preview?: string;
	set: Record<string, string>;
	verbose?: boolean;
	quiet?: boolean;
};

export type MainIO = {
	stdout: (text: string) => void;
	stderr: (text: string) => void;
	/** Filesystem for directives files. */
	fs?: DirectivesFs;
	cwd?: string;
	env?: Record<string, string | undefined>;
	version?: string;
};

// ----------------------------------------------------------------------------
// Directive options
// ----------------------------------------------------------------------------

type DirectiveOption = { flags: string; type: DirectiveType; help: string };

const DIRECTIVE_OPTIONS: DirectiveOption[] = [
	{ flags: "-F, --flag <spec>", type: "flag", help: "NAME:TARGET:VALUE" },
	{ flags: "-Y, --yes-no <spec>", type: "yes-no", help: "NAME:DEFAULT" },
	{
		flags: "-E, --enum <spec>",
		type: "enum",
		help: "NAME:DEFAULT:VALUE1,VALUE2,...",
	},
	{ flags: "-A, --anything <spec>", type: "anything", help: "NAME:DEFAULT" },
	{ flags: "--alias <spec>", type: "alias", help: "NAME:TARGET:TYPE" },
	{
		flags: "--list <spec>",
		type: "list",
		help: "NAME:TYPE:DEFAULT1,DEFAULT2,...[:VALUE1,VALUE2,...]",
	},
	{
		flags: "--map <spec>",
		type: "map",
		help: "VARIABLE:PARAMETER[:URL_ENCODE]",
	},
	{
		flags: "--list-map <spec>",
		type: "list-map",
		help: "VARIABLE:PARAMETER[:URL_ENCODE]",
	},
	{ flags: "--inline <spec>", type: "inline", help: "VARIABLE:KEYWORD" },
	{
		flags: "--list-inline <spec>",
		type: "list-inline",
		help: "VARIABLE:KEYWORD",
	},
	{
		flags: "--collapse <spec>",
		type: "collapse",
		help: "VARIABLE:VAL1,VAL2,RESULT[:VAL3,RESULT2...]",
	},
	{ flags: "--metavar <spec>", type: "metavar", help: "VARIABLE:METAVAR" },
	{
		flags: "--describe <spec>",
		type: "describe",
		help: "VARIABLE:DESCRIPTION",
	},
];

function parseInteger(value: string): number {
	if (!/^[0-9]+$/.test(value)) {
		throw new InvalidArgumentError(`Expected integer, got '${value}'`);
	}
	return Number.parseInt(value, 10);
}

function collectAssignment(
	value: string,
	previous: Record<string, string>,
): Record<string, string> {
	const at = value.indexOf("=");
	if (at <= 0) {
		throw new InvalidArgumentError(`Expected NAME=VALUE, got '${value}'`);
	}
	return { ...previous, [value.slice(0, at)]: value.slice(at + 1) };
}

/**
 * The mkelvis command line. Directive options all append to `directives`,
 * so their order on the command line is kept.
 */
export function createProgram(
	directives: RawDirective[],
	version: string,
): Command {
	const program = new Command();

	program
		.name("mkelvis")
		.description("Generate a surfraw elvis from option directives")
		.version(version, "-V, --version", "Output the version number")
		.argument("[name]", "Elvis name")
		.argument("[base-url]", "URL opened without search terms")
		.argument("[search-url]", "URL the search terms are appended to")
		.option("--description <text>", "Description (default: Search NAME)")
		.option("--insecure", "Use http when the URLs name no scheme")
		.option(
			"-Q, --query-parameter <key>",
			"URL parameter carrying the search terms",
		)
		.option(
			"--no-append-args",
			"Let the search URL place ${escaped_args} itself " +
				"(it must end in ? or & when parameters are mapped)",
		)
		.option("--no-completions", "Do not generate completion hooks")
		.option(
			"--num-tabs <n>",
			"Tabs after the name in the elvis header",
			parseInteger,
		);

	for (const { flags, type, help } of DIRECTIVE_OPTIONS) {
		program.option(
			flags,
			`${type} directive ${help} (repeatable)`,
			(text: string) => {
				directives.push({ type, text });
				return directives;
			},
		);
	}

	program
		.option("--use-results-option", "Add the special 'results' option")
		.option("--use-language-option", "Add the special 'language' option")
		.option(
			"-d, --directives <file>",
			"YAML or JSON file with settings and directives",
		)
		.option(
			"-o, --output <file>",
			"Output path, - for stdout (default: ./NAME)",
		)
		.option("--print-graph", "Print the resolved option graph as JSON")
		.option(
			"--preview <terms>",
			"Print the URL the elvis opens for these terms",
		)
		.option(
			"--set <name=value>",
			"Option value for --preview (repeatable)",
			collectAssignment,
			{},
		)
		.option("-v, --verbose", "Log every step")
		.option("-q, --quiet", "Log errors only")
		.showHelpAfterError();

	return program;
}

// ----------------------------------------------------------------------------
// Run
// ----------------------------------------------------------------------------

function verbosityOf(options: CliOptions): Verbosity {
	if (options.quiet) return "quiet";
	if (options.verbose) return "verbose";
	return "normal";
}

type Request = {
	program: Command;
	options: CliOptions;
	directives: RawDirective[];
};

async function resolveInput(
	request: Request,
	io: MainIO,
	log: Logger,
): Promise<{ settings: ElvisSettings; directives: RawDirective[] } | number> {
	const { program, options } = request;
	const fromCli = (key: string) => program.getOptionValueSource(key) === "cli";

	let file: LoadedDirectives = { settings: {}, directives: [] };
	if (options.directives) {
		file = await loadDirectivesFile(options.directives, io.fs);
		log.debug(
			`read ${file.directives.length} directives from ${options.directives}`,
		);
	}

	const [name, baseUrl, searchUrl] = [
		program.args[0] ?? file.settings.name,
		program.args[1] ?? file.settings.baseUrl,
		program.args[2] ?? file.settings.searchUrl,
	];
	if (name === undefined || baseUrl === undefined || searchUrl === undefined) {
		log.error("an elvis needs a name, a base URL and a search URL");
		program.outputHelp({ error: true });
		return EXIT.usage;
	}

	const settings: ElvisSettings = {
		name,
		baseUrl,
		searchUrl,
		description: options.description ?? file.settings.description,
		queryParameter: options.queryParameter ?? file.settings.queryParameter,
		insecure: options.insecure ?? file.settings.insecure,
		numTabs: options.numTabs ?? file.settings.numTabs,
		appendSearchArgs: fromCli("appendArgs")
			? options.appendArgs
			: file.settings.appendSearchArgs,
		enableCompletions: fromCli("completions")
			? options.completions
			: file.settings.enableCompletions,
	};

	const specials: RawDirective[] = [];
	if (options.useResultsOption) {
		specials.push({ type: "special", text: "results" });
	}
	if (options.useLanguageOption) {
		specials.push({ type: "special", text: "language" });
	}

	return {
		settings,
		directives: [...file.directives, ...request.directives, ...specials],
	};
}

async function run(request: Request, io: MainIO): Promise<number> {
	const { options } = request;
	const log = createLogger({
		verbosity: verbosityOf(options),
		write: io.stderr,
	});

	try {
		const input = await resolveInput(request, io, log);
		if (typeof input === "number") return input;

		log.debug(`compiling ${input.directives.length} directives`);
		const { graph, text } = compileElvis({
			...input,
			generator: { name: "mkelvis", version: io.version },
		});

		if (options.printGraph) {
			io.stdout(`${stableStringify(graphToJson(graph), { space: 2 })}\n`);
			return EXIT.ok;
		}

		if (options.preview !== undefined) {
			const env = io.env ?? process.env;
			const url = previewSearchUrl(graph, {
				terms: options.preview.split(/\s+/).filter((term) => term !== ""),
				values: options.set,
				env: { results: env.SURFRAW_results, language: env.SURFRAW_lang },
			});
			io.stdout(`${url}\n`);
			return EXIT.ok;
		}

		const target = options.output ?? graph.settings.name;
		const written = await writeElvis(text, target, {
			stdout: io.stdout,
			cwd: io.cwd,
		});
		if (written !== "-") log.info(`wrote ${written}`);
		return EXIT.ok;
	} catch (error) {
		if (isCompilationError(error) || error instanceof PreviewError) {
			log.error(error.message);
			return EXIT.usage;
		}
		if (error instanceof DirectivesFileError) {
			log.error(error.message);
			return error.problem === "unreadable" ? EXIT.noInput : EXIT.dataError;
		}
		if (error instanceof OutputError) {
			log.error(error.message);
			return EXIT.cantCreate;
		}
		throw error;
	}
}

/**
 * Run mkelvis on `argv` (without the node and script paths).
 *
 * @returns The process exit code
 */
export async function main(
	argv: string[],
	io: Partial<MainIO> = {},
): Promise<number> {
	const resolvedIo: MainIO = {
		stdout: (text) => {
			process.stdout.write(text);
		},
		stderr: (text) => {
			process.stderr.write(text);
		},
		version: getPackageVersion(),
		...io,
	};

	const directives: RawDirective[] = [];
	const program = createProgram(directives, resolvedIo.version ?? "0.0.0")
		.exitOverride()
		.configureOutput({
			writeOut: resolvedIo.stdout,
			writeErr: resolvedIo.stderr,
		});

	try {
		await program.parseAsync(argv, { from: "user" });
	} catch (error) {
		if (error instanceof CommanderError) {
			return error.exitCode === 0 ? EXIT.ok : EXIT.usage;
		}
		throw error;
	}

	const options = program.opts<CliOptions>();
	return run({ program, options, directives }, resolvedIo);
}
