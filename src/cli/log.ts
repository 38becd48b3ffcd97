export type Verbosity = "quiet" | "normal" | "verbose";
export type LogLevel = "error" | "warn" | "info" | "debug";

export type Logger = Record<LogLevel, (message: string) => void>;

const LEVEL_RANK: Record<LogLevel, number> = {
	error: 0,
	warn: 1,
	info: 2,
	debug: 3,
};

const VERBOSITY_LIMIT: Record<Verbosity, number> = {
	quiet: 0,
	normal: 1,
	verbose: 3,
};

export type LoggerOptions = {
	program?: string;
	verbosity?: Verbosity;
	/** Defaults to stderr. */
	write?: (text: string) => void;
};

/**
 * Diagnostics on stderr as `mkelvis: message`, with the level named for
 * anything but errors. Quiet keeps errors only; verbose shows everything.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
	const program = options.program ?? "mkelvis";
	const limit = VERBOSITY_LIMIT[options.verbosity ?? "normal"];
	const write =
		options.write ??
		((text: string) => {
			process.stderr.write(text);
		});

	const at = (level: LogLevel) => (message: string) => {
		if (LEVEL_RANK[level] > limit) return;
		const prefix = level === "error" ? "" : `${level}: `;
		write(`${program}: ${prefix}${message}\n`);
	};

	return {
		error: at("error"),
		warn: at("warn"),
		info: at("info"),
		debug: at("debug"),
	};
}
