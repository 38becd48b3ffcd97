import { randomBytes } from "node:crypto";
import { open, rename } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";

export const SHEBANG = "#!/bin/sh";

export class OutputError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "OutputError";
	}
}

export type WriteOptions = {
	/** Where `-` writes to. */
	stdout: (text: string) => void;
	cwd?: string;
};

function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Write an elvis with its shebang. `-` goes to stdout; anything else is
 * written to a temporary file beside the target, synced, made executable
 * and renamed into place, so the target is never half-written. A failed
 * write leaves the temporary file behind.
 *
 * @returns The path written, or `-`
 */
export async function writeElvis(
	text: string,
	target: string,
	options: WriteOptions,
): Promise<string> {
	const content = `${SHEBANG}\n${text}`;
	if (target === "-") {
		options.stdout(content);
		return target;
	}

	const path = resolve(options.cwd ?? process.cwd(), target);
	const temp = join(
		dirname(path),
		`${basename(path)}.${randomBytes(4).toString("hex")}.mkelvis.tmp`,
	);

	try {
		const handle = await open(temp, "wx", 0o755);
		try {
			await handle.writeFile(content, "utf-8");
			await handle.sync();
			await handle.chmod(0o755);
		} finally {
			await handle.close();
		}
		await rename(temp, path);
	} catch (error) {
		throw new OutputError(
			`cannot write ${path}: ${describeError(error)} (partial output may remain in ${temp})`,
		);
	}
	return path;
}
