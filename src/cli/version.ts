import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const packageJsonSchema = z.object({ version: z.string() });

/**
 * Reads the version from package.json. The module sits two levels below the
 * package root in the sources and three levels below it once built.
 */
export function getPackageVersion(): string {
	const currentDir = dirname(fileURLToPath(import.meta.url));
	const path = ["../../package.json", "../../../package.json"]
		.map((candidate) => join(currentDir, candidate))
		.find((candidate) => existsSync(candidate));
	if (!path) return "0.0.0";

	const parsed = packageJsonSchema.safeParse(
		JSON.parse(readFileSync(path, "utf-8")),
	);
	return parsed.success ? parsed.data.version : "0.0.0";
}
