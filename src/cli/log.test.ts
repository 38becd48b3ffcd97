import { describe, expect, test } from "vitest";

import { createLogger, type Verbosity } from "./log.js";

function capture(verbosity: Verbosity): string[] {
	const lines: string[] = [];
	const log = createLogger({ verbosity, write: (text) => lines.push(text) });
	log.error("failed");
	log.warn("careful");
	log.info("wrote ex");
	log.debug("3 directives");
	return lines;
}

describe("createLogger", () => {
	test("shows errors and warnings by default", () => {
		expect(capture("normal")).toEqual([
			"mkelvis: failed\n",
			"mkelvis: warn: careful\n",
		]);
	});

	test("shows only errors when quiet", () => {
		expect(capture("quiet")).toEqual(["mkelvis: failed\n"]);
	});

	test("shows everything when verbose", () => {
		expect(capture("verbose")).toEqual([
			"mkelvis: failed\n",
			"mkelvis: warn: careful\n",
			"mkelvis: info: wrote ex\n",
			"mkelvis: debug: 3 directives\n",
		]);
	});
});
