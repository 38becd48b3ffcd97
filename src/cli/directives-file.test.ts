import { describe, expect, test } from "vitest";

import {
	type DirectivesFs,
	DirectivesFileError,
	loadDirectivesFile,
	parseDirectivesText,
} from "./directives-file.js";

const yamlText = `
name: ex
baseUrl: example.com
searchUrl: example.com/search
queryParameter: q
completions: false
directives:
  - bool: safe:yes
  - enum: sort:date:date,relevance
  - map: sort:sort
`;

describe("parseDirectivesText", () => {
	test("reads settings and directives from YAML", () => {
		expect(parseDirectivesText(yamlText, "ex.yaml")).toEqual({
			settings: {
				name: "ex",
				baseUrl: "example.com",
				searchUrl: "example.com/search",
				queryParameter: "q",
				enableCompletions: false,
			},
			directives: [
				{ type: "bool", text: "safe:yes" },
				{ type: "enum", text: "sort:date:date,relevance" },
				{ type: "map", text: "sort:sort" },
			],
		});
	});

	test("reads JSON", () => {
		const loaded = parseDirectivesText(
			JSON.stringify({ name: "ex", directives: [{ anything: "site:" }] }),
			"ex.json",
		);
		expect(loaded.settings.name).toBe("ex");
		expect(loaded.directives).toEqual([{ type: "anything", text: "site:" }]);
	});

	test("accepts an empty file", () => {
		expect(parseDirectivesText("", "empty.yaml")).toEqual({
			settings: { enableCompletions: undefined },
			directives: [],
		});
	});

	test("reports the path of invalid entries", () => {
		expect(() =>
			parseDirectivesText(
				"directives:\n  - bool: safe:yes\n    enum: x\n",
				"bad.yaml",
			),
		).toThrow(
			"bad.yaml: directives.0: each directive needs exactly one type key, e.g. { enum: 'sort:date:date,relevance' }",
		);
	});

	test("rejects unknown keys", () => {
		expect(() =>
			parseDirectivesText("name: ex\nurl: example.com\n", "bad.yaml"),
		).toThrow(DirectivesFileError);
	});

	test("rejects values of the wrong type", () => {
		expect(() => parseDirectivesText("numTabs: two\n", "bad.yaml")).toThrow(
			"bad.yaml: numTabs: Expected number, received string",
		);
	});
});

describe("loadDirectivesFile", () => {
	test("reads through a custom fs", async () => {
		let readPath = "";
		const fs: DirectivesFs = {
			readFile: async (path) => {
				readPath = path;
				return yamlText;
			},
		};
		const loaded = await loadDirectivesFile("/elvi/ex.yaml", fs);
		expect(readPath).toBe("/elvi/ex.yaml");
		expect(loaded.directives).toHaveLength(3);
	});

	test("marks read failures as unreadable", async () => {
		const fs: DirectivesFs = {
			readFile: async () => {
				throw new Error("ENOENT: no such file or directory");
			},
		};
		const loading = loadDirectivesFile("/missing.yaml", fs);
		await expect(loading).rejects.toMatchObject({
			problem: "unreadable",
			message: "cannot read /missing.yaml: ENOENT: no such file or directory",
		});
	});
});
