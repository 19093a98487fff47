import { createPathPolicy, PathGuard } from "./PathGuard";
import { DEFAULT_CONTENT_RESULTS_CHARS, DEFAULT_FILE_RESULTS_CHARS } from "../../shared/OutputLimiter";
import { executeSearch, registerSearchTool, SearchTool } from "./SearchTool";
import { ToolRegistry } from "./ToolRegistry";
import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

describe("SearchTool", () => {
	let work: string;
	let tool: SearchTool;

	beforeEach(async () => {
		work = mkdtempSync(join(realpathSync(tmpdir()), "toolpilot-search-test-"));
		mkdirSync(join(work, "src"));
		mkdirSync(join(work, "lib"));
		writeFileSync(join(work, ".toolignore"), "*.key\n");
		writeFileSync(join(work, "src", "config.ts"), 'export const config = {\n  name: "demo",\n  retries: 3,\n};\n');
		writeFileSync(join(work, "lib", "confog.ts"), "// TODO: rename\n");
		writeFileSync(join(work, "README.md"), "# Demo\n\nSet the Config before running.\n");
		writeFileSync(join(work, "app.key"), "config\n");
		tool = new SearchTool(new PathGuard(await createPathPolicy({ repoPath: work })));
	});

	afterEach(() => {
		rmSync(work, { recursive: true, force: true });
	});

	describe("fuzzyFiles", () => {
		test("ranks file names by score", async () => {
			expect(await tool.fuzzyFiles("config")).toBe(
				"Found 2 files matching 'config':\n\n1. src/config.ts (Score: 100)\n2. lib/confog.ts (Score: 83)\n",
			);
		});

		test("caps the number of results", async () => {
			expect(await tool.fuzzyFiles("CONFIG", 1)).toBe("Found 1 files matching 'CONFIG':\n\n1. src/config.ts (Score: 100)\n");
		});

		test("reports no matches", async () => {
			expect(await tool.fuzzyFiles("zzzz")).toBe("No files found matching 'zzzz'");
		});

		test("rejects an empty query", async () => {
			await expect(tool.fuzzyFiles("")).rejects.toMatchObject({ code: "InvalidArguments" });
		});

		test("leaves out binary and oversized files", async () => {
			writeFileSync(join(work, "lib", "config.bin"), Buffer.from("config\u0000", "utf8"));
			writeFileSync(join(work, "lib", "config.log"), "x".repeat(1024 * 1024 + 1));

			expect(await tool.fuzzyFiles("config")).toBe(
				"Found 2 files matching 'config':\n\n1. src/config.ts (Score: 100)\n2. lib/confog.ts (Score: 83)\n",
			);
		});

		test("keeps the result within the output budget", async () => {
			const output = await tool.fuzzyFiles("q".repeat(6000));
			expect(output.length).toBeLessThanOrEqual(DEFAULT_FILE_RESULTS_CHARS);
			expect(output.startsWith("No files found matching 'qqq")).toBe(true);
			expect(output).toContain("[Output truncated: ");
		});
	});

	describe("searchContent", () => {
		test("finds lines with context, case-insensitive by default", async () => {
			expect(await tool.searchContent("config")).toBe(
				"Found 2 matches for 'config' in 2 files:\n\n" +
					"File: README.md (1 matches)\n" +
					"  Line 3: Set the Config before running.\n" +
					"  Context:\n" +
					"    Line 1: # Demo\n" +
					"    Line 2: \n" +
					"  > Line 3: Set the Config before running.\n" +
					"\n" +
					"File: src/config.ts (1 matches)\n" +
					"  Line 1: export const config = {\n" +
					"  Context:\n" +
					"  > Line 1: export const config = {\n" +
					'    Line 2:   name: "demo",\n' +
					"    Line 3:   retries: 3,\n" +
					"\n",
			);
		});

		test("honours case sensitivity", async () => {
			const output = await tool.searchContent("Config", { caseSensitive: true });
			expect(output.startsWith("Found 1 matches for 'Config' in 1 files:\n\nFile: README.md (1 matches)\n")).toBe(true);
		});

		test("treats the query literally unless regex is set", async () => {
			expect(await tool.searchContent("retries: \\d+")).toBe("No content matches found for 'retries: \\d+'");
			const output = await tool.searchContent("retries: \\d+", { regex: true });
			expect(output.startsWith("Found 1 matches for 'retries: \\d+' in 1 files:\n\nFile: src/config.ts (1 matches)\n  Line 3:   retries: 3,\n")).toBe(true);
		});

		test("rejects an invalid regular expression", async () => {
			await expect(tool.searchContent("(", { regex: true })).rejects.toMatchObject({ code: "InvalidArguments" });
		});

		test("limits matches per file and in total", async () => {
			mkdirSync(join(work, "many"));
			writeFileSync(join(work, "many", "a.txt"), "hit\nhit\nhit\n");
			writeFileSync(join(work, "many", "b.txt"), "hit\n");

			const perFile = await tool.searchContent("hit", { directory: "many", maxPerFile: 2 });
			expect(perFile.startsWith("Found 3 matches for 'hit' in 2 files:\n\nFile: many/a.txt (2 matches)\n")).toBe(true);

			const total = await tool.searchContent("hit", { directory: "many", maxResults: 2 });
			expect(total.startsWith("Found 2 matches for 'hit' in 1 files:\n\nFile: many/a.txt (2 matches)\n")).toBe(true);
		});

		test("skips binary and oversized files", async () => {
			mkdirSync(join(work, "skip"));
			writeFileSync(join(work, "skip", "bin.dat"), Buffer.from("hit\u0000", "utf8"));
			writeFileSync(join(work, "skip", "big.txt"), `hit\n${"x".repeat(1024 * 1024)}`);
			writeFileSync(join(work, "skip", "ok.txt"), "hit\n");

			const output = await tool.searchContent("hit", { directory: "skip" });
			expect(output).toBe(
				"Found 1 matches for 'hit' in 1 files:\n\nFile: skip/ok.txt (1 matches)\n  Line 1: hit\n  Context:\n  > Line 1: hit\n\n",
			);
		});
	});

	test("keeps content results within the output budget", async () => {
		const output = await tool.searchContent("q".repeat(12000), { directory: "src" });
		expect(output.length).toBeLessThanOrEqual(DEFAULT_CONTENT_RESULTS_CHARS);
		expect(output.startsWith("No content matches found for 'qqq")).toBe(true);
		expect(output).toContain("[Output truncated: ");
	});

	test("reports bad arguments as a rejected promise", async () => {
		const pending = executeSearch(tool, { search_type: "glob", query: "x" });
		expect(pending).toBeInstanceOf(Promise);
		await expect(pending).rejects.toMatchObject({ code: "InvalidArguments" });
		await expect(executeSearch(tool, { search_type: "content" })).rejects.toMatchObject({ code: "InvalidArguments" });
	});

	describe("file_search tool", () => {
		test("dispatches by search_type", async () => {
			const registry = new ToolRegistry();
			registerSearchTool(registry, tool);

			expect(await registry.dispatch("file_search", { search_type: "fuzzy_file", query: "zzzz" })).toEqual({
				output: "No files found matching 'zzzz'",
				isError: false,
			});
			expect(await registry.dispatch("file_search", { search_type: "glob", query: "x" })).toEqual({
				output: "Error [InvalidArguments]: Unknown search_type 'glob'",
				isError: true,
				code: "InvalidArguments",
			});
			expect(
				await registry.dispatch("file_search", { search_type: "content", query: "x", directory: "../" }),
			).toMatchObject({ isError: true, code: "PathViolation" });
		});
	});
});
