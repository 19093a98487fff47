/**
 * Search Tool
 *
 * Fuzzy file-name search and content search over the files the Path Guard lets through.
 * Exposed to the model as the `file_search` tool.
 */

import { errorMessage, ToolError } from "../../shared/errors";
import { getLog } from "../../shared/logger";
import {
	type ContentMatch,
	type ContextLine,
	DEFAULT_CONTENT_RESULTS_CHARS,
	DEFAULT_FILE_RESULTS_CHARS,
	type FileMatch,
	formatContentMatches,
	formatFileMatches,
	limitOutput,
} from "../../shared/OutputLimiter";
import { isBinary } from "./FileTool";
import { partialRatio } from "./FuzzyMatch";
import type { PathGuard } from "./PathGuard";
import { readBoolean, readInteger, readString, requireString } from "./ToolArgs";
import type { ParameterSpec, ToolArgs, ToolRegistry } from "./ToolRegistry";
import { open, readFile, stat } from "node:fs/promises";
import path from "node:path";

const logger = getLog(import.meta);

export const MAX_SEARCH_FILE_BYTES = 1024 * 1024;
export const FUZZY_SCORE_THRESHOLD = 50;
export const CONTEXT_LINES = 2;

export const DEFAULT_FUZZY_MAX_RESULTS = 10;
export const DEFAULT_CONTENT_MAX_RESULTS = 50;
export const DEFAULT_MAX_PER_FILE = 10;

export interface ContentSearchOptions {
	readonly directory?: string;
	/** Treat the query as a regular expression instead of literal text */
	readonly regex?: boolean;
	readonly caseSensitive?: boolean;
	readonly maxResults?: number;
	readonly maxPerFile?: number;
}

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function requirePositive(value: number, name: string): number {
	if (value < 1) {
		throw new ToolError("InvalidArguments", `'${name}' must be at least 1`);
	}
	return value;
}

export class SearchTool {
	private readonly guard: PathGuard;

	constructor(guard: PathGuard) {
		this.guard = guard;
	}

	/**
	 * Ranks files by how closely their name matches the query, best first. Searches every
	 * allowed root unless a directory is given.
	 */
	async fuzzyFiles(query: string, maxResults = DEFAULT_FUZZY_MAX_RESULTS, directory?: string): Promise<string> {
		if (query.length === 0) {
			throw new ToolError("InvalidArguments", "query must not be empty");
		}
		requirePositive(maxResults, "max_results");

		const needle = query.toLowerCase();
		const scored: Array<{ file: string; score: number }> = [];
		for (const file of await this.listFiles(directory)) {
			const score = partialRatio(needle, path.basename(file).toLowerCase());
			if (score > FUZZY_SCORE_THRESHOLD) {
				scored.push({ file, score });
			}
		}
		// Sort is stable, so equal scores keep path order
		scored.sort((a, b) => b.score - a.score);

		const matches: Array<FileMatch> = [];
		for (const { file, score } of scored) {
			if (matches.length >= maxResults) {
				break;
			}
			if (await this.isSearchable(file)) {
				matches.push({ path: this.guard.toDisplayPath(file), score });
			}
		}

		logger.info("Fuzzy search for '%s' found %d files", query, matches.length);
		return limitOutput(formatFileMatches(matches, query), DEFAULT_FILE_RESULTS_CHARS);
	}

	/**
	 * Finds lines matching the query, with two lines of context on each side.
	 */
	async searchContent(query: string, options: ContentSearchOptions = {}): Promise<string> {
		if (query.length === 0) {
			throw new ToolError("InvalidArguments", "query must not be empty");
		}
		const maxResults = requirePositive(options.maxResults ?? DEFAULT_CONTENT_MAX_RESULTS, "max_results");
		const maxPerFile = requirePositive(options.maxPerFile ?? DEFAULT_MAX_PER_FILE, "max_per_file");
		const pattern = this.compilePattern(query, options);

		const results = new Map<string, ReadonlyArray<ContentMatch>>();
		let total = 0;
		for (const file of await this.listFiles(options.directory ?? ".")) {
			if (total >= maxResults) {
				break;
			}
			const content = await this.readSearchable(file);
			if (content === undefined) {
				continue;
			}
			const matches = findMatches(content, pattern, Math.min(maxPerFile, maxResults - total));
			if (matches.length > 0) {
				results.set(this.guard.toDisplayPath(file), matches);
				total += matches.length;
			}
		}

		logger.info("Content search for '%s' found %d matches in %d files", query, total, results.size);
		return limitOutput(formatContentMatches(results, query), DEFAULT_CONTENT_RESULTS_CHARS);
	}

	private compilePattern(query: string, options: ContentSearchOptions): RegExp {
		const flags = options.caseSensitive ? "" : "i";
		if (!options.regex) {
			return new RegExp(escapeRegExp(query), flags);
		}
		try {
			return new RegExp(query, flags);
		} catch (error) {
			throw new ToolError("InvalidArguments", `Invalid regular expression: ${errorMessage(error)}`, { cause: error });
		}
	}

	private async listFiles(directory: string | undefined): Promise<Array<string>> {
		if (directory !== undefined) {
			return this.guard.walkFiles(directory);
		}
		const files = new Set<string>();
		for (const root of this.guard.policy.allowedRoots) {
			for (const file of await this.guard.walkFiles(root)) {
				files.add(file);
			}
		}
		return Array.from(files).sort();
	}

	/**
	 * Whether a file is small enough and looks like text. Only the first 1 KiB is read.
	 */
	private async isSearchable(file: string): Promise<boolean> {
		try {
			if ((await stat(file)).size > MAX_SEARCH_FILE_BYTES) {
				return false;
			}
			const handle = await open(file, "r");
			try {
				const head = Buffer.alloc(1024);
				const { bytesRead } = await handle.read(head, 0, head.length, 0);
				return !isBinary(head.subarray(0, bytesRead));
			} finally {
				await handle.close();
			}
		} catch (error) {
			logger.warn("Skipping %s: %s", file, errorMessage(error));
			return false;
		}
	}

	/**
	 * Reads a file as text, or returns undefined for binary, oversized and unreadable files.
	 */
	private async readSearchable(file: string): Promise<string | undefined> {
		if (!(await this.isSearchable(file))) {
			return;
		}
		try {
			return await readFile(file, "utf8");
		} catch (error) {
			logger.warn("Skipping %s: %s", file, errorMessage(error));
			return;
		}
	}
}

function findMatches(content: string, pattern: RegExp, limit: number): Array<ContentMatch> {
	const lines = content.split(/\r?\n/);
	if (lines[lines.length - 1] === "") {
		lines.pop();
	}

	const matches: Array<ContentMatch> = [];
	for (let i = 0; i < lines.length && matches.length < limit; i++) {
		if (!pattern.test(lines[i])) {
			continue;
		}
		const first = Math.max(0, i - CONTEXT_LINES);
		const last = Math.min(lines.length - 1, i + CONTEXT_LINES);
		const context: Array<ContextLine> = [];
		for (let j = first; j <= last; j++) {
			context.push({ lineNumber: j + 1, content: lines[j].trimEnd(), isMatch: j === i });
		}
		matches.push({ lineNumber: i + 1, content: lines[i].trimEnd(), context });
	}
	return matches;
}

// =============================================================================
// SECTION: Tool Registration
// =============================================================================

export const SEARCH_TOOL_NAME = "file_search";

const SEARCH_DESCRIPTION = `Search for files by name or for text inside files.

Search types:
- fuzzy_file: Find files whose names are similar to the query, ranked by score.
- content: Find lines containing the query, with two lines of context. Set regex to true to use a regular expression.

Files matched by the ignore rules, binary files and files larger than 1 MB are skipped.
Check that a file exists with fuzzy_file before viewing it, and narrow content searches with directory.`;

export const SEARCH_PARAMETERS: Record<string, ParameterSpec> = {
	search_type: { type: "string", description: "The type of search", enum: ["fuzzy_file", "content"] },
	query: { type: "string", description: "File name or text to search for" },
	directory: {
		type: "string",
		description: "Directory to search in, relative to the repository root. Defaults to the whole repository.",
	},
	regex: { type: "boolean", description: "Treat the query as a regular expression (content only). Default false." },
	case_sensitive: { type: "boolean", description: "Match case (content only). Default false." },
	max_results: {
		type: "integer",
		description: "Maximum number of results. Default 10 for fuzzy_file and 50 for content.",
	},
	max_per_file: { type: "integer", description: "Maximum matches per file (content only). Default 10." },
};

export async function executeSearch(tool: SearchTool, args: ToolArgs): Promise<string> {
	const searchType = requireString(args, "search_type");
	const query = requireString(args, "query");

	switch (searchType) {
		case "fuzzy_file":
			return tool.fuzzyFiles(query, readInteger(args, "max_results"), readString(args, "directory"));
		case "content":
			return tool.searchContent(query, {
				directory: readString(args, "directory"),
				regex: readBoolean(args, "regex"),
				caseSensitive: readBoolean(args, "case_sensitive"),
				maxResults: readInteger(args, "max_results"),
				maxPerFile: readInteger(args, "max_per_file"),
			});
		default:
			throw new ToolError("InvalidArguments", `Unknown search_type '${searchType}'`);
	}
}

export function registerSearchTool(registry: ToolRegistry, tool: SearchTool): void {
	registry.register(
		SEARCH_TOOL_NAME,
		args => executeSearch(tool, args),
		SEARCH_DESCRIPTION,
		SEARCH_PARAMETERS,
		["search_type", "query"],
	);
}
