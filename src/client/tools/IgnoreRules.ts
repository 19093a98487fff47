/**
 * Ignore Rules
 *
 * Gitignore-style patterns read from `.toolignore`. Rules are evaluated in file order and
 * the last matching rule decides, so `!pattern` re-includes what an earlier rule excluded.
 * A rule that matches a directory also matches everything below it.
 */

import { hasErrnoCode } from "../../shared/errors";
import { getLog } from "../../shared/logger";
import { PROJECT_DIR } from "../../shared/ProjectRoot";
import { readFile } from "node:fs/promises";
import { minimatch } from "minimatch";

const logger = getLog(import.meta);

export interface IgnoreRule {
	/** Glob without the `!`, leading `/` and trailing `/` markers */
	readonly pattern: string;
	readonly negated: boolean;
	readonly directoryOnly: boolean;
	/** Matched against the full relative path instead of each path component */
	readonly anchored: boolean;
	/** The line as written in the ignore file */
	readonly source: string;
}

/**
 * Parses one ignore-file line. Returns undefined for blank lines and comments.
 */
export function parseIgnoreRule(line: string): IgnoreRule | undefined {
	const source = line.trimEnd();
	let text = source.trimStart();
	if (text.length === 0 || text.startsWith("#")) {
		return;
	}

	let negated = false;
	if (text.startsWith("!")) {
		negated = true;
		text = text.slice(1);
	} else if (text.startsWith("\\#") || text.startsWith("\\!")) {
		text = text.slice(1);
	}

	let directoryOnly = false;
	while (text.endsWith("/")) {
		directoryOnly = true;
		text = text.slice(0, -1);
	}

	let anchored = text.includes("/");
	if (text.startsWith("/")) {
		anchored = true;
		text = text.replace(/^\/+/, "");
	}

	if (text.length === 0) {
		return;
	}
	return { pattern: text, negated, directoryOnly, anchored, source };
}

export function parseIgnoreFile(content: string): Array<IgnoreRule> {
	const rules: Array<IgnoreRule> = [];
	for (const line of content.split(/\r?\n/)) {
		const rule = parseIgnoreRule(line);
		if (rule) {
			rules.push(rule);
		}
	}
	return rules;
}

/**
 * Reads an ignore file. A missing file means no rules.
 */
export async function loadIgnoreFile(filePath: string): Promise<Array<IgnoreRule>> {
	try {
		const rules = parseIgnoreFile(await readFile(filePath, "utf8"));
		logger.debug("Loaded %d ignore rules from %s", rules.length, filePath);
		return rules;
	} catch (error) {
		if (hasErrnoCode(error, "ENOENT")) {
			logger.debug("No ignore file at %s", filePath);
			return [];
		}
		throw error;
	}
}

/**
 * Rule that keeps the project directory (config and backups) away from the tools.
 * It is always evaluated first.
 */
export const PROJECT_DIR_RULE: IgnoreRule = {
	pattern: PROJECT_DIR,
	negated: false,
	directoryOnly: true,
	anchored: true,
	source: `/${PROJECT_DIR}/`,
};

export class IgnoreMatcher {
	readonly rules: ReadonlyArray<IgnoreRule>;
	private readonly caseSensitive: boolean;
	private readonly hasNegations: boolean;

	constructor(rules: ReadonlyArray<IgnoreRule>, caseSensitive = true) {
		this.rules = Object.freeze([PROJECT_DIR_RULE, ...rules]);
		this.caseSensitive = caseSensitive;
		this.hasNegations = rules.some(rule => rule.negated);
	}

	/**
	 * Decides whether a root-relative posix path is ignored.
	 *
	 * @param relativePath path relative to its allowed root, `/`-separated
	 * @param isDirectory whether the path itself names a directory
	 */
	isIgnored(relativePath: string, isDirectory: boolean): boolean {
		const segments = relativePath.split("/").filter(segment => segment.length > 0 && segment !== ".");
		if (segments.length === 0) {
			return false;
		}

		let ignored = false;
		for (const rule of this.rules) {
			if (this.ruleMatches(rule, segments, isDirectory)) {
				ignored = !rule.negated;
			}
		}
		return ignored;
	}

	/**
	 * Whether a directory walk may skip a directory entirely. With negation rules present a
	 * file below an ignored directory can still be re-included, so nothing is pruned.
	 */
	canPrune(relativeDir: string): boolean {
		return !this.hasNegations && this.isIgnored(relativeDir, true);
	}

	private ruleMatches(rule: IgnoreRule, segments: ReadonlyArray<string>, isDirectory: boolean): boolean {
		const options = { dot: true, nocase: !this.caseSensitive };
		// Every ancestor of the path is a directory; the path itself is one only when told so
		for (let depth = 1; depth <= segments.length; depth++) {
			const candidateIsDirectory = depth < segments.length || isDirectory;
			if (rule.directoryOnly && !candidateIsDirectory) {
				continue;
			}
			const candidate = rule.anchored ? segments.slice(0, depth).join("/") : segments[depth - 1];
			if (minimatch(candidate, rule.pattern, options)) {
				return true;
			}
		}
		return false;
	}
}
