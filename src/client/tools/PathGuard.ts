/**
 * Path Guard
 *
 * Every path a tool touches passes through `validate`: it must resolve (symlinks included)
 * inside one of the allowed roots and must not be matched by the ignore rules.
 */

import { hasErrnoCode, ToolError, toIOFailure } from "../../shared/errors";
import { getLog } from "../../shared/logger";
import type { ProjectConfig } from "../../shared/ProjectConfig";
import { IgnoreMatcher, loadIgnoreFile } from "./IgnoreRules";
import type { Dirent } from "node:fs";
import { lstat, readdir, realpath, stat } from "node:fs/promises";
import path from "node:path";

const logger = getLog(import.meta);

// =============================================================================
// SECTION: Policy
// =============================================================================

/**
 * Immutable policy shared by every tool. Rebuild it to pick up ignore-file changes.
 */
export interface PathPolicy {
	/** Absolute, symlink-resolved directories; the first resolves relative paths */
	readonly allowedRoots: ReadonlyArray<string>;
	readonly ignore: IgnoreMatcher;
	readonly caseSensitive: boolean;
}

export interface PathPolicyOptions {
	readonly repoPath: string;
	readonly allowedFolders?: ReadonlyArray<string>;
	/** Ignore file, relative to the repository or absolute */
	readonly ignoreFile?: string;
	readonly caseSensitive?: boolean;
}

/**
 * Builds the policy for a repository. The repository must exist; extra allowed folders
 * that do not exist are skipped with a warning.
 */
export async function createPathPolicy(options: PathPolicyOptions): Promise<PathPolicy> {
	const repoRoot = await realpath(path.resolve(options.repoPath));
	const roots = [repoRoot];

	for (const folder of options.allowedFolders ?? []) {
		const absolute = path.resolve(repoRoot, folder);
		try {
			const resolved = await realpath(absolute);
			if (!roots.includes(resolved)) {
				roots.push(resolved);
			}
		} catch (error) {
			logger.warn({ err: error }, "Skipping allowed folder %s", absolute);
		}
	}

	const caseSensitive = options.caseSensitive ?? true;
	const ignorePath = path.resolve(repoRoot, options.ignoreFile ?? ".toolignore");
	const rules = await loadIgnoreFile(ignorePath);
	return Object.freeze({
		allowedRoots: Object.freeze(roots),
		ignore: new IgnoreMatcher(rules, caseSensitive),
		caseSensitive,
	});
}

/**
 * Builds the policy from a loaded project config.
 */
export function createPathPolicyFromConfig(repoPath: string, config: ProjectConfig): Promise<PathPolicy> {
	return createPathPolicy({
		repoPath,
		allowedFolders: config.allowedFolders,
		ignoreFile: config.ignoreFile,
		caseSensitive: config.caseSensitive,
	});
}

// =============================================================================
// SECTION: Guard
// =============================================================================

function toPosix(relativePath: string): string {
	return path.sep === "/" ? relativePath : relativePath.split(path.sep).join("/");
}

export class PathGuard {
	readonly policy: PathPolicy;

	constructor(policy: PathPolicy) {
		this.policy = policy;
	}

	get primaryRoot(): string {
		return this.policy.allowedRoots[0];
	}

	/**
	 * Resolves a path supplied by the model and checks it against the policy.
	 *
	 * @returns the canonical absolute path
	 * @throws ToolError with code `PathViolation` or `IgnoredPath`
	 */
	async validate(inputPath: string): Promise<string> {
		if (inputPath.includes("\u0000")) {
			throw new ToolError("PathViolation", "Invalid path: contains null byte");
		}

		const absolute = path.resolve(this.primaryRoot, inputPath);
		const canonical = await this.resolveSymlinks(absolute);
		const root = this.findContainingRoot(canonical);
		if (!root) {
			logger.warn("Blocked path outside allowed folders: %s", inputPath);
			throw new ToolError("PathViolation", `Path is outside the allowed folders: ${inputPath}`);
		}

		const relativePath = this.relativeTo(root, canonical);
		if (this.policy.ignore.isIgnored(relativePath, await isDirectory(canonical))) {
			logger.warn("Blocked ignored path: %s", inputPath);
			throw new ToolError("IgnoredPath", `Path is ignored by the ignore rules: ${toPosix(relativePath)}`);
		}
		return canonical;
	}

	/**
	 * Checks the ignore rules for a canonical path. Paths outside every root count as ignored.
	 */
	isIgnored(absolutePath: string, isDir: boolean): boolean {
		const root = this.findContainingRoot(absolutePath);
		if (!root) {
			return true;
		}
		return this.policy.ignore.isIgnored(this.relativeTo(root, absolutePath), isDir);
	}

	/**
	 * Formats a canonical path for the model: relative for the primary root, absolute for
	 * the other allowed roots so it resolves the same way when sent back.
	 */
	toDisplayPath(absolutePath: string): string {
		const root = this.findContainingRoot(absolutePath);
		if (root !== this.primaryRoot) {
			return absolutePath;
		}
		return toPosix(this.relativeTo(root, absolutePath)) || ".";
	}

	/**
	 * Lists every file below `dir` that would pass `validate`, sorted. Ignored directories are
	 * pruned and symlinked directories are not followed.
	 */
	async walkFiles(dir: string): Promise<Array<string>> {
		const start = await this.validate(dir);
		const files: Array<string> = [];
		await this.walk(start, files);
		return files.sort();
	}

	private async walk(dir: string, files: Array<string>): Promise<void> {
		let entries: Array<Dirent>;
		try {
			entries = await readdir(dir, { withFileTypes: true });
		} catch (error) {
			if (hasErrnoCode(error, "ENOTDIR")) {
				files.push(dir);
				return;
			}
			throw toIOFailure(error, `Failed to list ${this.toDisplayPath(dir)}`);
		}

		for (const entry of entries) {
			const entryPath = path.join(dir, entry.name);
			if (entry.isDirectory()) {
				const root = this.findContainingRoot(entryPath);
				if (root && !this.policy.ignore.canPrune(this.relativeTo(root, entryPath))) {
					await this.walk(entryPath, files);
				}
			} else if (entry.isFile() && !this.isIgnored(entryPath, false)) {
				files.push(entryPath);
			} else if (entry.isSymbolicLink() && !this.isIgnored(entryPath, false)) {
				const target = await this.validateLinkedFile(entryPath);
				if (target) {
					files.push(target);
				}
			}
		}
	}

	private async validateLinkedFile(linkPath: string): Promise<string | undefined> {
		try {
			const target = await this.validate(linkPath);
			return (await stat(target)).isFile() ? target : undefined;
		} catch (error) {
			// Dangling or escaping links are left out of listings
			if (error instanceof ToolError) {
				return;
			}
			throw error;
		}
	}

	private findContainingRoot(absolutePath: string): string | undefined {
		return this.policy.allowedRoots
			.slice()
			.sort((a, b) => b.length - a.length)
			.find(root => this.isWithin(root, absolutePath));
	}

	private isWithin(root: string, absolutePath: string): boolean {
		const base = this.policy.caseSensitive ? root : root.toLowerCase();
		const candidate = this.policy.caseSensitive ? absolutePath : absolutePath.toLowerCase();
		const prefix = base.endsWith(path.sep) ? base : base + path.sep;
		return candidate === base || candidate.startsWith(prefix);
	}

	// Slices instead of path.relative so case-insensitive matches keep the original casing
	private relativeTo(root: string, absolutePath: string): string {
		if (absolutePath.length === root.length) {
			return "";
		}
		return absolutePath.slice(root.endsWith(path.sep) ? root.length : root.length + 1);
	}

	/**
	 * Resolves symlinks in the longest existing prefix and re-appends the rest, so a path
	 * that is about to be created still resolves to where it will land.
	 */
	private async resolveSymlinks(absolutePath: string): Promise<string> {
		const tail: Array<string> = [];
		let current = absolutePath;
		while (true) {
			try {
				const resolved = await realpath(current);
				return tail.length > 0 ? path.join(resolved, ...tail) : resolved;
			} catch (error) {
				if (!hasErrnoCode(error, "ENOENT") && !hasErrnoCode(error, "ENOTDIR")) {
					throw toIOFailure(error, "Failed to resolve path");
				}
			}
			// A dangling link would be followed by the write that comes next
			if (await isSymbolicLink(current)) {
				throw new ToolError("PathViolation", `Path is a dangling symbolic link: ${absolutePath}`);
			}
			const parent = path.dirname(current);
			if (parent === current) {
				return absolutePath;
			}
			tail.unshift(path.basename(current));
			current = parent;
		}
	}
}

async function isDirectory(absolutePath: string): Promise<boolean> {
	try {
		return (await lstat(absolutePath)).isDirectory();
	} catch {
		return false;
	}
}

async function isSymbolicLink(absolutePath: string): Promise<boolean> {
	try {
		return (await lstat(absolutePath)).isSymbolicLink();
	} catch {
		return false;
	}
}
