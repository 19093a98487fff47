/**
 * Project Root Discovery
 *
 * Traverses up the directory tree from cwd (or a given start directory)
 * looking for a `.toolpilot` directory, similar to how git finds `.git`.
 * The directory containing `.toolpilot` is considered the project root.
 */

import { stat } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";

export const PROJECT_DIR = ".toolpilot";

/**
 * Walks up from `startDir` (defaults to `process.cwd()`) looking for a
 * `.toolpilot` directory. Returns the absolute path of the directory that
 * contains it, or `null` if the filesystem root is reached without
 * finding one.
 */
export async function findProjectRoot(startDir?: string): Promise<string | null> {
	let current = resolve(startDir ?? process.cwd());

	while (true) {
		const candidate = join(current, PROJECT_DIR);
		try {
			const stats = await stat(candidate);
			if (stats.isDirectory()) {
				return current;
			}
		} catch {
			// Not here, keep traversing
		}

		const parent = dirname(current);
		if (parent === current) {
			return null;
		}
		current = parent;
	}
}

/**
 * Picks the repository the agent works in: an explicit `--repo-path` wins,
 * then the nearest project root, then the working directory itself.
 */
export async function resolveRepoPath(repoPath?: string): Promise<string> {
	if (repoPath) {
		return resolve(repoPath);
	}
	return (await findProjectRoot()) ?? process.cwd();
}
