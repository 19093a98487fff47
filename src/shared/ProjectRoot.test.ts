import { findProjectRoot, resolveRepoPath } from "./ProjectRoot";
import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

describe("ProjectRoot", () => {
	let testDir: string;

	beforeEach(() => {
		// realpath resolves the macOS /var -> /private/var symlink
		testDir = mkdtempSync(join(realpathSync(tmpdir()), "toolpilot-root-test-"));
	});

	afterEach(() => {
		rmSync(testDir, { recursive: true, force: true });
	});

	describe("findProjectRoot", () => {
		test("returns directory containing .toolpilot when found", async () => {
			mkdirSync(join(testDir, ".toolpilot"));
			expect(await findProjectRoot(testDir)).toBe(testDir);
		});

		test("traverses up to find .toolpilot in a parent directory", async () => {
			mkdirSync(join(testDir, ".toolpilot"));
			const subDir = join(testDir, "src", "lib");
			mkdirSync(subDir, { recursive: true });

			expect(await findProjectRoot(subDir)).toBe(testDir);
		});

		test("stops at the nearest .toolpilot", async () => {
			mkdirSync(join(testDir, ".toolpilot"));
			const inner = join(testDir, "packages", "inner");
			mkdirSync(join(inner, ".toolpilot"), { recursive: true });

			expect(await findProjectRoot(join(inner))).toBe(inner);
		});

		test("ignores .toolpilot if it is a file", async () => {
			const inner = join(testDir, "a");
			mkdirSync(inner);
			writeFileSync(join(inner, ".toolpilot"), "not a directory");
			mkdirSync(join(testDir, ".toolpilot"));

			expect(await findProjectRoot(inner)).toBe(testDir);
		});
	});

	describe("resolveRepoPath", () => {
		test("prefers an explicit path", async () => {
			expect(await resolveRepoPath(testDir)).toBe(testDir);
		});

		test("falls back to the project root of the working directory", async () => {
			const originalCwd = process.cwd();
			mkdirSync(join(testDir, ".toolpilot"));
			const sub = join(testDir, "sub");
			mkdirSync(sub);
			try {
				process.chdir(sub);
				expect(await resolveRepoPath()).toBe(testDir);
			} finally {
				process.chdir(originalCwd);
			}
		});
	});
});
