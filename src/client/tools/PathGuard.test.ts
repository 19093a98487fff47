import { createPathPolicy, PathGuard } from "./PathGuard";
import { mkdirSync, mkdtempSync, realpathSync, rmSync, symlinkSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

describe("PathGuard", () => {
	let baseDir: string;
	let work: string;

	async function guardFor(options: { ignore?: string; allowedFolders?: Array<string>; caseSensitive?: boolean } = {}) {
		if (options.ignore !== undefined) {
			writeFileSync(join(work, ".toolignore"), options.ignore);
		}
		const policy = await createPathPolicy({
			repoPath: work,
			allowedFolders: options.allowedFolders,
			caseSensitive: options.caseSensitive,
		});
		return new PathGuard(policy);
	}

	beforeEach(() => {
		baseDir = mkdtempSync(join(realpathSync(tmpdir()), "toolpilot-guard-test-"));
		work = join(baseDir, "work");
		mkdirSync(work);
	});

	afterEach(() => {
		rmSync(baseDir, { recursive: true, force: true });
	});

	describe("createPathPolicy", () => {
		test("puts the repository first and skips missing folders", async () => {
			mkdirSync(join(baseDir, "shared"));
			const policy = await createPathPolicy({ repoPath: work, allowedFolders: ["../shared", "../missing", "."] });
			expect(policy.allowedRoots).toEqual([work, join(baseDir, "shared")]);
			expect(Object.isFrozen(policy)).toBe(true);
		});

		test("fails when the repository does not exist", async () => {
			await expect(createPathPolicy({ repoPath: join(baseDir, "nope") })).rejects.toThrow();
		});
	});

	describe("validate", () => {
		test("resolves relative paths against the repository", async () => {
			const guard = await guardFor();
			expect(await guard.validate("src/new.ts")).toBe(join(work, "src", "new.ts"));
			expect(await guard.validate(".")).toBe(work);
		});

		test("rejects a .. traversal out of the repository", async () => {
			const guard = await guardFor();
			await expect(guard.validate(`${work}/../etc/passwd`)).rejects.toMatchObject({ code: "PathViolation" });
			await expect(guard.validate("../outside.txt")).rejects.toMatchObject({ code: "PathViolation" });
		});

		test("rejects absolute paths outside the repository", async () => {
			const guard = await guardFor();
			await expect(guard.validate("/etc/passwd")).rejects.toMatchObject({
				code: "PathViolation",
				message: "Path is outside the allowed folders: /etc/passwd",
			});
		});

		test("rejects a NUL byte", async () => {
			const guard = await guardFor();
			await expect(guard.validate("a\u0000b")).rejects.toMatchObject({ code: "PathViolation" });
		});

		test("rejects a symlink that escapes the repository", async () => {
			writeFileSync(join(baseDir, "secret.txt"), "x");
			symlinkSync(join(baseDir, "secret.txt"), join(work, "link.txt"));
			symlinkSync(baseDir, join(work, "up"));
			const guard = await guardFor();

			await expect(guard.validate("link.txt")).rejects.toMatchObject({ code: "PathViolation" });
			await expect(guard.validate("up/new-file.txt")).rejects.toMatchObject({ code: "PathViolation" });
		});

		test("rejects a dangling symlink", async () => {
			symlinkSync(join(baseDir, "not-yet.txt"), join(work, "dangling.txt"));
			const guard = await guardFor();
			await expect(guard.validate("dangling.txt")).rejects.toMatchObject({ code: "PathViolation" });
		});

		test("accepts a symlink that stays inside the repository", async () => {
			mkdirSync(join(work, "real"));
			symlinkSync(join(work, "real"), join(work, "alias"));
			const guard = await guardFor();
			expect(await guard.validate("alias/file.txt")).toBe(join(work, "real", "file.txt"));
		});

		test("rejects ignored paths", async () => {
			const guard = await guardFor({ ignore: "*.secret\n" });
			await expect(guard.validate(`${work}/a.secret`)).rejects.toMatchObject({
				code: "IgnoredPath",
				message: "Path is ignored by the ignore rules: a.secret",
			});
			expect(await guard.validate("a.txt")).toBe(join(work, "a.txt"));
		});

		test("applies directory-only rules to existing directories", async () => {
			mkdirSync(join(work, "build"));
			const guard = await guardFor({ ignore: "build/\n" });
			await expect(guard.validate("build")).rejects.toMatchObject({ code: "IgnoredPath" });
			await expect(guard.validate("build/out.js")).rejects.toMatchObject({ code: "IgnoredPath" });
		});

		test("blocks the project directory", async () => {
			const guard = await guardFor();
			await expect(guard.validate(".toolpilot/config.yaml")).rejects.toMatchObject({ code: "IgnoredPath" });
		});

		test("accepts paths in extra allowed folders", async () => {
			mkdirSync(join(baseDir, "shared"));
			const guard = await guardFor({ allowedFolders: ["../shared"] });
			expect(await guard.validate("../shared/notes.md")).toBe(join(baseDir, "shared", "notes.md"));
		});

		test("compares roots case-insensitively when configured", async () => {
			const guard = await guardFor({ caseSensitive: false });
			const upper = work.toUpperCase();
			// The upper-cased path does not exist, so it is only contained when case is ignored
			expect(await guard.validate(join(upper, "a.txt"))).toBe(join(upper, "a.txt"));

			const strict = await guardFor();
			await expect(strict.validate(join(upper, "a.txt"))).rejects.toMatchObject({ code: "PathViolation" });
		});
	});

	describe("toDisplayPath", () => {
		test("is relative for the repository and absolute for other roots", async () => {
			mkdirSync(join(baseDir, "shared"));
			const guard = await guardFor({ allowedFolders: ["../shared"] });
			expect(guard.toDisplayPath(join(work, "src", "a.ts"))).toBe("src/a.ts");
			expect(guard.toDisplayPath(work)).toBe(".");
			expect(guard.toDisplayPath(join(baseDir, "shared", "b.md"))).toBe(join(baseDir, "shared", "b.md"));
		});
	});

	describe("walkFiles", () => {
		test("lists files, skipping ignored ones and pruning ignored directories", async () => {
			mkdirSync(join(work, "src"));
			mkdirSync(join(work, "node_modules", "pkg"), { recursive: true });
			mkdirSync(join(work, ".toolpilot"));
			writeFileSync(join(work, "src", "a.ts"), "a");
			writeFileSync(join(work, "src", "b.secret"), "b");
			writeFileSync(join(work, "node_modules", "pkg", "index.js"), "c");
			writeFileSync(join(work, ".toolpilot", "config.yaml"), "d");
			writeFileSync(join(work, "README.md"), "e");
			const guard = await guardFor({ ignore: "*.secret\nnode_modules/\n" });

			expect(await guard.walkFiles(".")).toEqual([
				join(work, ".toolignore"),
				join(work, "README.md"),
				join(work, "src", "a.ts"),
			]);
		});

		test("re-includes negated files under ignored directories", async () => {
			mkdirSync(join(work, "private"));
			writeFileSync(join(work, "private", "keep.txt"), "k");
			writeFileSync(join(work, "private", "drop.txt"), "d");
			const guard = await guardFor({ ignore: "private/\n!private/keep.txt\n.toolignore\n" });

			expect(await guard.walkFiles(".")).toEqual([join(work, "private", "keep.txt")]);
		});

		test("does not follow symlinked directories or escaping links", async () => {
			mkdirSync(join(work, "real"));
			writeFileSync(join(work, "real", "file.txt"), "f");
			writeFileSync(join(baseDir, "outside.txt"), "o");
			symlinkSync(join(work, "real"), join(work, "alias"));
			symlinkSync(join(baseDir, "outside.txt"), join(work, "escape.txt"));
			const guard = await guardFor({ ignore: ".toolignore\n" });

			expect(await guard.walkFiles(".")).toEqual([join(work, "real", "file.txt")]);
		});
	});
});
