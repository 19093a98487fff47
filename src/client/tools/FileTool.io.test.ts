import { BackupStore } from "./BackupStore";
import { ConfirmationGate } from "./ConfirmationGate";
import { FileTool, registerTextEditorTool } from "./FileTool";
import { createPathPolicy, PathGuard } from "./PathGuard";
import { ToolRegistry } from "./ToolRegistry";
import { mkdtempSync, readFileSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("node:fs/promises", async importOriginal => {
	const actual = await importOriginal<typeof import("node:fs/promises")>();
	return { ...actual, writeFile: vi.fn(actual.writeFile) };
});

function permissionDenied(): Error {
	return Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
}

describe("FileTool write failures", () => {
	let work: string;
	let backups: BackupStore;
	let tool: FileTool;

	beforeEach(async () => {
		work = mkdtempSync(join(realpathSync(tmpdir()), "toolpilot-file-io-test-"));
		backups = new BackupStore();
		tool = new FileTool({
			guard: new PathGuard(await createPathPolicy({ repoPath: work })),
			backups,
			gate: new ConfirmationGate(async () => "yes"),
		});
	});

	afterEach(() => {
		vi.mocked(writeFile).mockClear();
		rmSync(work, { recursive: true, force: true });
	});

	test("a failed edit is an IOFailure, leaves the file alone and keeps the earlier backup", async () => {
		writeFileSync(join(work, "a.txt"), "one\n");
		await tool.edit("a.txt", { kind: "replace", oldText: "one", newText: "two" });

		vi.mocked(writeFile).mockRejectedValueOnce(permissionDenied());
		await expect(tool.edit("a.txt", { kind: "replace", oldText: "two", newText: "three" })).rejects.toMatchObject({
			code: "IOFailure",
			message: "Failed to write a.txt: EACCES: permission denied",
		});

		expect(readFileSync(join(work, "a.txt"), "utf8")).toBe("two\n");
		expect(backups.peek(join(work, "a.txt"))?.content).toEqual(Buffer.from("one\n"));

		await tool.undo("a.txt");
		expect(readFileSync(join(work, "a.txt"), "utf8")).toBe("one\n");
	});

	test("a failed create leaves no backup behind", async () => {
		vi.mocked(writeFile).mockRejectedValueOnce(permissionDenied());
		await expect(tool.create("new.txt", "hello")).rejects.toMatchObject({ code: "IOFailure" });

		expect(backups.peek(join(work, "new.txt"))).toBeUndefined();
		await expect(tool.undo("new.txt")).rejects.toMatchObject({ code: "NoBackupAvailable" });
	});

	test("the model sees the failure as an error result", async () => {
		writeFileSync(join(work, "a.txt"), "one\n");
		const registry = new ToolRegistry();
		registerTextEditorTool(registry, tool);

		vi.mocked(writeFile).mockRejectedValueOnce(permissionDenied());
		expect(
			await registry.dispatch("text_editor", { command: "str_replace", path: "a.txt", old_str: "one", new_str: "two" }),
		).toEqual({
			output: "Error [IOFailure]: Failed to write a.txt: EACCES: permission denied",
			isError: true,
			code: "IOFailure",
		});
		expect(readFileSync(join(work, "a.txt"), "utf8")).toBe("one\n");
	});
});
