import { COLORS, formatChangePreview, formatToolCall, formatToolResult } from "./Terminal";
import { describe, expect, test } from "vitest";

describe("formatToolCall", () => {
	test("lists each argument on its own line", () => {
		const text = formatToolCall({ id: "call-1", name: "text_editor", arguments: { command: "view", path: "a.ts" } });
		expect(text).toBe("text_editor\n  - command: view\n  - path: a.ts");
	});

	test("renders non-string values as JSON", () => {
		const text = formatToolCall({ id: "call-1", name: "file_search", arguments: { view_range: [1, 5] } });
		expect(text).toBe("file_search\n  - view_range: [1,5]");
	});

	test("truncates long values", () => {
		const text = formatToolCall({ id: "call-1", name: "text_editor", arguments: { file_text: "x".repeat(250) } });
		expect(text).toBe(`text_editor\n  - file_text: ${"x".repeat(200)}... [truncated]`);
	});

	test("shows only the name when arguments are not an object", () => {
		expect(formatToolCall({ id: "call-1", name: "echo", arguments: "raw" })).toBe("echo");
	});
});

describe("formatToolResult", () => {
	test("marks declined changes", () => {
		expect(formatToolResult({ output: "declined", isError: false, code: "UserRejected" })).toEqual({
			prefix: "[Declined]",
			color: COLORS.yellow,
			text: "declined",
		});
	});

	test("marks errors", () => {
		expect(formatToolResult({ output: "Error [IOFailure]: boom", isError: true, code: "IOFailure" })).toEqual({
			prefix: "[Error]",
			color: COLORS.red,
			text: "Error [IOFailure]: boom",
		});
	});

	test("truncates long successful output", () => {
		const result = formatToolResult({ output: "y".repeat(600), isError: false });
		expect(result.prefix).toBe("[Result]");
		expect(result.color).toBe(COLORS.green);
		expect(result.text).toBe(`${"y".repeat(500)}... [truncated]`);
	});
});

describe("formatChangePreview", () => {
	test("shows non-diff previews unchanged", () => {
		const text = formatChangePreview({ path: "notes.txt", kind: "create", preview: "hello" });
		expect(text).toBe(`${COLORS.bold}Proposed create: notes.txt${COLORS.reset}\nhello`);
	});

	test("leaves created content alone even when it looks like a diff", () => {
		const preview = "===\n-item\n+item";
		const text = formatChangePreview({ path: "notes.md", kind: "create", preview });
		expect(text).toBe(`${COLORS.bold}Proposed create: notes.md${COLORS.reset}\n${preview}`);
	});

	test("colours added, removed and hunk lines of a diff", () => {
		const preview = "===\n--- a.txt\n+++ a.txt\n@@ -1 +1 @@\n-old\n+new";
		const text = formatChangePreview({ path: "a.txt", kind: "edit", preview });
		expect(text.split("\n")).toEqual([
			`${COLORS.bold}Proposed edit: a.txt${COLORS.reset}`,
			"===",
			"--- a.txt",
			"+++ a.txt",
			`${COLORS.cyan}@@ -1 +1 @@${COLORS.reset}`,
			`${COLORS.red}-old${COLORS.reset}`,
			`${COLORS.green}+new${COLORS.reset}`,
		]);
	});
});
