/**
 * File Tool
 *
 * View, create, edit, delete and undo for files inside the allowed roots. Every mutation
 * follows the same path: validate, build a preview, ask the gate, snapshot, write.
 * Exposed to the model as the `text_editor` tool.
 */

import { hasErrnoCode, ToolError, toIOFailure } from "../../shared/errors";
import { getLog } from "../../shared/logger";
import type { BackupStore } from "./BackupStore";
import type { ChangeKind, ConfirmationGate } from "./ConfirmationGate";
import type { PathGuard } from "./PathGuard";
import { readIntegerPair, readString, requireInteger, requireString } from "./ToolArgs";
import type { ParameterSpec, ToolArgs, ToolRegistry } from "./ToolRegistry";
import type { Stats } from "node:fs";
import { mkdir, readdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { createTwoFilesPatch } from "diff";

const logger = getLog(import.meta);

// =============================================================================
// SECTION: Types
// =============================================================================

export type EditPatch =
	| { readonly kind: "replace"; readonly oldText: string; readonly newText: string }
	| { readonly kind: "insert"; readonly line: number; readonly text: string };

/** 1-based inclusive line range; an end of -1 means the end of the file */
export type ViewRange = readonly [number, number];

export interface FileToolOptions {
	readonly guard: PathGuard;
	readonly backups: BackupStore;
	readonly gate: ConfirmationGate;
	readonly maxViewLines?: number;
}

export const DEFAULT_MAX_VIEW_LINES = 250;
export const REJECTED_MESSAGE = "Changes were rejected by the user. Nothing was written.";

// =============================================================================
// SECTION: Helpers
// =============================================================================

const BINARY_SNIFF_BYTES = 1024;

export function isBinary(content: Buffer): boolean {
	return content.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

// Keeps a leading BOM in the text so it is written back unchanged
const STRICT_UTF8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Decodes file bytes for editing. Bytes that are not valid UTF-8 would not survive the
 * round trip, so such files are refused.
 */
export function decodeForEdit(bytes: Buffer, display: string): string {
	try {
		return STRICT_UTF8.decode(bytes);
	} catch (error) {
		throw new ToolError("IOFailure", `Cannot edit non-UTF-8 file: ${display}`, { cause: error });
	}
}

export function formatSize(sizeBytes: number): string {
	let size = sizeBytes;
	for (const unit of ["B", "KB", "MB", "GB"]) {
		if (size < 1024) {
			return `${size.toFixed(1)} ${unit}`;
		}
		size /= 1024;
	}
	return `${size.toFixed(1)} TB`;
}

/**
 * Splits text into lines, keeping each line's terminator.
 */
function splitLinesKeepEnds(content: string): Array<string> {
	return content.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

function countOccurrences(haystack: string, needle: string): number {
	let count = 0;
	let index = haystack.indexOf(needle);
	while (index !== -1) {
		count++;
		index = haystack.indexOf(needle, index + needle.length);
	}
	return count;
}

/**
 * Unified diff with three lines of context, as shown in confirmation prompts.
 */
export function buildDiff(displayPath: string, before: string, after: string): string {
	return createTwoFilesPatch(`a/${displayPath}`, `b/${displayPath}`, before, after, undefined, undefined, {
		context: 3,
	});
}

/**
 * Finds the region of `content` sharing the most words with `search`, so a failed
 * replacement can point the model at what it probably meant.
 */
export function findSimilarText(content: string, search: string, maxSuggestionLength = 300): string | null {
	const toWords = (text: string) =>
		text
			.toLowerCase()
			.replace(/[^\w\s]/g, " ")
			.split(/\s+/)
			.filter(w => w.length >= 3);

	const searchWords = toWords(search);
	if (searchWords.length === 0) {
		return null;
	}

	const lines = content.split("\n");
	const windowSize = Math.max(1, search.split("\n").length);
	let bestScore = 0;
	let bestStart = 0;
	let bestEnd = 0;

	for (let start = 0; start < lines.length; start++) {
		const end = Math.min(start + windowSize, lines.length) - 1;
		const regionWords = toWords(lines.slice(start, end + 1).join("\n"));
		const matches = searchWords.filter(sw => regionWords.some(rw => rw.includes(sw) || sw.includes(rw)));
		const score = matches.length / searchWords.length;
		if (score > bestScore) {
			bestScore = score;
			bestStart = start;
			bestEnd = end;
		}
	}

	// Only suggest when at least 30% of the words match
	if (bestScore < 0.3) {
		return null;
	}

	const suggestion = lines.slice(bestStart, bestEnd + 1).join("\n");
	return suggestion.length > maxSuggestionLength ? `${suggestion.slice(0, maxSuggestionLength)}...` : suggestion;
}

// =============================================================================
// SECTION: File Tool
// =============================================================================

export class FileTool {
	private readonly guard: PathGuard;
	private readonly backups: BackupStore;
	private readonly gate: ConfirmationGate;
	private readonly maxViewLines: number;

	constructor(options: FileToolOptions) {
		this.guard = options.guard;
		this.backups = options.backups;
		this.gate = options.gate;
		this.maxViewLines = options.maxViewLines ?? DEFAULT_MAX_VIEW_LINES;
	}

	/**
	 * Shows numbered lines of a file, or lists a directory.
	 */
	async view(filePath: string, range?: ViewRange): Promise<string> {
		const target = await this.guard.validate(filePath);
		const display = this.guard.toDisplayPath(target);

		const stats = await this.statOrFail(target, display);
		if (stats.isDirectory()) {
			if (range) {
				throw new ToolError("InvalidArguments", "view_range cannot be used with a directory");
			}
			return this.listDirectory(target, display);
		}

		const bytes = await this.readOrFail(target, display);
		if (isBinary(bytes)) {
			return `${display} is a binary file (${formatSize(bytes.length)}) and cannot be displayed`;
		}

		const lines = bytes.toString("utf8").split(/\r?\n/);
		if (lines[lines.length - 1] === "") {
			lines.pop();
		}
		const total = lines.length;
		if (total === 0) {
			return `${display} is empty`;
		}

		let start = 1;
		let end = Math.min(total, this.maxViewLines);
		let capped = total > this.maxViewLines;
		if (range) {
			[start, end, capped] = this.resolveRange(range, total);
		}

		let result = lines
			.slice(start - 1, end)
			.map((line, i) => `${start + i}: ${line}`)
			.join("\n");

		if (range && (start > 1 || end < total)) {
			result += `\n\n(Showing lines ${start} to ${end} of ${total} total lines)`;
		} else if (!range && capped) {
			result += `\n\n(Showing first ${this.maxViewLines} lines of ${total} total lines)`;
		}
		if (capped) {
			result += `\n(Maximum view limit is ${this.maxViewLines} lines at a time)`;
		}
		return result;
	}

	/**
	 * Creates a new file. Fails when anything already exists at the path.
	 */
	async create(filePath: string, content: string): Promise<string> {
		const target = await this.guard.validate(filePath);
		const display = this.guard.toDisplayPath(target);

		if (await exists(target)) {
			throw new ToolError("IOFailure", `File already exists: ${display}. Use str_replace or insert to change it.`);
		}

		await this.confirm(display, "create", content);
		await this.applyWithBackup(target, null, async () => {
			await mkdir(path.dirname(target), { recursive: true });
			await writeFile(target, content, { encoding: "utf8", flag: "wx" });
		});
		return `Successfully created file '${display}'.`;
	}

	/**
	 * Replaces a unique occurrence of text, or inserts text after a line (0 = start of file).
	 */
	async edit(filePath: string, patch: EditPatch): Promise<string> {
		const target = await this.guard.validate(filePath);
		const display = this.guard.toDisplayPath(target);

		const stats = await this.statOrFail(target, display);
		if (!stats.isFile()) {
			throw new ToolError("IOFailure", `Not a regular file: ${display}`);
		}
		const bytes = await this.readOrFail(target, display);
		if (isBinary(bytes)) {
			throw new ToolError("IOFailure", `Cannot edit binary file: ${display}`);
		}
		const before = decodeForEdit(bytes, display);
		const after = patch.kind === "replace" ? this.replaceText(before, patch, display) : insertText(before, patch, display);

		if (after === before) {
			return `No changes to apply to '${display}'.`;
		}

		await this.confirm(display, "edit", buildDiff(display, before, after));
		await this.applyWithBackup(target, bytes, () => writeFile(target, after, "utf8"));

		return patch.kind === "replace"
			? `Successfully replaced text at exactly one location in '${display}'.`
			: `Successfully inserted text after line ${patch.line} in '${display}'.`;
	}

	/**
	 * Deletes a file. Directories are refused.
	 */
	async delete(filePath: string): Promise<string> {
		const target = await this.guard.validate(filePath);
		const display = this.guard.toDisplayPath(target);

		const stats = await this.statOrFail(target, display);
		if (stats.isDirectory()) {
			throw new ToolError("InvalidArguments", `Cannot delete a directory: ${display}`);
		}
		const bytes = await this.readOrFail(target, display);

		await this.confirm(display, "delete", `Delete file ${display} (${formatSize(bytes.length)})`);
		await this.applyWithBackup(target, bytes, () => rm(target));
		return `Successfully deleted '${display}'. Use undo_edit to restore it.`;
	}

	/**
	 * Restores the content a file had before its most recent change.
	 */
	async undo(filePath: string): Promise<string> {
		const target = await this.guard.validate(filePath);
		const display = this.guard.toDisplayPath(target);

		const record = this.backups.peek(target);
		if (!record) {
			throw new ToolError("NoBackupAvailable", `No previous edit to undo for '${display}'`);
		}

		const current = (await exists(target)) ? (await this.readOrFail(target, display)).toString("utf8") : "";
		const preview =
			record.content === null
				? `Undo removes ${display}, which did not exist before the last change`
				: buildDiff(display, current, record.content.toString("utf8"));
		await this.confirm(display, "undo", preview);

		const restored = await this.backups.undo(target);
		return restored === null
			? `Successfully undid the creation of '${display}' by deleting it.`
			: `Successfully restored '${display}' to its content before the last change.`;
	}

	// -------------------------------------------------------------------------
	// Internals
	// -------------------------------------------------------------------------

	private async confirm(display: string, kind: ChangeKind, preview: string): Promise<void> {
		const decision = await this.gate.propose({ path: display, kind, preview });
		if (decision.status !== "confirmed") {
			throw new ToolError("UserRejected", REJECTED_MESSAGE);
		}
	}

	/**
	 * Snapshots the old content, then runs the write. A failed write puts the previous
	 * snapshot back so undo still refers to a change that happened.
	 */
	private async applyWithBackup(target: string, before: Buffer | null, write: () => Promise<void>): Promise<void> {
		const previous = await this.backups.snapshot(target, before);
		try {
			await write();
		} catch (error) {
			await this.backups.restore(target, previous);
			throw toIOFailure(error, `Failed to write ${this.guard.toDisplayPath(target)}`);
		}
		logger.info("Wrote %s", target);
	}

	private replaceText(before: string, patch: { readonly oldText: string; readonly newText: string }, display: string): string {
		if (patch.oldText.length === 0) {
			throw new ToolError("InvalidArguments", "old_str must not be empty");
		}
		const count = countOccurrences(before, patch.oldText);
		if (count === 0) {
			const similar = findSimilarText(before, patch.oldText);
			const hint = similar ? `\n\nDid you mean:\n${similar}` : "";
			throw new ToolError("InvalidArguments", `The text to replace was not found in '${display}'.${hint}`);
		}
		if (count > 1) {
			throw new ToolError(
				"InvalidArguments",
				`The text to replace was found ${count} times in '${display}'. Include more surrounding context to make it unique.`,
			);
		}
		const index = before.indexOf(patch.oldText);
		return before.slice(0, index) + patch.newText + before.slice(index + patch.oldText.length);
	}

	private resolveRange(range: ViewRange, total: number): [number, number, boolean] {
		const [start, requestedEnd] = range;
		if (start < 1 || start > total) {
			throw new ToolError("InvalidArguments", `Invalid view_range start ${start}: file has ${total} lines`);
		}
		if (requestedEnd !== -1 && requestedEnd < start) {
			throw new ToolError("InvalidArguments", `Invalid view_range [${start}, ${requestedEnd}]: end is before start`);
		}
		let end = requestedEnd === -1 ? total : Math.min(requestedEnd, total);
		let capped = false;
		if (end - start + 1 > this.maxViewLines) {
			end = start + this.maxViewLines - 1;
			capped = true;
		}
		return [start, end, capped];
	}

	private async listDirectory(dir: string, display: string): Promise<string> {
		let entries: Array<string>;
		try {
			entries = await readdir(dir);
		} catch (error) {
			throw toIOFailure(error, `Failed to list ${display}`);
		}

		const dirs: Array<string> = [];
		const files: Array<string> = [];
		for (const name of entries) {
			const entryPath = path.join(dir, name);
			let entryStats: Stats;
			try {
				entryStats = await stat(entryPath);
			} catch {
				// Dangling links are not listed
				continue;
			}
			const isDir = entryStats.isDirectory();
			if (this.guard.isIgnored(entryPath, isDir)) {
				continue;
			}
			if (isDir) {
				dirs.push(`${name}/`);
			} else {
				files.push(`${name} (${formatSize(entryStats.size)})`);
			}
		}
		dirs.sort();
		files.sort();

		let result = `Directory listing for: ${display}\n\n`;
		if (dirs.length > 0) {
			result += `Directories:\n${dirs.map(d => `- ${d}`).join("\n")}\n\n`;
		}
		if (files.length > 0) {
			result += `Files:\n${files.map(f => `- ${f}`).join("\n")}\n`;
		}
		if (dirs.length === 0 && files.length === 0) {
			result += "Directory is empty or all items are ignored";
		}
		return result;
	}

	private async statOrFail(target: string, display: string): Promise<Stats> {
		try {
			return await stat(target);
		} catch (error) {
			if (hasErrnoCode(error, "ENOENT")) {
				throw new ToolError("IOFailure", `File not found: ${display}`, { cause: error });
			}
			throw toIOFailure(error, `Failed to read ${display}`);
		}
	}

	private async readOrFail(target: string, display: string): Promise<Buffer> {
		try {
			return await readFile(target);
		} catch (error) {
			if (hasErrnoCode(error, "ENOENT")) {
				throw new ToolError("IOFailure", `File not found: ${display}`, { cause: error });
			}
			throw toIOFailure(error, `Failed to read ${display}`);
		}
	}
}

function insertText(before: string, patch: { readonly line: number; readonly text: string }, display: string): string {
	const lines = splitLinesKeepEnds(before);
	if (!Number.isInteger(patch.line) || patch.line < 0 || patch.line > lines.length) {
		throw new ToolError(
			"InvalidArguments",
			`Invalid insert_line ${patch.line}: '${display}' has ${lines.length} lines`,
		);
	}
	let head = lines.slice(0, patch.line).join("");
	if (head.length > 0 && !head.endsWith("\n")) {
		head += "\n";
	}
	const inserted = patch.text.endsWith("\n") ? patch.text : `${patch.text}\n`;
	return head + inserted + lines.slice(patch.line).join("");
}

async function exists(target: string): Promise<boolean> {
	try {
		await stat(target);
		return true;
	} catch (error) {
		if (hasErrnoCode(error, "ENOENT")) {
			return false;
		}
		throw toIOFailure(error, "Failed to check path");
	}
}

// =============================================================================
// SECTION: Tool Registration
// =============================================================================

export const TEXT_EDITOR_TOOL_NAME = "text_editor";

const TEXT_EDITOR_DESCRIPTION = `View and modify text files.

Commands:
- view: Show a file with line numbers or list a directory. Long files are cut off; use view_range to page through them.
- create: Create a new file with file_text. Fails if the file exists.
- str_replace: Replace old_str with new_str. old_str must match exactly once, including whitespace.
- insert: Insert new_str after line insert_line (0 inserts at the start of the file).
- delete: Delete a file.
- undo_edit: Revert the last change made to a file.

Every change is shown to the user, who must approve it before it is written.
Paths are relative to the repository root. Files matched by the ignore rules and paths outside the allowed folders are blocked.`;

export const TEXT_EDITOR_PARAMETERS: Record<string, ParameterSpec> = {
	command: {
		type: "string",
		description: "The command to run",
		enum: ["view", "create", "str_replace", "insert", "delete", "undo_edit"],
	},
	path: {
		type: "string",
		description: "File or directory path, relative to the repository root. Use '.' for the root.",
	},
	view_range: {
		type: "array",
		description: "Two 1-based line numbers [start, end] to view; -1 as end reads to the end of the file",
		items: { type: "integer" },
	},
	old_str: { type: "string", description: "Text to replace; must match exactly once" },
	new_str: { type: "string", description: "Replacement text for str_replace, or the text to insert" },
	file_text: { type: "string", description: "Content of the file to create" },
	insert_line: { type: "integer", description: "Line after which to insert new_str (0 = start of file)" },
};

/**
 * Routes a `text_editor` call to the matching File Tool operation.
 */
export async function executeTextEditor(tool: FileTool, args: ToolArgs): Promise<string> {
	const command = requireString(args, "command");
	const filePath = requireString(args, "path");

	switch (command) {
		case "view":
			return tool.view(filePath, readIntegerPair(args, "view_range"));
		case "create":
			return tool.create(filePath, readString(args, "file_text") ?? "");
		case "str_replace":
			return tool.edit(filePath, {
				kind: "replace",
				oldText: requireString(args, "old_str"),
				newText: readString(args, "new_str") ?? "",
			});
		case "insert":
			return tool.edit(filePath, {
				kind: "insert",
				line: requireInteger(args, "insert_line"),
				text: requireString(args, "new_str"),
			});
		case "delete":
			return tool.delete(filePath);
		case "undo_edit":
			return tool.undo(filePath);
		default:
			throw new ToolError("InvalidArguments", `Unknown command '${command}'`);
	}
}

export function registerTextEditorTool(registry: ToolRegistry, tool: FileTool): void {
	registry.register(
		TEXT_EDITOR_TOOL_NAME,
		args => executeTextEditor(tool, args),
		TEXT_EDITOR_DESCRIPTION,
		TEXT_EDITOR_PARAMETERS,
		["command", "path"],
	);
}
