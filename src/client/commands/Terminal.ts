/**
 * Terminal output for agent sessions: coloured prefixes, tool activity and change previews.
 * Everything goes to stdout; logs go to stderr.
 */

import type { AgentHooks, ToolCall } from "../agent";
import type { DecisionProvider, ProposedChange, ToolResult } from "../tools";
import type { Interface } from "node:readline/promises";

// ANSI colors for terminal output
export const COLORS = {
	reset: "\x1b[0m",
	bold: "\x1b[1m",
	dim: "\x1b[2m",
	cyan: "\x1b[36m",
	green: "\x1b[32m",
	yellow: "\x1b[33m",
	red: "\x1b[31m",
	blue: "\x1b[34m",
};

const MAX_ARGUMENT_CHARS = 200;
const MAX_RESULT_CHARS = 500;

/**
 * Prints a colored message to the console.
 */
export function printColored(color: string, prefix: string, message: string): void {
	console.log(`${color}${prefix}${COLORS.reset} ${message}`);
}

function truncate(text: string, max: number): string {
	return text.length > max ? `${text.slice(0, max)}... [truncated]` : text;
}

/**
 * One line per argument, long values cut short.
 */
export function formatToolCall(call: ToolCall): string {
	let text = call.name;
	if (call.arguments && typeof call.arguments === "object" && !Array.isArray(call.arguments)) {
		for (const [key, value] of Object.entries(call.arguments)) {
			const rendered = typeof value === "string" ? value : JSON.stringify(value);
			text += `\n  - ${key}: ${truncate(rendered, MAX_ARGUMENT_CHARS)}`;
		}
	}
	return text;
}

export function formatToolResult(result: ToolResult): { prefix: string; color: string; text: string } {
	const text = truncate(result.output, MAX_RESULT_CHARS);
	if (result.code === "UserRejected") {
		return { prefix: "[Declined]", color: COLORS.yellow, text };
	}
	if (result.isError) {
		return { prefix: "[Error]", color: COLORS.red, text };
	}
	return { prefix: "[Result]", color: COLORS.green, text };
}

/**
 * Colours the diff of an edit or undo; other previews are shown as they are.
 */
export function formatChangePreview(change: ProposedChange): string {
	const header = `${COLORS.bold}Proposed ${change.kind}: ${change.path}${COLORS.reset}`;
	// Edits and undos are previewed as unified diffs; creates show the raw content
	if (change.kind !== "edit" && change.kind !== "undo") {
		return `${header}\n${change.preview}`;
	}
	const lines = change.preview.split("\n").map(line => {
		if (line.startsWith("+") && !line.startsWith("+++")) {
			return `${COLORS.green}${line}${COLORS.reset}`;
		}
		if (line.startsWith("-") && !line.startsWith("---")) {
			return `${COLORS.red}${line}${COLORS.reset}`;
		}
		if (line.startsWith("@@")) {
			return `${COLORS.cyan}${line}${COLORS.reset}`;
		}
		return line;
	});
	return `${header}\n${lines.join("\n")}`;
}

/**
 * Hooks that print the assistant's text and every tool call and result.
 */
export function createTerminalHooks(): AgentHooks {
	return {
		onAssistantText: text => {
			console.log(`${COLORS.green}Assistant:${COLORS.reset} ${text}`);
		},
		onToolCall: call => {
			printColored(COLORS.blue, "[Tool]", formatToolCall(call));
		},
		onToolResult: (_call, result) => {
			const { prefix, color, text } = formatToolResult(result);
			printColored(color, prefix, text);
		},
	};
}

/**
 * Asks for confirmations on the given readline interface. Once the input is closed every
 * change is declined.
 */
export function createReadlineDecider(rl: Interface, signal: AbortSignal): DecisionProvider {
	return async (change, question) => {
		console.log();
		console.log(formatChangePreview(change));
		console.log();
		if (signal.aborted) {
			return "no";
		}
		try {
			return await rl.question(`${COLORS.yellow}${question}${COLORS.reset} `, { signal });
		} catch (error) {
			if (signal.aborted) {
				return "no";
			}
			throw error;
		}
	};
}
