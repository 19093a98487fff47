// ---- The model ----
// Provider-agnostic interfaces between the agent loop and a model transport.

import type { ToolSpec } from "../tools/ToolRegistry";

export type ToolCall = {
	readonly id: string;
	readonly name: string;
	readonly arguments: unknown;
};

// -- Conversation --

export type UserTurn = { readonly role: "user"; readonly content: string };

export type AssistantTurn = {
	readonly role: "assistant";
	readonly content: string;
	readonly toolCalls: ReadonlyArray<ToolCall>;
};

// Answers exactly one ToolCall of the preceding assistant turn
export type ToolTurn = {
	readonly role: "tool";
	readonly toolCallId: string;
	readonly toolName: string;
	readonly content: string;
	readonly isError: boolean;
};

export type Turn = UserTurn | AssistantTurn | ToolTurn;

// -- Transport --

/**
 * Why the model stopped. `stop_sequence` and `refusal` end the run even when the
 * response also carries tool calls.
 */
export type StopReason = "end_turn" | "tool_use" | "max_tokens" | "stop_sequence" | "refusal" | "other";

export type TokenUsage = {
	readonly inputTokens: number;
	readonly outputTokens: number;
	readonly cacheCreationInputTokens: number;
	readonly cacheReadInputTokens: number;
};

export type ModelRequest = {
	readonly system: string;
	readonly conversation: ReadonlyArray<Turn>;
	readonly tools: ReadonlyArray<ToolSpec>;
};

export type ModelResponse = {
	readonly text: string;
	readonly toolCalls: ReadonlyArray<ToolCall>;
	readonly stopReason: StopReason;
	readonly usage: TokenUsage;
};

export interface ModelTransport {
	send(request: ModelRequest): Promise<ModelResponse>;
}
