/**
 * Agent module exports
 */

export {
	AgentLoop,
	DEFAULT_MAX_TURNS,
	DEFAULT_OUTPUT_LIMIT,
	type AgentHooks,
	type AgentLoopOptions,
} from "./AgentLoop";

export { AnthropicTransport, type AnthropicTransportOptions, type MessagesClient } from "./AnthropicTransport";

export { buildSystemPrompt } from "./SystemPrompt";

export { TokenTracker, type TokenStats } from "./TokenTracker";

export type {
	ModelRequest,
	ModelResponse,
	ModelTransport,
	StopReason,
	TokenUsage,
	ToolCall,
	Turn,
} from "./Types";
