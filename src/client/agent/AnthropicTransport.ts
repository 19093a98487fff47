/**
 * Anthropic Transport
 *
 * ModelTransport over the Messages API. The mapping functions are pure so they can be
 * checked without a network.
 */

import { getLog } from "../../shared/logger";
import type { ParameterSpec, ToolSpec } from "../tools/ToolRegistry";
import type { ModelRequest, ModelResponse, ModelTransport, StopReason, ToolCall, Turn } from "./Types";
import Anthropic from "@anthropic-ai/sdk";

const logger = getLog(import.meta);

// =============================================================================
// SECTION: Types
// =============================================================================

/**
 * The parts of a Messages API reply the transport reads.
 */
export type AnthropicReply = {
	readonly content: ReadonlyArray<Anthropic.ContentBlock>;
	readonly stop_reason: string | null;
	readonly usage: {
		readonly input_tokens: number;
		readonly output_tokens: number;
		readonly cache_creation_input_tokens?: number | null;
		readonly cache_read_input_tokens?: number | null;
	};
};

/**
 * The slice of the SDK client used here; `new Anthropic().messages` satisfies it.
 */
export interface MessagesClient {
	create(params: Anthropic.MessageCreateParamsNonStreaming): PromiseLike<AnthropicReply>;
}

export interface AnthropicTransportOptions {
	readonly model: string;
	readonly maxTokens: number;
	/** Marks the system prompt and the last tool as cacheable */
	readonly promptCaching: boolean;
	readonly apiKey?: string;
	readonly client?: MessagesClient;
}

const EPHEMERAL = { type: "ephemeral" } as const;

// =============================================================================
// SECTION: Request mapping
// =============================================================================

function toJsonSchema(spec: ParameterSpec): Record<string, unknown> {
	const schema: Record<string, unknown> = { type: spec.type };
	if (spec.description) {
		schema.description = spec.description;
	}
	if (spec.enum) {
		schema.enum = [...spec.enum];
	}
	if (spec.items) {
		schema.items = toJsonSchema(spec.items);
	}
	return schema;
}

export function toAnthropicTools(specs: ReadonlyArray<ToolSpec>, promptCaching: boolean): Array<Anthropic.Tool> {
	return specs.map((spec, index) => {
		const properties: Record<string, unknown> = {};
		for (const [name, param] of Object.entries(spec.parameters)) {
			properties[name] = toJsonSchema(param);
		}
		const tool: Anthropic.Tool = {
			name: spec.name,
			description: spec.description,
			input_schema: { type: "object", properties, required: [...spec.required] },
		};
		// A breakpoint on the last tool caches the whole tool list
		if (promptCaching && index === specs.length - 1) {
			tool.cache_control = EPHEMERAL;
		}
		return tool;
	});
}

export function toAnthropicSystem(prompt: string, promptCaching: boolean): string | Array<Anthropic.TextBlockParam> {
	if (!promptCaching) {
		return prompt;
	}
	return [{ type: "text", text: prompt, cache_control: EPHEMERAL }];
}

/**
 * Maps the conversation onto alternating messages. User text and tool results that follow
 * each other travel in one user message; tool calls ride on the assistant message.
 */
export function toAnthropicMessages(turns: ReadonlyArray<Turn>): Array<Anthropic.MessageParam> {
	const messages: Array<Anthropic.MessageParam> = [];
	let userBlocks: Array<Anthropic.ContentBlockParam> = [];

	const flushUser = () => {
		if (userBlocks.length === 0) {
			return;
		}
		const [first] = userBlocks;
		messages.push({
			role: "user",
			content: userBlocks.length === 1 && first.type === "text" ? first.text : userBlocks,
		});
		userBlocks = [];
	};

	for (const turn of turns) {
		switch (turn.role) {
			case "user":
				userBlocks.push({ type: "text", text: turn.content });
				break;
			case "tool": {
				const block: Anthropic.ToolResultBlockParam = {
					type: "tool_result",
					tool_use_id: turn.toolCallId,
					content: turn.content,
				};
				if (turn.isError) {
					block.is_error = true;
				}
				userBlocks.push(block);
				break;
			}
			case "assistant": {
				flushUser();
				const content: Array<Anthropic.ContentBlockParam> = [];
				// The API rejects empty text blocks
				if (turn.content) {
					content.push({ type: "text", text: turn.content });
				}
				for (const call of turn.toolCalls) {
					content.push({ type: "tool_use", id: call.id, name: call.name, input: call.arguments });
				}
				if (content.length > 0) {
					messages.push({ role: "assistant", content });
				}
				break;
			}
		}
	}
	flushUser();
	return messages;
}

// =============================================================================
// SECTION: Response mapping
// =============================================================================

export function toStopReason(reason: string | null): StopReason {
	switch (reason) {
		case "end_turn":
		case "tool_use":
		case "max_tokens":
		case "stop_sequence":
		case "refusal":
			return reason;
		default:
			return "other";
	}
}

export function fromAnthropicReply(reply: AnthropicReply): ModelResponse {
	const texts: Array<string> = [];
	const toolCalls: Array<ToolCall> = [];
	for (const block of reply.content) {
		if (block.type === "text") {
			texts.push(block.text);
		} else if (block.type === "tool_use") {
			toolCalls.push({ id: block.id, name: block.name, arguments: block.input });
		}
	}
	return {
		text: texts.join("\n"),
		toolCalls,
		stopReason: toStopReason(reply.stop_reason),
		usage: {
			inputTokens: reply.usage.input_tokens,
			outputTokens: reply.usage.output_tokens,
			cacheCreationInputTokens: reply.usage.cache_creation_input_tokens ?? 0,
			cacheReadInputTokens: reply.usage.cache_read_input_tokens ?? 0,
		},
	};
}

// =============================================================================
// SECTION: Transport
// =============================================================================

export class AnthropicTransport implements ModelTransport {
	private readonly client: MessagesClient;
	private readonly model: string;
	private readonly maxTokens: number;
	private readonly promptCaching: boolean;

	constructor(options: AnthropicTransportOptions) {
		this.client = options.client ?? new Anthropic({ apiKey: options.apiKey }).messages;
		this.model = options.model;
		this.maxTokens = options.maxTokens;
		this.promptCaching = options.promptCaching;
	}

	async send(request: ModelRequest): Promise<ModelResponse> {
		const params: Anthropic.MessageCreateParamsNonStreaming = {
			model: this.model,
			max_tokens: this.maxTokens,
			system: toAnthropicSystem(request.system, this.promptCaching),
			messages: toAnthropicMessages(request.conversation),
		};
		if (request.tools.length > 0) {
			params.tools = toAnthropicTools(request.tools, this.promptCaching);
		}

		logger.debug("Sending %d messages to %s", params.messages.length, this.model);
		const response = fromAnthropicReply(await this.client.create(params));

		const { cacheCreationInputTokens, cacheReadInputTokens } = response.usage;
		if (cacheCreationInputTokens > 0 || cacheReadInputTokens > 0) {
			logger.info("Prompt cache: %d tokens written, %d read", cacheCreationInputTokens, cacheReadInputTokens);
		}
		return response;
	}
}
