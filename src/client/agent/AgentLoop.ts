/**
 * Agent Loop
 *
 * Sends the conversation to the model, runs the tool calls it asks for through the
 * registry and feeds the results back, until the model answers in plain text.
 *
 * Invariant: every tool call in an assistant turn is answered by exactly one tool turn
 * before the next model request.
 */

import { TurnLimitExceededError } from "../../shared/errors";
import { getLog } from "../../shared/logger";
import { limitOutput } from "../../shared/OutputLimiter";
import type { ToolRegistry, ToolResult } from "../tools/ToolRegistry";
import type { ModelResponse, ModelTransport, StopReason, TokenUsage, ToolCall, Turn } from "./Types";

const logger = getLog(import.meta);

export const DEFAULT_MAX_TURNS = 25;
export const DEFAULT_OUTPUT_LIMIT = 10000;

// Stop reasons that end the run even when tool calls are pending
const STOP_DIRECTIVES: ReadonlySet<StopReason> = new Set(["stop_sequence", "refusal"]);

/**
 * Observers for showing progress. None of them can change the outcome of a run.
 */
export interface AgentHooks {
	readonly onAssistantText?: (text: string) => void;
	readonly onToolCall?: (call: ToolCall) => void;
	readonly onToolResult?: (call: ToolCall, result: ToolResult) => void;
	readonly onUsage?: (usage: TokenUsage) => void;
}

export interface AgentLoopOptions {
	readonly transport: ModelTransport;
	readonly registry: ToolRegistry;
	readonly systemPrompt: string;
	/** Model requests allowed for one user message */
	readonly maxTurns?: number;
	/** Character limit for each tool result fed back to the model */
	readonly outputLimit?: number;
	readonly hooks?: AgentHooks;
}

export function notExecutedMessage(stopReason: StopReason): string {
	return `Tool call not executed: the model stopped with '${stopReason}'`;
}

export class AgentLoop {
	private readonly transport: ModelTransport;
	private readonly registry: ToolRegistry;
	private readonly systemPrompt: string;
	private readonly maxTurns: number;
	private readonly outputLimit: number;
	private readonly hooks: AgentHooks;
	private turns: Array<Turn> = [];

	constructor(options: AgentLoopOptions) {
		this.transport = options.transport;
		this.registry = options.registry;
		this.systemPrompt = options.systemPrompt;
		this.maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
		this.outputLimit = options.outputLimit ?? DEFAULT_OUTPUT_LIMIT;
		this.hooks = options.hooks ?? {};
	}

	get conversation(): ReadonlyArray<Turn> {
		return this.turns;
	}

	/** Forgets the conversation so the next run starts fresh */
	reset(): void {
		this.turns = [];
	}

	/**
	 * Handles one user message and resolves with the model's final answer.
	 *
	 * @throws TurnLimitExceededError when the model keeps calling tools past `maxTurns`
	 */
	async run(userMessage: string): Promise<string> {
		this.turns.push({ role: "user", content: userMessage });

		for (let turn = 1; turn <= this.maxTurns; turn++) {
			const response = await this.request();
			this.hooks.onUsage?.(response.usage);
			if (response.text) {
				this.hooks.onAssistantText?.(response.text);
			}
			this.turns.push({ role: "assistant", content: response.text, toolCalls: response.toolCalls });

			if (response.toolCalls.length === 0) {
				logger.info("Final answer after %d model turns (stop reason %s)", turn, response.stopReason);
				return response.text;
			}

			if (STOP_DIRECTIVES.has(response.stopReason)) {
				logger.warn("Model stopped with %s; skipping %d tool calls", response.stopReason, response.toolCalls.length);
				for (const call of response.toolCalls) {
					this.answer(call, { output: notExecutedMessage(response.stopReason), isError: true });
				}
				return response.text;
			}

			for (const call of response.toolCalls) {
				this.hooks.onToolCall?.(call);
				const result = await this.registry.dispatch(call.name, call.arguments);
				this.answer(call, result);
			}
		}

		logger.warn("Turn limit of %d reached", this.maxTurns);
		throw new TurnLimitExceededError(this.maxTurns);
	}

	/**
	 * Sends the conversation. A failed request leaves no unanswered user turn behind, so the
	 * next run starts from a well-formed conversation.
	 */
	private async request(): Promise<ModelResponse> {
		try {
			return await this.transport.send({
				system: this.systemPrompt,
				conversation: this.turns.slice(),
				tools: this.registry.getToolSpecs(),
			});
		} catch (error) {
			const last = this.turns[this.turns.length - 1];
			if (last?.role === "user") {
				this.turns.pop();
			}
			throw error;
		}
	}

	private answer(call: ToolCall, result: ToolResult): void {
		const limited: ToolResult = { ...result, output: limitOutput(result.output, this.outputLimit) };
		this.turns.push({
			role: "tool",
			toolCallId: call.id,
			toolName: call.name,
			content: limited.output,
			isError: limited.isError,
		});
		this.hooks.onToolResult?.(call, limited);
	}
}
