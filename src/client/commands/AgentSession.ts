/**
 * Agent Session
 *
 * Turns command-line flags and environment config into a ready agent: toolkit, transport,
 * loop and token tracker. Shared by `chat` and `ask`.
 */

import { type Config, getConfig } from "../../shared/config";
import { resolveRepoPath } from "../../shared/ProjectRoot";
import {
	type AgentHooks,
	AgentLoop,
	AnthropicTransport,
	buildSystemPrompt,
	type ModelTransport,
	TokenTracker,
} from "../agent";
import { createToolkit, type DecisionProvider, type Toolkit } from "../tools";
import { type Command, InvalidArgumentError } from "commander";

// =============================================================================
// SECTION: Types
// =============================================================================

/**
 * Flags shared by the commands that talk to the model, as Commander parses them.
 */
export interface AgentCommandOptions {
	readonly model?: string;
	readonly maxTokens?: number;
	/** false only when --no-prompt-caching was given */
	readonly promptCaching?: boolean;
	readonly outputLimit?: number;
	readonly maxTurns?: number;
	readonly repoPath?: string;
}

export interface SessionSettings {
	readonly repoPath: string;
	readonly model: string;
	readonly maxTokens: number;
	readonly promptCaching: boolean;
	readonly outputLimit: number;
	readonly maxTurns: number;
}

export interface AgentSession {
	readonly agent: AgentLoop;
	readonly toolkit: Toolkit;
	readonly tracker: TokenTracker;
	readonly settings: SessionSettings;
}

export interface CreateSessionOptions {
	readonly settings: SessionSettings;
	readonly decide: DecisionProvider;
	readonly hooks?: AgentHooks;
	/** Defaults to the Anthropic transport */
	readonly transport?: ModelTransport;
	readonly config?: Config;
}

// =============================================================================
// SECTION: Options
// =============================================================================

export function parsePositiveInt(value: string): number {
	const parsed = Number(value);
	if (!/^\d+$/.test(value.trim()) || !Number.isInteger(parsed) || parsed < 1) {
		throw new InvalidArgumentError("Must be a positive integer.");
	}
	return parsed;
}

/**
 * Adds the model and tool flags to a command.
 */
export function addAgentOptions(command: Command): Command {
	return command
		.option("-m, --model <name>", "Model to use (default: TOOLPILOT_MODEL)")
		.option("--max-tokens <n>", "Maximum tokens per model response", parsePositiveInt)
		.option("--no-prompt-caching", "Disable prompt caching")
		.option("--output-limit <chars>", "Character limit for each tool result", parsePositiveInt)
		.option("--max-turns <n>", "Model requests allowed for one message", parsePositiveInt)
		.option("--repo-path <path>", "Repository the tools may access (default: project root or current directory)");
}

/**
 * Flags win over the environment config.
 */
export async function resolveSettings(options: AgentCommandOptions, config: Config = getConfig()): Promise<SessionSettings> {
	return {
		repoPath: await resolveRepoPath(options.repoPath),
		model: options.model ?? config.TOOLPILOT_MODEL,
		maxTokens: options.maxTokens ?? config.TOOLPILOT_MAX_TOKENS,
		promptCaching: options.promptCaching === false ? false : config.TOOLPILOT_PROMPT_CACHING,
		outputLimit: options.outputLimit ?? config.TOOLPILOT_OUTPUT_LIMIT,
		maxTurns: options.maxTurns ?? config.TOOLPILOT_MAX_TURNS,
	};
}

// =============================================================================
// SECTION: Session
// =============================================================================

export async function createAgentSession(options: CreateSessionOptions): Promise<AgentSession> {
	const { settings } = options;
	const config = options.config ?? getConfig();
	const toolkit = await createToolkit({ repoPath: settings.repoPath, decide: options.decide });

	let transport = options.transport;
	if (!transport) {
		if (!config.ANTHROPIC_API_KEY) {
			throw new Error("ANTHROPIC_API_KEY is not set. Export it or add it to .env.");
		}
		transport = new AnthropicTransport({
			apiKey: config.ANTHROPIC_API_KEY,
			model: settings.model,
			maxTokens: settings.maxTokens,
			promptCaching: settings.promptCaching,
		});
	}

	const tracker = new TokenTracker();
	const hooks = options.hooks ?? {};
	const agent = new AgentLoop({
		transport,
		registry: toolkit.registry,
		systemPrompt: buildSystemPrompt(toolkit.guard.primaryRoot, toolkit.guard.policy.allowedRoots.slice(1)),
		maxTurns: settings.maxTurns,
		outputLimit: settings.outputLimit,
		hooks: {
			...hooks,
			onUsage: usage => {
				tracker.record(usage);
				hooks.onUsage?.(usage);
			},
		},
	});

	return { agent, toolkit, tracker, settings };
}
