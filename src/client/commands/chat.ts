/**
 * Chat Command
 *
 * Interactive REPL: one agent loop per session, conversation kept between messages.
 */

import { errorMessage, TurnLimitExceededError } from "../../shared/errors";
import { getLog, logError } from "../../shared/logger";
import { type AgentCommandOptions, type AgentSession, addAgentOptions, createAgentSession, resolveSettings } from "./AgentSession";
import { COLORS, createReadlineDecider, createTerminalHooks, printColored } from "./Terminal";
import readline from "node:readline/promises";
import type { Command } from "commander";

const logger = getLog(import.meta);

export type ReplAction = "quit" | "clear" | "reset" | "help" | "usage" | "unknown" | "empty" | "message";

/**
 * Classifies a line of REPL input.
 */
export function parseReplInput(input: string): ReplAction {
	const trimmed = input.trim();
	if (!trimmed) {
		return "empty";
	}
	if (!trimmed.startsWith("/")) {
		return "message";
	}
	switch (trimmed.toLowerCase()) {
		case "/quit":
		case "/exit":
		case "/q":
			return "quit";
		case "/clear":
		case "/cls":
			return "clear";
		case "/reset":
			return "reset";
		case "/help":
		case "/?":
			return "help";
		case "/usage":
			return "usage";
		default:
			return "unknown";
	}
}

function printHelp(): void {
	console.log();
	console.log(`${COLORS.bold}Available Commands:${COLORS.reset}`);
	console.log("  /quit, /exit, /q  - Exit the session");
	console.log("  /clear, /cls      - Clear the screen");
	console.log("  /reset            - Start a new conversation");
	console.log("  /usage            - Show token usage");
	console.log("  /help, /?         - Show this help");
	console.log();
}

function printBanner(session: AgentSession): void {
	const { settings, toolkit } = session;
	console.log(`${COLORS.bold}toolpilot${COLORS.reset}`);
	console.log(`Model: ${settings.model}, max tokens: ${settings.maxTokens}`);
	console.log(`Repository: ${toolkit.guard.primaryRoot}`);
	if (!settings.promptCaching) {
		console.log("Prompt caching: disabled");
	}
	console.log(`Tools: ${toolkit.registry.listTools().join(", ")}`);
	console.log();
	console.log("Type your message and press Enter. /help lists the commands.");
	console.log();
}

/**
 * Sends one message. A turn-limit stop ends the request and starts a fresh conversation.
 */
async function handleMessage(session: AgentSession, message: string): Promise<void> {
	try {
		await session.agent.run(message);
	} catch (error) {
		if (error instanceof TurnLimitExceededError) {
			printColored(COLORS.red, "[Error]", `${error.message}. Starting a new conversation.`);
			session.agent.reset();
			return;
		}
		logError(logger, error, "Request failed");
		printColored(COLORS.red, "[Error]", errorMessage(error));
		return;
	}
	console.log(`${COLORS.dim}${session.tracker.format()}${COLORS.reset}`);
}

/**
 * Starts the interactive REPL session.
 */
async function startChat(options: AgentCommandOptions): Promise<void> {
	const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
	const closed = new AbortController();
	rl.on("close", () => closed.abort());

	let session: AgentSession;
	try {
		session = await createAgentSession({
			settings: await resolveSettings(options),
			decide: createReadlineDecider(rl, closed.signal),
			hooks: createTerminalHooks(),
		});
	} catch (error) {
		rl.close();
		logError(logger, error, "Failed to start chat");
		printColored(COLORS.red, "[Error]", errorMessage(error));
		process.exit(1);
	}

	printBanner(session);

	while (!closed.signal.aborted) {
		let input: string;
		try {
			input = await rl.question(`${COLORS.cyan}You:${COLORS.reset} `, { signal: closed.signal });
		} catch (error) {
			if (closed.signal.aborted) {
				break;
			}
			throw error;
		}

		switch (parseReplInput(input)) {
			case "quit":
				rl.close();
				break;
			case "clear":
				console.clear();
				break;
			case "reset":
				session.agent.reset();
				printColored(COLORS.yellow, "[Info]", "Conversation cleared");
				break;
			case "help":
				printHelp();
				break;
			case "usage":
				console.log(session.tracker.format());
				break;
			case "unknown":
				printColored(COLORS.yellow, "[Info]", `Unknown command: ${input.trim()}`);
				break;
			case "message":
				await handleMessage(session, input.trim());
				break;
			case "empty":
				break;
		}
	}

	console.log("Goodbye!");
}

// =============================================================================
// SECTION: Command Registration
// =============================================================================

/**
 * Registers the `chat` command, the default when no command is given.
 */
export function registerChatCommands(program: Command): void {
	addAgentOptions(
		program.command("chat", { isDefault: true }).description("Interactive agent session with local file tools"),
	).action(async (options: AgentCommandOptions) => {
		await startChat(options);
	});
}
