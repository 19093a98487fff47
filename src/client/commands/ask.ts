// Ask Command
// One-shot request: runs the agent on a single message and prints the answer

import { errorMessage } from "../../shared/errors";
import { getLog, logError } from "../../shared/logger";
import { type AgentCommandOptions, addAgentOptions, createAgentSession, resolveSettings } from "./AgentSession";
import { COLORS, createReadlineDecider, createTerminalHooks, printColored } from "./Terminal";
import readline from "node:readline/promises";
import type { Command } from "commander";

const logger = getLog(import.meta);

async function ask(words: Array<string>, options: AgentCommandOptions): Promise<void> {
	const message = words.join(" ").trim();
	if (!message) {
		printColored(COLORS.red, "[Error]", "Message must not be empty");
		process.exit(1);
	}

	// Only used when a change needs confirming
	const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
	const closed = new AbortController();
	rl.on("close", () => closed.abort());

	try {
		const session = await createAgentSession({
			settings: await resolveSettings(options),
			decide: createReadlineDecider(rl, closed.signal),
			hooks: createTerminalHooks(),
		});
		await session.agent.run(message);
		console.log(`${COLORS.dim}${session.tracker.format()}${COLORS.reset}`);
	} catch (error) {
		logError(logger, error, "Request failed");
		printColored(COLORS.red, "[Error]", errorMessage(error));
		process.exitCode = 1;
	} finally {
		rl.close();
	}
}

export function registerAskCommands(program: Command): void {
	addAgentOptions(
		program.command("ask").description("Send one message to the agent and print the answer").argument("<message...>", "Message to send"),
	).action(async (words: Array<string>, options: AgentCommandOptions) => {
		await ask(words, options);
	});
}
