// toolpilot CLI
// Usage: toolpilot [command]

import { registerAskCommands, registerChatCommands, registerInitCommands, registerToolsCommands } from "./commands";
import { Command } from "commander";

// =============================================================================
// SECTION: CLI
// Commander-based CLI with subcommands
// =============================================================================

export const VERSION = "0.1.0";

export function createProgram(): Command {
	const program = new Command();
	program
		.name("toolpilot")
		.description("Command-line agent with guarded local file tools")
		.version(VERSION);

	registerChatCommands(program);
	registerAskCommands(program);
	registerToolsCommands(program);
	registerInitCommands(program);
	return program;
}
