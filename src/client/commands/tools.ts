// Tools Command
// Lists the tools the agent advertises to the model

import { resolveRepoPath } from "../../shared/ProjectRoot";
import { createToolkit, type ToolSpec } from "../tools";
import { COLORS } from "./Terminal";
import type { Command } from "commander";

/**
 * Renders a tool's name, the first line of its description and its parameters.
 */
export function formatToolSpec(spec: ToolSpec): string {
	const [summary] = spec.description.split("\n");
	const lines = [`${COLORS.bold}${spec.name}${COLORS.reset} - ${summary}`];
	for (const [name, param] of Object.entries(spec.parameters)) {
		const required = spec.required.includes(name) ? " (required)" : "";
		const choices = param.enum ? ` [${param.enum.join(", ")}]` : "";
		lines.push(`  ${name}: ${param.type}${choices}${required}`);
	}
	return lines.join("\n");
}

export function registerToolsCommands(program: Command): void {
	program
		.command("tools")
		.description("List the tools available to the agent")
		.option("--repo-path <path>", "Repository the tools may access")
		.action(async (options: { repoPath?: string }) => {
			const { registry } = await createToolkit({
				repoPath: await resolveRepoPath(options.repoPath),
				// Listing never changes a file
				decide: async () => "no",
			});
			for (const spec of registry.getToolSpecs()) {
				console.log(formatToolSpec(spec));
				console.log();
			}
		});
}
