// Init Command
// Creates the project directory with a default config and a starter ignore file

import { initProject } from "../../shared/ProjectConfig";
import { resolve } from "node:path";
import type { Command } from "commander";

export function registerInitCommands(program: Command): void {
	program
		.command("init")
		.description("Create .toolpilot/config.yaml and a starter .toolignore in this directory")
		.option("--repo-path <path>", "Directory to initialize (default: current directory)")
		.action(async (options: { repoPath?: string }) => {
			try {
				const result = await initProject(resolve(options.repoPath ?? process.cwd()));
				console.log(result.createdConfig ? `Created ${result.configPath}` : `Kept existing ${result.configPath}`);
				console.log(result.createdIgnoreFile ? `Created ${result.ignorePath}` : `Kept existing ${result.ignorePath}`);
			} catch (error) {
				console.error("Init failed:", error instanceof Error ? error.message : error);
				process.exit(1);
			}
		});
}
