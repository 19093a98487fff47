// Tools Module Index
// Builds the guarded tool set for a repository and re-exports the pieces

import { loadProjectConfig, type ProjectConfig } from "../../shared/ProjectConfig";
import { BackupStore } from "./BackupStore";
import { ConfirmationGate, type DecisionProvider } from "./ConfirmationGate";
import { FileTool, registerTextEditorTool } from "./FileTool";
import { createPathPolicyFromConfig, PathGuard } from "./PathGuard";
import { registerSearchTool, SearchTool } from "./SearchTool";
import { ToolRegistry } from "./ToolRegistry";
import path from "node:path";

export { BackupStore } from "./BackupStore";
export { CONFIRMATION_QUESTION, ConfirmationGate, type DecisionProvider, type ProposedChange } from "./ConfirmationGate";
export { FileTool, TEXT_EDITOR_TOOL_NAME } from "./FileTool";
export { PathGuard, type PathPolicy } from "./PathGuard";
export { SearchTool, SEARCH_TOOL_NAME } from "./SearchTool";
export { ToolRegistry, type ToolResult, type ToolSpec } from "./ToolRegistry";

export interface ToolkitOptions {
	readonly repoPath: string;
	readonly decide: DecisionProvider;
	/** Loaded from `.toolpilot/config.yaml` under repoPath when omitted */
	readonly projectConfig?: ProjectConfig;
}

/**
 * Everything one agent session needs. The guard, store and gate are shared by the tools.
 */
export interface Toolkit {
	readonly registry: ToolRegistry;
	readonly guard: PathGuard;
	readonly backups: BackupStore;
	readonly gate: ConfirmationGate;
	readonly projectConfig: ProjectConfig;
}

/**
 * Creates the path policy, backup store and confirmation gate for a repository and
 * registers the `text_editor` and `file_search` tools over them.
 */
export async function createToolkit(options: ToolkitOptions): Promise<Toolkit> {
	const projectConfig = options.projectConfig ?? (await loadProjectConfig(options.repoPath));
	const guard = new PathGuard(await createPathPolicyFromConfig(options.repoPath, projectConfig));
	const backups = new BackupStore({
		backupDir: projectConfig.backupDir ? path.resolve(guard.primaryRoot, projectConfig.backupDir) : undefined,
	});
	const gate = new ConfirmationGate(options.decide);

	const registry = new ToolRegistry();
	registerTextEditorTool(
		registry,
		new FileTool({ guard, backups, gate, maxViewLines: projectConfig.maxViewLines }),
	);
	registerSearchTool(registry, new SearchTool(guard));

	return { registry, guard, backups, gate, projectConfig };
}
