import { hasErrnoCode } from "./errors";
import { PROJECT_DIR } from "./ProjectRoot";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { parse, stringify } from "yaml";
import { z } from "zod";

const CONFIG_FILE = "config.yaml";

export const ProjectConfigSchema = z.object({
	// Extra roots the tools may touch, relative to the project root or absolute
	allowedFolders: z.array(z.string().min(1)).default([]),
	ignoreFile: z.string().min(1).default(".toolignore"),
	// Empty string turns the on-disk backup mirror off
	backupDir: z.string().default(`${PROJECT_DIR}/backups`),
	caseSensitive: z.boolean().default(true),
	maxViewLines: z.number().int().positive().default(250),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

export const DEFAULT_IGNORE_FILE_CONTENT = `# Paths the agent may not read or modify (gitignore-style, last match wins)
.git/
node_modules/
.env
.env.*
*.pem
*.key
`;

export function getProjectConfigPath(projectRoot: string): string {
	return join(projectRoot, PROJECT_DIR, CONFIG_FILE);
}

export function defaultProjectConfig(): ProjectConfig {
	return ProjectConfigSchema.parse({});
}

/**
 * Parses the YAML text of a project config. An empty document yields the defaults.
 */
export function parseProjectConfig(text: string): ProjectConfig {
	const raw: unknown = parse(text);
	const result = ProjectConfigSchema.safeParse(raw ?? {});
	if (!result.success) {
		const issues = result.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
		throw new Error(`Invalid project config: ${issues.join("; ")}`);
	}
	return result.data;
}

/**
 * Loads `.toolpilot/config.yaml` from the project root, falling back to the defaults when
 * the file does not exist.
 */
export async function loadProjectConfig(projectRoot: string): Promise<ProjectConfig> {
	let text: string;
	try {
		text = await readFile(getProjectConfigPath(projectRoot), "utf8");
	} catch (error) {
		if (hasErrnoCode(error, "ENOENT")) {
			return defaultProjectConfig();
		}
		throw error;
	}
	return parseProjectConfig(text);
}

export interface InitResult {
	readonly configPath: string;
	readonly ignorePath: string;
	readonly createdConfig: boolean;
	readonly createdIgnoreFile: boolean;
}

async function writeIfMissing(filePath: string, content: string): Promise<boolean> {
	try {
		await writeFile(filePath, content, { encoding: "utf8", flag: "wx" });
		return true;
	} catch (error) {
		if (hasErrnoCode(error, "EEXIST")) {
			return false;
		}
		throw error;
	}
}

/**
 * Creates the project directory with a default config and a starter ignore file.
 * Existing files are left untouched.
 */
export async function initProject(projectRoot: string): Promise<InitResult> {
	const config = defaultProjectConfig();
	await mkdir(join(projectRoot, PROJECT_DIR), { recursive: true });

	const configPath = getProjectConfigPath(projectRoot);
	const ignorePath = join(projectRoot, config.ignoreFile);
	const createdConfig = await writeIfMissing(configPath, stringify(config));
	const createdIgnoreFile = await writeIfMissing(ignorePath, DEFAULT_IGNORE_FILE_CONTENT);
	return { configPath, ignorePath, createdConfig, createdIgnoreFile };
}
