import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse as parseDotenv } from "dotenv";
import { z } from "zod";

/**
 * Boolean schema that accepts string "true"/"false" or boolean values
 */
const BooleanSchema = (defaultValue: boolean) =>
	z.union([z.boolean(), z.string().transform(s => s === "true" || s === "1")]).default(defaultValue);

/**
 * Positive integer schema that accepts numeric strings
 */
const PositiveIntSchema = (defaultValue: number) => z.coerce.number().int().positive().default(defaultValue);

/**
 * Configuration schema definition
 */
const configSchema = {
	// Anthropic API key; only required by commands that talk to the model
	ANTHROPIC_API_KEY: z.string().optional(),

	// Model used for every request
	TOOLPILOT_MODEL: z.string().default("claude-sonnet-4-20250514"),

	// Maximum output tokens for a single model response
	TOOLPILOT_MAX_TOKENS: PositiveIntSchema(4096),

	// Model requests allowed for one user message before the loop aborts
	TOOLPILOT_MAX_TURNS: PositiveIntSchema(25),

	// Character limit applied to every tool result fed back to the model
	TOOLPILOT_OUTPUT_LIMIT: PositiveIntSchema(10000),

	// Mark the system prompt and tool list as cacheable
	TOOLPILOT_PROMPT_CACHING: BooleanSchema(true),

	// Enable debug logging
	DEBUG: BooleanSchema(false),

	// Log level for pino logger
	LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("warn"),
};

/**
 * Infer the config type from the schema
 */
type ConfigSchema = typeof configSchema;
export type Config = {
	[K in keyof ConfigSchema]: z.infer<ConfigSchema[K]>;
};

/**
 * Load a .env file from a path, returning an empty object if the file doesn't exist.
 */
function loadEnvFile(path: string): Record<string, string> {
	try {
		return parseDotenv(readFileSync(path, "utf-8"));
	} catch {
		return {};
	}
}

/**
 * Load environment variables from .env files.
 * Priority (highest to lowest):
 * 1. Process environment variables (e.g., from shell)
 * 2. .env in current working directory (project-level)
 * 3. ~/.toolpilot/.env (user-level)
 */
function loadEnvFiles(): Record<string, string> {
	const userEnv = loadEnvFile(join(homedir(), ".toolpilot", ".env"));
	const localEnv = loadEnvFile(join(process.cwd(), ".env"));
	return { ...userEnv, ...localEnv };
}

/**
 * Parse environment variables and return validated config
 */
function createConfig(): Config {
	const envFromFiles = loadEnvFiles();

	// Process env takes priority over .env files
	function getEnvValue(key: string): string | undefined {
		const envValue = process.env[key] ?? envFromFiles[key];
		// Treat empty string as undefined so defaults apply
		return envValue === "" ? undefined : envValue;
	}

	return {
		ANTHROPIC_API_KEY: configSchema.ANTHROPIC_API_KEY.parse(getEnvValue("ANTHROPIC_API_KEY")),
		TOOLPILOT_MODEL: configSchema.TOOLPILOT_MODEL.parse(getEnvValue("TOOLPILOT_MODEL")),
		TOOLPILOT_MAX_TOKENS: configSchema.TOOLPILOT_MAX_TOKENS.parse(getEnvValue("TOOLPILOT_MAX_TOKENS")),
		TOOLPILOT_MAX_TURNS: configSchema.TOOLPILOT_MAX_TURNS.parse(getEnvValue("TOOLPILOT_MAX_TURNS")),
		TOOLPILOT_OUTPUT_LIMIT: configSchema.TOOLPILOT_OUTPUT_LIMIT.parse(getEnvValue("TOOLPILOT_OUTPUT_LIMIT")),
		TOOLPILOT_PROMPT_CACHING: configSchema.TOOLPILOT_PROMPT_CACHING.parse(getEnvValue("TOOLPILOT_PROMPT_CACHING")),
		DEBUG: configSchema.DEBUG.parse(getEnvValue("DEBUG")),
		LOG_LEVEL: configSchema.LOG_LEVEL.parse(getEnvValue("LOG_LEVEL")),
	};
}

/**
 * Cached config instance
 */
let currentConfig: Config | undefined;

/**
 * Gets the current configuration object.
 * Config is created on first access and cached.
 */
export function getConfig(): Config {
	if (!currentConfig) {
		currentConfig = createConfig();
	}
	return currentConfig;
}

/**
 * Resets the config cache (useful for testing)
 */
export function resetConfig(): void {
	currentConfig = undefined;
}
