// Tool Registry
// Maps tool names to executors and the schemas advertised to the model.
// Dispatch never throws: every failure becomes a textual result the model can read.

import { errorMessage, RegistryError, ToolError, type ToolErrorCode } from "../../shared/errors";
import { getLog, logError } from "../../shared/logger";
import { z } from "zod";

const logger = getLog(import.meta);

// =============================================================================
// SECTION: Types
// =============================================================================

export type ParameterType = "string" | "integer" | "boolean" | "array" | "object";

export interface ParameterSpec {
	readonly type: ParameterType;
	readonly description?: string;
	readonly enum?: ReadonlyArray<string>;
	readonly items?: ParameterSpec;
}

export interface ToolSpec {
	readonly name: string;
	readonly description: string;
	readonly parameters: Readonly<Record<string, ParameterSpec>>;
	readonly required: ReadonlyArray<string>;
}

/**
 * Result handed back to the model. `code` is set for failures and for declined changes.
 */
export interface ToolResult {
	readonly output: string;
	readonly isError: boolean;
	readonly code?: ToolErrorCode;
}

export type ToolArgs = Readonly<Record<string, unknown>>;

/**
 * Tool executor function signature. Throw a ToolError to report a failure.
 */
export type ToolExecutor = (args: ToolArgs) => Promise<string>;

interface RegisteredTool {
	readonly spec: ToolSpec;
	readonly execute: ToolExecutor;
}

const ParameterSpecSchema: z.ZodType<ParameterSpec> = z.lazy(() =>
	z
		.object({
			type: z.enum(["string", "integer", "boolean", "array", "object"]),
			description: z.string().optional(),
			enum: z.array(z.string()).optional(),
			items: ParameterSpecSchema.optional(),
		})
		.strict(),
);

const ParametersSchema = z.record(ParameterSpecSchema);

// Names the Messages API accepts for tools
const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

// =============================================================================
// SECTION: Helpers
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
	return !!value && typeof value === "object" && !Array.isArray(value);
}

function matchesType(value: unknown, spec: ParameterSpec): boolean {
	switch (spec.type) {
		case "string":
			return typeof value === "string" && (!spec.enum || spec.enum.includes(value));
		case "integer":
			return typeof value === "number" && Number.isInteger(value);
		case "boolean":
			return typeof value === "boolean";
		case "array": {
			const items = spec.items;
			return Array.isArray(value) && (!items || value.every(item => matchesType(item, items)));
		}
		case "object":
			return isRecord(value);
	}
}

function errorResult(code: ToolErrorCode, message: string): ToolResult {
	return { output: `Error [${code}]: ${message}`, isError: true, code };
}

/**
 * Converts anything a tool threw into a result. A declined change is reported as a plain
 * outcome rather than an error.
 */
export function toToolResult(err: unknown): ToolResult {
	if (err instanceof ToolError) {
		if (err.code === "UserRejected") {
			return { output: err.message, isError: false, code: err.code };
		}
		return errorResult(err.code, err.message);
	}
	return errorResult("IOFailure", errorMessage(err));
}

// =============================================================================
// SECTION: Registry
// =============================================================================

export class ToolRegistry {
	private readonly tools = new Map<string, RegisteredTool>();

	/**
	 * Adds a tool.
	 *
	 * @throws RegistryError `DuplicateToolName` or `InvalidSchema`
	 */
	register(
		name: string,
		execute: ToolExecutor,
		description: string,
		parameters: Readonly<Record<string, ParameterSpec>>,
		required: ReadonlyArray<string> = [],
	): void {
		if (this.tools.has(name)) {
			throw new RegistryError("DuplicateToolName", `Tool '${name}' is already registered`);
		}
		if (!TOOL_NAME_PATTERN.test(name)) {
			throw new RegistryError("InvalidSchema", `Invalid tool name '${name}'`);
		}

		const parsed = ParametersSchema.safeParse(parameters);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			throw new RegistryError(
				"InvalidSchema",
				`Invalid parameter schema for tool '${name}' at ${issue.path.join(".")}: ${issue.message}`,
			);
		}

		const missing = required.filter(param => !Object.hasOwn(parameters, param));
		if (missing.length > 0) {
			throw new RegistryError(
				"InvalidSchema",
				`Required parameter(s) not defined for tool '${name}': ${missing.join(", ")}`,
			);
		}

		this.tools.set(name, {
			spec: { name, description, parameters: parsed.data, required: [...required] },
			execute,
		});
		logger.debug("Registered tool %s", name);
	}

	has(name: string): boolean {
		return this.tools.has(name);
	}

	/** Tool names in registration order */
	listTools(): Array<string> {
		return Array.from(this.tools.keys());
	}

	/** Specs in registration order, as advertised to the model */
	getToolSpecs(): Array<ToolSpec> {
		return Array.from(this.tools.values(), tool => tool.spec);
	}

	/**
	 * Runs a tool. Unknown tools, malformed arguments and anything the tool throws come back
	 * as results.
	 */
	async dispatch(name: string, args: unknown): Promise<ToolResult> {
		const tool = this.tools.get(name);
		if (!tool) {
			const available = this.listTools().join(", ") || "none";
			logger.warn("Model requested unknown tool %s", name);
			return errorResult("ToolNotFound", `Unknown tool '${name}'. Available tools: ${available}`);
		}

		if (!isRecord(args)) {
			return errorResult("InvalidArguments", `Arguments for tool '${name}' must be an object`);
		}

		const { parameters, required } = tool.spec;
		const missing = required.filter(param => args[param] === undefined);
		if (missing.length > 0) {
			return errorResult("InvalidArguments", `Missing required parameter(s) for tool '${name}': ${missing.join(", ")}`);
		}

		const unknown = Object.keys(args).filter(param => !Object.hasOwn(parameters, param));
		if (unknown.length > 0) {
			return errorResult("InvalidArguments", `Unknown parameter(s) for tool '${name}': ${unknown.join(", ")}`);
		}

		// Type mismatches are only logged; executors validate the values they read
		for (const [param, value] of Object.entries(args)) {
			const spec = parameters[param];
			if (value !== undefined && value !== null && !matchesType(value, spec)) {
				logger.warn("Argument %s of tool %s does not match type %s", param, name, spec.type);
			}
		}

		logger.info("Executing tool: %s", name);
		const startTime = Date.now();
		try {
			const output = await tool.execute(args);
			logger.info("Tool %s completed in %dms", name, Date.now() - startTime);
			return { output, isError: false };
		} catch (err) {
			if (!(err instanceof ToolError)) {
				logError(logger, err, `Tool ${name} failed`);
			}
			return toToolResult(err);
		}
	}
}
