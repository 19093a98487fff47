// Error taxonomy shared by the tools, the registry and the agent loop.
// Tool errors are recoverable: the registry turns them into results for the model.
// Registry and turn-limit errors are fatal misconfiguration or runaway conditions.

export type ToolErrorCode =
	| "PathViolation"
	| "IgnoredPath"
	| "UserRejected"
	| "IOFailure"
	| "NoBackupAvailable"
	| "ToolNotFound"
	| "InvalidArguments";

export type RegistryErrorCode = "DuplicateToolName" | "InvalidSchema";

/**
 * Error raised inside a tool invocation. The `code` tells the model (and the user watching
 * the transcript) whether the call was blocked by policy, declined, or failed on disk.
 */
export class ToolError extends Error {
	readonly code: ToolErrorCode;

	constructor(code: ToolErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ToolError";
		this.code = code;
	}
}

/**
 * Error raised while building the tool registry.
 */
export class RegistryError extends Error {
	readonly code: RegistryErrorCode;

	constructor(code: RegistryErrorCode, message: string) {
		super(message);
		this.name = "RegistryError";
		this.code = code;
	}
}

/**
 * Error raised when the agent loop exceeds its model-request ceiling for one user message.
 */
export class TurnLimitExceededError extends Error {
	readonly code = "TurnLimitExceeded";
	readonly maxTurns: number;

	constructor(maxTurns: number) {
		super(`Agent stopped after ${maxTurns} model turns without a final answer`);
		this.name = "TurnLimitExceededError";
		this.maxTurns = maxTurns;
	}
}

export function isToolError(err: unknown): err is ToolError {
	return err instanceof ToolError;
}

/**
 * Wraps a filesystem error as an IOFailure, keeping the errno code in the message.
 */
export function toIOFailure(err: unknown, action: string): ToolError {
	if (err instanceof ToolError) {
		return err;
	}
	const message = err instanceof Error ? err.message : String(err);
	return new ToolError("IOFailure", `${action}: ${message}`, { cause: err });
}

/**
 * Returns the message of an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/**
 * Checks the errno `code` of a filesystem error, e.g. `ENOENT`.
 */
export function hasErrnoCode(err: unknown, code: string): boolean {
	return err instanceof Error && "code" in err && err.code === code;
}
