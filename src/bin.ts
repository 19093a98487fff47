import { createProgram } from "./client/cli";
import { getLog, logError } from "./shared/logger";

// =============================================================================
// SECTION: Main
// =============================================================================

try {
	await createProgram().parseAsync();
} catch (error) {
	logError(getLog(import.meta), error, "Command failed");
	process.exit(1);
}
