/**
 * Logging
 *
 * One pino root logger, created on first use from `LOG_LEVEL` (or `debug` when `DEBUG` is
 * set), with a child per module. Records are rendered as coloured lines on stderr so they
 * stay out of the chat transcript on stdout.
 */

import { getConfig } from "./config";
import pino from "pino";

export type Logger = pino.Logger;

interface LevelStyle {
	readonly name: string;
	readonly color: string;
}

const LEVEL_STYLES: Readonly<Record<number, LevelStyle>> = {
	10: { name: "TRACE", color: "\x1b[90m" },
	20: { name: "DEBUG", color: "\x1b[36m" },
	30: { name: "INFO", color: "\x1b[32m" },
	40: { name: "WARN", color: "\x1b[33m" },
	50: { name: "ERROR", color: "\x1b[31m" },
	60: { name: "FATAL", color: "\x1b[35m" },
};
const UNKNOWN_LEVEL: LevelStyle = { name: "LOG", color: "" };
const RESET = "\x1b[0m";

interface LogRecord {
	readonly time?: number;
	readonly level?: number;
	readonly module?: string;
	readonly msg?: string;
	readonly err?: { readonly message?: string } | string;
}

let rootLogger: Logger | undefined;

/**
 * File name without directory or final extension: `.../tools/FileTool.ts` gives `FileTool`.
 */
export function getModuleName(module: string | ImportMeta): string {
	const url = typeof module === "string" ? module : module.url;
	const fileName = url.slice(url.lastIndexOf("/") + 1);
	const dot = fileName.lastIndexOf(".");
	return dot > 0 ? fileName.slice(0, dot) : fileName;
}

function clockTime(timestamp: number): string {
	return new Date(timestamp).toTimeString().slice(0, 8);
}

/**
 * Renders one pino JSON record as `[time] LEVEL module - message (error)`.
 */
export function formatLogLine(chunk: string): string {
	const record: LogRecord = JSON.parse(chunk);
	const style = LEVEL_STYLES[record.level ?? 30] ?? UNKNOWN_LEVEL;
	const errText = typeof record.err === "string" ? record.err : record.err?.message;
	const suffix = errText ? ` (${errText})` : "";
	return `${style.color}[${clockTime(record.time ?? Date.now())}] ${style.name}${RESET} ${record.module ?? "unknown"} - ${record.msg ?? ""}${suffix}\n`;
}

function stderrDestination(): pino.DestinationStream {
	return {
		write(chunk: string): void {
			let line: string;
			try {
				line = formatLogLine(chunk);
			} catch {
				// Not a JSON record
				line = chunk;
			}
			process.stderr.write(line);
		},
	};
}

function getRootLogger(): Logger {
	if (!rootLogger) {
		const config = getConfig();
		rootLogger = pino({ level: config.DEBUG ? "debug" : config.LOG_LEVEL }, stderrDestination());
	}
	return rootLogger;
}

/**
 * Logger for a module; call `getLog(import.meta)` after the imports.
 */
export function getLog(module: string | ImportMeta): Logger {
	return getRootLogger().child({ module: getModuleName(module) });
}

export function logError(logger: Logger, err: unknown, message: string): void {
	logger.error({ err: err instanceof Error ? err : String(err) }, message);
}

/**
 * Drops the root logger so the next `getLog` reads the config again.
 */
export function resetLogger(): void {
	rootLogger = undefined;
}
