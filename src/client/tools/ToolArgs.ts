// Typed readers for tool arguments. A value of the wrong type is an InvalidArguments error;
// an absent optional value reads as undefined.

import { ToolError } from "../../shared/errors";
import type { ToolArgs } from "./ToolRegistry";

function invalid(message: string): ToolError {
	return new ToolError("InvalidArguments", message);
}

export function readString(args: ToolArgs, name: string): string | undefined {
	const value = args[name];
	if (value === undefined || value === null) {
		return;
	}
	if (typeof value !== "string") {
		throw invalid(`'${name}' must be a string`);
	}
	return value;
}

export function requireString(args: ToolArgs, name: string): string {
	const value = readString(args, name);
	if (value === undefined) {
		throw invalid(`Missing required parameter '${name}'`);
	}
	return value;
}

export function readInteger(args: ToolArgs, name: string): number | undefined {
	const value = args[name];
	if (value === undefined || value === null) {
		return;
	}
	// Models occasionally send numbers as strings
	const parsed = typeof value === "string" && /^-?\d+$/.test(value.trim()) ? Number(value) : value;
	if (typeof parsed !== "number" || !Number.isInteger(parsed)) {
		throw invalid(`'${name}' must be an integer`);
	}
	return parsed;
}

export function requireInteger(args: ToolArgs, name: string): number {
	const value = readInteger(args, name);
	if (value === undefined) {
		throw invalid(`Missing required parameter '${name}'`);
	}
	return value;
}

export function readBoolean(args: ToolArgs, name: string): boolean | undefined {
	const value = args[name];
	if (value === undefined || value === null) {
		return;
	}
	if (value === "true" || value === "false") {
		return value === "true";
	}
	if (typeof value !== "boolean") {
		throw invalid(`'${name}' must be a boolean`);
	}
	return value;
}

/**
 * Reads a `[start, end]` pair of integers.
 */
export function readIntegerPair(args: ToolArgs, name: string): readonly [number, number] | undefined {
	const value = args[name];
	if (value === undefined || value === null) {
		return;
	}
	if (!Array.isArray(value) || value.length !== 2) {
		throw invalid(`'${name}' must be an array of two integers`);
	}
	const [first, second]: Array<unknown> = value;
	if (typeof first !== "number" || typeof second !== "number" || !Number.isInteger(first) || !Number.isInteger(second)) {
		throw invalid(`'${name}' must be an array of two integers`);
	}
	return [first, second];
}
