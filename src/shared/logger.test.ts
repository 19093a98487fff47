import { formatLogLine, getLog, getModuleName, resetLogger } from "./logger";
import { afterEach, describe, expect, test } from "vitest";

describe("logger", () => {
	afterEach(() => {
		resetLogger();
	});

	describe("getModuleName", () => {
		test("strips directory and extension from a module url", () => {
			expect(getModuleName("file:///repo/src/client/tools/FileTool.ts")).toBe("FileTool");
		});

		test("keeps inner dots", () => {
			expect(getModuleName("/repo/src/foo.test.ts")).toBe("foo.test");
		});

		test("returns a bare name unchanged", () => {
			expect(getModuleName("agent")).toBe("agent");
		});

		test("accepts import.meta", () => {
			expect(getModuleName(import.meta)).toBe("logger.test");
		});
	});

	describe("formatLogLine", () => {
		test("renders level, module and message", () => {
			const line = formatLogLine(JSON.stringify({ time: 0, level: 40, module: "PathGuard", msg: "blocked" }));
			expect(line.endsWith("WARN\x1b[0m PathGuard - blocked\n")).toBe(true);
			expect(line.startsWith("\x1b[33m[")).toBe(true);
		});

		test("appends the error message", () => {
			const line = formatLogLine(JSON.stringify({ level: 50, module: "cli", msg: "failed", err: { message: "boom" } }));
			expect(line.endsWith("cli - failed (boom)\n")).toBe(true);
		});

		test("falls back for unknown fields", () => {
			const line = formatLogLine(JSON.stringify({ level: 99 }));
			expect(line.endsWith("LOG\x1b[0m unknown - \n")).toBe(true);
		});
	});

	test("getLog returns a child logger bound to the module", () => {
		const logger = getLog(import.meta);
		expect(logger.bindings()).toEqual({ module: "logger.test" });
	});
});
