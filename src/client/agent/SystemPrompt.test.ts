import { buildSystemPrompt } from "./SystemPrompt";
import { describe, expect, test } from "vitest";

describe("buildSystemPrompt", () => {
	test("names the repository and the relative-path convention", () => {
		const prompt = buildSystemPrompt("/work/repo");
		expect(prompt).toContain("You are working in a repository located at: /work/repo\n");
		expect(prompt).toContain("1. Give paths relative to the repository root;");
		expect(prompt).not.toContain("additional folders");
	});

	test("lists extra roots", () => {
		const prompt = buildSystemPrompt("/work/repo", ["/shared/docs"]);
		expect(prompt.endsWith("These additional folders are also accessible by absolute path:\n- /shared/docs")).toBe(true);
	});
});
