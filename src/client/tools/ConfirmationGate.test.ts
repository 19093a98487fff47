import { CONFIRMATION_QUESTION, ConfirmationGate, isAffirmative, type ProposedChange } from "./ConfirmationGate";
import { describe, expect, test } from "vitest";

const change: ProposedChange = { path: "a.txt", kind: "edit", preview: "--- a/a.txt\n+++ b/a.txt\n" };

describe("ConfirmationGate", () => {
	test("isAffirmative accepts only yes and y", () => {
		expect(isAffirmative("yes")).toBe(true);
		expect(isAffirmative("  Y \n")).toBe(true);
		expect(isAffirmative("YES")).toBe(true);
		expect(isAffirmative("")).toBe(false);
		expect(isAffirmative("no")).toBe(false);
		expect(isAffirmative("yeah")).toBe(false);
		expect(isAffirmative("y es")).toBe(false);
	});

	test("confirms on an affirmative answer and passes the preview and question", async () => {
		const seen: Array<[ProposedChange, string]> = [];
		const gate = new ConfirmationGate(async (proposed, question) => {
			seen.push([proposed, question]);
			return "y";
		});

		const result = await gate.propose(change);

		expect(result).toEqual({ ...change, status: "confirmed" });
		expect(seen).toEqual([[change, CONFIRMATION_QUESTION]]);
		expect(CONFIRMATION_QUESTION).toBe("Do you want to apply these changes? (yes/no)");
	});

	test("rejects anything else", async () => {
		const gate = new ConfirmationGate(async () => "sure");
		expect((await gate.propose(change)).status).toBe("rejected");
	});

	test("exposes the pending change while waiting", async () => {
		let release: (answer: string) => void = () => undefined;
		const gate = new ConfirmationGate(
			() =>
				new Promise<string>(resolve => {
					release = resolve;
				}),
		);

		const result = gate.propose(change);
		expect(gate.pending).toEqual({ ...change, status: "proposed" });
		await expect(gate.propose(change)).rejects.toThrow("A change to a.txt is still waiting for confirmation");

		release("no");
		expect((await result).status).toBe("rejected");
		expect(gate.pending).toBeUndefined();
	});

	test("clears the pending change when the provider fails", async () => {
		const gate = new ConfirmationGate(() => Promise.reject(new Error("input closed")));
		await expect(gate.propose(change)).rejects.toThrow("input closed");
		expect(gate.pending).toBeUndefined();
	});
});
