/**
 * Confirmation Gate
 *
 * Every mutating file operation stops here: the preview is shown, the user answers, and
 * only an affirmative answer lets the change through. The gate never times out.
 */

import { getLog } from "../../shared/logger";

const logger = getLog(import.meta);

export type ChangeKind = "create" | "edit" | "delete" | "undo";
export type ChangeStatus = "proposed" | "confirmed" | "rejected";

export interface ProposedChange {
	/** Path as shown to the user */
	readonly path: string;
	readonly kind: ChangeKind;
	/** Unified diff, full new content or a deletion notice */
	readonly preview: string;
}

export interface PendingChange extends ProposedChange {
	status: ChangeStatus;
}

export const CONFIRMATION_QUESTION = "Do you want to apply these changes? (yes/no)";

/**
 * Presents a change and the question to the user and resolves with the raw answer.
 */
export type DecisionProvider = (change: ProposedChange, question: string) => Promise<string>;

const AFFIRMATIVE_ANSWERS: ReadonlySet<string> = new Set(["yes", "y"]);

export function isAffirmative(answer: string): boolean {
	return AFFIRMATIVE_ANSWERS.has(answer.trim().toLowerCase());
}

export class ConfirmationGate {
	private readonly decide: DecisionProvider;
	private current: PendingChange | undefined;

	constructor(decide: DecisionProvider) {
		this.decide = decide;
	}

	/** The change waiting for an answer, if any */
	get pending(): PendingChange | undefined {
		return this.current;
	}

	/**
	 * Asks for a decision on a change.
	 *
	 * @returns the change with status `confirmed` or `rejected`
	 * @throws Error when another change is still waiting for an answer
	 */
	async propose(change: ProposedChange): Promise<PendingChange> {
		if (this.current) {
			throw new Error(`A change to ${this.current.path} is still waiting for confirmation`);
		}

		const pending: PendingChange = { ...change, status: "proposed" };
		this.current = pending;
		try {
			const answer = await this.decide(change, CONFIRMATION_QUESTION);
			pending.status = isAffirmative(answer) ? "confirmed" : "rejected";
		} finally {
			this.current = undefined;
		}

		logger.info("%s of %s %s", change.kind, change.path, pending.status);
		return pending;
	}
}
