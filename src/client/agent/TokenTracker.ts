import type { TokenUsage } from "./Types";

export type TokenStats = {
	readonly promptTokens: number;
	readonly completionTokens: number;
	readonly totalTokens: number;
	readonly cacheCreationInputTokens: number;
	readonly cacheReadInputTokens: number;
};

/**
 * Running token totals for a session.
 */
export class TokenTracker {
	private promptTokens = 0;
	private completionTokens = 0;
	private cacheCreationInputTokens = 0;
	private cacheReadInputTokens = 0;

	record(usage: TokenUsage): void {
		this.promptTokens += usage.inputTokens;
		this.completionTokens += usage.outputTokens;
		this.cacheCreationInputTokens += usage.cacheCreationInputTokens;
		this.cacheReadInputTokens += usage.cacheReadInputTokens;
	}

	getStats(): TokenStats {
		return {
			promptTokens: this.promptTokens,
			completionTokens: this.completionTokens,
			totalTokens: this.promptTokens + this.completionTokens,
			cacheCreationInputTokens: this.cacheCreationInputTokens,
			cacheReadInputTokens: this.cacheReadInputTokens,
		};
	}

	reset(): void {
		this.promptTokens = 0;
		this.completionTokens = 0;
		this.cacheCreationInputTokens = 0;
		this.cacheReadInputTokens = 0;
	}

	format(): string {
		const stats = this.getStats();
		return (
			`Tokens: ${stats.totalTokens} total (${stats.promptTokens} prompt, ${stats.completionTokens} completion)\n` +
			`Cache: ${stats.cacheCreationInputTokens} created, ${stats.cacheReadInputTokens} read`
		);
	}
}
