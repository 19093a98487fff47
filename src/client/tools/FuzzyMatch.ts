// Approximate string scoring for file-name search. Scores run from 0 to 100.

/**
 * Length of the longest common subsequence, two-row dynamic programming.
 */
function longestCommonSubsequence(a: string, b: string): number {
	let previous = new Array<number>(b.length + 1).fill(0);
	let current = new Array<number>(b.length + 1).fill(0);
	for (let i = 1; i <= a.length; i++) {
		for (let j = 1; j <= b.length; j++) {
			current[j] = a[i - 1] === b[j - 1] ? previous[j - 1] + 1 : Math.max(previous[j], current[j - 1]);
		}
		[previous, current] = [current, previous];
	}
	return previous[b.length];
}

/**
 * Similarity from the insert/delete edit distance: 100 for equal strings, 0 when nothing is
 * shared.
 */
export function ratio(a: string, b: string): number {
	const total = a.length + b.length;
	if (total === 0) {
		return 100;
	}
	return Math.round((200 * longestCommonSubsequence(a, b)) / total);
}

/**
 * Best `ratio` between the shorter string and every same-length window of the longer one,
 * so a query scores high against any name that contains something close to it.
 */
export function partialRatio(a: string, b: string): number {
	const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
	if (shorter.length === 0) {
		return 0;
	}

	let best = 0;
	for (let start = 0; start + shorter.length <= longer.length; start++) {
		const score = ratio(shorter, longer.slice(start, start + shorter.length));
		if (score > best) {
			best = score;
			if (best === 100) {
				break;
			}
		}
	}
	return best;
}
