/**
 * Output Limiter
 *
 * Keeps tool output that is fed back into the model's context within a character budget.
 * Lengths are JavaScript string lengths (UTF-16 code units); cuts never split a surrogate pair.
 */

// =============================================================================
// SECTION: Types
// =============================================================================

/**
 * A file ranked by the fuzzy filename search
 */
export interface FileMatch {
	readonly path: string;
	readonly score: number;
}

/**
 * One line of context around a content match
 */
export interface ContextLine {
	readonly lineNumber: number;
	readonly content: string;
	readonly isMatch: boolean;
}

/**
 * A line matching a content search, with its surrounding context
 */
export interface ContentMatch {
	readonly lineNumber: number;
	readonly content: string;
	readonly context: ReadonlyArray<ContextLine>;
}

export const DEFAULT_FILE_RESULTS_CHARS = 5000;
export const DEFAULT_CONTENT_RESULTS_CHARS = 10000;

// =============================================================================
// SECTION: Truncation
// =============================================================================

function isHighSurrogate(code: number): boolean {
	return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Moves a cut index back by one when it would separate a surrogate pair.
 */
export function safeCutIndex(text: string, index: number): number {
	const bounded = Math.max(0, Math.min(index, text.length));
	if (bounded > 0 && bounded < text.length && isHighSurrogate(text.charCodeAt(bounded - 1))) {
		return bounded - 1;
	}
	return bounded;
}

export function countLines(text: string): number {
	return text.length === 0 ? 0 : text.split("\n").length;
}

export function buildTruncationNote(omittedChars: number, totalChars: number, omittedLines: number): string {
	return `\n\n[Output truncated: ${omittedChars} of ${totalChars} characters omitted, ${omittedLines} more lines]`;
}

/**
 * Truncates `text` to at most `maxChars`, ending with a note that says how much was left out.
 * Text that already fits is returned unchanged, which makes the function idempotent.
 */
export function limitOutput(text: string, maxChars: number): string {
	if (text.length <= maxChars) {
		return text;
	}

	const totalChars = text.length;
	const totalLines = countLines(text);
	// Size the kept prefix with the longest note this text could produce
	const widestNote = buildTruncationNote(totalChars, totalChars, totalLines);
	if (maxChars <= widestNote.length) {
		return text.slice(0, safeCutIndex(text, maxChars));
	}

	const keep = safeCutIndex(text, maxChars - widestNote.length);
	const kept = text.slice(0, keep);
	const omittedLines = totalLines - countLines(kept);
	return kept + buildTruncationNote(totalChars - keep, totalChars, omittedLines);
}

// =============================================================================
// SECTION: Search Result Formatting
// =============================================================================

function moreFileMatchesNote(count: number): string {
	return `\n[${count} more matches not shown due to output size limit]`;
}

/**
 * Renders fuzzy filename matches, stopping before the budget is exceeded. Room for the
 * "more not shown" note is kept while further matches remain.
 */
export function formatFileMatches(
	matches: ReadonlyArray<FileMatch>,
	query: string,
	maxChars = DEFAULT_FILE_RESULTS_CHARS,
): string {
	if (matches.length === 0) {
		return `No files found matching '${query}'`;
	}

	let content = `Found ${matches.length} files matching '${query}':\n\n`;
	for (let i = 0; i < matches.length; i++) {
		const match = matches[i];
		const line = `${i + 1}. ${match.path} (Score: ${match.score})\n`;
		const reserve = i < matches.length - 1 ? moreFileMatchesNote(matches.length - i).length : 0;
		if (content.length + line.length + reserve > maxChars) {
			content += moreFileMatchesNote(matches.length - i);
			break;
		}
		content += line;
	}
	return content;
}

function renderContentMatch(match: ContentMatch): string {
	let rendered = `  Line ${match.lineNumber}: ${match.content}\n  Context:\n`;
	for (const ctx of match.context) {
		const prefix = ctx.isMatch ? "  > " : "    ";
		rendered += `${prefix}Line ${ctx.lineNumber}: ${ctx.content}\n`;
	}
	return `${rendered}\n`;
}

function moreContentFilesNote(count: number): string {
	return `\n[${count} more files with matches not shown due to output size limit]`;
}

function moreContentMatchesNote(count: number): string {
	return `  [... and ${count} more matches not shown due to output size limit]\n`;
}

/**
 * Renders content matches grouped by file, stopping before the budget is exceeded. Room for
 * the "more not shown" note is kept while further entries remain.
 */
export function formatContentMatches(
	results: ReadonlyMap<string, ReadonlyArray<ContentMatch>>,
	query: string,
	maxChars = DEFAULT_CONTENT_RESULTS_CHARS,
): string {
	if (results.size === 0) {
		return `No content matches found for '${query}'`;
	}

	let totalMatches = 0;
	for (const matches of results.values()) {
		totalMatches += matches.length;
	}

	let content = `Found ${totalMatches} matches for '${query}' in ${results.size} files:\n\n`;
	let filesShown = 0;
	let matchesShown = 0;
	const reserveFor = (remainingMatches: number, remainingFiles: number): number =>
		Math.max(moreContentMatchesNote(remainingMatches).length, moreContentFilesNote(remainingFiles).length);

	for (const [filePath, matches] of results) {
		const header = `File: ${filePath} (${matches.length} matches)\n`;
		if (content.length + header.length + reserveFor(totalMatches - matchesShown, results.size - filesShown) > maxChars) {
			content += moreContentFilesNote(results.size - filesShown);
			return content;
		}
		content += header;
		filesShown++;

		for (const match of matches) {
			const rendered = renderContentMatch(match);
			const isLast = matchesShown === totalMatches - 1;
			const reserve = isLast ? 0 : reserveFor(totalMatches - matchesShown, results.size - filesShown);
			if (content.length + rendered.length + reserve > maxChars) {
				content += moreContentMatchesNote(totalMatches - matchesShown);
				return content;
			}
			content += rendered;
			matchesShown++;
		}
	}
	return content;
}
