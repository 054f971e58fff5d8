// CHANGE: Pure text rules behind the built-in whitespace and newline checks
// PURITY: CORE
// COMPLEXITY: O(n) where n = content length

const TRAILING_WHITESPACE = /\s+$/u;

/**
 * Returns 1-based numbers of lines that end in whitespace (a CRLF terminator aside).
 *
 * @pure true
 * @invariant ∀ n ∈ result: 1 ≤ n ≤ lineCount(content)
 *
 * @example
 * ```ts
 * findTrailingWhitespace("ok\nbad \n"); // [2]
 * ```
 */
export function findTrailingWhitespace(content: string): readonly number[] {
	const offenders: number[] = [];
	content.split("\n").forEach((line, index) => {
		if (TRAILING_WHITESPACE.test(line.replace(/\r$/u, ""))) {
			offenders.push(index + 1);
		}
	});
	return offenders;
}

/**
 * @pure true
 * @invariant findTrailingWhitespace(stripTrailingWhitespace(c)) = []
 */
export function stripTrailingWhitespace(content: string): string {
	return content
		.split("\n")
		.map((line) =>
			line.endsWith("\r")
				? `${line.slice(0, -1).replace(TRAILING_WHITESPACE, "")}\r`
				: line.replace(TRAILING_WHITESPACE, ""),
		)
		.join("\n");
}

/**
 * Empty content counts as terminated.
 *
 * @pure true
 */
export function hasTrailingNewline(content: string): boolean {
	return content.length === 0 || content.endsWith("\n");
}
