// CHANGE: Line intervals and line filters shared by the diff parser and tool invocation
// PURITY: CORE
// INVARIANT: Every produced interval satisfies 1 ≤ start ≤ end
// COMPLEXITY: O(n) serialization where n = number of intervals

import type { FileDelta, LineFilter, LineInterval } from "../types/index.js";

/**
 * Builds the closed interval `[start, end]`.
 *
 * @pure true
 * @invariant start ≤ end
 * @complexity O(1)
 */
export function closedInterval(start: number, end: number): LineInterval {
	if (end < start) {
		throw new RangeError(`Interval end ${end} precedes start ${start}`);
	}
	return { start, end };
}

/**
 * Builds the single-line interval `[line, line]`.
 *
 * @pure true
 * @complexity O(1)
 */
export function singleLine(line: number): LineInterval {
	return closedInterval(line, line);
}

/**
 * Builds an interval from a hunk range spec (`start[,length]`).
 *
 * An omitted length denotes one line; an explicit zero length means no lines
 * survive on that side and yields null. The end bound is `start + length`.
 *
 * @param start First line of the range
 * @param length Count from the hunk header, undefined when omitted
 * @returns Interval or null for an empty side
 *
 * @pure true
 * @invariant length === 0 → null
 * @complexity O(1)
 *
 * @example
 * ```ts
 * lineIntervalFromRange(10, 3); // { start: 10, end: 13 }
 * lineIntervalFromRange(5, undefined); // { start: 5, end: 5 }
 * lineIntervalFromRange(10, 0); // null
 * ```
 */
export function lineIntervalFromRange(
	start: number,
	length: number | undefined,
): LineInterval | null {
	if (length === undefined) return singleLine(start);
	if (length === 0) return null;
	return closedInterval(start, start + length);
}

/**
 * Serializes a filter as `{"name":"<file>","lines":[[s,e],...]}`.
 *
 * @pure true
 * @complexity O(n) where n = |filter.lines|
 */
export function formatLineFilter(filter: LineFilter): string {
	return JSON.stringify({
		name: filter.name,
		lines: filter.lines.map((interval) => [interval.start, interval.end]),
	});
}

/**
 * Serializes a list of filters as a JSON array.
 *
 * @pure true
 * @complexity O(n) where n = total number of intervals
 */
export function formatLineFilters(filters: readonly LineFilter[]): string {
	return `[${filters.map(formatLineFilter).join(",")}]`;
}

/**
 * Maps diff records to the filters a line-filtering tool consumes.
 * Deleted files have no new side and produce no filter.
 *
 * @pure true
 * @complexity O(n) where n = |deltas|
 */
export function lineFiltersFromDeltas(
	deltas: readonly FileDelta[],
): readonly LineFilter[] {
	const filters: LineFilter[] = [];
	for (const delta of deltas) {
		if (delta.toPath === null) continue;
		filters.push({ name: delta.toPath, lines: delta.toChanges });
	}
	return filters;
}
