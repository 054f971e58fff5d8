// CHANGE: Text rendering of the console progress bar
// PURITY: CORE
// INVARIANT: 0 ≤ current ≤ total ∧ total > 0
// COMPLEXITY: O(w) where w = bar width

export interface ProgressOptions {
	readonly prefix: string;
	readonly barWidth: number;
	readonly filled: string;
	readonly empty: string;
}

export const DEFAULT_PROGRESS_OPTIONS: ProgressOptions = {
	prefix: "Progress: ",
	barWidth: 60,
	filled: "█",
	empty: ".",
};

/**
 * Renders `<prefix>[<bar>] <pct>% (<current>/<total>)`.
 *
 * @pure true
 * @precondition 0 ≤ current ≤ total, total ≥ 1
 * @complexity O(barWidth)
 *
 * @example
 * ```ts
 * formatProgress(1, 2);
 * // "Progress: [██████████████████████████████..............................]  50% (1/2)"
 * ```
 */
export function formatProgress(
	current: number,
	total: number,
	options: ProgressOptions = DEFAULT_PROGRESS_OPTIONS,
): string {
	if (total < 1) {
		throw new RangeError(`'total' must be positive (${total})`);
	}
	if (current > total) {
		throw new RangeError(
			`'current' cannot exceed total (${current} > ${total})`,
		);
	}
	if (current < 0) {
		throw new RangeError(`'current' cannot be below zero (${current} < 0)`);
	}
	const ratio = current / total;
	const bar = options.filled
		.repeat(Math.floor(ratio * options.barWidth))
		.padEnd(options.barWidth, options.empty);
	const percent = String(Math.floor(ratio * 100)).padStart(3, " ");
	return `${options.prefix}[${bar}] ${percent}% (${current}/${total})`;
}
