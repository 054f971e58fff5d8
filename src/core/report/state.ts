// CHANGE: Pure fold of task completions into report state
// PURITY: CORE
// INVARIANT: recordCompletion(s, c).completed = s.completed + 1
// COMPLEXITY: O(n) per step (immutable append)

import type { Completion, ReportState } from "../types/index.js";

export const emptyReportState: ReportState = {
	passing: [],
	failing: [],
	completed: 0,
};

/**
 * Classifies one completion. A `null` result (fix not needed) only counts
 * towards `completed`.
 *
 * @pure true
 * @invariant file ∉ state.passing ∪ state.failing → file appears in at most one list afterwards
 *
 * @example
 * ```ts
 * recordCompletion(emptyReportState, { file: "a.ts", result: failed("x") });
 * // { passing: [], failing: ["a.ts"], completed: 1 }
 * ```
 */
export function recordCompletion(
	state: ReportState,
	completion: Completion,
): ReportState {
	const completed = state.completed + 1;
	const { result, file } = completion;
	if (result === null) return { ...state, completed };
	return result.succeeded
		? { ...state, completed, passing: [...state.passing, file] }
		: { ...state, completed, failing: [...state.failing, file] };
}
