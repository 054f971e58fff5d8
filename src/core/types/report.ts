// CHANGE: Report data flowing from task completions to rendered output
// PURITY: CORE
// INVARIANT: passing ∩ failing = ∅; |passing| + |failing| ≤ completed
// COMPLEXITY: O(1) - type declarations only

import type { CheckResult } from "./check.js";

/**
 * Aggregated state of one run.
 *
 * @property passing Files that passed (verify) or were repaired (fix), in completion order
 * @property failing Files that failed, in completion order
 * @property completed Number of finished tasks, including no-op fixes
 */
export interface ReportState {
	readonly passing: readonly string[];
	readonly failing: readonly string[];
	readonly completed: number;
}

/**
 * Message sent by a worker to the aggregator when a task finishes.
 */
export interface Completion {
	readonly file: string;
	readonly result: CheckResult | null;
}

/**
 * Output stream a rendered line belongs to.
 */
export type ReportStream = "info" | "error";

export interface ReportLine {
	readonly stream: ReportStream;
	readonly text: string;
}
