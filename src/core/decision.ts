// CHANGE: Pure decision function mapping a finished run to its exit code
// SOURCE: https://effect.website/docs/introduction
// PURITY: CORE
// FORMAT THEOREM: verify: failing ≠ ∅ ↔ code = 1; fix: code = |failing|
// INVARIANT: No side effects, deterministic mapping (mode, state) → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";
import { match } from "ts-pattern";

import { type CheckMode, type ExitCode, MAX_EXIT_STATUS } from "./models.js";
import type { ReportState } from "./types/index.js";

/**
 * Computes process exit code from the aggregated report (pure function).
 *
 * @param mode - Whether the run verified or repaired files
 * @param state - Final report state
 * @returns verify: 0 or 1; fix: number of files left unrepaired
 *
 * @pure true
 * @postcondition mode = "verify" → result ∈ {0,1}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode("verify", { passing: ["a"], failing: ["b"], completed: 2 }); // 1
 * computeExitCode("fix", { passing: [], failing: ["b", "c"], completed: 2 }); // 2
 * ```
 */
export const computeExitCode = (
	mode: CheckMode,
	state: ReportState,
): ExitCode =>
	pipe(state.failing.length, (failures) =>
		match(mode)
			.with("verify", () => (failures > 0 ? 1 : 0))
			.with("fix", () => failures)
			.exhaustive(),
	);

/**
 * Status handed to the operating system. Counts above 255 would wrap, and 256
 * unrepaired files would read as success.
 *
 * @pure true
 * @postcondition 0 ≤ result ≤ 255 ∧ (code > 0 → result > 0)
 *
 * @example
 * ```ts
 * toProcessStatus(256); // 255
 * ```
 */
export const toProcessStatus = (code: ExitCode): ExitCode =>
	Math.min(Math.max(Math.trunc(code), 0), MAX_EXIT_STATUS);
