// CHANGE: Check contract as an explicit capability-tagged union
// PURITY: CORE
// INVARIANT: Capability is carried by `_tag`, never probed at call time
// COMPLEXITY: O(1) - type declarations only

import { Data, type Effect } from "effect";

import type { CheckFault } from "../errors.js";

/**
 * Outcome of running one check on one file.
 *
 * @property succeeded Whether the file passed (or was repaired)
 * @property stdout Captured standard output, trimmed; null when empty
 * @property stderr Captured standard error, trimmed; null when empty
 */
export interface CheckResult {
	readonly succeeded: boolean;
	readonly stdout: string | null;
	readonly stderr: string | null;
}

/**
 * Presentation metadata shared by every check.
 *
 * @property message Label shown in reports (e.g. "whitespace")
 * @property command argv that reproduces the current invocation
 * @property verboseFlags Flags that enable verbose output; the first is suggested
 * @property fixFlags Flags that enable fix mode; the first is suggested
 */
export interface CheckInfo {
	readonly message: string;
	readonly command: readonly string[];
	readonly verboseFlags: readonly string[];
	readonly fixFlags: readonly string[];
}

/**
 * Verification or repair of a single file.
 *
 * @invariant Safe to run concurrently for distinct files
 */
export type CheckAction = (
	file: string,
) => Effect.Effect<CheckResult, CheckFault>;

/**
 * A check with its capabilities resolved up front.
 */
export type Check = Data.TaggedEnum<{
	VerifierOnly: {
		readonly info: CheckInfo;
		readonly verify: CheckAction;
	};
	FixerOnly: {
		readonly info: CheckInfo;
		readonly repair: CheckAction;
	};
	VerifierAndFixer: {
		readonly info: CheckInfo;
		readonly verify: CheckAction;
		readonly repair: CheckAction;
	};
}>;

export const Check = Data.taggedEnum<Check>();

/**
 * Operation dispatched for each file once the mode has been resolved.
 * A null result means nothing had to be done.
 */
export type TaskOperation = (
	file: string,
) => Effect.Effect<CheckResult | null, CheckFault>;
