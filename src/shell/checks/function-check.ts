// CHANGE: Wrap in-process verify/repair actions as a capability-tagged check
// PURITY: SHELL (actions may touch the filesystem)
// INVARIANT: Capability tag = set of actions supplied
// COMPLEXITY: O(1)

import { Check, type CheckAction, type CheckInfo } from "../../core/types/index.js";

/**
 * At least one action must be supplied; the type rules out neither.
 */
export type FunctionCheckActions =
	| { readonly verify: CheckAction; readonly repair?: undefined }
	| { readonly verify?: undefined; readonly repair: CheckAction }
	| { readonly verify: CheckAction; readonly repair: CheckAction };

/**
 * @example
 * ```ts
 * const check = functionCheck(info, { verify: (file) => Effect.succeed(passed()) });
 * // Check.VerifierOnly
 * ```
 */
export function functionCheck(
	info: CheckInfo,
	actions: FunctionCheckActions,
): Check {
	if (actions.verify === undefined) {
		return Check.FixerOnly({ info, repair: actions.repair });
	}
	if (actions.repair === undefined) {
		return Check.VerifierOnly({ info, verify: actions.verify });
	}
	return Check.VerifierAndFixer({
		info,
		verify: actions.verify,
		repair: actions.repair,
	});
}
