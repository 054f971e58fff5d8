// CHANGE: Default worker count for the check pool
// PURITY: SHELL (reads host information)
// INVARIANT: result ≥ 1

import { os } from "./node-mods.js";

/**
 * Number of tasks run at once when `--jobs` is not given.
 *
 * @pure false (queries the host)
 */
export function defaultJobs(): number {
	return Math.max(1, os.availableParallelism());
}
