// CHANGE: Make main.ts a thin APP delegator
// WHY: Programmatic use of the CLI without terminating the process
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { runCli } from "./app/runCli.js";
import type { ExitCode } from "./core/models.js";
import { ReportConsoleLive } from "./shell/output/console.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param args Command line arguments, defaults to the current process's
 * @returns ExitCode of the run
 *
 * @pure false (runs git and tools, writes to stdout/stderr)
 * @complexity O(1)
 */
export function main(
	args: readonly string[] = process.argv.slice(2),
): Promise<ExitCode> {
	return Effect.runPromise(
		runCli(args, { cwd: process.cwd() }).pipe(
			Effect.provide(ReportConsoleLive),
		),
	);
}
