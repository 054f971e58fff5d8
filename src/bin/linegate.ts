#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns ExitCode; BIN provides the live console and exits the process
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect } from "effect";

import { runCli } from "../app/runCli.js";
import { toProcessStatus } from "../core/decision.js";
import { ReportConsoleLive } from "../shell/output/console.js";

/**
 * CLI entry point for linegate.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @postcondition process terminates exactly once with the run's exit code, capped at 255
 */
void Effect.runPromise(
	runCli(process.argv.slice(2), { cwd: process.cwd() }).pipe(
		Effect.provide(ReportConsoleLive),
	),
).then(
	(code) => {
		process.exit(toProcessStatus(code));
	},
	(error: unknown) => {
		// Shell boundary: defects only; typed errors are handled in APP
		console.error("Fatal error:", error);
		process.exit(1);
	},
);
