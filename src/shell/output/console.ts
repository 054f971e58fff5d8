// CHANGE: Console output as an Effect service instead of direct console.log calls
// WHY: APP renders through a service; tests swap in a recording implementation
// PURITY: SHELL (writes to process streams)
// INVARIANT: info → stdout, error → stderr, progress → stdout without newline
// COMPLEXITY: O(n) where n = text length

import { Context, Effect, Layer } from "effect";

/**
 * Output channel for reports and the progress bar.
 */
export interface ReportConsoleService {
	readonly info: (text: string) => Effect.Effect<void>;
	readonly error: (text: string) => Effect.Effect<void>;
	/** Draws `text` and returns the cursor to the start of the line */
	readonly progress: (text: string) => Effect.Effect<void>;
	/** Overwrites `width` columns of the progress line with spaces */
	readonly clearProgress: (width: number) => Effect.Effect<void>;
}

export class ReportConsole extends Context.Tag("ReportConsole")<
	ReportConsole,
	ReportConsoleService
>() {}

export const ReportConsoleLive = Layer.succeed(ReportConsole, {
	info: (text) =>
		Effect.sync(() => {
			process.stdout.write(`${text}\n`);
		}),
	error: (text) =>
		Effect.sync(() => {
			process.stderr.write(`${text}\n`);
		}),
	progress: (text) =>
		Effect.sync(() => {
			process.stdout.write(`${text}\r`);
		}),
	clearProgress: (width) =>
		Effect.sync(() => {
			process.stdout.write(`${" ".repeat(width)}\r`);
		}),
});
