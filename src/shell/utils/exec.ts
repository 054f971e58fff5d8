// CHANGE: Run an external program (argv, no shell) as an Effect
// WHY: Git queries and external tools share one launch path with typed failures
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<ProcessOutcome, ExecError, never>
// INVARIANT: Exit status ≠ 0 is a value (ProcessOutcome); only launch failures and signals are ExecError
// COMPLEXITY: O(1) time, O(n) space where n = captured output length

import { Effect } from "effect";

import { ExecError } from "../../core/errors.js";
import { execFile, promisify } from "./node-mods.js";

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 10 * 1024 * 1024;

/**
 * Finished process with captured output.
 */
export interface ProcessOutcome {
	readonly exitCode: number;
	readonly stdout: string;
	readonly stderr: string;
}

export interface RunOptions {
	readonly cwd?: string;
}

/**
 * Signature of runProcess; injected where tests replace the real launcher.
 */
export type ProcessRunner = (
	program: string,
	args: readonly string[],
	options?: RunOptions,
) => Effect.Effect<ProcessOutcome, ExecError>;

function readOutput(error: Error, key: "stdout" | "stderr"): string {
	if (!(key in error)) return "";
	const value: unknown = Reflect.get(error, key);
	return typeof value === "string" ? value : "";
}

/**
 * Extract an outcome from a rejected execFile call.
 * A numeric `code` is the exit status; anything else (ENOENT, signals) is not.
 *
 * @pure true
 * @complexity O(1)
 */
function outcomeFromRejection(error: unknown): ProcessOutcome | null {
	if (!(error instanceof Error) || !("code" in error)) return null;
	const code: unknown = error.code;
	if (typeof code !== "number") return null;
	return {
		exitCode: code,
		stdout: readOutput(error, "stdout"),
		stderr: readOutput(error, "stderr"),
	};
}

function describeLaunchFailure(error: unknown): string {
	if (error instanceof Error) {
		const signal: unknown = "signal" in error ? error.signal : null;
		return typeof signal === "string"
			? `terminated by signal ${signal}`
			: error.message;
	}
	return String(error);
}

/**
 * Launches `program` with `args` and waits for it to exit.
 *
 * @param program - Executable name or path
 * @param args - Arguments, passed verbatim
 * @param options - Working directory
 * @returns Effect with exit status and output, or ExecError when the process never ran to completion
 *
 * @pure false (spawns a process)
 * @effect Effect<ProcessOutcome, ExecError>
 * @invariant result.exitCode = process exit status
 *
 * @example
 * ```ts
 * const outcome = yield* runProcess("git", ["rev-parse", "--show-toplevel"]);
 * // { exitCode: 0, stdout: "/repo\n", stderr: "" }
 * ```
 */
export const runProcess: ProcessRunner = (program, args, options = {}) => {
	const command = [program, ...args].join(" ");
	return Effect.logDebug(`$ ${command}`).pipe(
		Effect.zipRight(
			Effect.tryPromise({
				try: () =>
					execFileAsync(program, [...args], {
						...(options.cwd === undefined ? {} : { cwd: options.cwd }),
						encoding: "utf8",
						maxBuffer: MAX_BUFFER,
					}),
				catch: (error) => error,
			}),
		),
		Effect.map(
			({ stdout, stderr }): ProcessOutcome => ({ exitCode: 0, stdout, stderr }),
		),
		Effect.catchAll((error) => {
			const outcome = outcomeFromRejection(error);
			return outcome === null
				? Effect.fail(
						new ExecError({ command, detail: describeLaunchFailure(error) }),
					)
				: Effect.succeed(outcome);
		}),
	);
};
