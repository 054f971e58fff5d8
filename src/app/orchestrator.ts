// CHANGE: Bounded fan-out of per-file checks with a single aggregating fiber
// WHY: Completions travel through a queue to one owner of ReportState; no shared lists, no lock
// PURITY: APP (composes CORE rendering with SHELL console output)
// EFFECT: Effect<ExitCode, CapabilityMismatch, ReportConsole>
// INVARIANT: |passing| + |failing| + |no-op fixes| = |files|; at most `jobs` tasks in flight
// COMPLEXITY: O(n) tasks where n = |files|

import { Cause, Effect, Fiber, Queue } from "effect";

import { canFix, resolveOperation } from "../core/check/capability.js";
import { describeFault, failed } from "../core/check/result.js";
import { computeExitCode } from "../core/decision.js";
import type { CapabilityMismatch } from "../core/errors.js";
import type { CheckMode, ExitCode } from "../core/models.js";
import { formatProgress } from "../core/report/progress.js";
import {
	renderFailureDump,
	renderFixReport,
	renderVerifyReport,
} from "../core/report/render.js";
import { emptyReportState, recordCompletion } from "../core/report/state.js";
import type {
	Check,
	Completion,
	ReportLine,
	ReportState,
	TaskOperation,
} from "../core/types/index.js";
import {
	ReportConsole,
	type ReportConsoleService,
} from "../shell/output/console.js";
import { defaultJobs } from "../shell/utils/parallelism.js";

export interface ReportOptions {
	/** Label used in every summary line */
	readonly name: string;
	readonly files: readonly string[];
	readonly check: Check;
	readonly mode: CheckMode;
	/** Worker count; defaults to the host's available parallelism */
	readonly jobs?: number;
	readonly verbose: boolean;
	readonly showProgress: boolean;
}

export interface DispatchOptions {
	readonly files: readonly string[];
	readonly operation: TaskOperation;
	readonly jobs: number;
	readonly verbose: boolean;
	readonly showProgress: boolean;
}

/**
 * Writes rendered lines to their streams in order.
 *
 * @effect Effect<void, never, never>
 */
export function printLines(
	output: ReportConsoleService,
	lines: readonly ReportLine[],
): Effect.Effect<void> {
	return Effect.forEach(
		lines,
		(line) =>
			line.stream === "info" ? output.info(line.text) : output.error(line.text),
		{ discard: true },
	);
}

/**
 * Runs one task. Typed faults and defects alike become a failing result for
 * this file only.
 *
 * @effect Effect<Completion, never, never>
 */
export function runTask(
	operation: TaskOperation,
	file: string,
): Effect.Effect<Completion> {
	return Effect.suspend(() => operation(file)).pipe(
		Effect.map((result): Completion => ({ file, result })),
		Effect.catchAllCause((cause) => {
			const completion: Completion = {
				file,
				result: failed(describeFault(Cause.squash(cause))),
			};
			return Effect.logDebug(`task for ${file} failed`, cause).pipe(
				Effect.as(completion),
			);
		}),
	);
}

interface AggregateResult {
	readonly state: ReportState;
	readonly progressWidth: number;
}

/**
 * Sole consumer of the completion queue; owns the state and the progress line.
 */
function aggregate(
	queue: Queue.Dequeue<Completion>,
	output: ReportConsoleService,
	options: DispatchOptions,
): Effect.Effect<AggregateResult> {
	return Effect.gen(function* () {
		const total = options.files.length;
		let state = emptyReportState;
		let progressWidth = 0;

		for (let taken = 0; taken < total; taken++) {
			const completion = yield* Queue.take(queue);
			state = recordCompletion(state, completion);

			const { result } = completion;
			if (options.verbose && result !== null && !result.succeeded) {
				if (options.showProgress && progressWidth > 0) {
					yield* output.clearProgress(progressWidth);
					progressWidth = 0;
				}
				yield* printLines(output, renderFailureDump(completion.file, result));
			}
			if (options.showProgress) {
				const line = formatProgress(state.completed, total);
				yield* output.progress(line);
				progressWidth = line.length;
			}
		}
		return { state, progressWidth };
	});
}

/**
 * Fans the operation out over `files` and folds the completions.
 *
 * @param options Files, resolved operation and output flags
 * @returns Final report state
 *
 * @effect Effect<ReportState, never, ReportConsole>
 * @invariant result.completed = |files|
 *
 * @example
 * ```ts
 * const state = yield* dispatchChecks({ files, operation, jobs: 4, verbose: false, showProgress: false });
 * ```
 */
export function dispatchChecks(
	options: DispatchOptions,
): Effect.Effect<ReportState, never, ReportConsole> {
	return Effect.gen(function* () {
		const output = yield* ReportConsole;
		const queue = yield* Queue.unbounded<Completion>();
		const aggregator = yield* Effect.fork(aggregate(queue, output, options));

		yield* Effect.forEach(
			options.files,
			(file) =>
				runTask(options.operation, file).pipe(
					Effect.flatMap((completion) => Queue.offer(queue, completion)),
				),
			{ concurrency: Math.max(1, options.jobs), discard: true },
		);

		const { state, progressWidth } = yield* Fiber.join(aggregator);
		yield* Queue.shutdown(queue);
		if (options.showProgress && progressWidth > 0) {
			yield* output.clearProgress(progressWidth);
		}
		return state;
	});
}

/**
 * Runs a check over all files and prints the summary.
 *
 * @returns Exit code: verify 0/1, fix = number of files left unrepaired
 *
 * @effect Effect<ExitCode, CapabilityMismatch, ReportConsole>
 * @invariant CapabilityMismatch is raised before any task starts
 *
 * @example
 * ```ts
 * const code = yield* runReport({
 *   name: "whitespace", files, check, mode: "verify", verbose: false, showProgress: true,
 * });
 * ```
 */
export function runReport(
	options: ReportOptions,
): Effect.Effect<ExitCode, CapabilityMismatch, ReportConsole> {
	return Effect.gen(function* () {
		const operation = yield* resolveOperation(
			options.check,
			options.name,
			options.mode,
		);
		const output = yield* ReportConsole;

		if (options.files.length === 0) {
			yield* output.info(`No files for ${options.name} validation`);
			return 0;
		}

		const jobs = options.jobs ?? defaultJobs();
		yield* Effect.logDebug(
			`${options.mode} '${options.name}' on ${options.files.length} file(s) with ${jobs} job(s)`,
		);

		const state = yield* dispatchChecks({
			files: options.files,
			operation,
			jobs,
			verbose: options.verbose,
			showProgress: options.showProgress,
		});

		const lines =
			options.mode === "fix"
				? renderFixReport(options.name, state)
				: renderVerifyReport({
						name: options.name,
						state,
						info: options.check.info,
						verbose: options.verbose,
						canFix: canFix(options.check),
					});
		yield* printLines(output, lines);
		return computeExitCode(options.mode, state);
	});
}
