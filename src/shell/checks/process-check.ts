// CHANGE: External tool wrapped as a check (argv, no shell)
// WHY: Every configured tool is an opaque pass/fail + text producer
// PURITY: SHELL (spawns the tool)
// EFFECT: Effect<CheckResult, never>
// INVARIANT: exit status 0 ↔ result.succeeded; launch failures become failing results
// COMPLEXITY: O(1) per invocation plus tool runtime

import { Effect } from "effect";

import { failed, fromProcessOutcome } from "../../core/check/result.js";
import { formatLineFilters } from "../../core/diff/interval.js";
import {
	Check,
	type CheckInfo,
	type CheckResult,
	type LineFilter,
	type ToolConfig,
} from "../../core/types/index.js";
import { type ProcessRunner, runProcess } from "../utils/exec.js";

export interface ToolRunOptions {
	readonly fix: boolean;
	/** null: no line restriction is passed to the tool */
	readonly filters: readonly LineFilter[] | null;
}

/**
 * Argument vector for one tool invocation on one file.
 *
 * Order: configured args, warnings-as-errors flag, line filter, fix flag, file.
 *
 * @pure true
 * @complexity O(n) where n = total interval count
 *
 * @example
 * ```ts
 * toolInvocation(tidy, "src/a.cpp", { fix: false, filters: [{ name: "src/a.cpp", lines: [{ start: 3, end: 5 }] }] });
 * // ["-p=build", "--line-filter", '[{"name":"src/a.cpp","lines":[[3,5]]}]', "src/a.cpp"]
 * ```
 */
export function toolInvocation(
	tool: ToolConfig,
	file: string,
	options: ToolRunOptions,
): readonly string[] {
	const args = [...tool.args];
	if (tool.warningsAsErrors && tool.warningsAsErrorsFlag !== null) {
		args.push(tool.warningsAsErrorsFlag);
	}
	if (options.filters !== null && tool.lineFilterFlag !== null) {
		args.push(tool.lineFilterFlag, formatLineFilters(options.filters));
	}
	if (options.fix && tool.fixFlag !== null) {
		args.push(tool.fixFlag);
	}
	args.push(file);
	return args;
}

/**
 * Runs the tool once on `file`.
 *
 * @effect Effect<CheckResult, never>
 */
export function runTool(
	tool: ToolConfig,
	file: string,
	options: ToolRunOptions & {
		readonly cwd: string;
		readonly runner?: ProcessRunner;
	},
): Effect.Effect<CheckResult> {
	const runner = options.runner ?? runProcess;
	return runner(tool.program, toolInvocation(tool, file, options), {
		cwd: options.cwd,
	}).pipe(
		Effect.map(fromProcessOutcome),
		Effect.catchTag("Exec", (error) =>
			Effect.succeed(failed(`${error.command}: ${error.detail}`)),
		),
	);
}

export interface ProcessCheckOptions {
	readonly tool: ToolConfig;
	readonly info: CheckInfo;
	readonly cwd: string;
	readonly runner?: ProcessRunner;
}

/**
 * Check over the whole file. Repair is available when the tool declares a fix flag.
 */
export function processCheck(options: ProcessCheckOptions): Check {
	const { tool, info } = options;
	const action =
		(fix: boolean) =>
		(file: string): Effect.Effect<CheckResult> =>
			runTool(tool, file, {
				fix,
				filters: null,
				cwd: options.cwd,
				...(options.runner === undefined ? {} : { runner: options.runner }),
			});
	return tool.fixFlag === null
		? Check.VerifierOnly({ info, verify: action(false) })
		: Check.VerifierAndFixer({
				info,
				verify: action(false),
				repair: action(true),
			});
}
