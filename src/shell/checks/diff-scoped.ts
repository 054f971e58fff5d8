// CHANGE: Restrict an external tool's findings to the lines changed in git
// WHY: The tool filters its own diagnostics through the line filter; nothing is post-processed
// PURITY: SHELL (git + tool subprocess, sequential within one task)
// EFFECT: Effect<CheckResult, GitCommandError | ExecError | DiffParseError>
// INVARIANT: No changed lines → the tool is not launched and the file passes
// COMPLEXITY: O(d) where d = diff size for the file

import { Effect } from "effect";

import { passed } from "../../core/check/result.js";
import { lineFiltersFromDeltas } from "../../core/diff/interval.js";
import type { CheckFault } from "../../core/errors.js";
import {
	Check,
	type CheckInfo,
	type CheckResult,
	type LineFilter,
	type ToolConfig,
} from "../../core/types/index.js";
import type { GitService } from "../git/client.js";
import type { ProcessRunner } from "../utils/exec.js";
import { runTool } from "./process-check.js";

export interface DiffScopedCheckOptions {
	readonly tool: ToolConfig;
	readonly info: CheckInfo;
	readonly git: GitService;
	/** Diff the index instead of the work tree */
	readonly staged: boolean;
	/** Revision the diff is taken against; null for the default */
	readonly revision: string | null;
	readonly runner?: ProcessRunner;
}

/**
 * Filters with at least one interval. A filter with no lines would lift the
 * restriction in tools that read an empty list as "everything".
 *
 * @pure true
 */
export function nonEmptyFilters(
	filters: readonly LineFilter[],
): readonly LineFilter[] {
	return filters.filter((filter) => filter.lines.length > 0);
}

/**
 * Diff-scoped variant of processCheck.
 *
 * @example
 * ```ts
 * const check = diffScopedCheck({ tool, info, git, staged: true, revision: null });
 * ```
 */
export function diffScopedCheck(options: DiffScopedCheckOptions): Check {
	const { tool, info, git } = options;
	const action =
		(fix: boolean) =>
		(file: string): Effect.Effect<CheckResult, CheckFault> =>
			Effect.gen(function* () {
				const deltas = yield* git.diff([file], {
					staged: options.staged,
					revision: options.revision,
					contextLines: tool.contextLines,
				});
				const filters = nonEmptyFilters(lineFiltersFromDeltas(deltas));
				if (filters.length === 0) {
					yield* Effect.logDebug(`${file}: no changed lines, skipping ${tool.name}`);
					return passed();
				}
				return yield* runTool(tool, file, {
					fix,
					filters,
					cwd: git.cwd,
					...(options.runner === undefined ? {} : { runner: options.runner }),
				});
			});
	return tool.fixFlag === null
		? Check.VerifierOnly({ info, verify: action(false) })
		: Check.VerifierAndFixer({
				info,
				verify: action(false),
				repair: action(true),
			});
}
