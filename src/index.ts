// CHANGE: Create public API entry point for library consumers
// WHY: Export APP orchestration, CORE utilities and the git collaborator; keep process plumbing internal
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, Effects or typed interfaces
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION (Programmatic Entry Points)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Runs a check over a file list and prints the summary.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { ReportConsoleLive, runReport, whitespaceCheck } from "linegate";
 *
 * const code = await Effect.runPromise(
 *   runReport({ name: "whitespace", files, check, mode: "verify", verbose: false, showProgress: false })
 *     .pipe(Effect.provide(ReportConsoleLive)),
 * );
 * ```
 */
export {
	dispatchChecks,
	printLines,
	type DispatchOptions,
	type ReportOptions,
	runReport,
	runTask,
} from "./app/orchestrator.js";
export {
	BUILTIN_CHECK_NAMES,
	buildRegistry,
	type CheckContext,
	checkInfo,
	type RegisteredCheck,
} from "./app/registry.js";
export { type CliEnvironment, describeAppError, runCli } from "./app/runCli.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE (Pure Functions and Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	canFix,
	canVerify,
	resolveOperation,
	verifyThenRepair,
} from "./core/check/capability.js";
export {
	describeFault,
	failed,
	fromProcessOutcome,
	passed,
} from "./core/check/result.js";
export { computeExitCode, toProcessStatus } from "./core/decision.js";
export { isAddition, isDeletion, isRename } from "./core/diff/file-delta.js";
export {
	closedInterval,
	formatLineFilter,
	formatLineFilters,
	lineFiltersFromDeltas,
	lineIntervalFromRange,
	singleLine,
} from "./core/diff/interval.js";
export { parseUnifiedDiff } from "./core/diff/parser.js";
export {
	type AppError,
	CapabilityMismatch,
	type CheckFault,
	ConfigError,
	DiffParseError,
	ExecError,
	FSError,
	GitCommandError,
	UsageError,
} from "./core/errors.js";
export type { CheckMode, ExitCode, SourceGroup } from "./core/models.js";
export {
	DEFAULT_PROGRESS_OPTIONS,
	formatProgress,
	type ProgressOptions,
} from "./core/report/progress.js";
export {
	renderFailureDump,
	renderFixReport,
	renderVerifyReport,
	reproductionCommand,
} from "./core/report/render.js";
export { emptyReportState, recordCompletion } from "./core/report/state.js";
export {
	Check,
	type CheckAction,
	type CheckInfo,
	type CheckResult,
	type CLIOptions,
	type Completion,
	type FileDelta,
	type LinegateConfig,
	type LineFilter,
	type LineInterval,
	type ReportLine,
	type ReportState,
	type TaskOperation,
	type ToolConfig,
} from "./core/types/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL (Checks, Git, Console)
// ═══════════════════════════════════════════════════════════════════════════════

export { diffScopedCheck } from "./shell/checks/diff-scoped.js";
export {
	functionCheck,
	type FunctionCheckActions,
} from "./shell/checks/function-check.js";
export { processCheck, toolInvocation } from "./shell/checks/process-check.js";
export {
	trailingNewlineCheck,
	whitespaceCheck,
} from "./shell/checks/text-checks.js";
export { loadLinegateConfig } from "./shell/config/loader.js";
export {
	FileVersion,
	GitClient,
	type GitService,
} from "./shell/git/client.js";
export {
	ReportConsole,
	ReportConsoleLive,
	type ReportConsoleService,
} from "./shell/output/console.js";
export { findSources, readSource } from "./shell/sources/source-group.js";
export { type ProcessOutcome, runProcess } from "./shell/utils/exec.js";
