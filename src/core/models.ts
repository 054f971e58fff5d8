// CHANGE: Introduce Functional Core domain models for check runs (pure, immutable)
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Process exit code produced by a check run.
 *
 * @remarks
 * - verify mode: exitCode ∈ {0, 1}
 * - fix mode: exitCode = number of files that could not be repaired automatically
 * - usage and configuration errors: 2
 * - the process status is capped at MAX_EXIT_STATUS, so 2 also means
 *   "two files left unrepaired" after a fix run
 */
export type ExitCode = number;

/**
 * Whether a run validates files or repairs them in place.
 */
export type CheckMode = "verify" | "fix";

/**
 * Named selection of candidate files.
 *
 * @remarks
 * - `all`: every tracked file in the repository
 * - `staged`: files changed in the index
 * - `modified`: files differing from a base revision (or the work tree)
 * - `input`: only the files given explicitly on the command line
 */
export type SourceGroup = "all" | "staged" | "modified" | "input";

export const SOURCE_GROUPS: readonly SourceGroup[] = [
	"all",
	"staged",
	"modified",
	"input",
];

/**
 * Exit code used when the command line or configuration is invalid.
 */
export const USAGE_EXIT_CODE: ExitCode = 2;

/**
 * Largest status a process can report; POSIX keeps only the low 8 bits.
 */
export const MAX_EXIT_STATUS: ExitCode = 255;
