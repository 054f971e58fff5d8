// CHANGE: Typed domain error ADT for the check engine using Effect.Data
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Unified diff text could not be parsed.
 *
 * @invariant line ≥ 1 ∧ detail.length > 0
 */
export class DiffParseError extends Data.TaggedError("DiffParseError")<{
	readonly line: number;
	readonly text: string;
	readonly detail: string;
}> {}

/**
 * Requested mode is not supported by the check (fix on a verify-only check,
 * or verify on a fix-only check).
 */
export class CapabilityMismatch extends Data.TaggedError("CapabilityMismatch")<{
	readonly check: string;
	readonly mode: "verify" | "fix";
}> {}

/**
 * Git exited with a non-zero status.
 */
export class GitCommandError extends Data.TaggedError("GitCommandError")<{
	readonly args: readonly string[];
	readonly exitCode: number;
	readonly stderr: string;
}> {}

/**
 * Configuration file is unreadable or malformed.
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Command line arguments are invalid.
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly detail: string;
}> {}

/**
 * Filesystem operation error
 *
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * A process could not be launched or was terminated by a signal.
 *
 * @invariant command.length > 0 ∧ detail.length > 0
 */
export class ExecError extends Data.TaggedError("Exec")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * Errors a single check invocation may fail with.
 */
export type CheckFault = DiffParseError | GitCommandError | FSError | ExecError;

/**
 * Union type of all application errors for Effect signatures
 */
export type AppError =
	| CheckFault
	| CapabilityMismatch
	| ConfigError
	| UsageError;
