// CHANGE: Resolve a check's capability for the requested mode exactly once
// PURITY: CORE
// INVARIANT: resolveOperation(c, m) = Right(op) ↔ (m = verify → c can verify) ∧ (m = fix → c can fix)
// COMPLEXITY: O(1)

import { Effect, Either } from "effect";
import { match } from "ts-pattern";

import { CapabilityMismatch } from "../errors.js";
import type { CheckMode } from "../models.js";
import type { Check, CheckAction, TaskOperation } from "../types/index.js";

/** @pure true */
export function canVerify(check: Check): boolean {
	return check._tag !== "FixerOnly";
}

/** @pure true */
export function canFix(check: Check): boolean {
	return check._tag !== "VerifierOnly";
}

/**
 * Fix composed from verify and repair: files that already pass are left
 * untouched and reported as `null`.
 *
 * @pure true
 * @invariant verify(file).succeeded → result = null
 */
export function verifyThenRepair(
	verify: CheckAction,
	repair: CheckAction,
): TaskOperation {
	return (file) =>
		Effect.flatMap(verify(file), (verdict) =>
			verdict.succeeded ? Effect.succeed(null) : repair(file),
		);
}

/**
 * Picks the per-file operation for a mode.
 *
 * @param check Check with its capability tag
 * @param name Check name used in the mismatch error
 * @param mode Requested mode
 * @returns Operation or CapabilityMismatch when the check lacks the capability
 *
 * @pure true
 * @complexity O(1)
 *
 * @example
 * ```ts
 * const op = resolveOperation(whitespaceCheck, "whitespace", "fix");
 * // Right((file) => verify, then repair on failure)
 * ```
 */
export function resolveOperation(
	check: Check,
	name: string,
	mode: CheckMode,
): Either.Either<TaskOperation, CapabilityMismatch> {
	const mismatch = Either.left(new CapabilityMismatch({ check: name, mode }));
	return match<Check, Either.Either<TaskOperation, CapabilityMismatch>>(check)
		.with({ _tag: "VerifierOnly" }, (c) =>
			mode === "verify" ? Either.right(c.verify) : mismatch,
		)
		.with({ _tag: "FixerOnly" }, (c) =>
			mode === "fix" ? Either.right(c.repair) : mismatch,
		)
		.with({ _tag: "VerifierAndFixer" }, (c) =>
			Either.right(
				mode === "verify"
					? c.verify
					: verifyThenRepair(c.verify, c.repair),
			),
		)
		.exhaustive();
}
