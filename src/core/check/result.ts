// CHANGE: Constructors for CheckResult values
// PURITY: CORE
// INVARIANT: Messages built here are trimmed; process output is kept verbatim; blank text is null
// COMPLEXITY: O(n) where n = captured output length

import type { CheckResult } from "../types/index.js";

function normalizeOutput(text: string | null | undefined): string | null {
	if (text === null || text === undefined) return null;
	const trimmed = text.trim();
	return trimmed.length === 0 ? null : trimmed;
}

function verbatimOutput(text: string): string | null {
	return text.trim().length === 0 ? null : text;
}

/** @pure true */
export function passed(stdout?: string | null): CheckResult {
	return { succeeded: true, stdout: normalizeOutput(stdout), stderr: null };
}

/** @pure true */
export function failed(
	stderr: string | null,
	stdout?: string | null,
): CheckResult {
	return {
		succeeded: false,
		stdout: normalizeOutput(stdout),
		stderr: normalizeOutput(stderr),
	};
}

/**
 * Maps a finished process to a result; exit status 0 is success. Captured
 * text is kept as written, leading indentation included.
 *
 * @pure true
 * @invariant result.succeeded ↔ exitCode = 0
 */
export function fromProcessOutcome(outcome: {
	readonly exitCode: number;
	readonly stdout: string;
	readonly stderr: string;
}): CheckResult {
	return {
		succeeded: outcome.exitCode === 0,
		stdout: verbatimOutput(outcome.stdout),
		stderr: verbatimOutput(outcome.stderr),
	};
}

/**
 * Human-readable text for anything a task failed with.
 *
 * @pure true
 */
export function describeFault(fault: unknown): string {
	if (typeof fault === "object" && fault !== null && "_tag" in fault) {
		const tag = String(fault._tag);
		if ("detail" in fault && typeof fault.detail === "string") {
			return `${tag}: ${fault.detail}`;
		}
		if ("stderr" in fault && typeof fault.stderr === "string") {
			return `${tag}: ${fault.stderr}`;
		}
		return tag;
	}
	if (fault instanceof Error) return fault.message;
	return String(fault);
}
