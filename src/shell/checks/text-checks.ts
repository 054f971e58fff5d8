// CHANGE: Built-in whitespace and trailing-newline checks
// WHY: Checks that need no external tool; verify may read the staged blob, repair edits the work tree
// PURITY: SHELL (reads sources, rewrites files)
// EFFECT: Effect<CheckResult, CheckFault>
// INVARIANT: repair(file) followed by verify(file) on the work tree succeeds
// COMPLEXITY: O(n) where n = file size

import { Effect } from "effect";

import { failed, passed } from "../../core/check/result.js";
import {
	findTrailingWhitespace,
	hasTrailingNewline,
	stripTrailingWhitespace,
} from "../../core/checks/text-rules.js";
import type { CheckFault } from "../../core/errors.js";
import type { Check, CheckInfo } from "../../core/types/index.js";
import {
	appendWorkTree,
	readWorkTree,
	writeWorkTree,
} from "../sources/files.js";
import { functionCheck } from "./function-check.js";

/**
 * Reads the content a verification looks at (index or work tree).
 */
export type SourceReader = (file: string) => Effect.Effect<string, CheckFault>;

/**
 * Fails with one `<file>:<line>: trailing whitespace detected` line per offender.
 *
 * @example
 * ```ts
 * const check = whitespaceCheck(info, (file) => readSource(git, file, false));
 * ```
 */
export function whitespaceCheck(info: CheckInfo, read: SourceReader): Check {
	return functionCheck(info, {
		verify: (file) =>
			read(file).pipe(
				Effect.map((content) => {
					const offenders = findTrailingWhitespace(content);
					return offenders.length === 0
						? passed()
						: failed(
								offenders
									.map(
										(line) => `${file}:${line}: trailing whitespace detected`,
									)
									.join("\n"),
							);
				}),
			),
		repair: (file) =>
			readWorkTree(file).pipe(
				Effect.flatMap((content) =>
					writeWorkTree(file, stripTrailingWhitespace(content)),
				),
				Effect.as(passed()),
			),
	});
}

/**
 * Fails unless the content ends with `\n`; empty files pass. Repair appends
 * only to a work tree file that lacks the newline.
 */
export function trailingNewlineCheck(
	info: CheckInfo,
	read: SourceReader,
): Check {
	return functionCheck(info, {
		verify: (file) =>
			read(file).pipe(
				Effect.map((content) =>
					hasTrailingNewline(content)
						? passed()
						: failed(`${file}: missing trailing newline`),
				),
			),
		repair: (file) =>
			readWorkTree(file).pipe(
				Effect.flatMap((content) =>
					hasTrailingNewline(content)
						? Effect.void
						: appendWorkTree(file, "\n"),
				),
				Effect.as(passed()),
			),
	});
}
