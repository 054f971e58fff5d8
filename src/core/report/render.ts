// CHANGE: Render final verify/fix summaries and verbose failure dumps as plain lines
// PURITY: CORE
// INVARIANT: Output depends only on (name, state, flags); exit codes are computed elsewhere
// COMPLEXITY: O(n) where n = |passing| + |failing|

import type {
	CheckInfo,
	CheckResult,
	ReportLine,
	ReportState,
} from "../types/index.js";

const DIVIDER = "-".repeat(80);
const PROGRESS_FLAGS: readonly string[] = ["--progress", "--no-progress"];

const info = (text: string): ReportLine => ({ stream: "info", text });
const error = (text: string): ReportLine => ({ stream: "error", text });

/**
 * Normalizes an invocation for display: verbose and progress flags are dropped.
 *
 * @pure true
 *
 * @example
 * ```ts
 * reproductionCommand(["linegate", "whitespace", "-v", "--no-progress"], ["-v", "--verbose"]);
 * // ["linegate", "whitespace"]
 * ```
 */
export function reproductionCommand(
	argv: readonly string[],
	verboseFlags: readonly string[],
): readonly string[] {
	const removed = new Set([...verboseFlags, ...PROGRESS_FLAGS]);
	return argv.filter((arg) => !removed.has(arg));
}

function renderCommand(command: readonly string[], flag: string): string {
	return `>  ${[...command, flag].join(" ")}`;
}

function bullets(files: readonly string[]): readonly string[] {
	return files.map((file) => ` • ${file}`);
}

/**
 * Summary for a verify run.
 *
 * The verbose suggestion is omitted when the run already was verbose; the
 * fix suggestion appears only for checks that can repair.
 *
 * @pure true
 */
export function renderVerifyReport(params: {
	readonly name: string;
	readonly state: ReportState;
	readonly info: CheckInfo;
	readonly verbose: boolean;
	readonly canFix: boolean;
}): readonly ReportLine[] {
	const { name, state, verbose, canFix } = params;
	if (state.failing.length === 0) {
		const count = state.passing.length;
		const noun = count === 1 ? "file" : "files";
		return [info(`${count} ${noun} passed ${name} validation`)];
	}

	const lines: ReportLine[] = [
		error(`The following files failed ${name} validation:`),
		...bullets(state.failing).map(error),
	];
	const command = reproductionCommand(
		params.info.command,
		params.info.verboseFlags,
	);
	const verboseFlag = params.info.verboseFlags[0];
	if (!verbose && verboseFlag !== undefined) {
		lines.push(
			error(""),
			error("Additional diagnostics may be provided by running:"),
			error(renderCommand(command, verboseFlag)),
		);
	}
	const fixFlag = params.info.fixFlags[0];
	if (canFix && fixFlag !== undefined) {
		lines.push(
			error(""),
			error("Fixes can be automatically applied to your work tree with:"),
			error(renderCommand(command, fixFlag)),
			error(""),
		);
	}
	return lines;
}

/**
 * Summary for a fix run.
 *
 * @pure true
 */
export function renderFixReport(
	name: string,
	state: ReportState,
): readonly ReportLine[] {
	if (state.passing.length === 0 && state.failing.length === 0) {
		return [info(`No files needed to be fixed for ${name} validation`)];
	}
	const lines: ReportLine[] = [];
	if (state.passing.length > 0) {
		lines.push(
			info(
				`The following files were automatically fixed for ${name} validation:`,
			),
			...bullets(state.passing).map(info),
		);
	}
	if (state.failing.length > 0) {
		lines.push(
			error(
				`The following files could not be automatically fixed for ${name} validation:`,
			),
			...bullets(state.failing).map(error),
			error(""),
			info(
				`NOTE: These files will require manual changes to pass ${name} validation!`,
			),
		);
	}
	return lines;
}

/**
 * Captured output of a failed task, printed in verbose mode as it completes.
 *
 * @pure true
 */
export function renderFailureDump(
	file: string,
	result: CheckResult,
): readonly ReportLine[] {
	const lines: ReportLine[] = [];
	if (result.stdout !== null) {
		lines.push(
			info(DIVIDER),
			info(`stdout for ${file}:`),
			info(DIVIDER),
			info(result.stdout),
		);
	}
	if (result.stderr !== null) {
		lines.push(
			error(DIVIDER),
			error(`stderr for ${file}:`),
			error(DIVIDER),
			error(result.stderr),
		);
	}
	return lines;
}
