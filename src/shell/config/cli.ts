// CHANGE: Command line parsing for `linegate <check> [options] [file ...]`
// WHY: Handler tables keep each flag's rule in one place and the loop flat
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: Unknown options and malformed values are UsageError, never silently ignored
// COMPLEXITY: O(n) where n = number of arguments

import { Either } from "effect";

import { UsageError } from "../../core/errors.js";
import { SOURCE_GROUPS, type SourceGroup } from "../../core/models.js";
import type { CLIOptions, LogLevelName } from "../../core/types/index.js";

const LOG_LEVELS: readonly LogLevelName[] = [
	"debug",
	"info",
	"warning",
	"error",
	"none",
];

export const DEFAULT_CLI_OPTIONS: CLIOptions = {
	checkName: null,
	files: [],
	sourceGroup: "input",
	base: null,
	staged: null,
	jobs: null,
	verbose: false,
	fix: false,
	showProgress: true,
	configPath: null,
	logLevel: "warning",
	help: false,
};

type ValueHandler = (
	value: string,
	current: CLIOptions,
) => Either.Either<CLIOptions, UsageError>;

type FlagHandler = (current: CLIOptions) => CLIOptions;

const usage = (detail: string): Either.Either<never, UsageError> =>
	Either.left(new UsageError({ detail }));

function isSourceGroup(value: string): value is SourceGroup {
	return SOURCE_GROUPS.some((group) => group === value);
}

function isLogLevel(value: string): value is LogLevelName {
	return LOG_LEVELS.some((level) => level === value);
}

const parseJobs: ValueHandler = (value, current) => {
	if (!/^\d+$/u.test(value) || Number.parseInt(value, 10) < 1) {
		return usage(`--jobs expects a positive integer, got '${value}'`);
	}
	return Either.right({ ...current, jobs: Number.parseInt(value, 10) });
};

const valueHandlers = new Map<string, ValueHandler>([
	[
		"--source-group",
		(value, current) =>
			isSourceGroup(value)
				? Either.right({ ...current, sourceGroup: value })
				: usage(
						`--source-group expects one of ${SOURCE_GROUPS.join(", ")}, got '${value}'`,
					),
	],
	["--base", (value, current) => Either.right({ ...current, base: value })],
	["-j", parseJobs],
	["--jobs", parseJobs],
	[
		"--config",
		(value, current) => Either.right({ ...current, configPath: value }),
	],
	[
		"--log-level",
		(value, current) =>
			isLogLevel(value)
				? Either.right({ ...current, logLevel: value })
				: usage(
						`--log-level expects one of ${LOG_LEVELS.join(", ")}, got '${value}'`,
					),
	],
]);

const flagHandlers = new Map<string, FlagHandler>([
	["--staged", (current) => ({ ...current, staged: true })],
	["--no-staged", (current) => ({ ...current, staged: false })],
	["-v", (current) => ({ ...current, verbose: true })],
	["--verbose", (current) => ({ ...current, verbose: true })],
	["--fix", (current) => ({ ...current, fix: true })],
	["--progress", (current) => ({ ...current, showProgress: true })],
	["--no-progress", (current) => ({ ...current, showProgress: false })],
	["-h", (current) => ({ ...current, help: true })],
	["--help", (current) => ({ ...current, help: true })],
]);

function addPositional(current: CLIOptions, arg: string): CLIOptions {
	return current.checkName === null
		? { ...current, checkName: arg }
		: { ...current, files: [...current.files, arg] };
}

/**
 * Splits `--flag=value`; other arguments have no inline value.
 *
 * @pure true
 */
function splitInline(arg: string): readonly [string, string | undefined] {
	const eq = arg.indexOf("=");
	if (!arg.startsWith("--") || eq === -1) return [arg, undefined];
	return [arg.slice(0, eq), arg.slice(eq + 1)];
}

/**
 * Парсит аргументы командной строки.
 *
 * @param args Аргументы без `node` и пути к скрипту
 * @returns Опции командной строки или UsageError
 *
 * @example
 * ```ts
 * // Command: linegate whitespace --source-group staged -j 4 src/a.cpp
 * const options = parseCLIArgs();
 * // Right({ checkName: "whitespace", sourceGroup: "staged", jobs: 4, files: ["src/a.cpp"], ... })
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): Either.Either<CLIOptions, UsageError> {
	let state: CLIOptions = DEFAULT_CLI_OPTIONS;
	let optionsEnded = false;

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? "";
		if (arg.length === 0) continue;

		if (optionsEnded || !arg.startsWith("-") || arg === "-") {
			state = addPositional(state, arg);
			continue;
		}
		if (arg === "--") {
			optionsEnded = true;
			continue;
		}

		const [flag, inline] = splitInline(arg);
		const valueHandler = valueHandlers.get(flag);
		if (valueHandler !== undefined) {
			const value = inline ?? args[i + 1];
			if (inline === undefined) i++;
			if (value === undefined) return usage(`${flag} requires a value`);
			const next = valueHandler(value, state);
			if (Either.isLeft(next)) return next;
			state = next.right;
			continue;
		}

		const flagHandler = flagHandlers.get(flag);
		if (flagHandler !== undefined && inline === undefined) {
			state = flagHandler(state);
			continue;
		}
		return usage(`unknown option '${arg}'`);
	}

	return Either.right(state);
}

/**
 * Help text listing the available checks.
 *
 * @pure true
 */
export function usageText(checks: readonly string[]): string {
	return [
		"usage: linegate <check> [options] [file ...]",
		"",
		`checks: ${checks.length === 0 ? "(none)" : checks.join(", ")}`,
		"",
		"processing arguments:",
		`  --source-group GROUP   ${SOURCE_GROUPS.join("|")} (default: input); staged implies --staged`,
		"  --base REV             revision the 'modified' group and diff-scoped tools compare against",
		"  --staged, --no-staged  check the staged state of the sources",
		"  -j, --jobs N           allow N jobs at once (default: CPU count)",
		"  --fix                  apply fixes in place to the work tree",
		"",
		"output control arguments:",
		"  -v, --verbose          print the output of failing checks",
		"  --progress, --no-progress",
		"                         toggle the progress bar (default: on)",
		`  --log-level LEVEL      ${LOG_LEVELS.join("|")} (default: warning)`,
		"  --config PATH          tool configuration (default: linegate.config.json at the repository root)",
		"  -h, --help             show this help",
		"",
		"exit status:",
		"  verify: 0 when every file passes, 1 otherwise",
		"  fix: number of files left unrepaired, capped at 255",
		"  2: invalid arguments, configuration or repository (also two unrepaired files after --fix)",
	].join("\n");
}
