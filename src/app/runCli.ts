// CHANGE: Application entry composing argument parsing, configuration, source selection and the report
// WHY: APP returns an ExitCode value; BIN is the only layer that terminates the process
// PURITY: APP (no process.exit)
// EFFECT: Effect<ExitCode, never, ReportConsole>
// INVARIANT: Usage, configuration and repository errors map to exit code 2 with one message on stderr
// COMPLEXITY: O(n) where n = number of selected files

import { Effect, Either, Logger, LogLevel } from "effect";
import { match } from "ts-pattern";

import { type AppError, UsageError } from "../core/errors.js";
import { type ExitCode, USAGE_EXIT_CODE } from "../core/models.js";
import type { CLIOptions, LogLevelName } from "../core/types/index.js";
import { loadLinegateConfig } from "../shell/config/loader.js";
import { parseCLIArgs, usageText } from "../shell/config/cli.js";
import { GitClient } from "../shell/git/client.js";
import { ReportConsole } from "../shell/output/console.js";
import { findSources } from "../shell/sources/source-group.js";
import type { ProcessRunner } from "../shell/utils/exec.js";
import { path } from "../shell/utils/node-mods.js";
import { runReport } from "./orchestrator.js";
import { BUILTIN_CHECK_NAMES, buildRegistry } from "./registry.js";

export const PROGRAM_NAME = "linegate";

export interface CliEnvironment {
	/** Directory the command was invoked from */
	readonly cwd: string;
	readonly runner?: ProcessRunner;
}

const toLogLevel = (level: LogLevelName): LogLevel.LogLevel =>
	match(level)
		.with("debug", () => LogLevel.Debug)
		.with("info", () => LogLevel.Info)
		.with("warning", () => LogLevel.Warning)
		.with("error", () => LogLevel.Error)
		.with("none", () => LogLevel.None)
		.exhaustive();

/**
 * One-line message for an error that stops the run.
 *
 * @pure true
 */
export function describeAppError(error: AppError): string {
	return match(error)
		.with({ _tag: "UsageError" }, (e) => e.detail)
		.with({ _tag: "ConfigError" }, (e) => `${e.path}: ${e.detail}`)
		.with(
			{ _tag: "CapabilityMismatch" },
			(e) => `'${e.check}' cannot ${e.mode} files`,
		)
		.with(
			{ _tag: "GitCommandError" },
			(e) =>
				`git ${e.args.join(" ")} exited with ${e.exitCode}${e.stderr.length > 0 ? `: ${e.stderr}` : ""}`,
		)
		.with({ _tag: "DiffParseError" }, (e) => `diff line ${e.line}: ${e.detail}`)
		.with({ _tag: "Exec" }, (e) => `${e.command}: ${e.detail}`)
		.with({ _tag: "FS" }, (e) => e.detail)
		.exhaustive();
}

/**
 * Repository root, or the invocation directory when git is not needed.
 */
function resolveRoot(
	options: CLIOptions,
	env: CliEnvironment,
): Effect.Effect<string, AppError> {
	const needsGit = options.sourceGroup !== "input" || options.staged === true;
	return GitClient.repositoryRoot(env.cwd, env.runner).pipe(
		Effect.catchAll((error) =>
			needsGit
				? Effect.fail(error)
				: Effect.logDebug(
						`not in a git repository, using ${env.cwd}`,
					).pipe(Effect.as(env.cwd)),
		),
	);
}

/**
 * Check names shown by `--help`: built-ins plus configured tools. A missing
 * repository or unreadable configuration leaves the built-ins.
 */
function availableChecks(
	options: CLIOptions,
	env: CliEnvironment,
): Effect.Effect<readonly string[]> {
	return Effect.gen(function* () {
		const root = yield* resolveRoot(options, env);
		const config = yield* loadLinegateConfig(
			options.configPath === null
				? null
				: path.resolve(env.cwd, options.configPath),
			root,
		);
		const registry = yield* buildRegistry(config);
		return [...registry.keys()];
	}).pipe(
		Effect.catchAll((error) =>
			Effect.logDebug(
				`listing built-in checks only: ${describeAppError(error)}`,
			).pipe(Effect.as(BUILTIN_CHECK_NAMES)),
		),
	);
}

function execute(
	options: CLIOptions,
	args: readonly string[],
	env: CliEnvironment,
): Effect.Effect<ExitCode, AppError, ReportConsole> {
	return Effect.gen(function* () {
		const output = yield* ReportConsole;
		if (options.help) {
			const checks = yield* availableChecks(options, env);
			yield* output.info(usageText(checks));
			return 0;
		}
		const name = options.checkName;
		if (name === null) {
			return yield* Effect.fail(
				new UsageError({
					detail: `missing check name (try '${PROGRAM_NAME} --help')`,
				}),
			);
		}

		const root = yield* resolveRoot(options, env);
		const git = new GitClient({
			cwd: root,
			...(env.runner === undefined ? {} : { runner: env.runner }),
		});
		const config = yield* loadLinegateConfig(
			options.configPath === null
				? null
				: path.resolve(env.cwd, options.configPath),
			root,
		);
		const registry = yield* buildRegistry(config);
		const entry = registry.get(name);
		if (entry === undefined) {
			return yield* Effect.fail(
				new UsageError({
					detail: `unknown check '${name}'; available: ${[...registry.keys()].join(", ")}`,
				}),
			);
		}

		const staged = options.staged ?? options.sourceGroup === "staged";
		const mode = options.fix ? "fix" : "verify";
		const check = entry.build({
			git,
			staged,
			mode,
			base: options.base,
			argv: [PROGRAM_NAME, ...args],
			...(env.runner === undefined ? {} : { runner: env.runner }),
		});
		const files = yield* findSources(git, {
			group: options.sourceGroup,
			base: options.base,
			files: options.files,
			extensions: entry.extensions,
			cwd: env.cwd,
		});
		yield* Effect.logInfo(
			`running '${entry.name}' (staged=${String(staged)}) on ${files.length} file(s)`,
		);

		return yield* runReport({
			name: entry.label,
			files,
			check,
			mode,
			...(options.jobs === null ? {} : { jobs: options.jobs }),
			verbose: options.verbose,
			showProgress: options.showProgress,
		});
	});
}

/**
 * Runs the command line program.
 *
 * @param args Arguments without the node binary and script path
 * @param env Invocation directory and optional process runner
 * @returns Exit code: verify 0/1, fix = unrepaired file count, 2 on usage or configuration errors
 *
 * @pure false (runs git and tools, writes to the console)
 * @effect Effect<ExitCode, never, ReportConsole>
 *
 * @example
 * ```ts
 * const code = await Effect.runPromise(
 *   runCli(["whitespace", "--source-group", "staged"], { cwd: process.cwd() }).pipe(
 *     Effect.provide(ReportConsoleLive),
 *   ),
 * );
 * ```
 */
export function runCli(
	args: readonly string[],
	env: CliEnvironment,
): Effect.Effect<ExitCode, never, ReportConsole> {
	const parsed = parseCLIArgs(args);
	const logLevel = Either.isRight(parsed) ? parsed.right.logLevel : "warning";
	const program = Effect.flatMap(parsed, (options) =>
		execute(options, args, env),
	);
	return program.pipe(
		Effect.catchAll((error) =>
			Effect.flatMap(ReportConsole, (output) =>
				output.error(`${PROGRAM_NAME}: ${describeAppError(error)}`),
			).pipe(Effect.as(USAGE_EXIT_CODE)),
		),
		Logger.withMinimumLogLevel(toLogLevel(logLevel)),
	);
}
