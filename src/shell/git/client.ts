// CHANGE: Git collaborator bound to a working directory at construction
// WHY: Diff-scoped checks and source selection query one repository; cwd is not global state
// PURITY: SHELL (spawns git)
// EFFECT: Effect<_, GitCommandError | ExecError | DiffParseError>
// INVARIANT: Every command runs with cwd = this.cwd; absolute paths are relativized against it
// COMPLEXITY: O(n) in git output size

import { Data, Effect } from "effect";

import { parseUnifiedDiff } from "../../core/diff/parser.js";
import {
	type DiffParseError,
	type ExecError,
	GitCommandError,
} from "../../core/errors.js";
import type { FileDelta } from "../../core/types/index.js";
import { type ProcessRunner, runProcess } from "../utils/exec.js";
import { path } from "../utils/node-mods.js";

/**
 * Version of a file that `showFile` reads.
 */
export type FileVersion = Data.TaggedEnum<{
	Staged: {};
	Revision: { readonly revision: string };
}>;

export const FileVersion = Data.taggedEnum<FileVersion>();

export interface DiffOptions {
	/** Compare the index instead of the work tree */
	readonly staged?: boolean;
	/** Revision (or range) to diff against */
	readonly revision?: string | null;
	/** Lines of context around each hunk */
	readonly contextLines?: number;
}

export interface ChangedFilesOptions {
	readonly staged?: boolean;
	readonly revision?: string | null;
}

/**
 * Queries the check engine makes against version control.
 */
export interface GitService {
	readonly cwd: string;
	readonly diff: (
		paths: readonly string[],
		options?: DiffOptions,
	) => Effect.Effect<
		readonly FileDelta[],
		GitCommandError | ExecError | DiffParseError
	>;
	readonly showFile: (
		file: string,
		version?: FileVersion,
	) => Effect.Effect<string, GitCommandError | ExecError>;
	readonly changedFiles: (
		options?: ChangedFilesOptions,
	) => Effect.Effect<readonly string[], GitCommandError | ExecError>;
	readonly listFiles: () => Effect.Effect<
		readonly string[],
		GitCommandError | ExecError
	>;
	readonly isTracked: (file: string) => Effect.Effect<boolean, ExecError>;
}

export interface GitClientOptions {
	readonly cwd: string;
	readonly program?: string;
	readonly runner?: ProcessRunner;
}

function splitLines(output: string): readonly string[] {
	return output
		.split(/\r?\n/u)
		.map((line) => line.trim())
		.filter((line) => line.length > 0);
}

/**
 * Git CLI wrapper.
 *
 * @example
 * ```ts
 * const git = new GitClient({ cwd: "/repo" });
 * const deltas = yield* git.diff(["/repo/src/a.cpp"], { staged: true });
 * ```
 */
export class GitClient implements GitService {
	readonly cwd: string;
	private readonly program: string;
	private readonly runner: ProcessRunner;

	constructor(options: GitClientOptions) {
		this.cwd = path.resolve(options.cwd);
		this.program = options.program ?? "git";
		this.runner = options.runner ?? runProcess;
	}

	/**
	 * Top-level directory of the repository containing `cwd`.
	 *
	 * @effect Effect<string, GitCommandError | ExecError>
	 */
	static repositoryRoot(
		cwd: string,
		runner: ProcessRunner = runProcess,
	): Effect.Effect<string, GitCommandError | ExecError> {
		const client = new GitClient({ cwd, runner });
		return client
			.run(["rev-parse", "--show-toplevel"])
			.pipe(Effect.map((stdout) => stdout.trim()));
	}

	private relativize(file: string): string {
		return path.isAbsolute(file) ? path.relative(this.cwd, file) : file;
	}

	private absolutize(file: string): string {
		return path.resolve(this.cwd, file);
	}

	private run(
		args: readonly string[],
	): Effect.Effect<string, GitCommandError | ExecError> {
		return this.runner(this.program, args, { cwd: this.cwd }).pipe(
			Effect.flatMap((outcome) =>
				outcome.exitCode === 0
					? Effect.succeed(outcome.stdout)
					: Effect.fail(
							new GitCommandError({
								args,
								exitCode: outcome.exitCode,
								stderr: outcome.stderr.trim(),
							}),
						),
			),
		);
	}

	diff(
		paths: readonly string[],
		options: DiffOptions = {},
	): Effect.Effect<
		readonly FileDelta[],
		GitCommandError | ExecError | DiffParseError
	> {
		const args = [
			"diff",
			`--unified=${options.contextLines ?? 0}`,
			"--no-color",
			"--no-color-moved",
			"--no-color-moved-ws",
			"--no-prefix",
		];
		if (options.staged === true) args.push("--cached");
		if (options.revision !== undefined && options.revision !== null) {
			args.push(options.revision);
		}
		if (paths.length > 0) {
			args.push("--", ...paths.map((file) => this.relativize(file)));
		}
		// Either is a subtype of Effect: a parse failure surfaces as DiffParseError
		return this.run(args).pipe(
			Effect.flatMap((stdout) => parseUnifiedDiff(stdout)),
		);
	}

	showFile(
		file: string,
		version: FileVersion = FileVersion.Revision({ revision: "HEAD" }),
	): Effect.Effect<string, GitCommandError | ExecError> {
		const relative = this.relativize(file);
		const spec =
			version._tag === "Staged"
				? `:${relative}`
				: `${version.revision}:${relative}`;
		return this.run(["show", spec]);
	}

	changedFiles(
		options: ChangedFilesOptions = {},
	): Effect.Effect<readonly string[], GitCommandError | ExecError> {
		const args = ["diff", "--name-only", "--diff-filter=d"];
		if (options.staged === true) args.push("--cached");
		if (options.revision !== undefined && options.revision !== null) {
			args.push(options.revision);
		}
		return this.run(args).pipe(
			Effect.map((stdout) =>
				splitLines(stdout).map((line) => this.absolutize(line)),
			),
		);
	}

	listFiles(): Effect.Effect<readonly string[], GitCommandError | ExecError> {
		return this.run(["ls-files"]).pipe(
			Effect.map((stdout) =>
				splitLines(stdout).map((line) => this.absolutize(line)),
			),
		);
	}

	isTracked(file: string): Effect.Effect<boolean, ExecError> {
		return this.runner(
			this.program,
			["ls-files", "--error-unmatch", this.relativize(file)],
			{ cwd: this.cwd },
		).pipe(Effect.map((outcome) => outcome.exitCode === 0));
	}
}
