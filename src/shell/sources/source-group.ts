// CHANGE: Candidate file selection by source group plus explicit file arguments
// PURITY: SHELL (git queries, filesystem checks)
// EFFECT: Effect<readonly string[], GitCommandError | ExecError | UsageError>
// INVARIANT: Result is absolute, duplicate-free, ordered group files first then explicit files
// COMPLEXITY: O(n) where n = number of candidate files

import { Effect } from "effect";
import { match } from "ts-pattern";

import {
	type ExecError,
	type FSError,
	type GitCommandError,
	UsageError,
} from "../../core/errors.js";
import type { SourceGroup } from "../../core/models.js";
import { FileVersion, type GitService } from "../git/client.js";
import { path } from "../utils/node-mods.js";
import { fileExists, readWorkTree } from "./files.js";

/**
 * @property group Named group to query
 * @property base Revision the `modified` group compares against; null for the work tree
 * @property files Explicit file arguments, relative to `cwd`
 * @property extensions Suffixes kept from the group (explicit files are never filtered); null keeps all
 * @property cwd Directory explicit files are resolved against
 */
export interface SourceSelection {
	readonly group: SourceGroup;
	readonly base: string | null;
	readonly files: readonly string[];
	readonly extensions: readonly string[] | null;
	readonly cwd: string;
}

function hasExtension(
	file: string,
	extensions: readonly string[] | null,
): boolean {
	return extensions === null || extensions.includes(path.extname(file));
}

function unique(files: readonly string[]): readonly string[] {
	return [...new Set(files)];
}

function groupFiles(
	git: GitService,
	group: SourceGroup,
	base: string | null,
): Effect.Effect<readonly string[], GitCommandError | ExecError> {
	return match<
		SourceGroup,
		Effect.Effect<readonly string[], GitCommandError | ExecError>
	>(group)
		.with("all", () => git.listFiles())
		.with("staged", () => git.changedFiles({ staged: true }))
		.with("modified", () => git.changedFiles({ revision: base }))
		.with("input", () => Effect.succeed([]))
		.exhaustive();
}

/**
 * Resolves the files a run will process.
 *
 * @effect Effect<readonly string[], GitCommandError | ExecError | UsageError>
 * @invariant ∀ f ∈ selection.files: exists(f) else UsageError
 *
 * @example
 * ```ts
 * const files = yield* findSources(git, {
 *   group: "staged", base: null, files: [], extensions: [".cpp"], cwd: process.cwd(),
 * });
 * ```
 */
export function findSources(
	git: GitService,
	selection: SourceSelection,
): Effect.Effect<readonly string[], GitCommandError | ExecError | UsageError> {
	return Effect.gen(function* () {
		const fromGroup = yield* groupFiles(git, selection.group, selection.base);
		const filtered = fromGroup.filter((file) =>
			hasExtension(file, selection.extensions),
		);

		const explicit = selection.files.map((file) =>
			path.resolve(selection.cwd, file),
		);
		for (const file of explicit) {
			const exists = yield* fileExists(file);
			if (!exists) {
				return yield* Effect.fail(
					new UsageError({ detail: `Specified file does not exist: ${file}` }),
				);
			}
		}

		const files = unique([...filtered, ...explicit]);
		yield* Effect.logDebug(
			`selected ${files.length} file(s) from group '${selection.group}'`,
		);
		return files;
	});
}

/**
 * Reads a file's content from the index (`staged`) or the work tree.
 *
 * @effect Effect<string, FSError | GitCommandError | ExecError>
 */
export function readSource(
	git: GitService,
	file: string,
	staged: boolean,
): Effect.Effect<string, FSError | GitCommandError | ExecError> {
	return staged ? git.showFile(file, FileVersion.Staged()) : readWorkTree(file);
}
