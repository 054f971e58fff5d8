// CHANGE: Centralize test builders for tool configs, check info and fake git services
// WHY: Shell and app tests share the same fixtures; builders are pure and reusable

import { Effect } from "effect";

import type {
	CheckInfo,
	FileDelta,
	ToolConfig,
} from "../../src/core/types/index.js";
import type { FileVersion, GitService } from "../../src/shell/git/client.js";

/** Build a tool configuration with sensible defaults. */
export const toolConfig = (over: Partial<ToolConfig> = {}): ToolConfig => ({
	name: "lint",
	program: "lint-tool",
	args: [],
	extensions: null,
	lineFilterFlag: null,
	fixFlag: null,
	warningsAsErrorsFlag: null,
	warningsAsErrors: false,
	diffScoped: false,
	contextLines: 0,
	...over,
});

/** Build check metadata for the invocation `linegate <name>`. */
export const checkInfoFor = (name: string): CheckInfo => ({
	message: name,
	command: ["linegate", name],
	verboseFlags: ["-v", "--verbose"],
	fixFlags: ["--fix"],
});

/** Build a delta for a modified file. */
export const fileDelta = (over: Partial<FileDelta> = {}): FileDelta => ({
	fromPath: "a.cpp",
	toPath: "a.cpp",
	fromChanges: [],
	toChanges: [],
	fromPermissions: null,
	toPermissions: null,
	fromRevisionId: null,
	toRevisionId: null,
	...over,
});

export interface FakeGitCall {
	readonly method: string;
	readonly args: readonly unknown[];
}

export interface FakeGit extends GitService {
	readonly calls: FakeGitCall[];
}

/**
 * In-memory GitService answering from fixed data.
 *
 * @param data Deltas per file, blob contents per file and file lists per query
 */
export const fakeGit = (data: {
	readonly cwd?: string;
	readonly deltas?: Readonly<Record<string, readonly FileDelta[]>>;
	readonly blobs?: Readonly<Record<string, string>>;
	readonly tracked?: readonly string[];
	readonly staged?: readonly string[];
	readonly modified?: readonly string[];
}): FakeGit => {
	const calls: FakeGitCall[] = [];
	const record = (method: string, ...args: readonly unknown[]): void => {
		calls.push({ method, args });
	};
	return {
		cwd: data.cwd ?? "/repo",
		calls,
		diff: (paths, options) =>
			Effect.sync(() => {
				record("diff", paths, options);
				return paths.flatMap((file) => data.deltas?.[file] ?? []);
			}),
		showFile: (file: string, version?: FileVersion) =>
			Effect.sync(() => {
				record("showFile", file, version?._tag);
				return data.blobs?.[file] ?? "";
			}),
		changedFiles: (options) =>
			Effect.sync(() => {
				record("changedFiles", options);
				return options?.staged === true
					? (data.staged ?? [])
					: (data.modified ?? []);
			}),
		listFiles: () =>
			Effect.sync(() => {
				record("listFiles");
				return data.tracked ?? [];
			}),
		isTracked: (file) =>
			Effect.sync(() => (data.tracked ?? []).includes(file)),
	};
};
