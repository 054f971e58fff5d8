// CHANGE: Registry of checks addressable from the command line
// WHY: Built-in text checks and configured tools are built the same way from one run context
// PURITY: APP (constructs SHELL-backed checks)
// INVARIANT: Names are unique; built-in names win over configured tools
// COMPLEXITY: O(t) where t = number of configured tools

import { Effect } from "effect";

import type { CheckMode } from "../core/models.js";
import type {
	Check,
	CheckInfo,
	LinegateConfig,
	ToolConfig,
} from "../core/types/index.js";
import { diffScopedCheck } from "../shell/checks/diff-scoped.js";
import { processCheck } from "../shell/checks/process-check.js";
import {
	type SourceReader,
	trailingNewlineCheck,
	whitespaceCheck,
} from "../shell/checks/text-checks.js";
import type { GitService } from "../shell/git/client.js";
import { readSource } from "../shell/sources/source-group.js";
import type { ProcessRunner } from "../shell/utils/exec.js";

export const DEFAULT_TEXT_EXTENSIONS: readonly string[] = [
	".c",
	".cc",
	".cpp",
	".h",
	".hpp",
	".md",
	".py",
	".ts",
	".tsx",
	".js",
];

export const VERBOSE_FLAGS: readonly string[] = ["-v", "--verbose"];
export const FIX_FLAGS: readonly string[] = ["--fix"];

/**
 * Values fixed for the whole run that checks are built from.
 *
 * @property argv Invocation used for reproduction commands (program name first)
 * @property mode Fix runs read the work tree whatever `staged` says
 */
export interface CheckContext {
	readonly git: GitService;
	readonly staged: boolean;
	readonly mode: CheckMode;
	readonly base: string | null;
	readonly argv: readonly string[];
	readonly runner?: ProcessRunner;
}

export interface RegisteredCheck {
	/** Name given on the command line */
	readonly name: string;
	/** Label used in summaries */
	readonly label: string;
	/** Suffixes selected from source groups; null selects every file */
	readonly extensions: readonly string[] | null;
	readonly build: (context: CheckContext) => Check;
}

/** @pure true */
export function checkInfo(label: string, argv: readonly string[]): CheckInfo {
	return {
		message: label,
		command: argv,
		verboseFlags: VERBOSE_FLAGS,
		fixFlags: FIX_FLAGS,
	};
}

/**
 * Content the built-in checks verify. Repairs edit the work tree, so a fix
 * run gates on the work tree too.
 */
const sourceReader =
	(context: CheckContext): SourceReader =>
	(file) =>
		readSource(context.git, file, context.staged && context.mode === "verify");

const BUILTIN_CHECKS: readonly RegisteredCheck[] = [
	{
		name: "whitespace",
		label: "whitespace",
		extensions: DEFAULT_TEXT_EXTENSIONS,
		build: (context) =>
			whitespaceCheck(
				checkInfo("whitespace", context.argv),
				sourceReader(context),
			),
	},
	{
		name: "newline",
		label: "trailing newline",
		extensions: DEFAULT_TEXT_EXTENSIONS,
		build: (context) =>
			trailingNewlineCheck(
				checkInfo("trailing newline", context.argv),
				sourceReader(context),
			),
	},
];

export const BUILTIN_CHECK_NAMES: readonly string[] = BUILTIN_CHECKS.map(
	(check) => check.name,
);

function toolCheck(tool: ToolConfig): RegisteredCheck {
	return {
		name: tool.name,
		label: tool.name,
		extensions: tool.extensions,
		build: (context) => {
			const info = checkInfo(tool.name, context.argv);
			const runner =
				context.runner === undefined ? {} : { runner: context.runner };
			return tool.diffScoped
				? diffScopedCheck({
						tool,
						info,
						git: context.git,
						staged: context.staged,
						revision: context.base,
						...runner,
					})
				: processCheck({ tool, info, cwd: context.git.cwd, ...runner });
		},
	};
}

/**
 * Built-in checks followed by configured tools.
 *
 * @effect Effect<ReadonlyMap<string, RegisteredCheck>> (logs shadowed tools)
 */
export function buildRegistry(
	config: LinegateConfig,
): Effect.Effect<ReadonlyMap<string, RegisteredCheck>> {
	return Effect.gen(function* () {
		const registry = new Map<string, RegisteredCheck>(
			BUILTIN_CHECKS.map((check) => [check.name, check]),
		);
		for (const tool of config.tools) {
			if (registry.has(tool.name)) {
				yield* Effect.logWarning(
					`tool '${tool.name}' is shadowed by an earlier check with the same name`,
				);
				continue;
			}
			registry.set(tool.name, toolCheck(tool));
		}
		return registry;
	});
}
