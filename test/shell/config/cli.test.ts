// CHANGE: Unit tests for command line parsing
// WHY: Flags and positional arguments must be parsed deterministically; bad input is a UsageError

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import type { CLIOptions } from "../../../src/core/types/index.js";
import {
	DEFAULT_CLI_OPTIONS,
	parseCLIArgs,
	usageText,
} from "../../../src/shell/config/cli.js";

/**
 * Safely set process.argv for the duration of a test and restore afterwards.
 *
 * Invariants:
 * - Always restore original argv to avoid cross-test contamination.
 */
function withArgv<T>(args: readonly string[], fn: () => T): T {
	const original = process.argv.slice();
	try {
		process.argv = [original[0] ?? "node", original[1] ?? "linegate", ...args];
		return fn();
	} finally {
		process.argv = original;
	}
}

const parseOk = (args: readonly string[]): CLIOptions => {
	const result = parseCLIArgs(args);
	if (Either.isLeft(result)) throw new Error(result.left.detail);
	return result.right;
};

const parseError = (args: readonly string[]): string => {
	const result = parseCLIArgs(args);
	if (Either.isRight(result)) throw new Error("expected a usage error");
	return result.left.detail;
};

describe("parseCLIArgs: defaults and positional", () => {
	it("returns defaults when no args provided", (): void => {
		const opts = withArgv([], () => parseCLIArgs());
		expect(Either.isRight(opts) && opts.right).toEqual(DEFAULT_CLI_OPTIONS);
		expect(DEFAULT_CLI_OPTIONS.sourceGroup).toBe("input");
		expect(DEFAULT_CLI_OPTIONS.showProgress).toBe(true);
		expect(DEFAULT_CLI_OPTIONS.staged).toBeNull();
	});

	it("reads process.argv when no args are passed", (): void => {
		const opts = withArgv(["whitespace", "a.c"], () => parseCLIArgs());
		expect(Either.isRight(opts) && opts.right.checkName).toBe("whitespace");
	});

	it("takes the first positional as the check and the rest as files", (): void => {
		const opts = parseOk(["whitespace", "src/a.c", "-v", "b.h"]);
		expect(opts.checkName).toBe("whitespace");
		expect(opts.files).toEqual(["src/a.c", "b.h"]);
		expect(opts.verbose).toBe(true);
	});

	it("ignores empty string arguments", (): void => {
		expect(parseOk(["", "newline"]).checkName).toBe("newline");
	});

	it("treats everything after -- as positional", (): void => {
		const opts = parseOk(["whitespace", "--", "--fix", "-v"]);
		expect(opts.files).toEqual(["--fix", "-v"]);
		expect(opts.fix).toBe(false);
		expect(opts.verbose).toBe(false);
	});
});

describe("parseCLIArgs: value options", () => {
	it("accepts separate and inline values", (): void => {
		const opts = parseOk([
			"tidy",
			"--source-group",
			"modified",
			"--base=origin/main",
			"-j",
			"4",
			"--config",
			"tools.json",
			"--log-level=debug",
		]);
		expect(opts.sourceGroup).toBe("modified");
		expect(opts.base).toBe("origin/main");
		expect(opts.jobs).toBe(4);
		expect(opts.configPath).toBe("tools.json");
		expect(opts.logLevel).toBe("debug");
	});

	it("value options consume the next token", (): void => {
		const opts = parseOk(["--jobs", "2", "whitespace"]);
		expect(opts.jobs).toBe(2);
		expect(opts.checkName).toBe("whitespace");
	});

	it("rejects invalid values", (): void => {
		expect(parseError(["--source-group", "everything"])).toBe(
			"--source-group expects one of all, staged, modified, input, got 'everything'",
		);
		expect(parseError(["-j", "0"])).toBe(
			"--jobs expects a positive integer, got '0'",
		);
		expect(parseError(["--jobs=two"])).toBe(
			"--jobs expects a positive integer, got 'two'",
		);
		expect(parseError(["--log-level", "loud"])).toBe(
			"--log-level expects one of debug, info, warning, error, none, got 'loud'",
		);
	});

	it("requires a value", (): void => {
		expect(parseError(["whitespace", "--base"])).toBe("--base requires a value");
	});
});

describe("parseCLIArgs: boolean flags", () => {
	it("sets staged, fix, progress and help", (): void => {
		expect(parseOk(["--staged"]).staged).toBe(true);
		expect(parseOk(["--no-staged"]).staged).toBe(false);
		expect(parseOk(["--fix"]).fix).toBe(true);
		expect(parseOk(["--no-progress"]).showProgress).toBe(false);
		expect(parseOk(["--no-progress", "--progress"]).showProgress).toBe(true);
		expect(parseOk(["-h"]).help).toBe(true);
		expect(parseOk(["--verbose"]).verbose).toBe(true);
	});

	it("rejects unknown options and inline values on flags", (): void => {
		expect(parseError(["--frobnicate"])).toBe("unknown option '--frobnicate'");
		expect(parseError(["--fix=yes"])).toBe("unknown option '--fix=yes'");
	});
});

describe("usageText", () => {
	it("lists the available checks", (): void => {
		const text = usageText(["whitespace", "newline"]);
		expect(text.split("\n")[0]).toBe(
			"usage: linegate <check> [options] [file ...]",
		);
		expect(text.split("\n")[2]).toBe("checks: whitespace, newline");
		expect(usageText([]).split("\n")[2]).toBe("checks: (none)");
	});

	it("documents the capped fix status", (): void => {
		expect(usageText([]).split("\n")).toContain(
			"  fix: number of files left unrepaired, capped at 255",
		);
	});
});
