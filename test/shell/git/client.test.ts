// CHANGE: Tests for the git collaborator with a scripted process runner
// WHY: Argument vectors and error mapping are the whole contract; git itself is never spawned
// PURITY: SHELL tests (no processes)

import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import { FileVersion, GitClient } from "../../../src/shell/git/client.js";
import { fakeRunner } from "../../utils/fake-runner.js";

describe("GitClient", () => {
	it("runs diff with zero context, no prefix and relative paths", async () => {
		const { runner, calls } = fakeRunner(() => ({
			stdout: [
				"diff --git src/a.cpp src/a.cpp",
				"--- src/a.cpp",
				"+++ src/a.cpp",
				"@@ -3,2 +3,4 @@",
			].join("\n"),
		}));
		const git = new GitClient({ cwd: "/repo", runner });

		const deltas = await Effect.runPromise(
			git.diff(["/repo/src/a.cpp"], { staged: true }),
		);

		expect(calls).toEqual([
			{
				program: "git",
				args: [
					"diff",
					"--unified=0",
					"--no-color",
					"--no-color-moved",
					"--no-color-moved-ws",
					"--no-prefix",
					"--cached",
					"--",
					"src/a.cpp",
				],
				cwd: "/repo",
			},
		]);
		expect(deltas.map((delta) => delta.toChanges)).toEqual([
			[{ start: 3, end: 7 }],
		]);
	});

	it("passes the revision and context lines", async () => {
		const { runner, calls } = fakeRunner(() => ({ stdout: "" }));
		const git = new GitClient({ cwd: "/repo", runner });
		await Effect.runPromise(
			git.diff(["lib/b.c"], { revision: "origin/main", contextLines: 3 }),
		);
		expect(calls[0]?.args).toEqual([
			"diff",
			"--unified=3",
			"--no-color",
			"--no-color-moved",
			"--no-color-moved-ws",
			"--no-prefix",
			"origin/main",
			"--",
			"lib/b.c",
		]);
	});

	it("surfaces malformed diff output as DiffParseError", async () => {
		const { runner } = fakeRunner(() => ({
			stdout: "diff --git a.c a.c\n@@ nonsense @@",
		}));
		const git = new GitClient({ cwd: "/repo", runner });
		const error = await Effect.runPromise(Effect.flip(git.diff(["a.c"])));
		expect(error._tag).toBe("DiffParseError");
	});

	it("maps a non-zero exit to GitCommandError", async () => {
		const { runner } = fakeRunner(() => ({
			exitCode: 128,
			stderr: "fatal: bad revision\n",
		}));
		const git = new GitClient({ cwd: "/repo", runner });
		const error = await Effect.runPromise(
			Effect.flip(git.showFile("a.c", FileVersion.Revision({ revision: "nope" }))),
		);
		expect(error._tag).toBe("GitCommandError");
		if (error._tag === "GitCommandError") {
			expect(error.args).toEqual(["show", "nope:a.c"]);
			expect(error.exitCode).toBe(128);
			expect(error.stderr).toBe("fatal: bad revision");
		}
	});

	it("reads staged and committed blobs", async () => {
		const { runner, calls } = fakeRunner(() => ({ stdout: "content\n" }));
		const git = new GitClient({ cwd: "/repo", runner });
		const staged = await Effect.runPromise(
			git.showFile("/repo/src/a.c", FileVersion.Staged()),
		);
		await Effect.runPromise(git.showFile("src/a.c"));
		expect(staged).toBe("content\n");
		expect(calls.map((call) => call.args)).toEqual([
			["show", ":src/a.c"],
			["show", "HEAD:src/a.c"],
		]);
	});

	it("lists changed and tracked files as absolute paths", async () => {
		const { runner, calls } = fakeRunner((_program, args) => ({
			stdout: args[0] === "ls-files" ? "a.c\nsub/b.h\n" : "\nx.py\n\n",
		}));
		const git = new GitClient({ cwd: "/repo", runner });

		const changed = await Effect.runPromise(
			git.changedFiles({ staged: true, revision: "HEAD~1" }),
		);
		const tracked = await Effect.runPromise(git.listFiles());

		expect(changed).toEqual(["/repo/x.py"]);
		expect(tracked).toEqual(["/repo/a.c", "/repo/sub/b.h"]);
		expect(calls.map((call) => call.args)).toEqual([
			["diff", "--name-only", "--diff-filter=d", "--cached", "HEAD~1"],
			["ls-files"],
		]);
	});

	it("reports tracking from the exit status", async () => {
		const { runner } = fakeRunner((_program, args) => ({
			exitCode: args.includes("tracked.c") ? 0 : 1,
		}));
		const git = new GitClient({ cwd: "/repo", runner });
		expect(await Effect.runPromise(git.isTracked("/repo/tracked.c"))).toBe(true);
		expect(await Effect.runPromise(git.isTracked("other.c"))).toBe(false);
	});

	it("finds the repository root", async () => {
		const { runner, calls } = fakeRunner(() => ({ stdout: "/repo\n" }));
		const root = await Effect.runPromise(
			GitClient.repositoryRoot("/repo/src", runner),
		);
		expect(root).toBe("/repo");
		expect(calls[0]).toEqual({
			program: "git",
			args: ["rev-parse", "--show-toplevel"],
			cwd: "/repo/src",
		});
	});
});
