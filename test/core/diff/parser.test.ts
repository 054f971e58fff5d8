// CHANGE: Unit tests for the structural unified-diff parser
// WHY: Hunk ranges, additions, deletions and malformed headers drive diff-scoped checks
// PURITY: CORE tests (no IO)

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import { isAddition, isDeletion, isRename } from "../../../src/core/diff/file-delta.js";
import { parseUnifiedDiff } from "../../../src/core/diff/parser.js";
import type { FileDelta } from "../../../src/core/types/index.js";

const parseOk = (lines: readonly string[]): readonly FileDelta[] => {
	const result = parseUnifiedDiff(lines.join("\n"));
	if (Either.isLeft(result)) {
		throw new Error(`unexpected parse error: ${result.left.detail}`);
	}
	return result.right;
};

describe("parseUnifiedDiff", () => {
	it("returns no deltas for empty input", () => {
		expect(parseOk([])).toEqual([]);
		expect(parseOk([""])).toEqual([]);
	});

	it("ignores lines before the first header", () => {
		expect(parseOk(["warning: something", "@@ garbage"])).toEqual([]);
	});

	it("reads a modified file with mode and blob ids", () => {
		const deltas = parseOk([
			"diff --git src/a.ts src/a.ts",
			"index 83db48f..bf269f4 100644",
			"--- src/a.ts",
			"+++ src/a.ts",
			"@@ -5 +5,2 @@",
			"-old",
			"+new",
			"+newer",
		]);
		expect(deltas).toEqual([
			{
				fromPath: "src/a.ts",
				toPath: "src/a.ts",
				fromChanges: [{ start: 5, end: 5 }],
				toChanges: [{ start: 5, end: 7 }],
				fromPermissions: "100644",
				toPermissions: "100644",
				fromRevisionId: "83db48f",
				toRevisionId: "bf269f4",
			},
		]);
	});

	it("drops the new side of a pure deletion hunk", () => {
		const [delta] = parseOk([
			"diff --git a.c a.c",
			"--- a.c",
			"+++ a.c",
			"@@ -10,3 +10,0 @@",
		]);
		expect(delta?.fromChanges).toEqual([{ start: 10, end: 13 }]);
		expect(delta?.toChanges).toEqual([]);
	});

	it("keeps hunk intervals in diff order", () => {
		const [delta] = parseOk([
			"diff --git a.c a.c",
			"--- a.c",
			"+++ a.c",
			"@@ -1,2 +1,3 @@ int main()",
			" context",
			"@@ -20 +21 @@",
		]);
		expect(delta?.toChanges).toEqual([
			{ start: 1, end: 4 },
			{ start: 21, end: 21 },
		]);
	});

	it("emits one delta per header", () => {
		const deltas = parseOk([
			"diff --git a.c a.c",
			"--- a.c",
			"+++ a.c",
			"@@ -1 +1 @@",
			"diff --git b.c b.c",
			"--- b.c",
			"+++ b.c",
			"@@ -2 +2 @@",
			"diff --git c.c c.c",
		]);
		expect(deltas.map((delta) => delta.toPath)).toEqual(["a.c", "b.c", "c.c"]);
	});

	it("maps /dev/null to null paths", () => {
		const [added, deleted] = parseOk([
			"diff --git new.c new.c",
			"new file mode 100755",
			"index 0000000..1234567",
			"--- /dev/null",
			"+++ new.c",
			"@@ -0,0 +1,2 @@",
			"diff --git old.c old.c",
			"deleted file mode 100644",
			"index 1234567..0000000",
			"--- old.c",
			"+++ /dev/null",
			"@@ -1,2 +0,0 @@",
		]);
		expect(added?.fromPath).toBeNull();
		expect(added?.toPath).toBe("new.c");
		expect(added?.toPermissions).toBe("100755");
		expect(added?.fromChanges).toEqual([]);
		expect(added?.toChanges).toEqual([{ start: 1, end: 3 }]);
		expect(added !== undefined && isAddition(added)).toBe(true);

		expect(deleted?.toPath).toBeNull();
		expect(deleted?.fromPermissions).toBe("100644");
		expect(deleted?.toChanges).toEqual([]);
		expect(deleted !== undefined && isDeletion(deleted)).toBe(true);
	});

	it("treats an all-zero old blob as an addition without ---/+++ lines", () => {
		const [delta] = parseOk([
			"diff --git empty.txt empty.txt",
			"new file mode 100644",
			"index 0000000..e69de29",
		]);
		expect(delta).toEqual({
			fromPath: null,
			toPath: "empty.txt",
			fromChanges: [],
			toChanges: [],
			fromPermissions: null,
			toPermissions: "100644",
			fromRevisionId: null,
			toRevisionId: "e69de29",
		});
	});

	it("records mode changes", () => {
		const [delta] = parseOk([
			"diff --git run.sh run.sh",
			"old mode 100644",
			"old file mode 100644",
			"new file mode 100755",
		]);
		expect(delta?.fromPermissions).toBe("100644");
		expect(delta?.toPermissions).toBe("100755");
	});

	it("recognises renames", () => {
		const [delta] = parseOk([
			"diff --git lib/old.ts lib/new.ts",
			"similarity index 90%",
			"--- lib/old.ts",
			"+++ lib/new.ts",
			"@@ -3 +3 @@",
		]);
		expect(delta !== undefined && isRename(delta)).toBe(true);
	});

	it("splits header paths containing spaces", () => {
		const [delta] = parseOk(["diff --git my file.c my file.c"]);
		expect(delta?.fromPath).toBe("my file.c");
		expect(delta?.toPath).toBe("my file.c");
	});

	it("does not read hunk body lines as metadata", () => {
		const [delta] = parseOk([
			"diff --git a.md a.md",
			"--- a.md",
			"+++ a.md",
			"@@ -1,2 +1,2 @@",
			"--- removed rule",
			"+++ added rule",
			"index entry",
		]);
		expect(delta?.fromPath).toBe("a.md");
		expect(delta?.toPath).toBe("a.md");
		expect(delta?.fromRevisionId).toBeNull();
	});

	it("accepts CRLF line endings", () => {
		const [delta] = parseUnifiedDiff(
			"diff --git a.c a.c\r\n--- a.c\r\n+++ a.c\r\n@@ -1 +1,2 @@\r\n",
		).pipe(Either.getOrElse(() => []));
		expect(delta?.toPath).toBe("a.c");
		expect(delta?.toChanges).toEqual([{ start: 1, end: 3 }]);
	});

	it("fails on a malformed hunk header with its line number", () => {
		const result = parseUnifiedDiff(
			["diff --git a.c a.c", "--- a.c", "+++ a.c", "@@ -x +1 @@"].join("\n"),
		);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("DiffParseError");
			expect(result.left.line).toBe(4);
			expect(result.left.text).toBe("@@ -x +1 @@");
			expect(result.left.detail).toBe("malformed range '-x'");
		}
	});

	it("fails when the closing @@ is missing", () => {
		const result = parseUnifiedDiff(
			["diff --git a.c a.c", "@@ -1 +1"].join("\n"),
		);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.line).toBe(2);
			expect(result.left.detail).toBe(
				"hunk header must have the form '@@ -a,b +c,d @@'",
			);
		}
	});

	it("fails when the sides are swapped", () => {
		const result = parseUnifiedDiff(["diff --git a.c a.c", "@@ +1 -1 @@"].join("\n"));
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.detail).toBe("expected '-' range, found '+1'");
		}
	});
});
