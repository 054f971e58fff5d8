// CHANGE: Structural unified-diff parser producing one FileDelta per `diff --git` header
// PURITY: CORE
// INVARIANT: |result| = |{line ∈ diff : line starts with "diff --git "}|
// COMPLEXITY: O(n) where n = number of diff lines

import { Either } from "effect";

import { DiffParseError } from "../errors.js";
import type { FileDelta, LineInterval } from "../types/index.js";
import { lineIntervalFromRange } from "./interval.js";

const HEADER_PREFIX = "diff --git ";
const DEV_NULL = "/dev/null";
const RANGE_PATTERN = /^(\d+)(?:,(\d+))?$/u;
const NULL_REVISION_PATTERN = /^0+$/u;

/**
 * Mutable accumulator for the delta currently being read.
 * Mutation stays inside this module; emitted records are fresh objects.
 */
interface DeltaBuilder {
	fromPath: string | null;
	toPath: string | null;
	readonly fromChanges: LineInterval[];
	readonly toChanges: LineInterval[];
	fromPermissions: string | null;
	toPermissions: string | null;
	fromRevisionId: string | null;
	toRevisionId: string | null;
	inHunks: boolean;
}

type LineHandler = (
	delta: DeltaBuilder,
	rest: string,
	lineNumber: number,
	line: string,
) => DiffParseError | null;

function createBuilder(fromPath: string, toPath: string): DeltaBuilder {
	return {
		fromPath,
		toPath,
		fromChanges: [],
		toChanges: [],
		fromPermissions: null,
		toPermissions: null,
		fromRevisionId: null,
		toRevisionId: null,
		inHunks: false,
	};
}

function freeze(delta: DeltaBuilder): FileDelta {
	return {
		fromPath: delta.fromPath,
		toPath: delta.toPath,
		fromChanges: [...delta.fromChanges],
		toChanges: [...delta.toChanges],
		fromPermissions: delta.fromPermissions,
		toPermissions: delta.toPermissions,
		fromRevisionId: delta.fromRevisionId,
		toRevisionId: delta.toRevisionId,
	};
}

/**
 * Splits `a b` from a header line. When paths contain spaces and the
 * file was not renamed both halves are identical, which disambiguates.
 *
 * @pure true
 */
function splitHeaderPaths(rest: string): readonly [string, string] {
	const tokens = rest.split(" ");
	if (tokens.length === 2) {
		return [tokens[0] ?? "", tokens[1] ?? ""];
	}
	if (tokens.length % 2 === 0) {
		const half = tokens.length / 2;
		const left = tokens.slice(0, half).join(" ");
		const right = tokens.slice(half).join(" ");
		if (left === right) return [left, right];
	}
	return [tokens[0] ?? "", tokens.slice(1).join(" ")];
}

function parsePath(rest: string): string | null {
	const value = rest.trimEnd();
	return value === DEV_NULL ? null : value;
}

/**
 * Parses one side of a hunk header (`-s[,l]` or `+s[,l]`).
 *
 * @pure true
 */
function parseRange(
	token: string,
	sign: "-" | "+",
): Either.Either<LineInterval | null, string> {
	if (!token.startsWith(sign)) {
		return Either.left(`expected '${sign}' range, found '${token}'`);
	}
	const match = RANGE_PATTERN.exec(token.slice(1));
	if (match === null) {
		return Either.left(`malformed range '${token}'`);
	}
	const start = Number.parseInt(match[1] ?? "", 10);
	const length =
		match[2] === undefined ? undefined : Number.parseInt(match[2], 10);
	return Either.right(lineIntervalFromRange(start, length));
}

const applyHunkHeader: LineHandler = (delta, rest, lineNumber, line) => {
	const tokens = rest.split(" ");
	const fail = (detail: string): DiffParseError =>
		new DiffParseError({ line: lineNumber, text: line, detail });
	if (tokens.length < 3 || tokens[2] !== "@@") {
		return fail("hunk header must have the form '@@ -a,b +c,d @@'");
	}
	const from = parseRange(tokens[0] ?? "", "-");
	if (Either.isLeft(from)) return fail(from.left);
	const to = parseRange(tokens[1] ?? "", "+");
	if (Either.isLeft(to)) return fail(to.left);

	if (from.right !== null) delta.fromChanges.push(from.right);
	if (to.right !== null) delta.toChanges.push(to.right);
	delta.inHunks = true;
	return null;
};

const applyIndex: LineHandler = (delta, rest) => {
	const tokens = rest.trim().split(" ");
	const [revisions = "", mode] = tokens;
	const [fromRevision = "", toRevision = ""] = revisions.split("..");
	delta.fromRevisionId = fromRevision;
	delta.toRevisionId = toRevision;

	if (tokens.length === 2 && mode !== undefined) {
		delta.fromPermissions = mode;
		delta.toPermissions = mode;
	}

	// Added empty files get no `---`/`+++` pair; the null blob is the only marker.
	if (NULL_REVISION_PATTERN.test(fromRevision)) {
		delta.fromPath = null;
		delta.fromPermissions = null;
		delta.fromRevisionId = null;
	}
	return null;
};

/**
 * Metadata handlers in priority order. They apply only before the first
 * hunk of a file; after that every line except `@@` is body content.
 */
const METADATA_HANDLERS: ReadonlyArray<readonly [string, LineHandler]> = [
	[
		"--- ",
		(delta, rest) => {
			delta.fromPath = parsePath(rest);
			return null;
		},
	],
	[
		"+++ ",
		(delta, rest) => {
			delta.toPath = parsePath(rest);
			return null;
		},
	],
	["index ", applyIndex],
	[
		"old file mode ",
		(delta, rest) => {
			delta.fromPermissions = rest.trim();
			return null;
		},
	],
	[
		"new file mode ",
		(delta, rest) => {
			delta.toPermissions = rest.trim();
			return null;
		},
	],
	[
		"deleted file mode ",
		(delta, rest) => {
			delta.fromPermissions = rest.trim();
			return null;
		},
	],
];

function applyLine(
	delta: DeltaBuilder,
	line: string,
	lineNumber: number,
): DiffParseError | null {
	if (line.startsWith("@@ ")) {
		return applyHunkHeader(delta, line.slice(3), lineNumber, line);
	}
	if (delta.inHunks) return null;
	for (const [prefix, handler] of METADATA_HANDLERS) {
		if (line.startsWith(prefix)) {
			return handler(delta, line.slice(prefix.length), lineNumber, line);
		}
	}
	return null;
}

/**
 * Parses unified diff text (as produced by `git diff`) into per-file records.
 *
 * Only structural metadata is extracted: paths, modes, blob ids and the line
 * intervals named by hunk headers. Hunk bodies are skipped.
 *
 * @param diffText Full `git diff` output
 * @returns Records in diff order, or DiffParseError for a malformed hunk header
 *
 * @pure true
 * @invariant ∀ delta: fromRevisionId is all zeros → never (reclassified as addition)
 * @complexity O(n) where n = number of lines
 *
 * @example
 * ```ts
 * const deltas = parseUnifiedDiff([
 *   "diff --git src/a.ts src/a.ts",
 *   "--- src/a.ts",
 *   "+++ src/a.ts",
 *   "@@ -5 +5,2 @@",
 * ].join("\n"));
 * // Right([{ fromPath: "src/a.ts", fromChanges: [{5,5}], toChanges: [{5,7}], ... }])
 * ```
 */
export function parseUnifiedDiff(
	diffText: string,
): Either.Either<readonly FileDelta[], DiffParseError> {
	const result: FileDelta[] = [];
	let current: DeltaBuilder | null = null;
	const lines = diffText.split(/\r?\n/u);

	for (let index = 0; index < lines.length; index += 1) {
		const line = lines[index] ?? "";
		if (line.startsWith(HEADER_PREFIX)) {
			if (current !== null) result.push(freeze(current));
			const [fromPath, toPath] = splitHeaderPaths(
				line.slice(HEADER_PREFIX.length),
			);
			current = createBuilder(fromPath, toPath);
			continue;
		}
		if (current === null) continue;

		const error = applyLine(current, line, index + 1);
		if (error !== null) return Either.left(error);
	}

	if (current !== null) result.push(freeze(current));
	return Either.right(result);
}
