// CHANGE: Work-tree file access as Effects with typed FSError
// PURITY: SHELL (filesystem)
// EFFECT: Effect<_, FSError>
// COMPLEXITY: O(n) where n = file size

import { Effect } from "effect";

import { FSError } from "../../core/errors.js";
import { fs } from "../utils/node-mods.js";

const describe = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * @effect Effect<string, FSError>
 */
export function readWorkTree(file: string): Effect.Effect<string, FSError> {
	return Effect.tryPromise({
		try: () => fs.promises.readFile(file, "utf8"),
		catch: (error) => new FSError({ detail: describe(error), path: file }),
	});
}

/**
 * Replaces the file's content in place.
 *
 * @effect Effect<void, FSError>
 */
export function writeWorkTree(
	file: string,
	content: string,
): Effect.Effect<void, FSError> {
	return Effect.tryPromise({
		try: () => fs.promises.writeFile(file, content, "utf8"),
		catch: (error) => new FSError({ detail: describe(error), path: file }),
	});
}

/**
 * @effect Effect<void, FSError>
 */
export function appendWorkTree(
	file: string,
	content: string,
): Effect.Effect<void, FSError> {
	return Effect.tryPromise({
		try: () => fs.promises.appendFile(file, content, "utf8"),
		catch: (error) => new FSError({ detail: describe(error), path: file }),
	});
}

/** @effect Effect<boolean, never> */
export function fileExists(file: string): Effect.Effect<boolean> {
	return Effect.sync(() => fs.existsSync(file));
}
