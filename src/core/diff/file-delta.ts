// CHANGE: Derived queries over FileDelta records
// PURITY: CORE
// COMPLEXITY: O(1)

import type { FileDelta } from "../types/index.js";

/**
 * @pure true
 * @invariant result → fromPath ≠ null ∧ toPath ≠ null
 */
export function isRename(delta: FileDelta): boolean {
	return (
		delta.fromPath !== null &&
		delta.toPath !== null &&
		delta.fromPath !== delta.toPath
	);
}

/** @pure true */
export function isAddition(delta: FileDelta): boolean {
	return delta.fromPath === null;
}

/** @pure true */
export function isDeletion(delta: FileDelta): boolean {
	return delta.toPath === null;
}
