// CHANGE: Structural diff records consumed by line filters and diff-scoped checks
// PURITY: CORE
// INVARIANT: Records are immutable once emitted by the parser
// COMPLEXITY: O(1) - type declarations only

/**
 * Closed interval `[start, end]` of 1-based line numbers.
 *
 * @invariant 1 ≤ start ≤ end
 */
export interface LineInterval {
	readonly start: number;
	readonly end: number;
}

/**
 * Change record for one file of a unified diff.
 *
 * @property fromPath Path before the change; null when the file was created
 * @property toPath Path after the change; null when the file was deleted
 * @property fromChanges Intervals touched on the old side, in diff order
 * @property toChanges Intervals touched on the new side, in diff order
 * @property fromPermissions Mode before the change (e.g. "100644")
 * @property toPermissions Mode after the change
 * @property fromRevisionId Blob id before the change
 * @property toRevisionId Blob id after the change
 */
export interface FileDelta {
	readonly fromPath: string | null;
	readonly toPath: string | null;
	readonly fromChanges: readonly LineInterval[];
	readonly toChanges: readonly LineInterval[];
	readonly fromPermissions: string | null;
	readonly toPermissions: string | null;
	readonly fromRevisionId: string | null;
	readonly toRevisionId: string | null;
}

/**
 * Association of a file name with the intervals a tool should report on.
 */
export interface LineFilter {
	readonly name: string;
	readonly lines: readonly LineInterval[];
}
