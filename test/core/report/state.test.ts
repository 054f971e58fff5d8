// CHANGE: Tests for folding completions into report state
// PURITY: CORE tests

import { describe, expect, it } from "vitest";

import { failed, passed } from "../../../src/core/check/result.js";
import {
	emptyReportState,
	recordCompletion,
} from "../../../src/core/report/state.js";

describe("recordCompletion", () => {
	it("classifies results and counts every completion", () => {
		const state = [
			{ file: "a.c", result: passed() },
			{ file: "b.c", result: failed("x") },
			{ file: "c.c", result: null },
			{ file: "d.c", result: passed() },
		].reduce(recordCompletion, emptyReportState);
		expect(state).toEqual({
			passing: ["a.c", "d.c"],
			failing: ["b.c"],
			completed: 4,
		});
	});

	it("does not mutate the previous state", () => {
		const next = recordCompletion(emptyReportState, {
			file: "a.c",
			result: failed("x"),
		});
		expect(emptyReportState.failing).toEqual([]);
		expect(next.failing).toEqual(["a.c"]);
	});
});
