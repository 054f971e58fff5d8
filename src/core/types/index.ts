// CHANGE: Central export file for all type definitions
// PURITY: CORE

export type {
	CheckAction,
	CheckInfo,
	CheckResult,
	TaskOperation,
} from "./check.js";
export { Check } from "./check.js";
export type {
	CLIOptions,
	LinegateConfig,
	LogLevelName,
	ToolConfig,
} from "./config.js";
export type { FileDelta, LineFilter, LineInterval } from "./diff.js";
export type {
	Completion,
	ReportLine,
	ReportState,
	ReportStream,
} from "./report.js";
