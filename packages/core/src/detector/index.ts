// Tabular Region Detector - finds the header row and data rows inside a raw grid

export {
	detectTable,
	extractCandidates,
	tableRows,
	profileRow,
	gridWidth,
	resolveDetectOptions,
} from "./detector";
export { classifyCell, isEmptyCell, cellText, parseNumberText, parseDateText } from "./cells";

export type { DetectOptions, DetectResult, ResolvedDetectOptions, RowProfile } from "./types";
