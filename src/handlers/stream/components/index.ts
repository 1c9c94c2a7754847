export { ReasoningSplitter } from "./ReasoningSplitter.js";
export type { ReasoningSplitterOptions } from "./ReasoningSplitter.js";
export { StopSequenceMatcher } from "./StopSequenceMatcher.js";
export type { StopMatchResult } from "./StopSequenceMatcher.js";
export { ToolCallDetector } from "./ToolCallDetector.js";
export type { DetectorOutput, ToolCallDetectorOptions } from "./ToolCallDetector.js";
export { UsageAccumulator } from "./UsageAccumulator.js";
export { StateTracker } from "./StateTracker.js";
export type { GenerationState } from "./StateTracker.js";
export { SseFormatter } from "./SseFormatter.js";
export { findEarliest, longestPartialSuffix } from "./partialMatch.js";
