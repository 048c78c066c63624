export { runCase, type CaseRunnerOptions, type CaseResult } from "./case.js";
export { runBatch, type BatchCase, type BatchRunnerOptions } from "./batch.js";
export {
  summarizeResults,
  type RunSummary,
  type MetricSummary,
  type CategorySummary,
} from "./summary.js";
export {
  normalizeTurn,
  recordTurn,
  classifyLine,
  stitchTokens,
  NO_RESPONSE_CAPTURED,
  type NormalizeOptions,
  type LineKind,
} from "./turn.js";
