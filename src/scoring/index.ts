export { evaluateCase, type CaseEvaluation, type EvaluateOptions } from "./engine.js";
export {
  toolSelectionMetric,
  parameterMetric,
  responseMetric,
  compositeMetric,
  type MetricName,
  type MetricResult,
  type ParameterMetricResult,
} from "./metrics.js";
export {
  compareParameters,
  matchValue,
  isBooleanLike,
  toBoolean,
  type MatchRule,
  type ParameterComparison,
  type ParameterReportEntry,
} from "./params.js";
export {
  extractInfo,
  extractStatus,
  compareInfo,
  DEFAULT_STATUS_MAPPING,
  type ExtractInfoOptions,
  type InfoComparison,
} from "./response.js";
export { stringify, errorMessage, formatWeight } from "./utils.js";
