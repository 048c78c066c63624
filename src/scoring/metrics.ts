import type {
  ExtractedInfo,
  ScoringThresholds,
  ScoringWeights,
  ToolObservation,
} from "../types/index.js";
import { compareParameters, type ParameterReportEntry } from "./params.js";
import { compareInfo } from "./response.js";
import { formatWeight } from "./utils.js";

export type MetricName =
  | "Tool Selection"
  | "Parameter Accuracy"
  | "Response Accuracy"
  | "Comprehensive Evaluation";

/**
 * Outcome of one metric
 */
export interface MetricResult {
  name: MetricName;
  score: number;
  threshold: number;
  success: boolean;
  reason: string;
}

export interface ParameterMetricResult extends MetricResult {
  report: ParameterReportEntry[];
}

function result(
  name: MetricName,
  score: number,
  threshold: number,
  reason: string
): MetricResult {
  return { name, score, threshold, success: score >= threshold, reason };
}

/**
 * Tool names are compared case-insensitively
 */
export function toolSelectionMetric(
  expectedTool: string,
  observed: ToolObservation | null,
  threshold: number
): MetricResult {
  if (!observed) {
    return result("Tool Selection", 0, threshold, `No tool detected in response. Expected: ${expectedTool}`);
  }
  if (observed.toolName.toLowerCase() === expectedTool.toLowerCase()) {
    return result("Tool Selection", 1, threshold, `Correctly selected tool: ${expectedTool}`);
  }
  return result(
    "Tool Selection",
    0,
    threshold,
    `Incorrect tool selected. Expected: ${expectedTool}, Got: ${observed.toolName}`
  );
}

export function parameterMetric(
  expected: Readonly<Record<string, unknown>>,
  actual: Readonly<Record<string, unknown>>,
  threshold: number
): ParameterMetricResult {
  const comparison = compareParameters(expected, actual);
  return {
    ...result("Parameter Accuracy", comparison.score, threshold, comparison.reason),
    report: comparison.report,
  };
}

export function responseMetric(
  expected: ExtractedInfo,
  actual: ExtractedInfo,
  threshold: number
): MetricResult {
  const comparison = compareInfo(expected, actual);
  return result("Response Accuracy", comparison.score, threshold, comparison.reason);
}

/**
 * Weighted sum of the three sub-scores. Weights are used as given,
 * without normalizing them to sum to 1.
 */
export function compositeMetric(
  parts: { tool: MetricResult; params: MetricResult; response: MetricResult },
  weights: ScoringWeights,
  threshold: ScoringThresholds["composite"]
): MetricResult {
  const score =
    parts.tool.score * weights.tool +
    parts.params.score * weights.params +
    parts.response.score * weights.response;

  const reason = [
    `Tool Selection (${formatWeight(weights.tool)}): ${parts.tool.score.toFixed(2)} - ${parts.tool.reason}`,
    `Parameter Accuracy (${formatWeight(weights.params)}): ${parts.params.score.toFixed(2)} - ${parts.params.reason}`,
    `Response Accuracy (${formatWeight(weights.response)}): ${parts.response.score.toFixed(2)} - ${parts.response.reason}`,
    `Weighted Score: ${score.toFixed(3)}`,
  ].join(" | ");

  return result("Comprehensive Evaluation", score, threshold, reason);
}
