import type {
  ExpectedCase,
  ExtractedInfo,
  ScoringConfig,
  SessionRecord,
  ToolObservation,
} from "../types/index.js";
import {
  extractArgumentsFromText,
  extractToolObservations,
  extractToolResponses,
} from "../extraction/index.js";
import {
  compositeMetric,
  parameterMetric,
  responseMetric,
  toolSelectionMetric,
  type MetricResult,
  type ParameterMetricResult,
} from "./metrics.js";
import { extractInfo } from "./response.js";

export interface EvaluateOptions {
  scoring: ScoringConfig;
  /** Tool names looked for in the answer text when no call marker exists */
  knownTools?: readonly string[];
  onDebug?: (message: string) => void;
}

export interface CaseEvaluation {
  toolCall: ToolObservation | null;
  /** Every observation found, in discovery order */
  observations: ToolObservation[];
  /** Arguments the parameter metric scored */
  toolArguments: Record<string, unknown>;
  actualOutput: string;
  expectedInfo: ExtractedInfo;
  actualInfo: ExtractedInfo;
  tool: MetricResult;
  params: ParameterMetricResult;
  response: MetricResult;
  composite: MetricResult;
}

/**
 * Score one case against the session its turns were recorded in.
 * Only that session is consulted.
 */
export function evaluateCase(
  expected: ExpectedCase,
  session: SessionRecord | null,
  options: EvaluateOptions
): CaseEvaluation {
  const { scoring } = options;
  const turns = session?.turns ?? [];
  const actualOutput = turns.length > 0 ? turns[turns.length - 1].finalOutput : "";

  const observations = extractToolObservations(session, { knownTools: options.knownTools });
  const toolCall = observations.length > 0 ? observations[observations.length - 1] : null;
  options.onDebug?.(
    toolCall
      ? `Tool call ${toolCall.toolName} from ${toolCall.source} (turn ${toolCall.turnIndex}, fragment ${toolCall.fragmentIndex})`
      : "No tool call observed"
  );

  let toolArguments = toolCall?.arguments ?? {};
  if (Object.keys(toolArguments).length === 0) {
    toolArguments = extractArgumentsFromText(actualOutput, Object.keys(expected.expectedArguments));
    if (Object.keys(toolArguments).length > 0) {
      options.onDebug?.("Arguments recovered from response text");
    }
  }

  const expectedInfo = extractInfo(expected.expectedAnswer, {
    statusMapping: scoring.statusMapping,
  });
  const actualInfo = extractInfo(actualOutput, {
    statusMapping: scoring.statusMapping,
    toolResponses: extractToolResponses(session),
  });

  const tool = toolSelectionMetric(expected.expectedTool, toolCall, scoring.thresholds.tool);
  const params = parameterMetric(
    expected.expectedArguments,
    toolArguments,
    scoring.thresholds.params
  );
  const response = responseMetric(expectedInfo, actualInfo, scoring.thresholds.response);
  const composite = compositeMetric(
    { tool, params, response },
    scoring.weights,
    scoring.thresholds.composite
  );

  return {
    toolCall,
    observations,
    toolArguments,
    actualOutput,
    expectedInfo,
    actualInfo,
    tool,
    params,
    response,
    composite,
  };
}
