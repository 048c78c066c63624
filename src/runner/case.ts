import type { AgentClient } from "../client/types.js";
import type {
  ExpectedCase,
  ProjectConfig,
  RawTurnPayload,
} from "../types/index.js";
import { SessionStore } from "../session/index.js";
import { evaluateCase, errorMessage, type MetricResult } from "../scoring/index.js";
import {
  getCaseRecordingDir,
  loadRecordedPayload,
  recordTurnPayload,
} from "../recording/index.js";
import { normalizeTurn, recordTurn } from "./turn.js";

export interface CaseRunnerOptions {
  config: ProjectConfig;
  expected: ExpectedCase;
  /** 1-based position of the case within its file */
  caseIndex: number;
  /** Case file path relative to the working directory, used for recordings */
  caseFile?: string;
  /** Required unless replaying */
  client?: AgentClient;
  store?: SessionStore;
  /** Text-mention fallback names when the config lists no tools; defaults to the expected tool */
  knownTools?: readonly string[];
  recordDir?: string;
  replayDir?: string;
  verbose?: boolean;
  onLog?: (message: string) => void;
  onDebug?: (message: string) => void;
  onWarn?: (message: string) => void;
}

export interface CaseResult {
  caseIndex: number;
  caseFile: string | null;
  question: string;
  category: string;
  expectedTool: string;
  toolName: string | null;
  toolArguments: Record<string, unknown>;
  toolScore: number;
  paramScore: number;
  responseScore: number;
  compositeScore: number;
  success: boolean;
  reason: string;
  actualOutput: string;
  metrics: MetricResult[];
  durationMs: number;
  error?: string;
}

function truncate(text: string, max = 50): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function errorResult(
  options: CaseRunnerOptions,
  message: string,
  startTs: number
): CaseResult {
  const { expected } = options;
  return {
    caseIndex: options.caseIndex,
    caseFile: options.caseFile ?? null,
    question: expected.question,
    category: expected.category,
    expectedTool: expected.expectedTool,
    toolName: null,
    toolArguments: {},
    toolScore: 0,
    paramScore: 0,
    responseScore: 0,
    compositeScore: 0,
    success: false,
    reason: `Error: ${message}`,
    actualOutput: "",
    metrics: [],
    durationMs: Date.now() - startTs,
    error: message,
  };
}

/**
 * Run one case: open a session, request the turn (or load its recording),
 * normalize it, score it and clean up.
 * Failures become an error result instead of rejecting.
 */
export async function runCase(options: CaseRunnerOptions): Promise<CaseResult> {
  const { config, expected, caseIndex, client, verbose } = options;
  const log = options.onLog ?? (() => {});
  const debug = options.onDebug ?? (() => {});
  const warn = options.onWarn ?? (() => {});
  const store = options.store ?? new SessionStore();

  const startTs = Date.now();
  const caseFile = options.caseFile ?? "";
  const sessionName = `case-${caseIndex}`;
  let sessionId: string | undefined;
  let remoteSession = false;

  if (verbose) log(`  Case ${caseIndex}: "${truncate(expected.question)}"`);

  try {
    let payload: RawTurnPayload;

    if (options.replayDir) {
      const caseDir = getCaseRecordingDir(options.replayDir, caseFile);
      debug(`[Replay] Loading case ${caseIndex} from: ${caseDir}`);
      sessionId = store.create({ name: sessionName }).id;
      payload = await loadRecordedPayload(caseDir, caseIndex);
    } else {
      if (!client) {
        throw new Error("No agent client available");
      }
      sessionId = await client.createSession(sessionName);
      remoteSession = true;
      store.create({ id: sessionId, name: sessionName });
      payload = await client.createTurn({ sessionId, message: expected.question });

      if (options.recordDir) {
        const caseDir = getCaseRecordingDir(options.recordDir, caseFile);
        const filePath = await recordTurnPayload(caseDir, caseIndex, payload);
        debug(`[Record] Saved case ${caseIndex} to: ${filePath}`);
      }
    }

    const turn = normalizeTurn(expected.question, payload, { onWarn: warn, onDebug: debug });
    const session = recordTurn(store, turn, sessionId);

    const evaluation = evaluateCase(expected, session, {
      scoring: config.scoring,
      knownTools:
        config.tools.length > 0 ? config.tools : options.knownTools ?? [expected.expectedTool],
      onDebug: debug,
    });

    if (verbose) {
      log(`    Tool: ${evaluation.toolCall?.toolName ?? "(none)"}`);
      log(`    Arguments: ${JSON.stringify(evaluation.toolArguments)}`);
    }

    return {
      caseIndex,
      caseFile: options.caseFile ?? null,
      question: expected.question,
      category: expected.category,
      expectedTool: expected.expectedTool,
      toolName: evaluation.toolCall?.toolName ?? null,
      toolArguments: evaluation.toolArguments,
      toolScore: evaluation.tool.score,
      paramScore: evaluation.params.score,
      responseScore: evaluation.response.score,
      compositeScore: evaluation.composite.score,
      success: evaluation.composite.success,
      reason: evaluation.composite.reason,
      actualOutput: evaluation.actualOutput,
      metrics: [evaluation.tool, evaluation.params, evaluation.response, evaluation.composite],
      durationMs: Date.now() - startTs,
    };
  } catch (err) {
    return errorResult(options, errorMessage(err), startTs);
  } finally {
    if (sessionId !== undefined && config.execution.sessionCleanup) {
      store.remove(sessionId);
      if (remoteSession && client?.deleteSession) {
        try {
          await client.deleteSession(sessionId);
        } catch (err) {
          warn(`Failed to clean up session ${sessionId}: ${errorMessage(err)}`);
        }
      }
    }
  }
}
