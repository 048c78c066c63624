import type {
  RawTurnPayload,
  SessionRecord,
  StructuredResponse,
  StreamingTurnRecord,
  StructuredTurnRecord,
  TurnRecord,
} from "../types/index.js";
import type { SessionStore } from "../session/index.js";
import { contentText } from "../extraction/index.js";

export const NO_RESPONSE_CAPTURED = "Error: No response captured from agent";

export interface NormalizeOptions {
  onWarn?: (message: string) => void;
  onDebug?: (message: string) => void;
}

export type LineKind = "tool" | "inference" | "section" | "text";

const PUNCTUATION = new Set([".", ",", ":", ";", "!", "?", "%"]);
const CURRENCY = new Set(["$", "€", "£", "¥"]);
const SEPARATORS = new Set([".", ","]);
// "step_complete>", "shield_call>" and other section prefixes
const SECTION_MARKER = /^\s*\w+>/;
// Old-format marker without the tool_execution> prefix
const BARE_TOOL_MARKER = /\bTool:\s*\S+\s+(?:Args|Response):/;

const isDigits = (token: string) => /^\d+$/.test(token);

/**
 * Classify one streamed log line
 */
export function classifyLine(line: string): LineKind {
  if (line.includes("tool_execution>")) return "tool";
  if (line.includes("call_id=") && line.includes("tool_name=")) return "tool";
  if (BARE_TOOL_MARKER.test(line)) return "tool";
  if (line.includes("inference>")) return "inference";
  if (SECTION_MARKER.test(line)) return "section";
  return "text";
}

/**
 * Re-join streamed tokens into prose: no space before punctuation, after a
 * currency symbol, between digit runs, or around a separator inside a number.
 */
export function stitchTokens(tokens: readonly string[]): string {
  let result = "";

  tokens.forEach((token, i) => {
    if (i === 0) {
      result = token;
      return;
    }
    const prev = tokens[i - 1];
    const beforePrev = i >= 2 ? tokens[i - 2] : "";

    const glue =
      PUNCTUATION.has(token) ||
      CURRENCY.has(prev) ||
      (isDigits(prev) && isDigits(token)) ||
      (SEPARATORS.has(prev) && isDigits(token) && isDigits(beforePrev));

    result += glue ? token : ` ${token}`;
  });

  return result;
}

function normalizeStreaming(
  input: string,
  lines: readonly string[],
  options: NormalizeOptions
): StreamingTurnRecord {
  const tokens: string[] = [];
  let collecting = false;

  for (const line of lines) {
    switch (classifyLine(line)) {
      case "tool":
        break;

      case "inference": {
        collecting = true;
        const content = line.split("inference>").slice(1).join("inference>").trim();
        if (content) tokens.push(content);
        break;
      }

      case "section":
        collecting = false;
        break;

      case "text": {
        const token = line.trim();
        if (collecting && token) tokens.push(token);
        break;
      }
    }
  }

  let finalOutput = stitchTokens(tokens);

  if (!finalOutput) {
    // No inference text: take the last plain line of the log
    for (let i = lines.length - 1; i >= 0; i--) {
      const line = lines[i];
      const kind = classifyLine(line);
      if (line.trim() && kind !== "tool" && kind !== "inference") {
        finalOutput = line.trim();
        options.onDebug?.("No inference output, using last log line as response");
        break;
      }
    }
  }

  const captured = finalOutput.trim() !== "";
  if (!captured) {
    options.onWarn?.("No response content captured from streaming log");
  }

  return {
    transport: "streaming",
    input,
    finalOutput: captured ? finalOutput : NO_RESPONSE_CAPTURED,
    captured,
    rawFragments: [...lines],
  };
}

function normalizeStructured(
  input: string,
  response: StructuredResponse,
  options: NormalizeOptions
): StructuredTurnRecord {
  const finalOutput = contentText(response.outputMessage?.content);
  const captured = finalOutput.trim() !== "";
  if (!captured) {
    options.onWarn?.("Structured response has no output message content");
  }

  return {
    transport: "structured",
    input,
    finalOutput: captured ? finalOutput : NO_RESPONSE_CAPTURED,
    captured,
    rawFragments: [...response.steps],
    structuredSteps: [...response.steps],
  };
}

/**
 * Reduce one raw agent turn to a canonical TurnRecord
 */
export function normalizeTurn(
  input: string,
  payload: RawTurnPayload,
  options: NormalizeOptions = {}
): TurnRecord {
  switch (payload.kind) {
    case "streaming":
      return normalizeStreaming(input, payload.lines, options);
    case "structured":
      return normalizeStructured(input, payload.response, options);
  }
}

/**
 * Append a turn to the given session, or to the current one,
 * creating a session when none is active
 */
export function recordTurn(
  store: SessionStore,
  turn: TurnRecord,
  sessionId?: string
): SessionRecord {
  const id = sessionId ?? store.current()?.id ?? store.create().id;
  return store.appendTurn(id, turn);
}
