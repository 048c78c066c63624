import type { ExtractedInfo } from "../types/index.js";
import {
  warningsFromText,
  warningsFromToolResponses,
  type ToolResponse,
} from "../extraction/index.js";

export interface ExtractInfoOptions {
  /** Extra or overriding status canonicalization, keys matched upper-cased */
  statusMapping?: Readonly<Record<string, string>>;
  /** Tool answers of the turn; when any are present warnings come from them */
  toolResponses?: readonly ToolResponse[];
}

export interface InfoComparison {
  score: number;
  reason: string;
}

const NUMBER = /\b\d+(?:,\d{3})*(?:\.\d+)?\b/g;
const PERCENTAGE = /(\d+(?:\.\d+)?)%/g;
const AMOUNT = /\$([\d,]+(?:\.\d+)?)/g;

// Earlier patterns take precedence
const STATUS_PATTERNS: readonly RegExp[] = [
  /\b(PASSED|FAILED|ELIGIBLE|NOT ELIGIBLE)\b/i,
  /\b(passed|failed)\b/i,
  /\b(passes|pass)\b/i,
  /\b(fails|fail)\b/i,
  /\b(approved|approve)\b/i,
  /\b(rejected|reject)\b/i,
  /\b(valid|invalid)\b/i,
  /\b(successful|success)\b/i,
  /\b(unsuccessful)\b/i,
];

export const DEFAULT_STATUS_MAPPING: Readonly<Record<string, string>> = {
  PASSES: "PASSED",
  PASS: "PASSED",
  FAILS: "FAILED",
  FAIL: "FAILED",
  APPROVED: "PASSED",
  APPROVE: "PASSED",
  REJECTED: "FAILED",
  REJECT: "FAILED",
  VALID: "PASSED",
  INVALID: "FAILED",
  SUCCESSFUL: "PASSED",
  SUCCESS: "PASSED",
  UNSUCCESSFUL: "FAILED",
};

const PERCENT_TOLERANCE = 0.1;

function toNumbers(text: string, pattern: RegExp, group: number): number[] {
  return [...text.matchAll(pattern)]
    .map((match) => parseFloat(match[group].replace(/,/g, "")))
    .filter((value) => !Number.isNaN(value));
}

/**
 * Canonical status label of a text, or null when none of the patterns match
 */
export function extractStatus(
  text: string,
  statusMapping: Readonly<Record<string, string>> = {}
): string | null {
  const mapping: Record<string, string> = { ...DEFAULT_STATUS_MAPPING };
  for (const [key, value] of Object.entries(statusMapping)) {
    mapping[key.toUpperCase()] = value;
  }

  for (const pattern of STATUS_PATTERNS) {
    const match = text.match(pattern);
    if (match) {
      const raw = match[1].toUpperCase();
      return mapping[raw] ?? raw;
    }
  }
  return null;
}

/**
 * Pull the comparable facts out of an answer text
 */
export function extractInfo(text: string, options: ExtractInfoOptions = {}): ExtractedInfo {
  const toolResponses = options.toolResponses ?? [];

  return {
    numbers: toNumbers(text, NUMBER, 0),
    percentages: toNumbers(text, PERCENTAGE, 1),
    amounts: toNumbers(text, AMOUNT, 1),
    status: extractStatus(text, options.statusMapping),
    warnings:
      toolResponses.length > 0
        ? warningsFromToolResponses(toolResponses)
        : warningsFromText(text),
  };
}

/**
 * Score how well the actual facts reproduce the expected ones.
 * The result is the mean of the sub-checks that apply.
 */
export function compareInfo(expected: ExtractedInfo, actual: ExtractedInfo): InfoComparison {
  const scores: number[] = [];
  const reasons: string[] = [];

  if (expected.status && actual.status) {
    if (expected.status === actual.status) {
      scores.push(1.0);
      reasons.push("Status matches");
    } else {
      scores.push(0.0);
      reasons.push(`Status mismatch: expected ${expected.status}, got ${actual.status}`);
    }
  } else if (expected.status) {
    scores.push(0.0);
    reasons.push(`Missing status: expected ${expected.status}`);
  }

  if (expected.amounts.length > 0 && actual.amounts.length > 0) {
    const mainExpected = expected.amounts[0];
    const mainActual = actual.amounts[0];
    const accuracy =
      mainExpected > 0
        ? Math.max(0, 1 - Math.abs(mainExpected - mainActual) / mainExpected)
        : mainActual === 0
          ? 1.0
          : 0.0;
    scores.push(accuracy);
    reasons.push(`Main amount accuracy: ${accuracy.toFixed(2)}`);
  }

  if (expected.percentages.length > 0) {
    const found = expected.percentages.filter((pct) =>
      actual.percentages.some((other) => Math.abs(pct - other) <= PERCENT_TOLERANCE)
    ).length;
    const score = found / expected.percentages.length;
    scores.push(score);
    reasons.push(`Percentage accuracy: ${score.toFixed(2)}`);
  }

  const expectedWarns = expected.warnings.length > 0;
  const actualWarns = actual.warnings.length > 0;
  if (expectedWarns === actualWarns) {
    scores.push(1.0);
    reasons.push("Warning presence matches");
  } else {
    scores.push(0.5);
    reasons.push("Warning presence mismatch");
  }

  return {
    score: scores.reduce((sum, s) => sum + s, 0) / scores.length,
    reason: reasons.join("; "),
  };
}
