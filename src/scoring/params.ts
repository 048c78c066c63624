import { isDeepStrictEqual } from "node:util";
import { stringify } from "./utils.js";

export type MatchRule = "exact" | "string" | "numeric" | "boolean";

export type ParameterReportEntry =
  | { key: string; status: "match"; rule: MatchRule }
  | { key: string; status: "mismatch"; expected: unknown; actual: unknown }
  | { key: string; status: "missing"; expected: unknown };

export interface ParameterComparison {
  score: number;
  report: ParameterReportEntry[];
  reason: string;
}

const NUMERIC_FORM = /^-?[\d.]+$/;
const TRUTHY = ["true", "yes", "1"];
const BOOLEAN_WORDS = [...TRUTHY, "false", "no", "0"];

function isNumericForm(value: unknown): boolean {
  const text = stringify(value);
  return NUMERIC_FORM.test(text) && /\d/.test(text) && !Number.isNaN(Number(text));
}

export function isBooleanLike(value: unknown): boolean {
  if (typeof value === "boolean") return true;
  if (typeof value === "string") return BOOLEAN_WORDS.includes(value.toLowerCase());
  if (typeof value === "number") return value === 0 || value === 1;
  return false;
}

export function toBoolean(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") return TRUTHY.includes(value.toLowerCase());
  if (typeof value === "number") return value !== 0;
  return Boolean(value);
}

/**
 * Decide whether an observed value equals the expected one.
 * Numeric forms are compared as numbers and never fall through to
 * boolean coercion, so "5" and "0" stay distinct.
 */
export function matchValue(expected: unknown, actual: unknown): MatchRule | null {
  if (isDeepStrictEqual(expected, actual)) return "exact";
  if (stringify(expected) === stringify(actual)) return "string";

  if (isNumericForm(expected) && isNumericForm(actual)) {
    return Number(stringify(expected)) === Number(stringify(actual)) ? "numeric" : null;
  }

  if (isBooleanLike(expected) || isBooleanLike(actual)) {
    return toBoolean(expected) === toBoolean(actual) ? "boolean" : null;
  }

  return null;
}

/**
 * Compare observed arguments against expected ones, key by key.
 * Keys only present in `actual` are ignored.
 */
export function compareParameters(
  expected: Readonly<Record<string, unknown>>,
  actual: Readonly<Record<string, unknown>>
): ParameterComparison {
  const keys = Object.keys(expected);
  if (keys.length === 0) {
    return { score: 1.0, report: [], reason: "No parameters expected" };
  }

  const report: ParameterReportEntry[] = keys.map((key) => {
    if (!Object.prototype.hasOwnProperty.call(actual, key)) {
      return { key, status: "missing", expected: expected[key] };
    }
    const rule = matchValue(expected[key], actual[key]);
    return rule
      ? { key, status: "match", rule }
      : { key, status: "mismatch", expected: expected[key], actual: actual[key] };
  });

  const correct = report.filter((entry) => entry.status === "match").length;
  const missing = report.flatMap((entry) => (entry.status === "missing" ? [entry.key] : []));
  const incorrect = report.flatMap((entry) =>
    entry.status === "mismatch"
      ? [`${entry.key}: expected ${stringify(entry.expected)}, got ${stringify(entry.actual)}`]
      : []
  );

  const parts: string[] = [];
  if (correct > 0) parts.push(`${correct}/${keys.length} parameters correct`);
  if (missing.length > 0) parts.push(`Missing: ${missing.join(", ")}`);
  if (incorrect.length > 0) parts.push(`Incorrect: ${incorrect.join(", ")}`);

  return {
    score: correct / keys.length,
    report,
    reason: parts.length > 0 ? parts.join("; ") : "All parameters correct",
  };
}
