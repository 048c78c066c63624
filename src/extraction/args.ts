export type PayloadDecoding = "json" | "dict" | "scan";

export interface DecodedPayload {
  args: Record<string, unknown>;
  decoding: PayloadDecoding;
  /** False when the braces never closed and the tail was used */
  complete: boolean;
}

export interface BalancedSpan {
  text: string;
  start: number;
  closed: boolean;
}

/**
 * Find the `{...}` span opening at `from` (or at the first brace after it)
 * by brace counting. Quoted text is skipped so braces inside string
 * literals do not count. An unclosed span runs to the end of the text.
 */
export function findBalancedObject(text: string, from = 0): BalancedSpan | null {
  const start = text.indexOf("{", from);
  if (start === -1) return null;

  let depth = 0;
  let quote: string | null = null;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (ch === "\\") {
      i++;
      continue;
    }
    if (quote) {
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) {
        return { text: text.slice(start, i + 1), start, closed: true };
      }
    }
  }

  return { text: text.slice(start), start, closed: false };
}

const DICT_KEYWORDS: Record<string, string> = {
  True: "true",
  False: "false",
  None: "null",
};

/**
 * Rewrite a dict literal (`{'a': 'x', 'b': True}`) as JSON text.
 * Single-quoted strings become double-quoted; True/False/None are only
 * rewritten outside string literals and only in that exact case.
 * Returns null when a string literal never terminates.
 */
export function dictLiteralToJson(text: string): string | null {
  let out = "";
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (ch === "'" || ch === '"') {
      let j = i + 1;
      let body = "";
      while (j < text.length && text[j] !== ch) {
        const c = text[j];
        if (c === "\\" && j + 1 < text.length) {
          const next = text[j + 1];
          // \' is not a JSON escape
          body += ch === "'" && next === "'" ? "'" : c + next;
          j += 2;
          continue;
        }
        body += ch === "'" && c === '"' ? '\\"' : c;
        j++;
      }
      if (j >= text.length) return null;
      out += `"${body}"`;
      i = j + 1;
      continue;
    }

    if (/[A-Za-z_]/.test(ch)) {
      let j = i + 1;
      while (j < text.length && /\w/.test(text[j])) j++;
      const word = text.slice(i, j);
      out += DICT_KEYWORDS[word] ?? word;
      i = j;
      continue;
    }

    out += ch;
    i++;
  }

  return out;
}

function asPlainObject(value: unknown): Record<string, unknown> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return null;
  }
  return { ...value };
}

function tryJson(text: string): Record<string, unknown> | null {
  try {
    return asPlainObject(JSON.parse(text));
  } catch {
    return null;
  }
}

/**
 * Decode an object from strict JSON, falling back to dict-literal notation
 */
export function decodeObject(
  text: string
): { value: Record<string, unknown>; decoding: "json" | "dict" } | null {
  const json = tryJson(text);
  if (json) return { value: json, decoding: "json" };

  const converted = dictLiteralToJson(text);
  const dict = converted === null ? null : tryJson(converted);
  if (dict) return { value: dict, decoding: "dict" };

  return null;
}

const KEY_VALUE_PATTERN =
  /(["'])([^"']+)\1\s*:\s*("(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*'|-?\d+(?:\.\d+)?|true|false|null|True|False|None)/g;

/**
 * Coerce one scalar taken from text: numbers, booleans and null are
 * recognised with or without surrounding quotes.
 */
export function coerceScalar(raw: string): unknown {
  const value = raw.trim().replace(/^(["'])([\s\S]*)\1$/, "$2");
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);
  const lower = value.toLowerCase();
  if (lower === "true" || lower === "false") return lower === "true";
  if (lower === "null" || value === "None") return null;
  return value;
}

/**
 * Pull `"key": value` pairs straight out of text that does not decode,
 * e.g. a truncated argument payload.
 */
export function scanKeyValues(text: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const match of text.matchAll(KEY_VALUE_PATTERN)) {
    result[match[2]] = coerceScalar(match[3]);
  }
  return result;
}

/**
 * Top-level coercion applied to log-sourced arguments:
 * digit-only strings become integers, "true"/"false" become booleans.
 */
export function coerceArgumentValues(
  args: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(args)) {
    if (typeof value === "string" && /^\d+$/.test(value)) {
      result[key] = parseInt(value, 10);
    } else if (typeof value === "string" && /^(true|false)$/i.test(value)) {
      result[key] = value.toLowerCase() === "true";
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Decode an argument payload embedded in a log line.
 * `text` starts at (or before) the opening brace. Tries the balanced span as
 * JSON, then as a dict literal, then falls back to a key/value scan.
 * Returns null when nothing can be recovered.
 */
export function parseArgumentPayload(text: string): DecodedPayload | null {
  const span = findBalancedObject(text);
  if (!span) return null;

  const decoded = decodeObject(span.text);
  if (decoded) {
    return {
      args: coerceArgumentValues(decoded.value),
      decoding: decoded.decoding,
      complete: span.closed,
    };
  }

  const scanned = scanKeyValues(span.text);
  if (Object.keys(scanned).length === 0) return null;
  return { args: scanned, decoding: "scan", complete: span.closed };
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Recover arguments mentioned in prose: `key: value` / `key = value` for each
 * expected key, then any flat JSON object in the text (later blocks win).
 */
export function extractArgumentsFromText(
  text: string,
  keys: readonly string[]
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const key of keys) {
    const pattern = new RegExp(
      `(?<!\\w)${escapeRegExp(key)}["'\\s]*[:=]\\s*("[^"]*"|'[^']*'|[\\w.-]+)`,
      "i"
    );
    const match = text.match(pattern);
    if (match) result[key] = coerceScalar(match[1]);
  }

  for (const block of text.match(/\{[^{}]*\}/g) ?? []) {
    const json = tryJson(block);
    if (json) Object.assign(result, json);
  }

  return result;
}
