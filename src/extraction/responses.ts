import type {
  MessageContent,
  SessionRecord,
  StructuredStep,
  TurnRecord,
} from '../types/data.js';
import { decodeObject, findBalancedObject } from './args.js';

export type ToolResponse = Record<string, unknown>;

// additional_requirements entries that read as cautions
const CAUTION_INDICATORS = ['close to threshold', 'verify', 'caution', 'warning', 'alert'];

/**
 * Undo backslash escapes of quotes, newlines and tabs
 */
function unescapeRepr(text: string): string {
  return text.replace(/\\(['"\\nt])/g, (_match, ch: string) => {
    if (ch === 'n') return '\n';
    if (ch === 't') return '\t';
    return ch;
  });
}

function decodeJsonObject(text: string): ToolResponse | null {
  for (const candidate of [text, unescapeRepr(text)]) {
    const span = findBalancedObject(candidate);
    if (!span) continue;
    const decoded = decodeObject(span.text);
    if (decoded) return decoded.value;
  }
  return null;
}

/**
 * Parse the payload of a `tool_execution> Tool:<name> Response:<...>` line.
 * The payload is either a content item (`TextContentItem(text='{...}')`)
 * or a bare JSON object.
 */
export function parseResponseLine(line: string): ToolResponse | null {
  const at = line.indexOf('Response:');
  if (at === -1 || !(line.includes('tool_execution>') || line.includes('Tool:'))) {
    return null;
  }
  const section = line.slice(at + 'Response:'.length).trim();

  const textAt = section.indexOf('text=');
  if (textAt !== -1) {
    const quote = section[textAt + 'text='.length];
    if (quote === "'" || quote === '"') {
      const end = section.lastIndexOf(quote);
      if (end > textAt + 'text='.length) {
        return decodeJsonObject(section.slice(textAt + 'text='.length + 1, end));
      }
    }
  }

  return decodeJsonObject(section);
}

/**
 * Flatten message content to text, joining content items by their `text`
 */
export function contentText(content: MessageContent | undefined): string {
  if (content === undefined) return '';
  if (typeof content === 'string') return content;
  return content
    .map((item) => (typeof item === 'string' ? item : item.text ?? ''))
    .join('');
}

function stepResponses(step: StructuredStep): ToolResponse[] {
  const found: ToolResponse[] = [];
  for (const response of step.tool_responses ?? []) {
    const decoded = decodeJsonObject(contentText(response.content));
    if (decoded) found.push(decoded);
  }
  return found;
}

function turnResponses(turn: TurnRecord): ToolResponse[] {
  if (turn.transport === 'structured') {
    return turn.structuredSteps.flatMap(stepResponses);
  }
  const found: ToolResponse[] = [];
  for (const line of turn.rawFragments) {
    const decoded = parseResponseLine(line);
    if (decoded) found.push(decoded);
  }
  return found;
}

/**
 * Every JSON-shaped tool answer recoverable from a turn or a session, in order
 */
export function extractToolResponses(
  source: SessionRecord | TurnRecord | null | undefined
): ToolResponse[] {
  if (!source) return [];
  if ('transport' in source) return turnResponses(source);
  return source.turns.flatMap(turnResponses);
}

function stringEntries(value: unknown): string[] {
  if (typeof value === 'string') return value.trim() ? [value] : [];
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is string => typeof entry === 'string' && entry.trim() !== '');
}

/**
 * Warnings a tool reported: its `warnings` plus cautionary `additional_requirements`
 */
export function warningsFromToolResponses(responses: readonly ToolResponse[]): string[] {
  const warnings: string[] = [];
  for (const response of responses) {
    warnings.push(...stringEntries(response.warnings));
    for (const requirement of stringEntries(response.additional_requirements)) {
      const lower = requirement.toLowerCase();
      if (CAUTION_INDICATORS.some((indicator) => lower.includes(indicator))) {
        warnings.push(requirement);
      }
    }
  }
  return warnings;
}

/**
 * Sentences of free text that mention a warning
 */
export function warningsFromText(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => /\bwarnings?\b/i.test(sentence));
}
