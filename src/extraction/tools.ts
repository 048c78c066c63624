import type {
  ObservationSource,
  SessionRecord,
  StructuredStep,
  StructuredToolCall,
  ToolObservation,
  TurnRecord,
} from '../types/data.js';
import { SessionStore } from '../session/store.js';
import { coerceArgumentValues, escapeRegExp, parseArgumentPayload } from './args.js';

export interface ExtractToolOptions {
  /** Tool names searched for in plain answer text as a last resort */
  knownTools?: readonly string[];
}

/**
 * What to extract from: a store (its current session), one session, or one turn
 */
export type ExtractionSource = SessionStore | SessionRecord | TurnRecord | null | undefined;

interface ScanTarget {
  sessionId: string | null;
  turns: readonly TurnRecord[];
}

type TurnScanner = (
  turn: TurnRecord,
  turnIndex: number,
  sessionId: string | null,
  options: ExtractToolOptions
) => ToolObservation[];

function resolveTarget(source: ExtractionSource): ScanTarget | null {
  if (!source) return null;
  if (source instanceof SessionStore) {
    const session = source.current();
    return session ? { sessionId: session.id, turns: session.turns } : null;
  }
  if ('transport' in source) {
    return { sessionId: null, turns: [source] };
  }
  return { sessionId: source.id, turns: source.turns };
}

function observation(
  toolName: string,
  args: Record<string, unknown>,
  sessionId: string | null,
  turnIndex: number,
  fragmentIndex: number,
  source: ObservationSource
): ToolObservation {
  return { toolName, arguments: args, sessionId, turnIndex, fragmentIndex, source };
}

function stepToolCalls(step: StructuredStep): StructuredToolCall[] {
  return [...(step.model_response?.tool_calls ?? []), ...(step.tool_calls ?? [])];
}

function typedArguments(call: StructuredToolCall): Record<string, unknown> {
  if (typeof call.arguments === 'string') {
    return parseArgumentPayload(call.arguments)?.args ?? {};
  }
  return call.arguments ?? {};
}

const scanStructured: TurnScanner = (turn, turnIndex, sessionId) => {
  if (turn.transport !== 'structured') return [];
  const found: ToolObservation[] = [];
  turn.structuredSteps.forEach((step, stepIndex) => {
    for (const call of stepToolCalls(step)) {
      if (!call.tool_name) continue;
      found.push(
        observation(call.tool_name, typedArguments(call), sessionId, turnIndex, stepIndex, 'structured')
      );
    }
  });
  return found;
};

const NEW_FORMAT_NAME = /tool_name=(?:(['"])(.+?)\1|([\w.:-]+))/;
const OLD_FORMAT_NAME = /Tool:\s*([\w.:-]+)/;

/**
 * Decode the payload after `arguments=`, quoted (either quote) or bare
 */
function parseArgumentsSection(section: string): Record<string, unknown> {
  const quote = section[0] === '"' || section[0] === "'" ? section[0] : null;
  const body = quote ? section.slice(1) : section;

  // A quoted payload may carry escaped copies of its own delimiter
  const candidates = quote && body.includes(`\\${quote}`)
    ? [body.split(`\\${quote}`).join(quote), body]
    : [body];

  for (const candidate of candidates) {
    const decoded = parseArgumentPayload(candidate);
    if (decoded) return decoded.args;
  }
  return {};
}

/**
 * Parse one execution-log line into a tool call, if it is a call marker.
 * `Response:` lines report a tool's answer and are not calls.
 */
export function parseToolMarker(
  line: string
): { toolName: string; arguments: Record<string, unknown> } | null {
  if (line.includes('tool_name=')) {
    const match = line.match(NEW_FORMAT_NAME);
    const toolName = match?.[2] ?? match?.[3];
    if (!toolName) return null;
    const argsAt = line.indexOf('arguments=');
    return {
      toolName,
      arguments: argsAt === -1 ? {} : parseArgumentsSection(line.slice(argsAt + 'arguments='.length)),
    };
  }

  const isOldMarker = line.includes('tool_execution>') || line.includes('Args:');
  if (!isOldMarker) return null;

  const match = line.match(OLD_FORMAT_NAME);
  if (!match) return null;

  const argsAt = line.indexOf('Args:');
  if (argsAt === -1) {
    return line.includes('Response:') ? null : { toolName: match[1], arguments: {} };
  }

  const decoded = parseArgumentPayload(line.slice(argsAt + 'Args:'.length));
  return { toolName: match[1], arguments: decoded ? coerceArgumentValues(decoded.args) : {} };
}

const scanLog: TurnScanner = (turn, turnIndex, sessionId) => {
  const found: ToolObservation[] = [];
  const fragments: readonly (string | StructuredStep)[] = turn.rawFragments;
  fragments.forEach((fragment, fragmentIndex) => {
    if (typeof fragment !== 'string') return;
    const marker = parseToolMarker(fragment);
    if (marker) {
      found.push(
        observation(marker.toolName, marker.arguments, sessionId, turnIndex, fragmentIndex, 'log')
      );
    }
  });
  return found;
};

// Last whole-name occurrence, so calc_tax is not found inside calc_tax_rate
function lastMention(text: string, tool: string): number {
  const pattern = new RegExp(`(?<!\\w)${escapeRegExp(tool)}(?!\\w)`, 'gi');
  let position = -1;
  for (const match of text.matchAll(pattern)) {
    position = match.index ?? position;
  }
  return position;
}

const scanText: TurnScanner = (turn, turnIndex, sessionId, options) => {
  const mentions: Array<{ tool: string; position: number }> = [];

  for (const tool of options.knownTools ?? []) {
    const position = tool ? lastMention(turn.finalOutput, tool) : -1;
    if (position !== -1) {
      mentions.push({ tool, position });
    }
  }

  return mentions
    .sort((a, b) => a.position - b.position)
    .map((m) => observation(m.tool, {}, sessionId, turnIndex, m.position, 'text'));
};

// Each scanner is a full fallback for the one before it
const SCANNERS: readonly TurnScanner[] = [scanStructured, scanLog, scanText];

/**
 * All tool observations of the source in discovery order
 * (turn, then fragment), taken from the first evidence kind that yields any.
 */
export function extractToolObservations(
  source: ExtractionSource,
  options: ExtractToolOptions = {}
): ToolObservation[] {
  const target = resolveTarget(source);
  if (!target) return [];

  for (const scan of SCANNERS) {
    const found = target.turns.flatMap((turn, turnIndex) =>
      scan(turn, turnIndex, target.sessionId, options)
    );
    if (found.length > 0) return found;
  }
  return [];
}

/**
 * The agent's final tool decision: the temporally last observation, or null
 */
export function extractToolCall(
  source: ExtractionSource,
  options: ExtractToolOptions = {}
): ToolObservation | null {
  const observations = extractToolObservations(source, options);
  return observations.length > 0 ? observations[observations.length - 1] : null;
}
