import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { z } from 'zod';
import { StructuredResponseSchema, type RawTurnPayload } from '../types/data.js';
import { getCasePayloadPath, type RecordingFormat } from './recorder.js';

const RawTurnPayloadSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('streaming'), lines: z.array(z.string()) }),
  z.object({ kind: z.literal('structured'), response: StructuredResponseSchema }),
]);

/**
 * Decode a recorded payload.
 *
 * `.log` files hold one execution-log line per line. `.json` files hold a
 * tagged payload as written by the recorder, a bare array of log lines, or a
 * bare structured response object.
 */
export function parseRecordedPayload(content: string, format: RecordingFormat): RawTurnPayload {
  if (format === 'log') {
    const lines = content.split(/\r?\n/);
    while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
    return { kind: 'streaming', lines };
  }

  const raw: unknown = JSON.parse(content);

  if (Array.isArray(raw)) {
    const lines = z.array(z.string()).safeParse(raw);
    if (!lines.success) {
      throw new Error('Invalid recording: log line arrays must contain only strings');
    }
    return { kind: 'streaming', lines: lines.data };
  }

  const isTagged = typeof raw === 'object' && raw !== null && 'kind' in raw;
  const result = isTagged
    ? RawTurnPayloadSchema.safeParse(raw)
    : StructuredResponseSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Invalid recording:\n${errors}`);
  }

  const data = result.data;
  return 'kind' in data ? data : { kind: 'structured', response: data };
}

/**
 * Load the recorded payload of one case, preferring `.json` over `.log`
 */
export async function loadRecordedPayload(
  caseDir: string,
  caseIndex: number
): Promise<RawTurnPayload> {
  for (const format of ['json', 'log'] as const) {
    const filePath = getCasePayloadPath(caseDir, caseIndex, format);
    if (existsSync(filePath)) {
      const content = await readFile(filePath, 'utf-8');
      try {
        return parseRecordedPayload(content, format);
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        throw new Error(`${filePath}: ${msg}`);
      }
    }
  }

  throw new Error(`Recording not found: ${getCasePayloadPath(caseDir, caseIndex)}`);
}
