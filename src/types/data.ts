import { z } from "zod";

const ContentItemSchema = z
  .object({ type: z.string().optional(), text: z.string().optional() })
  .passthrough();

// Message content is either plain text or a list of typed items
export const MessageContentSchema = z.union([
  z.string(),
  z.array(z.union([z.string(), ContentItemSchema])),
]);

export const StructuredToolCallSchema = z
  .object({
    call_id: z.string().optional(),
    tool_name: z.string(),
    arguments: z.union([z.record(z.unknown()), z.string()]).optional(),
  })
  .passthrough();

export const StructuredToolResponseSchema = z
  .object({
    call_id: z.string().optional(),
    tool_name: z.string().optional(),
    content: MessageContentSchema.optional(),
  })
  .passthrough();

export const StructuredStepSchema = z
  .object({
    step_type: z.string().optional(),
    step_id: z.string().optional(),
    tool_calls: z.array(StructuredToolCallSchema).optional(),
    tool_responses: z.array(StructuredToolResponseSchema).optional(),
    model_response: z
      .object({
        content: MessageContentSchema.optional(),
        tool_calls: z.array(StructuredToolCallSchema).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const MessageSchema = z
  .object({ role: z.string().optional(), content: MessageContentSchema.optional() })
  .passthrough();

/**
 * Non-streaming turn response. Accepts the snake_case field names
 * agent servers put on the wire as well as camelCase.
 */
export const StructuredResponseSchema = z.preprocess(
  (raw) => {
    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) return raw;
    const record: Record<string, unknown> = { ...raw };
    return {
      inputMessages: record.inputMessages ?? record.input_messages ?? [],
      outputMessage: record.outputMessage ?? record.output_message,
      steps: record.steps ?? [],
    };
  },
  z.object({
    inputMessages: z.array(MessageSchema),
    outputMessage: MessageSchema.optional(),
    steps: z.array(StructuredStepSchema),
  })
);

export type MessageContent = z.infer<typeof MessageContentSchema>;
export type StructuredToolCall = z.infer<typeof StructuredToolCallSchema>;
export type StructuredToolResponse = z.infer<typeof StructuredToolResponseSchema>;
export type StructuredStep = z.infer<typeof StructuredStepSchema>;
export type StructuredResponse = z.infer<typeof StructuredResponseSchema>;

/**
 * Raw output of one agent turn, as delivered by a transport
 */
export type RawTurnPayload =
  | { kind: "streaming"; lines: string[] }
  | { kind: "structured"; response: StructuredResponse };

interface TurnRecordBase {
  readonly input: string;
  readonly finalOutput: string;
  /** False when no answer text could be recovered and the sentinel was used */
  readonly captured: boolean;
}

export interface StreamingTurnRecord extends TurnRecordBase {
  readonly transport: "streaming";
  readonly rawFragments: readonly string[];
}

export interface StructuredTurnRecord extends TurnRecordBase {
  readonly transport: "structured";
  readonly rawFragments: readonly StructuredStep[];
  readonly structuredSteps: readonly StructuredStep[];
}

export type TurnRecord = StreamingTurnRecord | StructuredTurnRecord;

export interface SessionRecord {
  readonly id: string;
  readonly name: string;
  /** Creation order within the store, starting at 0 */
  readonly sequence: number;
  readonly turns: readonly TurnRecord[];
}

export type ObservationSource = "structured" | "log" | "text";

export interface ToolObservation {
  toolName: string;
  arguments: Record<string, unknown>;
  sessionId: string | null;
  turnIndex: number;
  fragmentIndex: number;
  source: ObservationSource;
}

export interface ExtractedInfo {
  numbers: number[];
  percentages: number[];
  amounts: number[];
  status: string | null;
  warnings: string[];
}
