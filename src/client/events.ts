import { z } from "zod";

/**
 * AG-UI event types the client consumes.
 * Unknown fields are stripped and unknown event types are skipped.
 */

const RunStartedEventSchema = z.object({
  type: z.literal("RUN_STARTED"),
  runId: z.string().default(""),
  threadId: z.string().optional(),
});

const RunFinishedEventSchema = z.object({
  type: z.literal("RUN_FINISHED"),
  runId: z.string().default(""),
});

const RunErrorEventSchema = z.object({
  type: z.literal("RUN_ERROR"),
  runId: z.string().default(""),
  message: z.string().default("Unknown error"),
  code: z.string().optional(),
});

const TextMessageStartEventSchema = z.object({
  type: z.literal("TEXT_MESSAGE_START"),
  messageId: z.string(),
  role: z.string().default("assistant"),
});

const TextMessageContentEventSchema = z.object({
  type: z.literal("TEXT_MESSAGE_CONTENT"),
  messageId: z.string(),
  delta: z.string().default(""),
});

const TextMessageEndEventSchema = z.object({
  type: z.literal("TEXT_MESSAGE_END"),
  messageId: z.string(),
});

const ToolCallStartEventSchema = z.object({
  type: z.literal("TOOL_CALL_START"),
  toolCallId: z.string(),
  toolCallName: z.string(),
  parentMessageId: z.string().optional(),
});

const ToolCallArgsEventSchema = z.object({
  type: z.literal("TOOL_CALL_ARGS"),
  toolCallId: z.string(),
  delta: z.string().default(""),
});

const ToolCallEndEventSchema = z.object({
  type: z.literal("TOOL_CALL_END"),
  toolCallId: z.string(),
});

const ToolCallResultEventSchema = z.object({
  type: z.literal("TOOL_CALL_RESULT"),
  toolCallId: z.string(),
  // Results arrive as text or as an already decoded value
  content: z.unknown().optional(),
  result: z.unknown().optional(),
});

export const AGUIEventSchema = z.discriminatedUnion("type", [
  RunStartedEventSchema,
  RunFinishedEventSchema,
  RunErrorEventSchema,
  TextMessageStartEventSchema,
  TextMessageContentEventSchema,
  TextMessageEndEventSchema,
  ToolCallStartEventSchema,
  ToolCallArgsEventSchema,
  ToolCallEndEventSchema,
  ToolCallResultEventSchema,
]);

export type AGUIEvent = z.infer<typeof AGUIEventSchema>;
export type RunErrorEvent = z.infer<typeof RunErrorEventSchema>;

/**
 * Validate one raw event, or null when it is of a type the client ignores
 */
export function parseEvent(raw: unknown): AGUIEvent | null {
  const parsed = AGUIEventSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function resultText(value: unknown): string {
  if (typeof value === "string") return value;
  return JSON.stringify(value ?? "");
}

function quoteArguments(args: string): string {
  return `'${args.replace(/'/g, "\\'")}'`;
}

interface PendingToolCall {
  name: string;
  args: string;
  ended: boolean;
}

/**
 * Render an event stream as execution-log lines:
 *
 *   inference> <assistant message text>
 *   ToolCall(call_id='<id>', tool_name='<name>', arguments='<json>')
 *   tool_execution> Tool:<name> Response:<result>
 *
 * A tool call is written when it ends, or when its result or the end of the
 * stream arrives first.
 */
export function renderEventLog(events: readonly AGUIEvent[]): string[] {
  const lines: string[] = [];
  const messages = new Map<string, string>();
  const toolCalls = new Map<string, PendingToolCall>();

  const flushMessage = (messageId: string) => {
    const text = messages.get(messageId);
    messages.delete(messageId);
    if (text !== undefined && text.trim() !== "") {
      lines.push(`inference> ${text}`);
    }
  };

  const flushToolCall = (toolCallId: string) => {
    const call = toolCalls.get(toolCallId);
    if (!call || call.ended) return;
    call.ended = true;
    lines.push(
      `ToolCall(call_id='${toolCallId}', tool_name='${call.name}', arguments=${quoteArguments(call.args || "{}")})`
    );
  };

  for (const event of events) {
    switch (event.type) {
      case "TEXT_MESSAGE_START":
        messages.set(event.messageId, "");
        break;

      case "TEXT_MESSAGE_CONTENT":
        messages.set(event.messageId, (messages.get(event.messageId) ?? "") + event.delta);
        break;

      case "TEXT_MESSAGE_END":
        flushMessage(event.messageId);
        break;

      case "TOOL_CALL_START":
        toolCalls.set(event.toolCallId, { name: event.toolCallName, args: "", ended: false });
        break;

      case "TOOL_CALL_ARGS": {
        const call = toolCalls.get(event.toolCallId);
        if (call) call.args += event.delta;
        break;
      }

      case "TOOL_CALL_END":
        flushToolCall(event.toolCallId);
        break;

      case "TOOL_CALL_RESULT": {
        flushToolCall(event.toolCallId);
        const name = toolCalls.get(event.toolCallId)?.name ?? "unknown";
        lines.push(
          `tool_execution> Tool:${name} Response:${resultText(event.content ?? event.result)}`
        );
        break;
      }

      case "RUN_STARTED":
      case "RUN_FINISHED":
      case "RUN_ERROR":
        break;
    }
  }

  for (const messageId of [...messages.keys()]) flushMessage(messageId);
  for (const toolCallId of toolCalls.keys()) flushToolCall(toolCallId);

  return lines;
}
