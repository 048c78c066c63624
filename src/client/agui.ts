import { randomUUID } from "node:crypto";
import {
  runHttpRequest,
  transformHttpEventStream,
  type RunAgentInput,
} from "@ag-ui/client";
import type { RawTurnPayload } from "../types/data.js";
import { errorMessage } from "../scoring/utils.js";
import { parseEvent, renderEventLog, type AGUIEvent, type RunErrorEvent } from "./events.js";
import type { AgentClient, CreateTurnOptions } from "./types.js";

export interface AGUIClientOptions {
  endpoint: string;
  headers?: Record<string, string>;
  maxRetries?: number;
  onDebug?: (message: string) => void;

  // AG-UI specific options
  agentId?: string;
  forwardedProps?: Record<string, unknown>;
  state?: Record<string, unknown>;
}

const DEFAULT_MAX_RETRIES = 3;
const RETRY_DELAY_MS = 1000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * AG-UI agent client using the official @ag-ui/client library.
 * Each evaluation session is one AG-UI thread; a turn's event stream is
 * rendered into execution-log lines.
 */
export class AGUIClient implements AgentClient {
  private endpoint: string;
  private agentId: string;
  private maxRetries: number;
  private headers: Record<string, string>;
  private debug: (message: string) => void;
  private state: Record<string, unknown> | undefined;
  private forwardedProps: Record<string, unknown> | undefined;

  constructor(options: AGUIClientOptions) {
    this.endpoint = options.endpoint;
    this.agentId = options.agentId ?? "";
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.headers = options.headers ?? {};
    this.debug = options.onDebug ?? (() => {});
    this.state = options.state;
    this.forwardedProps = options.forwardedProps;

    if (this.agentId.length === 0) {
      throw new Error("AGUIClient requires an agentId");
    }
  }

  async createSession(name: string): Promise<string> {
    const threadId = randomUUID();
    this.debug(`[AG-UI] Thread ${threadId} for ${name}`);
    return threadId;
  }

  /**
   * Send a message over agent/run and render the resulting events
   */
  async createTurn(options: CreateTurnOptions): Promise<RawTurnPayload> {
    const input: RunAgentInput = {
      context: [],
      forwardedProps: this.forwardedProps,
      runId: randomUUID(),
      state: this.state,
      threadId: options.sessionId,
      tools: [],
      messages: [{ id: randomUUID(), role: "user", content: options.message }],
    };

    const events = await this.executeRequest("agent/run", input);

    const failure = events.find((event): event is RunErrorEvent => event.type === "RUN_ERROR");
    if (failure) {
      throw new Error(`AG-UI run error: ${failure.message}`);
    }

    return { kind: "streaming", lines: renderEventLog(events) };
  }

  /**
   * Execute a request to the AG-UI endpoint, retrying streams
   * that complete without any event
   */
  private async executeRequest(method: string, input: RunAgentInput): Promise<AGUIEvent[]> {
    const events: AGUIEvent[] = [];
    let receivedMeaningfulEvents = false;

    const executeStream = async (attempt: number): Promise<void> => {
      // Reset state for this attempt
      events.length = 0;
      receivedMeaningfulEvents = false;

      // Wrap in CopilotKit envelope format
      const envelope = {
        method,
        params: { agentId: this.agentId },
        body: input,
      };

      const requestInit: RequestInit = {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "text/event-stream",
          ...this.headers,
        },
        body: JSON.stringify(envelope),
      };

      this.debug(`[AG-UI] ${method} -> ${this.endpoint}`);
      this.debug(`[AG-UI] Request: ${JSON.stringify(envelope, null, 2)}`);

      try {
        const httpEvents = runHttpRequest(this.endpoint, requestInit);
        const eventStream = transformHttpEventStream(httpEvents);

        await new Promise<void>((resolve, reject) => {
          eventStream.subscribe({
            next: (event) => {
              receivedMeaningfulEvents = true;
              this.debug(`[AG-UI] Event: ${event.type}`);
              const aguiEvent = parseEvent(event);
              if (aguiEvent) {
                events.push(aguiEvent);
              }
            },
            error: (err: unknown) => {
              this.debug(`[AG-UI] Error: ${errorMessage(err)}`);
              events.push({ type: "RUN_ERROR", runId: input.runId, message: errorMessage(err) });
              reject(err);
            },
            complete: () => {
              this.debug(`[AG-UI] Stream complete (${events.length} events)`);
              resolve();
            },
          });
        });

        if (!receivedMeaningfulEvents && attempt < this.maxRetries) {
          this.debug(`[AG-UI] No events received, retrying (${attempt}/${this.maxRetries})...`);
          await sleep(RETRY_DELAY_MS);
          return executeStream(attempt + 1);
        }
      } catch (error) {
        // Error already recorded in subscribe.error
        if (events.length === 0 || events[events.length - 1].type !== "RUN_ERROR") {
          events.push({ type: "RUN_ERROR", runId: input.runId, message: errorMessage(error) });
        }
      }
    };

    await executeStream(1);
    return events;
  }
}
