import type { RawTurnPayload } from "../types/data.js";

/**
 * Options for requesting one agent turn
 */
export interface CreateTurnOptions {
  sessionId: string;
  message: string;
}

/**
 * Common interface for agent transports
 */
export interface AgentClient {
  /**
   * Open a conversation and return its id
   */
  createSession(name: string): Promise<string>;

  /**
   * Send one user message and return the raw turn output
   */
  createTurn(options: CreateTurnOptions): Promise<RawTurnPayload>;

  /**
   * Dispose of a conversation
   * Optional - not all agents keep server-side sessions
   */
  deleteSession?(sessionId: string): Promise<void>;
}
