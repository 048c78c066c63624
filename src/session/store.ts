import { randomUUID } from "node:crypto";
import type { SessionRecord, TurnRecord } from "../types/index.js";

export interface CreateSessionOptions {
  id?: string;
  name?: string;
}

/**
 * Ordered set of evaluation sessions with an explicit "current" pointer.
 *
 * The current session is always the most recently created one. Removing it
 * leaves no current session rather than falling back to an older one, so a
 * finished test case can never leak into the next.
 */
export class SessionStore {
  private sessions: SessionRecord[] = [];
  private currentId: string | null = null;
  private nextSequence = 0;

  create(options: CreateSessionOptions = {}): SessionRecord {
    const id = options.id ?? randomUUID();
    if (this.sessions.some((s) => s.id === id)) {
      throw new Error(`Session already exists: ${id}`);
    }
    const sequence = this.nextSequence++;
    const session: SessionRecord = {
      id,
      name: options.name ?? `eval_session_${sequence}`,
      sequence,
      turns: [],
    };
    this.sessions.push(session);
    this.currentId = id;
    return session;
  }

  get(id: string): SessionRecord | undefined {
    return this.sessions.find((s) => s.id === id);
  }

  current(): SessionRecord | undefined {
    return this.currentId === null ? undefined : this.get(this.currentId);
  }

  get size(): number {
    return this.sessions.length;
  }

  /**
   * Append a turn. Records are replaced, never mutated: references
   * taken before the append keep seeing the old turn list.
   */
  appendTurn(sessionId: string, turn: TurnRecord): SessionRecord {
    const index = this.sessions.findIndex((s) => s.id === sessionId);
    if (index === -1) {
      throw new Error(`Unknown session: ${sessionId}`);
    }
    const updated: SessionRecord = {
      ...this.sessions[index],
      turns: [...this.sessions[index].turns, turn],
    };
    this.sessions[index] = updated;
    return updated;
  }

  remove(sessionId: string): boolean {
    const before = this.sessions.length;
    this.sessions = this.sessions.filter((s) => s.id !== sessionId);
    if (this.currentId === sessionId) {
      this.currentId = null;
    }
    return this.sessions.length < before;
  }

  clear(): void {
    this.sessions = [];
    this.currentId = null;
  }
}
