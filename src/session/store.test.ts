import { describe, it, expect } from "vitest";
import { SessionStore } from "./store.js";
import type { TurnRecord } from "../types/index.js";

const turn = (finalOutput: string): TurnRecord => ({
  transport: "streaming",
  input: "question",
  finalOutput,
  captured: true,
  rawFragments: [],
});

describe("SessionStore", () => {
  it("makes the newest session current", () => {
    const store = new SessionStore();
    const first = store.create();
    const second = store.create({ name: "custom" });

    expect(first.name).toBe("eval_session_0");
    expect(second.name).toBe("custom");
    expect(second.sequence).toBe(1);
    expect(store.current()?.id).toBe(second.id);
    expect(store.size).toBe(2);
  });

  it("rejects duplicate ids", () => {
    const store = new SessionStore();
    store.create({ id: "thread-1" });
    expect(() => store.create({ id: "thread-1" })).toThrow("Session already exists: thread-1");
  });

  it("appends turns without mutating earlier records", () => {
    const store = new SessionStore();
    const before = store.create({ id: "s" });
    const after = store.appendTurn("s", turn("one"));

    expect(before.turns).toHaveLength(0);
    expect(after.turns).toHaveLength(1);
    expect(store.get("s")?.turns[0].finalOutput).toBe("one");
  });

  it("throws when appending to an unknown session", () => {
    const store = new SessionStore();
    expect(() => store.appendTurn("missing", turn("x"))).toThrow("Unknown session: missing");
  });

  it("leaves no current session after removing it", () => {
    const store = new SessionStore();
    const first = store.create();
    const second = store.create();

    expect(store.remove(second.id)).toBe(true);
    expect(store.current()).toBeUndefined();
    expect(store.get(first.id)).toBeDefined();
    expect(store.remove(second.id)).toBe(false);
  });

  it("clears everything", () => {
    const store = new SessionStore();
    store.create();
    store.clear();
    expect(store.size).toBe(0);
    expect(store.current()).toBeUndefined();
  });
});
