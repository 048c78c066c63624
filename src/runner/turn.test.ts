import { describe, it, expect, vi } from "vitest";
import {
  NO_RESPONSE_CAPTURED,
  classifyLine,
  normalizeTurn,
  recordTurn,
  stitchTokens,
} from "./turn.js";
import { SessionStore } from "../session/index.js";
import { StructuredResponseSchema } from "../types/index.js";

describe("classifyLine", () => {
  it("recognises each line kind", () => {
    expect(classifyLine("tool_execution> Tool:calc Args:{}")).toBe("tool");
    expect(classifyLine("ToolCall(call_id='1', tool_name='calc', arguments='{}')")).toBe("tool");
    expect(classifyLine("inference> Hello")).toBe("inference");
    expect(classifyLine("step_complete> done")).toBe("section");
    expect(classifyLine("world")).toBe("text");
  });

  it("recognises old-format markers without the tool_execution prefix", () => {
    expect(classifyLine("Tool:calc_penalty Args:{'days_late': '15'}")).toBe("tool");
    expect(classifyLine(`Tool:calc_penalty Response:{"penalty": 150}`)).toBe("tool");
    expect(classifyLine("Tool: hammer")).toBe("text");
  });
});

describe("stitchTokens", () => {
  it("rebuilds amounts and sentences", () => {
    expect(stitchTokens(["The", "penalty", "is", "$", "150", ".", "00", "."])).toBe(
      "The penalty is $150.00."
    );
  });

  it("joins thousands separators and punctuation", () => {
    expect(stitchTokens(["1", ",", "000", "users", "!"])).toBe("1,000 users!");
    expect(stitchTokens(["5", "%"])).toBe("5%");
    expect(stitchTokens(["12", "34"])).toBe("1234");
  });

  it("keeps a space after a sentence end", () => {
    expect(stitchTokens(["Done", ".", "Next"])).toBe("Done. Next");
  });
});

describe("normalizeTurn", () => {
  it("collects inference text until a section marker", () => {
    const turn = normalizeTurn("q", {
      kind: "streaming",
      lines: ["inference> The penalty", "is", "$", "150", "step_complete> done", "ignored"],
    });
    expect(turn.transport).toBe("streaming");
    expect(turn.finalOutput).toBe("The penalty is $150");
    expect(turn.captured).toBe(true);
    expect(turn.rawFragments).toHaveLength(6);
  });

  it("skips tool lines inside an inference run", () => {
    const turn = normalizeTurn("q", {
      kind: "streaming",
      lines: [
        "inference> Checking",
        "tool_execution> Tool:calc Args:{'a': 1}",
        "now",
      ],
    });
    expect(turn.finalOutput).toBe("Checking now");
  });

  it("keeps bare tool markers out of the answer", () => {
    const turn = normalizeTurn("q", {
      kind: "streaming",
      lines: [
        "inference> Let me check.",
        "Tool:calc_penalty Args:{'days_late': '15'}",
        "inference> Penalty is $150.00.",
      ],
    });
    expect(turn.finalOutput).toBe("Let me check. Penalty is $150.00.");
  });

  it("does not fall back to a bare tool marker", () => {
    const turn = normalizeTurn("q", {
      kind: "streaming",
      lines: ["Tool:calc_penalty Args:{'days_late': '15'}"],
    });
    expect(turn.finalOutput).toBe(NO_RESPONSE_CAPTURED);
    expect(turn.captured).toBe(false);
  });

  it("falls back to the last plain line", () => {
    const turn = normalizeTurn("q", {
      kind: "streaming",
      lines: ["tool_execution> Tool:calc Args:{}", "Final answer: 42", ""],
    });
    expect(turn.finalOutput).toBe("Final answer: 42");
    expect(turn.captured).toBe(true);
  });

  it("substitutes the sentinel and warns when nothing was captured", () => {
    const onWarn = vi.fn();
    const turn = normalizeTurn(
      "q",
      { kind: "streaming", lines: ["tool_execution> Tool:calc Args:{}", "inference>"] },
      { onWarn }
    );
    expect(turn.finalOutput).toBe(NO_RESPONSE_CAPTURED);
    expect(turn.captured).toBe(false);
    expect(onWarn).toHaveBeenCalledTimes(1);
  });

  it("reads structured output content", () => {
    const response = StructuredResponseSchema.parse({
      input_messages: [{ role: "user", content: "q" }],
      output_message: {
        role: "assistant",
        content: [
          { type: "text", text: "Hello" },
          { type: "text", text: " world" },
        ],
      },
      steps: [{ step_type: "tool_execution", tool_calls: [{ tool_name: "calc", arguments: {} }] }],
    });
    const turn = normalizeTurn("q", { kind: "structured", response });

    expect(turn.transport).toBe("structured");
    expect(turn.finalOutput).toBe("Hello world");
    if (turn.transport === "structured") {
      expect(turn.structuredSteps).toHaveLength(1);
    }
  });

  it("uses the sentinel for an empty structured response", () => {
    const response = StructuredResponseSchema.parse({ steps: [] });
    const turn = normalizeTurn("q", { kind: "structured", response });
    expect(turn.finalOutput).toBe(NO_RESPONSE_CAPTURED);
    expect(turn.captured).toBe(false);
  });
});

describe("recordTurn", () => {
  it("creates a session when none is current", () => {
    const store = new SessionStore();
    const turn = normalizeTurn("q", { kind: "streaming", lines: ["inference> hi"] });

    const session = recordTurn(store, turn);
    expect(store.size).toBe(1);
    expect(session.turns).toHaveLength(1);
  });

  it("appends to the session given", () => {
    const store = new SessionStore();
    const target = store.create({ id: "target" });
    store.create({ id: "newer" });
    const turn = normalizeTurn("q", { kind: "streaming", lines: ["inference> hi"] });

    recordTurn(store, turn, target.id);
    expect(store.get("target")?.turns).toHaveLength(1);
    expect(store.get("newer")?.turns).toHaveLength(0);
  });
});
