import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { runCase } from "./case.js";
import { runBatch } from "./batch.js";
import { summarizeResults } from "./summary.js";
import type { AgentClient, CreateTurnOptions } from "../client/types.js";
import {
  ProjectConfigSchema,
  type ExpectedCase,
  type RawTurnPayload,
} from "../types/index.js";

const config = ProjectConfigSchema.parse({});

const penaltyCase: ExpectedCase = {
  question: "What is the penalty for paying 15 days late?",
  expectedAnswer: "The penalty is $150.00. Status: PASSED",
  expectedTool: "calc_penalty",
  expectedArguments: { days_late: 15 },
  evaluationCriteria: "",
  category: "penalties",
};

const penaltyLines = [
  "tool_execution> Tool:calc_penalty Args:{'days_late': '15'}",
  "inference> Penalty is $150.00. Status: PASSED.",
];

const penaltyPayload: RawTurnPayload = { kind: "streaming", lines: penaltyLines };

class FakeClient implements AgentClient {
  sessions: string[] = [];
  deleted: string[] = [];

  constructor(
    private payloads: Record<string, RawTurnPayload | Error>,
    private deleteError?: Error
  ) {}

  async createSession(_name: string): Promise<string> {
    const id = `thread-${this.sessions.length + 1}`;
    this.sessions.push(id);
    return id;
  }

  async createTurn(options: CreateTurnOptions): Promise<RawTurnPayload> {
    const payload = this.payloads[options.message];
    if (payload === undefined) throw new Error(`Unexpected message: ${options.message}`);
    if (payload instanceof Error) throw payload;
    return payload;
  }

  async deleteSession(sessionId: string): Promise<void> {
    if (this.deleteError) throw this.deleteError;
    this.deleted.push(sessionId);
  }
}

describe("runCase", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tooleval-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("scores a live turn and cleans up the session", async () => {
    const client = new FakeClient({ [penaltyCase.question]: penaltyPayload });

    const result = await runCase({ config, expected: penaltyCase, caseIndex: 1, client });

    expect(result.error).toBeUndefined();
    expect(result.success).toBe(true);
    expect(result.toolName).toBe("calc_penalty");
    expect(result.toolArguments).toEqual({ days_late: 15 });
    expect(result.compositeScore).toBeCloseTo(1);
    expect(result.metrics.map((m) => m.name)).toEqual([
      "Tool Selection",
      "Parameter Accuracy",
      "Response Accuracy",
      "Comprehensive Evaluation",
    ]);
    expect(client.deleted).toEqual(["thread-1"]);
  });

  it("turns a failed request into an error result", async () => {
    const client = new FakeClient({ [penaltyCase.question]: new Error("connection refused") });

    const result = await runCase({ config, expected: penaltyCase, caseIndex: 2, client });

    expect(result.error).toBe("connection refused");
    expect(result.reason).toBe("Error: connection refused");
    expect(result.success).toBe(false);
    expect(result.compositeScore).toBe(0);
    expect(result.caseIndex).toBe(2);
    expect(client.deleted).toEqual(["thread-1"]);
  });

  it("warns when cleanup fails without failing the case", async () => {
    const client = new FakeClient({ [penaltyCase.question]: penaltyPayload }, new Error("gone"));
    const onWarn = vi.fn();

    const result = await runCase({ config, expected: penaltyCase, caseIndex: 1, client, onWarn });

    expect(result.success).toBe(true);
    expect(onWarn).toHaveBeenCalledWith("Failed to clean up session thread-1: gone");
  });

  it("fails without a client outside replay", async () => {
    const result = await runCase({ config, expected: penaltyCase, caseIndex: 1 });
    expect(result.error).toBe("No agent client available");
  });

  it("records the raw payload", async () => {
    const client = new FakeClient({ [penaltyCase.question]: penaltyPayload });

    await runCase({
      config,
      expected: penaltyCase,
      caseIndex: 3,
      caseFile: "cases/penalty.cases.csv",
      client,
      recordDir: dir,
    });

    const saved = await readFile(join(dir, "cases/penalty.cases.csv", "case-3.json"), "utf-8");
    expect(JSON.parse(saved)).toEqual(penaltyPayload);
  });

  it("replays a recorded log without a client", async () => {
    const caseDir = join(dir, "cases/penalty.cases.csv");
    await mkdir(caseDir, { recursive: true });
    await writeFile(join(caseDir, "case-1.log"), penaltyLines.join("\n") + "\n");

    const result = await runCase({
      config,
      expected: penaltyCase,
      caseIndex: 1,
      caseFile: "cases/penalty.cases.csv",
      replayDir: dir,
    });

    expect(result.error).toBeUndefined();
    expect(result.success).toBe(true);
    expect(result.actualOutput).toBe("Penalty is $150.00. Status: PASSED.");
  });

  it("reports a missing recording as an error", async () => {
    const result = await runCase({
      config,
      expected: penaltyCase,
      caseIndex: 9,
      caseFile: "none.cases.csv",
      replayDir: dir,
    });
    expect(result.error).toBe(`Recording not found: ${join(dir, "none.cases.csv", "case-9.json")}`);
  });
});

describe("runBatch", () => {
  const taxCase: ExpectedCase = { ...penaltyCase, question: "Tax?", expectedTool: "calc_tax", category: "tax" };

  it.each([1, 3])("returns results in case order with concurrency %i", async (concurrency) => {
    const client = new FakeClient({
      [penaltyCase.question]: penaltyPayload,
      [taxCase.question]: new Error("timeout"),
    });
    const onResult = vi.fn();

    const results = await runBatch(
      [
        { expected: penaltyCase, caseIndex: 1 },
        { expected: taxCase, caseIndex: 2 },
        { expected: penaltyCase, caseIndex: 3 },
      ],
      { config, client, concurrency, onResult }
    );

    expect(results.map((r) => r.caseIndex)).toEqual([1, 2, 3]);
    expect(results.map((r) => r.success)).toEqual([true, false, true]);
    expect(onResult).toHaveBeenCalledTimes(3);
  });

  it("falls back to the tools of the batch's cases for text mentions", async () => {
    const client = new FakeClient({
      [penaltyCase.question]: penaltyPayload,
      [taxCase.question]: { kind: "streaming", lines: ["inference> I used calc_tax for this."] },
    });

    const results = await runBatch(
      [
        { expected: penaltyCase, caseIndex: 1 },
        { expected: taxCase, caseIndex: 2 },
      ],
      { config, client }
    );

    expect(results[1].toolName).toBe("calc_tax");
    expect(results[1].toolScore).toBe(1);
  });

  it("feeds the summary", async () => {
    const client = new FakeClient({
      [penaltyCase.question]: penaltyPayload,
      [taxCase.question]: new Error("timeout"),
    });

    const results = await runBatch(
      [
        { expected: penaltyCase, caseIndex: 1 },
        { expected: taxCase, caseIndex: 2 },
      ],
      { config, client }
    );
    const summary = summarizeResults(results);

    expect(summary).toMatchObject({ total: 2, evaluated: 1, errors: 1, passed: 1, failed: 1 });
    expect(summary.metrics).toHaveLength(4);
    expect(summary.metrics[0].name).toBe("Tool Selection");
    expect(summary.metrics[0].average).toBe(1);
    expect(summary.metrics[0].successRate).toBe(1);
    expect(summary.categories).toEqual([
      { category: "penalties", total: 1, passed: 1, averageComposite: results[0].compositeScore },
      { category: "tax", total: 1, passed: 0, averageComposite: 0 },
    ]);
  });
});
