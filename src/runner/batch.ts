import pLimit from "p-limit";
import type { ExpectedCase } from "../types/index.js";
import { SessionStore } from "../session/index.js";
import { runCase, type CaseResult, type CaseRunnerOptions } from "./case.js";

export interface BatchCase {
  expected: ExpectedCase;
  caseIndex: number;
  caseFile?: string;
}

export type BatchRunnerOptions = Omit<
  CaseRunnerOptions,
  "expected" | "caseIndex" | "caseFile" | "store"
> & {
  /** Overrides execution.concurrency from the config */
  concurrency?: number;
  onResult?: (result: CaseResult) => void;
};

/**
 * Run cases sequentially, or under a bounded permit pool when concurrency
 * is above 1. Results come back in case order either way.
 */
export async function runBatch(
  cases: readonly BatchCase[],
  options: BatchRunnerOptions
): Promise<CaseResult[]> {
  const { concurrency, onResult, ...caseOptions } = options;
  const limit = concurrency ?? options.config.execution.concurrency;
  // Cases pass their session ids explicitly, so one store serves the batch
  const store = new SessionStore();
  const knownTools =
    caseOptions.knownTools ?? [...new Set(cases.map((item) => item.expected.expectedTool))];

  const run = async (item: BatchCase): Promise<CaseResult> => {
    const result = await runCase({ ...caseOptions, ...item, store, knownTools });
    onResult?.(result);
    return result;
  };

  if (limit <= 1) {
    const results: CaseResult[] = [];
    for (const item of cases) {
      results.push(await run(item));
    }
    return results;
  }

  const gate = pLimit(limit);
  return Promise.all(cases.map((item) => gate(() => run(item))));
}
