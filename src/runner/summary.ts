import type { MetricName } from "../scoring/index.js";
import type { CaseResult } from "./case.js";

export interface MetricSummary {
  name: MetricName;
  average: number;
  /** Share of evaluated cases at or above the metric's own threshold */
  successRate: number;
}

export interface CategorySummary {
  category: string;
  total: number;
  passed: number;
  averageComposite: number;
}

export interface RunSummary {
  total: number;
  /** Cases that produced scores, i.e. without an error */
  evaluated: number;
  errors: number;
  passed: number;
  failed: number;
  metrics: MetricSummary[];
  categories: CategorySummary[];
}

const mean = (values: readonly number[]) =>
  values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;

/**
 * Aggregate case results into run totals
 */
export function summarizeResults(results: readonly CaseResult[]): RunSummary {
  const evaluated = results.filter((r) => r.error === undefined);
  const passed = results.filter((r) => r.success).length;

  const byName = new Map<MetricName, { scores: number[]; successes: number }>();
  for (const result of evaluated) {
    for (const metric of result.metrics) {
      const entry = byName.get(metric.name) ?? { scores: [], successes: 0 };
      entry.scores.push(metric.score);
      if (metric.success) entry.successes++;
      byName.set(metric.name, entry);
    }
  }

  const metrics = [...byName].map(([name, entry]) => ({
    name,
    average: mean(entry.scores),
    successRate: entry.successes / entry.scores.length,
  }));

  const byCategory = new Map<string, CaseResult[]>();
  for (const result of results) {
    byCategory.set(result.category, [...(byCategory.get(result.category) ?? []), result]);
  }

  const categories = [...byCategory]
    .map(([category, items]) => ({
      category,
      total: items.length,
      passed: items.filter((r) => r.success).length,
      averageComposite: mean(
        items.filter((r) => r.error === undefined).map((r) => r.compositeScore)
      ),
    }))
    .sort((a, b) => a.category.localeCompare(b.category));

  return {
    total: results.length,
    evaluated: evaluated.length,
    errors: results.length - evaluated.length,
    passed,
    failed: results.length - passed,
    metrics,
    categories,
  };
}
