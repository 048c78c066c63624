import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { glob } from 'glob';
import { parse } from 'csv-parse/sync';
import { CaseRowSchema, toExpectedCase, type ExpectedCase } from '../types/index.js';

export interface LoadCasesResult {
  cases: ExpectedCase[];
  filePath: string;
}

// Blank cells in these columns fall back to the schema defaults
const OPTIONAL_COLUMNS = ['tool_parameters', 'evaluation_criteria', 'category'];

function withoutBlankOptionals(record: Record<string, unknown>): Record<string, unknown> {
  const row: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (OPTIONAL_COLUMNS.includes(key) && value === '') continue;
    row[key] = value;
  }
  return row;
}

/**
 * Parse and validate CSV case rows. `source` names the file in errors.
 */
export function parseCases(content: string, source = '<input>'): ExpectedCase[] {
  let records: unknown;
  try {
    records = parse(content, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
    });
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid case file ${source}: ${msg}`);
  }

  if (!Array.isArray(records)) {
    throw new Error(`Invalid case file ${source}: expected rows`);
  }

  return records.map((record: unknown, index) => {
    // Header is line 1
    const rowNumber = index + 2;
    const raw = typeof record === 'object' && record !== null ? { ...record } : {};
    const result = CaseRowSchema.safeParse(withoutBlankOptionals(raw));
    if (!result.success) {
      const errors = result.error.errors
        .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
        .join('\n');
      throw new Error(`Invalid case file ${source}, row ${rowNumber}:\n${errors}`);
    }
    return toExpectedCase(result.data);
  });
}

/**
 * Load and validate a single case file
 */
export function loadCaseFile(filePath: string): LoadCasesResult {
  if (!existsSync(filePath)) {
    throw new Error(`Case file not found: ${filePath}`);
  }

  const content = readFileSync(filePath, 'utf-8');
  return {
    cases: parseCases(content, filePath),
    filePath,
  };
}

/**
 * Find case files matching glob patterns
 */
export async function findCaseFiles(
  patterns: string[],
  cwd: string
): Promise<string[]> {
  const files: string[] = [];

  for (const pattern of patterns) {
    const matches = await glob(pattern, {
      cwd,
      nodir: true,
      ignore: ['**/node_modules/**'],
    });
    for (const match of matches) {
      files.push(resolve(cwd, match));
    }
  }

  return [...new Set(files)].sort();
}

/**
 * Keep only cases of one category, or all when no category is given
 */
export function filterByCategory(
  cases: readonly ExpectedCase[],
  category?: string
): ExpectedCase[] {
  if (!category) return [...cases];
  const wanted = category.toLowerCase();
  return cases.filter((c) => c.category.toLowerCase() === wanted);
}

/**
 * Default case file patterns
 */
export const DEFAULT_CASE_PATTERNS = ['**/*.cases.csv'];
