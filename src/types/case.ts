import { z } from "zod";

/**
 * tool_parameters cell: a JSON object, or empty for "no parameters"
 */
const ToolParametersSchema = z
  .string()
  .optional()
  .transform((raw, ctx): Record<string, unknown> => {
    const text = raw?.trim() ?? "";
    if (text === "") return {};
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `not valid JSON (${err instanceof Error ? err.message : String(err)})`,
      });
      return z.NEVER;
    }
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "must be a JSON object",
      });
      return z.NEVER;
    }
    return { ...parsed };
  });

// One CSV row, columns named as in the case file header
export const CaseRowSchema = z.object({
  question: z.string().min(1),
  expected_answer: z.string(),
  tool_name: z.string().min(1),
  tool_parameters: ToolParametersSchema,
  evaluation_criteria: z.string().default(""),
  category: z.string().default("uncategorized"),
});

export type CaseRow = z.infer<typeof CaseRowSchema>;

export interface ExpectedCase {
  readonly question: string;
  readonly expectedAnswer: string;
  readonly expectedTool: string;
  readonly expectedArguments: Readonly<Record<string, unknown>>;
  readonly evaluationCriteria: string;
  readonly category: string;
}

export function toExpectedCase(row: CaseRow): ExpectedCase {
  return {
    question: row.question,
    expectedAnswer: row.expected_answer,
    expectedTool: row.tool_name.trim(),
    expectedArguments: row.tool_parameters,
    evaluationCriteria: row.evaluation_criteria,
    category: row.category,
  };
}
