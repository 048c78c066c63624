import { z } from "zod";

// AG-UI target (flat - all fields at same level as type)
const AGUITargetSchema = z.object({
  type: z.literal("agui"),
  endpoint: z.string().url(),
  agentId: z.string().min(1),
  headers: z.record(z.string()).optional(),
  forwardedProps: z.record(z.unknown()).optional(),
  state: z.record(z.unknown()).optional(),
  maxRetries: z.number().int().min(1).optional(),
});

// Discriminated union on "type" field
const TargetSchema = z.discriminatedUnion("type", [AGUITargetSchema]);

// Composite weights are deliberately not normalized
const WeightsSchema = z
  .object({
    tool: z.number().min(0).default(0.3),
    params: z.number().min(0).default(0.3),
    response: z.number().min(0).default(0.4),
  })
  .strict();

const ThresholdsSchema = z
  .object({
    tool: z.number().min(0).max(1).default(1.0),
    params: z.number().min(0).max(1).default(0.8),
    response: z.number().min(0).max(1).default(0.7),
    composite: z.number().min(0).max(1).default(0.7),
  })
  .strict();

const ScoringSchema = z
  .object({
    weights: WeightsSchema.default({}),
    thresholds: ThresholdsSchema.default({}),
    // Extra status canonicalization, e.g. { CLEARED: PASSED }
    statusMapping: z.record(z.string()).default({}),
  })
  .strict();

const ExecutionSchema = z
  .object({
    concurrency: z.number().int().min(1).default(1),
    sessionCleanup: z.boolean().default(true),
  })
  .strict();

export const ProjectConfigSchema = z.object({
  version: z.string().default("1.0"),
  // Optional so recorded runs can be replayed without an agent
  target: TargetSchema.optional(),
  tools: z.array(z.string().min(1)).default([]),
  scoring: ScoringSchema.default({}),
  execution: ExecutionSchema.default({}),
});

// Type exports
export type AGUITarget = z.infer<typeof AGUITargetSchema>;
export type Target = z.infer<typeof TargetSchema>;
export type ScoringWeights = z.infer<typeof WeightsSchema>;
export type ScoringThresholds = z.infer<typeof ThresholdsSchema>;
export type ScoringConfig = z.infer<typeof ScoringSchema>;
export type ExecutionConfig = z.infer<typeof ExecutionSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
