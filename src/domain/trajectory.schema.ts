// =============================================================================
// Trajectory Schema — Validation for stored trajectory records
// =============================================================================

import { z } from "zod";

const SessionIdSchema = z.union([z.string(), z.number()]);

export const ModelUsageRecordSchema = z.object({
  id: z.string(),
  createdAt: z.number(),
  recordType: z.literal("model_usage"),
  sessionId: SessionIdSchema,
  currentCost: z.number(),
  inputTokens: z.number().int(),
  outputTokens: z.number().int(),
  stepData: z.object({
    duration: z.number(),
    model: z.string(),
  }),
});

export const LimitReachedRecordSchema = z.object({
  id: z.string(),
  createdAt: z.number(),
  recordType: z.literal("limit_reached"),
  sessionId: SessionIdSchema,
  stepData: z.object({
    limitType: z.enum(["cost", "tokens"]),
    currentValue: z.number(),
    limitValue: z.number(),
    exitAtLimit: z.boolean(),
  }),
});

export const TrajectoryRecordSchema = z.discriminatedUnion("recordType", [
  ModelUsageRecordSchema,
  LimitReachedRecordSchema,
]);
