import { z } from "zod";

export const LimitRuleSchema = z.object({
  windowMs: z.number().int().positive().max(Number.MAX_SAFE_INTEGER),
  max: z.number().int().positive().max(Number.MAX_SAFE_INTEGER),
});

export const RuleSetConfigSchema = z.object({
  namespace: z.string().trim().min(1),
  rules: z.array(LimitRuleSchema),
});

/**
 * Stored form of a window record: the oldest timestamp in full, then the gap
 * to each following timestamp. An empty record is `{ v: 1, ts: [] }`.
 */
export const WindowRecordWireSchema = z.object({
  v: z.literal(1),
  ts: z.array(z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER)),
});

export const RuleUsageSchema = z.object({
  rule: LimitRuleSchema,
  count: z.number().int().nonnegative(),
  remaining: z.number().int().nonnegative(),
  resetAfterMs: z.number().nonnegative(),
});

export const RateLimitedResponseSchema = z.object({
  error: z.literal("rate_limited"),
  retryAfterMs: z.number().nonnegative(),
  limit: LimitRuleSchema,
  count: z.number().int().nonnegative(),
});

export const LimitInspectionSchema = z.object({
  key: z.string(),
  storageKey: z.string(),
  history: z.array(z.number().int()),
  usage: z.array(RuleUsageSchema),
  allowed: z.boolean(),
  retryAfterMs: z.number().nonnegative(),
});

export const EventSubmissionSchema = z.object({
  name: z.string().min(1).max(200),
  payload: z.record(z.string()).optional(),
});

export type LimitRule = z.infer<typeof LimitRuleSchema>;
export type RuleSetConfig = z.infer<typeof RuleSetConfigSchema>;
export type WindowRecordWire = z.infer<typeof WindowRecordWireSchema>;
export type RuleUsage = z.infer<typeof RuleUsageSchema>;
export type RateLimitedResponse = z.infer<typeof RateLimitedResponseSchema>;
export type LimitInspection = z.infer<typeof LimitInspectionSchema>;
export type EventSubmission = z.infer<typeof EventSubmissionSchema>;
