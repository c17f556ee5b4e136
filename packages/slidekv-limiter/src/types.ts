import type { LimitRule, RuleUsage } from "@slidekv/contracts";

export type { LimitRule, RuleUsage };

/** Epoch milliseconds or a Date. */
export type Instant = number | Date;

/** Ascending epoch-ms timestamps of recorded actions. Duplicates are allowed. */
export type WindowRecord = readonly number[];

export interface RuleViolation {
  rule: LimitRule;
  ruleIndex: number;
  count: number;
  retryAfterMs: number;
}

export type Decision =
  | { allowed: true; usage: RuleUsage[] }
  | { allowed: false; violation: RuleViolation; usage: RuleUsage[] };

export function toEpochMs(instant: Instant): number {
  const ms = instant instanceof Date ? instant.getTime() : instant;
  if (!Number.isFinite(ms) || ms < 0) {
    throw new RangeError(`Invalid instant: ${String(instant)}`);
  }
  return Math.floor(ms);
}
