import type { RuleSet } from "./rule-set.js";
import {
  toEpochMs,
  type Decision,
  type Instant,
  type LimitRule,
  type RuleUsage,
  type RuleViolation,
  type WindowRecord,
} from "./types.js";

export interface Evaluation {
  decision: Decision;
  /** History after pruning; what a redemption writes back, plus the candidate. */
  pruned: WindowRecord;
  candidateMs: number;
  horizonMs: number;
}

/**
 * Drops timestamps older than the horizon. Timestamps ahead of `nowMs` are
 * kept: after a clock step backwards the store stays the source of truth.
 */
export function pruneRecord(record: WindowRecord, nowMs: number, horizonMs: number): WindowRecord {
  return record.filter((timestamp) => nowMs - timestamp <= horizonMs);
}

function measureRule(rule: LimitRule, history: WindowRecord, nowMs: number): RuleUsage {
  let count = 0;
  let oldest = Number.POSITIVE_INFINITY;
  for (const timestamp of history) {
    if (nowMs - timestamp <= rule.windowMs) {
      count += 1;
      oldest = Math.min(oldest, timestamp);
    }
  }
  return {
    rule,
    count,
    remaining: Math.max(0, rule.max - count),
    resetAfterMs: count === 0 ? 0 : rule.windowMs - (nowMs - oldest),
  };
}

/**
 * Tests every rule against the pruned history at `now`.
 *
 * A timestamp exactly `windowMs` old still counts. When several rules are
 * exceeded, the one that frees up soonest is reported.
 *
 * Nothing here is atomic with the store: two evaluations over the same
 * stored history may both allow, and whichever ticket is redeemed last
 * overwrites the other's timestamp. Limits can be exceeded transiently.
 */
export function evaluate(ruleSet: RuleSet, record: WindowRecord, now: Instant): Evaluation {
  const nowMs = toEpochMs(now);
  if (ruleSet.isEmpty) {
    return {
      decision: { allowed: true, usage: [] },
      pruned: record,
      candidateMs: nowMs,
      horizonMs: 0,
    };
  }

  const horizonMs = ruleSet.horizonMs;
  const pruned = pruneRecord(record, nowMs, horizonMs);
  const usage = ruleSet.rules.map((rule) => measureRule(rule, pruned, nowMs));

  let violation: RuleViolation | undefined;
  for (const [ruleIndex, entry] of usage.entries()) {
    if (entry.count < entry.rule.max) {
      continue;
    }
    if (!violation || entry.resetAfterMs < violation.retryAfterMs) {
      violation = {
        rule: entry.rule,
        ruleIndex,
        count: entry.count,
        retryAfterMs: entry.resetAfterMs,
      };
    }
  }

  const decision: Decision = violation
    ? { allowed: false, violation, usage }
    : { allowed: true, usage };
  return { decision, pruned, candidateMs: nowMs, horizonMs };
}
