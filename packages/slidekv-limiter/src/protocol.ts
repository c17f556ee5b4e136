import { decodeRecord } from "./codec.js";
import { StoreError } from "./errors.js";
import { evaluate, type Evaluation } from "./evaluator.js";
import { silentLogger, type LimiterLogger } from "./logger.js";
import type { RuleSet } from "./rule-set.js";
import type { KvStore } from "./store.js";
import { Ticket } from "./ticket.js";
import { toEpochMs, type Instant, type RuleUsage, type RuleViolation, type WindowRecord } from "./types.js";

export type Verdict =
  | { allowed: true; ticket: Ticket | null; usage: RuleUsage[] }
  | { allowed: false; violation: RuleViolation; usage: RuleUsage[] };

export interface Inspection {
  key: string;
  storageKey: string;
  history: WindowRecord;
  usage: RuleUsage[];
  allowed: boolean;
  retryAfterMs: number;
}

export interface ProtocolOptions {
  logger?: LimiterLogger;
}

async function loadEvaluation(
  store: KvStore,
  ruleSet: RuleSet,
  storageKey: string,
  now: Instant,
  logger: LimiterLogger,
): Promise<Evaluation> {
  ruleSet.seal();
  const nowMs = toEpochMs(now);
  let raw: string | null;
  try {
    raw = await store.get(storageKey);
  } catch (error) {
    throw new StoreError("get", storageKey, error);
  }
  return evaluate(ruleSet, decodeRecord(raw, logger), nowMs);
}

/**
 * Decides whether `key` may act at `now`. Read-only: an allowed action is
 * recorded only when the returned ticket is redeemed.
 *
 * Concurrent checks for one key see the same stored history and may all be
 * allowed; their redemptions overwrite each other (last write wins).
 */
export async function check(
  store: KvStore,
  ruleSet: RuleSet,
  key: string,
  now: Instant,
  options: ProtocolOptions = {},
): Promise<Verdict> {
  const logger = options.logger ?? silentLogger;
  const storageKey = ruleSet.storageKey(key);
  const evaluation = await loadEvaluation(store, ruleSet, storageKey, now, logger);
  const { decision } = evaluation;

  if (!decision.allowed) {
    logger.debug({
      key: storageKey,
      windowMs: decision.violation.rule.windowMs,
      count: decision.violation.count,
      retryAfterMs: decision.violation.retryAfterMs,
    }, "rate limit check denied");
    return { allowed: false, violation: decision.violation, usage: decision.usage };
  }

  const ticket = ruleSet.isEmpty
    ? null
    : new Ticket({
      storageKey,
      timestampMs: evaluation.candidateMs,
      history: evaluation.pruned,
      expirationTtl: ruleSet.expirationTtlSeconds,
      logger,
    });
  logger.debug({ key: storageKey, history: evaluation.pruned.length }, "rate limit check allowed");
  return { allowed: true, ticket, usage: decision.usage };
}

/** Read-only view of a key's pruned history and per-rule usage. */
export async function inspect(
  store: KvStore,
  ruleSet: RuleSet,
  key: string,
  now: Instant,
  options: ProtocolOptions = {},
): Promise<Inspection> {
  const storageKey = ruleSet.storageKey(key);
  const { decision, pruned } = await loadEvaluation(
    store,
    ruleSet,
    storageKey,
    now,
    options.logger ?? silentLogger,
  );
  return {
    key,
    storageKey,
    history: pruned,
    usage: decision.usage,
    allowed: decision.allowed,
    retryAfterMs: decision.allowed ? 0 : decision.violation.retryAfterMs,
  };
}

export class RateLimiter {
  private readonly logger: LimiterLogger;

  constructor(
    readonly ruleSet: RuleSet,
    readonly store: KvStore,
    options: ProtocolOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    ruleSet.seal();
  }

  check(key: string, now: Instant, logger: LimiterLogger = this.logger): Promise<Verdict> {
    return check(this.store, this.ruleSet, key, now, { logger });
  }

  inspect(key: string, now: Instant): Promise<Inspection> {
    return inspect(this.store, this.ruleSet, key, now, { logger: this.logger });
  }

  redeem(ticket: Ticket): Promise<boolean> {
    return ticket.redeem(this.store);
  }
}
