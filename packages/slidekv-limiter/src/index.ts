export { decodeRecord, encodeRecord, type RawRecord } from "./codec.js";
export { ConfigurationError, StoreError, type StoreOperation } from "./errors.js";
export { evaluate, pruneRecord, type Evaluation } from "./evaluator.js";
export { silentLogger, type LimiterLogger } from "./logger.js";
export { MemoryKvStore, type MemoryKvStoreOptions } from "./memory-store.js";
export {
  CloudflareKvStore,
  KvRequestError,
  MIN_EXPIRATION_TTL_SECONDS,
  type CloudflareKvStoreOptions,
} from "./cloudflare-store.js";
export {
  check,
  inspect,
  RateLimiter,
  type Inspection,
  type ProtocolOptions,
  type Verdict,
} from "./protocol.js";
export { RuleSet } from "./rule-set.js";
export type { KvPutOptions, KvStore } from "./store.js";
export { Ticket, type TicketInit, type TicketState } from "./ticket.js";
export {
  toEpochMs,
  type Decision,
  type Instant,
  type LimitRule,
  type RuleUsage,
  type RuleViolation,
  type WindowRecord,
} from "./types.js";
