import { encodeRecord } from "./codec.js";
import { StoreError } from "./errors.js";
import { silentLogger, type LimiterLogger } from "./logger.js";
import type { KvStore } from "./store.js";
import type { WindowRecord } from "./types.js";

export type TicketState = "issued" | "redeeming" | "redeemed" | "discarded";

export interface TicketInit {
  storageKey: string;
  timestampMs: number;
  history: WindowRecord;
  expirationTtl: number;
  logger?: LimiterLogger;
}

function insertSorted(record: WindowRecord, timestamp: number): number[] {
  const next = [...record];
  let index = next.length;
  while (index > 0 && (next[index - 1] ?? 0) > timestamp) {
    index -= 1;
  }
  next.splice(index, 0, timestamp);
  return next;
}

/**
 * A provisional "allow". Redeeming writes the action into the store; dropping
 * or discarding the ticket leaves the store as it was.
 */
export class Ticket {
  readonly storageKey: string;
  readonly timestampMs: number;
  private readonly history: WindowRecord;
  private readonly expirationTtl: number;
  private readonly logger: LimiterLogger;
  private current: TicketState = "issued";

  constructor(init: TicketInit) {
    this.storageKey = init.storageKey;
    this.timestampMs = init.timestampMs;
    this.history = init.history;
    this.expirationTtl = init.expirationTtl;
    this.logger = init.logger ?? silentLogger;
  }

  get state(): TicketState {
    return this.current;
  }

  /** The record a redemption writes: the pruned history plus this action. */
  nextRecord(): WindowRecord {
    return insertSorted(this.history, this.timestampMs);
  }

  /**
   * Overwrites the stored record unconditionally. Resolves `false` without
   * writing if the ticket was already redeemed or discarded. A failed write
   * leaves the ticket issued.
   */
  async redeem(store: KvStore): Promise<boolean> {
    if (this.current !== "issued") {
      return false;
    }
    const record = this.nextRecord();
    const value = encodeRecord(record);

    this.current = "redeeming";
    try {
      await store.put(this.storageKey, value, { expirationTtl: this.expirationTtl });
    } catch (error) {
      this.current = "issued";
      throw new StoreError("put", this.storageKey, error);
    }

    this.current = "redeemed";
    this.logger.debug({ key: this.storageKey, size: record.length }, "rate limit ticket redeemed");
    return true;
  }

  discard(): void {
    if (this.current === "issued") {
      this.current = "discarded";
    }
  }
}
