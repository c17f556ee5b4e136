import { WindowRecordWireSchema, type WindowRecordWire } from "@slidekv/contracts";
import { silentLogger, type LimiterLogger } from "./logger.js";
import type { WindowRecord } from "./types.js";

export type RawRecord = string | Uint8Array | ArrayBuffer | null | undefined;

const utf8 = new TextDecoder("utf-8", { fatal: true });

function rawToText(raw: string | Uint8Array | ArrayBuffer): string {
  if (typeof raw === "string") {
    return raw;
  }
  return utf8.decode(raw);
}

function parseWire(raw: string | Uint8Array | ArrayBuffer): WindowRecord | string {
  let json: unknown;
  try {
    json = JSON.parse(rawToText(raw));
  } catch (error) {
    return error instanceof Error ? error.message : "unreadable value";
  }

  const parsed = WindowRecordWireSchema.safeParse(json);
  if (!parsed.success) {
    return "value does not match the record schema";
  }

  const timestamps: number[] = [];
  let previous = 0;
  for (const [index, value] of parsed.data.ts.entries()) {
    const timestamp = index === 0 ? value : previous + value;
    if (!Number.isSafeInteger(timestamp)) {
      return "timestamp overflow";
    }
    timestamps.push(timestamp);
    previous = timestamp;
  }
  return timestamps;
}

/**
 * Reads a stored record. Absent values are empty records, and so are values
 * this codec did not write: a poisoned key must not lock its owner out.
 */
export function decodeRecord(raw: RawRecord, logger: LimiterLogger = silentLogger): WindowRecord {
  if (raw === null || raw === undefined) {
    return [];
  }
  const result = parseWire(raw);
  if (typeof result === "string") {
    logger.warn({ reason: result }, "discarding malformed window record");
    return [];
  }
  return result;
}

export function encodeRecord(record: WindowRecord): string {
  const sorted = [...record].sort((a, b) => a - b);
  const ts: number[] = [];
  let previous = 0;
  for (const [index, timestamp] of sorted.entries()) {
    if (!Number.isSafeInteger(timestamp) || timestamp < 0) {
      throw new RangeError(`Cannot encode timestamp ${timestamp}`);
    }
    ts.push(index === 0 ? timestamp : timestamp - previous);
    previous = timestamp;
  }
  const wire: WindowRecordWire = { v: 1, ts };
  return JSON.stringify(wire);
}
