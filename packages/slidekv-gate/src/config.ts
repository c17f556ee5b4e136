import { LimitRuleSchema, type LimitRule } from "@slidekv/contracts";

export type StoreFailureMode = "closed" | "open";

export interface CloudflareStoreConfig {
  accountId: string;
  namespaceId: string;
  apiToken: string;
}

export interface AppConfig {
  port: number;
  host: string;
  controlAuthToken: string;
  namespace: string;
  rules: LimitRule[];
  storeFailureMode: StoreFailureMode;
  cloudflare?: CloudflareStoreConfig;
  logLevel: string;
  prettyLogs: boolean;
}

const DURATION_UNITS_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

function required(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required env var ${name}`);
  }
  return value;
}

function numberEnv(name: string, fallback: number): number {
  const value = process.env[name];
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: ${value}`);
  }
  return parsed;
}

/** Parses `5s:2,60s:10,1h:50` into rules. */
export function parseRules(value: string): LimitRule[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map((entry) => {
      const match = /^(\d+)(ms|s|m|h):(\d+)$/.exec(entry);
      const amount = match?.[1];
      const unit = match?.[2];
      const max = match?.[3];
      if (!amount || !unit || !max) {
        throw new Error(`Invalid rate limit rule "${entry}", expected <duration>:<max> such as 5s:2`);
      }
      const parsed = LimitRuleSchema.safeParse({
        windowMs: Number(amount) * (DURATION_UNITS_MS[unit] ?? 0),
        max: Number(max),
      });
      if (!parsed.success) {
        throw new Error(`Invalid rate limit rule "${entry}": window and max must be positive`);
      }
      return parsed.data;
    });
}

function storeFailureModeEnv(): StoreFailureMode {
  const value = process.env.STORE_FAILURE_MODE ?? "closed";
  if (value !== "closed" && value !== "open") {
    throw new Error(`Invalid STORE_FAILURE_MODE: ${value}`);
  }
  return value;
}

function cloudflareEnv(): CloudflareStoreConfig | undefined {
  const accountId = process.env.CF_ACCOUNT_ID;
  const namespaceId = process.env.CF_KV_NAMESPACE_ID;
  const apiToken = process.env.CF_API_TOKEN;
  if (!accountId && !namespaceId && !apiToken) {
    return undefined;
  }
  if (!accountId || !namespaceId || !apiToken) {
    throw new Error("CF_ACCOUNT_ID, CF_KV_NAMESPACE_ID and CF_API_TOKEN must be set together");
  }
  return { accountId, namespaceId, apiToken };
}

export function loadConfig(): AppConfig {
  return {
    port: numberEnv("PORT", 8080),
    host: process.env.HOST ?? "0.0.0.0",
    controlAuthToken: required("CONTROL_AUTH_TOKEN"),
    namespace: process.env.RATE_LIMIT_NAMESPACE ?? "ratelimit",
    rules: parseRules(process.env.RATE_LIMIT_RULES ?? "5s:2,60s:10,1h:50"),
    storeFailureMode: storeFailureModeEnv(),
    cloudflare: cloudflareEnv(),
    logLevel: process.env.LOG_LEVEL ?? "info",
    prettyLogs: process.env.NODE_ENV !== "production",
  };
}
