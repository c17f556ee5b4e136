import { afterEach, describe, expect, it } from "vitest";
import { MemoryKvStore, type KvPutOptions, type KvStore } from "@slidekv/limiter";
import type { AppConfig } from "../src/config.js";
import { buildServer, storeKindOf } from "../src/server.js";

class FailingStore implements KvStore {
  constructor(
    private readonly inner: KvStore,
    private readonly failing: { gets: boolean; puts: boolean },
  ) {}

  async get(key: string): Promise<string | null> {
    if (this.failing.gets) {
      throw new Error("kv unavailable");
    }
    return this.inner.get(key);
  }

  async put(key: string, value: string, options?: KvPutOptions): Promise<void> {
    if (this.failing.puts) {
      throw new Error("kv write rejected");
    }
    await this.inner.put(key, value, options);
  }
}

function makeConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 8080,
    host: "127.0.0.1",
    controlAuthToken: "secret-token",
    namespace: "ratelimit",
    rules: [{ windowMs: 5000, max: 2 }],
    storeFailureMode: "closed",
    logLevel: "silent",
    prettyLogs: false,
    ...overrides,
  };
}

const apps: Array<{ close: () => Promise<void> }> = [];

afterEach(async () => {
  while (apps.length > 0) {
    const app = apps.pop();
    if (app) {
      await app.close();
    }
  }
});

describe("rate limit gate server", () => {
  it("returns health and ready", async () => {
    const app = await buildServer(makeConfig(), { store: new MemoryKvStore(), now: () => 42 });
    apps.push(app);

    const health = await app.inject({ method: "GET", url: "/health" });
    expect(health.statusCode).toBe(200);
    expect(health.json()).toEqual({ ok: true, ts: 42 });
    expect(health.headers["x-request-id"]).toBeDefined();

    const ready = await app.inject({ method: "GET", url: "/ready" });
    expect(ready.statusCode).toBe(200);
    expect(ready.json()).toEqual({
      ok: true,
      namespace: "ratelimit",
      rules: [{ windowMs: 5000, max: 2 }],
      store: "custom",
    });
  });

  it("names the store it was built with", async () => {
    const cloudflare = { accountId: "acct", namespaceId: "ns", apiToken: "test-secret" };

    expect(storeKindOf(makeConfig())).toBe("memory");
    expect(storeKindOf(makeConfig({ cloudflare }))).toBe("cloudflare");
    expect(storeKindOf(makeConfig({ cloudflare }), { store: new MemoryKvStore() })).toBe("custom");

    const app = await buildServer(makeConfig({ cloudflare }), { now: () => 0 });
    apps.push(app);
    const ready = await app.inject({ method: "GET", url: "/ready" });
    expect(ready.json()).toMatchObject({ store: "cloudflare" });
  });

  it("admits events until the window is full", async () => {
    let clock = 0;
    const store = new MemoryKvStore({ now: () => clock });
    const app = await buildServer(makeConfig(), { store, now: () => clock });
    apps.push(app);

    const first = await app.inject({ method: "POST", url: "/events", payload: { name: "signup" } });
    expect(first.statusCode).toBe(202);
    expect(first.json()).toEqual({ accepted: true, name: "signup" });
    expect(first.headers["x-ratelimit-remaining"]).toBe("1");

    clock = 1000;
    const second = await app.inject({ method: "POST", url: "/events", payload: { name: "signup" } });
    expect(second.statusCode).toBe(202);
    expect(second.headers["x-ratelimit-remaining"]).toBe("0");
    expect(await store.get("ratelimit/127.0.0.1")).toBe('{"v":1,"ts":[0,1000]}');

    clock = 2000;
    const third = await app.inject({ method: "POST", url: "/events", payload: { name: "signup" } });
    expect(third.statusCode).toBe(429);
    expect(third.headers["retry-after"]).toBe("4");
    expect(third.json()).toEqual({
      error: "rate_limited",
      retryAfterMs: 3000,
      limit: { windowMs: 5000, max: 2 },
      count: 2,
    });
    expect(await store.get("ratelimit/127.0.0.1")).toBe('{"v":1,"ts":[0,1000]}');

    clock = 5001;
    const later = await app.inject({ method: "POST", url: "/events", payload: { name: "signup" } });
    expect(later.statusCode).toBe(202);
    expect(await store.get("ratelimit/127.0.0.1")).toBe('{"v":1,"ts":[1000,4001]}');
  });

  it("asks for at least one second at the window boundary", async () => {
    let clock = 0;
    const store = new MemoryKvStore({ now: () => clock });
    const app = await buildServer(makeConfig(), { store, now: () => clock });
    apps.push(app);

    for (let i = 0; i < 2; i += 1) {
      const res = await app.inject({ method: "POST", url: "/events", payload: { name: "signup" } });
      expect(res.statusCode).toBe(202);
    }

    clock = 5000;
    const edge = await app.inject({ method: "POST", url: "/events", payload: { name: "signup" } });
    expect(edge.statusCode).toBe(429);
    expect(edge.headers["retry-after"]).toBe("1");
    expect(edge.json()).toEqual({
      error: "rate_limited",
      retryAfterMs: 0,
      limit: { windowMs: 5000, max: 2 },
      count: 2,
    });

    clock = 5001;
    const after = await app.inject({ method: "POST", url: "/events", payload: { name: "signup" } });
    expect(after.statusCode).toBe(202);
    expect(await store.get("ratelimit/127.0.0.1")).toBe('{"v":1,"ts":[5001]}');
  });

  it("does not count rejected submissions", async () => {
    const store = new MemoryKvStore({ now: () => 0 });
    const app = await buildServer(makeConfig(), { store, now: () => 0 });
    apps.push(app);

    for (let i = 0; i < 3; i += 1) {
      const invalid = await app.inject({ method: "POST", url: "/events", payload: {} });
      expect(invalid.statusCode).toBe(400);
    }
    expect(await store.get("ratelimit/127.0.0.1")).toBeNull();

    const valid = await app.inject({ method: "POST", url: "/events", payload: { name: "signup" } });
    expect(valid.statusCode).toBe(202);
  });

  it("fails closed when the store is unreachable", async () => {
    const store = new FailingStore(new MemoryKvStore(), { gets: true, puts: false });
    const app = await buildServer(makeConfig(), { store, now: () => 0 });
    apps.push(app);

    const res = await app.inject({ method: "POST", url: "/events", payload: { name: "signup" } });
    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ error: "rate_limit_unavailable" });
  });

  it("fails open when configured to", async () => {
    const store = new FailingStore(new MemoryKvStore(), { gets: true, puts: false });
    const app = await buildServer(makeConfig({ storeFailureMode: "open" }), { store, now: () => 0 });
    apps.push(app);

    const res = await app.inject({ method: "POST", url: "/events", payload: { name: "signup" } });
    expect(res.statusCode).toBe(202);
  });

  it("keeps the response when recording fails", async () => {
    const inner = new MemoryKvStore({ now: () => 0 });
    const store = new FailingStore(inner, { gets: false, puts: true });
    const app = await buildServer(makeConfig(), { store, now: () => 0 });
    apps.push(app);

    const res = await app.inject({ method: "POST", url: "/events", payload: { name: "signup" } });
    expect(res.statusCode).toBe(202);
    expect(await inner.get("ratelimit/127.0.0.1")).toBeNull();
  });

  it("requires control auth to inspect a key", async () => {
    const app = await buildServer(makeConfig(), { store: new MemoryKvStore(), now: () => 0 });
    apps.push(app);

    const missing = await app.inject({ method: "GET", url: "/limits/127.0.0.1" });
    expect(missing.statusCode).toBe(401);

    const wrong = await app.inject({
      method: "GET",
      url: "/limits/127.0.0.1",
      headers: { authorization: "Bearer other-token" },
    });
    expect(wrong.statusCode).toBe(401);
  });

  it("inspects a key without charging it", async () => {
    const store = new MemoryKvStore({ now: () => 0 });
    const app = await buildServer(makeConfig(), { store, now: () => 0 });
    apps.push(app);
    const auth = { authorization: "Bearer secret-token" };

    await app.inject({ method: "POST", url: "/events", payload: { name: "signup" } });

    for (let i = 0; i < 2; i += 1) {
      const res = await app.inject({ method: "GET", url: "/limits/127.0.0.1", headers: auth });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        key: "127.0.0.1",
        storageKey: "ratelimit/127.0.0.1",
        history: [0],
        usage: [{ rule: { windowMs: 5000, max: 2 }, count: 1, remaining: 1, resetAfterMs: 5000 }],
        allowed: true,
        retryAfterMs: 0,
      });
    }
  });
});
