import Fastify, { type FastifyInstance } from "fastify";
import { z } from "zod";
import { EventSubmissionSchema, type LimitInspection } from "@slidekv/contracts";
import {
  CloudflareKvStore,
  MemoryKvStore,
  RateLimiter,
  RuleSet,
  type KvStore,
} from "@slidekv/limiter";
import { assertControlAuth } from "./auth.js";
import type { AppConfig } from "./config.js";
import { createRateLimitGate } from "./gate.js";

export interface ServerDeps {
  store?: KvStore;
  now?: () => number;
}

const LimitKeyParamsSchema = z.object({
  key: z.string().min(1).max(512),
});

export type StoreKind = "custom" | "cloudflare" | "memory";

export function storeKindOf(config: AppConfig, deps: ServerDeps = {}): StoreKind {
  if (deps.store) {
    return "custom";
  }
  return config.cloudflare ? "cloudflare" : "memory";
}

function storeFromConfig(config: AppConfig): KvStore {
  if (config.cloudflare) {
    return new CloudflareKvStore(config.cloudflare);
  }
  return new MemoryKvStore();
}

export async function buildServer(config: AppConfig, deps: ServerDeps = {}): Promise<FastifyInstance> {
  const app = Fastify({
    bodyLimit: 64_000,
    logger: {
      level: config.logLevel,
      transport: config.prettyLogs ? { target: "pino-pretty" } : undefined,
    },
  });

  const now = deps.now ?? Date.now;
  const store = deps.store ?? storeFromConfig(config);
  const storeKind = storeKindOf(config, deps);

  const ruleSet = new RuleSet(config.namespace);
  for (const rule of config.rules) {
    ruleSet.addLimit(rule.windowMs, rule.max);
  }
  const limiter = new RateLimiter(ruleSet, store, { logger: app.log });
  const gate = createRateLimitGate({
    limiter,
    now,
    storeFailureMode: config.storeFailureMode,
  });

  app.addHook("onRequest", async (request, reply) => {
    reply.header("x-request-id", request.id);
  });

  app.setErrorHandler((error, request, reply) => {
    request.log.error({ err: error }, "unhandled request error");
    reply.code(500).send({ error: "internal_error", requestId: request.id });
  });

  app.get("/health", async () => ({ ok: true, ts: now() }));

  app.get("/ready", async () => ({
    ok: true,
    namespace: ruleSet.namespace,
    rules: ruleSet.rules,
    store: storeKind,
  }));

  app.get("/limits/:key", async (request, reply) => {
    try {
      assertControlAuth(request.headers.authorization, config.controlAuthToken);
    } catch {
      return reply.code(401).send({ error: "unauthorized" });
    }

    const params = LimitKeyParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send({ error: "invalid_request", details: params.error.flatten() });
    }

    const inspection = await limiter.inspect(params.data.key, now());
    const body: LimitInspection = {
      ...inspection,
      history: [...inspection.history],
    };
    return reply.send(body);
  });

  app.post("/events", { preHandler: gate.preHandler, onSend: gate.onSend }, async (request, reply) => {
    const parsed = EventSubmissionSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }

    request.log.info({ name: parsed.data.name }, "event accepted");
    return reply.code(202).send({ accepted: true, name: parsed.data.name });
  });

  return app;
}
