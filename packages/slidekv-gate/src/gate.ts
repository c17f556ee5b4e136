import type { FastifyReply, FastifyRequest } from "fastify";
import type { RateLimitedResponse } from "@slidekv/contracts";
import type { RateLimiter, Ticket, Verdict } from "@slidekv/limiter";
import type { StoreFailureMode } from "./config.js";

export interface RateLimitGateOptions {
  limiter: RateLimiter;
  keyFor?: (request: FastifyRequest) => string;
  now?: () => number;
  /** Decides after the handler ran whether the action counts. */
  shouldCount?: (reply: FastifyReply) => boolean;
  storeFailureMode?: StoreFailureMode;
}

export interface RateLimitGate {
  preHandler: (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined>;
  onSend: (request: FastifyRequest, reply: FastifyReply, payload: unknown) => Promise<unknown>;
}

function minRemaining(verdict: Verdict): number | undefined {
  if (verdict.usage.length === 0) {
    return undefined;
  }
  return Math.min(...verdict.usage.map((entry) => entry.remaining));
}

/**
 * Route hooks that check before the handler and record the action only when
 * the response says it happened. Register both on the guarded route.
 */
export function createRateLimitGate(options: RateLimitGateOptions): RateLimitGate {
  const { limiter } = options;
  const keyFor = options.keyFor ?? ((request: FastifyRequest) => request.ip);
  const now = options.now ?? Date.now;
  const shouldCount = options.shouldCount ?? ((reply: FastifyReply) => reply.statusCode < 400);
  const storeFailureMode = options.storeFailureMode ?? "closed";
  const tickets = new WeakMap<FastifyRequest, Ticket>();

  async function preHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> {
    const key = keyFor(request);

    let verdict: Verdict;
    try {
      verdict = await limiter.check(key, now(), request.log);
    } catch (error) {
      request.log.error({ err: error, key }, "rate limit check failed");
      if (storeFailureMode === "open") {
        return undefined;
      }
      return reply.code(503).send({ error: "rate_limit_unavailable" });
    }

    if (!verdict.allowed) {
      const { violation } = verdict;
      const body: RateLimitedResponse = {
        error: "rate_limited",
        retryAfterMs: violation.retryAfterMs,
        limit: violation.rule,
        count: violation.count,
      };
      request.log.warn({ key, windowMs: violation.rule.windowMs, retryAfterMs: violation.retryAfterMs }, "rate limited");
      // A timestamp exactly one window old still counts, so admission opens 1 ms later.
      const retryAfterSeconds = Math.max(1, Math.ceil((violation.retryAfterMs + 1) / 1000));
      reply.header("retry-after", String(retryAfterSeconds));
      return reply.code(429).send(body);
    }

    const remaining = minRemaining(verdict);
    if (remaining !== undefined) {
      // The action being admitted is not counted yet.
      reply.header("x-ratelimit-remaining", String(Math.max(0, remaining - 1)));
    }
    if (verdict.ticket) {
      tickets.set(request, verdict.ticket);
    }
    return undefined;
  }

  async function onSend(request: FastifyRequest, reply: FastifyReply, payload: unknown): Promise<unknown> {
    const ticket = tickets.get(request);
    if (!ticket) {
      return payload;
    }
    tickets.delete(request);

    if (!shouldCount(reply)) {
      ticket.discard();
      request.log.debug({ key: ticket.storageKey, statusCode: reply.statusCode }, "rate limit ticket discarded");
      return payload;
    }

    try {
      await limiter.redeem(ticket);
    } catch (error) {
      request.log.error({ err: error, key: ticket.storageKey }, "failed to record rate limited action");
    }
    return payload;
  }

  return { preHandler, onSend };
}
