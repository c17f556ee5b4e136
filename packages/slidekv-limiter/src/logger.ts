import { pino } from "pino";
import type { BaseLogger } from "pino";

/** Any pino logger, including Fastify's `app.log` and `request.log`. */
export type LimiterLogger = BaseLogger;

export const silentLogger: LimiterLogger = pino({ level: "silent" });
