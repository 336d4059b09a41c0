// src/logger.ts
import pino from "pino";
import { ENV } from "./env";

export const logger = pino({
  level: ENV.NODE_ENV === "test" ? "silent" : ENV.LOG_LEVEL,
  transport:
    ENV.NODE_ENV === "development"
      ? { target: "pino-pretty", options: { colorize: true } }
      : undefined,
});

/**
 * Staff-initiated changes (bulk actions, refunds, status overrides) carry
 * `audit: true` so they can be filtered out of the stream.
 */
export function audit(event: string, data: Record<string, unknown> = {}): void {
  logger.info({ audit: true, event, ...data }, `[AUDIT] ${event}`);
}
