/**
 * Structured logging with credential redaction and dispatch context.
 *
 * Action params and results can carry recipient addresses and message
 * bodies; those paths are censored at every level.
 */
import pino from "pino";
import { getCurrentContext } from "../core/correlation.js";

export function createLogger(name?: string) {
  return pino({
    name: name ?? "stepwise",
    level: process.env.LOG_LEVEL ?? "info",
    serializers: {
      // pino only serializes the `err` key by default; the code logs `error`.
      error: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        "apiKey",
        "api_key",
        "password",
        "token",
        "authorization",
        "body",
        "*.apiKey",
        "*.api_key",
        "*.password",
        "*.token",
        "*.authorization",
        "*.body",
        "headers.authorization",
      ],
      censor: "[REDACTED]",
    },
    mixin() {
      const ctx = getCurrentContext();
      if (!ctx) return {};
      return {
        correlationId: ctx.correlationId,
        ...(ctx.jobId ? { jobId: ctx.jobId } : {}),
        ...(ctx.userId ? { userId: ctx.userId } : {}),
      };
    },
    transport:
      process.env.NODE_ENV !== "production"
        ? { target: "pino-pretty", options: { colorize: true } }
        : undefined,
  });
}

export type Logger = pino.Logger;
