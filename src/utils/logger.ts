/**
 * Structured logging with PII redaction and run correlation.
 *
 * Redaction policy:
 * - DEFAULT (INFO): never logs message bodies, excerpts, or credentials
 * - DEBUG: may include subjects and model rationales for troubleshooting
 * - All paths listed in `redact.paths` are replaced with "[REDACTED]"
 *
 * Logs are written to stderr; stdout belongs to command output.
 */
import pino from "pino";
import { getCurrentContext } from "../core/correlation.js";

export function createLogger(name?: string) {
  const pretty = process.env.NODE_ENV !== "production";

  const logger = pino(
    {
      name: name ?? "mailsift",
      level: process.env.LOG_LEVEL ?? "info",
      serializers: {
        // Pino only serializes Error objects for the `err` key by default.
        // Add `error` so logger.error({ error: someError }) shows message + stack.
        error: pino.stdSerializers.err,
      },
      redact: {
        paths: [
          "excerpt",
          "body",
          "password",
          "pass",
          "apiKey",
          "api_key",
          "*.excerpt",
          "*.body",
          "*.password",
          "*.pass",
          "*.apiKey",
          "*.api_key",
          "auth.pass",
        ],
        censor: "[REDACTED]",
      },
      mixin() {
        const ctx = getCurrentContext();
        if (ctx) {
          return {
            runId: ctx.runId,
            ...(ctx.mailbox ? { mailbox: ctx.mailbox } : {}),
          };
        }
        return {};
      },
      transport: pretty
        ? {
            target: "pino-pretty",
            options: { colorize: true, destination: 2 },
          }
        : undefined,
    },
    pretty ? undefined : pino.destination(2)
  );

  return logger;
}

export type Logger = pino.Logger;
