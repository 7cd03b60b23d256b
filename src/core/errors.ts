/**
 * Error taxonomy for the triage pipeline.
 *
 * Only ConfigError and a TransportError raised while connecting, listing
 * labels, or fetching end a run. Everything else is isolated per message
 * and reported.
 */

export type ErrorCode =
  | "config"
  | "transport"
  | "classification"
  | "validation"
  | "execution"
  | "timeout";

export class MailsiftError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = this.constructor.name;
  }
}

/** Malformed configuration or rule set. Raised before the pipeline starts. */
export class ConfigError extends MailsiftError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("config", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}

/** Mail protocol failure. */
export class TransportError extends MailsiftError {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super("transport", `${operation} failed: ${message}`, options);
    this.operation = operation;
  }
}

/** Model backend failure or unusable model output. */
export class ClassificationError extends MailsiftError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("classification", message, options);
  }
}

/** A planned action cannot be carried out as configured. */
export class ValidationError extends MailsiftError {
  readonly messageId: string;

  constructor(messageId: string, message: string) {
    super("validation", message);
    this.messageId = messageId;
  }
}

/** A single action application failed after retries. */
export class ExecutionError extends MailsiftError {
  readonly messageId: string;
  readonly attempts: number;

  constructor(
    messageId: string,
    attempts: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("execution", message, options);
    this.messageId = messageId;
    this.attempts = attempts;
  }
}

export class TimeoutError extends MailsiftError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super("timeout", `${label} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
