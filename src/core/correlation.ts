/**
 * Run correlation context using AsyncLocalStorage.
 * Propagates the runId (and mailbox) through the async call stack so every
 * log line of a triage run can be grouped.
 */
import { AsyncLocalStorage } from "node:async_hooks";
import { generateRunId } from "../utils/id.js";

export interface RunContext {
  runId: string;
  mailbox?: string;
}

export const runContext = new AsyncLocalStorage<RunContext>();

export function withContext<T>(
  ctx: RunContext,
  fn: () => Promise<T>
): Promise<T> {
  return runContext.run(ctx, fn);
}

export function getCurrentContext(): RunContext | undefined {
  return runContext.getStore();
}

export function createRunId(): string {
  return generateRunId();
}
