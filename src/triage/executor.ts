import { ExecutionError } from "../core/errors.js";
import {
  DEFAULT_EXECUTION_RETRY,
  RetryExhaustedError,
  withRetry,
} from "../core/retry.js";
import type { RetryPolicy } from "../core/retry.js";
import type { Logger } from "../utils/logger.js";
import type { MessageStore } from "./store.js";
import {
  IRREVERSIBLE_ACTIONS,
  describeAction,
  toMailAction,
} from "./types.js";
import type {
  ConfirmMode,
  Message,
  Outcome,
  PlannedAction,
  RunMode,
} from "./types.js";

export type ExecutionState =
  | "planned"
  | "simulated"
  | "awaiting_confirmation"
  | "confirmed"
  | "cancelled"
  | "completed";

export type BatchDecision = "approve_all" | "cancel" | "per_item";
export type ItemDecision = "approve" | "skip" | "cancel";

export interface ExecutionItem {
  plan: PlannedAction;
  message: Message;
}

export interface ExecutionResult {
  messageId: string;
  outcome: Outcome;
  detail?: string;
}

/**
 * Asks a human (or a policy) whether irreversible actions may run.
 * Supplied by the caller; the engine never prompts on its own.
 */
export interface ConfirmationGate {
  confirmBatch(pending: readonly ExecutionItem[]): Promise<BatchDecision>;
  confirmItem(item: ExecutionItem, position: number, total: number): Promise<ItemDecision>;
}

/** Approves everything. Backs `confirm: "auto"`. */
export const autoApproveGate: ConfirmationGate = {
  confirmBatch: async () => "approve_all",
  confirmItem: async () => "approve",
};

export interface ExecuteOptions {
  mode: RunMode;
  confirm: ConfirmMode;
  gate?: ConfirmationGate;
}

export interface ExecutionEngineOptions {
  retry?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Applies a plan to the mailbox, one message at a time, in input order.
 *
 * State: planned -> simulated (dry run), or
 * planned -> awaiting_confirmation -> confirmed | cancelled -> completed.
 */
export class ExecutionEngine {
  private store: MessageStore;
  private logger: Logger;
  private retry: RetryPolicy;
  private sleep?: (ms: number) => Promise<void>;
  private currentState: ExecutionState = "planned";

  constructor(store: MessageStore, logger: Logger, options: ExecutionEngineOptions = {}) {
    this.store = store;
    this.logger = logger;
    this.retry = options.retry ?? DEFAULT_EXECUTION_RETRY;
    this.sleep = options.sleep;
  }

  get state(): ExecutionState {
    return this.currentState;
  }

  async execute(
    items: readonly ExecutionItem[],
    options: ExecuteOptions
  ): Promise<ExecutionResult[]> {
    this.currentState = "planned";

    if (options.mode === "dry_run") {
      const results = items.map((item) => simulate(item.plan));
      this.transition("simulated");
      return results;
    }

    const gate = options.confirm === "auto" ? autoApproveGate : options.gate;
    if (!gate) {
      throw new Error("interactive confirmation needs a ConfirmationGate");
    }

    const pending = items.filter(
      (i) => i.plan.status === "ok" && IRREVERSIBLE_ACTIONS.has(i.plan.action)
    );

    let decision: BatchDecision = "approve_all";
    if (pending.length > 0) {
      this.transition("awaiting_confirmation");
      decision = await gate.confirmBatch(pending);
      this.logger.info({ decision, pending: pending.length }, "Confirmation decision");
    }

    if (decision === "cancel") {
      this.transition("cancelled");
      const results = items.map((item) =>
        item.plan.status === "blocked"
          ? skipped(item.plan, item.plan.reason)
          : skipped(item.plan, "cancelled")
      );
      this.transition("completed");
      return results;
    }

    this.transition("confirmed");
    const results: ExecutionResult[] = [];
    let position = 0;
    let cancelled = false;

    for (const item of items) {
      const { plan } = item;

      if (plan.status === "blocked") {
        results.push(skipped(plan, plan.reason));
        continue;
      }
      if (cancelled) {
        results.push(skipped(plan, "cancelled"));
        continue;
      }
      if (plan.action === "none") {
        results.push({ messageId: plan.messageId, outcome: "applied", detail: "no action" });
        continue;
      }

      if (IRREVERSIBLE_ACTIONS.has(plan.action) && decision === "per_item") {
        position++;
        const answer = await gate.confirmItem(item, position, pending.length);
        if (answer === "skip") {
          results.push(skipped(plan, "declined"));
          continue;
        }
        if (answer === "cancel") {
          cancelled = true;
          this.transition("cancelled");
          results.push(skipped(plan, "cancelled"));
          continue;
        }
      }

      results.push(await this.apply(plan));
    }

    this.transition("completed");
    return results;
  }

  private async apply(plan: PlannedAction): Promise<ExecutionResult> {
    const description = describeAction(plan);
    try {
      const result = await withRetry(
        () => this.store.applyAction(plan.messageId, toMailAction(plan)),
        this.retry,
        this.logger,
        { label: `${description} ${plan.messageId}`, sleep: this.sleep }
      );
      this.logger.info(
        { messageId: plan.messageId, action: description, changed: result.changed },
        "Action applied"
      );
      return {
        messageId: plan.messageId,
        outcome: "applied",
        detail: result.changed ? description : `${description} (already done)`,
      };
    } catch (err) {
      const attempts = err instanceof RetryExhaustedError ? err.attempts : 1;
      const cause = err instanceof RetryExhaustedError ? err.lastError : err;
      const reason = cause instanceof Error ? cause.message : String(cause);
      const error = new ExecutionError(
        plan.messageId,
        attempts,
        `${description} failed after ${attempts} attempt(s): ${reason}`,
        { cause }
      );
      this.logger.error({ error, messageId: plan.messageId }, "Action failed");
      return { messageId: plan.messageId, outcome: "failed", detail: error.message };
    }
  }

  private transition(next: ExecutionState): void {
    this.logger.debug({ from: this.currentState, to: next }, "Execution state");
    this.currentState = next;
  }
}

function simulate(plan: PlannedAction): ExecutionResult {
  if (plan.status === "blocked") return skipped(plan, plan.reason);
  return {
    messageId: plan.messageId,
    outcome: "simulated",
    detail: plan.action === "none" ? "no action" : `would ${describeAction(plan)}`,
  };
}

function skipped(plan: PlannedAction, reason: string | undefined): ExecutionResult {
  return {
    messageId: plan.messageId,
    outcome: "skipped",
    ...(reason ? { detail: reason } : {}),
  };
}
