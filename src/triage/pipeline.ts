import { createRunId, withContext } from "../core/correlation.js";
import { TransportError } from "../core/errors.js";
import type { ModelSelection } from "../core/llm/manager.js";
import { UsageTracker } from "../core/llm/usage.js";
import {
  DEFAULT_EXECUTION_RETRY,
  DEFAULT_TRANSPORT_RETRY,
  RetryExhaustedError,
  withRetry,
} from "../core/retry.js";
import type { RetryPolicy } from "../core/retry.js";
import type { AppConfig, RetryConfig } from "../utils/config.js";
import type { Logger } from "../utils/logger.js";
import { Classifier } from "./classifier.js";
import type { ClassifierOptions } from "./classifier.js";
import { Comparator } from "./comparator.js";
import { ExecutionEngine } from "./executor.js";
import type { ConfirmationGate, ExecutionResult } from "./executor.js";
import { buildPlan } from "./planner.js";
import type { MessageStore } from "./store.js";
import { UNCLASSIFIED } from "./types.js";
import type {
  Classification,
  ComparisonReport,
  ConfirmMode,
  FetchCriteria,
  Message,
  PlannedAction,
  RuleSet,
  RunMode,
  RunReport,
  RunReportEntry,
  RunSummary,
} from "./types.js";

/** Anything that can turn a model id into a provider selection. */
export interface ModelResolver {
  resolve(modelId?: string): ModelSelection;
}

export interface PipelineOptions {
  classifier?: Partial<ClassifierOptions>;
  executionRetry?: RetryPolicy;
  transportRetry?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface ProcessRequest {
  criteria: FetchCriteria;
  ruleSet: RuleSet;
  mode: RunMode;
  confirm: ConfirmMode;
  /** Required when `confirm` is "interactive". */
  gate?: ConfirmationGate;
  model?: string;
  /** Second model; switches the run to side-by-side comparison. */
  compareModels?: string;
  skipStarred?: boolean;
}

const STARRED_REASON = "already starred";

/**
 * One triage run: fetch -> classify -> plan -> execute -> report.
 * Each run owns its usage tally and engine; nothing is shared between runs.
 */
export class TriagePipeline {
  private store: MessageStore;
  private models: ModelResolver;
  private logger: Logger;
  private options: PipelineOptions;

  constructor(
    store: MessageStore,
    models: ModelResolver,
    logger: Logger,
    options: PipelineOptions = {}
  ) {
    this.store = store;
    this.models = models;
    this.logger = logger;
    this.options = options;
  }

  async fetch(criteria: FetchCriteria): Promise<Message[]> {
    return this.transport("fetch messages", () => this.store.fetchMessages(criteria));
  }

  async process(request: ProcessRequest): Promise<RunReport | ComparisonReport> {
    const runId = createRunId();
    return withContext({ runId, mailbox: this.store.mailbox }, () =>
      this.run(runId, request)
    );
  }

  private async run(
    runId: string,
    request: ProcessRequest
  ): Promise<RunReport | ComparisonReport> {
    const now = this.options.now ?? (() => new Date());
    const startedAt = now();
    const usage = new UsageTracker();
    const classifier = new Classifier(this.logger, usage, {
      ...this.options.classifier,
      sleep: this.options.sleep,
    });

    // Resolve models before touching the mailbox so a bad id fails fast.
    const model = this.models.resolve(request.model);
    const other =
      request.compareModels !== undefined
        ? this.models.resolve(request.compareModels)
        : undefined;

    const messages = await this.fetch(request.criteria);
    const skipStarred = request.skipStarred ?? true;
    const candidates = skipStarred ? messages.filter((m) => !m.isStarred) : messages;

    this.logger.info(
      {
        mode: request.mode,
        model: model.id,
        fetched: messages.length,
        candidates: candidates.length,
      },
      "Run started"
    );

    if (other) {
      const comparator = new Comparator(classifier, this.logger);
      const result = await comparator.compare(candidates, request.ruleSet, model, other);
      return { kind: "comparison", runId, ...result, usage: usage.summary() };
    }

    const labels = await this.transport("list labels", () => this.store.listLabels());
    const dryRun = request.mode === "dry_run";

    const classifications = await classifier.classify(candidates, request.ruleSet, model, {
      suggest: dryRun,
    });
    const plan = buildPlan(classifications, request.ruleSet, {
      labels,
      messages: candidates,
      now: now(),
    });

    const engine = new ExecutionEngine(this.store, this.logger, {
      retry: this.options.executionRetry ?? DEFAULT_EXECUTION_RETRY,
      sleep: this.options.sleep,
    });
    const byMessage = new Map(candidates.map((m) => [m.id, m]));
    const results = await engine.execute(
      plan.flatMap((p) => {
        const message = byMessage.get(p.messageId);
        return message ? [{ plan: p, message }] : [];
      }),
      { mode: request.mode, confirm: request.confirm, gate: request.gate }
    );

    const suggestions = dryRun
      ? await classifier.suggestCategories(candidates, request.ruleSet, classifications, model)
      : [];

    const entries = assembleEntries(messages, classifications, plan, results, skipStarred);
    const report: RunReport = {
      kind: "run",
      runId,
      mode: request.mode,
      model: model.id,
      startedAt: startedAt.toISOString(),
      finishedAt: now().toISOString(),
      entries,
      summary: summarize(entries),
      usage: usage.summary(),
      suggestions,
    };

    this.logger.info({ summary: report.summary }, "Run finished");
    return report;
  }

  /** Mail calls that end the run if they still fail after retries. */
  private async transport<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(
        fn,
        this.options.transportRetry ?? DEFAULT_TRANSPORT_RETRY,
        this.logger,
        { label: operation, sleep: this.options.sleep }
      );
    } catch (err) {
      const cause = err instanceof RetryExhaustedError ? err.lastError : err;
      if (cause instanceof TransportError) throw cause;
      const reason = cause instanceof Error ? cause.message : String(cause);
      throw new TransportError(operation, reason, { cause });
    }
  }
}

function assembleEntries(
  messages: readonly Message[],
  classifications: readonly Classification[],
  plan: readonly PlannedAction[],
  results: readonly ExecutionResult[],
  skipStarred: boolean
): RunReportEntry[] {
  const classById = new Map(classifications.map((c) => [c.messageId, c]));
  const planById = new Map(plan.map((p) => [p.messageId, p]));
  const resultById = new Map(results.map((r) => [r.messageId, r]));

  return messages.map((m): RunReportEntry => {
    const planned = planById.get(m.id);
    const result = resultById.get(m.id);
    const c = classById.get(m.id);

    if (!planned || !result || (skipStarred && m.isStarred)) {
      const reason = skipStarred && m.isStarred ? STARRED_REASON : "not processed";
      return {
        messageId: m.id,
        subject: m.subject,
        category: UNCLASSIFIED,
        planned: {
          messageId: m.id,
          category: UNCLASSIFIED,
          action: "none",
          status: "ok",
          reason,
        },
        outcome: "skipped",
        detail: reason,
      };
    }

    return {
      messageId: m.id,
      subject: m.subject,
      category: planned.category,
      ...(c?.confidence !== undefined ? { confidence: c.confidence } : {}),
      ...(c?.rationale ? { rationale: c.rationale } : {}),
      ...(c?.suggestedCategory ? { suggestedCategory: c.suggestedCategory } : {}),
      ...(c?.failed ? { classificationFailed: true } : {}),
      planned,
      outcome: result.outcome,
      ...(result.detail ? { detail: result.detail } : {}),
    };
  });
}

export function summarize(entries: readonly RunReportEntry[]): RunSummary {
  const summary: RunSummary = { total: entries.length, applied: 0, skipped: 0, failed: 0, simulated: 0 };
  for (const entry of entries) summary[entry.outcome]++;
  return summary;
}

function toRetryPolicy(retry: RetryConfig, timeoutMs: number): RetryPolicy {
  return {
    attempts: retry.attempts,
    baseDelayMs: retry.base_delay_ms,
    maxDelayMs: retry.max_delay_ms,
    timeoutMs,
  };
}

export function pipelineOptionsFromConfig(config: AppConfig): PipelineOptions {
  return {
    classifier: {
      batchSize: config.llm.batch_size,
      concurrency: config.llm.concurrency,
      maxTokens: config.llm.max_tokens,
      retry: toRetryPolicy(config.llm.retry, config.llm.timeout_ms),
    },
    executionRetry: toRetryPolicy(config.execution.retry, config.execution.timeout_ms),
    transportRetry: {
      ...DEFAULT_TRANSPORT_RETRY,
      timeoutMs: config.imap.socket_timeout_ms,
    },
  };
}
