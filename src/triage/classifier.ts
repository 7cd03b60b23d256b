import { z } from "zod";
import { ClassificationError } from "../core/errors.js";
import {
  DEFAULT_CLASSIFIER_RETRY,
  RetryExhaustedError,
  isRetryableModelError,
  withRetry,
} from "../core/retry.js";
import type { RetryPolicy } from "../core/retry.js";
import type { ModelSelection } from "../core/llm/manager.js";
import type { UsageTracker } from "../core/llm/usage.js";
import { chunk, mapWithConcurrency } from "../utils/concurrency.js";
import type { Logger } from "../utils/logger.js";
import {
  buildClassificationSystemPrompt,
  buildClassificationUserMessage,
  buildSuggestionsSystemPrompt,
  buildSuggestionsUserMessage,
} from "./prompts.js";
import { resolveCategory } from "./rules.js";
import { UNCLASSIFIED } from "./types.js";
import type {
  ActionKind,
  CategorySuggestion,
  Classification,
  Message,
  RuleSet,
} from "./types.js";

export interface ClassifierOptions {
  batchSize: number;
  concurrency: number;
  maxTokens: number;
  retry: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
}

export interface ClassifyOptions {
  /** Ask the model for a free-text category suggestion per message. */
  suggest?: boolean;
}

const DEFAULT_OPTIONS: ClassifierOptions = {
  batchSize: 20,
  concurrency: 3,
  maxTokens: 1024,
  retry: DEFAULT_CLASSIFIER_RETRY,
};

const messageId = z.union([z.string(), z.number()]).transform(String);

const ClassificationEntrySchema = z.object({
  id: messageId,
  category: z.string(),
  confidence: z.number().min(0).max(1).optional().catch(undefined),
  reasoning: z.string().optional().catch(undefined),
  suggested_category: z.string().nullable().optional().catch(undefined),
});

const ClassificationResponseSchema = z.object({
  classifications: z.array(ClassificationEntrySchema),
});

type ClassificationEntry = z.infer<typeof ClassificationEntrySchema>;

const SuggestionSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  suggested_action: z
    .enum(["none", "star", "flag", "move", "trash", "archive"])
    .catch("none")
    .default("none"),
  example_ids: z.array(messageId).default([]),
  reasoning: z.string().default(""),
});

const SuggestionsResponseSchema = z.object({
  suggestions: z.array(SuggestionSchema),
});

/**
 * Assigns every message one RuleSet category using an LLM.
 * Failures are contained per batch: a batch that exhausts its retries
 * degrades to "unclassified" and the rest of the run continues.
 */
export class Classifier {
  private logger: Logger;
  private usage: UsageTracker;
  private options: ClassifierOptions;

  constructor(
    logger: Logger,
    usage: UsageTracker,
    options: Partial<ClassifierOptions> = {}
  ) {
    this.logger = logger;
    this.usage = usage;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async classify(
    messages: readonly Message[],
    ruleSet: RuleSet,
    model: ModelSelection,
    options: ClassifyOptions = {}
  ): Promise<Classification[]> {
    if (messages.length === 0) return [];

    const batches = chunk(messages, this.options.batchSize);
    this.logger.info(
      { model: model.id, messages: messages.length, batches: batches.length },
      "Classifying messages"
    );

    const results = await mapWithConcurrency(
      batches,
      this.options.concurrency,
      (batch, index) => this.classifyBatch(batch, index, ruleSet, model, options)
    );
    return results.flat();
  }

  /**
   * Ask for categories that would serve the batch better than the current
   * ones. Best effort: any failure is logged and yields no suggestions.
   */
  async suggestCategories(
    messages: readonly Message[],
    ruleSet: RuleSet,
    classifications: readonly Classification[],
    model: ModelSelection
  ): Promise<CategorySuggestion[]> {
    if (messages.length === 0) return [];

    const byId = new Map(classifications.map((c) => [c.messageId, c]));
    const classified = messages.map((m) => {
      const c = byId.get(m.id);
      return {
        id: m.id,
        subject: m.subject,
        category: c?.category ?? UNCLASSIFIED,
        ...(c?.rationale ? { reasoning: c.rationale } : {}),
      };
    });

    try {
      const text = await withRetry(
        (signal) =>
          this.request(model, {
            system: buildSuggestionsSystemPrompt(ruleSet),
            user: buildSuggestionsUserMessage(messages, classified),
            maxTokens: this.options.maxTokens,
            signal,
          }),
        this.options.retry,
        this.logger,
        {
          label: "category suggestions",
          isRetryable: isRetryableModelError,
          sleep: this.options.sleep,
        }
      );
      const parsed = parseModelJson(text, SuggestionsResponseSchema);
      return normalizeSuggestions(parsed.suggestions, ruleSet, messages);
    } catch (err) {
      this.logger.warn({ error: err, model: model.id }, "Category suggestions failed");
      return [];
    }
  }

  private async classifyBatch(
    batch: readonly Message[],
    index: number,
    ruleSet: RuleSet,
    model: ModelSelection,
    options: ClassifyOptions
  ): Promise<Classification[]> {
    const suggest = options.suggest ?? false;
    const system = buildClassificationSystemPrompt(ruleSet, suggest);
    const user = buildClassificationUserMessage(batch);
    const maxTokens = Math.max(this.options.maxTokens, 100 * batch.length + 256);

    try {
      const entries = await withRetry(
        async (signal) => {
          const text = await this.request(model, { system, user, maxTokens, signal });
          return parseModelJson(text, ClassificationResponseSchema).classifications;
        },
        this.options.retry,
        this.logger,
        {
          label: `classification batch ${index}`,
          isRetryable: isRetryableModelError,
          sleep: this.options.sleep,
        }
      );
      return this.mapEntries(batch, entries, ruleSet, model, suggest);
    } catch (err) {
      const cause = err instanceof RetryExhaustedError ? err.lastError : err;
      const reason = cause instanceof Error ? cause.message : String(cause);
      this.logger.warn(
        { error: err, batch: index, size: batch.length, model: model.id },
        "Classification batch failed; marking messages unclassified"
      );
      return batch.map((m) => ({
        messageId: m.id,
        category: UNCLASSIFIED,
        model: model.id,
        rationale: `classification failed: ${reason}`,
        failed: true,
      }));
    }
  }

  private mapEntries(
    batch: readonly Message[],
    entries: ClassificationEntry[],
    ruleSet: RuleSet,
    model: ModelSelection,
    suggest: boolean
  ): Classification[] {
    const wanted = new Set(batch.map((m) => m.id));
    const answers = new Map<string, ClassificationEntry>();

    for (const entry of entries) {
      if (!wanted.has(entry.id)) {
        this.logger.debug({ messageId: entry.id }, "Ignoring classification for unknown id");
        continue;
      }
      if (answers.has(entry.id)) continue;
      answers.set(entry.id, entry);
    }

    return batch.map((m): Classification => {
      const entry = answers.get(m.id);
      if (!entry) {
        return {
          messageId: m.id,
          category: UNCLASSIFIED,
          model: model.id,
          rationale: "no classification returned",
          failed: false,
        };
      }

      let category = resolveCategory(ruleSet, entry.category);
      if (category === null) {
        this.logger.warn(
          { messageId: m.id, category: entry.category },
          "Model returned an unknown category; using unclassified"
        );
        category = UNCLASSIFIED;
      }

      return {
        messageId: m.id,
        category,
        model: model.id,
        ...(entry.confidence !== undefined ? { confidence: entry.confidence } : {}),
        ...(entry.reasoning ? { rationale: entry.reasoning } : {}),
        ...(suggest && entry.suggested_category
          ? { suggestedCategory: entry.suggested_category }
          : {}),
        failed: false,
      };
    });
  }

  private async request(
    model: ModelSelection,
    prompt: { system: string; user: string; maxTokens: number; signal: AbortSignal }
  ): Promise<string> {
    const response = await model.provider.chat({
      model: model.model,
      system: prompt.system,
      messages: [{ role: "user", content: prompt.user }],
      maxTokens: prompt.maxTokens,
      json: true,
      signal: prompt.signal,
    });
    // Providers configured without usage metrics report unreliable counts.
    this.usage.track(
      response.provider,
      model.model,
      model.provider.capabilities.usageMetrics
        ? response.usage
        : { inputTokens: null, outputTokens: null }
    );

    if (response.stopReason === "max_tokens") {
      throw new ClassificationError("model response was cut off at the token limit");
    }
    if (!response.text) {
      throw new ClassificationError("model returned an empty response");
    }
    return response.text;
  }
}

/** Strip Markdown code fences and surrounding prose, then validate. */
export function parseModelJson<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let body = text.trim();
  const fenced = body.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced?.[1] !== undefined) body = fenced[1].trim();

  const start = body.indexOf("{");
  const end = body.lastIndexOf("}");
  if (start === -1 || end < start) {
    throw new ClassificationError("model response contains no JSON object");
  }

  let data: unknown;
  try {
    data = JSON.parse(body.slice(start, end + 1));
  } catch (err) {
    throw new ClassificationError("model response is not valid JSON", { cause: err });
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ClassificationError(
      `model response has an unexpected shape (${where}${issue?.message ?? "invalid"})`
    );
  }
  return result.data;
}

function normalizeSuggestions(
  raw: z.infer<typeof SuggestionSchema>[],
  ruleSet: RuleSet,
  messages: readonly Message[]
): CategorySuggestion[] {
  const known = new Set(messages.map((m) => m.id));
  const taken = new Set(ruleSet.categories.map((c) => c.name.toLowerCase()));
  const suggestions: CategorySuggestion[] = [];

  for (const s of raw) {
    const name = s.name.trim();
    if (taken.has(name.toLowerCase())) continue;
    taken.add(name.toLowerCase());

    const action: ActionKind = s.suggested_action === "flag" ? "star" : s.suggested_action;
    suggestions.push({
      name,
      description: s.description,
      suggestedAction: action,
      exampleIds: s.example_ids.filter((id) => known.has(id)),
      reasoning: s.reasoning,
    });
  }
  return suggestions;
}
