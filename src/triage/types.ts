import type { UsageSummary } from "../core/llm/usage.js";

/** Reserved fallback category. Always maps to action "none". */
export const UNCLASSIFIED = "unclassified";

export type ActionKind = "none" | "star" | "move" | "trash" | "archive";

/** Actions that cannot be undone by re-running the pipeline; gated by confirmation. */
export const IRREVERSIBLE_ACTIONS: ReadonlySet<ActionKind> = new Set([
  "move",
  "trash",
  "archive",
]);

export type MailAction =
  | { kind: "none" }
  | { kind: "star" }
  | { kind: "move"; target: string }
  | { kind: "trash" }
  | { kind: "archive" };

/** Read-only snapshot of a message taken at fetch time. */
export interface Message {
  readonly id: string;
  readonly sender: string;
  readonly subject: string;
  readonly date: Date | null;
  readonly excerpt: string;
  readonly labels: readonly string[];
  readonly isRead: boolean;
  readonly isStarred: boolean;
  readonly hasAttachments: boolean;
}

export interface CategoryRule {
  readonly name: string;
  readonly description: string;
  readonly action: ActionKind;
  readonly targetFolder?: string;
  readonly olderThanMinutes?: number;
}

export interface RuleSet {
  readonly categories: readonly CategoryRule[];
  readonly systemPrompt: string;
  readonly suggestionsPrompt: string;
}

export interface Classification {
  messageId: string;
  /** A RuleSet category name or UNCLASSIFIED; never free-form model text. */
  category: string;
  model: string;
  confidence?: number;
  rationale?: string;
  suggestedCategory?: string;
  /** True when the category is the fallback after classification failed. */
  failed: boolean;
}

export interface CategorySuggestion {
  name: string;
  description: string;
  suggestedAction: ActionKind;
  exampleIds: string[];
  reasoning: string;
}

export type PlanStatus = "ok" | "blocked";

export interface PlannedAction {
  readonly messageId: string;
  readonly category: string;
  readonly action: ActionKind;
  readonly targetFolder?: string;
  readonly status: PlanStatus;
  readonly reason?: string;
}

export type Outcome = "applied" | "skipped" | "failed" | "simulated";

export type RunMode = "dry_run" | "live";

export type ConfirmMode = "auto" | "interactive";

export interface RunReportEntry {
  messageId: string;
  subject: string;
  category: string;
  confidence?: number;
  rationale?: string;
  suggestedCategory?: string;
  /** Set when the model gave no usable answer and the category is a fallback. */
  classificationFailed?: boolean;
  planned: PlannedAction;
  outcome: Outcome;
  detail?: string;
}

export interface RunSummary {
  total: number;
  applied: number;
  skipped: number;
  failed: number;
  simulated: number;
}

export interface RunReport {
  kind: "run";
  runId: string;
  mode: RunMode;
  model: string;
  startedAt: string;
  finishedAt: string;
  entries: RunReportEntry[];
  summary: RunSummary;
  usage: UsageSummary[];
  suggestions: CategorySuggestion[];
}

export interface ComparisonRow {
  messageId: string;
  subject: string;
  categoryA: string;
  categoryB: string;
  confidenceA?: number;
  confidenceB?: number;
  agree: boolean;
}

export interface ComparisonReport {
  kind: "comparison";
  runId: string;
  modelA: string;
  modelB: string;
  rows: ComparisonRow[];
  agreed: number;
  total: number;
  usage: UsageSummary[];
}

export interface FetchCriteria {
  sinceDays: number;
  limit: number;
  includeRead: boolean;
  /** Mailbox/label to read from; defaults to the store's mailbox. */
  label?: string;
  /** Message ids to leave out, e.g. ones handled by an earlier run. */
  excludeIds?: ReadonlySet<string>;
}

export function toMailAction(plan: PlannedAction): MailAction {
  switch (plan.action) {
    case "move":
      if (!plan.targetFolder) {
        throw new Error(`move for message ${plan.messageId} has no target folder`);
      }
      return { kind: "move", target: plan.targetFolder };
    case "star":
    case "trash":
    case "archive":
    case "none":
      return { kind: plan.action };
  }
}

export function describeAction(plan: Pick<PlannedAction, "action" | "targetFolder">): string {
  return plan.action === "move" ? `move to ${plan.targetFolder ?? "?"}` : plan.action;
}
