import { ValidationError } from "../core/errors.js";
import { findRule } from "./rules.js";
import type { Classification, Message, PlannedAction, RuleSet } from "./types.js";

export interface PlanContext {
  /** Labels/folders that exist in the mailbox at plan time. */
  labels: ReadonlySet<string>;
  /** Needed for age gates; messages without a date are never held back. */
  messages?: readonly Message[];
  now: Date;
}

/**
 * Turn classifications into planned actions. Pure: same inputs, same plan.
 * Rule problems become `blocked` entries instead of exceptions.
 */
export function buildPlan(
  classifications: readonly Classification[],
  ruleSet: RuleSet,
  context: PlanContext
): PlannedAction[] {
  const dates = new Map<string, Date | null>();
  for (const m of context.messages ?? []) dates.set(m.id, m.date);

  return classifications.map((c) => planOne(c, ruleSet, context, dates.get(c.messageId)));
}

function planOne(
  classification: Classification,
  ruleSet: RuleSet,
  context: PlanContext,
  date: Date | null | undefined
): PlannedAction {
  const { messageId, category } = classification;
  const rule = findRule(ruleSet, category);

  if (!rule || rule.action === "none") {
    return { messageId, category, action: "none", status: "ok" };
  }

  if (rule.olderThanMinutes !== undefined && date) {
    const ageMinutes = (context.now.getTime() - date.getTime()) / 60_000;
    if (ageMinutes < rule.olderThanMinutes) {
      return {
        messageId,
        category,
        action: "none",
        status: "ok",
        reason: `younger than ${rule.olderThanMinutes} minutes`,
      };
    }
  }

  if (rule.action === "move") {
    const target = rule.targetFolder ?? "";
    const problem = validateMoveTarget(messageId, target, context.labels);
    if (problem) {
      return {
        messageId,
        category,
        action: "move",
        targetFolder: target,
        status: "blocked",
        reason: problem.message,
      };
    }
    return { messageId, category, action: "move", targetFolder: target, status: "ok" };
  }

  return { messageId, category, action: rule.action, status: "ok" };
}

function validateMoveTarget(
  messageId: string,
  target: string,
  labels: ReadonlySet<string>
): ValidationError | null {
  if (!target || !labels.has(target)) {
    return new ValidationError(messageId, "target label missing");
  }
  return null;
}
