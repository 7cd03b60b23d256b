import { ConfigError } from "../core/errors.js";
import type { AppConfig, CategoryConfig } from "../utils/config.js";
import {
  DEFAULT_SUGGESTIONS_PROMPT,
  DEFAULT_SYSTEM_PROMPT,
} from "./prompts.js";
import { UNCLASSIFIED } from "./types.js";
import type { ActionKind, CategoryRule, RuleSet } from "./types.js";

const UNCLASSIFIED_RULE: CategoryRule = {
  name: UNCLASSIFIED,
  description: "Fits no other category, or could not be classified.",
  action: "none",
};

export interface RuleSetInput {
  categories: CategoryConfig[];
  systemPrompt?: string;
  suggestionsPrompt?: string;
}

/**
 * Validate category definitions and build an immutable RuleSet.
 * All problems are collected and reported together as one ConfigError.
 */
export function createRuleSet(input: RuleSetInput): RuleSet {
  const issues: string[] = [];
  const seen = new Set<string>();
  const categories: CategoryRule[] = [];
  let hasUnclassified = false;

  input.categories.forEach((raw, index) => {
    const name = raw.name.trim();
    const where = `categories[${index}] "${name}"`;
    const action: ActionKind = raw.action === "flag" ? "star" : raw.action;
    const key = name.toLowerCase();

    if (!name) {
      issues.push(`categories[${index}]: name is empty`);
      return;
    }
    if (seen.has(key)) {
      issues.push(`${where}: duplicate category name`);
      return;
    }
    seen.add(key);

    if (key === UNCLASSIFIED) {
      if (action !== "none" || raw.target_folder) {
        issues.push(`${where}: the reserved category must have action "none"`);
        return;
      }
      hasUnclassified = true;
      categories.push({
        ...UNCLASSIFIED_RULE,
        description: raw.description || UNCLASSIFIED_RULE.description,
      });
      return;
    }

    if (action === "move" && !raw.target_folder) {
      issues.push(`${where}: action "move" requires target_folder`);
      return;
    }
    if (action !== "move" && raw.target_folder) {
      issues.push(`${where}: target_folder is only valid with action "move"`);
      return;
    }

    categories.push({
      name,
      description: raw.description.trim(),
      action,
      ...(raw.target_folder ? { targetFolder: raw.target_folder } : {}),
      ...(raw.older_than_minutes !== undefined
        ? { olderThanMinutes: raw.older_than_minutes }
        : {}),
    });
  });

  if (issues.length > 0) {
    throw new ConfigError("Invalid triage rules", issues);
  }

  if (!hasUnclassified) categories.push(UNCLASSIFIED_RULE);

  return Object.freeze({
    categories: Object.freeze(categories.map((c) => Object.freeze({ ...c }))),
    systemPrompt: input.systemPrompt?.trim() || DEFAULT_SYSTEM_PROMPT,
    suggestionsPrompt: input.suggestionsPrompt?.trim() || DEFAULT_SUGGESTIONS_PROMPT,
  });
}

export function ruleSetFromConfig(triage: AppConfig["triage"]): RuleSet {
  return createRuleSet({
    categories: triage.categories,
    systemPrompt: triage.system_prompt,
    suggestionsPrompt: triage.suggestions_prompt,
  });
}

export function findRule(ruleSet: RuleSet, category: string): CategoryRule | undefined {
  return ruleSet.categories.find((c) => c.name === category);
}

/**
 * Map raw model output onto a known category name: exact match first,
 * then case-insensitive. Returns null for anything else.
 */
export function resolveCategory(ruleSet: RuleSet, raw: string): string | null {
  const trimmed = raw.trim();
  const exact = ruleSet.categories.find((c) => c.name === trimmed);
  if (exact) return exact.name;

  const lower = trimmed.toLowerCase();
  const loose = ruleSet.categories.find((c) => c.name.toLowerCase() === lower);
  return loose ? loose.name : null;
}
