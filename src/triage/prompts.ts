/**
 * Prompt construction for classification and category suggestions.
 * The model sees message summaries only, never full bodies.
 */
import type { Message, RuleSet } from "./types.js";

export const DEFAULT_SYSTEM_PROMPT = `You are an email triage assistant. Classify each email into exactly one of the user's categories.
Prefer the most specific category that fits. When no category clearly fits, use "unclassified".`;

export const DEFAULT_SUGGESTIONS_PROMPT = `Look at the emails and how they were classified. Suggest new categories only when a recurring kind of email is not served well by the existing categories, for example several emails landing in "unclassified" for the same reason.`;

export interface MessageSummary {
  id: string;
  subject: string;
  sender: string;
  date: string | null;
  excerpt: string;
  has_attachments: boolean;
}

export function summarize(message: Message): MessageSummary {
  return {
    id: message.id,
    subject: message.subject,
    sender: message.sender,
    date: message.date ? message.date.toISOString() : null,
    excerpt: message.excerpt,
    has_attachments: message.hasAttachments,
  };
}

export function buildClassificationSystemPrompt(
  ruleSet: RuleSet,
  suggest: boolean
): string {
  const lines = [ruleSet.systemPrompt.trim(), "", "Available categories:"];
  for (const category of ruleSet.categories) {
    lines.push(
      category.description
        ? `- ${category.name}: ${category.description}`
        : `- ${category.name}`
    );
  }

  const fields = [
    '"id": the email id, copied exactly',
    '"category": one category name from the list above, spelled exactly',
    '"confidence": a number from 0 to 1',
    '"reasoning": one short sentence',
  ];
  if (suggest) {
    fields.push(
      '"suggested_category": a short snake_case name for the category you would create for this email if you could, or null'
    );
  }

  lines.push(
    "",
    "Return results for ALL emails in the batch. Respond with a single JSON object and nothing else:",
    '{"classifications": [{...}, ...]} where each entry has:',
    ...fields.map((f) => `  - ${f}`)
  );

  return lines.join("\n");
}

export function buildClassificationUserMessage(messages: readonly Message[]): string {
  return (
    "Classify the following emails:\n\n" +
    JSON.stringify(messages.map(summarize), null, 2)
  );
}

export function buildSuggestionsSystemPrompt(ruleSet: RuleSet): string {
  const existing = ruleSet.categories
    .map((c) => `- ${c.name}: ${c.description}`)
    .join("\n");

  return [
    "You are an email triage assistant. The user has these existing categories:",
    existing,
    "",
    ruleSet.suggestionsPrompt.trim(),
    "",
    "Only suggest categories that are clearly distinct from the existing ones. If the existing categories already cover everything well, return an empty list.",
    "Respond with a single JSON object and nothing else:",
    '{"suggestions": [{"name": snake_case name, "description": what it matches, "suggested_action": one of none|star|move|trash|archive, "example_ids": [email ids from this batch], "reasoning": why it helps}]}',
  ].join("\n");
}

export function buildSuggestionsUserMessage(
  messages: readonly Message[],
  classified: ReadonlyArray<{ id: string; subject: string; category: string; reasoning?: string }>
): string {
  return (
    buildClassificationUserMessage(messages) +
    "\n\nHere is how these emails were classified:\n\n" +
    JSON.stringify(classified, null, 2)
  );
}
