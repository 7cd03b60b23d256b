import type { LLMResponse } from "../../src/core/llm/provider.js";
import { createRuleSet } from "../../src/triage/rules.js";
import type { Message, RuleSet } from "../../src/triage/types.js";

/** Create a plain text LLM response. */
export function createTextResponse(
  text: string,
  overrides: Partial<LLMResponse> = {}
): LLMResponse {
  return {
    text,
    stopReason: "end_turn",
    usage: { inputTokens: 100, outputTokens: 50 },
    model: "mock-model",
    provider: "mock",
    ...overrides,
  };
}

export interface ClassificationReply {
  id: string;
  category: string;
  confidence?: number;
  reasoning?: string;
  suggested_category?: string | null;
}

/** A response carrying a classification JSON object. */
export function createClassificationResponse(
  entries: ClassificationReply[],
  overrides: Partial<LLMResponse> = {}
): LLMResponse {
  return createTextResponse(JSON.stringify({ classifications: entries }), overrides);
}

/** A response where the provider reported no token usage. */
export function createNullUsageResponse(text: string): LLMResponse {
  return createTextResponse(text, { usage: { inputTokens: null, outputTokens: null } });
}

export function createTestMessage(overrides: Partial<Message> = {}): Message {
  return {
    id: "1",
    sender: "Sender <sender@example.com>",
    subject: "Test message",
    date: new Date("2025-01-15T10:00:00Z"),
    excerpt: "Hello, this is a test message.",
    labels: [],
    isRead: false,
    isStarred: false,
    hasAttachments: false,
    ...overrides,
  };
}

export function createTestMessages(count: number): Message[] {
  return Array.from({ length: count }, (_, i) =>
    createTestMessage({
      id: String(i + 1),
      subject: `Test message ${i + 1}`,
      sender: `Sender ${i + 1} <sender${i + 1}@example.com>`,
    })
  );
}

/** Newsletters (move), receipts (archive), urgent (star), spam (trash). */
export function createTestRuleSet(): RuleSet {
  return createRuleSet({
    categories: [
      {
        name: "newsletters",
        description: "Mailing lists and digests",
        action: "move",
        target_folder: "Newsletters",
      },
      { name: "receipts", description: "Purchase receipts", action: "archive" },
      { name: "urgent", description: "Needs attention today", action: "star" },
      { name: "spam", description: "Unwanted mail", action: "trash" },
    ],
  });
}
