import { describe, it, expect } from "vitest";
import {
  formatComparison,
  formatLabels,
  formatRules,
  formatRunReport,
  formatUsage,
} from "../../../src/cli/format.js";
import type { ComparisonReport, RunReport } from "../../../src/triage/types.js";
import { createTestRuleSet } from "../../helpers/fixtures.js";

function runReport(overrides: Partial<RunReport> = {}): RunReport {
  return {
    kind: "run",
    runId: "run-1",
    mode: "live",
    model: "anthropic/claude-haiku-4-5",
    startedAt: "2025-01-15T10:00:00.000Z",
    finishedAt: "2025-01-15T10:00:05.000Z",
    entries: [
      {
        messageId: "1",
        subject: "Weekly digest",
        category: "newsletters",
        confidence: 0.9,
        planned: {
          messageId: "1",
          category: "newsletters",
          action: "move",
          targetFolder: "Newsletters",
          status: "ok",
        },
        outcome: "applied",
        detail: "move to Newsletters",
      },
      {
        messageId: "2",
        subject: "Hello",
        category: "unclassified",
        suggestedCategory: "personal",
        planned: { messageId: "2", category: "unclassified", action: "none", status: "ok" },
        outcome: "applied",
        detail: "no action",
      },
    ],
    summary: { total: 2, applied: 2, skipped: 0, failed: 0, simulated: 0 },
    usage: [
      {
        provider: "anthropic",
        model: "claude-haiku-4-5",
        inputTokens: 1200,
        outputTokens: 300,
        requestCount: 1,
        usageTracked: true,
      },
    ],
    suggestions: [],
    ...overrides,
  };
}

describe("formatRunReport", () => {
  it("lists each entry and the totals", () => {
    expect(formatRunReport(runReport()).split("\n")).toEqual([
      "Run run-1 with anthropic/claude-haiku-4-5",
      `  ${"Weekly digest".padEnd(50)}  newsletters (90%)  [applied: move to Newsletters]`,
      `  ${"Hello".padEnd(50)}  unclassified  [applied: no action]`,
      "      suggested: personal",
      "Total 2: 2 applied, 0 simulated, 0 skipped, 0 failed",
      "Token usage:",
      "  anthropic/claude-haiku-4-5: 1 request(s), 1200 in / 300 out tokens",
    ]);
  });

  it("prints only the summary when quiet", () => {
    const output = formatRunReport(runReport({ mode: "dry_run", usage: [] }), true);
    expect(output).toBe(
      "Dry run run-1 with anthropic/claude-haiku-4-5\nTotal 2: 2 applied, 0 simulated, 0 skipped, 0 failed"
    );
  });

  it("lists suggested categories", () => {
    const output = formatRunReport(
      runReport({
        usage: [],
        suggestions: [
          {
            name: "travel",
            description: "Bookings and itineraries",
            suggestedAction: "archive",
            exampleIds: ["4", "9"],
            reasoning: "",
          },
        ],
      }),
      true
    );
    expect(output.split("\n").slice(-2)).toEqual([
      "Suggested categories:",
      "  travel -> archive: Bookings and itineraries (e.g. 4, 9)",
    ]);
  });
});

describe("formatComparison", () => {
  const report: ComparisonReport = {
    kind: "comparison",
    runId: "run-2",
    modelA: "anthropic/a",
    modelB: "openai/b",
    rows: [
      { messageId: "1", subject: "Invoice", categoryA: "receipts", categoryB: "receipts", agree: true },
      { messageId: "2", subject: "Promo", categoryA: "spam", categoryB: "newsletters", agree: false },
      { messageId: "3", subject: "Hi", categoryA: "urgent", categoryB: "urgent", agree: true },
    ],
    agreed: 2,
    total: 3,
    usage: [],
  };

  it("marks disagreements and reports the agreement rate", () => {
    expect(formatComparison(report).split("\n")).toEqual([
      "Comparing anthropic/a (A) with openai/b (B)",
      `  ${"Invoice".padEnd(50)}  A: receipts  B: receipts`,
      `≠ ${"Promo".padEnd(50)}  A: spam  B: newsletters`,
      `  ${"Hi".padEnd(50)}  A: urgent  B: urgent`,
      "Agreement: 2/3 (67%)",
    ]);
  });

  it("reports zero agreement for an empty comparison", () => {
    expect(formatComparison({ ...report, rows: [], agreed: 0, total: 0 }, true)).toBe(
      "Comparing anthropic/a (A) with openai/b (B)\nAgreement: 0/0 (0%)"
    );
  });
});

describe("formatUsage", () => {
  it("notes providers that report no token counts", () => {
    expect(
      formatUsage([
        {
          provider: "local",
          model: "llama",
          inputTokens: 0,
          outputTokens: 0,
          requestCount: 2,
          usageTracked: false,
        },
      ])
    ).toBe("Token usage:\n  local/llama: 2 request(s), usage not reported");
  });
});

describe("formatRules", () => {
  it("shows each category with its action", () => {
    expect(formatRules(createTestRuleSet()).split("\n")).toEqual([
      "newsletters -> move to Newsletters",
      "    Mailing lists and digests",
      "receipts -> archive",
      "    Purchase receipts",
      "urgent -> star",
      "    Needs attention today",
      "spam -> trash",
      "    Unwanted mail",
      "unclassified -> none",
      "    Fits no other category, or could not be classified.",
    ]);
  });
});

describe("formatLabels", () => {
  it("sorts labels", () => {
    expect(formatLabels(new Set(["Work", "INBOX", "Archive"]))).toBe("Archive\nINBOX\nWork");
  });
});
