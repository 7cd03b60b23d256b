import type { UsageSummary } from "../core/llm/usage.js";
import { UNCLASSIFIED, describeAction } from "../triage/types.js";
import type {
  ComparisonReport,
  Message,
  RuleSet,
  RunReport,
} from "../triage/types.js";
import { truncate } from "../utils/text.js";

const SUBJECT_WIDTH = 50;

function pad(text: string, width: number): string {
  return truncate(text, width).padEnd(width);
}

function percent(part: number, total: number): string {
  return total === 0 ? "0%" : `${Math.round((part / total) * 100)}%`;
}

export function formatMessages(messages: readonly Message[]): string {
  if (messages.length === 0) return "No messages found.";

  const lines = messages.map((m) => {
    const marks = `${m.isRead ? " " : "*"}${m.isStarred ? "!" : " "}`;
    const date = m.date ? m.date.toISOString().slice(0, 16).replace("T", " ") : "".padEnd(16);
    return `${marks} ${m.id.padStart(6)}  ${date}  ${pad(m.sender, 30)}  ${truncate(m.subject, SUBJECT_WIDTH)}`;
  });
  return [`${messages.length} message(s):`, ...lines].join("\n");
}

export function formatRules(ruleSet: RuleSet): string {
  return ruleSet.categories
    .map((c) => {
      const action = describeAction({ action: c.action, targetFolder: c.targetFolder });
      const age = c.olderThanMinutes !== undefined ? `, older than ${c.olderThanMinutes} min` : "";
      const description = c.description ? `\n    ${c.description}` : "";
      return `${c.name} -> ${action}${age}${description}`;
    })
    .join("\n");
}

export function formatLabels(labels: ReadonlySet<string>): string {
  return Array.from(labels).sort().join("\n");
}

export function formatUsage(usage: readonly UsageSummary[]): string {
  if (usage.length === 0) return "";
  const lines = usage.map((u) =>
    u.usageTracked
      ? `  ${u.provider}/${u.model}: ${u.requestCount} request(s), ${u.inputTokens} in / ${u.outputTokens} out tokens`
      : `  ${u.provider}/${u.model}: ${u.requestCount} request(s), usage not reported`
  );
  return ["Token usage:", ...lines].join("\n");
}

export function formatRunReport(report: RunReport, quiet = false): string {
  const lines: string[] = [];
  const heading = report.mode === "dry_run" ? "Dry run" : "Run";
  lines.push(`${heading} ${report.runId} with ${report.model}`);

  if (!quiet) {
    for (const entry of report.entries) {
      const confidence =
        entry.confidence !== undefined ? ` (${Math.round(entry.confidence * 100)}%)` : "";
      const detail = entry.detail ? `: ${entry.detail}` : "";
      lines.push(
        `  ${pad(entry.subject, SUBJECT_WIDTH)}  ${entry.category}${confidence}  [${entry.outcome}${detail}]`
      );
      if (entry.suggestedCategory && entry.category === UNCLASSIFIED) {
        lines.push(`      suggested: ${entry.suggestedCategory}`);
      }
    }
  }

  const s = report.summary;
  lines.push(
    `Total ${s.total}: ${s.applied} applied, ${s.simulated} simulated, ${s.skipped} skipped, ${s.failed} failed`
  );

  if (report.suggestions.length > 0) {
    lines.push("Suggested categories:");
    for (const suggestion of report.suggestions) {
      lines.push(
        `  ${suggestion.name} -> ${suggestion.suggestedAction}: ${suggestion.description}` +
          (suggestion.exampleIds.length > 0 ? ` (e.g. ${suggestion.exampleIds.join(", ")})` : "")
      );
    }
  }

  const usage = formatUsage(report.usage);
  if (usage) lines.push(usage);
  return lines.join("\n");
}

export function formatComparison(report: ComparisonReport, quiet = false): string {
  const lines = [`Comparing ${report.modelA} (A) with ${report.modelB} (B)`];

  if (!quiet) {
    for (const row of report.rows) {
      const mark = row.agree ? " " : "≠";
      lines.push(`${mark} ${pad(row.subject, SUBJECT_WIDTH)}  A: ${row.categoryA}  B: ${row.categoryB}`);
    }
  }

  lines.push(
    `Agreement: ${report.agreed}/${report.total} (${percent(report.agreed, report.total)})`
  );
  const usage = formatUsage(report.usage);
  if (usage) lines.push(usage);
  return lines.join("\n");
}
