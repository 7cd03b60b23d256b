import type { LLMUsage } from "./provider.js";

export interface UsageSummary {
  provider: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  requestCount: number;
  /** False when the backend reported no token counts for some request. */
  usageTracked: boolean;
}

/**
 * Tallies LLM token usage for a single run, grouped by provider+model.
 * Lives only as long as the run that owns it.
 */
export class UsageTracker {
  private groups = new Map<string, UsageSummary>();

  track(provider: string, model: string, usage: LLMUsage): void {
    const key = `${provider}:${model}`;
    const tracked = usage.inputTokens !== null || usage.outputTokens !== null;
    const existing = this.groups.get(key);

    if (existing) {
      existing.inputTokens += usage.inputTokens ?? 0;
      existing.outputTokens += usage.outputTokens ?? 0;
      existing.requestCount++;
      if (!tracked) existing.usageTracked = false;
      return;
    }

    this.groups.set(key, {
      provider,
      model,
      inputTokens: usage.inputTokens ?? 0,
      outputTokens: usage.outputTokens ?? 0,
      requestCount: 1,
      usageTracked: tracked,
    });
  }

  summary(): UsageSummary[] {
    return Array.from(this.groups.values(), (s) => ({ ...s }));
  }
}
