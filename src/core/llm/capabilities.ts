import type { ProviderCapabilities } from "./provider.js";
import type { ProviderCapabilitiesConfig } from "../../utils/config.js";

// Anthropic has no response_format switch; JSON is requested in the prompt.
export const DEFAULT_ANTHROPIC_CAPABILITIES: ProviderCapabilities = {
  usageMetrics: true,
  jsonMode: false,
};

export const DEFAULT_OPENAI_COMPAT_CAPABILITIES: ProviderCapabilities = {
  usageMetrics: true,
  jsonMode: true,
};

/** Merge config-driven capability overrides into default capabilities. */
export function mergeCapabilities(
  defaults: ProviderCapabilities,
  overrides?: ProviderCapabilitiesConfig
): ProviderCapabilities {
  if (!overrides) return { ...defaults };
  return {
    usageMetrics: overrides.usage_metrics ?? defaults.usageMetrics,
    jsonMode: overrides.json_mode ?? defaults.jsonMode,
  };
}
