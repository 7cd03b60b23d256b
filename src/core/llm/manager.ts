import type { LLMProvider } from "./provider.js";
import type { AppConfig } from "../../utils/config.js";
import { createProvider } from "./factory.js";
import { ConfigError } from "../errors.js";
import type { Logger } from "../../utils/logger.js";

export interface ModelSelection {
  /** Canonical identifier, `provider/model`. */
  id: string;
  provider: LLMProvider;
  model: string;
}

/** Short names accepted wherever a model id is expected. */
export const BUILTIN_MODEL_ALIASES: Readonly<Record<string, string>> = {
  haiku: "anthropic/claude-haiku-4-5",
  sonnet: "anthropic/claude-sonnet-4-5",
  opus: "anthropic/claude-opus-4-1",
};

/**
 * Resolves model identifiers to configured providers.
 *
 * Accepted forms: an alias (`haiku`, or one from `llm.aliases`),
 * `provider/model` where `provider` is a configured provider name, or a
 * bare model name served by the default provider.
 */
export class ProviderManager {
  private providers: Map<string, LLMProvider> = new Map();
  private config: AppConfig["llm"];
  private aliases: Record<string, string>;
  private logger: Logger;

  constructor(
    config: AppConfig["llm"],
    logger: Logger,
    providerFactory: typeof createProvider = createProvider
  ) {
    this.config = config;
    this.aliases = { ...BUILTIN_MODEL_ALIASES, ...config.aliases };
    this.logger = logger;

    for (const [name, providerConfig] of Object.entries(config.providers)) {
      this.providers.set(name, providerFactory(name, providerConfig));
      this.logger.debug({ provider: name }, "LLM provider initialized");
    }
  }

  /** The model used when the caller names none. */
  defaultModelId(): string {
    return `${this.config.default_provider}/${this.config.default_model}`;
  }

  resolve(modelId?: string): ModelSelection {
    const requested = modelId ?? this.defaultModelId();
    const expanded = this.aliases[requested] ?? requested;

    const slash = expanded.indexOf("/");
    const prefix = slash > 0 ? expanded.slice(0, slash) : undefined;

    let providerName: string;
    let model: string;
    if (prefix !== undefined && this.providers.has(prefix)) {
      providerName = prefix;
      model = expanded.slice(slash + 1);
    } else {
      providerName = this.config.default_provider;
      model = expanded;
    }

    const provider = this.providers.get(providerName);
    if (!provider) {
      throw new ConfigError(
        `Provider "${providerName}" for model "${requested}" is not configured`
      );
    }

    const declared = this.config.providers[providerName]?.models ?? [];
    if (declared.length > 0 && !declared.includes(model)) {
      throw new ConfigError(
        `Model "${model}" is not available for provider "${providerName}". Available: ${declared.join(", ")}`
      );
    }

    return { id: `${providerName}/${model}`, provider, model };
  }
}
