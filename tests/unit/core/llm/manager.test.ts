import { describe, it, expect, beforeEach, vi } from "vitest";
import { ProviderManager } from "../../../../src/core/llm/manager.js";
import { ConfigError } from "../../../../src/core/errors.js";
import { parseConfig } from "../../../../src/utils/config.js";
import { createMockLogger, createMockProvider } from "../../../helpers/mocks.js";

function createLLMConfig(overrides: Record<string, unknown> = {}) {
  return parseConfig({
    imap: { user: "user@example.com", password: "test-password" },
    llm: {
      default_provider: "anthropic",
      default_model: "claude-sonnet-4-5",
      providers: {
        anthropic: {
          type: "anthropic",
          api_key: "test-key",
          models: ["claude-sonnet-4-5", "claude-haiku-4-5", "claude-opus-4-1"],
        },
        openai: {
          type: "openai_compat",
          api_key: "test-key",
          base_url: "https://api.openai.com/v1",
          models: ["gpt-4o", "gpt-4o-mini"],
        },
        ollama: {
          type: "openai_compat",
          api_key: "ollama",
          base_url: "http://localhost:11434/v1",
        },
      },
      ...overrides,
    },
  }).llm;
}

describe("ProviderManager", () => {
  let manager: ProviderManager;

  beforeEach(() => {
    manager = new ProviderManager(createLLMConfig(), createMockLogger());
  });

  it("resolves the default model when none is requested", () => {
    const selection = manager.resolve();
    expect(selection.id).toBe("anthropic/claude-sonnet-4-5");
    expect(selection.provider.name).toBe("anthropic");
    expect(selection.model).toBe("claude-sonnet-4-5");
  });

  it("resolves provider/model ids", () => {
    const selection = manager.resolve("openai/gpt-4o-mini");
    expect(selection.provider.name).toBe("openai");
    expect(selection.model).toBe("gpt-4o-mini");
  });

  it("resolves bare model names against the default provider", () => {
    expect(manager.resolve("claude-haiku-4-5").id).toBe("anthropic/claude-haiku-4-5");
  });

  it("expands built-in aliases", () => {
    expect(manager.resolve("haiku").id).toBe("anthropic/claude-haiku-4-5");
    expect(manager.resolve("opus").id).toBe("anthropic/claude-opus-4-1");
  });

  it("expands user-defined aliases", () => {
    const withAlias = new ProviderManager(
      createLLMConfig({ aliases: { fast: "openai/gpt-4o-mini" } }),
      createMockLogger()
    );
    expect(withAlias.resolve("fast").id).toBe("openai/gpt-4o-mini");
  });

  it("accepts any model for a provider that declares none", () => {
    expect(manager.resolve("ollama/llama3.1:8b").model).toBe("llama3.1:8b");
  });

  it("keeps slashes in model names of providers that use them", () => {
    // "meta" is not a configured provider, so the whole id is a model name.
    const selection = manager.resolve("ollama/meta/llama3");
    expect(selection.provider.name).toBe("ollama");
    expect(selection.model).toBe("meta/llama3");
  });

  it("throws ConfigError for a model the provider does not offer", () => {
    expect(() => manager.resolve("openai/gpt-5-turbo")).toThrow(ConfigError);
    expect(() => manager.resolve("openai/gpt-5-turbo")).toThrow(
      'Model "gpt-5-turbo" is not available for provider "openai"'
    );
  });

  it("throws ConfigError when the default provider is not configured", () => {
    const broken = new ProviderManager(
      createLLMConfig({ default_provider: "missing" }),
      createMockLogger()
    );
    expect(() => broken.resolve()).toThrow('Provider "missing"');
  });

  it("builds providers through the injected factory", () => {
    const factory = vi.fn((name: string) => createMockProvider({ name }));
    const injected = new ProviderManager(createLLMConfig(), createMockLogger(), factory);
    expect(factory).toHaveBeenCalledTimes(3);
    expect(injected.resolve("openai/gpt-4o").provider.name).toBe("openai");
  });
});
