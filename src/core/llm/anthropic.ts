import Anthropic from "@anthropic-ai/sdk";
import type {
  LLMProvider,
  LLMChatParams,
  LLMResponse,
  ProviderCapabilities,
} from "./provider.js";
import {
  DEFAULT_ANTHROPIC_CAPABILITIES,
  mergeCapabilities,
} from "./capabilities.js";
import type { ProviderCapabilitiesConfig } from "../../utils/config.js";

export class AnthropicProvider implements LLMProvider {
  readonly name = "anthropic";
  readonly capabilities: ProviderCapabilities;
  private client: Anthropic;

  constructor(apiKey: string, capabilityOverrides?: ProviderCapabilitiesConfig) {
    // Retries are owned by the caller's retry policy.
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
    this.capabilities = mergeCapabilities(
      DEFAULT_ANTHROPIC_CAPABILITIES,
      capabilityOverrides
    );
  }

  async chat(params: LLMChatParams): Promise<LLMResponse> {
    const messages: Anthropic.MessageParam[] = params.messages.map((m) => ({
      role: m.role,
      content: m.content,
    }));

    const response = await this.client.messages.create(
      {
        model: params.model,
        max_tokens: params.maxTokens ?? 1024,
        system: params.system,
        messages,
      },
      { signal: params.signal }
    );

    return this.toResponse(response, params.model);
  }

  private toResponse(
    response: Anthropic.Message,
    model: string
  ): LLMResponse {
    const text = response.content
      .flatMap((block) => (block.type === "text" ? [block.text] : []))
      .join("");

    return {
      text: text || null,
      stopReason: response.stop_reason === "max_tokens" ? "max_tokens" : "end_turn",
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
      model,
      provider: this.name,
    };
  }
}
