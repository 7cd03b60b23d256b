import OpenAI from "openai";
import type {
  LLMProvider,
  LLMChatParams,
  LLMResponse,
  ProviderCapabilities,
} from "./provider.js";
import {
  DEFAULT_OPENAI_COMPAT_CAPABILITIES,
  mergeCapabilities,
} from "./capabilities.js";
import type { ProviderCapabilitiesConfig } from "../../utils/config.js";

export interface OpenAICompatConfig {
  baseURL?: string;
  apiKey: string;
  name: string;
  defaultHeaders?: Record<string, string>;
  capabilities?: ProviderCapabilitiesConfig;
}

/** Any backend speaking the OpenAI chat completions API (OpenAI, OpenRouter, Ollama). */
export class OpenAICompatProvider implements LLMProvider {
  readonly name: string;
  readonly capabilities: ProviderCapabilities;
  private client: OpenAI;

  constructor(config: OpenAICompatConfig) {
    this.name = config.name;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      defaultHeaders: config.defaultHeaders,
      maxRetries: 0,
    });
    this.capabilities = mergeCapabilities(
      DEFAULT_OPENAI_COMPAT_CAPABILITIES,
      config.capabilities
    );
  }

  async chat(params: LLMChatParams): Promise<LLMResponse> {
    const messages: OpenAI.ChatCompletionMessageParam[] = [
      { role: "system", content: params.system },
      ...params.messages.map(
        (m): OpenAI.ChatCompletionMessageParam =>
          m.role === "user"
            ? { role: "user", content: m.content }
            : { role: "assistant", content: m.content }
      ),
    ];

    const requestParams: OpenAI.ChatCompletionCreateParamsNonStreaming = {
      model: params.model,
      messages,
      max_tokens: params.maxTokens ?? 1024,
      ...(params.json && this.capabilities.jsonMode
        ? { response_format: { type: "json_object" as const } }
        : {}),
    };

    const response = await this.client.chat.completions.create(requestParams, {
      signal: params.signal,
    });

    return this.toResponse(response, params.model);
  }

  private toResponse(
    response: OpenAI.ChatCompletion,
    model: string
  ): LLMResponse {
    const choice = response.choices[0];

    return {
      text: choice?.message.content ?? null,
      stopReason: choice?.finish_reason === "length" ? "max_tokens" : "end_turn",
      usage: {
        inputTokens: response.usage?.prompt_tokens ?? null,
        outputTokens: response.usage?.completion_tokens ?? null,
      },
      model,
      provider: this.name,
    };
  }
}
