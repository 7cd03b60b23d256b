/** Provider-agnostic LLM types and interface. */

export interface LLMMessage {
  role: "user" | "assistant";
  content: string;
}

export interface LLMUsage {
  inputTokens: number | null;
  outputTokens: number | null;
}

export interface LLMResponse {
  text: string | null;
  stopReason: "end_turn" | "max_tokens";
  usage: LLMUsage;
  model: string;
  provider: string;
}

export interface LLMChatParams {
  model: string;
  system: string;
  messages: LLMMessage[];
  maxTokens?: number;
  /** Ask the backend to constrain output to a JSON object, where supported. */
  json?: boolean;
  signal?: AbortSignal;
}

export interface LLMProvider {
  readonly name: string;
  readonly capabilities: ProviderCapabilities;
  chat(params: LLMChatParams): Promise<LLMResponse>;
}

export interface ProviderCapabilities {
  usageMetrics: boolean;
  jsonMode: boolean;
}
