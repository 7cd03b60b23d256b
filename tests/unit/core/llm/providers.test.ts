import { describe, it, expect, vi, beforeEach } from "vitest";

const mockMessagesCreate = vi.fn();
const mockCompletionsCreate = vi.fn();

vi.mock("@anthropic-ai/sdk", () => ({
  default: vi.fn().mockImplementation(() => ({
    messages: { create: mockMessagesCreate },
  })),
}));

vi.mock("openai", () => ({
  default: vi.fn().mockImplementation(() => ({
    chat: { completions: { create: mockCompletionsCreate } },
  })),
}));

import { AnthropicProvider } from "../../../../src/core/llm/anthropic.js";
import { OpenAICompatProvider } from "../../../../src/core/llm/openai-compat.js";

const params = {
  model: "test-model",
  system: "Classify.",
  messages: [{ role: "user" as const, content: "[]" }],
  maxTokens: 512,
  json: true,
};

describe("AnthropicProvider", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("sends the system prompt separately and joins text blocks", async () => {
    mockMessagesCreate.mockResolvedValue({
      content: [
        { type: "text", text: '{"classifications":' },
        { type: "text", text: " []}" },
      ],
      stop_reason: "end_turn",
      usage: { input_tokens: 120, output_tokens: 30 },
    });

    const provider = new AnthropicProvider("test-key");
    const response = await provider.chat(params);

    expect(mockMessagesCreate).toHaveBeenCalledWith(
      {
        model: "test-model",
        max_tokens: 512,
        system: "Classify.",
        messages: [{ role: "user", content: "[]" }],
      },
      { signal: undefined }
    );
    expect(response).toEqual({
      text: '{"classifications": []}',
      stopReason: "end_turn",
      usage: { inputTokens: 120, outputTokens: 30 },
      model: "test-model",
      provider: "anthropic",
    });
  });

  it("maps a max_tokens stop and empty content", async () => {
    mockMessagesCreate.mockResolvedValue({
      content: [],
      stop_reason: "max_tokens",
      usage: { input_tokens: 1, output_tokens: 512 },
    });

    const response = await new AnthropicProvider("test-key").chat(params);
    expect(response.text).toBeNull();
    expect(response.stopReason).toBe("max_tokens");
  });
});

describe("OpenAICompatProvider", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("requests JSON output when the backend supports it", async () => {
    mockCompletionsCreate.mockResolvedValue({
      choices: [{ message: { content: "{}" }, finish_reason: "stop" }],
      usage: { prompt_tokens: 80, completion_tokens: 20 },
    });

    const provider = new OpenAICompatProvider({ apiKey: "test-key", name: "openai" });
    const response = await provider.chat(params);

    expect(mockCompletionsCreate).toHaveBeenCalledWith(
      {
        model: "test-model",
        messages: [
          { role: "system", content: "Classify." },
          { role: "user", content: "[]" },
        ],
        max_tokens: 512,
        response_format: { type: "json_object" },
      },
      { signal: undefined }
    );
    expect(response.usage).toEqual({ inputTokens: 80, outputTokens: 20 });
    expect(response.provider).toBe("openai");
  });

  it("omits response_format when JSON mode is disabled", async () => {
    mockCompletionsCreate.mockResolvedValue({
      choices: [{ message: { content: "{}" }, finish_reason: "stop" }],
    });

    const provider = new OpenAICompatProvider({
      apiKey: "ollama",
      name: "ollama",
      capabilities: { json_mode: false },
    });
    const response = await provider.chat(params);

    const [request] = mockCompletionsCreate.mock.calls[0]!;
    expect(request).not.toHaveProperty("response_format");
    expect(response.usage).toEqual({ inputTokens: null, outputTokens: null });
  });

  it("maps finish_reason length to max_tokens", async () => {
    mockCompletionsCreate.mockResolvedValue({
      choices: [{ message: { content: '{"classifications": [' }, finish_reason: "length" }],
      usage: { prompt_tokens: 1, completion_tokens: 512 },
    });

    const response = await new OpenAICompatProvider({ apiKey: "test-key", name: "openai" }).chat(params);
    expect(response.stopReason).toBe("max_tokens");
  });
});
