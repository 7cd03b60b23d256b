import { describe, it, expect } from "vitest";
import type { LLMResponse } from "../../../src/core/llm/provider.js";
import { Comparator } from "../../../src/triage/comparator.js";
import { Classifier } from "../../../src/triage/classifier.js";
import { UsageTracker } from "../../../src/core/llm/usage.js";
import {
  createMockLogger,
  createMockProvider,
  createModelSelection,
} from "../../helpers/mocks.js";
import {
  createClassificationResponse,
  createTestMessages,
  createTestRuleSet,
} from "../../helpers/fixtures.js";

describe("Comparator", () => {
  it("classifies each message once per model and reports agreement", async () => {
    const providerA = createMockProvider({
      name: "alpha",
      responses: [
        createClassificationResponse([
          { id: "1", category: "spam", confidence: 0.9 },
          { id: "2", category: "receipts", confidence: 0.7 },
          { id: "3", category: "urgent" },
        ]),
      ],
    });
    const providerB = createMockProvider({
      name: "beta",
      responses: [
        createClassificationResponse([
          { id: "1", category: "spam", confidence: 0.6 },
          { id: "2", category: "newsletters" },
          { id: "3", category: "urgent" },
        ]),
      ],
    });
    const logger = createMockLogger();
    const usage = new UsageTracker();
    const comparator = new Comparator(new Classifier(logger, usage), logger);

    const result = await comparator.compare(
      createTestMessages(3),
      createTestRuleSet(),
      createModelSelection(providerA, "a-model"),
      createModelSelection(providerB, "b-model")
    );

    expect(providerA.chatMock).toHaveBeenCalledTimes(1);
    expect(providerB.chatMock).toHaveBeenCalledTimes(1);
    expect(result.modelA).toBe("alpha/a-model");
    expect(result.modelB).toBe("beta/b-model");
    expect(result.rows[0]).toEqual({
      messageId: "1",
      subject: "Test message 1",
      categoryA: "spam",
      categoryB: "spam",
      confidenceA: 0.9,
      confidenceB: 0.6,
      agree: true,
    });
    expect(result.rows.map((r) => r.agree)).toEqual([true, false, true]);
    expect(result.agreed).toBe(2);
    expect(result.total).toBe(3);
    expect(usage.summary().map((u) => u.model).sort()).toEqual(["a-model", "b-model"]);
  });

  it("runs the second model only after the first has finished", async () => {
    const calls: string[] = [];
    let inFlight = 0;
    let maxInFlight = 0;
    const respond = (name: string) => async (): Promise<LLMResponse> => {
      calls.push(name);
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return createClassificationResponse([]);
    };
    const providerA = createMockProvider({ name: "alpha", respond: respond("alpha") });
    const providerB = createMockProvider({ name: "beta", respond: respond("beta") });
    const logger = createMockLogger();
    const classifier = new Classifier(logger, new UsageTracker(), { batchSize: 1, concurrency: 1 });

    await new Comparator(classifier, logger).compare(
      createTestMessages(2),
      createTestRuleSet(),
      createModelSelection(providerA),
      createModelSelection(providerB)
    );

    expect(calls).toEqual(["alpha", "alpha", "beta", "beta"]);
    expect(maxInFlight).toBe(1);
  });
});
