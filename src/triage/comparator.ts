import type { ModelSelection } from "../core/llm/manager.js";
import type { Logger } from "../utils/logger.js";
import type { Classifier } from "./classifier.js";
import { UNCLASSIFIED } from "./types.js";
import type { ComparisonRow, Message, RuleSet } from "./types.js";

export interface ComparisonResult {
  modelA: string;
  modelB: string;
  rows: ComparisonRow[];
  agreed: number;
  total: number;
}

/**
 * Classifies the same messages with two models side by side.
 * Read-only: it has no access to the mailbox.
 */
export class Comparator {
  private classifier: Classifier;
  private logger: Logger;

  constructor(classifier: Classifier, logger: Logger) {
    this.classifier = classifier;
    this.logger = logger;
  }

  async compare(
    messages: readonly Message[],
    ruleSet: RuleSet,
    modelA: ModelSelection,
    modelB: ModelSelection
  ): Promise<ComparisonResult> {
    // One model at a time so the classifier's concurrency limit holds.
    const a = await this.classifier.classify(messages, ruleSet, modelA);
    const b = await this.classifier.classify(messages, ruleSet, modelB);

    const byIdA = new Map(a.map((c) => [c.messageId, c]));
    const byIdB = new Map(b.map((c) => [c.messageId, c]));

    const rows = messages.map((m): ComparisonRow => {
      const left = byIdA.get(m.id);
      const right = byIdB.get(m.id);
      const categoryA = left?.category ?? UNCLASSIFIED;
      const categoryB = right?.category ?? UNCLASSIFIED;
      return {
        messageId: m.id,
        subject: m.subject,
        categoryA,
        categoryB,
        ...(left?.confidence !== undefined ? { confidenceA: left.confidence } : {}),
        ...(right?.confidence !== undefined ? { confidenceB: right.confidence } : {}),
        agree: categoryA === categoryB,
      };
    });

    const agreed = rows.filter((r) => r.agree).length;
    this.logger.info(
      { modelA: modelA.id, modelB: modelB.id, agreed, total: rows.length },
      "Model comparison finished"
    );

    return { modelA: modelA.id, modelB: modelB.id, rows, agreed, total: rows.length };
  }
}
