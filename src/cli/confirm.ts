import { createInterface } from "node:readline";
import type { Interface } from "node:readline";
import type {
  BatchDecision,
  ConfirmationGate,
  ExecutionItem,
  ItemDecision,
} from "../triage/executor.js";
import { describeAction } from "../triage/types.js";
import { truncate } from "../utils/text.js";

type Ask = (question: string) => Promise<string>;

/** Terminal prompts for irreversible actions. Unknown answers are asked again. */
export class PromptConfirmationGate implements ConfirmationGate {
  private ask: Ask;
  private write: (line: string) => void;

  constructor(ask: Ask, write: (line: string) => void = (line) => console.log(line)) {
    this.ask = ask;
    this.write = write;
  }

  async confirmBatch(pending: readonly ExecutionItem[]): Promise<BatchDecision> {
    this.write(`\n${pending.length} action(s) cannot be undone by re-running:`);
    for (const item of pending) {
      this.write(`  ${describeItem(item)}`);
    }

    for (;;) {
      const answer = (await this.ask("Apply them? [a]ll / [e]ach / [c]ancel: ")).toLowerCase();
      if (answer === "a" || answer === "all") return "approve_all";
      if (answer === "e" || answer === "each") return "per_item";
      if (answer === "c" || answer === "cancel" || answer === "") return "cancel";
    }
  }

  async confirmItem(item: ExecutionItem, position: number, total: number): Promise<ItemDecision> {
    for (;;) {
      const answer = (
        await this.ask(`[${position}/${total}] ${describeItem(item)}? [y]es / [n]o / [c]ancel: `)
      ).toLowerCase();
      if (answer === "y" || answer === "yes") return "approve";
      if (answer === "n" || answer === "no") return "skip";
      if (answer === "c" || answer === "cancel" || answer === "") return "cancel";
    }
  }
}

function describeItem(item: ExecutionItem): string {
  return `${describeAction(item.plan)}: ${truncate(item.message.subject, 60)} (${item.message.sender})`;
}

/**
 * Readline-backed question function; call `close` when the run ends.
 * Once input ends, pending and later questions answer "".
 */
export function createReadlineAsk(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): { ask: Ask; close: () => void } {
  const rl: Interface = createInterface({ input, output });
  const pending = new Set<(answer: string) => void>();
  let closed = false;

  rl.on("close", () => {
    closed = true;
    for (const resolve of pending) resolve("");
    pending.clear();
  });

  return {
    ask: (question) =>
      new Promise((resolve) => {
        if (closed) {
          resolve("");
          return;
        }
        pending.add(resolve);
        rl.question(question, (answer) => {
          pending.delete(resolve);
          resolve(answer.trim());
        });
      }),
    close: () => rl.close(),
  };
}
