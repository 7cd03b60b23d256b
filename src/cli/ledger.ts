import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { z } from "zod";
import { ConfigError } from "../core/errors.js";

export const LEDGER_FILE = "processed.json";

const LedgerSchema = z.object({
  version: z.literal(1),
  mailboxes: z.record(z.array(z.string())).default({}),
});

/**
 * Message ids a live run already acted on, per mailbox. Later fetches leave
 * them out so a message is not triaged twice.
 */
export class ProcessedLedger {
  readonly path: string;
  private mailboxes: Map<string, Set<string>>;

  private constructor(path: string, mailboxes: Map<string, Set<string>>) {
    this.path = path;
    this.mailboxes = mailboxes;
  }

  static load(dir: string): ProcessedLedger {
    const path = join(dir, LEDGER_FILE);
    if (!existsSync(path)) return new ProcessedLedger(path, new Map());

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (err) {
      throw new ConfigError(`Processed ledger ${path} is not valid JSON`, [
        err instanceof Error ? err.message : String(err),
      ]);
    }

    const result = LedgerSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(
        `Processed ledger ${path} is malformed`,
        result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      );
    }

    const mailboxes = new Map<string, Set<string>>();
    for (const [mailbox, ids] of Object.entries(result.data.mailboxes)) {
      mailboxes.set(mailbox, new Set(ids));
    }
    return new ProcessedLedger(path, mailboxes);
  }

  processed(mailbox: string): ReadonlySet<string> {
    return this.mailboxes.get(mailbox) ?? new Set<string>();
  }

  record(mailbox: string, ids: readonly string[]): void {
    if (ids.length === 0) return;
    const set = this.mailboxes.get(mailbox) ?? new Set<string>();
    for (const id of ids) set.add(id);
    this.mailboxes.set(mailbox, set);
  }

  save(): void {
    const mailboxes: Record<string, string[]> = {};
    for (const [mailbox, ids] of this.mailboxes) {
      mailboxes[mailbox] = Array.from(ids).sort((a, b) => Number(a) - Number(b));
    }
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, JSON.stringify({ version: 1, mailboxes }, null, 2) + "\n");
  }
}
