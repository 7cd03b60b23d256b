import { parseArgs } from "node:util";
import { ConfigError } from "../core/errors.js";
import { ProviderManager } from "../core/llm/manager.js";
import { ImapMessageStore } from "../triage/imap-store.js";
import { TriagePipeline, pipelineOptionsFromConfig } from "../triage/pipeline.js";
import { ruleSetFromConfig } from "../triage/rules.js";
import type { FetchCriteria, RunReport } from "../triage/types.js";
import { configDir, loadConfig } from "../utils/config.js";
import type { AppConfig } from "../utils/config.js";
import type { Logger } from "../utils/logger.js";
import { PromptConfirmationGate, createReadlineAsk } from "./confirm.js";
import {
  formatComparison,
  formatLabels,
  formatMessages,
  formatRules,
  formatRunReport,
} from "./format.js";
import { ProcessedLedger } from "./ledger.js";

export const USAGE = `Usage: mailsift <command> [options]

Commands:
  fetch      List messages that would be triaged
  process    Classify messages and apply category actions
  rules      Show configured categories
  folders    List mailbox labels/folders

Options:
  --config PATH   Config file (default: $MAILSIFT_CONFIG or ~/.config/mailsift/config.yaml)
  --days N        Look back N days
  --limit N       At most N messages
  --all           Include read messages
  --label NAME    Read from this label instead of the configured mailbox
  --dry-run       Classify and plan only; change nothing        (process)
  --yes           Apply irreversible actions without asking      (process)
  --model ID      Model id or alias                              (process)
  --compare ID    Compare --model against this model; read-only  (process)
  --quiet         Print only the summary                         (process)`;

export type Command = "fetch" | "process" | "rules" | "folders" | "help";

const COMMANDS: readonly Command[] = ["fetch", "process", "rules", "folders", "help"];

export interface CliOptions {
  command: Command;
  config?: string;
  days?: number;
  limit?: number;
  all: boolean;
  label?: string;
  dryRun: boolean;
  yes: boolean;
  model?: string;
  compare?: string;
  quiet: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  let parsed;
  try {
    parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        config: { type: "string" },
        days: { type: "string" },
        limit: { type: "string" },
        all: { type: "boolean", default: false },
        label: { type: "string" },
        "dry-run": { type: "boolean", default: false },
        yes: { type: "boolean", short: "y", default: false },
        model: { type: "string" },
        compare: { type: "string" },
        quiet: { type: "boolean", short: "q", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }

  const { values, positionals } = parsed;
  const name = values.help ? "help" : (positionals[0] ?? "help");
  const command = COMMANDS.find((c) => c === name);
  if (!command) throw new ConfigError(`Unknown command "${name}"`);

  return {
    command,
    config: values.config,
    days: positiveInt("--days", values.days),
    limit: positiveInt("--limit", values.limit),
    all: values.all,
    label: values.label,
    dryRun: values["dry-run"],
    yes: values.yes,
    model: values.model,
    compare: values.compare,
    quiet: values.quiet,
  };
}

function positiveInt(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError(`${flag} expects a positive integer, got "${value}"`);
  }
  return n;
}

export function buildCriteria(
  options: CliOptions,
  config: AppConfig,
  excludeIds?: ReadonlySet<string>
): FetchCriteria {
  return {
    sinceDays: options.days ?? config.fetch.days_back,
    limit: options.limit ?? config.fetch.max_emails,
    includeRead: options.all || !config.fetch.unread_only,
    ...(options.label ? { label: options.label } : {}),
    ...(excludeIds && excludeIds.size > 0 ? { excludeIds } : {}),
  };
}

/**
 * Ids a live run is done with: changed messages and ones whose category
 * says to leave them alone. Failed classifications and messages held back
 * by an age gate are offered again.
 */
export function processedIds(report: RunReport): string[] {
  return report.entries
    .filter(
      (e) =>
        e.outcome === "applied" &&
        !e.classificationFailed &&
        !(e.planned.action === "none" && e.planned.reason !== undefined)
    )
    .map((e) => e.messageId);
}

export async function runCli(
  argv: string[],
  logger: Logger,
  write: (text: string) => void = (text) => console.log(text)
): Promise<void> {
  const options = parseCliArgs(argv);
  if (options.command === "help") {
    write(USAGE);
    return;
  }

  const config = loadConfig(options.config);
  const ruleSet = ruleSetFromConfig(config.triage);

  if (options.command === "rules") {
    write(formatRules(ruleSet));
    return;
  }

  const store = new ImapMessageStore(config.imap, logger);
  await store.connect();
  try {
    if (options.command === "folders") {
      write(formatLabels(await store.listLabels()));
      return;
    }

    const ledger = ProcessedLedger.load(configDir(options.config));
    const mailbox = options.label ?? config.imap.mailbox;
    const criteria = buildCriteria(options, config, ledger.processed(mailbox));
    const models = new ProviderManager(config.llm, logger);
    const pipeline = new TriagePipeline(store, models, logger, pipelineOptionsFromConfig(config));

    if (options.command === "fetch") {
      write(formatMessages(await pipeline.fetch(criteria)));
      return;
    }

    const live = !options.dryRun && options.compare === undefined;
    const interactive = live && !options.yes;
    if (interactive && !process.stdin.isTTY) {
      throw new ConfigError("Live runs need --yes when not attached to a terminal");
    }

    const prompt = interactive ? createReadlineAsk() : undefined;
    try {
      const report = await pipeline.process({
        criteria,
        ruleSet,
        mode: options.dryRun ? "dry_run" : "live",
        confirm: interactive ? "interactive" : "auto",
        ...(prompt ? { gate: new PromptConfirmationGate(prompt.ask) } : {}),
        model: options.model,
        compareModels: options.compare,
        skipStarred: config.fetch.skip_starred,
      });

      if (report.kind === "comparison") {
        write(formatComparison(report, options.quiet));
        return;
      }

      write(formatRunReport(report, options.quiet));
      if (report.mode === "live") {
        ledger.record(mailbox, processedIds(report));
        ledger.save();
      }
    } finally {
      prompt?.close();
    }
  } finally {
    await store.close();
  }
}
