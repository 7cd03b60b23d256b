import { readFileSync, existsSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigError } from "../core/errors.js";

const ProviderCapabilitiesSchema = z.object({
  usage_metrics: z.boolean().optional(),
  json_mode: z.boolean().optional(),
});

const ProviderConfigSchema = z.object({
  type: z.enum(["anthropic", "openai_compat"]),
  api_key: z.string().min(1),
  base_url: z.string().optional(),
  models: z.array(z.string()).default([]),
  default_headers: z.record(z.string()).optional(),
  capabilities: ProviderCapabilitiesSchema.optional(),
});

const RetrySchema = z.object({
  attempts: z.number().int().min(1).max(10),
  base_delay_ms: z.number().int().min(0),
  max_delay_ms: z.number().int().min(0),
});

const LLMConfigSchema = z.object({
  default_provider: z.string(),
  default_model: z.string(),
  providers: z.record(ProviderConfigSchema),
  aliases: z.record(z.string()).default({}),
  max_tokens: z.number().int().positive().default(1024),
  batch_size: z.number().int().min(1).max(100).default(20),
  concurrency: z.number().int().min(1).max(16).default(3),
  timeout_ms: z.number().int().min(0).default(60_000),
  retry: RetrySchema.default({ attempts: 3, base_delay_ms: 500, max_delay_ms: 8_000 }),
});

const ImapConfigSchema = z.object({
  host: z.string().default("imap.gmail.com"),
  port: z.number().int().default(993),
  tls: z.boolean().default(true),
  user: z.string().min(1),
  password: z.string().min(1),
  mailbox: z.string().default("INBOX"),
  trash_mailbox: z.string().optional(),
  archive_mailbox: z.string().optional(),
  connection_timeout_ms: z.number().int().positive().default(30_000),
  socket_timeout_ms: z.number().int().positive().default(120_000),
});

const FetchConfigSchema = z.object({
  days_back: z.number().int().min(1).default(1),
  max_emails: z.number().int().min(1).default(50),
  unread_only: z.boolean().default(true),
  skip_starred: z.boolean().default(true),
});

const ExecutionConfigSchema = z.object({
  timeout_ms: z.number().int().min(0).default(30_000),
  retry: RetrySchema.default({ attempts: 3, base_delay_ms: 200, max_delay_ms: 2_000 }),
});

export const CategoryConfigSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  action: z.enum(["none", "star", "flag", "move", "trash", "archive"]).default("none"),
  target_folder: z.string().min(1).optional(),
  older_than_minutes: z.number().int().min(0).optional(),
});

const TriageConfigSchema = z.object({
  system_prompt: z.string().optional(),
  suggestions_prompt: z.string().optional(),
  categories: z.array(CategoryConfigSchema).default([]),
});

const AppConfigSchema = z.object({
  imap: ImapConfigSchema,
  llm: LLMConfigSchema,
  fetch: FetchConfigSchema.default({}),
  execution: ExecutionConfigSchema.default({}),
  triage: TriageConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type ProviderCapabilitiesConfig = z.infer<typeof ProviderCapabilitiesSchema>;
export type CategoryConfig = z.infer<typeof CategoryConfigSchema>;
export type RetryConfig = z.infer<typeof RetrySchema>;

export function defaultConfigPath(): string {
  return (
    process.env.MAILSIFT_CONFIG ??
    join(homedir(), ".config", "mailsift", "config.yaml")
  );
}

/** Directory holding the config file; the processed ledger lives beside it. */
export function configDir(configPath?: string): string {
  return dirname(configPath ?? defaultConfigPath());
}

/**
 * Load configuration from a YAML file with environment variable overrides.
 * Env vars take precedence over YAML values for credentials.
 * Throws ConfigError when the file is unreadable or fails validation.
 */
export function loadConfig(configPath?: string): AppConfig {
  const path = configPath ?? defaultConfigPath();

  let rawConfig: Record<string, unknown> = {};

  if (existsSync(path)) {
    const fileContent = readFileSync(path, "utf-8");
    let parsed: unknown;
    try {
      parsed = yaml.load(fileContent);
    } catch (err) {
      throw new ConfigError(
        `Config file ${path} is not valid YAML`,
        [err instanceof Error ? err.message : String(err)]
      );
    }
    if (parsed !== undefined && parsed !== null) {
      if (!isRecord(parsed)) {
        throw new ConfigError(`Config file ${path} must contain a mapping`);
      }
      rawConfig = parsed;
    }
  }

  applyEnvOverrides(rawConfig);

  return parseConfig(rawConfig);
}

export function parseConfig(raw: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      "Invalid configuration",
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
      )
    );
  }
  return result.data;
}

function applyEnvOverrides(config: Record<string, unknown>): void {
  const imap = ensureObject(config, "imap");
  const llm = ensureObject(config, "llm");
  const providers = ensureObject(llm, "providers");

  if (process.env.MAILSIFT_IMAP_USER) imap.user = process.env.MAILSIFT_IMAP_USER;
  if (process.env.MAILSIFT_IMAP_PASSWORD) {
    imap.password = process.env.MAILSIFT_IMAP_PASSWORD;
  }

  if (process.env.ANTHROPIC_API_KEY) {
    const anthropic = ensureObject(providers, "anthropic");
    anthropic.api_key = process.env.ANTHROPIC_API_KEY;
    if (!anthropic.type) anthropic.type = "anthropic";
    if (!llm.default_provider) llm.default_provider = "anthropic";
    if (!llm.default_model) llm.default_model = "claude-sonnet-4-5";
  }

  if (process.env.OPENAI_API_KEY) {
    const openai = ensureObject(providers, "openai");
    openai.api_key = process.env.OPENAI_API_KEY;
    if (!openai.type) openai.type = "openai_compat";
    if (!openai.base_url) openai.base_url = "https://api.openai.com/v1";
  }

  if (process.env.OPENROUTER_API_KEY) {
    const openrouter = ensureObject(providers, "openrouter");
    openrouter.api_key = process.env.OPENROUTER_API_KEY;
    if (!openrouter.type) openrouter.type = "openai_compat";
    if (!openrouter.base_url) openrouter.base_url = "https://openrouter.ai/api/v1";
  }
}

function ensureObject(
  parent: Record<string, unknown>,
  key: string
): Record<string, unknown> {
  const existing = parent[key];
  if (isRecord(existing)) return existing;
  const created: Record<string, unknown> = {};
  parent[key] = created;
  return created;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
