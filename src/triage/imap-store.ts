import { ImapFlow } from "imapflow";
import type { FetchMessageObject, ListResponse, SearchObject } from "imapflow";
import { simpleParser } from "mailparser";
import { TransportError } from "../core/errors.js";
import type { AppConfig } from "../utils/config.js";
import type { Logger } from "../utils/logger.js";
import { shorten } from "../utils/text.js";
import type { ApplyResult, MessageStore } from "./store.js";
import type { FetchCriteria, MailAction, Message } from "./types.js";

const EXCERPT_LENGTH = 500;
const DAY_MS = 24 * 60 * 60 * 1000;

type ImapConfig = AppConfig["imap"];

/**
 * MessageStore over IMAP. Message ids are UIDs in the mailbox last fetched
 * from. Gmail labels appear as IMAP mailboxes, so "move" is a label change.
 */
export class ImapMessageStore implements MessageStore {
  private config: ImapConfig;
  private logger: Logger;
  private client: ImapFlow | null = null;
  private mailboxes: ListResponse[] | null = null;
  private activeMailbox: string;

  constructor(config: ImapConfig, logger: Logger) {
    this.config = config;
    this.logger = logger;
    this.activeMailbox = config.mailbox;
  }

  get mailbox(): string {
    return this.activeMailbox;
  }

  async connect(): Promise<void> {
    if (this.client) return;

    const client = new ImapFlow({
      host: this.config.host,
      port: this.config.port,
      secure: this.config.tls,
      auth: { user: this.config.user, pass: this.config.password },
      logger: false,
      connectionTimeout: this.config.connection_timeout_ms,
      greetingTimeout: this.config.connection_timeout_ms,
      socketTimeout: this.config.socket_timeout_ms,
    });

    try {
      await client.connect();
    } catch (err) {
      throw new TransportError("connect", describe(err), { cause: err });
    }

    this.client = client;
    this.logger.info({ host: this.config.host, user: this.config.user }, "IMAP connected");
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.mailboxes = null;
    if (!client) return;

    try {
      await client.logout();
    } catch (err) {
      this.logger.warn({ error: err }, "IMAP logout failed");
    }
  }

  async listLabels(): Promise<ReadonlySet<string>> {
    const mailboxes = await this.listMailboxes(true);
    return new Set(
      mailboxes.filter((m) => !m.flags.has("\\Noselect")).map((m) => m.path)
    );
  }

  async fetchMessages(criteria: FetchCriteria): Promise<Message[]> {
    const client = this.requireClient("fetch messages");
    const mailbox = criteria.label ?? this.config.mailbox;

    const lock = await client
      .getMailboxLock(mailbox, { readOnly: true })
      .catch((err: unknown) => {
        throw new TransportError("fetch messages", `cannot open ${mailbox}: ${describe(err)}`, {
          cause: err,
        });
      });

    try {
      this.activeMailbox = mailbox;

      const query: SearchObject = { since: new Date(Date.now() - criteria.sinceDays * DAY_MS) };
      if (!criteria.includeRead) query.seen = false;

      const found = await client.search(query, { uid: true });
      const excluded = criteria.excludeIds ?? new Set<string>();
      const uids = (Array.isArray(found) ? found : [])
        .filter((uid) => !excluded.has(String(uid)))
        .sort((a, b) => a - b)
        .slice(-criteria.limit);

      if (uids.length === 0) return [];

      const messages: Message[] = [];
      for await (const msg of client.fetch(
        uids,
        { uid: true, envelope: true, flags: true, labels: true, source: true },
        { uid: true }
      )) {
        try {
          messages.push(await toMessage(msg));
        } catch (err) {
          this.logger.warn({ error: err, uid: msg.uid }, "Skipping message that failed to parse");
        }
      }

      messages.sort((a, b) => Number(a.id) - Number(b.id));
      this.logger.info({ mailbox, found: uids.length, parsed: messages.length }, "Fetched messages");
      return messages;
    } catch (err) {
      if (err instanceof TransportError) throw err;
      throw new TransportError("fetch messages", describe(err), { cause: err });
    } finally {
      lock.release();
    }
  }

  async applyAction(messageId: string, action: MailAction): Promise<ApplyResult> {
    if (action.kind === "none") return { changed: false };

    const operation = `${action.kind} ${messageId}`;
    const client = this.requireClient(operation);
    const destination = action.kind === "star" ? null : await this.destinationFor(action);

    const lock = await client
      .getMailboxLock(this.activeMailbox)
      .catch((err: unknown) => {
        throw new TransportError(operation, describe(err), { cause: err });
      });

    try {
      const current = await client.fetchOne(messageId, { uid: true, flags: true }, { uid: true });
      if (!current) {
        // Already moved, trashed or archived away from this mailbox.
        return { changed: false };
      }

      if (action.kind === "star") {
        if (current.flags?.has("\\Flagged")) return { changed: false };
        await client.messageFlagsAdd(messageId, ["\\Flagged"], { uid: true });
        return { changed: true };
      }

      if (destination === this.activeMailbox) return { changed: false };

      if (destination === null) {
        // Gmail: removing the current label archives the message.
        await client.messageDelete(messageId, { uid: true });
      } else {
        await client.messageMove(messageId, destination, { uid: true });
      }
      return { changed: true };
    } catch (err) {
      if (err instanceof TransportError) throw err;
      throw new TransportError(operation, describe(err), { cause: err });
    } finally {
      lock.release();
    }
  }

  /** Target mailbox for move, trash and archive; null means "drop the current label". */
  private async destinationFor(
    action: Exclude<MailAction, { kind: "none" } | { kind: "star" }>
  ): Promise<string | null> {
    switch (action.kind) {
      case "move":
        return action.target;
      case "trash": {
        if (this.config.trash_mailbox) return this.config.trash_mailbox;
        const trash = await this.specialUse("\\Trash");
        if (!trash) throw new TransportError("trash", "no trash mailbox found");
        return trash;
      }
      case "archive": {
        if (this.config.archive_mailbox) return this.config.archive_mailbox;
        const archive = await this.specialUse("\\Archive");
        if (archive) return archive;
        if (await this.specialUse("\\All")) return null;
        throw new TransportError("archive", "no archive mailbox found");
      }
    }
  }

  private async specialUse(flag: string): Promise<string | undefined> {
    const mailboxes = await this.listMailboxes(false);
    return mailboxes.find((m) => m.specialUse === flag)?.path;
  }

  private async listMailboxes(refresh: boolean): Promise<ListResponse[]> {
    if (this.mailboxes && !refresh) return this.mailboxes;
    const client = this.requireClient("list labels");
    try {
      this.mailboxes = await client.list();
    } catch (err) {
      throw new TransportError("list labels", describe(err), { cause: err });
    }
    return this.mailboxes;
  }

  private requireClient(operation: string): ImapFlow {
    if (!this.client) throw new TransportError(operation, "not connected");
    return this.client;
  }
}

async function toMessage(msg: FetchMessageObject): Promise<Message> {
  const flags = msg.flags ?? new Set<string>();
  const envelope = msg.envelope;
  const parsed = msg.source ? await simpleParser(msg.source) : undefined;

  const envelopeFrom = envelope?.from?.[0];
  const sender =
    parsed?.from?.text ??
    (envelopeFrom
      ? envelopeFrom.name
        ? `${envelopeFrom.name} <${envelopeFrom.address ?? ""}>`
        : envelopeFrom.address ?? "unknown"
      : "unknown");

  const text = parsed?.text ?? (parsed?.html ? stripTags(parsed.html) : "");

  return {
    id: String(msg.uid),
    sender,
    subject: parsed?.subject ?? envelope?.subject ?? "(no subject)",
    date: parsed?.date ?? envelope?.date ?? null,
    excerpt: shorten(text, EXCERPT_LENGTH),
    labels: Array.from(msg.labels ?? []),
    isRead: flags.has("\\Seen"),
    isStarred: flags.has("\\Flagged"),
    hasAttachments: (parsed?.attachments.length ?? 0) > 0,
  };
}

function stripTags(html: string): string {
  return html.replace(/<style[\s\S]*?<\/style>/gi, " ").replace(/<[^>]+>/g, " ");
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
