import type { FetchCriteria, MailAction, Message } from "./types.js";

export interface ApplyResult {
  /** False when the message was already in the requested state. */
  changed: boolean;
}

/**
 * The mailbox as the pipeline sees it. One instance serves one mailbox;
 * callers must not run two pipelines against the same store concurrently.
 *
 * `applyAction` rejects with a TransportError on failure, and must treat
 * re-applying star, archive, trash or move to an already-acted message as
 * a successful no-op.
 */
export interface MessageStore {
  readonly mailbox: string;
  listLabels(): Promise<ReadonlySet<string>>;
  fetchMessages(criteria: FetchCriteria): Promise<Message[]>;
  applyAction(messageId: string, action: MailAction): Promise<ApplyResult>;
}
