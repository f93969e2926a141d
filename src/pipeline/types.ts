import type { ErrorKind } from "../errors.js";
import type { DraftMessage, FetchedMessage } from "../imap/types.js";

/**
 * Per-message lifecycle. `persisted` and `failed` are terminal.
 */
export type MessageState = "fetched" | "analyzed" | "drafted" | "persisted" | "failed";

export interface MessageFailure {
  /** Composite id of the message */
  id: string;
  /** State the message was in when the failing step ran */
  stage: Exclude<MessageState, "persisted" | "failed">;
  /** "unknown" for errors outside the taxonomy */
  kind: ErrorKind | "unknown";
  reason: string;
}

export interface MessageOutcome {
  id: string;
  subject: string;
  state: "persisted" | "failed";
  /** Every state the message passed through, in order */
  history: MessageState[];
  draftId?: string;
  failure?: MessageFailure;
}

export interface RunReport {
  fetched: number;
  succeeded: number;
  failed: number;
  failures: MessageFailure[];
  outcomes: MessageOutcome[];
}

/**
 * Structured logger the pipeline writes to. PinoLogger satisfies it.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Optional callbacks for presenting progress (the CLI prints from these).
 */
export interface PipelineObserver {
  onFetched?(messages: readonly FetchedMessage[]): void;
  onMessageStart?(message: FetchedMessage, index: number, total: number): void;
  onDraftComposed?(message: FetchedMessage, draft: DraftMessage): void;
  onOutcome?(outcome: MessageOutcome): void;
}
