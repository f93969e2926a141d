import { analysisAgent, draftingAgent } from "../agents/configs.js";
import { parseAnalysis } from "../agents/analysis.js";
import type { AgentRuntime } from "../agents/runtime.js";
import {
  analysisTask,
  draftingTask,
  formatDraftingInput,
  formatMessageInput,
} from "../agents/tasks.js";
import { InboxDrafterError, errorMessage, isFatalError } from "../errors.js";
import type { ImapClient } from "../imap/client.js";
import { createDraft } from "../imap/drafts.js";
import { fetchMessages } from "../imap/fetch.js";
import type { FetchFilter, FetchedMessage } from "../imap/types.js";
import { composeDraft } from "./compose.js";
import type {
  Logger,
  MessageFailure,
  MessageOutcome,
  MessageState,
  PipelineObserver,
  RunReport,
} from "./types.js";

export interface PipelineOptions {
  imapClient: ImapClient;
  runtime: AgentRuntime;
  /** Address drafts are written from */
  sender: string;
  limit: number;
  folder?: string;
  filter?: FetchFilter;
  logger: Logger;
  observer?: PipelineObserver;
}

/**
 * Tracks one message through fetched → analyzed → drafted → persisted.
 */
class MessageRun {
  readonly history: MessageState[] = ["fetched"];

  constructor(readonly message: FetchedMessage) {}

  get state(): MessageState {
    return this.history[this.history.length - 1];
  }

  advance(next: MessageState): void {
    const current = this.state;
    if (current === "persisted" || current === "failed") {
      throw new Error(`Message ${this.message.id} is already ${current}`);
    }
    this.history.push(next);
  }
}

/**
 * Fetch messages, then analyze, draft and store a reply for each one in turn.
 *
 * Auth and connectivity errors abort the run and propagate. Any other error
 * marks only the current message as failed; the next message is still processed.
 * Nothing is retried, and re-running on the same mailbox may create duplicate drafts.
 */
export async function runPipeline(options: PipelineOptions): Promise<RunReport> {
  const { imapClient, runtime, sender, limit, folder, filter, logger, observer } = options;

  const messages = await fetchMessages(imapClient, { folder, filter, limit });
  logger.info(`Fetched ${messages.length} message(s)`, { folder: folder ?? "INBOX", limit });
  observer?.onFetched?.(messages);

  const outcomes: MessageOutcome[] = [];
  for (const [index, message] of messages.entries()) {
    observer?.onMessageStart?.(message, index + 1, messages.length);
    const run = new MessageRun(message);

    let outcome: MessageOutcome;
    try {
      const analysisText = await runtime.run(
        analysisAgent,
        analysisTask,
        formatMessageInput(message)
      );
      const analysis = parseAnalysis(analysisText);
      run.advance("analyzed");
      logger.debug("Message analyzed", { id: message.id, urgency: analysis.urgency });

      const draftText = await runtime.run(
        draftingAgent,
        draftingTask,
        formatDraftingInput(message, analysis)
      );
      const draft = composeDraft(message, draftText);
      run.advance("drafted");
      observer?.onDraftComposed?.(message, draft);

      const stored = await createDraft(imapClient, sender, draft);
      run.advance("persisted");
      logger.info("Draft stored", { id: message.id, draftId: stored.id, folder: stored.folder });

      outcome = {
        id: message.id,
        subject: message.subject,
        state: "persisted",
        history: [...run.history],
        draftId: stored.id,
      };
    } catch (error) {
      if (isFatalError(error)) {
        logger.error("Run aborted", { id: message.id, kind: error.kind, error: error.message });
        throw error;
      }

      const stage = run.state;
      if (stage === "persisted" || stage === "failed") {
        throw error;
      }
      const failure: MessageFailure = {
        id: message.id,
        stage,
        kind: error instanceof InboxDrafterError ? error.kind : "unknown",
        reason: errorMessage(error),
      };
      run.advance("failed");
      logger.warn("Message failed", { ...failure });

      outcome = {
        id: message.id,
        subject: message.subject,
        state: "failed",
        history: [...run.history],
        failure,
      };
    }

    outcomes.push(outcome);
    observer?.onOutcome?.(outcome);
  }

  const failures = outcomes.flatMap((o) => (o.failure ? [o.failure] : []));
  return {
    fetched: messages.length,
    succeeded: outcomes.filter((o) => o.state === "persisted").length,
    failed: failures.length,
    failures,
    outcomes,
  };
}
