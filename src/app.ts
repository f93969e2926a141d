import type { AgentRuntime } from "./agents/runtime.js";
import { MastraAgentRuntime } from "./agents/runtime.js";
import type { AppConfig } from "./config.js";
import { loadConfig } from "./config.js";
import { ConfigError, InboxDrafterError, errorMessage, isFatalError } from "./errors.js";
import { ImapClient } from "./imap/client.js";
import type { ImapConfig } from "./imap/types.js";
import { createLogger } from "./logger.js";
import { runPipeline } from "./pipeline/driver.js";
import type { Logger, PipelineObserver, RunReport } from "./pipeline/types.js";

const PREVIEW_LENGTH = 500;
const RULE = "=".repeat(60);

export interface AppDependencies {
  env?: Record<string, string | undefined>;
  createImapClient?: (config: ImapConfig) => ImapClient;
  createRuntime?: (config: AppConfig) => AgentRuntime;
  createLogger?: (config: AppConfig) => Logger;
  /** Where the human-readable report goes. Default: stdout */
  print?: (line: string) => void;
  /** Where fatal diagnostics go. Default: stderr */
  printError?: (text: string) => void;
}

/**
 * Diagnostic block for a fatal error.
 */
export function formatError(label: string, err: unknown, imap?: ImapConfig): string {
  const lines = [`[inbox-drafter] ${label}`];
  if (err instanceof Error) {
    lines.push(`  Message: ${err.message}`);
    lines.push(`  Name:    ${err.name}`);
    const code: unknown = Reflect.get(err, "code");
    if (typeof code === "string") lines.push(`  Code:    ${code}`);
    if (err.cause instanceof Error) lines.push(`  Cause:   ${err.cause.message}`);
    if (!(err instanceof InboxDrafterError) && err.stack) lines.push(`  Stack:\n${err.stack}`);
  } else {
    lines.push(`  Value: ${JSON.stringify(err)}`);
  }
  lines.push(`  Time:  ${new Date().toISOString()}`);
  lines.push(`  PID:   ${process.pid}`);
  lines.push(`  Node:  ${process.version}`);
  if (imap) lines.push(`  IMAP:  ${imap.host}:${imap.port} secure=${imap.secure}`);
  return lines.join("\n") + "\n";
}

function preview(body: string): string {
  return body.length > PREVIEW_LENGTH ? `${body.slice(0, PREVIEW_LENGTH)}...` : body;
}

function consoleObserver(print: (line: string) => void): PipelineObserver {
  return {
    onFetched(messages) {
      print(
        messages.length === 0
          ? "No emails found to process."
          : `Found ${messages.length} email(s) to process.`
      );
    },
    onMessageStart(message, index, total) {
      print("");
      print(RULE);
      print(`Processing Email ${index} of ${total}`);
      print(RULE);
      print(`From: ${message.from}`);
      print(`Subject: ${message.subject}`);
      print(`Date: ${message.date.toISOString()}`);
      print("");
      print(preview(message.body));
    },
    onDraftComposed(_message, draft) {
      print("");
      print(`Draft to ${draft.to} — ${draft.subject}`);
      print(draft.body);
    },
    onOutcome(outcome) {
      print(
        outcome.state === "persisted"
          ? `Draft stored in Drafts folder (${outcome.draftId ?? "no id"}).`
          : `Failed at ${outcome.failure?.stage ?? "unknown"}: ${outcome.failure?.reason ?? "unknown error"}`
      );
    },
  };
}

/**
 * Report an error that escaped the run (an uncaught exception or unhandled
 * rejection) and make sure the process exits non-zero.
 */
export function reportCrash(
  label: string,
  err: unknown,
  printError: (text: string) => void = (text) => process.stderr.write(text)
): void {
  printError(formatError(label, err));
  process.exitCode = 1;
}

export function formatReport(report: RunReport): string[] {
  const lines = [
    RULE,
    `Processing complete: ${report.succeeded} succeeded, ${report.failed} failed (${report.fetched} fetched).`,
  ];
  for (const failure of report.failures) {
    lines.push(`  - ${failure.id} [${failure.kind} at ${failure.stage}]: ${failure.reason}`);
  }
  lines.push(RULE);
  return lines;
}

/**
 * Run one drafting pass and return the process exit code.
 *
 * 0 when the run completes, even if some messages failed.
 * 1 when configuration is invalid, the mailbox cannot be reached or
 * authenticated, or the fetch itself fails.
 */
export async function runApp(deps: AppDependencies = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const printError = deps.printError ?? ((text: string) => process.stderr.write(text));

  let config: AppConfig;
  try {
    config = loadConfig(deps.env ?? process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      printError(formatError("CONFIGURATION ERROR", error));
      return 1;
    }
    throw error;
  }

  const logger = (deps.createLogger ?? ((c: AppConfig) => createLogger(c.logLevel)))(config);
  const imapClient = (deps.createImapClient ?? ((c: ImapConfig) => new ImapClient(c)))(
    config.imap
  );
  const runtime = (
    deps.createRuntime ??
    ((c: AppConfig) =>
      new MastraAgentRuntime({ apiKey: c.provider.apiKey, model: c.provider.model }))
  )(config);

  print(RULE);
  print("Email Reading and Draft Generation");
  print(RULE);

  try {
    // Authenticate before anything else so bad credentials stop the run early.
    await imapClient.connect();

    const report = await runPipeline({
      imapClient,
      runtime,
      sender: config.email.address,
      limit: config.fetchLimit,
      folder: config.email.folder,
      logger,
      observer: consoleObserver(print),
    });

    for (const line of formatReport(report)) print(line);
    return 0;
  } catch (error) {
    const label = isFatalError(error)
      ? `${error.kind.toUpperCase()} ERROR`
      : "RUN FAILED";
    logger.error("Run failed", {
      kind: error instanceof InboxDrafterError ? error.kind : "unknown",
      error: errorMessage(error),
    });
    printError(formatError(label, error, config.imap));
    return 1;
  } finally {
    await imapClient.disconnect().catch((error: unknown) => {
      logger.warn("IMAP logout failed", {
        error: errorMessage(error),
      });
    });
  }
}
