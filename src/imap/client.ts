import { ImapFlow } from "imapflow";
import type { ImapFlowOptions, MailboxLockObject } from "imapflow";
import {
  AuthError,
  ConnectivityError,
  InboxDrafterError,
  ProtocolError,
} from "../errors.js";
import type { ImapConfig } from "./types.js";

const NETWORK_CODES = new Set([
  "ECONNRESET",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EAI_AGAIN",
  "NoConnection",
]);

function errorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, "code");
  return typeof code === "string" ? code : undefined;
}

/**
 * Classify an IMAP/network error into the run's error taxonomy.
 * Inspects error properties set by ImapFlow and Node.js to determine the cause.
 *
 * Errors raised while connecting default to ConnectivityError; errors raised
 * on an open session default to ProtocolError.
 */
export function classifyImapError(
  error: unknown,
  config: ImapConfig,
  phase: "connect" | "session" = "session"
): InboxDrafterError {
  if (error instanceof InboxDrafterError) {
    return error;
  }

  if (!(error instanceof Error)) {
    return phase === "connect"
      ? new ConnectivityError(`IMAP error: ${String(error)}`)
      : new ProtocolError(`IMAP error: ${String(error)}`);
  }

  const code = errorCode(error);

  if (Reflect.get(error, "authenticationFailed") === true) {
    return new AuthError(
      "IMAP authentication failed — check EMAIL_ADDRESS and EMAIL_PASSWORD.",
      { cause: error }
    );
  }

  if (code === "ECONNREFUSED") {
    return new ConnectivityError(
      `Cannot reach IMAP server at ${config.host}:${config.port} — connection refused. Is the server running?`,
      { cause: error }
    );
  }

  if (code === "ENOTFOUND") {
    return new ConnectivityError(
      `Cannot resolve IMAP server hostname '${config.host}' — check EMAIL_IMAP_SERVER.`,
      { cause: error }
    );
  }

  if (code === "ETIMEDOUT" || code === "CONNECT_TIMEOUT") {
    return new ConnectivityError(
      "Connection to IMAP server timed out — server may be slow or unreachable.",
      { cause: error }
    );
  }

  if (code?.startsWith("ERR_TLS") || /tls|certificate/i.test(error.message)) {
    return new ConnectivityError(
      "TLS/SSL error connecting to IMAP server — check EMAIL_IMAP_SECURE.",
      { cause: error }
    );
  }

  if (code !== undefined && NETWORK_CODES.has(code)) {
    return new ConnectivityError(`IMAP connection lost: ${error.message}`, {
      cause: error,
    });
  }

  return phase === "connect"
    ? new ConnectivityError(`IMAP error: ${error.message}`, { cause: error })
    : new ProtocolError(`IMAP error: ${error.message}`, { cause: error });
}

export interface OpenMailboxOptions {
  readOnly?: boolean;
}

function sessionLost(): ConnectivityError {
  return new ConnectivityError(
    "IMAP session was closed by the server during the run."
  );
}

/**
 * Manages the IMAP session for one run.
 * Wraps ImapFlow; the same session serves fetching and draft writing.
 *
 * Once opened, the session is never replaced: if the server drops it, every
 * later connect() or getClient() fails with ConnectivityError. Nothing is
 * retried.
 */
export class ImapClient {
  private client: ImapFlow | null = null;
  private lost = false;
  readonly config: ImapConfig;

  constructor(config: ImapConfig) {
    this.config = config;
  }

  /**
   * Get or create an authenticated IMAP session.
   * Fails with AuthError on bad credentials, ConnectivityError otherwise.
   */
  async connect(): Promise<ImapFlow> {
    if (this.client && !this.client.usable) {
      this.client = null;
      this.lost = true;
    }

    if (this.lost) {
      throw sessionLost();
    }

    if (this.client) {
      return this.client;
    }

    const options: ImapFlowOptions = {
      host: this.config.host,
      port: this.config.port,
      secure: this.config.secure,
      auth: this.config.auth,
      logger: false,
      ...(!this.config.starttls ? { doSTARTTLS: false } : {}),
      tls: {
        rejectUnauthorized: this.config.tlsRejectUnauthorized,
      },
    };
    const flow = new ImapFlow(options);

    try {
      await flow.connect();
    } catch (error) {
      throw classifyImapError(error, this.config, "connect");
    }

    flow.on("close", () => {
      if (this.client === flow) this.markLost();
    });

    // EventEmitter requires handling "error" events, otherwise Node throws.
    flow.on("error", (error: unknown) => {
      const err = classifyImapError(error, this.config);
      process.stderr.write(`IMAP connection error: ${err.message}\n`);
      if (this.client === flow) this.markLost();
    });

    this.client = flow;
    return this.client;
  }

  /**
   * Get the underlying ImapFlow instance (must be connected first).
   */
  getClient(): ImapFlow {
    if (this.lost) {
      throw sessionLost();
    }
    if (!this.client) {
      throw new ConnectivityError(
        "IMAP client not connected. Call connect() first."
      );
    }
    return this.client;
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      const client = this.client;
      this.client = null;
      await client.logout();
    }
  }

  private markLost(): void {
    this.client = null;
    this.lost = true;
  }

  /**
   * Open a mailbox lock. Caller must release the lock when done.
   * With `readOnly` the folder is selected with EXAMINE.
   */
  async openMailbox(
    path: string = "INBOX",
    options: OpenMailboxOptions = {}
  ): Promise<MailboxLockObject> {
    const client = await this.connect();
    try {
      return await client.getMailboxLock(path, {
        readOnly: options.readOnly ?? false,
      });
    } catch (error) {
      throw classifyImapError(error, this.config);
    }
  }
}
