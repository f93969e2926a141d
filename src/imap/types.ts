/**
 * Configuration for connecting to an IMAP server.
 */
export interface ImapConfig {
  host: string;
  port: number;
  secure: boolean;
  /** Allow upgrading a plain connection with STARTTLS */
  starttls: boolean;
  tlsRejectUnauthorized: boolean;
  auth: {
    user: string;
    pass: string;
  };
}

/**
 * Server-side search criteria for a fetch. An empty filter matches every message.
 */
export interface FetchFilter {
  /** Only messages without the \Seen flag */
  unseen?: boolean;
  /** Only messages received on or after this date */
  since?: Date;
  /** Substring match on the From header */
  from?: string;
}

/**
 * A message as read from the mailbox. Frozen on creation.
 *
 * The `id` is the composite `YYYY-MM-DDTHH:mm:ss.<Message-ID>` identifier,
 * which does not change when the message moves between folders
 * (unlike the IMAP UID).
 */
export interface FetchedMessage {
  readonly id: string;
  /** IMAP UID within the folder it was fetched from */
  readonly uid: number;
  /** Message-ID header, angle brackets included (may be empty) */
  readonly messageId: string;
  /** Bare sender address (e.g. "alice@example.com") */
  readonly from: string;
  /** Sender display name, empty when the header has none */
  readonly fromName: string;
  readonly subject: string;
  /** Plain text body */
  readonly body: string;
  readonly date: Date;
  /** In-Reply-To header of the original, if any */
  readonly inReplyTo: string;
  /** References header of the original, split into Message-IDs */
  readonly references: readonly string[];
}

/**
 * A reply ready to be stored in the Drafts folder.
 */
export interface DraftMessage {
  to: string;
  subject: string;
  body: string;
  /** Message-ID of the message being replied to */
  inReplyTo?: string;
  /** Full References chain, oldest first */
  references?: readonly string[];
}

export interface DraftResult {
  /** Draft identifier: composite id of the stored draft */
  id: string;
  /** UID in the Drafts folder, null when the server does not report UIDPLUS */
  uid: number | null;
  folder: string;
  messageId: string;
  subject: string;
  to: string;
  /** ISO 8601 date string */
  date: string;
}
