import { randomUUID } from "node:crypto";
import { createMimeMessage } from "mimetext";
import { ProtocolError } from "../errors.js";
import type { ImapClient } from "./client.js";
import { classifyImapError } from "./client.js";
import { buildCompositeId } from "./resolve.js";
import type { DraftMessage, DraftResult } from "./types.js";

/**
 * Find the Drafts folder by looking for the \Drafts special-use attribute.
 * Falls back to a folder named "Drafts" if no special-use attribute is found.
 */
export async function findDraftsFolder(imapClient: ImapClient): Promise<string> {
  const client = await imapClient.connect();

  const mailboxes = await client.list().catch((error: unknown) => {
    throw classifyImapError(error, imapClient.config);
  });

  for (const mb of mailboxes) {
    if (mb.specialUse === "\\Drafts") {
      return mb.path;
    }
  }

  for (const mb of mailboxes) {
    if (mb.name.toLowerCase() === "drafts") {
      return mb.path;
    }
  }

  throw new ProtocolError(
    "Could not find Drafts folder — the server lists no \\Drafts folder and none named Drafts."
  );
}

/**
 * Generate a Message-ID under the sender's domain.
 */
export function generateMessageId(sender: string): string {
  const at = sender.lastIndexOf("@");
  const domain = at >= 0 && at < sender.length - 1 ? sender.slice(at + 1) : "localhost";
  return `<${randomUUID()}@${domain}>`;
}

/**
 * Build a raw RFC 5322 message from a draft.
 * In-Reply-To and References are only set when the draft replies to something.
 */
export function buildMessage(
  sender: string,
  draft: DraftMessage,
  messageId: string
): string {
  const msg = createMimeMessage();

  msg.setSender(sender);
  msg.setTo(draft.to);
  msg.setSubject(draft.subject);
  msg.setHeader("Message-ID", messageId);

  if (draft.inReplyTo) {
    const references = draft.references?.length
      ? [...draft.references]
      : [draft.inReplyTo];
    if (!references.includes(draft.inReplyTo)) {
      references.push(draft.inReplyTo);
    }
    msg.setHeader("In-Reply-To", draft.inReplyTo);
    msg.setHeader("References", references.join(" "));
  }

  msg.addMessage({
    contentType: "text/plain",
    data: draft.body,
  });

  return msg.asRaw();
}

/**
 * Store a draft in the account's Drafts folder.
 *
 * Every call appends a new message: storing the same draft twice leaves two
 * drafts on the server.
 */
export async function createDraft(
  imapClient: ImapClient,
  sender: string,
  draft: DraftMessage
): Promise<DraftResult> {
  const messageId = generateMessageId(sender);
  const raw = buildMessage(sender, draft, messageId);
  const draftsFolder = await findDraftsFolder(imapClient);
  const client = await imapClient.connect();

  let result: unknown;
  try {
    result = await client.append(
      draftsFolder,
      Buffer.from(raw, "utf-8"),
      ["\\Draft", "\\Seen"]
    );
  } catch (error) {
    throw classifyImapError(error, imapClient.config);
  }

  const uid: unknown =
    typeof result === "object" && result !== null
      ? Reflect.get(result, "uid")
      : undefined;
  const date = new Date();

  return {
    id: buildCompositeId(date, messageId),
    uid: typeof uid === "number" && uid > 0 ? uid : null,
    folder: draftsFolder,
    messageId,
    subject: draft.subject,
    to: draft.to,
    date: date.toISOString(),
  };
}
