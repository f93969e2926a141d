import type { DraftMessage, FetchedMessage } from "../imap/types.js";
import { splitMessageIds } from "../imap/resolve.js";

const SUBJECT_LINE = /^[ \t]*subject:[ \t]*(.+?)[ \t]*$/im;
const HEADER_LINES = /^[ \t]*(?:subject|to|from|date):.*(?:\r?\n|$)/gim;
const REPLY_PREFIX = /^(?:re\s*:\s*)+/i;

/**
 * Give a subject exactly one "Re: " prefix.
 */
export function ensureReplySubject(subject: string): string {
  const bare = subject.trim().replace(REPLY_PREFIX, "").trim();
  return bare ? `Re: ${bare}` : "Re:";
}

/**
 * References chain for a reply: the original's References, then its
 * In-Reply-To, then its own Message-ID, without duplicates.
 */
export function buildReferences(message: FetchedMessage): string[] {
  const chain = [
    ...message.references,
    ...splitMessageIds(message.inReplyTo),
    ...splitMessageIds(message.messageId),
  ];
  return [...new Set(chain)];
}

/**
 * Turn the drafting agent's text into a DraftMessage replying to `message`.
 *
 * The subject comes from a "Subject:" line in the text when there is one,
 * otherwise from the original. Header-like lines are removed from the body.
 */
export function composeDraft(message: FetchedMessage, draftText: string): DraftMessage {
  const subjectMatch = SUBJECT_LINE.exec(draftText);
  const subject = ensureReplySubject(subjectMatch ? subjectMatch[1] : message.subject);
  const body = draftText.replace(HEADER_LINES, "").trim();
  const references = buildReferences(message);

  return {
    to: message.from,
    subject,
    body,
    ...(message.messageId ? { inReplyTo: message.messageId, references } : {}),
  };
}
