import type { SearchObject } from "imapflow";
import { simpleParser } from "mailparser";
import type { AddressObject, ParsedMail } from "mailparser";
import { ProtocolError } from "../errors.js";
import type { ImapClient } from "./client.js";
import { classifyImapError } from "./client.js";
import { buildCompositeId, splitMessageIds } from "./resolve.js";
import type { FetchFilter, FetchedMessage } from "./types.js";

export const DEFAULT_FILTER: FetchFilter = Object.freeze({ unseen: true });

export interface FetchOptions {
  /** Folder to read from. Default: "INBOX" */
  folder?: string;
  /** Search criteria. Default: unread messages only */
  filter?: FetchFilter;
  /** Upper bound on the number of messages returned */
  limit: number;
}

/**
 * Translate a FetchFilter into an IMAP SEARCH query.
 */
export function toSearchQuery(filter: FetchFilter): SearchObject {
  const query: SearchObject = {};
  if (filter.unseen) query.seen = false;
  if (filter.since) query.since = filter.since;
  if (filter.from) query.from = filter.from;
  return Object.keys(query).length > 0 ? query : { all: true };
}

/**
 * Pick the first address out of a parsed From header.
 */
export function extractSender(
  from: AddressObject | AddressObject[] | undefined
): { address: string; name: string } {
  const first = Array.isArray(from) ? from[0] : from;
  const entry = first?.value[0];
  return {
    address: entry?.address ?? "",
    name: entry?.name ?? "",
  };
}

function validDate(value: Date | string | undefined): Date | undefined {
  if (value === undefined) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

interface RawMessage {
  source: Buffer;
  internalDate?: Date;
}

function toFetchedMessage(
  uid: number,
  parsed: ParsedMail,
  internalDate: Date | undefined
): FetchedMessage {
  const sender = extractSender(parsed.from);
  // Received time from the server, falling back to the Date header.
  const date = internalDate ?? validDate(parsed.date) ?? new Date(0);
  const messageId = parsed.messageId ?? "";

  return Object.freeze({
    id: buildCompositeId(date, messageId || `uid:${uid}`),
    uid,
    messageId,
    from: sender.address,
    fromName: sender.name,
    subject: parsed.subject ?? "(no subject)",
    body: parsed.text ?? "",
    date,
    inReplyTo: parsed.inReplyTo ?? "",
    references: Object.freeze(splitMessageIds(parsed.references)),
  });
}

/**
 * Fetch the newest `limit` messages matching `filter`, returned in the order
 * the server reports them (ascending UID, which is arrival order on most
 * servers).
 *
 * The folder is opened read-only and sources are read with BODY.PEEK, so read
 * state is left as it was.
 * A failed search, a missing source, or unparseable MIME aborts the fetch
 * with a ProtocolError.
 */
export async function fetchMessages(
  imapClient: ImapClient,
  options: FetchOptions
): Promise<FetchedMessage[]> {
  const { folder = "INBOX", filter = DEFAULT_FILTER, limit } = options;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`limit must be a positive integer, got ${limit}`);
  }

  const lock = await imapClient.openMailbox(folder, { readOnly: true });
  try {
    const client = imapClient.getClient();

    let uids: unknown;
    try {
      uids = await client.search(toSearchQuery(filter), { uid: true });
    } catch (error) {
      throw classifyImapError(error, imapClient.config);
    }

    if (!Array.isArray(uids)) {
      throw new ProtocolError(`IMAP SEARCH failed in folder "${folder}".`);
    }

    const selected = uids
      .filter((uid): uid is number => typeof uid === "number")
      .sort((a, b) => a - b)
      .slice(-limit);

    if (selected.length === 0) {
      return [];
    }

    const sources = new Map<number, RawMessage>();
    try {
      for await (const msg of client.fetch(
        selected.join(","),
        { uid: true, source: true, internalDate: true },
        { uid: true }
      )) {
        if (msg.source) {
          sources.set(msg.uid, {
            source: msg.source,
            internalDate: validDate(msg.internalDate),
          });
        }
      }
    } catch (error) {
      throw classifyImapError(error, imapClient.config);
    }

    const results: FetchedMessage[] = [];
    for (const uid of selected) {
      const raw = sources.get(uid);
      if (!raw) {
        throw new ProtocolError(
          `Server returned no source for UID ${uid} in folder "${folder}".`
        );
      }

      let parsed: ParsedMail;
      try {
        parsed = await simpleParser(raw.source);
      } catch (error) {
        throw new ProtocolError(`Cannot parse message UID ${uid}.`, {
          cause: error,
        });
      }
      results.push(toFetchedMessage(uid, parsed, raw.internalDate));
    }

    return results;
  } finally {
    lock.release();
  }
}
