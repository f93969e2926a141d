import { describe, it, expect, vi } from "vitest";
import { fetchMessages, toSearchQuery, extractSender } from "./fetch.js";
import type { ImapClient } from "./client.js";
import { ProtocolError } from "../errors.js";
import type { ImapConfig } from "./types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const testConfig: ImapConfig = {
  host: "imap.example.com",
  port: 993,
  secure: true,
  starttls: true,
  tlsRejectUnauthorized: true,
  auth: { user: "me@example.com", pass: "test-password" },
};

function rawMessage(options: {
  n: number;
  from?: string;
  subject?: string;
  headers?: string[];
  body?: string;
}): Buffer {
  const lines = [
    `From: ${options.from ?? `Sender ${options.n} <sender${options.n}@example.com>`}`,
    "To: me@example.com",
    `Subject: ${options.subject ?? `Message ${options.n}`}`,
    `Message-ID: <m${options.n}@example.com>`,
    `Date: Thu, 12 Feb 2026 14:3${options.n}:00 +0000`,
    ...(options.headers ?? []),
    "MIME-Version: 1.0",
    "Content-Type: text/plain; charset=utf-8",
    "",
    options.body ?? `Body of message ${options.n}`,
    "",
  ];
  return Buffer.from(lines.join("\r\n"), "utf-8");
}

interface FetchedRecord {
  uid: number;
  source?: Buffer;
  internalDate?: Date;
}

function createMockImapClient(overrides: {
  search?: unknown;
  searchError?: Error;
  fetchMessages?: FetchedRecord[];
}) {
  const mockLock = { release: vi.fn() };

  const mockFetchIterator = async function* () {
    for (const msg of overrides.fetchMessages || []) {
      yield msg;
    }
  };

  const mockClient = {
    search: overrides.searchError
      ? vi.fn().mockRejectedValue(overrides.searchError)
      : vi.fn().mockResolvedValue(overrides.search ?? []),
    fetch: vi.fn().mockReturnValue(mockFetchIterator()),
  };

  const imapClient = {
    config: testConfig,
    openMailbox: vi.fn().mockResolvedValue(mockLock),
    getClient: vi.fn().mockReturnValue(mockClient),
    connect: vi.fn().mockResolvedValue(mockClient),
  } as unknown as ImapClient;

  return { imapClient, mockClient, mockLock };
}

// ---------------------------------------------------------------------------
// toSearchQuery
// ---------------------------------------------------------------------------

describe("toSearchQuery", () => {
  it("maps unseen to seen: false", () => {
    expect(toSearchQuery({ unseen: true })).toEqual({ seen: false });
  });

  it("combines criteria", () => {
    const since = new Date("2026-01-01T00:00:00Z");
    expect(toSearchQuery({ unseen: true, since, from: "@example.com" })).toEqual({
      seen: false,
      since,
      from: "@example.com",
    });
  });

  it("matches everything for an empty filter", () => {
    expect(toSearchQuery({})).toEqual({ all: true });
    expect(toSearchQuery({ unseen: false })).toEqual({ all: true });
  });
});

// ---------------------------------------------------------------------------
// extractSender
// ---------------------------------------------------------------------------

describe("extractSender", () => {
  it("returns empty fields for a missing header", () => {
    expect(extractSender(undefined)).toEqual({ address: "", name: "" });
  });

  it("takes the first address", () => {
    expect(
      extractSender({
        value: [
          { address: "alice@example.com", name: "Alice" },
          { address: "bob@example.com", name: "Bob" },
        ],
        html: "",
        text: "",
      })
    ).toEqual({ address: "alice@example.com", name: "Alice" });
  });
});

// ---------------------------------------------------------------------------
// fetchMessages
// ---------------------------------------------------------------------------

describe("fetchMessages", () => {
  it("searches for unread messages by default", async () => {
    const { imapClient, mockClient } = createMockImapClient({ search: [] });

    await fetchMessages(imapClient, { limit: 2 });

    expect(imapClient.openMailbox).toHaveBeenCalledWith("INBOX", { readOnly: true });
    expect(mockClient.search).toHaveBeenCalledWith({ seen: false }, { uid: true });
  });

  it("returns an empty list when nothing matches", async () => {
    const { imapClient, mockClient } = createMockImapClient({ search: [] });

    expect(await fetchMessages(imapClient, { limit: 2 })).toEqual([]);
    expect(mockClient.fetch).not.toHaveBeenCalled();
  });

  it("returns the newest `limit` messages, in server order", async () => {
    const { imapClient, mockClient } = createMockImapClient({
      search: [12, 10, 11, 14, 13],
      fetchMessages: [
        // Servers may stream FETCH responses out of order
        { uid: 14, source: rawMessage({ n: 4 }) },
        { uid: 13, source: rawMessage({ n: 3 }) },
      ],
    });

    const messages = await fetchMessages(imapClient, { limit: 2 });

    expect(mockClient.fetch).toHaveBeenCalledWith(
      "13,14",
      { uid: true, source: true, internalDate: true },
      { uid: true }
    );
    expect(messages).toHaveLength(2);
    expect(messages.map((m) => m.uid)).toEqual([13, 14]);
    expect(messages.map((m) => m.subject)).toEqual(["Message 3", "Message 4"]);
  });

  it("returns every match when fewer than `limit` exist", async () => {
    const { imapClient } = createMockImapClient({
      search: [5],
      fetchMessages: [{ uid: 5, source: rawMessage({ n: 5 }) }],
    });

    const messages = await fetchMessages(imapClient, { limit: 2 });

    expect(messages.map((m) => m.uid)).toEqual([5]);
  });

  it("dates a message by its server received time when available", async () => {
    const { imapClient } = createMockImapClient({
      search: [3],
      fetchMessages: [
        {
          uid: 3,
          source: rawMessage({ n: 1 }),
          internalDate: new Date("2026-02-12T15:00:05Z"),
        },
      ],
    });

    const [message] = await fetchMessages(imapClient, { limit: 2 });

    expect(message.date.toISOString()).toBe("2026-02-12T15:00:05.000Z");
    expect(message.id).toBe("2026-02-12T15:00:05.<m1@example.com>");
  });

  it("identifies a message without a Message-ID by its UID", async () => {
    const source = Buffer.from(
      [
        "From: Sender <sender@example.com>",
        "Subject: No id",
        "Date: Thu, 12 Feb 2026 14:30:00 +0000",
        "Content-Type: text/plain; charset=utf-8",
        "",
        "Hello",
        "",
      ].join("\r\n"),
      "utf-8"
    );
    const { imapClient } = createMockImapClient({
      search: [8, 9],
      fetchMessages: [
        { uid: 8, source },
        { uid: 9, source },
      ],
    });

    const messages = await fetchMessages(imapClient, { limit: 2 });

    expect(messages.map((m) => m.id)).toEqual([
      "2026-02-12T14:30:00.uid:8",
      "2026-02-12T14:30:00.uid:9",
    ]);
    expect(messages[0].messageId).toBe("");
  });

  it("parses the message into a FetchedMessage", async () => {
    const { imapClient } = createMockImapClient({
      search: [7],
      fetchMessages: [
        {
          uid: 7,
          source: rawMessage({
            n: 2,
            from: "Alice Example <alice@example.com>",
            subject: "Quarterly numbers",
            headers: [
              "In-Reply-To: <m1@example.com>",
              "References: <m0@example.com> <m1@example.com>",
            ],
            body: "Could you send the report?",
          }),
        },
      ],
    });

    const [message] = await fetchMessages(imapClient, { limit: 2 });

    expect(message.id).toBe("2026-02-12T14:32:00.<m2@example.com>");
    expect(message.uid).toBe(7);
    expect(message.messageId).toBe("<m2@example.com>");
    expect(message.from).toBe("alice@example.com");
    expect(message.fromName).toBe("Alice Example");
    expect(message.subject).toBe("Quarterly numbers");
    expect(message.body.trim()).toBe("Could you send the report?");
    expect(message.date.toISOString()).toBe("2026-02-12T14:32:00.000Z");
    expect(message.inReplyTo).toBe("<m1@example.com>");
    expect(message.references).toEqual(["<m0@example.com>", "<m1@example.com>"]);
    expect(Object.isFrozen(message)).toBe(true);
  });

  it("uses the folder and filter it is given", async () => {
    const { imapClient, mockClient } = createMockImapClient({ search: [] });

    await fetchMessages(imapClient, {
      folder: "Support",
      filter: { from: "customer@example.com" },
      limit: 5,
    });

    expect(imapClient.openMailbox).toHaveBeenCalledWith("Support", { readOnly: true });
    expect(mockClient.search).toHaveBeenCalledWith(
      { from: "customer@example.com" },
      { uid: true }
    );
  });

  it("rejects a non-positive limit", async () => {
    const { imapClient } = createMockImapClient({ search: [] });

    await expect(fetchMessages(imapClient, { limit: 0 })).rejects.toThrow(RangeError);
    expect(imapClient.openMailbox).not.toHaveBeenCalled();
  });

  it("raises ProtocolError when the search fails", async () => {
    const { imapClient, mockLock } = createMockImapClient({ search: false });

    await expect(fetchMessages(imapClient, { limit: 2 })).rejects.toThrow(
      'IMAP SEARCH failed in folder "INBOX".'
    );
    expect(mockLock.release).toHaveBeenCalled();
  });

  it("classifies a search command error as ProtocolError", async () => {
    const { imapClient } = createMockImapClient({
      searchError: new Error("BAD Invalid search criteria"),
    });

    await expect(fetchMessages(imapClient, { limit: 2 })).rejects.toBeInstanceOf(ProtocolError);
  });

  it("raises ProtocolError when a message has no source", async () => {
    const { imapClient, mockLock } = createMockImapClient({
      search: [1, 2],
      fetchMessages: [{ uid: 1, source: rawMessage({ n: 1 }) }, { uid: 2 }],
    });

    await expect(fetchMessages(imapClient, { limit: 2 })).rejects.toThrow(
      'Server returned no source for UID 2 in folder "INBOX".'
    );
    expect(mockLock.release).toHaveBeenCalled();
  });
});
