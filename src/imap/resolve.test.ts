import { describe, it, expect } from "vitest";
import { buildCompositeId, splitMessageIds } from "./resolve.js";

// ---------------------------------------------------------------------------
// buildCompositeId
// ---------------------------------------------------------------------------

describe("buildCompositeId", () => {
  it("formats a Date object correctly", () => {
    const date = new Date("2026-02-12T14:30:25.000Z");
    const result = buildCompositeId(date, "<abc123@mail.example.com>");
    expect(result).toBe("2026-02-12T14:30:25.<abc123@mail.example.com>");
  });

  it("formats a date string correctly", () => {
    const result = buildCompositeId("2026-01-01T00:00:00.000Z", "<msg@example.com>");
    expect(result).toBe("2026-01-01T00:00:00.<msg@example.com>");
  });

  it("truncates milliseconds from ISO date", () => {
    const date = new Date("2026-06-15T09:45:30.123Z");
    expect(buildCompositeId(date, "<test@example.com>")).toBe(
      "2026-06-15T09:45:30.<test@example.com>"
    );
  });

  it("uses the epoch for an invalid date", () => {
    expect(buildCompositeId("not a date", "<x@example.com>")).toBe(
      "1970-01-01T00:00:00.<x@example.com>"
    );
  });
});

// ---------------------------------------------------------------------------
// splitMessageIds
// ---------------------------------------------------------------------------

describe("splitMessageIds", () => {
  it("returns an empty list for missing values", () => {
    expect(splitMessageIds(undefined)).toEqual([]);
    expect(splitMessageIds("")).toEqual([]);
  });

  it("splits a References header on whitespace", () => {
    expect(splitMessageIds("<a@example.com>\r\n <b@example.com> <c@example.com>")).toEqual([
      "<a@example.com>",
      "<b@example.com>",
      "<c@example.com>",
    ]);
  });

  it("accepts an array of header values", () => {
    expect(splitMessageIds(["<a@example.com>", "<b@example.com>"])).toEqual([
      "<a@example.com>",
      "<b@example.com>",
    ]);
  });

  it("falls back to whitespace tokens when ids have no angle brackets", () => {
    expect(splitMessageIds("a@example.com b@example.com")).toEqual([
      "a@example.com",
      "b@example.com",
    ]);
  });
});
