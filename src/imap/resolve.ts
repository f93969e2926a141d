/**
 * Build the composite ID from date + messageId.
 * Format: `YYYY-MM-DDTHH:mm:ss.<messageId>`
 */
export function buildCompositeId(
  date: Date | string,
  messageId: string
): string {
  const d = typeof date === "string" ? new Date(date) : date;
  const iso = Number.isNaN(d.getTime())
    ? new Date(0).toISOString().slice(0, 19)
    : d.toISOString().slice(0, 19); // YYYY-MM-DDTHH:mm:ss
  return `${iso}.${messageId}`;
}

/**
 * Split a References / In-Reply-To header value into individual Message-IDs.
 */
export function splitMessageIds(value: string | readonly string[] | undefined): string[] {
  if (!value) return [];
  const joined = typeof value === "string" ? value : value.join(" ");
  return joined.match(/<[^<>\s]+>/g) ?? joined.split(/\s+/).filter(Boolean);
}
