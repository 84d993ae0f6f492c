/** Turning channel messages into timestamped lines and grouping them by day. */

export interface RawMessage {
  speakerId?: string;
  text?: string;
  /** Seconds since the epoch, possibly fractional. */
  timestamp?: number;
}

export type DateBucket = Map<string, string[]>;

const pad = (n: number): string => String(n).padStart(2, "0");

function fmtDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Local wall-clock time, truncated to whole seconds. */
export function formatLocalDateTime(timestamp: number): string {
  const date = new Date(timestamp * 1000);
  return `${fmtDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function formatMessages(messages: RawMessage[]): string {
  const lines: string[] = [];
  for (const msg of messages) {
    if (!msg.speakerId || msg.timestamp === undefined) continue;
    lines.push(
      `${msg.speakerId}: ${msg.text ?? ""} (timestamp: ${formatLocalDateTime(msg.timestamp)})`,
    );
  }
  return lines.join("\n");
}

// The body is lazy and spans newlines, so it ends at the first timestamp
// marker that follows it.
const LINE_PATTERN =
  /([A-Z0-9]+):\s+([\s\S]*?)\s+\(timestamp:\s+(\d{4}-\d{2}-\d{2})\s+\d{2}:\d{2}:\d{2}\)/g;

/**
 * Group formatted conversation text by calendar date. Text that does not look
 * like `SPEAKER: body (timestamp: YYYY-MM-DD HH:MM:SS)` is skipped.
 */
export function parseByDate(text: string): DateBucket {
  const groups: DateBucket = new Map();

  for (const match of text.matchAll(LINE_PATTERN)) {
    const [, speakerId, body, dateKey] = match;
    let group = groups.get(dateKey);
    if (!group) {
      group = [];
      groups.set(dateKey, group);
    }
    group.push(`${speakerId}: ${body.trim()}`);
  }

  return groups;
}

export function countLines(bucket: DateBucket): number {
  let total = 0;
  for (const lines of bucket.values()) total += lines.length;
  return total;
}
