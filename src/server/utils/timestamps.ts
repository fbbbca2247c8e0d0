// ============================================================================
// tracesift — Timestamp prefixes
// Shared by the tokenizer (LogLine.body) and the signature normalizer.
// ============================================================================

const MONTHS = 'Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec';

const STAMP_SOURCES = [
  // ISO 8601 (2026-02-11T14:30:00.000Z, 2026-02-11 14:30:00,123+01:00)
  String.raw`\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}:\d{2}(?:[.,]\d+)?(?:Z|[+-]\d{2}:?\d{2})?`,
  // Go log package (2026/02/11 14:30:00.000000)
  String.raw`\d{4}/\d{2}/\d{2} \d{2}:\d{2}:\d{2}(?:\.\d+)?`,
  // JVM logback/log4j layouts (11-02-2026 14:30:00.000)
  String.raw`\d{2}-\d{2}-\d{4}[ T]\d{2}:\d{2}:\d{2}\.\d{3}`,
  // syslog (Feb 11 14:30:00, Feb  1 14:30:00)
  String.raw`(?:${MONTHS}) {1,2}\d{1,2} \d{2}:\d{2}:\d{2}`,
];

export const TIMESTAMP_SOURCE = `(?:${STAMP_SOURCES.join('|')})`;

const LEADING_STAMP = new RegExp(`^(?:\\[(${TIMESTAMP_SOURCE})\\]|(${TIMESTAMP_SOURCE}))`);

export interface SplitLine {
  timestamp: string | null;
  body: string;
}

/**
 * Split one raw log line into its leading timestamp and the rest. Exactly one
 * separating space or tab is consumed so that indentation after the prefix
 * (Python `  File ...`, Go `\t/src/x.go:12`) survives.
 */
export function splitTimestamp(raw: string): SplitLine {
  const match = LEADING_STAMP.exec(raw);
  if (!match) {
    return { timestamp: null, body: raw };
  }

  const timestamp = match[1] ?? match[2] ?? null;
  let rest = raw.slice(match[0].length);
  if (rest.startsWith(' ') || rest.startsWith('\t')) {
    rest = rest.slice(1);
  }
  return { timestamp, body: rest };
}

const MAX_EPOCH_MS = 8.64e15;

/** Render a structured-log `ts`/`time` value as ISO-8601 when possible. */
export function coerceTimestamp(value: unknown): string | null {
  if (typeof value === 'string') {
    return value.trim() === '' ? null : value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    // zap and friends write epoch seconds as a float; others write ms
    const ms = Math.abs(value) < 1e11 ? value * 1000 : value;
    if (Math.abs(ms) > MAX_EPOCH_MS) return null;
    return new Date(ms).toISOString();
  }
  return null;
}
