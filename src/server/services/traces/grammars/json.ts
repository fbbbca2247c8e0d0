// ============================================================================
// tracesift — Structured log helpers
// JSON-per-line records (structlog, python-json-logger, zap, logrus, slog)
// ============================================================================

import { coerceTimestamp } from '../../../utils/timestamps.js';

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function looksLikeJson(body: string): boolean {
  return body.trimStart().startsWith('{');
}

export function parseJsonObject(text: string): JsonObject | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{') || !trimmed.endsWith('}')) {
    return null;
  }
  try {
    const value: unknown = JSON.parse(trimmed);
    return isJsonObject(value) ? value : null;
  } catch {
    return null;
  }
}

/** First string value among `keys`, in order. */
export function stringField(obj: JsonObject, ...keys: string[]): string | null {
  for (const key of keys) {
    const value = obj[key];
    if (typeof value === 'string') {
      return value;
    }
  }
  return null;
}

export function recordTimestamp(obj: JsonObject): string | null {
  for (const key of ['timestamp', 'time', 'ts', '@timestamp', 'asctime']) {
    const ts = coerceTimestamp(obj[key]);
    if (ts) return ts;
  }
  return null;
}

/**
 * Find the first balanced `{...}` in `text`, skipping braces inside JSON
 * strings. Used for payloads embedded in a message ("... with data {...}").
 */
export function firstBalancedObject(text: string): string | null {
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"' && depth > 0) {
      inString = true;
    } else if (ch === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === '}') {
      if (depth === 0) return null;
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }

  return null;
}

export function splitLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/);
}
