// ============================================================================
// tracesift — Tokenizer
// Raw text -> timestamp-split LogLines (line/byte capped) -> record spans.
// A header opens a span and continuation lines extend it.
// ============================================================================

import type { IngestMode, LogLine, Span, TruncationInfo } from '../../../shared/types.js';
import { splitTimestamp } from '../../utils/timestamps.js';
import type { Grammar } from './grammars/index.js';

export interface LineLimits {
  maxLines: number;
  maxBytes: number;
}

export interface ReadResult {
  lines: LogLine[];
  truncation: TruncationInfo | null;
  totalLines: number;
}

/** Blank lines a span may carry before the next continuation line. */
const MAX_BLANK_RUN = 2;

export function readLogLines(text: string, limits: LineLimits): ReadResult {
  if (text === '') {
    return { lines: [], truncation: null, totalLines: 0 };
  }

  const raws = text.split(/\r\n|\r|\n/);
  // trailing newline
  if (raws[raws.length - 1] === '') {
    raws.pop();
  }

  const lines: LogLine[] = [];
  let truncation: TruncationInfo | null = null;
  let bytes = 0;

  for (const raw of raws) {
    const size = Buffer.byteLength(raw, 'utf8') + (lines.length > 0 ? 1 : 0);

    if (lines.length + 1 > limits.maxLines) {
      truncation = { reason: 'lines', keptLines: lines.length, totalLines: raws.length };
      break;
    }
    if (bytes + size > limits.maxBytes) {
      truncation = { reason: 'bytes', keptLines: lines.length, totalLines: raws.length };
      break;
    }

    bytes += size;
    const { timestamp, body } = splitTimestamp(raw);
    lines.push({ index: lines.length, raw, body, timestamp });
  }

  return { lines, truncation, totalLines: raws.length };
}

function isBlank(line: LogLine): boolean {
  return line.body.trim() === '';
}

/**
 * Read the span that `grammar` opens at `start`, or null when the line is not
 * one of its headers.
 */
export function readSpan(
  lines: readonly LogLine[],
  start: number,
  grammar: Grammar,
  mode: IngestMode,
): Span | null {
  const first = lines[start];
  if (first === undefined || !grammar.isHeader(first.body)) {
    return null;
  }

  const span: LogLine[] = [first];
  if (mode === 'split') {
    return { lines: span, start, end: start + 1 };
  }

  let prev = first.body;
  let pending: LogLine[] = [];
  for (let i = start + 1; i < lines.length; i++) {
    const line = lines[i];

    if (isBlank(line)) {
      if (pending.length >= MAX_BLANK_RUN) break;
      pending.push(line);
      continue;
    }

    if (!grammar.continues(line.body, prev)) break;

    span.push(...pending, line);
    pending = [];
    prev = line.body;
  }

  return { lines: span, start, end: start + span.length };
}

export interface TokenizedSpan {
  span: Span;
  grammar: Grammar;
}

/** Every span in order; at each line the first grammar whose header matches wins. */
export function tokenize(
  lines: readonly LogLine[],
  mode: IngestMode,
  grammars: readonly Grammar[],
  from = 0,
): TokenizedSpan[] {
  const spans: TokenizedSpan[] = [];
  let i = from;

  while (i < lines.length) {
    let opened: TokenizedSpan | null = null;
    for (const grammar of grammars) {
      const span = readSpan(lines, i, grammar, mode);
      if (span) {
        opened = { span, grammar };
        break;
      }
    }

    if (opened) {
      spans.push(opened);
      i = opened.span.end;
    } else {
      i++;
    }
  }

  return spans;
}
