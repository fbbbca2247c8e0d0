// ============================================================================
// tracesift — Python traceback grammar
//
//   Traceback (most recent call last):
//     File "/app/views.py", line 42, in get
//       return self.load(pk)
//   KeyError: 'pk'
//
// Chained tracebacks ("During handling of the above exception...") stay in
// one span; the last exception line gives the record's type and message.
// ============================================================================

import type { StackFrame } from '../../../../shared/types.js';
import { extractEndpoint } from '../../../utils/endpoint.js';
import { looksLikeJson } from './json.js';
import { INCOMPLETE_MESSAGE, type Grammar, type ParsedException } from './types.js';

export const TRACEBACK_HEADER = /(?:Exception Group )?Traceback \(most recent call last\):/;

const CHAIN_MARKERS = [
  /^During handling of the above exception, another exception occurred:/,
  /^The above exception was the direct cause of the following exception:/,
];

const FRAME = /^\s*File "([^"]+)", line (\d+)(?:, in (.+))?/;

const EXCEPTION_LINE = /^((?:[A-Za-z_]\w*\.)*[A-Za-z_]\w*)(?::\s?(.*))?$/;

const EXCEPTION_SUFFIX = /(?:Error|Exception|Warning|Interrupt|Exit|Failure|Fault)$/;

function looksLikeExceptionName(name: string): boolean {
  if (EXCEPTION_SUFFIX.test(name)) return true;
  // django.db.utils.OperationalError is caught above; psycopg2.errors.UniqueViolation is not
  const dot = name.lastIndexOf('.');
  return dot > 0 && /^[A-Z]/.test(name.slice(dot + 1));
}

interface ExceptionLine {
  type: string;
  message: string;
}

function parseExceptionLine(body: string): ExceptionLine | null {
  const match = EXCEPTION_LINE.exec(body);
  if (!match || !looksLikeExceptionName(match[1])) {
    return null;
  }
  // a bare name is only an exception line when it carries a known suffix
  if (match[2] === undefined && !EXCEPTION_SUFFIX.test(match[1])) {
    return null;
  }
  return { type: match[1], message: (match[2] ?? '').trim() };
}

export function isExceptionLine(body: string): boolean {
  return parseExceptionLine(body) !== null;
}

export function isChainMarker(body: string): boolean {
  const trimmed = body.trim();
  return CHAIN_MARKERS.some((marker) => marker.test(trimmed));
}

export function pythonContinues(body: string, prev: string): boolean {
  if (body.trim() === '') return false;
  if (isChainMarker(body)) return true;
  if (TRACEBACK_HEADER.test(body)) return isChainMarker(prev);

  // once the exception line is out, the traceback is over
  if (/^\s/.test(body)) return !isExceptionLine(prev);
  if (isExceptionLine(body)) return !isExceptionLine(prev);

  return false;
}

/**
 * Frames and final exception of one (possibly chained) traceback. Without an
 * exception line the trace was cut short: the record keeps a placeholder
 * message and no frames.
 */
export function parseTraceback(bodies: readonly string[]): ParsedException {
  const frames: StackFrame[] = [];
  let last: ExceptionLine | null = null;

  for (const body of bodies) {
    const frame = FRAME.exec(body);
    if (frame) {
      frames.push({
        file: frame[1],
        line: Number(frame[2]),
        func: frame[3]?.trim() || null,
      });
      continue;
    }

    const exception = parseExceptionLine(body);
    if (exception) {
      last = exception;
    }
  }

  if (!last) {
    return { type: 'Traceback', message: INCOMPLETE_MESSAGE, frames: [] };
  }

  return { type: last.type, message: last.message, frames };
}

function isTracebackHeader(body: string): boolean {
  return TRACEBACK_HEADER.test(body) && !looksLikeJson(body);
}

export const pythonGrammar: Grammar = {
  id: 'python',
  structured: false,
  isHeader: isTracebackHeader,
  continues: pythonContinues,

  parse(bodies) {
    const [header] = bodies;
    if (header === undefined || !isTracebackHeader(header)) {
      return null;
    }
    return {
      ...parseTraceback(bodies),
      endpoint: extractEndpoint(header),
    };
  },
};
