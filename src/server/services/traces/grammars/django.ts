// ============================================================================
// tracesift — Django grammars
// Plain: django.request's "Internal Server Error: /path" followed by a Python
// traceback. Structured: the traceback text is the value of a JSON field
// (python-json-logger, structlog, Cloud Logging, DRF exception handlers).
// ============================================================================

import { extractEndpoint } from '../../../utils/endpoint.js';
import {
  firstBalancedObject,
  isJsonObject,
  looksLikeJson,
  parseJsonObject,
  recordTimestamp,
  splitLines,
  stringField,
  type JsonObject,
} from './json.js';
import { TRACEBACK_HEADER, parseTraceback, pythonContinues } from './python.js';
import type { Grammar } from './types.js';

const DJANGO_HEADER = /Internal Server Error: \/\S*/;

function isDjangoHeader(body: string): boolean {
  return DJANGO_HEADER.test(body) && !looksLikeJson(body);
}

export const djangoGrammar: Grammar = {
  id: 'django',
  structured: false,
  isHeader: isDjangoHeader,

  continues(body, prev) {
    if (TRACEBACK_HEADER.test(body)) {
      return isDjangoHeader(prev) || pythonContinues(body, prev);
    }
    return pythonContinues(body, prev);
  },

  parse(bodies) {
    const [header] = bodies;
    if (header === undefined || !isDjangoHeader(header)) {
      return null;
    }
    return {
      ...parseTraceback(bodies.slice(1)),
      endpoint: extractEndpoint(header),
    };
  },
};

// --- Structured ---

const TRACEBACK_FIELDS = [
  'exc_info',
  'stack_trace',
  'stacktrace',
  'traceback',
  'exception',
  'error',
  'detail',
  'message',
  'msg',
  'event',
];

const EMBEDDED_PAYLOAD = 'with data {';

const MAX_DEPTH = 2;

// structlog: "error handling request ... with data {"stacktrace": "..."}"
function fromEmbeddedPayload(text: string, depth: number): string | null {
  const at = text.indexOf(EMBEDDED_PAYLOAD);
  if (at < 0) return null;

  const embedded = firstBalancedObject(text.slice(at + EMBEDDED_PAYLOAD.length - 1));
  const payload = embedded ? parseJsonObject(embedded) : null;
  return payload ? findTraceback(payload, depth + 1) : null;
}

function tracebackIn(value: unknown, depth: number): string | null {
  if (typeof value !== 'string' || !TRACEBACK_HEADER.test(value)) {
    return null;
  }
  return fromEmbeddedPayload(value, depth) ?? value;
}

function findTraceback(obj: JsonObject, depth = 0): string | null {
  for (const key of TRACEBACK_FIELDS) {
    const found = tracebackIn(obj[key], depth);
    if (found) return found;
  }

  for (const value of Object.values(obj)) {
    const found = tracebackIn(value, depth);
    if (found) return found;
  }

  if (depth >= MAX_DEPTH) return null;
  for (const value of Object.values(obj)) {
    if (isJsonObject(value)) {
      const found = findTraceback(value, depth + 1);
      if (found) return found;
    }
  }

  return null;
}

function requestPath(obj: JsonObject, traceback: string): string | null {
  const path = stringField(obj, 'path', 'request_path');
  if (path) return path;

  const message = stringField(obj, 'message', 'msg', 'event');
  return extractEndpoint(message ?? '') ?? extractEndpoint(traceback);
}

export const djangoJsonGrammar: Grammar = {
  id: 'django-json',
  structured: true,

  isHeader(body) {
    if (!TRACEBACK_HEADER.test(body)) return false;
    const obj = parseJsonObject(body);
    return obj !== null && findTraceback(obj) !== null;
  },

  continues() {
    return false;
  },

  parse(bodies) {
    const [header] = bodies;
    const obj = header === undefined ? null : parseJsonObject(header);
    const traceback = obj ? findTraceback(obj) : null;
    if (!obj || !traceback) {
      return null;
    }

    const lines = splitLines(traceback);
    const start = lines.findIndex((line) => TRACEBACK_HEADER.test(line));

    return {
      ...parseTraceback(lines.slice(Math.max(start, 0))),
      timestamp: recordTimestamp(obj),
      endpoint: requestPath(obj, traceback),
    };
  },
};
