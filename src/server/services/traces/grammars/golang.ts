// ============================================================================
// tracesift — Go panic grammars
//
//   panic: runtime error: invalid memory address or nil pointer dereference
//   [signal SIGSEGV: segmentation violation code=0x1 addr=0x0 pc=0x4a1b2c]
//
//   goroutine 1 [running]:
//   main.(*Server).handle(0xc000010000, {0x0, 0x0})
//   	/src/handlers.go:69 +0x1d
//   created by main.main in goroutine 1
//   	/src/main.go:12 +0x65
//
// Structured form: one zap/logrus/slog JSON record at panic or fatal level
// carrying the stack in a field, optionally followed by raw stack lines.
// ============================================================================

import type { StackFrame } from '../../../../shared/types.js';
import { looksLikeJson, parseJsonObject, recordTimestamp, splitLines, stringField, type JsonObject } from './json.js';
import type { Grammar } from './types.js';

const GO_HEADER = /^(panic|fatal error): ?(.*)$/;
const GO_GOROUTINE = /^goroutine \d+ \[[^\]]*\]:?/;
const GO_GOROUTINE_ANYWHERE = /goroutine \d+ \[/;
const GO_SIGNAL = /^\[signal /;
const GO_LOCATION = /^\s+(\S.*?\.go):(\d+)(?:\s+\+0x[0-9a-fA-F]+)?\s*$/;
const GO_FUNC_LINE = /^[\w./-]+(?:\(\*?[\w.[\], ]+\))?[\w.-]*\(.*\)$/;
const GO_CREATED_BY = /^created by (\S+)/;
const GO_ELIDED = /^\.\.\.additional frames elided\.\.\./;
const GO_EXIT = /^exit status \d+$/;
const GO_NESTED_PANIC = /^\s+panic: /;
const GO_ARGS = /^(.*?)\((?:[^()]|\([^()]*\))*\)$/;

const PANIC_LEVELS = new Set(['panic', 'dpanic', 'fatal']);
const PANIC_MARKER = /\b(?:panic|fatal error):/;
const LOCATION_ANYWHERE = /\.go:\d+/;

export function goContinues(body: string): boolean {
  if (body.trim() === '') return false;
  if (GO_SIGNAL.test(body) || GO_GOROUTINE.test(body)) return true;
  if (GO_LOCATION.test(body) || GO_NESTED_PANIC.test(body)) return true;
  // the runtime indents with tabs; space-indented lines are someone else's
  if (body.startsWith('\t')) return true;
  if (GO_FUNC_LINE.test(body) || GO_CREATED_BY.test(body)) return true;
  return GO_ELIDED.test(body) || GO_EXIT.test(body);
}

function functionName(line: string): string | null {
  const trimmed = line.trim();
  const created = GO_CREATED_BY.exec(trimmed);
  if (created) return created[1];

  const call = GO_ARGS.exec(trimmed);
  return call ? call[1] : null;
}

/** Pair each `file.go:N` location with the function line before it. */
export function parseGoFrames(lines: readonly string[]): StackFrame[] {
  const frames: StackFrame[] = [];
  let pendingFunc: string | null = null;

  for (const line of lines) {
    // zap writes locations with a leading tab; a trimmed copy loses it
    const location = GO_LOCATION.exec(/^\s/.test(line) ? line : `\t${line}`);
    if (location) {
      frames.push({ file: location[1], line: Number(location[2]), func: pendingFunc });
      pendingFunc = null;
      continue;
    }
    if (line.trim() !== '') {
      pendingFunc = functionName(line);
    }
  }

  return frames;
}

export const golangGrammar: Grammar = {
  id: 'golang',
  structured: false,

  isHeader(body) {
    return GO_HEADER.test(body);
  },

  continues(body) {
    return goContinues(body);
  },

  parse(bodies) {
    const header = GO_HEADER.exec(bodies[0] ?? '');
    if (!header) {
      return null;
    }

    // without a goroutine dump the frames cannot be trusted
    const rest = bodies.slice(1);
    const hasGoroutine = rest.some((body) => GO_GOROUTINE.test(body));

    return {
      type: header[1],
      message: header[2].trim(),
      frames: hasGoroutine ? parseGoFrames(rest) : [],
    };
  },
};

// --- Structured ---

function hasPanicMarker(obj: JsonObject): boolean {
  const level = stringField(obj, 'level', 'severity', 'lvl');
  if (level && PANIC_LEVELS.has(level.toLowerCase())) return true;

  const text = stringField(obj, 'msg', 'message', 'error');
  return text !== null && PANIC_MARKER.test(text);
}

function stackText(obj: JsonObject): string | null {
  return stringField(obj, 'stacktrace', 'stack', 'error');
}

function hasGoroutineMarker(obj: JsonObject): boolean {
  for (const value of Object.values(obj)) {
    if (typeof value === 'string' && GO_GOROUTINE_ANYWHERE.test(value)) return true;
  }
  const stack = stackText(obj);
  return stack !== null && LOCATION_ANYWHERE.test(stack);
}

function isPanicRecord(obj: JsonObject | null): obj is JsonObject {
  return obj !== null && hasPanicMarker(obj) && hasGoroutineMarker(obj);
}

export const golangJsonGrammar: Grammar = {
  id: 'golang-json',
  structured: true,

  isHeader(body) {
    return looksLikeJson(body) && isPanicRecord(parseJsonObject(body));
  },

  // raw runtime output that follows the JSON record belongs to it
  continues(body) {
    return !looksLikeJson(body) && goContinues(body);
  },

  parse(bodies) {
    const obj = parseJsonObject(bodies[0] ?? '');
    if (!isPanicRecord(obj)) {
      return null;
    }

    const text = stringField(obj, 'msg', 'message') ?? stringField(obj, 'error') ?? '';
    const marker = /^(panic|fatal error):\s*/.exec(text);
    const level = stringField(obj, 'level', 'severity', 'lvl')?.toLowerCase();
    const fatal = level === 'fatal' || marker?.[1] === 'fatal error';

    const stack = stackText(obj);
    const stackLines = [...(stack ? splitLines(stack) : []), ...bodies.slice(1)];

    return {
      type: fatal ? 'fatal' : 'panic',
      message: (marker ? text.slice(marker[0].length) : text).trim(),
      frames: parseGoFrames(stackLines),
      timestamp: recordTimestamp(obj),
    };
  },
};
