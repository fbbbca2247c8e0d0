// ============================================================================
// tracesift — JVM exception grammar
//
//   Exception in thread "main" java.lang.IllegalStateException: cart is empty
//   	at com.shop.Cart.checkout(Cart.java:42)
//   	at java.base/java.lang.Thread.run(Thread.java:833)
//   Caused by: java.io.IOException: disk full
//   	at com.shop.Store.save(Store.java:17)
//   	... 2 more
// ============================================================================

import type { StackFrame } from '../../../../shared/types.js';
import type { Grammar } from './types.js';

const JAVA_TYPE_LINE = /^((?:[a-zA-Z_$][\w$]*\.)+[A-Z][\w$]*(?:Exception|Error|Throwable))(?::\s*(.*))?$/;
const THREAD_HEADER = /^Exception in thread "[^"]*" (.+)$/;
const AT_LINE = /^\s*at\s+(?:[\w.$@-]+\/+)?([\w$.<>]+)\(([^()]*)\)\s*$/;
// the parenthesised part of a JVM frame; a .NET argument list never matches
const SOURCE = /^(?:([\w$.-]+\.(?:java|kt|scala|groovy)):(\d+)|[\w$.-]+\.(?:java|kt|scala|groovy)|Native Method|Unknown Source)$/;
const CAUSED_BY = /^\s*Caused by: /;
const SUPPRESSED = /^\s*Suppressed: /;
const OMITTED = /^\s*\.\.\. \d+ (?:more|common frames omitted)\s*$/;

function headerException(body: string): { type: string; message: string } | null {
  const thread = THREAD_HEADER.exec(body);
  const match = JAVA_TYPE_LINE.exec(thread ? thread[1].trim() : body);
  if (!match) return null;
  return { type: match[1], message: (match[2] ?? '').trim() };
}

interface JavaFrame {
  func: string;
  file: string | null;
  line: number | null;
}

function frameOf(body: string): JavaFrame | null {
  const at = AT_LINE.exec(body);
  if (!at) return null;
  const source = SOURCE.exec(at[2].trim());
  if (!source) return null;
  return {
    func: at[1],
    file: source[1] ?? null,
    line: source[2] === undefined ? null : Number(source[2]),
  };
}

export const javaGrammar: Grammar = {
  id: 'java',
  structured: false,

  isHeader(body) {
    return headerException(body) !== null;
  },

  continues(body) {
    if (frameOf(body)) return true;
    return CAUSED_BY.test(body) || SUPPRESSED.test(body) || OMITTED.test(body);
  },

  parse(bodies) {
    const [header] = bodies;
    if (header === undefined) return null;

    const exception = headerException(header);
    if (!exception) return null;

    // a dotted Exception line alone is as likely .NET or prose as a JVM trace
    const parsed = bodies.slice(1).map(frameOf);
    if (!parsed.some((frame) => frame !== null)) return null;

    const frames: StackFrame[] = [];
    for (const frame of parsed) {
      if (frame && frame.file !== null && frame.line !== null) {
        frames.push({ file: frame.file, line: frame.line, func: frame.func });
      }
    }

    return { ...exception, frames };
  },
};
