// ============================================================================
// tracesift — .NET exception grammar
//
//   Unhandled exception. System.InvalidOperationException: Sequence contains no elements
//      at System.Linq.ThrowHelper.ThrowNoElementsException()
//      at Shop.Orders.OrderService.Load(Int32 id) in /src/Orders/OrderService.cs:line 31
//    ---> System.NullReferenceException: Object reference not set to an instance of an object.
//      --- End of inner exception stack trace ---
// ============================================================================

import type { StackFrame } from '../../../../shared/types.js';
import { INCOMPLETE_MESSAGE, type Grammar } from './types.js';

// .NET Core prints "Unhandled exception.", .NET Framework "Unhandled Exception:"
const UNHANDLED = /^(?:Unhandled exception\.|Unhandled Exception:)(?:\s+(.*))?$/;
const TYPE_LINE = /^((?:[A-Za-z_]\w*\.)+[A-Za-z_]\w*Exception)(?::\s*(.*))?$/;
const AT_LINE = /^\s*at\s+\S/;
const INNER = /^\s*--->\s/;
const END_OF = /^\s*--- End of /;
const FRAME = /^\s*at\s+(.+?)\(.*?\)\s+in\s+(.+):line\s+(\d+)\s*$/;

function typeLine(text: string): { type: string; message: string } | null {
  const match = TYPE_LINE.exec(text.trim());
  if (!match) return null;
  // inner exceptions are appended inline after " ---> "
  const message = (match[2] ?? '').split(' ---> ')[0];
  return { type: match[1], message: message.trim() };
}

export const csharpGrammar: Grammar = {
  id: 'csharp',
  structured: false,

  isHeader(body) {
    return UNHANDLED.test(body) || TYPE_LINE.test(body);
  },

  continues(body, prev) {
    if (AT_LINE.test(body) || INNER.test(body) || END_OF.test(body)) return true;
    // "Unhandled exception." alone puts the type on the next line
    const bare = UNHANDLED.exec(prev);
    return bare !== null && !bare[1] && TYPE_LINE.test(body);
  },

  parse(bodies) {
    const [header] = bodies;
    if (header === undefined) return null;

    const unhandled = UNHANDLED.exec(header);
    const typeText = unhandled ? unhandled[1] || (bodies[1] ?? '') : header;
    const exception = typeLine(typeText);
    if (!exception) {
      if (!unhandled) return null;
      return { type: 'UnhandledException', message: INCOMPLETE_MESSAGE, frames: [] };
    }

    const frames: StackFrame[] = [];
    for (const body of bodies) {
      const frame = FRAME.exec(body);
      if (frame) {
        frames.push({ file: frame[2].trim(), line: Number(frame[3]), func: frame[1].trim() });
      }
    }

    return { ...exception, frames };
  },
};
