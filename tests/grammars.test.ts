import { describe, expect, it } from 'vitest';
import {
  INCOMPLETE_MESSAGE,
  grammarFor,
  parseGrammarSelection,
  parseIngestMode,
} from '../src/server/services/traces/grammars/index.js';
import { selectExplicit } from '../src/server/services/traces/selector.js';
import { readLogLines } from '../src/server/services/traces/tokenizer.js';
import { AnalysisConfigError } from '../src/server/utils/errors.js';
import type { GrammarId, IngestMode } from '../src/shared/types.js';
import {
  CHAINED_TRACEBACK,
  DJANGO_JSON_ERROR,
  DJANGO_REQUEST_ERROR,
  DOTNET_UNHANDLED,
  GO_PANIC,
  GO_ZAP_PANIC,
  JAVA_TRACE,
  STRUCTLOG_EMBEDDED,
} from './fixtures.js';

const LIMITS = { maxLines: 1000, maxBytes: 1 << 20 };

function extract(text: string, grammar: GrammarId, mode: IngestMode = 'multiline') {
  const { lines } = readLogLines(text, LIMITS);
  return selectExplicit(lines, mode, grammar).records;
}

describe('python grammar', () => {
  it('keeps a chained traceback in one record and reports the last exception', () => {
    const records = extract(CHAINED_TRACEBACK, 'python');

    expect(records).toHaveLength(1);
    expect(records[0].type).toBe('RuntimeError');
    expect(records[0].message).toBe('lookup failed');
    expect(records[0].frames).toEqual([
      { file: '/app/db.py', line: 12, func: 'fetch' },
      { file: '/app/views.py', line: 30, func: 'get' },
    ]);
  });

  it('degrades a traceback cut off before its exception line', () => {
    const records = extract('Traceback (most recent call last):\n  File "a.py", line 3, in f', 'python');

    expect(records).toHaveLength(1);
    expect(records[0].type).toBe('Traceback');
    expect(records[0].message).toBe(INCOMPLETE_MESSAGE);
    expect(records[0].frames).toEqual([]);
  });

  it('stops the span after the exception line', () => {
    const text = [
      'Traceback (most recent call last):',
      '  File "a.py", line 3, in f',
      'KeyError: 1',
      '  unrelated indented text',
    ].join('\n');

    const records = extract(text, 'python');
    expect(records[0].raw.split('\n')).toHaveLength(3);
  });
});

describe('django grammar', () => {
  it('reads the request path and the traceback below it', () => {
    const [record] = extract(DJANGO_REQUEST_ERROR, 'django');

    expect(record.type).toBe('orders.models.Order.DoesNotExist');
    expect(record.message).toBe('Order matching query does not exist.');
    expect(record.endpoint).toBe('/api/orders/42/');
    expect(record.frames.map((f) => `${f.file}:${f.line}`)).toEqual([
      '/usr/lib/python3.11/site-packages/django/core/handlers/base.py:47',
      '/app/orders/views.py:88',
    ]);
  });
});

describe('django-json grammar', () => {
  it('parses a traceback carried in exc_info', () => {
    const [record] = extract(DJANGO_JSON_ERROR, 'django-json');

    expect(record.type).toBe('TypeError');
    expect(record.message).toBe("unsupported operand type(s) for +: 'int' and 'str'");
    expect(record.frames).toEqual([{ file: '/app/cart/views.py', line: 19, func: 'post' }]);
    expect(record.timestamp).toBe('2025-03-04T05:06:07Z');
    expect(record.endpoint).toBe('/api/cart/');
  });

  it('finds a traceback in a payload embedded in the event text', () => {
    const [record] = extract(STRUCTLOG_EMBEDDED, 'django-json');

    expect(record.type).toBe('ValueError');
    expect(record.message).toBe('card declined');
    expect(record.frames).toEqual([{ file: '/app/pay.py', line: 5, func: 'charge' }]);
    expect(record.endpoint).toBeNull();
  });

  it('ignores JSON lines without a traceback', () => {
    expect(extract('{"level":"info","message":"ok"}', 'django-json')).toEqual([]);
  });
});

describe('golang grammar', () => {
  it('pairs each location with its function line', () => {
    const [record] = extract(GO_PANIC, 'golang');

    expect(record.type).toBe('panic');
    expect(record.message).toBe('runtime error: invalid memory address or nil pointer dereference');
    expect(record.frames).toEqual([
      { file: '/src/handlers.go', line: 69, func: 'main.(*Server).handle' },
      { file: '/src/middleware.go', line: 82, func: 'main.logging.func1' },
      { file: '/usr/local/go/src/net/http/server.go', line: 2136, func: 'net/http.HandlerFunc.ServeHTTP' },
      { file: '/src/middleware.go', line: 109, func: 'main.recoverer.func1' },
    ]);
  });

  it('keeps the whole dump in one span across the blank line', () => {
    const [record] = extract(GO_PANIC, 'golang');
    expect(record.raw).toBe(GO_PANIC);
  });

  it('has no frames without a goroutine dump', () => {
    const records = extract('fatal error: all goroutines are asleep - deadlock!\nexit status 2', 'golang');

    expect(records).toHaveLength(1);
    expect(records[0].type).toBe('fatal error');
    expect(records[0].message).toBe('all goroutines are asleep - deadlock!');
    expect(records[0].frames).toEqual([]);
  });

  it('reads a location without a directory', () => {
    const text = ['panic: boom', 'goroutine 1 [running]:', 'main.main()', '\tmain.go:12 +0x65'].join('\n');
    const [record] = extract(text, 'golang');

    expect(record.frames).toEqual([{ file: 'main.go', line: 12, func: 'main.main' }]);
  });
});

describe('golang-json grammar', () => {
  it('parses a zap panic record', () => {
    const [record] = extract(GO_ZAP_PANIC, 'golang-json');

    expect(record.type).toBe('panic');
    expect(record.message).toBe('assignment to entry in nil map');
    expect(record.timestamp).toBe('2025-01-01T00:00:00.000Z');
    expect(record.frames).toEqual([
      { file: '/src/api/store.go', line: 27, func: 'main.(*API).store' },
      { file: '/src/main.go', line: 15, func: 'main.main' },
    ]);
  });

  it('needs a stack as well as the panic level', () => {
    const text = JSON.stringify({ level: 'fatal', msg: 'config missing' });
    expect(extract(text, 'golang-json')).toEqual([]);
  });
});

describe('csharp grammar', () => {
  it('reads type, message and frames with file info', () => {
    const [record] = extract(DOTNET_UNHANDLED, 'csharp');

    expect(record.type).toBe('System.InvalidOperationException');
    expect(record.message).toBe('Sequence contains no elements');
    expect(record.frames).toEqual([
      { file: '/src/Orders/OrderService.cs', line: 31, func: 'Shop.Orders.OrderService.Load' },
      { file: '/src/Program.cs', line: 12, func: 'Shop.Program.Main' },
    ]);
  });

  it('takes the type from the line after a bare header', () => {
    const text = [
      'Unhandled exception.',
      "System.IO.FileNotFoundException: Could not find file '/data/in.csv'.",
      '   at Importer.Run() in /src/Importer.cs:line 8',
    ].join('\n');

    const [record] = extract(text, 'csharp');
    expect(record.type).toBe('System.IO.FileNotFoundException');
    expect(record.message).toBe("Could not find file '/data/in.csv'.");
    expect(record.frames).toEqual([{ file: '/src/Importer.cs', line: 8, func: 'Importer.Run' }]);
  });

  it('degrades a header with no type line', () => {
    const [record] = extract('Unhandled exception.', 'csharp');

    expect(record.type).toBe('UnhandledException');
    expect(record.message).toBe(INCOMPLETE_MESSAGE);
  });

  it('reads the .NET Framework header', () => {
    const text = [
      'Unhandled Exception: System.ArgumentNullException: Value cannot be null.',
      '   at Legacy.Billing.Charge(Decimal amount) in C:\\src\\Billing.cs:line 19',
    ].join('\n');

    const [record] = extract(text, 'csharp');
    expect(record.type).toBe('System.ArgumentNullException');
    expect(record.message).toBe('Value cannot be null.');
    expect(record.frames).toEqual([{ file: 'C:\\src\\Billing.cs', line: 19, func: 'Legacy.Billing.Charge' }]);
  });

  it('ignores prose that starts like the header', () => {
    expect(extract('Unhandled exceptions are logged to the audit sink', 'csharp')).toEqual([]);
    expect(extract('Unhandled exception.Retrying', 'csharp')).toEqual([]);
  });
});

describe('java grammar', () => {
  it('reads the thread header, the frames and the timestamp', () => {
    const records = extract(JAVA_TRACE, 'java');

    expect(records).toHaveLength(1);
    expect(records[0].type).toBe('java.lang.IllegalStateException');
    expect(records[0].message).toBe('cart is empty');
    expect(records[0].timestamp).toBe('18-10-2026 09:15:02.417');
    expect(records[0].frames).toEqual([
      { file: 'Cart.java', line: 42, func: 'com.shop.Cart.checkout' },
      { file: 'Main.java', line: 10, func: 'com.shop.Main.main' },
      { file: 'Cart.java', line: 77, func: 'com.shop.Cart.total' },
    ]);
  });

  it('keeps the cause and the omitted-frames line in the span', () => {
    const [record] = extract(`${JAVA_TRACE}\nINFO shutting down`, 'java');
    expect(record.raw).toBe(JAVA_TRACE);
  });

  it('strips the module prefix from a frame', () => {
    const text = [
      'java.util.ConcurrentModificationException',
      '\tat java.base/java.util.ArrayList$Itr.next(ArrayList.java:1013)',
    ].join('\n');

    const [record] = extract(text, 'java');
    expect(record.message).toBe('');
    expect(record.frames).toEqual([{ file: 'ArrayList.java', line: 1013, func: 'java.util.ArrayList$Itr.next' }]);
  });

  it('needs at least one JVM frame', () => {
    expect(extract('com.shop.CartException: empty', 'java')).toEqual([]);
    expect(extract(DOTNET_UNHANDLED.replace('Unhandled exception. ', ''), 'java')).toEqual([]);
  });
});

describe('registry', () => {
  it('dispatches every id to the grammar carrying it', () => {
    for (const id of ['django-json', 'golang-json', 'django', 'python', 'golang', 'java', 'csharp'] as const) {
      expect(grammarFor(id).id).toBe(id);
    }
  });

  it('rejects unknown grammar and mode names', () => {
    expect(() => parseGrammarSelection('ruby')).toThrow(AnalysisConfigError);
    expect(() => parseIngestMode('chunked')).toThrow(/Unknown ingestion mode "chunked"/);
    expect(parseGrammarSelection('dynamic')).toBe('dynamic');
    expect(parseIngestMode('split')).toBe('split');
  });
});
