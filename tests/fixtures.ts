// Hand-written log excerpts shared by the tests.

export function pythonTraceback(stamp: string, message = 'bad input'): string {
  return [
    `${stamp} Traceback (most recent call last):`,
    `${stamp}   File "app.py", line 10, in handler`,
    `${stamp} ValueError: ${message}`,
  ].join('\n');
}

export const TWO_VALUE_ERRORS = [
  pythonTraceback('2025-01-01T00:00:00Z'),
  pythonTraceback('2025-01-02T00:00:00Z'),
].join('\n') + '\n';

export const CHAINED_TRACEBACK = [
  'Traceback (most recent call last):',
  '  File "/app/db.py", line 12, in fetch',
  '    row = cursor.fetchone()',
  "KeyError: 'id'",
  '',
  'During handling of the above exception, another exception occurred:',
  '',
  'Traceback (most recent call last):',
  '  File "/app/views.py", line 30, in get',
  '    return fetch(pk)',
  'RuntimeError: lookup failed',
].join('\n');

export const DJANGO_REQUEST_ERROR = [
  'Internal Server Error: /api/orders/42/',
  'Traceback (most recent call last):',
  '  File "/usr/lib/python3.11/site-packages/django/core/handlers/base.py", line 47, in inner',
  '    response = get_response(request)',
  '  File "/app/orders/views.py", line 88, in retrieve',
  '    order = Order.objects.get(pk=pk)',
  'orders.models.Order.DoesNotExist: Order matching query does not exist.',
].join('\n');

export const GO_PANIC = [
  'panic: runtime error: invalid memory address or nil pointer dereference',
  '[signal SIGSEGV: segmentation violation code=0x1 addr=0x0 pc=0x4a1b2c]',
  '',
  'goroutine 1 [running]:',
  'main.(*Server).handle(0xc000010000, {0x0, 0x0})',
  '\t/src/handlers.go:69 +0x1d',
  'main.logging.func1({0x5e2b40, 0xc0000a2000}, 0xc0000b4000)',
  '\t/src/middleware.go:82 +0x9c',
  'net/http.HandlerFunc.ServeHTTP(0xc000012345, {0x5e2b40, 0xc0000a2000}, 0xc0000b4000)',
  '\t/usr/local/go/src/net/http/server.go:2136 +0x29',
  'main.recoverer.func1({0x5e2b40, 0xc0000a2000}, 0xc0000b4000)',
  '\t/src/middleware.go:109 +0x7a',
  'exit status 2',
].join('\n');

export const GO_ZAP_PANIC = JSON.stringify({
  level: 'panic',
  ts: 1735689600,
  caller: 'api/server.go:41',
  msg: 'panic: assignment to entry in nil map',
  stacktrace: 'main.(*API).store(...)\n\t/src/api/store.go:27\nmain.main()\n\t/src/main.go:15',
});

export const DJANGO_JSON_ERROR = JSON.stringify({
  levelname: 'ERROR',
  timestamp: '2025-03-04T05:06:07Z',
  message: 'Internal Server Error: /api/cart/',
  exc_info: [
    'Traceback (most recent call last):',
    '  File "/app/cart/views.py", line 19, in post',
    '    total = sum(prices)',
    "TypeError: unsupported operand type(s) for +: 'int' and 'str'",
  ].join('\n'),
});

export const STRUCTLOG_EMBEDDED = JSON.stringify({
  timestamp: '2025-03-04T06:00:00Z',
  event: `request failed with data ${JSON.stringify({
    stacktrace: 'Traceback (most recent call last):\n  File "/app/pay.py", line 5, in charge\nValueError: card declined',
  })}`,
});

export const DOTNET_UNHANDLED = [
  'Unhandled exception. System.InvalidOperationException: Sequence contains no elements',
  '   at System.Linq.ThrowHelper.ThrowNoElementsException()',
  '   at Shop.Orders.OrderService.Load(Int32 id) in /src/Orders/OrderService.cs:line 31',
  '   at Shop.Program.Main(String[] args) in /src/Program.cs:line 12',
].join('\n');

export const JAVA_TRACE = [
  '18-10-2026 09:15:02.417 Exception in thread "main" java.lang.IllegalStateException: cart is empty',
  '\tat com.shop.Cart.checkout(Cart.java:42)',
  '\tat com.shop.Main.main(Main.java:10)',
  'Caused by: java.lang.NullPointerException: items',
  '\tat com.shop.Cart.total(Cart.java:77)',
  '\tat jdk.internal.reflect.NativeMethodAccessorImpl.invoke0(Native Method)',
  '\t... 2 more',
].join('\n');
