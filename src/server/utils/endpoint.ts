// ============================================================================
// tracesift — Endpoint extraction
// Recovers the request path a record was raised under, when the log says so.
// ============================================================================

const HTTP_METHODS = 'GET|POST|PUT|DELETE|PATCH|HEAD|OPTIONS';

// django.request: "Internal Server Error: /api/orders/42/"
const DJANGO_REQUEST = /Internal Server Error: (\/[^\s"]*)/;

// "GET /api/orders" 500
const QUOTED_REQUEST = new RegExp(`"(${HTTP_METHODS})\\s+(\\/[^\\s"]*?)"`);

// method=GET path=/api/orders status=500
const STRUCTURED_REQUEST = new RegExp(`method=(${HTTP_METHODS})\\s+path=(\\/\\S+)`);

// POST /api/orders failed
const FAILED_REQUEST = new RegExp(`(${HTTP_METHODS})\\s+(\\/\\S+)\\s+failed`, 'i');

export function extractEndpoint(text: string): string | null {
  const django = DJANGO_REQUEST.exec(text);
  if (django) {
    return django[1];
  }

  for (const pattern of [QUOTED_REQUEST, STRUCTURED_REQUEST, FAILED_REQUEST]) {
    const match = pattern.exec(text);
    if (match) {
      return `${match[1].toUpperCase()} ${match[2]}`;
    }
  }

  return null;
}
