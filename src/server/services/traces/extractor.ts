// ============================================================================
// tracesift — Frame extractor
// ============================================================================

import type { ExceptionRecord, Span } from '../../../shared/types.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { Grammar, ParsedException } from './grammars/index.js';

/**
 * Apply `grammar` to one span. Returns null when the grammar does not
 * recognise it; a grammar that throws is logged and treated the same way.
 */
export function extractRecord(span: Span, grammar: Grammar): ExceptionRecord | null {
  let parsed: ParsedException | null;
  try {
    parsed = grammar.parse(span.lines.map((line) => line.body));
  } catch (err: unknown) {
    logger.warn('Grammar failed on span; treating as no match', {
      grammar: grammar.id,
      line: span.start,
      error: errorMessage(err),
    });
    return null;
  }

  if (!parsed) {
    return null;
  }

  return {
    raw: span.lines.map((line) => line.raw).join('\n'),
    grammar: grammar.id,
    type: parsed.type,
    message: parsed.message,
    frames: parsed.frames,
    timestamp: parsed.timestamp ?? span.lines[0]?.timestamp ?? null,
    endpoint: parsed.endpoint ?? null,
  };
}
