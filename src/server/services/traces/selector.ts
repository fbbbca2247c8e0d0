// ============================================================================
// tracesift — Grammar selector
// Explicit: one named grammar over the whole stream.
// Dynamic: probe every grammar in priority order at each line until one
// parses a span, then lock it for the rest of the stream.
// ============================================================================

import type {
  ExceptionRecord,
  GrammarId,
  IngestMode,
  LogLine,
  ProbeOutcome,
  ProbeTraceEntry,
  Selection,
} from '../../../shared/types.js';
import { logger } from '../../utils/logger.js';
import { extractRecord } from './extractor.js';
import { DYNAMIC_PRIORITY, grammarFor, type Grammar } from './grammars/index.js';
import { readSpan, tokenize } from './tokenizer.js';

export interface SelectOptions {
  debug?: boolean;
}

interface Pass {
  records: ExceptionRecord[];
  spansExamined: number;
}

function applyGrammar(
  lines: readonly LogLine[],
  mode: IngestMode,
  grammar: Grammar,
  from: number,
  trace: ProbeTraceEntry[] | null,
): Pass {
  const records: ExceptionRecord[] = [];
  const spans = tokenize(lines, mode, [grammar], from);

  for (const { span } of spans) {
    const record = extractRecord(span, grammar);
    if (record) {
      records.push(record);
    }
    trace?.push({ line: span.start, grammar: grammar.id, outcome: record ? 'matched' : 'no-match' });
  }

  return { records, spansExamined: spans.length };
}

export function selectExplicit(
  lines: readonly LogLine[],
  mode: IngestMode,
  id: GrammarId,
  options: SelectOptions = {},
): Selection {
  const trace: ProbeTraceEntry[] = [];
  const pass = applyGrammar(lines, mode, grammarFor(id), 0, options.debug ? trace : null);

  return {
    strategy: 'explicit',
    grammar: id,
    lockedAtLine: null,
    records: pass.records,
    spansExamined: pass.spansExamined,
    trace,
  };
}

export function selectDynamic(
  lines: readonly LogLine[],
  mode: IngestMode,
  options: SelectOptions = {},
): Selection {
  const trace: ProbeTraceEntry[] = [];
  const probe = (line: number, grammar: GrammarId, outcome: ProbeOutcome): void => {
    if (options.debug) {
      trace.push({ line, grammar, outcome });
    }
  };

  const grammars = DYNAMIC_PRIORITY.map(grammarFor);
  let spansExamined = 0;

  for (let i = 0; i < lines.length; i++) {
    for (const grammar of grammars) {
      const span = readSpan(lines, i, grammar, mode);
      if (!span) {
        probe(i, grammar.id, 'no-header');
        continue;
      }

      spansExamined++;
      const record = extractRecord(span, grammar);
      if (!record) {
        probe(i, grammar.id, 'no-match');
        continue;
      }

      probe(i, grammar.id, 'locked');
      logger.debug('Grammar locked', { grammar: grammar.id, line: i });

      // never re-probed: the rest of the stream belongs to the locked grammar
      const rest = applyGrammar(lines, mode, grammar, span.end, options.debug ? trace : null);
      return {
        strategy: 'dynamic',
        grammar: grammar.id,
        lockedAtLine: i,
        records: [record, ...rest.records],
        spansExamined: spansExamined + rest.spansExamined,
        trace,
      };
    }
  }

  return {
    strategy: 'dynamic',
    grammar: null,
    lockedAtLine: null,
    records: [],
    spansExamined,
    trace,
  };
}
