// ============================================================================
// tracesift — Grammar registry
// ============================================================================

import {
  GRAMMAR_IDS,
  INGEST_MODES,
  type GrammarId,
  type GrammarSelection,
  type IngestMode,
} from '../../../../shared/types.js';
import { AnalysisConfigError } from '../../../utils/errors.js';
import { csharpGrammar } from './csharp.js';
import { djangoGrammar, djangoJsonGrammar } from './django.js';
import { golangGrammar, golangJsonGrammar } from './golang.js';
import { javaGrammar } from './java.js';
import { pythonGrammar } from './python.js';
import type { Grammar } from './types.js';

export type { Grammar, ParsedException } from './types.js';
export { INCOMPLETE_MESSAGE } from './types.js';

/** Structured grammars first: a JSON line can also contain a plain header. */
export const DYNAMIC_PRIORITY: readonly GrammarId[] = GRAMMAR_IDS;

function assertNever(value: never): never {
  throw new Error(`Unhandled grammar: ${String(value)}`);
}

export function grammarFor(id: GrammarId): Grammar {
  switch (id) {
    case 'django-json':
      return djangoJsonGrammar;
    case 'golang-json':
      return golangJsonGrammar;
    case 'django':
      return djangoGrammar;
    case 'python':
      return pythonGrammar;
    case 'golang':
      return golangGrammar;
    case 'java':
      return javaGrammar;
    case 'csharp':
      return csharpGrammar;
    default:
      return assertNever(id);
  }
}

export function isGrammarId(value: unknown): value is GrammarId {
  return GRAMMAR_IDS.some((id) => id === value);
}

function isIngestMode(value: unknown): value is IngestMode {
  return INGEST_MODES.some((mode) => mode === value);
}

export function parseGrammarSelection(value: unknown): GrammarSelection {
  if (value === 'dynamic' || isGrammarId(value)) {
    return value;
  }
  throw new AnalysisConfigError(
    'grammar',
    `Unknown grammar "${String(value)}". Expected "dynamic" or one of: ${GRAMMAR_IDS.join(', ')}`,
  );
}

export function parseIngestMode(value: unknown): IngestMode {
  if (isIngestMode(value)) {
    return value;
  }
  throw new AnalysisConfigError(
    'mode',
    `Unknown ingestion mode "${String(value)}". Expected one of: ${INGEST_MODES.join(', ')}`,
  );
}
