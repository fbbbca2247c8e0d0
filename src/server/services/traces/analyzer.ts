// ============================================================================
// tracesift — Analyzer
// Single entry point: validate control inputs, then
// tokenize -> select -> extract -> normalize -> aggregate -> report.
// ============================================================================

import type {
  ExceptionRecord,
  AnalysisStats,
  Selection,
  SubstitutionRule,
  TruncationInfo,
} from '../../../shared/types.js';
import { AnalysisConfigError, type ConfigField } from '../../utils/errors.js';
import { compileRules } from '../../utils/fingerprint.js';
import { logger } from '../../utils/logger.js';
import { DEFAULT_ANCHOR_EXCLUDES, groupRecords } from './aggregator.js';
import { parseGrammarSelection, parseIngestMode } from './grammars/index.js';
import { DEFAULT_SNIPPET_LINES, TraceReport } from './reporter.js';
import { selectDynamic, selectExplicit } from './selector.js';
import { readLogLines, type LineLimits } from './tokenizer.js';

export const DEFAULT_LIMITS: LineLimits = {
  maxLines: 10_000,
  maxBytes: 2 * 1024 * 1024,
};

export interface AnalyzeOptions {
  /** `split` or `multiline`; strings from callers are validated */
  mode?: string;
  /** `dynamic` or a grammar id */
  grammar?: string;
  substitutions?: readonly SubstitutionRule[];
  debug?: boolean;
  maxLines?: number;
  maxBytes?: number;
  anchorExcludes?: readonly string[];
  anchorFrames?: number;
  snippetLines?: number;
}

export interface AnalysisResult {
  records: ExceptionRecord[];
  report: TraceReport;
  selection: Selection;
  truncation: TruncationInfo | null;
  stats: AnalysisStats;
}

function positiveInt(field: ConfigField, name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isInteger(value) || value < 1) {
    throw new AnalysisConfigError(field, `${name} must be a positive integer, got ${String(value)}`);
  }
  return value;
}

export function analyzeLogs(text: string, options: AnalyzeOptions = {}): AnalysisResult {
  const mode = parseIngestMode(options.mode ?? 'multiline');
  const grammar = parseGrammarSelection(options.grammar ?? 'dynamic');
  const rules = compileRules(options.substitutions);
  const limits: LineLimits = {
    maxLines: positiveInt('limits', 'maxLines', options.maxLines, DEFAULT_LIMITS.maxLines),
    maxBytes: positiveInt('limits', 'maxBytes', options.maxBytes, DEFAULT_LIMITS.maxBytes),
  };
  const anchorFrames = positiveInt('anchor', 'anchorFrames', options.anchorFrames, 1);
  const snippetLines = positiveInt('limits', 'snippetLines', options.snippetLines, DEFAULT_SNIPPET_LINES);

  const { lines, truncation, totalLines } = readLogLines(text, limits);
  if (truncation) {
    logger.warn('Log input truncated', { ...truncation });
  }

  const selection =
    grammar === 'dynamic'
      ? selectDynamic(lines, mode, { debug: options.debug })
      : selectExplicit(lines, mode, grammar, { debug: options.debug });

  const groups = groupRecords(selection.records, {
    rules,
    anchorExcludes: options.anchorExcludes ?? DEFAULT_ANCHOR_EXCLUDES,
  });
  const report = new TraceReport(groups, { anchorFrames, snippetLines, truncation });

  const stats: AnalysisStats = {
    linesTotal: totalLines,
    linesProcessed: lines.length,
    spansExamined: selection.spansExamined,
    records: selection.records.length,
    groups: groups.length,
  };

  logger.info('Log analysis complete', {
    mode,
    grammar: selection.grammar ?? grammar,
    ...stats,
    anchor: report.anchor(),
  });

  return { records: selection.records, report, selection, truncation, stats };
}
