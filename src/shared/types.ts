// ============================================================================
// tracesift — Shared TypeScript Types
// Used by the engine, the HTTP plugins and the tests
// ============================================================================

// --- Grammar ids (closed union, dynamic priority order) ---

export const GRAMMAR_IDS = [
  'django-json',
  'golang-json',
  'django',
  'python',
  'golang',
  'java',
  'csharp',
] as const;

export type GrammarId = (typeof GRAMMAR_IDS)[number];

export type GrammarSelection = 'dynamic' | GrammarId;

// --- Ingestion mode ---

export const INGEST_MODES = ['split', 'multiline'] as const;

export type IngestMode = (typeof INGEST_MODES)[number];

// --- Log lines ---

export interface LogLine {
  /** 0-based position in the (possibly truncated) input */
  index: number;
  raw: string;
  /** raw with the leading timestamp prefix removed */
  body: string;
  timestamp: string | null;
}

export interface Span {
  lines: LogLine[];
  start: number;
  /** index of the first line after the span */
  end: number;
}

// --- Extracted records ---

export interface StackFrame {
  file: string;
  line: number;
  func: string | null;
}

export interface ExceptionRecord {
  raw: string;
  grammar: GrammarId;
  type: string;
  message: string;
  frames: StackFrame[];
  timestamp: string | null;
  endpoint: string | null;
}

// --- Normalization ---

export interface SubstitutionRule {
  pattern: string;
  placeholder: string;
  /** treat pattern as a regular expression instead of a literal substring */
  regex?: boolean;
}

// --- Aggregation ---

export interface TraceGroup {
  signature: string;
  count: number;
  representative: ExceptionRecord;
  /** position of the representative in the record list */
  firstSeen: number;
  anchorFrames: StackFrame[];
  firstTimestamp: string | null;
  lastTimestamp: string | null;
}

// --- Selection ---

export type SelectionStrategy = 'explicit' | 'dynamic';

export type ProbeOutcome = 'no-header' | 'no-match' | 'matched' | 'locked';

export interface ProbeTraceEntry {
  line: number;
  grammar: GrammarId;
  outcome: ProbeOutcome;
}

export interface Selection {
  strategy: SelectionStrategy;
  /** the named grammar, the locked grammar, or null if dynamic never locked */
  grammar: GrammarId | null;
  lockedAtLine: number | null;
  records: ExceptionRecord[];
  spansExamined: number;
  trace: ProbeTraceEntry[];
}

// --- Truncation ---

export interface TruncationInfo {
  reason: 'lines' | 'bytes';
  keptLines: number;
  totalLines: number;
}

// --- HTTP payloads ---

export interface GroupView {
  count: number;
  grammar: GrammarId;
  type: string;
  message: string;
  location: string | null;
  endpoint: string | null;
  firstSeenAt: string | null;
  lastSeenAt: string | null;
  snippet: string;
}

export interface ReportView {
  summary: string;
  totalRecords: number;
  groups: GroupView[];
  mostCommon: GroupView | null;
  anchor: string | null;
}

export interface AnalyzeRequestBody {
  logs?: unknown;
  mode?: unknown;
  grammar?: unknown;
  substitutions?: unknown;
  debug?: unknown;
  anchorFrames?: unknown;
}

export interface AnalyzeResponse {
  records: ExceptionRecord[];
  report: ReportView;
  selection: Omit<Selection, 'records'>;
  truncation: TruncationInfo | null;
  stats: AnalysisStats;
}

export interface AnalysisStats {
  linesTotal: number;
  linesProcessed: number;
  spansExamined: number;
  records: number;
  groups: number;
}

// --- Health ---

export interface HealthStatus {
  status: 'ok';
  uptime: number;
  grammars: GrammarId[];
}
