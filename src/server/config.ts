// ============================================================================
// tracesift — Server Configuration
// Loads and validates environment variables
// ============================================================================

import { INGEST_MODES, type GrammarSelection, type IngestMode } from '../shared/types.js';
import { DEFAULT_ANCHOR_EXCLUDES } from './services/traces/aggregator.js';
import { DEFAULT_LIMITS } from './services/traces/analyzer.js';
import { isGrammarId } from './services/traces/grammars/index.js';
import { DEFAULT_SNIPPET_LINES } from './services/traces/reporter.js';
import { logger } from './utils/logger.js';

export interface Config {
  /** Server port */
  port: number;

  /** Interface to bind */
  host: string;

  /** Lines read per request before the input is truncated */
  maxLines: number;

  /** UTF-8 bytes read per request before the input is truncated */
  maxBytes: number;

  /** Ingestion mode when the request names none */
  defaultMode: IngestMode;

  /** Grammar selection when the request names none */
  defaultGrammar: GrammarSelection;

  /** Frame paths never used as the anchor */
  anchorExcludes: string[];

  /** Representative lines shown per group */
  snippetLines: number;
}

type Env = Record<string, string | undefined>;

function positiveInt(env: Env, name: string, fallback: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[name];
  const value = raw ? Number(raw) : fallback;
  if (!Number.isInteger(value) || value < 1 || value > max) {
    throw new Error(`Invalid ${name} value: ${raw}`);
  }
  return value;
}

function isIngestMode(value: string): value is IngestMode {
  return INGEST_MODES.some((mode) => mode === value);
}

export function loadConfig(env: Env = process.env): Config {
  // --- PORT (optional, default 3000) ---
  const port = positiveInt(env, 'PORT', 3000, 65535);

  const host = env.HOST || '0.0.0.0';

  // --- Input caps ---
  const maxLines = positiveInt(env, 'TRACESIFT_MAX_LINES', DEFAULT_LIMITS.maxLines);
  const maxBytes = positiveInt(env, 'TRACESIFT_MAX_BYTES', DEFAULT_LIMITS.maxBytes);

  // --- TRACESIFT_DEFAULT_MODE (optional, default multiline) ---
  const defaultMode = env.TRACESIFT_DEFAULT_MODE || 'multiline';
  if (!isIngestMode(defaultMode)) {
    throw new Error(`Invalid TRACESIFT_DEFAULT_MODE value: ${defaultMode} (expected ${INGEST_MODES.join(' or ')})`);
  }

  // --- TRACESIFT_DEFAULT_GRAMMAR (optional, default dynamic) ---
  const defaultGrammar = env.TRACESIFT_DEFAULT_GRAMMAR || 'dynamic';
  if (defaultGrammar !== 'dynamic' && !isGrammarId(defaultGrammar)) {
    throw new Error(`Invalid TRACESIFT_DEFAULT_GRAMMAR value: ${defaultGrammar}`);
  }

  // --- TRACESIFT_ANCHOR_EXCLUDES (optional, comma separated) ---
  const excludesRaw = env.TRACESIFT_ANCHOR_EXCLUDES;
  const anchorExcludes = excludesRaw
    ? excludesRaw.split(',').map((part) => part.trim()).filter((part) => part !== '')
    : [...DEFAULT_ANCHOR_EXCLUDES];

  const snippetLines = positiveInt(env, 'TRACESIFT_SNIPPET_LINES', DEFAULT_SNIPPET_LINES);

  const config: Config = {
    port,
    host,
    maxLines,
    maxBytes,
    defaultMode,
    defaultGrammar,
    anchorExcludes,
    snippetLines,
  };

  logger.info('Configuration loaded', { ...config });

  return config;
}
