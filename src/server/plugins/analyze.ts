// ============================================================================
// tracesift — Analyze Plugin
// POST /api/analyze (JSON or text/plain body), GET /api/grammars.
// Rate limited per route; body limit follows the configured byte cap.
// ============================================================================

import type { FastifyInstance } from 'fastify';
import type { Config } from '../config.js';
import { analyzeLogs } from '../services/traces/analyzer.js';
import { DYNAMIC_PRIORITY, parseGrammarSelection, parseIngestMode } from '../services/traces/grammars/index.js';
import { AnalysisConfigError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { AnalyzeRequestBody, AnalyzeResponse, SubstitutionRule } from '../../shared/types.js';

export interface AnalyzePluginOptions {
  config: Config;
}

interface AnalyzeQuery {
  mode?: string;
  grammar?: string;
  debug?: string;
}

// JSON string escaping can double the size of the log text
const JSON_OVERHEAD = 65536;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseSubstitutions(value: unknown): SubstitutionRule[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new AnalysisConfigError('substitutions', 'substitutions must be an array');
  }

  return value.map((item: unknown, i): SubstitutionRule => {
    if (!isRecord(item)) {
      throw new AnalysisConfigError('substitutions', `Substitution #${i + 1} must be an object`);
    }
    const { pattern, placeholder, regex } = item;
    if (typeof pattern !== 'string' || typeof placeholder !== 'string') {
      throw new AnalysisConfigError(
        'substitutions',
        `Substitution #${i + 1} needs string "pattern" and "placeholder" fields`,
      );
    }
    if (regex !== undefined && typeof regex !== 'boolean') {
      throw new AnalysisConfigError('substitutions', `Substitution #${i + 1}: "regex" must be a boolean`);
    }
    return { pattern, placeholder, regex };
  });
}

function parseAnchorFrames(value: unknown): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number') {
    throw new AnalysisConfigError('anchor', 'anchorFrames must be a number');
  }
  return value;
}

// --- Plugin ---

export default async function analyzePlugin(
  fastify: FastifyInstance,
  opts: AnalyzePluginOptions,
): Promise<void> {
  const { config } = opts;

  // GET /api/grammars — grammar ids in dynamic probe order
  fastify.get('/api/grammars', async (_request, reply) => {
    return reply.status(200).send({ grammars: DYNAMIC_PRIORITY });
  });

  // POST /api/analyze — extract, group and rank stack traces
  fastify.post<{ Body: AnalyzeRequestBody | string; Querystring: AnalyzeQuery }>('/api/analyze', {
    config: {
      rateLimit: {
        max: 60,
        timeWindow: '1 minute',
      },
    },
    bodyLimit: config.maxBytes * 2 + JSON_OVERHEAD,
  }, async (request, reply) => {
    const { body, query } = request;

    let logs: string;
    let fields: AnalyzeRequestBody;
    if (typeof body === 'string') {
      // text/plain: the body is the log itself
      logs = body;
      fields = { mode: query.mode, grammar: query.grammar, debug: query.debug === 'true' || query.debug === '1' };
    } else if (isRecord(body) && typeof body.logs === 'string') {
      logs = body.logs;
      fields = body;
    } else {
      return reply.status(400).send({ error: 'Request body must include a "logs" string', field: 'logs' });
    }

    try {
      const result = analyzeLogs(logs, {
        mode: parseIngestMode(fields.mode ?? config.defaultMode),
        grammar: parseGrammarSelection(fields.grammar ?? config.defaultGrammar),
        substitutions: parseSubstitutions(fields.substitutions),
        debug: fields.debug === true,
        anchorFrames: parseAnchorFrames(fields.anchorFrames),
        maxLines: config.maxLines,
        maxBytes: config.maxBytes,
        anchorExcludes: config.anchorExcludes,
        snippetLines: config.snippetLines,
      });

      const { records, ...selection } = result.selection;
      const response: AnalyzeResponse = {
        records,
        report: result.report.toJSON(),
        selection,
        truncation: result.truncation,
        stats: result.stats,
      };

      return reply.status(200).send(response);
    } catch (err: unknown) {
      if (err instanceof AnalysisConfigError) {
        return reply.status(400).send({ error: err.message, field: err.field });
      }
      logger.error('Failed to analyze logs', { error: errorMessage(err), ip: request.ip });
      return reply.status(500).send({ error: 'Internal server error' });
    }
  });
}
