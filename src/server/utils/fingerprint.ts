// ============================================================================
// tracesift — Signature normalization
// Strips volatile data from a record and hashes what is left so that the same
// logical exception groups together across occurrences.
// ============================================================================

import { createHash } from 'node:crypto';
import type { ExceptionRecord, SubstitutionRule } from '../../shared/types.js';
import { AnalysisConfigError, errorMessage } from './errors.js';
import { TIMESTAMP_SOURCE } from './timestamps.js';

export const UUID_PLACEHOLDER = '<uuid>';
export const HEX_PLACEHOLDER = '<hex>';

const LEADING_TIMESTAMP = new RegExp(`^\\s*(?:\\[${TIMESTAMP_SOURCE}\\]|${TIMESTAMP_SOURCE})\\s*`);

const UUID = /[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}/g;

// request ids, trace ids, pointers, hashes
const HEX_RUN = /[0-9a-fA-F]{6,}/g;

// passes that change the text without shortening it; shrinking passes are unbounded
const MAX_NON_SHRINKING_PASSES = 8;

export interface CompiledRule {
  readonly rule: SubstitutionRule;
  apply(text: string): string;
}

/**
 * Validate caller-supplied substitutions. A rule whose placeholder would match
 * its own pattern is rejected: applying it again would keep rewriting.
 */
export function compileRules(rules: readonly SubstitutionRule[] = []): CompiledRule[] {
  return rules.map((rule, i) => {
    if (typeof rule.pattern !== 'string' || rule.pattern === '') {
      throw new AnalysisConfigError('substitutions', `Substitution #${i + 1} needs a non-empty pattern`);
    }
    if (typeof rule.placeholder !== 'string') {
      throw new AnalysisConfigError('substitutions', `Substitution #${i + 1} needs a string placeholder`);
    }

    if (!rule.regex) {
      const { pattern, placeholder } = rule;
      if (placeholder.includes(pattern)) {
        throw new AnalysisConfigError(
          'substitutions',
          `Substitution #${i + 1}: placeholder "${placeholder}" contains its own pattern "${pattern}"`,
        );
      }
      return { rule, apply: (text: string) => text.split(pattern).join(placeholder) };
    }

    let regex: RegExp;
    try {
      regex = new RegExp(rule.pattern, 'g');
    } catch (err: unknown) {
      throw new AnalysisConfigError(
        'substitutions',
        `Substitution #${i + 1}: invalid pattern /${rule.pattern}/: ${errorMessage(err)}`,
      );
    }
    if (new RegExp(rule.pattern).test(rule.placeholder)) {
      throw new AnalysisConfigError(
        'substitutions',
        `Substitution #${i + 1}: placeholder "${rule.placeholder}" matches its own pattern /${rule.pattern}/`,
      );
    }
    const placeholder = rule.placeholder;
    return { rule, apply: (text: string) => text.replace(regex, () => placeholder) };
  });
}

function stripLeadingTimestamps(text: string): string {
  let result = text;
  while (LEADING_TIMESTAMP.test(result)) {
    result = result.replace(LEADING_TIMESTAMP, '');
  }
  return result;
}

function normalizeOnce(text: string, rules: readonly CompiledRule[]): string {
  let result = stripLeadingTimestamps(text);
  result = result.replace(UUID, UUID_PLACEHOLDER).replace(HEX_RUN, HEX_PLACEHOLDER);
  for (const rule of rules) {
    result = rule.apply(result);
  }
  return result;
}

/**
 * Normalize one line of record text:
 *   1. leading timestamp prefixes (ISO 8601, Go log, syslog, DD-MM-YYYY)
 *   2. UUIDs, then runs of 6+ hex characters
 *   3. caller substitutions, in the order given
 * Repeated until nothing changes, so normalize(normalize(x)) === normalize(x).
 * Substitutions that keep rewriting without shortening the text are rejected.
 */
export function normalize(text: string, rules: readonly CompiledRule[] = []): string {
  let current = text;
  let nonShrinking = 0;

  for (;;) {
    const next = normalizeOnce(current, rules);
    if (next === current) {
      return current;
    }

    if (next.length >= current.length) {
      nonShrinking++;
      if (nonShrinking > MAX_NON_SHRINKING_PASSES) {
        throw new AnalysisConfigError(
          'substitutions',
          `Substitutions never settle: text still changing after ${MAX_NON_SHRINKING_PASSES} passes that did not shorten it`,
        );
      }
    }
    current = next;
  }
}

/**
 * Grouping key for a record. Built from the grammar, the normalized
 * `type: message` line and each normalized frame location; never shown.
 */
export function signatureOf(record: ExceptionRecord, rules: readonly CompiledRule[] = []): string {
  const parts = [
    record.grammar,
    normalize(`${record.type}: ${record.message}`, rules),
    ...record.frames.map((frame) => normalize(`${frame.file}:${frame.line}`, rules)),
  ];

  // null byte separator so one field cannot bleed into the next
  return createHash('sha256').update(parts.join('\0')).digest('hex');
}
