import type { GrammarId, StackFrame } from '../../../../shared/types.js';

/** Message used when a header matched but the rest of the trace did not. */
export const INCOMPLETE_MESSAGE = '<incomplete stack trace>';

export interface ParsedException {
  type: string;
  message: string;
  frames: StackFrame[];
  /** set by structured grammars that carry their own time field */
  timestamp?: string | null;
  endpoint?: string | null;
}

/**
 * One language ecosystem's exception format. Predicates and `parse` see line
 * bodies (timestamp prefix already removed) and must never throw.
 */
export interface Grammar {
  readonly id: GrammarId;
  /** one exception per record (JSON line) rather than bare text lines */
  readonly structured: boolean;
  isHeader(body: string): boolean;
  /** `prev` is the last non-blank body already in the span */
  continues(body: string, prev: string): boolean;
  parse(bodies: readonly string[]): ParsedException | null;
}
