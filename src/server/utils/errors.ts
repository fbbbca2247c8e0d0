// ============================================================================
// tracesift — Error types
// Control-input mistakes (unknown grammar/mode, bad rules, bad limits) are the
// only fatal conditions; everything in the log data itself is a normal outcome.
// ============================================================================

export type ConfigField = 'grammar' | 'mode' | 'substitutions' | 'limits' | 'anchor';

export class AnalysisConfigError extends Error {
  readonly field: ConfigField;

  constructor(field: ConfigField, message: string) {
    super(message);
    this.name = 'AnalysisConfigError';
    this.field = field;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
