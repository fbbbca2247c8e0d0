// ============================================================================
// tracesift — Reporter
// Ranked groups, the most common one, and its file:line anchor for the
// downstream issue writer.
// ============================================================================

import type { GroupView, ReportView, StackFrame, TraceGroup, TruncationInfo } from '../../../shared/types.js';
import { splitTimestamp } from '../../utils/timestamps.js';
import { rankGroups } from './aggregator.js';

export const DEFAULT_SNIPPET_LINES = 12;

const MAX_SNIPPET_LINE = 240;

export interface ReportOptions {
  /** frames joined by anchor() when called without an argument */
  anchorFrames?: number;
  snippetLines?: number;
  truncation?: TruncationInfo | null;
}

function formatFrame(frame: StackFrame): string {
  return `${frame.file}:${frame.line}`;
}

function headline(group: TraceGroup): string {
  const { type, message } = group.representative;
  return message ? `${type}: ${message}` : type;
}

function clip(line: string): string {
  return line.length > MAX_SNIPPET_LINE ? `${line.slice(0, MAX_SNIPPET_LINE - 3)}...` : line;
}

export class TraceReport {
  readonly groups: readonly TraceGroup[];
  readonly mostCommon: TraceGroup | null;
  readonly totalRecords: number;

  private readonly anchorFrames: number;
  private readonly snippetLines: number;
  private readonly truncation: TruncationInfo | null;

  constructor(groups: readonly TraceGroup[], options: ReportOptions = {}) {
    this.groups = rankGroups(groups);
    this.mostCommon = this.groups[0] ?? null;
    this.totalRecords = this.groups.reduce((sum, group) => sum + group.count, 0);
    this.anchorFrames = options.anchorFrames ?? 1;
    this.snippetLines = options.snippetLines ?? DEFAULT_SNIPPET_LINES;
    this.truncation = options.truncation ?? null;
  }

  /**
   * `file:line` of the most common group's first frame(s), comma separated.
   * Null when there is no group or it has no frames.
   */
  anchor(frameCount = this.anchorFrames): string | null {
    const frames = this.mostCommon?.anchorFrames.slice(0, Math.max(frameCount, 1)) ?? [];
    return frames.length > 0 ? frames.map(formatFrame).join(', ') : null;
  }

  snippet(group: TraceGroup): string {
    const lines = group.representative.raw.split('\n').map((raw) => clip(splitTimestamp(raw).body));
    if (lines.length <= this.snippetLines) {
      return lines.join('\n');
    }
    const kept = lines.slice(0, this.snippetLines);
    kept.push(`... (${lines.length - this.snippetLines} more lines)`);
    return kept.join('\n');
  }

  render(): string {
    if (!this.mostCommon) {
      const out = ['Stack trace report: no stack traces found'];
      const warning = this.truncationWarning();
      if (warning) out.push(warning);
      return out.join('\n');
    }

    const out: string[] = [
      `Stack trace report: ${this.totalRecords} occurrence(s) in ${this.groups.length} group(s)`,
      `Most common: ${headline(this.mostCommon)} (${this.mostCommon.count}x) at ${this.anchor() ?? 'unknown location'}`,
    ];

    const warning = this.truncationWarning();
    if (warning) out.push(warning);

    this.groups.forEach((group, i) => {
      out.push('');
      out.push(`#${i + 1} [${group.representative.grammar}] ${headline(group)}`);
      out.push(`  occurrences: ${group.count}`);
      if (group.firstTimestamp) out.push(`  first seen: ${group.firstTimestamp}`);
      if (group.lastTimestamp) out.push(`  last seen: ${group.lastTimestamp}`);
      if (group.representative.endpoint) out.push(`  endpoint: ${group.representative.endpoint}`);
      out.push(`  location: ${group.anchorFrames[0] ? formatFrame(group.anchorFrames[0]) : 'unknown'}`);
      out.push('  snippet:');
      for (const line of this.snippet(group).split('\n')) {
        out.push(`    ${line}`);
      }
    });

    return out.join('\n');
  }

  toJSON(): ReportView {
    const groups = this.groups.map((group) => this.view(group));
    return {
      summary: this.render(),
      totalRecords: this.totalRecords,
      groups,
      mostCommon: groups[0] ?? null,
      anchor: this.anchor(),
    };
  }

  private view(group: TraceGroup): GroupView {
    const { representative } = group;
    return {
      count: group.count,
      grammar: representative.grammar,
      type: representative.type,
      message: representative.message,
      location: group.anchorFrames[0] ? formatFrame(group.anchorFrames[0]) : null,
      endpoint: representative.endpoint,
      firstSeenAt: group.firstTimestamp,
      lastSeenAt: group.lastTimestamp,
      snippet: this.snippet(group),
    };
  }

  private truncationWarning(): string | null {
    if (!this.truncation) return null;
    const { keptLines, totalLines, reason } = this.truncation;
    return `warning: input truncated at ${keptLines} of ${totalLines} lines (${reason} cap); counts reflect the processed prefix`;
  }
}
