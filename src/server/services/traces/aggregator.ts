// ============================================================================
// tracesift — Aggregator
// Group by signature, count occurrences, keep the first-seen record as the
// representative and the first anchor-eligible frames across members.
// ============================================================================

import type { ExceptionRecord, StackFrame, TraceGroup } from '../../../shared/types.js';
import { signatureOf, type CompiledRule } from '../../utils/fingerprint.js';

/** Frames in these locations are library or runtime code, not the app's. */
export const DEFAULT_ANCHOR_EXCLUDES: readonly string[] = [
  'site-packages',
  'dist-packages',
  '/html',
  '/usr/local/go/src/',
  '<frozen ',
];

export interface GroupOptions {
  rules?: readonly CompiledRule[];
  anchorExcludes?: readonly string[];
}

export function anchorFramesOf(
  record: ExceptionRecord,
  excludes: readonly string[] = DEFAULT_ANCHOR_EXCLUDES,
): StackFrame[] {
  const eligible = record.frames.filter(
    (frame) => !excludes.some((exclude) => frame.file.includes(exclude)),
  );
  // all library frames: better a library location than none
  return eligible.length > 0 ? eligible : record.frames;
}

export function groupRecords(
  records: readonly ExceptionRecord[],
  options: GroupOptions = {},
): TraceGroup[] {
  const { rules = [], anchorExcludes = DEFAULT_ANCHOR_EXCLUDES } = options;
  const groups = new Map<string, TraceGroup>();

  records.forEach((record, position) => {
    const signature = signatureOf(record, rules);
    const existing = groups.get(signature);

    if (!existing) {
      groups.set(signature, {
        signature,
        count: 1,
        representative: record,
        firstSeen: position,
        anchorFrames: anchorFramesOf(record, anchorExcludes),
        firstTimestamp: record.timestamp,
        lastTimestamp: record.timestamp,
      });
      return;
    }

    existing.count++;
    if (existing.anchorFrames.length === 0) {
      existing.anchorFrames = anchorFramesOf(record, anchorExcludes);
    }
    if (record.timestamp) {
      existing.firstTimestamp ??= record.timestamp;
      existing.lastTimestamp = record.timestamp;
    }
  });

  return [...groups.values()];
}

/** Count descending; ties keep first-seen order. */
export function rankGroups(groups: readonly TraceGroup[]): TraceGroup[] {
  return [...groups].sort((a, b) => b.count - a.count || a.firstSeen - b.firstSeen);
}
