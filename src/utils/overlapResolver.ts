// src/utils/overlapResolver.ts
import type { NormalizedEvent } from '../types/calendar.js';
import type { CandidateChange, ChangeAction } from '../types/sync.js';

type Span = Pick<NormalizedEvent, 'start' | 'end'>;

/**
 * Same occurrence = identical [start, end). Titles are never compared
 * because the portal only ever sees redacted titles.
 */
export function isSameOccurrence(a: Span, b: Span): boolean {
  return a.start.getTime() === b.start.getTime() && a.end.getTime() === b.end.getTime();
}

/**
 * Intervals intersect with non-zero duration.
 * Touching boundaries (one ends when the other starts) do not overlap.
 */
export function overlaps(a: Span, b: Span): boolean {
  return a.start.getTime() < b.end.getTime() && b.start.getTime() < a.end.getTime();
}

/**
 * Chronological order, ties broken by sourceId (code-unit order, locale independent)
 */
export function compareEvents(a: NormalizedEvent, b: NormalizedEvent): number {
  const diff = a.start.getTime() - b.start.getTime();
  if (diff !== 0) return diff;
  if (a.sourceId < b.sourceId) return -1;
  if (a.sourceId > b.sourceId) return 1;
  return 0;
}

/**
 * Compute the changes needed to represent `incoming` in a target that
 * already holds `existing`.
 *
 * - Identical interval already in `existing`: dropped, never re-proposed
 * - Identical interval to an earlier incoming event: collapsed into it
 * - Overlapping an existing event: proposed with `duplicateOf` set, for the
 *   human to judge
 * - All-day events on either side are ignored
 *
 * Pure: no I/O, no throws, same inputs give the same list.
 *
 * @param existing - Events already present in the target
 * @param incoming - Events that should be represented in the target
 * @param action - What applying a candidate means for this target
 * @returns Candidates ordered by start, then sourceId
 */
export function resolve(
  existing: readonly NormalizedEvent[],
  incoming: readonly NormalizedEvent[],
  action: ChangeAction
): CandidateChange[] {
  const present = existing.filter((e) => !e.allDay).sort(compareEvents);
  const ordered = incoming.filter((e) => !e.allDay).sort(compareEvents);

  const accepted: NormalizedEvent[] = [];
  const candidates: CandidateChange[] = [];

  for (const event of ordered) {
    if (present.some((e) => isSameOccurrence(e, event))) {
      continue;
    }
    if (accepted.some((e) => isSameOccurrence(e, event))) {
      continue;
    }
    accepted.push(event);

    const overlapping = present.find((e) => overlaps(e, event));
    candidates.push(
      Object.freeze(
        overlapping ? { event, action, duplicateOf: overlapping } : { event, action }
      )
    );
  }

  return candidates;
}
