import type { CalendarDate } from "../types.js"
import {
  checkSpan,
  intersection,
  occupiedDates,
  type ShiftInterval,
} from "./interval-math.js"

export type OverlapIssue =
  | { type: "illegal-span"; reason: "empty" | "too-long"; spanMs: number }
  | {
      type: "overlap"
      conflicts: ShiftInterval[]
      /** Every calendar date on which the candidate collides, in order */
      dates: CalendarDate[]
    }

export type ValidationResult =
  | { valid: true; candidate: ShiftInterval }
  | { valid: false; candidate: ShiftInterval; issue: OverlapIssue }

/**
 * Check a candidate interval against already-committed intervals.
 *
 * A candidate with an illegal span is rejected without looking at
 * `existing`. Otherwise every overlapping interval is reported, not only
 * the first. An existing interval sharing the candidate's id is the
 * candidate's own previous placement and is skipped.
 */
export function validate(
  candidate: ShiftInterval,
  existing: readonly ShiftInterval[],
): ValidationResult {
  const span = checkSpan(candidate)
  if (!span.legal) {
    return {
      valid: false,
      candidate,
      issue: { type: "illegal-span", reason: span.reason, spanMs: span.spanMs },
    }
  }

  const conflicts: ShiftInterval[] = []
  const dates = new Set<CalendarDate>()

  for (const other of existing) {
    if (other.id === candidate.id) continue

    const shared = intersection(candidate, other)
    if (!shared) continue

    conflicts.push(other)
    for (const date of occupiedDates(shared)) {
      dates.add(date)
    }
  }

  if (conflicts.length === 0) {
    return { valid: true, candidate }
  }

  return {
    valid: false,
    candidate,
    issue: { type: "overlap", conflicts, dates: [...dates].sort() },
  }
}
