import type { CalendarDate, ShiftWindow, TimeOfDay } from "../types.js"

export const MINUTE_MS = 60_000
export const HOUR_MS = 60 * MINUTE_MS
export const DAY_MS = 24 * HOUR_MS

/**
 * A half-open span `[start, end)` of wall-clock milliseconds.
 *
 * A legal interval satisfies `start < end` and `end - start < DAY_MS`.
 */
export type ShiftInterval = {
  readonly id: string
  readonly start: number
  readonly end: number
}

export type SpanCheck =
  | { legal: true; spanMs: number }
  | { legal: false; reason: "empty" | "too-long"; spanMs: number }

export type IntervalResult =
  | { type: "success"; result: ShiftInterval }
  | { type: "error"; error: Extract<SpanCheck, { legal: false }> }

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// CALENDAR DATES
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

function midnightOf(date: CalendarDate): number {
  const match = DATE_PATTERN.exec(date)
  if (!match) {
    throw new RangeError(`Invalid calendar date '${date}'`)
  }
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]))
}

export function formatCalendarDate(instant: number): CalendarDate {
  return new Date(instant).toISOString().slice(0, 10)
}

/**
 * Returns the date when `text` is a real `YYYY-MM-DD` calendar date
 * (rejecting e.g. `2025-02-30`), otherwise `undefined`.
 */
export function parseCalendarDate(text: string): CalendarDate | undefined {
  if (!DATE_PATTERN.test(text)) return undefined
  return formatCalendarDate(midnightOf(text)) === text ? text : undefined
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return formatCalendarDate(midnightOf(date) + days * DAY_MS)
}

export function dateOfInstant(instant: number): CalendarDate {
  return formatCalendarDate(instant)
}

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// TIMES OF DAY
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export function isValidTimeOfDay(time: TimeOfDay): boolean {
  return (
    Number.isInteger(time.hour) &&
    Number.isInteger(time.minute) &&
    time.hour >= 0 &&
    time.hour < 24 &&
    time.minute >= 0 &&
    time.minute < 60
  )
}

export function minutesOfDay(time: TimeOfDay): number {
  return time.hour * 60 + time.minute
}

export function toInstant(date: CalendarDate, time: TimeOfDay): number {
  return midnightOf(date) + minutesOfDay(time) * MINUTE_MS
}

/**
 * A window whose end is not after its start wraps past midnight. Equal
 * start and end wrap a full day, which `checkSpan` then rejects.
 */
export function isOvernight(window: ShiftWindow): boolean {
  return minutesOfDay(window.end) <= minutesOfDay(window.start)
}

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// INTERVALS
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

/**
 * Expand a template window placed on `date` to its full span. Overnight
 * windows end on the following day.
 *
 * @example
 * ```typescript
 * // 23:00 → 07:00 on 2025-03-10 covers [2025-03-10 23:00, 2025-03-11 07:00)
 * const night = intervalFor("shift-1", "2025-03-10", {
 *   start: { hour: 23, minute: 0 },
 *   end: { hour: 7, minute: 0 },
 * })
 * ```
 */
export function intervalFor(
  id: string,
  date: CalendarDate,
  window: ShiftWindow,
): ShiftInterval {
  const endDate = isOvernight(window) ? addDays(date, 1) : date
  return {
    id,
    start: toInstant(date, window.start),
    end: toInstant(endDate, window.end),
  }
}

export function spanOf(interval: ShiftInterval): number {
  return interval.end - interval.start
}

export function checkSpan(interval: ShiftInterval): SpanCheck {
  const spanMs = spanOf(interval)
  if (spanMs <= 0) return { legal: false, reason: "empty", spanMs }
  if (spanMs >= DAY_MS) return { legal: false, reason: "too-long", spanMs }
  return { legal: true, spanMs }
}

/**
 * Build an interval from raw instants, refusing illegal spans rather than
 * truncating them.
 */
export function createShiftInterval(
  id: string,
  start: number,
  end: number,
): IntervalResult {
  const interval = { id, start, end }
  const check = checkSpan(interval)
  if (!check.legal) {
    return { type: "error", error: check }
  }
  return { type: "success", result: interval }
}

/**
 * Half-open intersection test. Touching boundaries do not overlap.
 */
export function overlaps(a: ShiftInterval, b: ShiftInterval): boolean {
  return a.start < b.end && b.start < a.end
}

export function intersection(
  a: ShiftInterval,
  b: ShiftInterval,
): { start: number; end: number } | undefined {
  if (!overlaps(a, b)) return undefined
  return { start: Math.max(a.start, b.start), end: Math.min(a.end, b.end) }
}

/**
 * Every calendar date that `[start, end)` touches, in order.
 */
export function occupiedDates(span: {
  start: number
  end: number
}): CalendarDate[] {
  if (span.end <= span.start) return []

  const dates: CalendarDate[] = []
  const last = dateOfInstant(span.end - 1)
  let current = dateOfInstant(span.start)
  dates.push(current)
  while (current !== last) {
    current = addDays(current, 1)
    dates.push(current)
  }
  return dates
}
