import { describe, expect, it } from "vitest"
import {
  addDays,
  checkSpan,
  createShiftInterval,
  DAY_MS,
  HOUR_MS,
  intervalFor,
  isOvernight,
  isValidTimeOfDay,
  occupiedDates,
  overlaps,
  parseCalendarDate,
  type ShiftInterval,
  toInstant,
} from "./interval-math.js"

const at = (hour: number, minute = 0) => ({ hour, minute })

describe("calendar dates", () => {
  it("accepts real dates and rejects malformed or impossible ones", () => {
    expect(parseCalendarDate("2024-02-29")).toBe("2024-02-29")
    expect(parseCalendarDate("2025-02-29")).toBeUndefined()
    expect(parseCalendarDate("2025-13-01")).toBeUndefined()
    expect(parseCalendarDate("2025-3-1")).toBeUndefined()
    expect(parseCalendarDate("tomorrow")).toBeUndefined()
  })

  it("adds days across month and year boundaries", () => {
    expect(addDays("2025-01-31", 1)).toBe("2025-02-01")
    expect(addDays("2024-12-31", 1)).toBe("2025-01-01")
    expect(addDays("2025-03-01", -1)).toBe("2025-02-28")
  })

  it("validates times of day", () => {
    expect(isValidTimeOfDay(at(0))).toBe(true)
    expect(isValidTimeOfDay(at(23, 59))).toBe(true)
    expect(isValidTimeOfDay(at(24))).toBe(false)
    expect(isValidTimeOfDay(at(9, 60))).toBe(false)
    expect(isValidTimeOfDay(at(9.5))).toBe(false)
  })
})

describe("intervalFor", () => {
  it("places a day shift on its own date", () => {
    const interval = intervalFor("day", "2025-03-10", {
      start: at(9),
      end: at(17),
    })

    expect(interval).toEqual({
      id: "day",
      start: Date.UTC(2025, 2, 10, 9),
      end: Date.UTC(2025, 2, 10, 17),
    })
  })

  it("expands an overnight shift into the next day", () => {
    const window = { start: at(23), end: at(7) }
    const interval = intervalFor("night", "2025-03-10", window)

    expect(isOvernight(window)).toBe(true)
    expect(interval.start).toBe(Date.UTC(2025, 2, 10, 23))
    expect(interval.end).toBe(Date.UTC(2025, 2, 11, 7))
    expect(interval.end - interval.start).toBe(8 * HOUR_MS)
  })

  it("treats equal start and end as a full-day wrap", () => {
    const interval = intervalFor("wrap", "2025-03-10", {
      start: at(10),
      end: at(10),
    })

    expect(interval.end - interval.start).toBe(DAY_MS)
    expect(checkSpan(interval)).toEqual({
      legal: false,
      reason: "too-long",
      spanMs: DAY_MS,
    })
  })
})

describe("checkSpan and createShiftInterval", () => {
  it("accepts spans just under a day", () => {
    const start = toInstant("2025-03-10", at(10))
    const result = createShiftInterval("a", start, start + DAY_MS - 1)

    expect(result.type).toBe("success")
  })

  it("refuses spans of exactly 24 hours instead of truncating", () => {
    const start = toInstant("2025-03-10", at(10))
    const result = createShiftInterval(
      "a",
      start,
      toInstant("2025-03-11", at(10)),
    )

    expect(result).toEqual({
      type: "error",
      error: { legal: false, reason: "too-long", spanMs: DAY_MS },
    })
  })

  it("refuses empty and negative spans", () => {
    expect(createShiftInterval("a", 100, 100)).toEqual({
      type: "error",
      error: { legal: false, reason: "empty", spanMs: 0 },
    })
    expect(checkSpan({ id: "b", start: 100, end: 50 })).toEqual({
      legal: false,
      reason: "empty",
      spanMs: -50,
    })
  })
})

describe("overlaps", () => {
  const nineToFive = intervalFor("a", "2025-03-10", {
    start: at(9),
    end: at(17),
  })
  const fiveToNine = intervalFor("b", "2025-03-10", {
    start: at(17),
    end: at(21),
  })
  const noonToSix = intervalFor("c", "2025-03-10", {
    start: at(12),
    end: at(18),
  })

  it("does not treat touching boundaries as a conflict", () => {
    expect(overlaps(nineToFive, fiveToNine)).toBe(false)
    expect(overlaps(fiveToNine, nineToFive)).toBe(false)
  })

  it("detects partial and full containment", () => {
    const lunch = intervalFor("d", "2025-03-10", { start: at(12), end: at(13) })

    expect(overlaps(nineToFive, noonToSix)).toBe(true)
    expect(overlaps(nineToFive, lunch)).toBe(true)
    expect(overlaps(lunch, nineToFive)).toBe(true)
  })

  it("is symmetric", () => {
    const samples: ShiftInterval[] = [
      nineToFive,
      fiveToNine,
      noonToSix,
      intervalFor("e", "2025-03-10", { start: at(23), end: at(7) }),
      intervalFor("f", "2025-03-11", { start: at(6), end: at(14) }),
      intervalFor("g", "2025-03-11", { start: at(7), end: at(15) }),
    ]

    for (const x of samples) {
      for (const y of samples) {
        expect(overlaps(x, y)).toBe(overlaps(y, x))
      }
    }
  })
})

describe("occupiedDates", () => {
  it("lists both dates of an overnight span", () => {
    const night = intervalFor("n", "2025-03-10", { start: at(23), end: at(7) })

    expect(occupiedDates(night)).toEqual(["2025-03-10", "2025-03-11"])
  })

  it("does not count the date an interval ends on at midnight", () => {
    const late = intervalFor("l", "2025-03-10", { start: at(18), end: at(0) })

    expect(occupiedDates(late)).toEqual(["2025-03-10"])
  })

  it("returns nothing for an empty span", () => {
    expect(occupiedDates({ start: 10, end: 10 })).toEqual([])
  })
})
