import { describe, expect, it, vi } from "vitest"
import { ChangeLogIntegrityError } from "../errors.js"
import { makeDraft } from "../testing/fixtures.js"
import type { ChangeLogEntry } from "../types.js"
import { ChangeLog } from "./change-log.js"

const day = (n: number) => Date.UTC(2025, 2, n)

describe("ChangeLog", () => {
  describe("append", () => {
    it("assigns increasing sequence numbers", async () => {
      const log = new ChangeLog()

      const first = await log.append(makeDraft())
      const second = await log.append(makeDraft())

      expect(first.sequenceNumber).toBe(1)
      expect(second.sequenceNumber).toBe(2)
      expect(log.size).toBe(2)
    })

    it("freezes appended entries", async () => {
      const log = new ChangeLog()
      const entry = await log.append(makeDraft())

      expect(Object.isFrozen(entry)).toBe(true)
    })

    it("writes through the sink before the entry becomes visible", async () => {
      const seen: number[] = []
      const log = new ChangeLog({
        sink: async entry => {
          seen.push(entry.sequenceNumber)
          expect(log.size).toBe(0)
        },
      })

      await log.append(makeDraft())

      expect(seen).toEqual([1])
      expect(log.size).toBe(1)
    })

    it("keeps nothing when the sink fails and never reuses the number", async () => {
      const sink = vi
        .fn<(entry: ChangeLogEntry) => Promise<void>>()
        .mockRejectedValueOnce(new Error("disk full"))
        .mockResolvedValue(undefined)
      const log = new ChangeLog({ sink })

      await expect(log.append(makeDraft())).rejects.toThrow("disk full")
      expect(log.size).toBe(0)

      const next = await log.append(makeDraft())
      expect(next.sequenceNumber).toBe(2)
      expect(log.entries.map(e => e.sequenceNumber)).toEqual([2])
    })

    it("keeps entries in sequence order when sinks settle out of order", async () => {
      const resolvers: Array<() => void> = []
      const log = new ChangeLog({
        sink: () => new Promise<void>(resolve => resolvers.push(resolve)),
      })

      const first = log.append(makeDraft())
      const second = log.append(makeDraft())
      resolvers[1]()
      await second
      resolvers[0]()
      await first

      expect(log.entries.map(e => e.sequenceNumber)).toEqual([1, 2])
    })
  })

  describe("query", () => {
    it("filters by predicate and half-open date range", async () => {
      const log = new ChangeLog()
      await log.append(makeDraft({ timestamp: day(1), kind: "created" }))
      await log.append(makeDraft({ timestamp: day(2), kind: "switched" }))
      await log.append(makeDraft({ timestamp: day(3), kind: "switched" }))
      await log.append(makeDraft({ timestamp: day(4), kind: "deleted" }))

      const switched = log.query(e => e.kind === "switched")
      const ranged = log.query(undefined, { from: day(2), to: day(4) })

      expect(switched.map(e => e.sequenceNumber)).toEqual([2, 3])
      expect(ranged.map(e => e.sequenceNumber)).toEqual([2, 3])
    })

    it("finds entries by id and sequence number", async () => {
      const log = new ChangeLog()
      const entry = await log.append(makeDraft({ id: "abc" }))

      expect(log.get("abc")).toBe(entry)
      expect(log.getBySequence(1)).toBe(entry)
      expect(log.has(2)).toBe(false)
    })
  })

  describe("purgeOlderThan", () => {
    it("removes exactly the entries older than the cutoff", async () => {
      const log = new ChangeLog()
      await log.append(makeDraft({ timestamp: day(1) }))
      await log.append(makeDraft({ timestamp: day(2) - 1 }))
      await log.append(makeDraft({ timestamp: day(2) }))
      await log.append(makeDraft({ timestamp: day(3) }))

      const removed = log.purgeOlderThan(day(2))

      expect(removed).toBe(2)
      expect(log.entries.map(e => e.timestamp)).toEqual([day(2), day(3)])
    })

    it("is idempotent", async () => {
      const log = new ChangeLog()
      await log.append(makeDraft({ timestamp: day(1) }))
      await log.append(makeDraft({ timestamp: day(5) }))

      expect(log.purgeOlderThan(day(3))).toBe(1)
      expect(log.purgeOlderThan(day(3))).toBe(0)
      expect(log.size).toBe(1)
    })

    it("skips pinned entries until they are released", async () => {
      const log = new ChangeLog()
      const old = await log.append(makeDraft({ timestamp: day(1) }))

      const release = log.pin(old.sequenceNumber)
      expect(log.sweep(day(3))).toEqual([])

      release()
      expect(log.sweep(day(3))).toEqual([old])
    })

    it("counts nested pins", async () => {
      const log = new ChangeLog()
      const old = await log.append(makeDraft({ timestamp: day(1) }))

      const releaseA = log.pin(old.sequenceNumber)
      const releaseB = log.pin(old.sequenceNumber)
      releaseA()
      releaseA()

      expect(log.isPinned(old.sequenceNumber)).toBe(true)
      releaseB()
      expect(log.isPinned(old.sequenceNumber)).toBe(false)
    })
  })

  describe("hydrate", () => {
    it("restores entries and continues numbering after the highest", async () => {
      const log = new ChangeLog()
      log.hydrate([
        { ...makeDraft(), sequenceNumber: 7 },
        { ...makeDraft(), sequenceNumber: 3 },
      ])

      const next = await log.append(makeDraft())

      expect(log.entries.map(e => e.sequenceNumber)).toEqual([3, 7, 8])
      expect(next.sequenceNumber).toBe(8)
    })

    it("rejects duplicate sequence numbers", () => {
      const log = new ChangeLog()

      expect(() =>
        log.hydrate([
          { ...makeDraft(), sequenceNumber: 4 },
          { ...makeDraft(), sequenceNumber: 4 },
        ]),
      ).toThrow(ChangeLogIntegrityError)
    })
  })
})
