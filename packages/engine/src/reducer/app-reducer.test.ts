import { describe, expect, it, vi } from "vitest"
import type { AppAction } from "../actions.js"
import { selectSlotStatus } from "../selectors.js"
import { type AppState, initState, toSnapshot } from "../state.js"
import { DAY, LATE, makeDraft, makeShift, NIGHT, TEMPLATES } from "../testing/fixtures.js"
import type { ChangeLogEntry } from "../types.js"
import { createAppReducer } from "./app-reducer.js"

const reducer = createAppReducer()

function entry(sequenceNumber: number, overrides: Partial<ChangeLogEntry> = {}): ChangeLogEntry {
  return { ...makeDraft({ id: `e-${sequenceNumber}` }), sequenceNumber, ...overrides }
}

function reduceAll(state: AppState, actions: AppAction[]): AppState {
  return actions.reduce(reducer, state)
}

function withShift(): AppState {
  return reducer(initState({ templates: TEMPLATES }), {
    type: "schedule/shift-added",
    shift: makeShift("shift-1", "2025-03-10", DAY),
    entry: entry(1, { kind: "created" }),
  })
}

describe("createAppReducer", () => {
  it("is deterministic", () => {
    const state = withShift()
    const action: AppAction = {
      type: "schedule/shift-switched",
      shiftId: "shift-1",
      templateId: LATE.id,
      cause: "switch",
      entry: entry(2),
    }

    expect(reducer(state, action)).toEqual(reducer(state, action))
  })

  it("never mutates the input state and bumps the version", () => {
    const state = initState({ templates: TEMPLATES })
    const before = structuredClone(state)

    const next = reducer(state, { type: "history/undo-requested" })

    expect(state).toEqual(before)
    expect(next).not.toBe(state)
    expect(next.version).toBe(1)
  })

  it("returns frozen state", () => {
    const next = withShift()

    expect(Object.isFrozen(next)).toBe(true)
    expect(Object.isFrozen(next.schedule.shifts)).toBe(true)
  })

  it("reports patches when asked", () => {
    const onPatch = vi.fn()
    const patching = createAppReducer({ onPatch })

    patching(initState(), { type: "settings/auto-purge-toggled", enabled: false })

    expect(onPatch).toHaveBeenCalledTimes(1)
    expect(onPatch.mock.calls[0][1]).toEqual({
      type: "settings/auto-purge-toggled",
      enabled: false,
    })
  })

  describe("schedule", () => {
    it("adds a shift and mirrors its change-log entry", () => {
      const state = withShift()

      expect(state.schedule.shifts).toEqual([
        { id: "shift-1", date: "2025-03-10", templateId: DAY.id },
      ])
      expect(state.history.entries.map(e => e.sequenceNumber)).toEqual([1])
    })

    it("walks the slot state machine through switch, undo and redo", () => {
      let state = withShift()
      expect(selectSlotStatus(state, "shift-1")).toEqual({ type: "unmodified" })

      state = reduceAll(state, [
        { type: "schedule/shift-switched", shiftId: "shift-1", templateId: LATE.id, cause: "switch", entry: entry(2) },
        { type: "schedule/shift-switched", shiftId: "shift-1", templateId: NIGHT.id, cause: "switch", entry: entry(3) },
      ])
      expect(selectSlotStatus(state, "shift-1")).toEqual({ type: "switched", depth: 2 })

      state = reducer(state, {
        type: "schedule/shift-switched",
        shiftId: "shift-1",
        templateId: LATE.id,
        cause: "undo",
        entry: entry(4, { kind: "undone", revertsSequenceNumber: 3 }),
      })
      expect(selectSlotStatus(state, "shift-1")).toEqual({ type: "switched", depth: 1 })
      expect(state.history.lastStep).toEqual({ type: "undone", sequenceNumber: 3 })

      state = reducer(state, {
        type: "schedule/shift-switched",
        shiftId: "shift-1",
        templateId: DAY.id,
        cause: "undo",
        entry: entry(5, { kind: "undone", revertsSequenceNumber: 2 }),
      })
      expect(selectSlotStatus(state, "shift-1")).toEqual({ type: "unmodified" })
      expect(state.schedule.shifts[0].templateId).toBe(DAY.id)
    })

    it("removes deleted shifts and their switch depth", () => {
      const state = reduceAll(withShift(), [
        { type: "schedule/shift-switched", shiftId: "shift-1", templateId: LATE.id, cause: "switch", entry: entry(2) },
        { type: "schedule/shift-deleted", shiftId: "shift-1", entry: entry(3, { kind: "deleted" }) },
      ])

      expect(state.schedule.shifts).toEqual([])
      expect(state.schedule.switchDepth).toEqual({})
      expect(state.history.entries).toHaveLength(3)
    })

    it("records and clears rejections", () => {
      const rejected = reducer(withShift(), {
        type: "schedule/request-rejected",
        operation: "switch",
        shiftId: "shift-1",
        issue: { type: "unknown-template", templateId: "tpl-missing" },
      })
      expect(rejected.schedule.lastRejection?.issue).toEqual({
        type: "unknown-template",
        templateId: "tpl-missing",
      })

      const retried = reducer(rejected, {
        type: "schedule/switch-requested",
        shiftId: "shift-1",
        templateId: LATE.id,
      })
      expect(retried.schedule.lastRejection).toBeUndefined()
    })

    it("tracks side-effect failures until reconciled", () => {
      const failed = reducer(withShift(), {
        type: "schedule/side-effect-failed",
        operation: "switch",
        shiftId: "shift-1",
        failure: { kind: "calendar", message: "offline" },
        needsReconciliation: true,
      })
      expect(failed.schedule.failures).toHaveLength(1)

      const reconciled = reducer(failed, { type: "schedule/reconciled", shiftId: "shift-1" })
      expect(reconciled.schedule.failures).toEqual([])
    })

    it("links calendar events", () => {
      const state = reducer(withShift(), {
        type: "schedule/calendar-linked",
        shiftId: "shift-1",
        eventId: "evt-9",
      })

      expect(state.schedule.shifts[0].eventId).toBe("evt-9")
    })
  })

  describe("history", () => {
    it("keeps the mirrored entries ordered and unique", () => {
      const state = reduceAll(withShift(), [
        { type: "schedule/shift-switched", shiftId: "shift-1", templateId: NIGHT.id, cause: "switch", entry: entry(3) },
        { type: "schedule/shift-switched", shiftId: "shift-1", templateId: LATE.id, cause: "switch", entry: entry(2) },
        { type: "schedule/shift-switched", shiftId: "shift-1", templateId: LATE.id, cause: "switch", entry: entry(3) },
      ])

      expect(state.history.entries.map(e => e.sequenceNumber)).toEqual([1, 2, 3])
    })

    it("drops purged entries and records the purge", () => {
      const state = reduceAll(withShift(), [
        { type: "history/purge-requested" },
        { type: "history/purged", at: 5000, cutoff: 4000, removed: [1] },
      ])

      expect(state.history.entries).toEqual([])
      expect(state.history.isPurging).toBe(false)
      expect(state.history.lastPurge).toEqual({ at: 5000, cutoff: 4000, removed: 1 })
    })

    it("mirrors the stacks", () => {
      const state = reducer(initState(), { type: "history/stacks-changed", undo: [2, 3], redo: [4] })

      expect(state.history.undo).toEqual([2, 3])
      expect(state.history.redo).toEqual([4])
    })

    it("records no-op steps explicitly", () => {
      const state = reducer(initState(), { type: "history/nothing-to-undo" })

      expect(state.history.lastStep).toEqual({ type: "nothing-to-undo" })
    })
  })

  describe("lifecycle", () => {
    it("restores every slice from a snapshot", () => {
      const source = reduceAll(withShift(), [
        { type: "settings/retention-changed", retention: { type: "days", days: 30 } },
        { type: "history/stacks-changed", undo: [1], redo: [] },
      ])
      const snapshot = toSnapshot(source)

      const restored = reduceAll(initState(), [
        { type: "app/started" },
        { type: "app/restored", snapshot, entries: [entry(1)] },
      ])

      expect(restored.lifecycle.status).toBe("ready")
      expect(restored.schedule.shifts).toEqual(source.schedule.shifts)
      expect(restored.catalog.templates).toEqual(TEMPLATES)
      expect(restored.settings.retention).toEqual({ type: "days", days: 30 })
      expect(restored.history.undo).toEqual([1])
      expect(restored.history.entries).toEqual([entry(1)])
    })

    it("keeps initial slices when nothing was stored", () => {
      const restored = reducer(initState({ templates: [DAY] }), {
        type: "app/restored",
        snapshot: undefined,
        entries: [],
      })

      expect(restored.catalog.templates).toEqual([DAY])
      expect(restored.lifecycle.status).toBe("ready")
    })

    it("records failures", () => {
      const state = reducer(initState(), {
        type: "app/restore-failed",
        failure: { kind: "persistence", message: "unreadable" },
      })

      expect(state.lifecycle).toEqual({
        status: "failed",
        lastError: { kind: "persistence", message: "unreadable" },
      })
    })
  })

  describe("catalog", () => {
    it("upserts and removes templates", () => {
      const renamed = { ...DAY, title: "Day (long)" }
      const state = reduceAll(initState({ templates: [DAY, LATE] }), [
        { type: "catalog/template-saved", template: renamed },
        { type: "catalog/template-saved", template: NIGHT },
        { type: "catalog/template-removed", templateId: LATE.id },
      ])

      expect(state.catalog.templates).toEqual([renamed, NIGHT])
    })
  })
})
