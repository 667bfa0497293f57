import { beforeEach, describe, expect, it } from "vitest"
import { DAY, EARLY, LATE, makeDraft, NIGHT, snapshotOf } from "../testing/fixtures.js"
import type { ShiftTemplate } from "../types.js"
import { ChangeLog } from "./change-log.js"
import { type SwitchRecord, UndoRedoController } from "./undo-redo-controller.js"

const actor = { id: "user-1", displayName: "Test User" }
const context = { actor, timestamp: Date.UTC(2025, 2, 5) }

function switchRecord(from: ShiftTemplate, to: ShiftTemplate): SwitchRecord {
  return {
    shiftId: "shift-1",
    shiftDate: "2025-03-10",
    before: snapshotOf(from),
    after: snapshotOf(to),
    actor,
    timestamp: Date.UTC(2025, 2, 4),
  }
}

describe("UndoRedoController", () => {
  let log: ChangeLog
  let ids: number
  let controller: UndoRedoController

  beforeEach(() => {
    log = new ChangeLog()
    ids = 0
    controller = new UndoRedoController({
      changeLog: log,
      generateId: () => `id-${++ids}`,
    })
  })

  it("starts with nothing to undo or redo", async () => {
    expect(controller.canUndo()).toBe(false)
    expect(controller.canRedo()).toBe(false)
    expect(await controller.undo(context)).toEqual({ type: "nothing-to-undo" })
    expect(await controller.redo(context)).toEqual({ type: "nothing-to-redo" })
    expect(log.size).toBe(0)
  })

  it("records a switch as an undoable change-log entry", async () => {
    const entry = await controller.recordSwitch(switchRecord(DAY, LATE))

    expect(entry).toEqual({
      id: "id-1",
      sequenceNumber: 1,
      timestamp: Date.UTC(2025, 2, 4),
      actorId: "user-1",
      actorName: "Test User",
      kind: "switched",
      shiftId: "shift-1",
      shiftDate: "2025-03-10",
      before: snapshotOf(DAY),
      after: snapshotOf(LATE),
    })
    expect(controller.canUndo()).toBe(true)
    expect(controller.peekUndo()).toBe(entry)
  })

  it("round-trips a switch through undo and redo", async () => {
    const switched = await controller.recordSwitch(switchRecord(DAY, LATE))

    const undone = await controller.undo(context)
    expect(undone).toEqual({
      type: "undone",
      entry: switched,
      logged: expect.objectContaining({
        kind: "undone",
        sequenceNumber: 2,
        before: snapshotOf(LATE),
        after: snapshotOf(DAY),
        revertsSequenceNumber: 1,
      }),
    })
    expect(controller.canUndo()).toBe(false)
    expect(controller.canRedo()).toBe(true)

    const redone = await controller.redo(context)
    expect(redone).toEqual({
      type: "redone",
      entry: switched,
      logged: expect.objectContaining({
        kind: "redone",
        sequenceNumber: 3,
        before: snapshotOf(DAY),
        after: snapshotOf(LATE),
        revertsSequenceNumber: 1,
      }),
    })
    expect(controller.canRedo()).toBe(false)
    expect(controller.canUndo()).toBe(true)
    expect(log.entries.map(e => e.kind)).toEqual(["switched", "undone", "redone"])
  })

  it("keeps at most K entries, evicting the oldest", async () => {
    const small = new UndoRedoController({ changeLog: log, capacity: 3 })
    const templates = [DAY, LATE, NIGHT, EARLY]

    for (let i = 0; i < 4; i++) {
      await small.recordSwitch(switchRecord(templates[i], templates[(i + 1) % 4]))
    }

    expect(small.undoDepth).toBe(3)
    expect(small.snapshot().undo).toEqual([2, 3, 4])
  })

  it("uses a default capacity of 10", async () => {
    for (let i = 0; i < 11; i++) {
      await controller.recordSwitch(switchRecord(DAY, LATE))
    }

    expect(controller.undoDepth).toBe(10)
    expect(controller.snapshot().undo[0]).toBe(2)
  })

  it("clears redo when a new switch forks history", async () => {
    await controller.recordSwitch(switchRecord(DAY, LATE))
    await controller.undo(context)
    expect(controller.canRedo()).toBe(true)

    await controller.recordSwitch(switchRecord(DAY, NIGHT))

    expect(controller.canRedo()).toBe(false)
    expect(controller.undoDepth).toBe(1)
  })

  it("clears redo on structural mutations without making them undoable", async () => {
    await controller.recordSwitch(switchRecord(DAY, LATE))
    await controller.undo(context)

    await controller.recordMutation(makeDraft({ kind: "created", before: undefined }))

    expect(controller.canRedo()).toBe(false)
    expect(controller.canUndo()).toBe(false)
  })

  it("restores the stacks when logging the step fails", async () => {
    let fail = false
    const flaky = new ChangeLog({
      sink: async () => {
        if (fail) throw new Error("storage offline")
      },
    })
    const undoable = new UndoRedoController({ changeLog: flaky })
    await undoable.recordSwitch(switchRecord(DAY, LATE))

    fail = true
    await expect(undoable.undo(context)).rejects.toThrow("storage offline")

    expect(undoable.undoDepth).toBe(1)
    expect(undoable.redoDepth).toBe(0)
    expect(flaky.size).toBe(1)
  })

  it("pins the entry being undone against retention sweeps", async () => {
    let release: () => void = () => {}
    const slow = new ChangeLog({
      sink: entry =>
        entry.kind === "undone"
          ? new Promise<void>(resolve => {
              release = resolve
            })
          : Promise.resolve(),
    })
    const undoable = new UndoRedoController({ changeLog: slow })
    await undoable.recordSwitch(switchRecord(DAY, LATE))

    const pending = undoable.undo(context)
    expect(slow.purgeOlderThan(Date.UTC(2030, 0, 1))).toBe(0)

    release()
    await pending
    expect(slow.isPinned(1)).toBe(false)
  })

  it("hydrates from sequence numbers and drops missing references", async () => {
    await controller.recordSwitch(switchRecord(DAY, LATE))
    await controller.recordSwitch(switchRecord(LATE, NIGHT))

    const restored = new UndoRedoController({ changeLog: log })
    restored.hydrate({ undo: [1, 2, 99], redo: [] })

    expect(restored.snapshot()).toEqual({ undo: [1, 2], redo: [] })
  })

  it("forgets purged entries", async () => {
    const old = new ChangeLog()
    const undoable = new UndoRedoController({ changeLog: old })
    await undoable.recordSwitch({ ...switchRecord(DAY, LATE), timestamp: 1000 })
    await undoable.recordSwitch({ ...switchRecord(LATE, NIGHT), timestamp: 5000 })

    old.purgeOlderThan(2000)

    expect(undoable.retainOnly()).toBe(true)
    expect(undoable.snapshot().undo).toEqual([2])
    expect(undoable.retainOnly()).toBe(false)
  })

  it("forgets every stack reference to a deleted shift", async () => {
    await controller.recordSwitch(switchRecord(DAY, LATE))
    await controller.recordSwitch({ ...switchRecord(DAY, EARLY), shiftId: "shift-2" })
    await controller.recordSwitch(switchRecord(LATE, NIGHT))
    await controller.undo(context)
    expect(controller.snapshot()).toEqual({ undo: [1, 2], redo: [3] })

    expect(controller.forgetShift("shift-1")).toBe(true)
    expect(controller.snapshot()).toEqual({ undo: [2], redo: [] })
    expect(controller.forgetShift("shift-1")).toBe(false)
  })

  it("rejects a non-positive capacity", () => {
    expect(() => new UndoRedoController({ changeLog: log, capacity: 0 })).toThrow(
      RangeError,
    )
  })
})
