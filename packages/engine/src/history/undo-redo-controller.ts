import { getLogger, type Logger } from "@logtape/logtape"
import type {
  Actor,
  CalendarDate,
  ChangeLogDraft,
  ChangeLogEntry,
  ShiftId,
  ShiftSnapshot,
} from "../types.js"
import { generateId } from "../utils/generate-id.js"
import type { ChangeLog } from "./change-log.js"

export const DEFAULT_UNDO_CAPACITY = 10

export type UndoRedoParams = {
  changeLog: ChangeLog
  /** Maximum depth of the undo stack; the oldest entry is evicted beyond it */
  capacity?: number
  generateId?: () => string
  logger?: Logger
}

export type SwitchRecord = {
  shiftId: ShiftId
  shiftDate: CalendarDate
  before: ShiftSnapshot
  after: ShiftSnapshot
  actor: Actor
  timestamp: number
  reason?: string
}

export type StepContext = {
  actor: Actor
  timestamp: number
  reason?: string
}

export type UndoResult =
  | { type: "nothing-to-undo" }
  | { type: "undone"; entry: ChangeLogEntry; logged: ChangeLogEntry }

export type RedoResult =
  | { type: "nothing-to-redo" }
  | { type: "redone"; entry: ChangeLogEntry; logged: ChangeLogEntry }

export type StackSnapshot = {
  undo: number[]
  redo: number[]
}

/**
 * Bounded undo/redo stacks over `switched` change-log entries.
 *
 * Every step is itself recorded in the change log (`undone` / `redone`),
 * so history stays append-only. The stacks only hold references to
 * entries the log already contains.
 */
export class UndoRedoController {
  #undo: ChangeLogEntry[] = []
  #redo: ChangeLogEntry[] = []
  readonly capacity: number
  readonly #changeLog: ChangeLog
  readonly #generateId: () => string
  readonly #logger: Logger

  constructor({
    changeLog,
    capacity = DEFAULT_UNDO_CAPACITY,
    generateId: makeId = generateId,
    logger,
  }: UndoRedoParams) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Undo capacity must be a positive integer, got ${capacity}`)
    }
    this.capacity = capacity
    this.#changeLog = changeLog
    this.#generateId = makeId
    this.#logger = (logger ?? getLogger(["shift-ledger", "engine"])).getChild(
      "undo-redo",
    )
  }

  canUndo(): boolean {
    return this.#undo.length > 0
  }

  canRedo(): boolean {
    return this.#redo.length > 0
  }

  peekUndo(): ChangeLogEntry | undefined {
    return this.#undo.at(-1)
  }

  peekRedo(): ChangeLogEntry | undefined {
    return this.#redo.at(-1)
  }

  get undoDepth(): number {
    return this.#undo.length
  }

  get redoDepth(): number {
    return this.#redo.length
  }

  /**
   * Log a committed switch and make it undoable. Clears the redo stack.
   */
  async recordSwitch(record: SwitchRecord): Promise<ChangeLogEntry> {
    const entry = await this.#changeLog.append({
      id: this.#generateId(),
      timestamp: record.timestamp,
      actorId: record.actor.id,
      actorName: record.actor.displayName,
      kind: "switched",
      shiftId: record.shiftId,
      shiftDate: record.shiftDate,
      before: record.before,
      after: record.after,
      ...(record.reason !== undefined ? { reason: record.reason } : {}),
    })

    this.#pushUndo(entry)
    this.invalidateRedo()
    return entry
  }

  /**
   * Log a structural change (create or delete). These are not undoable,
   * but they fork history and so clear the redo stack.
   */
  async recordMutation(draft: ChangeLogDraft): Promise<ChangeLogEntry> {
    const entry = await this.#changeLog.append(draft)
    this.invalidateRedo()
    return entry
  }

  /** Returns true when the redo stack had entries to drop */
  invalidateRedo(): boolean {
    if (this.#redo.length === 0) return false
    this.#logger.debug("redo stack cleared ({count} entries)", {
      count: this.#redo.length,
    })
    this.#redo = []
    return true
  }

  async undo(context: StepContext): Promise<UndoResult> {
    const entry = this.#undo.pop()
    if (!entry) return { type: "nothing-to-undo" }

    const release = this.#changeLog.pin(entry.sequenceNumber)
    try {
      const logged = await this.#changeLog.append(
        this.#stepDraft(entry, "undone", context),
      )
      this.#redo.push(entry)
      return { type: "undone", entry, logged }
    } catch (error) {
      this.#undo.push(entry)
      throw error
    } finally {
      release()
    }
  }

  async redo(context: StepContext): Promise<RedoResult> {
    const entry = this.#redo.pop()
    if (!entry) return { type: "nothing-to-redo" }

    const release = this.#changeLog.pin(entry.sequenceNumber)
    try {
      const logged = await this.#changeLog.append(
        this.#stepDraft(entry, "redone", context),
      )
      this.#pushUndo(entry)
      return { type: "redone", entry, logged }
    } catch (error) {
      this.#redo.push(entry)
      throw error
    } finally {
      release()
    }
  }

  snapshot(): StackSnapshot {
    return {
      undo: this.#undo.map(entry => entry.sequenceNumber),
      redo: this.#redo.map(entry => entry.sequenceNumber),
    }
  }

  /**
   * Restore stacks from persisted sequence numbers. References the change
   * log no longer holds are dropped.
   */
  hydrate(snapshot: StackSnapshot): void {
    this.#undo = this.#resolve(snapshot.undo).slice(-this.capacity)
    this.#redo = this.#resolve(snapshot.redo)
  }

  /**
   * Drop stack references to entries a retention sweep removed from the
   * log. Returns true when either stack changed.
   */
  retainOnly(): boolean {
    const undo = this.#undo.filter(e => this.#changeLog.has(e.sequenceNumber))
    const redo = this.#redo.filter(e => this.#changeLog.has(e.sequenceNumber))
    const changed =
      undo.length !== this.#undo.length || redo.length !== this.#redo.length

    this.#undo = undo
    this.#redo = redo
    return changed
  }

  /**
   * Drop stack references to a shift that no longer exists. Returns true
   * when either stack changed.
   */
  forgetShift(shiftId: string): boolean {
    const undo = this.#undo.filter(e => e.shiftId !== shiftId)
    const redo = this.#redo.filter(e => e.shiftId !== shiftId)
    const changed =
      undo.length !== this.#undo.length || redo.length !== this.#redo.length

    this.#undo = undo
    this.#redo = redo
    return changed
  }

  #pushUndo(entry: ChangeLogEntry): void {
    this.#undo.push(entry)
    if (this.#undo.length > this.capacity) {
      const evicted = this.#undo.shift()
      this.#logger.trace("evicted entry #{sequenceNumber} from undo stack", {
        sequenceNumber: evicted?.sequenceNumber,
      })
    }
  }

  #resolve(sequenceNumbers: readonly number[]): ChangeLogEntry[] {
    const resolved: ChangeLogEntry[] = []
    for (const sequenceNumber of sequenceNumbers) {
      const entry = this.#changeLog.getBySequence(sequenceNumber)
      if (entry?.kind === "switched" && entry.before && entry.after) {
        resolved.push(entry)
      } else {
        this.#logger.warn(
          "dropping stack reference to missing entry #{sequenceNumber}",
          { sequenceNumber },
        )
      }
    }
    return resolved
  }

  #stepDraft(
    entry: ChangeLogEntry,
    kind: "undone" | "redone",
    context: StepContext,
  ): ChangeLogDraft {
    const [before, after] =
      kind === "undone" ? [entry.after, entry.before] : [entry.before, entry.after]

    return {
      id: this.#generateId(),
      timestamp: context.timestamp,
      actorId: context.actor.id,
      actorName: context.actor.displayName,
      kind,
      shiftId: entry.shiftId,
      shiftDate: entry.shiftDate,
      ...(before ? { before } : {}),
      ...(after ? { after } : {}),
      ...(context.reason !== undefined ? { reason: context.reason } : {}),
      revertsSequenceNumber: entry.sequenceNumber,
    }
  }
}
