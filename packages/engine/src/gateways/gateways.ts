import type { StateSnapshot } from "../state.js"
import type { CalendarDate, ChangeLogEntry, ShiftId } from "../types.js"

/**
 * Durable storage for the state snapshot and the change log.
 *
 * Implementations must round-trip `sequenceNumber` exactly. Any method may
 * reject; the engine only calls them from middleware and turns rejections
 * into failure actions.
 */
export interface PersistenceGateway {
  loadState(): Promise<StateSnapshot | undefined>
  saveState(snapshot: StateSnapshot): Promise<void>
  loadChangeLog(): Promise<ChangeLogEntry[]>
  appendChangeLog(entry: ChangeLogEntry): Promise<void>
  removeChangeLogEntries(ids: readonly string[]): Promise<void>
}

export type CalendarEvent = {
  shiftId: ShiftId
  date: CalendarDate
  title: string
  symbol: string
  /** Wall-clock milliseconds */
  start: number
  end: number
  location?: string
  notes?: string
}

/**
 * External calendar the schedule is mirrored into. Events are keyed by the
 * opaque id returned from `createEvent` and stored on the shift.
 */
export interface CalendarGateway {
  createEvent(event: CalendarEvent): Promise<string>
  updateEvent(eventId: string, event: CalendarEvent): Promise<void>
  deleteEvent(eventId: string): Promise<void>
}
