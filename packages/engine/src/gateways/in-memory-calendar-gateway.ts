import { CalendarSyncError } from "../errors.js"
import type { CalendarEvent, CalendarGateway } from "./gateways.js"

type Operation = CalendarSyncError["operation"]

export type CalendarCall = {
  operation: Operation
  eventId: string
  event?: CalendarEvent
}

/**
 * Process-local calendar. Records every call and can be told to fail the
 * next call of an operation.
 */
export class InMemoryCalendarGateway implements CalendarGateway {
  readonly events = new Map<string, CalendarEvent>()
  readonly calls: CalendarCall[] = []
  #nextId = 1
  readonly #failures = new Map<Operation, number>()

  failNext(operation: Operation, times = 1): void {
    this.#failures.set(operation, (this.#failures.get(operation) ?? 0) + times)
  }

  async createEvent(event: CalendarEvent): Promise<string> {
    this.#maybeFail("create", event.shiftId)
    const eventId = `evt-${this.#nextId++}`
    this.events.set(eventId, { ...event })
    this.calls.push({ operation: "create", eventId, event })
    return eventId
  }

  async updateEvent(eventId: string, event: CalendarEvent): Promise<void> {
    this.#maybeFail("update", event.shiftId)
    if (!this.events.has(eventId)) {
      throw new CalendarSyncError("update", event.shiftId, `unknown event '${eventId}'`)
    }
    this.events.set(eventId, { ...event })
    this.calls.push({ operation: "update", eventId, event })
  }

  async deleteEvent(eventId: string): Promise<void> {
    const existing = this.events.get(eventId)
    this.#maybeFail("delete", existing?.shiftId ?? eventId)
    this.events.delete(eventId)
    this.calls.push({ operation: "delete", eventId })
  }

  #maybeFail(operation: Operation, shiftId: string): void {
    const remaining = this.#failures.get(operation) ?? 0
    if (remaining <= 0) return

    this.#failures.set(operation, remaining - 1)
    throw new CalendarSyncError(operation, shiftId, "injected failure")
  }
}
