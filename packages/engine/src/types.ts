// =============================================================================
// Domain Types
// =============================================================================

export type ShiftId = string
export type TemplateId = string
export type ActorId = string

/**
 * A calendar date in `YYYY-MM-DD` form. Dates are floating: they carry no
 * time zone, and instants derived from them are wall-clock milliseconds.
 */
export type CalendarDate = string

export type TimeOfDay = {
  hour: number
  minute: number
}

/**
 * The time-of-day span of a shift template. When `end` is earlier than
 * `start` the shift runs overnight into the next calendar day.
 */
export type ShiftWindow = {
  start: TimeOfDay
  end: TimeOfDay
}

export type Location = {
  name: string
  address?: string
}

export type ShiftTemplate = {
  id: TemplateId
  symbol: string
  title: string
  description?: string
  window: ShiftWindow
  location?: Location
}

export type ScheduledShift = {
  id: ShiftId
  date: CalendarDate
  templateId: TemplateId
  /** Opaque identifier of the linked external calendar event, once created */
  eventId?: string
  notes?: string
}

export type Actor = {
  id: ActorId
  displayName: string
}

// =============================================================================
// Change Log Types
// =============================================================================

export type ChangeKind = "created" | "switched" | "deleted" | "undone" | "redone"

/**
 * The template data a shift had at the moment a change was recorded. Kept
 * on the entry so history stays readable after the template is edited or
 * removed.
 */
export type ShiftSnapshot = {
  templateId: TemplateId
  symbol: string
  title: string
  window: ShiftWindow
  locationName?: string
}

export type ChangeLogEntry = {
  readonly id: string
  readonly sequenceNumber: number
  readonly timestamp: number
  readonly actorId: ActorId
  readonly actorName: string
  readonly kind: ChangeKind
  readonly shiftId: ShiftId
  readonly shiftDate: CalendarDate
  readonly before?: ShiftSnapshot
  readonly after?: ShiftSnapshot
  readonly reason?: string
  /** For `undone` and `redone` entries, the `switched` entry they act on */
  readonly revertsSequenceNumber?: number
}

/** A change-log entry before the log has assigned its sequence number. */
export type ChangeLogDraft = Omit<ChangeLogEntry, "sequenceNumber">

// =============================================================================
// Failures
// =============================================================================

export type FailureKind =
  | "persistence"
  | "calendar"
  | "change-log"
  | "middleware"
  | "unknown"

/**
 * Plain-data description of a failed side effect. Failure actions carry
 * this rather than the Error itself so they stay comparable by value.
 */
export type FailureInfo = {
  kind: FailureKind
  message: string
}
