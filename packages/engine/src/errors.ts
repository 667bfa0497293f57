import type { FailureInfo, FailureKind } from "./types.js"

/**
 * Error thrown by a persistence gateway when a read or write fails.
 */
export class PersistenceError extends Error {
  constructor(
    public readonly operation:
      | "load-state"
      | "save-state"
      | "load-change-log"
      | "append-change-log"
      | "remove-change-log-entries",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Persistence operation '${operation}' failed: ${message}`, options)
    this.name = "PersistenceError"
  }
}

/**
 * Error thrown by a calendar gateway when an event call fails.
 */
export class CalendarSyncError extends Error {
  constructor(
    public readonly operation: "create" | "update" | "delete",
    public readonly shiftId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Calendar ${operation} for shift '${shiftId}' failed: ${message}`, options)
    this.name = "CalendarSyncError"
  }
}

/**
 * Error thrown when change-log data loaded from storage breaks the log's
 * ordering guarantees (duplicate sequence numbers, dangling stack refs).
 */
export class ChangeLogIntegrityError extends Error {
  constructor(
    public readonly sequenceNumber: number,
    message: string,
  ) {
    super(`Change log entry #${sequenceNumber}: ${message}`)
    this.name = "ChangeLogIntegrityError"
  }
}

/**
 * Thrown by a reducer that receives an action it has no case for. The
 * action union is closed, so reaching this is a programmer error.
 */
export class UnhandledActionError extends Error {
  constructor(public readonly action: unknown) {
    super(`No reducer case for action: ${JSON.stringify(action)}`)
    this.name = "UnhandledActionError"
  }
}

export function assertNever(action: never): never {
  throw new UnhandledActionError(action)
}

function kindOf(error: unknown): FailureKind {
  if (error instanceof PersistenceError) return "persistence"
  if (error instanceof CalendarSyncError) return "calendar"
  if (error instanceof ChangeLogIntegrityError) return "change-log"
  return "unknown"
}

/**
 * Reduce any thrown value to plain failure data that an action can carry.
 */
export function toFailureInfo(error: unknown, kind?: FailureKind): FailureInfo {
  const message = error instanceof Error ? error.message : String(error)
  return { kind: kind ?? kindOf(error), message }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
