import type { ScheduleOperation, StepDirection } from "./actions.js"
import type { RetentionPolicy } from "./history/retention-policy.js"
import type { ValidationIssue } from "./selectors.js"
import type {
  Actor,
  ChangeLogEntry,
  FailureInfo,
  ScheduledShift,
  ShiftId,
  ShiftTemplate,
} from "./types.js"

// ═══════════════════════════════════════════════════════════════════════════
// Feature Sub-States
// ═══════════════════════════════════════════════════════════════════════════

export type LifecycleStatus = "idle" | "restoring" | "ready" | "failed"

export type LifecycleState = {
  status: LifecycleStatus
  lastError?: FailureInfo
}

export type Rejection = {
  operation: ScheduleOperation
  shiftId: ShiftId
  issue: ValidationIssue
}

export type SideEffectFailure = {
  operation: ScheduleOperation | StepDirection
  shiftId: ShiftId
  failure: FailureInfo
  needsReconciliation: boolean
}

export type ScheduleState = {
  shifts: ScheduledShift[]
  /**
   * Per-slot switch depth: absent means Unmodified, `n` means Switched(n).
   * Switches and redos increment it, undos decrement it.
   */
  switchDepth: Record<ShiftId, number>
  lastRejection?: Rejection
  failures: SideEffectFailure[]
}

export type CatalogState = {
  templates: ShiftTemplate[]
}

export type LastStep =
  | { type: "nothing-to-undo" }
  | { type: "nothing-to-redo" }
  | { type: "undone" | "redone"; sequenceNumber: number }
  | {
      type: "rejected"
      direction: StepDirection
      sequenceNumber: number
      issue: ValidationIssue
    }

export type PurgeSummary = {
  at: number
  cutoff: number | null
  removed: number
}

export type HistoryState = {
  /** Mirror of the change log, in sequence order */
  entries: ChangeLogEntry[]
  /** Sequence numbers on the undo stack, oldest first */
  undo: number[]
  /** Sequence numbers on the redo stack, oldest first */
  redo: number[]
  lastStep?: LastStep
  lastPurge?: PurgeSummary
  isPurging: boolean
}

export type SettingsState = {
  actor: Actor
  retention: RetentionPolicy
  autoPurge: boolean
}

// ═══════════════════════════════════════════════════════════════════════════
// App State
// ═══════════════════════════════════════════════════════════════════════════

export type AppState = {
  /** Incremented by every reducer application */
  version: number
  lifecycle: LifecycleState
  schedule: ScheduleState
  catalog: CatalogState
  history: HistoryState
  settings: SettingsState
}

export const DEFAULT_SETTINGS: SettingsState = {
  actor: { id: "local-user", displayName: "User" },
  retention: { type: "forever" },
  autoPurge: true,
}

export function initState({
  settings,
  templates = [],
}: {
  settings?: Partial<SettingsState>
  templates?: ShiftTemplate[]
} = {}): AppState {
  return {
    version: 0,
    lifecycle: { status: "idle" },
    schedule: { shifts: [], switchDepth: {}, failures: [] },
    catalog: { templates: [...templates] },
    history: { entries: [], undo: [], redo: [], isPurging: false },
    settings: { ...DEFAULT_SETTINGS, ...settings },
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Persisted Snapshot
// ═══════════════════════════════════════════════════════════════════════════

export const SNAPSHOT_SCHEMA_VERSION = 1

/**
 * The durable part of AppState. The change log is stored separately; undo
 * and redo stacks are stored as sequence numbers into it.
 */
export type StateSnapshot = {
  schemaVersion: typeof SNAPSHOT_SCHEMA_VERSION
  stateVersion: number
  shifts: ScheduledShift[]
  switchDepth: Record<ShiftId, number>
  templates: ShiftTemplate[]
  settings: SettingsState
  undo: number[]
  redo: number[]
}

export function toSnapshot(state: AppState): StateSnapshot {
  return {
    schemaVersion: SNAPSHOT_SCHEMA_VERSION,
    stateVersion: state.version,
    shifts: state.schedule.shifts,
    switchDepth: state.schedule.switchDepth,
    templates: state.catalog.templates,
    settings: state.settings,
    undo: state.history.undo,
    redo: state.history.redo,
  }
}
