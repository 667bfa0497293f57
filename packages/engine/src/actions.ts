import type { StateSnapshot } from "./state.js"
import type { RetentionPolicy } from "./history/retention-policy.js"
import type { ValidationIssue } from "./selectors.js"
import type {
  Actor,
  CalendarDate,
  ChangeLogEntry,
  FailureInfo,
  ScheduledShift,
  ShiftId,
  ShiftTemplate,
  TemplateId,
} from "./types.js"

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// LIFECYCLE
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export type LifecycleAction =
  | { type: "app/started" }
  | {
      type: "app/restored"
      snapshot: StateSnapshot | undefined
      entries: ChangeLogEntry[]
    }
  | { type: "app/restore-failed"; failure: FailureInfo }
  | {
      type: "engine/middleware-failed"
      middleware: string
      actionType: string
      failure: FailureInfo
    }
  | { type: "persistence/save-failed"; version: number; failure: FailureInfo }

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// CATALOG
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export type CatalogAction =
  | { type: "catalog/template-saved"; template: ShiftTemplate }
  | { type: "catalog/template-removed"; templateId: TemplateId }

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// SCHEDULE
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export type ScheduleOperation = "add" | "switch" | "delete"

export type SwitchCause = "switch" | "undo" | "redo"

export type ScheduleRequestAction =
  | {
      type: "schedule/add-requested"
      shiftId: ShiftId
      date: CalendarDate
      templateId: TemplateId
      notes?: string
    }
  | {
      type: "schedule/switch-requested"
      shiftId: ShiftId
      templateId: TemplateId
      reason?: string
    }
  | { type: "schedule/delete-requested"; shiftId: ShiftId; reason?: string }

export type ScheduleResultAction =
  | {
      type: "schedule/request-rejected"
      operation: ScheduleOperation
      shiftId: ShiftId
      issue: ValidationIssue
    }
  | { type: "schedule/shift-added"; shift: ScheduledShift; entry: ChangeLogEntry }
  | {
      type: "schedule/shift-switched"
      shiftId: ShiftId
      templateId: TemplateId
      cause: SwitchCause
      entry: ChangeLogEntry
    }
  | { type: "schedule/shift-deleted"; shiftId: ShiftId; entry: ChangeLogEntry }
  | { type: "schedule/calendar-linked"; shiftId: ShiftId; eventId: string }
  | {
      type: "schedule/side-effect-failed"
      operation: ScheduleOperation | "undo" | "redo"
      shiftId: ShiftId
      failure: FailureInfo
      /** True when state was already changed and storage/calendar may disagree */
      needsReconciliation: boolean
    }
  | { type: "schedule/reconciled"; shiftId: ShiftId }

export type ScheduleAction = ScheduleRequestAction | ScheduleResultAction

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// HISTORY
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export type StepDirection = "undo" | "redo"

export type HistoryAction =
  | { type: "history/undo-requested" }
  | { type: "history/redo-requested" }
  | { type: "history/nothing-to-undo" }
  | { type: "history/nothing-to-redo" }
  | {
      type: "history/step-rejected"
      direction: StepDirection
      sequenceNumber: number
      issue: ValidationIssue
    }
  | { type: "history/stacks-changed"; undo: number[]; redo: number[] }
  | { type: "history/purge-requested" }
  | {
      type: "history/purged"
      at: number
      /** `null` when the retention policy keeps everything */
      cutoff: number | null
      removed: number[]
    }
  | { type: "history/purge-failed"; failure: FailureInfo }

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// SETTINGS
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export type SettingsAction =
  | { type: "settings/actor-changed"; actor: Actor }
  | { type: "settings/retention-changed"; retention: RetentionPolicy }
  | { type: "settings/auto-purge-toggled"; enabled: boolean }

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// ALL ACTIONS
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export type AppAction =
  | LifecycleAction
  | CatalogAction
  | ScheduleAction
  | HistoryAction
  | SettingsAction

export type AppActionType = AppAction["type"]

export type ActionOf<T extends AppActionType> = Extract<AppAction, { type: T }>

/** Actions whose reduction changes data that must be persisted */
export const PERSISTED_ACTION_TYPES: ReadonlySet<AppActionType> = new Set<AppActionType>([
  "catalog/template-saved",
  "catalog/template-removed",
  "schedule/shift-added",
  "schedule/shift-switched",
  "schedule/shift-deleted",
  "schedule/calendar-linked",
  "history/stacks-changed",
  "settings/actor-changed",
  "settings/retention-changed",
  "settings/auto-purge-toggled",
])
