import type { ActionOf, ScheduleAction } from "../actions.js"
import { assertNever } from "../errors.js"
import type { ScheduleState } from "../state.js"

export type ScheduleReducerAction = ScheduleAction | ActionOf<"app/restored">

export function scheduleReducer(
  draft: ScheduleState,
  action: ScheduleReducerAction,
): void {
  switch (action.type) {
    case "app/restored":
      if (action.snapshot) {
        draft.shifts = action.snapshot.shifts
        draft.switchDepth = action.snapshot.switchDepth
      }
      draft.failures = []
      delete draft.lastRejection
      return

    // Requests are validated by middleware; only stale feedback is cleared.
    case "schedule/add-requested":
    case "schedule/switch-requested":
    case "schedule/delete-requested":
      delete draft.lastRejection
      return

    case "schedule/request-rejected":
      draft.lastRejection = {
        operation: action.operation,
        shiftId: action.shiftId,
        issue: action.issue,
      }
      return

    case "schedule/shift-added":
      draft.shifts.push({ ...action.shift })
      return

    case "schedule/shift-switched": {
      const shift = draft.shifts.find(s => s.id === action.shiftId)
      if (shift) {
        shift.templateId = action.templateId
      }

      const depth = draft.switchDepth[action.shiftId] ?? 0
      const next = action.cause === "undo" ? depth - 1 : depth + 1
      if (next > 0) {
        draft.switchDepth[action.shiftId] = next
      } else {
        delete draft.switchDepth[action.shiftId]
      }
      return
    }

    case "schedule/shift-deleted":
      draft.shifts = draft.shifts.filter(s => s.id !== action.shiftId)
      delete draft.switchDepth[action.shiftId]
      return

    case "schedule/calendar-linked": {
      const shift = draft.shifts.find(s => s.id === action.shiftId)
      if (shift) {
        shift.eventId = action.eventId
      }
      return
    }

    case "schedule/side-effect-failed":
      draft.failures.push({
        operation: action.operation,
        shiftId: action.shiftId,
        failure: action.failure,
        needsReconciliation: action.needsReconciliation,
      })
      return

    case "schedule/reconciled":
      draft.failures = draft.failures.filter(f => f.shiftId !== action.shiftId)
      return

    default:
      assertNever(action)
  }
}
