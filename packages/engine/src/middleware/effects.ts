import type { ActionOf } from "../actions.js"
import { toFailureInfo } from "../errors.js"
import { toCalendarEvent } from "../gateways/calendar-event.js"
import type { AppMiddlewareContext } from "../services.js"
import type { ScheduledShift, ShiftTemplate } from "../types.js"

type FailedOperation = ActionOf<"schedule/side-effect-failed">["operation"]

export function sideEffectFailed(
  operation: FailedOperation,
  shiftId: string,
  error: unknown,
  needsReconciliation: boolean,
): ActionOf<"schedule/side-effect-failed"> {
  return {
    type: "schedule/side-effect-failed",
    operation,
    shiftId,
    failure: toFailureInfo(error),
    needsReconciliation,
  }
}

/**
 * Mirror the controller's stacks into state so observers and the
 * persisted snapshot see them.
 */
export function publishStacks({ dispatch, services }: AppMiddlewareContext): void {
  const { undo, redo } = services.history.snapshot()
  dispatch({ type: "history/stacks-changed", undo, redo })
}

/**
 * Push a committed template change to the shift's calendar event. The
 * state change already happened, so a failure is reported as needing
 * reconciliation rather than rolled back.
 */
export async function updateCalendarEvent(
  { dispatch, services, logger, signal }: AppMiddlewareContext,
  operation: FailedOperation,
  shift: ScheduledShift,
  template: ShiftTemplate,
): Promise<void> {
  if (shift.eventId === undefined || signal.aborted) return

  try {
    await services.calendar.updateEvent(
      shift.eventId,
      toCalendarEvent(shift, template),
    )
  } catch (error) {
    logger.error("calendar update for {shiftId} failed: {error}", {
      shiftId: shift.id,
      error,
    })
    dispatch(sideEffectFailed(operation, shift.id, error, true))
  }
}
