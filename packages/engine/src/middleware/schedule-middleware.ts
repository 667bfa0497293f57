import type { ActionOf } from "../actions.js"
import { toCalendarEvent } from "../gateways/calendar-event.js"
import {
  checkAdd,
  checkSwitch,
  selectShift,
  selectTemplate,
  toShiftSnapshot,
} from "../selectors.js"
import type { AppMiddleware, AppMiddlewareContext } from "../services.js"
import type { ChangeLogEntry, ScheduledShift } from "../types.js"
import { publishStacks, sideEffectFailed, updateCalendarEvent } from "./effects.js"

/**
 * Turns schedule requests into committed changes.
 *
 * For each request: validate against the published state, record the
 * change-log entry, dispatch the mutating action, then mirror the change
 * into the calendar. Rejected requests never reach the change log.
 */
export const scheduleMiddleware: AppMiddleware = {
  name: "schedule",
  handles: [
    "schedule/add-requested",
    "schedule/switch-requested",
    "schedule/delete-requested",
  ],
  run: async context => {
    const { action } = context
    switch (action.type) {
      case "schedule/add-requested":
        return addShift(context, action)
      case "schedule/switch-requested":
        return switchShift(context, action)
      case "schedule/delete-requested":
        return deleteShift(context, action)
    }
  },
}

async function addShift(
  context: AppMiddlewareContext,
  action: ActionOf<"schedule/add-requested">,
): Promise<void> {
  const { state, dispatch, services, logger } = context

  const check = checkAdd(state, {
    shiftId: action.shiftId,
    date: action.date,
    templateId: action.templateId,
  })
  if (!check.valid) {
    logger.warn("add of {shiftId} rejected: {issue}", {
      shiftId: action.shiftId,
      issue: check.issue.type,
    })
    dispatch({
      type: "schedule/request-rejected",
      operation: "add",
      shiftId: action.shiftId,
      issue: check.issue,
    })
    return
  }

  const shift: ScheduledShift = {
    id: action.shiftId,
    date: action.date,
    templateId: action.templateId,
    ...(action.notes !== undefined ? { notes: action.notes } : {}),
  }
  const { actor } = state.settings

  let entry: ChangeLogEntry
  try {
    entry = await services.history.recordMutation({
      id: services.generateId(),
      timestamp: services.clock(),
      actorId: actor.id,
      actorName: actor.displayName,
      kind: "created",
      shiftId: shift.id,
      shiftDate: shift.date,
      after: toShiftSnapshot(check.template),
    })
  } catch (error) {
    dispatch(sideEffectFailed("add", shift.id, error, false))
    return
  }

  dispatch({ type: "schedule/shift-added", shift, entry })
  publishStacks(context)

  if (context.signal.aborted) return
  try {
    const eventId = await services.calendar.createEvent(
      toCalendarEvent(shift, check.template),
    )
    dispatch({ type: "schedule/calendar-linked", shiftId: shift.id, eventId })
  } catch (error) {
    logger.error("calendar create for {shiftId} failed: {error}", {
      shiftId: shift.id,
      error,
    })
    dispatch(sideEffectFailed("add", shift.id, error, true))
  }
}

async function switchShift(
  context: AppMiddlewareContext,
  action: ActionOf<"schedule/switch-requested">,
): Promise<void> {
  const { state, dispatch, services, logger } = context

  const check = checkSwitch(state, action.shiftId, action.templateId)
  if (!check.valid) {
    logger.warn("switch of {shiftId} rejected: {issue}", {
      shiftId: action.shiftId,
      issue: check.issue.type,
    })
    dispatch({
      type: "schedule/request-rejected",
      operation: "switch",
      shiftId: action.shiftId,
      issue: check.issue,
    })
    return
  }

  let entry: ChangeLogEntry
  try {
    entry = await services.history.recordSwitch({
      shiftId: check.shift.id,
      shiftDate: check.shift.date,
      before: toShiftSnapshot(check.from),
      after: toShiftSnapshot(check.to),
      actor: state.settings.actor,
      timestamp: services.clock(),
      ...(action.reason !== undefined ? { reason: action.reason } : {}),
    })
  } catch (error) {
    dispatch(sideEffectFailed("switch", check.shift.id, error, false))
    return
  }

  dispatch({
    type: "schedule/shift-switched",
    shiftId: check.shift.id,
    templateId: check.to.id,
    cause: "switch",
    entry,
  })
  publishStacks(context)

  await updateCalendarEvent(
    context,
    "switch",
    { ...check.shift, templateId: check.to.id },
    check.to,
  )
}

async function deleteShift(
  context: AppMiddlewareContext,
  action: ActionOf<"schedule/delete-requested">,
): Promise<void> {
  const { state, dispatch, services, logger } = context

  const shift = selectShift(state, action.shiftId)
  if (!shift) {
    dispatch({
      type: "schedule/request-rejected",
      operation: "delete",
      shiftId: action.shiftId,
      issue: { type: "unknown-shift", shiftId: action.shiftId },
    })
    return
  }

  const template = selectTemplate(state, shift.templateId)
  const { actor } = state.settings

  let entry: ChangeLogEntry
  try {
    entry = await services.history.recordMutation({
      id: services.generateId(),
      timestamp: services.clock(),
      actorId: actor.id,
      actorName: actor.displayName,
      kind: "deleted",
      shiftId: shift.id,
      shiftDate: shift.date,
      ...(template ? { before: toShiftSnapshot(template) } : {}),
      ...(action.reason !== undefined ? { reason: action.reason } : {}),
    })
  } catch (error) {
    dispatch(sideEffectFailed("delete", shift.id, error, false))
    return
  }

  services.history.forgetShift(shift.id)
  dispatch({ type: "schedule/shift-deleted", shiftId: shift.id, entry })
  publishStacks(context)

  if (shift.eventId === undefined || context.signal.aborted) return
  try {
    await services.calendar.deleteEvent(shift.eventId)
  } catch (error) {
    logger.error("calendar delete for {shiftId} failed: {error}", {
      shiftId: shift.id,
      error,
    })
    dispatch(sideEffectFailed("delete", shift.id, error, true))
  }
}
