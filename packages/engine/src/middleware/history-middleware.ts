import type { StepDirection } from "../actions.js"
import { ChangeLogIntegrityError, toFailureInfo } from "../errors.js"
import { cutoffFor } from "../history/retention-policy.js"
import type { RedoResult, UndoResult } from "../history/undo-redo-controller.js"
import { checkSwitch } from "../selectors.js"
import type { AppMiddleware, AppMiddlewareContext } from "../services.js"
import { publishStacks, sideEffectFailed, updateCalendarEvent } from "./effects.js"

/**
 * Undo, redo and retention sweeps.
 */
export const historyMiddleware: AppMiddleware = {
  name: "history",
  handles: [
    "history/undo-requested",
    "history/redo-requested",
    "history/purge-requested",
  ],
  run: async context => {
    switch (context.action.type) {
      case "history/undo-requested":
        return step(context, "undo")
      case "history/redo-requested":
        return step(context, "redo")
      case "history/purge-requested":
        return purge(context)
    }
  },
}

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// UNDO / REDO
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

async function step(
  context: AppMiddlewareContext,
  direction: StepDirection,
): Promise<void> {
  const { state, dispatch, services, logger } = context
  const { history } = services

  const target = direction === "undo" ? history.peekUndo() : history.peekRedo()
  if (!target) {
    dispatch({
      type:
        direction === "undo"
          ? "history/nothing-to-undo"
          : "history/nothing-to-redo",
    })
    return
  }

  const destination = direction === "undo" ? target.before : target.after
  if (!destination) {
    throw new ChangeLogIntegrityError(
      target.sequenceNumber,
      "switched entry is missing a shift snapshot",
    )
  }

  // Reverting is a switch like any other and must fit the current schedule.
  const check = checkSwitch(state, target.shiftId, destination.templateId)
  if (!check.valid) {
    logger.warn("{direction} of #{sequenceNumber} rejected: {issue}", {
      direction,
      sequenceNumber: target.sequenceNumber,
      issue: check.issue.type,
    })
    dispatch({
      type: "history/step-rejected",
      direction,
      sequenceNumber: target.sequenceNumber,
      issue: check.issue,
    })
    return
  }

  const stepContext = { actor: state.settings.actor, timestamp: services.clock() }
  let result: UndoResult | RedoResult
  try {
    result =
      direction === "undo"
        ? await history.undo(stepContext)
        : await history.redo(stepContext)
  } catch (error) {
    dispatch(sideEffectFailed(direction, target.shiftId, error, false))
    return
  }

  if (result.type === "nothing-to-undo") {
    dispatch({ type: "history/nothing-to-undo" })
    return
  }
  if (result.type === "nothing-to-redo") {
    dispatch({ type: "history/nothing-to-redo" })
    return
  }

  dispatch({
    type: "schedule/shift-switched",
    shiftId: check.shift.id,
    templateId: check.to.id,
    cause: direction,
    entry: result.logged,
  })
  publishStacks(context)

  await updateCalendarEvent(
    context,
    direction,
    { ...check.shift, templateId: check.to.id },
    check.to,
  )
}

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// RETENTION
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

async function purge(context: AppMiddlewareContext): Promise<void> {
  const { state, dispatch, services, logger } = context
  const at = services.clock()
  const cutoff = cutoffFor(state.settings.retention, at)

  if (cutoff === undefined) {
    logger.debug("retention keeps everything; nothing to sweep")
    dispatch({ type: "history/purged", at, cutoff: null, removed: [] })
    return
  }

  const removed = services.changeLog.sweep(cutoff)
  const stacksChanged = services.history.retainOnly()

  dispatch({
    type: "history/purged",
    at,
    cutoff,
    removed: removed.map(entry => entry.sequenceNumber),
  })
  if (stacksChanged) {
    publishStacks(context)
  }

  if (removed.length === 0) return
  try {
    await services.persistence.removeChangeLogEntries(
      removed.map(entry => entry.id),
    )
  } catch (error) {
    logger.error("removing {count} purged entries from storage failed: {error}", {
      count: removed.length,
      error,
    })
    dispatch({ type: "history/purge-failed", failure: toFailureInfo(error) })
  }
}
