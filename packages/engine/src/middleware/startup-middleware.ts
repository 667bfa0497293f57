import { toFailureInfo } from "../errors.js"
import type { AppMiddleware } from "../services.js"

/**
 * Restores persisted state and the change log when the app starts, then
 * kicks off the startup retention sweep.
 *
 * The change log is hydrated before the stacks so stack references can be
 * resolved against it. References to entries that no longer exist are
 * dropped, and the restored snapshot carries the surviving stacks.
 */
export const startupMiddleware: AppMiddleware = {
  name: "startup",
  handles: ["app/started"],
  run: async ({ state, dispatch, services, logger }) => {
    const { persistence, changeLog, history } = services

    try {
      const [snapshot, entries] = await Promise.all([
        persistence.loadState(),
        persistence.loadChangeLog(),
      ])

      changeLog.hydrate(entries)
      history.hydrate({ undo: snapshot?.undo ?? [], redo: snapshot?.redo ?? [] })
      const stacks = history.snapshot()

      logger.info("restored {shifts} shifts and {entries} change-log entries", {
        shifts: snapshot?.shifts.length ?? 0,
        entries: changeLog.size,
      })
      dispatch({
        type: "app/restored",
        snapshot: snapshot && { ...snapshot, ...stacks },
        entries: [...changeLog.entries],
      })

      if (snapshot?.settings.autoPurge ?? state.settings.autoPurge) {
        dispatch({ type: "history/purge-requested" })
      }
    } catch (error) {
      logger.error("restore failed: {error}", { error })
      dispatch({ type: "app/restore-failed", failure: toFailureInfo(error) })
    }
  },
}
