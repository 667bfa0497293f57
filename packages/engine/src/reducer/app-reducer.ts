import { getLogger, type Logger } from "@logtape/logtape"
import type { Draft, Patch } from "mutative"
import type { AppAction } from "../actions.js"
import { assertNever } from "../errors.js"
import type { AppState } from "../state.js"
import { makeImmutableUpdate } from "../utils/make-immutable-update.js"
import { catalogReducer } from "./catalog-reducer.js"
import { historyReducer } from "./history-reducer.js"
import { lifecycleReducer } from "./lifecycle-reducer.js"
import { scheduleReducer } from "./schedule-reducer.js"
import { settingsReducer } from "./settings-reducer.js"

export type Reducer<S, A> = (state: S, action: A) => S

export type AppReducerParams = {
  logger?: Logger
  /** Receives the JSON patches each action produced (debugging aid) */
  onPatch?: (patches: Patch[], action: AppAction) => void
}

/**
 * Build the root reducer.
 *
 * Every action type is routed explicitly to the sub-reducers whose slice
 * it touches. Adding an action without routing it is a compile error.
 */
export function createAppReducer({
  logger,
  onPatch,
}: AppReducerParams = {}): Reducer<AppState, AppAction> {
  const reducerLogger = (logger ?? getLogger(["shift-ledger", "engine"])).getChild(
    "reducer",
  )

  return makeImmutableUpdate<AppState, AppAction>((draft, action) => {
    draft.version += 1
    route(draft, action)
    reducerLogger.trace("{type} -> version {version}", {
      type: action.type,
      version: draft.version,
    })
  }, onPatch)
}

function route(draft: Draft<AppState>, action: AppAction): void {
  switch (action.type) {
    case "app/started":
    case "app/restore-failed":
    case "engine/middleware-failed":
    case "persistence/save-failed":
      lifecycleReducer(draft.lifecycle, action)
      return

    case "app/restored":
      lifecycleReducer(draft.lifecycle, action)
      scheduleReducer(draft.schedule, action)
      catalogReducer(draft.catalog, action)
      historyReducer(draft.history, action)
      settingsReducer(draft.settings, action)
      return

    case "catalog/template-saved":
    case "catalog/template-removed":
      catalogReducer(draft.catalog, action)
      return

    case "schedule/add-requested":
    case "schedule/switch-requested":
    case "schedule/delete-requested":
    case "schedule/request-rejected":
    case "schedule/calendar-linked":
    case "schedule/side-effect-failed":
    case "schedule/reconciled":
      scheduleReducer(draft.schedule, action)
      return

    case "schedule/shift-added":
    case "schedule/shift-switched":
    case "schedule/shift-deleted":
      scheduleReducer(draft.schedule, action)
      historyReducer(draft.history, action)
      return

    case "history/undo-requested":
    case "history/redo-requested":
    case "history/nothing-to-undo":
    case "history/nothing-to-redo":
    case "history/step-rejected":
    case "history/stacks-changed":
    case "history/purge-requested":
    case "history/purged":
      historyReducer(draft.history, action)
      return

    case "history/purge-failed":
      historyReducer(draft.history, action)
      lifecycleReducer(draft.lifecycle, action)
      return

    case "settings/actor-changed":
    case "settings/retention-changed":
    case "settings/auto-purge-toggled":
      settingsReducer(draft.settings, action)
      return

    default:
      assertNever(action)
  }
}
