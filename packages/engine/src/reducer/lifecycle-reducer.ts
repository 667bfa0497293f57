import type { ActionOf, LifecycleAction } from "../actions.js"
import { assertNever } from "../errors.js"
import type { LifecycleState } from "../state.js"

export type LifecycleReducerAction =
  | LifecycleAction
  | ActionOf<"history/purge-failed">

export function lifecycleReducer(
  draft: LifecycleState,
  action: LifecycleReducerAction,
): void {
  switch (action.type) {
    case "app/started":
      draft.status = "restoring"
      delete draft.lastError
      return
    case "app/restored":
      draft.status = "ready"
      return
    case "app/restore-failed":
      draft.status = "failed"
      draft.lastError = action.failure
      return
    case "engine/middleware-failed":
    case "persistence/save-failed":
    case "history/purge-failed":
      draft.lastError = action.failure
      return
    default:
      assertNever(action)
  }
}
