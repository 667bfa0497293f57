import type { ActionOf, SettingsAction } from "../actions.js"
import { assertNever } from "../errors.js"
import type { SettingsState } from "../state.js"

export type SettingsReducerAction = SettingsAction | ActionOf<"app/restored">

export function settingsReducer(
  draft: SettingsState,
  action: SettingsReducerAction,
): void {
  switch (action.type) {
    case "app/restored":
      if (action.snapshot) {
        draft.actor = action.snapshot.settings.actor
        draft.retention = action.snapshot.settings.retention
        draft.autoPurge = action.snapshot.settings.autoPurge
      }
      return
    case "settings/actor-changed":
      draft.actor = action.actor
      return
    case "settings/retention-changed":
      draft.retention = action.retention
      return
    case "settings/auto-purge-toggled":
      draft.autoPurge = action.enabled
      return
    default:
      assertNever(action)
  }
}
