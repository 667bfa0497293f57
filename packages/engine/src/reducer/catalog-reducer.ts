import type { ActionOf, CatalogAction } from "../actions.js"
import { assertNever } from "../errors.js"
import type { CatalogState } from "../state.js"

export type CatalogReducerAction = CatalogAction | ActionOf<"app/restored">

export function catalogReducer(
  draft: CatalogState,
  action: CatalogReducerAction,
): void {
  switch (action.type) {
    case "app/restored":
      if (action.snapshot) {
        draft.templates = action.snapshot.templates
      }
      return
    case "catalog/template-saved": {
      const index = draft.templates.findIndex(t => t.id === action.template.id)
      if (index === -1) {
        draft.templates.push(action.template)
      } else {
        draft.templates[index] = action.template
      }
      return
    }
    case "catalog/template-removed":
      draft.templates = draft.templates.filter(t => t.id !== action.templateId)
      return
    default:
      assertNever(action)
  }
}
