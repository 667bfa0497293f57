import type { ActionOf, HistoryAction } from "../actions.js"
import { assertNever } from "../errors.js"
import type { HistoryState } from "../state.js"
import type { ChangeLogEntry } from "../types.js"

export type HistoryReducerAction =
  | HistoryAction
  | ActionOf<
      | "app/restored"
      | "schedule/shift-added"
      | "schedule/shift-switched"
      | "schedule/shift-deleted"
    >

export function historyReducer(
  draft: HistoryState,
  action: HistoryReducerAction,
): void {
  switch (action.type) {
    case "app/restored":
      draft.entries = action.entries
      draft.undo = action.snapshot?.undo ?? []
      draft.redo = action.snapshot?.redo ?? []
      draft.isPurging = false
      delete draft.lastStep
      return

    case "schedule/shift-added":
    case "schedule/shift-deleted":
      mirrorEntry(draft, action.entry)
      return

    case "schedule/shift-switched":
      mirrorEntry(draft, action.entry)
      if (action.cause === "switch") {
        delete draft.lastStep
      } else {
        draft.lastStep = {
          type: action.cause === "undo" ? "undone" : "redone",
          sequenceNumber:
            action.entry.revertsSequenceNumber ?? action.entry.sequenceNumber,
        }
      }
      return

    case "history/undo-requested":
    case "history/redo-requested":
      delete draft.lastStep
      return

    case "history/nothing-to-undo":
      draft.lastStep = { type: "nothing-to-undo" }
      return

    case "history/nothing-to-redo":
      draft.lastStep = { type: "nothing-to-redo" }
      return

    case "history/step-rejected":
      draft.lastStep = {
        type: "rejected",
        direction: action.direction,
        sequenceNumber: action.sequenceNumber,
        issue: action.issue,
      }
      return

    case "history/stacks-changed":
      draft.undo = action.undo
      draft.redo = action.redo
      return

    case "history/purge-requested":
      draft.isPurging = true
      return

    case "history/purged": {
      const removed = new Set(action.removed)
      draft.entries = draft.entries.filter(e => !removed.has(e.sequenceNumber))
      draft.lastPurge = {
        at: action.at,
        cutoff: action.cutoff,
        removed: action.removed.length,
      }
      draft.isPurging = false
      return
    }

    case "history/purge-failed":
      draft.isPurging = false
      return

    default:
      assertNever(action)
  }
}

// Appends can settle out of order, so keep the mirror sorted and unique.
function mirrorEntry(draft: HistoryState, entry: ChangeLogEntry): void {
  let index = draft.entries.length
  while (index > 0) {
    const previous = draft.entries[index - 1].sequenceNumber
    if (previous === entry.sequenceNumber) return
    if (previous < entry.sequenceNumber) break
    index--
  }
  draft.entries.splice(index, 0, entry)
}
