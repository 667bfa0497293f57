import { create, type Draft, type Patch } from "mutative"

/**
 * Turns a reducer written against a mutable draft (via `mutative`) into a
 * pure `(state, action) => state` function.
 *
 * The draft reducer mutates in place and returns nothing; the wrapper hands
 * back a fresh, frozen state that shares unchanged branches with the input.
 * Pass `onPatch` to observe the JSON patches each action produced.
 *
 * @param mutativeUpdate - Function that mutates the draft state
 * @param onPatch - Optional callback to receive patches for debugging
 */
export function makeImmutableUpdate<State extends object, Action>(
  mutativeUpdate: (draft: Draft<State>, action: Action) => void,
  onPatch?: (patches: Patch[], action: Action) => void,
): (state: State, action: Action) => State {
  return (state: State, action: Action) => {
    if (onPatch) {
      const [next, patches] = create(
        state,
        draft => {
          mutativeUpdate(draft, action)
        },
        { enablePatches: true, enableAutoFreeze: true },
      )
      if (patches.length > 0) {
        onPatch(patches, action)
      }
      return next
    }

    return create(
      state,
      draft => {
        mutativeUpdate(draft, action)
      },
      { enableAutoFreeze: true },
    )
  }
}
