import { PERSISTED_ACTION_TYPES } from "../actions.js"
import { toFailureInfo } from "../errors.js"
import type { AppMiddleware } from "../services.js"
import { toSnapshot } from "../state.js"

/**
 * Saves a state snapshot after every action that changes durable data.
 *
 * Saves run one at a time in dispatch order. A save whose state has been
 * superseded by a newer action before it starts is skipped, so bursts of
 * actions collapse into the latest snapshot. Nothing is saved until the
 * restore has finished, so a half-started app never overwrites storage.
 */
export function createPersistenceMiddleware(): AppMiddleware {
  let latestVersion = 0
  let chain: Promise<void> = Promise.resolve()

  return {
    name: "persistence",
    handles: [...PERSISTED_ACTION_TYPES],
    run: ({ state, dispatch, services, logger }) => {
      if (state.lifecycle.status !== "ready") {
        logger.debug("not saving version {version} while {status}", {
          version: state.version,
          status: state.lifecycle.status,
        })
        return
      }

      latestVersion = Math.max(latestVersion, state.version)
      const snapshot = toSnapshot(state)

      chain = chain.then(async () => {
        if (snapshot.stateVersion < latestVersion) {
          logger.trace("skipping superseded save of version {version}", {
            version: snapshot.stateVersion,
          })
          return
        }

        try {
          await services.persistence.saveState(snapshot)
        } catch (error) {
          logger.error("saving version {version} failed: {error}", {
            version: snapshot.stateVersion,
            error,
          })
          dispatch({
            type: "persistence/save-failed",
            version: snapshot.stateVersion,
            failure: toFailureInfo(error),
          })
        }
      })
      return chain
    },
  }
}
