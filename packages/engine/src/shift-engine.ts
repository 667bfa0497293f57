import { getLogger, type Logger } from "@logtape/logtape"
import type { AppAction } from "./actions.js"
import { type EngineConfigInput, parseEngineConfig } from "./config.js"
import { Engine, type MiddlewareFailure } from "./engine/engine.js"
import { serialize } from "./engine/middleware.js"
import { toFailureInfo } from "./errors.js"
import type { CalendarGateway, PersistenceGateway } from "./gateways/gateways.js"
import { ChangeLog } from "./history/change-log.js"
import { RetentionScheduler } from "./history/retention-scheduler.js"
import { UndoRedoController } from "./history/undo-redo-controller.js"
import { historyMiddleware } from "./middleware/history-middleware.js"
import { loggingMiddleware } from "./middleware/logging-middleware.js"
import { createPersistenceMiddleware } from "./middleware/persistence-middleware.js"
import { scheduleMiddleware } from "./middleware/schedule-middleware.js"
import { startupMiddleware } from "./middleware/startup-middleware.js"
import { type AppReducerParams, createAppReducer } from "./reducer/app-reducer.js"
import type { AppMiddleware, ShiftServices } from "./services.js"
import { type AppState, initState } from "./state.js"
import type { ShiftTemplate } from "./types.js"
import { generateId } from "./utils/generate-id.js"

export type ShiftEngine = Engine<AppState, AppAction, ShiftServices>

export type ShiftEngineParams = {
  persistence: PersistenceGateway
  calendar: CalendarGateway
  config?: EngineConfigInput
  /** Catalog used until a restored snapshot replaces it */
  templates?: ShiftTemplate[]
  clock?: () => number
  generateId?: () => string
  logger?: Logger
  /** Extra middleware, run after the built-in ones */
  middleware?: AppMiddleware[]
  onPatch?: AppReducerParams["onPatch"]
}

/**
 * Wire a ready-to-start engine: change log, undo/redo stacks, reducer and
 * the built-in middleware. Dispatch `app/started` to restore from storage.
 *
 * @example
 * ```typescript
 * const engine = createShiftEngine({
 *   persistence: new JsonFilePersistenceGateway({ directory: "./data" }),
 *   calendar,
 *   config: { retention: { type: "days", days: 90 } },
 * })
 *
 * engine.dispatch({ type: "app/started" })
 * engine.dispatch({
 *   type: "schedule/switch-requested",
 *   shiftId: "shift-1",
 *   templateId: "tpl-night",
 * })
 * await engine.whenIdle()
 * ```
 */
export function createShiftEngine({
  persistence,
  calendar,
  config: configInput,
  templates,
  clock = Date.now,
  generateId: makeId = generateId,
  logger: parentLogger,
  middleware = [],
  onPatch,
}: ShiftEngineParams): ShiftEngine {
  const config = parseEngineConfig(configInput)
  const logger = parentLogger ?? getLogger(["shift-ledger", "engine"])

  const changeLog = new ChangeLog({
    sink: entry => persistence.appendChangeLog(entry),
    logger,
  })
  const history = new UndoRedoController({
    changeLog,
    capacity: config.undoCapacity,
    generateId: makeId,
    logger,
  })

  const engine: ShiftEngine = new Engine({
    initialState: initState({
      settings: {
        actor: config.actor,
        retention: config.retention,
        autoPurge: config.autoPurge,
      },
      templates,
    }),
    reducer: createAppReducer({ logger, onPatch }),
    services: {
      persistence,
      calendar,
      changeLog,
      history,
      clock,
      generateId: makeId,
    },
    middleware: [
      loggingMiddleware,
      // Restore, schedule changes and history steps each validate against
      // what the previous one committed.
      ...serialize([startupMiddleware, scheduleMiddleware, historyMiddleware]),
      createPersistenceMiddleware(),
      ...middleware,
    ],
    toFailureAction: toMiddlewareFailedAction,
    logger,
  })

  if (config.purgeIntervalMs !== undefined) {
    const scheduler = new RetentionScheduler(config.purgeIntervalMs, () => {
      const { lifecycle, settings, history } = engine.state
      if (lifecycle.status !== "ready" || !settings.autoPurge || history.isPurging) {
        return
      }
      engine.dispatch({ type: "history/purge-requested" })
    })
    scheduler.start()
    engine.events.on("disposed", () => {
      scheduler.stop()
    })
  }

  return engine
}

export function toMiddlewareFailedAction({
  middleware,
  action,
  error,
}: MiddlewareFailure<AppAction>): AppAction {
  const failure = toFailureInfo(error)
  return {
    type: "engine/middleware-failed",
    middleware,
    actionType: action.type,
    failure: failure.kind === "unknown" ? { ...failure, kind: "middleware" } : failure,
  }
}
