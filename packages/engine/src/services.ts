import type { AppAction } from "./actions.js"
import type { Middleware, MiddlewareContext } from "./engine/middleware.js"
import type { CalendarGateway, PersistenceGateway } from "./gateways/gateways.js"
import type { ChangeLog } from "./history/change-log.js"
import type { UndoRedoController } from "./history/undo-redo-controller.js"
import type { AppState } from "./state.js"

/**
 * Everything middleware may touch besides state. The change log and the
 * undo/redo stacks live here, owned by the engine instance.
 */
export type ShiftServices = {
  persistence: PersistenceGateway
  calendar: CalendarGateway
  changeLog: ChangeLog
  history: UndoRedoController
  clock: () => number
  generateId: () => string
}

export type AppMiddleware = Middleware<AppState, AppAction, ShiftServices>

export type AppMiddlewareContext = MiddlewareContext<
  AppState,
  AppAction,
  ShiftServices
>
