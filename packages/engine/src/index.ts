// Domain
export type {
  Actor,
  ActorId,
  CalendarDate,
  ChangeKind,
  ChangeLogDraft,
  ChangeLogEntry,
  FailureInfo,
  FailureKind,
  Location,
  ScheduledShift,
  ShiftId,
  ShiftSnapshot,
  ShiftTemplate,
  ShiftWindow,
  TemplateId,
  TimeOfDay,
} from "./types.js"
export {
  CalendarSyncError,
  ChangeLogIntegrityError,
  PersistenceError,
  UnhandledActionError,
  toFailureInfo,
} from "./errors.js"

// Interval math
export {
  DAY_MS,
  HOUR_MS,
  MINUTE_MS,
  addDays,
  checkSpan,
  createShiftInterval,
  dateOfInstant,
  formatCalendarDate,
  intersection,
  intervalFor,
  isOvernight,
  isValidTimeOfDay,
  minutesOfDay,
  occupiedDates,
  overlaps,
  parseCalendarDate,
  spanOf,
  toInstant,
  type IntervalResult,
  type ShiftInterval,
  type SpanCheck,
} from "./interval/interval-math.js"
export {
  validate,
  type OverlapIssue,
  type ValidationResult,
} from "./interval/overlap-validator.js"

// History
export {
  ChangeLog,
  type ChangeLogParams,
  type ChangeLogSink,
  type DateRange,
} from "./history/change-log.js"
export {
  DEFAULT_UNDO_CAPACITY,
  UndoRedoController,
  type RedoResult,
  type StackSnapshot,
  type StepContext,
  type SwitchRecord,
  type UndoRedoParams,
  type UndoResult,
} from "./history/undo-redo-controller.js"
export {
  RETENTION_PRESETS,
  RetentionPolicySchema,
  cutoffFor,
  describeRetention,
  retentionDays,
  type RetentionPolicy,
  type RetentionPreset,
} from "./history/retention-policy.js"
export { RetentionScheduler } from "./history/retention-scheduler.js"

// State, actions and reducer
export type {
  ActionOf,
  AppAction,
  AppActionType,
  CatalogAction,
  HistoryAction,
  LifecycleAction,
  ScheduleAction,
  ScheduleOperation,
  ScheduleRequestAction,
  ScheduleResultAction,
  SettingsAction,
  StepDirection,
  SwitchCause,
} from "./actions.js"
export { PERSISTED_ACTION_TYPES } from "./actions.js"
export {
  DEFAULT_SETTINGS,
  SNAPSHOT_SCHEMA_VERSION,
  initState,
  toSnapshot,
  type AppState,
  type CatalogState,
  type HistoryState,
  type LastStep,
  type LifecycleState,
  type LifecycleStatus,
  type PurgeSummary,
  type Rejection,
  type ScheduleState,
  type SettingsState,
  type SideEffectFailure,
  type StateSnapshot,
} from "./state.js"
export * from "./selectors.js"
export {
  createAppReducer,
  type AppReducerParams,
  type Reducer,
} from "./reducer/app-reducer.js"

// Dispatch engine
export {
  Engine,
  type EngineEvents,
  type EngineParams,
  type MiddlewareFailure,
  type Observer,
} from "./engine/engine.js"
export type {
  Dispatch,
  Middleware,
  MiddlewareContext,
} from "./engine/middleware.js"
export { serialize } from "./engine/middleware.js"
export * from "./middleware/index.js"
export type {
  AppMiddleware,
  AppMiddlewareContext,
  ShiftServices,
} from "./services.js"

// Gateways
export type {
  CalendarEvent,
  CalendarGateway,
  PersistenceGateway,
} from "./gateways/gateways.js"
export { toCalendarEvent } from "./gateways/calendar-event.js"
export { InMemoryCalendarGateway } from "./gateways/in-memory-calendar-gateway.js"
export { InMemoryPersistenceGateway } from "./gateways/in-memory-persistence-gateway.js"
export {
  ChangeLogEntrySchema,
  ShiftTemplateSchema,
  StateSnapshotSchema,
} from "./gateways/storage-schema.js"

// Configuration and wiring
export {
  ActorSchema,
  EngineConfigSchema,
  parseEngineConfig,
  type EngineConfig,
  type EngineConfigInput,
} from "./config.js"
export {
  createShiftEngine,
  toMiddlewareFailedAction,
  type ShiftEngine,
  type ShiftEngineParams,
} from "./shift-engine.js"
