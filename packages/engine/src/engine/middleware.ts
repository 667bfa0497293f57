import type { Logger } from "@logtape/logtape"

export type Dispatch<A> = (action: A) => void

/**
 * Context handed to middleware for one action.
 *
 * Every middleware running for the same action receives the same `state`:
 * the state observers were shown after the action was reduced. Results of
 * sibling middleware are only visible through actions they dispatch, and
 * through `getState()` once those actions have been reduced.
 */
export type MiddlewareContext<S, A, Services> = {
  /** State published for this action */
  state: S
  /** The engine's current state, including actions reduced since `state` */
  getState: () => S
  /** The action that was just reduced */
  action: A
  /** Enqueue follow-up actions; they run after the current action */
  dispatch: Dispatch<A>
  services: Services
  logger: Logger
  /** Aborted when the engine is disposed */
  signal: AbortSignal
}

/**
 * Side-effect handler run after an action is reduced and published.
 *
 * `run` may be sync or async. A throw or rejection is caught by the engine,
 * logged, and converted into a failure action.
 *
 * @example
 * ```typescript
 * const audit: Middleware<AppState, AppAction, Services> = {
 *   name: "audit",
 *   handles: ["schedule/shift-switched"],
 *   run: async ({ action, services }) => {
 *     await services.auditTrail.write(action)
 *   },
 * }
 * ```
 */
export interface Middleware<S, A extends { type: string }, Services> {
  /** Name for logging and failure reporting */
  name: string

  /**
   * Action types this middleware reacts to. When omitted the middleware
   * runs for every action.
   */
  handles?: readonly A["type"][]

  run(context: MiddlewareContext<S, A, Services>): void | Promise<void>
}

export function appliesTo<A extends { type: string }>(
  middleware: { handles?: readonly A["type"][] },
  action: A,
): boolean {
  return middleware.handles === undefined || middleware.handles.includes(action.type)
}

/**
 * Run a group of middleware one task at a time, in the order their actions
 * were dispatched. Each task starts with `state` replaced by the engine's
 * state at the moment its turn comes, so it sees every change the tasks
 * before it committed. Tasks still waiting when the engine is disposed are
 * skipped.
 *
 * @example
 * ```typescript
 * const [schedule, history] = serialize([scheduleMiddleware, historyMiddleware])
 * ```
 */
export function serialize<S, A extends { type: string }, Services>(
  group: readonly Middleware<S, A, Services>[],
): Middleware<S, A, Services>[] {
  let chain: Promise<unknown> = Promise.resolve()

  return group.map(
    (inner): Middleware<S, A, Services> => ({
      ...inner,
      run: context => {
        const task = chain.then(async (): Promise<void> => {
          if (context.signal.aborted) {
            context.logger.debug("skipping {type} after dispose", {
              type: context.action.type,
            })
            return
          }
          await inner.run({ ...context, state: context.getState() })
        })
        // The engine observes `task`; the chain only needs it settled.
        chain = Promise.allSettled([task])
        return task
      },
    }),
  )
}
