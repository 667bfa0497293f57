import { getLogger, type Logger } from "@logtape/logtape"
import Emittery from "emittery"
import { toError } from "../errors.js"
import { ActionQueue } from "./action-queue.js"
import { appliesTo, type Dispatch, type Middleware } from "./middleware.js"

export type Observer<S, A> = (state: S, action: A) => void

export type MiddlewareFailure<A> = {
  middleware: string
  action: A
  error: Error
}

export type EngineEvents<A> = {
  "middleware-failed": MiddlewareFailure<A>
  disposed: undefined
}

export type EngineParams<S, A extends { type: string }, Services> = {
  initialState: S
  reducer: (state: S, action: A) => S
  services: Services
  middleware?: Middleware<S, A, Services>[]
  /**
   * Describe a middleware failure as an action. Return `undefined` to only
   * log it. Failures of middleware handling a failure action are never
   * converted again.
   */
  toFailureAction?: (failure: MiddlewareFailure<A>) => A | undefined
  logger?: Logger
}

/**
 * The dispatch engine: single owner of the current state.
 *
 * Each dispatched action goes through three phases, in order:
 *
 * 1. Reduce: `state = reducer(state, action)`, synchronously.
 * 2. Publish: every observer is called with `(state, action)`, synchronously.
 * 3. Effect: every middleware that handles the action is started with the
 *    published state. They run concurrently and may dispatch more actions.
 *
 * Actions dispatched while another is being reduced or published are
 * queued, so one action's phases 1 and 2 always finish before the next
 * action's phase 1 begins.
 *
 * @example
 * ```typescript
 * const engine = new Engine({
 *   initialState,
 *   reducer,
 *   services,
 *   middleware: [loggingMiddleware, scheduleMiddleware],
 * })
 *
 * const unsubscribe = engine.subscribe((state, action) => render(state))
 * engine.dispatch({ type: "app/started" })
 * await engine.whenIdle()
 * ```
 */
export class Engine<S, A extends { type: string }, Services> {
  readonly events = new Emittery<EngineEvents<A>>()
  readonly services: Services

  #state: S
  #isRunning = true
  readonly #reducer: (state: S, action: A) => S
  readonly #middleware: readonly Middleware<S, A, Services>[]
  readonly #toFailureAction:
    | ((failure: MiddlewareFailure<A>) => A | undefined)
    | undefined
  readonly #observers = new Set<Observer<S, A>>()
  readonly #inFlight = new Set<Promise<void>>()
  readonly #failureActions = new WeakSet<A>()
  readonly #abort = new AbortController()
  readonly #queue: ActionQueue<A>
  readonly #logger: Logger

  constructor({
    initialState,
    reducer,
    services,
    middleware = [],
    toFailureAction,
    logger,
  }: EngineParams<S, A, Services>) {
    this.#state = initialState
    this.#reducer = reducer
    this.services = services
    this.#middleware = [...middleware]
    this.#toFailureAction = toFailureAction
    this.#logger = (logger ?? getLogger(["shift-ledger", "engine"])).getChild(
      "dispatch",
    )
    this.#queue = new ActionQueue(action => this.#process(action))
  }

  get state(): S {
    return this.#state
  }

  get isRunning(): boolean {
    return this.#isRunning
  }

  /** Number of middleware tasks that have not settled yet */
  get inFlight(): number {
    return this.#inFlight.size
  }

  dispatch: Dispatch<A> = action => {
    if (!this.#isRunning) {
      this.#logger.warn("ignoring {type} dispatched after dispose", {
        type: action.type,
      })
      return
    }
    this.#queue.enqueue(action)
  }

  subscribe(observer: Observer<S, A>): () => void {
    this.#observers.add(observer)
    return () => {
      this.#observers.delete(observer)
    }
  }

  /**
   * Resolves once no middleware task is running, including tasks started
   * by actions that earlier tasks dispatched.
   */
  async whenIdle(): Promise<void> {
    while (this.#inFlight.size > 0) {
      await Promise.allSettled([...this.#inFlight])
    }
  }

  /**
   * Stop accepting actions, abort the middleware signal, and wait for
   * running middleware to settle.
   */
  async dispose(): Promise<void> {
    if (!this.#isRunning) return

    this.#isRunning = false
    this.#queue.clear()
    this.#abort.abort()
    await this.whenIdle()
    this.#observers.clear()
    await this.events.emit("disposed", undefined)
    this.events.clearListeners()
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Phases
  // ═══════════════════════════════════════════════════════════════════════

  #process(action: A): void {
    let next: S
    try {
      next = this.#reducer(this.#state, action)
    } catch (error) {
      this.#logger.fatal("reducer failed on {type}: {error}", {
        type: action.type,
        error,
      })
      throw error
    }

    this.#state = next
    this.#publish(next, action)
    this.#startEffects(next, action)
  }

  #publish(state: S, action: A): void {
    for (const observer of [...this.#observers]) {
      try {
        observer(state, action)
      } catch (error) {
        this.#logger.error("observer threw while handling {type}: {error}", {
          type: action.type,
          error,
        })
      }
    }
  }

  #startEffects(state: S, action: A): void {
    for (const middleware of this.#middleware) {
      if (!appliesTo(middleware, action)) continue

      const context = {
        state,
        getState: () => this.#state,
        action,
        dispatch: this.dispatch,
        services: this.services,
        logger: this.#logger.getChild(middleware.name),
        signal: this.#abort.signal,
      }

      const task: Promise<void> = Promise.resolve()
        .then(() => middleware.run(context))
        .catch(error => this.#handleFailure(middleware.name, action, error))
        .finally(() => {
          this.#inFlight.delete(task)
        })
      this.#inFlight.add(task)
    }
  }

  #handleFailure(middleware: string, action: A, thrown: unknown): void {
    const failure: MiddlewareFailure<A> = {
      middleware,
      action,
      error: toError(thrown),
    }

    this.#logger.error("middleware {middleware} failed on {type}: {error}", {
      middleware,
      type: action.type,
      error: failure.error,
    })

    this.events.emit("middleware-failed", failure).catch(error => {
      this.#logger.error("middleware-failed listener threw: {error}", { error })
    })

    if (this.#failureActions.has(action)) return

    const failureAction = this.#toFailureAction?.(failure)
    if (failureAction) {
      this.#failureActions.add(failureAction)
      this.dispatch(failureAction)
    }
  }
}
