/**
 * ActionQueue - serialized FIFO processing of dispatched actions
 *
 * Dispatches that happen while an action is being processed (from an
 * observer, or from middleware that resolves synchronously) are queued
 * and processed iteratively after the current one, never recursively.
 *
 * @example
 * ```typescript
 * const queue = new ActionQueue<Action>(action => {
 *   state = reducer(state, action)
 *   notifyObservers(state, action)
 * })
 *
 * queue.enqueue({ type: "a" })
 * // an observer dispatching { type: "b" } here runs after "a" completes
 * ```
 */
export class ActionQueue<A> {
  #queue: A[] = []
  #isProcessing = false
  readonly #process: (action: A) => void

  constructor(process: (action: A) => void) {
    this.#process = process
  }

  /**
   * Enqueue an action. Processing starts immediately unless the queue is
   * already draining, in which case the action waits its turn.
   */
  enqueue(action: A): void {
    this.#queue.push(action)
    this.#drain()
  }

  get isProcessing(): boolean {
    return this.#isProcessing
  }

  get pending(): number {
    return this.#queue.length
  }

  /** Drop queued actions that have not started processing. */
  clear(): void {
    this.#queue = []
  }

  #drain(): void {
    if (this.#isProcessing) return

    this.#isProcessing = true
    try {
      let action = this.#queue.shift()
      while (action !== undefined) {
        this.#process(action)
        action = this.#queue.shift()
      }
    } finally {
      this.#isProcessing = false
    }
  }
}
