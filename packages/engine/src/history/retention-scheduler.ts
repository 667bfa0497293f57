/**
 * RetentionScheduler - runs the change-log retention sweep on a cadence
 *
 * The startup sweep covers the common case of one sweep per process
 * lifetime. Long-running hosts can add a periodic sweep on top.
 *
 * @example
 * ```typescript
 * const scheduler = new RetentionScheduler(24 * HOUR_MS, () => {
 *   engine.dispatch({ type: "history/purge-requested" })
 * })
 *
 * scheduler.start()
 * // ... later
 * scheduler.stop()
 * ```
 */
export class RetentionScheduler {
  #timer: ReturnType<typeof setInterval> | undefined
  readonly #intervalMs: number
  readonly #onSweep: () => void

  constructor(intervalMs: number, onSweep: () => void) {
    if (!(intervalMs > 0)) {
      throw new RangeError(`Sweep interval must be positive, got ${intervalMs}`)
    }
    this.#intervalMs = intervalMs
    this.#onSweep = onSweep
  }

  /** No-op when already running */
  start(): void {
    if (this.#timer !== undefined) return

    this.#timer = setInterval(() => {
      this.#onSweep()
    }, this.#intervalMs)
    this.#timer.unref?.()
  }

  stop(): void {
    if (this.#timer === undefined) return

    clearInterval(this.#timer)
    this.#timer = undefined
  }

  get isRunning(): boolean {
    return this.#timer !== undefined
  }

  get intervalMs(): number {
    return this.#intervalMs
  }
}
