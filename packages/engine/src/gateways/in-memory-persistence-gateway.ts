import { PersistenceError } from "../errors.js"
import type { StateSnapshot } from "../state.js"
import type { ChangeLogEntry } from "../types.js"
import type { PersistenceGateway } from "./gateways.js"

type Operation = PersistenceError["operation"]

/**
 * Process-local persistence. Values are cloned on the way in and out so
 * callers never share references with what is "stored".
 *
 * `failNext` makes the next call of an operation reject, for exercising
 * failure paths.
 */
export class InMemoryPersistenceGateway implements PersistenceGateway {
  #state: StateSnapshot | undefined
  #entries = new Map<string, ChangeLogEntry>()
  readonly #failures = new Map<Operation, number>()

  constructor(initial: { state?: StateSnapshot; entries?: ChangeLogEntry[] } = {}) {
    this.#state = initial.state && structuredClone(initial.state)
    for (const entry of initial.entries ?? []) {
      this.#entries.set(entry.id, structuredClone(entry))
    }
  }

  failNext(operation: Operation, times = 1): void {
    this.#failures.set(operation, (this.#failures.get(operation) ?? 0) + times)
  }

  /** What is currently stored, for assertions */
  get storedState(): StateSnapshot | undefined {
    return this.#state && structuredClone(this.#state)
  }

  get storedEntries(): ChangeLogEntry[] {
    return [...this.#entries.values()]
      .map(entry => structuredClone(entry))
      .sort((a, b) => a.sequenceNumber - b.sequenceNumber)
  }

  async loadState(): Promise<StateSnapshot | undefined> {
    this.#maybeFail("load-state")
    return this.storedState
  }

  async saveState(snapshot: StateSnapshot): Promise<void> {
    this.#maybeFail("save-state")
    this.#state = structuredClone(snapshot)
  }

  async loadChangeLog(): Promise<ChangeLogEntry[]> {
    this.#maybeFail("load-change-log")
    return this.storedEntries
  }

  async appendChangeLog(entry: ChangeLogEntry): Promise<void> {
    this.#maybeFail("append-change-log")
    this.#entries.set(entry.id, structuredClone(entry))
  }

  async removeChangeLogEntries(ids: readonly string[]): Promise<void> {
    this.#maybeFail("remove-change-log-entries")
    for (const id of ids) {
      this.#entries.delete(id)
    }
  }

  #maybeFail(operation: Operation): void {
    const remaining = this.#failures.get(operation) ?? 0
    if (remaining <= 0) return

    this.#failures.set(operation, remaining - 1)
    throw new PersistenceError(operation, "injected failure")
  }
}
