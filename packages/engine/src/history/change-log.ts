import { getLogger, type Logger } from "@logtape/logtape"
import { ChangeLogIntegrityError } from "../errors.js"
import type { ChangeLogDraft, ChangeLogEntry } from "../types.js"

export type ChangeLogSink = (entry: ChangeLogEntry) => Promise<void>

export type ChangeLogParams = {
  /**
   * Durable write for each appended entry. The entry is only added to the
   * log after the sink resolves; a rejected sink leaves the log unchanged.
   */
  sink?: ChangeLogSink
  logger?: Logger
}

export type DateRange = {
  /** Inclusive lower bound on `timestamp` */
  from?: number
  /** Exclusive upper bound on `timestamp` */
  to?: number
}

/**
 * Append-only audit log of shift changes.
 *
 * Sequence numbers are handed out synchronously when `append` is called, so
 * two appends racing on the sink still get distinct, increasing numbers.
 * A failed append burns its number: gaps are allowed, reuse is not.
 *
 * Entries can be pinned while an undo or redo is working with them; a
 * retention sweep skips pinned entries.
 *
 * @example
 * ```typescript
 * const log = new ChangeLog({ sink: entry => gateway.appendChangeLog(entry) })
 * const entry = await log.append(draft)
 * const lastWeek = log.query(e => e.kind === "switched", { from: weekAgo })
 * const removed = log.purgeOlderThan(cutoff)
 * ```
 */
export class ChangeLog {
  #entries: ChangeLogEntry[] = []
  #nextSequenceNumber = 1
  readonly #pins = new Map<number, number>()
  readonly #sink: ChangeLogSink | undefined
  readonly #logger: Logger

  constructor({ sink, logger }: ChangeLogParams = {}) {
    this.#sink = sink
    this.#logger = (logger ?? getLogger(["shift-ledger", "engine"])).getChild(
      "change-log",
    )
  }

  get size(): number {
    return this.#entries.length
  }

  /** Entries in sequence order */
  get entries(): readonly ChangeLogEntry[] {
    return [...this.#entries]
  }

  get nextSequenceNumber(): number {
    return this.#nextSequenceNumber
  }

  /**
   * Replace the log's contents with entries loaded from storage. Sequence
   * numbering continues after the highest loaded number.
   */
  hydrate(entries: readonly ChangeLogEntry[]): void {
    const sorted = [...entries].sort(
      (a, b) => a.sequenceNumber - b.sequenceNumber,
    )

    for (let i = 1; i < sorted.length; i++) {
      const current = sorted[i]
      if (current.sequenceNumber === sorted[i - 1].sequenceNumber) {
        throw new ChangeLogIntegrityError(
          current.sequenceNumber,
          "duplicate sequence number in loaded change log",
        )
      }
    }

    this.#entries = sorted.map(entry => Object.freeze({ ...entry }))
    const last = this.#entries.at(-1)
    this.#nextSequenceNumber = Math.max(
      this.#nextSequenceNumber,
      (last?.sequenceNumber ?? 0) + 1,
    )
    this.#logger.debug("hydrated change log with {count} entries", {
      count: this.#entries.length,
      nextSequenceNumber: this.#nextSequenceNumber,
    })
  }

  async append(draft: ChangeLogDraft): Promise<ChangeLogEntry> {
    const entry: ChangeLogEntry = Object.freeze({
      ...draft,
      sequenceNumber: this.#nextSequenceNumber++,
    })

    if (this.#sink) {
      await this.#sink(entry)
    }

    this.#insert(entry)
    this.#logger.trace("appended {kind} entry #{sequenceNumber}", {
      kind: entry.kind,
      sequenceNumber: entry.sequenceNumber,
      shiftId: entry.shiftId,
    })
    return entry
  }

  get(id: string): ChangeLogEntry | undefined {
    return this.#entries.find(entry => entry.id === id)
  }

  getBySequence(sequenceNumber: number): ChangeLogEntry | undefined {
    return this.#entries.find(entry => entry.sequenceNumber === sequenceNumber)
  }

  has(sequenceNumber: number): boolean {
    return this.getBySequence(sequenceNumber) !== undefined
  }

  query(
    predicate: (entry: ChangeLogEntry) => boolean = () => true,
    range: DateRange = {},
  ): ChangeLogEntry[] {
    const { from = Number.NEGATIVE_INFINITY, to = Number.POSITIVE_INFINITY } =
      range
    return this.#entries.filter(
      entry =>
        entry.timestamp >= from && entry.timestamp < to && predicate(entry),
    )
  }

  /**
   * Hold an entry back from retention sweeps until the returned release
   * function is called. Pins are counted, so nested pins need matching
   * releases.
   */
  pin(sequenceNumber: number): () => void {
    this.#pins.set(sequenceNumber, (this.#pins.get(sequenceNumber) ?? 0) + 1)

    let released = false
    return () => {
      if (released) return
      released = true

      const count = (this.#pins.get(sequenceNumber) ?? 1) - 1
      if (count <= 0) {
        this.#pins.delete(sequenceNumber)
      } else {
        this.#pins.set(sequenceNumber, count)
      }
    }
  }

  isPinned(sequenceNumber: number): boolean {
    return this.#pins.has(sequenceNumber)
  }

  /**
   * Remove every unpinned entry with `timestamp < cutoff` and return the
   * removed entries. Running it again with the same cutoff removes nothing.
   */
  sweep(cutoff: number): ChangeLogEntry[] {
    const removed: ChangeLogEntry[] = []
    const kept: ChangeLogEntry[] = []

    for (const entry of this.#entries) {
      if (entry.timestamp < cutoff && !this.isPinned(entry.sequenceNumber)) {
        removed.push(entry)
      } else {
        kept.push(entry)
      }
    }

    this.#entries = kept
    if (removed.length > 0) {
      this.#logger.debug("swept {count} entries older than {cutoff}", {
        count: removed.length,
        cutoff: new Date(cutoff).toISOString(),
      })
    }
    return removed
  }

  purgeOlderThan(cutoff: number): number {
    return this.sweep(cutoff).length
  }

  // Concurrent appends can settle out of order, so keep the array sorted.
  #insert(entry: ChangeLogEntry): void {
    let index = this.#entries.length
    while (
      index > 0 &&
      this.#entries[index - 1].sequenceNumber > entry.sequenceNumber
    ) {
      index--
    }
    this.#entries.splice(index, 0, entry)
  }
}
