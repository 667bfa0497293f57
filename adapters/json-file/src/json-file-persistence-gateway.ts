import { mkdir, readFile, rename, writeFile } from "node:fs/promises"
import path from "node:path"
import { getLogger, type Logger } from "@logtape/logtape"
import {
  type ChangeLogEntry,
  ChangeLogEntrySchema,
  PersistenceError,
  type PersistenceGateway,
  type StateSnapshot,
  StateSnapshotSchema,
} from "@shift-ledger/engine"
import { z } from "zod"

type Operation = PersistenceError["operation"]

const ChangeLogFileSchema = z.array(ChangeLogEntrySchema)

/**
 * Options for creating a JsonFilePersistenceGateway
 */
export interface JsonFilePersistenceGatewayOptions {
  /** Directory holding both files; created on first write */
  directory: string

  /** State snapshot file name (default: 'state.json') */
  stateFile?: string

  /** Change log file name (default: 'change-log.json') */
  changeLogFile?: string

  logger?: Logger
}

/**
 * Persistence gateway that keeps the state snapshot and the change log in
 * two JSON files.
 *
 * Operations run one at a time, so concurrent appends never lose each
 * other's writes. Every write goes to a temporary file that is renamed over
 * the target, leaving either the old or the new content on disk.
 *
 * @example
 * ```typescript
 * import { createShiftEngine } from '@shift-ledger/engine'
 * import { JsonFilePersistenceGateway } from '@shift-ledger/adapter-json-file'
 *
 * const engine = createShiftEngine({
 *   persistence: new JsonFilePersistenceGateway({ directory: './data' }),
 *   calendar,
 * })
 * ```
 */
export class JsonFilePersistenceGateway implements PersistenceGateway {
  readonly #directory: string
  readonly #statePath: string
  readonly #changeLogPath: string
  readonly #logger: Logger
  #pending: Promise<unknown> = Promise.resolve()

  constructor(options: JsonFilePersistenceGatewayOptions) {
    this.#directory = options.directory
    this.#statePath = path.join(options.directory, options.stateFile ?? "state.json")
    this.#changeLogPath = path.join(
      options.directory,
      options.changeLogFile ?? "change-log.json",
    )
    this.#logger = (
      options.logger ?? getLogger(["shift-ledger", "adapter-json-file"])
    ).getChild("gateway")
  }

  loadState(): Promise<StateSnapshot | undefined> {
    return this.#exclusive("load-state", async () => {
      const data = await this.#readJson(this.#statePath)
      return data === undefined ? undefined : StateSnapshotSchema.parse(data)
    })
  }

  saveState(snapshot: StateSnapshot): Promise<void> {
    return this.#exclusive("save-state", () =>
      this.#writeJson(this.#statePath, snapshot),
    )
  }

  loadChangeLog(): Promise<ChangeLogEntry[]> {
    return this.#exclusive("load-change-log", () => this.#readEntries())
  }

  appendChangeLog(entry: ChangeLogEntry): Promise<void> {
    return this.#exclusive("append-change-log", async () => {
      const entries = (await this.#readEntries()).filter(e => e.id !== entry.id)
      entries.push(entry)
      entries.sort((a, b) => a.sequenceNumber - b.sequenceNumber)
      await this.#writeJson(this.#changeLogPath, entries)
    })
  }

  removeChangeLogEntries(ids: readonly string[]): Promise<void> {
    return this.#exclusive("remove-change-log-entries", async () => {
      const doomed = new Set(ids)
      const entries = await this.#readEntries()
      const kept = entries.filter(entry => !doomed.has(entry.id))
      if (kept.length === entries.length) return

      await this.#writeJson(this.#changeLogPath, kept)
      this.#logger.debug("removed {count} change-log entries", {
        count: entries.length - kept.length,
      })
    })
  }

  // ═══════════════════════════════════════════════════════════════════════
  // File access
  // ═══════════════════════════════════════════════════════════════════════

  #exclusive<T>(operation: Operation, task: () => Promise<T>): Promise<T> {
    const run = this.#pending.then(task).catch((error: unknown) => {
      if (error instanceof PersistenceError) throw error
      throw new PersistenceError(
        operation,
        error instanceof Error ? error.message : String(error),
        { cause: error },
      )
    })
    this.#pending = run.catch(() => undefined)
    return run
  }

  async #readEntries(): Promise<ChangeLogEntry[]> {
    const data = await this.#readJson(this.#changeLogPath)
    return data === undefined ? [] : ChangeLogFileSchema.parse(data)
  }

  async #readJson(file: string): Promise<unknown> {
    let text: string
    try {
      text = await readFile(file, "utf8")
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return undefined
      }
      throw error
    }

    const data: unknown = JSON.parse(text)
    return data
  }

  async #writeJson(file: string, value: unknown): Promise<void> {
    await mkdir(this.#directory, { recursive: true })

    const temporary = `${file}.${process.pid}.tmp`
    await writeFile(temporary, `${JSON.stringify(value, null, 2)}\n`, "utf8")
    await rename(temporary, file)
    this.#logger.trace("wrote {file}", { file })
  }
}
