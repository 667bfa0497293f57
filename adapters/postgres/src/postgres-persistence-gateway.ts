import {
  type ChangeLogEntry,
  ChangeLogEntrySchema,
  PersistenceError,
  type PersistenceGateway,
  type StateSnapshot,
  StateSnapshotSchema,
} from "@shift-ledger/engine"

type Operation = PersistenceError["operation"]

// The snapshot table holds a single row under this key
const SNAPSHOT_ROW_ID = 1

/**
 * Minimal interface for query execution - works with Pool, Client, or custom implementations
 */
export interface QueryInterface {
  query(
    text: string,
    values?: unknown[],
  ): Promise<{ rows: Record<string, unknown>[] }>
}

/**
 * Options for creating a PostgresPersistenceGateway
 */
export interface PostgresPersistenceGatewayOptions {
  /** PostgreSQL Pool or Client instance */
  client: QueryInterface

  /** Prefix for both table names (default: 'shift_ledger') */
  tablePrefix?: string

  /** Auto-create tables if not exists (default: true) */
  createTables?: boolean
}

/**
 * PostgreSQL persistence gateway for @shift-ledger/engine
 *
 * The state snapshot is stored as JSONB in `<prefix>_state`; change-log
 * entries are stored one per row in `<prefix>_change_log`, with the
 * sequence number in its own unique column.
 *
 * @example
 * ```typescript
 * import { Pool } from 'pg'
 * import { PostgresPersistenceGateway } from '@shift-ledger/adapter-postgres'
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL })
 * const persistence = new PostgresPersistenceGateway({ client: pool })
 * ```
 */
export class PostgresPersistenceGateway implements PersistenceGateway {
  readonly #client: QueryInterface
  readonly #stateTable: string
  readonly #changeLogTable: string
  readonly #createTables: boolean
  #initialized: Promise<void> | undefined

  constructor(options: PostgresPersistenceGatewayOptions) {
    const prefix = options.tablePrefix ?? "shift_ledger"
    this.#client = options.client
    this.#stateTable = `${prefix}_state`
    this.#changeLogTable = `${prefix}_change_log`
    this.#createTables = options.createTables ?? true
  }

  loadState(): Promise<StateSnapshot | undefined> {
    return this.#run("load-state", async () => {
      const result = await this.#client.query(
        `SELECT snapshot FROM ${this.#stateTable} WHERE id = $1`,
        [SNAPSHOT_ROW_ID],
      )

      const [row] = result.rows
      if (row === undefined) return undefined
      return StateSnapshotSchema.parse(fromJson(row.snapshot))
    })
  }

  saveState(snapshot: StateSnapshot): Promise<void> {
    return this.#run("save-state", async () => {
      await this.#client.query(
        `INSERT INTO ${this.#stateTable} (id, snapshot)
         VALUES ($1, $2)
         ON CONFLICT (id) DO UPDATE SET snapshot = EXCLUDED.snapshot`,
        [SNAPSHOT_ROW_ID, JSON.stringify(snapshot)],
      )
    })
  }

  loadChangeLog(): Promise<ChangeLogEntry[]> {
    return this.#run("load-change-log", async () => {
      const result = await this.#client.query(
        `SELECT entry FROM ${this.#changeLogTable} ORDER BY sequence_number`,
      )
      return result.rows.map(row => ChangeLogEntrySchema.parse(fromJson(row.entry)))
    })
  }

  appendChangeLog(entry: ChangeLogEntry): Promise<void> {
    return this.#run("append-change-log", async () => {
      await this.#client.query(
        `INSERT INTO ${this.#changeLogTable} (id, sequence_number, recorded_at, entry)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (id) DO NOTHING`,
        [entry.id, entry.sequenceNumber, entry.timestamp, JSON.stringify(entry)],
      )
    })
  }

  removeChangeLogEntries(ids: readonly string[]): Promise<void> {
    return this.#run("remove-change-log-entries", async () => {
      if (ids.length === 0) return

      await this.#client.query(
        `DELETE FROM ${this.#changeLogTable} WHERE id = ANY($1)`,
        [[...ids]],
      )
    })
  }

  async #run<T>(operation: Operation, task: () => Promise<T>): Promise<T> {
    try {
      await this.#ensureTables()
      return await task()
    } catch (error) {
      if (error instanceof PersistenceError) throw error
      throw new PersistenceError(
        operation,
        error instanceof Error ? error.message : String(error),
        { cause: error },
      )
    }
  }

  /**
   * Ensure the tables exist before the first operation
   */
  #ensureTables(): Promise<void> {
    if (!this.#createTables) return Promise.resolve()

    this.#initialized ??= this.#createSchema().catch((error: unknown) => {
      // Let the next operation try again
      this.#initialized = undefined
      throw error
    })
    return this.#initialized
  }

  async #createSchema(): Promise<void> {
    await this.#client.query(`
      CREATE TABLE IF NOT EXISTS ${this.#stateTable} (
        id SMALLINT PRIMARY KEY,
        snapshot JSONB NOT NULL
      )
    `)

    await this.#client.query(`
      CREATE TABLE IF NOT EXISTS ${this.#changeLogTable} (
        id TEXT PRIMARY KEY,
        sequence_number INTEGER NOT NULL UNIQUE,
        recorded_at BIGINT NOT NULL,
        entry JSONB NOT NULL
      )
    `)
  }
}

// pg parses JSONB columns itself; other clients may hand back the raw text
function fromJson(value: unknown): unknown {
  if (typeof value !== "string") return value
  const parsed: unknown = JSON.parse(value)
  return parsed
}
