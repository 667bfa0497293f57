import { randomUUID } from "node:crypto"

/**
 * Generate an identifier for shifts and change-log entries.
 *
 * @param prefix - Optional readable prefix, e.g. `"shift"` → `"shift-3f2a…"`
 */
export function generateId(prefix?: string): string {
  const uuid = randomUUID()
  return prefix ? `${prefix}-${uuid}` : uuid
}
