import { z } from "zod"
import { RetentionPolicySchema } from "../history/retention-policy.js"
import { SNAPSHOT_SCHEMA_VERSION, type StateSnapshot } from "../state.js"
import type { ChangeLogEntry, ShiftTemplate } from "../types.js"

// Schemas for data read back from storage. Gateways parse what they load
// so a corrupted or hand-edited store fails loudly at startup.

const TimeOfDaySchema = z.object({
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59),
})

const ShiftWindowSchema = z.object({
  start: TimeOfDaySchema,
  end: TimeOfDaySchema,
})

export const ShiftTemplateSchema = z.object({
  id: z.string().min(1),
  symbol: z.string(),
  title: z.string(),
  description: z.string().optional(),
  window: ShiftWindowSchema,
  location: z
    .object({ name: z.string(), address: z.string().optional() })
    .optional(),
}) satisfies z.ZodType<ShiftTemplate>

const ShiftSnapshotSchema = z.object({
  templateId: z.string(),
  symbol: z.string(),
  title: z.string(),
  window: ShiftWindowSchema,
  locationName: z.string().optional(),
})

export const ChangeLogEntrySchema = z.object({
  id: z.string().min(1),
  sequenceNumber: z.number().int().positive(),
  timestamp: z.number(),
  actorId: z.string(),
  actorName: z.string(),
  kind: z.enum(["created", "switched", "deleted", "undone", "redone"]),
  shiftId: z.string(),
  shiftDate: z.string(),
  before: ShiftSnapshotSchema.optional(),
  after: ShiftSnapshotSchema.optional(),
  reason: z.string().optional(),
  revertsSequenceNumber: z.number().int().positive().optional(),
}) satisfies z.ZodType<ChangeLogEntry>

export const StateSnapshotSchema = z.object({
  schemaVersion: z.literal(SNAPSHOT_SCHEMA_VERSION),
  stateVersion: z.number().int().nonnegative(),
  shifts: z.array(
    z.object({
      id: z.string().min(1),
      date: z.string(),
      templateId: z.string(),
      eventId: z.string().optional(),
      notes: z.string().optional(),
    }),
  ),
  switchDepth: z.record(z.string(), z.number().int().positive()),
  templates: z.array(ShiftTemplateSchema),
  settings: z.object({
    actor: z.object({ id: z.string().min(1), displayName: z.string() }),
    retention: RetentionPolicySchema,
    autoPurge: z.boolean(),
  }),
  undo: z.array(z.number().int().positive()),
  redo: z.array(z.number().int().positive()),
}) satisfies z.ZodType<StateSnapshot>
