import { z } from "zod"
import { RetentionPolicySchema } from "./history/retention-policy.js"
import { DEFAULT_UNDO_CAPACITY } from "./history/undo-redo-controller.js"
import { DEFAULT_SETTINGS } from "./state.js"

export const ActorSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().min(1),
})

/**
 * Engine configuration. `actor`, `retention` and `autoPurge` seed the
 * settings slice; a restored snapshot takes precedence over them.
 */
export const EngineConfigSchema = z.object({
  undoCapacity: z.number().int().positive().default(DEFAULT_UNDO_CAPACITY),
  retention: RetentionPolicySchema.default(DEFAULT_SETTINGS.retention),
  autoPurge: z.boolean().default(DEFAULT_SETTINGS.autoPurge),
  actor: ActorSchema.default(DEFAULT_SETTINGS.actor),
  /** Periodic retention sweep while running; omit for startup-only sweeps */
  purgeIntervalMs: z.number().int().positive().optional(),
})

export type EngineConfig = z.infer<typeof EngineConfigSchema>
export type EngineConfigInput = z.input<typeof EngineConfigSchema>

/**
 * Apply defaults and validate. Throws a `ZodError` describing every invalid
 * field.
 */
export function parseEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  return EngineConfigSchema.parse(input)
}
