import { z } from "zod"
import { DAY_MS } from "../interval/interval-math.js"

export const RetentionPolicySchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("days"), days: z.number().int().positive() }),
  z.object({ type: z.literal("forever") }),
])

/**
 * How long change-log entries are kept before a retention sweep removes
 * them. Supplied by settings; the engine never computes it.
 */
export type RetentionPolicy = z.infer<typeof RetentionPolicySchema>

export const RETENTION_PRESETS = {
  "30-days": { type: "days", days: 30 },
  "90-days": { type: "days", days: 90 },
  "6-months": { type: "days", days: 182 },
  "1-year": { type: "days", days: 365 },
  "2-years": { type: "days", days: 730 },
  forever: { type: "forever" },
} as const satisfies Record<string, RetentionPolicy>

export type RetentionPreset = keyof typeof RETENTION_PRESETS

export function retentionDays(days: number): RetentionPolicy {
  return { type: "days", days }
}

/**
 * The instant before which entries expire, or `undefined` when the policy
 * keeps everything.
 */
export function cutoffFor(
  policy: RetentionPolicy,
  now: number,
): number | undefined {
  switch (policy.type) {
    case "forever":
      return undefined
    case "days":
      return now - policy.days * DAY_MS
  }
}

export function describeRetention(policy: RetentionPolicy): string {
  switch (policy.type) {
    case "forever":
      return "forever"
    case "days":
      return policy.days === 1 ? "1 day" : `${policy.days} days`
  }
}
