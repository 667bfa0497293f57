import type { AppAction } from "../actions.js"
import type { AppMiddleware } from "../services.js"

/**
 * One-line summary of an action for logs.
 */
export function describeAction(action: AppAction): string {
  const parts: string[] = [action.type]
  if ("shiftId" in action) parts.push(action.shiftId)
  if ("templateId" in action) parts.push(`-> ${action.templateId}`)
  if ("entry" in action) parts.push(`#${action.entry.sequenceNumber}`)
  if ("failure" in action) {
    parts.push(`(${action.failure.kind}: ${action.failure.message})`)
  }
  return parts.join(" ")
}

export const loggingMiddleware: AppMiddleware = {
  name: "logging",
  run: ({ state, action, logger }) => {
    logger.debug("{description} [version {version}]", {
      description: describeAction(action),
      version: state.version,
      action,
    })
  },
}
