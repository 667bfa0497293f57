import { toShiftSnapshot } from "../selectors.js"
import type { ChangeLogDraft, ScheduledShift, ShiftTemplate } from "../types.js"

export { toShiftSnapshot as snapshotOf }

export const DAY: ShiftTemplate = {
  id: "tpl-day",
  symbol: "D",
  title: "Day",
  window: { start: { hour: 9, minute: 0 }, end: { hour: 17, minute: 0 } },
  location: { name: "Ward 3" },
}

export const LATE: ShiftTemplate = {
  id: "tpl-late",
  symbol: "L",
  title: "Late",
  window: { start: { hour: 14, minute: 0 }, end: { hour: 22, minute: 0 } },
}

export const NIGHT: ShiftTemplate = {
  id: "tpl-night",
  symbol: "N",
  title: "Night",
  window: { start: { hour: 23, minute: 0 }, end: { hour: 7, minute: 0 } },
}

export const EARLY: ShiftTemplate = {
  id: "tpl-early",
  symbol: "E",
  title: "Early",
  window: { start: { hour: 6, minute: 0 }, end: { hour: 14, minute: 0 } },
}

export const TEMPLATES = [DAY, LATE, NIGHT, EARLY]

export function makeShift(
  id: string,
  date: string,
  template: ShiftTemplate,
  extra: Partial<ScheduledShift> = {},
): ScheduledShift {
  return { id, date, templateId: template.id, ...extra }
}

let draftCounter = 0

export function makeDraft(overrides: Partial<ChangeLogDraft> = {}): ChangeLogDraft {
  draftCounter++
  return {
    id: `entry-${draftCounter}`,
    timestamp: Date.UTC(2025, 2, 1),
    actorId: "user-1",
    actorName: "Test User",
    kind: "switched",
    shiftId: "shift-1",
    shiftDate: "2025-03-10",
    before: toShiftSnapshot(DAY),
    after: toShiftSnapshot(LATE),
    ...overrides,
  }
}
