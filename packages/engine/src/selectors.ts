import {
  intervalFor,
  parseCalendarDate,
  type ShiftInterval,
} from "./interval/interval-math.js"
import { type OverlapIssue, validate } from "./interval/overlap-validator.js"
import type { AppState, SideEffectFailure } from "./state.js"
import type {
  CalendarDate,
  ChangeLogEntry,
  ScheduledShift,
  ShiftId,
  ShiftSnapshot,
  ShiftTemplate,
  TemplateId,
} from "./types.js"

export type ValidationIssue =
  | OverlapIssue
  | { type: "invalid-date"; date: string }
  | { type: "unknown-shift"; shiftId: ShiftId }
  | { type: "duplicate-shift"; shiftId: ShiftId }
  | { type: "unknown-template"; templateId: TemplateId }
  | { type: "unchanged"; templateId: TemplateId }

export type Placement = {
  shiftId: ShiftId
  date: CalendarDate
  templateId: TemplateId
}

export type PlacementCheck =
  | { valid: true; interval: ShiftInterval; template: ShiftTemplate }
  | { valid: false; issue: ValidationIssue }

export type SwitchCheck =
  | {
      valid: true
      shift: ScheduledShift
      from: ShiftTemplate
      to: ShiftTemplate
      interval: ShiftInterval
    }
  | { valid: false; issue: ValidationIssue }

export type SlotStatus = { type: "unmodified" } | { type: "switched"; depth: number }

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// LOOKUPS
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export function selectShift(
  state: AppState,
  shiftId: ShiftId,
): ScheduledShift | undefined {
  return state.schedule.shifts.find(shift => shift.id === shiftId)
}

export function selectTemplate(
  state: AppState,
  templateId: TemplateId,
): ShiftTemplate | undefined {
  return state.catalog.templates.find(template => template.id === templateId)
}

export function selectShiftsOn(
  state: AppState,
  date: CalendarDate,
): ScheduledShift[] {
  return state.schedule.shifts.filter(shift => shift.date === date)
}

/**
 * Intervals of every committed shift whose template is still known.
 */
export function selectShiftIntervals(state: AppState): ShiftInterval[] {
  const intervals: ShiftInterval[] = []
  for (const shift of state.schedule.shifts) {
    const template = selectTemplate(state, shift.templateId)
    if (template) {
      intervals.push(intervalFor(shift.id, shift.date, template.window))
    }
  }
  return intervals
}

export function selectSlotStatus(state: AppState, shiftId: ShiftId): SlotStatus {
  const depth = state.schedule.switchDepth[shiftId] ?? 0
  return depth > 0 ? { type: "switched", depth } : { type: "unmodified" }
}

export function selectCanUndo(state: AppState): boolean {
  return state.history.undo.length > 0
}

export function selectCanRedo(state: AppState): boolean {
  return state.history.redo.length > 0
}

export function selectEntriesForShift(
  state: AppState,
  shiftId: ShiftId,
): ChangeLogEntry[] {
  return state.history.entries.filter(entry => entry.shiftId === shiftId)
}

export function selectPendingReconciliation(
  state: AppState,
): SideEffectFailure[] {
  return state.schedule.failures.filter(failure => failure.needsReconciliation)
}

export function toShiftSnapshot(template: ShiftTemplate): ShiftSnapshot {
  return {
    templateId: template.id,
    symbol: template.symbol,
    title: template.title,
    window: template.window,
    ...(template.location ? { locationName: template.location.name } : {}),
  }
}

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// VALIDATION
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

/**
 * Would placing `templateId` on `date` for `shiftId` fit the schedule?
 * The shift's own current placement, if any, is not counted as a conflict.
 */
export function validateShiftPlacement(
  state: AppState,
  placement: Placement,
): PlacementCheck {
  const date = parseCalendarDate(placement.date)
  if (!date) {
    return { valid: false, issue: { type: "invalid-date", date: placement.date } }
  }

  const template = selectTemplate(state, placement.templateId)
  if (!template) {
    return {
      valid: false,
      issue: { type: "unknown-template", templateId: placement.templateId },
    }
  }

  const candidate = intervalFor(placement.shiftId, date, template.window)
  const result = validate(candidate, selectShiftIntervals(state))
  if (!result.valid) {
    return { valid: false, issue: result.issue }
  }
  return { valid: true, interval: candidate, template }
}

export function checkAdd(state: AppState, placement: Placement): PlacementCheck {
  if (selectShift(state, placement.shiftId)) {
    return {
      valid: false,
      issue: { type: "duplicate-shift", shiftId: placement.shiftId },
    }
  }
  return validateShiftPlacement(state, placement)
}

/**
 * Validate moving an existing shift onto another template. Used for user
 * switches and for the reverts performed by undo and redo.
 */
export function checkSwitch(
  state: AppState,
  shiftId: ShiftId,
  templateId: TemplateId,
): SwitchCheck {
  const shift = selectShift(state, shiftId)
  if (!shift) {
    return { valid: false, issue: { type: "unknown-shift", shiftId } }
  }
  if (shift.templateId === templateId) {
    return { valid: false, issue: { type: "unchanged", templateId } }
  }

  const from = selectTemplate(state, shift.templateId)
  if (!from) {
    return {
      valid: false,
      issue: { type: "unknown-template", templateId: shift.templateId },
    }
  }

  const placement = validateShiftPlacement(state, {
    shiftId,
    date: shift.date,
    templateId,
  })
  if (!placement.valid) return placement

  return {
    valid: true,
    shift,
    from,
    to: placement.template,
    interval: placement.interval,
  }
}
