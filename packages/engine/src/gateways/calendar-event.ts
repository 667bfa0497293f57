import { intervalFor } from "../interval/interval-math.js"
import type { ScheduledShift, ShiftTemplate } from "../types.js"
import type { CalendarEvent } from "./gateways.js"

export function toCalendarEvent(
  shift: ScheduledShift,
  template: ShiftTemplate,
): CalendarEvent {
  const { start, end } = intervalFor(shift.id, shift.date, template.window)
  return {
    shiftId: shift.id,
    date: shift.date,
    title: template.title,
    symbol: template.symbol,
    start,
    end,
    ...(template.location ? { location: template.location.name } : {}),
    ...(shift.notes !== undefined ? { notes: shift.notes } : {}),
  }
}
