/**
 * Schedule Extender
 *
 * Walks forward one meeting slot at a time from an anchor date. Each slot is
 * either a holiday (emitted without touching the rotation) or a presentation
 * whose track comes from the cadence and whose presenters come from the cursor.
 *
 * `extendSchedule()` is pure: every input is pre-loaded and pre-validated, and
 * it always returns exactly `targetCount` events.
 */

import { nextSlot, presentersFor } from './cadence'
import { isHoliday } from './holidays'
import { createRotationCursor } from './rotation-cursor'
import type { LocalDate, Weekday } from './time-date'
import { addDays, dayOfWeek, weekdayToIndex } from './time-date'
import type {
  CadenceSettings,
  CursorState,
  HolidayOverrides,
  RotationRoster,
  ScheduleEvent,
} from './types'

// ============================================================================
// Types
// ============================================================================

export type ExtendScheduleInput = {
  /** First date eligible for a slot; aligned forward to `weekday` */
  anchor: LocalDate
  weekday: Weekday
  roster: RotationRoster
  overrides: HolidayOverrides
  cursor: CursorState
  cadence: CadenceSettings
  /** Events to emit; holidays count toward it */
  targetCount: number
}

export type ExtendScheduleResult = {
  events: ScheduleEvent[]
  /** Cursor after the last emitted event */
  cursor: CursorState
}

const DAYS_PER_WEEK = 7

// ============================================================================
// Anchors
// ============================================================================

/** First date on or after `date` that falls on `weekday` */
export function alignToWeekday(date: LocalDate, weekday: Weekday): LocalDate {
  const offset = (weekdayToIndex(weekday) - weekdayToIndex(dayOfWeek(date)) + DAYS_PER_WEEK) % DAYS_PER_WEEK
  return addDays(date, offset)
}

/**
 * Where the next run starts: the day after the newest logged event, or the
 * day after `today` when nothing has been scheduled yet.
 */
export function nextAnchor(log: readonly ScheduleEvent[], today: LocalDate): LocalDate {
  const last = log[log.length - 1]
  return addDays(last ? last.date : today, 1)
}

// ============================================================================
// Extender
// ============================================================================

export function extendSchedule(input: ExtendScheduleInput): ExtendScheduleResult {
  const { weekday, roster, overrides, cadence, targetCount } = input
  const cursor = createRotationCursor(roster, input.cursor.nextIndex)
  const events: ScheduleEvent[] = []

  let streak = input.cursor.streak
  let date = alignToWeekday(input.anchor, weekday)

  while (events.length < targetCount) {
    const check = isHoliday(date, overrides, weekday)

    if (check.holiday) {
      events.push({ date, track: 'holiday', name: check.name, presenters: [] })
    } else {
      const step = nextSlot(streak, cadence)
      events.push({
        date,
        track: step.track,
        presenters: cursor.take(step.track, presentersFor(step.track, cadence)),
      })
      streak = step.streak
    }

    date = addDays(date, DAYS_PER_WEEK)
  }

  return {
    events,
    cursor: { nextIndex: cursor.snapshot(), streak },
  }
}
