/**
 * Holiday Resolver
 *
 * Decides whether a candidate meeting date is a non-meeting day. Fixed rules
 * cover the recurring federal holidays that land on the meeting weekday; the
 * override list supplements them with one-off closures.
 */

import type { LocalDate, Weekday } from './time-date'
import { dayOf, dayOfWeek, daysInMonth, monthOf, yearOf } from './time-date'
import type { HolidayOverride, HolidayOverrides } from './types'

// ============================================================================
// Types
// ============================================================================

export type HolidayCheck = { holiday: true; name: string } | { holiday: false }

export const FIXED_HOLIDAY_NAME = 'Federal Holiday/BCM observed'

// ============================================================================
// Fixed Rules
// ============================================================================

type FixedRule = (month: number, day: number, year: number) => boolean

const FIXED_RULES: readonly FixedRule[] = [
  // New Year's: first week of January
  (month, day) => month === 1 && day <= 7,
  // Independence Day
  (month, day) => month === 7 && day === 4,
  // Thanksgiving window: fourth occurrence falls on the 22nd-28th
  (month, day) => month === 11 && day >= 22 && day <= 28,
  // Year-end closure: last seven days of December
  (month, day, year) => month === 12 && day >= daysInMonth(year, 12) - 6,
]

function matchesFixedRule(date: LocalDate): boolean {
  const month = monthOf(date)
  const day = dayOf(date)
  const year = yearOf(date)
  return FIXED_RULES.some((rule) => rule(month, day, year))
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Index an override list by date. The first entry for a date wins.
 * Build once per run, then pass the map to every `isHoliday` call.
 */
export function buildOverrideIndex(overrides: readonly HolidayOverride[]): HolidayOverrides {
  const index = new Map<LocalDate, string>()
  for (const o of overrides) {
    if (!index.has(o.date)) index.set(o.date, o.name)
  }
  return index
}

export function isHoliday(
  date: LocalDate,
  overrides: HolidayOverrides,
  weekday: Weekday
): HolidayCheck {
  if (dayOfWeek(date) === weekday && matchesFixedRule(date)) {
    return { holiday: true, name: FIXED_HOLIDAY_NAME }
  }

  const name = overrides.get(date)
  if (name !== undefined) {
    return { holiday: true, name }
  }

  return { holiday: false }
}
