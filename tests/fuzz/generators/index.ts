/**
 * fast-check generators for rotation domain types.
 */
import * as fc from 'fast-check'
import type { Arbitrary } from 'fast-check'
import { daysInMonth, makeDate, type LocalDate, type Weekday } from '../../../src/time-date'
import type { CadenceSettings, HolidayOverride, RotationRoster } from '../../../src/types'

export const WEEKDAYS: readonly Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

export function weekdayGen(): Arbitrary<Weekday> {
  return fc.constantFrom(...WEEKDAYS)
}

/**
 * LocalDate within a year range. Days past the end of the month are clamped.
 */
export function localDateGen(options?: { minYear?: number; maxYear?: number }): Arbitrary<LocalDate> {
  return fc
    .tuple(
      fc.integer({ min: options?.minYear ?? 2000, max: options?.maxYear ?? 2060 }),
      fc.integer({ min: 1, max: 12 }),
      fc.integer({ min: 1, max: 31 })
    )
    .map(([year, month, day]) => makeDate(year, month, Math.min(day, daysInMonth(year, month))))
}

/** Presenter names: no commas, no surrounding whitespace */
export function presenterNameGen(): Arbitrary<string> {
  return fc.stringMatching(/^[A-Z][a-z]{1,8}$/)
}

export function rosterListGen(maxLength = 8): Arbitrary<string[]> {
  return fc.uniqueArray(presenterNameGen(), { minLength: 1, maxLength })
}

export function rosterGen(): Arbitrary<RotationRoster> {
  return fc.record({ data: rosterListGen(), journalClub: rosterListGen(5) })
}

export function cadenceGen(): Arbitrary<CadenceSettings> {
  return fc.record({
    dataPerCycle: fc.integer({ min: 0, max: 5 }),
    journalClubPresenters: fc.integer({ min: 1, max: 3 }),
  })
}

export function holidayOverrideGen(): Arbitrary<HolidayOverride> {
  return fc.record({
    date: localDateGen({ minYear: 2024, maxYear: 2026 }),
    name: fc.constantFrom('Spring Break', 'Lab Retreat', 'Building Closed'),
  })
}
