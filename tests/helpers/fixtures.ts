/**
 * Test data builders shared across segments.
 */
import { parseDate, type LocalDate } from '../../src/time-date'
import type { RotationRoster, ScheduleSettings, StoredRow } from '../../src/types'

export function date(s: string): LocalDate {
  const r = parseDate(s)
  if (!r.ok) throw new Error(`Invalid test date: ${s}`)
  return r.value
}

export const ROSTER: RotationRoster = {
  data: ['Alice', 'Bob', 'Carol', 'Dave'],
  journalClub: ['Eve', 'Frank', 'Grace'],
}

export const SETTINGS: ScheduleSettings = {
  weekday: 'thu',
  timezone: 'UTC',
  cadence: { dataPerCycle: 3, journalClubPresenters: 2 },
  holidayLabels: ['Holiday'],
}

/** Three Data meetings in January 2024 */
export const JANUARY_LOG: StoredRow[] = [
  { date: '2024-01-04', type: 'Data', presenters: 'Alice' },
  { date: '2024-01-11', type: 'Data', presenters: 'Bob' },
  { date: '2024-01-18', type: 'Data', presenters: 'Carol' },
]
