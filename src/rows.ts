/**
 * Event Log Rows
 *
 * Boundary between the three-column rows the store holds
 * (Date | Type | Presenter(s)) and typed schedule events. Everything read
 * from storage passes through `parseEventLog` before the engine sees it.
 */

import { InvalidDataError, ParseError } from './errors'
import { type Result, Ok, Err } from './result'
import { dayOfWeek, parseCalendarDay } from './time-date'
import type { PresentationTrack, ScheduleEvent, ScheduleSettings, StoredRow } from './types'
import { TRACK_LABELS } from './types'

const PRESENTER_SEPARATOR = ', '

// ============================================================================
// Serialization
// ============================================================================

export function presenterField(event: ScheduleEvent): string {
  return event.track === 'holiday' ? event.name : event.presenters.join(PRESENTER_SEPARATOR)
}

export function toStoredRow(event: ScheduleEvent): StoredRow {
  return {
    date: event.date,
    type: TRACK_LABELS[event.track],
    presenters: presenterField(event),
  }
}

function splitPresenters(field: string): string[] {
  return field
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0)
}

// ============================================================================
// Parsing
// ============================================================================

export function parseStoredRow(
  row: StoredRow,
  holidayLabels: readonly string[]
): Result<ScheduleEvent, ParseError> {
  const dateResult = parseCalendarDay(row.date)
  if (!dateResult.ok) return Err(dateResult.error)
  const date = dateResult.value

  const type = row.type.trim()
  if (type === TRACK_LABELS.holiday || holidayLabels.includes(type)) {
    const holiday: ScheduleEvent = { date, track: 'holiday', name: row.presenters.trim(), presenters: [] }
    return Ok(holiday)
  }

  const track: PresentationTrack | null = type === TRACK_LABELS.data
    ? 'data'
    : type === TRACK_LABELS.journalClub ? 'journalClub' : null
  if (track === null) {
    return Err(new ParseError(`Unknown event type '${row.type}'`))
  }

  const presenters = splitPresenters(row.presenters)
  if (presenters.length === 0) {
    return Err(new ParseError(`${type} event on ${date} has no presenters`))
  }

  const event: ScheduleEvent = { date, track, presenters }
  return Ok(event)
}

/**
 * Parse and validate the whole log. Throws on the first bad row, naming its
 * 1-based position, so nothing downstream runs on a partial history.
 */
export function parseEventLog(
  rows: readonly StoredRow[],
  settings: Pick<ScheduleSettings, 'weekday' | 'holidayLabels'>
): ScheduleEvent[] {
  const events: ScheduleEvent[] = []

  rows.forEach((row, i) => {
    const result = parseStoredRow(row, settings.holidayLabels)
    if (!result.ok) {
      throw new ParseError(`Event log row ${i + 1}: ${result.error.message}`)
    }

    const event = result.value
    if (dayOfWeek(event.date) !== settings.weekday) {
      throw new InvalidDataError(
        `Event log row ${i + 1}: ${event.date} is not a '${settings.weekday}' meeting day`
      )
    }

    const previous = events[events.length - 1]
    if (previous && event.date <= previous.date) {
      throw new InvalidDataError(
        `Event log row ${i + 1}: ${event.date} does not follow ${previous.date}`
      )
    }

    events.push(event)
  })

  return events
}

// ============================================================================
// Preview
// ============================================================================

export function formatScheduleTable(events: readonly ScheduleEvent[]): string {
  const line = (date: string, type: string, presenters: string) =>
    `${date.padEnd(12)} | ${type.padEnd(15)} | ${presenters}`

  return [
    line('Date', 'Type', 'Presenter(s)'),
    '-'.repeat(45),
    ...events.map((e) => line(e.date, TRACK_LABELS[e.track], presenterField(e))),
  ].join('\n')
}
