/**
 * Rotation Planner
 *
 * Consumer-facing interface that ties the engine to its collaborators.
 * Loads roster, overrides and history, validates them before the extender
 * runs, and hands the new events to the adapter as a single batch.
 */

import type { Adapter } from './adapter'
import { ConfigurationError, ValidationError } from './errors'
import { buildOverrideIndex } from './holidays'
import { type Logger, silentLogger } from './logger'
import { deriveCursorState } from './rotation-cursor'
import { parseEventLog, toStoredRow } from './rows'
import { extendSchedule, nextAnchor } from './schedule'
import type { LocalDate } from './time-date'
import { isValidTimezone, todayIn } from './time-date'
import type { CursorState, RotationRoster, ScheduleEvent, ScheduleSettings } from './types'
import { PRESENTATION_TRACKS, TRACK_LABELS } from './types'

// ============================================================================
// Types
// ============================================================================

export type RotationPlannerConfig = {
  adapter: Adapter
  settings: ScheduleSettings
  logger?: Logger
  /** Clock override; defaults to today in `settings.timezone` */
  today?: () => LocalDate
}

export type GenerateOptions = {
  /** Build the schedule without appending it */
  dryRun?: boolean
}

export type GenerateResult = {
  events: ScheduleEvent[]
  /** Cursor after the last generated event */
  cursor: CursorState
  appended: boolean
}

export type RotationPlanner = {
  generate(targetCount: number, options?: GenerateOptions): Promise<GenerateResult>
  loadEventLog(): Promise<ScheduleEvent[]>
  upcoming(count: number, asOf?: LocalDate): Promise<ScheduleEvent[]>
}

// ============================================================================
// Validation
// ============================================================================

function validateCount(count: number, what: string): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new ValidationError(`${what} must be a non-negative integer, got ${count}`)
  }
}

function validateRoster(roster: RotationRoster): void {
  for (const track of PRESENTATION_TRACKS) {
    if (roster[track].length === 0) {
      throw new ConfigurationError(`${TRACK_LABELS[track]} rotation list is empty`)
    }
  }
}

function validateSettings(settings: ScheduleSettings): void {
  if (!isValidTimezone(settings.timezone)) {
    throw new ConfigurationError(`Unknown timezone '${settings.timezone}'`)
  }
  const { dataPerCycle, journalClubPresenters } = settings.cadence
  if (!Number.isInteger(dataPerCycle) || dataPerCycle < 0) {
    throw new ConfigurationError(`dataPerCycle must be a non-negative integer, got ${dataPerCycle}`)
  }
  if (!Number.isInteger(journalClubPresenters) || journalClubPresenters < 1) {
    throw new ConfigurationError(`journalClubPresenters must be a positive integer, got ${journalClubPresenters}`)
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createRotationPlanner(config: RotationPlannerConfig): RotationPlanner {
  const { adapter, settings } = config
  validateSettings(settings)

  const logger = config.logger ?? silentLogger()
  const today = config.today ?? (() => todayIn(settings.timezone))

  async function loadEventLog(): Promise<ScheduleEvent[]> {
    return parseEventLog(await adapter.getEventLog(), settings)
  }

  async function generate(targetCount: number, options: GenerateOptions = {}): Promise<GenerateResult> {
    validateCount(targetCount, 'Event count')

    // Everything that can fail on bad input happens before the extender runs
    const [roster, overrideList, log] = await Promise.all([
      adapter.getRoster(),
      adapter.getHolidayOverrides(),
      loadEventLog(),
    ])
    validateRoster(roster)

    const { state, warnings } = deriveCursorState(log, roster, settings.cadence)
    for (const warning of warnings) {
      logger.warn({ code: warning.code }, warning.message)
    }

    const anchor = nextAnchor(log, today())
    logger.info({ anchor, cursor: state, history: log.length }, 'Extending schedule')

    const { events, cursor } = extendSchedule({
      anchor,
      weekday: settings.weekday,
      roster,
      overrides: buildOverrideIndex(overrideList),
      cursor: state,
      cadence: settings.cadence,
      targetCount,
    })

    const first = events[0]
    if (!first) {
      logger.info('No events generated')
      return { events, cursor, appended: false }
    }

    if (options.dryRun) {
      logger.info({ count: events.length }, 'Dry run: schedule not appended')
      return { events, cursor, appended: false }
    }

    await adapter.transaction(() => adapter.appendEvents(events.map(toStoredRow)))
    logger.info({ count: events.length, from: first.date }, 'Appended new events')
    return { events, cursor, appended: true }
  }

  async function upcoming(count: number, asOf?: LocalDate): Promise<ScheduleEvent[]> {
    validateCount(count, 'Upcoming count')
    const from = asOf ?? today()
    const log = await loadEventLog()
    return log.filter((e) => e.date > from).slice(0, count)
  }

  return { generate, loadEventLog, upcoming }
}
