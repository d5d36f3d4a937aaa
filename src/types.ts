/**
 * Shared Types
 *
 * Domain types used across the engine, the persistence adapters and the
 * notification layer.
 */

import type { LocalDate, Weekday } from './time-date'

export type { LocalDate, Weekday } from './time-date'

// ============================================================================
// Tracks
// ============================================================================

/** The two recurring presentation formats competing for the weekly slot */
export type PresentationTrack = 'data' | 'journalClub'

export type Track = PresentationTrack | 'holiday'

export const PRESENTATION_TRACKS: readonly PresentationTrack[] = ['data', 'journalClub']

/** Labels written to the event log's type column; downstream readers match them exactly */
export const TRACK_LABELS = {
  data: 'Data',
  journalClub: 'Journal Club',
  holiday: 'Holiday',
} as const satisfies Record<Track, string>

export function isPresentationTrack(value: string): value is PresentationTrack {
  return value === 'data' || value === 'journalClub'
}

// ============================================================================
// Events
// ============================================================================

export type PresentationEvent = {
  date: LocalDate
  track: PresentationTrack
  presenters: string[]
}

export type HolidayEvent = {
  date: LocalDate
  track: 'holiday'
  name: string
  presenters: []
}

export type ScheduleEvent = PresentationEvent | HolidayEvent

/** Three-column event log row as held by the persistence adapter */
export type StoredRow = {
  date: string
  type: string
  presenters: string
}

// ============================================================================
// Rotation Inputs
// ============================================================================

export type RotationRoster = Record<PresentationTrack, readonly string[]>

export type HolidayOverride = {
  date: LocalDate
  name: string
}

export type HolidayOverrides = ReadonlyMap<LocalDate, string>

export type CadenceSettings = {
  /** Data slots between two Journal Club slots */
  dataPerCycle: number
  /** Presenters consumed by each Journal Club slot */
  journalClubPresenters: number
}

export type ScheduleSettings = {
  weekday: Weekday
  timezone: string
  cadence: CadenceSettings
  /** Type labels read back from the log as holidays */
  holidayLabels: readonly string[]
}

export const DEFAULT_CADENCE: CadenceSettings = {
  dataPerCycle: 3,
  journalClubPresenters: 2,
}

// ============================================================================
// Derived State
// ============================================================================

/** Where the rotation left off; recomputed from the event log on every run */
export type CursorState = {
  nextIndex: Record<PresentationTrack, number>
  /** Data slots since the last Journal Club slot */
  streak: number
}
