/**
 * Rotation Cursor
 *
 * Rotates through each track's roster. The starting position is never stored;
 * it is recovered from the event log by finding the last presenter of each
 * track and stepping one past them.
 */

import { deriveStreak } from './cadence'
import { DataInconsistencyError } from './errors'
import type {
  CadenceSettings,
  CursorState,
  PresentationTrack,
  RotationRoster,
  ScheduleEvent,
} from './types'
import { PRESENTATION_TRACKS, TRACK_LABELS } from './types'

// ============================================================================
// Types
// ============================================================================

export type RotationCursor = {
  /** Presenter at the track's current index; the index then moves on, wrapping */
  advance(track: PresentationTrack): string
  take(track: PresentationTrack, count: number): string[]
  snapshot(): Record<PresentationTrack, number>
}

export type CursorDerivation = {
  state: CursorState
  warnings: DataInconsistencyError[]
}

type LastPresenters = Partial<Record<PresentationTrack, string>>

// ============================================================================
// Cursor
// ============================================================================

export function createRotationCursor(
  roster: RotationRoster,
  start: Record<PresentationTrack, number>
): RotationCursor {
  const indices = { ...start }

  function advance(track: PresentationTrack): string {
    const names = roster[track]
    const index = indices[track] % names.length
    indices[track] = (index + 1) % names.length
    const name = names[index]
    if (name === undefined) {
      throw new RangeError(`Roster for ${TRACK_LABELS[track]} is empty`)
    }
    return name
  }

  return {
    advance,
    take(track, count) {
      return Array.from({ length: count }, () => advance(track))
    },
    snapshot() {
      return { ...indices }
    },
  }
}

// ============================================================================
// Derivation
// ============================================================================

/** Last-listed presenter of each track's most recent event, newest first */
function lastPresenters(log: readonly ScheduleEvent[]): LastPresenters {
  return [...log].reverse().reduce<LastPresenters>((found, event) => {
    if (event.track === 'holiday' || found[event.track] !== undefined) return found
    const last = event.presenters[event.presenters.length - 1]
    return last === undefined ? found : { ...found, [event.track]: last }
  }, {})
}

export function derivePresenterIndices(
  log: readonly ScheduleEvent[],
  roster: RotationRoster
): { nextIndex: Record<PresentationTrack, number>; warnings: DataInconsistencyError[] } {
  const last = lastPresenters(log)
  const nextIndex: Record<PresentationTrack, number> = { data: 0, journalClub: 0 }
  const warnings: DataInconsistencyError[] = []

  for (const track of PRESENTATION_TRACKS) {
    const name = last[track]
    if (name === undefined) continue

    const names = roster[track]
    const found = names.indexOf(name)
    if (found === -1) {
      warnings.push(new DataInconsistencyError(
        `Last ${TRACK_LABELS[track]} presenter '${name}' not found in rotation list. Starting from top.`
      ))
      continue
    }
    nextIndex[track] = (found + 1) % names.length
  }

  return { nextIndex, warnings }
}

export function deriveCursorState(
  log: readonly ScheduleEvent[],
  roster: RotationRoster,
  cadence: CadenceSettings
): CursorDerivation {
  const { nextIndex, warnings } = derivePresenterIndices(log, roster)
  return {
    state: { nextIndex, streak: deriveStreak(log, cadence) },
    warnings,
  }
}
