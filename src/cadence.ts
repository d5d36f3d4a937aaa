/**
 * Cadence
 *
 * Streak-based cycle: after `dataPerCycle` consecutive Data slots the next
 * meeting slot is Journal Club, which resets the streak. Holiday slots are
 * never fed to the state machine, so they neither count toward nor reset it.
 */

import type { CadenceSettings, PresentationTrack, ScheduleEvent } from './types'

// ============================================================================
// Types
// ============================================================================

export type CadenceStep = {
  track: PresentationTrack
  streak: number
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Count Data events since the most recent Journal Club event, walking the log
 * from newest to oldest. Clamped to the cycle length so an over-long run of
 * Data slots still yields Journal Club next.
 */
export function deriveStreak(log: readonly ScheduleEvent[], cadence: CadenceSettings): number {
  let streak = 0
  for (let i = log.length - 1; i >= 0; i--) {
    const event = log[i]
    if (!event || event.track === 'journalClub') break
    if (event.track === 'data') streak++
  }
  return Math.min(streak, cadence.dataPerCycle)
}

export function nextSlot(streak: number, cadence: CadenceSettings): CadenceStep {
  if (streak < cadence.dataPerCycle) {
    return { track: 'data', streak: streak + 1 }
  }
  return { track: 'journalClub', streak: 0 }
}

export function presentersFor(track: PresentationTrack, cadence: CadenceSettings): number {
  return track === 'data' ? 1 : cadence.journalClubPresenters
}
