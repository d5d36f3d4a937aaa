/**
 * Adapter
 *
 * Persistence interface for the three collaborator tables (roster, holiday
 * overrides, event log) + in-memory mock implementation.
 * All methods are async so synchronous and networked stores share one shape.
 */

import { PersistenceError } from './errors'
import type { HolidayOverride, PresentationTrack, RotationRoster, StoredRow } from './types'

export type { HolidayOverride, PresentationTrack, RotationRoster, StoredRow } from './types'

// ============================================================================
// Interface
// ============================================================================

export type Adapter = {
  /** Run `fn` atomically: every write inside it lands, or none does */
  transaction<T>(fn: () => Promise<T>): Promise<T>

  // Roster
  getRoster(): Promise<RotationRoster>
  setRoster(track: PresentationTrack, names: readonly string[]): Promise<void>

  // Holiday overrides
  getHolidayOverrides(): Promise<HolidayOverride[]>
  addHolidayOverride(override: HolidayOverride): Promise<void>

  // Event log (append-only)
  getEventLog(): Promise<StoredRow[]>
  appendEvents(rows: readonly StoredRow[]): Promise<void>
}

// ============================================================================
// Mock Adapter
// ============================================================================

type MockState = {
  roster: Record<PresentationTrack, string[]>
  holidays: HolidayOverride[]
  events: StoredRow[]
}

export function createMockAdapter(): Adapter {
  // ---- State ----
  let state: MockState = {
    roster: { data: [], journalClub: [] },
    holidays: [],
    events: [],
  }

  // ---- Transaction ----
  let txDepth = 0

  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  return {
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      const snapshot = txDepth === 0 ? clone(state) : null
      txDepth++
      try {
        return await fn()
      } catch (e) {
        if (snapshot) state = snapshot
        throw e
      } finally {
        txDepth--
      }
    },

    async getRoster() {
      return clone(state.roster)
    },

    async setRoster(track, names) {
      state.roster[track] = [...names]
    },

    async getHolidayOverrides() {
      return clone(state.holidays)
    },

    async addHolidayOverride(override) {
      state.holidays.push({ ...override })
    },

    async getEventLog() {
      return clone(state.events)
    },

    async appendEvents(rows) {
      const taken = new Set(state.events.map((r) => r.date))
      for (const row of rows) {
        if (taken.has(row.date)) {
          throw new PersistenceError(`Event log already has an entry for ${row.date}`)
        }
        taken.add(row.date)
      }
      state.events.push(...rows.map((r) => ({ ...r })))
    },
  }
}
