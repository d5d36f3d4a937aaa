/**
 * SQLite Adapter
 *
 * Production implementation of the rotation adapter using better-sqlite3.
 * The event log table is append-only; roster and overrides are replaced or
 * extended through the CLI.
 */
import Database from 'better-sqlite3'
import type { Adapter, HolidayOverride, PresentationTrack, StoredRow } from './adapter'
import { PersistenceError } from './errors'
import { parseCalendarDay } from './time-date'

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  listTables(): Promise<string[]>
  getSchemaVersion(): Promise<number>
  inTransaction(): Promise<boolean>
  close(): Promise<void>
}

export type SqliteAdapter = Adapter & SqliteExtras

export type SqliteAdapterOptions = {
  /** Create the database file and schema when missing (first use) */
  create?: boolean
  /** Milliseconds to wait for another connection's lock before SQLITE_BUSY */
  timeout?: number
}

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_VERSION = 1

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS roster_member (
    track TEXT NOT NULL CHECK (track IN ('data', 'journalClub')),
    position INTEGER NOT NULL,
    name TEXT NOT NULL,
    PRIMARY KEY (track, position)
  );

  CREATE TABLE IF NOT EXISTS holiday_override (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    date TEXT NOT NULL,
    name TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_holiday_override_date ON holiday_override(date);

  CREATE TABLE IF NOT EXISTS event_log (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    date TEXT NOT NULL UNIQUE,
    type TEXT NOT NULL,
    presenters TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  if (e instanceof PersistenceError) throw e
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint/i.test(msg)) {
    throw new PersistenceError(`Duplicate event log date: ${msg}`, { cause: e })
  }
  throw new PersistenceError(`Event store failure: ${msg}`, { cause: e })
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type RosterRow = {
  track: PresentationTrack
  name: string
}

type HolidayRow = {
  date: string
  name: string
}

type EventRow = {
  date: string
  type: string
  presenters: string
}

type SchemaVersionRow = {
  v: number | null
}

// ============================================================================
// Row → Domain Mappers
// ============================================================================

function toHolidayOverride(row: HolidayRow): HolidayOverride {
  const parsed = parseCalendarDay(row.date)
  if (!parsed.ok) {
    throw new PersistenceError(`Stored holiday override has an invalid date: '${row.date}'`)
  }
  return { date: parsed.value, name: row.name }
}

function toStoredRow(row: EventRow): StoredRow {
  return { date: row.date, type: row.type, presenters: row.presenters }
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(
  path: string,
  options: SqliteAdapterOptions = {}
): Promise<SqliteAdapter> {
  const db = safe(() => new Database(path, {
    fileMustExist: !options.create,
    ...(options.timeout !== undefined ? { timeout: options.timeout } : {}),
  }))
  safe(() => db.exec(SCHEMA_SQL))

  // Seed initial schema version if empty
  const ver = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
  if (ver?.v == null) {
    db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, new Date().toISOString(),
    )
  }

  let _inTx = false

  const replaceRoster = db.transaction((track: PresentationTrack, names: readonly string[]) => {
    db.prepare('DELETE FROM roster_member WHERE track = ?').run(track)
    const insert = db.prepare('INSERT INTO roster_member (track, position, name) VALUES (?, ?, ?)')
    names.forEach((name, position) => insert.run(track, position, name))
  })

  const insertEvents = db.transaction((rows: readonly StoredRow[]) => {
    const insert = db.prepare('INSERT INTO event_log (date, type, presenters) VALUES (?, ?, ?)')
    for (const row of rows) insert.run(row.date, row.type, row.presenters)
  })

  const adapter: SqliteAdapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (_inTx) return await fn()
      try {
        _inTx = true
        safe(() => db.exec('BEGIN IMMEDIATE'))
        const result = await fn()
        safe(() => db.exec('COMMIT'))
        return result
      } catch (e) {
        if (db.inTransaction) db.exec('ROLLBACK')
        throw e
      } finally {
        _inTx = false
      }
    },

    // ================================================================
    // Roster
    // ================================================================
    async getRoster() {
      const rows = safe(() =>
        db.prepare<[], RosterRow>('SELECT track, name FROM roster_member ORDER BY track, position').all(),
      )
      return {
        data: rows.filter((r) => r.track === 'data').map((r) => r.name),
        journalClub: rows.filter((r) => r.track === 'journalClub').map((r) => r.name),
      }
    },

    async setRoster(track, names) {
      safe(() => replaceRoster(track, names))
    },

    // ================================================================
    // Holiday Overrides
    // ================================================================
    async getHolidayOverrides() {
      const rows = safe(() =>
        db.prepare<[], HolidayRow>('SELECT date, name FROM holiday_override ORDER BY id').all(),
      )
      return rows.map(toHolidayOverride)
    },

    async addHolidayOverride(override) {
      safe(() =>
        db.prepare('INSERT INTO holiday_override (date, name) VALUES (?, ?)').run(override.date, override.name),
      )
    },

    // ================================================================
    // Event Log
    // ================================================================
    async getEventLog() {
      const rows = safe(() =>
        db.prepare<[], EventRow>('SELECT date, type, presenters FROM event_log ORDER BY seq').all(),
      )
      return rows.map(toStoredRow)
    },

    async appendEvents(rows) {
      safe(() => insertEvents(rows))
    },

    // ================================================================
    // Introspection
    // ================================================================
    async listTables() {
      const rows = db
        .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
        .all()
      return rows.map((r) => r.name)
    },

    async getSchemaVersion() {
      const row = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
      return row?.v ?? 0
    },

    async inTransaction() {
      return _inTx
    },

    async close() {
      db.close()
    },
  }

  return adapter
}
