/**
 * Segment 13: Command Line
 *
 * Every command run end to end against a config file and database in a
 * temporary directory.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { pino } from 'pino'
import { run, type CliOptions } from '../src/cli'
import type { MailTransport } from '../src/invite'
import { createSqliteAdapter } from '../src/sqlite-adapter'
import type { StoredRow } from '../src/types'
import { date } from './helpers/fixtures'

// ============================================================================
// Test Helpers
// ============================================================================

const CONFIG = [
  'meeting:',
  '  weekday: thu',
  '  timezone: UTC',
  '  room: BCM 101',
  '  link: https://meet.example.test/lab',
  'storage:',
  '  database: rotation.db',
  'notify:',
  '  sender: Lab Bot',
  'invite:',
  '  contact: scheduler@example.test',
  '  recipients: [a@example.test, b@example.test, c@example.test]',
  '  batchSize: 2',
  '  batchDelayMs: 0',
].join('\n')

const TABLE_HEADER = 'Date         | Type            | Presenter(s)\n' + '-'.repeat(45)

describe('Segment 13: Command Line', () => {
  let dir: string
  let configPath: string
  let log: MockInstance<typeof console.log>
  let error: MockInstance<typeof console.error>

  function cli(args: string[], options: CliOptions = {}): Promise<number> {
    return run(['-c', configPath, ...args], {
      env: {},
      logger: pino({ level: 'silent' }),
      today: () => date('2024-01-05'),
      ...options,
    })
  }

  async function storedLog(): Promise<StoredRow[]> {
    const adapter = await createSqliteAdapter(path.join(dir, 'rotation.db'))
    try {
      return await adapter.getEventLog()
    } finally {
      await adapter.close()
    }
  }

  async function seedRoster(): Promise<void> {
    expect(await cli(['roster', 'data', 'Alice', 'Bob', 'Carol', 'Dave'])).toBe(0)
    expect(await cli(['roster', 'journalClub', 'Eve', 'Frank', 'Grace'])).toBe(0)
  }

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'rotation-cli-'))
    configPath = path.join(dir, 'rotation.yaml')
    writeFileSync(configPath, CONFIG)
    log = vi.spyOn(console, 'log').mockImplementation(() => {})
    error = vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
  })

  afterEach(() => {
    vi.restoreAllMocks()
    rmSync(dir, { recursive: true, force: true })
  })

  // ═══════════════════════════════════════════════════════════════════════════
  // SECTION 1: ROSTER AND HOLIDAYS
  // ═══════════════════════════════════════════════════════════════════════════

  describe('1. roster and holiday', () => {
    it('roster replaces a track', async () => {
      await seedRoster()
      const adapter = await createSqliteAdapter(path.join(dir, 'rotation.db'))
      try {
        expect(await adapter.getRoster()).toEqual({
          data: ['Alice', 'Bob', 'Carol', 'Dave'],
          journalClub: ['Eve', 'Frank', 'Grace'],
        })
      } finally {
        await adapter.close()
      }
    })

    it('unknown track is rejected', async () => {
      expect(await cli(['roster', 'seminar', 'Zed'])).toBe(1)
    })

    it('holiday override shows up in the next run', async () => {
      await seedRoster()
      expect(await cli(['holiday', '2024-01-18', 'Lab Retreat'])).toBe(0)
      expect(await cli(['generate', '-n', '2'])).toBe(0)
      expect(await storedLog()).toEqual([
        { date: '2024-01-11', type: 'Data', presenters: 'Alice' },
        { date: '2024-01-18', type: 'Holiday', presenters: 'Lab Retreat' },
      ])
    })

    it('invalid holiday date', async () => {
      expect(await cli(['holiday', 'soon', 'Lab Retreat'])).toBe(1)
      expect(error).toHaveBeenCalledWith("Error: Invalid date format: 'soon'")
    })
  })

  // ═══════════════════════════════════════════════════════════════════════════
  // SECTION 2: GENERATE AND UPCOMING
  // ═══════════════════════════════════════════════════════════════════════════

  describe('2. generate and upcoming', () => {
    it('-n 2 appends two rows', async () => {
      await seedRoster()
      expect(await cli(['generate', '-n', '2'])).toBe(0)

      expect(await storedLog()).toEqual([
        { date: '2024-01-11', type: 'Data', presenters: 'Alice' },
        { date: '2024-01-18', type: 'Data', presenters: 'Bob' },
      ])
      expect(log).toHaveBeenCalledWith(
        `${TABLE_HEADER}\n` +
        '2024-01-11   | Data            | Alice\n' +
        '2024-01-18   | Data            | Bob'
      )
    })

    it('--dry-run leaves the log alone', async () => {
      await seedRoster()
      expect(await cli(['generate', '-n', '2', '--dry-run'])).toBe(0)
      expect(await storedLog()).toEqual([])
      expect(log).toHaveBeenLastCalledWith('(dry run: event log not changed)')
    })

    it('empty roster is an error', async () => {
      expect(await cli(['generate', '-n', '2'])).toBe(1)
      expect(error).toHaveBeenCalledWith('Error: Data rotation list is empty')
    })

    it('empty count is rejected', async () => {
      await seedRoster()
      expect(await cli(['generate', '-n', ''])).toBe(1)
      expect(await cli(['generate', '-n', ' '])).toBe(1)
      expect(await storedLog()).toEqual([])
    })

    it('upcoming lists logged meetings after today', async () => {
      await seedRoster()
      await cli(['generate', '-n', '2'])
      log.mockClear()

      expect(await cli(['upcoming', '-n', '1'])).toBe(0)
      expect(log).toHaveBeenCalledWith(`${TABLE_HEADER}\n2024-01-11   | Data            | Alice`)
    })

    it('upcoming with an empty log', async () => {
      expect(await cli(['upcoming'])).toBe(0)
      expect(log).toHaveBeenCalledWith('No upcoming events.')
    })
  })

  // ═══════════════════════════════════════════════════════════════════════════
  // SECTION 3: NOTIFY
  // ═══════════════════════════════════════════════════════════════════════════

  describe('3. notify', () => {
    it('needs a webhook URL', async () => {
      expect(await cli(['notify'])).toBe(1)
      expect(error).toHaveBeenCalledWith('Error: notify.webhookUrl is not set (or export ROTATION_WEBHOOK_URL)')
    })

    it('posts to the webhook from the environment', async () => {
      await seedRoster()
      await cli(['generate', '-n', '2'])
      const fetch = vi.fn<typeof globalThis.fetch>().mockResolvedValue(new Response('ok', { status: 200 }))

      const code = await cli(['notify'], {
        env: { ROTATION_WEBHOOK_URL: 'https://hooks.example.test/rotation' },
        fetch,
      })

      expect(code).toBe(0)
      expect(fetch).toHaveBeenCalledTimes(1)
      expect(fetch.mock.calls[0]?.[0]).toBe('https://hooks.example.test/rotation')
      expect(log).toHaveBeenLastCalledWith('Sent 2 meetings to the webhook.')
    })
  })

  // ═══════════════════════════════════════════════════════════════════════════
  // SECTION 4: INVITE
  // ═══════════════════════════════════════════════════════════════════════════

  describe('4. invite', () => {
    const SMTP_ENV = { ROTATION_SMTP_USER: 'bot@example.test', ROTATION_SMTP_PASSWORD: 'test-secret' }

    beforeEach(async () => {
      await seedRoster()
      await cli(['generate', '-n', '2'])
      log.mockClear()
    })

    it('--dry-run prints the message', async () => {
      expect(await cli(['invite', '--dry-run'])).toBe(0)
      expect(log).toHaveBeenCalledWith(
        'Subject: [Lab Meeting]: Alice | Data\n\n' +
        'Hi all,\n\n' +
        'Alice will be presenting data at our next meeting.\n\n' +
        'Meeting will be held in BCM 101 and virtually at https://meet.example.test/lab.\n\n' +
        'If you have any questions regarding scheduling, let scheduler@example.test know.\n\n' +
        'Best,\nLab Bot\n'
      )
    })

    it('sends in batches over SMTP', async () => {
      const sendMail = vi.fn<MailTransport['sendMail']>().mockResolvedValue({})
      const createTransport = vi.fn<NonNullable<CliOptions['createTransport']>>().mockReturnValue({ sendMail })

      expect(await cli(['invite'], { env: SMTP_ENV, createTransport })).toBe(0)
      expect(createTransport).toHaveBeenCalledWith({
        host: 'smtp.gmail.com',
        port: 587,
        user: 'bot@example.test',
        password: 'test-secret',
      })
      expect(sendMail).toHaveBeenCalledTimes(2)
      expect(sendMail.mock.calls[1]?.[0].bcc).toEqual(['c@example.test'])
      expect(log).toHaveBeenLastCalledWith('Sent invite for 2024-01-11 in 2 batch(es).')
    })

    it('needs SMTP credentials', async () => {
      expect(await cli(['invite'])).toBe(1)
      expect(error).toHaveBeenCalledWith(
        'Error: SMTP credentials are not set (export ROTATION_SMTP_USER and ROTATION_SMTP_PASSWORD)'
      )
    })

    it('--auto skips a run with no meeting exactly one week out', async () => {
      const sendMail = vi.fn<MailTransport['sendMail']>().mockResolvedValue({})
      const code = await cli(['invite', '--auto'], { env: SMTP_ENV, createTransport: () => ({ sendMail }) })

      expect(code).toBe(0)
      expect(sendMail).not.toHaveBeenCalled()
      expect(log).toHaveBeenCalledWith('No upcoming events.')
    })

    it('--auto sends when the meeting is one week out', async () => {
      const sendMail = vi.fn<MailTransport['sendMail']>().mockResolvedValue({})
      const code = await cli(['invite', '--auto'], {
        env: SMTP_ENV,
        createTransport: () => ({ sendMail }),
        today: () => date('2024-01-04'),
      })

      expect(code).toBe(0)
      expect(sendMail).toHaveBeenCalledTimes(2)
    })
  })
})
