#!/usr/bin/env node
/**
 * Command line entry point.
 *
 *   rotation generate [-n 16] [--dry-run]
 *   rotation upcoming [-n 4]
 *   rotation notify [-n 4]
 *   rotation invite [--auto] [--dry-run]
 *   rotation roster <data|journalClub> <names...>
 *   rotation holiday <date> <name>
 */

import { Argument, Command, CommanderError, InvalidArgumentError } from 'commander'
import nodemailer from 'nodemailer'
import { type RotationConfig, type SmtpSettings, loadConfig, resolveConfigPath } from './config'
import { ConfigurationError, RotationError, ValidationError } from './errors'
import { composeInvite, createInviteSender, findInviteEvent, type MailTransport } from './invite'
import { createLogger, type Logger } from './logger'
import { createWebhookNotifier } from './notify'
import { createRotationPlanner, type RotationPlanner } from './planner'
import { formatScheduleTable } from './rows'
import { type SqliteAdapter, createSqliteAdapter } from './sqlite-adapter'
import { type LocalDate, parseCalendarDay, todayIn } from './time-date'
import { PRESENTATION_TRACKS, isPresentationTrack } from './types'

// ============================================================================
// Types
// ============================================================================

export type CliOptions = {
  env?: Record<string, string | undefined>
  logger?: Logger
  fetch?: typeof fetch
  createTransport?: (smtp: Required<SmtpSettings>) => MailTransport
  today?: () => LocalDate
}

type GlobalOptions = {
  config?: string
  verbose?: boolean
}

type StoreContext = {
  config: RotationConfig
  adapter: SqliteAdapter
  logger: Logger
  planner: RotationPlanner
  today: () => LocalDate
}

// ============================================================================
// Helpers
// ============================================================================

function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Not a non-negative integer.')
  }
  return Number(value)
}

function smtpTransport(smtp: Required<SmtpSettings>): MailTransport {
  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.port === 465,
    auth: { user: smtp.user, pass: smtp.password },
  })
}

// ============================================================================
// Program
// ============================================================================

export function buildProgram(options: CliOptions = {}): Command {
  const env = options.env ?? process.env
  const program = new Command()

  async function withStore<T>(fn: (ctx: StoreContext) => Promise<T>): Promise<T> {
    const opts = program.opts<GlobalOptions>()
    const logger = options.logger ?? createLogger({ level: opts.verbose ? 'debug' : 'info' })
    const config = loadConfig(resolveConfigPath(opts.config, env), env)
    const today = options.today ?? (() => todayIn(config.schedule.timezone))
    const adapter = await createSqliteAdapter(config.databasePath, { create: true })
    try {
      const planner = createRotationPlanner({ adapter, settings: config.schedule, logger, today })
      return await fn({ config, adapter, logger, planner, today })
    } finally {
      await adapter.close()
    }
  }

  program
    .name('rotation')
    .description('Weekly meeting rotation: presenters, holidays and the Data / Journal Club cadence')
    .option('-c, --config <path>', 'path to rotation.yaml')
    .option('-v, --verbose', 'debug logging')
    .exitOverride()

  program
    .command('generate')
    .description('extend the schedule and append it to the event log')
    .option('-n, --count <n>', 'number of events to generate', parseCount)
    .option('--dry-run', 'print the schedule without saving it')
    .action(async (opts: { count?: number; dryRun?: boolean }) => {
      await withStore(async ({ config, planner }) => {
        const { events, appended } = await planner.generate(opts.count ?? config.eventsPerRun, {
          dryRun: opts.dryRun ?? false,
        })
        if (events.length === 0) {
          console.log('No events generated.')
          return
        }
        console.log(formatScheduleTable(events))
        if (!appended) console.log('(dry run: event log not changed)')
      })
    })

  program
    .command('upcoming')
    .description('show upcoming meetings')
    .option('-n, --count <n>', 'number of meetings to show', parseCount)
    .action(async (opts: { count?: number }) => {
      await withStore(async ({ config, planner }) => {
        const events = await planner.upcoming(opts.count ?? config.notify.maxEvents)
        console.log(events.length > 0 ? formatScheduleTable(events) : 'No upcoming events.')
      })
    })

  program
    .command('notify')
    .description('post upcoming meetings to the configured webhook')
    .option('-n, --count <n>', 'number of meetings to include', parseCount)
    .action(async (opts: { count?: number }) => {
      await withStore(async ({ config, logger, planner, today }) => {
        const url = config.notify.webhookUrl
        if (!url) {
          throw new ConfigurationError('notify.webhookUrl is not set (or export ROTATION_WEBHOOK_URL)')
        }
        const events = await planner.upcoming(opts.count ?? config.notify.maxEvents)
        if (events.length === 0) {
          console.log('No upcoming events.')
          return
        }
        const notifier = createWebhookNotifier({
          url,
          sender: config.notify.sender,
          ...(config.notify.title !== undefined ? { title: config.notify.title } : {}),
          ...(options.fetch !== undefined ? { fetch: options.fetch } : {}),
          ...config.location,
          logger,
        })
        await notifier.send(events, today())
        console.log(`Sent ${events.length} meetings to the webhook.`)
      })
    })

  program
    .command('invite')
    .description('email the calendar invite (or holiday reminder) for the next meeting')
    .option('--auto', 'only act when a meeting falls exactly one week from today')
    .option('--dry-run', 'print the message without sending it')
    .action(async (opts: { auto?: boolean; dryRun?: boolean }) => {
      await withStore(async ({ config, logger, planner, today }) => {
        const event = await findInviteEvent(planner, today(), { exact: opts.auto ?? false })
        if (!event) {
          console.log('No upcoming events.')
          return
        }

        const { invite } = config
        const settings = {
          ...invite,
          timezone: config.schedule.timezone,
          sender: config.notify.sender,
        }

        if (opts.dryRun) {
          const message = composeInvite(event, settings, config.location)
          console.log(`Subject: ${message.subject}\n\n${message.text}`)
          return
        }

        if (invite.recipients.length === 0) {
          throw new ConfigurationError('invite.recipients is empty')
        }
        const { user, password } = invite.smtp
        if (!user || !password) {
          throw new ConfigurationError('SMTP credentials are not set (export ROTATION_SMTP_USER and ROTATION_SMTP_PASSWORD)')
        }

        const smtp = { ...invite.smtp, user, password }
        const sender = createInviteSender({
          transport: (options.createTransport ?? smtpTransport)(smtp),
          from: { name: config.notify.sender, address: user },
          settings,
          location: config.location,
          batchSize: invite.batchSize,
          batchDelayMs: invite.batchDelayMs,
          logger,
        })
        const delivery = await sender.send(event, invite.recipients)
        console.log(`Sent ${delivery.kind} for ${event.date} in ${delivery.batches} batch(es).`)
      })
    })

  program
    .command('roster')
    .description('replace the rotation list for a track')
    .addArgument(new Argument('<track>', 'rotation track').choices(PRESENTATION_TRACKS))
    .argument('<names...>', 'presenters in rotation order')
    .action(async (trackArg: string, names: string[]) => {
      if (!isPresentationTrack(trackArg)) {
        throw new ValidationError(`Unknown track '${trackArg}'`)
      }
      const track = trackArg
      await withStore(async ({ adapter, logger }) => {
        await adapter.setRoster(track, names)
        logger.info({ track, count: names.length }, 'Rotation list updated')
      })
    })

  program
    .command('holiday')
    .description('add a holiday override')
    .argument('<date>', 'YYYY-MM-DD')
    .argument('<name>', 'holiday name shown in the schedule')
    .action(async (dateArg: string, name: string) => {
      const parsed = parseCalendarDay(dateArg)
      if (!parsed.ok) throw new ValidationError(parsed.error.message)
      const date = parsed.value
      await withStore(async ({ adapter, logger }) => {
        await adapter.addHolidayOverride({ date, name })
        logger.info({ date, name }, 'Holiday override added')
      })
    })

  return program
}

/**
 * Run one command line. Resolves to the process exit code; rotation errors
 * are printed as a single line.
 */
export async function run(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  try {
    await buildProgram(options).parseAsync([...argv], { from: 'user' })
    return 0
  } catch (err) {
    if (err instanceof RotationError) {
      console.error(`Error: ${err.message}`)
      return 1
    }
    // Commander has already printed its own usage errors
    if (err instanceof CommanderError) return err.exitCode
    throw err
  }
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code
    })
    .catch((err: unknown) => {
      console.error(err)
      process.exitCode = 1
    })
}
