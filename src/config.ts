/**
 * Configuration
 *
 * Loads `rotation.yaml`, validates it with zod and fills defaults. Secrets
 * such as the webhook URL and SMTP credentials come from the environment.
 */

import { existsSync, readFileSync } from 'node:fs'
import * as path from 'node:path'
import { parse } from 'yaml'
import { z } from 'zod'
import { ConfigurationError } from './errors'
import type { MeetingLocation } from './notify'
import { isValidTimezone } from './time-date'
import type { ScheduleSettings } from './types'
import { DEFAULT_CADENCE, TRACK_LABELS } from './types'

export const DEFAULT_CONFIG_FILENAME = 'rotation.yaml'

// ============================================================================
// Schema
// ============================================================================

const weekdaySchema = z.enum(['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun'])

const timeSchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:MM')

const configSchema = z.object({
  meeting: z.object({
    weekday: weekdaySchema.default('thu'),
    timezone: z.string().refine(isValidTimezone, { message: 'Unknown timezone' }).default('UTC'),
    room: z.string().default(''),
    link: z.string().default(''),
  }).default({}),
  schedule: z.object({
    eventsPerRun: z.number().int().nonnegative().default(16),
    dataPerCycle: z.number().int().nonnegative().default(DEFAULT_CADENCE.dataPerCycle),
    journalClubPresenters: z.number().int().positive().default(DEFAULT_CADENCE.journalClubPresenters),
    holidayLabels: z.array(z.string().min(1)).default([TRACK_LABELS.holiday]),
  }).default({}),
  storage: z.object({
    database: z.string().min(1).default('rotation.db'),
  }).default({}),
  notify: z.object({
    webhookUrl: z.string().url().optional(),
    sender: z.string().default('Meeting Rotation'),
    title: z.string().optional(),
    maxEvents: z.number().int().positive().default(4),
  }).default({}),
  invite: z.object({
    startTime: timeSchema.default('10:00'),
    endTime: timeSchema.default('11:00'),
    subjectPrefix: z.string().default('[Lab Meeting]'),
    contact: z.string().default(''),
    recipients: z.array(z.string().email()).default([]),
    batchSize: z.number().int().positive().default(1),
    batchDelayMs: z.number().int().nonnegative().default(2000),
    smtp: z.object({
      host: z.string().min(1).default('smtp.gmail.com'),
      port: z.number().int().positive().default(587),
    }).default({}),
  }).refine((invite) => invite.endTime > invite.startTime, {
    message: 'endTime must be after startTime',
    path: ['endTime'],
  }).default({}),
})

type ConfigFile = z.infer<typeof configSchema>

// ============================================================================
// Types
// ============================================================================

export type NotifySettings = {
  webhookUrl?: string
  sender: string
  title?: string
  maxEvents: number
}

export type SmtpSettings = {
  host: string
  port: number
  user?: string
  password?: string
}

export type InviteConfig = {
  startTime: string
  endTime: string
  subjectPrefix: string
  contact: string
  recipients: string[]
  batchSize: number
  batchDelayMs: number
  smtp: SmtpSettings
}

export type RotationConfig = {
  schedule: ScheduleSettings
  eventsPerRun: number
  databasePath: string
  location: MeetingLocation
  notify: NotifySettings
  invite: InviteConfig
}

type Env = Record<string, string | undefined>

// ============================================================================
// Loading
// ============================================================================

function toRotationConfig(file: ConfigFile, baseDir: string, env: Env): RotationConfig {
  const { meeting, schedule, storage, notify, invite } = file
  const webhookUrl = env.ROTATION_WEBHOOK_URL ?? notify.webhookUrl
  const smtpUser = env.ROTATION_SMTP_USER
  const smtpPassword = env.ROTATION_SMTP_PASSWORD

  return {
    schedule: {
      weekday: meeting.weekday,
      timezone: meeting.timezone,
      cadence: {
        dataPerCycle: schedule.dataPerCycle,
        journalClubPresenters: schedule.journalClubPresenters,
      },
      holidayLabels: schedule.holidayLabels,
    },
    eventsPerRun: schedule.eventsPerRun,
    databasePath: path.resolve(baseDir, storage.database),
    location: { room: meeting.room, meetingLink: meeting.link },
    notify: {
      sender: notify.sender,
      maxEvents: notify.maxEvents,
      ...(webhookUrl !== undefined ? { webhookUrl } : {}),
      ...(notify.title !== undefined ? { title: notify.title } : {}),
    },
    invite: {
      ...invite,
      smtp: {
        ...invite.smtp,
        ...(smtpUser !== undefined ? { user: smtpUser } : {}),
        ...(smtpPassword !== undefined ? { password: smtpPassword } : {}),
      },
    },
  }
}

/**
 * Parse YAML config text. Relative storage paths resolve against `baseDir`.
 */
export function parseConfig(text: string, baseDir: string, env: Env = process.env): RotationConfig {
  let raw: unknown
  try {
    raw = parse(text) ?? {}
  } catch (err) {
    throw new ConfigurationError(
      `Could not parse config: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    )
  }

  const result = configSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(`Invalid config: ${issues}`)
  }

  return toRotationConfig(result.data, baseDir, env)
}

export function resolveConfigPath(explicit?: string, env: Env = process.env): string {
  return path.resolve(explicit ?? env.ROTATION_CONFIG ?? DEFAULT_CONFIG_FILENAME)
}

export function loadConfig(configPath: string, env: Env = process.env): RotationConfig {
  if (!existsSync(configPath)) {
    throw new ConfigurationError(`Config file not found: ${configPath}`)
  }
  return parseConfig(readFileSync(configPath, 'utf-8'), path.dirname(configPath), env)
}
