/**
 * Calendar Invites
 *
 * Email for the next meeting: an iCalendar REQUEST for a presentation week,
 * a plain reminder for a holiday week. Recipients are Bcc'd in batches so a
 * single message never carries the whole list.
 */

import ical, { ICalAttendeeRole, ICalCalendarMethod } from 'ical-generator'
import type Mail from 'nodemailer/lib/mailer'
import { setTimeout as sleep } from 'node:timers/promises'
import { NotificationError } from './errors'
import { type Logger, silentLogger } from './logger'
import type { MeetingLocation } from './notify'
import type { RotationPlanner } from './planner'
import { presenterField } from './rows'
import type { LocalDate } from './time-date'
import { addDays, formatLongDate, zonedTimeToInstant } from './time-date'
import type { ScheduleEvent } from './types'
import { TRACK_LABELS } from './types'

// ============================================================================
// Types
// ============================================================================

export type InviteSettings = {
  /** Wall-clock HH:MM in `timezone` */
  startTime: string
  endTime: string
  timezone: string
  subjectPrefix: string
  /** Who to ask about scheduling; the line is left out when empty */
  contact: string
  /** Display name on the mail and the invite organizer */
  sender: string
}

export type InviteMessage =
  | { kind: 'reminder'; date: LocalDate; subject: string; text: string }
  | { kind: 'invite'; date: LocalDate; subject: string; text: string; start: Date; end: Date }

export type Mailbox = {
  name: string
  address: string
}

/** The slice of a nodemailer transporter the sender needs */
export type MailTransport = {
  sendMail(mail: Mail.Options): Promise<unknown>
}

export type InviteSenderConfig = {
  transport: MailTransport
  from: Mailbox
  settings: InviteSettings
  location: MeetingLocation
  batchSize: number
  /** Pause between batches */
  batchDelayMs?: number
  now?: () => Date
  logger?: Logger
}

export type InviteDelivery = {
  kind: InviteMessage['kind']
  batches: number
}

export type InviteSender = {
  send(event: ScheduleEvent, recipients: readonly string[]): Promise<InviteDelivery>
}

// ============================================================================
// Composition
// ============================================================================

function closing(settings: InviteSettings): string {
  const contact = settings.contact
    ? `If you have any questions regarding scheduling, let ${settings.contact} know.\n\n`
    : ''
  return `${contact}Best,\n${settings.sender}\n`
}

export function composeInvite(
  event: ScheduleEvent,
  settings: InviteSettings,
  location: MeetingLocation
): InviteMessage {
  if (event.track === 'holiday') {
    const day = formatLongDate(event.date)
    return {
      kind: 'reminder',
      date: event.date,
      subject: `${settings.subjectPrefix}: No meeting on ${day}`,
      text:
        'Hi all,\n\n' +
        `Just a reminder: we will not have a meeting on ${day} due to ${event.name}.\n\n` +
        closing(settings),
    }
  }

  const presenters = presenterField(event)
  const topic = event.track === 'data' ? 'data' : 'journal club articles'

  return {
    kind: 'invite',
    date: event.date,
    subject: `${settings.subjectPrefix}: ${presenters} | ${TRACK_LABELS[event.track]}`,
    text:
      'Hi all,\n\n' +
      `${presenters} will be presenting ${topic} at our next meeting.\n\n` +
      `Meeting will be held in ${location.room} and virtually at ${location.meetingLink}.\n\n` +
      closing(settings),
    start: zonedTimeToInstant(event.date, settings.startTime, settings.timezone),
    end: zonedTimeToInstant(event.date, settings.endTime, settings.timezone),
  }
}

/** VCALENDAR text with one REQUEST event addressed to `attendees` */
export function buildCalendar(
  message: Extract<InviteMessage, { kind: 'invite' }>,
  options: { organizer: Mailbox; attendees: readonly string[]; location: MeetingLocation; stamp: Date }
): string {
  const calendar = ical({
    prodId: { company: 'meeting-rotation', product: 'scheduler', language: 'EN' },
    method: ICalCalendarMethod.REQUEST,
  })

  calendar.createEvent({
    start: message.start,
    end: message.end,
    stamp: options.stamp,
    summary: message.subject,
    description: message.text,
    location: `${options.location.room}, ${options.location.meetingLink}`,
    organizer: { name: options.organizer.name, email: options.organizer.address },
    attendees: options.attendees.map((email) => ({
      email,
      name: email,
      rsvp: true,
      role: ICalAttendeeRole.REQ,
    })),
  })

  return calendar.toString()
}

export function chunkRecipients<T>(recipients: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`)
  }
  const batches: T[][] = []
  for (let i = 0; i < recipients.length; i += size) {
    batches.push(recipients.slice(i, i + size))
  }
  return batches
}

// ============================================================================
// Lookup
// ============================================================================

/**
 * The meeting an invite run is about: the next logged event after `today`,
 * or with `exact`, only the event exactly one week out.
 */
export async function findInviteEvent(
  planner: Pick<RotationPlanner, 'upcoming'>,
  today: LocalDate,
  options: { exact?: boolean } = {}
): Promise<ScheduleEvent | undefined> {
  if (!options.exact) {
    const [next] = await planner.upcoming(1, today)
    return next
  }
  const target = addDays(today, 7)
  const [next] = await planner.upcoming(1, addDays(target, -1))
  return next?.date === target ? next : undefined
}

// ============================================================================
// Delivery
// ============================================================================

export function createInviteSender(config: InviteSenderConfig): InviteSender {
  const logger = config.logger ?? silentLogger()
  const now = config.now ?? (() => new Date())
  const delay = config.batchDelayMs ?? 0

  function mailFor(message: InviteMessage, batch: string[]): Mail.Options {
    const mail: Mail.Options = {
      from: config.from,
      // Recipients stay hidden from each other
      to: config.from.address,
      bcc: batch,
      subject: message.subject,
      text: message.text,
    }
    if (message.kind === 'reminder') return mail

    return {
      ...mail,
      icalEvent: {
        method: 'REQUEST',
        filename: 'invite.ics',
        content: buildCalendar(message, {
          organizer: config.from,
          attendees: batch,
          location: config.location,
          stamp: now(),
        }),
      },
    }
  }

  async function send(event: ScheduleEvent, recipients: readonly string[]): Promise<InviteDelivery> {
    const message = composeInvite(event, config.settings, config.location)
    const batches = chunkRecipients(recipients, config.batchSize)
    const failures: string[] = []

    for (const [i, batch] of batches.entries()) {
      if (i > 0 && delay > 0) await sleep(delay)
      try {
        await config.transport.sendMail(mailFor(message, batch))
        logger.info({ kind: message.kind, batch: i + 1, of: batches.length, recipients: batch.length }, 'Invite batch sent')
      } catch (e) {
        const reason = e instanceof Error ? e.message : String(e)
        logger.error({ batch: i + 1, err: e }, 'Invite batch failed')
        failures.push(`batch ${i + 1}: ${reason}`)
      }
    }

    if (failures.length > 0) {
      throw new NotificationError(
        `Invite delivery failed for ${failures.length} of ${batches.length} batches (${failures.join('; ')})`
      )
    }
    return { kind: message.kind, batches: batches.length }
  }

  return { send }
}
