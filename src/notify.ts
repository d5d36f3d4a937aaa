/**
 * Notifications
 *
 * Posts the upcoming schedule to a chat workflow webhook. The payload is a
 * flat JSON object whose `message_list` holds one HTML line per meeting.
 */

import { NotificationError } from './errors'
import { type Logger, silentLogger } from './logger'
import { presenterField } from './rows'
import type { LocalDate } from './time-date'
import type { ScheduleEvent } from './types'
import { TRACK_LABELS } from './types'

// ============================================================================
// Types
// ============================================================================

export type MeetingLocation = {
  room: string
  meetingLink: string
}

export type WebhookPayload = {
  title: string
  message_list: string
  sender: string
  date_sent: string
}

export type WebhookNotifierConfig = {
  url: string
  sender: string
  title?: string
  timeoutMs?: number
  fetch?: typeof fetch
  logger?: Logger
}

export type WebhookNotifier = {
  buildPayload(events: readonly ScheduleEvent[], today: LocalDate): WebhookPayload
  send(events: readonly ScheduleEvent[], today: LocalDate): Promise<void>
}

const DEFAULT_TITLE = 'Upcoming Meeting Schedule'
const DEFAULT_TIMEOUT_MS = 10_000

// ============================================================================
// Formatting
// ============================================================================

/**
 * One line per event. Holidays are highlighted; the first presentation also
 * carries the room and meeting link.
 */
export function formatScheduleMessage(
  events: readonly ScheduleEvent[],
  location: MeetingLocation
): string {
  let first = true

  const lines = events.map((event) => {
    const date = `<strong>${event.date}</strong>`
    const topic = TRACK_LABELS[event.track]
    const member = presenterField(event)

    if (event.track === 'holiday') {
      return `${date} <font color='red'>${topic} - ${member}</font>`
    }
    if (first) {
      first = false
      return `${date} ${member} | ${topic} (location <strong>${location.room}</strong> and <a href='${location.meetingLink}'>Meeting Link</a>)`
    }
    return `${date} ${member} | ${topic}`
  })

  return lines.join('\n\n')
}

// ============================================================================
// Webhook
// ============================================================================

export function createWebhookNotifier(
  config: WebhookNotifierConfig & MeetingLocation
): WebhookNotifier {
  const doFetch = config.fetch ?? fetch
  const logger = config.logger ?? silentLogger()

  function buildPayload(events: readonly ScheduleEvent[], today: LocalDate): WebhookPayload {
    return {
      title: config.title ?? DEFAULT_TITLE,
      message_list: formatScheduleMessage(events, config),
      sender: config.sender,
      date_sent: today,
    }
  }

  async function send(events: readonly ScheduleEvent[], today: LocalDate): Promise<void> {
    const payload = buildPayload(events, today)

    let response: Response
    try {
      response = await doFetch(config.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(config.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      })
    } catch (e) {
      throw new NotificationError(
        `Webhook connection error: ${e instanceof Error ? e.message : String(e)}`,
        { cause: e },
      )
    }

    if (!response.ok) {
      const body = await response.text()
      throw new NotificationError(`Webhook failed: ${response.status} - ${body}`)
    }

    logger.info({ events: events.length }, 'Schedule sent to webhook')
  }

  return { buildPayload, send }
}
