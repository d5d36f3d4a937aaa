/**
 * Segment 11: Notifications
 *
 * Webhook message formatting and delivery.
 */
import { describe, it, expect, vi } from 'vitest'
import { formatScheduleMessage, createWebhookNotifier } from '../src/notify'
import { NotificationError } from '../src/errors'
import type { ScheduleEvent } from '../src/types'
import { date } from './helpers/fixtures'

const LOCATION = { room: 'BCM 101', meetingLink: 'https://meet.example.test/lab' }

const EVENTS: ScheduleEvent[] = [
  { date: date('2024-11-28'), track: 'holiday', name: 'Federal Holiday/BCM observed', presenters: [] },
  { date: date('2024-12-05'), track: 'data', presenters: ['Alice'] },
  { date: date('2024-12-12'), track: 'journalClub', presenters: ['Eve', 'Frank'] },
]

const EXPECTED_MESSAGE = [
  "<strong>2024-11-28</strong> <font color='red'>Holiday - Federal Holiday/BCM observed</font>",
  "<strong>2024-12-05</strong> Alice | Data (location <strong>BCM 101</strong> and <a href='https://meet.example.test/lab'>Meeting Link</a>)",
  '<strong>2024-12-12</strong> Eve, Frank | Journal Club',
].join('\n\n')

describe('Segment 11: Notifications', () => {
  describe('1. Message', () => {
    it('one line per event, location on the first meeting', () => {
      expect(formatScheduleMessage(EVENTS, LOCATION)).toBe(EXPECTED_MESSAGE)
    })

    it('empty schedule', () => {
      expect(formatScheduleMessage([], LOCATION)).toBe('')
    })
  })

  describe('2. Delivery', () => {
    it('posts the payload as JSON', async () => {
      const fetch = vi.fn<typeof globalThis.fetch>().mockResolvedValue(new Response('ok', { status: 200 }))
      const notifier = createWebhookNotifier({
        url: 'https://hooks.example.test/rotation',
        sender: 'Lab Bot',
        fetch,
        ...LOCATION,
      })

      await notifier.send(EVENTS, date('2024-11-20'))

      expect(fetch).toHaveBeenCalledTimes(1)
      expect(fetch).toHaveBeenCalledWith(
        'https://hooks.example.test/rotation',
        expect.objectContaining({ method: 'POST', headers: { 'Content-Type': 'application/json' } })
      )
      const init = fetch.mock.calls[0]?.[1]
      expect(JSON.parse(String(init?.body))).toEqual({
        title: 'Upcoming Meeting Schedule',
        message_list: EXPECTED_MESSAGE,
        sender: 'Lab Bot',
        date_sent: '2024-11-20',
      })
    })

    it('custom title', () => {
      const notifier = createWebhookNotifier({
        url: 'https://hooks.example.test/rotation',
        sender: 'Lab Bot',
        title: 'Lab Meeting',
        ...LOCATION,
      })
      expect(notifier.buildPayload([], date('2024-11-20')).title).toBe('Lab Meeting')
    })

    it('non-2xx response', async () => {
      const fetch = vi.fn<typeof globalThis.fetch>().mockImplementation(
        async () => new Response('nope', { status: 500 })
      )
      const notifier = createWebhookNotifier({ url: 'https://hooks.example.test/x', sender: 'Lab Bot', fetch, ...LOCATION })

      await expect(notifier.send(EVENTS, date('2024-11-20'))).rejects.toThrow(NotificationError)
      await expect(notifier.send(EVENTS, date('2024-11-20'))).rejects.toThrow('Webhook failed: 500 - nope')
    })

    it('connection failure', async () => {
      const fetch = vi.fn<typeof globalThis.fetch>().mockRejectedValue(new TypeError('fetch failed'))
      const notifier = createWebhookNotifier({ url: 'https://hooks.example.test/x', sender: 'Lab Bot', fetch, ...LOCATION })

      await expect(notifier.send(EVENTS, date('2024-11-20'))).rejects.toThrow(
        'Webhook connection error: fetch failed'
      )
    })
  })
})
