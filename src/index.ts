/**
 * meeting-rotation
 *
 * Public API exports
 */

// Error system
export {
  RotationError, RotationErrorCode,
  ConfigurationError, ValidationError,
  ParseError, InvalidDataError, DataInconsistencyError,
  PersistenceError, NotificationError,
} from './errors'
export type { RotationErrorCode as RotationErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate, Weekday } from './time-date'
export {
  isLeapYear, daysInMonth,
  parseDate, parseCalendarDay, makeDate,
  yearOf, monthOf, dayOf,
  addDays, daysBetween,
  dayOfWeek, weekdayToIndex, isWeekday,
  isValidTimezone, todayIn, zonedTimeToInstant, formatLongDate,
} from './time-date'

// Domain types
export type {
  Track, PresentationTrack,
  ScheduleEvent, PresentationEvent, HolidayEvent, StoredRow,
  RotationRoster, HolidayOverride, HolidayOverrides,
  CadenceSettings, ScheduleSettings, CursorState,
} from './types'
export { TRACK_LABELS, PRESENTATION_TRACKS, DEFAULT_CADENCE, isPresentationTrack } from './types'

// Engine
export type { HolidayCheck } from './holidays'
export { isHoliday, buildOverrideIndex, FIXED_HOLIDAY_NAME } from './holidays'
export type { CadenceStep } from './cadence'
export { deriveStreak, nextSlot, presentersFor } from './cadence'
export type { RotationCursor, CursorDerivation } from './rotation-cursor'
export { createRotationCursor, derivePresenterIndices, deriveCursorState } from './rotation-cursor'
export type { ExtendScheduleInput, ExtendScheduleResult } from './schedule'
export { extendSchedule, alignToWeekday, nextAnchor } from './schedule'

// Event log rows
export { toStoredRow, parseStoredRow, parseEventLog, presenterField, formatScheduleTable } from './rows'

// Adapters
export type { Adapter } from './adapter'
export { createMockAdapter } from './adapter'
export type { SqliteAdapter, SqliteAdapterOptions } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// Planner
export type {
  RotationPlanner, RotationPlannerConfig,
  GenerateOptions, GenerateResult,
} from './planner'
export { createRotationPlanner } from './planner'

// Notifications
export type { MeetingLocation, WebhookPayload, WebhookNotifier, WebhookNotifierConfig } from './notify'
export { formatScheduleMessage, createWebhookNotifier } from './notify'

// Calendar invites
export type {
  InviteSettings, InviteMessage, InviteSender, InviteSenderConfig, InviteDelivery,
  Mailbox, MailTransport,
} from './invite'
export { composeInvite, buildCalendar, chunkRecipients, findInviteEvent, createInviteSender } from './invite'

// Configuration & logging
export type { RotationConfig, NotifySettings, InviteConfig, SmtpSettings } from './config'
export { parseConfig, loadConfig, resolveConfigPath, DEFAULT_CONFIG_FILENAME } from './config'
export type { Logger, LoggerOptions } from './logger'
export { createLogger, silentLogger } from './logger'
