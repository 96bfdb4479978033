/**
 * Calendar Engine Types
 *
 * Structured calendar entries as handed over by the ICS parser, and the
 * occurrences the engine materializes from them.
 */

import type { DateTime, Duration } from 'luxon'

/** Sentinel used in place of a missing UID */
export const NO_ID = '**NOID**'

// ─── Time values ───

/** A date without time of day (VALUE=DATE) */
export interface CalendarDate {
  kind: 'date'
  year: number
  month: number
  day: number
}

/** A wall-clock date-time without a timezone */
export interface FloatingDateTime {
  kind: 'floating'
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
}

/** A date-time pinned to an instant; `instant.zone` is the zone it was written in */
export interface ZonedDateTime {
  kind: 'zoned'
  instant: DateTime
}

export type TimeValue = CalendarDate | FloatingDateTime | ZonedDateTime

// ─── Components ───

export type ParticipationStatus =
  | 'NEEDS-ACTION'
  | 'ACCEPTED'
  | 'DECLINED'
  | 'TENTATIVE'
  | 'DELEGATED'
  | (string & {})

export interface Attendee {
  /** Calendar user address, e.g. "mailto:ana@example.org" */
  address: string

  /** CN parameter */
  displayName?: string

  /** PARTSTAT parameter */
  participationStatus?: ParticipationStatus
}

/**
 * One VEVENT.
 * Immutable once parsed; the engine only reads it.
 */
export interface Component {
  /** UID, absent when the feed does not carry one */
  id?: string

  start: TimeValue
  end?: TimeValue
  duration?: Duration

  /** Raw RRULE text, e.g. "FREQ=WEEKLY;BYDAY=MO" */
  recurrenceRule?: string

  /** EXDATE values, all properties flattened */
  exclusions: TimeValue[]

  /** RECURRENCE-ID of an overridden instance */
  recurrenceId?: TimeValue

  attendees: Attendee[]
  organizer?: string

  summary?: string
  location?: string
  description?: string

  /** DTSTAMP, falling back to LAST-MODIFIED */
  lastModified?: TimeValue
}

// ─── Occurrences ───

/** Inclusion boundary; an occurrence qualifies iff start < window.end && end > window.start */
export interface Window {
  start: DateTime
  end: DateTime
}

export interface Occurrence {
  start: DateTime
  end: DateTime
  isRecurring: boolean
  componentId: string
}

export type EmitResult = 'accepted' | 'duplicate'

/** Diagnostic channel for recoverable problems; `console` fits */
export type Logger = Pick<Console, 'warn'>
