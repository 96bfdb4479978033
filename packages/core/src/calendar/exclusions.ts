/**
 * Exception Filter
 *
 * Drops occurrences the calendar says should not happen: the whole series
 * when "self" declined it, single instants listed in EXDATE.
 */

import type { DateTime } from 'luxon'
import { normalize } from './time.js'
import type { Attendee, Component } from './types.js'

/**
 * True when one of the attendees is "self" (matched on CN) and declined.
 */
export function isSeriesDeclined(
  attendees: readonly Attendee[],
  selfEmails: ReadonlySet<string>,
): boolean {
  return attendees.some(
    (attendee) =>
      attendee.participationStatus?.toUpperCase() === 'DECLINED' &&
      attendee.displayName !== undefined &&
      selfEmails.has(attendee.displayName),
  )
}

/**
 * EXDATE instants as epoch milliseconds, for exact instant matching.
 */
export function collectExclusions(component: Component, zone: string): Set<number> {
  const excluded = new Set<number>()
  for (const value of component.exclusions) {
    excluded.add(normalize(value, zone).toMillis())
  }
  return excluded
}

/**
 * Remove every start that matches an excluded instant.
 */
export function* subtractExclusions(
  starts: Iterable<DateTime>,
  excluded: ReadonlySet<number>,
): Generator<DateTime> {
  for (const start of starts) {
    if (!excluded.has(start.toMillis())) {
      yield start
    }
  }
}

/**
 * Filter candidate starts of one component.
 *
 * Returns nothing when the series is declined, otherwise the candidates
 * that are not excluded.
 */
export function filterOccurrenceStarts(
  starts: Iterable<DateTime>,
  component: Component,
  zone: string,
  selfEmails: ReadonlySet<string>,
): DateTime[] {
  if (isSeriesDeclined(component.attendees, selfEmails)) {
    return []
  }
  return [...subtractExclusions(starts, collectExclusions(component, zone))]
}
