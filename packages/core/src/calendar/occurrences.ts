/**
 * Occurrence Generator
 *
 * Materializes the concrete (start, end) pairs of one component inside a
 * window. A component is either a single event or a recurring series,
 * told apart by the presence of an RRULE.
 */

import type { DateTime } from 'luxon'
import { InvalidComponentError, RecurrenceRuleError } from '../errors.js'
import {
  collectExclusions,
  filterOccurrenceStarts,
  isSeriesDeclined,
  subtractExclusions,
} from './exclusions.js'
import { expandRecurrence, parseRecurrenceRule, type ExpandOptions } from './recurrence.js'
import { addDuration, normalize } from './time.js'
import { NO_ID, type Component, type Logger, type Occurrence, type Window } from './types.js'

export type ComponentShape =
  | { kind: 'single'; component: Component }
  | { kind: 'recurring'; component: Component; rule: string }

export interface GenerateOptions extends ExpandOptions {
  /** Where unusable recurrence rules are reported (default: console) */
  logger?: Logger

  /** Extra instants (epoch ms) removed from a series, e.g. overridden instances */
  excluded?: Iterable<number>
}

export function classify(component: Component): ComponentShape {
  return component.recurrenceRule
    ? { kind: 'recurring', component, rule: component.recurrenceRule }
    : { kind: 'single', component }
}

/**
 * Resolve the anchor times of a component.
 * End falls back to start + DURATION, then to start (zero-length event).
 */
export function resolveBounds(component: Component, zone: string): { start: DateTime; end: DateTime } {
  const start = normalize(component.start, zone)
  if (!start.isValid) {
    throw new InvalidComponentError(`invalid DTSTART (${start.invalidReason ?? 'unknown reason'})`)
  }

  let end = start
  if (component.end) {
    end = normalize(component.end, zone)
  } else if (component.duration) {
    end = addDuration(start, component.duration)
  }
  if (!end.isValid) {
    throw new InvalidComponentError(`invalid DTEND (${end.invalidReason ?? 'unknown reason'})`)
  }

  return { start, end }
}

/**
 * Occurrences of `component` that qualify for `window`.
 *
 * Single events overlap the window; recurring instances start inside
 * [window.start, window.end). Order within a component is not part of the
 * contract.
 */
export function generateOccurrences(
  component: Component,
  window: Window,
  zone: string,
  selfEmails: ReadonlySet<string>,
  options: GenerateOptions = {},
): Iterable<Occurrence> {
  const shape = classify(component)
  switch (shape.kind) {
    case 'single':
      return singleOccurrence(shape.component, window, zone, selfEmails)
    case 'recurring':
      return recurringOccurrences(shape.component, shape.rule, window, zone, selfEmails, options)
  }
}

function* singleOccurrence(
  component: Component,
  window: Window,
  zone: string,
  selfEmails: ReadonlySet<string>,
): Generator<Occurrence> {
  const { start, end } = resolveBounds(component, zone)

  if (start.toMillis() >= window.end.toMillis() || end.toMillis() <= window.start.toMillis()) {
    return
  }

  for (const survivor of filterOccurrenceStarts([start], component, zone, selfEmails)) {
    yield { start: survivor, end, isRecurring: false, componentId: component.id ?? NO_ID }
  }
}

function* recurringOccurrences(
  component: Component,
  ruleText: string,
  window: Window,
  zone: string,
  selfEmails: ReadonlySet<string>,
  options: GenerateOptions,
): Generator<Occurrence> {
  if (isSeriesDeclined(component.attendees, selfEmails)) {
    return
  }

  const { start, end } = resolveBounds(component, zone)
  const durationMs = end.toMillis() - start.toMillis()
  const componentId = component.id ?? NO_ID

  // All-day series step through UTC midnights so DST never moves them off their date
  const anchor = component.start.kind === 'date' ? start.setZone('utc') : start

  let starts: DateTime[]
  try {
    const rule = parseRecurrenceRule(ruleText)
    starts = [...expandRecurrence(rule, anchor, window, options)]
  } catch (err) {
    if (err instanceof RecurrenceRuleError) {
      const logger = options.logger ?? console
      logger.warn(`${err.message} [UID ${componentId}]`)
      return
    }
    throw err
  }

  const excluded = collectExclusions(component, zone)
  for (const instant of options.excluded ?? []) {
    excluded.add(instant)
  }

  for (const candidate of subtractExclusions(starts, excluded)) {
    yield {
      start: candidate,
      end: candidate.plus(durationMs),
      isRecurring: true,
      componentId,
    }
  }
}
