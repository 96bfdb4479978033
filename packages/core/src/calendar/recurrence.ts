/**
 * Recurrence Expansion
 *
 * Thin layer over ical.js's RRULE iterator. Candidates are produced in the
 * anchor's wall-clock time and resolved back into its zone with luxon, so a
 * 09:00 weekly meeting stays at 09:00 across DST changes.
 *
 * UNTIL is lifted out of the rule and checked here as an instant, because
 * ical.js compares it against the floating iterator time.
 *
 * Rules that repeat at a fixed wall-clock stride (no COUNT, no BYxxx parts)
 * start iterating near the window instead of at DTSTART.
 */

import ICAL from 'ical.js'
import { DateTime } from 'luxon'
import { RecurrenceRuleError, describeError } from '../errors.js'
import type { Window } from './types.js'

type IcalRecur = InstanceType<typeof ICAL.Recur>
type IcalTime = InstanceType<typeof ICAL.Time>

const FREQUENCIES = new Set([
  'SECONDLY',
  'MINUTELY',
  'HOURLY',
  'DAILY',
  'WEEKLY',
  'MONTHLY',
  'YEARLY',
])

const RULE_PARTS = new Set([
  'FREQ',
  'UNTIL',
  'COUNT',
  'INTERVAL',
  'BYSECOND',
  'BYMINUTE',
  'BYHOUR',
  'BYDAY',
  'BYMONTHDAY',
  'BYYEARDAY',
  'BYWEEKNO',
  'BYMONTH',
  'BYSETPOS',
  'WKST',
])

/** Wall-clock length of one FREQ step, for frequencies that have a fixed one */
const FIXED_STEPS = new Map([
  ['SECONDLY', 1000],
  ['MINUTELY', 60_000],
  ['HOURLY', 3_600_000],
  ['DAILY', 86_400_000],
  ['WEEKLY', 604_800_000],
])

/** Parts that keep a rule on a fixed stride */
const STRIDE_PARTS = new Set(['FREQ', 'INTERVAL', 'UNTIL', 'WKST'])

/** Upper bound on iterator steps for one expansion */
const DEFAULT_MAX_ITERATIONS = 1_000_000

const UNTIL_FORMATS = [
  { pattern: /^\d{8}T\d{6}Z$/, format: "yyyyMMdd'T'HHmmss'Z'", utc: true, date: false },
  { pattern: /^\d{8}T\d{6}$/, format: "yyyyMMdd'T'HHmmss", utc: false, date: false },
  { pattern: /^\d{8}$/, format: 'yyyyMMdd', utc: false, date: true },
] as const

/** UNTIL as written: an absolute instant, or wall-clock time in the anchor's zone */
export type UntilBound =
  | { kind: 'instant'; instant: DateTime }
  | { kind: 'wall'; local: DateTime; endOfDay: boolean }

export interface RecurrenceRule {
  /** The rule text as found on the component */
  text: string
  recur: IcalRecur
  until?: UntilBound
  /** Wall-clock milliseconds between starts, when every start is one */
  stride?: number
}

export interface ExpandOptions {
  maxIterations?: number
}

/**
 * Parse RRULE text.
 *
 * @throws RecurrenceRuleError when the text is not a usable rule
 */
export function parseRecurrenceRule(text: string): RecurrenceRule {
  const body = text.trim().replace(/^RRULE:/i, '')
  const kept: string[] = []
  let frequency: string | undefined
  let until: UntilBound | undefined
  let interval = 1
  let strided = true

  for (const part of body.split(';')) {
    if (!part) continue
    const eq = part.indexOf('=')
    if (eq <= 0) {
      throw new RecurrenceRuleError(text, `malformed part "${part}"`)
    }
    const name = part.slice(0, eq).toUpperCase()
    const value = part.slice(eq + 1)

    if (!RULE_PARTS.has(name)) {
      throw new RecurrenceRuleError(text, `unknown part ${name}`)
    }
    if (!STRIDE_PARTS.has(name)) {
      strided = false
    }

    switch (name) {
      case 'FREQ':
        frequency = value.toUpperCase()
        if (!FREQUENCIES.has(frequency)) {
          throw new RecurrenceRuleError(text, `invalid frequency ${value}`)
        }
        break
      case 'COUNT':
      case 'INTERVAL':
        if (!/^\d+$/.test(value) || Number(value) < 1) {
          throw new RecurrenceRuleError(text, `${name} must be a positive integer`)
        }
        if (name === 'INTERVAL') {
          interval = Number(value)
        }
        break
      case 'UNTIL':
        until = parseUntil(text, value)
        continue
    }

    kept.push(`${name}=${value}`)
  }

  if (!frequency) {
    throw new RecurrenceRuleError(text, 'missing FREQ')
  }

  let recur: IcalRecur
  try {
    recur = ICAL.Recur.fromString(kept.join(';'))
  } catch (err) {
    throw new RecurrenceRuleError(text, describeError(err))
  }

  const step = FIXED_STEPS.get(frequency)
  const stride = strided && step !== undefined ? step * interval : undefined

  return { text, recur, until, stride }
}

function parseUntil(rule: string, value: string): UntilBound {
  for (const candidate of UNTIL_FORMATS) {
    if (!candidate.pattern.test(value)) continue
    const parsed = DateTime.fromFormat(value, candidate.format, { zone: 'utc' })
    if (!parsed.isValid) break
    return candidate.utc
      ? { kind: 'instant', instant: parsed }
      : { kind: 'wall', local: parsed, endOfDay: candidate.date }
  }
  throw new RecurrenceRuleError(rule, `invalid UNTIL ${value}`)
}

/**
 * Resolve the UNTIL bound against the zone the series is expanded in.
 * A date-only UNTIL includes the whole day.
 */
function resolveUntil(until: UntilBound, anchor: DateTime): DateTime {
  if (until.kind === 'instant') {
    return until.instant
  }
  const local = until.local.setZone(anchor.zone, { keepLocalTime: true })
  return until.endOfDay ? local.endOf('day') : local
}

/**
 * Wall-clock start to iterate from: the last start of a strided rule at
 * least a day before the window (in UTC fields), or the anchor itself.
 */
function iterationStart(rule: RecurrenceRule, anchor: DateTime, window: Window): DateTime {
  const anchorWall = anchor.setZone('utc', { keepLocalTime: true })
  if (rule.stride === undefined) {
    return anchorWall
  }
  const target = window.start
    .setZone(anchor.zone)
    .setZone('utc', { keepLocalTime: true })
    .minus({ days: 1 })
  const steps = Math.floor((target.toMillis() - anchorWall.toMillis()) / rule.stride)
  return steps > 0 ? anchorWall.plus({ milliseconds: steps * rule.stride }) : anchorWall
}

/**
 * Lazily enumerate candidate starts of `rule` anchored at `anchor` that fall
 * inside [window.start, window.end). Ascending, each instant at most once.
 *
 * @throws RecurrenceRuleError when ical.js rejects the rule or the iteration bound is hit
 */
export function* expandRecurrence(
  rule: RecurrenceRule,
  anchor: DateTime,
  window: Window,
  options: ExpandOptions = {},
): Generator<DateTime> {
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS
  const zone = anchor.zone
  const until = rule.until ? resolveUntil(rule.until, anchor).toMillis() : undefined
  const windowStart = window.start.toMillis()
  const windowEnd = window.end.toMillis()

  const first = iterationStart(rule, anchor, window)
  const dtstart = ICAL.Time.fromData({
    year: first.year,
    month: first.month,
    day: first.day,
    hour: first.hour,
    minute: first.minute,
    second: first.second,
    isDate: false,
  })

  let iterator: ReturnType<IcalRecur['iterator']>
  try {
    iterator = rule.recur.iterator(dtstart)
  } catch (err) {
    throw new RecurrenceRuleError(rule.text, describeError(err))
  }

  let previous = Number.NEGATIVE_INFINITY
  for (let steps = 0; ; steps++) {
    if (steps >= maxIterations) {
      throw new RecurrenceRuleError(
        rule.text,
        `more than ${maxIterations} iterations`,
        'Gave up expanding RRULE',
      )
    }

    let next: IcalTime | null
    try {
      next = iterator.next()
    } catch (err) {
      throw new RecurrenceRuleError(rule.text, describeError(err))
    }
    if (!next) return

    const candidate = DateTime.fromObject(
      {
        year: next.year,
        month: next.month,
        day: next.day,
        hour: next.hour,
        minute: next.minute,
        second: next.second,
      },
      { zone },
    )
    const at = candidate.toMillis()

    if (at >= windowEnd) return
    if (until !== undefined && at > until) return
    // Wall-clock times skipped by a DST gap resolve onto the next valid instant
    if (at <= previous) continue
    previous = at

    if (at >= windowStart) {
      yield candidate
    }
  }
}
