/**
 * ICS Parser Adapter
 *
 * Reads iCalendar text with ical.js and maps each VEVENT onto the engine's
 * Component model. Timezones are resolved with luxon (IANA); a TZID that is
 * only defined by an embedded VTIMEZONE gets a VTimezoneZone, which reads its
 * offsets from ical.js.
 */

import ICAL from 'ical.js'
import { DateTime, Duration, IANAZone } from 'luxon'
import {
  CalendarParseError,
  ConversionError,
  InvalidComponentError,
  describeError,
} from '../errors.js'
import { VTimezoneZone } from './vtimezone-zone.js'
import { NO_ID, type Attendee, type Component, type Logger, type TimeValue } from '../calendar/types.js'

type IcalComponent = InstanceType<typeof ICAL.Component>
type IcalProperty = InstanceType<typeof ICAL.Property>
type IcalTime = InstanceType<typeof ICAL.Time>

/**
 * VEVENT RRULE lines are renamed to this X- property before parsing, so
 * ical.js keeps the rule as raw text instead of decoding it. A malformed rule
 * then only affects its own event. VTIMEZONE rules are left alone: ical.js
 * needs them for the zone's DST transitions.
 */
const RAW_RRULE_PROPERTY = 'X-ICS-OUTLINE-RRULE'

/**
 * Parse iCalendar text and return its VEVENTs.
 *
 * @throws CalendarParseError when the text is not an iCalendar document
 */
export function parseCalendar(text: string): IcalComponent[] {
  const unfolded = text.replace(/\r?\n[ \t]/g, '')
  const shielded = shieldEventRules(unfolded)

  let root: IcalComponent
  try {
    root = ICAL.Component.fromString(shielded)
  } catch (err) {
    throw new CalendarParseError(`Parsing error: ${describeError(err)}`, { cause: err })
  }

  if (root.name !== 'vcalendar') {
    // An empty document parses to a nameless component
    const found = typeof root.name === 'string' ? root.name.toUpperCase() : 'nothing'
    throw new CalendarParseError(`Parsing error: expected VCALENDAR, found ${found}`)
  }

  return root.getAllSubcomponents('vevent')
}

/** Rename RRULE lines whose innermost enclosing component is a VEVENT */
function shieldEventRules(text: string): string {
  const open: string[] = []
  return text
    .split(/\r?\n/)
    .map((line) => {
      const boundary = /^(BEGIN|END):(.+)$/i.exec(line.trim())
      if (boundary) {
        if (boundary[1].toUpperCase() === 'BEGIN') {
          open.push(boundary[2].toUpperCase())
        } else {
          open.pop()
        }
        return line
      }
      return open[open.length - 1] === 'VEVENT'
        ? line.replace(/^RRULE(?=[;:])/i, RAW_RRULE_PROPERTY)
        : line
    })
    .join('\r\n')
}

/**
 * Parse iCalendar text straight into Components.
 *
 * @throws CalendarParseError for an unreadable document
 * @throws ConversionError for the first malformed event
 */
export function readComponents(text: string, logger: Logger = console): Component[] {
  return parseCalendar(text).map((vevent) => {
    try {
      return toComponent(vevent, logger)
    } catch (err) {
      throw new ConversionError(readText(vevent, 'uid') ?? NO_ID, err)
    }
  })
}

/**
 * Map one VEVENT onto a Component.
 *
 * @throws InvalidComponentError when DTSTART is missing or a timestamp is unreadable
 */
export function toComponent(vevent: IcalComponent, logger: Logger = console): Component {
  const start = readTime(vevent, 'dtstart', logger)
  if (!start) {
    throw new InvalidComponentError('missing DTSTART')
  }

  return {
    id: readText(vevent, 'uid'),
    start,
    end: readTime(vevent, 'dtend', logger),
    duration: readDuration(vevent),
    recurrenceRule: readText(vevent, RAW_RRULE_PROPERTY.toLowerCase()),
    exclusions: readTimeList(vevent, 'exdate', logger),
    recurrenceId: readTime(vevent, 'recurrence-id', logger),
    attendees: vevent.getAllProperties('attendee').map(toAttendee),
    organizer: readText(vevent, 'organizer'),
    summary: readText(vevent, 'summary'),
    location: readText(vevent, 'location'),
    description: readText(vevent, 'description'),
    lastModified: readTime(vevent, 'dtstamp', logger) ?? readTime(vevent, 'last-modified', logger),
  }
}

// ─── Property readers ───

function readText(vevent: IcalComponent, name: string): string | undefined {
  const value: unknown = vevent.getFirstPropertyValue(name)
  if (value === null || value === undefined) return undefined
  const text = String(value)
  return text === '' ? undefined : text
}

function readParameter(prop: IcalProperty, name: string): string | undefined {
  const value: unknown = prop.getParameter(name)
  if (typeof value === 'string') return value
  if (Array.isArray(value)) return value.map(String).join(',')
  return undefined
}

function toAttendee(prop: IcalProperty): Attendee {
  const value: unknown = prop.getFirstValue()
  return {
    address: value === null || value === undefined ? '' : String(value),
    displayName: readParameter(prop, 'cn'),
    participationStatus: readParameter(prop, 'partstat')?.toUpperCase(),
  }
}

function readDuration(vevent: IcalComponent): Duration | undefined {
  const value: unknown = vevent.getFirstPropertyValue('duration')
  if (!(value instanceof ICAL.Duration)) return undefined

  const duration = Duration.fromObject({
    weeks: value.weeks,
    days: value.days,
    hours: value.hours,
    minutes: value.minutes,
    seconds: value.seconds,
  })
  return value.isNegative ? duration.negate() : duration
}

function readTime(vevent: IcalComponent, name: string, logger: Logger): TimeValue | undefined {
  const prop = vevent.getFirstProperty(name)
  if (!prop) return undefined

  const value: unknown = prop.getFirstValue()
  if (!(value instanceof ICAL.Time)) {
    throw new InvalidComponentError(`malformed ${name.toUpperCase()}`)
  }
  return toTimeValue(value, name, readParameter(prop, 'tzid'), logger)
}

/** EXDATE may repeat, and each occurrence may carry several values */
function readTimeList(vevent: IcalComponent, name: string, logger: Logger): TimeValue[] {
  const result: TimeValue[] = []
  for (const prop of vevent.getAllProperties(name)) {
    const tzid = readParameter(prop, 'tzid')
    const values: unknown[] = prop.getValues()
    for (const value of values) {
      if (!(value instanceof ICAL.Time)) {
        throw new InvalidComponentError(`malformed ${name.toUpperCase()}`)
      }
      result.push(toTimeValue(value, name, tzid, logger))
    }
  }
  return result
}

// ─── Time conversion ───

function toTimeValue(
  time: IcalTime,
  name: string,
  tzid: string | undefined,
  logger: Logger,
): TimeValue {
  const wall = {
    year: time.year,
    month: time.month,
    day: time.day,
    hour: time.hour,
    minute: time.minute,
    second: time.second,
  }
  if (!Object.values(wall).every(Number.isFinite)) {
    throw new InvalidComponentError(`unreadable ${name.toUpperCase()}`)
  }

  if (time.isDate) {
    return { kind: 'date', year: wall.year, month: wall.month, day: wall.day }
  }

  if (time.zone === ICAL.Timezone.utcTimezone) {
    return { kind: 'zoned', instant: DateTime.fromObject(wall, { zone: 'utc' }) }
  }

  if (tzid) {
    if (IANAZone.isValidZone(tzid)) {
      return { kind: 'zoned', instant: DateTime.fromObject(wall, { zone: tzid }) }
    }

    if (time.zone && time.zone !== ICAL.Timezone.localTimezone) {
      // Defined by an embedded VTIMEZONE only
      return {
        kind: 'zoned',
        instant: DateTime.fromSeconds(time.toUnixTime(), { zone: new VTimezoneZone(time.zone) }),
      }
    }

    logger.warn(`Unknown timezone "${tzid}" on ${name.toUpperCase()}; reading it as local time`)
  }

  return { kind: 'floating', ...wall }
}
