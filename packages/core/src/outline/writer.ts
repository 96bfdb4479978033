/**
 * Org Outline Writer
 *
 * Renders accepted occurrences as org-mode headings with an :ICALCONTENTS:
 * drawer and an active timestamp range.
 */

import type { OutlineEntry, OutlineSink } from '../calendar/emitter.js'
import {
  formatDateTime,
  formatOrgDate,
  formatOrgDateTime,
  normalize,
} from '../calendar/time.js'
import { NO_ID, type Component } from '../calendar/types.js'

export const NO_TITLE = '(No title)'
export const DEFAULT_RECURRING_TAG = ':RECURRING:'

/** Anything text can be written to: a stream, process.stdout, a buffer */
export interface TextSink {
  write(chunk: string): unknown
}

export interface OrgWriterOptions {
  /** Zone timed events are rendered in */
  zone: string
  /** Append " - <location>" to the heading */
  includeLocation: boolean
  /** Tag on headings of recurring instances; empty disables it */
  recurringTag: string
}

/**
 * Heading text: summary, optionally followed by the location.
 */
export function formatTitle(component: Component, includeLocation: boolean): string {
  const summary = oneLine(component.summary)
  const location = includeLocation ? oneLine(component.location) : undefined

  if (summary && location) return `${summary} - ${location}`
  return summary ?? location ?? NO_TITLE
}

function oneLine(text: string | undefined): string | undefined {
  const flattened = text?.replace(/\s*\r?\n\s*/g, ' ').trim()
  return flattened ? flattened : undefined
}

/**
 * Timestamp range line. All-day events (date-only DTSTART) are shown as
 * dates, with the exclusive DTEND pulled back to the last day of the event.
 */
export function formatRange(entry: OutlineEntry, zone: string): string {
  const { start, end } = entry.occurrence

  if (entry.component.start.kind === 'date') {
    const utcStart = start.setZone('utc')
    const lastDay = end.setZone('utc').minus({ days: 1 })
    const shownEnd = lastDay.toMillis() < utcStart.toMillis() ? utcStart : lastDay
    return `  ${formatOrgDate(utcStart, 'utc')}--${formatOrgDate(shownEnd, 'utc')}`
  }

  return `  ${formatOrgDateTime(start, zone)}--${formatOrgDateTime(end, zone)}`
}

export function renderEntry(entry: OutlineEntry, options: OrgWriterOptions): string {
  const { component, occurrence, hash } = entry
  const { zone } = options

  let heading = `* ${formatTitle(component, options.includeLocation)}`
  if (occurrence.isRecurring && options.recurringTag) {
    heading += ` ${options.recurringTag}`
  }

  const lines = [
    heading,
    ':ICALCONTENTS:',
    `:ORGUID: ${hash}`,
    `:ORIGINAL-UID: ${component.id ?? NO_ID}`,
    `:DTSTART: ${formatDateTime(occurrence.start, zone)}`,
    `:DTEND: ${formatDateTime(occurrence.end, zone)}`,
  ]

  if (component.lastModified) {
    lines.push(`:DTSTAMP: ${formatDateTime(normalize(component.lastModified, zone), zone)}`)
  }
  for (const attendee of component.attendees) {
    lines.push(`:ATTENDEE: ${attendee.address}`)
  }
  if (component.organizer) {
    lines.push(`:ORGANIZER: ${component.organizer}`)
  }
  if (component.recurrenceRule) {
    lines.push(`:RRULE: ${component.recurrenceRule}`)
  }

  lines.push(':END:', formatRange(entry, zone))

  if (component.description) {
    lines.push('** Description', '', component.description)
  }

  lines.push('')
  return lines.join('\n') + '\n'
}

export class OrgWriter implements OutlineSink {
  private readonly out: TextSink
  private readonly options: OrgWriterOptions

  constructor(out: TextSink, options: OrgWriterOptions) {
    this.out = out
    this.options = options
  }

  writeEntry(entry: OutlineEntry): void {
    this.out.write(renderEntry(entry, this.options))
  }
}
