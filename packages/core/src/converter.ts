/**
 * Converter
 *
 * One conversion run: parse the calendar, materialize every VEVENT inside
 * [now - days, now + days], drop duplicate occurrences and write the rest
 * as an org outline.
 */

import { DateTime, IANAZone } from 'luxon'
import { DeduplicatingEmitter } from './calendar/emitter.js'
import { generateOccurrences } from './calendar/occurrences.js'
import { normalize } from './calendar/time.js'
import { NO_ID, type Component, type Logger, type Window } from './calendar/types.js'
import { ConfigError, ConversionError } from './errors.js'
import { readComponents } from './ics/parser.js'
import { DEFAULT_RECURRING_TAG, OrgWriter, type TextSink } from './outline/writer.js'

export const DEFAULT_DAYS = 90

export interface ConverterOptions {
  /** Window half-width in days, must be >= 0 (default: 90) */
  days?: number

  /** IANA zone for output and floating times (default: host zone) */
  timezone?: string

  /** Addresses that identify "self"; a series one of them declined is skipped */
  emails?: Iterable<string>

  /** Append the location to headings (default: true) */
  includeLocation?: boolean

  /** Tag for recurring instances (default: ":RECURRING:") */
  recurringTag?: string

  /** Warning channel (default: console) */
  logger?: Logger

  /** Clock, for tests */
  now?: () => DateTime
}

export interface ConversionSummary {
  /** VEVENTs seen */
  components: number
  accepted: number
  duplicates: number
  warnings: number
}

export function localZone(): string {
  return DateTime.local().zoneName ?? 'UTC'
}

export class Converter {
  readonly days: number
  readonly zone: string
  readonly selfEmails: ReadonlySet<string>
  readonly includeLocation: boolean
  readonly recurringTag: string
  private readonly logger: Logger
  private readonly now: () => DateTime

  constructor(options: ConverterOptions = {}) {
    const days = options.days ?? DEFAULT_DAYS
    if (!Number.isFinite(days) || days < 0) {
      throw new ConfigError(`Window length must be a non-negative number of days, got ${days}`)
    }

    const zone = options.timezone ?? localZone()
    if (!IANAZone.isValidZone(zone)) {
      throw new ConfigError(`Invalid timezone value ${zone}.`)
    }

    this.days = days
    this.zone = zone
    this.selfEmails = new Set(options.emails ?? [])
    this.includeLocation = options.includeLocation ?? true
    this.recurringTag = options.recurringTag ?? DEFAULT_RECURRING_TAG
    this.logger = options.logger ?? console
    this.now = options.now ?? (() => DateTime.utc())
  }

  /** The window this run covers, centered on "now" */
  window(): Window {
    const now = this.now().toUTC()
    return {
      start: now.minus({ days: this.days }),
      end: now.plus({ days: this.days }),
    }
  }

  /**
   * Convert `icsText`, writing the outline to `out`.
   *
   * @throws CalendarParseError before anything is written when the document is unreadable
   * @throws ConversionError when one event cannot be processed
   */
  convert(icsText: string, out: TextSink): ConversionSummary {
    let warnings = 0
    const logger: Logger = {
      warn: (...data: unknown[]) => {
        warnings++
        this.logger.warn(...data)
      },
    }

    const components = readComponents(icsText, logger)

    const window = this.window()
    const overridden = this.indexOverrides(components)
    const emitter = new DeduplicatingEmitter(
      this.zone,
      new OrgWriter(out, {
        zone: this.zone,
        includeLocation: this.includeLocation,
        recurringTag: this.recurringTag,
      }),
    )

    for (const component of components) {
      const id = component.id ?? NO_ID
      try {
        const occurrences = generateOccurrences(component, window, this.zone, this.selfEmails, {
          logger,
          excluded: component.recurrenceId ? undefined : overridden.get(id),
        })
        for (const occurrence of occurrences) {
          emitter.emit(occurrence, component)
        }
      } catch (err) {
        if (err instanceof ConversionError) throw err
        throw new ConversionError(id, err)
      }
    }

    return {
      components: components.length,
      accepted: emitter.accepted,
      duplicates: emitter.duplicates,
      warnings,
    }
  }

  /**
   * RECURRENCE-ID instants per UID. The override VEVENT is emitted on its
   * own, so the master series must skip that instance.
   */
  private indexOverrides(components: Component[]): Map<string, number[]> {
    const index = new Map<string, number[]>()
    for (const component of components) {
      if (!component.recurrenceId || component.id === undefined) continue
      const instants = index.get(component.id) ?? []
      instants.push(normalize(component.recurrenceId, this.zone).toMillis())
      index.set(component.id, instants)
    }
    return index
  }
}
