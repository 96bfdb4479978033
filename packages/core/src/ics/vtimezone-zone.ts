/**
 * luxon Zone backed by an ical.js Timezone, for TZIDs that only exist as a
 * VTIMEZONE inside the document (Outlook's "Pacific Standard Time" and the
 * like). Offsets follow the VTIMEZONE's own STANDARD/DAYLIGHT transitions.
 */

import ICAL from 'ical.js'
import { FixedOffsetZone, Zone, type ZoneOffsetFormat, type ZoneOffsetOptions } from 'luxon'

type IcalTimezone = InstanceType<typeof ICAL.Timezone>

export class VTimezoneZone extends Zone {
  private readonly timezone: IcalTimezone

  constructor(timezone: IcalTimezone) {
    super()
    this.timezone = timezone
  }

  get type(): string {
    return 'vtimezone'
  }

  get name(): string {
    return this.timezone.tzid
  }

  get ianaName(): string {
    return this.timezone.tzid
  }

  get isUniversal(): boolean {
    return false
  }

  get isValid(): true {
    return true
  }

  /** Offset in minutes at the instant `ts` (epoch ms) */
  offset(ts: number): number {
    const utc = ICAL.Time.fromJSDate(new Date(ts), true)
    return Math.round(utc.convertToZone(this.timezone).utcOffset() / 60)
  }

  offsetName(_ts: number, _options: ZoneOffsetOptions): string {
    return this.timezone.tzid
  }

  formatOffset(ts: number, format: ZoneOffsetFormat): string {
    return FixedOffsetZone.instance(this.offset(ts)).formatOffset(ts, format)
  }

  equals(other: Zone): boolean {
    return other.type === this.type && other.name === this.name
  }
}
