/**
 * Time Normalizer
 *
 * Turns calendar date/date-time values into zone-aware luxon DateTimes and
 * renders them back as the outline expects.
 */

import { DateTime, type Duration } from 'luxon'
import type { TimeValue } from './types.js'

const OUTPUT_LOCALE = 'en-US'

/**
 * Resolve a calendar value into an instant.
 *
 * - zoned date-times are returned unchanged
 * - floating date-times are read as wall-clock time in `zone`
 * - dates are taken as midnight UTC, then converted to `zone`
 */
export function normalize(value: TimeValue, zone: string): DateTime {
  switch (value.kind) {
    case 'zoned':
      return value.instant
    case 'floating':
      return DateTime.fromObject(
        {
          year: value.year,
          month: value.month,
          day: value.day,
          hour: value.hour,
          minute: value.minute,
          second: value.second,
        },
        { zone },
      )
    case 'date':
      return DateTime.fromObject(
        { year: value.year, month: value.month, day: value.day },
        { zone: 'utc' },
      ).setZone(zone)
  }
}

/**
 * Add a duration in wall-clock terms.
 *
 * The instant is stripped to its civil time, the duration added, and the
 * original zone reattached, so +1 day across a DST change lands on the same
 * local time.
 */
export function addDuration(instant: DateTime, duration: Duration): DateTime {
  return instant
    .setZone('utc', { keepLocalTime: true })
    .plus(duration)
    .setZone(instant.zone, { keepLocalTime: true })
}

/** "2024-01-01 09:00" in `zone` */
export function formatDateTime(instant: DateTime, zone: string): string {
  return instant.setZone(zone).toFormat('yyyy-MM-dd HH:mm')
}

/** "<2024-01-01 Mon 09:00>" in `zone` */
export function formatOrgDateTime(instant: DateTime, zone: string): string {
  return instant.setZone(zone).toFormat("'<'yyyy-MM-dd ccc HH:mm'>'", { locale: OUTPUT_LOCALE })
}

/** "<2024-01-01 Mon>" in `zone` */
export function formatOrgDate(instant: DateTime, zone: string): string {
  return instant.setZone(zone).toFormat("'<'yyyy-MM-dd ccc'>'", { locale: OUTPUT_LOCALE })
}
