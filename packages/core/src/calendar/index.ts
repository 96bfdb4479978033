/**
 * Event Materialization Engine
 *
 * Time normalization, exclusion filtering, occurrence generation and
 * deduplicated emission for single calendar components.
 */

// Types
export type {
  CalendarDate,
  FloatingDateTime,
  ZonedDateTime,
  TimeValue,
  ParticipationStatus,
  Attendee,
  Component,
  Window,
  Occurrence,
  EmitResult,
  Logger,
} from './types.js'
export { NO_ID } from './types.js'

// Implementation
export { normalize, addDuration, formatDateTime, formatOrgDate, formatOrgDateTime } from './time.js'
export {
  isSeriesDeclined,
  collectExclusions,
  subtractExclusions,
  filterOccurrenceStarts,
} from './exclusions.js'
export { parseRecurrenceRule, expandRecurrence } from './recurrence.js'
export type { RecurrenceRule, UntilBound, ExpandOptions } from './recurrence.js'
export { classify, resolveBounds, generateOccurrences } from './occurrences.js'
export type { ComponentShape, GenerateOptions } from './occurrences.js'
export { identityHash, DeduplicatingEmitter } from './emitter.js'
export type { OutlineEntry, OutlineSink } from './emitter.js'
