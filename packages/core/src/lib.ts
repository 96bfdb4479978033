// Public API for consumption as a library

// Engine
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
} from './calendar/index.js'
export {
  NO_ID,
  normalize,
  addDuration,
  formatDateTime,
  formatOrgDate,
  formatOrgDateTime,
  isSeriesDeclined,
  collectExclusions,
  subtractExclusions,
  filterOccurrenceStarts,
  parseRecurrenceRule,
  expandRecurrence,
  classify,
  resolveBounds,
  generateOccurrences,
  identityHash,
  DeduplicatingEmitter,
} from './calendar/index.js'
export type {
  RecurrenceRule,
  UntilBound,
  ExpandOptions,
  ComponentShape,
  GenerateOptions,
  OutlineEntry,
  OutlineSink,
} from './calendar/index.js'

export { DedupRegistry } from './utils/dedup.js'

// Parser / writer
export { parseCalendar, readComponents, toComponent } from './ics/parser.js'
export { VTimezoneZone } from './ics/vtimezone-zone.js'
export {
  OrgWriter,
  renderEntry,
  formatTitle,
  formatRange,
  NO_TITLE,
  DEFAULT_RECURRING_TAG,
} from './outline/writer.js'
export type { TextSink, OrgWriterOptions } from './outline/writer.js'

// Run
export { Converter, DEFAULT_DAYS, localZone } from './converter.js'
export type { ConverterOptions, ConversionSummary } from './converter.js'
export {
  resolveConfig,
  loadConfigFile,
  findConfigFile,
  CONFIG_FILENAME,
  CONFIG_ENV_VAR,
} from './config.js'
export type { ConfigFile, ConfigOverrides, ResolvedConfig } from './config.js'

// Errors
export {
  IcsOutlineError,
  CalendarParseError,
  RecurrenceRuleError,
  InvalidComponentError,
  ConversionError,
  ConfigError,
} from './errors.js'
