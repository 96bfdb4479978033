/**
 * Error types
 *
 * Every failure the converter reports on purpose extends IcsOutlineError,
 * so the CLI can tell expected failures from crashes.
 */

export class IcsOutlineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'IcsOutlineError'
  }
}

/** The input document could not be parsed at all. Fatal for the run. */
export class CalendarParseError extends IcsOutlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CalendarParseError'
  }
}

/**
 * A recurrence rule could not be parsed or expanded.
 * Never escapes the occurrence generator; it becomes a warning.
 */
export class RecurrenceRuleError extends IcsOutlineError {
  readonly rule: string

  constructor(rule: string, reason: string, prefix = 'Could not decode RRULE') {
    super(`${prefix}: ${rule} (${reason})`)
    this.name = 'RecurrenceRuleError'
    this.rule = rule
  }
}

/** A single component is malformed (missing DTSTART, unreadable timestamp, ...). */
export class InvalidComponentError extends IcsOutlineError {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidComponentError'
  }
}

/** Processing one component failed; aborts the remaining run. */
export class ConversionError extends IcsOutlineError {
  readonly componentId: string

  constructor(componentId: string, cause: unknown) {
    super(`Error in component ${componentId}: ${describeError(cause)}`, { cause })
    this.name = 'ConversionError'
    this.componentId = componentId
  }
}

/** Invalid configuration file or command-line value. */
export class ConfigError extends IcsOutlineError {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
