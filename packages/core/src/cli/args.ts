/**
 * Command-line argument parsing
 */

import { ConfigError } from '../errors.js'

export const USAGE = `
Usage: ics-outline [options] <ics_file> <org_file>

Convert ICAL format into org-mode.

Files can be set as explicit file name, or \`-\` for stdin or stdout:

  ics-outline in.ical out.org
  ics-outline in.ical - > out.org
  cat in.ical | ics-outline - out.org
  cat in.ical | ics-outline - - > out.org

Options:
  -p, --print-timezones       Print acceptable timezone names and exit
  -e, --email <address>       User email address (used to deal with declined
                              events). Repeat for several addresses
  -d, --days <N>              Window length in days, left and right from the
                              current time (default: 90). Negative values
                              count as 0
  -t, --timezone <zone>       Timezone to use (default: local timezone)
  --location / --no-location  Include the location (if present) in the
                              headline (default: included)
  -c, --config <path>         YAML config file (default: $ICS_OUTLINE_CONFIG,
                              then ./ics-outline.yaml)
  -h, --help                  Show this help message
`

export interface CliArgs {
  help: boolean
  printTimezones: boolean
  configPath?: string
  days?: number
  timezone?: string
  emails: string[]
  includeLocation?: boolean
  input?: string
  output?: string
}

/**
 * Parse argv (without the node and script entries).
 *
 * @throws ConfigError on unknown options, missing values or extra arguments
 */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { help: false, printTimezones: false, emails: [] }
  const positional: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const raw = argv[i]

    // "--name=value" form
    const eq = raw.startsWith('--') ? raw.indexOf('=') : -1
    const flag = eq > 0 ? raw.slice(0, eq) : raw
    const inline = eq > 0 ? raw.slice(eq + 1) : undefined

    const value = (): string => {
      if (inline !== undefined) return inline
      const next = argv[i + 1]
      if (next === undefined) {
        throw new ConfigError(`Option ${flag} requires a value`)
      }
      i++
      return next
    }

    switch (flag) {
      case '-h':
      case '--help':
        args.help = true
        break
      case '-p':
      case '--print-timezones':
        args.printTimezones = true
        break
      case '-e':
      case '--email':
        args.emails.push(value())
        break
      case '-d':
      case '--days':
        args.days = parseDays(value())
        break
      case '-t':
      case '--timezone':
        args.timezone = value()
        break
      case '-c':
      case '--config':
        args.configPath = value()
        break
      case '--location':
        args.includeLocation = true
        break
      case '--no-location':
        args.includeLocation = false
        break
      default:
        if (raw !== '-' && raw.startsWith('-')) {
          throw new ConfigError(`Unknown option: ${raw}`)
        }
        positional.push(raw)
    }
  }

  if (positional.length > 2) {
    throw new ConfigError(`Got unexpected extra argument (${positional.slice(2).join(' ')})`)
  }
  args.input = positional[0]
  args.output = positional[1]

  return args
}

/** Whole number of days; negative values clamp to 0 */
function parseDays(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new ConfigError(`Invalid value for --days: ${value} is not a valid integer`)
  }
  return Math.max(0, Number.parseInt(value, 10))
}
