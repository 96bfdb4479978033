import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { IANAZone } from 'luxon'
import { parse } from 'yaml'
import { z } from 'zod'
import { DEFAULT_DAYS, localZone } from './converter.js'
import { ConfigError, describeError } from './errors.js'
import { DEFAULT_RECURRING_TAG } from './outline/writer.js'

export const CONFIG_FILENAME = 'ics-outline.yaml'
export const CONFIG_ENV_VAR = 'ICS_OUTLINE_CONFIG'

const ConfigFileSchema = z
  .object({
    days: z.number().int().nonnegative().optional(),
    timezone: z.string().min(1).optional(),
    emails: z.array(z.string().min(1)).optional(),
    includeLocation: z.boolean().optional(),
    recurringTag: z.string().optional(),
  })
  .strict()

export type ConfigFile = z.infer<typeof ConfigFileSchema>

/** Settings given on the command line; absent means "not given" */
export interface ConfigOverrides {
  configPath?: string
  days?: number
  timezone?: string
  emails?: string[]
  includeLocation?: boolean
}

export interface ResolvedConfig {
  days: number
  timezone: string
  emails: string[]
  includeLocation: boolean
  recurringTag: string
  /** File the settings were read from, if any */
  source?: string
}

/**
 * Locate the config file: explicit path, then $ICS_OUTLINE_CONFIG, then
 * ics-outline.yaml in the working directory.
 */
export function findConfigFile(
  explicitPath: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string | undefined {
  const requested = explicitPath ?? env[CONFIG_ENV_VAR]
  if (requested) {
    const resolved = path.resolve(cwd, requested)
    if (!existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`)
    }
    return resolved
  }

  const fallback = path.join(cwd, CONFIG_FILENAME)
  return existsSync(fallback) ? fallback : undefined
}

/**
 * Load and validate a YAML config file. An empty file is an empty config.
 */
export function loadConfigFile(configPath: string): ConfigFile {
  let raw: unknown
  try {
    raw = parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    throw new ConfigError(`Could not parse ${configPath}: ${describeError(err)}`)
  }

  const result = ConfigFileSchema.safeParse(raw ?? {})
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid config in ${configPath}: ${issues}`)
  }
  return result.data
}

export function assertValidTimezone(zone: string): void {
  if (!IANAZone.isValidZone(zone)) {
    throw new ConfigError(
      `Invalid timezone value ${zone}.\nUse --print-timezones to show acceptable values.`,
    )
  }
}

/**
 * Merge defaults, config file and command-line overrides, in that order.
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ResolvedConfig {
  const source = findConfigFile(overrides.configPath, env, cwd)
  const file = source ? loadConfigFile(source) : {}

  const timezone = overrides.timezone ?? file.timezone ?? localZone()
  assertValidTimezone(timezone)

  return {
    days: overrides.days ?? file.days ?? DEFAULT_DAYS,
    timezone,
    emails: [...(file.emails ?? []), ...(overrides.emails ?? [])],
    includeLocation: overrides.includeLocation ?? file.includeLocation ?? true,
    recurringTag: file.recurringTag ?? DEFAULT_RECURRING_TAG,
    source,
  }
}
