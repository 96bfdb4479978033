/**
 * Unit Tests: Configuration
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'

import {
  CONFIG_ENV_VAR,
  findConfigFile,
  loadConfigFile,
  resolveConfig,
} from '../src/config.js'
import { ConfigError } from '../src/errors.js'

// -------------------------------------------------------------------
// Helpers
// -------------------------------------------------------------------

function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'ics-outline-config-'))
}

function writeFile(dir: string, name: string, content: string): string {
  const fullPath = path.join(dir, name)
  fs.writeFileSync(fullPath, content, 'utf-8')
  return fullPath
}

const FULL_CONFIG = [
  'days: 7',
  'timezone: Europe/Berlin',
  'emails:',
  '  - me@example.org',
  'includeLocation: false',
  "recurringTag: ':REPEAT:'",
  '',
].join('\n')

describe('config', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = createTempDir()
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  // -----------------------------------------------------------------
  // findConfigFile
  // -----------------------------------------------------------------

  describe('findConfigFile', () => {
    it('finds ics-outline.yaml in the working directory', () => {
      const file = writeFile(tempDir, 'ics-outline.yaml', FULL_CONFIG)

      expect(findConfigFile(undefined, {}, tempDir)).toBe(file)
    })

    it('returns undefined when there is none', () => {
      expect(findConfigFile(undefined, {}, tempDir)).toBeUndefined()
    })

    it('prefers the explicit path over the environment', () => {
      const explicit = writeFile(tempDir, 'explicit.yaml', '')
      writeFile(tempDir, 'from-env.yaml', '')

      const found = findConfigFile('explicit.yaml', { [CONFIG_ENV_VAR]: 'from-env.yaml' }, tempDir)

      expect(found).toBe(explicit)
    })

    it('uses the environment variable', () => {
      const file = writeFile(tempDir, 'from-env.yaml', '')

      expect(findConfigFile(undefined, { [CONFIG_ENV_VAR]: file }, tempDir)).toBe(file)
    })

    it('fails for a requested file that does not exist', () => {
      expect(() => findConfigFile('missing.yaml', {}, tempDir)).toThrow(
        `Config file not found: ${path.join(tempDir, 'missing.yaml')}`,
      )
    })
  })

  // -----------------------------------------------------------------
  // loadConfigFile
  // -----------------------------------------------------------------

  describe('loadConfigFile', () => {
    it('reads every setting', () => {
      const file = writeFile(tempDir, 'ics-outline.yaml', FULL_CONFIG)

      expect(loadConfigFile(file)).toEqual({
        days: 7,
        timezone: 'Europe/Berlin',
        emails: ['me@example.org'],
        includeLocation: false,
        recurringTag: ':REPEAT:',
      })
    })

    it('treats an empty file as an empty config', () => {
      const file = writeFile(tempDir, 'ics-outline.yaml', '')

      expect(loadConfigFile(file)).toEqual({})
    })

    it('rejects unknown keys', () => {
      const file = writeFile(tempDir, 'ics-outline.yaml', 'colour: blue\n')

      expect(() => loadConfigFile(file)).toThrow(ConfigError)
    })

    it('rejects a negative window', () => {
      const file = writeFile(tempDir, 'ics-outline.yaml', 'days: -3\n')

      expect(() => loadConfigFile(file)).toThrow(`Invalid config in ${file}: days:`)
    })

    it('rejects malformed YAML', () => {
      const file = writeFile(tempDir, 'ics-outline.yaml', 'days: [1, 2\n')

      expect(() => loadConfigFile(file)).toThrow(`Could not parse ${file}`)
    })
  })

  // -----------------------------------------------------------------
  // resolveConfig
  // -----------------------------------------------------------------

  describe('resolveConfig', () => {
    it('uses defaults without a config file', () => {
      const config = resolveConfig({ timezone: 'UTC' }, {}, tempDir)

      expect(config).toEqual({
        days: 90,
        timezone: 'UTC',
        emails: [],
        includeLocation: true,
        recurringTag: ':RECURRING:',
        source: undefined,
      })
    })

    it('reads the config file', () => {
      const file = writeFile(tempDir, 'ics-outline.yaml', FULL_CONFIG)

      expect(resolveConfig({}, {}, tempDir)).toEqual({
        days: 7,
        timezone: 'Europe/Berlin',
        emails: ['me@example.org'],
        includeLocation: false,
        recurringTag: ':REPEAT:',
        source: file,
      })
    })

    it('lets flags override the file and adds their emails', () => {
      writeFile(tempDir, 'ics-outline.yaml', FULL_CONFIG)

      const config = resolveConfig(
        {
          days: 3,
          timezone: 'Asia/Tokyo',
          emails: ['work@example.org'],
          includeLocation: true,
        },
        {},
        tempDir,
      )

      expect(config.days).toBe(3)
      expect(config.timezone).toBe('Asia/Tokyo')
      expect(config.emails).toEqual(['me@example.org', 'work@example.org'])
      expect(config.includeLocation).toBe(true)
    })

    it('rejects an unknown timezone', () => {
      expect(() => resolveConfig({ timezone: 'Mars/Olympus' }, {}, tempDir)).toThrow(
        'Invalid timezone value Mars/Olympus.\nUse --print-timezones to show acceptable values.',
      )
    })
  })
})
