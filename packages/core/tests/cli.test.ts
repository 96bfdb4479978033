/**
 * Integration Tests: CLI runner
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'

import { listTimezones, runCli, type CliIO } from '../src/cli/run.js'

// -------------------------------------------------------------------
// Helpers
// -------------------------------------------------------------------

const ICS = [
  'BEGIN:VCALENDAR',
  'VERSION:2.0',
  'PRODID:-//ics-outline//tests//EN',
  'BEGIN:VEVENT',
  'UID:cli-1',
  'DTSTART:20240110T090000Z',
  'DTEND:20240110T100000Z',
  'SUMMARY:Dentist',
  'END:VEVENT',
  'END:VCALENDAR',
  '',
].join('\r\n')

// Wide enough to reach January 2024 from any current date
const WIDE = ['-t', 'UTC', '-d', '36500']

async function* chunksOf(...chunks: string[]): AsyncGenerator<string> {
  yield* chunks
}

function createIO(cwd: string, stdin: string[] = []) {
  const stdout: string[] = []
  const stderr: string[] = []
  const io: CliIO = {
    stdin: chunksOf(...stdin),
    stdout: { write: (chunk: string) => stdout.push(chunk) },
    stderr: { write: (chunk: string) => stderr.push(chunk) },
    env: {},
    cwd,
  }
  return { io, stdout, stderr }
}

describe('runCli', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ics-outline-cli-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('converts a file into a file', async () => {
    fs.writeFileSync(path.join(tempDir, 'in.ics'), ICS, 'utf-8')
    const { io, stderr } = createIO(tempDir)

    const code = await runCli([...WIDE, 'in.ics', 'out.org'], io)

    expect(code).toBe(0)
    expect(stderr).toEqual([])
    const output = fs.readFileSync(path.join(tempDir, 'out.org'), 'utf-8')
    expect(output.split('\n')[0]).toBe('* Dentist')
    expect(output).toContain('  <2024-01-10 Wed 09:00>--<2024-01-10 Wed 10:00>\n')
  })

  it('reads stdin and writes stdout for "-"', async () => {
    const half = Math.floor(ICS.length / 2)
    const { io, stdout } = createIO(tempDir, [ICS.slice(0, half), ICS.slice(half)])

    const code = await runCli([...WIDE, '-', '-'], io)

    expect(code).toBe(0)
    expect(stdout.join('').split('\n')[0]).toBe('* Dentist')
  })

  it('prints usage for --help', async () => {
    const { io, stdout } = createIO(tempDir)

    expect(await runCli(['--help'], io)).toBe(0)
    expect(stdout.join('').startsWith('Usage: ics-outline [options] <ics_file> <org_file>')).toBe(
      true,
    )
  })

  it('prints the known timezones', async () => {
    const { io, stdout } = createIO(tempDir)

    expect(await runCli(['--print-timezones'], io)).toBe(0)
    const zones = stdout.join('').trimEnd().split('\n')
    expect(zones).toContain('Europe/Berlin')
    expect(zones).toContain('UTC')
    expect(zones).toEqual(listTimezones())
  })

  it('exits with 2 when a file argument is missing', async () => {
    const { io, stderr } = createIO(tempDir)

    expect(await runCli(['in.ics'], io)).toBe(2)
    expect(stderr[0]).toBe("Error: Missing argument 'ORG_FILE'.\n")
  })

  it('exits with 1 for an invalid timezone', async () => {
    const { io, stderr } = createIO(tempDir)

    expect(await runCli(['-t', 'Mars/Olympus', 'in.ics', 'out.org'], io)).toBe(1)
    expect(stderr).toEqual([
      'Error: Invalid timezone value Mars/Olympus.\nUse --print-timezones to show acceptable values.\n',
    ])
  })

  it('exits with 1 for an unreadable calendar', async () => {
    fs.writeFileSync(path.join(tempDir, 'in.ics'), 'not a calendar', 'utf-8')
    const { io, stderr } = createIO(tempDir)

    expect(await runCli([...WIDE, 'in.ics', 'out.org'], io)).toBe(1)
    expect(stderr.join('').startsWith('Error: Parsing error: ')).toBe(true)
    expect(fs.existsSync(path.join(tempDir, 'out.org'))).toBe(false)
  })

  it('exits with 1 when the input file does not exist', async () => {
    const { io, stderr } = createIO(tempDir)

    expect(await runCli([...WIDE, 'missing.ics', 'out.org'], io)).toBe(1)
    expect(stderr.join('').startsWith('Error: ENOENT')).toBe(true)
  })

  it('reads settings from the config file in the working directory', async () => {
    fs.writeFileSync(path.join(tempDir, 'in.ics'), ICS, 'utf-8')
    fs.writeFileSync(
      path.join(tempDir, 'ics-outline.yaml'),
      'timezone: Asia/Tokyo\ndays: 36500\n',
      'utf-8',
    )
    const { io } = createIO(tempDir)

    expect(await runCli(['in.ics', 'out.org'], io)).toBe(0)
    const output = fs.readFileSync(path.join(tempDir, 'out.org'), 'utf-8')
    expect(output).toContain(':DTSTART: 2024-01-10 18:00\n')
  })
})
