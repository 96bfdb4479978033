/**
 * CLI runner
 *
 * Everything the ics-outline binary does, with its I/O passed in so it can
 * be driven from tests.
 */

import * as path from 'node:path'
import { readFile, writeFile } from 'node:fs/promises'
import { resolveConfig } from '../config.js'
import { Converter } from '../converter.js'
import { IcsOutlineError, describeError } from '../errors.js'
import type { TextSink } from '../outline/writer.js'
import { USAGE, parseArgs } from './args.js'

export interface CliIO {
  stdin: AsyncIterable<string | Buffer>
  stdout: TextSink
  stderr: TextSink
  env: NodeJS.ProcessEnv
  cwd: string
}

/** Every IANA zone the runtime knows, plus UTC */
export function listTimezones(): string[] {
  const zones = new Set(Intl.supportedValuesOf('timeZone'))
  zones.add('UTC')
  return [...zones].sort()
}

async function readInput(source: string, io: CliIO): Promise<string> {
  if (source === '-') {
    const chunks: Buffer[] = []
    for await (const chunk of io.stdin) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk)
    }
    return Buffer.concat(chunks).toString('utf-8')
  }
  return readFile(path.resolve(io.cwd, source), 'utf-8')
}

async function writeOutput(target: string, text: string, io: CliIO): Promise<void> {
  if (target === '-') {
    io.stdout.write(text)
    return
  }
  await writeFile(path.resolve(io.cwd, target), text, 'utf-8')
}

/**
 * Run the CLI. Resolves to the process exit code.
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  try {
    const args = parseArgs(argv)

    if (args.help) {
      io.stdout.write(USAGE.trimStart())
      return 0
    }

    if (args.printTimezones) {
      io.stdout.write(listTimezones().join('\n') + '\n')
      return 0
    }

    if (!args.input || !args.output) {
      io.stderr.write(`Error: Missing argument '${args.input ? 'ORG_FILE' : 'ICS_FILE'}'.\n`)
      io.stderr.write(USAGE.trimStart())
      return 2
    }

    const config = resolveConfig(args, io.env, io.cwd)
    const converter = new Converter({
      ...config,
      logger: { warn: (...data: unknown[]) => io.stderr.write(`${data.join(' ')}\n`) },
    })

    const ics = await readInput(args.input, io)
    const chunks: string[] = []
    converter.convert(ics, { write: (chunk: string) => chunks.push(chunk) })
    await writeOutput(args.output, chunks.join(''), io)
    return 0
  } catch (err) {
    if (err instanceof IcsOutlineError) {
      io.stderr.write(`Error: ${err.message}\n`)
      return 1
    }
    if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
      // fs errors: ENOENT, EACCES, ...
      io.stderr.write(`Error: ${describeError(err)}\n`)
      return 1
    }
    throw err
  }
}
