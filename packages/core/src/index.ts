#!/usr/bin/env node
import { runCli } from './cli/run.js'

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    cwd: process.cwd(),
  })
}

main().catch((err) => {
  console.error('Fatal error:', err)
  process.exit(1)
})
