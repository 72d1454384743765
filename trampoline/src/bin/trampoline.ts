#!/usr/bin/env node
/**
 * CLI entrypoint for the desktop trampoline.
 *
 * Usage:
 *   desktop-trampoline [args...]
 *
 * Arguments, allow-listed DESKTOP_* environment variables and stdin are
 * forwarded to the desktop host on 127.0.0.1:$DESKTOP_PORT. The host's
 * captured stdout and stderr are written to this process's stdout and
 * stderr unchanged.
 *
 * Exit codes:
 * - 0: Round trip completed
 * - 1: Any configuration, connection, protocol or I/O failure
 *
 * @module
 */
import { errorMessage } from '../errors.js'
import { drainOutput } from '../ipc/sink.js'
import { EXIT_FAILURE, runTrampoline } from '../trampoline.js'

/**
 * Main entry point.
 */
async function main(): Promise<never> {
  const code = await runTrampoline({
    args: process.argv.slice(2),
    env: process.env,
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr
  })

  // Flush relayed output before exiting
  await Promise.all([drainOutput(process.stdout), drainOutput(process.stderr)])
  process.exit(code)
}

main().catch((err) => {
  if (process.stderr.writable) {
    process.stderr.write(`Unexpected error: ${errorMessage(err)}\n`)
  }
  process.exit(EXIT_FAILURE)
})
