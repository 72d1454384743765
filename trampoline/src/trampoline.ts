/**
 * Program body of the trampoline CLI.
 *
 * Kept apart from the bin entrypoint so it can run in-process with fake
 * stdio streams.
 *
 * Exit codes:
 * - 0: round trip completed
 * - 1: configuration, connection, protocol or I/O failure
 *
 * @module
 */
import type { Readable, Writable } from 'node:stream'
import { readTrampolineConfig } from './config.js'
import type { Connector } from './connect.js'
import { createDiagnostics } from './diagnostics.js'
import { createEnvFilter, environmentEntries } from './env-filter.js'
import { errorMessage } from './errors.js'
import { ReadableStdinSource } from './ipc/stdin-source.js'
import { TrampolineSession } from './session.js'

export const EXIT_SUCCESS = 0
export const EXIT_FAILURE = 1

export type ExitCode = typeof EXIT_SUCCESS | typeof EXIT_FAILURE

export interface TrampolineInvocation {
  /** Positional arguments, program name excluded */
  readonly args: readonly string[]
  readonly env: Readonly<Record<string, string | undefined>>
  readonly stdin: Readable & { readonly isTTY?: boolean }
  readonly stdout: Writable
  readonly stderr: Writable
  /** Stdin grace period override, in milliseconds */
  readonly stdinGraceMs?: number
  /** Network collaborator override */
  readonly connect?: Connector
}

/**
 * Forward one invocation to the desktop host and relay its output.
 * Never throws: every failure becomes one `ERROR:` line and exit code 1.
 */
export async function runTrampoline(invocation: TrampolineInvocation): Promise<ExitCode> {
  const { stderr } = invocation

  try {
    const config = readTrampolineConfig(invocation.env)
    const diagnostics = createDiagnostics(stderr, config.debug)

    const filterEnv = createEnvFilter(config.allowList)
    const env = filterEnv(environmentEntries(invocation.env))
    diagnostics.debug(
      `forwarding ${invocation.args.length} argument(s) and ${env.length} environment variable(s) to port ${config.port}`
    )

    const session = new TrampolineSession({
      port: config.port,
      args: invocation.args,
      env,
      stdin: new ReadableStdinSource(invocation.stdin, { graceMs: invocation.stdinGraceMs }),
      stdout: invocation.stdout,
      stderr,
      connect: invocation.connect,
      onTransition: (from, to) => diagnostics.debug(`session ${from} -> ${to}`)
    })

    const result = await session.run()
    diagnostics.debug(
      `done: sent ${result.stdinBytes} stdin byte(s), received ${result.stdoutBytes} stdout and ${result.stderrBytes} stderr byte(s)`
    )
    return EXIT_SUCCESS
  } catch (err) {
    stderr.write(`ERROR: ${errorMessage(err)}\n`)
    return EXIT_FAILURE
  }
}
