/**
 * Trampoline configuration, read from the process environment.
 *
 * Extracted from the CLI entrypoint so it can be tested without
 * triggering main() side-effects.
 *
 * @module
 */
import { DESKTOP_ENV_ALLOW_LIST } from './env-filter.js'
import { ConfigurationError } from './errors.js'

/** Loopback port the desktop host listens on (required). */
export const PORT_ENV_VAR = 'DESKTOP_PORT'

/** Set to `1` to print `[trampoline]` diagnostics to stderr. */
export const DEBUG_ENV_VAR = 'DESKTOP_TRAMPOLINE_DEBUG'

export interface TrampolineConfig {
  /** Server port on 127.0.0.1 */
  readonly port: number
  /** Whether diagnostic lines are written to stderr */
  readonly debug: boolean
  /** Environment variable names forwarded to the server */
  readonly allowList: readonly string[]
}

/**
 * Parse and validate configuration.
 *
 * @throws ConfigurationError if DESKTOP_PORT is missing or not a port number
 */
export function readTrampolineConfig(
  env: Readonly<Record<string, string | undefined>>
): TrampolineConfig {
  return {
    port: parsePort(env[PORT_ENV_VAR]),
    debug: env[DEBUG_ENV_VAR] === '1',
    allowList: DESKTOP_ENV_ALLOW_LIST
  }
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined) {
    throw new ConfigurationError(`Missing ${PORT_ENV_VAR} environment variable`)
  }

  const trimmed = raw.trim()
  const port = /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : Number.NaN
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(
      `Invalid ${PORT_ENV_VAR} environment variable ${JSON.stringify(raw)}: expected an integer between 1 and 65535`
    )
  }

  return port
}
