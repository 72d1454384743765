/**
 * Diagnostic output on stderr.
 *
 * Stdout and stderr carry the server's relayed output, so diagnostics are
 * off unless explicitly enabled, and always carry the `[trampoline]` prefix.
 *
 * @module
 */
import type { Writable } from 'node:stream'

export interface Diagnostics {
  /** Write a diagnostic line when enabled. */
  debug(message: string): void
}

/**
 * Create a diagnostics writer over `output`.
 */
export function createDiagnostics(output: Writable, enabled: boolean): Diagnostics {
  return {
    debug(message) {
      if (!enabled) return
      output.write(`[trampoline] ${message}\n`)
    }
  }
}
