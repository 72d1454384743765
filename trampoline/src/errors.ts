/**
 * Error taxonomy for a trampoline invocation.
 *
 * Every failure is fatal to the invocation: there is no retry and no partial
 * success. Each error carries the step that failed so the CLI can print a
 * single diagnostic line and exit with status 1.
 *
 * @module
 */

/**
 * The step of an invocation an error was raised in.
 */
export type TrampolineStep = 'config' | 'connect' | 'send' | 'stdin' | 'receive' | 'output'

/**
 * Base class for all trampoline failures.
 */
export abstract class TrampolineError extends Error {
  constructor(
    public readonly step: TrampolineStep,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'TrampolineError'
  }
}

/**
 * Missing or invalid configuration (e.g. DESKTOP_PORT).
 */
export class ConfigurationError extends TrampolineError {
  constructor(message: string) {
    super('config', message)
    this.name = 'ConfigurationError'
  }
}

/**
 * The loopback connection could not be established.
 */
export class ConnectionError extends TrampolineError {
  constructor(
    public readonly port: number,
    options?: { cause?: unknown }
  ) {
    super('connect', `Couldn't connect to 127.0.0.1:${port}${causeSuffix(options?.cause)}`, options)
    this.name = 'ConnectionError'
  }
}

/**
 * The peer violated the wire protocol, e.g. a response frame declared a
 * length larger than the receiver's capacity.
 */
export class ProtocolError extends TrampolineError {
  constructor(message: string, step: TrampolineStep = 'receive') {
    super(step, message)
    this.name = 'ProtocolError'
  }
}

/**
 * A read or write failed on the socket or on a local stdio stream.
 */
export class IOError extends TrampolineError {
  constructor(step: TrampolineStep, message: string, options?: { cause?: unknown }) {
    super(step, `${message}${causeSuffix(options?.cause)}`, options)
    this.name = 'IOError'
  }
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message
  }
  return String(err)
}

function causeSuffix(cause: unknown): string {
  return cause === undefined ? '' : `: ${errorMessage(cause)}`
}
