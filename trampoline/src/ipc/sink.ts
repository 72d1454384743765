/**
 * StreamSink: writes bytes to a writable stream with backpressure.
 *
 * Used for both directions of local output: request frames and stdin bytes
 * go to the socket, response payloads go to the process's stdout/stderr.
 * A write resolves once the stream has accepted the whole buffer, so a
 * frame is never partially delivered without an error being raised.
 *
 * @remarks
 * **Single-writer assumption**: calls must be awaited in sequence.
 *
 * @module
 */
import type { Writable } from 'node:stream'

/**
 * Error thrown when the output stream is closed or finished unexpectedly.
 */
export class StreamClosedError extends Error {
  constructor(reason: 'destroyed' | 'ended' | 'close' | 'finish') {
    super(`Output stream unavailable: ${reason}`)
    this.name = 'StreamClosedError'
  }
}

/**
 * Write a buffer to a stream with backpressure handling.
 * Resolves only from a single code path to avoid double-resolution.
 *
 * @returns Promise that resolves when data is accepted by the stream
 * @throws StreamClosedError if the stream is closed/finished
 * @throws Error if the stream emits an error
 */
function writeWithBackpressure(stream: Writable, data: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    if (stream.destroyed) {
      reject(new StreamClosedError('destroyed'))
      return
    }
    if (stream.writableEnded || stream.writableFinished) {
      reject(new StreamClosedError('ended'))
      return
    }

    let settled = false

    const settle = (fn: () => void) => {
      if (settled) return
      settled = true
      cleanup()
      fn()
    }

    const onError = (err: Error) => settle(() => reject(err))
    const onClose = () => settle(() => reject(new StreamClosedError('close')))
    const onFinish = () => settle(() => reject(new StreamClosedError('finish')))
    const onDrain = () => settle(() => resolve())

    const cleanup = () => {
      stream.off('error', onError)
      stream.off('close', onClose)
      stream.off('finish', onFinish)
      stream.off('drain', onDrain)
    }

    // Attach listeners before write to catch synchronous errors
    stream.on('error', onError)
    stream.on('close', onClose)
    stream.on('finish', onFinish)

    const canContinue = stream.write(data)

    if (canContinue) {
      // Resolve on next tick so a synchronous error from write() wins
      setImmediate(() => settle(() => resolve()))
    } else {
      stream.on('drain', onDrain)
    }
  })
}

/**
 * End a writable stream and wait until everything buffered has been handed
 * to the OS. Without this, `process.exit()` can drop relayed output still
 * sitting in Node's internal buffer.
 */
export function drainOutput(stream: Writable): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (stream.writableFinished || stream.destroyed) {
      resolve()
      return
    }
    const onError = (err: Error): void => {
      cleanup()
      reject(err)
    }
    const cleanup = (): void => {
      stream.off('error', onError)
    }
    stream.on('error', onError)
    stream.end(() => {
      cleanup()
      resolve()
    })
  })
}

/**
 * Sequential, backpressure-aware writer over a single stream.
 */
export class StreamSink {
  private written = 0

  constructor(private readonly output: Writable) {}

  /**
   * Total bytes accepted by the stream so far.
   */
  get bytesWritten(): number {
    return this.written
  }

  /**
   * Write bytes verbatim. Empty buffers are accepted and write nothing.
   */
  async write(data: Uint8Array): Promise<void> {
    if (data.length === 0) return
    await writeWithBackpressure(this.output, data)
    this.written += data.length
  }
}
