/**
 * Non-blocking access to standard input.
 *
 * The trampoline must never hang waiting for input that will not come (a
 * caller may leave stdin attached to a terminal or an idle pipe). Instead of
 * flipping the descriptor into non-blocking mode, stdin is exposed as a
 * "try read" operation: it yields whatever is available, or `null` once the
 * stream has ended or nothing arrived within a short grace period.
 *
 * @module
 */
import type { Readable } from 'node:stream'

/**
 * Default time to wait for the next stdin chunk before treating input as
 * exhausted. A fresh pipe needs at least one event-loop turn before Node has
 * read anything from it, so a strict zero wait would miss piped input.
 */
export const STDIN_GRACE_MS = 50

/**
 * Source of stdin chunks.
 */
export interface StdinSource {
  /**
   * Read the next available chunk.
   *
   * @returns A non-empty chunk, or `null` when input is exhausted or nothing
   *   is available right now. Once `null` is returned, every later call
   *   returns `null` too.
   * @throws Error if the underlying stream fails
   */
  tryRead(): Promise<Buffer | null>
}

export interface ReadableStdinSourceOptions {
  /** Grace period per read, in milliseconds (defaults to STDIN_GRACE_MS) */
  readonly graceMs?: number
}

type WaitOutcome = 'readable' | 'end' | 'idle'

/**
 * StdinSource over a Node readable stream (normally `process.stdin`).
 *
 * A TTY is never read from: interactive input is not part of a forwarded
 * invocation.
 */
export class ReadableStdinSource implements StdinSource {
  private exhausted = false
  private failure: Error | undefined
  private readonly graceMs: number

  constructor(
    private readonly stream: Readable & { readonly isTTY?: boolean },
    options: ReadableStdinSourceOptions = {}
  ) {
    this.graceMs = options.graceMs ?? STDIN_GRACE_MS
    // Stays attached for the source's lifetime: an error between reads is
    // reported by the next tryRead(), or dropped once input is exhausted.
    this.stream.on('error', (err) => {
      this.failure ??= err
    })
  }

  async tryRead(): Promise<Buffer | null> {
    if (this.exhausted) return null

    if (this.stream.isTTY === true) {
      return this.finish()
    }

    for (;;) {
      const failure = this.failure ?? this.stream.errored
      if (failure) throw failure

      if (this.stream.readableEnded || this.stream.destroyed) {
        return this.finish()
      }

      const chunk: unknown = this.stream.read()
      if (chunk !== null) {
        const bytes = toBuffer(chunk)
        if (bytes.length > 0) return bytes
        continue
      }

      const outcome = await this.waitForInput()
      if (outcome !== 'readable') {
        return this.finish()
      }
    }
  }

  private finish(): null {
    this.exhausted = true
    return null
  }

  /** Wait for the stream to become readable, end, or stay quiet for graceMs. */
  private waitForInput(): Promise<WaitOutcome> {
    return new Promise((resolve, reject) => {
      let settled = false

      const settle = (fn: () => void) => {
        if (settled) return
        settled = true
        cleanup()
        fn()
      }

      const onReadable = () => settle(() => resolve('readable'))
      const onEnd = () => settle(() => resolve('end'))
      const onError = (err: Error) => settle(() => reject(err))
      const timer = setTimeout(() => settle(() => resolve('idle')), this.graceMs)

      const cleanup = () => {
        clearTimeout(timer)
        this.stream.off('readable', onReadable)
        this.stream.off('end', onEnd)
        this.stream.off('close', onEnd)
        this.stream.off('error', onError)
      }

      this.stream.on('readable', onReadable)
      this.stream.on('end', onEnd)
      this.stream.on('close', onEnd)
      this.stream.on('error', onError)
    })
  }
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk
  if (chunk instanceof Uint8Array) return Buffer.from(chunk)
  return Buffer.from(String(chunk), 'utf-8')
}
