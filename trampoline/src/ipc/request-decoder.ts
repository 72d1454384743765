/**
 * RequestDecoder: server-side parser for the trampoline request format.
 *
 * Bytes can be pushed in arbitrary chunks (down to one byte at a time). The
 * decoder walks the fixed request layout and yields the request once the
 * stdin terminator has arrived.
 *
 * @remarks
 * The stdin segment has no length: it runs up to the first `0x00` byte after
 * the environment frames. Input containing NUL bytes is therefore cut short
 * by the wire format itself.
 *
 * @module
 */
import { ProtocolError } from '../errors.js'
import { LENGTH_PREFIX_SIZE, readFrameLength, STDIN_TERMINATOR } from './frame.js'

/**
 * A fully decoded trampoline request.
 */
export interface TrampolineRequest {
  /** Positional arguments, program name excluded */
  readonly args: readonly string[]
  /** Allow-listed `NAME=VALUE` entries in the client's environment order */
  readonly env: readonly string[]
  /** Raw stdin bytes, terminator excluded */
  readonly stdin: Buffer
}

type Phase =
  | { readonly kind: 'arg-count' }
  | { readonly kind: 'args'; readonly remaining: number }
  | { readonly kind: 'env-count' }
  | { readonly kind: 'env'; readonly remaining: number }
  | { readonly kind: 'stdin' }
  | { readonly kind: 'complete' }

/**
 * Incremental decoder for a single request.
 */
export class RequestDecoder {
  private buffer: Buffer = Buffer.alloc(0)
  private phase: Phase = { kind: 'arg-count' }
  private readonly args: string[] = []
  private readonly env: string[] = []
  private readonly stdin: Buffer[] = []

  /**
   * True once the stdin terminator has been consumed.
   */
  get complete(): boolean {
    return this.phase.kind === 'complete'
  }

  /**
   * Feed bytes to the decoder.
   *
   * @returns The request once complete, otherwise undefined
   * @throws ProtocolError on malformed frames, or on data after completion
   */
  push(chunk: Uint8Array): TrampolineRequest | undefined {
    if (this.phase.kind === 'complete') {
      if (chunk.length === 0) return undefined
      throw new ProtocolError('Unexpected data after end of request')
    }

    this.buffer = Buffer.concat([this.buffer, chunk])

    for (;;) {
      const phase: Phase = this.phase
      switch (phase.kind) {
        case 'arg-count':
        case 'env-count': {
          const value = this.nextString()
          if (value === undefined) return undefined
          const count = parseCount(value)
          if (phase.kind === 'arg-count') {
            this.phase = count > 0 ? { kind: 'args', remaining: count } : { kind: 'env-count' }
          } else {
            this.phase = count > 0 ? { kind: 'env', remaining: count } : { kind: 'stdin' }
          }
          break
        }
        case 'args': {
          const value = this.nextString()
          if (value === undefined) return undefined
          this.args.push(value)
          this.phase =
            phase.remaining > 1 ? { kind: 'args', remaining: phase.remaining - 1 } : { kind: 'env-count' }
          break
        }
        case 'env': {
          const value = this.nextString()
          if (value === undefined) return undefined
          this.env.push(value)
          this.phase =
            phase.remaining > 1 ? { kind: 'env', remaining: phase.remaining - 1 } : { kind: 'stdin' }
          break
        }
        case 'stdin': {
          const terminator = this.buffer.indexOf(STDIN_TERMINATOR)
          if (terminator === -1) {
            this.stdin.push(this.buffer)
            this.buffer = Buffer.alloc(0)
            return undefined
          }
          this.stdin.push(this.buffer.subarray(0, terminator))
          const trailing = this.buffer.length - terminator - 1
          this.buffer = Buffer.alloc(0)
          this.phase = { kind: 'complete' }
          if (trailing > 0) {
            throw new ProtocolError('Unexpected data after end of request')
          }
          return {
            args: [...this.args],
            env: [...this.env],
            stdin: Buffer.concat(this.stdin)
          }
        }
        default:
          return undefined
      }
    }
  }

  /** Take one NUL-terminated string frame from the buffer, if complete. */
  private nextString(): string | undefined {
    if (this.buffer.length < LENGTH_PREFIX_SIZE) return undefined

    const length = readFrameLength(this.buffer)
    const frameEnd = LENGTH_PREFIX_SIZE + length
    if (this.buffer.length < frameEnd) return undefined

    const payload = this.buffer.subarray(LENGTH_PREFIX_SIZE, frameEnd)
    this.buffer = this.buffer.subarray(frameEnd)

    if (length === 0 || payload[length - 1] !== 0) {
      throw new ProtocolError('Request string is missing its NUL terminator')
    }
    return payload.subarray(0, length - 1).toString('utf-8')
  }
}

function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ProtocolError(`Invalid count in request: ${JSON.stringify(value)}`)
  }
  return Number.parseInt(value, 10)
}
