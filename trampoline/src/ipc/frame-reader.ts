/**
 * FrameReader: reads length-prefixed response frames from the socket.
 *
 * Socket data arrives in arbitrary chunks. The reader buffers it and hands
 * out one frame at a time, accumulating partial reads until the declared
 * length is satisfied or the peer ends the stream.
 *
 * @module
 */
import type { Readable } from 'node:stream'
import { IOError, ProtocolError } from '../errors.js'
import { LENGTH_PREFIX_SIZE, RECEIVE_BUFFER_CAPACITY, readFrameLength } from './frame.js'

/**
 * FrameReader reads response frames from a readable stream.
 *
 * Lifecycle:
 * 1. Construct with a readable stream (the socket)
 * 2. Call start() before any data can arrive
 * 3. Call readFrame() once per expected frame, sequentially
 * 4. Call stop() when done
 */
export class FrameReader {
  private buffer: Buffer = Buffer.alloc(0)
  private ended = false
  private failure: Error | undefined
  private wake: (() => void) | undefined
  private readonly stream: Readable

  constructor(stream: Readable) {
    this.stream = stream
  }

  /**
   * Attach data/end/error listeners.
   */
  start(): void {
    this.stream.on('data', this.onData)
    this.stream.on('end', this.onEnd)
    this.stream.on('close', this.onEnd)
    this.stream.on('error', this.onError)
  }

  /**
   * Detach listeners. The error listener stays attached so a late socket
   * error cannot surface as an uncaught exception.
   */
  stop(): void {
    this.stream.removeListener('data', this.onData)
    this.stream.removeListener('end', this.onEnd)
    this.stream.removeListener('close', this.onEnd)
    this.ended = true
    this.notify()
  }

  /**
   * Number of bytes received but not yet handed out.
   */
  get buffered(): number {
    return this.buffer.length
  }

  /**
   * Read one frame.
   *
   * @param capacity - Largest payload the caller accepts
   * @returns The payload. Shorter than declared only if the peer ended the
   *   stream mid-payload.
   * @throws ProtocolError if the declared length exceeds `capacity`
   * @throws IOError if the stream errors or ends before the length prefix
   */
  async readFrame(capacity: number = RECEIVE_BUFFER_CAPACITY): Promise<Buffer> {
    await this.fill(LENGTH_PREFIX_SIZE)
    if (this.buffer.length < LENGTH_PREFIX_SIZE) {
      throw this.shortReadError('Connection closed before frame length was received')
    }

    const length = readFrameLength(this.buffer)
    if (length > capacity) {
      throw new ProtocolError(`Received string is bigger than buffer (${length} > ${capacity})`)
    }

    const frameEnd = LENGTH_PREFIX_SIZE + length
    await this.fill(frameEnd)
    if (this.buffer.length < frameEnd && this.failure) {
      throw this.shortReadError('Error reading from socket')
    }

    const end = Math.min(frameEnd, this.buffer.length)
    const payload = Buffer.from(this.buffer.subarray(LENGTH_PREFIX_SIZE, end))
    this.buffer = this.buffer.subarray(end)

    return payload
  }

  /** Wait until `size` bytes are buffered or no more can arrive. */
  private async fill(size: number): Promise<void> {
    while (this.buffer.length < size && !this.ended) {
      await new Promise<void>((resolve) => {
        this.wake = resolve
      })
    }
  }

  private shortReadError(message: string): IOError {
    return new IOError('receive', message, this.failure ? { cause: this.failure } : undefined)
  }

  private notify(): void {
    const wake = this.wake
    this.wake = undefined
    wake?.()
  }

  private readonly onData = (chunk: Buffer): void => {
    this.buffer = Buffer.concat([this.buffer, chunk])
    this.notify()
  }

  private readonly onEnd = (): void => {
    this.ended = true
    this.notify()
  }

  private readonly onError = (err: Error): void => {
    this.failure ??= err
    this.ended = true
    this.notify()
  }
}
