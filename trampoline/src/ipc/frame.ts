/**
 * Trampoline wire framing.
 *
 * Frame structure:
 * - 2-byte length prefix (unsigned, little-endian)
 * - payload bytes
 *
 * Request layout (client → server), in this exact order:
 * 1. argument count, decimal ASCII
 * 2. one frame per positional argument
 * 3. filtered environment count, decimal ASCII
 * 4. one frame per filtered `NAME=VALUE` entry
 * 5. raw stdin bytes (unframed), then a single `0x00` terminator byte
 *
 * Response layout (server → client): two frames, captured stdout then
 * captured stderr.
 *
 * @remarks
 * The NUL handling is asymmetric and must stay that way for the existing
 * peer: request strings count their trailing NUL in the length prefix,
 * response payloads do not carry one at all.
 *
 * @module
 */

/**
 * Length prefix size in bytes.
 */
export const LENGTH_PREFIX_SIZE = 2

/**
 * Largest payload a 16-bit length prefix can describe.
 */
export const MAX_PAYLOAD_SIZE = 0xffff

/**
 * Default receive capacity for each response frame. A declared length above
 * this is a protocol violation.
 */
export const RECEIVE_BUFFER_CAPACITY = 4096

/**
 * Byte sent after the raw stdin segment to mark its end.
 */
export const STDIN_TERMINATOR = 0x00

/**
 * Error thrown when a payload does not fit the 16-bit length prefix.
 */
export class FrameSizeError extends Error {
  constructor(
    public readonly payloadSize: number,
    public readonly maxPayloadSize: number
  ) {
    super(`Payload size ${payloadSize} exceeds maximum ${maxPayloadSize}`)
    this.name = 'FrameSizeError'
  }
}

/**
 * Encode raw bytes into a framed buffer with length prefix.
 *
 * @throws FrameSizeError if payload exceeds MAX_PAYLOAD_SIZE
 */
export function encodeFrame(payload: Uint8Array): Buffer {
  if (payload.length > MAX_PAYLOAD_SIZE) {
    throw new FrameSizeError(payload.length, MAX_PAYLOAD_SIZE)
  }

  const frame = Buffer.allocUnsafe(LENGTH_PREFIX_SIZE + payload.length)
  frame.writeUInt16LE(payload.length, 0)
  frame.set(payload, LENGTH_PREFIX_SIZE)

  return frame
}

/**
 * Encode a request string. The trailing NUL is part of the payload and is
 * counted in the length prefix.
 */
export function encodeStringFrame(value: string): Buffer {
  return encodeFrame(Buffer.from(`${value}\0`, 'utf-8'))
}

/**
 * Encode a count as a decimal ASCII request string.
 */
export function encodeCountFrame(count: number): Buffer {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`count must be a non-negative integer, got ${count}`)
  }
  return encodeStringFrame(count.toString(10))
}

/**
 * Encode the framed part of a request (everything before the stdin segment).
 * Frames are returned in wire order so callers can report which one failed.
 */
export function encodeRequestFrames(
  args: readonly string[],
  env: readonly string[]
): RequestFrame[] {
  return [
    { label: 'number of arguments', frame: encodeCountFrame(args.length) },
    ...args.map((arg) => ({ label: 'argument', frame: encodeStringFrame(arg) })),
    { label: 'number of environment variables', frame: encodeCountFrame(env.length) },
    ...env.map((entry) => ({ label: 'environment variable', frame: encodeStringFrame(entry) }))
  ]
}

/**
 * One encoded request frame and a human-readable name for diagnostics.
 */
export interface RequestFrame {
  readonly label: string
  readonly frame: Buffer
}

/**
 * Read the declared payload length from the start of a buffer.
 * The caller must ensure at least LENGTH_PREFIX_SIZE bytes are present.
 */
export function readFrameLength(buffer: Buffer, offset = 0): number {
  return buffer.readUInt16LE(offset)
}
