/**
 * Wire-level building blocks: framing, frame reading, request decoding and
 * stream I/O.
 *
 * @module
 */

export {
  encodeCountFrame,
  encodeFrame,
  encodeRequestFrames,
  encodeStringFrame,
  FrameSizeError,
  LENGTH_PREFIX_SIZE,
  MAX_PAYLOAD_SIZE,
  RECEIVE_BUFFER_CAPACITY,
  readFrameLength,
  type RequestFrame,
  STDIN_TERMINATOR
} from './frame.js'
export { FrameReader } from './frame-reader.js'
export { RequestDecoder, type TrampolineRequest } from './request-decoder.js'
export { drainOutput, StreamClosedError, StreamSink } from './sink.js'
export {
  ReadableStdinSource,
  type ReadableStdinSourceOptions,
  STDIN_GRACE_MS,
  type StdinSource
} from './stdin-source.js'
