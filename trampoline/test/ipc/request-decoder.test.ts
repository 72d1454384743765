/**
 * Tests for the server-side request decoder.
 *
 * Goal: Whatever the client encodes, the reference peer decodes to the same
 * arguments, environment and stdin, regardless of how the bytes are chunked.
 */
import * as fc from 'fast-check'
import { describe, expect, it } from 'vitest'
import { ProtocolError } from '../../src/errors.js'
import {
  encodeCountFrame,
  encodeFrame,
  encodeRequestFrames,
  encodeStringFrame,
  STDIN_TERMINATOR
} from '../../src/ipc/frame.js'
import { RequestDecoder, type TrampolineRequest } from '../../src/ipc/request-decoder.js'

/** Encode a complete request the way the client puts it on the wire. */
function encodeRequest(args: readonly string[], env: readonly string[], stdin: Uint8Array): Buffer {
  return Buffer.concat([
    ...encodeRequestFrames(args, env).map((f) => f.frame),
    stdin,
    Buffer.of(STDIN_TERMINATOR)
  ])
}

describe('RequestDecoder', () => {
  it('decodes a complete request pushed at once', () => {
    const decoder = new RequestDecoder()
    const request = decoder.push(
      encodeRequest(['trampoline', 'status'], ['DESKTOP_USERNAME=alice'], Buffer.from('input\n'))
    )

    expect(request).toEqual({
      args: ['trampoline', 'status'],
      env: ['DESKTOP_USERNAME=alice'],
      stdin: Buffer.from('input\n')
    })
    expect(decoder.complete).toBe(true)
  })

  it('decodes a request pushed one byte at a time', () => {
    const bytes = encodeRequest(['get'], ['DESKTOP_ENDPOINT=https://example.test'], Buffer.from('x'))
    const decoder = new RequestDecoder()

    for (let i = 0; i < bytes.length - 1; i++) {
      expect(decoder.push(bytes.subarray(i, i + 1))).toBeUndefined()
    }
    const request = decoder.push(bytes.subarray(bytes.length - 1))

    expect(request).toEqual({
      args: ['get'],
      env: ['DESKTOP_ENDPOINT=https://example.test'],
      stdin: Buffer.from('x')
    })
  })

  it('decodes an empty request with no stdin', () => {
    const request = new RequestDecoder().push(
      Buffer.concat([encodeCountFrame(0), encodeCountFrame(0), Buffer.of(0)])
    )

    expect(request).toEqual({ args: [], env: [], stdin: Buffer.alloc(0) })
  })

  it('keeps empty-string arguments', () => {
    const request = new RequestDecoder().push(encodeRequest(['', 'b'], [], new Uint8Array(0)))

    expect(request?.args).toEqual(['', 'b'])
  })

  it('rejects a non-numeric count', () => {
    const decoder = new RequestDecoder()

    expect(() => decoder.push(encodeStringFrame('two'))).toThrow(ProtocolError)
    expect(() => new RequestDecoder().push(encodeStringFrame('two'))).toThrow(
      'Invalid count in request: "two"'
    )
  })

  it('rejects a string frame without its NUL terminator', () => {
    expect(() => new RequestDecoder().push(encodeFrame(Buffer.from('1')))).toThrow(
      'Request string is missing its NUL terminator'
    )
  })

  it('rejects data after the stdin terminator', () => {
    const decoder = new RequestDecoder()
    const bytes = Buffer.concat([encodeRequest([], [], new Uint8Array(0)), Buffer.from('extra')])

    expect(() => decoder.push(bytes)).toThrow('Unexpected data after end of request')
  })

  it('rejects pushes after completion', () => {
    const decoder = new RequestDecoder()
    decoder.push(encodeRequest([], [], new Uint8Array(0)))

    expect(() => decoder.push(Buffer.from('x'))).toThrow('Unexpected data after end of request')
  })

  it('round-trips arbitrary requests in arbitrary chunk sizes', () => {
    const stdinArb = fc
      .uint8Array({ maxLength: 64 })
      .map((bytes) => bytes.map((b) => (b === STDIN_TERMINATOR ? 1 : b)))
    const envArb = fc
      .tuple(fc.constantFrom('DESKTOP_USERNAME', 'DESKTOP_ENDPOINT'), fc.string())
      .map(([name, value]) => `${name}=${value}`)

    fc.assert(
      fc.property(
        fc.array(fc.string()),
        fc.array(envArb, { maxLength: 4 }),
        stdinArb,
        fc.integer({ min: 1, max: 7 }),
        (args, env, stdin, chunkSize) => {
          const bytes = encodeRequest(args, env, stdin)
          const decoder = new RequestDecoder()

          let request: TrampolineRequest | undefined
          for (let offset = 0; offset < bytes.length; offset += chunkSize) {
            request = decoder.push(bytes.subarray(offset, offset + chunkSize))
          }

          expect(request).toEqual({ args, env, stdin: Buffer.from(stdin) })
        }
      )
    )
  })
})
