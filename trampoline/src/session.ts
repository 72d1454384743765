/**
 * TrampolineSession: one request/response round trip with the desktop host.
 *
 * The session owns its socket for its whole life and walks a strictly linear
 * state machine:
 *
 *   start → connected → request_sent → stdin_streamed
 *         → stdout_received → stderr_received → done
 *
 * Any failure moves it to `error` and is rethrown as a TrampolineError. The
 * socket is destroyed on every exit path. Nothing is retried.
 *
 * @module
 */
import type { Socket } from 'node:net'
import type { Writable } from 'node:stream'
import { type Connector, connectLoopback } from './connect.js'
import { ConnectionError, errorMessage, IOError, ProtocolError, TrampolineError } from './errors.js'
import {
  encodeRequestFrames,
  RECEIVE_BUFFER_CAPACITY,
  type RequestFrame,
  STDIN_TERMINATOR
} from './ipc/frame.js'
import { FrameReader } from './ipc/frame-reader.js'
import { StreamSink } from './ipc/sink.js'
import type { StdinSource } from './ipc/stdin-source.js'

export type SessionState =
  | 'start'
  | 'connected'
  | 'request_sent'
  | 'stdin_streamed'
  | 'stdout_received'
  | 'stderr_received'
  | 'done'
  | 'error'

export interface SessionOptions {
  /** Server port on 127.0.0.1 */
  readonly port: number
  /** Positional arguments, program name excluded */
  readonly args: readonly string[]
  /** Already-filtered `NAME=VALUE` entries */
  readonly env: readonly string[]
  readonly stdin: StdinSource
  /** Sink for the server's captured stdout */
  readonly stdout: Writable
  /** Sink for the server's captured stderr */
  readonly stderr: Writable
  /** Largest response frame accepted (defaults to RECEIVE_BUFFER_CAPACITY) */
  readonly receiveCapacity?: number
  /** Network collaborator (defaults to connectLoopback) */
  readonly connect?: Connector
  /** Called after every state change */
  readonly onTransition?: (from: SessionState, to: SessionState) => void
}

/**
 * Byte counts of a completed round trip.
 */
export interface SessionResult {
  readonly stdinBytes: number
  readonly stdoutBytes: number
  readonly stderrBytes: number
}

export class TrampolineSession {
  private current: SessionState = 'start'

  constructor(private readonly options: SessionOptions) {}

  get state(): SessionState {
    return this.current
  }

  /**
   * Run the round trip.
   *
   * @throws ConnectionError, ProtocolError or IOError
   * @throws Error if called more than once
   */
  async run(): Promise<SessionResult> {
    if (this.current !== 'start') {
      throw new Error('TrampolineSession.run() may only be called once')
    }

    let socket: Socket | undefined
    let reader: FrameReader | undefined

    try {
      socket = await this.openSocket()
      reader = new FrameReader(socket)
      reader.start()
      this.transition('connected')

      const output = new StreamSink(socket)
      await this.sendRequest(output)
      this.transition('request_sent')

      const stdinBytes = await this.streamStdin(output)
      this.transition('stdin_streamed')

      const stdoutBytes = await this.relayFrame(reader, this.options.stdout, 'stdout')
      this.transition('stdout_received')

      const stderrBytes = await this.relayFrame(reader, this.options.stderr, 'stderr')
      this.transition('stderr_received')

      reader.stop()
      socket.destroy()
      this.transition('done')

      return { stdinBytes, stdoutBytes, stderrBytes }
    } catch (err) {
      this.transition('error')
      throw err
    } finally {
      reader?.stop()
      socket?.destroy()
    }
  }

  private transition(to: SessionState): void {
    const from = this.current
    this.current = to
    this.options.onTransition?.(from, to)
  }

  private async openSocket(): Promise<Socket> {
    const connect = this.options.connect ?? connectLoopback
    try {
      return await connect(this.options.port)
    } catch (err) {
      if (err instanceof TrampolineError) throw err
      throw new ConnectionError(this.options.port, { cause: err })
    }
  }

  private async sendRequest(output: StreamSink): Promise<void> {
    let frames: RequestFrame[]
    try {
      frames = encodeRequestFrames(this.options.args, this.options.env)
    } catch (err) {
      throw new ProtocolError(`Couldn't encode request: ${errorMessage(err)}`, 'send')
    }

    for (const { label, frame } of frames) {
      try {
        await output.write(frame)
      } catch (err) {
        throw new IOError('send', `Couldn't send ${label}`, { cause: err })
      }
    }
  }

  /**
   * Forward stdin unframed, then the terminator byte.
   * A read error before any byte was forwarded means "no stdin".
   */
  private async streamStdin(output: StreamSink): Promise<number> {
    let forwarded = 0

    for (;;) {
      let chunk: Buffer | null
      try {
        chunk = await this.options.stdin.tryRead()
      } catch (err) {
        if (forwarded === 0) break
        throw new IOError('stdin', 'Error reading stdin data', { cause: err })
      }
      if (chunk === null) break

      try {
        await output.write(chunk)
      } catch (err) {
        throw new IOError('send', "Couldn't send stdin data", { cause: err })
      }
      forwarded += chunk.length
    }

    try {
      await output.write(Buffer.of(STDIN_TERMINATOR))
    } catch (err) {
      throw new IOError('send', "Couldn't send end of stdin", { cause: err })
    }

    return forwarded
  }

  /** Read one response frame and copy it verbatim to `target`. */
  private async relayFrame(
    reader: FrameReader,
    target: Writable,
    name: 'stdout' | 'stderr'
  ): Promise<number> {
    let payload: Buffer
    try {
      payload = await reader.readFrame(this.options.receiveCapacity ?? RECEIVE_BUFFER_CAPACITY)
    } catch (err) {
      if (err instanceof ProtocolError) {
        throw new ProtocolError(`Couldn't read ${name} from socket: ${err.message}`)
      }
      throw new IOError('receive', `Couldn't read ${name} from socket`, { cause: err })
    }

    try {
      await new StreamSink(target).write(payload)
    } catch (err) {
      throw new IOError('output', `Couldn't write ${name}`, { cause: err })
    }

    return payload.length
  }
}
