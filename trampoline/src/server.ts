/**
 * TrampolineServer: loopback peer for the trampoline client.
 *
 * Accepts one request per connection, hands it to a handler, and answers
 * with the two response frames (captured stdout, then captured stderr).
 * Response lengths never include a NUL terminator.
 *
 * Hosts embed this to serve trampoline invocations; the test suite uses it
 * as the reference peer.
 *
 * @module
 */
import { createServer, type Server, type Socket } from 'node:net'
import { LOOPBACK_HOST } from './connect.js'
import { errorMessage } from './errors.js'
import { encodeFrame } from './ipc/frame.js'
import { RequestDecoder, type TrampolineRequest } from './ipc/request-decoder.js'

/**
 * Output captured for one invocation. Missing streams are sent empty.
 */
export interface TrampolineResponse {
  readonly stdout?: string | Uint8Array
  readonly stderr?: string | Uint8Array
}

export type TrampolineHandler = (
  request: TrampolineRequest
) => TrampolineResponse | Promise<TrampolineResponse>

export interface TrampolineServerOptions {
  /**
   * Called for connection-level failures (malformed request, oversize
   * response, socket error). Defaults to a `[trampoline]` line on stderr.
   */
  readonly onError?: (err: Error) => void
}

export class TrampolineServer {
  private readonly server: Server
  private readonly sockets = new Set<Socket>()
  private readonly onError: (err: Error) => void

  constructor(
    private readonly handler: TrampolineHandler,
    options: TrampolineServerOptions = {}
  ) {
    this.onError =
      options.onError ??
      ((err) => {
        process.stderr.write(`[trampoline] server: ${err.message}\n`)
      })
    this.server = createServer((socket) => this.accept(socket))
  }

  /**
   * Start listening on 127.0.0.1.
   *
   * @param port - Port to bind, 0 for an ephemeral one
   * @returns The bound port
   */
  listen(port = 0): Promise<number> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err)
      this.server.once('error', onError)
      this.server.listen(port, LOOPBACK_HOST, () => {
        this.server.off('error', onError)
        const address = this.server.address()
        if (address === null || typeof address === 'string') {
          reject(new Error('server is not bound to a TCP port'))
          return
        }
        resolve(address.port)
      })
    })
  }

  /**
   * Stop accepting connections and drop any still open.
   */
  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      for (const socket of this.sockets) {
        socket.destroy()
      }
      this.sockets.clear()
      this.server.close((err) => {
        if (err) {
          reject(err)
          return
        }
        resolve()
      })
    })
  }

  private accept(socket: Socket): void {
    this.sockets.add(socket)
    const decoder = new RequestDecoder()

    const onData = (chunk: Buffer): void => {
      let request: TrampolineRequest | undefined
      try {
        request = decoder.push(chunk)
      } catch (err) {
        socket.off('data', onData)
        this.fail(socket, err)
        return
      }
      if (request === undefined) return

      socket.off('data', onData)
      this.respond(socket, request).catch((err: unknown) => this.fail(socket, err))
    }

    socket.on('data', onData)
    socket.on('error', (err) => this.onError(err))
    socket.on('close', () => this.sockets.delete(socket))
  }

  private async respond(socket: Socket, request: TrampolineRequest): Promise<void> {
    let response: TrampolineResponse
    try {
      response = await this.handler(request)
    } catch (err) {
      response = { stderr: `${errorMessage(err)}\n` }
    }

    const frames = Buffer.concat([
      encodeFrame(toBytes(response.stdout)),
      encodeFrame(toBytes(response.stderr))
    ])
    socket.end(frames)
  }

  private fail(socket: Socket, err: unknown): void {
    socket.destroy()
    this.onError(err instanceof Error ? err : new Error(String(err)))
  }
}

function toBytes(output: string | Uint8Array | undefined): Uint8Array {
  if (output === undefined) return new Uint8Array(0)
  return typeof output === 'string' ? Buffer.from(output, 'utf-8') : output
}
