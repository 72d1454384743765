/**
 * Loopback TCP connect.
 *
 * @module
 */
import { createConnection, type Socket } from 'node:net'
import { ConnectionError } from './errors.js'

/** The trampoline only ever talks to the local host. */
export const LOOPBACK_HOST = '127.0.0.1'

/**
 * Opens a connection to the server. Injected into the session so tests can
 * observe or replace the network collaborator.
 */
export type Connector = (port: number) => Promise<Socket>

/**
 * Connect to 127.0.0.1 on `port`.
 *
 * @throws ConnectionError if the connection cannot be established
 */
export function connectLoopback(port: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = createConnection({ host: LOOPBACK_HOST, port })

    const onConnect = () => {
      socket.off('error', onError)
      resolve(socket)
    }
    const onError = (err: Error) => {
      socket.off('connect', onConnect)
      socket.destroy()
      reject(new ConnectionError(port, { cause: err }))
    }

    socket.once('connect', onConnect)
    socket.once('error', onError)
  })
}
