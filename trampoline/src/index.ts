/**
 * Desktop Trampoline
 *
 * Forwards a CLI invocation (arguments, allow-listed environment, stdin) to
 * a desktop host over loopback TCP and relays the host's captured output.
 *
 * @packageDocumentation
 */

// Program
export { EXIT_FAILURE, EXIT_SUCCESS, type ExitCode, runTrampoline, type TrampolineInvocation } from './trampoline.js'

// Session
export { TrampolineSession, type SessionOptions, type SessionResult, type SessionState } from './session.js'
export { connectLoopback, type Connector, LOOPBACK_HOST } from './connect.js'

// Server
export {
  TrampolineServer,
  type TrampolineHandler,
  type TrampolineResponse,
  type TrampolineServerOptions
} from './server.js'

// Configuration
export { DEBUG_ENV_VAR, PORT_ENV_VAR, readTrampolineConfig, type TrampolineConfig } from './config.js'
export {
  createEnvFilter,
  DESKTOP_ENV_ALLOW_LIST,
  type EnvFilter,
  environmentEntries,
  matchesEnvName
} from './env-filter.js'

// Errors
export {
  ConfigurationError,
  ConnectionError,
  errorMessage,
  IOError,
  ProtocolError,
  TrampolineError,
  type TrampolineStep
} from './errors.js'

// IPC (re-export for advanced usage)
export {
  // Constants
  LENGTH_PREFIX_SIZE,
  MAX_PAYLOAD_SIZE,
  RECEIVE_BUFFER_CAPACITY,
  STDIN_TERMINATOR,
  // Framing
  encodeFrame,
  encodeRequestFrames,
  encodeStringFrame,
  FrameSizeError,
  // Streams
  FrameReader,
  ReadableStdinSource,
  RequestDecoder,
  type StdinSource,
  StreamSink,
  type TrampolineRequest
} from './ipc/index.js'
