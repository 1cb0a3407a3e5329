/**
 * Stdio side of the relay.
 *
 * @module
 */

export { DEFAULT_STOP_TIMEOUT_MS, InputRelay, type InputRelayState } from './input-relay.js'
export { StdoutSink, StreamClosedError } from './sink.js'
