/**
 * sclang-lsp-stdio
 *
 * Runs the SuperCollider language server and bridges its UDP transport to
 * stdin/stdout for editors that only speak LSP over stdio.
 *
 * @packageDocumentation
 */

// Supervisor
export {
  ExecutableNotFoundError,
  exitCodeOf,
  lspEnvironment,
  type RelayFactories,
  type RelayInput,
  type RelayReceiver,
  type RelaySender,
  type ServerLogLevel,
  Supervisor,
  type SupervisorOptions,
  type SupervisorState
} from './supervisor.js'
export { DEFAULT_READY_MARKER, ReadinessLatch } from './readiness.js'

// Configuration
export {
  DEFAULT_IDE_NAME,
  DEFAULT_SCLANG_PATHS,
  defaultSclangPath,
  findFreePorts,
  type PortFlags,
  PortConfigError,
  type RelayPorts,
  resolvePorts
} from './config.js'
export { type CliOptions, parseCliArgs } from './cli-args.js'

// Logging
export { createRootLogger, Logger, type LogLevel } from './logger.js'

// Transports (re-export for advanced usage)
export {
  MAX_DATAGRAM_SIZE,
  encodeMessage,
  HeaderParseError,
  Reassembler
} from './lsp/index.js'
export { createUdpReceiver, createUdpSender, type MessageSink, UdpReceiver, UdpSender } from './udp/index.js'
export { InputRelay, StdoutSink, StreamClosedError } from './io/index.js'
