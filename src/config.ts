/**
 * Session configuration: platform defaults and UDP port negotiation.
 *
 * @module
 */
import { createSocket, type Socket } from 'node:dgram'
import { once } from 'node:events'
import { LOCALHOST } from './udp/socket.js'

/**
 * Default sclang location per platform. Platforms without an entry must
 * pass the path explicitly.
 */
export const DEFAULT_SCLANG_PATHS: Readonly<Partial<Record<NodeJS.Platform, string>>> = {
  darwin: '/Applications/SuperCollider.app/Contents/MacOS/sclang',
  linux: 'sclang'
}

export const DEFAULT_IDE_NAME = 'vscode'

export function defaultSclangPath(platform: NodeJS.Platform = process.platform): string | undefined {
  return DEFAULT_SCLANG_PATHS[platform]
}

/**
 * Error thrown for an invalid or inconsistent port configuration.
 */
export class PortConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PortConfigError'
  }
}

/**
 * Ports as named on the command line, from the child's point of view:
 * `sendPort` is where the child sends, `receivePort` where it listens.
 */
export interface PortFlags {
  readonly sendPort?: number
  readonly receivePort?: number
}

/**
 * Ports as the relay uses them, fixed for the session.
 */
export interface RelayPorts {
  /** Port the relay's sender targets (the child listens here) */
  readonly sendPort: number
  /** Port the relay's receiver binds (the child sends here) */
  readonly receivePort: number
}

/**
 * Validate a single port number.
 *
 * @throws PortConfigError if the value is not an integer in 1..65535
 */
export function validatePort(value: number, name: string): number {
  if (!Number.isInteger(value) || value < 1 || value > 65535) {
    throw new PortConfigError(`${name} must be an integer between 1 and 65535, got ${value}`)
  }
  return value
}

/**
 * Bind two udp4 sockets to ephemeral ports, read the ports the OS picked,
 * and release them. Both sockets are open at the same time so the two ports
 * differ.
 */
export async function findFreePorts(host: string = LOCALHOST): Promise<[number, number]> {
  const sockets: Socket[] = [createSocket('udp4'), createSocket('udp4')]
  try {
    const ports = await Promise.all(
      sockets.map(async (socket) => {
        socket.bind(0, host)
        await once(socket, 'listening')
        return socket.address().port
      })
    )
    return [ports[0], ports[1]]
  } finally {
    for (const socket of sockets) {
      socket.close()
    }
  }
}

/**
 * Resolve the session's relay ports.
 *
 * Explicit ports must be given together; they map crosswise because the
 * flags name them from the child's side. Without them, two free ports are
 * discovered.
 *
 * @throws PortConfigError if only one port is given, or a port is invalid
 */
export async function resolvePorts(
  flags: PortFlags,
  discover: () => Promise<[number, number]> = findFreePorts
): Promise<RelayPorts> {
  const { sendPort, receivePort } = flags
  if ((sendPort === undefined) !== (receivePort === undefined)) {
    throw new PortConfigError('Both server and client port must be specified (or neither)')
  }

  if (sendPort !== undefined && receivePort !== undefined) {
    return {
      sendPort: validatePort(receivePort, '--receive-port'),
      receivePort: validatePort(sendPort, '--send-port')
    }
  }

  const [receive, send] = await discover()
  return { sendPort: send, receivePort: receive }
}
