/**
 * The slice of a `node:dgram` socket the relay uses.
 * Tests substitute an in-process fake.
 */
export interface DatagramSocket {
  send(
    msg: Uint8Array,
    port: number,
    address: string,
    callback?: (error: Error | null, bytes: number) => void
  ): void
  close(callback?: () => void): void
}

/** Loopback address both relay sockets use. */
export const LOCALHOST = '127.0.0.1'
