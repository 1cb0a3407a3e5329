/**
 * UDP side of the relay.
 *
 * @module
 */

export {
  createUdpReceiver,
  type CreateUdpReceiverOptions,
  type MessageSink,
  UdpReceiver,
  type UdpReceiverOptions
} from './receiver.js'
export { createUdpSender, UdpSender, type UdpSenderOptions } from './sender.js'
export { type DatagramSocket, LOCALHOST } from './socket.js'
