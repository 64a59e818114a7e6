export { extractPayload } from './frame-codec'
export { DEFAULT_TRANSPORT_CONFIG } from './message-transport.interface'
export type { MessageTransport, TransportConfig } from './message-transport.interface'
export { ZmqTransport } from './zmq-transport'
