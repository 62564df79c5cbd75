/**
 * Transport layer
 */

export type { ClientTransport, ConnectionEvent, InboundPacket, ServerTransport } from './transport';
export { LoopbackNetwork } from './loopback';
export type { Direction, LoopbackOptions } from './loopback';
export { WebSocketClientTransport, WebSocketServerTransport, wrapWebSocket } from './websocket';
export type { PeerSocket } from './websocket';
