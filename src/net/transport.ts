/**
 * Transport Contracts
 *
 * The simulation never touches sockets. Both sides talk to a transport that
 * buffers inbound messages until the tick loop drains them with receive();
 * sends are fire-and-forget and may be lost.
 */

export interface InboundPacket {
    clientId: number;
    bytes: Uint8Array;
}

export type ConnectionEvent =
    | { kind: 'connect'; clientId: number }
    | { kind: 'disconnect'; clientId: number };

export interface ServerTransport {
    sendToClient(clientId: number, bytes: Uint8Array): void;
    broadcast(bytes: Uint8Array): void;
    /** Drain packets received since the last call, in arrival order */
    receive(): InboundPacket[];
    /** Drain connection changes since the last call */
    pollConnectionEvents?(): ConnectionEvent[];
    /** Close a client's connection from the server side */
    disconnect?(clientId: number): void;
}

export interface ClientTransport {
    send(bytes: Uint8Array): void;
    /** Drain packets received since the last call, in arrival order */
    receive(): Uint8Array[];
    close?(): void;
}
