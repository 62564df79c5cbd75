/**
 * WebSocket Transports
 *
 * Server and client transports on top of the `ws` library. Socket callbacks
 * only queue; the tick loop drains the queues with receive(). Sockets are
 * reached through the narrow PeerSocket interface so tests can drive the
 * transports without opening a port.
 */

import WebSocket from 'ws';
import type { WebSocketServer } from 'ws';
import { createLogger } from '../logger';
import type {
    ClientTransport,
    ConnectionEvent,
    InboundPacket,
    ServerTransport
} from './transport';

const log = createLogger('net');

/**
 * The part of a socket the transports use.
 */
export interface PeerSocket {
    readonly isOpen: boolean;
    send(bytes: Uint8Array): void;
    close(): void;
    onMessage(listener: (bytes: Uint8Array) => void): void;
    onClose(listener: () => void): void;
    onError(listener: (error: Error) => void): void;
}

function toBytes(data: WebSocket.RawData): Uint8Array {
    if (Array.isArray(data)) return new Uint8Array(Buffer.concat(data));
    return new Uint8Array(data);
}

/**
 * Adapt a `ws` socket to PeerSocket.
 */
export function wrapWebSocket(socket: WebSocket): PeerSocket {
    return {
        get isOpen() {
            return socket.readyState === WebSocket.OPEN;
        },
        send(bytes) {
            socket.send(bytes, error => {
                if (error) log.debug(`send failed: ${error.message}`);
            });
        },
        close() {
            socket.close();
        },
        onMessage(listener) {
            socket.on('message', data => listener(toBytes(data)));
        },
        onClose(listener) {
            socket.on('close', () => listener());
        },
        onError(listener) {
            socket.on('error', error => listener(error));
        }
    };
}

// ============================================
// Server
// ============================================

export class WebSocketServerTransport implements ServerTransport {
    private peers = new Map<number, PeerSocket>();
    private inbox: InboundPacket[] = [];
    private events: ConnectionEvent[] = [];
    private nextClientId = 1;

    /**
     * Register an accepted socket. Returns the client id assigned to it.
     */
    accept(peer: PeerSocket): number {
        const clientId = this.nextClientId++;
        this.peers.set(clientId, peer);
        this.events.push({ kind: 'connect', clientId });

        peer.onMessage(bytes => {
            if (this.peers.get(clientId) === peer) {
                this.inbox.push({ clientId, bytes });
            }
        });
        peer.onClose(() => this.forget(clientId, peer));
        peer.onError(error => {
            log.warn(`Client ${clientId} socket error: ${error.message}`);
        });

        log.info(`Client ${clientId} connected`);
        return clientId;
    }

    /**
     * Accept every connection of a `ws` server.
     */
    listen(server: WebSocketServer): void {
        server.on('connection', socket => {
            socket.binaryType = 'nodebuffer';
            this.accept(wrapWebSocket(socket));
        });
    }

    sendToClient(clientId: number, bytes: Uint8Array): void {
        const peer = this.peers.get(clientId);
        if (!peer || !peer.isOpen) return;
        peer.send(bytes);
    }

    broadcast(bytes: Uint8Array): void {
        for (const peer of this.peers.values()) {
            if (peer.isOpen) peer.send(bytes);
        }
    }

    receive(): InboundPacket[] {
        const drained = this.inbox;
        this.inbox = [];
        return drained;
    }

    pollConnectionEvents(): ConnectionEvent[] {
        const drained = this.events;
        this.events = [];
        return drained;
    }

    disconnect(clientId: number): void {
        const peer = this.peers.get(clientId);
        if (!peer) return;
        this.forget(clientId, peer);
        peer.close();
    }

    get clientCount(): number {
        return this.peers.size;
    }

    private forget(clientId: number, peer: PeerSocket): void {
        if (this.peers.get(clientId) !== peer) return;
        this.peers.delete(clientId);
        this.events.push({ kind: 'disconnect', clientId });
        log.info(`Client ${clientId} disconnected`);
    }
}

// ============================================
// Client
// ============================================

export class WebSocketClientTransport implements ClientTransport {
    private inbox: Uint8Array[] = [];
    private closed = false;

    constructor(private readonly peer: PeerSocket) {
        peer.onMessage(bytes => {
            if (!this.closed) this.inbox.push(bytes);
        });
        peer.onClose(() => {
            this.closed = true;
        });
        peer.onError(error => {
            log.warn(`Socket error: ${error.message}`);
        });
    }

    /**
     * Open a connection to `url`. Sends before the socket opens are dropped.
     */
    static connect(url: string): WebSocketClientTransport {
        return new WebSocketClientTransport(wrapWebSocket(new WebSocket(url)));
    }

    get connected(): boolean {
        return !this.closed && this.peer.isOpen;
    }

    send(bytes: Uint8Array): void {
        if (!this.connected) {
            log.debug(`dropped ${bytes.byteLength} byte send on a closed socket`);
            return;
        }
        this.peer.send(bytes);
    }

    receive(): Uint8Array[] {
        const drained = this.inbox;
        this.inbox = [];
        return drained;
    }

    close(): void {
        this.closed = true;
        this.peer.close();
    }
}
