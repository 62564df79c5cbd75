/**
 * Loopback Network
 *
 * In-process transport pair for tests and local play. Messages are delivered
 * after `latencyTicks` calls to `advance()` (immediately at zero latency),
 * and a drop filter can discard chosen messages to simulate loss.
 */

import { createLogger } from '../logger';
import type {
    ClientTransport,
    ConnectionEvent,
    InboundPacket,
    ServerTransport
} from './transport';

const log = createLogger('net');

interface InFlight<T> {
    deliverAt: number;
    message: T;
}

export type Direction = 'toServer' | 'toClient';

export interface LoopbackOptions {
    latencyTicks?: number;
    /** Return true to drop a message */
    drop?: (direction: Direction, clientId: number, bytes: Uint8Array) => boolean;
}

class LoopbackClientTransport implements ClientTransport {
    inbox: Uint8Array[] = [];
    open = true;

    constructor(
        private readonly network: LoopbackNetwork,
        readonly clientId: number
    ) {}

    send(bytes: Uint8Array): void {
        if (!this.open) return;
        this.network.enqueueToServer(this.clientId, bytes);
    }

    receive(): Uint8Array[] {
        const drained = this.inbox;
        this.inbox = [];
        return drained;
    }

    close(): void {
        if (!this.open) return;
        this.network.disconnect(this.clientId);
    }
}

class LoopbackServerTransport implements ServerTransport {
    inbox: InboundPacket[] = [];
    events: ConnectionEvent[] = [];

    constructor(private readonly network: LoopbackNetwork) {}

    sendToClient(clientId: number, bytes: Uint8Array): void {
        this.network.enqueueToClient(clientId, bytes);
    }

    broadcast(bytes: Uint8Array): void {
        for (const clientId of this.network.clientIds()) {
            this.network.enqueueToClient(clientId, bytes);
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
        this.network.disconnect(clientId);
    }
}

export class LoopbackNetwork {
    readonly server: LoopbackServerTransport;
    private clients = new Map<number, LoopbackClientTransport>();
    private toServer: InFlight<InboundPacket>[] = [];
    private toClient: InFlight<InboundPacket>[] = [];
    private clock = 0;
    private nextClientId = 1;
    private readonly latencyTicks: number;
    private readonly drop?: LoopbackOptions['drop'];

    sent = { toServer: 0, toClient: 0, bytesToClient: 0 };

    constructor(options: LoopbackOptions = {}) {
        this.latencyTicks = options.latencyTicks ?? 0;
        this.drop = options.drop;
        this.server = new LoopbackServerTransport(this);
    }

    /**
     * Open a client connection. The server sees a connect event on its next poll.
     */
    connect(clientId: number = this.nextClientId++): ClientTransport {
        if (this.clients.get(clientId)?.open) {
            throw new Error(`Client ${clientId} is already connected`);
        }
        const transport = new LoopbackClientTransport(this, clientId);
        this.clients.set(clientId, transport);
        this.nextClientId = Math.max(this.nextClientId, clientId + 1);
        this.server.events.push({ kind: 'connect', clientId });
        return transport;
    }

    disconnect(clientId: number): void {
        const client = this.clients.get(clientId);
        if (!client || !client.open) return;
        client.open = false;
        this.server.events.push({ kind: 'disconnect', clientId });
        log.debug(`loopback client ${clientId} closed`);
    }

    clientIds(): number[] {
        return [...this.clients.values()].filter(c => c.open).map(c => c.clientId);
    }

    /**
     * Move the network clock one step and deliver what is due.
     */
    advance(): void {
        this.clock++;
        this.deliver();
    }

    /** Messages still in flight in either direction. */
    get inFlight(): number {
        return this.toServer.length + this.toClient.length;
    }

    enqueueToServer(clientId: number, bytes: Uint8Array): void {
        this.sent.toServer++;
        if (this.drop?.('toServer', clientId, bytes)) return;
        this.toServer.push({ deliverAt: this.clock + this.latencyTicks, message: { clientId, bytes: bytes.slice() } });
        this.deliver();
    }

    enqueueToClient(clientId: number, bytes: Uint8Array): void {
        const client = this.clients.get(clientId);
        if (!client || !client.open) return;
        this.sent.toClient++;
        this.sent.bytesToClient += bytes.byteLength;
        if (this.drop?.('toClient', clientId, bytes)) return;
        this.toClient.push({ deliverAt: this.clock + this.latencyTicks, message: { clientId, bytes: bytes.slice() } });
        this.deliver();
    }

    private deliver(): void {
        const dueToServer = this.toServer.filter(m => m.deliverAt <= this.clock);
        this.toServer = this.toServer.filter(m => m.deliverAt > this.clock);
        for (const { message } of dueToServer) {
            if (this.clients.get(message.clientId)?.open) {
                this.server.inbox.push(message);
            }
        }

        const dueToClient = this.toClient.filter(m => m.deliverAt <= this.clock);
        this.toClient = this.toClient.filter(m => m.deliverAt > this.clock);
        for (const { message } of dueToClient) {
            const client = this.clients.get(message.clientId);
            if (client?.open) client.inbox.push(message.bytes);
        }
    }
}
