/**
 * Error taxonomy for the simulation core.
 *
 * None of these are fatal to the process: store operations hand
 * InvalidEntityError back as a value, decoders throw MalformedPacketError
 * which the receive paths catch and count, and ConfigError only surfaces at
 * startup.
 */

export type ErrorCode = 'InvalidEntity' | 'MalformedPacket' | 'InvalidConfig';

export abstract class SimulationError extends Error {
    abstract readonly code: ErrorCode;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * A stale or destroyed entity id was used.
 */
export class InvalidEntityError extends SimulationError {
    readonly code = 'InvalidEntity';

    constructor(readonly entityId: number) {
        super(`Entity ${formatEntityId(entityId)} is not alive`);
    }
}

/**
 * A payload could not be decoded (corrupt, truncated or version mismatch).
 */
export class MalformedPacketError extends SimulationError {
    readonly code = 'MalformedPacket';

    constructor(reason: string, readonly offset: number = -1) {
        super(offset >= 0 ? `${reason} (at byte ${offset})` : reason);
    }
}

export class ConfigError extends SimulationError {
    readonly code = 'InvalidConfig';

    constructor(readonly field: string, reason: string) {
        super(`Invalid config '${field}': ${reason}`);
    }
}

/**
 * Format an entity id as index:generation for log output.
 */
export function formatEntityId(id: number): string {
    return `${id & 0xFFFFF}:${id >>> 20}`;
}
