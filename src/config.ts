/**
 * Simulation Configuration
 *
 * Plain values read once at startup. `resolveConfig` merges overrides onto
 * the defaults, validates the result and freezes it.
 */

import { ConfigError } from './errors';

export interface WorldBounds {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
}

export interface SimulationConfig {
    /** Rectangle every entity is clamped into */
    worldBounds: WorldBounds;
    /** Ticks per second; dt is 1 / tickRate */
    tickRate: number;
    /** Spatial grid cell edge */
    cellSize: number;
    /** Render delay applied to entities the client does not own */
    interpolationDelayMs: number;
    /** Largest per-axis prediction error accepted without correction */
    reconciliationEpsilon: number;
    /** How long a pressed action waits in the character input buffer */
    inputBufferWindowMs: number;

    moveSpeed: number;
    dashSpeed: number;
    jumpSpeed: number;
    gravity: number;

    attackTicks: number;
    /** Trailing ticks of an attack during which presses are only buffered */
    attackRecoveryTicks: number;
    dashTicks: number;
    hurtTicks: number;
    invulnerabilityTicks: number;

    /** A client gets a full snapshot at least this often (ticks) */
    fullSnapshotInterval: number;
    /** Server snapshots retained as delta baselines */
    snapshotHistorySize: number;
    /** Client prediction ring capacity */
    predictionHistorySize: number;
    /** Consecutive undecodable packets tolerated before a disconnect */
    maxMalformedPackets: number;
    /** Silence or disconnect time before a client's entities are destroyed */
    disconnectGraceMs: number;
    /** Inputs held per client awaiting their tick; the oldest are dropped beyond this */
    maxQueuedInputs: number;
}

export type SimulationConfigInput = Partial<Omit<SimulationConfig, 'worldBounds'>> & {
    worldBounds?: Partial<WorldBounds>;
};

export const DEFAULT_CONFIG: Readonly<SimulationConfig> = Object.freeze({
    worldBounds: Object.freeze({ minX: 0, minY: 0, maxX: 2048, maxY: 2048 }),
    tickRate: 60,
    cellSize: 64,
    interpolationDelayMs: 100,
    reconciliationEpsilon: 0.01,
    inputBufferWindowMs: 250,
    moveSpeed: 200,
    dashSpeed: 600,
    jumpSpeed: 300,
    gravity: 900,
    attackTicks: 18,
    attackRecoveryTicks: 6,
    dashTicks: 10,
    hurtTicks: 12,
    invulnerabilityTicks: 30,
    fullSnapshotInterval: 60,
    snapshotHistorySize: 64,
    predictionHistorySize: 128,
    maxMalformedPackets: 5,
    disconnectGraceMs: 5000,
    maxQueuedInputs: 8
});

type NumericField = {
    [K in keyof SimulationConfig]: SimulationConfig[K] extends number ? K : never
}[keyof SimulationConfig];

const POSITIVE: readonly NumericField[] = [
    'tickRate',
    'cellSize',
    'moveSpeed',
    'dashSpeed',
    'jumpSpeed',
    'gravity',
    'attackTicks',
    'dashTicks',
    'hurtTicks'
];

const NON_NEGATIVE: readonly NumericField[] = [
    'interpolationDelayMs',
    'reconciliationEpsilon',
    'inputBufferWindowMs',
    'attackRecoveryTicks',
    'invulnerabilityTicks',
    'disconnectGraceMs'
];

const POSITIVE_INTEGER: readonly NumericField[] = [
    'fullSnapshotInterval',
    'snapshotHistorySize',
    'predictionHistorySize',
    'maxMalformedPackets',
    'maxQueuedInputs'
];

/**
 * Merge overrides onto DEFAULT_CONFIG and validate.
 * @throws ConfigError when a value is out of range
 */
export function resolveConfig(overrides: SimulationConfigInput = {}): Readonly<SimulationConfig> {
    const { worldBounds, ...rest } = overrides;
    const config: SimulationConfig = {
        ...DEFAULT_CONFIG,
        ...rest,
        worldBounds: { ...DEFAULT_CONFIG.worldBounds, ...worldBounds }
    };

    for (const field of POSITIVE) {
        const value = config[field];
        if (!Number.isFinite(value) || value <= 0) {
            throw new ConfigError(field, `must be a positive number, got ${value}`);
        }
    }
    for (const field of NON_NEGATIVE) {
        const value = config[field];
        if (!Number.isFinite(value) || value < 0) {
            throw new ConfigError(field, `must be zero or positive, got ${value}`);
        }
    }
    for (const field of POSITIVE_INTEGER) {
        const value = config[field];
        if (!Number.isInteger(value) || value < 1) {
            throw new ConfigError(field, `must be a positive integer, got ${value}`);
        }
    }

    const b = config.worldBounds;
    if (![b.minX, b.minY, b.maxX, b.maxY].every(Number.isFinite) || b.minX >= b.maxX || b.minY >= b.maxY) {
        throw new ConfigError('worldBounds', 'min must be below max on both axes');
    }
    if (config.attackRecoveryTicks > config.attackTicks) {
        throw new ConfigError('attackRecoveryTicks', 'cannot exceed attackTicks');
    }

    Object.freeze(config.worldBounds);
    return Object.freeze(config);
}

/** Fixed timestep in seconds. */
export function tickDt(config: Pick<SimulationConfig, 'tickRate'>): number {
    return 1 / config.tickRate;
}

/** Fixed timestep in milliseconds. */
export function tickIntervalMs(config: Pick<SimulationConfig, 'tickRate'>): number {
    return 1000 / config.tickRate;
}

/** Input-buffer window converted to ticks. */
export function inputBufferTicks(config: Pick<SimulationConfig, 'inputBufferWindowMs' | 'tickRate'>): number {
    return Math.ceil((config.inputBufferWindowMs * config.tickRate) / 1000);
}
