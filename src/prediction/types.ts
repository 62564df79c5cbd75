/**
 * Client-Side Prediction Types
 */

import type { ActionState } from '../components';
import type { InputCommand } from '../core/input';
import type { EntityRecord } from '../core/world';
import type { Vec2 } from '../math/vec';

/**
 * One locally predicted input and the owned entity's state right after it.
 */
export interface PredictionEntry {
    sequence: number;
    input: InputCommand;
    state: EntityRecord;
}

/**
 * Outcome of comparing a prediction with the authoritative state.
 */
export interface ReconcileResult {
    /** Whether local state was replaced by the server's */
    corrected: boolean;
    /** Unacknowledged inputs re-simulated after a correction */
    replayed: number;
    /**
     * Largest per-axis position or velocity error. Infinity when there was
     * no prediction to compare against or the action states differed.
     */
    error: number;
}

/**
 * What the renderer draws for one entity.
 */
export interface RenderState {
    position: Vec2;
    rotation: number;
    scale: Vec2;
    actionState: ActionState | undefined;
}

export interface PredictionStats {
    /** Snapshots applied */
    snapshotsApplied: number;
    /** Snapshots ignored as stale or missing their base */
    snapshotsDropped: number;
    malformedPackets: number;
    corrections: number;
    /** Total inputs replayed across all corrections */
    replayedInputs: number;
    /** Error of the most recent reconciliation */
    lastError: number;
    /** Inputs not yet acknowledged by the server */
    pendingInputs: number;
}
