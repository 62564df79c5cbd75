/**
 * Client-Side Prediction Module
 *
 * Local prediction of the owned entity, reconciliation against server
 * snapshots and interpolation of everything else.
 */

export type { PredictionEntry, PredictionStats, ReconcileResult, RenderState } from './types';
export { PredictionHistory } from './prediction-history';
export { InterpolationBuffer, lerpAngle } from './interpolation';
export type { InterpolationSample } from './interpolation';
export { GameClient, predictionError } from './client';
export type { GameClientOptions } from './client';
