/**
 * Interpolation Buffer
 *
 * Keeps the received states of one remote entity stamped with local receive
 * time. Rendering samples the buffer at (now - delay) and blends the two
 * samples around that time. It never extrapolates: before the first sample
 * it returns the first, after the last it holds the last.
 */

import type { ActionState } from '../components';
import { Vec2, vec2Clone, vec2Lerp } from '../math/vec';
import type { RenderState } from './types';

export interface InterpolationSample {
    /** Local receive time, ms */
    time: number;
    position: Vec2;
    rotation: number;
    scale: Vec2;
    actionState: ActionState | undefined;
}

const DEFAULT_CAPACITY = 32;
const TWO_PI = Math.PI * 2;

/**
 * Blend two angles along the shorter arc.
 */
export function lerpAngle(from: number, to: number, t: number): number {
    let delta = (to - from) % TWO_PI;
    if (delta > Math.PI) delta -= TWO_PI;
    if (delta < -Math.PI) delta += TWO_PI;
    return from + delta * t;
}

function toRenderState(sample: InterpolationSample): RenderState {
    return {
        position: vec2Clone(sample.position),
        rotation: sample.rotation,
        scale: vec2Clone(sample.scale),
        actionState: sample.actionState
    };
}

export class InterpolationBuffer {
    private samples: InterpolationSample[] = [];

    constructor(private readonly capacity: number = DEFAULT_CAPACITY) {}

    /**
     * Add a sample. Samples older than the newest are ignored.
     */
    push(sample: InterpolationSample): void {
        const last = this.samples[this.samples.length - 1];
        if (last && sample.time < last.time) return;

        this.samples.push({
            time: sample.time,
            position: vec2Clone(sample.position),
            rotation: sample.rotation,
            scale: vec2Clone(sample.scale),
            actionState: sample.actionState
        });
        if (this.samples.length > this.capacity) this.samples.shift();
    }

    sample(renderTime: number): RenderState | undefined {
        const samples = this.samples;
        if (samples.length === 0) return undefined;

        const first = samples[0];
        if (renderTime <= first.time) return toRenderState(first);

        const last = samples[samples.length - 1];
        if (renderTime >= last.time) return toRenderState(last);

        let i = 1;
        while (samples[i].time < renderTime) i++;
        const from = samples[i - 1];
        const to = samples[i];

        const span = to.time - from.time;
        const t = span > 0 ? (renderTime - from.time) / span : 1;
        return {
            position: vec2Lerp(from.position, to.position, t),
            rotation: lerpAngle(from.rotation, to.rotation, t),
            scale: vec2Lerp(from.scale, to.scale, t),
            actionState: t < 1 ? from.actionState : to.actionState
        };
    }

    /**
     * Drop samples no longer needed to render at `renderTime` or later,
     * keeping the one just before it.
     */
    prune(renderTime: number): void {
        while (this.samples.length > 2 && this.samples[1].time <= renderTime) {
            this.samples.shift();
        }
    }

    get length(): number {
        return this.samples.length;
    }

    clear(): void {
        this.samples = [];
    }
}
