/**
 * Fixed Tick Loop
 *
 * Host loop that calls `step` at a fixed rate using an accumulator over a
 * monotonic clock. A late wake-up runs the ticks it owes, up to
 * `maxCatchUpTicks`; anything beyond that is skipped rather than queued.
 * Tests drive it by hand through advance(now). Slow ticks are reported by
 * the scheduler that `step` runs, not here.
 */

import { createLogger } from '../logger';

const log = createLogger('loop');

export interface FixedTickLoopOptions {
    tickRate: number;
    step: (tick: number) => void;
    /** Milliseconds, monotonic */
    now?: () => number;
    maxCatchUpTicks?: number;
    /** Called when step throws while the loop runs on its timer; the loop stops */
    onError?: (error: unknown) => void;
}

const DEFAULT_MAX_CATCH_UP = 5;

export class FixedTickLoop {
    readonly intervalMs: number;
    private readonly stepFn: (tick: number) => void;
    private readonly now: () => number;
    private readonly maxCatchUpTicks: number;
    private readonly onError?: (error: unknown) => void;

    private lastTickTime = 0;
    private timer: ReturnType<typeof setTimeout> | undefined;
    private _running = false;
    private _tick = 0;
    private _skipped = 0;

    constructor(options: FixedTickLoopOptions) {
        if (!Number.isFinite(options.tickRate) || options.tickRate <= 0) {
            throw new RangeError(`tickRate must be positive, got ${options.tickRate}`);
        }
        this.intervalMs = 1000 / options.tickRate;
        this.stepFn = options.step;
        this.now = options.now ?? (() => performance.now());
        this.maxCatchUpTicks = options.maxCatchUpTicks ?? DEFAULT_MAX_CATCH_UP;
        this.onError = options.onError;
    }

    get running(): boolean {
        return this._running;
    }

    /** Ticks run so far. */
    get tick(): number {
        return this._tick;
    }

    /** Ticks dropped because the loop fell too far behind. */
    get skipped(): number {
        return this._skipped;
    }

    /**
     * Start ticking on timers. The first tick is due one interval from now.
     */
    start(): void {
        if (this._running) return;
        this._running = true;
        this.lastTickTime = this.now();
        this.schedule();
        log.info(`started at ${(1000 / this.intervalMs).toFixed(0)}Hz`);
    }

    stop(): void {
        if (!this._running) return;
        this._running = false;
        if (this.timer !== undefined) {
            clearTimeout(this.timer);
            this.timer = undefined;
        }
        log.info(`stopped after ${this._tick} ticks`);
    }

    /**
     * Set the time the next tick is measured from, for manual driving.
     */
    reset(now: number): void {
        this.lastTickTime = now;
    }

    /**
     * Run every tick due at `now`. Returns the number run.
     */
    advance(now: number): number {
        let ran = 0;
        while (now - this.lastTickTime >= this.intervalMs && ran < this.maxCatchUpTicks) {
            this.runTick();
            this.lastTickTime += this.intervalMs;
            ran++;
        }

        const behind = Math.floor((now - this.lastTickTime) / this.intervalMs);
        if (behind > 0) {
            this._skipped += behind;
            this.lastTickTime += behind * this.intervalMs;
            log.warn(`fell ${behind} ticks behind, skipping them`);
        }
        return ran;
    }

    private runTick(): void {
        this._tick++;
        this.stepFn(this._tick);
    }

    private schedule(): void {
        const delay = Math.max(0, this.lastTickTime + this.intervalMs - this.now());
        this.timer = setTimeout(() => {
            this.timer = undefined;
            if (!this._running) return;
            try {
                this.advance(this.now());
            } catch (error) {
                log.error('Tick failed, stopping loop:', error);
                this.stop();
                if (!this.onError) throw error;
                this.onError(error);
                return;
            }
            this.schedule();
        }, delay);
    }
}
