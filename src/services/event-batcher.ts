import type { EventBatch, RawEvent } from '../types/pipeline.js';

export const DEFAULT_BATCH_INTERVAL_MS = 300;

export interface EventBatcherOptions {
    /** Length of one coalescing window. @default 300 */
    intervalMs?: number;
    /** Receives each non-empty window's events, in arrival order. */
    onBatch: (batch: EventBatch) => void;
}

/**
 * Coalesces raw events into fixed-interval batches.
 *
 * Events are buffered without bound during a window. On each tick a
 * non-empty buffer is emitted as one batch and reset; an empty window emits
 * nothing. `stop()` ends the batcher for good: the partial window is
 * dropped and later pushes are ignored.
 */
export class EventBatcher {
    readonly #intervalMs: number;
    readonly #onBatch: (batch: EventBatch) => void;
    #pending: RawEvent[] = [];
    #timer: NodeJS.Timeout | null = null;
    #stopped = false;

    constructor(options: EventBatcherOptions) {
        this.#intervalMs = Math.max(1, Math.floor(options.intervalMs ?? DEFAULT_BATCH_INTERVAL_MS));
        this.#onBatch = options.onBatch;
    }

    get intervalMs(): number {
        return this.#intervalMs;
    }

    get running(): boolean {
        return this.#timer !== null;
    }

    get pendingCount(): number {
        return this.#pending.length;
    }

    start(): void {
        if (this.#stopped || this.#timer) return;
        this.#timer = setInterval(() => this.#tick(), this.#intervalMs);
    }

    push(event: RawEvent): void {
        if (this.#stopped) return;
        this.#pending.push(event);
    }

    stop(): void {
        this.#stopped = true;
        if (this.#timer) {
            clearInterval(this.#timer);
            this.#timer = null;
        }
        this.#pending = [];
    }

    #tick(): void {
        if (this.#pending.length === 0) return;
        const batch = this.#pending;
        this.#pending = [];
        this.#onBatch(batch);
    }
}
