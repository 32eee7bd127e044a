import { watch, type FSWatcher } from 'chokidar';
import { logThought } from '../utils/logger.js';
import { FileOp, SetupError } from '../types/pipeline.js';
import type {
    EventSource,
    EventSourceErrorListener,
    RawEvent,
    RawEventListener,
} from '../types/pipeline.js';

/** chokidar events the pipeline cares about, and the op each maps to. */
const CHOKIDAR_OPS = {
    add: FileOp.Create,
    addDir: FileOp.Create,
    change: FileOp.Write,
    unlink: FileOp.Remove,
    unlinkDir: FileOp.Remove,
} as const;

export type ChokidarEventName = keyof typeof CHOKIDAR_OPS;

function isChokidarEventName(name: string): name is ChokidarEventName {
    return Object.hasOwn(CHOKIDAR_OPS, name);
}

/** Translate a chokidar event into a raw event, or null for events the pipeline ignores. */
export function toRawEvent(eventName: string, filePath: string): RawEvent | null {
    if (!isChokidarEventName(eventName)) return null;
    return { path: filePath, op: CHOKIDAR_OPS[eventName] };
}

export interface ChokidarEventSourceOptions {
    /** Use stat polling instead of native events (network mounts, containers). */
    usePolling?: boolean;
    /** @default 100 */
    pollIntervalMs?: number;
}

/**
 * {@link EventSource} over a single chokidar watcher.
 *
 * Every subscribed directory is watched with `depth: 0`: its immediate
 * entries report events, its subdirectories need their own subscription.
 * Recursion is the WatchSet's job.
 */
export class ChokidarEventSource implements EventSource {
    readonly #watcher: FSWatcher;
    readonly #listeners: Set<RawEventListener> = new Set();
    readonly #errorListeners: Set<EventSourceErrorListener> = new Set();
    #closed = false;

    private constructor(watcher: FSWatcher) {
        this.#watcher = watcher;

        watcher.on('all', (eventName: string, filePath: string) => {
            const event = toRawEvent(eventName, filePath);
            if (event) this.#emit(event);
        });

        watcher.on('error', (err: unknown) => {
            const error = err instanceof Error ? err : new Error(String(err));
            if (this.#errorListeners.size === 0) {
                console.error('[EventSource] Watcher error:', error.message);
                return;
            }
            for (const listener of this.#errorListeners) {
                listener(error);
            }
        });
    }

    /** Open a watcher with nothing subscribed yet. Throws {@link SetupError} on failure. */
    static open(options: ChokidarEventSourceOptions = {}): ChokidarEventSource {
        try {
            const watcher = watch([], {
                persistent: true,
                ignoreInitial: true,
                depth: 0,
                usePolling: options.usePolling ?? false,
                interval: options.pollIntervalMs ?? 100,
            });
            return new ChokidarEventSource(watcher);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            throw new SetupError(`Failed to open file watcher: ${message}`);
        }
    }

    subscribe(directory: string): void {
        if (this.#closed) return;
        this.#watcher.add(directory);
    }

    onEvent(listener: RawEventListener): () => void {
        this.#listeners.add(listener);
        return () => {
            this.#listeners.delete(listener);
        };
    }

    onError(listener: EventSourceErrorListener): () => void {
        this.#errorListeners.add(listener);
        return () => {
            this.#errorListeners.delete(listener);
        };
    }

    async close(): Promise<void> {
        if (this.#closed) return;
        this.#closed = true;
        this.#listeners.clear();
        this.#errorListeners.clear();
        await this.#watcher.close();
        await logThought('[EventSource] Watcher closed.');
    }

    #emit(event: RawEvent): void {
        for (const listener of this.#listeners) {
            listener(event);
        }
    }
}
