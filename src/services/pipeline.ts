import { logThought } from '../utils/logger.js';
import { AsyncChannel } from '../utils/async-channel.js';
import { ChokidarEventSource } from './event-source.js';
import { DEFAULT_BATCH_INTERVAL_MS, EventBatcher } from './event-batcher.js';
import { writeLine } from './task-context.js';
import { WatchSet } from './watch-set.js';
import { WorkflowDispatcher } from './workflow-dispatcher.js';
import { SetupError } from '../types/pipeline.js';
import type {
    EventBatch,
    EventSource,
    EventSourceFactory,
    OutputSink,
    PipelineOptions,
    PipelineRun,
    PipelineState,
    Workflow,
} from '../types/pipeline.js';

const UNNAMED = '<UNNAMED>';

/** Resources that exist only between `start()` and `stop()`. */
interface LiveHandles {
    source: EventSource;
    batcher: EventBatcher;
    channel: AsyncChannel<EventBatch>;
    unsubscribe: (() => void)[];
    done: Promise<void>;
}

/**
 * Watches directories, batches their change events and runs every workflow
 * whose pattern matches a changed path.
 *
 * Usage:
 * ```ts
 * const pipeline = new Pipeline({ name: 'api', verbose: true });
 * await pipeline.watchRecursive('./src', true);
 * pipeline.add(new PatternWorkflow({ name: 'ts', patterns: [/\.ts$/], tasks: [createTscTask()] }));
 * const run = await pipeline.start();
 * // …later, from anywhere
 * await run.stop();
 * ```
 *
 * Watches may be added before or after `start()`; once running they are
 * subscribed immediately.
 */
export class Pipeline {
    readonly name: string;
    readonly verbose: boolean;
    readonly out: OutputSink;
    readonly err: OutputSink;
    readonly #batchIntervalMs: number;
    readonly #openEventSource: EventSourceFactory;
    readonly #watchSet: WatchSet;
    readonly #workflows: Workflow[] = [];
    #state: PipelineState = 'configured';
    #live: LiveHandles | null = null;

    constructor(options: PipelineOptions = {}) {
        this.name = options.name?.trim() || UNNAMED;
        this.verbose = options.verbose ?? false;
        this.out = options.out ?? process.stdout;
        this.err = options.err ?? process.stderr;
        this.#batchIntervalMs = options.batchIntervalMs ?? DEFAULT_BATCH_INTERVAL_MS;
        this.#openEventSource = options.openEventSource ?? (() => ChokidarEventSource.open({
            usePolling: options.usePolling,
            pollIntervalMs: options.pollIntervalMs,
        }));
        this.#watchSet = new WatchSet({ out: this.out, verbose: this.verbose });
    }

    get state(): PipelineState {
        return this.#state;
    }

    /** Watched directories in registration order, canonicalized. */
    get watches(): readonly string[] {
        return this.#watchSet.paths;
    }

    get recursiveRoots(): ReadonlyMap<string, boolean> {
        return this.#watchSet.recursiveRoots;
    }

    get workflows(): readonly Workflow[] {
        return [...this.#workflows];
    }

    /** Watch one directory. Resolves to its canonical path; rejects with `ResolutionError`. */
    watch(directory: string): Promise<string> {
        return this.#watchSet.add(directory);
    }

    /** Watch a directory and every directory below it, now and as they appear. */
    watchRecursive(directory: string, ignoreHidden = true): Promise<void> {
        return this.#watchSet.addRecursive(directory, ignoreHidden);
    }

    add(...workflows: Workflow[]): void {
        this.#workflows.push(...workflows);
    }

    /**
     * Open the event source, subscribe every watch and begin dispatching.
     * Rejects with {@link SetupError} when the event source cannot be opened;
     * the pipeline then stays configured.
     */
    async start(): Promise<PipelineRun> {
        if (this.#state !== 'configured') {
            throw new Error(`[Pipeline] '${this.name}' cannot start while ${this.#state}.`);
        }

        if (this.#watchSet.paths.length === 0) {
            writeLine(this.err, `Pipeline ${this.name} is not watching anything`);
        }
        if (this.#workflows.length === 0) {
            writeLine(this.err, `Pipeline ${this.name} has no workflows`);
        }

        let source: EventSource;
        try {
            source = await this.#openEventSource();
        } catch (error) {
            const setupError = error instanceof SetupError
                ? error
                : new SetupError(error instanceof Error ? error.message : String(error));
            writeLine(this.err, setupError.message);
            void logThought(`[Pipeline] '${this.name}' failed to start: ${setupError.message}`);
            throw setupError;
        }

        const channel = new AsyncChannel<EventBatch>();
        const batcher = new EventBatcher({
            intervalMs: this.#batchIntervalMs,
            onBatch: (batch) => {
                channel.push(batch);
            },
        });

        const unsubscribe = [
            source.onEvent((event) => batcher.push(event)),
            source.onError((error) => {
                writeLine(this.err, `Watcher error: ${error.message}`);
                void logThought(`[Pipeline] '${this.name}' watcher error: ${error.message}`);
            }),
        ];

        batcher.start();

        this.#watchSet.attach(source);
        if (this.verbose) {
            for (const directory of this.#watchSet.paths) {
                writeLine(this.out, `Watching ${directory}`);
            }
        }

        const dispatcher = new WorkflowDispatcher({
            name: this.name,
            workflows: () => this.#workflows,
            rescan: (event) => this.#watchSet.rescan(event),
            out: this.out,
            err: this.err,
            verbose: this.verbose,
        });

        const done = this.#dispatchLoop(channel, dispatcher);
        this.#live = { source, batcher, channel, unsubscribe, done };
        this.#state = 'running';

        await logThought(
            `[Pipeline] '${this.name}' started: ${this.#watchSet.paths.length} watches, ${this.#workflows.length} workflows.`,
        );

        return {
            done,
            stop: () => this.stop(),
        };
    }

    /**
     * Start and block until the pipeline is stopped, either through
     * `stop()` or by aborting `signal`.
     */
    async run(signal?: AbortSignal): Promise<void> {
        const handle = await this.start();
        if (signal) {
            if (signal.aborted) {
                await handle.stop();
            } else {
                signal.addEventListener('abort', () => {
                    void handle.stop();
                }, { once: true });
            }
        }
        await handle.done;
    }

    /**
     * Stop intake of new events and release the event source. Task chains
     * already running are not cancelled.
     */
    async stop(): Promise<void> {
        const live = this.#live;
        if (!live) return;

        this.#live = null;
        this.#state = 'stopped';

        live.batcher.stop();
        live.channel.close();
        for (const unsubscribe of live.unsubscribe) {
            unsubscribe();
        }
        this.#watchSet.detach();

        try {
            await live.source.close();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            writeLine(this.err, `Failed to close watcher: ${message}`);
        }

        await logThought(`[Pipeline] '${this.name}' stopped.`);
    }

    async #dispatchLoop(channel: AsyncChannel<EventBatch>, dispatcher: WorkflowDispatcher): Promise<void> {
        for await (const batch of channel) {
            await dispatcher.dispatch(batch);
        }
    }
}
