import { logThought } from '../utils/logger.js';
import { createTaskContext, writeLine } from './task-context.js';
import { TaskError } from '../types/pipeline.js';
import type { EventBatch, OutputSink, RawEvent, Workflow } from '../types/pipeline.js';

export interface WorkflowDispatcherOptions {
    /** Pipeline name used to prefix failure lines. */
    name: string;
    /** Read on every event so workflows added while running take part. */
    workflows: () => readonly Workflow[];
    /** Fire-and-forget recursive rescan for each event. */
    rescan: (event: RawEvent) => Promise<unknown>;
    out: OutputSink;
    err: OutputSink;
    verbose: boolean;
}

function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Runs matching workflows for each event of a batch.
 *
 * Events are handled strictly in batch order and every matching workflow
 * finishes before the next one is tried, each with its own context. The
 * rescan for an event is started first and never awaited. A failing
 * workflow never stops dispatch: task failures were already reported by the
 * chain itself, anything else is written to the error sink here.
 */
export class WorkflowDispatcher {
    readonly #options: WorkflowDispatcherOptions;

    constructor(options: WorkflowDispatcherOptions) {
        this.#options = options;
    }

    async dispatch(batch: EventBatch): Promise<void> {
        for (const event of batch) {
            this.#startRescan(event);
            await this.#dispatchEvent(event);
        }
    }

    #startRescan(event: RawEvent): void {
        this.#options.rescan(event).catch((err: unknown) => {
            void logThought(`[Dispatcher] Rescan of ${event.path} failed: ${describeError(err)}`);
        });
    }

    async #dispatchEvent(event: RawEvent): Promise<void> {
        const { name, out, err, verbose } = this.#options;
        if (verbose) {
            writeLine(out, `Watcher event ${event.path} ${event.op}`);
        }

        for (const workflow of this.#options.workflows()) {
            try {
                if (!workflow.match(event.path, event.op)) continue;
                await workflow.run(createTaskContext({ src: event.path, out, err, verbose }));
            } catch (error) {
                const label = workflow.name ? ` '${workflow.name}'` : '';
                const message = describeError(error);
                if (!(error instanceof TaskError)) {
                    writeLine(err, `[${name}] workflow${label} failed for ${event.path}: ${message}`);
                }
                void logThought(`[Dispatcher] Workflow${label} failed for ${event.path}: ${message}`);
            }
        }
    }
}
