import { logThought } from '../utils/logger.js';
import { writeLine } from './task-context.js';
import { ALL_OPS, TaskError } from '../types/pipeline.js';
import type { Task, TaskContext, Workflow } from '../types/pipeline.js';

export interface PatternWorkflowConfig {
    name: string;
    /** A path matches when any pattern matches it. */
    patterns: RegExp[];
    /** Paths matching any of these are never dispatched. */
    ignore?: RegExp[];
    /** Bitmask of FileOp flags to react to. @default ALL_OPS */
    ops?: number;
    /**
     * Start the chain without waiting for it, so the dispatch loop moves on
     * to the next workflow immediately. @default false
     */
    concurrent?: boolean;
    tasks: Task[];
}

function testPattern(pattern: RegExp, value: string): boolean {
    // Global and sticky patterns keep state between calls.
    pattern.lastIndex = 0;
    return pattern.test(value);
}

/**
 * Workflow that matches file paths against regular expressions and runs a
 * chain of tasks. Each task's `target` becomes the next task's `src`; the
 * first failure ends the chain.
 */
export class PatternWorkflow implements Workflow {
    readonly name: string;
    readonly #patterns: RegExp[];
    readonly #ignore: RegExp[];
    readonly #ops: number;
    readonly #concurrent: boolean;
    readonly #tasks: Task[];

    constructor(config: PatternWorkflowConfig) {
        this.name = config.name;
        this.#patterns = [...config.patterns];
        this.#ignore = [...(config.ignore ?? [])];
        this.#ops = config.ops ?? ALL_OPS;
        this.#concurrent = config.concurrent ?? false;
        this.#tasks = [...config.tasks];
    }

    get tasks(): readonly Task[] {
        return [...this.#tasks];
    }

    match(filePath: string, op: number): boolean {
        if ((op & this.#ops) === 0) return false;
        if (this.#ignore.some((pattern) => testPattern(pattern, filePath))) return false;
        return this.#patterns.some((pattern) => testPattern(pattern, filePath));
    }

    async run(context: TaskContext): Promise<void> {
        if (!this.#concurrent) {
            await this.#runChain(context);
            return;
        }

        this.#runChain(context).catch((error: unknown) => {
            const message = error instanceof Error ? error.message : String(error);
            void logThought(`[Workflow] '${this.name}' concurrent chain failed for ${context.src}: ${message}`);
        });
    }

    async #runChain(context: TaskContext): Promise<void> {
        for (const task of this.#tasks) {
            try {
                await task.run(context);
            } catch (error) {
                const taskError = error instanceof TaskError
                    ? error
                    : new TaskError(task.label ?? 'task', error instanceof Error ? error.message : String(error));
                writeLine(context.err, `Error: ${taskError.message}`);
                throw taskError;
            }
            context.src = context.target;
        }
    }
}
