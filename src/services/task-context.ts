import type { OutputSink, ScratchBuffer, TaskContext } from '../types/pipeline.js';

/** In-memory {@link ScratchBuffer} tasks capture command output into. */
export class TaskBuffer implements ScratchBuffer {
    #chunks: string[] = [];
    #length = 0;

    get length(): number {
        return this.#length;
    }

    write(chunk: string): boolean {
        if (chunk.length === 0) return true;
        this.#chunks.push(chunk);
        this.#length += chunk.length;
        return true;
    }

    reset(): void {
        this.#chunks = [];
        this.#length = 0;
    }

    toString(): string {
        return this.#chunks.join('');
    }

    writeTo(sink: OutputSink): void {
        if (this.#length === 0) return;
        // One write keeps the block contiguous when several tasks share a sink.
        sink.write(this.toString());
        this.reset();
    }
}

export interface TaskContextInit {
    src: string;
    out: OutputSink;
    err: OutputSink;
    verbose: boolean;
}

/** Fresh context for one dispatch. Contexts are never shared across events. */
export function createTaskContext(init: TaskContextInit): TaskContext {
    return {
        src: init.src,
        target: init.src,
        out: init.out,
        err: init.err,
        buf: new TaskBuffer(),
        verbose: init.verbose,
    };
}

/** Write a single whole line to a shared sink. */
export function writeLine(sink: OutputSink, line: string): void {
    sink.write(`${line}\n`);
}
