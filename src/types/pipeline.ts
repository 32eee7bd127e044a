/**
 * Filesystem operation bit flags carried by every raw event.
 * Several flags may be combined in one event.
 */
export const FileOp = {
    Create: 1,
    Write: 2,
    Remove: 4,
    Rename: 8,
    Chmod: 16,
} as const;

export type FileOpName = 'create' | 'write' | 'remove' | 'rename' | 'chmod';

export const FILE_OP_NAMES: Record<FileOpName, number> = {
    create: FileOp.Create,
    write: FileOp.Write,
    remove: FileOp.Remove,
    rename: FileOp.Rename,
    chmod: FileOp.Chmod,
};

/** Every operation flag set. */
export const ALL_OPS = FileOp.Create | FileOp.Write | FileOp.Remove | FileOp.Rename | FileOp.Chmod;

/** Operations that may announce a new directory. */
export const DIRECTORY_OPS = FileOp.Create | FileOp.Rename;

/** Raw event reported by an {@link EventSource}. */
export interface RawEvent {
    /** Absolute path of the affected file or directory. */
    path: string;
    /** Bitwise combination of {@link FileOp} flags. */
    op: number;
}

/** Events accumulated during one coalescing window, in arrival order. */
export type EventBatch = readonly RawEvent[];

export type RawEventListener = (event: RawEvent) => void;
export type EventSourceErrorListener = (error: Error) => void;

/** OS-level notifier the pipeline subscribes directories to. */
export interface EventSource {
    subscribe(path: string): void;
    /** Returns an unsubscribe function. */
    onEvent(listener: RawEventListener): () => void;
    /** Returns an unsubscribe function. */
    onError(listener: EventSourceErrorListener): () => void;
    close(): Promise<void>;
}

/** Opens a fresh event source on every pipeline start. */
export type EventSourceFactory = () => Promise<EventSource> | EventSource;

/** Append-only text sink shared by every task of a pipeline. */
export interface OutputSink {
    write(chunk: string): unknown;
}

/** Reusable scratch text buffer handed to tasks through their context. */
export interface ScratchBuffer extends OutputSink {
    readonly length: number;
    reset(): void;
    toString(): string;
    /** Copies the buffered text to `sink` and empties the buffer. */
    writeTo(sink: OutputSink): void;
}

/** Mutable per-dispatch record threaded through a workflow's task chain. */
export interface TaskContext {
    /** Path that triggered the dispatch, or the previous task's target. */
    src: string;
    /** Artifact path produced by the current task; later tasks read it. */
    target: string;
    out: OutputSink;
    err: OutputSink;
    buf: ScratchBuffer;
    verbose: boolean;
}

/** A single unit of work in a task chain. Rejects on failure. */
export interface Task {
    readonly label?: string;
    run(context: TaskContext): Promise<void>;
}

/** A match predicate paired with a task chain. */
export interface Workflow {
    readonly name?: string;
    match(path: string, op: number): boolean;
    run(context: TaskContext): Promise<void>;
}

export type PipelineState = 'configured' | 'running' | 'stopped';

/** Handle for a started pipeline. */
export interface PipelineRun {
    /** Settles once the dispatch loop has exited. */
    readonly done: Promise<void>;
    stop(): Promise<void>;
}

export interface PipelineOptions {
    /** @default '<UNNAMED>' */
    name?: string;
    /** @default false */
    verbose?: boolean;
    /** Coalescing window in ms. @default 300 */
    batchIntervalMs?: number;
    /** @default process.stdout */
    out?: OutputSink;
    /** @default process.stderr */
    err?: OutputSink;
    /** @default ChokidarEventSource.open */
    openEventSource?: EventSourceFactory;
    /** Passed to the default chokidar source: poll with stat instead of native events. @default false */
    usePolling?: boolean;
    /** Poll interval for the default chokidar source. @default 100 */
    pollIntervalMs?: number;
}

export class ResolutionError extends Error {
    readonly path: string;

    constructor(path: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Cannot resolve watch path '${path}': ${reason}`);
        this.name = 'ResolutionError';
        this.path = path;
    }
}

export class SetupError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SetupError';
    }
}

export class TaskError extends Error {
    readonly task: string;
    readonly exitCode: number | null;

    constructor(task: string, message: string, exitCode: number | null = null) {
        super(message);
        this.name = 'TaskError';
        this.task = task;
        this.exitCode = exitCode;
    }
}
