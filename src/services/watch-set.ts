import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { logThought } from '../utils/logger.js';
import { isHidden, isPathContained, resolveWatchPath } from '../utils/paths.js';
import { writeLine } from './task-context.js';
import { DIRECTORY_OPS } from '../types/pipeline.js';
import type { EventSource, OutputSink, RawEvent } from '../types/pipeline.js';

export interface WatchSetOptions {
    /** @default resolveWatchPath */
    resolve?: (target: string) => Promise<string>;
    /** @default isHidden */
    isHidden?: (target: string) => boolean;
    /** Receives resolution failures when `verbose` is set. */
    out?: OutputSink;
    verbose?: boolean;
}

/** True when `op` only carries flags that can announce a new directory. */
export function isDirectoryOp(op: number): boolean {
    return op !== 0 && (op & DIRECTORY_OPS) === op;
}

async function isExistingDirectory(target: string): Promise<boolean> {
    try {
        return (await stat(target)).isDirectory();
    } catch {
        return false;
    }
}

/**
 * The directories a pipeline watches, plus the recursive roots whose
 * subtrees are kept under watch as new directories appear.
 *
 * Resolution and directory walks are asynchronous, but every mutation
 * (duplicate check, append, subscribe) runs as one synchronous step on the
 * event loop, so concurrent rescans never lose or duplicate an entry.
 * Recursive roots are only ever added.
 */
export class WatchSet {
    readonly #paths: string[] = [];
    readonly #known: Set<string> = new Set();
    readonly #recursiveRoots: Map<string, boolean> = new Map();
    readonly #resolve: (target: string) => Promise<string>;
    readonly #isHidden: (target: string) => boolean;
    readonly #out: OutputSink | undefined;
    readonly #verbose: boolean;
    #source: EventSource | null = null;

    constructor(options: WatchSetOptions = {}) {
        this.#resolve = options.resolve ?? resolveWatchPath;
        this.#isHidden = options.isHidden ?? isHidden;
        this.#out = options.out;
        this.#verbose = options.verbose ?? false;
    }

    /** Watched directories in registration order. */
    get paths(): readonly string[] {
        return [...this.#paths];
    }

    /** Recursive root → ignoreHidden policy. */
    get recursiveRoots(): ReadonlyMap<string, boolean> {
        return new Map(this.#recursiveRoots);
    }

    has(resolvedPath: string): boolean {
        return this.#known.has(resolvedPath);
    }

    /** Subscribe every current path to `source` and every later one as it is added. */
    attach(source: EventSource): void {
        this.#source = source;
        for (const target of this.#paths) {
            source.subscribe(target);
        }
    }

    detach(): void {
        this.#source = null;
    }

    /**
     * Add one directory. Resolves to its canonical path, which is also
     * returned when it was already watched.
     */
    async add(target: string): Promise<string> {
        let resolved: string;
        try {
            resolved = await this.#resolve(target);
        } catch (err) {
            if (this.#verbose && this.#out) {
                writeLine(this.#out, err instanceof Error ? err.message : String(err));
            }
            throw err;
        }

        this.#commit(resolved);
        return resolved;
    }

    /**
     * Record `target` as a recursive root and add it with every directory
     * below it. With `ignoreHidden`, hidden directories and their subtrees
     * are skipped. Unreadable entries are skipped without failing the walk.
     */
    async addRecursive(target: string, ignoreHidden: boolean): Promise<void> {
        const root = await this.#resolve(target);
        this.#recursiveRoots.set(root, ignoreHidden);
        await this.#walk(root, ignoreHidden);
    }

    /**
     * Bring a newly created or renamed directory under watch when it lies
     * inside a recursive root. The first containing root whose hidden policy
     * admits the path wins. Resolves to whether a rescan happened.
     */
    async rescan(event: RawEvent): Promise<boolean> {
        if (!isDirectoryOp(event.op)) return false;
        if (!(await isExistingDirectory(event.path))) return false;

        const hidden = this.#isHidden(event.path);
        for (const [root, ignoreHidden] of [...this.#recursiveRoots]) {
            if (hidden && ignoreHidden) continue;
            if (!isPathContained(root, event.path)) continue;

            await this.addRecursive(event.path, ignoreHidden);
            void logThought(`[WatchSet] Rescanned ${event.path} under recursive root ${root}`);
            return true;
        }
        return false;
    }

    async #walk(directory: string, ignoreHidden: boolean): Promise<void> {
        try {
            await this.add(directory);
        } catch {
            return;
        }

        let entries: Dirent[];
        try {
            entries = await readdir(directory, { withFileTypes: true });
        } catch {
            return;
        }

        for (const entry of entries) {
            if (!entry.isDirectory()) continue;
            const child = path.join(directory, entry.name);
            if (ignoreHidden && this.#isHidden(child)) continue;
            await this.#walk(child, ignoreHidden);
        }
    }

    #commit(resolved: string): void {
        if (this.#known.has(resolved)) return;
        this.#known.add(resolved);
        this.#paths.push(resolved);
        this.#source?.subscribe(resolved);
    }
}
