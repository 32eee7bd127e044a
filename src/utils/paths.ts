import { realpath, stat } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ResolutionError } from '../types/pipeline.js';

/**
 * Resolve a watch target to its canonical absolute directory path.
 *
 * `~` expands to the home directory and relative paths resolve against the
 * working directory. Symlinks are followed. Rejects with
 * {@link ResolutionError} when the path is missing, unreadable or not a
 * directory.
 */
export async function resolveWatchPath(target: string): Promise<string> {
    let expanded = target.trim();
    if (expanded === '~' || expanded.startsWith('~/')) {
        expanded = path.join(os.homedir(), expanded.slice(1));
    }

    try {
        const resolved = await realpath(path.resolve(expanded));
        const info = await stat(resolved);
        if (!info.isDirectory()) {
            throw new Error('not a directory');
        }
        return resolved;
    } catch (err) {
        throw new ResolutionError(target, err);
    }
}

/** Dotfiles and dot-directories are hidden. `.` and `..` are not. */
export function isHidden(target: string): boolean {
    const base = path.basename(target);
    return base.startsWith('.') && base !== '.' && base !== '..';
}

/**
 * True when `candidate` is `root` itself or lies below it.
 * Anything that cannot be proven contained (other drive, escape via `..`)
 * is reported as not contained.
 */
export function isPathContained(root: string, candidate: string): boolean {
    const relative = path.relative(root, candidate);
    if (relative === '') return true;
    if (path.isAbsolute(relative)) return false;
    return relative !== '..' && !relative.startsWith(`..${path.sep}`);
}

async function statKind(target: string): Promise<'file' | 'directory' | null> {
    try {
        const info = await stat(target);
        if (info.isDirectory()) return 'directory';
        return info.isFile() ? 'file' : null;
    } catch {
        return null;
    }
}

/**
 * Nearest directory at or above `source` that holds a `package.json`.
 * Falls back to the directory of `source` when none is found.
 */
export async function findProjectRoot(source: string): Promise<string> {
    const start = (await statKind(source)) === 'directory' ? source : path.dirname(source);
    let current = start;

    for (;;) {
        if ((await statKind(path.join(current, 'package.json'))) === 'file') return current;
        const parent = path.dirname(current);
        if (parent === current) return start;
        current = parent;
    }
}
