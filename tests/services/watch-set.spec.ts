import { afterEach, describe, expect, it, vi } from 'vitest';
import { mkdir, mkdtemp, realpath, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn(async () => undefined),
}));

import { WatchSet, isDirectoryOp } from '../../src/services/watch-set.js';
import { FileOp, ResolutionError } from '../../src/types/pipeline.js';
import { FakeEventSource, MemorySink } from '../harness/fake-event-source.js';

describe('WatchSet', () => {
    const workspaces: string[] = [];

    afterEach(async () => {
        await Promise.all(workspaces.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
    });

    async function createWorkspace(...dirs: string[]): Promise<string> {
        const root = await realpath(await mkdtemp(path.join(os.tmpdir(), 'watchflow-watchset-')));
        workspaces.push(root);
        for (const dir of dirs) {
            await mkdir(path.join(root, dir), { recursive: true });
        }
        return root;
    }

    describe('add', () => {
        it('keeps one entry for paths resolving to the same directory', async () => {
            const root = await createWorkspace('src');
            const watchSet = new WatchSet();

            const first = await watchSet.add(path.join(root, 'src'));
            const second = await watchSet.add(path.join(root, 'src', '..', 'src'));

            expect(first).toBe(path.join(root, 'src'));
            expect(second).toBe(first);
            expect(watchSet.paths).toEqual([path.join(root, 'src')]);
        });

        it('rejects unresolvable paths without mutating and reports them when verbose', async () => {
            const root = await createWorkspace();
            const out = new MemorySink();
            const watchSet = new WatchSet({ out, verbose: true });
            const missing = path.join(root, 'missing');

            await expect(watchSet.add(missing)).rejects.toBeInstanceOf(ResolutionError);

            expect(watchSet.paths).toEqual([]);
            expect(out.lines).toHaveLength(1);
            expect(out.lines[0].startsWith(`Cannot resolve watch path '${missing}'`)).toBe(true);
        });

        it('stays silent about failures when not verbose', async () => {
            const root = await createWorkspace();
            const out = new MemorySink();
            const watchSet = new WatchSet({ out });

            await expect(watchSet.add(path.join(root, 'missing'))).rejects.toThrow(ResolutionError);
            expect(out.chunks).toEqual([]);
        });

        it('subscribes existing and new paths once attached', async () => {
            const root = await createWorkspace('a', 'b');
            const source = new FakeEventSource();
            const watchSet = new WatchSet();

            await watchSet.add(path.join(root, 'a'));
            watchSet.attach(source);
            await watchSet.add(path.join(root, 'b'));
            await watchSet.add(path.join(root, 'b'));

            expect(source.subscribed).toEqual([path.join(root, 'a'), path.join(root, 'b')]);
        });

        it('stops subscribing after detach', async () => {
            const root = await createWorkspace('a');
            const source = new FakeEventSource();
            const watchSet = new WatchSet();
            watchSet.attach(source);
            watchSet.detach();

            await watchSet.add(path.join(root, 'a'));

            expect(source.subscribed).toEqual([]);
            expect(watchSet.has(path.join(root, 'a'))).toBe(true);
        });
    });

    describe('addRecursive', () => {
        it('skips hidden directories and their subtrees when ignoring hidden', async () => {
            const root = await createWorkspace('.git/objects', 'src/lib', 'docs');
            await writeFile(path.join(root, 'src', 'index.ts'), '', 'utf8');
            const watchSet = new WatchSet();

            await watchSet.addRecursive(root, true);

            expect([...watchSet.paths].sort()).toEqual(
                [root, path.join(root, 'docs'), path.join(root, 'src'), path.join(root, 'src', 'lib')].sort(),
            );
            expect(watchSet.recursiveRoots.get(root)).toBe(true);
        });

        it('includes hidden directories when asked to', async () => {
            const root = await createWorkspace('.git/objects');
            const watchSet = new WatchSet();

            await watchSet.addRecursive(root, false);

            expect([...watchSet.paths].sort()).toEqual(
                [root, path.join(root, '.git'), path.join(root, '.git', 'objects')].sort(),
            );
            expect(watchSet.recursiveRoots.get(root)).toBe(false);
        });

        it('propagates a ResolutionError for the root', async () => {
            const root = await createWorkspace();
            const watchSet = new WatchSet();

            await expect(watchSet.addRecursive(path.join(root, 'missing'), true)).rejects.toBeInstanceOf(
                ResolutionError,
            );
            expect(watchSet.recursiveRoots.size).toBe(0);
        });

        it('lists the root first', async () => {
            const root = await createWorkspace('src');
            const watchSet = new WatchSet();

            await watchSet.addRecursive(root, true);

            expect(watchSet.paths[0]).toBe(root);
        });
    });

    describe('rescan', () => {
        it('watches a new directory and its subtree under a recursive root', async () => {
            const root = await createWorkspace('sub');
            const watchSet = new WatchSet();
            await watchSet.addRecursive(root, true);

            const created = path.join(root, 'sub', 'new');
            await mkdir(path.join(created, 'deep'), { recursive: true });

            const rescanned = await watchSet.rescan({ path: created, op: FileOp.Create });

            expect(rescanned).toBe(true);
            expect(watchSet.has(created)).toBe(true);
            expect(watchSet.has(path.join(created, 'deep'))).toBe(true);
            expect(watchSet.recursiveRoots.get(created)).toBe(true);
        });

        it('treats renames like creations', async () => {
            const root = await createWorkspace();
            const watchSet = new WatchSet();
            await watchSet.addRecursive(root, true);
            const renamed = path.join(root, 'renamed');
            await mkdir(renamed);

            expect(await watchSet.rescan({ path: renamed, op: FileOp.Rename })).toBe(true);
            expect(watchSet.has(renamed)).toBe(true);
        });

        it('ignores operations other than create and rename', async () => {
            const root = await createWorkspace();
            const watchSet = new WatchSet();
            await watchSet.addRecursive(root, true);
            const dir = path.join(root, 'touched');
            await mkdir(dir);

            expect(await watchSet.rescan({ path: dir, op: FileOp.Write })).toBe(false);
            expect(await watchSet.rescan({ path: dir, op: FileOp.Create | FileOp.Write })).toBe(false);
            expect(watchSet.has(dir)).toBe(false);
        });

        it('ignores files', async () => {
            const root = await createWorkspace();
            const watchSet = new WatchSet();
            await watchSet.addRecursive(root, true);
            const file = path.join(root, 'index.ts');
            await writeFile(file, '', 'utf8');

            expect(await watchSet.rescan({ path: file, op: FileOp.Create })).toBe(false);
        });

        it('ignores directories outside every recursive root', async () => {
            const root = await createWorkspace('app', 'app-other/new');
            const watchSet = new WatchSet();
            await watchSet.addRecursive(path.join(root, 'app'), true);

            const outside = path.join(root, 'app-other', 'new');
            expect(await watchSet.rescan({ path: outside, op: FileOp.Create })).toBe(false);
            expect(watchSet.has(outside)).toBe(false);
        });

        it('never adds a hidden directory under a root that ignores hidden paths', async () => {
            const root = await createWorkspace();
            const watchSet = new WatchSet();
            await watchSet.addRecursive(root, true);
            const hidden = path.join(root, '.cache');
            await mkdir(hidden);

            expect(await watchSet.rescan({ path: hidden, op: FileOp.Create })).toBe(false);
            expect(watchSet.has(hidden)).toBe(false);
        });

        it('falls through to another root that admits hidden paths', async () => {
            const root = await createWorkspace('app');
            const app = path.join(root, 'app');
            const watchSet = new WatchSet();
            await watchSet.addRecursive(app, true);
            await watchSet.addRecursive(root, false);
            const hidden = path.join(app, '.cache');
            await mkdir(hidden);

            expect(await watchSet.rescan({ path: hidden, op: FileOp.Create })).toBe(true);
            expect(watchSet.has(hidden)).toBe(true);
            expect(watchSet.recursiveRoots.get(hidden)).toBe(false);
        });

        it('adds each directory once when rescans run concurrently', async () => {
            const root = await createWorkspace();
            const source = new FakeEventSource();
            const watchSet = new WatchSet();
            await watchSet.addRecursive(root, true);
            watchSet.attach(source);
            const created = path.join(root, 'burst');
            await mkdir(path.join(created, 'inner'), { recursive: true });

            await Promise.all([
                watchSet.rescan({ path: created, op: FileOp.Create }),
                watchSet.rescan({ path: created, op: FileOp.Create }),
                watchSet.rescan({ path: created, op: FileOp.Rename }),
            ]);

            expect(watchSet.paths.filter((p) => p === created)).toHaveLength(1);
            expect(watchSet.paths.filter((p) => p === path.join(created, 'inner'))).toHaveLength(1);
            expect(source.subscribed.filter((p) => p === created)).toHaveLength(1);
        });
    });

    describe('isDirectoryOp', () => {
        it('accepts create, rename and their combination only', () => {
            expect(isDirectoryOp(FileOp.Create)).toBe(true);
            expect(isDirectoryOp(FileOp.Rename)).toBe(true);
            expect(isDirectoryOp(FileOp.Create | FileOp.Rename)).toBe(true);
            expect(isDirectoryOp(FileOp.Remove)).toBe(false);
            expect(isDirectoryOp(FileOp.Chmod | FileOp.Create)).toBe(false);
            expect(isDirectoryOp(0)).toBe(false);
        });
    });
});
