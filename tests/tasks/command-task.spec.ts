import { afterEach, describe, expect, it, vi } from 'vitest';
import { mkdir, mkdtemp, realpath, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn(async () => undefined),
    logSystemCommand: vi.fn(async () => undefined),
    scrubSensitiveText: vi.fn((text: string) => text),
}));

import { CommandTask, expandPlaceholders } from '../../src/tasks/command-task.js';
import { runCommand } from '../../src/tasks/command-runner.js';
import {
    createEslintTask,
    createNpmBuildTask,
    createNpmScriptTask,
    createNpmTestTask,
    createTscTask,
} from '../../src/tasks/project-tasks.js';
import { createTaskContext } from '../../src/services/task-context.js';
import { TaskError } from '../../src/types/pipeline.js';
import type { CommandExecutionResult, CommandInvocation } from '../../src/types/tasks.js';
import { MemorySink } from '../harness/fake-event-source.js';

function fakeRunner(result: Partial<CommandExecutionResult> = {}) {
    return vi.fn(async (_invocation: CommandInvocation): Promise<CommandExecutionResult> => ({
        ok: true,
        exitCode: 0,
        stdout: '',
        stderr: '',
        durationMs: 1,
        ...result,
    }));
}

function contextFor(src: string) {
    const out = new MemorySink();
    const err = new MemorySink();
    return { context: createTaskContext({ src, out, err, verbose: false }), out, err };
}

describe('expandPlaceholders', () => {
    it('substitutes every known placeholder and leaves others alone', () => {
        const values = { src: '/w/a.ts', target: '/w/a.js', dir: '/w', root: '/r' };

        expect(expandPlaceholders('{src}:{target}:{dir}:{root}:{src}', values)).toBe('/w/a.ts:/w/a.js:/w:/r:/w/a.ts');
        expect(expandPlaceholders('{unknown} {SRC}', values)).toBe('{unknown} {SRC}');
    });
});

describe('CommandTask', () => {
    const workspaces: string[] = [];

    afterEach(async () => {
        await Promise.all(workspaces.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
    });

    async function createProject(): Promise<string> {
        const root = await realpath(await mkdtemp(path.join(os.tmpdir(), 'watchflow-task-')));
        workspaces.push(root);
        await mkdir(path.join(root, 'src'));
        await writeFile(path.join(root, 'package.json'), '{"name":"fixture"}\n');
        return root;
    }

    it('runs in the file directory and flushes captured output before ok', async () => {
        const runner = fakeRunner({ stdout: 'compiled\n' });
        const task = new CommandTask({ command: 'tsc', args: ['--noEmit', '{src}'], runner });
        const { context, out, err } = contextFor('/w/src/a.ts');
        context.buf.write('stale');

        await task.run(context);

        expect(task.label).toBe('tsc --noEmit {src}');
        expect(runner).toHaveBeenCalledWith({
            executable: 'tsc',
            args: ['--noEmit', '/w/src/a.ts'],
            cwd: '/w/src',
            timeoutMs: undefined,
        });
        expect(out.text).toBe('tsc --noEmit {src} ... /w/src\ncompiled\nok\n');
        expect(err.chunks).toEqual([]);
        expect(context.target).toBe('/w/src/a.ts');
        expect(context.buf.length).toBe(0);
    });

    it('fails with the exit code and still flushes output', async () => {
        const runner = fakeRunner({ ok: false, exitCode: 2, stdout: 'a.ts(1,1): error\n', stderr: 'warn\n' });
        const task = new CommandTask({ label: 'build', command: 'make', runner });
        const { context, out, err } = contextFor('/w/src/a.ts');

        const failure = task.run(context);

        await expect(failure).rejects.toBeInstanceOf(TaskError);
        await expect(failure).rejects.toMatchObject({
            task: 'build',
            message: 'build failed with exit code 2',
            exitCode: 2,
        });
        expect(out.text).toBe('build ... /w/src\na.ts(1,1): error\n');
        expect(err.text).toBe('warn\n');
    });

    it('fails on any output when failOnOutput is set', async () => {
        const runner = fakeRunner({ stdout: '1:1 error Unexpected var\n' });
        const task = new CommandTask({ label: 'lint', command: 'lint', failOnOutput: true, runner });
        const { context, out } = contextFor('/w/a.ts');

        await expect(task.run(context)).rejects.toThrow('lint reported problems');
        expect(out.text).toBe('lint ... /w\n1:1 error Unexpected var\n');
    });

    it('passes the timeout and custom cwd to the runner', async () => {
        const runner = fakeRunner();
        const task = new CommandTask({ command: 'cp', args: ['{src}', '{target}.bak'], cwd: '/tmp', timeoutMs: 500, runner });
        const { context } = contextFor('/w/a.ts');

        await task.run(context);

        expect(runner).toHaveBeenCalledWith({
            executable: 'cp',
            args: ['/w/a.ts', '/w/a.ts.bak'],
            cwd: '/tmp',
            timeoutMs: 500,
        });
    });

    it('resolves {root} to the nearest package.json directory', async () => {
        const root = await createProject();
        const runner = fakeRunner();
        const task = new CommandTask({ command: 'echo', args: ['{root}'], cwd: '{root}', runner });
        const { context } = contextFor(path.join(root, 'src', 'a.ts'));

        await task.run(context);

        expect(runner).toHaveBeenCalledWith({ executable: 'echo', args: [root], cwd: root, timeoutMs: undefined });
    });

    describe('project tasks', () => {
        it('builds npm script invocations', async () => {
            const root = await createProject();
            const src = path.join(root, 'src', 'a.ts');
            const runner = fakeRunner();

            const script = createNpmScriptTask('lint', { args: ['--fix'], runner });
            const test = createNpmTestTask({ runner });
            const build = createNpmBuildTask({ runner });
            for (const task of [script, test, build]) {
                await task.run(contextFor(src).context);
            }

            expect([script.label, test.label, build.label]).toEqual(['npm run lint', 'npm test', 'npm run build']);
            expect(runner.mock.calls.map(([invocation]) => invocation)).toEqual([
                { executable: 'npm', args: ['run', 'lint', '--', '--fix'], cwd: root, timeoutMs: undefined },
                { executable: 'npm', args: ['test'], cwd: root, timeoutMs: undefined },
                { executable: 'npm', args: ['run', 'build'], cwd: root, timeoutMs: undefined },
            ]);
        });

        it('type-checks the project and lints the changed file', async () => {
            const root = await createProject();
            const src = path.join(root, 'src', 'a.ts');
            const runner = fakeRunner();

            const tsc = createTscTask({ timeoutMs: 60_000, runner });
            const eslint = createEslintTask({ args: ['--max-warnings', '0'], runner });
            await tsc.run(contextFor(src).context);
            await eslint.run(contextFor(src).context);

            expect(runner.mock.calls.map(([invocation]) => invocation)).toEqual([
                { executable: 'npx', args: ['--no-install', 'tsc', '--noEmit', '-p', root], cwd: root, timeoutMs: 60_000 },
                { executable: 'npx', args: ['--no-install', 'eslint', '--max-warnings', '0', src], cwd: root, timeoutMs: undefined },
            ]);
        });

        it('fails eslint on reported findings', async () => {
            const root = await createProject();
            const eslint = createEslintTask({ runner: fakeRunner({ stdout: 'src/a.ts\n  1:1  error  no-var\n' }) });

            await expect(eslint.run(contextFor(path.join(root, 'src', 'a.ts')).context)).rejects.toThrow(
                'eslint reported problems',
            );
        });
    });
});

describe('runCommand', () => {
    it('reports a missing executable as a failed result', async () => {
        const result = await runCommand({
            executable: 'watchflow-missing-executable',
            args: [],
            cwd: os.tmpdir(),
        });

        expect(result.ok).toBe(false);
        expect(result.exitCode).toBe(1);
        expect(result.stdout).toBe('');
        expect(result.stderr).toContain('ENOENT');
    });
});
