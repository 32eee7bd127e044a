/**
 * Tasks that act on the Node project containing the changed file: the
 * nearest directory above it with a `package.json`. None of them change
 * `target`.
 */

import { CommandTask } from './command-task.js';
import type { CommandRunner } from '../types/tasks.js';

export interface ProjectTaskOptions {
    args?: string[];
    timeoutMs?: number;
    runner?: CommandRunner;
}

/** `npm run <script> [-- args]` in the project root. */
export function createNpmScriptTask(script: string, options: ProjectTaskOptions = {}): CommandTask {
    const extra = options.args ?? [];
    return new CommandTask({
        label: `npm run ${script}`,
        command: 'npm',
        args: ['run', script, ...(extra.length > 0 ? ['--', ...extra] : [])],
        cwd: '{root}',
        timeoutMs: options.timeoutMs,
        runner: options.runner,
    });
}

export function createNpmTestTask(options: ProjectTaskOptions = {}): CommandTask {
    const extra = options.args ?? [];
    return new CommandTask({
        label: 'npm test',
        command: 'npm',
        args: ['test', ...(extra.length > 0 ? ['--', ...extra] : [])],
        cwd: '{root}',
        timeoutMs: options.timeoutMs,
        runner: options.runner,
    });
}

export function createNpmBuildTask(options: ProjectTaskOptions = {}): CommandTask {
    return createNpmScriptTask('build', options);
}

/** Type-check the project with its local compiler. */
export function createTscTask(options: ProjectTaskOptions = {}): CommandTask {
    return new CommandTask({
        label: 'tsc',
        command: 'npx',
        args: ['--no-install', 'tsc', '--noEmit', '-p', '{root}', ...(options.args ?? [])],
        cwd: '{root}',
        timeoutMs: options.timeoutMs,
        runner: options.runner,
    });
}

/** Lint the changed file. Any reported finding fails the task, even on exit code 0. */
export function createEslintTask(options: ProjectTaskOptions = {}): CommandTask {
    return new CommandTask({
        label: 'eslint',
        command: 'npx',
        args: ['--no-install', 'eslint', ...(options.args ?? []), '{src}'],
        cwd: '{root}',
        timeoutMs: options.timeoutMs,
        failOnOutput: true,
        runner: options.runner,
    });
}
