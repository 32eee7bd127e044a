import path from 'node:path';
import { findProjectRoot } from '../utils/paths.js';
import { writeLine } from '../services/task-context.js';
import { runCommand } from './command-runner.js';
import { TaskError } from '../types/pipeline.js';
import type { Task, TaskContext } from '../types/pipeline.js';
import type { CommandRunner, TaskPlaceholders } from '../types/tasks.js';

const PLACEHOLDER_PATTERN = /\{(src|target|dir|root)\}/g;

export interface CommandTaskConfig {
    /** Name printed in the running line and in errors. Defaults to the command line. */
    label?: string;
    command: string;
    args?: string[];
    /** Working directory; placeholders allowed. @default '{dir}' */
    cwd?: string;
    timeoutMs?: number;
    /** Treat any stdout as failure, for linters that exit 0 on findings. */
    failOnOutput?: boolean;
    runner?: CommandRunner;
}

export function expandPlaceholders(template: string, values: TaskPlaceholders): string {
    return template.replace(PLACEHOLDER_PATTERN, (_match, key: keyof TaskPlaceholders) => values[key]);
}

/**
 * Runs one external command per dispatch.
 *
 * Follows the task contract: `target` is set to `src`, stdout is captured in
 * the context buffer and flushed to the output sink whether or not the
 * command succeeds, stderr goes straight to the error sink, and `ok` marks
 * success.
 */
export class CommandTask implements Task {
    readonly label: string;
    readonly #command: string;
    readonly #args: string[];
    readonly #cwd: string;
    readonly #timeoutMs: number | undefined;
    readonly #failOnOutput: boolean;
    readonly #runner: CommandRunner;

    constructor(config: CommandTaskConfig) {
        this.#command = config.command;
        this.#args = [...(config.args ?? [])];
        this.#cwd = config.cwd ?? '{dir}';
        this.#timeoutMs = config.timeoutMs;
        this.#failOnOutput = config.failOnOutput ?? false;
        this.#runner = config.runner ?? runCommand;
        this.label = config.label ?? [config.command, ...this.#args].join(' ');
    }

    async run(context: TaskContext): Promise<void> {
        context.target = context.src;
        context.buf.reset();

        const values = await this.#placeholders(context);
        const cwd = expandPlaceholders(this.#cwd, values);
        const args = this.#args.map((arg) => expandPlaceholders(arg, values));

        writeLine(context.out, `${this.label} ... ${cwd}`);

        try {
            const result = await this.#runner({
                executable: this.#command,
                args,
                cwd,
                timeoutMs: this.#timeoutMs,
            });
            context.buf.write(result.stdout);
            if (result.stderr) {
                context.err.write(result.stderr);
            }

            if (!result.ok) {
                throw new TaskError(this.label, `${this.label} failed with exit code ${result.exitCode}`, result.exitCode);
            }
            if (this.#failOnOutput && result.stdout.trim().length > 0) {
                throw new TaskError(this.label, `${this.label} reported problems`, result.exitCode);
            }
        } finally {
            context.buf.writeTo(context.out);
        }

        writeLine(context.out, 'ok');
    }

    async #placeholders(context: TaskContext): Promise<TaskPlaceholders> {
        const needsRoot = [this.#cwd, ...this.#args].some((value) => value.includes('{root}'));
        return {
            src: context.src,
            target: context.target,
            dir: path.dirname(context.src),
            root: needsRoot ? await findProjectRoot(context.src) : '',
        };
    }
}
