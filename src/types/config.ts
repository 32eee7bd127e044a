import type { FileOpName } from './pipeline.js';

interface TaskSpecBase {
    args?: string[];
    timeoutMs?: number;
}

export interface CommandTaskSpec extends TaskSpecBase {
    type: 'command';
    command: string;
    label?: string;
    cwd?: string;
    failOnOutput?: boolean;
}

export interface NpmScriptTaskSpec extends TaskSpecBase {
    type: 'npm-script';
    script: string;
}

export interface ProjectTaskSpec extends TaskSpecBase {
    type: 'npm-test' | 'npm-build' | 'tsc' | 'eslint';
}

export type TaskSpec = CommandTaskSpec | NpmScriptTaskSpec | ProjectTaskSpec;

export type TaskSpecType = TaskSpec['type'];

export interface WatchConfig {
    path: string;
    /** @default false */
    recursive: boolean;
    /** Only meaningful for recursive watches. @default false */
    includeHidden: boolean;
}

export interface WorkflowConfig {
    name: string;
    /** Regular expression sources matched against absolute paths. */
    patterns: string[];
    ignore: string[];
    /** @default every operation */
    ops: FileOpName[];
    concurrent: boolean;
    tasks: TaskSpec[];
}

export interface WatchflowConfig {
    name: string;
    verbose: boolean;
    batchIntervalMs: number;
    /** Poll with stat instead of native events (network mounts, containers). */
    usePolling: boolean;
    pollIntervalMs: number;
    watches: WatchConfig[];
    workflows: WorkflowConfig[];
}

export class ConfigError extends Error {
    readonly hints: string[];

    constructor(hints: string[]) {
        super(`Configuration is invalid:\n  - ${hints.join('\n  - ')}`);
        this.name = 'ConfigError';
        this.hints = hints;
    }
}
