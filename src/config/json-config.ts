import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { DEFAULT_BATCH_INTERVAL_MS } from '../services/event-batcher.js';
import { FILE_OP_NAMES } from '../types/pipeline.js';
import { ConfigError } from '../types/config.js';
import type { FileOpName } from '../types/pipeline.js';
import type {
    TaskSpec,
    TaskSpecType,
    WatchConfig,
    WatchflowConfig,
    WorkflowConfig,
} from '../types/config.js';

export const CONFIG_FILE_NAME = 'watchflow.json';

export const DEFAULT_CONFIG: WatchflowConfig = {
    name: '',
    verbose: false,
    batchIntervalMs: DEFAULT_BATCH_INTERVAL_MS,
    usePolling: false,
    pollIntervalMs: 100,
    watches: [],
    workflows: [],
};

const TASK_TYPES: readonly TaskSpecType[] = ['command', 'npm-script', 'npm-test', 'npm-build', 'tsc', 'eslint'];

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.WATCHFLOW_CONFIG_PATH) {
        return path.resolve(process.env.WATCHFLOW_CONFIG_PATH);
    }
    return path.resolve(CONFIG_FILE_NAME);
}

function anchorWatchPath(watchPath: string, baseDir: string): string {
    const trimmed = watchPath.trim();
    if (trimmed === '~' || trimmed.startsWith('~/') || path.isAbsolute(trimmed)) {
        return trimmed;
    }
    return path.resolve(baseDir, trimmed);
}

/**
 * Read and validate the pipeline configuration. A missing file yields the
 * defaults; unparsable JSON and invalid structure both throw. Relative watch
 * paths are resolved from the directory holding the file.
 */
export async function readConfig(overridePath?: string): Promise<WatchflowConfig> {
    const targetPath = getConfigPath(overridePath);
    let parsed: unknown;
    try {
        const rawData = await fs.readFile(targetPath, 'utf-8');
        parsed = JSON.parse(rawData);
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return parseConfig({});
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to parse config file at ${targetPath}: ${message}`);
    }
    const config = parseConfig(parsed);
    const baseDir = path.dirname(targetPath);
    return {
        ...config,
        watches: config.watches.map((watch) => ({ ...watch, path: anchorWatchPath(watch.path, baseDir) })),
    };
}

// ── Validation ──────────────────────────────────────────────────────────────

function isObjectRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFileOpName(value: unknown): value is FileOpName {
    return typeof value === 'string' && Object.hasOwn(FILE_OP_NAMES, value);
}

function isTaskType(value: unknown): value is TaskSpecType {
    return typeof value === 'string' && TASK_TYPES.some((type) => type === value);
}

function isValidRegExp(source: string): boolean {
    try {
        new RegExp(source);
        return true;
    } catch {
        return false;
    }
}

class HintCollector {
    readonly hints: string[] = [];

    add(hint: string): void {
        this.hints.push(hint);
    }

    optionalBoolean(record: Record<string, unknown>, key: string, where: string, fallback: boolean): boolean {
        const value = record[key];
        if (value === undefined) return fallback;
        if (typeof value === 'boolean') return value;
        this.add(`${where}.${key} must be a boolean.`);
        return fallback;
    }

    optionalString(record: Record<string, unknown>, key: string, where: string): string | undefined {
        const value = record[key];
        if (value === undefined) return undefined;
        if (typeof value === 'string') return value;
        this.add(`${where}.${key} must be a string.`);
        return undefined;
    }

    requiredString(record: Record<string, unknown>, key: string, where: string): string {
        const value = record[key];
        if (typeof value === 'string' && value.trim().length > 0) return value;
        this.add(`${where}.${key} must be a non-empty string.`);
        return '';
    }

    optionalPositiveInteger(record: Record<string, unknown>, key: string, where: string): number | undefined {
        const value = record[key];
        if (value === undefined) return undefined;
        if (typeof value === 'number' && Number.isInteger(value) && value > 0) return value;
        this.add(`${where}.${key} must be a positive integer.`);
        return undefined;
    }

    stringArray(record: Record<string, unknown>, key: string, where: string): string[] {
        const value = record[key];
        if (value === undefined) return [];
        if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
            return value;
        }
        this.add(`${where}.${key} must be an array of strings.`);
        return [];
    }
}

function parseWatch(raw: unknown, where: string, hints: HintCollector): WatchConfig | null {
    if (typeof raw === 'string') {
        return { path: raw, recursive: false, includeHidden: false };
    }
    if (!isObjectRecord(raw)) {
        hints.add(`${where} must be a path string or an object.`);
        return null;
    }
    return {
        path: hints.requiredString(raw, 'path', where),
        recursive: hints.optionalBoolean(raw, 'recursive', where, false),
        includeHidden: hints.optionalBoolean(raw, 'includeHidden', where, false),
    };
}

function parseTask(raw: unknown, where: string, hints: HintCollector): TaskSpec | null {
    if (!isObjectRecord(raw)) {
        hints.add(`${where} must be an object.`);
        return null;
    }
    const type = raw.type;
    if (!isTaskType(type)) {
        hints.add(`${where}.type must be one of: ${TASK_TYPES.join(', ')}.`);
        return null;
    }

    const args = hints.stringArray(raw, 'args', where);
    const timeoutMs = hints.optionalPositiveInteger(raw, 'timeoutMs', where);

    switch (type) {
        case 'command':
            return {
                type: 'command',
                command: hints.requiredString(raw, 'command', where),
                args,
                timeoutMs,
                label: hints.optionalString(raw, 'label', where),
                cwd: hints.optionalString(raw, 'cwd', where),
                failOnOutput: hints.optionalBoolean(raw, 'failOnOutput', where, false),
            };
        case 'npm-script':
            return { type: 'npm-script', script: hints.requiredString(raw, 'script', where), args, timeoutMs };
        default:
            return { type, args, timeoutMs };
    }
}

function parseWorkflow(raw: unknown, where: string, hints: HintCollector): WorkflowConfig | null {
    if (!isObjectRecord(raw)) {
        hints.add(`${where} must be an object.`);
        return null;
    }

    const name = hints.requiredString(raw, 'name', where);
    const patterns = hints.stringArray(raw, 'patterns', where);
    if (patterns.length === 0) {
        hints.add(`${where}.patterns must list at least one regular expression.`);
    }
    const ignore = hints.stringArray(raw, 'ignore', where);
    for (const source of [...patterns, ...ignore]) {
        if (!isValidRegExp(source)) {
            hints.add(`${where} has an invalid regular expression: ${source}`);
        }
    }

    let ops: FileOpName[] = [];
    const rawOps = raw.ops;
    if (rawOps !== undefined) {
        if (Array.isArray(rawOps) && rawOps.every(isFileOpName)) {
            ops = rawOps;
        } else {
            hints.add(`${where}.ops must be an array of: ${Object.keys(FILE_OP_NAMES).join(', ')}.`);
        }
    }

    const tasks: TaskSpec[] = [];
    const rawTasks = raw.tasks;
    if (Array.isArray(rawTasks) && rawTasks.length > 0) {
        rawTasks.forEach((task: unknown, index: number) => {
            const parsed = parseTask(task, `${where}.tasks[${index}]`, hints);
            if (parsed) tasks.push(parsed);
        });
    } else {
        hints.add(`${where}.tasks must list at least one task.`);
    }

    return {
        name,
        patterns,
        ignore,
        ops,
        concurrent: hints.optionalBoolean(raw, 'concurrent', where, false),
        tasks,
    };
}

/** Validate an already-parsed JSON value. Throws {@link ConfigError} listing every problem. */
export function parseConfig(raw: unknown): WatchflowConfig {
    const hints = new HintCollector();
    if (!isObjectRecord(raw)) {
        throw new ConfigError(['The configuration root must be a JSON object.']);
    }

    const config: WatchflowConfig = {
        name: hints.optionalString(raw, 'name', 'config') ?? DEFAULT_CONFIG.name,
        verbose: hints.optionalBoolean(raw, 'verbose', 'config', DEFAULT_CONFIG.verbose),
        batchIntervalMs: hints.optionalPositiveInteger(raw, 'batchIntervalMs', 'config') ?? DEFAULT_CONFIG.batchIntervalMs,
        usePolling: hints.optionalBoolean(raw, 'usePolling', 'config', DEFAULT_CONFIG.usePolling),
        pollIntervalMs: hints.optionalPositiveInteger(raw, 'pollIntervalMs', 'config') ?? DEFAULT_CONFIG.pollIntervalMs,
        watches: [],
        workflows: [],
    };

    const rawWatches = raw.watches;
    if (rawWatches !== undefined) {
        if (Array.isArray(rawWatches)) {
            rawWatches.forEach((watch: unknown, index: number) => {
                const parsed = parseWatch(watch, `watches[${index}]`, hints);
                if (parsed) config.watches.push(parsed);
            });
        } else {
            hints.add('config.watches must be an array.');
        }
    }

    const rawWorkflows = raw.workflows;
    if (rawWorkflows !== undefined) {
        if (Array.isArray(rawWorkflows)) {
            rawWorkflows.forEach((workflow: unknown, index: number) => {
                const parsed = parseWorkflow(workflow, `workflows[${index}]`, hints);
                if (parsed) config.workflows.push(parsed);
            });
        } else {
            hints.add('config.workflows must be an array.');
        }
    }

    if (hints.hints.length > 0) {
        throw new ConfigError(hints.hints);
    }
    return config;
}
