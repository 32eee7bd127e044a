import { Pipeline } from '../services/pipeline.js';
import { PatternWorkflow } from '../services/pattern-workflow.js';
import { writeLine } from '../services/task-context.js';
import { CommandTask } from '../tasks/command-task.js';
import {
    createEslintTask,
    createNpmBuildTask,
    createNpmScriptTask,
    createNpmTestTask,
    createTscTask,
} from '../tasks/project-tasks.js';
import { ALL_OPS, FILE_OP_NAMES } from '../types/pipeline.js';
import type { EventSourceFactory, FileOpName, OutputSink, Task } from '../types/pipeline.js';
import type { CommandRunner } from '../types/tasks.js';
import type { TaskSpec, WatchflowConfig, WorkflowConfig } from '../types/config.js';

export interface BuildPipelineOptions {
    out?: OutputSink;
    err?: OutputSink;
    /** Overrides `verbose` from the config file. */
    verbose?: boolean;
    openEventSource?: EventSourceFactory;
    runner?: CommandRunner;
}

export interface BuildPipelineResult {
    pipeline: Pipeline;
    /** Watches that could not be resolved; the pipeline runs without them. */
    failedWatches: string[];
}

export function opsToMask(ops: readonly FileOpName[]): number {
    if (ops.length === 0) return ALL_OPS;
    return ops.reduce((mask, op) => mask | FILE_OP_NAMES[op], 0);
}

export function createTask(taskSpec: TaskSpec, runner?: CommandRunner): Task {
    const options = { args: taskSpec.args, timeoutMs: taskSpec.timeoutMs, runner };
    switch (taskSpec.type) {
        case 'command':
            return new CommandTask({
                label: taskSpec.label,
                command: taskSpec.command,
                args: taskSpec.args,
                cwd: taskSpec.cwd,
                timeoutMs: taskSpec.timeoutMs,
                failOnOutput: taskSpec.failOnOutput,
                runner,
            });
        case 'npm-script':
            return createNpmScriptTask(taskSpec.script, options);
        case 'npm-test':
            return createNpmTestTask(options);
        case 'npm-build':
            return createNpmBuildTask(options);
        case 'tsc':
            return createTscTask(options);
        case 'eslint':
            return createEslintTask(options);
    }
}

export function createWorkflow(config: WorkflowConfig, runner?: CommandRunner): PatternWorkflow {
    return new PatternWorkflow({
        name: config.name,
        patterns: config.patterns.map((source) => new RegExp(source)),
        ignore: config.ignore.map((source) => new RegExp(source)),
        ops: opsToMask(config.ops),
        concurrent: config.concurrent,
        tasks: config.tasks.map((taskSpec) => createTask(taskSpec, runner)),
    });
}

/**
 * Turn a validated configuration into a pipeline with its watches and
 * workflows registered. Unresolvable watches are reported on the error
 * sink and skipped.
 */
export async function buildPipeline(
    config: WatchflowConfig,
    options: BuildPipelineOptions = {},
): Promise<BuildPipelineResult> {
    const pipeline = new Pipeline({
        name: config.name,
        verbose: options.verbose ?? config.verbose,
        batchIntervalMs: config.batchIntervalMs,
        usePolling: config.usePolling,
        pollIntervalMs: config.pollIntervalMs,
        out: options.out,
        err: options.err,
        openEventSource: options.openEventSource,
    });

    const failedWatches: string[] = [];
    for (const watch of config.watches) {
        try {
            if (watch.recursive) {
                await pipeline.watchRecursive(watch.path, !watch.includeHidden);
            } else {
                await pipeline.watch(watch.path);
            }
        } catch (error) {
            failedWatches.push(watch.path);
            writeLine(pipeline.err, error instanceof Error ? error.message : String(error));
        }
    }

    pipeline.add(...config.workflows.map((workflow) => createWorkflow(workflow, options.runner)));

    return { pipeline, failedWatches };
}
