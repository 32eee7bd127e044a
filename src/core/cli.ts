import { readConfig, getConfigPath } from '../config/json-config.js';
import { buildPipeline } from '../config/pipeline-builder.js';
import { ConfigError } from '../types/config.js';
import { logThought } from '../utils/logger.js';
import type { WatchflowConfig } from '../types/config.js';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: watchflow [command] [options]

Commands:
  run                 Watch the configured directories and run matching workflows
  check               Validate the configuration file and print a summary

Options:
  --config <path>     Configuration file (default: ./watchflow.json or $WATCHFLOW_CONFIG_PATH);
                      relative watch paths in it resolve from its directory
  --verbose, -v       Print every watched directory and filesystem event (run only)
  --json              Output in machine-readable JSON format (check only)
  --help, -h          Show this help message

Examples:
  watchflow run
  watchflow run --config ./ci/watchflow.json --verbose
  watchflow check --json
`.trim();

const KNOWN_COMMANDS = new Set(['run', 'check']);

function readOption(argv: string[], name: string): string | undefined {
    const index = argv.indexOf(name);
    if (index === -1) return undefined;
    const value = argv[index + 1];
    return value && !value.startsWith('-') ? value : undefined;
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

async function loadConfigOrReport(argv: string[]): Promise<WatchflowConfig | null> {
    try {
        return await readConfig(readOption(argv, '--config'));
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(`[watchflow] ${error.message}`);
        } else {
            console.error(`[watchflow] ${describeError(error)}`);
        }
        process.exitCode = 1;
        return null;
    }
}

export function formatConfigSummary(config: WatchflowConfig, configPath: string): string {
    const lines = [
        `Config: ${configPath}`,
        `Pipeline: ${config.name || '<UNNAMED>'}`,
        `Batch interval: ${config.batchIntervalMs}ms`,
        `Event source: ${config.usePolling ? `polling every ${config.pollIntervalMs}ms` : 'native'}`,
        `Watches (${config.watches.length}):`,
        ...config.watches.map((watch) => {
            const mode = watch.recursive
                ? `recursive, ${watch.includeHidden ? 'including' : 'ignoring'} hidden`
                : 'single directory';
            return `  - ${watch.path} (${mode})`;
        }),
        `Workflows (${config.workflows.length}):`,
        ...config.workflows.map(
            (workflow) =>
                `  - ${workflow.name}: ${workflow.patterns.join(' | ')} -> ${workflow.tasks.map((task) => task.type).join(', ')}`,
        ),
    ];
    return lines.join('\n');
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
    if (!argv.includes('--help') && !argv.includes('-h')) return false;

    console.log(HELP_TEXT);
    process.exitCode = 0;
    return true;
}

/**
 * Handle the `check` command: validate the configuration without watching.
 */
export async function handleCheckCli(argv: string[]): Promise<boolean> {
    if (argv[0] !== 'check') return false;

    const configPath = getConfigPath(readOption(argv, '--config'));
    const config = await loadConfigOrReport(argv);
    if (!config) return true;

    if (argv.includes('--json')) {
        console.log(JSON.stringify({ ok: true, configPath, config }, null, 2));
    } else {
        console.log(formatConfigSummary(config, configPath));
    }
    process.exitCode = 0;
    return true;
}

/**
 * Handle the `run` command (also the default with no command).
 * Resolves once the pipeline has stopped after SIGINT or SIGTERM.
 */
export async function handleRunCli(argv: string[]): Promise<boolean> {
    if (argv.length > 0 && argv[0] !== 'run' && !argv[0].startsWith('-')) return false;

    const config = await loadConfigOrReport(argv);
    if (!config) return true;

    const verbose = argv.includes('--verbose') || argv.includes('-v') ? true : undefined;
    const { pipeline, failedWatches } = await buildPipeline(config, { verbose });
    if (failedWatches.length > 0) {
        void logThought(`[CLI] Skipped unresolvable watches: ${failedWatches.join(', ')}`);
    }

    const controller = new AbortController();
    const shutdown = (signal: NodeJS.Signals) => {
        console.log(`\n[watchflow] Received ${signal}, stopping pipeline '${pipeline.name}'.`);
        controller.abort();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    try {
        await pipeline.run(controller.signal);
        process.exitCode = 0;
    } catch (error) {
        console.error(`[watchflow] Pipeline failed to start: ${describeError(error)}`);
        process.exitCode = 1;
    } finally {
        process.off('SIGINT', shutdown);
        process.off('SIGTERM', shutdown);
    }
    return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
    if (argv.length === 0) return false;

    const command = argv[0];
    if (KNOWN_COMMANDS.has(command) || command.startsWith('-')) {
        return false;
    }

    console.error(`[watchflow] Unknown command: '${command}'`);
    console.error(`Run 'watchflow --help' to see available commands.`);
    process.exitCode = 1;
    return true;
}
