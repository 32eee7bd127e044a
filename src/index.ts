#!/usr/bin/env node
import { handleCheckCli, handleHelpCli, handleRunCli, handleUnknownCommand } from './core/cli.js';

const argv = process.argv.slice(2);

// ── One-shot commands ────────────────────────────────────────────────────────

if (handleHelpCli(argv) || handleUnknownCommand(argv)) {
    process.exit(process.exitCode ?? 0);
}

if (await handleCheckCli(argv)) {
    process.exit(process.exitCode ?? 0);
}

// ── Pipeline ─────────────────────────────────────────────────────────────────

await handleRunCli(argv);
process.exit(process.exitCode ?? 0);
