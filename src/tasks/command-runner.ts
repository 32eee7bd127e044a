import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { logSystemCommand, scrubSensitiveText } from '../utils/logger.js';
import type { CommandExecutionResult, CommandInvocation } from '../types/tasks.js';

const execFileAsync = promisify(execFile);
const DEFAULT_TIMEOUT_MS = 120_000;
const MAX_BUFFER_BYTES = 10 * 1024 * 1024;

interface ExecError extends Error {
    code?: number | string;
    stdout?: string;
    stderr?: string;
}

function isExecError(error: unknown): error is ExecError {
    return error instanceof Error;
}

function resolveTimeout(timeoutMs?: number): number {
    if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs < 1) {
        return DEFAULT_TIMEOUT_MS;
    }
    return Math.floor(timeoutMs);
}

/**
 * Run an executable without a shell and capture its output.
 * Never rejects for a failing command; the result carries the exit code.
 */
export async function runCommand(invocation: CommandInvocation): Promise<CommandExecutionResult> {
    const { executable, args, cwd } = invocation;
    const preview = [executable, ...args].join(' ');
    const startedAt = Date.now();

    try {
        const { stdout, stderr } = await execFileAsync(executable, args, {
            cwd,
            timeout: resolveTimeout(invocation.timeoutMs),
            windowsHide: true,
            maxBuffer: MAX_BUFFER_BYTES,
        });
        await logSystemCommand(preview, `${stdout}${stderr}`, 0);
        return { ok: true, exitCode: 0, stdout, stderr, durationMs: Date.now() - startedAt };
    } catch (error: unknown) {
        if (!isExecError(error)) {
            throw error;
        }
        const exitCode = typeof error.code === 'number' ? error.code : 1;
        const stdout = error.stdout ?? '';
        // Spawn failures (ENOENT and the like) carry no stderr; surface the message instead.
        const stderr = error.stderr || `${scrubSensitiveText(error.message)}\n`;
        await logSystemCommand(preview, `${stdout}${stderr}`, exitCode);
        return { ok: false, exitCode, stdout, stderr, durationMs: Date.now() - startedAt };
    }
}
