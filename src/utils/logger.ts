import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

const REDACTED = '[REDACTED]';
const SENSITIVE_KEY_PATTERN = /(token|secret|password|passwd|api[_-]?key|auth)/i;
const KEY_VALUE_PATTERN = /\b([A-Za-z0-9_]*(?:TOKEN|SECRET|PASSWORD|PASSWD|API_KEY|APIKEY|AUTH)[A-Za-z0-9_]*)\s*[=:]\s*("[^"]*"|'[^']*'|\S+)/gi;
const MIN_ENV_SECRET_LENGTH = 8;

function logDirectory(): string {
    return path.resolve(process.env.WATCHFLOW_LOG_DIR ?? 'logs');
}

function currentDateIso(): string {
    return new Date().toISOString().slice(0, 10);
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Redact secrets from free text before it reaches a log file.
 *
 * Covers `KEY=value` style pairs whose key looks sensitive, and raw values of
 * sensitive environment variables wherever they appear.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text.replace(KEY_VALUE_PATTERN, (_match, key: string) => `${key}=${REDACTED}`);

    for (const [name, value] of Object.entries(process.env)) {
        if (!value || value.length < MIN_ENV_SECRET_LENGTH || !SENSITIVE_KEY_PATTERN.test(name)) {
            continue;
        }
        scrubbed = scrubbed.replace(new RegExp(escapeRegExp(value), 'g'), REDACTED);
    }

    return scrubbed;
}

async function appendEntry(entry: string): Promise<void> {
    const dir = logDirectory();
    try {
        await mkdir(dir, { recursive: true });
        await appendFile(path.join(dir, `${currentDateIso()}.md`), entry, 'utf8');
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[Logger] Failed to write log entry: ${message}`);
    }
}

/** Append a timestamped line to today's log. Never throws. */
export async function logThought(thought: string): Promise<void> {
    const time = new Date().toISOString().slice(11, 19);
    await appendEntry(`- [${time}] ${scrubSensitiveText(thought)}\n`);
}

/** Record a command a task executed, with its exit code and captured output. */
export async function logSystemCommand(command: string, output: string, exitCode: number): Promise<void> {
    const time = new Date().toISOString().slice(11, 19);
    const body = scrubSensitiveText(output).trim() || '(no output)';
    await appendEntry(
        `- [${time}] \`${scrubSensitiveText(command)}\` exited ${exitCode}\n\n\`\`\`\n${body}\n\`\`\`\n`,
    );
}
