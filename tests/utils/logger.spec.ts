import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { logSystemCommand, logThought, scrubSensitiveText } from '../../src/utils/logger.js';

describe('scrubSensitiveText', () => {
    const envName = 'WATCHFLOW_DEPLOY_TOKEN';
    let previousEnvValue: string | undefined;

    beforeEach(() => {
        previousEnvValue = process.env[envName];
        process.env[envName] = 'test-secret-value-123456789';
    });

    afterEach(() => {
        if (previousEnvValue === undefined) {
            delete process.env[envName];
        } else {
            process.env[envName] = previousEnvValue;
        }
    });

    it('redacts raw sensitive env values even outside key=value patterns', () => {
        const scrubbed = scrubSensitiveText('trace => test-secret-value-123456789 <= hidden');
        expect(scrubbed).toBe('trace => [REDACTED] <= hidden');
    });

    it('redacts values of sensitive-looking keys', () => {
        expect(scrubSensitiveText('NPM_TOKEN=placeholder done')).toBe('NPM_TOKEN=[REDACTED] done');
    });

    it('leaves ordinary text alone', () => {
        expect(scrubSensitiveText('npm run build exited 0')).toBe('npm run build exited 0');
    });
});

describe('log files', () => {
    let logDir: string;

    beforeEach(async () => {
        logDir = await mkdtemp(path.join(os.tmpdir(), 'watchflow-logs-'));
        vi.stubEnv('WATCHFLOW_LOG_DIR', logDir);
    });

    afterEach(async () => {
        vi.unstubAllEnvs();
        await rm(logDir, { recursive: true, force: true });
    });

    function todaysLog(): string {
        return path.join(logDir, `${new Date().toISOString().slice(0, 10)}.md`);
    }

    it('appends timestamped thoughts to the daily log', async () => {
        await logThought('[Pipeline] started');
        await logThought('[Pipeline] stopped');

        const contents = await readFile(todaysLog(), 'utf8');
        expect(contents).toMatch(/^- \[\d{2}:\d{2}:\d{2}\] \[Pipeline\] started\n- \[\d{2}:\d{2}:\d{2}\] \[Pipeline\] stopped\n$/);
    });

    it('records commands with their exit code and output', async () => {
        await logSystemCommand('npm test', 'all green\n', 0);

        const contents = await readFile(todaysLog(), 'utf8');
        expect(contents).toMatch(/^- \[\d{2}:\d{2}:\d{2}\] `npm test` exited 0\n\n```\nall green\n```\n$/);
    });
});
