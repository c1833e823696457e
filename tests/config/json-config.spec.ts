import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
    DEFAULT_CONFIG,
    clearConfigCacheForTests,
    getConfigValue,
    loadGatewayConfig,
    mergeWithDefaults,
    readConfig,
} from '../../src/config/json-config.js';

describe('gateway config', () => {
    let tempDir: string;
    let configPath: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'gateway-config-test-'));
        configPath = path.join(tempDir, 'gateway.json');
        vi.stubEnv('GATEWAY_CONFIG_PATH', configPath);
        clearConfigCacheForTests();
    });

    afterEach(async () => {
        vi.unstubAllEnvs();
        clearConfigCacheForTests();
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('loads defaults when the file is missing', async () => {
        const config = await readConfig();

        expect(config.buffer).toEqual({ debounceMs: 2500, maxWaitMs: 30_000, maxCapacity: 10, textSeparator: ' ' });
        expect(config.collect.triggerKeywords).toEqual(['now respond', 'go ahead', 'process this', '/go']);
        expect(config.tasks.shutdownTimeoutMs).toBe(5000);
    });

    it('merges a partial file over the defaults', async () => {
        await fs.writeFile(
            configPath,
            JSON.stringify({
                buffer: { debounceMs: 1500, maxCapacity: 0 },
                media: { image: { maxBytes: 1024, allowedExtensions: ['.PNG'] } },
                collect: { triggerKeywords: ['send it'] },
            }),
        );

        const config = await readConfig();

        expect(config.buffer.debounceMs).toBe(1500);
        expect(config.buffer.maxWaitMs).toBe(30_000);
        expect(config.buffer.maxCapacity).toBe(1);
        expect(config.media.image.maxBytes).toBe(1024);
        expect(config.media.image.allowedExtensions).toEqual(['png']);
        expect(config.media.image.allowedMimeTypes).toEqual(DEFAULT_CONFIG.media.image.allowedMimeTypes);
        expect(config.media.voice).toEqual(DEFAULT_CONFIG.media.voice);
        expect(config.collect.triggerKeywords).toEqual(['send it']);
    });

    it('ignores values of the wrong type', () => {
        const config = mergeWithDefaults({
            buffer: { debounceMs: 'soon', textSeparator: 7 },
            logging: { level: 'verbose' },
            agent: { model: '  ' },
        });

        expect(config.buffer.debounceMs).toBe(2500);
        expect(config.buffer.textSeparator).toBe(' ');
        expect(config.logging.level).toBe('info');
        expect(config.agent.model).toBe(DEFAULT_CONFIG.agent.model);
    });

    it('reports an unreadable file with its path', async () => {
        await fs.writeFile(configPath, '{ not json');

        await expect(readConfig()).rejects.toThrow(`Failed to parse config file at ${configPath}`);
    });

    it('prefers environment overrides over the file', async () => {
        await fs.writeFile(configPath, JSON.stringify({ runtime: { apiPort: 4000 }, telegram: { botToken: 'file-token' } }));
        vi.stubEnv('TELEGRAM_BOT_TOKEN', 'test-secret');
        vi.stubEnv('BUFFER_DEBOUNCE_MS', '800');

        const config = loadGatewayConfig();

        expect(config.runtime.apiPort).toBe(4000);
        expect(config.telegram.botToken).toBe('test-secret');
        expect(config.buffer.debounceMs).toBe(800);
    });

    it('falls back to the file value for a blank environment override', async () => {
        await fs.writeFile(configPath, JSON.stringify({ media: { sweepCron: '*/5 * * * *' } }));
        vi.stubEnv('MEDIA_SWEEP_CRON', '   ');

        expect(getConfigValue('MEDIA_SWEEP_CRON')).toBe('*/5 * * * *');
    });

    it('returns undefined for unknown or empty keys', () => {
        vi.stubEnv('TELEGRAM_BOT_TOKEN', '');

        expect(getConfigValue('NOT_A_KEY')).toBeUndefined();
        expect(getConfigValue('TELEGRAM_BOT_TOKEN')).toBeUndefined();
    });
});
