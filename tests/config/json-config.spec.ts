import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
    applyEnvOverrides,
    DEFAULT_CONFIG,
    getConfigPath,
    mergeWithDefaults,
    readConfig,
    resolveConfig,
    writeConfig,
} from '../../src/config/json-config.js';

describe('Config JSON Foundation', () => {
    const tempDir = path.join(os.tmpdir(), 'voxloop-test-config', `${process.pid}-${Date.now()}`);
    const tempConfigPath = path.join(tempDir, 'voxloop.json');
    const env = { VOXLOOP_CONFIG_PATH: tempConfigPath };

    beforeEach(async () => {
        if (!existsSync(tempDir)) {
            await fs.mkdir(tempDir, { recursive: true });
        }
    });

    afterEach(async () => {
        if (existsSync(tempDir)) {
            await fs.rm(tempDir, { recursive: true, force: true });
        }
    });

    it('resolves the config path from the override, then the environment', () => {
        expect(getConfigPath('/tmp/explicit.json', env)).toBe(path.resolve('/tmp/explicit.json'));
        expect(getConfigPath(undefined, env)).toBe(path.resolve(tempConfigPath));
        expect(getConfigPath(undefined, {})).toBe(path.join(os.homedir(), '.voxloop', 'voxloop.json'));
    });

    it('loads default config when file is missing', async () => {
        const config = await readConfig(undefined, env);
        expect(config).toEqual(DEFAULT_CONFIG);
        expect(config.runtime.apiPort).toBe(3100);
        expect(config.reasoning.maxIterations).toBe(8);
    });

    it('saves and reads structured config correctly', async () => {
        const customConfig = mergeWithDefaults({});
        customConfig.runtime.apiPort = 9999;
        customConfig.speech.transcribeBackend = 'whisper-api';
        customConfig.reasoning.maxDurationMs = 120_000;

        const written = await writeConfig(customConfig, undefined, env);
        const loaded = await readConfig(undefined, env);

        expect(written).toBe(path.resolve(tempConfigPath));
        expect(loaded.runtime.apiPort).toBe(9999);
        expect(loaded.speech.transcribeBackend).toBe('whisper-api');
        expect(loaded.reasoning.maxDurationMs).toBe(120_000);
        expect((await fs.readdir(tempDir)).filter((name) => name.endsWith('.tmp'))).toEqual([]);
    });

    it('reports a file that is not valid JSON', async () => {
        await fs.writeFile(tempConfigPath, '{ not json', 'utf-8');

        await expect(readConfig(undefined, env)).rejects.toThrow(
            `Failed to parse config file at ${path.resolve(tempConfigPath)}:`,
        );
    });

    it('merges partial files field by field and ignores values of the wrong type', () => {
        const merged = mergeWithDefaults({
            runtime: { apiPort: 'not-a-number', queueMaxDepth: 5 },
            reasoning: { model: 'qwen', maxDurationMs: null },
            speech: 'not-an-object',
        });

        expect(merged.runtime.apiPort).toBe(3100);
        expect(merged.runtime.queueMaxDepth).toBe(5);
        expect(merged.reasoning.model).toBe('qwen');
        expect(merged.reasoning.maxDurationMs).toBeNull();
        expect(merged.speech).toEqual(DEFAULT_CONFIG.speech);
    });

    it('applies environment overrides and skips malformed numbers', () => {
        const config = applyEnvOverrides(DEFAULT_CONFIG, {
            API_SECRET: '  test-secret  ',
            API_PORT: 'eighty',
            MAX_ITERATIONS: '3',
            QUEUE_MAX_DEPTH: '-1',
            STS_TRANSCRIBE_BACKEND: 'whisper-api',
            GROQ_API_KEY: '',
        });

        expect(config.runtime.apiSecret).toBe('test-secret');
        expect(config.runtime.apiPort).toBe(3100);
        expect(config.runtime.queueMaxDepth).toBeNull();
        expect(config.reasoning.maxIterations).toBe(3);
        expect(config.speech.transcribeBackend).toBe('whisper-api');
        expect(config.speech.groqApiKey).toBe('');
    });

    it('layers the environment over the file', async () => {
        await fs.writeFile(tempConfigPath, JSON.stringify({ runtime: { apiPort: 4000 }, reasoning: { model: 'file-model' } }));

        const config = await resolveConfig({ ...env, REASONING_MODEL: 'env-model' });

        expect(config.runtime.apiPort).toBe(4000);
        expect(config.reasoning.model).toBe('env-model');
    });
});
