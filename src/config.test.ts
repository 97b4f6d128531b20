import path from 'path';
import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG_PATH, loadConfig, resolveConfig } from './config.js';
import { ConfigError } from './errors.js';

const RAW = {
    llm: { host: 'http://127.0.0.1:11434', model: 'llama3.2:3b' },
    drone: { uri: 'radio://0/80/2M/E7E7E7E7E7' },
    inspection: { csvPath: 'runtime/inspection_data.csv', datasetCsvPath: 'runtime/dataset/data.csv' },
    signal: {},
    motion: {},
    statusApi: {},
};

const ROOT = path.resolve('/srv/inspection');

describe('resolveConfig', () => {
    it('fills defaults and resolves CSV paths against the root', () => {
        const config = resolveConfig(RAW, {}, ROOT);

        expect(config.logLevel).toBe('info');
        expect(config.llm.timeoutMs).toBe(120_000);
        expect(config.drone.flyingHeightM).toBe(0.5);
        expect(config.inspection.samplingIntervalMs).toBe(300);
        expect(config.inspection.holdMs).toBe(1000);
        expect(config.inspection.csvPath).toBe(path.join(ROOT, 'runtime', 'inspection_data.csv'));
        expect(config.signal.durationMs).toBe(5000);
        expect(config.motion.timeoutSeconds).toBe(5);
        expect(config.statusApi.port).toBeNull();
    });

    it('lets the environment override the file', () => {
        const config = resolveConfig(RAW, {
            OLLAMA_HOST: 'http://gpu-box:11434',
            SLM_MODEL: 'qwen2.5:1.5b',
            LOG_LEVEL: 'DEBUG',
            INSPECTION_CSV: '/data/run.csv',
            STATUS_API_PORT: '8080',
            DRONE_URI: 'radio://0/90/2M/E7E7E7E7E8',
        }, ROOT);

        expect(config.llm.host).toBe('http://gpu-box:11434');
        expect(config.llm.model).toBe('qwen2.5:1.5b');
        expect(config.logLevel).toBe('debug');
        expect(config.inspection.csvPath).toBe(path.resolve('/data/run.csv'));
        expect(config.statusApi.port).toBe(8080);
        expect(config.drone.uri).toBe('radio://0/90/2M/E7E7E7E7E8');
    });

    it('rejects an unknown log level from the environment', () => {
        expect(() => resolveConfig(RAW, { LOG_LEVEL: 'loud' }, ROOT)).toThrow(ConfigError);
        expect(() => resolveConfig(RAW, { LOG_LEVEL: 'loud' }, ROOT)).toThrow(/logLevel/);
    });

    it('rejects a port that is not a whole number', () => {
        expect(() => resolveConfig(RAW, { STATUS_API_PORT: 'eighty' }, ROOT)).toThrow(/statusApi\.port/);
        expect(() => resolveConfig(RAW, { STATUS_API_PORT: '80.5' }, ROOT)).toThrow(/statusApi\.port/);
    });

    it('treats empty overrides as unset', () => {
        const config = resolveConfig(RAW, { LOG_LEVEL: '', STATUS_API_PORT: ' ' }, ROOT);

        expect(config.logLevel).toBe('info');
        expect(config.statusApi.port).toBeNull();
    });

    it('rejects a file without a model', () => {
        const raw = { ...RAW, llm: { host: 'http://127.0.0.1:11434', model: '' } };
        expect(() => resolveConfig(raw, {}, ROOT)).toThrow(ConfigError);
        expect(() => resolveConfig(raw, {}, ROOT)).toThrow(/llm\.model/);
    });

    it('rejects an override that breaks validation', () => {
        expect(() => resolveConfig(RAW, { OLLAMA_HOST: 'not a url' }, ROOT)).toThrow('Invalid environment override');
    });
});

describe('loadConfig', () => {
    it('reads the bundled default config', () => {
        const config = loadConfig(DEFAULT_CONFIG_PATH, {});

        expect(config.llm.model).toBe('llama3.2:3b');
        expect(config.drone.uri).toBe('radio://0/80/2M/E7E7E7E7E7');
    });

    it('fails on a missing file', () => {
        expect(() => loadConfig('/nonexistent/config.json', {})).toThrow('Config file not found');
    });
});
