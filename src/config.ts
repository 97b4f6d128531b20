// ========================================
// Smart Inspection - Configuration
// ========================================

import path from 'path';
import fs from 'fs-extra';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// src/ and dist/ both sit one level below the project root
export const PROJECT_ROOT = path.resolve(__dirname, '..');

export const DEFAULT_CONFIG_PATH = path.join(PROJECT_ROOT, 'config', 'default-config.json');

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const ConfigSchema = z.object({
    logLevel: LogLevelSchema.default('info'),
    llm: z.object({
        host: z.string().url(),
        model: z.string().min(1),
        timeoutMs: z.number().int().positive().default(120_000),
    }),
    drone: z.object({
        uri: z.string().min(1),
        flyingHeightM: z.number().positive().default(0.5),
    }),
    inspection: z.object({
        samplingIntervalMs: z.number().int().positive().default(300),
        holdMs: z.number().int().nonnegative().default(1000),
        csvPath: z.string().min(1),
        datasetCsvPath: z.string().min(1),
    }),
    signal: z.object({
        durationMs: z.number().int().nonnegative().default(5000),
    }),
    motion: z.object({
        timeoutSeconds: z.number().positive().default(5),
    }),
    statusApi: z.object({
        port: z.number().int().min(0).max(65535).nullable().default(null),
    }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

// Non-numeric text is passed through so the schema reports it
function numberFromEnv(value: string | undefined): number | string | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    const n = Number(value);
    return Number.isFinite(n) ? n : value;
}

/**
 * Environment variables win over the JSON file and go through the same
 * schema. Relative CSV paths resolve against the project root.
 */
export function resolveConfig(raw: unknown, env: Env, root: string = PROJECT_ROOT): AppConfig {
    const parsed = ConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(`Invalid configuration: ${parsed.error.issues
            .map((i) => `${i.path.join('.')}: ${i.message}`)
            .join('; ')}`);
    }
    const base = parsed.data;

    const apiPort = numberFromEnv(env.STATUS_API_PORT);

    // Validated again below, so a bad override fails like a bad file value
    const merged = {
        ...base,
        logLevel: env.LOG_LEVEL ? env.LOG_LEVEL.toLowerCase() : base.logLevel,
        llm: {
            ...base.llm,
            host: env.OLLAMA_HOST || base.llm.host,
            model: env.SLM_MODEL || base.llm.model,
        },
        drone: {
            ...base.drone,
            uri: env.DRONE_URI || base.drone.uri,
        },
        inspection: {
            ...base.inspection,
            csvPath: path.resolve(root, env.INSPECTION_CSV || base.inspection.csvPath),
            datasetCsvPath: path.resolve(root, env.DATASET_CSV || base.inspection.datasetCsvPath),
        },
        statusApi: {
            port: apiPort ?? base.statusApi.port,
        },
    };

    const checked = ConfigSchema.safeParse(merged);
    if (!checked.success) {
        throw new ConfigError(`Invalid environment override: ${checked.error.issues
            .map((i) => `${i.path.join('.')}: ${i.message}`)
            .join('; ')}`);
    }
    return checked.data;
}

export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH, env: Env = process.env): AppConfig {
    if (!fs.pathExistsSync(configPath)) {
        throw new ConfigError(`Config file not found: ${configPath}`);
    }
    const raw: unknown = fs.readJSONSync(configPath);
    return resolveConfig(raw, env);
}
