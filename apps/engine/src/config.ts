import os from 'os';
import path from 'path';
import { RetryPolicy } from './db/job.entity';
import { ConfigError } from './errors/engine.errors';

export type StoreKind = 'file' | 'postgres' | 'memory';

export interface EngineConfig {
    port: number;
    maxWorkers: number;
    maxQueueSize: number;
    pollIntervalMs: number;
    dataDir: string;
    store: StoreKind;
    databaseUrl: string | null;
    defaultTimeoutMs: number;
    retryPolicy: RetryPolicy;
    /** Modules that register tasks at startup */
    taskModules: string[];
}

export function defaultWorkerCount(): number {
    return Math.max(2, os.cpus().length - 1);
}

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = parseInt(raw, 10);
    if (Number.isNaN(value) || String(value) !== raw.trim()) {
        throw new ConfigError(`${key} must be an integer, got "${raw}"`);
    }
    if (value < min) {
        throw new ConfigError(`${key} must be at least ${min}, got ${value}`);
    }
    return value;
}

function readFloat(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number, max: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new ConfigError(`${key} must be a number, got "${raw}"`);
    }
    if (value < min || value > max) {
        throw new ConfigError(`${key} must be between ${min} and ${max}, got ${value}`);
    }
    return value;
}

function readStore(env: NodeJS.ProcessEnv): StoreKind {
    const raw = (env.JOB_STORE || 'file').trim().toLowerCase();
    if (raw === 'file' || raw === 'postgres' || raw === 'memory') return raw;
    throw new ConfigError(`JOB_STORE must be one of file, postgres, memory, got "${env.JOB_STORE}"`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const store = readStore(env);
    const databaseUrl = env.DATABASE_URL?.trim() || null;
    if (store === 'postgres' && !databaseUrl) {
        throw new ConfigError('DATABASE_URL is required when JOB_STORE=postgres');
    }

    const retryPolicy: RetryPolicy = {
        maxAttempts: readInt(env, 'RETRY_MAX_ATTEMPTS', 3, 1),
        baseDelayMs: readInt(env, 'RETRY_BASE_DELAY_MS', 1000, 0),
        multiplier: readFloat(env, 'RETRY_MULTIPLIER', 4, 1, 100),
        maxDelayMs: readInt(env, 'RETRY_MAX_DELAY_MS', 60_000, 0),
        jitter: readFloat(env, 'RETRY_JITTER', 0, 0, 1),
    };

    return {
        port: readInt(env, 'PORT', 50051, 0),
        maxWorkers: readInt(env, 'MAX_WORKERS', defaultWorkerCount(), 1),
        maxQueueSize: readInt(env, 'MAX_QUEUE_SIZE', 1000, 1),
        pollIntervalMs: readInt(env, 'POLL_INTERVAL_MS', 100, 1),
        dataDir: path.resolve(env.DATA_DIR || './data'),
        store,
        databaseUrl,
        defaultTimeoutMs: readInt(env, 'JOB_TIMEOUT_MS', 0, 0),
        retryPolicy,
        taskModules: (env.BATCHLINE_TASKS || '')
            .split(',')
            .map(entry => entry.trim())
            .filter(entry => entry.length > 0),
    };
}
