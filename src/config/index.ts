import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;

    // Storage locations
    uploadDir: string;
    downloadDir: string;
    workDir: string;
    jobStorePath: string;

    // Redis (queue + API keys); in-process adapters when absent
    redisUrl?: string;

    // Workers
    workerConcurrency: number;
    queuePollIntervalMs: number;
    maxStageAttempts: number;
    stageRetryInitialBackoffMs: number;
    stageRetryMaxBackoffMs: number;
    stageTimeoutMs: number;
    stalledJobTimeoutMs: number;

    // Timeline
    defaultSceneDurationSeconds: number;
    timePrecisionDigits: number;

    // Remote media
    remoteFetchMaxBytes: number;
    remoteFetchTimeoutMs: number;
    allowedRemoteDomains: string[];

    // Static API keys (fallback when the key store is empty)
    apiKeys: string[];
}

export const DEVELOPMENT_API_KEY = 'dev-api-key-12345';

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Proactive cleanup: trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarList(key: string): string[] {
    return getEnvVar(key, '')
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    const environment = getEnvVar('NODE_ENV', 'development');
    const apiKeys = getEnvVarList('API_KEYS');

    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment,

        // Storage locations
        uploadDir: getEnvVar('UPLOAD_DIR', './uploads'),
        downloadDir: getEnvVar('DOWNLOAD_DIR', './uploads/remote'),
        workDir: getEnvVar('WORK_DIR', './temp'),
        jobStorePath: getEnvVar('JOB_STORE_PATH', './data/jobs.json'),

        // Redis
        redisUrl: process.env.REDIS_URL ? getEnvVar('REDIS_URL') : undefined,

        // Workers
        workerConcurrency: getEnvVarNumber('WORKER_CONCURRENCY', 2),
        queuePollIntervalMs: getEnvVarNumber('QUEUE_POLL_INTERVAL_MS', 1000),
        maxStageAttempts: getEnvVarNumber('MAX_STAGE_ATTEMPTS', 3),
        stageRetryInitialBackoffMs: getEnvVarNumber('STAGE_RETRY_INITIAL_BACKOFF_MS', 1000),
        stageRetryMaxBackoffMs: getEnvVarNumber('STAGE_RETRY_MAX_BACKOFF_MS', 30000),
        stageTimeoutMs: getEnvVarNumber('STAGE_TIMEOUT_MS', 600000),
        stalledJobTimeoutMs: getEnvVarNumber('STALLED_JOB_TIMEOUT_MS', 1800000),

        // Timeline
        defaultSceneDurationSeconds: getEnvVarNumber('DEFAULT_SCENE_DURATION_SECONDS', 5),
        timePrecisionDigits: getEnvVarNumber('TIME_PRECISION_DIGITS', 3),

        // Remote media
        remoteFetchMaxBytes: getEnvVarNumber('REMOTE_FETCH_MAX_BYTES', 100 * 1024 * 1024),
        remoteFetchTimeoutMs: getEnvVarNumber('REMOTE_FETCH_TIMEOUT_MS', 30000),
        allowedRemoteDomains: getEnvVarList('ALLOWED_REMOTE_DOMAINS').map((domain) => domain.toLowerCase()),

        // Development falls back to a well-known key so the API is usable out of the box
        apiKeys: apiKeys.length === 0 && environment === 'development' ? [DEVELOPMENT_API_KEY] : apiKeys,
    };
}

/**
 * Validates ranges and required values. Returns one message per problem.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!Number.isInteger(config.workerConcurrency) || config.workerConcurrency < 1) {
        errors.push('WORKER_CONCURRENCY must be a positive integer');
    }
    if (!Number.isInteger(config.maxStageAttempts) || config.maxStageAttempts < 1) {
        errors.push('MAX_STAGE_ATTEMPTS must be a positive integer');
    }
    if (config.stageRetryInitialBackoffMs < 0 || config.stageRetryMaxBackoffMs < config.stageRetryInitialBackoffMs) {
        errors.push('STAGE_RETRY_MAX_BACKOFF_MS must be at least STAGE_RETRY_INITIAL_BACKOFF_MS');
    }
    if (config.stalledJobTimeoutMs <= config.stageTimeoutMs + config.stageRetryMaxBackoffMs) {
        // A stage still inside its timeout must never look stalled
        errors.push('STALLED_JOB_TIMEOUT_MS must exceed STAGE_TIMEOUT_MS plus STAGE_RETRY_MAX_BACKOFF_MS');
    }
    if (config.defaultSceneDurationSeconds <= 0) {
        errors.push('DEFAULT_SCENE_DURATION_SECONDS must be positive');
    }
    if (!Number.isInteger(config.timePrecisionDigits) || config.timePrecisionDigits < 0 || config.timePrecisionDigits > 6) {
        errors.push('TIME_PRECISION_DIGITS must be an integer between 0 and 6');
    }
    if (config.remoteFetchMaxBytes <= 0) {
        errors.push('REMOTE_FETCH_MAX_BYTES must be positive');
    }
    if (config.apiKeys.length === 0 && !config.redisUrl) {
        errors.push('API_KEYS is required outside development when no REDIS_URL key store is configured');
    }
    if (config.apiKeys.some((key) => key.length < 10)) {
        errors.push('Every API key must be at least 10 characters long');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
