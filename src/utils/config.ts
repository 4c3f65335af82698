import dotenv from 'dotenv';

dotenv.config();

interface Config {
    port: number;
    nodeEnv: string;
    org: {
        name: string;
        timezone: string;
    };
    backend: {
        url: string;
        apiToken?: string;
        email?: string;
        password?: string;
        timeoutMs: number;
        cacheSeconds: number;
    };
    admin: {
        apiToken?: string;
    };
    devices: {
        maxPendingCommands: number;
        offlineMinutes: number;
        statusInterval: number;
    };
    ingest: {
        batchTimeoutMs: number;
        dedupeKeyLimit: number;
    };
    diagnostics: {
        recentLogLimit: number;
        debugRequestLimit: number;
    };
    logging: {
        level: string;
        file: string;
    };
    queue: {
        dir: string;
        retryInterval: number;
        maxRetries: number;
    };
}

function getEnvVar(key: string, defaultValue?: string): string {
    const value = process.env[key] || defaultValue;
    if (!value) {
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return value;
}

function getEnvVarOptional(key: string, defaultValue?: string): string | undefined {
    return process.env[key] || defaultValue;
}

function getIntEnvVar(key: string, defaultValue: string): number {
    const value = parseInt(getEnvVar(key, defaultValue), 10);
    if (isNaN(value)) {
        throw new Error(`Environment variable ${key} must be an integer`);
    }
    return value;
}

const config: Config = {
    port: getIntEnvVar('PORT', '8000'),
    nodeEnv: getEnvVar('NODE_ENV', 'development'),
    org: {
        name: getEnvVar('ORG_NAME', 'My Company'),
        timezone: getEnvVar('ORG_TIMEZONE', 'UTC'),
    },
    backend: {
        url: getEnvVar('BACKEND_URL', 'http://localhost:1337'),
        apiToken: getEnvVarOptional('BACKEND_API_TOKEN'),
        email: getEnvVarOptional('BACKEND_EMAIL'),
        password: getEnvVarOptional('BACKEND_PASSWORD'),
        timeoutMs: getIntEnvVar('BACKEND_TIMEOUT_MS', '10000'),
        cacheSeconds: getIntEnvVar('BACKEND_CACHE_SECONDS', '30'),
    },
    admin: {
        apiToken: getEnvVarOptional('ADMIN_API_TOKEN'),
    },
    devices: {
        maxPendingCommands: getIntEnvVar('MAX_PENDING_COMMANDS', '1000'),
        offlineMinutes: getIntEnvVar('DEVICE_OFFLINE_MINUTES', '5'),
        statusInterval: getIntEnvVar('DEVICE_STATUS_INTERVAL', '1'),
    },
    ingest: {
        batchTimeoutMs: getIntEnvVar('INGEST_BATCH_TIMEOUT_MS', '5000'),
        dedupeKeyLimit: getIntEnvVar('DEDUPE_KEY_LIMIT', '10000'),
    },
    diagnostics: {
        recentLogLimit: getIntEnvVar('RECENT_LOG_LIMIT', '500'),
        debugRequestLimit: getIntEnvVar('DEBUG_REQUEST_LIMIT', '200'),
    },
    logging: {
        level: getEnvVar('LOG_LEVEL', 'info'),
        file: getEnvVar('LOG_FILE', './logs/bridge.log'),
    },
    queue: {
        dir: getEnvVar('QUEUE_DIR', './data/queue'),
        retryInterval: getIntEnvVar('QUEUE_RETRY_INTERVAL', '2'),
        maxRetries: getIntEnvVar('QUEUE_MAX_RETRIES', '10'),
    },
};

// Validate configuration
if (Boolean(config.backend.email) !== Boolean(config.backend.password)) {
    throw new Error('BACKEND_EMAIL and BACKEND_PASSWORD must be provided together');
}

export default config;
