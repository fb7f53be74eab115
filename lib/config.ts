import { isLogLevel } from './interfaces';
import { AppConfig } from './models';

const DEFAULT_AUTH_PATH = '/auth/login';
const DEFAULT_TIMEOUT_MS = 30000;

type Env = Record<string, string | undefined>;

const required = (env: Env, name: string): string => {
    const value = env[name];
    if (!value) throw new Error(`Missing required environment variable '${name}'`);
    return value;
};

const optional = (env: Env, name: string): string | undefined => env[name] || undefined;

function parseTimeout(raw: string | undefined): number {
    if (raw === undefined) return DEFAULT_TIMEOUT_MS;
    const timeout = Number(raw);
    if (!Number.isInteger(timeout) || timeout <= 0) {
        throw new Error(`Invalid API_TIMEOUT_MS '${raw}': expected a positive integer`);
    }
    return timeout;
}

/**
 * Reads shell settings from environment variables
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const logLevel = optional(env, 'LOG_LEVEL') ?? 'info';
    if (!isLogLevel(logLevel)) {
        throw new Error(`Invalid LOG_LEVEL '${logLevel}': expected debug, info, warn or error`);
    }

    return {
        baseUrl: required(env, 'API_BASE_URL'),
        authPath: optional(env, 'API_AUTH_PATH') ?? DEFAULT_AUTH_PATH,
        clientId: optional(env, 'API_CLIENT_ID'),
        clientSecret: optional(env, 'API_CLIENT_SECRET'),
        timeout: parseTimeout(optional(env, 'API_TIMEOUT_MS')),
        logLevel,
    };
}
