import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import type { DispatchSettings } from '../types/dispatch.js';

export interface RelaycastConfig {
    runtime: {
        apiSecret: string;
        apiPort: number;
        dbPath: string;
        reportDir: string;
        workspaceFile: string;
    };
    dispatch: {
        /** Seconds. */
        messageDelayMin: number;
        /** Seconds. */
        messageDelayMax: number;
        /** Seconds. */
        accountSwitchDelay: number;
        messagesPerAccount: number;
        maxConcurrentTasks: number;
    };
}

export const DEFAULT_CONFIG: RelaycastConfig = {
    runtime: {
        apiSecret: '',
        apiPort: 3100,
        dbPath: 'memory/relaycast.db',
        reportDir: 'reports',
        workspaceFile: 'data/workspace.json',
    },
    dispatch: {
        messageDelayMin: 5,
        messageDelayMax: 15,
        accountSwitchDelay: 30,
        messagesPerAccount: 50,
        maxConcurrentTasks: 3,
    },
};

const DEFAULT_CONFIG_FILE = 'relaycast.json';

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.RELAYCAST_CONFIG_PATH) {
        return path.resolve(process.env.RELAYCAST_CONFIG_PATH);
    }
    return path.resolve(DEFAULT_CONFIG_FILE);
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickString(source: Record<string, unknown>, key: string, fallback: string): string {
    const value = source[key];
    return typeof value === 'string' ? value : fallback;
}

function pickNumber(source: Record<string, unknown>, key: string, fallback: number): number {
    const value = source[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function mergeWithDefaults(loaded: unknown): RelaycastConfig {
    const root = isRecord(loaded) ? loaded : {};
    const runtime = isRecord(root.runtime) ? root.runtime : {};
    const dispatch = isRecord(root.dispatch) ? root.dispatch : {};
    const defaults = DEFAULT_CONFIG;

    return {
        runtime: {
            apiSecret: pickString(runtime, 'apiSecret', defaults.runtime.apiSecret),
            apiPort: pickNumber(runtime, 'apiPort', defaults.runtime.apiPort),
            dbPath: pickString(runtime, 'dbPath', defaults.runtime.dbPath),
            reportDir: pickString(runtime, 'reportDir', defaults.runtime.reportDir),
            workspaceFile: pickString(runtime, 'workspaceFile', defaults.runtime.workspaceFile),
        },
        dispatch: {
            messageDelayMin: pickNumber(dispatch, 'messageDelayMin', defaults.dispatch.messageDelayMin),
            messageDelayMax: pickNumber(dispatch, 'messageDelayMax', defaults.dispatch.messageDelayMax),
            accountSwitchDelay: pickNumber(dispatch, 'accountSwitchDelay', defaults.dispatch.accountSwitchDelay),
            messagesPerAccount: pickNumber(dispatch, 'messagesPerAccount', defaults.dispatch.messagesPerAccount),
            maxConcurrentTasks: pickNumber(dispatch, 'maxConcurrentTasks', defaults.dispatch.maxConcurrentTasks),
        },
    };
}

// ── Flat key lookup ─────────────────────────────────────────────────────────

let cachedConfig: RelaycastConfig | null = null;

export function clearConfigCacheForTests(): void {
    cachedConfig = null;
}

export function reloadConfigSync(): RelaycastConfig {
    const configPath = getConfigPath();
    try {
        if (existsSync(configPath)) {
            cachedConfig = mergeWithDefaults(JSON.parse(readFileSync(configPath, 'utf8')));
            return cachedConfig;
        }
    } catch (error) {
        console.error(`[Relaycast Config] Failed to parse JSON config at ${configPath}:`, describe(error));
    }
    cachedConfig = mergeWithDefaults({});
    return cachedConfig;
}

const ENV_KEYS = [
    'API_PORT',
    'API_SECRET',
    'RELAYCAST_DB_PATH',
    'RELAYCAST_REPORT_DIR',
    'RELAYCAST_WORKSPACE_FILE',
    'MESSAGE_DELAY_MIN',
    'MESSAGE_DELAY_MAX',
    'ACCOUNT_SWITCH_DELAY',
    'MESSAGES_PER_ACCOUNT',
    'MAX_CONCURRENT_TASKS',
] as const;

export type ConfigKey = (typeof ENV_KEYS)[number];

function jsonValueFor(config: RelaycastConfig, key: ConfigKey): string | number {
    switch (key) {
        case 'API_PORT': return config.runtime.apiPort;
        case 'API_SECRET': return config.runtime.apiSecret;
        case 'RELAYCAST_DB_PATH': return config.runtime.dbPath;
        case 'RELAYCAST_REPORT_DIR': return config.runtime.reportDir;
        case 'RELAYCAST_WORKSPACE_FILE': return config.runtime.workspaceFile;
        case 'MESSAGE_DELAY_MIN': return config.dispatch.messageDelayMin;
        case 'MESSAGE_DELAY_MAX': return config.dispatch.messageDelayMax;
        case 'ACCOUNT_SWITCH_DELAY': return config.dispatch.accountSwitchDelay;
        case 'MESSAGES_PER_ACCOUNT': return config.dispatch.messagesPerAccount;
        case 'MAX_CONCURRENT_TASKS': return config.dispatch.maxConcurrentTasks;
    }
}

/**
 * Value of a configuration key: a non-empty environment variable wins over
 * `relaycast.json`, which is merged over the defaults.
 */
export function getConfigValue(key: ConfigKey): string | undefined {
    const config = cachedConfig ?? reloadConfigSync();

    const envValue = process.env[key];
    if (envValue !== undefined && envValue.trim() !== '') {
        return envValue;
    }

    const jsonValue = String(jsonValueFor(config, key));
    return jsonValue.trim() !== '' ? jsonValue : undefined;
}

function readNumber(key: ConfigKey): number {
    const raw = getConfigValue(key);
    const value = raw === undefined ? Number.NaN : Number(raw);
    if (!Number.isFinite(value) || value < 0) {
        throw new Error(`[Relaycast Config] ${key} must be a non-negative number (got '${raw ?? ''}').`);
    }
    return value;
}

/** Pacing and rotation limits, converted from seconds to milliseconds. */
export function loadDispatchSettings(): DispatchSettings {
    const minDelay = readNumber('MESSAGE_DELAY_MIN');
    const maxDelay = readNumber('MESSAGE_DELAY_MAX');
    const switchDelay = readNumber('ACCOUNT_SWITCH_DELAY');
    const perIdentity = readNumber('MESSAGES_PER_ACCOUNT');

    if (minDelay > maxDelay) {
        throw new Error(`[Relaycast Config] MESSAGE_DELAY_MIN (${minDelay}) exceeds MESSAGE_DELAY_MAX (${maxDelay}).`);
    }
    if (!Number.isInteger(perIdentity) || perIdentity < 1) {
        throw new Error(`[Relaycast Config] MESSAGES_PER_ACCOUNT must be a positive integer (got ${perIdentity}).`);
    }

    return {
        minDelayMs: Math.round(minDelay * 1000),
        maxDelayMs: Math.round(maxDelay * 1000),
        identitySwitchDelayMs: Math.round(switchDelay * 1000),
        messagesPerIdentity: perIdentity,
    };
}

export function loadMaxConcurrentJobs(): number {
    const value = readNumber('MAX_CONCURRENT_TASKS');
    if (!Number.isInteger(value) || value < 1) {
        throw new Error(`[Relaycast Config] MAX_CONCURRENT_TASKS must be a positive integer (got ${value}).`);
    }
    return value;
}
